import {
  MEALS_NOT_SPECIFIED,
  type RoomRecord,
  type RoomRecordField,
  SENTINEL,
} from '../roomtable-types.js';
import { BOOKING_MARKUP } from './booking-markup.js';
import { mergeBreakfastSignals, readBreakfastIcon, readMealsText } from './breakfast.js';
import type { ListingNode, ListingTree } from './tree.js';

export interface ExtractOptions {
  /**
   * Room type given to rows that come before the first labelled row.
   * Defaults to the `N/A` placeholder.
   */
  initialRoomType?: string;
  /** Called once per field that failed and fell back to its default. */
  onWarning?: (message: string) => void;
}

interface UnitAvailability {
  availableUnits: number;
  pricePerUnit: string;
}

/**
 * Carry the last seen room type down to unlabelled rows.
 * Only the first row of each room group shows its label on the page.
 */
export function resolveRoomTypes(labels: readonly string[], initialRoomType: string = SENTINEL): string[] {
  return labels.reduce<{ current: string; resolved: string[] }>(
    (state, label) => {
      const current = label && label !== SENTINEL ? label : state.current;
      state.resolved.push(current);
      return { current, resolved: state.resolved };
    },
    { current: initialRoomType, resolved: [] },
  ).resolved;
}

/**
 * Extract the price from a quantity option like "2 ($6,584)"
 */
export function parseOptionPrice(optionText: string): string {
  const markerIndex = optionText.lastIndexOf(BOOKING_MARKUP.currencyMarker);
  if (markerIndex === -1) return SENTINEL;

  const amount = optionText
    .slice(markerIndex + BOOKING_MARKUP.currencyMarker.length)
    .split(')')[0]
    .replace(/,/g, '')
    .trim();
  return amount || SENTINEL;
}

/**
 * Last `:`-separated part of the occupancy text, e.g. "Occupancy: 2 adults" -> "2 adults"
 */
export function parseOccupancy(rawText: string): string {
  const parts = rawText.split(':');
  return parts[parts.length - 1].trim();
}

function readText(row: ListingNode, selector: string, separator = ''): string {
  return row.findFirst(selector)?.text(separator) ?? SENTINEL;
}

function readUnitAvailability(row: ListingNode): UnitAvailability {
  const select = row.findFirst(BOOKING_MARKUP.quantitySelect);
  if (!select) {
    return { availableUnits: 0, pricePerUnit: SENTINEL };
  }

  // The "0" option is always listed and is not a unit
  const options = select.findAllWithin(BOOKING_MARKUP.quantityOption);
  const availableUnits = Math.max(options.length - 1, 0);
  if (availableUnits === 0) {
    return { availableUnits, pricePerUnit: SENTINEL };
  }

  return { availableUnits, pricePerUnit: parseOptionPrice(options[options.length - 1].text()) };
}

class RowReader {
  constructor(
    private readonly row: ListingNode,
    private readonly index: number,
    private readonly warn: (message: string) => void,
  ) {}

  read<T>(field: RoomRecordField, fallback: T, reader: (row: ListingNode) => T): T {
    try {
      return reader(this.row);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.warn(`Row ${this.index + 1}: ${field} unreadable (${reason})`);
      return fallback;
    }
  }
}

function extractRow(reader: RowReader, roomType: string): RoomRecord {
  const units = reader.read<UnitAvailability>('available_units', { availableUnits: 0, pricePerUnit: SENTINEL }, (row) =>
    readUnitAvailability(row),
  );
  const iconIncluded = reader.read('breakfast_included', false, readBreakfastIcon);
  const mealsText = reader.read('meals_included', MEALS_NOT_SPECIFIED, readMealsText);

  return {
    room_type: roomType,
    description: reader.read('description', SENTINEL, (row) => readText(row, BOOKING_MARKUP.description, ' ')),
    price: reader.read('price', SENTINEL, (row) => readText(row, BOOKING_MARKUP.price)),
    cancellation_policy: reader.read('cancellation_policy', SENTINEL, (row) =>
      readText(row, BOOKING_MARKUP.cancellationPolicy),
    ),
    max_occupancy: reader.read('max_occupancy', SENTINEL, (row) =>
      parseOccupancy(readText(row, BOOKING_MARKUP.occupancy)),
    ),
    available_units: units.availableUnits,
    price_per_unit: units.pricePerUnit,
    breakfast_included: mergeBreakfastSignals(iconIncluded, mealsText),
    meals_included: mealsText,
  };
}

/**
 * Extract one record per room table row, in page order.
 *
 * Reads the tree without changing it. A field that cannot be read falls back
 * to its placeholder; the rest of the row and the remaining rows are still
 * extracted.
 */
export function extractRoomRecords(tree: ListingTree, options: ExtractOptions = {}): RoomRecord[] {
  const warn = options.onWarning ?? ((): void => undefined);
  const readers = tree.selectAll(BOOKING_MARKUP.row).map((row, index) => new RowReader(row, index, warn));

  const labels = readers.map((reader) =>
    reader.read('room_type', SENTINEL, (row) => readText(row, BOOKING_MARKUP.roomTypeLabel)),
  );
  const roomTypes = resolveRoomTypes(labels, options.initialRoomType);

  return readers.map((reader, index) => extractRow(reader, roomTypes[index]));
}
