import { readFileSync } from 'node:fs';
import { describe, expect, it } from 'vitest';
import { BOOKING_MARKUP } from '../src/lib/listing/booking-markup.js';
import { parseListing } from '../src/lib/listing/cheerio-tree.js';
import {
  extractRoomRecords,
  parseOccupancy,
  parseOptionPrice,
  resolveRoomTypes,
} from '../src/lib/listing/room-extractor.js';
import type { ListingNode, ListingTree } from '../src/lib/listing/tree.js';
import { ROOM_RECORD_FIELDS, type RoomRecord } from '../src/lib/roomtable-types.js';

const fixtureHtml = readFileSync(new URL('./fixtures/hotel-listing.html', import.meta.url), 'utf-8');

interface RowMarkup {
  label?: string;
  occupancy?: string;
  options?: string[];
  iconFill?: string;
  panel?: string;
}

function row(markup: RowMarkup): string {
  const label = markup.label
    ? `<a class="hprt-roomtype-link"><span class="hprt-roomtype-icon-link">${markup.label}</span></a>`
    : '';
  const occupancy = markup.occupancy
    ? `<span class="hprt-occupancy-occupancy-info">${markup.occupancy}</span>`
    : '';
  const select = markup.options
    ? `<select class="hprt-nos-select">${markup.options.map((text) => `<option>${text}</option>`).join('')}</select>`
    : '';
  const icon = markup.iconFill ? `<svg class="bk-icon -streamline-food_coffee" fill="${markup.iconFill}"></svg>` : '';
  return `<tr class="js-rt-block-row e2e-hprt-table-row"><td>${label}${occupancy}${icon}${select}</td></tr>${markup.panel ?? ''}`;
}

function page(...rows: string[]): ListingTree {
  return parseListing(`<html><body><table><tbody>${rows.join('\n')}</tbody></table></body></html>`);
}

function mealsPanel(id: string, mealsText: string): string {
  return `<template id="policyModal_${id}"><div><h3>Meals</h3><div class="bui-list__description">${mealsText}</div></div></template>`;
}

describe('extractRoomRecords on a saved listing', () => {
  const records = extractRoomRecords(parseListing(fixtureHtml));

  it('returns one record per table row in page order', () => {
    expect(records).toHaveLength(4);
  });

  it('extracts a fully populated row', () => {
    expect(records[0]).toEqual({
      room_type: 'Deluxe King Room',
      description: 'Deluxe King Room 1 king bed',
      price: '$ 1,250',
      cancellation_policy: 'Free cancellation before August 5',
      max_occupancy: '2',
      available_units: 2,
      price_per_unit: '2500',
      breakfast_included: 'Yes',
      meals_included: 'Breakfast included in the price',
    } satisfies RoomRecord);
  });

  it('carries the room type into unlabelled rows and falls back for missing fields', () => {
    expect(records[1]).toEqual({
      room_type: 'Deluxe King Room',
      description: 'N/A',
      price: '$ 1,100',
      cancellation_policy: 'N/A',
      max_occupancy: '1',
      available_units: 1,
      price_per_unit: '1100',
      breakfast_included: 'No',
      meals_included: 'No meals included',
    } satisfies RoomRecord);
  });

  it('reads breakfast from the panel when the icon is missing', () => {
    expect(records[2]).toEqual({
      room_type: 'Family Suite',
      description: 'Family Suite',
      price: '$ 3,000',
      cancellation_policy: 'Non-refundable',
      max_occupancy: '4 adults',
      available_units: 0,
      price_per_unit: 'N/A',
      breakfast_included: 'Yes',
      meals_included: 'Breakfast & dinner included',
    } satisfies RoomRecord);
  });

  it('degrades a bare row to placeholders', () => {
    expect(records[3]).toEqual({
      room_type: 'Family Suite',
      description: 'N/A',
      price: 'N/A',
      cancellation_policy: 'N/A',
      max_occupancy: 'N/A',
      available_units: 0,
      price_per_unit: 'N/A',
      breakfast_included: 'No',
      meals_included: 'Not specified',
    } satisfies RoomRecord);
  });

  it('keeps the same field order on every record', () => {
    for (const record of records) {
      expect(Object.keys(record)).toEqual([...ROOM_RECORD_FIELDS]);
    }
  });

  it('never reports a per-unit price without available units', () => {
    for (const record of records.filter((r) => r.available_units === 0)) {
      expect(record.price_per_unit).toBe('N/A');
    }
  });

  it('returns identical records when run twice on the same tree', () => {
    const tree = parseListing(fixtureHtml);
    expect(extractRoomRecords(tree)).toEqual(extractRoomRecords(tree));
  });
});

describe('extractRoomRecords field rules', () => {
  it('counts units and reads the last option price', () => {
    const [record] = extractRoomRecords(page(row({ label: 'Twin Room', options: ['0', '1 ($100)', '2 ($6,584)'] })));
    expect(record.available_units).toBe(2);
    expect(record.price_per_unit).toBe('6584');
  });

  it('leaves the per-unit price empty when the last option has no currency', () => {
    const [record] = extractRoomRecords(page(row({ label: 'Twin Room', options: ['0', '1 room', '2 rooms'] })));
    expect(record.available_units).toBe(2);
    expect(record.price_per_unit).toBe('N/A');
  });

  it('keeps the text after the last colon of the occupancy', () => {
    const [record] = extractRoomRecords(page(row({ label: 'Twin Room', occupancy: 'Occupancy: 2 adults' })));
    expect(record.max_occupancy).toBe('2 adults');
  });

  it('uses the whole occupancy text when it has no colon', () => {
    const [record] = extractRoomRecords(page(row({ label: 'Twin Room', occupancy: '  3 guests ' })));
    expect(record.max_occupancy).toBe('3 guests');
  });

  it('inherits the previous label', () => {
    const records = extractRoomRecords(page(row({ label: 'Deluxe Suite' }), row({})));
    expect(records.map((r) => r.room_type)).toEqual(['Deluxe Suite', 'Deluxe Suite']);
  });

  it('gives leading unlabelled rows the placeholder by default', () => {
    const records = extractRoomRecords(page(row({}), row({ label: 'Studio' }), row({})));
    expect(records.map((r) => r.room_type)).toEqual(['N/A', 'Studio', 'Studio']);
  });

  it('gives leading unlabelled rows the configured initial room type', () => {
    const records = extractRoomRecords(page(row({}), row({ label: 'Studio' })), {
      initialRoomType: 'Unlabelled room',
    });
    expect(records.map((r) => r.room_type)).toEqual(['Unlabelled room', 'Studio']);
  });

  it('upgrades breakfast from the panel when the icon is not green', () => {
    const [record] = extractRoomRecords(
      page(row({ label: 'Twin Room', iconFill: '#6b6b6b', panel: mealsPanel('1', 'Breakfast included for 2') })),
    );
    expect(record.breakfast_included).toBe('Yes');
    expect(record.meals_included).toBe('Breakfast included for 2');
  });

  it('keeps a green icon even when the panel mentions no breakfast', () => {
    const [record] = extractRoomRecords(
      page(row({ label: 'Twin Room', iconFill: '#008009', panel: mealsPanel('1', 'Dinner available on request') })),
    );
    expect(record.breakfast_included).toBe('Yes');
    expect(record.meals_included).toBe('Dinner available on request');
  });

  it('reports an unspecified meal when the Meals heading has no description after it', () => {
    const panel = '<template id="policyModal_9"><div><h3>Meals</h3></div></template>';
    const [record] = extractRoomRecords(page(row({ label: 'Twin Room', panel })));
    expect(record.meals_included).toBe('Not specified');
    expect(record.breakfast_included).toBe('No');
  });

  it('ignores templates that are not policy panels', () => {
    const decoy = '<template id="galleryModal_1"><h3>Meals</h3><div class="bui-list__description">Breakfast</div></template>';
    const [record] = extractRoomRecords(page(row({ label: 'Twin Room', panel: decoy })));
    expect(record.meals_included).toBe('Not specified');
  });

  it('returns no records for a page without room rows', () => {
    expect(extractRoomRecords(parseListing('<html><body><p>Sold out</p></body></html>'))).toEqual([]);
  });
});

describe('extractRoomRecords error isolation', () => {
  function brokenRow(failingSelector: string): ListingNode {
    return {
      findFirst(selector) {
        if (selector === failingSelector) throw new Error('markup changed');
        return null;
      },
      findAllWithin: () => [],
      findFollowing: () => null,
      text: () => '',
      attr: () => undefined,
    };
  }

  it('falls back on the failing field only and reports it', () => {
    const warnings: string[] = [];
    const tree: ListingTree = { selectAll: () => [brokenRow(BOOKING_MARKUP.price), brokenRow('none')] };

    const records = extractRoomRecords(tree, { onWarning: (message) => warnings.push(message) });

    expect(records).toHaveLength(2);
    expect(records[0].price).toBe('N/A');
    expect(records[0].breakfast_included).toBe('No');
    expect(warnings).toEqual(['Row 1: price unreadable (markup changed)']);
  });

  it('falls back to zero units when the selector cannot be read', () => {
    const warnings: string[] = [];
    const tree: ListingTree = { selectAll: () => [brokenRow(BOOKING_MARKUP.quantitySelect)] };

    const [record] = extractRoomRecords(tree, { onWarning: (message) => warnings.push(message) });

    expect(record.available_units).toBe(0);
    expect(record.price_per_unit).toBe('N/A');
    expect(warnings).toEqual(['Row 1: available_units unreadable (markup changed)']);
  });
});

describe('resolveRoomTypes', () => {
  it('carries the last label forward', () => {
    expect(resolveRoomTypes(['Double', 'N/A', '', 'Suite', 'N/A'])).toEqual([
      'Double',
      'Double',
      'Double',
      'Suite',
      'Suite',
    ]);
  });

  it('starts from the given initial value', () => {
    expect(resolveRoomTypes(['N/A', 'Single'], 'Unknown')).toEqual(['Unknown', 'Single']);
  });
});

describe('parseOptionPrice', () => {
  it('strips thousands separators', () => {
    expect(parseOptionPrice('2 ($6,584)')).toBe('6584');
  });

  it('keeps decimals', () => {
    expect(parseOptionPrice('3 ($1,234.50)')).toBe('1234.50');
  });

  it('returns the placeholder without a currency marker or amount', () => {
    expect(parseOptionPrice('2 rooms')).toBe('N/A');
    expect(parseOptionPrice('1 ($)')).toBe('N/A');
  });
});

describe('parseOccupancy', () => {
  it('takes the last segment', () => {
    expect(parseOccupancy('Max: guests: 3')).toBe('3');
  });

  it('keeps the placeholder as is', () => {
    expect(parseOccupancy('N/A')).toBe('N/A');
  });
});
