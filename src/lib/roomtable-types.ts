// Result pattern for error handling
export type Result<T> = { success: true; data: T } | { success: false; error: string };

// Placeholder written when a field cannot be read from the page
export const SENTINEL = 'N/A';

export const MEALS_NOT_SPECIFIED = 'Not specified';
export const NO_MEALS_INCLUDED = 'No meals included';

export type BreakfastFlag = 'Yes' | 'No';

// Column order of every record, table and CSV export
export const ROOM_RECORD_FIELDS = [
  'room_type',
  'description',
  'price',
  'cancellation_policy',
  'max_occupancy',
  'available_units',
  'price_per_unit',
  'breakfast_included',
  'meals_included',
] as const;

export type RoomRecordField = (typeof ROOM_RECORD_FIELDS)[number];

// One bookable rate row of the availability table
export interface RoomRecord {
  room_type: string;
  description: string;
  price: string;
  cancellation_policy: string;
  max_occupancy: string;
  available_units: number;
  price_per_unit: string;
  breakfast_included: BreakfastFlag;
  meals_included: string;
}

export interface AvailabilityTable {
  source?: string;
  extractedAt: string;
  columns: readonly RoomRecordField[];
  rows: RoomRecord[];
}

// Configuration
export interface RoomtableConfig {
  csvOutput?: string;
  initialRoomType?: string;
  maxColumnWidth?: number;
}
