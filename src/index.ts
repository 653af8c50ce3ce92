// Library exports

export { AvailabilityParser } from './lib/availability-parser.js';
export type { ListingSource } from './lib/availability-parser.js';
export { escapeCsvCell, toCsv, writeCsv } from './lib/csv.js';
export { BOOKING_MARKUP } from './lib/listing/booking-markup.js';
export { mergeBreakfastSignals, readBreakfastIcon, readMealsText } from './lib/listing/breakfast.js';
export { CheerioListingTree, loadListingFile, parseListing } from './lib/listing/cheerio-tree.js';
export {
  extractRoomRecords,
  parseOccupancy,
  parseOptionPrice,
  resolveRoomTypes,
} from './lib/listing/room-extractor.js';
export type { ExtractOptions } from './lib/listing/room-extractor.js';
export type { ListingNode, ListingTree } from './lib/listing/tree.js';
export {
  MEALS_NOT_SPECIFIED,
  NO_MEALS_INCLUDED,
  ROOM_RECORD_FIELDS,
  SENTINEL,
} from './lib/roomtable-types.js';
export type {
  AvailabilityTable,
  BreakfastFlag,
  Result,
  RoomRecord,
  RoomRecordField,
  RoomtableConfig,
} from './lib/roomtable-types.js';
