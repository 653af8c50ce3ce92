import { loadListingFile } from './listing/cheerio-tree.js';
import { type ExtractOptions, extractRoomRecords } from './listing/room-extractor.js';
import type { ListingTree } from './listing/tree.js';
import { type AvailabilityTable, ROOM_RECORD_FIELDS, type Result, type RoomRecord } from './roomtable-types.js';

export type ListingSource = { path: string } | { tree: ListingTree };

/**
 * Room availability parser for one saved hotel page.
 *
 * The page is read on the first extraction and reused afterwards. A parser
 * built from an already loaded tree never touches the file system.
 */
export class AvailabilityParser {
  private readonly path?: string;
  private tree: ListingTree | null;

  constructor(source: ListingSource) {
    if ('tree' in source) {
      this.tree = source.tree;
    } else {
      this.path = source.path;
      this.tree = null;
    }
  }

  get source(): string | undefined {
    return this.path;
  }

  load(): Result<ListingTree> {
    if (this.tree) {
      return { success: true, data: this.tree };
    }
    if (!this.path) {
      return { success: false, error: 'No listing path or tree given' };
    }

    const loaded = loadListingFile(this.path);
    if (loaded.success) {
      this.tree = loaded.data;
    }
    return loaded;
  }

  extractRooms(options: ExtractOptions = {}): Result<RoomRecord[]> {
    const loaded = this.load();
    if (!loaded.success) {
      return loaded;
    }
    return { success: true, data: extractRoomRecords(loaded.data, options) };
  }

  getAvailabilityTable(options: ExtractOptions = {}): Result<AvailabilityTable> {
    const rooms = this.extractRooms(options);
    if (!rooms.success) {
      return rooms;
    }
    return {
      success: true,
      data: {
        source: this.path,
        extractedAt: new Date().toISOString(),
        columns: ROOM_RECORD_FIELDS,
        rows: rooms.data,
      },
    };
  }
}
