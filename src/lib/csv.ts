import { mkdirSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { ROOM_RECORD_FIELDS, type Result, type RoomRecord } from './roomtable-types.js';

const NEEDS_QUOTING = /[",\r\n]/;

export function escapeCsvCell(value: string | number): string {
  const text = String(value);
  if (!NEEDS_QUOTING.test(text)) return text;
  return `"${text.replace(/"/g, '""')}"`;
}

export function toCsv(records: readonly RoomRecord[]): string {
  const lines = [ROOM_RECORD_FIELDS.join(',')];
  for (const record of records) {
    lines.push(ROOM_RECORD_FIELDS.map((field) => escapeCsvCell(record[field])).join(','));
  }
  return `${lines.join('\n')}\n`;
}

export function writeCsv(path: string, records: readonly RoomRecord[]): Result<string> {
  try {
    mkdirSync(dirname(path), { recursive: true });
    writeFileSync(path, toCsv(records), 'utf-8');
  } catch (error) {
    return {
      success: false,
      error: `Failed to write ${path}: ${error instanceof Error ? error.message : String(error)}`,
    };
  }
  return { success: true, data: path };
}
