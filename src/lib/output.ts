import { basename } from 'node:path';
import type { CliContext } from '../cli/shared.js';
import type { AvailabilityTable, RoomRecord, RoomRecordField } from './roomtable-types.js';
import { cleanCellText, truncate } from './utils/formatters.js';

export interface TableFormatOptions {
  maxColumnWidth: number;
  savedTo?: string;
}

const BANNER = '═══════════════════════════════════════════════════════════';
const COLUMN_GAP = '  ';

export function formatError(error: string, ctx: CliContext): string {
  if (ctx.json) {
    return JSON.stringify({ success: false, error }, null, 2);
  }
  return ctx.colors.error(`Error: ${error}`);
}

export function formatInfo(message: string, ctx: CliContext): string {
  if (ctx.json) {
    return '';
  }
  return ctx.colors.info(message);
}

export function formatVerbose(message: string, ctx: CliContext): string {
  if (ctx.json || !ctx.verbose) {
    return '';
  }
  return ctx.colors.muted(`[verbose] ${message}`);
}

function cellText(record: RoomRecord, field: RoomRecordField, maxColumnWidth: number): string {
  return truncate(cleanCellText(String(record[field])), maxColumnWidth);
}

export function formatAvailabilityTable(table: AvailabilityTable, ctx: CliContext, options: TableFormatOptions): string {
  if (ctx.json) {
    return JSON.stringify({ ...table, savedTo: options.savedTo }, null, 2);
  }

  const { colors } = ctx;
  const { columns, rows } = table;
  const lines: string[] = [];

  // Header
  lines.push('');
  lines.push(colors.highlight(BANNER));
  lines.push(colors.highlight(`  ROOM AVAILABILITY: ${table.source ? basename(table.source) : 'in-memory listing'}`));
  lines.push(colors.highlight(BANNER));
  lines.push('');
  lines.push(colors.primary(`▸ Found ${rows.length} room rows`));
  lines.push('');

  if (rows.length === 0) {
    lines.push(colors.warning('No room rows found. The page may not contain an availability table.'));
    lines.push('');
  } else {
    const cells = rows.map((record) => columns.map((field) => cellText(record, field, options.maxColumnWidth)));
    const widths = columns.map((field, col) => Math.max(field.length, ...cells.map((row) => row[col].length)));
    const last = columns.length - 1;
    const pad = (text: string, col: number): string => (col === last ? text : text.padEnd(widths[col]));

    lines.push(`  ${columns.map((field, col) => colors.highlight(pad(field, col))).join(COLUMN_GAP)}`);
    lines.push(`  ${colors.muted(widths.map((width) => '─'.repeat(width)).join(COLUMN_GAP))}`);

    for (const row of cells) {
      const line = row.map((value, col) => {
        const padded = pad(value, col);
        return columns[col] === 'breakfast_included' && value === 'Yes' ? colors.success(padded) : padded;
      });
      lines.push(`  ${line.join(COLUMN_GAP)}`);
    }
    lines.push('');
  }

  if (options.savedTo) {
    lines.push(`${colors.muted('Data saved to:')} ${options.savedTo}`);
    lines.push('');
  }

  return lines.join('\n');
}
