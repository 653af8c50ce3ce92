import { dirname, join, resolve } from 'node:path';
import type { Command } from 'commander';
import type { CliContext } from '../cli/shared.js';
import { AvailabilityParser } from '../lib/availability-parser.js';
import { loadConfig } from '../lib/config.js';
import { writeCsv } from '../lib/csv.js';
import { formatAvailabilityTable, formatError, formatInfo, formatVerbose } from '../lib/output.js';
import { parsePositiveInt } from '../lib/utils/formatters.js';

const DEFAULT_CSV_NAME = 'booking_availability.csv';

interface ExtractCommandOptions {
  output?: string;
  save: boolean;
  initialRoomType?: string;
  maxWidth?: string;
}

export function extractCommand(program: Command, getContext: () => CliContext): void {
  program
    .command('extract')
    .alias('parse')
    .description('Extract the room availability table from a saved Booking.com hotel page')
    .argument('<file>', 'Saved hotel page (HTML)')
    .option('-o, --output <path>', `CSV destination (default: ${DEFAULT_CSV_NAME} next to the page)`)
    .option('--no-save', 'Do not write a CSV file')
    .option('--initial-room-type <label>', 'Room type for rows before the first labelled row')
    .option('-w, --max-width <n>', 'Truncate table cells to this many characters')
    .action((file: string, options: ExtractCommandOptions) => {
      const ctx = getContext();
      const config = loadConfig();

      const maxColumnWidth = parsePositiveInt(options.maxWidth ?? config.maxColumnWidth);
      if (maxColumnWidth === undefined) {
        console.log(formatError('Max width must be a positive number', ctx));
        process.exit(1);
      }

      const inputPath = resolve(file);
      const verboseMsg = formatVerbose(`Reading listing: ${inputPath}`, ctx);
      if (verboseMsg) console.log(verboseMsg);

      const parser = new AvailabilityParser({ path: inputPath });
      const result = parser.getAvailabilityTable({
        initialRoomType: options.initialRoomType ?? config.initialRoomType,
        onWarning: (message) => {
          const warning = formatVerbose(message, ctx);
          if (warning) console.log(warning);
        },
      });

      if (!result.success) {
        console.log(formatError(result.error, ctx));
        process.exit(1);
      }

      let savedTo: string | undefined;
      if (options.save) {
        const outputPath = resolve(options.output ?? config.csvOutput ?? join(dirname(inputPath), DEFAULT_CSV_NAME));
        const written = writeCsv(outputPath, result.data.rows);
        if (!written.success) {
          console.log(formatError(written.error, ctx));
          process.exit(1);
        }
        savedTo = written.data;
      }

      console.log(formatAvailabilityTable(result.data, ctx, { maxColumnWidth, savedTo }));

      if (!savedTo) {
        const info = formatInfo('CSV export skipped (--no-save)', ctx);
        if (info) console.log(info);
      }
    });
}
