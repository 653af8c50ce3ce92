import { createRequire } from 'node:module';
import { Command } from 'commander';
import kleur from 'kleur';
import { configCommand } from '../commands/config.js';
import { extractCommand } from '../commands/extract.js';
import type { CliColors, CliContext } from './shared.js';

const require = createRequire(import.meta.url);
const pkg = require('../../package.json') as { version: string };

function createColors(): CliColors {
  return {
    primary: kleur.cyan,
    secondary: kleur.magenta,
    success: kleur.green,
    error: kleur.red,
    warning: kleur.yellow,
    info: kleur.blue,
    muted: kleur.gray,
    highlight: kleur.bold,
  };
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('roomtable')
    .description('Turn saved Booking.com hotel pages into room availability tables')
    .version(pkg.version);

  // Global options
  program.option('--json', 'Output as JSON').option('-v, --verbose', 'Verbose output');

  // Create shared context
  const getContext = (): CliContext => {
    const opts = program.opts<{ json?: boolean; verbose?: boolean }>();
    return {
      colors: createColors(),
      json: opts.json ?? false,
      verbose: opts.verbose ?? false,
    };
  };

  // Register commands
  extractCommand(program, getContext);
  configCommand(program, getContext);

  return program;
}
