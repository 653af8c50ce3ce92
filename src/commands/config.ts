import type { Command } from 'commander';
import type { CliContext } from '../cli/shared.js';
import { deleteConfigValue, getConfigPath, loadConfig, setConfigValue } from '../lib/config.js';
import type { RoomtableConfig } from '../lib/roomtable-types.js';
import { parsePositiveInt } from '../lib/utils/formatters.js';

const VALID_KEYS: (keyof RoomtableConfig)[] = ['csvOutput', 'initialRoomType', 'maxColumnWidth'];

function isConfigKey(key: string): key is keyof RoomtableConfig {
  return VALID_KEYS.some((validKey) => validKey === key);
}

function rejectKey(key: string, ctx: CliContext): never {
  console.log(ctx.colors.error(`Invalid key: ${key}`));
  console.log(ctx.colors.muted(`Valid keys: ${VALID_KEYS.join(', ')}`));
  process.exit(1);
}

export function configCommand(program: Command, getContext: () => CliContext): void {
  const config = program.command('config').description('Manage configuration');

  // Show config
  config
    .command('show')
    .description('Show current configuration')
    .action(() => {
      const ctx = getContext();
      const current = loadConfig();

      if (ctx.json) {
        console.log(JSON.stringify(current, null, 2));
        return;
      }

      const { colors } = ctx;
      console.log('');
      console.log(colors.highlight('Configuration'));
      console.log(colors.muted(`Path: ${getConfigPath()}`));
      console.log('');

      for (const key of VALID_KEYS) {
        const value = current[key];
        if (value !== undefined) {
          console.log(`  ${colors.primary(key)}: ${String(value)}`);
        } else {
          console.log(`  ${colors.primary(key)}: ${colors.muted('(not set)')}`);
        }
      }
      console.log('');
    });

  // Set config value
  config
    .command('set')
    .description('Set a configuration value')
    .argument('<key>', `Configuration key (${VALID_KEYS.join(', ')})`)
    .argument('<value>', 'Value to set')
    .action((key: string, value: string) => {
      const ctx = getContext();

      if (!isConfigKey(key)) {
        rejectKey(key, ctx);
      }

      let storedValue: string | number = value;
      if (key === 'maxColumnWidth') {
        const width = parsePositiveInt(value);
        if (width === undefined) {
          console.log(ctx.colors.error(`Invalid number: ${value}`));
          process.exit(1);
        }
        setConfigValue('maxColumnWidth', width);
        storedValue = width;
      } else {
        setConfigValue(key, value);
      }

      if (ctx.json) {
        console.log(JSON.stringify({ success: true, key, value: storedValue }));
      } else {
        console.log(ctx.colors.success(`Set ${key}`));
      }
    });

  // Unset config value
  config
    .command('unset')
    .description('Remove a configuration value')
    .argument('<key>', 'Configuration key to remove')
    .action((key: string) => {
      const ctx = getContext();

      if (!isConfigKey(key)) {
        rejectKey(key, ctx);
      }

      deleteConfigValue(key);

      if (ctx.json) {
        console.log(JSON.stringify({ success: true, key, deleted: true }));
      } else {
        console.log(ctx.colors.success(`Removed ${key}`));
      }
    });

  // Get config path
  config
    .command('path')
    .description('Show configuration file path')
    .action(() => {
      const ctx = getContext();
      if (ctx.json) {
        console.log(JSON.stringify({ path: getConfigPath() }));
      } else {
        console.log(getConfigPath());
      }
    });
}
