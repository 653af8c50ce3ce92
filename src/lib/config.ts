import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';
import JSON5 from 'json5';
import type { RoomtableConfig } from './roomtable-types.js';

const DEFAULT_CONFIG: RoomtableConfig = {
  maxColumnWidth: 50,
};

// ROOMTABLE_CONFIG_DIR overrides the location, e.g. for tests
function getConfigDir(): string {
  return process.env.ROOMTABLE_CONFIG_DIR || join(homedir(), '.config', 'roomtable');
}

export function getConfigPath(): string {
  return join(getConfigDir(), 'config.json5');
}

export function loadConfig(): RoomtableConfig {
  const configFile = getConfigPath();
  try {
    if (existsSync(configFile)) {
      const content = readFileSync(configFile, 'utf-8');
      const parsed = JSON5.parse<Partial<RoomtableConfig>>(content);
      return { ...DEFAULT_CONFIG, ...parsed };
    }
  } catch {
    // Ignore parse errors, use defaults
  }
  return { ...DEFAULT_CONFIG };
}

export function saveConfig(config: RoomtableConfig): void {
  const configDir = getConfigDir();
  if (!existsSync(configDir)) {
    mkdirSync(configDir, { recursive: true });
  }

  const content = JSON5.stringify(config, null, 2);
  writeFileSync(getConfigPath(), content, 'utf-8');
}

export function setConfigValue<K extends keyof RoomtableConfig>(key: K, value: RoomtableConfig[K]): void {
  const config = loadConfig();
  config[key] = value;
  saveConfig(config);
}

export function deleteConfigValue<K extends keyof RoomtableConfig>(key: K): void {
  const config = loadConfig();
  delete config[key];
  saveConfig(config);
}
