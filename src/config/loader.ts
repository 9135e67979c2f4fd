/**
 * Configuration Loader
 *
 * Handles the complete config lifecycle:
 * 1. Find/create the config directory (~/.chunkwise)
 * 2. Load config.toml if it exists
 * 3. Validate with the Zod schema
 * 4. Merge with defaults (user values override defaults)
 */

import * as fs from 'node:fs';
import TOML from '@iarna/toml';
import { ConfigSchema, PartialConfigSchema, type Config } from './schema.js';
import { DEFAULT_CONFIG, CONFIG_TEMPLATE } from './defaults.js';
import { getHomeDir, getConfigPath } from './paths.js';
import { coerceConfigValue, findConfigKey, listConfigKeys, type ConfigKeyInfo } from './keys.js';
import { ConfigError } from '../errors/index.js';
import { isRecord } from '../utils/guards.js';

type TomlTable = Parameters<typeof TOML.stringify>[0];

function ensureHomeDir(): void {
  const dir = getHomeDir();
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
}

/**
 * Deep merge two plain objects, with source values overriding target.
 * Nested objects merge key by key; arrays and scalars replace.
 */
export function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = target[key];
    if (isRecord(sourceValue) && isRecord(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }

  return result;
}

function formatIssues(issues: Array<{ path: Array<string | number>; message: string }>): string {
  return issues.map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`).join('\n');
}

function readUserConfig(configPath: string): Record<string, unknown> {
  const content = fs.readFileSync(configPath, 'utf-8');
  try {
    return TOML.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown parse error';
    throw new ConfigError(
      `Invalid TOML in config file: ${message}`,
      `Fix the syntax in ${configPath}, or delete it to start over from the defaults`
    );
  }
}

/**
 * Load and parse the config file, returning defaults merged with user
 * overrides.
 *
 * @param createIfMissing - Write the commented template on first run
 * @throws ConfigError if the file exists but is invalid
 */
export function loadConfig(createIfMissing = true): Config {
  const configPath = getConfigPath();

  if (!fs.existsSync(configPath)) {
    if (createIfMissing) {
      ensureHomeDir();
      fs.writeFileSync(configPath, CONFIG_TEMPLATE, 'utf-8');
    }
    return structuredClone(DEFAULT_CONFIG);
  }

  const userConfig = readUserConfig(configPath);

  const partial = PartialConfigSchema.safeParse(userConfig);
  if (!partial.success) {
    throw new ConfigError(
      `Invalid configuration:\n${formatIssues(partial.error.issues)}`,
      `Fix the listed keys in ${configPath}, or delete it to start over from the defaults`
    );
  }

  const merged = ConfigSchema.safeParse(deepMerge(DEFAULT_CONFIG, userConfig));
  if (!merged.success) {
    throw new ConfigError(`Invalid configuration:\n${formatIssues(merged.error.issues)}`);
  }
  return merged.data;
}

/**
 * Get a config value by dot-notation path.
 * Example: getConfigValue('processing.code.max_lines_per_chunk') => 100
 */
export function getConfigValue(key: string): unknown {
  return readPath(loadConfig(), key);
}

function readPath(root: unknown, key: string): unknown {
  let current = root;
  for (const part of key.split('.')) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[part];
  }
  return current;
}

function toTomlTable(record: Record<string, unknown>): TomlTable {
  const table: TomlTable = {};
  for (const [key, value] of Object.entries(record)) {
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
      table[key] = value;
    } else if (isRecord(value)) {
      table[key] = toTomlTable(value);
    }
  }
  return table;
}

/**
 * Set a config value by dot-notation path and write the file back.
 * The raw string is coerced to the key's type, and the whole merged config
 * is validated before anything is written.
 *
 * @returns the stored value
 */
export function setConfigValue(key: string, value: string): string | number | boolean {
  const info = findConfigKey(key);
  if (info === undefined) {
    throw new ConfigError(`Unknown config key: ${key}`, 'Run: chunkwise config list  to see all keys');
  }
  const parsed = coerceConfigValue(info, value);
  const parts = key.split('.');
  const leaf = parts.pop() ?? key;

  const configPath = getConfigPath();
  ensureHomeDir();
  const config = fs.existsSync(configPath) ? readUserConfig(configPath) : {};

  let current = config;
  for (const part of parts) {
    const next = current[part];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[part] = created;
      current = created;
    }
  }
  current[leaf] = parsed;

  const validation = ConfigSchema.safeParse(deepMerge(DEFAULT_CONFIG, config));
  if (!validation.success) {
    throw new ConfigError(
      `Invalid value for '${key}':\n${formatIssues(validation.error.issues)}`,
      'Run: chunkwise config list  to see current values and types'
    );
  }

  fs.writeFileSync(configPath, TOML.stringify(toTomlTable(config)), 'utf-8');
  return parsed;
}

export interface ConfigEntry extends ConfigKeyInfo {
  value: unknown;
}

/**
 * Every settable key with its current (merged) value, in schema order.
 */
export function listConfig(): ConfigEntry[] {
  const config = loadConfig();
  return listConfigKeys().map((info) => ({ ...info, value: readPath(config, info.key) }));
}
