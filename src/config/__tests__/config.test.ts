/**
 * Config Module Tests
 *
 * Tests the configuration loading, validation, and merging logic.
 * CHUNKWISE_HOME points every test at its own temp directory.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'node:fs';
import { ConfigSchema, PartialConfigSchema } from '../schema.js';
import { DEFAULT_CONFIG, CONFIG_TEMPLATE } from '../defaults.js';
import { deepMerge, getConfigValue, listConfig, loadConfig, setConfigValue } from '../loader.js';
import { coerceConfigValue, findConfigKey, listConfigKeys, type ConfigKeyInfo } from '../keys.js';
import { getConfigPath } from '../paths.js';
import { _clearEnvCache } from '../env.js';
import { ConfigError } from '../../errors/index.js';
import { createTempDir, type TempDir } from '../../test-utils/index.js';

describe('Config Schema', () => {
  it('validates the defaults', () => {
    expect(ConfigSchema.safeParse(DEFAULT_CONFIG).success).toBe(true);
  });

  it('rejects invalid provider enum', () => {
    const result = ConfigSchema.safeParse({ ...DEFAULT_CONFIG, default_provider: 'gpt-api' });
    expect(result.success).toBe(false);
  });

  it('rejects top_k outside valid range', () => {
    const result = ConfigSchema.safeParse({
      ...DEFAULT_CONFIG,
      search: { ...DEFAULT_CONFIG.search, top_k: 200 },
    });
    expect(result.success).toBe(false);
  });

  it('rejects a zero max_depth', () => {
    const result = ConfigSchema.safeParse({
      ...DEFAULT_CONFIG,
      processing: {
        ...DEFAULT_CONFIG.processing,
        structured_data: { ...DEFAULT_CONFIG.processing.structured_data, max_depth: 0 },
      },
    });
    expect(result.success).toBe(false);
  });

  it('allows deeply partial config', () => {
    const result = PartialConfigSchema.safeParse({ processing: { excel: { max_rows_per_chunk: 10 } } });
    expect(result.success).toBe(true);
  });
});

describe('deepMerge', () => {
  it('merges nested objects key by key', () => {
    const merged = deepMerge(
      { a: 1, nested: { x: 1, y: 2 } },
      { nested: { y: 3 }, b: 'new' }
    );
    expect(merged).toEqual({ a: 1, b: 'new', nested: { x: 1, y: 3 } });
  });

  it('replaces arrays and ignores undefined values', () => {
    expect(deepMerge({ list: [1, 2], keep: true }, { list: [3], keep: undefined })).toEqual({
      list: [3],
      keep: true,
    });
  });
});

describe('config keys', () => {
  function key(name: string): ConfigKeyInfo {
    const info = findConfigKey(name);
    if (!info) throw new Error(`missing key ${name}`);
    return info;
  }

  it('lists every leaf of the schema in order', () => {
    const keys = listConfigKeys();

    expect(keys).toHaveLength(22);
    expect(keys.slice(0, 3).map((info) => info.key)).toEqual([
      'default_provider',
      'default_model',
      'processing.code.enabled',
    ]);
    expect(keys.at(-1)?.key).toBe('search.facet_sample_size');
  });

  it('reads kinds and descriptions off the schema', () => {
    expect(key('default_provider')).toEqual({
      key: 'default_provider',
      kind: 'enum',
      description: 'Generation provider for auto-tagging',
      choices: ['openai', 'ollama', 'openai-compatible'],
    });
    expect(key('search.top_k')).toEqual({
      key: 'search.top_k',
      kind: 'integer',
      description: 'Number of results to return',
    });
    expect(key('tagging.temperature').kind).toBe('number');
    expect(key('processing.excel.detect_tables').kind).toBe('boolean');
    expect(key('default_model').kind).toBe('string');
  });

  it('does not treat sections as keys', () => {
    expect(findConfigKey('processing.excel')).toBeUndefined();
    expect(findConfigKey('')).toBeUndefined();
  });

  it('coerces strings to the key kind', () => {
    expect(coerceConfigValue(key('tagging.enabled'), 'FALSE')).toBe(false);
    expect(coerceConfigValue(key('search.top_k'), ' 42 ')).toBe(42);
    expect(coerceConfigValue(key('tagging.temperature'), '0.5')).toBe(0.5);
    expect(coerceConfigValue(key('default_model'), '4')).toBe('4');
    expect(coerceConfigValue(key('default_provider'), 'ollama')).toBe('ollama');
  });

  it('rejects strings that do not fit the kind', () => {
    expect(() => coerceConfigValue(key('tagging.enabled'), 'yes')).toThrow(
      "'tagging.enabled' expects true or false, got 'yes'"
    );
    expect(() => coerceConfigValue(key('search.top_k'), 'ten')).toThrow(ConfigError);
    expect(() => coerceConfigValue(key('search.top_k'), '2.5')).toThrow(
      "'search.top_k' expects a whole number, got '2.5'"
    );
    expect(() => coerceConfigValue(key('default_provider'), 'gpt-api')).toThrow(
      "'default_provider' must be one of: openai, ollama, openai-compatible"
    );
  });
});

describe('Config file lifecycle', () => {
  let home: TempDir;

  beforeEach(() => {
    home = createTempDir('chunkwise-config-');
    vi.stubEnv('CHUNKWISE_HOME', home.path);
    _clearEnvCache();
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    _clearEnvCache();
    home.cleanup();
  });

  it('writes the template on first load and returns defaults', () => {
    expect(loadConfig()).toEqual(DEFAULT_CONFIG);
    expect(fs.readFileSync(getConfigPath(), 'utf-8')).toBe(CONFIG_TEMPLATE);
  });

  it('does not create the file when createIfMissing is false', () => {
    loadConfig(false);
    expect(fs.existsSync(getConfigPath())).toBe(false);
  });

  it('reads the template back as the defaults', () => {
    loadConfig();
    expect(loadConfig()).toEqual(DEFAULT_CONFIG);
  });

  it('merges user overrides over defaults', () => {
    home.write('config.toml', '[processing.code]\nmax_lines_per_chunk = 50\n');

    const config = loadConfig();

    expect(config.processing.code.max_lines_per_chunk).toBe(50);
    expect(config.processing.code.extract_functions).toBe(true);
    expect(config.search.top_k).toBe(10);
  });

  it('throws ConfigError on invalid TOML', () => {
    home.write('config.toml', 'this is = = not toml');
    expect(() => loadConfig()).toThrow(ConfigError);
  });

  it('throws ConfigError on out-of-range values', () => {
    home.write('config.toml', '[search]\ntop_k = 0\n');
    expect(() => loadConfig()).toThrow(ConfigError);
  });

  it('reads values by dot path', () => {
    expect(getConfigValue('processing.excel.max_rows_per_chunk')).toBe(100);
    expect(getConfigValue('processing.nope')).toBeUndefined();
    expect(getConfigValue('search.top_k.deeper')).toBeUndefined();
  });

  it('sets values and persists them', () => {
    expect(setConfigValue('search.top_k', '20')).toBe(20);
    setConfigValue('default_provider', 'ollama');

    expect(getConfigValue('search.top_k')).toBe(20);
    expect(loadConfig().default_provider).toBe('ollama');
  });

  it('keeps numeric-looking text for string keys', () => {
    setConfigValue('default_model', '4');
    expect(loadConfig().default_model).toBe('4');
  });

  it('rejects unknown keys', () => {
    expect(() => setConfigValue('search.rerank', 'true')).toThrow(ConfigError);
    expect(() => setConfigValue('processing.excel', 'true')).toThrow('Unknown config key: processing.excel');
    expect(() => setConfigValue('', 'x')).toThrow(ConfigError);
  });

  it('rejects invalid values without touching the file', () => {
    loadConfig();
    expect(() => setConfigValue('search.top_k', '0')).toThrow(ConfigError);
    expect(fs.readFileSync(getConfigPath(), 'utf-8')).toBe(CONFIG_TEMPLATE);
  });

  it('lists every key with its current value', () => {
    setConfigValue('processing.excel.max_rows_per_chunk', '25');
    const entries = listConfig();

    expect(entries).toHaveLength(22);
    expect(entries).toContainEqual({
      key: 'processing.excel.max_rows_per_chunk',
      kind: 'integer',
      description: 'Data rows per row-batch chunk',
      value: 25,
    });
    expect(entries.find((entry) => entry.key === 'default_model')?.value).toBe('gpt-4o-mini');
  });
});
