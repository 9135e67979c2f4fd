/**
 * Config Keys
 *
 * The settable leaves of ConfigSchema, addressed by dot path
 * (`processing.excel.max_rows_per_chunk`). Kinds and descriptions are read
 * off the schema.
 */

import { z } from 'zod';
import { ConfigSchema } from './schema.js';
import { ConfigError } from '../errors/index.js';

export type ConfigValueKind = 'boolean' | 'integer' | 'number' | 'string' | 'enum';

export interface ConfigKeyInfo {
  key: string;
  kind: ConfigValueKind;
  description: string;
  /** Allowed values of an enum key */
  choices?: string[];
}

export type ConfigValue = string | number | boolean;

function collectKeys(schema: z.ZodTypeAny, prefix: string, out: ConfigKeyInfo[]): void {
  if (schema instanceof z.ZodObject) {
    const shape: Record<string, z.ZodTypeAny> = schema.shape;
    for (const [name, child] of Object.entries(shape)) {
      collectKeys(child, prefix ? `${prefix}.${name}` : name, out);
    }
    return;
  }

  const description = schema.description ?? '';
  if (schema instanceof z.ZodBoolean) {
    out.push({ key: prefix, kind: 'boolean', description });
  } else if (schema instanceof z.ZodNumber) {
    out.push({ key: prefix, kind: schema.isInt ? 'integer' : 'number', description });
  } else if (schema instanceof z.ZodEnum) {
    const options: unknown[] = schema.options;
    const choices = options.filter((option): option is string => typeof option === 'string');
    out.push({ key: prefix, kind: 'enum', description, choices });
  } else {
    out.push({ key: prefix, kind: 'string', description });
  }
}

let _keys: ConfigKeyInfo[] | null = null;

/** Every settable key, in schema order */
export function listConfigKeys(): ConfigKeyInfo[] {
  if (_keys === null) {
    const keys: ConfigKeyInfo[] = [];
    collectKeys(ConfigSchema, '', keys);
    _keys = keys;
  }
  return _keys;
}

export function findConfigKey(key: string): ConfigKeyInfo | undefined {
  return listConfigKeys().find((info) => info.key === key);
}

/**
 * Turn a CLI string into the type the key holds. Range checks are left to
 * the schema.
 *
 * @throws ConfigError when the string does not fit the key's kind
 */
export function coerceConfigValue(info: ConfigKeyInfo, raw: string): ConfigValue {
  const value = raw.trim();

  switch (info.kind) {
    case 'boolean': {
      const lower = value.toLowerCase();
      if (lower === 'true') return true;
      if (lower === 'false') return false;
      throw new ConfigError(`'${info.key}' expects true or false, got '${raw}'`);
    }
    case 'integer':
    case 'number': {
      const num = Number(value);
      if (value === '' || Number.isNaN(num)) {
        throw new ConfigError(`'${info.key}' expects a number, got '${raw}'`);
      }
      if (info.kind === 'integer' && !Number.isInteger(num)) {
        throw new ConfigError(`'${info.key}' expects a whole number, got '${raw}'`);
      }
      return num;
    }
    case 'enum':
      if (info.choices && !info.choices.includes(value)) {
        throw new ConfigError(`'${info.key}' must be one of: ${info.choices.join(', ')}`);
      }
      return value;
    case 'string':
      return raw;
  }
}
