/**
 * Structured Data Processor
 *
 * JSON, JSONL and YAML files. One overview chunk, then one chunk per
 * top-level key for a mapping root, or batches of items for an array root.
 */

import { readFile } from 'node:fs/promises';
import { basename } from 'node:path';
import yaml from 'js-yaml';
import {
  FileContextProcessor,
  fileExtension,
  type ChunkDraft,
  type ProcessorOptions,
} from '../base-processor.js';
import type { ProcessedContext, RawContextProperties } from '../types.js';
import type { StructuredDataConfig } from '../../config/schema.js';
import { DEFAULT_CONFIG } from '../../config/defaults.js';
import { isRecord } from '../../utils/guards.js';

export type DataTypeName = 'object' | 'array' | 'string' | 'number' | 'boolean' | 'null' | 'date' | 'unknown';

/** Inferred shape of a document, bounded by max_depth */
export type SchemaNode =
  | { type: 'object'; properties: Record<string, SchemaNode> }
  | { type: 'array'; length?: number; items: SchemaNode | Record<string, never> }
  | { type: 'max_depth_exceeded' }
  | { type: Exclude<DataTypeName, 'object' | 'array'> };

/** Path of the document root; child paths join keys with no leading dot */
export const ROOT_PATH = '';

const PREVIEW_LIMIT = 500;
const CONTENT_LIMIT = 2000;
const OVERVIEW_KEY_LIMIT = 10;

export function typeName(value: unknown): DataTypeName {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  if (value instanceof Date) return 'date';
  switch (typeof value) {
    case 'object':
      return 'object';
    case 'string':
      return 'string';
    case 'number':
      return 'number';
    case 'boolean':
      return 'boolean';
    default:
      return 'unknown';
  }
}

function pretty(value: unknown): string {
  return JSON.stringify(value, null, 2) ?? String(value);
}

/** Limit counts code points, so a surrogate pair is never split */
function truncate(text: string, limit: number): string {
  if (text.length <= limit) return text;
  const points = Array.from(text);
  return points.length > limit ? `${points.slice(0, limit).join('')}\n... (truncated)` : text;
}

function scalarText(value: unknown): string {
  return value instanceof Date ? value.toISOString() : String(value);
}

/**
 * Parse a structured data file by extension.
 * `.jsonl` yields an array with one entry per non-blank line.
 */
export function parseStructuredData(content: string, extension: string): unknown {
  switch (extension) {
    case '.jsonl':
      return content
        .split('\n')
        .filter((line) => line.trim() !== '')
        .map((line): unknown => JSON.parse(line));
    case '.yaml':
    case '.yml':
      return yaml.load(content);
    default:
      return JSON.parse(content);
  }
}

export class StructuredDataProcessor extends FileContextProcessor {
  static readonly SUPPORTED_FORMATS: ReadonlySet<string> = new Set(['.json', '.yaml', '.yml', '.jsonl']);

  readonly name = 'structured_data_processor';
  readonly description = 'Processor for JSON and YAML files with path-based chunking';

  private readonly config: StructuredDataConfig;

  constructor(config: Partial<StructuredDataConfig> = {}, options: ProcessorOptions = {}) {
    const merged = { ...DEFAULT_CONFIG.processing.structured_data, ...config };
    super(merged.enabled, options);
    this.config = merged;
  }

  getSupportedFormats(): ReadonlySet<string> {
    return StructuredDataProcessor.SUPPORTED_FORMATS;
  }

  protected async processFile(path: string, raw: RawContextProperties): Promise<ProcessedContext[]> {
    const extension = fileExtension(path);
    const data = parseStructuredData(await readFile(path, 'utf-8'), extension);
    if (data === null || data === undefined) {
      this.logger.warn(`${this.name}: ${path} holds no document`);
      return [];
    }

    const fileName = basename(path);
    const dataType = typeName(data);
    const metadata: Record<string, unknown> = {
      file_name: fileName,
      file_path: path,
      file_type: extension,
      data_type: dataType,
    };

    let summary: string;
    const topKeys = isRecord(data) ? Object.keys(data) : [];

    if (Array.isArray(data)) {
      metadata.num_items = data.length;
      const first: unknown = data[0];
      if (isRecord(first)) {
        metadata.item_keys = Object.keys(first);
      }
      summary = `Array with ${data.length} items`;
    } else if (isRecord(data)) {
      metadata.top_level_keys = topKeys;
      metadata.num_keys = topKeys.length;
      summary = `Structured data with ${topKeys.length} top-level keys`;
    } else {
      summary = `Structured data of type ${dataType}`;
    }
    metadata.schema = this.inferSchema(data);

    const context = this.buildContext(
      raw,
      {
        id: raw.objectId,
        title: fileName,
        summary,
        keywords: [fileName, extension.replace(/^\./, ''), dataType, ...topKeys.slice(0, OVERVIEW_KEY_LIMIT)],
        entities: [],
        confidence: 95,
        importance: 75,
        metadata,
      },
      this.createChunks(data, fileName)
    );
    return context ? [context] : [];
  }

  /**
   * Recursive shape of `data`. Arrays are described by their first item.
   */
  inferSchema(data: unknown, depth = 0): SchemaNode {
    if (depth > this.config.max_depth) {
      return { type: 'max_depth_exceeded' };
    }
    if (Array.isArray(data)) {
      if (data.length === 0) return { type: 'array', items: {} };
      return { type: 'array', length: data.length, items: this.inferSchema(data[0], depth + 1) };
    }
    if (isRecord(data)) {
      const properties: Record<string, SchemaNode> = {};
      for (const [key, value] of Object.entries(data)) {
        properties[key] = this.inferSchema(value, depth + 1);
      }
      return { type: 'object', properties };
    }
    const kind = typeName(data);
    if (kind === 'object' || kind === 'array') {
      return { type: 'unknown' };
    }
    return { type: kind };
  }

  private createChunks(data: unknown, fileName: string): ChunkDraft[] {
    const dataType = typeName(data);
    let overview = `File: ${fileName}\nType: ${dataType}\n`;

    if (Array.isArray(data)) {
      overview += `Array with ${data.length} items\n`;
    } else if (isRecord(data)) {
      const keys = Object.keys(data);
      overview += `Top-level keys: ${keys.slice(0, OVERVIEW_KEY_LIMIT).join(', ')}\n`;
      if (keys.length > OVERVIEW_KEY_LIMIT) {
        overview += `... and ${keys.length - OVERVIEW_KEY_LIMIT} more keys\n`;
      }
    }
    overview += `\nPreview:\n${truncate(pretty(data), PREVIEW_LIMIT)}\n`;

    const chunks: ChunkDraft[] = [{ text: overview, keywords: [fileName, 'overview', 'structure'] }];

    if (Array.isArray(data)) {
      chunks.push(...this.chunkArray(data, ROOT_PATH, fileName));
    } else if (isRecord(data)) {
      chunks.push(...this.chunkMapping(data, fileName));
    }
    return chunks;
  }

  private chunkMapping(data: Record<string, unknown>, fileName: string): ChunkDraft[] {
    const chunks: ChunkDraft[] = [];

    for (const [key, value] of Object.entries(data)) {
      const path = key;
      const valueType = typeName(value);

      if (Array.isArray(value) && value.length > this.config.max_array_items_per_chunk) {
        chunks.push(...this.chunkArray(value, path, fileName));
      } else if (valueType === 'object' || valueType === 'array') {
        chunks.push({
          text: `Path: ${path}\nType: ${valueType}\nContent:\n${truncate(pretty(value), CONTENT_LIMIT)}\n`,
          keywords: [fileName, key, path, valueType],
        });
      } else {
        chunks.push({
          text: `Path: ${path}\nValue: ${scalarText(value)}\n`,
          keywords: [fileName, key, path],
        });
      }
    }
    return chunks;
  }

  private chunkArray(data: readonly unknown[], path: string, fileName: string): ChunkDraft[] {
    const size = this.config.max_array_items_per_chunk;
    const chunks: ChunkDraft[] = [];

    for (let i = 0; i < data.length; i += size) {
      const batch = data.slice(i, i + size);
      const end = i + batch.length;
      chunks.push({
        text:
          `Path: ${path}\n` +
          `Array items [${i}:${end}]\n` +
          `Content:\n${truncate(pretty(batch), CONTENT_LIMIT)}\n`,
        keywords: [fileName, path, 'array', `items_${i}_${end}`],
      });
    }
    return chunks;
  }
}
