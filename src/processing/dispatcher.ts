/**
 * Format Dispatch
 *
 * Binds the processors together: a file is handed to the first registered
 * processor whose `canProcess` holds, most specific first. Batch runs go
 * one file at a time and report per-file outcomes, so one malformed file
 * never stops the rest.
 */

import { randomUUID } from 'node:crypto';
import { stat } from 'node:fs/promises';
import { resolve } from 'node:path';
import fg from 'fast-glob';
import type {
  ContentFormat,
  ContextProcessor,
  ContextSource,
  ProcessedContext,
  ProcessorName,
  RawContextProperties,
} from './types.js';
import type { ProcessorOptions } from './base-processor.js';
import { CodeProcessor } from './processors/code-processor.js';
import { ExcelProcessor } from './processors/excel-processor.js';
import { StructuredDataProcessor } from './processors/structured-data-processor.js';
import type { ProcessingConfig } from '../config/schema.js';
import { DEFAULT_CONFIG } from '../config/defaults.js';
import { consoleLogger, type Logger } from '../utils/logger.js';

export type FormatCategory = 'code' | 'spreadsheet' | 'structured_data';

/**
 * Extension routing. Order within each list is display order only.
 */
export const ROUTING_TABLE: Readonly<Record<FormatCategory, readonly string[]>> = {
  code: [...CodeProcessor.SUPPORTED_FORMATS],
  spreadsheet: [...ExcelProcessor.SUPPORTED_FORMATS],
  structured_data: [...StructuredDataProcessor.SUPPORTED_FORMATS],
};

const CATEGORY_PROCESSOR: Readonly<Record<FormatCategory, ProcessorName>> = {
  code: 'code_processor',
  spreadsheet: 'excel_processor',
  structured_data: 'structured_data_processor',
};

/**
 * Category for an extension (with or without the leading dot, any case).
 */
export function classifyExtension(extension: string): FormatCategory | null {
  const normalized = `.${extension.toLowerCase().replace(/^\./, '')}`;
  for (const [category, extensions] of Object.entries(ROUTING_TABLE)) {
    if (extensions.includes(normalized) && isCategory(category)) {
      return category;
    }
  }
  return null;
}

function isCategory(value: string): value is FormatCategory {
  return value === 'code' || value === 'spreadsheet' || value === 'structured_data';
}

export interface FormatRoute {
  extension: string;
  category: FormatCategory;
  processor: ProcessorName;
}

export interface DispatchResult {
  /** null when no processor accepted the file */
  processor: ProcessorName | null;
  contexts: ProcessedContext[];
}

export interface FileProcessingResult extends DispatchResult {
  objectId: string;
  filePath: string | undefined;
  /** A processor accepted the file and produced at least one context */
  success: boolean;
}

export interface BatchProcessingResult {
  files: FileProcessingResult[];
  successCount: number;
  /** Accepted by a processor but produced nothing (load failure) */
  failureCount: number;
  /** No processor accepted the file */
  unmatchedCount: number;
  totalContexts: number;
  totalChunks: number;
}

export class ProcessorRegistry {
  private readonly logger: Logger;

  constructor(
    private readonly registered: readonly ContextProcessor[],
    logger: Logger = consoleLogger
  ) {
    this.logger = logger;
  }

  /**
   * The three built-in processors, most specific first:
   * spreadsheet, structured data, code.
   */
  static withDefaults(
    config: ProcessingConfig = DEFAULT_CONFIG.processing,
    options: ProcessorOptions = {}
  ): ProcessorRegistry {
    return new ProcessorRegistry(
      [
        new ExcelProcessor(config.excel, options),
        new StructuredDataProcessor(config.structured_data, options),
        new CodeProcessor(config.code, options),
      ],
      options.logger
    );
  }

  get processors(): readonly ContextProcessor[] {
    return this.registered;
  }

  select(raw: RawContextProperties): ContextProcessor | null {
    return this.registered.find((processor) => processor.canProcess(raw)) ?? null;
  }

  async process(raw: RawContextProperties): Promise<DispatchResult> {
    const processor = this.select(raw);
    if (!processor) {
      this.logger.debug?.(`No processor accepts ${raw.contentPath ?? raw.objectId}`);
      return { processor: null, contexts: [] };
    }
    return { processor: processor.name, contexts: await processor.process(raw) };
  }

  async processMany(
    raws: readonly RawContextProperties[],
    onResult?: (result: FileProcessingResult) => void
  ): Promise<BatchProcessingResult> {
    const batch: BatchProcessingResult = {
      files: [],
      successCount: 0,
      failureCount: 0,
      unmatchedCount: 0,
      totalContexts: 0,
      totalChunks: 0,
    };

    for (const raw of raws) {
      const { processor, contexts } = await this.process(raw);
      const result: FileProcessingResult = {
        objectId: raw.objectId,
        filePath: raw.contentPath,
        processor,
        contexts,
        success: processor !== null && contexts.length > 0,
      };

      if (processor === null) {
        batch.unmatchedCount++;
      } else if (result.success) {
        batch.successCount++;
      } else {
        batch.failureCount++;
      }
      batch.totalContexts += contexts.length;
      batch.totalChunks += contexts.reduce((sum, ctx) => sum + ctx.chunks.length, 0);
      batch.files.push(result);
      onResult?.(result);
    }

    return batch;
  }

  /**
   * Routing rows for the registered processors, whether or not they are
   * currently enabled.
   */
  listSupportedFormats(): FormatRoute[] {
    const registeredNames = new Set(this.registered.map((p) => p.name));
    const routes: FormatRoute[] = [];
    for (const [category, extensions] of Object.entries(ROUTING_TABLE)) {
      if (!isCategory(category)) continue;
      const processor = CATEGORY_PROCESSOR[category];
      if (!registeredNames.has(processor)) continue;
      for (const extension of extensions) {
        routes.push({ extension, category, processor });
      }
    }
    return routes;
  }
}

export interface RawContextOptions {
  objectId?: string;
  source?: ContextSource;
  contentFormat?: ContentFormat;
  metadata?: Record<string, unknown>;
  createTime?: Date;
}

/**
 * Build the input envelope for a file on disk.
 */
export function createRawContext(path: string, options: RawContextOptions = {}): RawContextProperties {
  return {
    objectId: options.objectId ?? randomUUID(),
    source: options.source ?? 'local_file',
    contentFormat: options.contentFormat ?? 'file',
    contentPath: resolve(path),
    metadata: { ...options.metadata },
    createTime: options.createTime ?? new Date(),
  };
}

/**
 * Resolve CLI inputs to file paths. Directories are searched recursively
 * for routed extensions; dot-directories and node_modules are skipped.
 * Missing paths are returned as-is so callers can report them.
 */
export async function expandPaths(inputs: readonly string[]): Promise<string[]> {
  const extensions = Object.values(ROUTING_TABLE)
    .flat()
    .map((ext) => ext.slice(1));
  const pattern = `**/*.{${extensions.join(',')}}`;
  const files: string[] = [];

  for (const input of inputs) {
    const absolute = resolve(input);
    const info = await stat(absolute).catch(() => null);
    if (info?.isDirectory()) {
      const entries = await fg(pattern, {
        cwd: absolute,
        absolute: true,
        dot: false,
        onlyFiles: true,
        caseSensitiveMatch: false,
        suppressErrors: true,
        ignore: ['**/node_modules/**'],
      });
      files.push(...entries.sort());
    } else {
      files.push(absolute);
    }
  }

  return files;
}

