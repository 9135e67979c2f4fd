/**
 * Base File Processor
 *
 * Shared plumbing for processors that read a file from `contentPath`:
 * routing checks, failure isolation, and assembly of the ProcessedContext
 * with dense chunk indices, de-duplicated keyword lists and clamped scores.
 */

import { existsSync } from 'node:fs';
import { extname } from 'node:path';
import type {
  Chunk,
  ContextProcessor,
  ProcessedContext,
  ProcessorName,
  RawContextProperties,
} from './types.js';
import { FILE_SOURCES } from './types.js';
import { consoleLogger, describeError, type Logger } from '../utils/logger.js';

/**
 * Construction options common to every processor.
 */
export interface ProcessorOptions {
  logger?: Logger;
  /** Source of createTime/updateTime (tests pin it) */
  clock?: () => Date;
}

/** A chunk before its index is assigned */
export interface ChunkDraft {
  text: string;
  keywords?: readonly string[];
  entities?: readonly string[];
}

/** Everything a processor decides about one output context */
export interface ContextDraft {
  id: string;
  title: string;
  summary: string;
  keywords: readonly string[];
  entities: readonly string[];
  confidence: number;
  importance: number;
  metadata: Record<string, unknown>;
}

/**
 * Case-insensitive de-duplication that keeps the first spelling seen.
 * Empty strings are dropped.
 */
export function dedupeCaseInsensitive(values: Iterable<string>, limit = Infinity): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const value of values) {
    if (result.length >= limit) break;
    const key = value.toLowerCase();
    if (value === '' || seen.has(key)) continue;
    seen.add(key);
    result.push(value);
  }
  return result;
}

/** Round and clamp a score into the integer range [0, 100]. */
export function clampScore(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.min(100, Math.max(0, Math.round(value)));
}

/** Assign chunkIndex 0..N-1 in order. */
export function indexChunks(drafts: readonly ChunkDraft[]): Chunk[] {
  return drafts.map((draft, chunkIndex) => ({
    text: draft.text,
    chunkIndex,
    keywords: dedupeCaseInsensitive(draft.keywords ?? []),
    entities: dedupeCaseInsensitive(draft.entities ?? []),
  }));
}

/** Lower-cased extension including the dot, or '' */
export function fileExtension(path: string): string {
  return extname(path).toLowerCase();
}

export abstract class FileContextProcessor implements ContextProcessor {
  abstract readonly name: ProcessorName;
  abstract readonly description: string;

  protected readonly logger: Logger;
  protected readonly clock: () => Date;

  constructor(
    protected readonly enabled: boolean,
    options: ProcessorOptions = {}
  ) {
    this.logger = options.logger ?? consoleLogger;
    this.clock = options.clock ?? (() => new Date());
  }

  abstract getSupportedFormats(): ReadonlySet<string>;

  /**
   * Read and segment one file. May throw; `process` turns any failure into
   * an empty result.
   */
  protected abstract processFile(
    path: string,
    raw: RawContextProperties
  ): Promise<ProcessedContext[]>;

  canProcess(raw: RawContextProperties): boolean {
    if (!this.enabled) return false;
    if (!FILE_SOURCES.has(raw.source)) return false;
    if (!raw.contentPath || raw.rawData !== undefined) return false;
    if (!existsSync(raw.contentPath)) return false;
    return this.getSupportedFormats().has(fileExtension(raw.contentPath));
  }

  async process(raw: RawContextProperties): Promise<ProcessedContext[]> {
    const path = raw.contentPath;
    if (!path) {
      this.logger.warn(`${this.name}: ${raw.objectId} has no content path`);
      return [];
    }

    this.logger.debug?.(`${this.name}: processing ${path}`);
    try {
      const contexts = await this.processFile(path, raw);
      this.logger.info?.(`${this.name}: ${contexts.length} context(s) from ${path}`);
      return contexts;
    } catch (error) {
      this.logger.warn(`${this.name}: failed to process ${path}: ${describeError(error)}`);
      return [];
    }
  }

  /**
   * Assemble a ProcessedContext, or null when there are no chunks.
   */
  protected buildContext(
    raw: RawContextProperties,
    draft: ContextDraft,
    chunks: readonly ChunkDraft[]
  ): ProcessedContext | null {
    if (chunks.length === 0) {
      return null;
    }

    const keywords = dedupeCaseInsensitive(draft.keywords);
    const entities = dedupeCaseInsensitive(draft.entities);
    const now = this.clock();

    return {
      id: draft.id,
      properties: {
        contextType: 'semantic_context',
        source: raw.source,
        createTime: now,
        updateTime: now,
        contentPath: raw.contentPath,
        contentFormat: 'text',
        title: draft.title,
        summary: draft.summary,
        tags: keywords,
        additionalMetadata: { ...draft.metadata, processor: this.name },
      },
      chunks: indexChunks(chunks),
      extractedData: {
        title: draft.title,
        summary: draft.summary,
        keywords,
        entities,
        contextType: 'semantic_context',
        confidence: clampScore(draft.confidence),
        importance: clampScore(draft.importance),
      },
    };
  }
}
