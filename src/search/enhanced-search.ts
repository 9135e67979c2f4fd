/**
 * Enhanced Search Service
 *
 * Wraps the storage capability's vector search with in-process filters
 * (file type, tags, date range, minimum relevance), sort policies and
 * facet aggregation.
 *
 * Storage is asked for twice the requested count so that filtering still
 * leaves enough candidates; results are truncated to topK after sorting.
 */

import { z } from 'zod';
import { DEFAULT_CONFIG } from '../config/defaults.js';
import { ValidationError } from '../errors/index.js';
import type { Logger } from '../utils/logger.js';
import { consoleLogger, describeError } from '../utils/logger.js';
import { safeJsonParse } from '../utils/json.js';
import { readNumber, readString } from '../utils/guards.js';
import {
  MAX_TOP_K,
  SearchOptionsSchema,
  type ContextStorage,
  type DateRangeCounts,
  type Facets,
  type ResolvedSearchOptions,
  type SearchOptions,
  type SearchResult,
  type StorageSearchHit,
  type TagCount,
} from './types.js';

// ============================================================================
// CONSTANTS
// ============================================================================

export const DEFAULT_IMPORTANCE = 50;
export const FACET_TAGS_PER_RESULT = 5;
export const FACET_TAG_LIMIT = 20;

const DAY_MS = 24 * 60 * 60 * 1000;

// ============================================================================
// METADATA READERS
// ============================================================================

/** Lower-cased extension without its leading dot */
function normalizeExtension(value: string): string {
  return value.replace(/^\./, '').toLowerCase();
}

/**
 * Tags as stored: a string array, a JSON array string, or a
 * comma-separated string.
 */
export function readTags(metadata: Record<string, unknown>): string[] {
  const value = metadata.tags;
  if (Array.isArray(value)) {
    return value.filter((tag): tag is string => typeof tag === 'string');
  }
  if (typeof value !== 'string' || value.trim() === '') {
    return [];
  }
  if (value.trim().startsWith('[')) {
    return safeJsonParse(value, z.array(z.string()), []);
  }
  return value
    .split(',')
    .map((tag) => tag.trim())
    .filter((tag) => tag !== '');
}

/** Creation time, or null when missing or unparseable */
export function readCreatedTime(metadata: Record<string, unknown>): Date | null {
  const value = readString(metadata, 'created_time');
  if (value === undefined || value === '') {
    return null;
  }
  const time = Date.parse(value);
  return Number.isNaN(time) ? null : new Date(time);
}

export function emptyFacets(): Facets {
  return {
    fileTypes: {},
    contextTypes: {},
    tags: [],
    dateRanges: { last_day: 0, last_week: 0, last_month: 0, older: 0 },
  };
}

// ============================================================================
// SERVICE
// ============================================================================

export interface EnhancedSearchOptions {
  /** @default 10 */
  defaultTopK?: number;
  /** Candidates gathered for facets. @default 100 */
  facetSampleSize?: number;
  clock?: () => Date;
  logger?: Logger;
}

export class EnhancedSearchService {
  private readonly defaultTopK: number;
  private readonly facetSampleSize: number;
  private readonly clock: () => Date;
  private readonly logger: Logger;

  constructor(
    private readonly storage: ContextStorage,
    options: EnhancedSearchOptions = {}
  ) {
    this.defaultTopK = options.defaultTopK ?? DEFAULT_CONFIG.search.top_k;
    this.facetSampleSize = options.facetSampleSize ?? DEFAULT_CONFIG.search.facet_sample_size;
    this.clock = options.clock ?? (() => new Date());
    this.logger = options.logger ?? consoleLogger;
  }

  /**
   * Vector search with in-process filtering and sorting.
   *
   * @throws ValidationError when options are malformed
   */
  async search(query: string, options: SearchOptions = {}): Promise<SearchResult[]> {
    const resolved = this.resolveOptions(options);
    const topK = resolved.topK ?? this.defaultTopK;

    let hits: StorageSearchHit[];
    try {
      hits = await this.storage.searchContext(query, topK * 2, resolved.contextTypes);
    } catch (error) {
      this.logger.warn(`Error in enhanced search: ${describeError(error)}`);
      return [];
    }

    const results = hits
      .map((hit) => this.toResult(hit))
      .filter((result) => this.passesFilters(result, resolved));

    return this.sortResults(results, resolved.sortBy).slice(0, topK);
  }

  /**
   * Search using the joined tags as the query. With `matchAll`, only
   * results carrying every requested tag are kept.
   */
  async searchByTags(tags: readonly string[], topK = this.defaultTopK, matchAll = false): Promise<SearchResult[]> {
    const results = await this.search(tags.join(' '), { topK, tags: [...tags] });
    if (!matchAll) {
      return results;
    }
    return results
      .filter((result) => {
        const stored = new Set(readTags(result.metadata));
        return tags.every((tag) => stored.has(tag));
      })
      .slice(0, topK);
  }

  /** Most recent content created within the last `days` days */
  async searchRecent(days = 7, topK = 20, contextTypes?: readonly string[]): Promise<SearchResult[]> {
    const dateFrom = new Date(this.clock().getTime() - days * DAY_MS);
    return this.search('', {
      topK,
      contextTypes: contextTypes ? [...contextTypes] : undefined,
      dateFrom,
      sortBy: 'date',
    });
  }

  /**
   * Contexts similar to a stored one, found by its summary (or title).
   * The origin context is never part of the result.
   *
   * @throws ValidationError when topK is out of range
   */
  async searchSimilar(contextId: string, topK = this.defaultTopK): Promise<SearchResult[]> {
    this.resolveOptions({ topK });

    let context: Record<string, unknown> | null;
    try {
      context = await this.storage.getContextById(contextId);
    } catch (error) {
      this.logger.warn(`Error in similarity search: ${describeError(error)}`);
      return [];
    }

    if (context === null) {
      this.logger.warn(`Context not found: ${contextId}`);
      return [];
    }

    const query = readString(context, 'summary') || readString(context, 'title') || '';
    if (query === '') {
      return [];
    }

    // One extra candidate stands in for the origin, within the option bounds
    const results = await this.search(query, { topK: Math.min(topK + 1, MAX_TOP_K) });
    return results.filter((result) => result.id !== contextId).slice(0, topK);
  }

  /**
   * Facet counts over a sample of candidates: by file type, context type,
   * tag and creation-date bucket.
   */
  async getFacets(query?: string, contextTypes?: readonly string[]): Promise<Facets> {
    let hits: StorageSearchHit[];
    if (query) {
      hits = await this.search(query, {
        topK: this.facetSampleSize,
        contextTypes: contextTypes ? [...contextTypes] : undefined,
      });
    } else {
      try {
        hits = await this.storage.searchContext('', this.facetSampleSize, contextTypes);
      } catch (error) {
        this.logger.warn(`Error getting facets: ${describeError(error)}`);
        return emptyFacets();
      }
    }

    const facets = emptyFacets();
    const tagCounts = new Map<string, number>();
    const now = this.clock().getTime();

    for (const { metadata } of hits) {
      const extension = (readString(metadata, 'file_extension') ?? 'unknown').replace(/^\./, '');
      facets.fileTypes[extension] = (facets.fileTypes[extension] ?? 0) + 1;

      const contextType = readString(metadata, 'context_type') ?? 'unknown';
      facets.contextTypes[contextType] = (facets.contextTypes[contextType] ?? 0) + 1;

      for (const tag of readTags(metadata).slice(0, FACET_TAGS_PER_RESULT)) {
        tagCounts.set(tag, (tagCounts.get(tag) ?? 0) + 1);
      }

      const created = readCreatedTime(metadata);
      if (created !== null) {
        facets.dateRanges[dateBucket(now - created.getTime())] += 1;
      }
    }

    facets.tags = [...tagCounts]
      .map(([value, count]): TagCount => ({ value, count }))
      .sort((a, b) => b.count - a.count)
      .slice(0, FACET_TAG_LIMIT);

    return facets;
  }

  // --------------------------------------------------------------------------

  private resolveOptions(options: SearchOptions): ResolvedSearchOptions {
    const parsed = SearchOptionsSchema.safeParse(options);
    if (!parsed.success) {
      throw new ValidationError(
        'Invalid search options',
        parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      );
    }
    return parsed.data;
  }

  private toResult(hit: StorageSearchHit): SearchResult {
    return {
      ...hit,
      relevanceScore: 1 - hit.distance,
      importance: readNumber(hit.metadata, 'importance') ?? DEFAULT_IMPORTANCE,
    };
  }

  private passesFilters(result: SearchResult, options: ResolvedSearchOptions): boolean {
    if (result.relevanceScore < options.minRelevance) {
      return false;
    }

    const { metadata } = result;

    if (options.fileTypes && options.fileTypes.length > 0) {
      const extension = normalizeExtension(readString(metadata, 'file_extension') ?? '');
      if (!options.fileTypes.some((fileType) => normalizeExtension(fileType) === extension)) {
        return false;
      }
    }

    if (options.tags && options.tags.length > 0) {
      const stored = new Set(readTags(metadata));
      if (!options.tags.some((tag) => stored.has(tag))) {
        return false;
      }
    }

    if (options.dateFrom || options.dateTo) {
      // An unreadable timestamp keeps the record.
      const created = readCreatedTime(metadata);
      if (created !== null) {
        if (options.dateFrom && created < options.dateFrom) return false;
        if (options.dateTo && created > options.dateTo) return false;
      }
    }

    return true;
  }

  private sortResults(results: SearchResult[], sortBy: ResolvedSearchOptions['sortBy']): SearchResult[] {
    switch (sortBy) {
      case 'relevance':
        return results.sort((a, b) => b.relevanceScore - a.relevanceScore);
      case 'date':
        return results.sort((a, b) => {
          const left = readString(a.metadata, 'created_time') ?? '';
          const right = readString(b.metadata, 'created_time') ?? '';
          return left < right ? 1 : left > right ? -1 : 0;
        });
      case 'importance':
        return results.sort((a, b) => b.importance - a.importance);
    }
  }
}

/** Whole days elapsed, floored; future timestamps land in last_day */
function dateBucket(elapsedMs: number): keyof DateRangeCounts {
  const days = Math.floor(elapsedMs / DAY_MS);
  if (days < 1) return 'last_day';
  if (days < 7) return 'last_week';
  if (days < 30) return 'last_month';
  return 'older';
}
