/**
 * Search Module Types
 *
 * The storage capability the search service queries, plus the option and
 * result shapes it exposes.
 */

import { z } from 'zod';

// ============================================================================
// STORAGE CAPABILITY
// ============================================================================

/**
 * One vector-search hit as returned by storage.
 *
 * Metadata keys the search service reads: `file_extension`, `tags`,
 * `created_time`, `importance` and `context_type`.
 */
export interface StorageSearchHit {
  id: string;
  /** Vector distance; lower is closer */
  distance: number;
  metadata: Record<string, unknown>;
}

/** A stored context record; `summary` and `title` are read for similarity */
export type StoredContext = Record<string, unknown>;

/**
 * Narrow contract over the vector store. Only `contextTypes` is filtered
 * natively; everything else happens in process.
 */
export interface ContextStorage {
  searchContext(query: string, topK: number, contextTypes?: readonly string[]): Promise<StorageSearchHit[]>;
  getContextById(id: string): Promise<StoredContext | null>;
}

// ============================================================================
// OPTIONS
// ============================================================================

export const SortBySchema = z.enum(['relevance', 'date', 'importance']);
export type SortBy = z.infer<typeof SortBySchema>;

export const MAX_TOP_K = 1000;

export const SearchOptionsSchema = z.object({
  topK: z.number().int().min(1).max(MAX_TOP_K).optional(),
  contextTypes: z.array(z.string()).optional(),
  /** Extensions, with or without the leading dot; case-insensitive */
  fileTypes: z.array(z.string()).optional(),
  /** A result passes when it carries at least one of these tags */
  tags: z.array(z.string()).optional(),
  dateFrom: z.date().optional(),
  dateTo: z.date().optional(),
  /** Compared against relevanceScore (1 - distance) */
  minRelevance: z.number().default(0),
  sortBy: SortBySchema.default('relevance'),
});

export type SearchOptions = z.input<typeof SearchOptionsSchema>;
export type ResolvedSearchOptions = z.output<typeof SearchOptionsSchema>;

// ============================================================================
// RESULTS
// ============================================================================

export interface SearchResult extends StorageSearchHit {
  /** 1 - distance */
  relevanceScore: number;
  /** Stored importance, 50 when absent */
  importance: number;
}

export interface TagCount {
  value: string;
  count: number;
}

export interface DateRangeCounts {
  last_day: number;
  last_week: number;
  last_month: number;
  older: number;
}

export interface Facets {
  fileTypes: Record<string, number>;
  contextTypes: Record<string, number>;
  /** Descending by count, at most 20 */
  tags: TagCount[];
  dateRanges: DateRangeCounts;
}
