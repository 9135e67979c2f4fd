/**
 * Search module: storage contract and the enhanced search service.
 */

export {
  EnhancedSearchService,
  readTags,
  readCreatedTime,
  emptyFacets,
  DEFAULT_IMPORTANCE,
  FACET_TAGS_PER_RESULT,
  FACET_TAG_LIMIT,
  type EnhancedSearchOptions,
} from './enhanced-search.js';

export {
  MAX_TOP_K,
  SearchOptionsSchema,
  SortBySchema,
  type ContextStorage,
  type StorageSearchHit,
  type StoredContext,
  type SearchOptions,
  type ResolvedSearchOptions,
  type SortBy,
  type SearchResult,
  type TagCount,
  type DateRangeCounts,
  type Facets,
} from './types.js';
