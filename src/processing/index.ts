/**
 * Processing module: data model, format processors, dispatch, metadata
 * extraction and auto-tagging.
 */

export type {
  ContextSource,
  ContentFormat,
  ContextType,
  ProcessorName,
  RawContextProperties,
  Chunk,
  ExtractedData,
  ContextProperties,
  ProcessedContext,
  ContextProcessor,
} from './types.js';
export { FILE_SOURCES } from './types.js';

export {
  FileContextProcessor,
  dedupeCaseInsensitive,
  clampScore,
  indexChunks,
  fileExtension,
  type ProcessorOptions,
  type ChunkDraft,
  type ContextDraft,
} from './base-processor.js';

export * from './processors/index.js';

export {
  ProcessorRegistry,
  ROUTING_TABLE,
  classifyExtension,
  createRawContext,
  expandPaths,
  type FormatCategory,
  type FormatRoute,
  type DispatchResult,
  type FileProcessingResult,
  type BatchProcessingResult,
  type RawContextOptions,
} from './dispatcher.js';

export * from './metadata/index.js';

export {
  AutoTaggingService,
  cleanTags,
  extractTagsFromFilePath,
  emptyTagSet,
  buildTaggingPrompt,
  TagSetSchema,
  TAGGING_SYSTEM_MESSAGE,
  MAX_TAGS,
  MAX_TAG_LENGTH,
  MAX_PATH_TAGS,
  type TagSet,
  type AutoTaggingOptions,
} from './auto-tagging.js';
