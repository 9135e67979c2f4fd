/**
 * chunkwise - Library Entry Point
 *
 * Format-aware processing of code, spreadsheets and structured data into
 * searchable chunks, plus metadata extraction, auto-tagging and filtered
 * search over a pluggable vector store.
 *
 * @example Processing a file
 * ```typescript
 * import { ProcessorRegistry, createRawContext } from 'chunkwise';
 *
 * const registry = ProcessorRegistry.withDefaults();
 * const { processor, contexts } = await registry.process(createRawContext('report.xlsx'));
 * ```
 *
 * @example Searching
 * ```typescript
 * import { EnhancedSearchService } from 'chunkwise';
 *
 * const search = new EnhancedSearchService(myStorage);
 * const recent = await search.searchRecent(7, 20);
 * ```
 */

export * from './processing/index.js';
export * from './search/index.js';

export {
  createGenerationProvider,
  OpenAIGenerationProvider,
  type GenerationProvider,
  type GenerationProviderOverrides,
  type ChatMessage,
  type ChatOptions,
  type ChatResponse,
} from './providers/index.js';

export {
  loadConfig,
  DEFAULT_CONFIG,
  ConfigSchema,
  type Config,
  type ProcessingConfig,
  type TaggingConfig,
  type SearchConfig,
} from './config/index.js';

export {
  CLIError,
  ConfigError,
  APIKeyError,
  ValidationError,
  FileNotFoundError,
  UnsupportedFormatError,
} from './errors/index.js';

export { consoleLogger, silentLogger, type Logger } from './utils/index.js';
