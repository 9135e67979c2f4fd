/**
 * Config Module
 *
 * Exports for programmatic config access.
 * CLI users interact via `chunkwise config` commands.
 */

// Schema and types
export {
  ConfigSchema,
  PartialConfigSchema,
  ProviderTypeSchema,
  ProcessingConfigSchema,
  TaggingConfigSchema,
  SearchConfigSchema,
} from './schema.js';
export type {
  Config,
  PartialConfig,
  ProviderType,
  ProcessingConfig,
  CodeProcessingConfig,
  ExcelProcessingConfig,
  StructuredDataConfig,
  TaggingConfig,
  SearchConfig,
} from './schema.js';

// Defaults
export { DEFAULT_CONFIG, CONFIG_TEMPLATE } from './defaults.js';

// Loader functions
export {
  loadConfig,
  getConfigValue,
  setConfigValue,
  listConfig,
  deepMerge,
  type ConfigEntry,
} from './loader.js';

// Settable keys
export {
  listConfigKeys,
  findConfigKey,
  coerceConfigValue,
  type ConfigKeyInfo,
  type ConfigValueKind,
  type ConfigValue,
} from './keys.js';

// Paths
export { getHomeDir, getConfigPath, CONFIG_FILE_NAME } from './paths.js';

// Environment variables
export { loadEnv, getEnv, EnvSchema, DEFAULT_OLLAMA_HOST, _clearEnvCache } from './env.js';
export type { EnvVars } from './env.js';
