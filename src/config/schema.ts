/**
 * Configuration Schema
 *
 * Defines the shape of ~/.chunkwise/config.toml using Zod.
 * This provides both TypeScript types AND runtime validation.
 */

import { z } from 'zod';

/**
 * Generation provider used by auto-tagging
 */
export const ProviderTypeSchema = z.enum(['openai', 'ollama', 'openai-compatible']);
export type ProviderType = z.infer<typeof ProviderTypeSchema>;

/**
 * Code processor settings
 */
export const CodeProcessingConfigSchema = z.object({
  enabled: z.boolean().describe('Route source files to the code processor'),
  max_lines_per_chunk: z
    .number()
    .int()
    .min(1)
    .max(10000)
    .describe('Lines per window when no functions or classes are detected'),
  extract_functions: z.boolean().describe('Record function names in metadata'),
  extract_classes: z.boolean().describe('Record class names in metadata'),
  extract_imports: z.boolean().describe('Record import lines in metadata (first 20)'),
  extract_comments: z.boolean().describe('Count comment lines in metadata'),
});

/**
 * Spreadsheet processor settings
 */
export const ExcelProcessingConfigSchema = z.object({
  enabled: z.boolean().describe('Route workbooks to the spreadsheet processor'),
  max_rows_per_chunk: z.number().int().min(1).max(10000).describe('Data rows per row-batch chunk'),
  extract_formulas: z.boolean().describe('Append formula cells to row-batch chunks'),
  extract_comments: z.boolean().describe('Collect cell comments into sheet metadata'),
  detect_tables: z.boolean().describe('Collect named table ranges into sheet metadata'),
});

/**
 * Structured data (JSON/YAML/JSONL) processor settings
 */
export const StructuredDataConfigSchema = z.object({
  enabled: z.boolean().describe('Route JSON/YAML/JSONL files to the structured data processor'),
  max_depth: z.number().int().min(1).max(100).describe('Maximum depth of the inferred schema'),
  max_array_items_per_chunk: z
    .number()
    .int()
    .min(1)
    .max(10000)
    .describe('Array items per batch chunk'),
});

export const ProcessingConfigSchema = z.object({
  code: CodeProcessingConfigSchema,
  excel: ExcelProcessingConfigSchema,
  structured_data: StructuredDataConfigSchema,
});

/**
 * Auto-tagging settings
 */
export const TaggingConfigSchema = z.object({
  enabled: z.boolean().describe('Allow `chunkwise process --tag` to call the generation provider'),
  max_content_length: z
    .number()
    .int()
    .min(100)
    .max(100000)
    .describe('Characters of content sent to the model'),
  max_tokens: z.number().int().min(1).max(8192).describe('Completion token limit'),
  temperature: z.number().min(0).max(2).describe('Sampling temperature'),
});

/**
 * Search configuration
 */
export const SearchConfigSchema = z.object({
  top_k: z.number().int().min(1).max(100).describe('Number of results to return'),
  facet_sample_size: z
    .number()
    .int()
    .min(1)
    .max(1000)
    .describe('Candidate records gathered for facet counts'),
});

/**
 * Root configuration schema
 * This is the complete shape of config.toml
 */
export const ConfigSchema = z.object({
  default_provider: ProviderTypeSchema.describe('Generation provider for auto-tagging'),
  default_model: z.string().min(1).describe('Model used for auto-tagging'),
  processing: ProcessingConfigSchema,
  tagging: TaggingConfigSchema,
  search: SearchConfigSchema,
});

export type Config = z.infer<typeof ConfigSchema>;
export type CodeProcessingConfig = z.infer<typeof CodeProcessingConfigSchema>;
export type ExcelProcessingConfig = z.infer<typeof ExcelProcessingConfigSchema>;
export type StructuredDataConfig = z.infer<typeof StructuredDataConfigSchema>;
export type ProcessingConfig = z.infer<typeof ProcessingConfigSchema>;
export type TaggingConfig = z.infer<typeof TaggingConfigSchema>;
export type SearchConfig = z.infer<typeof SearchConfigSchema>;

/**
 * Partial config for merging user overrides with defaults
 * Every field becomes optional, allowing sparse config files
 */
export const PartialConfigSchema = ConfigSchema.deepPartial();
export type PartialConfig = z.infer<typeof PartialConfigSchema>;
