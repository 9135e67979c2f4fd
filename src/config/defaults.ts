/**
 * Default Configuration Values
 *
 * The loader merges user config ON TOP of these defaults.
 */

import type { Config } from './schema.js';

export const DEFAULT_CONFIG: Config = {
  default_provider: 'openai',
  default_model: 'gpt-4o-mini',

  processing: {
    code: {
      enabled: true,
      max_lines_per_chunk: 100,
      extract_functions: true,
      extract_classes: true,
      extract_imports: true,
      extract_comments: true,
    },
    excel: {
      enabled: true,
      max_rows_per_chunk: 100,
      extract_formulas: true,
      extract_comments: true,
      detect_tables: true,
    },
    structured_data: {
      enabled: true,
      max_depth: 10,
      max_array_items_per_chunk: 50,
    },
  },

  tagging: {
    enabled: true,
    max_content_length: 4000,
    max_tokens: 500,
    temperature: 0.3,
  },

  search: {
    top_k: 10,
    facet_sample_size: 100,
  },
};

/**
 * Config file template (TOML format)
 * Written to ~/.chunkwise/config.toml on first run
 */
export const CONFIG_TEMPLATE = `# chunkwise configuration
# Location: ~/.chunkwise/config.toml (or $CHUNKWISE_HOME/config.toml)

# Generation provider for auto-tagging: openai | ollama | openai-compatible
default_provider = "${DEFAULT_CONFIG.default_provider}"
default_model = "${DEFAULT_CONFIG.default_model}"

[processing.code]
enabled = ${DEFAULT_CONFIG.processing.code.enabled}
max_lines_per_chunk = ${DEFAULT_CONFIG.processing.code.max_lines_per_chunk}
extract_functions = ${DEFAULT_CONFIG.processing.code.extract_functions}
extract_classes = ${DEFAULT_CONFIG.processing.code.extract_classes}
extract_imports = ${DEFAULT_CONFIG.processing.code.extract_imports}
extract_comments = ${DEFAULT_CONFIG.processing.code.extract_comments}

[processing.excel]
enabled = ${DEFAULT_CONFIG.processing.excel.enabled}
max_rows_per_chunk = ${DEFAULT_CONFIG.processing.excel.max_rows_per_chunk}
extract_formulas = ${DEFAULT_CONFIG.processing.excel.extract_formulas}
extract_comments = ${DEFAULT_CONFIG.processing.excel.extract_comments}
detect_tables = ${DEFAULT_CONFIG.processing.excel.detect_tables}

[processing.structured_data]
enabled = ${DEFAULT_CONFIG.processing.structured_data.enabled}
max_depth = ${DEFAULT_CONFIG.processing.structured_data.max_depth}
max_array_items_per_chunk = ${DEFAULT_CONFIG.processing.structured_data.max_array_items_per_chunk}

[tagging]
enabled = ${DEFAULT_CONFIG.tagging.enabled}
max_content_length = ${DEFAULT_CONFIG.tagging.max_content_length}
max_tokens = ${DEFAULT_CONFIG.tagging.max_tokens}
temperature = ${DEFAULT_CONFIG.tagging.temperature}

[search]
top_k = ${DEFAULT_CONFIG.search.top_k}
facet_sample_size = ${DEFAULT_CONFIG.search.facet_sample_size}
`;
