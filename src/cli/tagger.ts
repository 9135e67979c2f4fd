/**
 * Auto-tagging service built from the loaded config.
 */

import type { Config } from '../config/index.js';
import { ConfigError } from '../errors/index.js';
import { AutoTaggingService } from '../processing/index.js';
import { createGenerationProvider } from '../providers/index.js';
import type { Logger } from '../utils/logger.js';

/**
 * @throws ConfigError when tagging.enabled is false
 */
export function createTagger(config: Config, logger: Logger): AutoTaggingService {
  if (!config.tagging.enabled) {
    throw new ConfigError('Auto-tagging is disabled', 'Run: chunkwise config set tagging.enabled true');
  }
  return new AutoTaggingService(
    createGenerationProvider(config),
    {
      maxContentLength: config.tagging.max_content_length,
      maxTokens: config.tagging.max_tokens,
      temperature: config.tagging.temperature,
    },
    logger
  );
}
