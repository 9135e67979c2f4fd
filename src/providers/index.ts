/**
 * Providers Module
 *
 * Bridges the config system with the chat-completion client.
 *
 * ```typescript
 * import { createGenerationProvider } from './providers/index.js';
 * const provider = createGenerationProvider(config);
 * ```
 */

import type { Config, ProviderType } from '../config/schema.js';
import { getEnv } from '../config/env.js';
import { APIKeyError, ConfigError } from '../errors/index.js';
import type { GenerationProvider } from './types.js';
import { OpenAIGenerationProvider } from './openai.js';

export type { ChatMessage, ChatOptions, ChatResponse, ChatRole, GenerationProvider } from './types.js';
export { OpenAIGenerationProvider, DEFAULT_TIMEOUT_MS, type OpenAIGenerationProviderOptions } from './openai.js';

/** Ollama and many compatible servers ignore the key, but the client requires one */
const PLACEHOLDER_API_KEY = 'ollama';

export interface GenerationProviderOverrides {
  provider?: ProviderType;
  model?: string;
}

/**
 * Create the generation provider named by `default_provider`.
 *
 * @throws APIKeyError when OpenAI is selected without OPENAI_API_KEY
 * @throws ConfigError when openai-compatible is selected without OPENAI_BASE_URL
 */
export function createGenerationProvider(
  config: Pick<Config, 'default_provider' | 'default_model'>,
  overrides: GenerationProviderOverrides = {}
): GenerationProvider {
  const name = overrides.provider ?? config.default_provider;
  const model = overrides.model ?? config.default_model;

  switch (name) {
    case 'openai': {
      const apiKey = getEnv('OPENAI_API_KEY');
      if (!apiKey) {
        throw new APIKeyError('OpenAI', 'OPENAI_API_KEY');
      }
      return new OpenAIGenerationProvider({ name, model, apiKey });
    }
    case 'ollama': {
      const host = getEnv('OLLAMA_HOST').replace(/\/+$/, '');
      return new OpenAIGenerationProvider({
        name,
        model,
        apiKey: PLACEHOLDER_API_KEY,
        baseURL: `${host}/v1`,
        timeout: 120_000,
      });
    }
    case 'openai-compatible': {
      const baseURL = getEnv('OPENAI_BASE_URL');
      if (!baseURL) {
        throw new ConfigError(
          'openai-compatible provider requires a base URL',
          'Set the OPENAI_BASE_URL environment variable'
        );
      }
      return new OpenAIGenerationProvider({
        name,
        model,
        apiKey: getEnv('OPENAI_API_KEY') ?? PLACEHOLDER_API_KEY,
        baseURL,
      });
    }
  }
}
