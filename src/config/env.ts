/**
 * Environment Variable Handler
 *
 * Loads provider credentials and the config home override.
 * Supports .env files for local development via dotenv.
 *
 * Keys are never logged and never included in error messages; only their
 * presence is reported.
 */

import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';

// No-op if .env doesn't exist
dotenvConfig();

export const DEFAULT_OLLAMA_HOST = 'http://localhost:11434';

/**
 * Keys are optional at load time; the provider factory checks the one it
 * actually needs.
 */
export const EnvSchema = z.object({
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_BASE_URL: z.string().url().optional(),
  OLLAMA_HOST: z.string().url().default(DEFAULT_OLLAMA_HOST),
  CHUNKWISE_HOME: z.string().min(1).optional(),
});

export type EnvVars = z.infer<typeof EnvSchema>;

let _envCache: EnvVars | null = null;

function blankToUndefined(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value;
}

/**
 * Load environment variables (called once, then cached).
 *
 * A malformed URL variable is dropped rather than failing the whole load;
 * the provider factory reports the missing piece when it is needed.
 */
export function loadEnv(): EnvVars {
  if (_envCache !== null) {
    return _envCache;
  }

  const raw = {
    OPENAI_API_KEY: blankToUndefined(process.env.OPENAI_API_KEY),
    OPENAI_BASE_URL: blankToUndefined(process.env.OPENAI_BASE_URL),
    OLLAMA_HOST: blankToUndefined(process.env.OLLAMA_HOST),
    CHUNKWISE_HOME: blankToUndefined(process.env.CHUNKWISE_HOME),
  };

  const result = EnvSchema.safeParse(raw);
  if (result.success) {
    _envCache = result.data;
  } else {
    const invalid = new Set(result.error.issues.map((issue) => String(issue.path[0])));
    _envCache = EnvSchema.parse({
      OPENAI_API_KEY: raw.OPENAI_API_KEY,
      OPENAI_BASE_URL: invalid.has('OPENAI_BASE_URL') ? undefined : raw.OPENAI_BASE_URL,
      OLLAMA_HOST: invalid.has('OLLAMA_HOST') ? undefined : raw.OLLAMA_HOST,
      CHUNKWISE_HOME: raw.CHUNKWISE_HOME,
    });
  }

  return _envCache;
}

/**
 * Type-safe access to a single variable.
 */
export function getEnv<K extends keyof EnvVars>(key: K): EnvVars[K] {
  return loadEnv()[key];
}

/**
 * Clear the environment cache.
 * FOR TESTING ONLY - allows tests to vary process.env between cases.
 *
 * @internal
 */
export function _clearEnvCache(): void {
  _envCache = null;
}
