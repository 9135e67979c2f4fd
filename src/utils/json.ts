/**
 * JSON Utilities
 *
 * Safe JSON parsing with fallback for corrupted data, plus tolerant
 * extraction of a JSON object from free-form LLM output.
 */

import type { z } from 'zod';

/**
 * Safely parse a JSON string and validate it against a schema, with
 * fallback on any parse or validation error.
 *
 * @example
 * ```typescript
 * const tags = safeJsonParse(raw, z.array(z.string()), []);
 *
 * const data = safeJsonParse(jsonString, MySchema, null, (err) => {
 *   logger.warn(`Failed to parse JSON: ${err.message}`);
 * });
 * ```
 */
export function safeJsonParse<T>(
  json: string | null | undefined,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  fallback: T,
  onError?: (error: Error, rawValue: string) => void
): T {
  if (json === null || json === undefined) {
    return fallback;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (error) {
    if (onError && error instanceof Error) {
      onError(error, json);
    }
    return fallback;
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    onError?.(new Error(result.error.issues.map((i) => i.message).join('; ')), json);
    return fallback;
  }
  return result.data;
}

const FENCE_PATTERN = /```(?:json)?\s*([\s\S]*?)```/i;
const OBJECT_PATTERN = /\{[\s\S]*\}/;

/**
 * Pull the first JSON object out of a model response.
 *
 * Handles markdown code fences and leading/trailing prose around the
 * object. Returns `undefined` when nothing parseable is found.
 */
export function parseJsonFromResponse(response: string): unknown {
  const fenced = FENCE_PATTERN.exec(response);
  const body = fenced?.[1] ?? response;

  const match = OBJECT_PATTERN.exec(body);
  if (!match) {
    return undefined;
  }

  try {
    const value: unknown = JSON.parse(match[0]);
    return value;
  } catch {
    return undefined;
  }
}
