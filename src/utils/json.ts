/**
 * JSON Utilities
 *
 * Parsing for JSON read back from the database or from model output,
 * where the text may be corrupt or shaped differently than expected.
 */

import type { z } from 'zod';

/**
 * Parse a JSON string and validate it against a schema.
 *
 * Returns `fallback` when the input is null, not JSON, or does not match.
 *
 * @example
 * ```typescript
 * const tags = safeJsonParse(row.tags, z.array(z.string()), []);
 * ```
 */
export function safeJsonParse<S extends z.ZodTypeAny>(
  json: string | null | undefined,
  schema: S,
  fallback: z.output<S>,
  onError?: (error: Error, rawValue: string) => void
): z.output<S> {
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

/**
 * Pull the first `{...}` object out of free-form text (model output often
 * wraps JSON in prose or code fences) and parse it.
 *
 * @returns the parsed value, or undefined when no parseable object exists
 */
export function extractJsonObject(text: string): unknown {
  const match = text.match(/\{[\s\S]*\}/);
  if (!match) {
    return undefined;
  }
  try {
    return JSON.parse(match[0]);
  } catch {
    return undefined;
  }
}
