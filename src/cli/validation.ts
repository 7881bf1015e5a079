/**
 * Zod validation schemas for CLI inputs
 *
 * Commander.js parses arguments as strings; these schemas coerce and
 * check them before a command touches the engine.
 */

import { z } from 'zod';

import { ValidationError } from '../errors/index.js';

const positiveInt = (label: string, max: number) =>
  z.string().transform((val, ctx) => {
    const n = /^\d+$/.test(val) ? parseInt(val, 10) : NaN;
    if (!(n >= 1 && n <= max)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${label} must be a whole number from 1 to ${max}` });
      return z.NEVER;
    }
    return n;
  });

const documentIds = z.array(z.string().trim().min(1, 'Document id cannot be empty')).optional();

// ============================================================================
// INGEST
// ============================================================================

export const IngestOptionsSchema = z.object({
  tag: z
    .array(z.string().trim().min(1, 'Tag cannot be empty').max(64, 'Tag too long (max 64 chars)'))
    .optional(),
});

// ============================================================================
// ASK
// ============================================================================

export const AskArgsSchema = z.object({
  question: z
    .string()
    .trim()
    .min(1, 'Question cannot be empty')
    .max(2000, 'Question too long (max 2000 chars)'),
});

export const AskOptionsSchema = z.object({
  document: documentIds,
  maxSteps: positiveInt('max-steps', 50).optional(),
  trace: z.boolean().default(false),
});

// ============================================================================
// SEARCH
// ============================================================================

export const SearchArgsSchema = z.object({
  query: z
    .string()
    .trim()
    .min(1, 'Search query cannot be empty')
    .max(500, 'Search query too long (max 500 chars)'),
});

export const SearchOptionsSchema = z.object({
  k: positiveInt('k', 100).optional(),
  document: documentIds,
});

// ============================================================================
// SESSION
// ============================================================================

export const SessionOptionsSchema = z.object({
  limit: positiveInt('limit', 500),
});

// ============================================================================
// VALIDATION HELPER
// ============================================================================

/**
 * Parse input with a Zod schema.
 *
 * @example
 * ```typescript
 * const { maxSteps } = parseCommandInput(AskOptionsSchema, cmdOptions);
 * ```
 *
 * @throws ValidationError listing every issue
 */
export function parseCommandInput<T extends z.ZodTypeAny>(schema: T, input: unknown): z.output<T> {
  const result = schema.safeParse(input);
  if (result.success) {
    return result.data;
  }

  const issues = result.error.issues.map((issue) => {
    const path = issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    return `${path}${issue.message}`;
  });
  throw new ValidationError('Invalid command input', issues);
}

/**
 * Commander argParser for repeatable options (`--tag a --tag b`).
 */
export function collect(value: string, previous: string[] | undefined): string[] {
  return [...(previous ?? []), value];
}
