/**
 * Database Row Validation
 *
 * Zod schemas for rows read back from SQLite, so schema drift (a failed
 * migration, a hand-edited file) surfaces as SchemaValidationError instead
 * of corrupt values deep in the engine.
 *
 * ```ts
 * const row = db.prepare('SELECT * FROM documents WHERE id = ?').get(id);
 * return row ? validateRow(DocumentRowSchema, row, `documents.id=${id}`) : undefined;
 * ```
 */

import { z, type ZodIssue } from 'zod';
import { DocentError } from '../errors/types.js';

export const DocumentRowSchema = z.object({
  id: z.string(),
  source_uri: z.string(),
  content_hash: z.string(),
  raw_text: z.string(),
  tags: z.string(),
  created_at: z.string(),
});
export type DocumentRow = z.infer<typeof DocumentRowSchema>;

/** Listing rows omit raw_text and add the chunk count */
export const DocumentSummaryRowSchema = DocumentRowSchema.omit({ raw_text: true }).extend({
  chunk_count: z.number().int().nonnegative(),
});
export type DocumentSummaryRow = z.infer<typeof DocumentSummaryRowSchema>;

export const ChunkRowSchema = z.object({
  id: z.string(),
  document_id: z.string(),
  text: z.string(),
  offset_start: z.number().int().nonnegative(),
  offset_end: z.number().int().nonnegative(),
  sequence_index: z.number().int().nonnegative(),
  page: z.number().int().positive(),
  token_count: z.number().int().nonnegative(),
});
export type ChunkRow = z.infer<typeof ChunkRowSchema>;

export const IndexEntryRowSchema = z.object({
  chunk_id: z.string(),
  document_id: z.string(),
  // better-sqlite3 returns BLOBs as Buffers
  vector: z.instanceof(Buffer),
  dimensions: z.number().int().positive(),
  page: z.number().int().positive(),
  tags: z.string(),
});
export type IndexEntryRow = z.infer<typeof IndexEntryRowSchema>;

export const SessionRowSchema = z.object({
  id: z.string(),
  query: z.string(),
  status: z.enum(['running', 'succeeded', 'failed', 'truncated']),
  failure_reason: z.string().nullable(),
  failure_message: z.string().nullable(),
  final_answer: z.string().nullable(),
  partial_answer: z.string().nullable(),
  created_at: z.string(),
  completed_at: z.string().nullable(),
});
export type SessionRow = z.infer<typeof SessionRowSchema>;

export const SessionStepRowSchema = z.object({
  session_id: z.string(),
  step_index: z.number().int().nonnegative(),
  action: z.string(),
  observation: z.string(),
  timestamp: z.string(),
});
export type SessionStepRow = z.infer<typeof SessionStepRowSchema>;

export const CountRowSchema = z.object({ count: z.number().int().nonnegative() });

/**
 * A row read from SQLite does not match its schema.
 */
export class SchemaValidationError extends DocentError {
  public readonly issues: Array<{ path: string; message: string }>;

  constructor(message: string, zodIssues: ZodIssue[]) {
    const issues = zodIssues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    const summary = issues
      .slice(0, 3)
      .map((i) => `  - ${i.path}: ${i.message}`)
      .join('\n');
    const more = issues.length > 3 ? `\n  ... and ${issues.length - 3} more` : '';

    super(
      message,
      `Schema validation failed:\n${summary}${more}\n\n` +
        'The database may be from a different Docent version. Try: docent status',
      5
    );
    this.name = 'SchemaValidationError';
    this.issues = issues;
  }
}

/**
 * @throws SchemaValidationError if the row doesn't match
 */
export function validateRow<T extends z.ZodTypeAny>(schema: T, row: unknown, context: string): z.output<T> {
  const result = schema.safeParse(row);
  if (result.success) {
    return result.data;
  }
  throw new SchemaValidationError(`Database schema mismatch in ${context}`, result.error.issues);
}

/**
 * Validate every row; the first mismatch throws with its index in the context.
 */
export function validateRows<T extends z.ZodTypeAny>(
  schema: T,
  rows: unknown[],
  context: string
): Array<z.output<T>> {
  return rows.map((row, i) => validateRow(schema, row, `${context}[${i}]`));
}
