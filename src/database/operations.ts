/**
 * Database Operations
 *
 * Typed access to documents, chunks, index entries and session traces.
 * Handles Float32 BLOB conversion, JSON columns and transactions; every
 * row read back is validated (see validation.ts).
 */

import type Database from 'better-sqlite3';
import { z } from 'zod';
import { getDb } from './connection.js';
import { runMigrations } from './migrate.js';
import { blobToVector, vectorToBlob } from './schema.js';
import {
  ChunkRowSchema,
  CountRowSchema,
  DocumentRowSchema,
  DocumentSummaryRowSchema,
  IndexEntryRowSchema,
  SessionRowSchema,
  SessionStepRowSchema,
  SchemaValidationError,
  validateRow,
  validateRows,
  type ChunkRow,
  type DocumentRow,
  type SessionRow,
} from './validation.js';
import { DatabaseError } from '../errors/index.js';
import { safeJsonParse } from '../utils/json.js';
import type { Chunk, Document } from '../indexer/types.js';
import type { IndexEntry } from '../search/types.js';
import {
  FailureReasonSchema,
  StepActionSchema,
  StepObservationSchema,
  type AgentSession,
  type AgentStep,
} from '../agent/types.js';

/** SQLite caps bound parameters per statement */
const MAX_IN_PARAMS = 500;

const TagsSchema = z.array(z.string());

const ChunkWithVectorRowSchema = ChunkRowSchema.extend({
  vector: z.instanceof(Buffer).nullable(),
});

export interface DocumentSummary {
  id: string;
  sourceUri: string;
  contentHash: string;
  tags: string[];
  createdAt: string;
  chunkCount: number;
}

export interface SessionSummary {
  id: string;
  query: string;
  status: AgentSession['status'];
  stepCount: number;
  createdAt: string;
  completedAt: string | null;
}

export interface StoreStats {
  documents: number;
  chunks: number;
  indexEntries: number;
  sessions: number;
}

function toDocument(row: DocumentRow): Document {
  return {
    id: row.id,
    sourceUri: row.source_uri,
    rawText: row.raw_text,
    contentHash: row.content_hash,
    tags: safeJsonParse(row.tags, TagsSchema, []),
    createdAt: row.created_at,
  };
}

function toChunk(row: ChunkRow, vector: Buffer | null): Chunk {
  return {
    id: row.id,
    documentId: row.document_id,
    text: row.text,
    offsetStart: row.offset_start,
    offsetEnd: row.offset_end,
    sequenceIndex: row.sequence_index,
    page: row.page,
    tokenCount: row.token_count,
    embedding: vector ? blobToVector(vector) : null,
  };
}

/**
 * Parse a JSON column strictly; corrupt JSON is schema drift, not a
 * recoverable default.
 */
function parseJsonColumn<T extends z.ZodTypeAny>(schema: T, text: string, context: string): z.output<T> {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch (error) {
    const message = error instanceof Error ? error.message : 'invalid JSON';
    throw new SchemaValidationError(`Database schema mismatch in ${context}`, [
      { code: z.ZodIssueCode.custom, path: [], message },
    ]);
  }
  return validateRow(schema, value, context);
}

function chunked<T>(items: readonly T[], size: number): T[][] {
  const out: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    out.push(items.slice(i, i + size));
  }
  return out;
}

/**
 * High-level database operations.
 *
 * Uses the shared connection from getDb() unless one is passed in.
 */
export class DatabaseOperations {
  private db: Database.Database;

  constructor(db?: Database.Database) {
    this.db = db ?? getDb();
  }

  // ==========================================================================
  // Documents
  // ==========================================================================

  findDocumentByHash(contentHash: string): Document | undefined {
    const row = this.db.prepare('SELECT * FROM documents WHERE content_hash = ?').get(contentHash);
    return row ? toDocument(validateRow(DocumentRowSchema, row, `documents.content_hash=${contentHash}`)) : undefined;
  }

  getDocument(id: string): Document | undefined {
    const row = this.db.prepare('SELECT * FROM documents WHERE id = ?').get(id);
    return row ? toDocument(validateRow(DocumentRowSchema, row, `documents.id=${id}`)) : undefined;
  }

  listDocuments(): DocumentSummary[] {
    const rows = this.db
      .prepare(
        `SELECT d.id, d.source_uri, d.content_hash, d.tags, d.created_at,
                (SELECT COUNT(*) FROM chunks c WHERE c.document_id = d.id) AS chunk_count
         FROM documents d
         ORDER BY d.created_at, d.id`
      )
      .all();

    return validateRows(DocumentSummaryRowSchema, rows, 'documents').map((row) => ({
      id: row.id,
      sourceUri: row.source_uri,
      contentHash: row.content_hash,
      tags: safeJsonParse(row.tags, TagsSchema, []),
      createdAt: row.created_at,
      chunkCount: row.chunk_count,
    }));
  }

  /**
   * Store a document and its chunks in one transaction.
   *
   * @throws DatabaseError on constraint failures (e.g. duplicate content hash)
   */
  insertDocumentWithChunks(document: Document, chunks: readonly Chunk[]): void {
    const insertDocument = this.db.prepare(`
      INSERT INTO documents (id, source_uri, content_hash, raw_text, tags, created_at)
      VALUES (@id, @sourceUri, @contentHash, @rawText, @tags, @createdAt)
    `);
    const insertChunk = this.db.prepare(`
      INSERT INTO chunks (id, document_id, text, offset_start, offset_end, sequence_index, page, token_count)
      VALUES (@id, @documentId, @text, @offsetStart, @offsetEnd, @sequenceIndex, @page, @tokenCount)
    `);

    const insertAll = this.db.transaction(() => {
      insertDocument.run({
        id: document.id,
        sourceUri: document.sourceUri,
        contentHash: document.contentHash,
        rawText: document.rawText,
        tags: JSON.stringify(document.tags),
        createdAt: document.createdAt,
      });
      for (const chunk of chunks) {
        insertChunk.run({
          id: chunk.id,
          documentId: chunk.documentId,
          text: chunk.text,
          offsetStart: chunk.offsetStart,
          offsetEnd: chunk.offsetEnd,
          sequenceIndex: chunk.sequenceIndex,
          page: chunk.page,
          tokenCount: chunk.tokenCount,
        });
      }
    });

    try {
      insertAll();
    } catch (error) {
      throw new DatabaseError(
        `Failed to store document ${document.sourceUri}: ${error instanceof Error ? error.message : String(error)}`,
        error instanceof Error ? error : undefined
      );
    }
  }

  /**
   * Delete a document; chunks and index entries cascade.
   *
   * @returns true if the document existed
   */
  deleteDocument(id: string): boolean {
    return this.db.prepare('DELETE FROM documents WHERE id = ?').run(id).changes > 0;
  }

  // ==========================================================================
  // Chunks
  // ==========================================================================

  getChunksByIds(ids: readonly string[]): Map<string, Chunk> {
    const result = new Map<string, Chunk>();

    for (const batch of chunked(ids, MAX_IN_PARAMS)) {
      const placeholders = batch.map(() => '?').join(', ');
      const rows = this.db
        .prepare(
          `SELECT c.*, e.vector AS vector
           FROM chunks c LEFT JOIN index_entries e ON e.chunk_id = c.id
           WHERE c.id IN (${placeholders})`
        )
        .all(...batch);

      for (const row of validateRows(ChunkWithVectorRowSchema, rows, 'chunks')) {
        result.set(row.id, toChunk(row, row.vector));
      }
    }

    return result;
  }

  getChunksForDocument(documentId: string): Chunk[] {
    const rows = this.db
      .prepare(
        `SELECT c.*, e.vector AS vector
         FROM chunks c LEFT JOIN index_entries e ON e.chunk_id = c.id
         WHERE c.document_id = ?
         ORDER BY c.sequence_index`
      )
      .all(documentId);

    return validateRows(ChunkWithVectorRowSchema, rows, `chunks.document_id=${documentId}`).map((row) =>
      toChunk(row, row.vector)
    );
  }

  // ==========================================================================
  // Index entries
  // ==========================================================================

  /**
   * Insert or replace index entries in one transaction.
   */
  upsertIndexEntries(entries: readonly IndexEntry[]): void {
    const upsert = this.db.prepare(`
      INSERT INTO index_entries (chunk_id, document_id, vector, dimensions, page, tags, updated_at)
      VALUES (@chunkId, @documentId, @vector, @dimensions, @page, @tags, @now)
      ON CONFLICT(chunk_id) DO UPDATE SET
        document_id = @documentId,
        vector = @vector,
        dimensions = @dimensions,
        page = @page,
        tags = @tags,
        updated_at = @now
    `);
    const now = new Date().toISOString();

    this.db.transaction(() => {
      for (const entry of entries) {
        upsert.run({
          chunkId: entry.chunkId,
          documentId: entry.metadata.documentId,
          vector: vectorToBlob(entry.vector),
          dimensions: entry.vector.length,
          page: entry.metadata.page,
          tags: JSON.stringify(entry.metadata.tags),
          now,
        });
      }
    })();
  }

  deleteIndexEntriesForDocument(documentId: string): number {
    return this.db.prepare('DELETE FROM index_entries WHERE document_id = ?').run(documentId).changes;
  }

  loadIndexEntries(): IndexEntry[] {
    const rows = this.db
      .prepare('SELECT chunk_id, document_id, vector, dimensions, page, tags FROM index_entries')
      .all();

    return validateRows(IndexEntryRowSchema, rows, 'index_entries').map((row) => ({
      chunkId: row.chunk_id,
      vector: blobToVector(row.vector),
      metadata: {
        documentId: row.document_id,
        page: row.page,
        tags: safeJsonParse(row.tags, TagsSchema, []),
      },
    }));
  }

  // ==========================================================================
  // Sessions
  // ==========================================================================

  /**
   * Insert or replace a session together with its full trace.
   */
  saveSession(session: AgentSession): void {
    const upsertSession = this.db.prepare(`
      INSERT INTO sessions (id, query, status, failure_reason, failure_message, final_answer, partial_answer, created_at, completed_at)
      VALUES (@id, @query, @status, @failureReason, @failureMessage, @finalAnswer, @partialAnswer, @createdAt, @completedAt)
      ON CONFLICT(id) DO UPDATE SET
        status = @status,
        failure_reason = @failureReason,
        failure_message = @failureMessage,
        final_answer = @finalAnswer,
        partial_answer = @partialAnswer,
        completed_at = @completedAt
    `);
    const clearSteps = this.db.prepare('DELETE FROM session_steps WHERE session_id = ?');
    const insertStep = this.db.prepare(`
      INSERT INTO session_steps (session_id, step_index, action, observation, timestamp)
      VALUES (@sessionId, @stepIndex, @action, @observation, @timestamp)
    `);

    this.db.transaction(() => {
      upsertSession.run({
        id: session.id,
        query: session.query,
        status: session.status,
        failureReason: session.failure?.reason ?? null,
        failureMessage: session.failure?.message ?? null,
        finalAnswer: session.finalAnswer,
        partialAnswer: session.partialAnswer,
        createdAt: session.createdAt,
        completedAt: session.completedAt,
      });
      clearSteps.run(session.id);
      for (const step of session.trace) {
        insertStep.run({
          sessionId: session.id,
          stepIndex: step.stepIndex,
          action: JSON.stringify(step.action),
          observation: JSON.stringify(step.observation),
          timestamp: step.timestamp,
        });
      }
    })();
  }

  getSession(id: string): AgentSession | undefined {
    const row = this.db.prepare('SELECT * FROM sessions WHERE id = ?').get(id);
    if (!row) {
      return undefined;
    }
    const session = validateRow(SessionRowSchema, row, `sessions.id=${id}`);
    const stepRows = this.db
      .prepare('SELECT * FROM session_steps WHERE session_id = ? ORDER BY step_index')
      .all(id);

    const trace: AgentStep[] = validateRows(SessionStepRowSchema, stepRows, `session_steps.session_id=${id}`).map(
      (step) => ({
        stepIndex: step.step_index,
        action: parseJsonColumn(StepActionSchema, step.action, `session_steps[${step.step_index}].action`),
        observation: parseJsonColumn(
          StepObservationSchema,
          step.observation,
          `session_steps[${step.step_index}].observation`
        ),
        timestamp: step.timestamp,
      })
    );

    return this.toSession(session, trace);
  }

  listSessions(limit = 20): SessionSummary[] {
    const rows = this.db
      .prepare(
        `SELECT s.*, (SELECT COUNT(*) FROM session_steps st WHERE st.session_id = s.id) AS step_count
         FROM sessions s
         ORDER BY s.created_at DESC, s.id
         LIMIT ?`
      )
      .all(limit);

    const schema = SessionRowSchema.extend({ step_count: z.number().int().nonnegative() });
    return validateRows(schema, rows, 'sessions').map((row) => ({
      id: row.id,
      query: row.query,
      status: row.status,
      stepCount: row.step_count,
      createdAt: row.created_at,
      completedAt: row.completed_at,
    }));
  }

  private toSession(row: SessionRow, trace: AgentStep[]): AgentSession {
    let failure: AgentSession['failure'] = null;
    if (row.failure_reason !== null) {
      const reason = FailureReasonSchema.safeParse(row.failure_reason);
      failure = {
        reason: reason.success ? reason.data : 'internal_error',
        message: row.failure_message ?? '',
      };
    }
    return {
      id: row.id,
      query: row.query,
      trace,
      status: row.status,
      finalAnswer: row.final_answer,
      partialAnswer: row.partial_answer,
      failure,
      createdAt: row.created_at,
      completedAt: row.completed_at,
    };
  }

  // ==========================================================================
  // Stats
  // ==========================================================================

  getStats(): StoreStats {
    const count = (table: string): number =>
      validateRow(CountRowSchema, this.db.prepare(`SELECT COUNT(*) AS count FROM ${table}`).get(), table).count;

    return {
      documents: count('documents'),
      chunks: count('chunks'),
      indexEntries: count('index_entries'),
      sessions: count('sessions'),
    };
  }
}

// ============================================================================
// Singleton
// ============================================================================

let instance: DatabaseOperations | null = null;

/**
 * Shared DatabaseOperations over the default database, migrated on first use.
 */
export function getDatabase(): DatabaseOperations {
  if (!instance) {
    const db = getDb();
    const result = runMigrations(db);
    if (result.failed.length > 0) {
      const details = result.failed.map((f) => `${f.name}: ${f.error}`).join('; ');
      throw new DatabaseError(`Database migration failed: ${details}`);
    }
    instance = new DatabaseOperations(db);
  }
  return instance;
}

/**
 * FOR TESTING ONLY
 *
 * @internal
 */
export function resetDatabase(): void {
  instance = null;
}
