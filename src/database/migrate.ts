/**
 * Database Migration Runner
 *
 * Applies the embedded SQL migrations in order and records each in
 * `_migrations`. Safe to run repeatedly.
 */

import type Database from 'better-sqlite3';
import { getDb } from './connection.js';

export interface MigrationResult {
  /** Migrations applied by this call */
  applied: string[];
  /** Migrations that failed, with their error messages */
  failed: Array<{ name: string; error: string }>;
}

/**
 * Connections already migrated in this process.
 */
const migratedConnections = new WeakSet<Database.Database>();

// SQL is embedded so bundled output has no file-system dependency
const MIGRATIONS: ReadonlyArray<{ name: string; sql: string }> = [
  {
    name: '001-documents.sql',
    sql: `
CREATE TABLE IF NOT EXISTS documents (
  id TEXT PRIMARY KEY,
  source_uri TEXT NOT NULL,
  content_hash TEXT NOT NULL UNIQUE,
  raw_text TEXT NOT NULL,
  tags TEXT NOT NULL DEFAULT '[]',
  created_at TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS chunks (
  id TEXT PRIMARY KEY,
  document_id TEXT NOT NULL REFERENCES documents(id) ON DELETE CASCADE,
  text TEXT NOT NULL,
  offset_start INTEGER NOT NULL,
  offset_end INTEGER NOT NULL,
  sequence_index INTEGER NOT NULL,
  page INTEGER NOT NULL,
  token_count INTEGER NOT NULL,
  UNIQUE (document_id, sequence_index)
);

CREATE INDEX IF NOT EXISTS idx_chunks_document ON chunks(document_id);

-- One row per embedded chunk; vector is a Float32 BLOB
CREATE TABLE IF NOT EXISTS index_entries (
  chunk_id TEXT PRIMARY KEY REFERENCES chunks(id) ON DELETE CASCADE,
  document_id TEXT NOT NULL,
  vector BLOB NOT NULL,
  dimensions INTEGER NOT NULL,
  page INTEGER NOT NULL,
  tags TEXT NOT NULL DEFAULT '[]',
  updated_at TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_index_entries_document ON index_entries(document_id);
`,
  },
  {
    name: '002-sessions.sql',
    sql: `
CREATE TABLE IF NOT EXISTS sessions (
  id TEXT PRIMARY KEY,
  query TEXT NOT NULL,
  status TEXT NOT NULL CHECK (status IN ('running', 'succeeded', 'failed', 'truncated')),
  failure_reason TEXT,
  failure_message TEXT,
  final_answer TEXT,
  partial_answer TEXT,
  created_at TEXT NOT NULL,
  completed_at TEXT
);

CREATE INDEX IF NOT EXISTS idx_sessions_created ON sessions(created_at);

CREATE TABLE IF NOT EXISTS session_steps (
  session_id TEXT NOT NULL REFERENCES sessions(id) ON DELETE CASCADE,
  step_index INTEGER NOT NULL,
  action TEXT NOT NULL,
  observation TEXT NOT NULL,
  timestamp TEXT NOT NULL,
  PRIMARY KEY (session_id, step_index)
);
`,
  },
];

/**
 * Apply pending migrations, each in its own transaction.
 *
 * Failures are reported in the result rather than thrown; the next call
 * retries them.
 */
export function runMigrations(db: Database.Database = getDb()): MigrationResult {
  if (migratedConnections.has(db)) {
    return { applied: [], failed: [] };
  }

  const applied: string[] = [];
  const failed: MigrationResult['failed'] = [];

  db.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      name TEXT UNIQUE NOT NULL,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    )
  `);

  const done = new Set(getAppliedMigrations(db).map((m) => m.name));
  const record = db.prepare('INSERT INTO _migrations (name) VALUES (?)');

  for (const migration of MIGRATIONS) {
    if (done.has(migration.name)) {
      continue;
    }
    try {
      db.transaction(() => {
        db.exec(migration.sql);
        record.run(migration.name);
      })();
      applied.push(migration.name);
    } catch (error) {
      failed.push({
        name: migration.name,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  if (failed.length === 0) {
    migratedConnections.add(db);
  }
  return { applied, failed };
}

export function getAppliedMigrations(
  db: Database.Database = getDb()
): Array<{ name: string; applied_at: string }> {
  const table = db
    .prepare("SELECT name FROM sqlite_master WHERE type='table' AND name='_migrations'")
    .get();
  if (!table) {
    return [];
  }
  return db
    .prepare('SELECT name, applied_at FROM _migrations ORDER BY id')
    .all()
    .flatMap((row) =>
      typeof row === 'object' && row !== null && 'name' in row && 'applied_at' in row
        ? [{ name: String(row.name), applied_at: String(row.applied_at) }]
        : []
    );
}

export function hasPendingMigrations(db: Database.Database = getDb()): boolean {
  return getAppliedMigrations(db).length < MIGRATIONS.length;
}
