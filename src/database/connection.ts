/**
 * Database Connection Module
 *
 * Singleton SQLite connection (better-sqlite3) stored at
 * ~/.docent/docent.db, plus openDatabase() for explicit connections
 * (tests use ':memory:').
 */

import Database from 'better-sqlite3';
import { existsSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { getDbPath } from '../config/paths.js';

let db: Database.Database | null = null;

/**
 * Open a connection with the pragmas every Docent database needs.
 */
export function openDatabase(path: string): Database.Database {
  if (path !== ':memory:') {
    const dir = dirname(path);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  }

  const connection = new Database(path);
  // Chunks and index entries cascade from documents
  connection.pragma('foreign_keys = ON');
  if (path !== ':memory:') {
    connection.pragma('journal_mode = WAL');
  }
  return connection;
}

/**
 * Get the singleton database instance, creating it on first call.
 *
 * @example
 * ```ts
 * const db = getDb();
 * const count = db.prepare('SELECT COUNT(*) AS n FROM documents').get();
 * ```
 */
export function getDb(): Database.Database {
  if (db) {
    return db;
  }

  db = openDatabase(getDbPath());
  process.once('exit', closeDb);
  return db;
}

/**
 * Close the singleton connection. Safe to call repeatedly.
 */
export function closeDb(): void {
  if (db) {
    db.close();
    db = null;
  }
}
