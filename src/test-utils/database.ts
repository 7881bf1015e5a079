/**
 * In-memory databases for tests.
 */

import type Database from 'better-sqlite3';
import { openDatabase } from '../database/connection.js';
import { runMigrations } from '../database/migrate.js';
import { DatabaseOperations } from '../database/operations.js';

export interface TestDatabase {
  db: Database.Database;
  ops: DatabaseOperations;
}

/**
 * A migrated ':memory:' database. Close it in afterEach.
 */
export function createTestDatabase(): TestDatabase {
  const db = openDatabase(':memory:');
  const result = runMigrations(db);
  if (result.failed.length > 0) {
    throw new Error(`Test migrations failed: ${JSON.stringify(result.failed)}`);
  }
  return { db, ops: new DatabaseOperations(db) };
}
