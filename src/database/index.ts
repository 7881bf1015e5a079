/**
 * Database Module
 */

export { getDb, closeDb, openDatabase } from './connection.js';
export {
  runMigrations,
  hasPendingMigrations,
  getAppliedMigrations,
  type MigrationResult,
} from './migrate.js';
export { generateId, vectorToBlob, blobToVector } from './schema.js';
export { SchemaValidationError, validateRow, validateRows } from './validation.js';
export {
  DatabaseOperations,
  getDatabase,
  resetDatabase,
  type DocumentSummary,
  type SessionSummary,
  type StoreStats,
} from './operations.js';
