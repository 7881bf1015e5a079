/**
 * Test Utilities - Unified Reset
 *
 * Resets every singleton, in dependency order:
 * 1. vector index manager (caches data from the database)
 * 2. database operations singleton
 * 3. database connection
 * 4. cached environment
 */

import { resetVectorIndexManager } from '../search/index.js';
import { resetDatabase, closeDb } from '../database/index.js';
import { _clearEnvCache } from '../config/env.js';

export function resetAll(): void {
  resetVectorIndexManager();
  resetDatabase();
  closeDb();
  _clearEnvCache();
}
