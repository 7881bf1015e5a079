/**
 * Test Utilities Module
 *
 * Shared utilities for testing across the codebase.
 *
 * @example
 * ```typescript
 * import { createTestDatabase, FakeEmbeddingProvider } from '../test-utils/index.js';
 *
 * const { db, ops } = createTestDatabase();
 * const provider = new FakeEmbeddingProvider({ dimensions: 3 });
 * ```
 */

export { resetAll } from './reset.js';
export { createTestDatabase, type TestDatabase } from './database.js';
export {
  FakeEmbeddingProvider,
  hashVector,
  type FakeEmbeddingProviderOptions,
} from './embedding.js';
export { ScriptedPlanner, toolCall, finalAnswer, type PlannerReply } from './agent.js';
export { createCapturingContext, runCommand, type CapturedContext } from './cli.js';
export { createPdf } from './pdf.js';
