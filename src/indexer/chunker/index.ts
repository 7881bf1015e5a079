/**
 * Chunker Module
 *
 * ```typescript
 * const chunks = chunkDocument(document, { maxTokens: 300, overlapTokens: 50 });
 * ```
 */

export { chunkDocument, reconstructText } from './chunker.js';
export { normalizeText, tokenize, countTokens, PAGE_BREAK, type TokenSpan } from './tokens.js';
export type { ChunkOptions, ChunkSource } from './types.js';
