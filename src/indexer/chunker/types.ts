/**
 * Chunker Types
 */

export interface ChunkOptions {
  /** Upper bound on tokens per chunk (> 0) */
  maxTokens: number;
  /** Tokens repeated at the start of the next chunk (< maxTokens) */
  overlapTokens: number;
  /** Chunk id factory (defaults to random UUIDs) */
  generateId?: () => string;
}

/**
 * What the chunker needs from a document.
 */
export interface ChunkSource {
  id: string;
  rawText: string;
}
