/**
 * Search Module Types
 */

import type { Chunk } from '../indexer/types.js';

/**
 * Fixed per VectorIndex instance; changing it requires a full reindex.
 */
export type DistanceMetric = 'cosine' | 'euclidean';

export interface IndexEntryMetadata {
  documentId: string;
  page: number;
  tags: string[];
}

/**
 * One embedded chunk in the vector index (one-to-one with Chunk).
 */
export interface IndexEntry {
  chunkId: string;
  vector: Float32Array;
  metadata: IndexEntryMetadata;
}

/**
 * Metadata filters. Every present field must match.
 */
export interface IndexFilter {
  /** Entry belongs to any of these documents */
  documentIds?: string[];
  /** Entry is on any of these pages */
  pages?: number[];
  /** Entry carries all of these tags */
  tags?: string[];
}

export interface SearchHit {
  chunkId: string;
  distance: number;
}

export interface RetrievedChunk {
  chunk: Chunk;
  /** Relevance in [0, 1], higher is better */
  score: number;
  distance: number;
}

/**
 * Descending score, no repeated chunk ids.
 */
export type RetrievalResult = RetrievedChunk[];

/**
 * Durable backing for a VectorIndex.
 */
export interface IndexPersistence {
  /** Write all entries atomically (one transaction) */
  saveEntries(entries: readonly IndexEntry[]): void;
  /** Remove every entry of the document; returns the number removed */
  deleteEntriesForDocument(documentId: string): number;
  loadEntries(): IndexEntry[];
}

/**
 * Resolves chunk ids to chunks for the retriever. Missing ids (deleted
 * since the search) are simply absent from the map.
 */
export interface ChunkLookup {
  getChunksByIds(ids: readonly string[]): Map<string, Chunk>;
}

export type DiversityPolicy = 'none' | 'page';

export interface RetrieverOptions {
  /** Neighbours fetched per requested result (default 3) */
  oversampleFactor?: number;
  /** 'page' keeps only the best chunk per documentId+page */
  diversity?: DiversityPolicy;
  /** Results scoring below this are dropped (default 0) */
  minScore?: number;
  /** Timeout per embedding attempt */
  embedTimeoutMs?: number;
  /** Retries after a failed embedding attempt */
  maxRetries?: number;
  retryBaseDelayMs?: number;
}
