/**
 * Search Module
 *
 * Vector index and retrieval over ingested documents.
 *
 * @example
 * ```typescript
 * import { getVectorIndexManager, createDatabasePersistence, Retriever } from './search';
 *
 * const ops = getDatabase();
 * const index = await getVectorIndexManager().getIndex({
 *   dimensions: config.embedding.dimensions,
 *   metric: config.index.metric,
 *   persistence: createDatabasePersistence(ops),
 * });
 * const retriever = new Retriever(index, embeddingProvider, ops);
 * const results = await retriever.retrieve('late payment fees', 5);
 * ```
 */

export {
  VectorIndex,
  VectorIndexManager,
  getVectorIndexManager,
  resetVectorIndexManager,
  createDatabasePersistence,
  cosineDistance,
  euclideanDistance,
  type VectorIndexOptions,
  type VectorIndexManagerOptions,
} from './store.js';

export {
  Retriever,
  scoreFromDistance,
  compareRetrieved,
  type RetrieveCallOptions,
} from './retriever.js';

export type {
  DistanceMetric,
  IndexEntry,
  IndexEntryMetadata,
  IndexFilter,
  IndexPersistence,
  SearchHit,
  RetrievedChunk,
  RetrievalResult,
  ChunkLookup,
  DiversityPolicy,
  RetrieverOptions,
} from './types.js';
