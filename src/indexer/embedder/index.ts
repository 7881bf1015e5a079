/**
 * Embedder Module
 *
 * Usage:
 * ```typescript
 * import { createEmbeddingProvider, embedChunks } from './embedder';
 *
 * const provider = createEmbeddingProvider(config.embedding);
 * await embedChunks(chunks, provider, {
 *   batchSize: config.embedding.batch_size,
 *   onProgress: (done, total) => console.log(`${done}/${total}`),
 * });
 * ```
 */

export {
  createEmbeddingProvider,
  getModelDimensions,
  AiSdkEmbeddingProvider,
} from './provider.js';

export {
  embedChunks,
  embedTexts,
  embedText,
  DEFAULT_EMBEDDING_POLICY,
} from './embedder.js';

export type {
  EmbeddingProvider,
  EmbeddingProviderConfig,
  EmbeddingPolicy,
  EmbedderOptions,
  EmbedCallOptions,
} from './types.js';
