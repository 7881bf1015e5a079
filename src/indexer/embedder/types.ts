/**
 * Embedder Types
 *
 * Embeddings come back from providers as `number[]`; the pipeline stores
 * them as Float32Array (the SQLite BLOB layout and the in-memory index
 * both use it).
 */

import type { Logger } from '../../utils/index.js';

export interface EmbedCallOptions {
  /** Aborted on timeout or cancellation */
  signal?: AbortSignal;
}

/**
 * Anything that turns text into fixed-length vectors.
 *
 * All vectors from one provider share `dimensions`; vectors from different
 * models are not comparable.
 */
export interface EmbeddingProvider {
  /** Provider name used in error messages (e.g. "openai") */
  readonly name: string;
  readonly model: string;
  readonly dimensions: number;
  embed(text: string, options?: EmbedCallOptions): Promise<number[]>;
  /** Must return one vector per input, in input order */
  embedBatch(texts: string[], options?: EmbedCallOptions): Promise<number[][]>;
}

/**
 * Timeout and retry policy shared by chunk and query embedding.
 */
export interface EmbeddingPolicy {
  /** Per-request timeout */
  timeoutMs: number;
  /** Retries after the first failed request */
  maxRetries: number;
  retryBaseDelayMs: number;
}

export interface EmbedderOptions extends Partial<EmbeddingPolicy> {
  /** Chunks per embedBatch call (default: 32) */
  batchSize?: number;
  signal?: AbortSignal;
  /** Called after each batch with (embedded, total) */
  onProgress?: (embedded: number, total: number) => void;
  logger?: Logger;
}

/**
 * Embedding provider settings, as in the [embedding] section of config.toml.
 */
export interface EmbeddingProviderConfig {
  provider: 'openai' | 'ollama';
  model: string;
  dimensions: number;
}
