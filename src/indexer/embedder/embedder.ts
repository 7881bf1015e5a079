/**
 * Embedder Orchestration
 *
 * Turns chunk texts (or a single query) into vectors:
 * 1. Batch chunks (default: 32 per request)
 * 2. Bound every request with a timeout and retry with backoff
 * 3. When a batch keeps failing, fall back to one request per chunk
 * 4. Report progress for long-running ingestions
 *
 * Unlike a best-effort indexer, a chunk that cannot be embedded fails the
 * whole call with EmbeddingUnavailableError: a document is either fully
 * indexed or not at all.
 */

import {
  EmbeddingUnavailableError,
  ProviderError,
  TimeoutError,
} from '../../errors/index.js';
import { retryWithBackoff, RetryExhaustedError, withTimeout } from '../../utils/index.js';
import type {
  EmbedderOptions,
  EmbeddingPolicy,
  EmbeddingProvider,
} from './types.js';

/** Default batch size - 32 is a good balance of speed vs request size */
const DEFAULT_BATCH_SIZE = 32;

export const DEFAULT_EMBEDDING_POLICY: EmbeddingPolicy = {
  timeoutMs: 30_000,
  maxRetries: 3,
  retryBaseDelayMs: 500,
};

/**
 * Retry everything except provider errors marked non-retryable
 * (bad credentials, unknown model) and caller cancellation.
 */
function isRetryable(error: unknown, signal?: AbortSignal): boolean {
  if (signal?.aborted) {
    return false;
  }
  if (error instanceof ProviderError) {
    return error.retryable;
  }
  return true;
}

function unwrap(error: unknown): { cause: unknown; attempts: number } {
  if (error instanceof RetryExhaustedError) {
    return { cause: error.lastError, attempts: error.attempts };
  }
  return { cause: error, attempts: 1 };
}

function describe(error: unknown): string {
  if (error instanceof TimeoutError || error instanceof ProviderError) {
    return error.message;
  }
  return error instanceof Error ? error.message : String(error);
}

function checkDimensions(provider: EmbeddingProvider, vector: number[]): Float32Array {
  if (vector.length !== provider.dimensions) {
    throw new ProviderError(
      provider.name,
      `model ${provider.model} returned ${vector.length} dimensions, expected ${provider.dimensions}`,
      { retryable: false }
    );
  }
  return new Float32Array(vector);
}

/**
 * Run one embedding request under the timeout/retry policy. Attempts are
 * counted for the error message.
 */
async function withPolicy<T>(
  label: string,
  policy: EmbeddingPolicy,
  signal: AbortSignal | undefined,
  request: (signal: AbortSignal) => Promise<T>,
  onRetry?: (error: unknown, attempt: number) => void
): Promise<T> {
  try {
    return await retryWithBackoff(
      () => withTimeout(request, policy.timeoutMs, label, signal),
      {
        retries: policy.maxRetries,
        baseDelayMs: policy.retryBaseDelayMs,
        shouldRetry: (error) => isRetryable(error, signal),
        onRetry: (error, attempt) => onRetry?.(error, attempt),
        signal,
      }
    );
  } catch (error) {
    if (signal?.aborted) {
      throw error;
    }
    const { cause, attempts } = unwrap(error);
    throw new EmbeddingUnavailableError(
      `Embedding provider unavailable: ${describe(cause)}`,
      attempts,
      cause
    );
  }
}

/**
 * Embed a single text (used for queries).
 *
 * @throws EmbeddingUnavailableError when every attempt failed
 */
export async function embedText(
  provider: EmbeddingProvider,
  text: string,
  options: Partial<EmbeddingPolicy> & { signal?: AbortSignal } = {}
): Promise<Float32Array> {
  const policy = { ...DEFAULT_EMBEDDING_POLICY, ...definedOnly(options) };
  const vector = await withPolicy('Embedding request', policy, options.signal, (signal) =>
    provider.embed(text, { signal })
  );
  return checkDimensions(provider, vector);
}

/**
 * Embed texts in batches. Returns one Float32Array per input, in order.
 *
 * @example
 * ```typescript
 * const vectors = await embedTexts(chunks.map((c) => c.text), provider, {
 *   batchSize: 16,
 *   onProgress: (done, total) => spinner.text = `Embedding ${done}/${total}`,
 * });
 * ```
 *
 * @throws EmbeddingUnavailableError when a text could not be embedded
 */
export async function embedTexts(
  texts: readonly string[],
  provider: EmbeddingProvider,
  options: EmbedderOptions = {}
): Promise<Float32Array[]> {
  const { batchSize = DEFAULT_BATCH_SIZE, signal, onProgress, logger } = options;
  const policy = { ...DEFAULT_EMBEDDING_POLICY, ...definedOnly(options) };
  const results: Float32Array[] = [];

  for (let i = 0; i < texts.length; i += batchSize) {
    const batch = texts.slice(i, i + batchSize);
    const batchNumber = Math.floor(i / batchSize) + 1;

    let vectors: number[][] | null = null;
    try {
      vectors = await withPolicy(
        'Embedding batch',
        policy,
        signal,
        (batchSignal) => provider.embedBatch(batch, { signal: batchSignal }),
        (error, attempt) =>
          logger?.debug?.(`Batch ${batchNumber} attempt ${attempt} failed: ${describe(error)}`)
      );
    } catch (error) {
      if (signal?.aborted) {
        throw error;
      }
      logger?.warn(`Batch ${batchNumber} failed, embedding its ${batch.length} chunk(s) one by one`);
    }

    if (vectors && vectors.length !== batch.length) {
      throw new ProviderError(
        provider.name,
        `embedBatch returned ${vectors.length} vectors for ${batch.length} inputs`,
        { retryable: false }
      );
    }

    if (vectors) {
      for (const vector of vectors) {
        results.push(checkDimensions(provider, vector));
      }
    } else {
      for (const text of batch) {
        results.push(await embedText(provider, text, { ...policy, signal }));
      }
    }

    onProgress?.(results.length, texts.length);

    // Let spinners repaint between batches
    await new Promise((resolve) => setImmediate(resolve));
  }

  return results;
}

/**
 * Embed chunks in place: sets `chunk.embedding` on every chunk.
 */
export async function embedChunks<C extends { text: string; embedding: Float32Array | null }>(
  chunks: C[],
  provider: EmbeddingProvider,
  options: EmbedderOptions = {}
): Promise<C[]> {
  const vectors = await embedTexts(
    chunks.map((chunk) => chunk.text),
    provider,
    options
  );
  chunks.forEach((chunk, index) => {
    chunk.embedding = vectors[index] ?? null;
  });
  return chunks;
}

function definedOnly(options: Partial<EmbeddingPolicy>): Partial<EmbeddingPolicy> {
  const policy: Partial<EmbeddingPolicy> = {};
  if (options.timeoutMs !== undefined) policy.timeoutMs = options.timeoutMs;
  if (options.maxRetries !== undefined) policy.maxRetries = options.maxRetries;
  if (options.retryBaseDelayMs !== undefined) policy.retryBaseDelayMs = options.retryBaseDelayMs;
  return policy;
}
