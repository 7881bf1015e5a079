/**
 * Retriever
 *
 * Query text in, ranked chunks out:
 * 1. Embeds the query (timeout + retry with backoff)
 * 2. Over-fetches neighbours from the VectorIndex
 * 3. Resolves chunk rows and converts distance to a [0, 1] score
 * 4. Applies the diversity policy and truncates to k
 */

import { embedText } from '../indexer/embedder/embedder.js';
import type { EmbeddingProvider } from '../indexer/embedder/types.js';
import { ValidationError } from '../errors/index.js';
import { consoleLogger, type Logger } from '../utils/index.js';
import type { VectorIndex } from './store.js';
import type {
  ChunkLookup,
  DistanceMetric,
  IndexFilter,
  RetrievalResult,
  RetrievedChunk,
  RetrieverOptions,
} from './types.js';

const DEFAULTS = {
  oversampleFactor: 3,
  diversity: 'none',
  minScore: 0,
  embedTimeoutMs: 30_000,
  maxRetries: 3,
  retryBaseDelayMs: 500,
} as const satisfies Required<RetrieverOptions>;

/**
 * Monotonic decreasing map from distance to a relevance score in [0, 1].
 *
 * Cosine distance lives in [0, 2], so `1 - d/2`; Euclidean distance is
 * unbounded, so `1 / (1 + d)`.
 */
export function scoreFromDistance(distance: number, metric: DistanceMetric): number {
  if (metric === 'cosine') {
    return Math.max(0, Math.min(1, 1 - distance / 2));
  }
  return 1 / (1 + distance);
}

/**
 * Score descending, then sequenceIndex ascending, then chunkId.
 */
export function compareRetrieved(a: RetrievedChunk, b: RetrievedChunk): number {
  return (
    b.score - a.score ||
    a.chunk.sequenceIndex - b.chunk.sequenceIndex ||
    (a.chunk.id < b.chunk.id ? -1 : a.chunk.id > b.chunk.id ? 1 : 0)
  );
}

export interface RetrieveCallOptions {
  signal?: AbortSignal;
}

/**
 * Semantic search over the ingested documents.
 *
 * @example
 * ```typescript
 * const retriever = new Retriever(index, embeddingProvider, getDatabase(), {
 *   oversampleFactor: 3,
 *   diversity: 'page',
 * });
 *
 * const results = await retriever.retrieve('refund policy', 5);
 * for (const { chunk, score } of results) {
 *   console.log(`${score.toFixed(3)} p.${chunk.page} ${chunk.text.slice(0, 60)}`);
 * }
 * ```
 */
export class Retriever {
  private readonly options: Required<RetrieverOptions>;

  constructor(
    private readonly index: VectorIndex,
    private readonly embeddingProvider: EmbeddingProvider,
    private readonly chunks: ChunkLookup,
    options: RetrieverOptions = {},
    private readonly logger: Logger = consoleLogger
  ) {
    this.options = {
      oversampleFactor: options.oversampleFactor ?? DEFAULTS.oversampleFactor,
      diversity: options.diversity ?? DEFAULTS.diversity,
      minScore: options.minScore ?? DEFAULTS.minScore,
      embedTimeoutMs: options.embedTimeoutMs ?? DEFAULTS.embedTimeoutMs,
      maxRetries: options.maxRetries ?? DEFAULTS.maxRetries,
      retryBaseDelayMs: options.retryBaseDelayMs ?? DEFAULTS.retryBaseDelayMs,
    };
    if (!Number.isInteger(this.options.oversampleFactor) || this.options.oversampleFactor < 1) {
      throw new ValidationError(
        `oversampleFactor must be a positive integer, got ${this.options.oversampleFactor}`
      );
    }
    if (embeddingProvider.dimensions !== index.dimensions) {
      throw new ValidationError(
        `Embedding provider produces ${embeddingProvider.dimensions}-d vectors but the index holds ${index.dimensions}-d vectors`
      );
    }
  }

  /**
   * Retrieve the k most relevant chunks.
   *
   * @throws ValidationError for an empty query or a non-positive k
   * @throws EmbeddingUnavailableError if the query could not be embedded
   *   within the retry budget
   */
  async retrieve(
    query: string,
    k: number,
    filters?: IndexFilter,
    callOptions: RetrieveCallOptions = {}
  ): Promise<RetrievalResult> {
    if (!Number.isInteger(k) || k < 1) {
      throw new ValidationError(`k must be a positive integer, got ${k}`);
    }
    if (query.trim().length === 0) {
      throw new ValidationError('Query must not be empty');
    }

    const vector = await embedText(this.embeddingProvider, query, {
      timeoutMs: this.options.embedTimeoutMs,
      maxRetries: this.options.maxRetries,
      retryBaseDelayMs: this.options.retryBaseDelayMs,
      signal: callOptions.signal,
    });

    const hits = this.index.search(vector, k * this.options.oversampleFactor, filters);
    if (hits.length === 0) {
      return [];
    }

    const chunkMap = this.chunks.getChunksByIds(hits.map((hit) => hit.chunkId));
    const scored: RetrievedChunk[] = [];
    for (const hit of hits) {
      const chunk = chunkMap.get(hit.chunkId);
      if (!chunk) {
        // Deleted between search and lookup
        this.logger.debug?.(`[Retriever] Skipping missing chunk ${hit.chunkId}`);
        continue;
      }
      const score = scoreFromDistance(hit.distance, this.index.metric);
      if (score < this.options.minScore) {
        continue;
      }
      scored.push({ chunk, score, distance: hit.distance });
    }

    scored.sort(compareRetrieved);

    const diverse = this.options.diversity === 'page' ? onePerPage(scored) : scored;
    return diverse.slice(0, k);
  }
}

/**
 * Keep the best chunk per documentId+page. Input must already be sorted.
 */
function onePerPage(results: RetrievedChunk[]): RetrievedChunk[] {
  const seen = new Set<string>();
  return results.filter(({ chunk }) => {
    const key = `${chunk.documentId}:${chunk.page}`;
    if (seen.has(key)) {
      return false;
    }
    seen.add(key);
    return true;
  });
}
