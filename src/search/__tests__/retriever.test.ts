/**
 * Retriever Tests
 *
 * In-memory index + fake embedding provider; no database or network.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';

import { Retriever, compareRetrieved, scoreFromDistance } from '../retriever.js';
import { VectorIndex } from '../store.js';
import type { ChunkLookup, IndexEntry, RetrievedChunk } from '../types.js';
import type { Chunk } from '../../indexer/types.js';
import {
  EmbeddingUnavailableError,
  ProviderError,
  ValidationError,
} from '../../errors/index.js';
import { FakeEmbeddingProvider, hashVector } from '../../test-utils/index.js';
import { silentLogger } from '../../utils/index.js';

function makeChunk(id: string, overrides: Partial<Chunk> = {}): Chunk {
  return {
    id,
    documentId: 'doc-1',
    text: `text of ${id}`,
    offsetStart: 0,
    offsetEnd: 10,
    sequenceIndex: 0,
    page: 1,
    tokenCount: 3,
    embedding: null,
    ...overrides,
  };
}

class MapLookup implements ChunkLookup {
  constructor(readonly chunks = new Map<string, Chunk>()) {}

  getChunksByIds(ids: readonly string[]): Map<string, Chunk> {
    const result = new Map<string, Chunk>();
    for (const id of ids) {
      const chunk = this.chunks.get(id);
      if (chunk) result.set(id, chunk);
    }
    return result;
  }
}

function setup(
  items: Array<{ chunk: Chunk; vector: number[] }>,
  options: ConstructorParameters<typeof Retriever>[3] = {}
) {
  const index = new VectorIndex({ dimensions: 2, metric: 'cosine' });
  const entries: IndexEntry[] = items.map(({ chunk, vector }) => ({
    chunkId: chunk.id,
    vector: Float32Array.from(vector),
    metadata: { documentId: chunk.documentId, page: chunk.page, tags: [] },
  }));
  index.upsert(entries);

  const lookup = new MapLookup(new Map(items.map(({ chunk }) => [chunk.id, chunk])));
  const provider = new FakeEmbeddingProvider({
    dimensions: 2,
    vectors: { 'east query': [1, 0] },
  });
  const retriever = new Retriever(
    index,
    provider,
    lookup,
    { retryBaseDelayMs: 0, ...options },
    silentLogger
  );
  return { index, lookup, provider, retriever };
}

describe('scoreFromDistance', () => {
  it('maps cosine distance [0, 2] onto [1, 0]', () => {
    expect(scoreFromDistance(0, 'cosine')).toBe(1);
    expect(scoreFromDistance(1, 'cosine')).toBe(0.5);
    expect(scoreFromDistance(2, 'cosine')).toBe(0);
  });

  it('maps euclidean distance onto (0, 1]', () => {
    expect(scoreFromDistance(0, 'euclidean')).toBe(1);
    expect(scoreFromDistance(1, 'euclidean')).toBe(0.5);
    expect(scoreFromDistance(3, 'euclidean')).toBe(0.25);
  });
});

describe('compareRetrieved', () => {
  it('orders equal scores by sequenceIndex, then id', () => {
    const results: RetrievedChunk[] = [
      { chunk: makeChunk('z', { sequenceIndex: 2 }), score: 0.5, distance: 1 },
      { chunk: makeChunk('b', { sequenceIndex: 1 }), score: 0.5, distance: 1 },
      { chunk: makeChunk('a', { sequenceIndex: 1 }), score: 0.5, distance: 1 },
      { chunk: makeChunk('y', { sequenceIndex: 9 }), score: 0.9, distance: 0.2 },
    ];

    expect(results.sort(compareRetrieved).map((r) => r.chunk.id)).toEqual(['y', 'a', 'b', 'z']);
  });
});

describe('Retriever', () => {
  describe('retrieve', () => {
    it('returns chunks ranked by score', async () => {
      const { retriever } = setup([
        { chunk: makeChunk('north'), vector: [0, 1] },
        { chunk: makeChunk('east'), vector: [1, 0] },
        { chunk: makeChunk('north-east'), vector: [1, 1] },
      ]);

      const results = await retriever.retrieve('east query', 3);

      expect(results.map((r) => r.chunk.id)).toEqual(['east', 'north-east', 'north']);
      expect(results[0]?.score).toBe(1);
      expect(results[2]?.score).toBe(0.5);
    });

    it('truncates to k', async () => {
      const { retriever } = setup([
        { chunk: makeChunk('a'), vector: [1, 0] },
        { chunk: makeChunk('b'), vector: [1, 1] },
        { chunk: makeChunk('c'), vector: [0, 1] },
      ]);

      expect(await retriever.retrieve('east query', 1)).toHaveLength(1);
    });

    it('over-fetches k * oversampleFactor neighbours', async () => {
      const { index, retriever } = setup([{ chunk: makeChunk('a'), vector: [1, 0] }], {
        oversampleFactor: 4,
      });
      const search = vi.spyOn(index, 'search');

      await retriever.retrieve('east query', 2, { documentIds: ['doc-1'] });

      expect(search).toHaveBeenCalledWith(expect.any(Float32Array), 8, { documentIds: ['doc-1'] });
    });

    it('breaks score ties by ascending sequenceIndex', async () => {
      const { retriever } = setup([
        { chunk: makeChunk('third', { sequenceIndex: 3 }), vector: [1, 0] },
        { chunk: makeChunk('first', { sequenceIndex: 1 }), vector: [1, 0] },
        { chunk: makeChunk('second', { sequenceIndex: 2 }), vector: [1, 0] },
      ]);

      const results = await retriever.retrieve('east query', 3);

      expect(results.map((r) => r.chunk.id)).toEqual(['first', 'second', 'third']);
    });

    it('keeps the best chunk per page with page diversity', async () => {
      const { retriever } = setup(
        [
          { chunk: makeChunk('p1-best', { page: 1 }), vector: [1, 0] },
          { chunk: makeChunk('p1-other', { page: 1, sequenceIndex: 1 }), vector: [1, 1] },
          { chunk: makeChunk('p2', { page: 2, sequenceIndex: 2 }), vector: [0, 1] },
        ],
        { diversity: 'page' }
      );

      const results = await retriever.retrieve('east query', 3);

      expect(results.map((r) => r.chunk.id)).toEqual(['p1-best', 'p2']);
    });

    it('drops results below minScore', async () => {
      const { retriever } = setup(
        [
          { chunk: makeChunk('east'), vector: [1, 0] },
          { chunk: makeChunk('west'), vector: [-1, 0] },
        ],
        { minScore: 0.25 }
      );

      const results = await retriever.retrieve('east query', 5);

      expect(results.map((r) => r.chunk.id)).toEqual(['east']);
    });

    it('skips chunks deleted since they were indexed', async () => {
      const { lookup, retriever } = setup([
        { chunk: makeChunk('kept'), vector: [1, 0] },
        { chunk: makeChunk('gone'), vector: [1, 0] },
      ]);
      lookup.chunks.delete('gone');

      const results = await retriever.retrieve('east query', 5);

      expect(results.map((r) => r.chunk.id)).toEqual(['kept']);
    });

    it('returns an empty result for an empty index', async () => {
      const { retriever } = setup([]);
      expect(await retriever.retrieve('east query', 3)).toEqual([]);
    });

    it('produces non-increasing scores without repeated chunks', async () => {
      let seed = 7;
      const random = (): number => {
        seed = (seed * 48271) % 2147483647;
        return seed / 2147483647 - 0.5;
      };
      const items = Array.from({ length: 40 }, (_, i) => ({
        chunk: makeChunk(`c${i}`, { sequenceIndex: i % 5, page: i % 3 }),
        vector: [random(), random()],
      }));

      for (const diversity of ['none', 'page'] as const) {
        const { retriever } = setup(items, { diversity });
        const results = await retriever.retrieve('east query', 10);

        const ids = results.map((r) => r.chunk.id);
        expect(new Set(ids).size).toBe(ids.length);
        for (let i = 1; i < results.length; i++) {
          expect(results[i - 1]?.score ?? 0).toBeGreaterThanOrEqual(results[i]?.score ?? 0);
        }
      }
    });
  });

  describe('validation', () => {
    it('rejects a non-positive k before embedding', async () => {
      const { provider, retriever } = setup([]);

      await expect(retriever.retrieve('east query', 0)).rejects.toThrow(ValidationError);
      await expect(retriever.retrieve('east query', 2.5)).rejects.toThrow(ValidationError);
      expect(provider.calls).toEqual([]);
    });

    it('rejects an empty query', async () => {
      const { retriever } = setup([]);
      await expect(retriever.retrieve('   ', 3)).rejects.toThrow('Query must not be empty');
    });

    it('rejects a provider whose dimensions differ from the index', () => {
      const index = new VectorIndex({ dimensions: 2 });
      expect(
        () => new Retriever(index, new FakeEmbeddingProvider({ dimensions: 3 }), new MapLookup())
      ).toThrow(ValidationError);
    });
  });

  describe('embedding failures', () => {
    let provider: FakeEmbeddingProvider;
    let retriever: Retriever;

    beforeEach(() => {
      const index = new VectorIndex({ dimensions: 2 });
      index.upsert([
        { chunkId: 'a', vector: Float32Array.from([1, 0]), metadata: { documentId: 'doc-1', page: 1, tags: [] } },
      ]);
      provider = new FakeEmbeddingProvider({ dimensions: 2 });
      retriever = new Retriever(
        index,
        provider,
        new MapLookup(new Map([['a', makeChunk('a')]])),
        { maxRetries: 2, retryBaseDelayMs: 0 },
        silentLogger
      );
    });

    it('fails with EmbeddingUnavailableError after the configured retries', async () => {
      const embed = vi
        .spyOn(provider, 'embed')
        .mockRejectedValue(new ProviderError('fake', 'connect ECONNREFUSED'));

      const promise = retriever.retrieve('anything', 3);

      await expect(promise).rejects.toBeInstanceOf(EmbeddingUnavailableError);
      await expect(promise).rejects.toMatchObject({ attempts: 3 });
      expect(embed).toHaveBeenCalledTimes(3);
    });

    it('recovers when a retry succeeds', async () => {
      vi.spyOn(provider, 'embed')
        .mockRejectedValueOnce(new ProviderError('fake', 'rate limited'))
        .mockResolvedValueOnce(hashVector('anything', 2));

      const results = await retriever.retrieve('anything', 3);

      expect(results.map((r) => r.chunk.id)).toEqual(['a']);
    });
  });
});
