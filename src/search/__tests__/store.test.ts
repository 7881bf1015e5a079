/**
 * VectorIndex Tests
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

import {
  VectorIndex,
  VectorIndexManager,
  cosineDistance,
  createDatabasePersistence,
  euclideanDistance,
  getVectorIndexManager,
  resetVectorIndexManager,
} from '../store.js';
import type { IndexEntry, IndexPersistence } from '../types.js';
import { ValidationError } from '../../errors/index.js';
import { createTestDatabase, type TestDatabase } from '../../test-utils/index.js';
import type { Chunk, Document } from '../../indexer/types.js';

function entry(
  chunkId: string,
  vector: number[],
  metadata: Partial<IndexEntry['metadata']> = {}
): IndexEntry {
  return {
    chunkId,
    vector: Float32Array.from(vector),
    metadata: { documentId: 'doc-1', page: 1, tags: [], ...metadata },
  };
}

function createMockPersistence(stored: IndexEntry[] = []): IndexPersistence {
  return {
    saveEntries: vi.fn(),
    deleteEntriesForDocument: vi.fn(() => 0),
    loadEntries: vi.fn(() => stored),
  };
}

describe('distance functions', () => {
  it('computes cosine distance in [0, 2]', () => {
    expect(cosineDistance([1, 0], [1, 0])).toBe(0);
    expect(cosineDistance([1, 0], [0, 1])).toBe(1);
    expect(cosineDistance([1, 0], [-1, 0])).toBe(2);
    expect(cosineDistance([2, 0], [5, 0])).toBe(0);
  });

  it('treats a zero vector as orthogonal', () => {
    expect(cosineDistance([0, 0], [1, 0])).toBe(1);
  });

  it('computes euclidean distance', () => {
    expect(euclideanDistance([0, 0], [3, 4])).toBe(5);
    expect(euclideanDistance([1, 1], [1, 1])).toBe(0);
  });
});

describe('VectorIndex', () => {
  let index: VectorIndex;

  beforeEach(() => {
    index = new VectorIndex({ dimensions: 2, metric: 'cosine' });
  });

  describe('upsert', () => {
    it('inserts entries and reports the count', () => {
      expect(index.upsert([entry('a', [1, 0]), entry('b', [0, 1])])).toBe(2);
      expect(index.size).toBe(2);
      expect(index.has('a')).toBe(true);
    });

    it('counts a chunkId repeated within a batch once, keeping the last', () => {
      expect(index.upsert([entry('a', [1, 0]), entry('b', [0, 1]), entry('a', [-1, 0])])).toBe(2);

      expect(index.size).toBe(2);
      expect(index.search([-1, 0], 1)).toEqual([{ chunkId: 'a', distance: 0 }]);
    });

    it('replaces an entry with the same chunkId', () => {
      index.upsert([entry('a', [1, 0]), entry('b', [0, 1])]);
      index.upsert([entry('a', [-1, 0])]);

      expect(index.size).toBe(2);
      expect(index.search([1, 0], 2)).toEqual([
        { chunkId: 'b', distance: 1 },
        { chunkId: 'a', distance: 2 },
      ]);
    });

    it('rejects the whole batch when one vector has the wrong dimensionality', () => {
      const persistence = createMockPersistence();
      index = new VectorIndex({ dimensions: 2, persistence });

      expect(() => index.upsert([entry('a', [1, 0]), entry('b', [1, 0, 0])])).toThrow(ValidationError);
      expect(index.size).toBe(0);
      expect(persistence.saveEntries).not.toHaveBeenCalled();
    });

    it('names the offending entry', () => {
      try {
        index.upsert([entry('bad', [1])]);
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(ValidationError);
        expect(error).toMatchObject({
          issues: ['chunk bad: expected 2 dimensions, got 1'],
        });
      }
    });

    it('rejects non-finite components', () => {
      expect(() => index.upsert([entry('a', [Number.NaN, 0])])).toThrow(ValidationError);
      expect(() => index.upsert([entry('a', [Number.POSITIVE_INFINITY, 0])])).toThrow(ValidationError);
    });

    it('persists before swapping entries in', () => {
      const persistence = createMockPersistence();
      index = new VectorIndex({ dimensions: 2, persistence });
      const entries = [entry('a', [1, 0])];

      index.upsert(entries);

      expect(persistence.saveEntries).toHaveBeenCalledWith(entries);
    });

    it('leaves memory untouched when persistence fails', () => {
      const persistence = createMockPersistence();
      vi.mocked(persistence.saveEntries).mockImplementation(() => {
        throw new Error('disk full');
      });
      index = new VectorIndex({ dimensions: 2, persistence });

      expect(() => index.upsert([entry('a', [1, 0])])).toThrow('disk full');
      expect(index.size).toBe(0);
    });

    it('copies vectors so callers cannot mutate indexed data', () => {
      const e = entry('a', [1, 0]);
      index.upsert([e]);
      e.vector[0] = -1;

      expect(index.search([1, 0], 1)).toEqual([{ chunkId: 'a', distance: 0 }]);
    });
  });

  describe('search', () => {
    beforeEach(() => {
      index.upsert([
        entry('far', [-1, 0]),
        entry('exact', [1, 0]),
        entry('orthogonal', [0, 1]),
        entry('near', [1, 1]),
      ]);
    });

    it('returns hits by ascending distance', () => {
      const hits = index.search([1, 0], 4);

      expect(hits.map((h) => h.chunkId)).toEqual(['exact', 'near', 'orthogonal', 'far']);
      expect(hits[1]?.distance).toBeCloseTo(1 - Math.SQRT1_2, 6);
    });

    it('returns at most k hits', () => {
      expect(index.search([1, 0], 2).map((h) => h.chunkId)).toEqual(['exact', 'near']);
    });

    it('breaks distance ties by chunkId', () => {
      const tied = new VectorIndex({ dimensions: 2 });
      tied.upsert([entry('c', [0, 1]), entry('a', [0, 1]), entry('b', [0, 1])]);

      expect(tied.search([0, 1], 3).map((h) => h.chunkId)).toEqual(['a', 'b', 'c']);
    });

    it('returns an empty list for an empty index', () => {
      expect(new VectorIndex({ dimensions: 2 }).search([1, 0], 5)).toEqual([]);
    });

    it('rejects a non-positive or fractional k', () => {
      expect(() => index.search([1, 0], 0)).toThrow(ValidationError);
      expect(() => index.search([1, 0], -1)).toThrow(ValidationError);
      expect(() => index.search([1, 0], 1.5)).toThrow(ValidationError);
    });

    it('rejects a query vector with the wrong dimensionality', () => {
      expect(() => index.search([1, 0, 0], 1)).toThrow(ValidationError);
    });
  });

  describe('filters', () => {
    beforeEach(() => {
      index.upsert([
        entry('a1', [1, 0], { documentId: 'a', page: 1, tags: ['finance', '2024'] }),
        entry('a2', [1, 0], { documentId: 'a', page: 2, tags: ['finance'] }),
        entry('b1', [1, 0], { documentId: 'b', page: 1, tags: ['legal'] }),
      ]);
    });

    it('filters by document id', () => {
      expect(index.search([1, 0], 5, { documentIds: ['a'] }).map((h) => h.chunkId)).toEqual(['a1', 'a2']);
    });

    it('filters by page', () => {
      expect(index.search([1, 0], 5, { pages: [1] }).map((h) => h.chunkId)).toEqual(['a1', 'b1']);
    });

    it('requires every filter tag', () => {
      expect(index.search([1, 0], 5, { tags: ['finance', '2024'] }).map((h) => h.chunkId)).toEqual(['a1']);
    });

    it('combines filters', () => {
      expect(index.search([1, 0], 5, { documentIds: ['a'], pages: [2] }).map((h) => h.chunkId)).toEqual([
        'a2',
      ]);
    });
  });

  describe('delete', () => {
    it('removes every entry of a document', () => {
      const persistence = createMockPersistence();
      index = new VectorIndex({ dimensions: 2, persistence });
      index.upsert([
        entry('a1', [1, 0], { documentId: 'a' }),
        entry('a2', [0, 1], { documentId: 'a' }),
        entry('b1', [1, 1], { documentId: 'b' }),
      ]);

      expect(index.delete('a')).toBe(2);
      expect(index.size).toBe(1);
      expect(persistence.deleteEntriesForDocument).toHaveBeenCalledWith('a');
    });

    it('returns 0 for an unknown document', () => {
      expect(index.delete('missing')).toBe(0);
    });
  });

  describe('load', () => {
    it('rebuilds from persistence and skips entries of the wrong size', () => {
      const persistence = createMockPersistence([entry('a', [1, 0]), entry('bad', [1, 0, 0])]);
      const logger = { warn: vi.fn() };
      index = new VectorIndex({ dimensions: 2, persistence });

      expect(index.load(logger)).toBe(1);
      expect(index.has('a')).toBe(true);
      expect(logger.warn).toHaveBeenCalledWith(
        '[VectorIndex] Skipping stored entry: chunk bad: expected 2 dimensions, got 3'
      );
    });
  });

  it('uses euclidean distance when configured', () => {
    const euclidean = new VectorIndex({ dimensions: 2, metric: 'euclidean' });
    euclidean.upsert([entry('a', [3, 4]), entry('b', [1, 0])]);

    expect(euclidean.search([0, 0], 2)).toEqual([
      { chunkId: 'b', distance: 1 },
      { chunkId: 'a', distance: 5 },
    ]);
  });

  it('rejects invalid dimensions', () => {
    expect(() => new VectorIndex({ dimensions: 0 })).toThrow(ValidationError);
  });
});

describe('VectorIndexManager', () => {
  afterEach(() => {
    resetVectorIndexManager();
  });

  it('shares one build between concurrent callers', async () => {
    const persistence = createMockPersistence([entry('a', [1, 0])]);
    const manager = new VectorIndexManager();

    const [first, second] = await Promise.all([
      manager.getIndex({ dimensions: 2, persistence }),
      manager.getIndex({ dimensions: 2, persistence }),
    ]);

    expect(first).toBe(second);
    expect(first.size).toBe(1);
    expect(persistence.loadEntries).toHaveBeenCalledTimes(1);
  });

  it('reloads after invalidate', async () => {
    const persistence = createMockPersistence();
    const manager = new VectorIndexManager();

    const first = await manager.getIndex({ dimensions: 2, persistence });
    manager.invalidate();
    const second = await manager.getIndex({ dimensions: 2, persistence });

    expect(second).not.toBe(first);
    expect(persistence.loadEntries).toHaveBeenCalledTimes(2);
  });

  it('refuses a different dimensionality than the cached index', async () => {
    const manager = new VectorIndexManager();
    await manager.getIndex({ dimensions: 2, persistence: createMockPersistence() });

    await expect(manager.getIndex({ dimensions: 3 })).rejects.toThrow(ValidationError);
  });

  it('is a process-wide singleton until reset', () => {
    const manager = getVectorIndexManager();
    expect(getVectorIndexManager()).toBe(manager);

    resetVectorIndexManager();
    expect(getVectorIndexManager()).not.toBe(manager);
  });
});

describe('createDatabasePersistence', () => {
  let testDb: TestDatabase;

  const document: Document = {
    id: 'doc-1',
    sourceUri: 'memory://doc-1',
    rawText: 'alpha beta',
    contentHash: 'hash-1',
    tags: [],
    createdAt: '2024-01-01T00:00:00.000Z',
  };

  const chunks: Chunk[] = ['alpha', 'beta'].map((text, i) => ({
    id: `chunk-${i}`,
    documentId: 'doc-1',
    text,
    offsetStart: i * 6,
    offsetEnd: i * 6 + text.length,
    sequenceIndex: i,
    page: 1,
    tokenCount: 1,
    embedding: null,
  }));

  beforeEach(() => {
    testDb = createTestDatabase();
    testDb.ops.insertDocumentWithChunks(document, chunks);
  });

  afterEach(() => {
    testDb.db.close();
  });

  it('survives a restart', () => {
    const persistence = createDatabasePersistence(testDb.ops);
    const index = new VectorIndex({ dimensions: 2, persistence });
    index.upsert([
      entry('chunk-0', [1, 0], { tags: ['q1'] }),
      entry('chunk-1', [0, 1]),
    ]);

    const restarted = new VectorIndex({ dimensions: 2, persistence });
    expect(restarted.load()).toBe(2);
    expect(restarted.search([1, 0], 1)).toEqual([{ chunkId: 'chunk-0', distance: 0 }]);
    expect(restarted.search([1, 0], 2, { tags: ['q1'] })).toHaveLength(1);
  });

  it('deletes stored entries with the document', () => {
    const persistence = createDatabasePersistence(testDb.ops);
    const index = new VectorIndex({ dimensions: 2, persistence });
    index.upsert([entry('chunk-0', [1, 0]), entry('chunk-1', [0, 1])]);

    index.delete('doc-1');

    expect(testDb.ops.loadIndexEntries()).toEqual([]);
  });
});
