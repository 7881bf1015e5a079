/**
 * Vector Index
 *
 * In-memory nearest-neighbour index over chunk embeddings, backed by the
 * `index_entries` table:
 * - Exact (brute-force) search with a fixed distance metric
 * - Whole-batch upserts: validated, persisted, then swapped in
 * - Lazy loading from SQLite on first use via VectorIndexManager
 */

import type { DatabaseOperations } from '../database/operations.js';
import { ValidationError } from '../errors/index.js';
import { consoleLogger, type Logger } from '../utils/index.js';
import type {
  DistanceMetric,
  IndexEntry,
  IndexFilter,
  IndexPersistence,
  SearchHit,
} from './types.js';

export interface VectorIndexOptions {
  dimensions: number;
  /** Fixed for the lifetime of the index (default: cosine) */
  metric?: DistanceMetric;
  /** Durable backing; without it the index is memory-only */
  persistence?: IndexPersistence;
}

// ============================================================================
// Distance
// ============================================================================

/**
 * 1 - cosine similarity, in [0, 2]. A zero vector has no direction and is
 * treated as orthogonal to everything (distance 1).
 */
export function cosineDistance(a: ArrayLike<number>, b: ArrayLike<number>): number {
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }
  if (normA === 0 || normB === 0) {
    return 1;
  }
  const cos = dot / (Math.sqrt(normA) * Math.sqrt(normB));
  // Clamp float error so the result stays in [0, 2]
  return 1 - Math.max(-1, Math.min(1, cos));
}

export function euclideanDistance(a: ArrayLike<number>, b: ArrayLike<number>): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    const d = (a[i] ?? 0) - (b[i] ?? 0);
    sum += d * d;
  }
  return Math.sqrt(sum);
}

function distanceFn(metric: DistanceMetric): (a: Float32Array, b: Float32Array) => number {
  return metric === 'cosine' ? cosineDistance : euclideanDistance;
}

function matchesFilter(entry: IndexEntry, filter?: IndexFilter): boolean {
  if (!filter) {
    return true;
  }
  const { documentId, page, tags } = entry.metadata;
  if (filter.documentIds && !filter.documentIds.includes(documentId)) {
    return false;
  }
  if (filter.pages && !filter.pages.includes(page)) {
    return false;
  }
  if (filter.tags && !filter.tags.every((tag) => tags.includes(tag))) {
    return false;
  }
  return true;
}

// ============================================================================
// VectorIndex
// ============================================================================

/**
 * Exact nearest-neighbour index.
 *
 * All mutations are synchronous once validated, so a concurrent search sees
 * either none or all of a batch.
 *
 * @example
 * ```typescript
 * const index = new VectorIndex({ dimensions: 1536, metric: 'cosine' });
 * index.upsert(entries);
 * const hits = index.search(queryVector, 15, { documentIds: [docId] });
 * ```
 */
export class VectorIndex {
  readonly dimensions: number;
  readonly metric: DistanceMetric;
  private readonly persistence?: IndexPersistence;
  private readonly distance: (a: Float32Array, b: Float32Array) => number;
  private entries = new Map<string, IndexEntry>();

  constructor(options: VectorIndexOptions) {
    if (!Number.isInteger(options.dimensions) || options.dimensions < 1) {
      throw new ValidationError(`Invalid index dimensions: ${options.dimensions}`);
    }
    this.dimensions = options.dimensions;
    this.metric = options.metric ?? 'cosine';
    this.persistence = options.persistence;
    this.distance = distanceFn(this.metric);
  }

  get size(): number {
    return this.entries.size;
  }

  has(chunkId: string): boolean {
    return this.entries.has(chunkId);
  }

  /**
   * Insert or replace entries by chunkId. Within one batch the last entry
   * for a chunkId wins.
   *
   * @returns Number of distinct chunkIds inserted or updated
   * @throws ValidationError if any entry has the wrong dimensionality or a
   *   non-finite component (nothing is written in that case)
   */
  upsert(entries: readonly IndexEntry[]): number {
    const issues: string[] = [];
    for (const entry of entries) {
      issues.push(...this.validateVector(entry.vector, `chunk ${entry.chunkId}`));
    }
    if (issues.length > 0) {
      throw new ValidationError('Rejected index entries', issues);
    }
    if (entries.length === 0) {
      return 0;
    }

    this.persistence?.saveEntries(entries);

    const written = new Set<string>();
    for (const entry of entries) {
      written.add(entry.chunkId);
      // Own copy so later mutation of the caller's array can't leak in
      this.entries.set(entry.chunkId, {
        chunkId: entry.chunkId,
        vector: Float32Array.from(entry.vector),
        metadata: { ...entry.metadata, tags: [...entry.metadata.tags] },
      });
    }
    return written.size;
  }

  /**
   * The k nearest entries, ascending by distance (ties by chunkId).
   *
   * @throws ValidationError for a non-positive k or a mismatched query vector
   */
  search(vector: ArrayLike<number>, k: number, filter?: IndexFilter): SearchHit[] {
    if (!Number.isInteger(k) || k < 1) {
      throw new ValidationError(`k must be a positive integer, got ${k}`);
    }
    const query = Float32Array.from(vector);
    const issues = this.validateVector(query, 'query vector');
    if (issues.length > 0) {
      throw new ValidationError('Invalid query vector', issues);
    }

    const hits: SearchHit[] = [];
    for (const entry of this.entries.values()) {
      if (matchesFilter(entry, filter)) {
        hits.push({ chunkId: entry.chunkId, distance: this.distance(query, entry.vector) });
      }
    }

    hits.sort((a, b) => a.distance - b.distance || compareIds(a.chunkId, b.chunkId));
    return hits.slice(0, k);
  }

  /**
   * Remove every entry of a document.
   *
   * @returns Number of entries removed
   */
  delete(documentId: string): number {
    const chunkIds = [...this.entries.values()]
      .filter((entry) => entry.metadata.documentId === documentId)
      .map((entry) => entry.chunkId);

    this.persistence?.deleteEntriesForDocument(documentId);

    for (const chunkId of chunkIds) {
      this.entries.delete(chunkId);
    }
    return chunkIds.length;
  }

  /**
   * Drop the in-memory entries (persistence is untouched).
   */
  clear(): void {
    this.entries = new Map();
  }

  /**
   * Rebuild from persistence. The new map is swapped in only once every
   * stored entry has been read and validated.
   *
   * @returns Number of entries loaded
   */
  load(logger: Logger = consoleLogger): number {
    if (!this.persistence) {
      return this.entries.size;
    }
    const next = new Map<string, IndexEntry>();
    for (const entry of this.persistence.loadEntries()) {
      const issues = this.validateVector(entry.vector, `chunk ${entry.chunkId}`);
      if (issues.length > 0) {
        logger.warn(`[VectorIndex] Skipping stored entry: ${issues.join('; ')}`);
        continue;
      }
      next.set(entry.chunkId, entry);
    }
    this.entries = next;
    return next.size;
  }

  private validateVector(vector: ArrayLike<number>, label: string): string[] {
    if (vector.length !== this.dimensions) {
      return [`${label}: expected ${this.dimensions} dimensions, got ${vector.length}`];
    }
    for (let i = 0; i < vector.length; i++) {
      if (!Number.isFinite(vector[i])) {
        return [`${label}: component ${i} is not a finite number`];
      }
    }
    return [];
  }
}

function compareIds(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * IndexPersistence over the index_entries table.
 */
export function createDatabasePersistence(ops: DatabaseOperations): IndexPersistence {
  return {
    saveEntries: (entries) => ops.upsertIndexEntries(entries),
    deleteEntriesForDocument: (documentId) => ops.deleteIndexEntriesForDocument(documentId),
    loadEntries: () => ops.loadIndexEntries(),
  };
}

// ============================================================================
// VectorIndexManager
// ============================================================================

export interface VectorIndexManagerOptions extends VectorIndexOptions {
  logger?: Logger;
}

/**
 * Holds the process-wide index.
 *
 * Uses lazy initialization - the index is loaded from SQLite on first
 * access, and concurrent callers share the same load.
 */
export class VectorIndexManager {
  private index: VectorIndex | null = null;

  /** In-progress build, shared by concurrent callers */
  private building: Promise<VectorIndex> | null = null;

  async getIndex(options: VectorIndexManagerOptions): Promise<VectorIndex> {
    if (this.index) {
      if (this.index.dimensions !== options.dimensions || this.index.metric !== (options.metric ?? 'cosine')) {
        throw new ValidationError(
          `Index was built with ${this.index.dimensions}-d ${this.index.metric} vectors; ` +
            `requested ${options.dimensions}-d ${options.metric ?? 'cosine'}`,
          ['Re-ingest your documents after changing the embedding model or index metric']
        );
      }
      return this.index;
    }
    if (this.building) {
      return this.building;
    }

    this.building = this.build(options);
    try {
      this.index = await this.building;
      return this.index;
    } finally {
      this.building = null;
    }
  }

  private async build(options: VectorIndexManagerOptions): Promise<VectorIndex> {
    const { logger, ...indexOptions } = options;
    const index = new VectorIndex(indexOptions);
    // Yield first so concurrent callers attach to this build
    await Promise.resolve();
    index.load(logger);
    return index;
  }

  hasIndex(): boolean {
    return this.index !== null;
  }

  /**
   * Forget the cached index; the next getIndex() reloads from persistence.
   */
  invalidate(): void {
    this.index = null;
  }
}

let managerInstance: VectorIndexManager | null = null;

export function getVectorIndexManager(): VectorIndexManager {
  if (!managerInstance) {
    managerInstance = new VectorIndexManager();
  }
  return managerInstance;
}

/**
 * Reset the singleton instance.
 *
 * Useful for testing or after switching databases.
 */
export function resetVectorIndexManager(): void {
  managerInstance?.invalidate();
  managerInstance = null;
}
