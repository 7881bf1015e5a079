/**
 * Ingestion Pipeline
 *
 * Orchestrates the complete ingestion workflow for one document:
 * Decode → Normalize → Hash → Chunk → Embed → Store → Index
 *
 * Design principles:
 * - Identical content is stored once (keyed by the sha256 of the
 *   normalized text)
 * - A document is either fully stored and indexed or not at all
 * - Batch ingestion isolates failures per document
 * - Progress is reported through callbacks; the pipeline doesn't know
 *   how it is displayed
 */

import { createHash, randomUUID } from 'node:crypto';
import { stat, readFile } from 'node:fs/promises';
import { extname, resolve } from 'node:path';
import { pathToFileURL } from 'node:url';

import { chunkDocument, normalizeText } from './chunker/index.js';
import { embedChunks } from './embedder/index.js';
import { extractPdfText, PDF_EXTENSION } from './pdf.js';
import type { EmbeddingPolicy, EmbeddingProvider } from './embedder/index.js';
import type {
  BatchIngestOutcome,
  Chunk,
  Document,
  IngestInput,
  IngestOptions,
  IngestProgress,
  IngestResult,
} from './types.js';
import type { DatabaseOperations } from '../database/operations.js';
import type { VectorIndex } from '../search/store.js';
import type { IndexEntry } from '../search/types.js';
import {
  DocumentNotFoundError,
  FileNotFoundError,
  InvalidDocumentError,
  ValidationError,
} from '../errors/index.js';
import { consoleLogger, type Logger } from '../utils/index.js';

/**
 * The slice of DatabaseOperations ingestion needs.
 */
export type DocumentStore = Pick<
  DatabaseOperations,
  'findDocumentByHash' | 'getDocument' | 'getChunksForDocument' | 'insertDocumentWithChunks' | 'deleteDocument'
>;

export interface IngestionServiceOptions {
  store: DocumentStore;
  index: VectorIndex;
  embeddingProvider: EmbeddingProvider;
  chunking: { maxTokens: number; overlapTokens: number };
  embedding?: Partial<EmbeddingPolicy> & { batchSize?: number };
  /** File checks for ingestFile */
  files?: { maxFileSizeMb: number; allowedExtensions: string[] };
  logger?: Logger;
  /** Injected for deterministic ids/timestamps in tests */
  generateId?: () => string;
  now?: () => Date;
}

export interface RemoveResult {
  documentId: string;
  /** Index entries removed */
  entriesRemoved: number;
}

export interface BatchIngestOptions extends IngestProgress {
  signal?: AbortSignal;
}

const utf8 = new TextDecoder('utf-8', { fatal: true });

/**
 * Decode bytes as strict UTF-8. A leading BOM is dropped.
 */
export function decodeContent(content: string | Uint8Array, sourceUri: string): string {
  if (typeof content === 'string') {
    return content;
  }
  try {
    return utf8.decode(content);
  } catch {
    throw new InvalidDocumentError('Document is not valid UTF-8', sourceUri);
  }
}

export function contentHash(normalizedText: string): string {
  return createHash('sha256').update(normalizedText, 'utf8').digest('hex');
}

/**
 * Ingests documents into the store and the vector index.
 *
 * @example
 * ```typescript
 * const service = new IngestionService({
 *   store: getDatabase(),
 *   index,
 *   embeddingProvider,
 *   chunking: { maxTokens: 300, overlapTokens: 50 },
 * });
 *
 * const { documentId, created } = await service.ingestDocument(text, 'file:///notes/q3.md');
 * ```
 */
export class IngestionService {
  private readonly store: DocumentStore;
  private readonly index: VectorIndex;
  private readonly embeddingProvider: EmbeddingProvider;
  private readonly options: IngestionServiceOptions;
  private readonly logger: Logger;
  private readonly generateId: () => string;
  private readonly now: () => Date;

  /** Ingestions in progress, by content hash */
  private readonly inFlight = new Map<string, Promise<IngestResult>>();

  constructor(options: IngestionServiceOptions) {
    this.options = options;
    this.store = options.store;
    this.index = options.index;
    this.embeddingProvider = options.embeddingProvider;
    this.logger = options.logger ?? consoleLogger;
    this.generateId = options.generateId ?? randomUUID;
    this.now = options.now ?? (() => new Date());

    if (this.embeddingProvider.dimensions !== this.index.dimensions) {
      throw new ValidationError(
        `Embedding provider produces ${this.embeddingProvider.dimensions}-d vectors but the index holds ${this.index.dimensions}-d vectors`
      );
    }
  }

  /**
   * Ingest one document.
   *
   * Re-ingesting identical content returns the existing document id with
   * `created: false` and leaves the index untouched.
   *
   * @throws InvalidDocumentError for undecodable or empty content
   * @throws EmbeddingUnavailableError if a chunk could not be embedded
   */
  async ingestDocument(
    content: string | Uint8Array,
    sourceUri: string,
    options: IngestOptions & IngestProgress = {}
  ): Promise<IngestResult> {
    if (sourceUri.trim().length === 0) {
      throw new ValidationError('sourceUri must not be empty');
    }

    const rawText = normalizeText(decodeContent(content, sourceUri));
    if (rawText.length === 0) {
      throw new InvalidDocumentError('Document is empty after normalization', sourceUri);
    }
    const hash = contentHash(rawText);

    const pending = this.inFlight.get(hash);
    if (pending) {
      const result = await pending;
      return { ...result, created: false };
    }

    const existing = this.store.findDocumentByHash(hash);
    if (existing) {
      this.logger.debug?.(`[Ingest] ${sourceUri} matches existing document ${existing.id}`);
      return {
        documentId: existing.id,
        created: false,
        chunkCount: this.store.getChunksForDocument(existing.id).length,
      };
    }

    const ingestion = this.ingestNew(rawText, hash, sourceUri, options);
    this.inFlight.set(hash, ingestion);
    try {
      return await ingestion;
    } finally {
      this.inFlight.delete(hash);
    }
  }

  private async ingestNew(
    rawText: string,
    hash: string,
    sourceUri: string,
    options: IngestOptions & IngestProgress
  ): Promise<IngestResult> {
    const { signal } = options;
    const tags = [...new Set(options.tags ?? [])];
    const document: Document = {
      id: this.generateId(),
      sourceUri,
      rawText,
      contentHash: hash,
      tags,
      createdAt: this.now().toISOString(),
    };

    options.onStage?.('chunking', sourceUri);
    const chunks = chunkDocument(document, {
      maxTokens: this.options.chunking.maxTokens,
      overlapTokens: this.options.chunking.overlapTokens,
      generateId: this.generateId,
    });

    options.onStage?.('embedding', sourceUri);
    await embedChunks(chunks, this.embeddingProvider, {
      ...this.options.embedding,
      signal,
      logger: this.logger,
      onProgress: (embedded, total) => options.onEmbedProgress?.(embedded, total, sourceUri),
    });
    signal?.throwIfAborted();

    options.onStage?.('storing', sourceUri);
    const entries = toIndexEntries(chunks, tags);
    this.store.insertDocumentWithChunks(document, chunks);
    try {
      this.index.upsert(entries);
    } catch (error) {
      // Don't leave a stored document the index can't find
      this.store.deleteDocument(document.id);
      throw error;
    }

    this.logger.debug?.(`[Ingest] ${sourceUri}: ${chunks.length} chunks as ${document.id}`);
    return { documentId: document.id, created: true, chunkCount: chunks.length };
  }

  /**
   * Ingest several documents in parallel. One failure never aborts the
   * others; each input gets its own outcome, in input order.
   */
  async ingestBatch(inputs: readonly IngestInput[], options: BatchIngestOptions = {}): Promise<BatchIngestOutcome[]> {
    const settled = await Promise.allSettled(
      inputs.map((input) =>
        this.ingestDocument(input.content, input.sourceUri, { ...options, tags: input.tags })
      )
    );

    return settled.map((result, i): BatchIngestOutcome => {
      const sourceUri = inputs[i]?.sourceUri ?? '';
      if (result.status === 'fulfilled') {
        return {
          sourceUri,
          status: result.value.created ? 'ingested' : 'duplicate',
          documentId: result.value.documentId,
          chunkCount: result.value.chunkCount,
        };
      }
      const error = result.reason instanceof Error ? result.reason : new Error(String(result.reason));
      this.logger.warn(`[Ingest] ${sourceUri} failed: ${error.message}`);
      return { sourceUri, status: 'failed', error };
    });
  }

  /**
   * Read a file and ingest it under its file:// URI. PDFs are reduced to
   * their text layer, one page per form feed; other files must be UTF-8.
   *
   * @throws FileNotFoundError if the path doesn't exist
   * @throws InvalidDocumentError for unsupported extensions or oversized files
   */
  async ingestFile(path: string, options: IngestOptions & IngestProgress = {}): Promise<IngestResult> {
    const absolutePath = resolve(path);
    const sourceUri = pathToFileURL(absolutePath).href;

    const info = await stat(absolutePath).catch((error: unknown) => {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        throw new FileNotFoundError(path);
      }
      throw error;
    });
    if (!info.isFile()) {
      throw new InvalidDocumentError('Not a regular file', sourceUri);
    }

    const files = this.options.files;
    if (files) {
      const extension = extname(absolutePath).toLowerCase();
      if (!files.allowedExtensions.includes(extension)) {
        throw new InvalidDocumentError(
          `Unsupported file type '${extension || '(none)'}' (allowed: ${files.allowedExtensions.join(', ')})`,
          sourceUri
        );
      }
      const maxBytes = files.maxFileSizeMb * 1024 * 1024;
      if (info.size > maxBytes) {
        throw new InvalidDocumentError(
          `File is ${(info.size / 1024 / 1024).toFixed(1)}MB, over the ${files.maxFileSizeMb}MB limit`,
          sourceUri
        );
      }
    }

    const bytes = new Uint8Array(await readFile(absolutePath));
    const content =
      extname(absolutePath).toLowerCase() === PDF_EXTENSION ? await extractPdfText(bytes, sourceUri) : bytes;
    return this.ingestDocument(content, sourceUri, options);
  }

  /**
   * Delete a document, its chunks and its index entries.
   *
   * @throws DocumentNotFoundError for an unknown id
   */
  removeDocument(documentId: string): RemoveResult {
    if (!this.store.getDocument(documentId)) {
      throw new DocumentNotFoundError(documentId);
    }
    const entriesRemoved = this.index.delete(documentId);
    this.store.deleteDocument(documentId);
    return { documentId, entriesRemoved };
  }
}

function toIndexEntries(chunks: readonly Chunk[], tags: string[]): IndexEntry[] {
  return chunks.map((chunk) => {
    if (!chunk.embedding) {
      throw new ValidationError(`Chunk ${chunk.id} has no embedding`);
    }
    return {
      chunkId: chunk.id,
      vector: chunk.embedding,
      metadata: { documentId: chunk.documentId, page: chunk.page, tags },
    };
  });
}
