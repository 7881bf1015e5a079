/**
 * Indexer Module
 *
 * Turns raw documents into stored chunks and index entries.
 *
 * @example
 * ```ts
 * import { IngestionService } from './indexer';
 *
 * const service = new IngestionService({ store, index, embeddingProvider, chunking });
 * const outcomes = await service.ingestBatch([
 *   { content: 'Invoices are due in 30 days.', sourceUri: 'memory://terms' },
 * ]);
 * ```
 */

export {
  IngestionService,
  decodeContent,
  contentHash,
  type DocumentStore,
  type IngestionServiceOptions,
  type RemoveResult,
  type BatchIngestOptions,
} from './pipeline.js';

export {
  chunkDocument,
  reconstructText,
  normalizeText,
  tokenize,
  countTokens,
  PAGE_BREAK,
  type ChunkOptions,
  type ChunkSource,
  type TokenSpan,
} from './chunker/index.js';

export {
  createEmbeddingProvider,
  getModelDimensions,
  embedChunks,
  embedTexts,
  embedText,
  type EmbeddingProvider,
  type EmbeddingProviderConfig,
  type EmbeddingPolicy,
} from './embedder/index.js';

export { extractPdfText, PDF_EXTENSION } from './pdf.js';

export {
  scanDirectory,
  buildGlobPatterns,
  parseGitignoreContent,
  DEFAULT_IGNORE_PATTERNS,
  type ScanOptions,
} from './scanner.js';

export type {
  Document,
  Chunk,
  IngestOptions,
  IngestResult,
  IngestInput,
  BatchIngestOutcome,
  IngestProgress,
} from './types.js';
