/**
 * Indexer Types
 *
 * Domain shapes for the ingestion path: Document → Chunk → IndexEntry.
 */

/**
 * An ingested document. Immutable; different content is ingested under a
 * new id rather than mutating an existing document.
 */
export interface Document {
  id: string;
  /** Where the content came from (file URI, URL, caller-supplied name) */
  sourceUri: string;
  /** Normalized text the chunks were cut from */
  rawText: string;
  /** sha256 of rawText, hex */
  contentHash: string;
  tags: string[];
  /** ISO timestamp */
  createdAt: string;
}

/**
 * A contiguous slice of a document's normalized text.
 *
 * `text === document.rawText.slice(offsetStart, offsetEnd)`. Adjacent
 * chunks may overlap by the configured overlap window; sequenceIndex is
 * strictly increasing within a document.
 */
export interface Chunk {
  id: string;
  documentId: string;
  text: string;
  offsetStart: number;
  offsetEnd: number;
  sequenceIndex: number;
  /** 1-based page (pages are separated by form feeds) */
  page: number;
  tokenCount: number;
  /** Null until the chunk is embedded */
  embedding: Float32Array | null;
}

export interface IngestOptions {
  /** Tags stored with every index entry of the document */
  tags?: string[];
  signal?: AbortSignal;
}

export interface IngestResult {
  documentId: string;
  /** False when identical content was already ingested */
  created: boolean;
  chunkCount: number;
}

export interface IngestInput {
  content: string | Uint8Array;
  sourceUri: string;
  tags?: string[];
}

export type BatchIngestOutcome =
  | { sourceUri: string; status: 'ingested' | 'duplicate'; documentId: string; chunkCount: number }
  | { sourceUri: string; status: 'failed'; error: Error };

/**
 * Progress callbacks for long ingestions (the CLI drives a spinner with them).
 */
export interface IngestProgress {
  onStage?: (stage: 'chunking' | 'embedding' | 'storing', sourceUri: string) => void;
  onEmbedProgress?: (embedded: number, total: number, sourceUri: string) => void;
}
