/**
 * Chunker
 *
 * Splits normalized document text into overlapping, size-bounded chunks.
 *
 * Boundaries prefer the end of a paragraph, then the end of a sentence,
 * searching backwards from the size limit but never into the first half
 * of the window; otherwise the window is cut at exactly maxTokens.
 *
 * Every chunk is a slice of the normalized text running from its first
 * token to the start of the token after its last, so trailing whitespace
 * belongs to the chunk and dropping each chunk's overlap with its
 * predecessor reconstructs the text exactly (see reconstructText).
 */

import { randomUUID } from 'node:crypto';
import { InvalidDocumentError, ValidationError } from '../../errors/index.js';
import type { Chunk } from '../types.js';
import { normalizeText, tokenize, PAGE_BREAK, type TokenSpan } from './tokens.js';
import type { ChunkOptions, ChunkSource } from './types.js';

const SENTENCE_END = /[.!?]["'”’)\]]*$/;

function validateOptions(maxTokens: number, overlapTokens: number): void {
  const issues: string[] = [];
  if (!Number.isInteger(maxTokens) || maxTokens <= 0) {
    issues.push(`maxTokens must be a positive integer (got ${maxTokens})`);
  }
  if (!Number.isInteger(overlapTokens) || overlapTokens < 0) {
    issues.push(`overlapTokens must be a non-negative integer (got ${overlapTokens})`);
  } else if (overlapTokens >= maxTokens) {
    issues.push(`overlapTokens (${overlapTokens}) must be smaller than maxTokens (${maxTokens})`);
  }
  if (issues.length > 0) {
    throw new ValidationError('Invalid chunking options', issues);
  }
}

/**
 * Pick the exclusive end token index for a window.
 *
 * @param after - the end must be strictly greater than this
 * @param limit - the end may not exceed this
 */
function chooseEnd(text: string, tokens: TokenSpan[], after: number, limit: number): number {
  const gapAfter = (i: number): string => text.slice(tokens[i - 1]?.end ?? 0, tokens[i]?.start ?? text.length);

  for (let end = limit; end > after; end--) {
    const gap = gapAfter(end);
    if (gap.includes('\n\n') || gap.includes(PAGE_BREAK)) {
      return end;
    }
  }

  for (let end = limit; end > after; end--) {
    const last = tokens[end - 1];
    if (last && SENTENCE_END.test(text.slice(last.start, last.end))) {
      return end;
    }
  }

  return limit;
}

/**
 * Count page breaks before each requested offset. Offsets must be
 * non-decreasing across calls.
 */
function pageCounter(text: string): (offset: number) => number {
  let position = 0;
  let page = 1;
  return (offset: number) => {
    for (; position < offset; position++) {
      if (text[position] === PAGE_BREAK) {
        page++;
      }
    }
    return page;
  };
}

/**
 * Split a document into chunks.
 *
 * @throws InvalidDocumentError when the text is empty after normalization
 * @throws ValidationError on invalid sizes
 */
export function chunkDocument(document: ChunkSource, options: ChunkOptions): Chunk[] {
  const { maxTokens, overlapTokens, generateId = randomUUID } = options;
  validateOptions(maxTokens, overlapTokens);

  const text = normalizeText(document.rawText);
  const tokens = tokenize(text);
  if (tokens.length === 0) {
    throw new InvalidDocumentError('Document is empty after normalization');
  }

  const pageAt = pageCounter(text);
  const chunks: Chunk[] = [];
  let start = 0;
  let previousEnd = 0;

  for (let sequenceIndex = 0; ; sequenceIndex++) {
    const limit = Math.min(start + maxTokens, tokens.length);
    const end =
      limit === tokens.length
        ? limit
        : chooseEnd(text, tokens, Math.max(start + Math.floor(maxTokens / 2), previousEnd), limit);

    const offsetStart = tokens[start]?.start ?? 0;
    const offsetEnd = tokens[end]?.start ?? text.length;
    chunks.push({
      id: generateId(),
      documentId: document.id,
      text: text.slice(offsetStart, offsetEnd),
      offsetStart,
      offsetEnd,
      sequenceIndex,
      page: pageAt(offsetStart),
      tokenCount: end - start,
      embedding: null,
    });

    if (end === tokens.length) {
      return chunks;
    }

    // Only adjacent chunks may share tokens
    const nextStart = Math.max(end - overlapTokens, start + 1, previousEnd);
    previousEnd = end;
    start = nextStart;
  }
}

/**
 * Concatenate chunk texts, dropping the part of each chunk that its
 * predecessor already covered.
 */
export function reconstructText(chunks: readonly Pick<Chunk, 'text' | 'offsetStart' | 'offsetEnd'>[]): string {
  let result = '';
  let covered = 0;
  for (const chunk of chunks) {
    result += chunk.text.slice(Math.max(0, covered - chunk.offsetStart));
    covered = Math.max(covered, chunk.offsetEnd);
  }
  return result;
}
