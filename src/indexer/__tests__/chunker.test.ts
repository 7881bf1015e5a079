/**
 * Chunker Module Tests
 */

import { describe, it, expect } from 'vitest';
import {
  chunkDocument,
  reconstructText,
  normalizeText,
  tokenize,
  countTokens,
} from '../chunker/index.js';
import { InvalidDocumentError, ValidationError } from '../../errors/index.js';

function words(count: number, from = 0): string[] {
  return Array.from({ length: count }, (_, i) => `w${from + i}`);
}

function sequentialIds(): () => string {
  let n = 0;
  return () => `chunk-${n++}`;
}

/** Small deterministic PRNG so the property checks are reproducible */
function lcg(seed: number): () => number {
  let state = seed;
  return () => {
    state = (state * 1103515245 + 12345) % 2147483648;
    return state / 2147483648;
  };
}

function randomDocument(random: () => number): string {
  const vocabulary = ['ledger', 'invoice', 'Q3', 'revenue', 'grew', '12%.', 'Costs', 'fell!', 'Why?', '"net"', '(gross).'];
  const separators = [' ', ' ', ' ', '  ', '\n', '\n\n', '\n\n\n', ' \t', '\r\n', '\f'];
  const parts: string[] = [];
  const length = 5 + Math.floor(random() * 400);
  for (let i = 0; i < length; i++) {
    parts.push(vocabulary[Math.floor(random() * vocabulary.length)] ?? 'x');
    parts.push(separators[Math.floor(random() * separators.length)] ?? ' ');
  }
  return parts.join('');
}

describe('normalizeText', () => {
  it('canonicalizes line endings, control chars and blank runs', () => {
    expect(normalizeText('  a  \r\nb\r\n\r\n\r\n\r\nc\u0000d  ')).toBe('a\nb\n\ncd');
  });

  it('keeps form feeds between pages', () => {
    expect(normalizeText('page one\fpage two')).toBe('page one\fpage two');
  });

  it('is idempotent', () => {
    const once = normalizeText('x \n\n\n\n y\r\n\tz ');

    expect(normalizeText(once)).toBe(once);
  });
});

describe('tokenize', () => {
  it('returns spans of non-whitespace runs', () => {
    expect(tokenize('ab  c\nd')).toEqual([
      { start: 0, end: 2 },
      { start: 4, end: 5 },
      { start: 6, end: 7 },
    ]);
    expect(countTokens(' ab  c\nd ')).toBe(3);
    expect(countTokens('   ')).toBe(0);
  });
});

describe('chunkDocument', () => {
  it('splits a 900-token, 3-page document into 4 overlapping chunks', () => {
    const rawText = [words(300, 0), words(300, 300), words(300, 600)].map((p) => p.join(' ')).join('\f');

    const chunks = chunkDocument(
      { id: 'doc-1', rawText },
      { maxTokens: 300, overlapTokens: 50, generateId: sequentialIds() }
    );

    expect(chunks).toHaveLength(4);
    expect(chunks.map((c) => c.tokenCount)).toEqual([300, 300, 300, 150]);
    expect(chunks.map((c) => c.page)).toEqual([1, 1, 2, 3]);
    expect(chunks.map((c) => c.sequenceIndex)).toEqual([0, 1, 2, 3]);
    expect(chunks.map((c) => c.id)).toEqual(['chunk-0', 'chunk-1', 'chunk-2', 'chunk-3']);

    // Adjacent chunks share exactly 50 tokens
    for (let i = 0; i + 1 < chunks.length; i++) {
      const current = tokenize(chunks[i]?.text ?? '').length;
      const next = chunks[i + 1];
      expect(current).toBeLessThanOrEqual(300);
      expect(next?.text.startsWith(`w${250 * (i + 1)} `)).toBe(true);
    }
    expect(chunks[1]?.text.split(/\s+/)[0]).toBe('w250');
    expect(chunks[3]?.text.endsWith('w899')).toBe(true);
    expect(chunks.every((c) => c.documentId === 'doc-1' && c.embedding === null)).toBe(true);
  });

  it('prefers sentence ends in the second half of the window', () => {
    const chunks = chunkDocument(
      { id: 'd', rawText: 'a b c d e f g. h i j k l m n o p' },
      { maxTokens: 10, overlapTokens: 2 }
    );

    expect(chunks.map((c) => c.text)).toEqual(['a b c d e f g. ', 'f g. h i j k l m n o ', 'n o p']);
    expect(chunks.map((c) => c.tokenCount)).toEqual([7, 10, 3]);
  });

  it('prefers paragraph ends over sentence ends', () => {
    const chunks = chunkDocument(
      { id: 'd', rawText: 'Alpha beta gamma.\n\nDelta epsilon zeta eta theta iota kappa.' },
      { maxTokens: 5, overlapTokens: 0 }
    );

    expect(chunks.map((c) => c.text)).toEqual([
      'Alpha beta gamma.\n\n',
      'Delta epsilon zeta eta theta ',
      'iota kappa.',
    ]);
  });

  it('returns a single chunk for short documents', () => {
    const chunks = chunkDocument({ id: 'd', rawText: '  Just one line.  ' }, { maxTokens: 50, overlapTokens: 10 });

    expect(chunks).toHaveLength(1);
    expect(chunks[0]).toMatchObject({ text: 'Just one line.', offsetStart: 0, offsetEnd: 14, page: 1 });
  });

  it('throws InvalidDocumentError for whitespace-only text', () => {
    expect(() => chunkDocument({ id: 'd', rawText: ' \n\t\r\n ' }, { maxTokens: 10, overlapTokens: 0 })).toThrow(
      InvalidDocumentError
    );
  });

  it.each([
    [0, 0],
    [10, 10],
    [10, 12],
    [10, -1],
    [2.5, 0],
  ])('rejects maxTokens=%d overlapTokens=%d', (maxTokens, overlapTokens) => {
    expect(() => chunkDocument({ id: 'd', rawText: 'text' }, { maxTokens, overlapTokens })).toThrow(ValidationError);
  });

  it('round-trips and respects size and overlap invariants', () => {
    const random = lcg(42);
    const settings: Array<[number, number]> = [
      [1, 0],
      [3, 2],
      [7, 3],
      [20, 5],
      [50, 49],
      [300, 50],
    ];

    for (let docIndex = 0; docIndex < 25; docIndex++) {
      const rawText = randomDocument(random);
      const normalized = normalizeText(rawText);

      for (const [maxTokens, overlapTokens] of settings) {
        const chunks = chunkDocument({ id: 'd', rawText }, { maxTokens, overlapTokens });

        expect(reconstructText(chunks)).toBe(normalized);
        chunks.forEach((chunk, i) => {
          expect(chunk.text).toBe(normalized.slice(chunk.offsetStart, chunk.offsetEnd));
          expect(chunk.tokenCount).toBe(countTokens(chunk.text));
          expect(chunk.tokenCount).toBeLessThanOrEqual(maxTokens);
          expect(chunk.sequenceIndex).toBe(i);

          const previous = chunks[i - 1];
          if (previous) {
            expect(chunk.offsetStart).toBeGreaterThan(previous.offsetStart);
            expect(chunk.offsetEnd).toBeGreaterThan(previous.offsetEnd);
            expect(chunk.offsetStart).toBeLessThanOrEqual(previous.offsetEnd);
            expect(chunk.page).toBeGreaterThanOrEqual(previous.page);
          }
          const beforePrevious = chunks[i - 2];
          if (beforePrevious) {
            expect(chunk.offsetStart).toBeGreaterThanOrEqual(beforePrevious.offsetEnd);
          }
        });
      }
    }
  });
});

describe('reconstructText', () => {
  it('drops overlapping prefixes', () => {
    expect(
      reconstructText([
        { text: 'one two ', offsetStart: 0, offsetEnd: 8 },
        { text: 'two three', offsetStart: 4, offsetEnd: 13 },
      ])
    ).toBe('one two three');
  });
});
