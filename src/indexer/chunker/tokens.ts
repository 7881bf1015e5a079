/**
 * Text normalization and whitespace tokenization.
 *
 * A token is a maximal run of non-whitespace characters. Token counts are
 * what `maxTokens` / `overlapTokens` measure.
 */

export interface TokenSpan {
  /** Offset of the first character */
  start: number;
  /** Offset one past the last character */
  end: number;
}

/** Form feed separates pages (as emitted by most PDF text extractors) */
export const PAGE_BREAK = '\f';

// eslint-disable-next-line no-control-regex
const CONTROL_CHARS = /[\u0000-\u0008\u000B\u000E-\u001F\u007F]/g;

/**
 * Canonical form of document text. Idempotent.
 *
 * - Unicode NFC
 * - CRLF / CR → LF
 * - control characters removed (tab, newline and form feed are kept)
 * - trailing spaces and tabs stripped from each line
 * - runs of 3+ newlines collapsed to a blank line
 * - leading/trailing whitespace trimmed
 */
export function normalizeText(raw: string): string {
  return raw
    .normalize('NFC')
    .replace(/\r\n?/g, '\n')
    .replace(CONTROL_CHARS, '')
    .replace(/[ \t]+$/gm, '')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

export function tokenize(text: string): TokenSpan[] {
  const spans: TokenSpan[] = [];
  for (const match of text.matchAll(/\S+/g)) {
    const start = match.index ?? 0;
    spans.push({ start, end: start + match[0].length });
  }
  return spans;
}

export function countTokens(text: string): number {
  return text.match(/\S+/g)?.length ?? 0;
}
