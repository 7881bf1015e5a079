/**
 * PDF text extraction tests (PDFs are generated in memory)
 */

import { describe, it, expect } from 'vitest';

import { extractPdfText } from '../pdf.js';
import { InvalidDocumentError } from '../../errors/index.js';
import { createPdf } from '../../test-utils/index.js';

function pagesOf(text: string): string[] {
  return text.split('\f').map((page) => page.replace(/\s+/g, ' ').trim());
}

describe('extractPdfText', () => {
  it('separates pages with form feeds', async () => {
    const text = await extractPdfText(createPdf(['Rent paid in March.', 'Groceries on page two.']), 'memory://a.pdf');

    expect(pagesOf(text)).toEqual(['Rent paid in March.', 'Groceries on page two.']);
  });

  it('keeps an empty page so later pages keep their numbers', async () => {
    const text = await extractPdfText(createPdf(['First.', '', 'Third.']), 'memory://b.pdf');

    expect(pagesOf(text)).toEqual(['First.', '', 'Third.']);
  });

  it('reads escaped parentheses', async () => {
    const text = await extractPdfText(createPdf(['Fees (late) 25.00']), 'memory://c.pdf');

    expect(pagesOf(text)).toEqual(['Fees (late) 25.00']);
  });

  it('rejects bytes that are not a PDF', async () => {
    const promise = extractPdfText(new TextEncoder().encode('plain text'), 'memory://d.pdf');

    await expect(promise).rejects.toBeInstanceOf(InvalidDocumentError);
    await expect(promise).rejects.toThrow(/^Not a readable PDF: .* \(memory:\/\/d\.pdf\)$/);
  });
});
