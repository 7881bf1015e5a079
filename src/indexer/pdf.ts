/**
 * PDF text extraction with Mozilla's pdfjs-dist.
 *
 * Pages are joined with a form feed so the chunker can number them.
 */

import { getDocument } from 'pdfjs-dist/legacy/build/pdf.mjs';

import { InvalidDocumentError } from '../errors/index.js';
import { PAGE_BREAK } from './chunker/index.js';

export const PDF_EXTENSION = '.pdf';

/**
 * Text of every page, in order, one form feed between pages. Pages with no
 * text layer (scans) contribute an empty page so numbering stays aligned.
 *
 * @throws InvalidDocumentError when the bytes are not a readable PDF
 */
export async function extractPdfText(bytes: Uint8Array, sourceUri: string): Promise<string> {
  // pdfjs transfers the buffer to its worker; hand it a copy
  const loadingTask = getDocument({ data: new Uint8Array(bytes), isEvalSupported: false, verbosity: 0 });

  const pdf = await loadingTask.promise.catch((error: unknown) => {
    throw new InvalidDocumentError(
      `Not a readable PDF: ${error instanceof Error ? error.message : String(error)}`,
      sourceUri
    );
  });

  try {
    const pages: string[] = [];
    for (let pageNumber = 1; pageNumber <= pdf.numPages; pageNumber++) {
      const page = await pdf.getPage(pageNumber);
      const content = await page.getTextContent();
      let text = '';
      for (const item of content.items) {
        if ('str' in item) {
          text += item.str + (item.hasEOL ? '\n' : ' ');
        }
      }
      pages.push(text.trim());
    }
    return pages.join(PAGE_BREAK);
  } finally {
    await loadingTask.destroy();
  }
}
