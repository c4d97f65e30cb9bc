/**
 * Fallback Text Extractor (pdf.js)
 *
 * Slower, more tolerant extraction used only when the primary extractor
 * comes back with too little text. The backend produces one text blob in
 * which every page is terminated by a form feed; the extractor re-splits
 * that blob into pages.
 */

import { readFile } from 'node:fs/promises';
import {
  type PageExtraction,
  type PageFault,
  type PageTextExtractor,
  IngestError,
  IngestErrorCode,
  classifyBackendError,
  toPageFault,
} from './types.js';
import { openPdfDocument, type PdfJsModule } from './pdfjs.js';
import type { Logger } from '../logging/index.js';

/** Page-boundary marker in the fallback backend's text blob */
export const PAGE_BREAK = '\f';

// =============================================================================
// Page splitting
// =============================================================================

/**
 * Split a form-feed delimited blob into per-page strings.
 *
 * Each page loses its trailing whitespace, and wholly empty pieces after the
 * last page with content are dropped (a marker after the final page leaves
 * one such piece behind). When the backend reported its page count, the
 * result is padded back up to it with empty pages.
 *
 * @example
 * ```typescript
 * splitOnPageBreaks('one  \ftwo\n\f');  // ['one', 'two']
 * splitOnPageBreaks('one\f\f\f', 3);    // ['one', '', '']
 * ```
 */
export function splitOnPageBreaks(text: string, expectedPageCount?: number): string[] {
  const pages = text.split(PAGE_BREAK).map((page) => page.trimEnd());

  while (pages.length > 0 && (pages[pages.length - 1] ?? '').trim() === '') {
    pages.pop();
  }

  if (expectedPageCount !== undefined) {
    while (pages.length < expectedPageCount) {
      pages.push('');
    }
  }

  return pages;
}

// =============================================================================
// pdf.js text backend
// =============================================================================

/**
 * Output of a blob-producing text backend
 */
export interface TextBlob {
  text: string;
  /** Pages the backend saw in the document */
  pageCount: number;
  faults: PageFault[];
}

export type TextBlobBackend = (data: Uint8Array, filePath: string) => Promise<TextBlob>;

/**
 * Extract the whole document's text layer with pdf.js, one page after the
 * other, each page followed by {@link PAGE_BREAK}.
 */
export function createPdfJsTextBackend(options: { pdfjs?: PdfJsModule; logger?: Logger } = {}): TextBlobBackend {
  return async (data, filePath) => {
    const pdfDocument = await openPdfDocument(data, { pdfjs: options.pdfjs, filePath });
    const faults: PageFault[] = [];
    let text = '';

    try {
      for (let pageNumber = 1; pageNumber <= pdfDocument.numPages; pageNumber++) {
        let pageText = '';
        try {
          const page = await pdfDocument.getPage(pageNumber);
          const content = await page.getTextContent();
          for (const item of content.items) {
            if ('str' in item) {
              pageText += item.hasEOL ? `${item.str}\n` : item.str;
            }
          }
          page.cleanup();
        } catch (error) {
          const fault = toPageFault(pageNumber, 'extraction', error);
          faults.push(fault);
          options.logger?.warn('Fallback page extraction failed, using empty text', {
            page: pageNumber,
            error: fault.message,
          });
        }
        text += pageText + PAGE_BREAK;
      }

      return { text, pageCount: pdfDocument.numPages, faults };
    } finally {
      await pdfDocument.destroy();
    }
  };
}

// =============================================================================
// Extractor
// =============================================================================

export interface PdfJsExtractorOptions {
  /** Text backend; pdf.js when omitted */
  backend?: TextBlobBackend;
  readDocument?: (filePath: string) => Promise<Uint8Array>;
  logger?: Logger;
}

/**
 * Create the fallback extractor.
 *
 * @example
 * ```typescript
 * const fallback = createPdfJsExtractor({ logger });
 * const { pages } = await fallback.extractPages('/data/scanned.pdf');
 * ```
 */
export function createPdfJsExtractor(options: PdfJsExtractorOptions = {}): PageTextExtractor {
  const readDocument = options.readDocument ?? ((filePath: string) => readFile(filePath));
  const backend = options.backend ?? createPdfJsTextBackend({ logger: options.logger });

  return {
    name: 'pdfjs',
    role: 'fallback',

    async extractPages(filePath: string): Promise<PageExtraction> {
      let data: Uint8Array;
      try {
        data = await readDocument(filePath);
      } catch (error) {
        throw new IngestError(`Failed to read PDF file: ${filePath}`, IngestErrorCode.READ_ERROR, {
          filePath,
          cause: error instanceof Error ? error : undefined,
        });
      }

      let blob: TextBlob;
      try {
        blob = await backend(data, filePath);
      } catch (error) {
        throw classifyBackendError(error, filePath);
      }

      const pages = splitOnPageBreaks(blob.text, blob.pageCount);
      options.logger?.debug('Fallback extraction finished', {
        pages: pages.length,
        reportedPages: blob.pageCount,
      });

      return { pages, faults: blob.faults };
    },
  };
}
