/**
 * Primary Text Extractor (pdf-parse)
 *
 * Fast page-level extraction through pdf-parse's `pagerender` hook. Each
 * page's text is captured separately so that one malformed page costs only
 * its own text.
 */

import { readFile } from 'node:fs/promises';
import { createRequire } from 'node:module';
import {
  type PageExtraction,
  type PageFault,
  type PageTextExtractor,
  IngestError,
  IngestErrorCode,
  classifyBackendError,
  toPageFault,
} from './types.js';
import type { Logger } from '../logging/index.js';

// =============================================================================
// pdf-parse surface
// =============================================================================

/**
 * A text item from pdf.js `getTextContent()`. Marked-content entries carry
 * no `str` and contribute nothing.
 */
export interface PdfTextItem {
  str?: string;
  transform?: number[];
  hasEOL?: boolean;
}

/**
 * The page object pdf-parse hands to `pagerender`
 */
export interface PdfParsePage {
  pageIndex: number;
  getTextContent(options?: {
    normalizeWhitespace?: boolean;
    disableCombineTextItems?: boolean;
  }): Promise<{ items: PdfTextItem[] }>;
}

export interface PdfParseOptions {
  pagerender?: (page: PdfParsePage) => Promise<string>;
  max?: number;
}

export interface PdfParseResult {
  numpages: number;
  text: string;
}

/**
 * The call signature of pdf-parse's default export
 */
export type PdfParseFn = (data: Buffer, options?: PdfParseOptions) => Promise<PdfParseResult>;

/**
 * Load pdf-parse's implementation module.
 *
 * The package entry point runs a self-test against a bundled sample file
 * when it decides it was not required by another module, which is what an
 * ESM import looks like to it; the library module under it has no such
 * side effect.
 */
export function loadPdfParse(): PdfParseFn {
  const require = createRequire(import.meta.url);
  const pdfParse: PdfParseFn = require('pdf-parse/lib/pdf-parse.js');
  return pdfParse;
}

// =============================================================================
// Page text assembly
// =============================================================================

/**
 * Join pdf.js text items into page text, breaking lines where the text
 * matrix moves vertically (same rule as pdf-parse's default renderer).
 */
export function joinTextItems(items: readonly PdfTextItem[]): string {
  let text = '';
  let lastY: number | undefined;

  for (const item of items) {
    if (typeof item.str !== 'string') {
      continue;
    }

    const y = item.transform?.[5];
    if (lastY === undefined || y === undefined || y === lastY) {
      text += item.str;
    } else {
      text += `\n${item.str}`;
    }
    lastY = y;
  }

  return text;
}

// =============================================================================
// Extractor
// =============================================================================

export interface PdfParseExtractorOptions {
  /** pdf-parse implementation; loaded lazily when omitted */
  pdfParse?: PdfParseFn;
  /** Reads the document bytes; defaults to fs */
  readDocument?: (filePath: string) => Promise<Buffer>;
  logger?: Logger;
}

/**
 * Create the primary extractor.
 *
 * A page whose text content cannot be read is recorded as an `extraction`
 * page fault and contributes ''. A failure to open or parse the
 * document as a whole is thrown as an {@link IngestError}.
 *
 * @example
 * ```typescript
 * const primary = createPdfParseExtractor({ logger });
 * const { pages, faults } = await primary.extractPages('/data/report.pdf');
 * ```
 */
export function createPdfParseExtractor(options: PdfParseExtractorOptions = {}): PageTextExtractor {
  const readDocument = options.readDocument ?? ((filePath: string) => readFile(filePath));
  let pdfParse = options.pdfParse;

  return {
    name: 'pdf-parse',
    role: 'primary',

    async extractPages(filePath: string): Promise<PageExtraction> {
      let buffer: Buffer;
      try {
        buffer = await readDocument(filePath);
      } catch (error) {
        throw new IngestError(`Failed to read PDF file: ${filePath}`, IngestErrorCode.READ_ERROR, {
          filePath,
          cause: error instanceof Error ? error : undefined,
        });
      }

      pdfParse ??= loadPdfParse();

      const captured = new Map<number, string>();
      const faults: PageFault[] = [];

      const pagerender = async (page: PdfParsePage): Promise<string> => {
        let text = '';
        try {
          const content = await page.getTextContent({
            normalizeWhitespace: false,
            disableCombineTextItems: false,
          });
          text = joinTextItems(content.items);
        } catch (error) {
          const fault = toPageFault(page.pageIndex + 1, 'extraction', error);
          faults.push(fault);
          options.logger?.warn('Page text extraction failed, using empty text', {
            page: fault.pageNumber,
            error: fault.message,
          });
        }
        captured.set(page.pageIndex, text);
        return text;
      };

      let result: PdfParseResult;
      try {
        result = await pdfParse(buffer, { pagerender, max: 0 });
      } catch (error) {
        throw classifyBackendError(error, filePath);
      }

      const pages: string[] = [];
      for (let index = 0; index < result.numpages; index++) {
        const text = captured.get(index);
        if (text === undefined) {
          // pdf-parse swallows a failing getPage() before our hook runs
          const fault = toPageFault(index + 1, 'extraction', 'Page could not be loaded');
          faults.push(fault);
          options.logger?.warn('Page could not be loaded, using empty text', { page: index + 1 });
        }
        pages.push(text ?? '');
      }

      faults.sort((a, b) => a.pageNumber - b.pageNumber);
      options.logger?.debug('Primary extraction finished', {
        pages: pages.length,
        faults: faults.length,
      });

      return { pages, faults };
    },
  };
}
