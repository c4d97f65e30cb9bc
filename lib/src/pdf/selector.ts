/**
 * Extraction Selector
 *
 * Chooses one extractor's page texts per document. The primary extractor
 * always runs; the fallback runs only when the primary's total output is
 * below the content threshold, and wins only with strictly more text.
 */

import { stat } from 'node:fs/promises';
import { MIN_CONTENT_THRESHOLD } from '../config/index.js';
import type { Logger } from '../logging/index.js';
import {
  type ExtractionResult,
  type PageExtraction,
  type PageTextExtractor,
  IngestError,
  IngestErrorCode,
  countCharacters,
} from './types.js';

export interface ExtractorPair {
  primary: PageTextExtractor;
  fallback: PageTextExtractor;
}

export interface SelectionOptions {
  /** @default MIN_CONTENT_THRESHOLD (100) */
  minContentChars?: number;
  logger?: Logger;
  /** Existence check run before any extraction; defaults to a stat of the path */
  assertDocument?: (filePath: string) => Promise<void>;
}

/**
 * Fail with FILE_NOT_FOUND unless the path is an existing regular file
 */
export async function assertDocumentExists(filePath: string): Promise<void> {
  let isFile = false;
  try {
    isFile = (await stat(filePath)).isFile();
  } catch {
    isFile = false;
  }

  if (!isFile) {
    throw new IngestError(`PDF not found at ${filePath}`, IngestErrorCode.FILE_NOT_FOUND, { filePath });
  }
}

function toResult(
  extraction: PageExtraction,
  extractor: PageTextExtractor,
  primaryCharacters: number,
  fallbackCharacters: number | undefined,
  pageCount: number
): ExtractionResult {
  // The primary's page count is authoritative: pad short results, drop extras
  const pages = extraction.pages.slice(0, pageCount);
  while (pages.length < pageCount) {
    pages.push('');
  }

  return {
    pages,
    extractor: extractor.name,
    pageCount: pages.length,
    totalCharacters: countCharacters(pages),
    primaryCharacters,
    fallbackCharacters,
    fallbackAttempted: fallbackCharacters !== undefined,
    pageFaults: extraction.faults.filter((fault) => fault.pageNumber <= pageCount),
  };
}

/**
 * Select the page texts for a document.
 *
 * Document-level failures from either extractor propagate; only a shortfall
 * of content sends the document to the fallback.
 *
 * @example
 * ```typescript
 * const result = await selectExtraction('/data/report.pdf', {
 *   primary: createPdfParseExtractor(),
 *   fallback: createPdfJsExtractor(),
 * });
 * console.log(`${result.extractor}: ${result.totalCharacters} chars on ${result.pageCount} pages`);
 * ```
 */
export async function selectExtraction(
  filePath: string,
  extractors: ExtractorPair,
  options: SelectionOptions = {}
): Promise<ExtractionResult> {
  const { primary, fallback } = extractors;
  const threshold = options.minContentChars ?? MIN_CONTENT_THRESHOLD;
  const logger = options.logger;

  await (options.assertDocument ?? assertDocumentExists)(filePath);

  const primaryExtraction = await primary.extractPages(filePath);
  const primaryCharacters = countCharacters(primaryExtraction.pages);
  const pageCount = primaryExtraction.pages.length;

  if (primaryCharacters >= threshold) {
    logger?.info('Primary extraction accepted', {
      extractor: primary.name,
      characters: primaryCharacters,
      pages: pageCount,
    });
    return toResult(primaryExtraction, primary, primaryCharacters, undefined, pageCount);
  }

  logger?.info('Primary extraction below threshold, trying fallback', {
    extractor: primary.name,
    characters: primaryCharacters,
    threshold,
  });

  const fallbackExtraction = await fallback.extractPages(filePath);
  const fallbackCharacters = countCharacters(fallbackExtraction.pages);

  if (fallbackExtraction.pages.length !== pageCount) {
    logger?.warn('Extractors disagree on page count', {
      [primary.name]: pageCount,
      [fallback.name]: fallbackExtraction.pages.length,
    });
  }

  if (fallbackCharacters > primaryCharacters) {
    logger?.info('Fallback extraction selected', {
      extractor: fallback.name,
      characters: fallbackCharacters,
      primaryCharacters,
    });
    return toResult(fallbackExtraction, fallback, primaryCharacters, fallbackCharacters, pageCount);
  }

  logger?.info('Fallback extraction not better, keeping primary', {
    extractor: primary.name,
    characters: primaryCharacters,
    fallbackCharacters,
  });
  return toResult(primaryExtraction, primary, primaryCharacters, fallbackCharacters, pageCount);
}
