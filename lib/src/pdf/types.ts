/**
 * PDF Ingestion Types
 *
 * Type definitions, schemas and the error class shared by the extractors,
 * the page renderer and the ingest pipeline.
 */

import { z } from 'zod';

// =============================================================================
// Error Codes (must be defined first for use in schemas)
// =============================================================================

/**
 * Error codes for ingestion failures
 */
export const IngestErrorCode = {
  /** Input path does not resolve to an existing file */
  FILE_NOT_FOUND: 'FILE_NOT_FOUND',
  /** Invalid or corrupted PDF */
  INVALID_PDF: 'INVALID_PDF',
  /** PDF is password protected */
  PASSWORD_PROTECTED: 'PASSWORD_PROTECTED',
  /** Read error (permissions, etc.) */
  READ_ERROR: 'READ_ERROR',
  /** A required backend package cannot be loaded */
  BACKEND_UNAVAILABLE: 'BACKEND_UNAVAILABLE',
  /** Document-level failure inside an extraction backend */
  EXTRACTION_ERROR: 'EXTRACTION_ERROR',
  /** An output artifact could not be written */
  WRITE_ERROR: 'WRITE_ERROR',
} as const;

export type IngestErrorCode = (typeof IngestErrorCode)[keyof typeof IngestErrorCode];

export const IngestErrorCodeSchema = z.enum([
  'FILE_NOT_FOUND',
  'INVALID_PDF',
  'PASSWORD_PROTECTED',
  'READ_ERROR',
  'BACKEND_UNAVAILABLE',
  'EXTRACTION_ERROR',
  'WRITE_ERROR',
]);

// =============================================================================
// Extraction Schemas
// =============================================================================

/**
 * Text extraction backends, in the order they are tried
 */
export const ExtractorNameSchema = z.enum(['pdf-parse', 'pdfjs']);

export type ExtractorName = z.infer<typeof ExtractorNameSchema>;

/**
 * Position of an extractor in the selection policy
 */
export const ExtractorRoleSchema = z.enum(['primary', 'fallback']);

export type ExtractorRole = z.infer<typeof ExtractorRoleSchema>;

/**
 * Stage of per-page processing in which a fault occurred
 */
export const PageStageSchema = z.enum(['extraction', 'render', 'ocr', 'images']);

export type PageStage = z.infer<typeof PageStageSchema>;

/**
 * A recovered, page-level failure
 */
export const PageFaultSchema = z.object({
  /** 1-based page number */
  pageNumber: z.number().int().positive(),
  stage: PageStageSchema,
  message: z.string(),
});

export type PageFault = z.infer<typeof PageFaultSchema>;

/**
 * Output of one extractor run over a whole document
 */
export interface PageExtraction {
  /** One entry per page, in page order; empty string for pages without text */
  pages: string[];
  /** Pages whose text could not be extracted (their entry is '') */
  faults: PageFault[];
}

/**
 * A text extraction strategy.
 *
 * The selection policy only ever sees this shape; which library sits behind
 * it is the extractor's own business.
 */
export interface PageTextExtractor {
  readonly name: ExtractorName;
  readonly role: ExtractorRole;
  extractPages(filePath: string): Promise<PageExtraction>;
}

/**
 * The extraction chosen for a document
 */
export const ExtractionResultSchema = z.object({
  /** Chosen page texts, in page order */
  pages: z.array(z.string()),
  /** Extractor whose output is returned */
  extractor: ExtractorNameSchema,
  /** Number of pages (always pages.length) */
  pageCount: z.number().int().nonnegative(),
  /** Code points across the chosen pages */
  totalCharacters: z.number().int().nonnegative(),
  /** Code points across the primary extractor's pages */
  primaryCharacters: z.number().int().nonnegative(),
  /** Code points across the fallback extractor's pages, when it ran */
  fallbackCharacters: z.number().int().nonnegative().optional(),
  /** Whether the fallback extractor was invoked */
  fallbackAttempted: z.boolean(),
  /** Page faults recorded by the chosen extractor */
  pageFaults: z.array(PageFaultSchema),
});

export type ExtractionResult = z.infer<typeof ExtractionResultSchema>;

// =============================================================================
// Error Classes
// =============================================================================

/**
 * Error raised for document-level ingestion failures.
 *
 * Page-level failures are never thrown past the page that produced them;
 * they are recorded as {@link PageFault} values tagged with their stage.
 */
export class IngestError extends Error {
  readonly code: IngestErrorCode;
  readonly filePath: string | undefined;
  override readonly cause: Error | undefined;

  constructor(
    message: string,
    code: IngestErrorCode,
    options?: { filePath?: string | undefined; cause?: Error | undefined }
  ) {
    super(message);
    this.name = 'IngestError';
    this.code = code;
    this.filePath = options?.filePath;
    this.cause = options?.cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, IngestError);
    }
  }
}

/**
 * Type guard to check if an error is an IngestError
 */
export function isIngestError(error: unknown): error is IngestError {
  return error instanceof IngestError;
}

/**
 * Map a document-level backend failure onto an error code by its message.
 */
export function classifyBackendError(error: unknown, filePath?: string): IngestError {
  if (error instanceof IngestError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const cause = error instanceof Error ? error : undefined;
  const lower = message.toLowerCase();

  if (lower.includes('password') || lower.includes('encrypted')) {
    return new IngestError('PDF is password protected', IngestErrorCode.PASSWORD_PROTECTED, {
      filePath,
      cause,
    });
  }

  if (
    lower.includes('invalid') ||
    lower.includes('corrupt') ||
    lower.includes('xref') ||
    lower.includes('malformed')
  ) {
    return new IngestError(`Invalid or corrupted PDF: ${message}`, IngestErrorCode.INVALID_PDF, {
      filePath,
      cause,
    });
  }

  if (lower.includes('eacces') || lower.includes('permission')) {
    return new IngestError(`Failed to read PDF file: ${message}`, IngestErrorCode.READ_ERROR, {
      filePath,
      cause,
    });
  }

  return new IngestError(`PDF extraction failed: ${message}`, IngestErrorCode.EXTRACTION_ERROR, {
    filePath,
    cause,
  });
}

/**
 * Turn a caught page-level error into a fault record
 */
export function toPageFault(pageNumber: number, stage: PageStage, error: unknown): PageFault {
  return {
    pageNumber,
    stage,
    message: error instanceof Error ? error.message : String(error),
  };
}

/**
 * Number of characters (Unicode code points) in a string. A character
 * outside the Basic Multilingual Plane, such as U+1D465, counts once.
 */
export function codePointLength(text: string): number {
  let count = 0;
  for (const _char of text) {
    count++;
  }
  return count;
}

/**
 * Sum of page text lengths, in code points
 */
export function countCharacters(pages: readonly string[]): number {
  return pages.reduce((sum, page) => sum + codePointLength(page), 0);
}
