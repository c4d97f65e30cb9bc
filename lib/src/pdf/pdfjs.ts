/**
 * pdf.js document loading, shared by the fallback extractor and the page
 * renderer.
 */

import type { PDFDocumentProxy, PDFPageProxy } from 'pdfjs-dist/legacy/build/pdf.mjs';
import { IngestError, IngestErrorCode } from './types.js';

export type PdfJsModule = typeof import('pdfjs-dist/legacy/build/pdf.mjs');

export type { PDFDocumentProxy, PDFPageProxy };

/**
 * Load the legacy pdf.js build, the one that runs under Node without a DOM.
 */
export async function loadPdfJs(): Promise<PdfJsModule> {
  return import('pdfjs-dist/legacy/build/pdf.mjs');
}

/**
 * Check for PDF magic bytes (%PDF-)
 */
export function assertPdfHeader(data: Uint8Array, filePath?: string): void {
  if (data.length < 5) {
    throw new IngestError('PDF buffer is too small', IngestErrorCode.INVALID_PDF, { filePath });
  }

  const header = String.fromCharCode(...data.subarray(0, 5));
  if (header !== '%PDF-') {
    throw new IngestError('Invalid PDF: file does not start with PDF header', IngestErrorCode.INVALID_PDF, {
      filePath,
    });
  }
}

export interface OpenDocumentOptions {
  pdfjs?: PdfJsModule;
  /** Canvas factory class used for pdf.js' scratch canvases while rendering */
  CanvasFactory?: object;
  filePath?: string;
}

/**
 * Open a document with pdf.js.
 *
 * pdf.js takes ownership of the array it is given, so the bytes are copied.
 */
export async function openPdfDocument(
  data: Uint8Array,
  options: OpenDocumentOptions = {}
): Promise<PDFDocumentProxy> {
  assertPdfHeader(data, options.filePath);

  const pdfjs = options.pdfjs ?? (await loadPdfJs());
  const loadingTask = pdfjs.getDocument({
    data: new Uint8Array(data),
    useWorkerFetch: false,
    isEvalSupported: false,
    useSystemFonts: true,
    verbosity: 0,
    // Decoded images arrive as pixel arrays rather than bitmaps
    isOffscreenCanvasSupported: false,
    ...(options.CanvasFactory ? { CanvasFactory: options.CanvasFactory } : {}),
  });

  return loadingTask.promise;
}
