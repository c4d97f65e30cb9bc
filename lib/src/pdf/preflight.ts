/**
 * Backend Preflight
 *
 * Loads every backend package a run will need before any work starts, so a
 * missing dependency fails the run up front instead of halfway through a
 * document. Nothing is installed here.
 */

import { createRequire } from 'node:module';
import { IngestError, IngestErrorCode } from './types.js';
import { languageDataPackage, resolveBundledLanguageData, splitLanguages } from './ocr-data.js';
import type { Logger } from '../logging/index.js';

/**
 * A backend package and the module loaded to prove it is usable
 */
export interface BackendRequirement {
  /** npm package name */
  packageName: string;
  /** What the package is used for */
  purpose: string;
  load: () => Promise<unknown>;
}

export interface PreflightOptions {
  renderPages: boolean;
  ocrEnabled: boolean;
  /** Tesseract language(s), e.g. 'eng' (default: 'eng') */
  ocrLanguage?: string;
  /** Local language data directory; when set, no language package is needed */
  ocrLangPath?: string;
}

/**
 * The backends a run needs: both text extractors always, the canvas when pages
 * are rendered, tesseract.js when rendered pages are also OCR'd, plus the
 * language data package of each OCR language unless a local directory
 * provides the data.
 */
export function requiredBackends(options: PreflightOptions): BackendRequirement[] {
  const require = createRequire(import.meta.url);

  const backends: BackendRequirement[] = [
    {
      packageName: 'pdf-parse',
      purpose: 'primary text extraction',
      load: async () => require('pdf-parse/lib/pdf-parse.js'),
    },
    {
      packageName: 'pdfjs-dist',
      purpose: 'fallback text extraction and page rendering',
      load: () => import('pdfjs-dist/legacy/build/pdf.mjs'),
    },
  ];

  if (options.renderPages) {
    backends.push({
      packageName: '@napi-rs/canvas',
      purpose: 'page rendering',
      load: () => import('@napi-rs/canvas'),
    });

    if (options.ocrEnabled) {
      backends.push({
        packageName: 'tesseract.js',
        purpose: 'page OCR',
        load: () => import('tesseract.js'),
      });

      if (options.ocrLangPath === undefined) {
        for (const language of splitLanguages(options.ocrLanguage ?? 'eng')) {
          backends.push({
            packageName: languageDataPackage(language),
            purpose: `OCR language data for "${language}"`,
            load: async () => resolveBundledLanguageData(language, require.resolve),
          });
        }
      }
    }
  }

  return backends;
}

/**
 * Load each required backend in turn.
 *
 * @throws {IngestError} BACKEND_UNAVAILABLE for the first backend that fails
 * to load
 */
export async function checkBackends(
  backends: readonly BackendRequirement[],
  logger?: Logger
): Promise<void> {
  for (const backend of backends) {
    try {
      await backend.load();
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new IngestError(
        `Required backend "${backend.packageName}" (${backend.purpose}) could not be loaded: ${reason}. ` +
          `Install it with: npm install ${backend.packageName}`,
        IngestErrorCode.BACKEND_UNAVAILABLE,
        { cause: error instanceof Error ? error : undefined }
      );
    }
    logger?.debug('Backend available', { package: backend.packageName });
  }
}
