/**
 * Ingest Pipeline
 *
 * Runs one document through extraction, text outputs, per-page assets and
 * the manifest, strictly in that order and one page at a time.
 */

import { join, resolve } from 'node:path';
import { checkBackends, requiredBackends } from '../pdf/preflight.js';
import { createPdfParseExtractor } from '../pdf/primary.js';
import { createPdfJsExtractor } from '../pdf/fallback.js';
import { assertDocumentExists, selectExtraction, type ExtractorPair } from '../pdf/selector.js';
import {
  createPdfJsRenderer,
  createTesseractRecognizer,
  producePageAsset,
  type PageRecognizer,
  type PageRenderer,
} from '../pdf/render.js';
import type { PageFault } from '../pdf/types.js';
import {
  buildManifest,
  determinePadWidth,
  pageFolderName,
  resolveOutputPaths,
} from '../output/format.js';
import {
  ensureDirectory,
  writeManifestAtomically,
  writePageAsset,
  writeTextOutputs,
} from '../output/writer.js';
import type { OutputPaths } from '../output/types.js';
import type { IngestConfig } from '../config/index.js';
import { type Logger, createSilentLogger } from '../logging/index.js';
import { describeDocument } from './document.js';
import type { IngestOptions, IngestSummary } from './types.js';

// =============================================================================
// Default collaborators
// =============================================================================

function defaultExtractors(logger: Logger): ExtractorPair {
  return {
    primary: createPdfParseExtractor({ logger: logger.child('pdf-parse') }),
    fallback: createPdfJsExtractor({ logger: logger.child('pdfjs') }),
  };
}

function defaultRenderer(filePath: string, config: IngestConfig, logger: Logger): PageRenderer {
  return createPdfJsRenderer(filePath, { dpi: config.renderDpi, logger });
}

function defaultRecognizer(config: IngestConfig, logger: Logger): PageRecognizer {
  return createTesseractRecognizer({
    language: config.ocrLanguage,
    langPath: config.ocrLangPath,
    psm: config.ocrPsm,
    logger,
  });
}

async function defaultPreflight(config: IngestConfig, logger: Logger): Promise<void> {
  await checkBackends(requiredBackends(config), logger);
}

// =============================================================================
// Per-page assets
// =============================================================================

/**
 * Render every page into its folder. With `ocrOnlyWhenNoText`, pages whose
 * extracted text is non-blank are rendered but not OCR'd.
 */
async function writePageAssets(
  filePath: string,
  pages: readonly string[],
  paths: OutputPaths,
  options: {
    config: IngestConfig;
    logger: Logger;
    createRenderer: (filePath: string, config: IngestConfig, logger: Logger) => PageRenderer;
    createRecognizer: (config: IngestConfig, logger: Logger) => PageRecognizer;
  }
): Promise<PageFault[]> {
  const { config, logger } = options;
  const faults: PageFault[] = [];
  const pageCount = pages.length;
  const padWidth = determinePadWidth(pageCount);

  await ensureDirectory(paths.perPageDir);

  const renderer = options.createRenderer(filePath, config, logger.child('render'));
  const recognizer = config.ocrEnabled ? options.createRecognizer(config, logger.child('ocr')) : undefined;

  try {
    for (let pageIndex = 0; pageIndex < pageCount; pageIndex++) {
      const hasText = (pages[pageIndex] ?? '').trim() !== '';
      const pageRecognizer = config.ocrOnlyWhenNoText && hasText ? undefined : recognizer;
      const asset = await producePageAsset(pageIndex, renderer, pageRecognizer, {
        extractImages: config.extractImages,
        logger,
      });
      if (asset.status === 'degraded') {
        faults.push(...asset.faults);
      }

      const pageDir = join(paths.perPageDir, pageFolderName(asset.pageNumber, padWidth, config.pagePrefix));
      await writePageAsset(pageDir, asset);
      logger.debug('Page assets written', {
        page: asset.pageNumber,
        status: asset.status,
        ocr: pageRecognizer !== undefined,
        embeddedImages: asset.embeddedImages.length,
      });
    }
  } finally {
    await recognizer?.close();
    await renderer.close();
  }

  return faults;
}

// =============================================================================
// Pipeline
// =============================================================================

/**
 * Ingest one PDF into `outputDir`.
 *
 * @throws {IngestError} FILE_NOT_FOUND before any work when the input is not
 * an existing file; BACKEND_UNAVAILABLE from preflight; the selector's
 * document-level errors; WRITE_ERROR for output failures
 *
 * @example
 * ```typescript
 * const summary = await ingestPdf('reports/q3.pdf', 'out', {
 *   config: loadIngestConfig(),
 *   logger: createLogger('ingest'),
 * });
 * console.log(summary.extractor, summary.num_pages);
 * ```
 */
export async function ingestPdf(
  inputPath: string,
  outputDir: string,
  options: IngestOptions
): Promise<IngestSummary> {
  const { config } = options;
  const logger = options.logger ?? createSilentLogger();
  const dependencies = options.dependencies ?? {};
  const now = dependencies.now ?? (() => new Date());

  const filePath = resolve(inputPath);
  const artifactDir = resolve(outputDir);

  await assertDocumentExists(filePath);
  await (dependencies.preflight ?? defaultPreflight)(config, logger.child('preflight'));

  await ensureDirectory(artifactDir);
  const document = await describeDocument(filePath);
  const paths = resolveOutputPaths(artifactDir, document.stem);

  logger.info('Ingesting document', {
    file: document.fileName,
    sizeBytes: document.sizeBytes,
    outputDir: artifactDir,
  });

  const extraction = await selectExtraction(filePath, dependencies.extractors ?? defaultExtractors(logger), {
    minContentChars: config.minContentChars,
    logger: logger.child('selector'),
    assertDocument: async () => undefined,
  });

  await writeTextOutputs(paths, extraction.pages, document);
  logger.info('Text outputs written', { text: paths.textPath, pagesJsonl: paths.pagesJsonlPath });

  const pageFaults: PageFault[] = [...extraction.pageFaults];

  if (config.renderPages) {
    const assetFaults = await writePageAssets(filePath, extraction.pages, paths, {
      config,
      logger: logger.child('pages'),
      createRenderer: dependencies.createRenderer ?? defaultRenderer,
      createRecognizer: dependencies.createRecognizer ?? defaultRecognizer,
    });
    pageFaults.push(...assetFaults);
    logger.info('Per-page folders written', { dir: paths.perPageDir, pages: extraction.pageCount });
  }

  const manifest = buildManifest({
    fileName: document.fileName,
    filePath: document.filePath,
    sizeBytes: document.sizeBytes,
    sha256: document.sha256,
    pages: extraction.pages,
    extractor: extraction.extractor,
    fallbackAttempted: extraction.fallbackAttempted,
    pageFaults,
    paths,
    perPageWritten: config.renderPages,
    createdAt: now(),
  });
  await writeManifestAtomically(paths.manifestPath, manifest);

  if (pageFaults.length > 0) {
    logger.warn('Document ingested with page faults', { faults: pageFaults.length });
  }

  return {
    status: 'ok',
    message: 'Ingestion complete',
    artifact_dir: artifactDir,
    file: document.fileName,
    num_pages: manifest.num_pages,
    total_characters: manifest.total_characters,
    extractor: manifest.extractor,
    text_path: paths.textPath,
    pages_jsonl_path: paths.pagesJsonlPath,
  };
}
