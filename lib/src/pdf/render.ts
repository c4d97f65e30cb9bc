/**
 * Page Rendering and OCR
 *
 * Renders pages to PNG with pdf.js on an @napi-rs/canvas surface, pulls the
 * images embedded in each page, and transcribes rendered pages with a
 * tesseract.js worker. Every collaborator is fallible per page:
 * {@link producePageAsset} turns their failures into a degraded asset instead
 * of an exception, so one bad page never stops the rest of the document.
 */

import { readFile } from 'node:fs/promises';
import type { Canvas } from '@napi-rs/canvas';
import { type PageFault, toPageFault } from './types.js';
import {
  loadPdfJs,
  openPdfDocument,
  type PdfJsModule,
  type PDFDocumentProxy,
  type PDFPageProxy,
} from './pdfjs.js';
import { DecodedImageSchema, encodePng, toRgba } from './images.js';
import { resolveBundledLanguageData } from './ocr-data.js';
import type { Logger } from '../logging/index.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Renders one page (0-based index) to PNG bytes and extracts the images
 * embedded in it
 */
export interface PageRenderer {
  render(pageIndex: number): Promise<Buffer>;
  /** PNG bytes of each embedded image, in drawing order */
  extractImages(pageIndex: number): Promise<Buffer[]>;
  close(): Promise<void>;
}

/**
 * Transcribes one page image
 */
export interface PageRecognizer {
  recognize(image: Buffer): Promise<string>;
  close(): Promise<void>;
}

/**
 * The rendered image, embedded images and OCR transcript of one page.
 *
 * A degraded asset carries an empty image when rendering failed, an empty
 * transcript when rendering or recognition failed, and no embedded images
 * when their extraction failed.
 */
export type PageAsset =
  | { status: 'ok'; pageNumber: number; image: Buffer; transcript: string; embeddedImages: Buffer[] }
  | {
      status: 'degraded';
      pageNumber: number;
      image: Buffer;
      transcript: string;
      embeddedImages: Buffer[];
      faults: PageFault[];
    };

export interface PageAssetOptions {
  /** Also extract embedded images (default: false) */
  extractImages?: boolean;
  logger?: Logger;
}

// =============================================================================
// Page Asset Production
// =============================================================================

/**
 * Render, transcribe and (optionally) extract the embedded images of a page,
 * isolating each stage's failure. OCR runs only on a rendered image; image
 * extraction is independent of both.
 */
export async function producePageAsset(
  pageIndex: number,
  renderer: PageRenderer,
  recognizer: PageRecognizer | undefined,
  options: PageAssetOptions = {}
): Promise<PageAsset> {
  const { logger } = options;
  const pageNumber = pageIndex + 1;
  const faults: PageFault[] = [];

  let image: Buffer = Buffer.alloc(0);
  let rendered = false;
  try {
    image = await renderer.render(pageIndex);
    rendered = true;
  } catch (error) {
    const fault = toPageFault(pageNumber, 'render', error);
    logger?.warn('Page render failed, writing empty placeholder', { page: pageNumber, error: fault.message });
    faults.push(fault);
  }

  let transcript = '';
  if (rendered && recognizer) {
    try {
      transcript = await recognizer.recognize(image);
    } catch (error) {
      const fault = toPageFault(pageNumber, 'ocr', error);
      logger?.warn('Page OCR failed, writing empty transcript', { page: pageNumber, error: fault.message });
      faults.push(fault);
    }
  }

  let embeddedImages: Buffer[] = [];
  if (options.extractImages) {
    try {
      embeddedImages = await renderer.extractImages(pageIndex);
    } catch (error) {
      const fault = toPageFault(pageNumber, 'images', error);
      logger?.warn('Embedded image extraction failed', { page: pageNumber, error: fault.message });
      faults.push(fault);
    }
  }

  if (faults.length > 0) {
    return { status: 'degraded', pageNumber, image, transcript, embeddedImages, faults };
  }
  return { status: 'ok', pageNumber, image, transcript, embeddedImages };
}

// =============================================================================
// pdf.js + canvas renderer
// =============================================================================

export type CanvasModule = typeof import('@napi-rs/canvas');

interface CanvasAndContext {
  canvas: Canvas;
}

/**
 * Scratch-canvas factory handed to pdf.js, so that image-heavy pages render
 * on the same canvas backend as the page itself.
 */
function createCanvasFactoryClass(canvasModule: CanvasModule): object {
  return class NapiCanvasFactory {
    create(width: number, height: number) {
      const canvas = canvasModule.createCanvas(width, height);
      return { canvas, context: canvas.getContext('2d') };
    }

    reset(target: CanvasAndContext, width: number, height: number): void {
      target.canvas.width = width;
      target.canvas.height = height;
    }

    destroy(target: CanvasAndContext): void {
      target.canvas.width = 0;
      target.canvas.height = 0;
    }
  };
}

/**
 * Scale factor for a DPI, relative to the 72 DPI of PDF user space. Never
 * below 1.
 */
export function dpiToScale(dpi: number): number {
  return Math.max(1, dpi / 72);
}

/** How long to wait for pdf.js to finish decoding one image object */
const IMAGE_DECODE_TIMEOUT_MS = 10_000;

/**
 * Wait for a page's image object to be decoded. Objects shared across pages
 * ('g_' ids) live in the document-wide store.
 */
function resolveImageObject(page: PDFPageProxy, objId: string): Promise<unknown> {
  const store = objId.startsWith('g_') ? page.commonObjs : page.objs;
  return new Promise((resolve, reject) => {
    const timer = setTimeout(() => {
      reject(new Error(`Embedded image ${objId} was not decoded within ${IMAGE_DECODE_TIMEOUT_MS}ms`));
    }, IMAGE_DECODE_TIMEOUT_MS);
    store.get(objId, (data: unknown) => {
      clearTimeout(timer);
      resolve(data);
    });
  });
}

export interface PdfJsRendererOptions {
  dpi: number;
  pdfjs?: PdfJsModule;
  canvas?: CanvasModule;
  logger?: Logger;
}

/**
 * Create a renderer over one document. The document is opened on first use
 * and kept open until {@link PageRenderer.close}; if it cannot be opened,
 * every page's render fails (and is degraded by the caller).
 */
export function createPdfJsRenderer(filePath: string, options: PdfJsRendererOptions): PageRenderer {
  const scale = dpiToScale(options.dpi);
  let opened: Promise<{ document: PDFDocumentProxy; canvas: CanvasModule; pdfjs: PdfJsModule }> | undefined;

  const open = () => {
    opened ??= (async () => {
      const canvas = options.canvas ?? (await import('@napi-rs/canvas'));
      const pdfjs = options.pdfjs ?? (await loadPdfJs());
      const data = await readFile(filePath);
      const document = await openPdfDocument(data, {
        pdfjs,
        CanvasFactory: createCanvasFactoryClass(canvas),
        filePath,
      });
      options.logger?.debug('Opened document for rendering', { pages: document.numPages, scale });
      return { document, canvas, pdfjs };
    })();
    return opened;
  };

  return {
    async render(pageIndex: number): Promise<Buffer> {
      const { document, canvas: canvasModule } = await open();
      const page = await document.getPage(pageIndex + 1);

      try {
        const viewport = page.getViewport({ scale });
        const width = Math.ceil(viewport.width);
        const height = Math.ceil(viewport.height);
        const canvas = canvasModule.createCanvas(width, height);
        const context = canvas.getContext('2d');

        // Pages render without alpha
        context.fillStyle = '#ffffff';
        context.fillRect(0, 0, width, height);

        await page.render({
          canvasContext: context as unknown as CanvasRenderingContext2D,
          viewport,
        }).promise;

        return canvas.toBuffer('image/png');
      } finally {
        page.cleanup();
      }
    },

    async extractImages(pageIndex: number): Promise<Buffer[]> {
      const { document, canvas: canvasModule, pdfjs } = await open();
      const page = await document.getPage(pageIndex + 1);

      try {
        const operatorList = await page.getOperatorList();
        const images: Buffer[] = [];

        for (const [index, fn] of operatorList.fnArray.entries()) {
          const args: unknown = operatorList.argsArray[index];
          let decoded: unknown;
          if (fn === pdfjs.OPS.paintImageXObject || fn === pdfjs.OPS.paintImageXObjectRepeat) {
            const objId: unknown = Array.isArray(args) ? args[0] : undefined;
            if (typeof objId !== 'string') {
              continue;
            }
            decoded = await resolveImageObject(page, objId);
          } else if (fn === pdfjs.OPS.paintInlineImageXObject) {
            decoded = Array.isArray(args) ? args[0] : undefined;
          } else {
            continue;
          }

          const parsed = DecodedImageSchema.safeParse(decoded);
          const rgba = parsed.success ? toRgba(parsed.data) : undefined;
          if (!parsed.success || !rgba) {
            options.logger?.debug('Skipping embedded image without raw pixel data', { page: pageIndex + 1 });
            continue;
          }
          images.push(encodePng(canvasModule, rgba, parsed.data.width, parsed.data.height));
        }

        return images;
      } finally {
        page.cleanup();
      }
    },

    async close(): Promise<void> {
      if (!opened) {
        return;
      }
      const pending = opened;
      opened = undefined;
      try {
        const { document } = await pending;
        await document.destroy();
      } catch (error) {
        // Opening failed; every render already reported it
        options.logger?.debug('Renderer had no open document to close', {
          error: error instanceof Error ? error.message : String(error),
        });
      }
    },
  };
}

// =============================================================================
// tesseract.js recognizer
// =============================================================================

export type TesseractModule = typeof import('tesseract.js');

type PageSegMode = TesseractModule['PSM'][keyof TesseractModule['PSM']];

/** Page segmentation mode used when none is configured (fully automatic) */
export const DEFAULT_OCR_PSM = 3;

/**
 * A started OCR engine
 */
export interface OcrWorker {
  recognize(image: Buffer): Promise<string>;
  terminate(): Promise<void>;
}

export interface OcrWorkerOptions {
  language: string;
  /** Directory holding `<lang>.traineddata` (`.traineddata.gz` with gzip) */
  langPath: string;
  gzip: boolean;
  /** Tesseract page segmentation mode, 0-13 */
  psm: number;
}

export type OcrWorkerFactory = (options: OcrWorkerOptions) => Promise<OcrWorker>;

/**
 * tesseract.js' PSM value for a numeric mode; AUTO for numbers it does not
 * know
 */
export function toPageSegMode(Tesseract: TesseractModule, psm: number): PageSegMode {
  return Object.values(Tesseract.PSM).find((mode) => mode === String(psm)) ?? Tesseract.PSM.AUTO;
}

/**
 * Start a tesseract.js worker that reads its language data from a local
 * directory. Nothing is fetched and nothing is cached.
 */
export async function startTesseractWorker(
  options: OcrWorkerOptions,
  tesseract?: TesseractModule
): Promise<OcrWorker> {
  const Tesseract = tesseract ?? (await import('tesseract.js'));
  const worker = await Tesseract.createWorker(options.language, Tesseract.OEM.LSTM_ONLY, {
    langPath: options.langPath,
    gzip: options.gzip,
    cacheMethod: 'none',
  });
  await worker.setParameters({ tessedit_pageseg_mode: toPageSegMode(Tesseract, options.psm) });

  return {
    async recognize(image: Buffer): Promise<string> {
      const {
        data: { text },
      } = await worker.recognize(image);
      return text;
    },
    async terminate(): Promise<void> {
      await worker.terminate();
    },
  };
}

export interface TesseractRecognizerOptions {
  /** Tesseract language(s), e.g. 'eng' */
  language: string;
  /** Local directory with uncompressed <lang>.traineddata files; the installed language package when unset */
  langPath?: string;
  /** Page segmentation mode (default: {@link DEFAULT_OCR_PSM}) */
  psm?: number;
  startWorker?: OcrWorkerFactory;
  resolveLanguageData?: (language: string) => string;
  logger?: Logger;
}

/**
 * Create an OCR recognizer backed by one worker. The worker is started on
 * the first page and reused for the rest of the document.
 */
export function createTesseractRecognizer(options: TesseractRecognizerOptions): PageRecognizer {
  const startWorker = options.startWorker ?? ((workerOptions: OcrWorkerOptions) => startTesseractWorker(workerOptions));
  const resolveLanguageData = options.resolveLanguageData ?? ((language: string) => resolveBundledLanguageData(language));
  let started: Promise<OcrWorker> | undefined;

  const start = () => {
    started ??= (async () => {
      // Bundled data ships gzipped; a user directory holds plain files
      const gzip = options.langPath === undefined;
      const langPath = options.langPath ?? resolveLanguageData(options.language);
      const psm = options.psm ?? DEFAULT_OCR_PSM;
      const worker = await startWorker({ language: options.language, langPath, gzip, psm });
      options.logger?.debug('OCR worker started', { language: options.language, langPath, psm });
      return worker;
    })();
    return started;
  };

  return {
    async recognize(image: Buffer): Promise<string> {
      if (image.length === 0) {
        return '';
      }
      const worker = await start();
      return worker.recognize(image);
    },

    async close(): Promise<void> {
      if (!started) {
        return;
      }
      const pending = started;
      started = undefined;
      try {
        const worker = await pending;
        await worker.terminate();
      } catch (error) {
        options.logger?.debug('OCR worker was never started', {
          error: error instanceof Error ? error.message : String(error),
        });
      }
    },
  };
}
