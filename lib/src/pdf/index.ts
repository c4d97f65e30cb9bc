/**
 * PDF Module
 *
 * Text extraction with primary/fallback selection, page rendering and OCR,
 * and backend preflight.
 */

// Types and schemas
export {
  // Schemas
  IngestErrorCodeSchema,
  ExtractorNameSchema,
  ExtractorRoleSchema,
  PageStageSchema,
  PageFaultSchema,
  ExtractionResultSchema,
  // Error handling
  IngestErrorCode,
  IngestError,
  isIngestError,
  classifyBackendError,
  toPageFault,
  countCharacters,
  codePointLength,
  // Types
  type ExtractorName,
  type ExtractorRole,
  type PageStage,
  type PageFault,
  type PageExtraction,
  type PageTextExtractor,
  type ExtractionResult,
} from './types.js';

// Primary extractor (pdf-parse)
export {
  createPdfParseExtractor,
  loadPdfParse,
  joinTextItems,
  type PdfParseFn,
  type PdfParseExtractorOptions,
  type PdfParsePage,
  type PdfTextItem,
} from './primary.js';

// Fallback extractor (pdf.js)
export {
  PAGE_BREAK,
  splitOnPageBreaks,
  createPdfJsTextBackend,
  createPdfJsExtractor,
  type TextBlob,
  type TextBlobBackend,
  type PdfJsExtractorOptions,
} from './fallback.js';

export { loadPdfJs, assertPdfHeader, openPdfDocument, type PdfJsModule } from './pdfjs.js';

// Selection policy
export {
  selectExtraction,
  assertDocumentExists,
  type ExtractorPair,
  type SelectionOptions,
} from './selector.js';

// Page rendering and OCR
export {
  producePageAsset,
  createPdfJsRenderer,
  createTesseractRecognizer,
  startTesseractWorker,
  toPageSegMode,
  dpiToScale,
  DEFAULT_OCR_PSM,
  type PageAsset,
  type PageAssetOptions,
  type PageRenderer,
  type PageRecognizer,
  type PdfJsRendererOptions,
  type OcrWorker,
  type OcrWorkerOptions,
  type OcrWorkerFactory,
  type TesseractRecognizerOptions,
} from './render.js';

// Embedded images
export { ImageKind, DecodedImageSchema, toRgba, encodePng, type DecodedImage } from './images.js';

// OCR language data
export {
  BUNDLED_TESSDATA_VARIANT,
  languageDataPackage,
  splitLanguages,
  resolveBundledLanguageData,
  type ModuleResolver,
} from './ocr-data.js';

// Preflight
export {
  requiredBackends,
  checkBackends,
  type BackendRequirement,
  type PreflightOptions,
} from './preflight.js';
