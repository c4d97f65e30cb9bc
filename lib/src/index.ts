/**
 * pdf-ingest
 *
 * Per-page PDF text extraction with a primary/fallback extractor policy,
 * page rendering with OCR, and artifact writing.
 */

// PDF extraction, rendering and OCR
export * from './pdf/index.js';

// Output artifacts
export * from './output/index.js';

// Ingest pipeline
export * from './ingest/index.js';

// Command line
export * from './cli/index.js';

// Configuration
export * from './config/index.js';

// Logging
export * from './logging/index.js';
