/**
 * Ingest Module
 */

export {
  IngestSummarySchema,
  type IngestSummary,
  type DocumentInfo,
  type IngestDependencies,
  type IngestOptions,
} from './types.js';

export { hashFile, describeDocument } from './document.js';

export { ingestPdf } from './pipeline.js';
