/**
 * Configuration Module
 */

export {
  IngestConfigSchema,
  type IngestConfig,
  type IngestEnv,
  MIN_CONTENT_THRESHOLD,
  DEFAULT_RENDER_DPI,
  loadIngestConfig,
  validateIngestEnv,
} from './config.js';
