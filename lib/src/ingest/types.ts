/**
 * Ingest Pipeline Types
 */

import { z } from 'zod';
import { ExtractorNameSchema } from '../pdf/types.js';
import type { ExtractorPair } from '../pdf/selector.js';
import type { PageRecognizer, PageRenderer } from '../pdf/render.js';
import type { IngestConfig } from '../config/index.js';
import type { Logger } from '../logging/index.js';

/**
 * A source document as identified in the manifest
 */
export interface DocumentInfo {
  fileName: string;
  /** Absolute path */
  filePath: string;
  /** File name without its last extension */
  stem: string;
  sizeBytes: number;
  sha256: string;
}

/**
 * The status line printed on success
 */
export const IngestSummarySchema = z.object({
  status: z.literal('ok'),
  message: z.string(),
  artifact_dir: z.string(),
  file: z.string(),
  num_pages: z.number().int().nonnegative(),
  total_characters: z.number().int().nonnegative(),
  extractor: ExtractorNameSchema,
  text_path: z.string(),
  pages_jsonl_path: z.string(),
});

export type IngestSummary = z.infer<typeof IngestSummarySchema>;

/**
 * Collaborators of a run. Each one defaults to the real backend; tests and
 * embedders substitute their own.
 */
export interface IngestDependencies {
  extractors?: ExtractorPair;
  createRenderer?: (filePath: string, config: IngestConfig, logger: Logger) => PageRenderer;
  createRecognizer?: (config: IngestConfig, logger: Logger) => PageRecognizer;
  /** Backend availability check run before any work */
  preflight?: (config: IngestConfig, logger: Logger) => Promise<void>;
  /** Clock for the manifest's created_at */
  now?: () => Date;
}

export interface IngestOptions {
  config: IngestConfig;
  logger?: Logger;
  dependencies?: IngestDependencies;
}
