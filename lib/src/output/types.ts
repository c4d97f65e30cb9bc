/**
 * Output Artifact Types
 *
 * Wire shapes of the files an ingestion run writes. Field names are
 * snake_case because they are read by tools outside this codebase.
 */

import { z } from 'zod';
import { ExtractorNameSchema, PageStageSchema } from '../pdf/types.js';

/**
 * One line of `<stem>.pages.jsonl`
 */
export const PageRecordSchema = z.object({
  file_name: z.string(),
  /** Absolute path of the source document */
  file_path: z.string(),
  /** 1-based */
  page_number: z.number().int().positive(),
  text: z.string(),
});

export type PageRecord = z.infer<typeof PageRecordSchema>;

export const ManifestPageFaultSchema = z.object({
  page_number: z.number().int().positive(),
  stage: PageStageSchema,
  message: z.string(),
});

export type ManifestPageFault = z.infer<typeof ManifestPageFaultSchema>;

/**
 * `<stem>.manifest.json`
 */
export const ManifestSchema = z.object({
  file_name: z.string(),
  file_path: z.string(),
  size_bytes: z.number().int().nonnegative(),
  /** Lowercase hex SHA-256 of the source bytes */
  sha256: z.string().regex(/^[0-9a-f]{64}$/),
  num_pages: z.number().int().nonnegative(),
  total_characters: z.number().int().nonnegative(),
  extractor: ExtractorNameSchema,
  output_text_path: z.string(),
  output_pages_jsonl_path: z.string(),
  /** Directory of per-page folders; null when they were not written */
  per_page_dir: z.string().nullable(),
  /** ISO-8601 UTC, e.g. 2025-01-31T12:00:00.000Z */
  created_at: z.string().datetime(),
  fallback_attempted: z.boolean(),
  page_faults: z.array(ManifestPageFaultSchema),
});

export type Manifest = z.infer<typeof ManifestSchema>;

/**
 * Where a run's artifacts live, all absolute
 */
export interface OutputPaths {
  outputDir: string;
  textPath: string;
  pagesJsonlPath: string;
  manifestPath: string;
  perPageDir: string;
}
