/**
 * Output Formatting
 *
 * Pure functions that turn an extraction into artifact contents. Writing
 * them to disk is {@link ./writer.ts}'s job.
 */

import { join } from 'node:path';
import { type ExtractorName, type PageFault, countCharacters } from '../pdf/types.js';
import type { Manifest, OutputPaths, PageRecord } from './types.js';

// =============================================================================
// Paged text
// =============================================================================

export function pageStartMarker(pageNumber: number): string {
  return `----- PAGE ${pageNumber} START -----`;
}

export function pageEndMarker(pageNumber: number): string {
  return `----- PAGE ${pageNumber} END -----`;
}

/**
 * Render pages as delimited plain text, a blank line between pages and no
 * trailing newline.
 *
 * @example
 * ```typescript
 * formatPagedText(['Intro', '']);
 * // '----- PAGE 1 START -----\nIntro\n----- PAGE 1 END -----\n\n'
 * // + '----- PAGE 2 START -----\n\n----- PAGE 2 END -----'
 * ```
 */
export function formatPagedText(pages: readonly string[]): string {
  return pages
    .map((text, index) => `${pageStartMarker(index + 1)}\n${text}\n${pageEndMarker(index + 1)}`)
    .join('\n\n');
}

// =============================================================================
// JSONL
// =============================================================================

export function toPageRecords(
  pages: readonly string[],
  source: { fileName: string; filePath: string }
): PageRecord[] {
  return pages.map((text, index) => ({
    file_name: source.fileName,
    file_path: source.filePath,
    page_number: index + 1,
    text,
  }));
}

/**
 * One JSON object per page, each line newline-terminated.
 */
export function formatPagesJsonl(
  pages: readonly string[],
  source: { fileName: string; filePath: string }
): string {
  return toPageRecords(pages, source)
    .map((record) => `${JSON.stringify(record)}\n`)
    .join('');
}

// =============================================================================
// Per-page folders
// =============================================================================

/**
 * Zero-pad width for page folder numbers: at least 3, more for documents of
 * 1000 pages and up.
 */
export function determinePadWidth(pageCount: number): number {
  return Math.max(3, String(pageCount).length);
}

/**
 * @example
 * ```typescript
 * pageFolderName(7, 3);                 // '007'
 * pageFolderName(7, 3, 'REPORT_2025_'); // 'REPORT_2025_007'
 * ```
 */
export function pageFolderName(pageNumber: number, padWidth: number, prefix = ''): string {
  return `${prefix}${String(pageNumber).padStart(padWidth, '0')}`;
}

/**
 * Artifact paths for a document stem inside an (absolute) output directory
 */
export function resolveOutputPaths(outputDir: string, stem: string): OutputPaths {
  return {
    outputDir,
    textPath: join(outputDir, `${stem}.txt`),
    pagesJsonlPath: join(outputDir, `${stem}.pages.jsonl`),
    manifestPath: join(outputDir, `${stem}.manifest.json`),
    perPageDir: join(outputDir, stem),
  };
}

// =============================================================================
// Manifest
// =============================================================================

export interface ManifestInput {
  fileName: string;
  filePath: string;
  sizeBytes: number;
  sha256: string;
  pages: readonly string[];
  extractor: ExtractorName;
  fallbackAttempted: boolean;
  pageFaults: readonly PageFault[];
  paths: OutputPaths;
  /** Whether per-page folders were written */
  perPageWritten: boolean;
  createdAt: Date;
}

export function buildManifest(input: ManifestInput): Manifest {
  return {
    file_name: input.fileName,
    file_path: input.filePath,
    size_bytes: input.sizeBytes,
    sha256: input.sha256,
    num_pages: input.pages.length,
    total_characters: countCharacters(input.pages),
    extractor: input.extractor,
    output_text_path: input.paths.textPath,
    output_pages_jsonl_path: input.paths.pagesJsonlPath,
    per_page_dir: input.perPageWritten ? input.paths.perPageDir : null,
    created_at: input.createdAt.toISOString(),
    fallback_attempted: input.fallbackAttempted,
    page_faults: [...input.pageFaults]
      .sort((a, b) => a.pageNumber - b.pageNumber)
      .map((fault) => ({ page_number: fault.pageNumber, stage: fault.stage, message: fault.message })),
  };
}
