/**
 * Artifact Writers
 *
 * Every filesystem failure here is fatal for the run and surfaces as an
 * IngestError with code WRITE_ERROR.
 */

import { mkdir, rename, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { IngestError, IngestErrorCode } from '../pdf/types.js';
import type { PageAsset } from '../pdf/render.js';
import { formatPagedText, formatPagesJsonl } from './format.js';
import type { Manifest, OutputPaths } from './types.js';

/** File names inside each per-page folder */
export const PAGE_IMAGE_FILE = 'image.png';
export const PAGE_TRANSCRIPT_FILE = 'ocr.txt';

/**
 * File name of the n-th (0-based) embedded image of a page
 *
 * @example
 * ```typescript
 * embeddedImageFileName(0);  // 'embedded-000.png'
 * ```
 */
export function embeddedImageFileName(index: number): string {
  return `embedded-${String(index).padStart(3, '0')}.png`;
}

async function writeOrFail(path: string, action: () => Promise<unknown>): Promise<void> {
  try {
    await action();
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new IngestError(`Failed to write ${path}: ${reason}`, IngestErrorCode.WRITE_ERROR, {
      filePath: path,
      cause: error instanceof Error ? error : undefined,
    });
  }
}

/**
 * Create a directory (and its parents) if missing
 */
export async function ensureDirectory(path: string): Promise<void> {
  await writeOrFail(path, () => mkdir(path, { recursive: true }));
}

/**
 * Write `<stem>.txt` and `<stem>.pages.jsonl`
 */
export async function writeTextOutputs(
  paths: OutputPaths,
  pages: readonly string[],
  source: { fileName: string; filePath: string }
): Promise<void> {
  await writeOrFail(paths.textPath, () => writeFile(paths.textPath, formatPagedText(pages), 'utf-8'));
  await writeOrFail(paths.pagesJsonlPath, () =>
    writeFile(paths.pagesJsonlPath, formatPagesJsonl(pages, source), 'utf-8')
  );
}

/**
 * Write one page folder: the page image, its transcript and any embedded
 * images. A degraded asset still produces the image and transcript files,
 * empty where their stage failed.
 */
export async function writePageAsset(pageDir: string, asset: PageAsset): Promise<void> {
  await ensureDirectory(pageDir);

  const imagePath = join(pageDir, PAGE_IMAGE_FILE);
  await writeOrFail(imagePath, () => writeFile(imagePath, asset.image));

  const transcriptPath = join(pageDir, PAGE_TRANSCRIPT_FILE);
  await writeOrFail(transcriptPath, () => writeFile(transcriptPath, asset.transcript, 'utf-8'));

  for (const [index, png] of asset.embeddedImages.entries()) {
    const embeddedPath = join(pageDir, embeddedImageFileName(index));
    await writeOrFail(embeddedPath, () => writeFile(embeddedPath, png));
  }
}

/**
 * Write the manifest through a temporary file and a rename, so the manifest
 * path only ever holds a complete document.
 */
export async function writeManifestAtomically(manifestPath: string, manifest: Manifest): Promise<void> {
  const tempPath = `${manifestPath}.${process.pid}.tmp`;

  await writeOrFail(tempPath, () => writeFile(tempPath, JSON.stringify(manifest, null, 2), 'utf-8'));
  await writeOrFail(manifestPath, async () => {
    try {
      await rename(tempPath, manifestPath);
    } catch (error) {
      await rm(tempPath, { force: true });
      throw error;
    }
  });
}
