/**
 * Output Module
 */

export {
  PageRecordSchema,
  ManifestPageFaultSchema,
  ManifestSchema,
  type PageRecord,
  type ManifestPageFault,
  type Manifest,
  type OutputPaths,
} from './types.js';

export {
  pageStartMarker,
  pageEndMarker,
  formatPagedText,
  toPageRecords,
  formatPagesJsonl,
  determinePadWidth,
  pageFolderName,
  resolveOutputPaths,
  buildManifest,
  type ManifestInput,
} from './format.js';

export {
  PAGE_IMAGE_FILE,
  PAGE_TRANSCRIPT_FILE,
  ensureDirectory,
  writeTextOutputs,
  writePageAsset,
  writeManifestAtomically,
} from './writer.js';
