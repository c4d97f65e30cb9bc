/**
 * Command-line argument parsing for `ingest-pdf`.
 */

import type { IngestConfig } from '../config/index.js';
import { LogFormatSchema } from '../logging/index.js';

export const USAGE = `
Ingest a PDF into page text, JSONL, per-page images/OCR and a manifest.

Usage:
  ingest-pdf <pdf_path> <output_dir> [options]

Options:
  --dpi=N             Page image resolution (default: 220)
  --ocr-lang=LANG     Tesseract language(s), e.g. eng or eng+deu (default: eng)
  --lang-path=DIR     Directory with <lang>.traineddata files (needed for eng+deu)
  --psm=N             Tesseract page segmentation mode 0-13 (default: 3)
  --ocr-only-when-no-text
                      OCR only pages whose extracted text is empty
  --no-pages          Do not write per-page folders
  --no-ocr            Render page images but skip OCR
  --no-images         Do not write embedded page images
  --page-prefix=STR   Prefix for per-page folder names
  --min-chars=N       Primary text below N characters tries the fallback (default: 100)
  --verbose           Show detailed logging (DEBUG level)
  --quiet             Minimal output (ERROR level only)
  --log-format=FMT    Log format: text, json, compact (default: text)
  -h, --help          Show this help message

Environment:
  INGEST_MIN_CONTENT_CHARS, INGEST_RENDER_DPI, INGEST_RENDER_PAGES, INGEST_OCR,
  INGEST_OCR_LANGUAGE, INGEST_OCR_LANG_PATH, INGEST_OCR_PSM, INGEST_OCR_ONLY_WHEN_NO_TEXT,
  INGEST_EXTRACT_IMAGES, INGEST_PAGE_PREFIX, LOG_LEVEL, LOG_FORMAT
  (flags win over the environment)

Examples:
  ingest-pdf reports/q3.pdf out
  ingest-pdf scans/contract.pdf out --dpi=300 --psm=6 --ocr-only-when-no-text
  ingest-pdf scans/brief.pdf out --ocr-lang=eng+deu --lang-path=/usr/share/tessdata
  ingest-pdf big.pdf out --no-pages --quiet
`.trim();

export type ParsedArgs =
  | { kind: 'help' }
  | { kind: 'usage-error'; message: string }
  | {
      kind: 'run';
      inputPath: string;
      outputDir: string;
      /** Config fields set by flags */
      overrides: Partial<IngestConfig>;
      verbose: boolean;
      quiet: boolean;
    };

function parseInteger(flag: string, value: string): number | string {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isInteger(parsed)) {
    return `${flag} expects an integer, got "${value}"`;
  }
  return parsed;
}

/**
 * Parse `ingest-pdf` arguments (without the node and script entries).
 *
 * @example
 * ```typescript
 * parseArgs(['doc.pdf', 'out', '--dpi=300']);
 * // { kind: 'run', inputPath: 'doc.pdf', outputDir: 'out', overrides: { renderDpi: 300 }, ... }
 * ```
 */
export function parseArgs(argv: readonly string[]): ParsedArgs {
  const positionals: string[] = [];
  const overrides: Partial<IngestConfig> = {};
  let verbose = false;
  let quiet = false;

  for (const arg of argv) {
    if (arg === '--help' || arg === '-h') {
      return { kind: 'help' };
    } else if (arg === '--verbose') {
      verbose = true;
    } else if (arg === '--quiet') {
      quiet = true;
    } else if (arg === '--no-pages') {
      overrides.renderPages = false;
    } else if (arg === '--no-ocr') {
      overrides.ocrEnabled = false;
    } else if (arg === '--no-images') {
      overrides.extractImages = false;
    } else if (arg === '--ocr-only-when-no-text') {
      overrides.ocrOnlyWhenNoText = true;
    } else if (arg.startsWith('--psm=')) {
      const psm = parseInteger('--psm', arg.slice(6));
      if (typeof psm === 'string') {
        return { kind: 'usage-error', message: psm };
      }
      overrides.ocrPsm = psm;
    } else if (arg.startsWith('--dpi=')) {
      const dpi = parseInteger('--dpi', arg.slice(6));
      if (typeof dpi === 'string') {
        return { kind: 'usage-error', message: dpi };
      }
      overrides.renderDpi = dpi;
    } else if (arg.startsWith('--min-chars=')) {
      const minChars = parseInteger('--min-chars', arg.slice(12));
      if (typeof minChars === 'string') {
        return { kind: 'usage-error', message: minChars };
      }
      overrides.minContentChars = minChars;
    } else if (arg.startsWith('--ocr-lang=')) {
      overrides.ocrLanguage = arg.slice(11);
    } else if (arg.startsWith('--lang-path=')) {
      overrides.ocrLangPath = arg.slice(12);
    } else if (arg.startsWith('--page-prefix=')) {
      overrides.pagePrefix = arg.slice(14);
    } else if (arg.startsWith('--log-format=')) {
      const format = LogFormatSchema.safeParse(arg.slice(13));
      if (!format.success) {
        return { kind: 'usage-error', message: `--log-format must be text, json or compact, got "${arg.slice(13)}"` };
      }
      overrides.logFormat = format.data;
    } else if (arg.startsWith('-') && arg !== '-') {
      return { kind: 'usage-error', message: `Unknown option: ${arg}` };
    } else {
      positionals.push(arg);
    }
  }

  const [inputPath, outputDir, ...extra] = positionals;
  if (inputPath === undefined || outputDir === undefined) {
    return { kind: 'usage-error', message: 'Expected <pdf_path> and <output_dir>' };
  }
  if (extra.length > 0) {
    return { kind: 'usage-error', message: `Unexpected argument: ${extra[0]}` };
  }

  return { kind: 'run', inputPath, outputDir, overrides, verbose, quiet };
}
