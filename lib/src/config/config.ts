/**
 * Ingest Configuration
 *
 * Settings for one ingestion run. Read from environment variables with
 * defaults, then overridden by command-line flags.
 */

import { z } from 'zod';
import { LogFormatSchema, LogLevel, LogLevelSchema, parseLogLevel } from '../logging/index.js';
import { DEFAULT_OCR_PSM } from '../pdf/render.js';

/**
 * Minimum total characters for the primary extractor's output to be accepted
 * without consulting the fallback.
 */
export const MIN_CONTENT_THRESHOLD = 100;

/** DPI at which page images are rendered */
export const DEFAULT_RENDER_DPI = 220;

const IngestConfigShape = z.object({
  /** Primary output below this many characters triggers the fallback extractor */
  minContentChars: z.number().int().nonnegative().default(MIN_CONTENT_THRESHOLD),

  /** Render DPI for per-page images */
  renderDpi: z.number().int().min(36).max(1200).default(DEFAULT_RENDER_DPI),

  /** Write per-page folders (image + OCR transcript) */
  renderPages: z.boolean().default(true),

  /** OCR each rendered page; without it, ocr.txt files are left empty */
  ocrEnabled: z.boolean().default(true),

  /** Tesseract language(s), e.g. 'eng' or 'eng+deu' */
  ocrLanguage: z
    .string()
    .regex(/^[a-z_]+(\+[a-z_]+)*$/i, 'OCR language must look like "eng" or "eng+deu"')
    .default('eng'),

  /** Directory holding <lang>.traineddata files, instead of the installed @tesseract.js-data package */
  ocrLangPath: z.string().min(1).optional(),

  /** Tesseract page segmentation mode (0-13) */
  ocrPsm: z.number().int().min(0).max(13).default(DEFAULT_OCR_PSM),

  /** OCR only the pages whose extracted text is empty */
  ocrOnlyWhenNoText: z.boolean().default(false),

  /** Write the images embedded in each page next to its rendering */
  extractImages: z.boolean().default(true),

  /** Prefix for per-page folder names, e.g. 'REPORT_202509_' */
  pagePrefix: z
    .string()
    .regex(/^[^/\\]*$/, 'Page prefix must not contain path separators')
    .default(''),

  logLevel: LogLevelSchema.default(LogLevel.INFO),

  logFormat: LogFormatSchema.default('text'),
});

/**
 * Validated run settings. Installed language packages carry one language
 * each, so combined languages need a local data directory.
 */
export const IngestConfigSchema = IngestConfigShape.superRefine((config, ctx) => {
  if (config.renderPages && config.ocrEnabled && config.ocrLangPath === undefined && config.ocrLanguage.includes('+')) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['ocrLanguage'],
      message: `OCR language "${config.ocrLanguage}" combines several languages; pass a data directory with --lang-path`,
    });
  }
});

export type IngestConfig = z.infer<typeof IngestConfigSchema>;

export type IngestEnv = Record<string, string | undefined>;

function toInt(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  const parsed = Number(value.trim());
  return Number.isFinite(parsed) ? parsed : Number.NaN;
}

function toBool(value: string | undefined): boolean | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === '1' || normalized === 'true' || normalized === 'yes') {
    return true;
  }
  if (normalized === '0' || normalized === 'false' || normalized === 'no') {
    return false;
  }
  return undefined;
}

/**
 * Loads ingest configuration from environment variables.
 *
 * Environment variables:
 * - INGEST_MIN_CONTENT_CHARS: fallback threshold (default: 100)
 * - INGEST_RENDER_DPI: page image DPI (default: 220)
 * - INGEST_RENDER_PAGES: write per-page folders (default: true)
 * - INGEST_OCR: OCR rendered pages (default: true)
 * - INGEST_OCR_LANGUAGE: tesseract language(s) (default: eng)
 * - INGEST_OCR_LANG_PATH: local traineddata directory (default: the @tesseract.js-data package)
 * - INGEST_OCR_PSM: tesseract page segmentation mode 0-13 (default: 3)
 * - INGEST_OCR_ONLY_WHEN_NO_TEXT: OCR only pages without extracted text (default: false)
 * - INGEST_EXTRACT_IMAGES: write embedded page images (default: true)
 * - INGEST_PAGE_PREFIX: per-page folder name prefix (default: none)
 * - LOG_LEVEL: error | warn | info | debug | trace (default: info)
 * - LOG_FORMAT: text | json | compact (default: text)
 *
 * Keys present in `overrides` win over the environment, so callers leave
 * out the ones they do not set.
 *
 * @throws {z.ZodError} when a value is present but invalid
 */
export function loadIngestConfig(
  env: IngestEnv = process.env,
  overrides?: Partial<IngestConfig>
): IngestConfig {
  const rawConfig = {
    minContentChars: toInt(env['INGEST_MIN_CONTENT_CHARS']),
    renderDpi: toInt(env['INGEST_RENDER_DPI']),
    renderPages: toBool(env['INGEST_RENDER_PAGES']),
    ocrEnabled: toBool(env['INGEST_OCR']),
    ocrLanguage: env['INGEST_OCR_LANGUAGE'] || undefined,
    ocrLangPath: env['INGEST_OCR_LANG_PATH'] || undefined,
    ocrPsm: toInt(env['INGEST_OCR_PSM']),
    ocrOnlyWhenNoText: toBool(env['INGEST_OCR_ONLY_WHEN_NO_TEXT']),
    extractImages: toBool(env['INGEST_EXTRACT_IMAGES']),
    pagePrefix: env['INGEST_PAGE_PREFIX'],
    logLevel: env['LOG_LEVEL'] ? parseLogLevel(env['LOG_LEVEL']) : undefined,
    logFormat: env['LOG_FORMAT'] || undefined,
  };

  return IngestConfigSchema.parse({ ...rawConfig, ...overrides });
}

/**
 * Validates ingest environment variables without throwing.
 */
export function validateIngestEnv(env: IngestEnv = process.env): {
  isValid: boolean;
  warnings: string[];
  errors: string[];
} {
  const warnings: string[] = [];
  const errors: string[] = [];

  for (const key of ['INGEST_RENDER_PAGES', 'INGEST_OCR', 'INGEST_OCR_ONLY_WHEN_NO_TEXT', 'INGEST_EXTRACT_IMAGES']) {
    const value = env[key];
    if (value !== undefined && value.trim() !== '' && toBool(value) === undefined) {
      warnings.push(`${key}=${value} is not a recognised boolean and will be ignored`);
    }
  }

  const result = IngestConfigSchema.safeParse({
    minContentChars: toInt(env['INGEST_MIN_CONTENT_CHARS']),
    renderDpi: toInt(env['INGEST_RENDER_DPI']),
    renderPages: toBool(env['INGEST_RENDER_PAGES']),
    ocrEnabled: toBool(env['INGEST_OCR']),
    ocrLanguage: env['INGEST_OCR_LANGUAGE'] || undefined,
    ocrLangPath: env['INGEST_OCR_LANG_PATH'] || undefined,
    ocrPsm: toInt(env['INGEST_OCR_PSM']),
    pagePrefix: env['INGEST_PAGE_PREFIX'],
    logFormat: env['LOG_FORMAT'] || undefined,
  });

  if (!result.success) {
    for (const issue of result.error.issues) {
      errors.push(`${issue.path.join('.')}: ${issue.message}`);
    }
  }

  if (env['LOG_LEVEL'] && parseLogLevel(env['LOG_LEVEL']) === LogLevel.INFO && env['LOG_LEVEL'].toUpperCase() !== 'INFO') {
    warnings.push(`LOG_LEVEL=${env['LOG_LEVEL']} is not a recognised level, using INFO`);
  }

  return {
    isValid: errors.length === 0,
    warnings,
    errors,
  };
}
