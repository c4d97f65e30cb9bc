/**
 * Tests for ingest configuration loading
 *
 * Tests cover:
 * - Defaults with an empty environment
 * - Environment parsing (integers, booleans, log settings)
 * - Flag overrides winning over the environment
 * - Validation errors and warnings
 */

import { describe, it, expect } from 'vitest';
import { ZodError } from 'zod';
import {
  DEFAULT_RENDER_DPI,
  IngestConfigSchema,
  MIN_CONTENT_THRESHOLD,
  loadIngestConfig,
  validateIngestEnv,
} from '../../lib/src/config/index.js';
import { LogLevel } from '../../lib/src/logging/index.js';

describe('loadIngestConfig', () => {
  it('should apply defaults for an empty environment', () => {
    const config = loadIngestConfig({});

    expect(config).toEqual({
      minContentChars: MIN_CONTENT_THRESHOLD,
      renderDpi: DEFAULT_RENDER_DPI,
      renderPages: true,
      ocrEnabled: true,
      ocrLanguage: 'eng',
      ocrPsm: 3,
      ocrOnlyWhenNoText: false,
      extractImages: true,
      pagePrefix: '',
      logLevel: LogLevel.INFO,
      logFormat: 'text',
    });
  });

  it('should keep the documented default constants', () => {
    expect(MIN_CONTENT_THRESHOLD).toBe(100);
    expect(DEFAULT_RENDER_DPI).toBe(220);
  });

  it('should read every setting from the environment', () => {
    const config = loadIngestConfig({
      INGEST_MIN_CONTENT_CHARS: '50',
      INGEST_RENDER_DPI: '300',
      INGEST_RENDER_PAGES: 'no',
      INGEST_OCR: '0',
      INGEST_OCR_LANGUAGE: 'eng+deu',
      INGEST_OCR_LANG_PATH: '/opt/tessdata',
      INGEST_OCR_PSM: '6',
      INGEST_OCR_ONLY_WHEN_NO_TEXT: 'true',
      INGEST_EXTRACT_IMAGES: 'false',
      INGEST_PAGE_PREFIX: 'DOC_',
      LOG_LEVEL: 'debug',
      LOG_FORMAT: 'json',
    });

    expect(config).toEqual({
      minContentChars: 50,
      renderDpi: 300,
      renderPages: false,
      ocrEnabled: false,
      ocrLanguage: 'eng+deu',
      ocrLangPath: '/opt/tessdata',
      ocrPsm: 6,
      ocrOnlyWhenNoText: true,
      extractImages: false,
      pagePrefix: 'DOC_',
      logLevel: LogLevel.DEBUG,
      logFormat: 'json',
    });
  });

  it('should accept true/yes/1 as booleans', () => {
    expect(loadIngestConfig({ INGEST_OCR: 'yes' }).ocrEnabled).toBe(true);
    expect(loadIngestConfig({ INGEST_RENDER_PAGES: 'TRUE' }).renderPages).toBe(true);
    expect(loadIngestConfig({ INGEST_RENDER_PAGES: '1' }).renderPages).toBe(true);
  });

  it('should ignore unrecognised booleans', () => {
    expect(loadIngestConfig({ INGEST_OCR: 'maybe' }).ocrEnabled).toBe(true);
  });

  it('should let overrides win over the environment', () => {
    const config = loadIngestConfig(
      { INGEST_RENDER_DPI: '300', INGEST_OCR: 'true' },
      { renderDpi: 150, ocrEnabled: false }
    );

    expect(config.renderDpi).toBe(150);
    expect(config.ocrEnabled).toBe(false);
  });

  it('should reject a non-numeric DPI', () => {
    expect(() => loadIngestConfig({ INGEST_RENDER_DPI: 'high' })).toThrow(ZodError);
  });

  it('should reject an out-of-range DPI', () => {
    expect(() => loadIngestConfig({}, { renderDpi: 10 })).toThrow(ZodError);
  });

  it('should reject a page prefix containing a path separator', () => {
    expect(() => loadIngestConfig({ INGEST_PAGE_PREFIX: '../x' })).toThrow(ZodError);
  });

  it('should reject a malformed OCR language', () => {
    expect(() => loadIngestConfig({}, { ocrLanguage: 'eng deu' })).toThrow(ZodError);
  });

  it('should reject a page segmentation mode outside 0-13', () => {
    expect(() => loadIngestConfig({ INGEST_OCR_PSM: '14' })).toThrow(ZodError);
    expect(loadIngestConfig({ INGEST_OCR_PSM: '0' }).ocrPsm).toBe(0);
  });

  it('should require a data directory for combined OCR languages', () => {
    expect(() => loadIngestConfig({ INGEST_OCR_LANGUAGE: 'eng+deu' })).toThrow(
      /combines several languages; pass a data directory with --lang-path/
    );
    expect(loadIngestConfig({ INGEST_OCR_LANGUAGE: 'eng+deu', INGEST_OCR_LANG_PATH: '/opt/tessdata' }).ocrLanguage).toBe(
      'eng+deu'
    );
  });

  it('should not care about combined languages when OCR is off', () => {
    expect(loadIngestConfig({ INGEST_OCR_LANGUAGE: 'eng+deu' }, { ocrEnabled: false }).ocrLanguage).toBe('eng+deu');
  });
});

describe('IngestConfigSchema', () => {
  it('should allow a zero threshold', () => {
    expect(IngestConfigSchema.parse({ minContentChars: 0 }).minContentChars).toBe(0);
  });
});

describe('validateIngestEnv', () => {
  it('should pass an empty environment', () => {
    expect(validateIngestEnv({})).toEqual({ isValid: true, warnings: [], errors: [] });
  });

  it('should warn about unrecognised booleans', () => {
    const result = validateIngestEnv({ INGEST_OCR: 'maybe' });

    expect(result.isValid).toBe(true);
    expect(result.warnings).toEqual(['INGEST_OCR=maybe is not a recognised boolean and will be ignored']);
  });

  it('should warn about unknown log levels', () => {
    const result = validateIngestEnv({ LOG_LEVEL: 'loud' });

    expect(result.warnings).toEqual(['LOG_LEVEL=loud is not a recognised level, using INFO']);
  });

  it('should not warn about an explicit INFO level', () => {
    expect(validateIngestEnv({ LOG_LEVEL: 'info' }).warnings).toEqual([]);
  });

  it('should report invalid values as errors', () => {
    const result = validateIngestEnv({ INGEST_RENDER_DPI: '10', INGEST_PAGE_PREFIX: 'a/b' });

    expect(result.isValid).toBe(false);
    expect(result.errors).toHaveLength(2);
    expect(result.errors[0]).toMatch(/^renderDpi: /);
    expect(result.errors[1]).toBe('pagePrefix: Page prefix must not contain path separators');
  });

  it('should report combined OCR languages without a data directory', () => {
    const result = validateIngestEnv({ INGEST_OCR_LANGUAGE: 'eng+deu' });

    expect(result.errors).toEqual([
      'ocrLanguage: OCR language "eng+deu" combines several languages; pass a data directory with --lang-path',
    ]);
  });
});
