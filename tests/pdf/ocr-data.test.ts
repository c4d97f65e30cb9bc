/**
 * Tests for OCR language data resolution
 */

import { describe, it, expect, vi } from 'vitest';
import {
  BUNDLED_TESSDATA_VARIANT,
  languageDataPackage,
  resolveBundledLanguageData,
  splitLanguages,
} from '../../lib/src/pdf/ocr-data.js';

describe('languageDataPackage', () => {
  it('should name the scoped data package', () => {
    expect(languageDataPackage('eng')).toBe('@tesseract.js-data/eng');
  });
});

describe('splitLanguages', () => {
  it('should split combined languages', () => {
    expect(splitLanguages('eng+deu')).toEqual(['eng', 'deu']);
  });

  it('should drop empty parts', () => {
    expect(splitLanguages(' eng + ')).toEqual(['eng']);
  });
});

describe('resolveBundledLanguageData', () => {
  it('should return the directory holding the gzipped data', () => {
    const resolve = vi.fn(() => '/node_modules/@tesseract.js-data/eng/4.0.0_best_int/eng.traineddata.gz');

    expect(resolveBundledLanguageData('eng', resolve)).toBe('/node_modules/@tesseract.js-data/eng/4.0.0_best_int');
    expect(resolve).toHaveBeenCalledWith('@tesseract.js-data/eng/4.0.0_best_int/eng.traineddata.gz');
  });

  it('should use the int-quantized best models', () => {
    expect(BUNDLED_TESSDATA_VARIANT).toBe('4.0.0_best_int');
  });

  it('should throw when the package is not installed', () => {
    expect(() => resolveBundledLanguageData('zzz')).toThrow();
  });
});
