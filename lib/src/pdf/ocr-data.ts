/**
 * OCR Language Data
 *
 * tesseract.js fetches `<lang>.traineddata` from a CDN unless it is given a
 * local directory. Runs without `--lang-path` read the data from the
 * `@tesseract.js-data/<lang>` package installed next to this one.
 */

import { createRequire } from 'node:module';
import { dirname } from 'node:path';

/** Model variant read from the language data packages */
export const BUNDLED_TESSDATA_VARIANT = '4.0.0_best_int';

/**
 * npm package carrying the trained data for one language
 *
 * @example
 * ```typescript
 * languageDataPackage('eng'); // '@tesseract.js-data/eng'
 * ```
 */
export function languageDataPackage(language: string): string {
  return `@tesseract.js-data/${language}`;
}

/**
 * Split a combined tesseract language ('eng+deu') into its languages
 */
export function splitLanguages(language: string): string[] {
  return language
    .split('+')
    .map((part) => part.trim())
    .filter((part) => part !== '');
}

export type ModuleResolver = (specifier: string) => string;

/**
 * Directory holding the gzipped trained data of an installed language
 * package, suitable as tesseract.js' `langPath` with `gzip: true`.
 *
 * @throws when the language package is not installed
 */
export function resolveBundledLanguageData(
  language: string,
  resolve: ModuleResolver = createRequire(import.meta.url).resolve
): string {
  return dirname(resolve(`${languageDataPackage(language)}/${BUNDLED_TESSDATA_VARIANT}/${language}.traineddata.gz`));
}
