/**
 * Tests for ingest-pdf argument parsing
 */

import { describe, it, expect } from 'vitest';
import { USAGE, parseArgs } from '../../lib/src/cli/args.js';

describe('parseArgs', () => {
  it('should take the input path and output directory', () => {
    expect(parseArgs(['doc.pdf', 'out'])).toEqual({
      kind: 'run',
      inputPath: 'doc.pdf',
      outputDir: 'out',
      overrides: {},
      verbose: false,
      quiet: false,
    });
  });

  it('should map every option onto config overrides', () => {
    const parsed = parseArgs([
      'doc.pdf',
      '--dpi=300',
      '--ocr-lang=eng+deu',
      '--lang-path=/opt/tessdata',
      '--no-pages',
      '--no-ocr',
      '--no-images',
      '--psm=6',
      '--ocr-only-when-no-text',
      '--page-prefix=R_',
      '--min-chars=50',
      '--log-format=json',
      'out',
      '--verbose',
    ]);

    expect(parsed).toEqual({
      kind: 'run',
      inputPath: 'doc.pdf',
      outputDir: 'out',
      overrides: {
        renderDpi: 300,
        ocrLanguage: 'eng+deu',
        ocrLangPath: '/opt/tessdata',
        renderPages: false,
        ocrEnabled: false,
        extractImages: false,
        ocrPsm: 6,
        ocrOnlyWhenNoText: true,
        pagePrefix: 'R_',
        minContentChars: 50,
        logFormat: 'json',
      },
      verbose: true,
      quiet: false,
    });
  });

  it('should recognise --quiet', () => {
    expect(parseArgs(['a.pdf', 'out', '--quiet'])).toMatchObject({ kind: 'run', quiet: true });
  });

  it('should return help for -h and --help anywhere', () => {
    expect(parseArgs(['--help'])).toEqual({ kind: 'help' });
    expect(parseArgs(['a.pdf', '-h', '--dpi=bad'])).toEqual({ kind: 'help' });
  });

  describe('usage errors', () => {
    it('should require both positionals', () => {
      expect(parseArgs(['a.pdf'])).toEqual({
        kind: 'usage-error',
        message: 'Expected <pdf_path> and <output_dir>',
      });
      expect(parseArgs([])).toMatchObject({ kind: 'usage-error' });
    });

    it('should reject extra positionals', () => {
      expect(parseArgs(['a.pdf', 'out', 'extra'])).toEqual({
        kind: 'usage-error',
        message: 'Unexpected argument: extra',
      });
    });

    it('should reject unknown options', () => {
      expect(parseArgs(['a.pdf', 'out', '--fast'])).toEqual({
        kind: 'usage-error',
        message: 'Unknown option: --fast',
      });
    });

    it('should reject non-integer numbers', () => {
      expect(parseArgs(['a.pdf', 'out', '--dpi=abc'])).toEqual({
        kind: 'usage-error',
        message: '--dpi expects an integer, got "abc"',
      });
      expect(parseArgs(['a.pdf', 'out', '--min-chars=1.5'])).toEqual({
        kind: 'usage-error',
        message: '--min-chars expects an integer, got "1.5"',
      });
      expect(parseArgs(['a.pdf', 'out', '--dpi='])).toMatchObject({ kind: 'usage-error' });
      expect(parseArgs(['a.pdf', 'out', '--psm=auto'])).toEqual({
        kind: 'usage-error',
        message: '--psm expects an integer, got "auto"',
      });
    });

    it('should reject unknown log formats', () => {
      expect(parseArgs(['a.pdf', 'out', '--log-format=pretty'])).toEqual({
        kind: 'usage-error',
        message: '--log-format must be text, json or compact, got "pretty"',
      });
    });
  });
});

describe('USAGE', () => {
  it('should document the command line and every option', () => {
    expect(USAGE).toContain('ingest-pdf <pdf_path> <output_dir> [options]');
    for (const option of ['--dpi=', '--ocr-lang=', '--lang-path=', '--psm=', '--ocr-only-when-no-text', '--no-images', '--no-pages', '--no-ocr', '--page-prefix=', '--min-chars=', '--verbose', '--quiet', '--log-format=', '--help']) {
      expect(USAGE).toContain(option);
    }
  });
});
