/**
 * Tests for output formatting
 *
 * Tests cover:
 * - Paged text markers and separators
 * - JSONL records
 * - Text/JSONL round-trip
 * - Folder zero-padding
 * - Manifest construction
 */

import { describe, it, expect } from 'vitest';
import {
  buildManifest,
  determinePadWidth,
  formatPagedText,
  formatPagesJsonl,
  pageFolderName,
  resolveOutputPaths,
} from '../../lib/src/output/format.js';
import { ManifestSchema, PageRecordSchema } from '../../lib/src/output/types.js';

const SOURCE = { fileName: 'report.pdf', filePath: '/docs/report.pdf' };

/**
 * Text between page n's START and END markers
 */
function textBetweenMarkers(document: string, pageNumber: number): string | undefined {
  const start = `----- PAGE ${pageNumber} START -----\n`;
  const end = `\n----- PAGE ${pageNumber} END -----`;
  const from = document.indexOf(start);
  const to = document.indexOf(end, from + start.length);
  if (from === -1 || to === -1) {
    return undefined;
  }
  return document.slice(from + start.length, to);
}

describe('formatPagedText', () => {
  it('should wrap each page in markers with a blank line between pages', () => {
    expect(formatPagedText(['Intro', ''])).toBe(
      '----- PAGE 1 START -----\nIntro\n----- PAGE 1 END -----\n\n' +
        '----- PAGE 2 START -----\n\n----- PAGE 2 END -----'
    );
  });

  it('should not end with a newline', () => {
    expect(formatPagedText(['only']).endsWith('----- PAGE 1 END -----')).toBe(true);
  });

  it('should produce nothing for a document without pages', () => {
    expect(formatPagedText([])).toBe('');
  });
});

describe('formatPagesJsonl', () => {
  it('should write one newline-terminated record per page', () => {
    expect(formatPagesJsonl(['a', 'b'], SOURCE)).toBe(
      '{"file_name":"report.pdf","file_path":"/docs/report.pdf","page_number":1,"text":"a"}\n' +
        '{"file_name":"report.pdf","file_path":"/docs/report.pdf","page_number":2,"text":"b"}\n'
    );
  });

  it('should escape newlines inside page text', () => {
    expect(formatPagesJsonl(['x\ny'], SOURCE)).toContain('"text":"x\\ny"');
  });

  it('should keep non-ASCII text as is', () => {
    expect(formatPagesJsonl(['Grüße'], SOURCE)).toContain('"text":"Grüße"');
  });
});

describe('text and JSONL round-trip', () => {
  it('should carry the same page texts in the same order', () => {
    const pages = ['Line one\nLine two', '', 'Grüße aus Köln', '  indented'];
    const text = formatPagedText(pages);
    const records = formatPagesJsonl(pages, SOURCE)
      .split('\n')
      .filter((line) => line !== '')
      .map((line) => PageRecordSchema.parse(JSON.parse(line)));

    expect(records.map((record) => record.page_number)).toEqual([1, 2, 3, 4]);
    for (const record of records) {
      expect(textBetweenMarkers(text, record.page_number)).toBe(record.text);
    }
  });
});

describe('determinePadWidth', () => {
  it('should pad to at least three digits', () => {
    expect(determinePadWidth(0)).toBe(3);
    expect(determinePadWidth(1)).toBe(3);
    expect(determinePadWidth(999)).toBe(3);
  });

  it('should grow with the page count', () => {
    expect(determinePadWidth(1000)).toBe(4);
    expect(determinePadWidth(12345)).toBe(5);
  });
});

describe('pageFolderName', () => {
  it('should zero-pad the page number', () => {
    expect(pageFolderName(7, 3)).toBe('007');
    expect(pageFolderName(1234, 4)).toBe('1234');
  });

  it('should prepend the prefix', () => {
    expect(pageFolderName(7, 3, 'REPORT_2025_')).toBe('REPORT_2025_007');
  });
});

describe('resolveOutputPaths', () => {
  it('should name artifacts after the stem', () => {
    expect(resolveOutputPaths('/out', 'report')).toEqual({
      outputDir: '/out',
      textPath: '/out/report.txt',
      pagesJsonlPath: '/out/report.pages.jsonl',
      manifestPath: '/out/report.manifest.json',
      perPageDir: '/out/report',
    });
  });
});

describe('buildManifest', () => {
  const base = {
    ...SOURCE,
    sizeBytes: 2048,
    sha256: 'ab'.repeat(32),
    pages: ['hello', '', 'world!'],
    extractor: 'pdf-parse' as const,
    fallbackAttempted: false,
    pageFaults: [],
    paths: resolveOutputPaths('/out', 'report'),
    perPageWritten: true,
    createdAt: new Date('2025-01-31T12:00:00Z'),
  };

  it('should describe the run', () => {
    const manifest = buildManifest(base);

    expect(manifest).toEqual({
      file_name: 'report.pdf',
      file_path: '/docs/report.pdf',
      size_bytes: 2048,
      sha256: 'ab'.repeat(32),
      num_pages: 3,
      total_characters: 11,
      extractor: 'pdf-parse',
      output_text_path: '/out/report.txt',
      output_pages_jsonl_path: '/out/report.pages.jsonl',
      per_page_dir: '/out/report',
      created_at: '2025-01-31T12:00:00.000Z',
      fallback_attempted: false,
      page_faults: [],
    });
    expect(ManifestSchema.parse(manifest)).toEqual(manifest);
  });

  it('should count total characters in code points', () => {
    const manifest = buildManifest({ ...base, pages: ['\u{1D465}'.repeat(60), 'ab'] });

    expect(manifest.total_characters).toBe(62);
  });

  it('should set per_page_dir to null when folders were not written', () => {
    expect(buildManifest({ ...base, perPageWritten: false }).per_page_dir).toBeNull();
  });

  it('should list page faults by page number', () => {
    const manifest = buildManifest({
      ...base,
      pageFaults: [
        { pageNumber: 3, stage: 'ocr', message: 'worker crashed' },
        { pageNumber: 1, stage: 'extraction', message: 'bad stream' },
        { pageNumber: 3, stage: 'render', message: 'canvas' },
      ],
    });

    expect(manifest.page_faults).toEqual([
      { page_number: 1, stage: 'extraction', message: 'bad stream' },
      { page_number: 3, stage: 'ocr', message: 'worker crashed' },
      { page_number: 3, stage: 'render', message: 'canvas' },
    ]);
  });
});
