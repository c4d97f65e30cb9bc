/**
 * Tests for the fallback extractor and page-break splitting
 */

import { describe, it, expect, vi } from 'vitest';
import {
  PAGE_BREAK,
  createPdfJsExtractor,
  createPdfJsTextBackend,
  splitOnPageBreaks,
  type TextBlobBackend,
} from '../../lib/src/pdf/fallback.js';
import { assertPdfHeader } from '../../lib/src/pdf/pdfjs.js';

describe('splitOnPageBreaks', () => {
  it('should use form feed as the page break', () => {
    expect(PAGE_BREAK).toBe('\f');
  });

  it('should trim page ends and drop the empty piece after the last marker', () => {
    expect(splitOnPageBreaks('one  \ftwo\n\f')).toEqual(['one', 'two']);
  });

  it('should keep leading whitespace', () => {
    expect(splitOnPageBreaks('  indented\f')).toEqual(['  indented']);
  });

  it('should keep blank pages between pages with content', () => {
    expect(splitOnPageBreaks('a\f\fc\f')).toEqual(['a', '', 'c']);
  });

  it('should drop all trailing blank pages without a page count', () => {
    expect(splitOnPageBreaks('a\f \f\n\f')).toEqual(['a']);
  });

  it('should pad back up to the reported page count', () => {
    expect(splitOnPageBreaks('one\f\f\f', 3)).toEqual(['one', '', '']);
  });

  it('should return only empty pages for a blob without text', () => {
    expect(splitOnPageBreaks('\f\f', 2)).toEqual(['', '']);
    expect(splitOnPageBreaks('')).toEqual([]);
  });

  it('should keep a final page without a trailing marker', () => {
    expect(splitOnPageBreaks('a\fb', 2)).toEqual(['a', 'b']);
  });
});

describe('assertPdfHeader', () => {
  it('should accept data starting with %PDF-', () => {
    expect(() => assertPdfHeader(Buffer.from('%PDF-1.7\n'))).not.toThrow();
  });

  it('should reject other data as INVALID_PDF', () => {
    expect(() => assertPdfHeader(Buffer.from('<html>'), '/docs/page.pdf')).toThrow(
      'Invalid PDF: file does not start with PDF header'
    );
  });

  it('should reject data shorter than the header', () => {
    expect(() => assertPdfHeader(Buffer.from('%PD'))).toThrow('PDF buffer is too small');
  });
});

describe('createPdfJsTextBackend', () => {
  it('should reject non-PDF bytes before loading pdf.js', async () => {
    const backend = createPdfJsTextBackend();

    await expect(backend(Buffer.from('plain text file'), '/docs/notes.pdf')).rejects.toMatchObject({
      code: 'INVALID_PDF',
      filePath: '/docs/notes.pdf',
    });
  });
});

describe('createPdfJsExtractor', () => {
  const bytes = Buffer.from('%PDF-1.4 test');
  const readDocument = async () => bytes;

  it('should identify itself as the fallback pdfjs extractor', () => {
    const extractor = createPdfJsExtractor({ readDocument });

    expect(extractor.name).toBe('pdfjs');
    expect(extractor.role).toBe('fallback');
  });

  it('should split the backend blob into pages', async () => {
    const backend = vi.fn<TextBlobBackend>(async () => ({
      text: 'Page one text\fPage two text\f',
      pageCount: 2,
      faults: [],
    }));
    const extractor = createPdfJsExtractor({ backend, readDocument });

    const result = await extractor.extractPages('/docs/scan.pdf');

    expect(result.pages).toEqual(['Page one text', 'Page two text']);
    expect(backend).toHaveBeenCalledWith(bytes, '/docs/scan.pdf');
  });

  it('should keep trailing blank pages by page count', async () => {
    const extractor = createPdfJsExtractor({
      backend: async () => ({ text: 'cover\f\f\f', pageCount: 3, faults: [] }),
      readDocument,
    });

    const result = await extractor.extractPages('/docs/a.pdf');

    expect(result.pages).toEqual(['cover', '', '']);
  });

  it('should pass page faults through', async () => {
    const fault = { pageNumber: 2, stage: 'extraction' as const, message: 'bad glyphs' };
    const extractor = createPdfJsExtractor({
      backend: async () => ({ text: 'a\f\f', pageCount: 2, faults: [fault] }),
      readDocument,
    });

    const result = await extractor.extractPages('/docs/a.pdf');

    expect(result.pages).toEqual(['a', '']);
    expect(result.faults).toEqual([fault]);
  });

  it('should classify document-level backend failures', async () => {
    const extractor = createPdfJsExtractor({
      backend: async () => {
        throw new Error('No password given');
      },
      readDocument,
    });

    await expect(extractor.extractPages('/docs/locked.pdf')).rejects.toMatchObject({
      code: 'PASSWORD_PROTECTED',
      filePath: '/docs/locked.pdf',
    });
  });

  it('should report unreadable files as READ_ERROR', async () => {
    const extractor = createPdfJsExtractor({
      readDocument: async () => {
        throw new Error('EACCES');
      },
    });

    await expect(extractor.extractPages('/docs/a.pdf')).rejects.toMatchObject({ code: 'READ_ERROR' });
  });
});
