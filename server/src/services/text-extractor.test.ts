import { getDocument } from 'pdfjs-dist/legacy/build/pdf.mjs';
import { describe, expect, it, vi } from 'vitest';
import { isArabicText } from '../core/arabic-text';
import { ExtractionError, ValidationError } from '../errors';
import { ARABIC_HELLO, buildEncryptedPdf, buildPdf } from '../testing/pdf-fixture';
import type { ExtractedText } from '../types/document';
import {
  joinPages,
  normalizePageText,
  parsePageSelection,
  selectPages,
  TextExtractor
} from './text-extractor';

vi.mock('pdfjs-dist/legacy/build/pdf.mjs', async (importOriginal) => {
  const pdfjs = await importOriginal<typeof import('pdfjs-dist/legacy/build/pdf.mjs')>();
  return { ...pdfjs, getDocument: vi.fn(pdfjs.getDocument) };
});

const extractor = new TextExtractor();

describe('TextExtractor.extractText', () => {
  it('extracts the text of every page', async () => {
    const extracted = await extractor.extractText(buildPdf([['Hello world'], ['Second page']]));

    expect(extracted.pageCount).toBe(2);
    expect(extracted.pages).toEqual([
      { pageNumber: 1, text: 'Hello world' },
      { pageNumber: 2, text: 'Second page' }
    ]);
    expect(extracted.text).toBe('Hello world\n\nSecond page');
  });

  it('keeps the lines of a page', async () => {
    const extracted = await extractor.extractText(buildPdf([['First line', 'Second line']]));
    expect(extracted.text.split(/\s+/)).toEqual(['First', 'line', 'Second', 'line']);
  });

  it('extracts Arabic text', async () => {
    const extracted = await extractor.extractText(buildPdf([[ARABIC_HELLO]]));
    const letters = [...extracted.text.replace(/\s/g, '')].sort();

    expect(isArabicText(extracted.text)).toBe(true);
    expect(letters).toEqual([...ARABIC_HELLO].sort());
  });

  it('rejects an empty file', async () => {
    await expect(extractor.extractText(new Uint8Array())).rejects.toThrow('The uploaded file is empty');
  });

  it('rejects a file that is not a PDF', async () => {
    const data = new Uint8Array(Buffer.from('just some notes, no header here'));
    await expect(extractor.extractText(data)).rejects.toThrow(ExtractionError);
    await expect(extractor.extractText(data)).rejects.toThrow('The uploaded file is not a valid PDF');
  });

  it('rejects a password protected PDF', async () => {
    const data = await buildEncryptedPdf('Riservato', 'test-secret');

    const error = await extractor.extractText(data).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ExtractionError);
    expect(error).toHaveProperty('message', 'The PDF is password protected');
  });

  it('rejects a PDF without a text layer', async () => {
    await expect(extractor.extractText(buildPdf([[]]))).rejects.toThrow(
      'The PDF contains no extractable text. Scanned pages need OCR before they can be translated.'
    );
  });
});

describe('TextExtractor.extractDocument', () => {
  it('reports text, page count, size and metadata', async () => {
    const data = buildPdf([['One'], ['Two'], ['Three']], { title: 'Rapporto', author: 'Redazione' });
    const { extracted, info } = await extractor.extractDocument(data);

    expect(extracted.text).toBe('One\n\nTwo\n\nThree');
    expect(info.pageCount).toBe(3);
    expect(info.fileSizeKb).toBe(Math.round((data.byteLength / 1024) * 100) / 100);
    expect(info.metadata).toMatchObject({ Title: 'Rapporto', Author: 'Redazione' });
  });

  it('parses the PDF once', async () => {
    await extractor.extractDocument(buildPdf([['Hello world']]));
    expect(vi.mocked(getDocument)).toHaveBeenCalledTimes(1);
  });
});

describe('normalizePageText', () => {
  it('collapses spaces and blank lines', () => {
    expect(normalizePageText('  a \t b \r\n\r\n\r\n c ')).toBe('a b\n\nc');
  });

  it('turns non-breaking spaces into spaces', () => {
    expect(normalizePageText('a\u00A0\u00A0b')).toBe('a b');
  });
});

describe('joinPages', () => {
  it('skips empty pages', () => {
    expect(
      joinPages([
        { pageNumber: 1, text: 'uno' },
        { pageNumber: 2, text: '' },
        { pageNumber: 3, text: 'tre' }
      ])
    ).toBe('uno\n\ntre');
  });
});

describe('selectPages', () => {
  const extracted: ExtractedText = {
    pageCount: 3,
    pages: [
      { pageNumber: 1, text: 'uno' },
      { pageNumber: 2, text: 'due' },
      { pageNumber: 3, text: 'tre' }
    ],
    text: 'uno\n\ndue\n\ntre'
  };

  it('keeps every page when nothing is selected', () => {
    expect(selectPages(extracted, [])).toBe(extracted);
  });

  it('keeps the selected pages in document order', () => {
    expect(
      selectPages(extracted, [
        { start: 3, end: 3 },
        { start: 1, end: 1 }
      ])
    ).toEqual({
      pageCount: 3,
      pages: [
        { pageNumber: 1, text: 'uno' },
        { pageNumber: 3, text: 'tre' }
      ],
      text: 'uno\n\ntre'
    });
  });

  it('keeps every page of a range', () => {
    expect(selectPages(extracted, [{ start: 2, end: 3 }]).text).toBe('due\n\ntre');
  });

  it('rejects pages outside the document', () => {
    expect(() => selectPages(extracted, [{ start: 4, end: 4 }])).toThrow(ValidationError);
    expect(() => selectPages(extracted, [{ start: 2, end: 4 }])).toThrow(
      'Page 4 does not exist (the document has 3 pages)'
    );
  });

  it('rejects an oversized range without expanding it', () => {
    const ranges = parsePageSelection('1-999999999');
    expect(ranges).toEqual([{ start: 1, end: 999999999 }]);
    expect(() => selectPages(extracted, ranges)).toThrow(
      'Page 999999999 does not exist (the document has 3 pages)'
    );
  });

  it('uses the singular for a one-page document', () => {
    const single: ExtractedText = { pageCount: 1, pages: [{ pageNumber: 1, text: 'uno' }], text: 'uno' };
    expect(() => selectPages(single, [{ start: 2, end: 2 }])).toThrow(
      'Page 2 does not exist (the document has 1 page)'
    );
  });
});

describe('parsePageSelection', () => {
  it('parses single pages and ranges', () => {
    expect(parsePageSelection('1, 3-4')).toEqual([
      { start: 1, end: 1 },
      { start: 3, end: 4 }
    ]);
    expect(parsePageSelection('2')).toEqual([{ start: 2, end: 2 }]);
  });

  it('treats an empty value as every page', () => {
    expect(parsePageSelection(undefined)).toEqual([]);
    expect(parsePageSelection('  ')).toEqual([]);
  });

  it('rejects malformed selections', () => {
    expect(() => parsePageSelection('a-b')).toThrow('Invalid page selection: "a-b"');
    expect(() => parsePageSelection('4-2')).toThrow('Invalid page range: "4-2"');
    expect(() => parsePageSelection('0')).toThrow('Invalid page range: "0"');
  });
});
