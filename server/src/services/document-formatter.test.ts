import { describe, expect, it } from 'vitest';
import { buildDownloadName, DocumentFormatter, formatTimestamp } from './document-formatter';
import { TextExtractor } from './text-extractor';

const now = new Date(2024, 0, 31, 9, 5, 7);

describe('buildDownloadName', () => {
  it('adds a suffix and a timestamp to the original name', () => {
    expect(formatTimestamp(now)).toBe('20240131_090507');
    expect(buildDownloadName('rapporto.pdf', 'txt', now)).toBe('rapporto_translated_20240131_090507.txt');
    expect(buildDownloadName('/tmp/upload/doc.final.pdf', 'pdf', now)).toBe(
      'doc.final_translated_20240131_090507.pdf'
    );
  });

  it('falls back to a generic name', () => {
    expect(buildDownloadName(undefined, 'txt', now)).toBe('translated_document_20240131_090507.txt');
    expect(buildDownloadName('', 'pdf', now)).toBe('translated_document_20240131_090507.pdf');
  });
});

describe('DocumentFormatter', () => {
  const formatter = new DocumentFormatter();

  it('writes plain text as UTF-8', async () => {
    const output = await formatter.formatOutput('Ciao, città!', 'txt');
    expect(output.toString('utf8')).toBe('Ciao, città!');
  });

  it('defaults to plain text', async () => {
    const output = await formatter.formatOutput('Ciao');
    expect(output.toString('utf8')).toBe('Ciao');
  });

  it('renders a readable PDF', async () => {
    const output = await formatter.formatOutput('Ciao mondo', 'pdf');
    expect(output.subarray(0, 5).toString('latin1')).toBe('%PDF-');

    const extractor = new TextExtractor();
    const extracted = await extractor.extractText(new Uint8Array(output));
    expect(extracted.pageCount).toBe(1);
    expect(extracted.text.replace(/\s+/g, ' ')).toBe('Ciao mondo');
  });
});
