import { describe, expect, it } from 'vitest';
import { chunkText, DEFAULT_MAX_CHUNK_SIZE, TextSegmenter } from './text-segmenter';

describe('TextSegmenter', () => {
  it('uses 4000 characters by default', () => {
    expect(new TextSegmenter().maxChunkSize).toBe(DEFAULT_MAX_CHUNK_SIZE);
    expect(DEFAULT_MAX_CHUNK_SIZE).toBe(4000);
  });

  it('rejects invalid chunk sizes', () => {
    expect(() => new TextSegmenter({ maxChunkSize: 0 })).toThrow(RangeError);
    expect(() => new TextSegmenter({ maxChunkSize: 2.5 })).toThrow(RangeError);
  });

  it('keeps short text in a single chunk', () => {
    const chunks = new TextSegmenter().segmentText('Primo paragrafo.\n\nSecondo paragrafo.');
    expect(chunks).toEqual([
      { index: 0, text: 'Primo paragrafo.\n\nSecondo paragrafo.', pageNumber: undefined }
    ]);
  });

  it('packs paragraphs without exceeding the limit', () => {
    const segmenter = new TextSegmenter({ maxChunkSize: 10 });
    expect(segmenter.segmentText('aaaa\n\nbbbb\n\ncccccccc').map((c) => c.text)).toEqual([
      'aaaa\n\nbbbb',
      'cccccccc'
    ]);
  });

  it('drops blank paragraphs', () => {
    const segmenter = new TextSegmenter({ maxChunkSize: 100 });
    expect(segmenter.segmentText('  uno  \n\n \n\n\n due ').map((c) => c.text)).toEqual([
      'uno\n\ndue'
    ]);
    expect(segmenter.segmentText('   \n\n  ')).toEqual([]);
  });

  it('splits oversized paragraphs at sentence boundaries', () => {
    const segmenter = new TextSegmenter({ maxChunkSize: 20 });
    expect(segmenter.segmentText('One sentence. Two sentence. Three.').map((c) => c.text)).toEqual([
      'One sentence.',
      'Two sentence. Three.'
    ]);
  });

  it('recognises the Arabic question mark as a sentence end', () => {
    const segmenter = new TextSegmenter({ maxChunkSize: 8 });
    expect(segmenter.segmentText('ما هذا؟ هذا كتاب').map((c) => c.text)).toEqual([
      'ما هذا؟',
      'هذا كتاب'
    ]);
  });

  it('hard-splits sentences longer than the limit', () => {
    const segmenter = new TextSegmenter({ maxChunkSize: 4 });
    expect(segmenter.segmentText('abcdefghij').map((c) => c.text)).toEqual(['abcd', 'efgh', 'ij']);
  });

  it('numbers chunks and keeps the page number', () => {
    const segmenter = new TextSegmenter({ maxChunkSize: 5 });
    expect(segmenter.segmentText('aaaa\n\nbbbb', 3)).toEqual([
      { index: 0, text: 'aaaa', pageNumber: 3 },
      { index: 1, text: 'bbbb', pageNumber: 3 }
    ]);
  });
});

describe('chunkText', () => {
  it('returns the chunk texts', () => {
    expect(chunkText('aaaa\n\nbbbb', 5)).toEqual(['aaaa', 'bbbb']);
    expect(chunkText('breve')).toEqual(['breve']);
  });

  it('never returns a chunk longer than the limit', () => {
    const text = Array.from({ length: 50 }, (_, i) => `Frase numero ${i}.`).join(' ');
    for (const chunk of chunkText(text, 60)) {
      expect(chunk.length).toBeLessThanOrEqual(60);
    }
  });
});
