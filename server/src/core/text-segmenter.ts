import { debugLog } from '../utils/logger';
import type { SegmentationConfig, TextChunk } from '../types/segmentation';

export const DEFAULT_MAX_CHUNK_SIZE = 4000;

const PARAGRAPH_BREAK = /\n\s*\n/;
// Fins de phrase latines et arabes (؟ et ۔)
const SENTENCE = /[^.!?؟۔]+(?:[.!?؟۔]+|$)/g;

export class TextSegmenter {
  private readonly config: SegmentationConfig;

  constructor(config: Partial<SegmentationConfig> = {}) {
    const maxChunkSize = config.maxChunkSize ?? DEFAULT_MAX_CHUNK_SIZE;
    if (!Number.isInteger(maxChunkSize) || maxChunkSize <= 0) {
      throw new RangeError(`maxChunkSize must be a positive integer, got ${maxChunkSize}`);
    }
    this.config = { maxChunkSize };
  }

  get maxChunkSize(): number {
    return this.config.maxChunkSize;
  }

  /**
   * Regroupe les paragraphes en segments d'au plus `maxChunkSize` caractères,
   * sans couper un paragraphe qui tient dans un segment.
   */
  public segmentText(text: string, pageNumber?: number): TextChunk[] {
    const units = text
      .split(PARAGRAPH_BREAK)
      .map((paragraph) => paragraph.trim())
      .filter((paragraph) => paragraph.length > 0)
      .flatMap((paragraph) =>
        paragraph.length > this.config.maxChunkSize ? this.splitParagraph(paragraph) : [paragraph]
      );

    const chunks: string[] = [];
    let current = '';

    for (const unit of units) {
      const candidate = current ? `${current}\n\n${unit}` : unit;
      if (candidate.length > this.config.maxChunkSize && current) {
        chunks.push(current);
        current = unit;
      } else {
        current = candidate;
      }
    }
    if (current) {
      chunks.push(current);
    }

    debugLog(`Segmentation: ${units.length} blocs -> ${chunks.length} segments`);
    return chunks.map((chunk, index) => ({ index, text: chunk, pageNumber }));
  }

  private splitParagraph(paragraph: string): string[] {
    const pieces: string[] = [];
    let current = '';

    for (const sentence of this.splitIntoSentences(paragraph)) {
      for (const part of this.hardSplit(sentence)) {
        const candidate = current ? `${current} ${part}` : part;
        if (candidate.length > this.config.maxChunkSize && current) {
          pieces.push(current);
          current = part;
        } else {
          current = candidate;
        }
      }
    }
    if (current) {
      pieces.push(current);
    }
    return pieces;
  }

  private splitIntoSentences(text: string): string[] {
    const sentences = text.match(SENTENCE) ?? [text];
    return sentences.map((s) => s.trim()).filter((s) => s.length > 0);
  }

  private hardSplit(sentence: string): string[] {
    const size = this.config.maxChunkSize;
    if (sentence.length <= size) {
      return [sentence];
    }
    const parts: string[] = [];
    for (let start = 0; start < sentence.length; start += size) {
      parts.push(sentence.slice(start, start + size));
    }
    return parts;
  }
}

export function chunkText(text: string, maxChunkSize: number = DEFAULT_MAX_CHUNK_SIZE): string[] {
  return new TextSegmenter({ maxChunkSize }).segmentText(text).map((chunk) => chunk.text);
}
