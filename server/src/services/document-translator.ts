import { EventEmitter } from 'events';
import { normalizeArabic } from '../core/arabic-text';
import { TextSegmenter } from '../core/text-segmenter';
import type { TranslationClient } from '../core/translation-client';
import type { LanguagePair } from '../config/languages';
import { ExtractionError, errorMessage } from '../errors';
import type { ExtractedText, PageText } from '../types/document';
import type {
  TranslatedSection,
  TranslationMode,
  TranslationProgress,
  TranslationResult
} from '../types/translation';
import { createLogger, type Logger } from '../utils/logger';

export interface DocumentTranslationOptions {
  pair: LanguagePair;
  mode?: TranslationMode;
  maxChunkSize?: number;
}

interface SectionJob {
  pageNumbers: number[];
  originalText: string;
  chunks: string[];
}

export function pageHeader(pageNumber: number): string {
  return `--- Page ${pageNumber} ---`;
}

export class DocumentTranslator {
  private readonly client: TranslationClient;
  private readonly logger: Logger;
  private readonly eventEmitter = new EventEmitter();
  private translationStartTime = 0;

  constructor(client: TranslationClient, logger: Logger = createLogger('translator')) {
    this.client = client;
    this.logger = logger;
  }

  public on(event: 'progress', listener: (progress: TranslationProgress) => void): this {
    this.eventEmitter.on(event, listener);
    return this;
  }

  public async translateDocument(
    extracted: ExtractedText,
    options: DocumentTranslationOptions
  ): Promise<TranslationResult> {
    const { pair, mode = 'combined' } = options;
    this.translationStartTime = Date.now();

    const pages = extracted.pages
      .map((page): PageText => ({
        pageNumber: page.pageNumber,
        text: pair.source.code === 'ar' ? normalizeArabic(page.text) : page.text
      }))
      .filter((page) => page.text.trim().length > 0);

    if (pages.length === 0) {
      throw new ExtractionError('Nothing to translate: the selected pages contain no text');
    }

    const segmenter = new TextSegmenter({ maxChunkSize: options.maxChunkSize });
    const jobs = this.planJobs(pages, mode, segmenter);
    const totalChunks = jobs.reduce((sum, job) => sum + job.chunks.length, 0);
    let currentChunk = 0;

    this.emitProgress({ status: 'preparing', progress: 0, currentChunk, totalChunks });

    try {
      const sections: TranslatedSection[] = [];
      for (const job of jobs) {
        const translatedChunks: string[] = [];
        for (const chunk of job.chunks) {
          translatedChunks.push(await this.client.translateText(chunk, pair));
          currentChunk++;
          this.emitProgress({
            status: 'translating',
            progress: Math.round((currentChunk / totalChunks) * 100),
            currentChunk,
            totalChunks,
            currentPage: mode === 'per-page' ? job.pageNumbers[0] : undefined
          });
        }
        sections.push({
          pageNumbers: job.pageNumbers,
          originalText: job.originalText,
          translatedText: translatedChunks.join('\n\n')
        });
      }

      const translatedText =
        mode === 'per-page'
          ? sections
              .map((section) => `${pageHeader(section.pageNumbers[0])}\n${section.translatedText}`)
              .join('\n\n')
          : sections[0].translatedText;

      this.emitProgress({ status: 'completed', progress: 100, currentChunk, totalChunks });
      this.logger.info(
        `Traduction terminée: ${totalChunks} segment(s) en ${Date.now() - this.translationStartTime}ms`
      );

      return {
        sourceLanguage: pair.source,
        targetLanguage: pair.target,
        mode,
        model: this.client.model,
        sections,
        translatedText,
        source: extracted
      };
    } catch (error) {
      this.emitProgress({ status: 'error', progress: 0, currentChunk, totalChunks, error: errorMessage(error) });
      throw error;
    }
  }

  private planJobs(pages: PageText[], mode: TranslationMode, segmenter: TextSegmenter): SectionJob[] {
    if (mode === 'per-page') {
      return pages.map((page) => ({
        pageNumbers: [page.pageNumber],
        originalText: page.text,
        chunks: segmenter.segmentText(page.text, page.pageNumber).map((chunk) => chunk.text)
      }));
    }

    // Les en-têtes de page ne servent que si plusieurs pages sont traduites ensemble
    const originalText =
      pages.length === 1
        ? pages[0].text
        : pages.map((page) => `${pageHeader(page.pageNumber)}\n${page.text}`).join('\n\n');
    return [
      {
        pageNumbers: pages.map((page) => page.pageNumber),
        originalText,
        chunks: segmenter.segmentText(originalText).map((chunk) => chunk.text)
      }
    ];
  }

  private emitProgress(progress: TranslationProgress): void {
    this.eventEmitter.emit('progress', progress);
  }
}
