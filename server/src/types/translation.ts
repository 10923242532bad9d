import type { Language } from '../config/languages';
import type { ExtractedText } from './document';

export type TranslationMode = 'combined' | 'per-page';

export const TRANSLATION_MODES: readonly TranslationMode[] = ['combined', 'per-page'];

export interface TranslationProgress {
  status: 'preparing' | 'translating' | 'completed' | 'error';
  progress: number;
  currentChunk: number;
  totalChunks: number;
  currentPage?: number;
  error?: string;
}

/**
 * Une section par page en mode `per-page`, une seule section couvrant
 * toutes les pages en mode `combined`.
 */
export interface TranslatedSection {
  pageNumbers: number[];
  originalText: string;
  translatedText: string;
}

export interface TranslationResult {
  sourceLanguage: Language;
  targetLanguage: Language;
  mode: TranslationMode;
  model: string;
  sections: TranslatedSection[];
  translatedText: string;
  source: ExtractedText;
}
