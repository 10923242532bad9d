export interface Language {
  code: string;
  name: string;
  rtl: boolean;
}

export type TranslationMode = 'combined' | 'per-page';
export type OutputFormat = 'txt' | 'pdf';

export interface LanguagesResponse {
  languages: Language[];
  defaults: { source: string; target: string };
  modes: TranslationMode[];
  model: string;
  maxUploadMb: number;
  translationAvailable: boolean;
}

export interface PageText {
  pageNumber: number;
  text: string;
}

export interface DocumentInfo {
  pageCount: number;
  fileSizeKb: number;
  metadata: Record<string, string>;
}

export interface ExtractResponse {
  success: true;
  fileName: string;
  text: string;
  pages: PageText[];
  info: DocumentInfo;
}

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
}

export interface TranslateResponse {
  success: true;
  fileName: string;
  downloadName: string;
  result: TranslationResult;
}

export interface TranslateOptions {
  sourceLanguage: string;
  targetLanguage: string;
  mode: TranslationMode;
  /** Sélection de pages, par exemple "1,3-4" ; vide pour tout le document */
  pages: string;
}

export interface ExportedFile {
  blob: Blob;
  fileName: string;
}
