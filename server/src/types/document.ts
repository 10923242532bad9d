export interface PageText {
  /** Numéro de page, à partir de 1 */
  pageNumber: number;
  text: string;
}

export interface ExtractedText {
  pages: PageText[];
  pageCount: number;
  text: string;
}

export interface DocumentInfo {
  pageCount: number;
  fileSizeKb: number;
  metadata: Record<string, string>;
}
