export interface SegmentationConfig {
  /** Taille maximale d'un segment, en caractères */
  maxChunkSize: number;
}

export interface TextChunk {
  index: number;
  text: string;
  pageNumber?: number;
}
