import { getDocument, VerbosityLevel } from 'pdfjs-dist/legacy/build/pdf.mjs';
import { ExtractionError, ValidationError, errorMessage } from '../errors';
import type { DocumentInfo, ExtractedText, PageText } from '../types/document';
import { debugLog } from '../utils/logger';

const PDF_HEADER = '%PDF-';
const HEADER_SEARCH_WINDOW = 1024;

export interface ExtractedDocument {
  extracted: ExtractedText;
  info: DocumentInfo;
}

export interface DocumentExtractor {
  extractText(data: Uint8Array): Promise<ExtractedText>;
  extractDocument(data: Uint8Array): Promise<ExtractedDocument>;
}

type PdfDocument = Awaited<ReturnType<typeof getDocument>['promise']>;

function hasPdfHeader(data: Uint8Array): boolean {
  const head = Buffer.from(data.subarray(0, HEADER_SEARCH_WINDOW)).toString('latin1');
  return head.includes(PDF_HEADER);
}

export function normalizePageText(raw: string): string {
  return raw
    .replace(/\r\n?/g, '\n')
    .split('\n')
    .map((line) => line.replace(/[ \t\u00A0]+/g, ' ').trim())
    .join('\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

export function joinPages(pages: PageText[]): string {
  return pages
    .map((page) => page.text)
    .filter((text) => text.length > 0)
    .join('\n\n');
}

export interface PageRange {
  start: number;
  end: number;
}

function describePageCount(pageCount: number): string {
  return `${pageCount} ${pageCount === 1 ? 'page' : 'pages'}`;
}

/**
 * Restreint le texte extrait aux plages demandées (pages numérotées à
 * partir de 1), dans l'ordre du document.
 */
export function selectPages(extracted: ExtractedText, ranges: PageRange[]): ExtractedText {
  if (ranges.length === 0) {
    return extracted;
  }
  for (const { start, end } of ranges) {
    for (const pageNumber of [start, end]) {
      if (!Number.isInteger(pageNumber) || pageNumber < 1 || pageNumber > extracted.pageCount) {
        throw new ValidationError(
          `Page ${pageNumber} does not exist (the document has ${describePageCount(extracted.pageCount)})`
        );
      }
    }
  }
  const pages = extracted.pages.filter((page) =>
    ranges.some(({ start, end }) => page.pageNumber >= start && page.pageNumber <= end)
  );
  return { pages, pageCount: extracted.pageCount, text: joinPages(pages) };
}

/**
 * "1,3-4" -> [{ start: 1, end: 1 }, { start: 3, end: 4 }]. Une chaîne vide
 * signifie toutes les pages. Les plages ne sont pas développées : leurs
 * bornes sont vérifiées par `selectPages`.
 */
export function parsePageSelection(value: string | undefined): PageRange[] {
  if (!value?.trim()) {
    return [];
  }
  const ranges: PageRange[] = [];
  for (const token of value.split(',').map((t) => t.trim()).filter((t) => t.length > 0)) {
    const match = /^(\d+)(?:\s*-\s*(\d+))?$/.exec(token);
    if (!match) {
      throw new ValidationError(`Invalid page selection: "${token}"`);
    }
    const start = Number(match[1]);
    const end = match[2] === undefined ? start : Number(match[2]);
    if (start < 1 || end < start) {
      throw new ValidationError(`Invalid page range: "${token}"`);
    }
    ranges.push({ start, end });
  }
  return ranges;
}

export class TextExtractor implements DocumentExtractor {
  public extractText(data: Uint8Array): Promise<ExtractedText> {
    return this.withDocument(data, (pdf) => this.readText(pdf));
  }

  /**
   * Texte et informations du document en une seule analyse du PDF.
   */
  public extractDocument(data: Uint8Array): Promise<ExtractedDocument> {
    return this.withDocument(data, async (pdf) => {
      const info = await this.readInfo(pdf, data.byteLength);
      const extracted = await this.readText(pdf);
      return { extracted, info };
    });
  }

  private async withDocument<T>(data: Uint8Array, read: (pdf: PdfDocument) => Promise<T>): Promise<T> {
    const pdf = await this.open(data);
    try {
      return await read(pdf);
    } finally {
      await pdf.destroy();
    }
  }

  private async readText(pdf: PdfDocument): Promise<ExtractedText> {
    const pages: PageText[] = [];
    for (let pageNumber = 1; pageNumber <= pdf.numPages; pageNumber++) {
      const page = await pdf.getPage(pageNumber);
      const content = await page.getTextContent();
      let raw = '';
      for (const item of content.items) {
        if (!('str' in item)) {
          continue;
        }
        raw += item.str;
        if (item.hasEOL) {
          raw += '\n';
        }
      }
      pages.push({ pageNumber, text: normalizePageText(raw) });
      page.cleanup();
    }

    const text = joinPages(pages);
    debugLog('Extraction réussie');
    debugLog('Nombre de pages:', pdf.numPages);
    debugLog('Taille du texte extrait:', text.length);

    if (!text) {
      throw new ExtractionError(
        'The PDF contains no extractable text. Scanned pages need OCR before they can be translated.'
      );
    }
    return { pages, pageCount: pdf.numPages, text };
  }

  private async readInfo(pdf: PdfDocument, byteLength: number): Promise<DocumentInfo> {
    const { info } = await pdf.getMetadata();
    const metadata: Record<string, string> = {};
    for (const [key, value] of Object.entries(info)) {
      if (typeof value === 'string' && value.trim()) {
        metadata[key] = value.trim();
      }
    }
    return {
      pageCount: pdf.numPages,
      fileSizeKb: Math.round((byteLength / 1024) * 100) / 100,
      metadata
    };
  }

  private async open(data: Uint8Array): Promise<PdfDocument> {
    if (data.byteLength === 0) {
      throw new ExtractionError('The uploaded file is empty');
    }
    if (!hasPdfHeader(data)) {
      throw new ExtractionError('The uploaded file is not a valid PDF');
    }

    debugLog('Chargement du PDF', { bytes: data.byteLength });
    try {
      // pdf.js veut un Uint8Array qui ne soit pas un Buffer
      const loadingTask = getDocument({
        data: new Uint8Array(data),
        verbosity: VerbosityLevel.ERRORS,
        isEvalSupported: false,
        disableFontFace: true,
        useSystemFonts: false
      });
      return await loadingTask.promise;
    } catch (error) {
      debugLog('Erreur lors du chargement du PDF:', error);
      if (error instanceof Error && error.name === 'PasswordException') {
        throw new ExtractionError('The PDF is password protected', { cause: error });
      }
      throw new ExtractionError(`The uploaded file is not a valid PDF: ${errorMessage(error)}`, {
        cause: error
      });
    }
  }
}
