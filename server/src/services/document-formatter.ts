import PDFDocument from 'pdfkit';
import path from 'path';

export type OutputFormat = 'txt' | 'pdf';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['txt', 'pdf'];

export const CONTENT_TYPES: Record<OutputFormat, string> = {
  txt: 'text/plain; charset=utf-8',
  pdf: 'application/pdf'
};

export interface DocumentStyle {
  fontSize?: number;
  /** Nom d'une police standard PDF ou chemin vers un fichier TTF/OTF */
  fontFamily?: string;
  lineHeight?: number;
  pageSize?: string;
  margins?: {
    top: number;
    bottom: number;
    left: number;
    right: number;
  };
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

/**
 * `rapport.pdf` -> `rapport_translated_20240131_090507.txt`
 */
export function buildDownloadName(
  originalName: string | undefined,
  format: OutputFormat,
  now: Date = new Date()
): string {
  const stem = originalName ? path.parse(path.basename(originalName)).name.trim() : '';
  const timestamp = formatTimestamp(now);
  return stem
    ? `${stem}_translated_${timestamp}.${format}`
    : `translated_document_${timestamp}.${format}`;
}

export class DocumentFormatter {
  private readonly defaultStyle: Required<DocumentStyle> = {
    fontSize: 12,
    fontFamily: 'Helvetica',
    lineHeight: 1.5,
    pageSize: 'A4',
    margins: {
      top: 72,
      bottom: 72,
      left: 72,
      right: 72
    }
  };

  constructor(style: DocumentStyle = {}) {
    this.defaultStyle = { ...this.defaultStyle, ...style };
  }

  public formatPDF(inputText: string, style: DocumentStyle = {}): Promise<Buffer> {
    const mergedStyle = { ...this.defaultStyle, ...style };
    const doc = new PDFDocument({
      size: mergedStyle.pageSize,
      margins: mergedStyle.margins
    });

    const chunks: Buffer[] = [];
    const done = new Promise<Buffer>((resolve, reject) => {
      doc.on('data', (chunk: Buffer) => chunks.push(chunk));
      doc.on('end', () => resolve(Buffer.concat(chunks)));
      doc.on('error', reject);
    });

    doc
      .font(mergedStyle.fontFamily)
      .fontSize(mergedStyle.fontSize)
      .text(inputText, {
        lineGap: (mergedStyle.lineHeight - 1) * mergedStyle.fontSize
      });

    doc.end();
    return done;
  }

  public async formatOutput(
    translatedText: string,
    format: OutputFormat = 'txt',
    style: DocumentStyle = {}
  ): Promise<Buffer> {
    if (format === 'pdf') {
      return this.formatPDF(translatedText, style);
    }
    return Buffer.from(translatedText, 'utf8');
  }
}
