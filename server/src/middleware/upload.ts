import multer from 'multer';
import path from 'path';
import { ValidationError } from '../errors';

const PDF_MIME_TYPE = 'application/pdf';

/**
 * busboy décode les noms de fichiers en latin1 ; les navigateurs les envoient en UTF-8.
 */
export function decodeFileName(name: string): string {
  if (/[^\u0000-\u00FF]/.test(name)) {
    return name;
  }
  const decoded = Buffer.from(name, 'latin1').toString('utf8');
  return decoded.includes('\uFFFD') ? name : decoded;
}

export function isPdfUpload(file: { mimetype: string; originalname: string }): boolean {
  return (
    file.mimetype === PDF_MIME_TYPE || path.extname(file.originalname).toLowerCase() === '.pdf'
  );
}

// Stockage en mémoire : aucun fichier n'est écrit sur le disque
export function createPdfUpload(maxUploadMb: number): multer.Multer {
  return multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: maxUploadMb * 1024 * 1024, files: 1 },
    fileFilter: (_req, file, cb) => {
      file.originalname = decodeFileName(file.originalname);
      if (isPdfUpload(file)) {
        cb(null, true);
      } else {
        cb(new ValidationError('Only PDF files are accepted'));
      }
    }
  });
}
