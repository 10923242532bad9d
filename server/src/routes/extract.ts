import { Router } from 'express';
import type multer from 'multer';
import { ValidationError } from '../errors';
import { getContext } from '../middleware/request-context';
import type { DocumentExtractor } from '../services/text-extractor';

export function createExtractRouter(extractor: DocumentExtractor, upload: multer.Multer): Router {
  const router = Router();

  router.post('/extract', upload.single('file'), async (req, res, next) => {
    try {
      const { logger } = getContext(res);
      if (!req.file) {
        throw new ValidationError('No file uploaded. Attach a PDF in the "file" field.');
      }
      logger.info(`Extraction du texte: ${req.file.originalname} (${req.file.size} octets)`);

      const { extracted, info } = await extractor.extractDocument(req.file.buffer);
      logger.debug('Nombre de pages:', extracted.pageCount);
      logger.debug('Taille du texte extrait:', extracted.text.length);

      res.json({
        success: true,
        fileName: req.file.originalname,
        text: extracted.text,
        pages: extracted.pages,
        info
      });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
