import express, { Router } from 'express';
import { ValidationError } from '../errors';
import { getContext } from '../middleware/request-context';
import {
  CONTENT_TYPES,
  buildDownloadName,
  type DocumentFormatter
} from '../services/document-formatter';
import { parseFormat, readField } from './params';

export function createExportRouter(formatter: DocumentFormatter): Router {
  const router = Router();

  router.post('/export', express.json({ limit: '5mb' }), async (req, res, next) => {
    try {
      const { logger } = getContext(res);
      const text = readField(req.body, 'text');
      if (!text?.trim()) {
        throw new ValidationError('The "text" field is required');
      }
      const format = parseFormat(readField(req.body, 'format'));
      const downloadName = buildDownloadName(readField(req.body, 'fileName'), format);

      const output = await formatter.formatOutput(text, format);
      logger.info(`Export ${format}: ${downloadName} (${output.length} octets)`);

      res.attachment(downloadName);
      res.type(CONTENT_TYPES[format]);
      res.send(output);
    } catch (error) {
      next(error);
    }
  });

  return router;
}
