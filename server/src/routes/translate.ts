import express, { Router } from 'express';
import type multer from 'multer';
import { resolveLanguagePair } from '../config/languages';
import { chunkText } from '../core/text-segmenter';
import { ValidationError } from '../errors';
import { getContext } from '../middleware/request-context';
import { buildDownloadName } from '../services/document-formatter';
import { DocumentTranslator } from '../services/document-translator';
import {
  parsePageSelection,
  selectPages,
  type DocumentExtractor
} from '../services/text-extractor';
import { parseMode, readField } from './params';

export function createTranslateRouter(extractor: DocumentExtractor, upload: multer.Multer): Router {
  const router = Router();

  router.post('/translate', upload.single('file'), async (req, res, next) => {
    try {
      const { logger, config, translationClient } = getContext(res);
      if (!req.file) {
        throw new ValidationError('No file uploaded. Attach a PDF in the "file" field.');
      }
      const pair = resolveLanguagePair(
        readField(req.body, 'sourceLanguage'),
        readField(req.body, 'targetLanguage')
      );
      const mode = parseMode(readField(req.body, 'mode'));
      const pageRanges = parsePageSelection(readField(req.body, 'pages'));

      // Pas de clé API : on échoue avant d'analyser le document
      translationClient.ensureCredential();

      logger.info('=== DÉBUT TRADUCTION ===');
      logger.info(`Fichier: ${req.file.originalname} (${req.file.size} octets)`);
      logger.info(`Langues: ${pair.source.name} -> ${pair.target.name}, mode ${mode}`);

      const extracted = selectPages(await extractor.extractText(req.file.buffer), pageRanges);
      const translator = new DocumentTranslator(translationClient, logger.child('translator'));
      translator.on('progress', (progress) =>
        logger.debug(
          `Progression: ${progress.status} ${progress.progress}% (${progress.currentChunk}/${progress.totalChunks})`
        )
      );
      const result = await translator.translateDocument(extracted, {
        pair,
        mode,
        maxChunkSize: config.maxChunkSize
      });

      res.json({
        success: true,
        fileName: req.file.originalname,
        downloadName: buildDownloadName(req.file.originalname, 'txt'),
        result
      });
    } catch (error) {
      next(error);
    }
  });

  router.post('/translate/text', express.json({ limit: '1mb' }), async (req, res, next) => {
    try {
      const { logger, config, translationClient } = getContext(res);
      const text = readField(req.body, 'text');
      if (!text?.trim()) {
        throw new ValidationError('The "text" field is required');
      }
      const pair = resolveLanguagePair(
        readField(req.body, 'sourceLanguage'),
        readField(req.body, 'targetLanguage')
      );
      logger.info(`Traduction de texte: ${text.length} caractères (${pair.source.code} -> ${pair.target.code})`);

      const translatedChunks: string[] = [];
      for (const chunk of chunkText(text, config.maxChunkSize)) {
        translatedChunks.push(await translationClient.translateText(chunk, pair));
      }
      const translatedText = translatedChunks.join('\n\n');
      res.json({
        success: true,
        translatedText,
        sourceLanguage: pair.source,
        targetLanguage: pair.target
      });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
