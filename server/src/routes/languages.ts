import { Router } from 'express';
import type { AppConfig } from '../config';
import { DEFAULT_SOURCE_LANGUAGE, DEFAULT_TARGET_LANGUAGE, LANGUAGES } from '../config/languages';
import { getContext } from '../middleware/request-context';
import { TRANSLATION_MODES } from '../types/translation';

export function createLanguagesRouter(config: AppConfig): Router {
  const router = Router();

  router.get('/languages', (_req, res, next) => {
    try {
      const { translationClient } = getContext(res);
      res.json({
        languages: LANGUAGES,
        defaults: { source: DEFAULT_SOURCE_LANGUAGE, target: DEFAULT_TARGET_LANGUAGE },
        modes: TRANSLATION_MODES,
        model: config.geminiModel,
        maxUploadMb: config.maxUploadMb,
        translationAvailable: translationClient.hasCredential
      });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
