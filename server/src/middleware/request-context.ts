import { randomUUID } from 'crypto';
import type { RequestHandler, Response } from 'express';
import type { AppConfig } from '../config';
import { TranslationClient, type GeneratorFactory } from '../core/translation-client';
import { createLogger, type Logger } from '../utils/logger';

/**
 * État propre à une requête : remplace l'état de session global.
 */
export interface RequestContext {
  requestId: string;
  logger: Logger;
  startedAt: number;
  config: AppConfig;
  translationClient: TranslationClient;
}

declare global {
  namespace Express {
    interface Locals {
      context?: RequestContext;
    }
  }
}

export function requestContext(config: AppConfig, createGenerator: GeneratorFactory): RequestHandler {
  return (req, res, next) => {
    const requestId = randomUUID().slice(0, 8);
    const logger = createLogger(`req ${requestId}`);
    const context: RequestContext = {
      requestId,
      logger,
      startedAt: Date.now(),
      config,
      translationClient: new TranslationClient({
        apiKey: config.googleApiKey,
        model: config.geminiModel,
        createGenerator,
        logger: logger.child('translation')
      })
    };
    res.locals.context = context;
    res.setHeader('X-Request-Id', requestId);

    logger.debug(`${req.method} ${req.originalUrl}`);
    res.on('finish', () => {
      logger.info(`${req.method} ${req.originalUrl} ${res.statusCode} ${Date.now() - context.startedAt}ms`);
    });
    next();
  };
}

export function getContext(res: Response): RequestContext {
  const context = res.locals.context;
  if (!context) {
    throw new Error('Request context is missing: register requestContext() before the routes');
  }
  return context;
}
