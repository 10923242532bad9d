import cors from 'cors';
import express from 'express';
import type { AppConfig } from './config';
import type { GeneratorFactory } from './core/translation-client';
import { errorHandler } from './middleware/error-handler';
import { requestContext } from './middleware/request-context';
import { createPdfUpload } from './middleware/upload';
import { createExportRouter } from './routes/export';
import { createExtractRouter } from './routes/extract';
import { createLanguagesRouter } from './routes/languages';
import { createTranslateRouter } from './routes/translate';
import { DocumentFormatter } from './services/document-formatter';
import { createGeminiGenerator } from './services/gemini';
import { TextExtractor, type DocumentExtractor } from './services/text-extractor';

export interface AppDependencies {
  config: AppConfig;
  extractor?: DocumentExtractor;
  formatter?: DocumentFormatter;
  createGenerator?: GeneratorFactory;
}

export function createApp({
  config,
  extractor = new TextExtractor(),
  formatter = new DocumentFormatter(config.pdfFontPath ? { fontFamily: config.pdfFontPath } : {}),
  createGenerator = createGeminiGenerator
}: AppDependencies): express.Express {
  const app = express();
  const upload = createPdfUpload(config.maxUploadMb);

  app.use(cors({
    origin: config.corsOrigins,
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type'],
    exposedHeaders: ['Content-Disposition', 'X-Request-Id']
  }));

  app.use(requestContext(config, createGenerator));

  // Routes
  app.use('/api', createLanguagesRouter(config));
  app.use('/api', createExtractRouter(extractor, upload));
  app.use('/api', createTranslateRouter(extractor, upload));
  app.use('/api', createExportRouter(formatter));

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  app.use((req, res) => {
    res.status(404).json({
      success: false,
      error: `Route not found: ${req.method} ${req.path}`,
      code: 'not_found'
    });
  });

  app.use(errorHandler(config));

  return app;
}
