import { isLogLevel, type LogLevel } from '../utils/logger';

export interface AppConfig {
  port: number;
  nodeEnv: string;
  googleApiKey?: string;
  geminiModel: string;
  maxUploadMb: number;
  maxChunkSize: number;
  corsOrigins: string[];
  logLevel: LogLevel;
  /** Police TTF/OTF pour l'export PDF (Helvetica par défaut, sans glyphes arabes) */
  pdfFontPath?: string;
}

export const DEFAULT_MODEL = 'gemini-2.0-flash';
export const DEFAULT_CORS_ORIGINS = ['http://localhost:5173', 'http://127.0.0.1:5173'];

export const MISSING_API_KEY_MESSAGE =
  'GOOGLE_API_KEY is not set. Add your Gemini API key to the environment and restart the server.';

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

function readPositiveInt(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = env[name]?.trim();
  if (!raw) {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigError(`${name} must be a positive integer, got "${raw}"`);
  }
  return value;
}

function readList(raw: string | undefined, fallback: string[]): string[] {
  if (!raw?.trim()) {
    return fallback;
  }
  return raw.split(',').map((item) => item.trim()).filter((item) => item.length > 0);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const nodeEnv = env.NODE_ENV?.trim() || 'development';
  const rawLevel = env.LOG_LEVEL?.trim().toLowerCase();
  let logLevel: LogLevel = nodeEnv === 'development' ? 'debug' : 'info';
  if (rawLevel) {
    if (!isLogLevel(rawLevel)) {
      throw new ConfigError(`LOG_LEVEL must be one of debug, info, warn, error, got "${rawLevel}"`);
    }
    logLevel = rawLevel;
  }

  return {
    port: readPositiveInt(env, 'PORT', 3001),
    nodeEnv,
    googleApiKey: env.GOOGLE_API_KEY?.trim() || undefined,
    geminiModel: env.GEMINI_MODEL?.trim() || DEFAULT_MODEL,
    maxUploadMb: readPositiveInt(env, 'MAX_UPLOAD_MB', 10),
    maxChunkSize: readPositiveInt(env, 'MAX_CHUNK_SIZE', 4000),
    corsOrigins: readList(env.CORS_ORIGINS, DEFAULT_CORS_ORIGINS),
    logLevel,
    pdfFontPath: env.PDF_FONT_PATH?.trim() || undefined
  };
}
