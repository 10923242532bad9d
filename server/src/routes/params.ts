import { ValidationError } from '../errors';
import { OUTPUT_FORMATS, type OutputFormat } from '../services/document-formatter';
import { TRANSLATION_MODES, type TranslationMode } from '../types/translation';

/**
 * Lit un champ texte d'un corps multipart ou JSON ; tout autre type est ignoré.
 */
export function readField(body: unknown, name: string): string | undefined {
  if (typeof body !== 'object' || body === null || !(name in body)) {
    return undefined;
  }
  const value: unknown = Reflect.get(body, name);
  return typeof value === 'string' ? value : undefined;
}

function isMode(value: string): value is TranslationMode {
  return TRANSLATION_MODES.some((mode) => mode === value);
}

function isFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

export function parseMode(value: string | undefined): TranslationMode {
  const mode = value?.trim().toLowerCase() || 'combined';
  if (!isMode(mode)) {
    throw new ValidationError(`Unknown translation mode "${value}". Use one of: ${TRANSLATION_MODES.join(', ')}`);
  }
  return mode;
}

export function parseFormat(value: string | undefined): OutputFormat {
  const format = value?.trim().toLowerCase() || 'txt';
  if (!isFormat(format)) {
    throw new ValidationError(`Unknown output format "${value}". Use one of: ${OUTPUT_FORMATS.join(', ')}`);
  }
  return format;
}
