import { ValidationError } from '../errors';

export interface Language {
  code: string;
  name: string;
  rtl: boolean;
}

export interface LanguagePair {
  source: Language;
  target: Language;
}

// Langues proposées par l'interface
export const LANGUAGES: readonly Language[] = [
  { code: 'ar', name: 'Arabic', rtl: true },
  { code: 'en', name: 'English', rtl: false },
  { code: 'fr', name: 'French', rtl: false },
  { code: 'de', name: 'German', rtl: false },
  { code: 'es', name: 'Spanish', rtl: false },
  { code: 'zh', name: 'Chinese', rtl: false },
  { code: 'ja', name: 'Japanese', rtl: false },
  { code: 'ko', name: 'Korean', rtl: false },
  { code: 'it', name: 'Italian', rtl: false },
  { code: 'pt', name: 'Portuguese', rtl: false },
  { code: 'ru', name: 'Russian', rtl: false },
  { code: 'hi', name: 'Hindi', rtl: false },
  { code: 'bn', name: 'Bengali', rtl: false },
  { code: 'ur', name: 'Urdu', rtl: true },
  { code: 'tr', name: 'Turkish', rtl: false },
  { code: 'fa', name: 'Persian', rtl: true },
  { code: 'sw', name: 'Swahili', rtl: false },
  { code: 'nl', name: 'Dutch', rtl: false },
  { code: 'el', name: 'Greek', rtl: false },
  { code: 'he', name: 'Hebrew', rtl: true },
  { code: 'th', name: 'Thai', rtl: false },
  { code: 'vi', name: 'Vietnamese', rtl: false }
];

export const DEFAULT_SOURCE_LANGUAGE = 'ar';
export const DEFAULT_TARGET_LANGUAGE = 'it';

/**
 * Accepte un code ISO 639-1 ou un nom anglais, sans tenir compte de la casse.
 */
export function resolveLanguage(value: string): Language {
  const needle = value.trim().toLowerCase();
  const language = LANGUAGES.find(
    (lang) => lang.code === needle || lang.name.toLowerCase() === needle
  );
  if (!language) {
    throw new ValidationError(`Unsupported language: ${value}`);
  }
  return language;
}

export function resolveLanguagePair(source?: string, target?: string): LanguagePair {
  const pair = {
    source: resolveLanguage(source?.trim() ? source : DEFAULT_SOURCE_LANGUAGE),
    target: resolveLanguage(target?.trim() ? target : DEFAULT_TARGET_LANGUAGE)
  };
  if (pair.source.code === pair.target.code) {
    throw new ValidationError('Source and target languages must be different');
  }
  return pair;
}
