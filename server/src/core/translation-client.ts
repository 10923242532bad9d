import { resolveLanguagePair, type LanguagePair } from '../config/languages';
import { MISSING_API_KEY_MESSAGE } from '../config';
import {
  AppError,
  AuthenticationError,
  TranslationError,
  ValidationError,
  errorMessage
} from '../errors';
import { createLogger, type Logger } from '../utils/logger';

export interface GenerationRequest {
  systemInstruction: string;
  prompt: string;
}

/**
 * Accès au modèle génératif distant. Une invocation = un appel réseau.
 */
export interface TextGenerator {
  readonly model: string;
  generate(request: GenerationRequest): Promise<string | undefined>;
}

export type GeneratorFactory = (apiKey: string, model: string) => TextGenerator;

export interface TranslationClientOptions {
  apiKey?: string;
  model: string;
  createGenerator: GeneratorFactory;
  logger?: Logger;
}

export function buildSystemInstruction({ source, target }: LanguagePair): string {
  if (source.code === 'ar') {
    return `You are an expert translator specializing in ${source.name} to ${target.name} translations, with extensive knowledge of Islamic texts and cultural context.

Context handling:
1. When a word is unclear or only partially extracted, infer the most likely word from the surrounding context and from common ${source.name} phrases and religious terminology.
2. Keep religious terms in ${source.name} followed by their ${target.name} translation in parentheses, and use the traditional translations of Islamic concepts.

Output format:
- Provide only the ${target.name} translation, without the original text or any commentary.
- Maintain the paragraph structure.`;
  }

  return `You are an expert translator specializing in ${source.name} to ${target.name} translations.

Translation guidelines:
1. Maintain the original meaning and tone.
2. Use natural ${target.name} expressions.
3. Keep technical terms, adding a translation where needed.
4. Handle cultural references appropriately.

Output format:
- Provide only the ${target.name} translation, without the original text or any commentary.
- Maintain the paragraph structure and the original formatting.`;
}

export function buildPrompt(text: string): string {
  return `Text to translate:\n${text}`;
}

export class TranslationClient {
  private readonly options: TranslationClientOptions;
  private readonly logger: Logger;
  private generator?: TextGenerator;

  constructor(options: TranslationClientOptions) {
    this.options = options;
    this.logger = options.logger ?? createLogger('translation');
  }

  get model(): string {
    return this.options.model;
  }

  get hasCredential(): boolean {
    return Boolean(this.options.apiKey?.trim());
  }

  /**
   * Échoue sans appel réseau si aucune clé API n'est configurée.
   */
  public ensureCredential(): string {
    const apiKey = this.options.apiKey?.trim();
    if (!apiKey) {
      throw new AuthenticationError(MISSING_API_KEY_MESSAGE);
    }
    return apiKey;
  }

  public async translateText(
    text: string,
    pair: LanguagePair = resolveLanguagePair()
  ): Promise<string> {
    const apiKey = this.ensureCredential();
    if (!text.trim()) {
      throw new ValidationError('There is no text to translate');
    }
    if (pair.source.code === pair.target.code) {
      throw new ValidationError('Source and target languages must be different');
    }

    this.generator ??= this.options.createGenerator(apiKey, this.options.model);

    this.logger.debug('Starting translation request', {
      model: this.options.model,
      source: pair.source.code,
      target: pair.target.code,
      textLength: text.length
    });

    let output: string | undefined;
    try {
      output = await this.generator.generate({
        systemInstruction: buildSystemInstruction(pair),
        prompt: buildPrompt(text)
      });
    } catch (error) {
      this.logger.warn('Translation request failed:', errorMessage(error));
      if (error instanceof AppError) {
        throw error;
      }
      throw new TranslationError(`Translation failed: ${errorMessage(error)}`, { cause: error });
    }

    const translated = output?.trim();
    if (!translated) {
      throw new TranslationError('The translation service returned an empty response');
    }
    this.logger.debug('Translation completed', { translatedLength: translated.length });
    return translated;
  }
}
