import { GoogleGenAI } from '@google/genai';
import type { GenerationRequest, TextGenerator } from '../core/translation-client';
import { AuthenticationError, TranslationError, errorMessage } from '../errors';

export const GENERATION_TEMPERATURE = 0.3;

const INVALID_KEY_PATTERN = /API[_ ]KEY[_ ]INVALID|API key not valid|API key expired/i;
const QUOTA_PATTERN = /RESOURCE_EXHAUSTED|quota/i;
const NETWORK_PATTERN = /fetch failed|ECONNREFUSED|ECONNRESET|ENOTFOUND|ETIMEDOUT|network/i;

function errorStatus(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'status' in error) {
    return typeof error.status === 'number' ? error.status : undefined;
  }
  return undefined;
}

/**
 * Traduit une erreur du SDK Gemini en erreur applicative.
 */
export function toTranslationError(error: unknown): TranslationError {
  if (error instanceof TranslationError) {
    return error;
  }
  const message = errorMessage(error);
  const status = errorStatus(error);

  if (status === 401 || status === 403 || INVALID_KEY_PATTERN.test(message)) {
    return new AuthenticationError(
      'The Gemini API rejected the API key. Check the value of GOOGLE_API_KEY.',
      { cause: error }
    );
  }
  if (status === 429 || QUOTA_PATTERN.test(message)) {
    return new TranslationError(
      'The Gemini API rate limit or quota was exceeded. Please try again later.',
      { cause: error, status: 429, code: 'rate_limited' }
    );
  }
  if (status !== undefined) {
    return new TranslationError(`The Gemini API request failed (HTTP ${status}): ${message}`, {
      cause: error
    });
  }
  if (NETWORK_PATTERN.test(message)) {
    return new TranslationError(`Could not reach the Gemini API: ${message}`, { cause: error });
  }
  return new TranslationError(`Translation failed: ${message}`, { cause: error });
}

export class GeminiGenerator implements TextGenerator {
  readonly model: string;
  private readonly ai: GoogleGenAI;

  constructor(apiKey: string, model: string) {
    this.model = model;
    this.ai = new GoogleGenAI({ apiKey });
  }

  public async generate(request: GenerationRequest): Promise<string | undefined> {
    try {
      const response = await this.ai.models.generateContent({
        model: this.model,
        contents: request.prompt,
        config: {
          systemInstruction: request.systemInstruction,
          temperature: GENERATION_TEMPERATURE
        }
      });
      return response.text;
    } catch (error) {
      throw toTranslationError(error);
    }
  }
}

export function createGeminiGenerator(apiKey: string, model: string): TextGenerator {
  return new GeminiGenerator(apiKey, model);
}
