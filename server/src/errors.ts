export type ErrorCode =
  | 'validation_error'
  | 'extraction_error'
  | 'translation_error'
  | 'authentication_error'
  | 'rate_limited'
  | 'file_too_large'
  | 'not_found'
  | 'internal_error';

/**
 * Base des erreurs applicatives : chaque erreur porte le statut HTTP
 * et le code renvoyés au client.
 */
export class AppError extends Error {
  readonly status: number;
  readonly code: ErrorCode;

  constructor(message: string, status: number, code: ErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.status = status;
    this.code = code;
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 400, 'validation_error');
  }
}

/** PDF illisible, corrompu ou sans couche texte. */
export class ExtractionError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 422, 'extraction_error', options);
  }
}

export class TranslationError extends AppError {
  constructor(
    message: string,
    options?: { cause?: unknown; status?: number; code?: ErrorCode }
  ) {
    super(message, options?.status ?? 502, options?.code ?? 'translation_error', options);
  }
}

/** Clé API absente ou refusée par le service de traduction. */
export class AuthenticationError extends TranslationError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, { ...options, status: 401, code: 'authentication_error' });
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
