import type { NextFunction, Request, Response } from 'express';
import multer from 'multer';
import type { AppConfig } from '../config';
import { AppError, errorMessage, type ErrorCode } from '../errors';
import { createLogger } from '../utils/logger';

export interface ErrorBody {
  success: false;
  error: string;
  code: ErrorCode;
  details?: string;
}

interface HttpErrorLike {
  type: string;
  status: number;
}

// Erreurs levées par express.json() (body-parser)
function isBodyParserError(error: unknown): error is Error & HttpErrorLike {
  return (
    error instanceof Error &&
    'type' in error &&
    typeof error.type === 'string' &&
    'status' in error &&
    typeof error.status === 'number'
  );
}

export function toErrorResponse(
  error: unknown,
  exposeDetails: boolean,
  maxUploadMb: number
): { status: number; body: ErrorBody } {
  if (error instanceof AppError) {
    return { status: error.status, body: { success: false, error: error.message, code: error.code } };
  }
  if (error instanceof multer.MulterError) {
    if (error.code === 'LIMIT_FILE_SIZE') {
      return {
        status: 413,
        body: {
          success: false,
          error: `The file is larger than the ${maxUploadMb} MB upload limit`,
          code: 'file_too_large'
        }
      };
    }
    return {
      status: 400,
      body: { success: false, error: `Invalid upload: ${error.message}`, code: 'validation_error' }
    };
  }
  if (isBodyParserError(error)) {
    if (error.type === 'entity.too.large') {
      return {
        status: 413,
        body: { success: false, error: 'The request body is too large', code: 'file_too_large' }
      };
    }
    if (error.status === 400) {
      return {
        status: 400,
        body: { success: false, error: 'The request body is not valid JSON', code: 'validation_error' }
      };
    }
  }
  return {
    status: 500,
    body: {
      success: false,
      error: 'An unexpected error occurred',
      code: 'internal_error',
      details: exposeDetails ? errorMessage(error) : undefined
    }
  };
}

export function errorHandler(config: AppConfig) {
  return (err: unknown, _req: Request, res: Response, _next: NextFunction): void => {
    const logger = res.locals.context?.logger ?? createLogger('http');
    const { status, body } = toErrorResponse(
      err,
      config.nodeEnv === 'development',
      config.maxUploadMb
    );
    if (status >= 500) {
      logger.error('Error:', err);
    } else {
      logger.warn(`${status} ${body.code}: ${body.error}`);
    }
    res.status(status).json(body);
  };
}
