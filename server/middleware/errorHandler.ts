import type { Request, Response, NextFunction, RequestHandler } from 'express';
import multer from 'multer';
import { createApiErrorResponse, ERROR_CODES, isVatSummaryError, type ErrorCode } from '@shared/errors';
import { ZodError } from 'zod';
import { HTTP_STATUS } from '../config/constants';
import { logger } from '../services/logger';

/**
 * Helper to safely extract error message from unknown error
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return 'Unknown error occurred';
}

export function isErrorWithMessage(error: unknown): error is Error {
  return error instanceof Error;
}

export class ServerError extends Error {
  constructor(
    public code: ErrorCode,
    public userMessage: string,
    public statusCode: number = 500,
    public details?: Record<string, unknown>
  ) {
    super(`[${code}] ${userMessage}`);
    this.name = 'ServerError';
  }

  static validation(userMessage: string, details?: Record<string, unknown>): ServerError {
    return new ServerError(ERROR_CODES.VALIDATION_FAILED, userMessage, HTTP_STATUS.BAD_REQUEST, details);
  }

  static notFound(code: ErrorCode, resource: string): ServerError {
    return new ServerError(code, `${resource} not found`, HTTP_STATUS.NOT_FOUND);
  }
}

function hasStringCode(err: unknown): err is { code: string } {
  return typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string';
}

/**
 * Central error handling middleware
 */
export function errorHandler(
  err: unknown,
  req: Request,
  res: Response,
  _next: NextFunction
) {
  const requestId = req.get('x-request-id') ?? 'unknown';
  logger.error('errorHandler', `Error in ${req.method} ${req.path}`, {
    errorMessage: getErrorMessage(err),
    requestId
  }, isErrorWithMessage(err) ? err : undefined);

  if (err instanceof ServerError) {
    return res.status(err.statusCode).json(
      createApiErrorResponse('SERVER_ERROR', err.code, err.message, err.userMessage, err.details)
    );
  }

  if (isVatSummaryError(err)) {
    const userMessage = err.category === 'no_data'
      ? 'The workbook contains no usable VAT rows.'
      : err.category === 'unreadable_workbook'
      ? 'The uploaded file is not a readable workbook.'
      : err.category === 'cancelled'
      ? 'The request was cancelled before the summary finished.'
      : 'The VAT summary could not be produced.';
    return res.status(err.statusCode).json(
      createApiErrorResponse('VAT_SUMMARY_ERROR', err.code, err.message, userMessage, {
        category: err.category,
        ...err.details
      })
    );
  }

  if (err instanceof ZodError) {
    const details = {
      validationErrors: err.errors.map(error => ({
        path: error.path.join('.'),
        message: error.message,
        code: error.code
      }))
    };
    const firstError = err.errors[0];
    return res.status(HTTP_STATUS.BAD_REQUEST).json(
      createApiErrorResponse(
        'VALIDATION_ERROR',
        ERROR_CODES.VALIDATION_FAILED,
        'Validation failed',
        firstError?.message || 'The request is not valid.',
        details
      )
    );
  }

  // Upload limits and unexpected fields
  if (err instanceof multer.MulterError) {
    return res.status(HTTP_STATUS.BAD_REQUEST).json(
      createApiErrorResponse(
        'UPLOAD_ERROR',
        ERROR_CODES.VALIDATION_FAILED,
        err.message,
        err.code === 'LIMIT_FILE_SIZE' ? 'The workbook is too large.' : 'The upload was rejected.',
        { multerCode: err.code, field: err.field }
      )
    );
  }

  // PostgreSQL errors (class 23: integrity constraint violation)
  if (hasStringCode(err) && err.code.startsWith('23')) {
    return res.status(HTTP_STATUS.INTERNAL_SERVER_ERROR).json(
      createApiErrorResponse(
        'DATABASE_ERROR',
        ERROR_CODES.DATABASE_ERROR,
        'Database operation failed',
        'There is a problem with the database. Please try again later.',
        { postgresCode: err.code }
      )
    );
  }

  const statusCode = (typeof err === 'object' && err !== null && 'statusCode' in err && typeof err.statusCode === 'number')
    ? err.statusCode
    : (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number')
    ? err.status
    : HTTP_STATUS.INTERNAL_SERVER_ERROR;

  const isClientError = statusCode >= 400 && statusCode < 500;

  return res.status(statusCode).json(
    createApiErrorResponse(
      'UNKNOWN_ERROR',
      ERROR_CODES.INTERNAL_SERVER_ERROR,
      getErrorMessage(err),
      isClientError
        ? 'The request could not be processed.'
        : 'An internal server error occurred. Please try again later.'
    )
  );
}

/**
 * Forwards rejections of async route handlers to the error middleware
 */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>
): RequestHandler {
  return (req, res, next) => {
    fn(req, res, next).catch(next);
  };
}
