import { Request, Response, NextFunction } from 'express';
import { AppError, ErrorCode } from '../types/error.types';
import { createErrorResponse } from '../utils/response-factory';
import { logger } from '../config/logger';
import { redact } from './logger.middleware';
import { ZodError } from 'zod';

// body-parser marks its errors with a type
const isBodyParseError = (err: Error): boolean =>
  'type' in err && err.type === 'entity.parse.failed';

/**
 * Global error handling middleware
 *
 * Catches all errors and returns consistent error responses
 */
export const errorHandler = (err: Error, req: Request, res: Response, _next: NextFunction) => {
  const known = err instanceof AppError && err.statusCode < 500;

  // Log error with context
  logger.log(known ? 'warn' : 'error', 'Error occurred', {
    error: err.message,
    ...(!known && { stack: err.stack }),
    path: req.path,
    method: req.method,
    body: redact(req.body),
  });

  // AppError (known application errors)
  if (err instanceof AppError) {
    return res.status(err.statusCode).json(createErrorResponse(err.code, err.message, err.details));
  }

  // Zod validation errors
  if (err instanceof ZodError) {
    return res.status(400).json(
      createErrorResponse(ErrorCode.VALIDATION_ERROR, 'Validation failed', {
        errors: err.errors.map((issue) => ({
          field: issue.path.join('.'),
          message: issue.message,
        })),
      })
    );
  }

  if (isBodyParseError(err)) {
    return res
      .status(400)
      .json(createErrorResponse(ErrorCode.VALIDATION_ERROR, 'Request body is not valid JSON'));
  }

  // PostgreSQL/Supabase errors
  if (err.message.includes('duplicate key')) {
    return res
      .status(409)
      .json(createErrorResponse(ErrorCode.DUPLICATE_RESOURCE, 'Duplicate resource'));
  }

  if (err.message.includes('foreign key')) {
    return res
      .status(400)
      .json(createErrorResponse(ErrorCode.DATABASE_ERROR, 'Referenced resource does not exist'));
  }

  if (err.message.includes('violates check constraint')) {
    return res
      .status(409)
      .json(createErrorResponse(ErrorCode.DATABASE_ERROR, 'Change conflicts with current stock'));
  }

  // Unknown errors - don't expose internals in production
  return res
    .status(500)
    .json(createErrorResponse(ErrorCode.INTERNAL_ERROR, 'An unexpected error occurred'));
};

/**
 * 404 Not Found handler
 */
export const notFoundHandler = (req: Request, res: Response) => {
  res
    .status(404)
    .json(createErrorResponse(ErrorCode.NOT_FOUND, `Route ${req.method} ${req.path} not found`));
};
