import type { NextFunction, Request, Response } from 'express';
import { ZodError } from 'zod';
import { AppError, ErrorCode } from '../utils/appError.js';
import { logger } from '../utils/logger.js';
import { toValidationError } from './validate.js';

function isBodyParseError(err: Error): boolean {
  return err instanceof SyntaxError && 'type' in err && err.type === 'entity.parse.failed';
}

export const errorHandler = (
  err: Error,
  _req: Request,
  res: Response,
  _next: NextFunction,
): void => {
  const known = err instanceof ZodError ? toValidationError(err) : err;

  // AppError (operational)
  if (known instanceof AppError) {
    if (!known.isOperational) {
      logger.error('Non-operational AppError:', {
        message: known.message,
        code: known.code,
        stack: known.stack,
      });
    }

    res.status(known.statusCode).json({
      success: false,
      error: {
        code: known.code,
        message: known.message,
        details: known.details,
      },
    });
    return;
  }

  // Malformed JSON body
  if (isBodyParseError(err)) {
    res.status(400).json({
      success: false,
      error: {
        code: ErrorCode.VALIDATION_ERROR,
        message: 'Request body is not valid JSON',
      },
    });
    return;
  }

  // Unknown error
  logger.error('Unhandled error:', {
    name: err.name,
    message: err.message,
    stack: err.stack,
  });

  res.status(500).json({
    success: false,
    error: {
      code: ErrorCode.INTERNAL_ERROR,
      message: 'Internal server error',
    },
  });
};
