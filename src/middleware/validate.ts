import type { NextFunction, Request, Response } from 'express';
import { ZodError, type ZodSchema } from 'zod';
import { AppError, ErrorCode } from '../utils/appError.js';

export function toValidationError(error: ZodError): AppError {
  const details = error.issues.map((e) => ({
    path: e.path.join('.'),
    message: e.message,
  }));
  return AppError.badRequest('Validation failed', ErrorCode.VALIDATION_ERROR, { errors: details });
}

/**
 * Validate request body, query, or params using a Zod schema.
 */
export const validate = (schema: ZodSchema, source: 'body' | 'query' | 'params' = 'body') => {
  return (req: Request, _res: Response, next: NextFunction): void => {
    try {
      const data = schema.parse(req[source]);
      // In Express 5, req.query and req.params are getter-only; only reassign body
      if (source === 'body') {
        req.body = data;
      }
      next();
    } catch (error) {
      if (error instanceof ZodError) {
        next(toValidationError(error));
        return;
      }
      next(error);
    }
  };
};
