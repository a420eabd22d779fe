import type { NextFunction, Request, RequestHandler, Response } from 'express';

/**
 * Wraps an async route handler so thrown errors are forwarded to Express error handler.
 * `ReqBody` is the shape the route's validate() middleware has already parsed.
 */
export const asyncHandler = <ReqBody = unknown, P = Record<string, string>>(
  fn: (req: Request<P, unknown, ReqBody>, res: Response, next: NextFunction) => Promise<unknown>,
): RequestHandler<P, unknown, ReqBody> => {
  return (req, res, next) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
};
