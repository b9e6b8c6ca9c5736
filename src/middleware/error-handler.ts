/**
 * Error Handling Middleware
 */

import { NextFunction, Request, RequestHandler, Response } from 'express';
import { env } from '../config/env';

export class ApiError extends Error {
  constructor(
    public readonly statusCode: number,
    message: string
  ) {
    super(message);
    this.name = 'ApiError';
  }
}

/**
 * Forward rejected promises from async route handlers to the error handler
 */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>
): RequestHandler {
  return (req, res, next) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}

/**
 * Final error handler (must be registered last)
 */
export function errorHandler(
  err: unknown,
  req: Request,
  res: Response,
  // Express recognizes error handlers by their arity
  // eslint-disable-next-line @typescript-eslint/no-unused-vars
  next: NextFunction
): void {
  if (err instanceof ApiError) {
    res.status(err.statusCode).json({ success: false, error: err.message });
    return;
  }

  // Malformed JSON body
  if (err instanceof SyntaxError && 'body' in err) {
    res.status(400).json({ success: false, error: 'Invalid JSON body' });
    return;
  }

  console.error(`Unhandled error on ${req.method} ${req.path}:`, err);
  const message = err instanceof Error ? err.message : 'Internal server error';
  res.status(500).json({
    success: false,
    error: env.NODE_ENV === 'production' ? 'Internal server error' : message,
  });
}
