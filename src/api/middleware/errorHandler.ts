/**
 * Error handling middleware
 */
import type { Request, Response, NextFunction } from 'express';
import { createElement } from 'react';
import { ZodError } from 'zod';
import { createChildLogger } from '../../core/Logger.js';
import { ProviderError } from '../../providers/errors.js';
import { ErrorPage } from '../../views/index.js';
import { sendPage } from '../render.js';

const logger = createChildLogger({ service: 'HTTP' });

/**
 * HTTP error with a status code
 */
export class ApiError extends Error {
  constructor(
    public statusCode: number,
    message: string
  ) {
    super(message);
    this.name = 'ApiError';
  }

  static notFound(resource: string = 'Resource'): ApiError {
    return new ApiError(404, `${resource} not found`);
  }

  static internal(message: string = 'Internal server error'): ApiError {
    return new ApiError(500, message);
  }
}

function formatZodError(error: ZodError): string {
  return error.errors
    .map((err) => (err.path.length > 0 ? `${err.path.join('.')}: ${err.message}` : err.message))
    .join('; ');
}

/**
 * Global error handler middleware; the process keeps serving after any error
 */
export function errorHandler(
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  if (res.headersSent) {
    logger.error({ error: err.message, path: req.path }, 'Error after response was sent');
    return;
  }

  if (err instanceof ZodError) {
    logger.debug({ path: req.path, method: req.method }, 'Request validation failed');
    sendPage(res, 400, createElement(ErrorPage, { status: 400, message: `Invalid request: ${formatZodError(err)}` }));
    return;
  }

  if (err instanceof ApiError) {
    logger.debug({ status: err.statusCode, path: req.path, method: req.method }, err.message);
    sendPage(res, err.statusCode, createElement(ErrorPage, { status: err.statusCode, message: err.message }));
    return;
  }

  if (err instanceof ProviderError) {
    logger.warn({ kind: err.kind, path: req.path, method: req.method }, err.message);
    sendPage(res, err.httpStatus, createElement(ErrorPage, { status: err.httpStatus, message: err.message }));
    return;
  }

  logger.error(
    {
      error: err.message,
      stack: err.stack,
      path: req.path,
      method: req.method,
    },
    'Unhandled error'
  );

  const message = process.env.NODE_ENV === 'production' ? 'Internal server error' : err.message;
  sendPage(res, 500, createElement(ErrorPage, { status: 500, message }));
}

/**
 * Not found handler for unmatched routes
 */
export function notFoundHandler(req: Request, res: Response): void {
  sendPage(res, 404, createElement(ErrorPage, { status: 404, message: `Page not found: ${req.method} ${req.path}` }));
}

/**
 * Async handler wrapper to catch errors in async route handlers
 */
export function asyncHandler<T>(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<T>
): (req: Request, res: Response, next: NextFunction) => void {
  return (req, res, next) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}
