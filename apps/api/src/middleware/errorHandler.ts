/**
 * Global error handler middleware
 */

import type { ErrorRequestHandler, Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { createLogger, toError } from '@sentiment/shared';

const logger = createLogger('HTTP');

/**
 * Error carrying the HTTP status to answer with
 */
export class AppError extends Error {
  statusCode: number;
  isOperational: boolean;

  constructor(message: string, statusCode = 500, isOperational = true) {
    super(message);
    this.name = 'AppError';
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Status set by the body parser (malformed JSON, oversized body)
 */
function bodyParserStatus(err: Error): number | undefined {
  if ('type' in err && typeof err.type === 'string' && err.type.startsWith('entity.')
    && 'status' in err && typeof err.status === 'number') {
    return err.status;
  }
  return undefined;
}

function statusOf(err: Error): number {
  if (err instanceof ZodError) return 400;
  if (err instanceof AppError) return err.statusCode;
  return bodyParserStatus(err) ?? 500;
}

export interface ErrorHandlerOptions {
  /** Adds stack traces to responses */
  isDevelopment: boolean;
}

/**
 * Global error handler
 */
export function createErrorHandler({ isDevelopment }: ErrorHandlerOptions): ErrorRequestHandler {
  return (
    error: unknown,
    req: Request,
    res: Response,
    // Express recognises error handlers by their four parameters
    _next: NextFunction
  ): void => {
    const err = toError(error);
    const statusCode = statusOf(err);

    // Log error
    if (statusCode >= 500) {
      logger.error(`Server error on ${req.method} ${req.path}: ${err.message}`, { stack: err.stack });
    } else {
      logger.warn(`Client error ${statusCode} on ${req.method} ${req.path}: ${err.message}`);
    }

    // Handle Zod validation errors
    if (err instanceof ZodError) {
      res.status(400).json({
        error: 'Validation error',
        details: err.errors.map(e => ({
          path: e.path.join('.'),
          message: e.message
        }))
      });
      return;
    }

    if (statusCode === 400 && bodyParserStatus(err) !== undefined) {
      res.status(400).json({
        error: 'Validation error',
        details: [{ path: '', message: 'Request body is not valid JSON' }]
      });
      return;
    }

    // Internal details stay out of 500 responses
    const expose = statusCode < 500 || (err instanceof AppError && err.isOperational);
    res.status(statusCode).json({
      error: expose ? err.message : 'Internal server error',
      ...(isDevelopment && { stack: err.stack })
    });
  };
}

/**
 * 404 handler
 */
export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json({
    error: 'Not found',
    message: `Route ${req.method} ${req.path} not found`
  });
}
