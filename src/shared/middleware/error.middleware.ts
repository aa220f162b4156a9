/**
 * =============================================================================
 * ERROR HANDLING MIDDLEWARE
 * =============================================================================
 *
 * Centralized error handling for all routes.
 *
 * SECURITY:
 * - Stack traces never reach clients
 * - Internal error messages are hidden in production
 * - All errors are logged server-side
 * =============================================================================
 */

import { Request, Response, NextFunction } from 'express';
import { logger } from '../services/logger.service';
import { AppError, ErrorCode } from '../types/error.types';
import { errorResponse } from '../types/api.types';
import { config } from '../../config/environment';

/**
 * Body-parser failures carry an HTTP status and a `type`
 */
function isBodyParserError(error: unknown): error is Error & { status: number; type: string } {
  return error instanceof Error
    && 'status' in error && typeof error.status === 'number'
    && 'type' in error && typeof error.type === 'string';
}

/**
 * Global error handler middleware
 * Must be the last middleware in the chain
 */
export function errorHandler(
  error: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  // Determine if this is a known operational error
  if (error instanceof AppError) {
    const logData = {
      code: error.code,
      error: error.message,
      path: req.path,
      method: req.method,
      userId: req.user?.userId || 'anonymous'
    };
    if (error.statusCode >= 500) {
      logger.error('Request failed', logData);
    } else {
      logger.warn('Request rejected', logData);
    }
    res.status(error.statusCode).json(errorResponse(error.code, error.message, error.details));
    return;
  }

  if (isBodyParserError(error) && error.status < 500) {
    logger.warn('Malformed request body', { type: error.type, path: req.path });
    res.status(error.status).json(errorResponse(ErrorCode.VALIDATION_ERROR, 'Malformed request body'));
    return;
  }

  // Log the full error server-side
  logger.error('Request error', {
    error: error.message,
    stack: error.stack,
    path: req.path,
    method: req.method,
    ip: req.ip,
    userId: req.user?.userId || 'anonymous'
  });

  // SECURITY: Never expose internal error details to client
  res.status(500).json(errorResponse(
    ErrorCode.INTERNAL_ERROR,
    config.isProduction
      ? 'An unexpected error occurred. Please try again later.'
      : error.message // Show details only in development
  ));
}

/**
 * Async route wrapper to catch async errors
 * Use this to wrap async route handlers
 */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>
) {
  return (req: Request, res: Response, next: NextFunction): void => {
    fn(req, res, next).catch(next);
  };
}

/**
 * Not found error handler
 */
export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json(errorResponse(ErrorCode.NOT_FOUND, `Cannot ${req.method} ${req.path}`));
}
