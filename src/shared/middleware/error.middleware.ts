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
import { ZodError } from 'zod';
import { config } from '../../config/environment';
import { ErrorCode, HTTP_STATUS } from '../../core/constants';
import { AppError, ValidationError } from '../../core/errors/AppError';
import { logger } from '../services/logger.service';

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
  const known = error instanceof ZodError ? ValidationError.fromZodError(error) : error;

  if (known instanceof AppError) {
    const level = known.statusCode >= HTTP_STATUS.INTERNAL_ERROR ? 'error' : 'warn';
    logger.log(level, 'Request error', {
      code: known.code,
      error: known.message,
      path: req.path,
      method: req.method,
      userId: req.user?.userId ?? 'anonymous'
    });

    res.status(known.statusCode).json({
      success: false,
      error: {
        code: known.code,
        message: known.message,
        ...(known.details && { details: known.details })
      }
    });
    return;
  }

  logger.error('Unhandled request error', {
    error: error.message,
    stack: error.stack,
    path: req.path,
    method: req.method,
    userId: req.user?.userId ?? 'anonymous'
  });

  // SECURITY: Never expose internal error details to client
  res.status(HTTP_STATUS.INTERNAL_ERROR).json({
    success: false,
    error: {
      code: ErrorCode.INTERNAL_ERROR,
      message: config.isProduction
        ? 'An unexpected error occurred. Please try again later.'
        : error.message
    }
  });
}

/**
 * Async route wrapper to catch async errors
 */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>
) {
  return (req: Request, res: Response, next: NextFunction): void => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}

/**
 * Not found error handler
 */
export function notFoundHandler(req: Request, res: Response): void {
  res.status(HTTP_STATUS.NOT_FOUND).json({
    success: false,
    error: {
      code: ErrorCode.NOT_FOUND,
      message: `Cannot ${req.method} ${req.path}`
    }
  });
}
