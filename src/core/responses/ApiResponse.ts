/**
 * =============================================================================
 * API RESPONSE BUILDERS
 * =============================================================================
 *
 * Every successful response uses the same envelope:
 *
 * ```json
 * {
 *   "success": true,
 *   "data": { ... },
 *   "message": "Optional success message",
 *   "meta": { "timestamp": "2024-01-01T00:00:00.000Z" }
 * }
 * ```
 *
 * USAGE:
 * ```typescript
 * return ApiResponse.success(res, pkg);
 * return ApiResponse.created(res, pkg, 'Package created');
 * ```
 *
 * Errors are rendered by the error middleware from AppError instances.
 * =============================================================================
 */

import { Response } from 'express';
import { HTTP_STATUS } from '../constants';

/**
 * Success response format
 */
export interface SuccessResponse<T> {
  success: true;
  data: T;
  message?: string;
  meta?: ResponseMeta;
}

/**
 * Response metadata
 */
export interface ResponseMeta {
  timestamp?: string;
  [key: string]: unknown;
}

/**
 * API Response Builder Class
 */
export class ApiResponse {
  /**
   * 200 OK - Generic success response
   */
  static success<T>(
    res: Response,
    data: T,
    message?: string,
    meta?: Omit<ResponseMeta, 'timestamp'>
  ): Response {
    const response: SuccessResponse<T> = {
      success: true,
      data,
      ...(message && { message }),
      meta: {
        timestamp: new Date().toISOString(),
        ...meta
      }
    };
    return res.status(HTTP_STATUS.OK).json(response);
  }

  /**
   * 201 Created - Resource created successfully
   */
  static created<T>(
    res: Response,
    data: T,
    message: string = 'Resource created successfully'
  ): Response {
    const response: SuccessResponse<T> = {
      success: true,
      data,
      message,
      meta: {
        timestamp: new Date().toISOString()
      }
    };
    return res.status(HTTP_STATUS.CREATED).json(response);
  }

  /**
   * 202 Accepted - Request queued, effect is asynchronous
   */
  static accepted(res: Response, message: string = 'Accepted'): Response {
    return res.status(HTTP_STATUS.ACCEPTED).json({
      success: true,
      data: null,
      message,
      meta: { timestamp: new Date().toISOString() }
    });
  }
}
