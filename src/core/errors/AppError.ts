/**
 * =============================================================================
 * APPLICATION ERROR CLASSES
 * =============================================================================
 *
 * Standardized error handling for the entire application.
 *
 * USAGE:
 * ```typescript
 * // In service
 * throw new PackageNotFoundError(packageId);
 *
 * // In realtime handler
 * throw new ProtocolError('Frame is not valid JSON');
 * ```
 *
 * HTTP errors are turned into responses by the global error middleware.
 * Realtime errors carry the WebSocket close code the connection ends with.
 * =============================================================================
 */

import { ErrorCode, HTTP_STATUS, WS_CLOSE_CODES, WsCloseCode } from '../constants';

/**
 * Base Application Error
 * All custom errors extend this class
 */
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: ErrorCode | string;
  public readonly isOperational: boolean;
  public readonly details?: Record<string, unknown>;
  public readonly timestamp: string;

  constructor(
    message: string,
    statusCode: number = HTTP_STATUS.INTERNAL_ERROR,
    code: ErrorCode | string = ErrorCode.INTERNAL_ERROR,
    isOperational: boolean = true,
    details?: Record<string, unknown>
  ) {
    super(message);

    this.name = new.target.name;
    this.statusCode = statusCode;
    this.code = code;
    this.isOperational = isOperational;
    this.details = details;
    this.timestamp = new Date().toISOString();

    Error.captureStackTrace(this, this.constructor);

    // Set prototype explicitly (TypeScript issue with extending Error)
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Convert error to JSON response format
   */
  toJSON(): ErrorResponse {
    return {
      success: false,
      error: {
        code: this.code,
        message: this.message,
        ...(this.details && { details: this.details }),
        timestamp: this.timestamp
      }
    };
  }
}

/**
 * Error response format
 */
export interface ErrorResponse {
  success: false;
  error: {
    code: string;
    message: string;
    details?: Record<string, unknown>;
    timestamp: string;
  };
}

// =============================================================================
// SPECIFIC ERROR CLASSES
// =============================================================================

/**
 * 400 Validation Error - Schema/input validation failed
 */
export class ValidationError extends AppError {
  public readonly errors: ValidationErrorDetail[];

  constructor(
    message: string = 'Validation failed',
    errors: ValidationErrorDetail[] = []
  ) {
    super(message, HTTP_STATUS.BAD_REQUEST, ErrorCode.VALIDATION_ERROR, true, { errors });
    this.errors = errors;
  }

  static fromZodError(zodError: { errors: Array<{ path: (string | number)[]; message: string }> }): ValidationError {
    const errors = zodError.errors.map(err => ({
      field: err.path.join('.'),
      message: err.message
    }));
    return new ValidationError('Validation failed', errors);
  }
}

export interface ValidationErrorDetail {
  field: string;
  message: string;
}

/**
 * 401 Unauthorized - Authentication required or failed
 */
export class UnauthorizedError extends AppError {
  constructor(
    message: string = 'Unauthorized',
    code: ErrorCode | string = ErrorCode.AUTH_TOKEN_INVALID
  ) {
    super(message, HTTP_STATUS.UNAUTHORIZED, code, true);
  }
}

/**
 * 403 Forbidden - Authenticated but not allowed
 */
export class ForbiddenError extends AppError {
  constructor(
    message: string = 'Access forbidden',
    code: ErrorCode | string = ErrorCode.AUTH_FORBIDDEN
  ) {
    super(message, HTTP_STATUS.FORBIDDEN, code, true);
  }
}

/**
 * 404 Not Found - Resource doesn't exist
 */
export class NotFoundError extends AppError {
  constructor(
    message: string = 'Resource not found',
    code: ErrorCode | string = ErrorCode.NOT_FOUND,
    details?: Record<string, unknown>
  ) {
    super(message, HTTP_STATUS.NOT_FOUND, code, true, details);
  }
}

/**
 * 409 Conflict - State conflict
 */
export class ConflictError extends AppError {
  constructor(
    message: string = 'Resource conflict',
    code: ErrorCode | string = 'CONFLICT',
    details?: Record<string, unknown>
  ) {
    super(message, HTTP_STATUS.CONFLICT, code, true, details);
  }
}

/**
 * 500 Internal Server Error - Unexpected error
 */
export class InternalError extends AppError {
  constructor(
    message: string = 'Internal server error',
    details?: Record<string, unknown>
  ) {
    super(message, HTTP_STATUS.INTERNAL_ERROR, ErrorCode.INTERNAL_ERROR, false, details);
  }
}

// =============================================================================
// DOMAIN-SPECIFIC ERRORS
// =============================================================================

export class PackageNotFoundError extends NotFoundError {
  constructor(packageId: number) {
    super(`Package not found: ${packageId}`, ErrorCode.PACKAGE_NOT_FOUND, { packageId });
  }
}

export class InvalidPackageStatusError extends ConflictError {
  constructor(currentStatus: string, requestedStatus: string) {
    super(
      `Cannot move package from ${currentStatus} to ${requestedStatus}`,
      ErrorCode.PACKAGE_INVALID_STATUS,
      { currentStatus, requestedStatus }
    );
  }
}

export class DeliveryNotFoundError extends NotFoundError {
  constructor(deliveryId: number) {
    super(`Delivery not found: ${deliveryId}`, ErrorCode.DELIVERY_NOT_FOUND, { deliveryId });
  }
}

// =============================================================================
// REALTIME ERRORS
// =============================================================================

/**
 * Base for errors that end a WebSocket session
 */
export abstract class RealtimeError extends AppError {
  abstract readonly closeCode: WsCloseCode;
}

/**
 * Upgrade refused - the socket never opens
 */
export class AuthRejectedError extends RealtimeError {
  readonly closeCode = WS_CLOSE_CODES.POLICY_VIOLATION;

  constructor(message: string = 'Authentication failed') {
    super(message, HTTP_STATUS.UNAUTHORIZED, ErrorCode.WS_AUTH_REJECTED, true);
  }
}

/**
 * Inbound frame could not be parsed - connection closed, process unaffected
 */
export class ProtocolError extends RealtimeError {
  readonly closeCode = WS_CLOSE_CODES.PROTOCOL_ERROR;

  constructor(message: string = 'Protocol error') {
    super(message, HTTP_STATUS.BAD_REQUEST, ErrorCode.WS_PROTOCOL_ERROR, true);
  }
}

/**
 * Outbound queue full - slow consumer is dropped, no retry
 */
export class BufferOverflowError extends RealtimeError {
  readonly closeCode = WS_CLOSE_CODES.TRY_AGAIN_LATER;

  constructor(connectionId: string, capacity: number) {
    super(
      `Outbound buffer full for connection ${connectionId}`,
      HTTP_STATUS.SERVICE_UNAVAILABLE,
      ErrorCode.WS_BUFFER_OVERFLOW,
      true,
      { connectionId, capacity }
    );
  }
}

// =============================================================================
// ERROR TYPE GUARDS
// =============================================================================

/**
 * Check if error is an operational (expected) error
 */
export function isOperationalError(error: unknown): error is AppError {
  return error instanceof AppError && error.isOperational;
}

export function isRealtimeError(error: unknown): error is RealtimeError {
  return error instanceof RealtimeError;
}
