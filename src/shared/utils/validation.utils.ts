/**
 * =============================================================================
 * VALIDATION UTILITIES
 * =============================================================================
 *
 * Shared validation schemas and request validation middleware.
 * =============================================================================
 */

import { z } from 'zod';
import { Request, Response, NextFunction } from 'express';
import { ValidationError } from '../../core/errors/AppError';

// ============================================================
// COMMON SCHEMAS
// ============================================================

/**
 * Numeric `:id` route parameter
 */
export const idParamSchema = z.object({
  id: z.coerce.number().int().positive()
});

export const latitudeSchema = z.number().min(-90).max(90);
export const longitudeSchema = z.number().min(-180).max(180);

// ============================================================
// VALIDATION FUNCTIONS
// ============================================================

/**
 * Validate data against a schema, throwing ValidationError on failure
 */
export function validateSchema<T extends z.ZodTypeAny>(schema: T, data: unknown): z.infer<T> {
  const result = schema.safeParse(data);
  if (!result.success) {
    throw ValidationError.fromZodError(result.error);
  }
  return result.data;
}

/**
 * Request validation middleware
 * Validates request body against a Zod schema and replaces it with the parsed value
 */
export function validateRequest<T extends z.ZodTypeAny>(schema: T) {
  return (req: Request, _res: Response, next: NextFunction): void => {
    const result = schema.safeParse(req.body);
    if (!result.success) {
      next(ValidationError.fromZodError(result.error));
      return;
    }
    req.body = result.data;
    next();
  };
}
