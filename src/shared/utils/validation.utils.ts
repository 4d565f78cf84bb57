/**
 * =============================================================================
 * VALIDATION UTILITIES
 * =============================================================================
 *
 * Zod-based validation helpers shared by every route module.
 * Failures become ValidationError (400) for the global error handler.
 * =============================================================================
 */

import { z } from 'zod';
import { Request, Response, NextFunction } from 'express';
import { ValidationError } from '../../core';
import { logger } from '../services/logger.service';

/**
 * Synchronous schema validation - validates data and returns parsed result
 * Throws ValidationError on validation failure
 *
 * @param schema - Zod schema to validate against
 * @param data - Data to validate
 * @returns Validated and transformed data
 */
export function validateSchema<T extends z.ZodTypeAny>(
  schema: T,
  data: unknown
): z.infer<T> {
  const result = schema.safeParse(data);
  if (!result.success) {
    throw ValidationError.fromZodError(result.error);
  }
  return result.data;
}

/**
 * Request validation middleware
 * Validates request body against a Zod schema
 *
 * @param schema - Zod schema to validate against
 */
export function validateRequest<T extends z.ZodTypeAny>(schema: T) {
  return (req: Request, _res: Response, next: NextFunction): void => {
    const result = schema.safeParse(req.body);

    if (!result.success) {
      const error = ValidationError.fromZodError(result.error);
      logger.debug('Request validation failed', { path: req.path, errors: error.errors });
      next(error);
      return;
    }

    // Replace body with validated data (includes transforms)
    req.body = result.data;
    next();
  };
}
