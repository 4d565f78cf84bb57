/**
 * =============================================================================
 * APPLICATION ERROR CLASSES
 * =============================================================================
 *
 * Standardized error handling for the entire application.
 *
 * USAGE:
 * ```typescript
 * // In the matrix builder
 * throw new DistanceLookupError('Distance Matrix returned REQUEST_DENIED');
 *
 * // In route handler
 * throw ValidationError.fromZodError(parsed.error);
 * ```
 *
 * Inside the route optimizer these never reach the caller: the service turns
 * them into a structured `status: "error"` result.
 * =============================================================================
 */

import { ErrorCode, HTTP_STATUS } from '../constants';

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
        details: this.details,
        timestamp: this.timestamp,
        ...(process.env.NODE_ENV === 'development' && { stack: this.stack })
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
    stack?: string;
  };
}

// =============================================================================
// SPECIFIC ERROR CLASSES
// =============================================================================

/**
 * 400 Bad Request - Invalid input
 */
export class BadRequestError extends AppError {
  constructor(
    message: string = 'Bad request',
    code: ErrorCode | string = ErrorCode.VALIDATION_ERROR,
    details?: Record<string, unknown>
  ) {
    super(message, HTTP_STATUS.BAD_REQUEST, code, true, details);
  }
}

/**
 * 400 Validation Error - Schema/input validation failed
 */
export class ValidationError extends AppError {
  public readonly errors: ValidationErrorDetail[];

  constructor(
    message: string = 'Validation failed',
    errors: ValidationErrorDetail[] = [],
    code: ErrorCode | string = ErrorCode.VALIDATION_ERROR
  ) {
    super(message, HTTP_STATUS.BAD_REQUEST, code, true, { errors });
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
  value?: unknown;
}

/**
 * 503 Service Unavailable - Dependency down
 */
export class ServiceUnavailableError extends AppError {
  constructor(
    message: string = 'Service temporarily unavailable',
    code: ErrorCode | string = ErrorCode.SERVICE_UNAVAILABLE,
    details?: Record<string, unknown>
  ) {
    super(message, HTTP_STATUS.SERVICE_UNAVAILABLE, code, true, details);
  }
}

// =============================================================================
// DOMAIN-SPECIFIC ERRORS
// =============================================================================

/**
 * The distance lookup failed as a whole (unreachable, unauthorized, quota).
 * Individual unreachable pairs are NOT errors - they become Infinity.
 */
export class DistanceLookupError extends ServiceUnavailableError {
  constructor(reason: string, providerStatus?: string) {
    super(
      `Distance lookup failed: ${reason}`,
      ErrorCode.DISTANCE_LOOKUP_FAILED,
      providerStatus !== undefined ? { providerStatus } : undefined
    );
  }
}

/**
 * Stop count beyond what the exact solver is allowed to handle
 */
export class TooManyStopsError extends BadRequestError {
  constructor(stopCount: number, maxStops: number) {
    super(
      `Cannot optimize ${stopCount} stops exactly (maximum is ${maxStops})`,
      ErrorCode.TOO_MANY_STOPS,
      { stopCount, maxStops }
    );
  }
}

/**
 * Distance matrix that the solver cannot interpret
 */
export class InvalidDistanceMatrixError extends ValidationError {
  constructor(message: string, field: string) {
    super(message, [{ field, message }], ErrorCode.VALIDATION_MATRIX_INVALID);
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
