/**
 * =============================================================================
 * CORE CONSTANTS - Single Source of Truth
 * =============================================================================
 *
 * All application-wide constants in one place.
 *
 * BENEFITS:
 * - No magic strings/numbers scattered in code
 * - Type safety with enums
 * =============================================================================
 */

// =============================================================================
// ROUTE OPTIMIZATION STATUS
// =============================================================================

/**
 * Outcome of a multi-stop optimization
 *
 * - SUCCESS: optimal tour found (or trivial 0/1 stop input)
 * - ERROR: lookup or solver failed; route is returned unoptimized
 * - INFEASIBLE: no closed tour exists over the reachable legs
 */
export enum RouteOptimizationStatus {
  SUCCESS = 'success',
  ERROR = 'error',
  INFEASIBLE = 'infeasible'
}

// =============================================================================
// DISTANCE ELEMENT STATUS (Google Distance Matrix element codes)
// =============================================================================

export const DISTANCE_ELEMENT_STATUS = {
  OK: 'OK',
  NOT_FOUND: 'NOT_FOUND',
  ZERO_RESULTS: 'ZERO_RESULTS',
  MAX_ROUTE_LENGTH_EXCEEDED: 'MAX_ROUTE_LENGTH_EXCEEDED',
  MALFORMED: 'MALFORMED'
} as const;

export type DistanceElementFailureStatus = Exclude<
  typeof DISTANCE_ELEMENT_STATUS[keyof typeof DISTANCE_ELEMENT_STATUS],
  'OK'
>;

// =============================================================================
// UNITS
// =============================================================================

export const METERS_PER_KILOMETER = 1000;

// =============================================================================
// HTTP STATUS CODES (for consistency)
// =============================================================================

export const HTTP_STATUS = {
  OK: 200,
  BAD_REQUEST: 400,
  NOT_FOUND: 404,
  TOO_MANY_REQUESTS: 429,
  INTERNAL_ERROR: 500,
  SERVICE_UNAVAILABLE: 503
} as const;

// =============================================================================
// ERROR CODES (Hierarchical Structure)
// =============================================================================
/**
 * Application-specific error codes
 *
 * - 2xxx: Validation errors
 * - 7xxx: Route optimization
 * - 9xxx: System/Infrastructure errors
 */
export enum ErrorCode {
  // VALIDATION ERRORS (2xxx)
  VALIDATION_ERROR = 'VAL_2001',
  VALIDATION_MATRIX_INVALID = 'VAL_2002',

  // ROUTE OPTIMIZATION (7xxx)
  TOO_MANY_STOPS = 'ROUTE_7001',
  DISTANCE_LOOKUP_FAILED = 'ROUTE_7002',

  // SYSTEM & INFRASTRUCTURE (9xxx)
  INTERNAL_ERROR = 'SYS_9001',
  SERVICE_UNAVAILABLE = 'SYS_9002',
  RATE_LIMIT_EXCEEDED = 'SYS_9003',
  NOT_FOUND = 'SYS_9004',
  CIRCUIT_BREAKER_OPEN = 'SYS_9010',
  TIMEOUT_ERROR = 'SYS_9011'
}

// =============================================================================
// API
// =============================================================================

export const API_PREFIX = '/api/v1';
