/**
 * =============================================================================
 * ROUTE OPTIMIZER MODULE - SCHEMAS & TYPES
 * =============================================================================
 *
 * Defines data structures for multi-stop route optimization.
 *
 * KEY CONCEPTS:
 * - Location: an address string; its position in the input list is its node
 *   index, and index 0 is the depot the engineer starts from and returns to
 * - DistanceMatrix: matrix[i][j] = meters from node i to node j,
 *   Infinity when no usable route exists for that pair
 * - Tour: permutation of node indices starting at the depot; the return
 *   leg to the depot is implicit
 *
 * EXAMPLE:
 * Stops: Depot, A, B, C
 *   Tour [0, 1, 3, 2] = Depot -> A -> C -> B (-> Depot)
 * =============================================================================
 */

import { z } from 'zod';
import { DistanceElementFailureStatus, RouteOptimizationStatus } from '../../core';

// =============================================================================
// CONFIGURATION
// =============================================================================

export const ROUTE_OPTIMIZER_CONFIG = {
  /**
   * Default cap on stops (depot included) handed to the exact solver.
   * 15 stops = 15 * 2^15 ≈ 490K table cells, solved in well under a second.
   */
  DEFAULT_MAX_STOPS: 15,

  /**
   * Longest accepted address string
   */
  MAX_ADDRESS_LENGTH: 500,
};

// =============================================================================
// CORE TYPES
// =============================================================================

/** Address string; duplicates are allowed and treated as distinct nodes */
export type Location = string;

/** Row-major N x N matrix of meters, Infinity = forbidden edge */
export type DistanceMatrix = ReadonlyArray<ReadonlyArray<number>>;

/** Permutation of node indices beginning with the start index */
export type Tour = number[];

export interface TourSolution {
  /** Visiting order, start first, return leg implicit */
  order: Tour;

  /** Closed-tour cost in matrix units (Infinity when no tour exists) */
  cost: number;
}

export interface OptimizationResult {
  status: RouteOptimizationStatus;

  /** Addresses in visiting order (input order when not optimized) */
  optimizedRoute: Location[];

  /** Closed-tour length in kilometers (0 when not optimized) */
  distanceKm: number;
}

/**
 * Wire shape returned to the caller (the engineer navigation tool)
 */
export interface RouteToolPayload {
  status: RouteOptimizationStatus;
  optimized_route: Location[];
  'distance (in km)': number;
}

// =============================================================================
// DISTANCE LOOKUP COLLABORATOR
// =============================================================================

/**
 * One origin -> destination cell of a lookup response
 */
export type DistanceElement =
  | { status: 'OK'; distanceMeters: number }
  | { status: DistanceElementFailureStatus };

/**
 * Whole-batch outcome. `ok: false` means the provider itself is unusable
 * (network, auth, quota), as opposed to a single pair without a route.
 */
export type DistanceLookupResult =
  | { ok: true; rows: DistanceElement[][] }
  | { ok: false; reason: string; providerStatus?: string };

/**
 * Anything able to return travel distances for every origin/destination pair.
 * rows[i][j] must describe origins[i] -> destinations[j].
 */
export interface DistanceLookup {
  lookup(origins: Location[], destinations: Location[]): Promise<DistanceLookupResult>;
}

// =============================================================================
// REQUEST SCHEMA
// =============================================================================

/**
 * Build the request schema for a given stop cap
 */
export function createOptimizeRouteSchema(maxStops: number) {
  return z.object({
    addresses: z
      .array(
        z.string()
          .trim()
          .min(1, 'Address cannot be empty')
          .max(ROUTE_OPTIMIZER_CONFIG.MAX_ADDRESS_LENGTH)
      )
      .max(maxStops, `At most ${maxStops} addresses (depot included) can be optimized`),
  });
}

export const optimizeRouteSchema = createOptimizeRouteSchema(ROUTE_OPTIMIZER_CONFIG.DEFAULT_MAX_STOPS);

// =============================================================================
// TYPE EXPORTS
// =============================================================================

export type OptimizeRouteRequest = z.infer<typeof optimizeRouteSchema>;
