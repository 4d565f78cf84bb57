/**
 * =============================================================================
 * ROUTE OPTIMIZER SERVICE - Multi-stop Visiting Order
 * =============================================================================
 *
 * Public entry point for "in which order should the engineer visit these
 * addresses?". Combines the distance matrix builder and the exact tour
 * solver, and never throws to its caller.
 *
 * FLOW:
 * ─────────────────────────────────────────────────────────────────────────────
 * addresses ──► DistanceMatrixBuilder ──► TourSolver ──► indices → addresses
 *                  (meters, Infinity)      (Held-Karp)     meters → km
 *
 * RESULT SHAPES:
 * ─────────────────────────────────────────────────────────────────────────────
 * - success:    optimized order + closed-tour distance in km
 * - infeasible: no closed tour over the reachable legs; input order, 0 km
 * - error:      lookup/solver failure; input order, 0 km
 * =============================================================================
 */

import { logger } from '../../shared/services/logger.service';
import { AppError, METERS_PER_KILOMETER, RouteOptimizationStatus, TooManyStopsError } from '../../core';
import { DistanceMatrixBuilder } from './distance-matrix.builder';
import { TourSolver } from './tour-solver';
import {
  DistanceLookup,
  Location,
  OptimizationResult,
  RouteToolPayload,
} from './route-optimizer.schema';

export interface RouteOptimizerOptions {
  /** Stop cap (depot included) for the exact solver */
  maxStops?: number;
}

export class RouteOptimizerService {
  private readonly builder: DistanceMatrixBuilder;
  private readonly solver: TourSolver;

  constructor(lookup: DistanceLookup, options: RouteOptimizerOptions = {}) {
    this.builder = new DistanceMatrixBuilder(lookup);
    this.solver = new TourSolver(options.maxStops);
  }

  /**
   * ┏━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━┓
   * ┃  OPTIMIZE ROUTE                                                         ┃
   * ┗━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━┛
   *
   * EXAMPLE INPUT:
   *   ["Depot", "A", "B", "C"]
   *
   * EXAMPLE OUTPUT:
   *   { status: "success", optimizedRoute: ["Depot", "A", "C", "B"], distanceKm: 0.01 }
   *
   * @param addresses Stops in any order; the first one is the depot
   */
  async optimizeRoute(addresses: Location[]): Promise<OptimizationResult> {
    if (addresses.length <= 1) {
      return {
        status: RouteOptimizationStatus.SUCCESS,
        optimizedRoute: [...addresses],
        distanceKm: 0,
      };
    }

    try {
      // Cap first: no lookup for a request the solver would refuse
      if (addresses.length > this.solver.maxStops) {
        throw new TooManyStopsError(addresses.length, this.solver.maxStops);
      }

      const matrix = await this.builder.build(addresses);
      const { order, cost } = this.solver.solve(matrix, 0);

      if (cost === Infinity) {
        logger.warn(`🚫 No closed tour over ${addresses.length} stops - some legs have no route`);
        return {
          status: RouteOptimizationStatus.INFEASIBLE,
          optimizedRoute: [...addresses],
          distanceKm: 0,
        };
      }

      const optimizedRoute = order.map(index => addresses[index]);
      const distanceKm = cost / METERS_PER_KILOMETER;

      logger.info(`🗺️ Route optimized: ${addresses.length} stops, ${distanceKm} km`, {
        order,
      });

      return {
        status: RouteOptimizationStatus.SUCCESS,
        optimizedRoute,
        distanceKm,
      };
    } catch (error: unknown) {
      logger.error('Route optimization failed, returning stops unoptimized', {
        stops: addresses.length,
        error: error instanceof Error ? error.message : String(error),
        ...(error instanceof AppError && { code: error.code }),
      });
      return {
        status: RouteOptimizationStatus.ERROR,
        optimizedRoute: [...addresses],
        distanceKm: 0,
      };
    }
  }
}

/**
 * Render a result in the shape the navigation tool contract expects
 */
export function toRouteToolPayload(result: OptimizationResult): RouteToolPayload {
  return {
    status: result.status,
    optimized_route: result.optimizedRoute,
    'distance (in km)': result.distanceKm,
  };
}
