/**
 * =============================================================================
 * ROUTE OPTIMIZER MODULE
 * =============================================================================
 *
 * Shortest closed tour over an engineer's stops:
 * - Distance matrix from a pluggable DistanceLookup (Google by default)
 * - Exact Held-Karp solver (small stop counts only)
 * - Structured success / infeasible / error results, never exceptions
 * =============================================================================
 */

export * from './route-optimizer.schema';
export * from './distance-matrix.builder';
export * from './tour-solver';
export * from './route-optimizer.service';
export * from './route-optimizer.routes';
