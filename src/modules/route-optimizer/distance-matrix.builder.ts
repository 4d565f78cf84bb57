/**
 * =============================================================================
 * DISTANCE MATRIX BUILDER
 * =============================================================================
 *
 * Turns an ordered list of addresses into the N x N matrix the tour solver
 * consumes.
 *
 * FAILURE HANDLING:
 * ─────────────────────────────────────────────────────────────────────────────
 * - One pair without a route (NOT_FOUND, ZERO_RESULTS, malformed cell)
 *   -> Infinity in that cell, the build carries on
 * - Whole lookup unusable ({ ok: false }) -> DistanceLookupError
 * - Lookup throws (network) -> error propagates unchanged
 *
 * No caching: a matrix lives for exactly one optimization call.
 * =============================================================================
 */

import { logger } from '../../shared/services/logger.service';
import { DistanceLookupError } from '../../core';
import {
  DistanceElement,
  DistanceLookup,
  DistanceMatrix,
  Location,
} from './route-optimizer.schema';

export class DistanceMatrixBuilder {
  constructor(private readonly lookup: DistanceLookup) {}

  async build(addresses: Location[]): Promise<DistanceMatrix> {
    const n = addresses.length;
    if (n === 0) {
      return [];
    }

    const matrix: number[][] = Array.from({ length: n }, () => new Array<number>(n).fill(0));
    if (n === 1) {
      return matrix;
    }

    const result = await this.lookup.lookup(addresses, addresses);
    if (!result.ok) {
      throw new DistanceLookupError(result.reason, result.providerStatus);
    }

    const { rows } = result;
    if (rows.length !== n || rows.some(row => row.length !== n)) {
      throw new DistanceLookupError(
        `expected a ${n}x${n} response, got ${rows.length} rows`
      );
    }

    let unreachable = 0;
    for (let i = 0; i < n; i++) {
      for (let j = 0; j < n; j++) {
        if (i === j) continue;
        const distance = toMeters(rows[i][j]);
        if (distance === Infinity) unreachable++;
        matrix[i][j] = distance;
      }
    }

    logger.debug(`🧮 Distance matrix built: ${n}x${n}`, { stops: n, unreachablePairs: unreachable });

    return matrix;
  }
}

/**
 * Distance of a successful element, Infinity for anything else
 */
function toMeters(element: DistanceElement): number {
  if (element.status !== 'OK') {
    return Infinity;
  }
  const { distanceMeters } = element;
  if (!Number.isFinite(distanceMeters) || distanceMeters < 0) {
    return Infinity;
  }
  return distanceMeters;
}
