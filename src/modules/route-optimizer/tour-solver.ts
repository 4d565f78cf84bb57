/**
 * =============================================================================
 * TOUR SOLVER - Exact Held-Karp Dynamic Programming
 * =============================================================================
 *
 * Finds the shortest closed tour that leaves the start node, visits every
 * other node exactly once and returns to the start.
 *
 * TABLE LAYOUT:
 * ─────────────────────────────────────────────────────────────────────────────
 * State (visited, last): `visited` is a bitmask of nodes already on the path
 * (always containing the start), `last` is where the path currently ends.
 *
 *   cost[visited][last] = cheapest way to visit every node NOT in `visited`
 *                         and then return to the start
 *   next[visited][last] = node to go to from `last` to achieve that cost
 *
 *   cost[full][last]    = matrix[last][start]
 *   cost[S][last]       = min over k ∉ S of matrix[last][k] + cost[S ∪ {k}][k]
 *
 * Masks are filled from the full mask downwards, so every superset of S is
 * final before S is read. No recursion, so no stack depth concerns.
 *
 * TIE-BREAKING:
 * ─────────────────────────────────────────────────────────────────────────────
 * Candidates are scanned in ascending node index and only a strictly smaller
 * cost replaces the current choice. Walking `next` from the start therefore
 * yields the lexicographically smallest optimal visiting order: for a
 * symmetric matrix, the direction whose first stop has the lower index.
 *
 * COMPLEXITY:
 * ─────────────────────────────────────────────────────────────────────────────
 * O(N² · 2^N) time, O(N · 2^N) memory. Exact only; callers keep N small.
 * =============================================================================
 */

import { InvalidDistanceMatrixError, TooManyStopsError } from '../../core';
import { DistanceMatrix, ROUTE_OPTIMIZER_CONFIG, TourSolution, Tour } from './route-optimizer.schema';

/** Largest N the tables are ever allocated for (20 * 2^20 cells per table) */
export const HARD_MAX_STOPS = 20;

export class TourSolver {
  /** Largest node count solve() accepts */
  readonly maxStops: number;

  constructor(maxStops: number = ROUTE_OPTIMIZER_CONFIG.DEFAULT_MAX_STOPS) {
    this.maxStops = Math.min(maxStops, HARD_MAX_STOPS);
  }

  /**
   * Optimal closed tour over every node of `matrix`, starting at `startIndex`
   */
  solve(matrix: DistanceMatrix, startIndex: number = 0): TourSolution {
    const n = validateMatrix(matrix);

    if (n === 0) {
      return { order: [], cost: 0 };
    }
    if (!Number.isInteger(startIndex) || startIndex < 0 || startIndex >= n) {
      throw new InvalidDistanceMatrixError(
        `Start index ${startIndex} is outside 0..${n - 1}`,
        'startIndex'
      );
    }
    if (n === 1) {
      return { order: [startIndex], cost: 0 };
    }
    if (n > this.maxStops) {
      throw new TooManyStopsError(n, this.maxStops);
    }

    const full = (1 << n) - 1;
    const startBit = 1 << startIndex;
    const cost = new Float64Array((full + 1) * n).fill(Infinity);
    const next = new Int8Array((full + 1) * n).fill(-1);

    // Everything visited: only the return leg is left
    for (let last = 0; last < n; last++) {
      cost[full * n + last] = matrix[last][startIndex];
    }

    for (let visited = full - 1; visited >= startBit; visited--) {
      if ((visited & startBit) === 0) continue;

      for (let last = 0; last < n; last++) {
        if ((visited & (1 << last)) === 0) continue;
        // The path only sits on the start before it has left it
        if (last === startIndex && visited !== startBit) continue;

        const row = matrix[last];
        let best = Infinity;
        let bestNext = -1;

        for (let k = 0; k < n; k++) {
          const bit = 1 << k;
          if ((visited & bit) !== 0) continue;

          const candidate = row[k] + cost[(visited | bit) * n + k];
          // First candidate is always taken so a full order exists even when every leg is Infinity
          if (bestNext === -1 || candidate < best) {
            best = candidate;
            bestNext = k;
          }
        }

        cost[visited * n + last] = best;
        next[visited * n + last] = bestNext;
      }
    }

    const order: Tour = [startIndex];
    let visited = startBit;
    let current = startIndex;
    while (visited !== full) {
      current = next[visited * n + current];
      order.push(current);
      visited |= 1 << current;
    }

    return { order, cost: cost[startBit * n + startIndex] };
  }
}

/**
 * Length of the closed tour `order` (return leg to order[0] included)
 */
export function tourCost(matrix: DistanceMatrix, order: Tour): number {
  if (order.length < 2) {
    return 0;
  }
  let total = 0;
  for (let i = 0; i < order.length; i++) {
    const from = order[i];
    const to = order[(i + 1) % order.length];
    total += matrix[from][to];
  }
  return total;
}

/**
 * Square, non-negative, no NaN. Infinity is allowed (forbidden edge).
 */
function validateMatrix(matrix: DistanceMatrix): number {
  const n = matrix.length;
  for (let i = 0; i < n; i++) {
    const row = matrix[i];
    if (row.length !== n) {
      throw new InvalidDistanceMatrixError(
        `Distance matrix must be square: row ${i} has ${row.length} entries, expected ${n}`,
        `matrix[${i}]`
      );
    }
    for (let j = 0; j < n; j++) {
      const value = row[j];
      if (Number.isNaN(value) || value < 0) {
        throw new InvalidDistanceMatrixError(
          `Distance matrix entry [${i}][${j}] must be a non-negative number, got ${value}`,
          `matrix[${i}][${j}]`
        );
      }
    }
  }
  return n;
}
