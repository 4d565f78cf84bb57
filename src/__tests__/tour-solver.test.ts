/**
 * =============================================================================
 * TOUR SOLVER - Unit Tests
 * =============================================================================
 *
 * Covers:
 * - Degenerate inputs (0, 1, 2 nodes)
 * - Optimality against brute force on small matrices
 * - Infinity edges (avoided when possible, Infinity cost when not)
 * - Deterministic tie-breaking (lexicographically smallest optimal order)
 * - Matrix validation and the stop cap
 * =============================================================================
 */

import { TourSolver, tourCost, HARD_MAX_STOPS } from '../modules/route-optimizer/tour-solver';
import { InvalidDistanceMatrixError, TooManyStopsError } from '../core';

// =============================================================================
// HELPERS
// =============================================================================

function bruteForceCost(matrix: number[][], start = 0): number {
  const rest = matrix.map((_, i) => i).filter(i => i !== start);
  let best = Infinity;

  const permute = (prefix: number[], remaining: number[]) => {
    if (remaining.length === 0) {
      best = Math.min(best, tourCost(matrix, [start, ...prefix]));
      return;
    }
    remaining.forEach((node, i) => {
      permute([...prefix, node], [...remaining.slice(0, i), ...remaining.slice(i + 1)]);
    });
  };

  permute([], rest);
  return best;
}

/** Small deterministic generator so failures are reproducible */
function seededIntegers(seed: number): () => number {
  let state = seed;
  return () => {
    state = (state * 1103515245 + 12345) % 2147483648;
    return 1 + (state % 97);
  };
}

function randomMatrix(n: number, seed: number): number[][] {
  const next = seededIntegers(seed);
  return Array.from({ length: n }, (_, i) =>
    Array.from({ length: n }, (_, j) => (i === j ? 0 : next()))
  );
}

// Depot=0, A=1, B=2, C=3
const FIELD_MATRIX = [
  [0, 1, 4, 5],
  [1, 0, 5, 2],
  [4, 5, 0, 3],
  [5, 2, 3, 0],
];

// =============================================================================
// TESTS
// =============================================================================

describe('TourSolver', () => {
  const solver = new TourSolver();

  describe('degenerate inputs', () => {
    it('returns an empty tour for an empty matrix', () => {
      expect(solver.solve([])).toEqual({ order: [], cost: 0 });
    });

    it('returns the start alone for a single node', () => {
      expect(solver.solve([[0]])).toEqual({ order: [0], cost: 0 });
    });

    it('includes both legs for two nodes', () => {
      const result = solver.solve([
        [0, 3],
        [5, 0],
      ]);
      expect(result).toEqual({ order: [0, 1], cost: 8 });
    });
  });

  describe('optimality', () => {
    it('walks the perimeter of a unit square', () => {
      const d = Math.SQRT2;
      const matrix = [
        [0, 1, d, 1],
        [1, 0, 1, d],
        [d, 1, 0, 1],
        [1, d, 1, 0],
      ];

      const result = solver.solve(matrix);

      expect(result.order).toEqual([0, 1, 2, 3]);
      expect(result.cost).toBe(4);
    });

    it('finds the shortest closed tour for the field example', () => {
      expect(solver.solve(FIELD_MATRIX)).toEqual({ order: [0, 1, 3, 2], cost: 10 });
    });

    it.each([
      [3, 11],
      [4, 23],
      [5, 37],
      [6, 41],
      [7, 59],
    ])('matches brute force on a %i-node asymmetric matrix (seed %i)', (n, seed) => {
      const matrix = randomMatrix(n, seed);
      const result = solver.solve(matrix);

      expect(result.cost).toBe(bruteForceCost(matrix));
      expect(tourCost(matrix, result.order)).toBe(result.cost);
      expect([...result.order].sort((a, b) => a - b)).toEqual(matrix.map((_, i) => i));
      expect(result.order[0]).toBe(0);
    });

    it('honors a start index other than 0', () => {
      const result = solver.solve(FIELD_MATRIX, 2);

      expect(result).toEqual({ order: [2, 0, 1, 3], cost: 10 });
    });

    it('returns the same result when solved twice', () => {
      const matrix = randomMatrix(6, 7);
      expect(solver.solve(matrix)).toEqual(solver.solve(matrix));
    });
  });

  describe('unreachable pairs', () => {
    it('routes around an Infinity edge', () => {
      const matrix = [
        [0, Infinity, 1, 1],
        [Infinity, 0, 1, 1],
        [1, 1, 0, 1],
        [1, 1, 1, 0],
      ];

      expect(solver.solve(matrix)).toEqual({ order: [0, 2, 1, 3], cost: 4 });
    });

    it('reports Infinity but still returns a full order when no tour exists', () => {
      const matrix = [
        [0, Infinity, Infinity],
        [Infinity, 0, Infinity],
        [Infinity, Infinity, 0],
      ];

      expect(solver.solve(matrix)).toEqual({ order: [0, 1, 2], cost: Infinity });
    });

    it('reports Infinity when a node can be entered but never left', () => {
      const matrix = [
        [0, 1, 1],
        [Infinity, 0, Infinity],
        [1, 1, 0],
      ];

      expect(solver.solve(matrix).cost).toBe(Infinity);
    });
  });

  describe('validation', () => {
    it('rejects a non-square matrix', () => {
      expect(() => solver.solve([[0, 1], [1]])).toThrow(InvalidDistanceMatrixError);
    });

    it('rejects NaN entries', () => {
      expect(() => solver.solve([[0, NaN], [1, 0]])).toThrow(
        'Distance matrix entry [0][1] must be a non-negative number, got NaN'
      );
    });

    it('rejects negative entries', () => {
      expect(() => solver.solve([[0, 1], [-1, 0]])).toThrow(InvalidDistanceMatrixError);
    });

    it('rejects a start index outside the matrix', () => {
      expect(() => solver.solve(FIELD_MATRIX, 4)).toThrow('Start index 4 is outside 0..3');
      expect(() => solver.solve(FIELD_MATRIX, -1)).toThrow(InvalidDistanceMatrixError);
    });

    it('rejects more stops than the configured maximum', () => {
      const small = new TourSolver(3);
      expect(() => small.solve(FIELD_MATRIX)).toThrow(TooManyStopsError);
      expect(() => small.solve(FIELD_MATRIX)).toThrow('Cannot optimize 4 stops exactly (maximum is 3)');
    });

    it('never raises the cap above the hard maximum', () => {
      const generous = new TourSolver(100);
      const n = HARD_MAX_STOPS + 1;
      const matrix = Array.from({ length: n }, () => new Array<number>(n).fill(0));

      expect(() => generous.solve(matrix)).toThrow(
        `Cannot optimize ${n} stops exactly (maximum is ${HARD_MAX_STOPS})`
      );
    });
  });
});

describe('tourCost', () => {
  it('adds the return leg', () => {
    expect(tourCost(FIELD_MATRIX, [0, 1, 3, 2])).toBe(10);
  });

  it('is the same in both directions on a symmetric matrix', () => {
    expect(tourCost(FIELD_MATRIX, [0, 2, 3, 1])).toBe(tourCost(FIELD_MATRIX, [0, 1, 3, 2]));
  });

  it('is 0 for fewer than two nodes', () => {
    expect(tourCost(FIELD_MATRIX, [])).toBe(0);
    expect(tourCost(FIELD_MATRIX, [2])).toBe(0);
  });
});
