/**
 * =============================================================================
 * DISTANCE MATRIX BUILDER - Unit Tests
 * =============================================================================
 */

import { DistanceMatrixBuilder } from '../modules/route-optimizer/distance-matrix.builder';
import {
  DistanceElement,
  DistanceLookup,
  DistanceLookupResult,
} from '../modules/route-optimizer/route-optimizer.schema';
import { DistanceLookupError, ErrorCode } from '../core';

jest.mock('../shared/services/logger.service', () => ({
  logger: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  },
}));

// =============================================================================
// HELPERS
// =============================================================================

const ok = (distanceMeters: number): DistanceElement => ({ status: 'OK', distanceMeters });
const notFound: DistanceElement = { status: 'NOT_FOUND' };

function fakeLookup(result: DistanceLookupResult) {
  const lookup = jest.fn<Promise<DistanceLookupResult>, [string[], string[]]>()
    .mockResolvedValue(result);
  const distanceLookup: DistanceLookup = { lookup };
  return { distanceLookup, lookup };
}

// =============================================================================
// TESTS
// =============================================================================

describe('DistanceMatrixBuilder', () => {
  it('returns an empty matrix without a lookup for no addresses', async () => {
    const { distanceLookup, lookup } = fakeLookup({ ok: true, rows: [] });

    await expect(new DistanceMatrixBuilder(distanceLookup).build([])).resolves.toEqual([]);
    expect(lookup).not.toHaveBeenCalled();
  });

  it('returns [[0]] without a lookup for a single address', async () => {
    const { distanceLookup, lookup } = fakeLookup({ ok: true, rows: [] });

    await expect(new DistanceMatrixBuilder(distanceLookup).build(['Depot'])).resolves.toEqual([[0]]);
    expect(lookup).not.toHaveBeenCalled();
  });

  it('asks for every address against every address', async () => {
    const { distanceLookup, lookup } = fakeLookup({
      ok: true,
      rows: [
        [ok(0), ok(1200)],
        [ok(1300), ok(0)],
      ],
    });

    const matrix = await new DistanceMatrixBuilder(distanceLookup).build(['Depot', 'Aluva']);

    expect(lookup).toHaveBeenCalledWith(['Depot', 'Aluva'], ['Depot', 'Aluva']);
    expect(matrix).toEqual([
      [0, 1200],
      [1300, 0],
    ]);
  });

  it('marks pairs without a route as Infinity and keeps the rest', async () => {
    const { distanceLookup } = fakeLookup({
      ok: true,
      rows: [
        [ok(0), ok(500), notFound],
        [ok(600), ok(0), { status: 'ZERO_RESULTS' }],
        [ok(700), ok(800), ok(0)],
      ],
    });

    const matrix = await new DistanceMatrixBuilder(distanceLookup).build(['Depot', 'A', 'B']);

    expect(matrix).toEqual([
      [0, 500, Infinity],
      [600, 0, Infinity],
      [700, 800, 0],
    ]);
  });

  it('treats negative or non-finite distances as unreachable', async () => {
    const { distanceLookup } = fakeLookup({
      ok: true,
      rows: [
        [ok(0), ok(-5)],
        [ok(NaN), ok(0)],
      ],
    });

    const matrix = await new DistanceMatrixBuilder(distanceLookup).build(['Depot', 'A']);

    expect(matrix).toEqual([
      [0, Infinity],
      [Infinity, 0],
    ]);
  });

  it('forces the diagonal to 0 whatever the provider says', async () => {
    const { distanceLookup } = fakeLookup({
      ok: true,
      rows: [
        [notFound, ok(10)],
        [ok(20), ok(35)],
      ],
    });

    const matrix = await new DistanceMatrixBuilder(distanceLookup).build(['Depot', 'A']);

    expect(matrix).toEqual([
      [0, 10],
      [20, 0],
    ]);
  });

  it('throws DistanceLookupError when the lookup fails as a whole', async () => {
    const { distanceLookup } = fakeLookup({
      ok: false,
      reason: 'REQUEST_DENIED: The provided API key is invalid.',
      providerStatus: 'REQUEST_DENIED',
    });

    const build = new DistanceMatrixBuilder(distanceLookup).build(['Depot', 'A']);

    await expect(build).rejects.toBeInstanceOf(DistanceLookupError);
    await expect(build).rejects.toMatchObject({
      message: 'Distance lookup failed: REQUEST_DENIED: The provided API key is invalid.',
      code: ErrorCode.DISTANCE_LOOKUP_FAILED,
      details: { providerStatus: 'REQUEST_DENIED' },
    });
  });

  it('throws DistanceLookupError when the response has the wrong shape', async () => {
    const { distanceLookup } = fakeLookup({ ok: true, rows: [[ok(0), ok(1)]] });

    await expect(new DistanceMatrixBuilder(distanceLookup).build(['Depot', 'A'])).rejects.toThrow(
      'Distance lookup failed: expected a 2x2 response, got 1 rows'
    );
  });

  it('lets a thrown lookup error propagate', async () => {
    const lookup = jest.fn<Promise<DistanceLookupResult>, [string[], string[]]>()
      .mockRejectedValue(new Error('socket hang up'));

    await expect(new DistanceMatrixBuilder({ lookup }).build(['Depot', 'A'])).rejects.toThrow('socket hang up');
  });
});
