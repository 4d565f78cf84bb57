/**
 * =============================================================================
 * GOOGLE DISTANCE MATRIX SERVICE - Pairwise Driving Distances
 * =============================================================================
 *
 * DistanceLookup implementation backed by the Google Distance Matrix API.
 *
 * - Driving mode, metric units, distances returned in meters
 * - Requests are split into blocks so no call exceeds Google's limits
 *   (25 origins, 25 destinations, `maxElementsPerRequest` cells)
 * - Every block goes through a circuit breaker whose request timeout is the
 *   deadline for one provider call
 *
 * RESULT CONTRACT:
 * - A cell without a route (NOT_FOUND, ZERO_RESULTS, ...) is reported per cell
 * - Anything that makes the whole response unusable (HTTP error, top-level
 *   status other than OK, malformed body, open circuit, timeout, network)
 *   becomes `{ ok: false }`
 *
 * The API key is given to the constructor; this file never reads config.
 * =============================================================================
 */

import { z } from 'zod';
import { logger } from './logger.service';
import { CircuitBreaker } from '../resilience/circuit-breaker';
import { DISTANCE_ELEMENT_STATUS } from '../../core';
import {
  DistanceElement,
  DistanceLookup,
  DistanceLookupResult,
  Location,
} from '../../modules/route-optimizer/route-optimizer.schema';

// =============================================================================
// CONFIGURATION
// =============================================================================

export const GOOGLE_DISTANCE_MATRIX_LIMITS = {
  MAX_ORIGINS: 25,
  MAX_DESTINATIONS: 25,
  DEFAULT_MAX_ELEMENTS: 100,
};

/** Top-level statuses caused by the request itself, not by the provider being down */
const CLIENT_SIDE_STATUSES = new Set([
  'INVALID_REQUEST',
  'MAX_ELEMENTS_EXCEEDED',
  'MAX_DIMENSIONS_EXCEEDED',
]);

export interface GoogleDistanceMatrixOptions {
  apiKey: string;
  /** Cells per request (origins x destinations) */
  maxElementsPerRequest?: number;
  /** Deadline for one provider call (ms); aborts the fetch and bounds the default breaker */
  requestTimeoutMs?: number;
  breaker?: CircuitBreaker;
}

// =============================================================================
// RESPONSE SCHEMA
// =============================================================================

const distanceMatrixElementSchema = z.object({
  status: z.string(),
  distance: z.object({ value: z.number(), text: z.string().optional() }).optional(),
});

const distanceMatrixResponseSchema = z.object({
  status: z.string(),
  rows: z.array(z.object({ elements: z.array(distanceMatrixElementSchema) })).default([]),
  error_message: z.string().optional(),
});

type DistanceMatrixElementPayload = z.infer<typeof distanceMatrixElementSchema>;

/**
 * A block request whose response cannot be used at all
 */
export class DistanceMatrixRequestError extends Error {
  constructor(message: string, public readonly providerStatus?: string) {
    super(message);
    this.name = 'DistanceMatrixRequestError';
  }
}

// =============================================================================
// GOOGLE DISTANCE MATRIX LOOKUP
// =============================================================================

export class GoogleDistanceMatrixLookup implements DistanceLookup {
  private readonly url = 'https://maps.googleapis.com/maps/api/distancematrix/json';
  private readonly apiKey: string;
  private readonly maxElements: number;
  private readonly requestTimeoutMs: number;
  private readonly breaker: CircuitBreaker;

  constructor(options: GoogleDistanceMatrixOptions) {
    this.apiKey = options.apiKey;
    this.maxElements = Math.max(1, options.maxElementsPerRequest ?? GOOGLE_DISTANCE_MATRIX_LIMITS.DEFAULT_MAX_ELEMENTS);
    this.requestTimeoutMs = options.requestTimeoutMs ?? 10000;
    this.breaker = options.breaker ?? new CircuitBreaker({
      name: 'google-distance-matrix',
      failureThreshold: 5,
      resetTimeout: 30000,
      requestTimeout: this.requestTimeoutMs,
      isFailure: (error) => !(
        error instanceof DistanceMatrixRequestError &&
        error.providerStatus !== undefined &&
        CLIENT_SIDE_STATUSES.has(error.providerStatus)
      ),
    });
  }

  /**
   * Check if service is available (API key configured)
   */
  isAvailable(): boolean {
    return this.apiKey.length > 0;
  }

  getBreaker(): CircuitBreaker {
    return this.breaker;
  }

  async lookup(origins: Location[], destinations: Location[]): Promise<DistanceLookupResult> {
    if (!this.isAvailable()) {
      logger.warn('Google Maps API key not configured');
      return { ok: false, reason: 'Google Maps API key not configured' };
    }

    const rows: DistanceElement[][] = origins.map(() => []);
    if (origins.length === 0 || destinations.length === 0) {
      return { ok: true, rows };
    }

    const { originsPerBlock, destinationsPerBlock } = this.blockSize(destinations.length);
    const startTime = Date.now();
    let requests = 0;

    try {
      for (let o = 0; o < origins.length; o += originsPerBlock) {
        const originBlock = origins.slice(o, o + originsPerBlock);

        for (let d = 0; d < destinations.length; d += destinationsPerBlock) {
          const destinationBlock = destinations.slice(d, d + destinationsPerBlock);
          const block = await this.breaker.execute(() => this.requestBlock(originBlock, destinationBlock));
          requests++;

          block.forEach((elements, i) => {
            rows[o + i].push(...elements);
          });
        }
      }
    } catch (error: unknown) {
      const reason = error instanceof Error ? error.message : String(error);
      const providerStatus = error instanceof DistanceMatrixRequestError ? error.providerStatus : undefined;
      logger.error(`Google Distance Matrix failed: ${reason}`, { providerStatus });
      return { ok: false, reason, ...(providerStatus !== undefined && { providerStatus }) };
    }

    logger.debug(`📍 Google Distance Matrix: ${origins.length}x${destinations.length} in ${requests} request(s) - ${Date.now() - startTime}ms`);

    return { ok: true, rows };
  }

  /**
   * Largest block that respects every per-request limit
   */
  private blockSize(destinationCount: number): { originsPerBlock: number; destinationsPerBlock: number } {
    const destinationsPerBlock = Math.min(
      destinationCount,
      GOOGLE_DISTANCE_MATRIX_LIMITS.MAX_DESTINATIONS,
      this.maxElements
    );
    const originsPerBlock = Math.max(
      1,
      Math.min(
        GOOGLE_DISTANCE_MATRIX_LIMITS.MAX_ORIGINS,
        Math.floor(this.maxElements / destinationsPerBlock)
      )
    );
    return { originsPerBlock, destinationsPerBlock };
  }

  private async requestBlock(origins: Location[], destinations: Location[]): Promise<DistanceElement[][]> {
    const params = new URLSearchParams({
      origins: origins.map(toPipeSafe).join('|'),
      destinations: destinations.map(toPipeSafe).join('|'),
      key: this.apiKey,
      mode: 'driving',
      units: 'metric',
    });

    const response = await fetch(`${this.url}?${params.toString()}`, {
      signal: AbortSignal.timeout(this.requestTimeoutMs),
    });
    if (!response.ok) {
      throw new DistanceMatrixRequestError(`HTTP ${response.status}`, `HTTP_${response.status}`);
    }

    const parsed = distanceMatrixResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new DistanceMatrixRequestError('Malformed Distance Matrix response');
    }

    const data = parsed.data;
    if (data.status !== 'OK') {
      throw new DistanceMatrixRequestError(
        data.error_message ? `${data.status}: ${data.error_message}` : data.status,
        data.status
      );
    }

    if (data.rows.length !== origins.length ||
        data.rows.some(row => row.elements.length !== destinations.length)) {
      throw new DistanceMatrixRequestError(
        `Expected ${origins.length}x${destinations.length} elements in Distance Matrix response`
      );
    }

    return data.rows.map(row => row.elements.map(toDistanceElement));
  }
}

/**
 * '|' separates addresses in the request, so it cannot appear inside one
 */
function toPipeSafe(address: Location): string {
  return address.replace(/\|/g, ' ');
}

function toDistanceElement(element: DistanceMatrixElementPayload): DistanceElement {
  switch (element.status) {
    case DISTANCE_ELEMENT_STATUS.OK:
      return element.distance
        ? { status: DISTANCE_ELEMENT_STATUS.OK, distanceMeters: element.distance.value }
        : { status: DISTANCE_ELEMENT_STATUS.MALFORMED };
    case DISTANCE_ELEMENT_STATUS.NOT_FOUND:
      return { status: DISTANCE_ELEMENT_STATUS.NOT_FOUND };
    case DISTANCE_ELEMENT_STATUS.ZERO_RESULTS:
      return { status: DISTANCE_ELEMENT_STATUS.ZERO_RESULTS };
    case DISTANCE_ELEMENT_STATUS.MAX_ROUTE_LENGTH_EXCEEDED:
      return { status: DISTANCE_ELEMENT_STATUS.MAX_ROUTE_LENGTH_EXCEEDED };
    default:
      return { status: DISTANCE_ELEMENT_STATUS.MALFORMED };
  }
}
