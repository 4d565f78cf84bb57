/**
 * =============================================================================
 * HEALTH CHECK ROUTES - Production Monitoring Endpoints
 * =============================================================================
 *
 * ENDPOINTS:
 * - GET /health          - Quick health check (for load balancers)
 * - GET /health/live     - Liveness probe (is the process running?)
 * - GET /health/ready    - Readiness probe (is the distance provider usable?)
 * =============================================================================
 */

import { Router, Request, Response } from 'express';
import { CircuitState } from '../resilience/circuit-breaker';
import { GoogleDistanceMatrixLookup } from '../services/google-distance-matrix.service';
import { HTTP_STATUS } from '../../core';

export function createHealthRoutes(distanceLookup: GoogleDistanceMatrixLookup): Router {
  const router = Router();

  // Track server start time
  const startTime = Date.now();

  /**
   * Basic health check - for load balancers
   */
  router.get('/health', (_req: Request, res: Response) => {
    res.status(HTTP_STATUS.OK).json({
      status: 'healthy',
      timestamp: new Date().toISOString()
    });
  });

  /**
   * Liveness probe - is the process alive?
   */
  router.get('/health/live', (_req: Request, res: Response) => {
    res.status(HTTP_STATUS.OK).json({
      status: 'alive',
      pid: process.pid,
      uptime: Math.floor((Date.now() - startTime) / 1000)
    });
  });

  /**
   * Readiness probe - can optimizations actually succeed?
   * Not ready without an API key or while the provider circuit is open
   */
  router.get('/health/ready', (_req: Request, res: Response) => {
    const circuit = distanceLookup.getBreaker().getStats();
    const configured = distanceLookup.isAvailable();
    const ready = configured && circuit.state !== CircuitState.OPEN;

    res.status(ready ? HTTP_STATUS.OK : HTTP_STATUS.SERVICE_UNAVAILABLE).json({
      status: ready ? 'ready' : 'not_ready',
      checks: {
        distanceLookupConfigured: configured,
        distanceLookupCircuit: circuit.state,
      },
      timestamp: new Date().toISOString()
    });
  });

  return router;
}
