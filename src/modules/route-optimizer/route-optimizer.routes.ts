/**
 * =============================================================================
 * ROUTE OPTIMIZER ROUTES
 * =============================================================================
 *
 * POST /api/v1/route-optimizer/optimize
 *
 * Request:
 * {
 *   "addresses": ["Depot, Kochi", "Aluva", "Edappally", "Kakkanad"]
 * }
 *
 * Response (always 200 once the body is valid; failures are in `status`):
 * {
 *   "success": true,
 *   "data": {
 *     "status": "success",
 *     "optimized_route": ["Depot, Kochi", "Edappally", "Aluva", "Kakkanad"],
 *     "distance (in km)": 41.3
 *   },
 *   "meta": { "timestamp": "..." }
 * }
 * =============================================================================
 */

import { Router, Request, Response } from 'express';
import { ApiResponse } from '../../core';
import { asyncHandler } from '../../shared/middleware/error.middleware';
import { optimizeRateLimiter } from '../../shared/middleware/rate-limiter.middleware';
import { getRequestId } from '../../shared/middleware/security.middleware';
import { validateRequest } from '../../shared/utils/validation.utils';
import { RouteOptimizerService, toRouteToolPayload } from './route-optimizer.service';
import { createOptimizeRouteSchema, OptimizeRouteRequest } from './route-optimizer.schema';

export function createRouteOptimizerRouter(
  service: RouteOptimizerService,
  maxStops: number
): Router {
  const router = Router();

  router.post(
    '/optimize',
    optimizeRateLimiter,
    validateRequest(createOptimizeRouteSchema(maxStops)),
    asyncHandler(async (req: Request, res: Response) => {
      const { addresses }: OptimizeRouteRequest = req.body;
      const result = await service.optimizeRoute(addresses);
      return ApiResponse.success(res, toRouteToolPayload(result), undefined, {
        requestId: getRequestId(req),
      });
    })
  );

  return router;
}
