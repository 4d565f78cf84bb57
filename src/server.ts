/**
 * =============================================================================
 * FIELD ROUTE OPTIMIZER - MAIN SERVER
 * =============================================================================
 *
 * Serves the multi-stop route optimizer used by the engineer navigation tool.
 *
 * MODULES:
 * ┌─────────────────────────────────────────────────────────────────────────┐
 * │ ROUTE-OPTIMIZER │ Distance matrix + exact shortest closed tour         │
 * │ HEALTH          │ Load balancer / readiness probes                     │
 * └─────────────────────────────────────────────────────────────────────────┘
 *
 * SECURITY:
 * - Input validation using Zod schemas
 * - Rate limiting per IP (stricter on the paid optimize endpoint)
 * - Helmet security headers
 * =============================================================================
 */

import express, { Express } from 'express';
import cors from 'cors';
import compression from 'compression';

// Config & Services
import { config } from './config/environment';
import { logger, logError } from './shared/services/logger.service';
import { GoogleDistanceMatrixLookup } from './shared/services/google-distance-matrix.service';

// Middleware
import { errorHandler, notFoundHandler } from './shared/middleware/error.middleware';
import { requestLogger } from './shared/middleware/request-logger.middleware';
import { rateLimiter } from './shared/middleware/rate-limiter.middleware';
import { requestIdMiddleware, securityHeaders } from './shared/middleware/security.middleware';

// Routes
import { API_PREFIX } from './core';
import { createHealthRoutes } from './shared/routes/health.routes';
import { createRouteOptimizerRouter, RouteOptimizerService } from './modules/route-optimizer';

export interface AppDependencies {
  distanceLookup: GoogleDistanceMatrixLookup;
  routeOptimizer: RouteOptimizerService;
  maxStops: number;
}

/**
 * Resolve configuration into the concrete services
 */
export function createDependencies(): AppDependencies {
  const distanceLookup = new GoogleDistanceMatrixLookup({
    apiKey: config.googleMaps.apiKey,
    maxElementsPerRequest: config.googleMaps.maxElementsPerRequest,
    requestTimeoutMs: config.googleMaps.requestTimeoutMs,
  });

  return {
    distanceLookup,
    routeOptimizer: new RouteOptimizerService(distanceLookup, {
      maxStops: config.routeOptimizer.maxStops,
    }),
    maxStops: config.routeOptimizer.maxStops,
  };
}

export function createApp(deps: AppDependencies): Express {
  const app = express();

  // Required for per-IP rate limiting behind a load balancer
  app.set('trust proxy', 1);

  app.use(requestIdMiddleware);
  app.use(compression());

  if (config.security.enableHeaders) {
    app.use(securityHeaders);
  }

  app.use(cors({
    origin: config.isDevelopment ? '*' : config.cors.origin,
    methods: ['GET', 'POST'],
    allowedHeaders: ['Content-Type', 'X-Request-ID'],
  }));

  app.use(express.json({ limit: '100kb' }));

  if (config.security.enableRequestLogging) {
    app.use(requestLogger);
  }

  // Health checks stay outside the rate limiter
  app.use('/', createHealthRoutes(deps.distanceLookup));

  app.use(API_PREFIX, rateLimiter);
  app.use(
    `${API_PREFIX}/route-optimizer`,
    createRouteOptimizerRouter(deps.routeOptimizer, deps.maxStops)
  );

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}

// =============================================================================
// START SERVER
// =============================================================================

function start(): void {
  const deps = createDependencies();
  const app = createApp(deps);

  const server = app.listen(config.port, config.host, () => {
    logger.info(`🚀 Route optimizer listening on http://${config.host}:${config.port}`, {
      environment: config.nodeEnv,
      maxStops: deps.maxStops,
      distanceLookup: deps.distanceLookup.isAvailable() ? 'google' : 'not configured',
    });
  });

  server.timeout = 30000;

  const gracefulShutdown = (signal: string) => {
    logger.info(`${signal} received. Starting graceful shutdown...`);
    server.close((error) => {
      if (error) {
        logError('Error during shutdown', error);
        process.exit(1);
      }
      logger.info('Server closed');
      process.exit(0);
    });
  };

  process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
  process.on('SIGINT', () => gracefulShutdown('SIGINT'));

  process.on('unhandledRejection', (reason) => {
    logError('Unhandled rejection', reason);
    process.exit(1);
  });
}

if (require.main === module) {
  start();
}
