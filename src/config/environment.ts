/**
 * =============================================================================
 * ENVIRONMENT CONFIGURATION
 * =============================================================================
 *
 * Centralized configuration loaded from environment variables.
 * All config access goes through this file - no direct process.env usage elsewhere.
 *
 * SECURITY:
 * - The Google Maps key is never logged or exposed in error messages
 *
 * FOR BACKEND DEVELOPERS:
 * - Add new config here, not scattered across the codebase
 * - Use getOptional() for values with sensible defaults
 * - The route optimizer core never imports this file: server.ts resolves
 *   the values and hands them to constructors
 * =============================================================================
 */

import dotenv from 'dotenv';

// Load .env file
dotenv.config();

// =============================================================================
// HELPER FUNCTIONS
// =============================================================================

/**
 * Get optional environment variable with default
 */
function getOptional(key: string, defaultValue: string): string {
  return process.env[key] || defaultValue;
}

/**
 * Get boolean environment variable
 */
function getBoolean(key: string, defaultValue: boolean): boolean {
  const value = process.env[key];
  if (!value) return defaultValue;
  return value.toLowerCase() === 'true';
}

/**
 * Get number environment variable
 */
function getNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

/**
 * Parse CORS origins from comma-separated string
 */
function parseCorsOrigins(value: string): string | string[] {
  if (value === '*') return '*';
  return value.split(',').map(origin => origin.trim()).filter(Boolean);
}

// Exact DP tables grow as N * 2^N; 20 stops is already ~20M cells per table
const MAX_STOPS_CEILING = 20;

// =============================================================================
// CONFIGURATION OBJECT
// =============================================================================

const nodeEnv = getOptional('NODE_ENV', 'development');

/**
 * Application configuration object
 * All configuration is validated at startup
 */
export const config = {
  // Server
  nodeEnv,
  port: getNumber('PORT', 3000),
  host: getOptional('HOST', '0.0.0.0'),

  // Google Maps Distance Matrix
  googleMaps: {
    apiKey: getOptional('GOOGLE_MAPS_API_KEY', ''),
    enabled: getOptional('GOOGLE_MAPS_API_KEY', '').length > 0,
    maxElementsPerRequest: getNumber('DISTANCE_MATRIX_MAX_ELEMENTS', 100),
    requestTimeoutMs: getNumber('DISTANCE_MATRIX_TIMEOUT_MS', 10000),
  },

  // Route optimizer
  routeOptimizer: {
    maxStops: Math.min(getNumber('ROUTE_OPTIMIZER_MAX_STOPS', 15), MAX_STOPS_CEILING),
  },

  // Rate Limiting
  rateLimit: {
    windowMs: getNumber('RATE_LIMIT_WINDOW_MS', 15 * 60 * 1000), // 15 minutes
    maxRequests: getNumber('RATE_LIMIT_MAX_REQUESTS', 100),
  },

  // Logging
  logLevel: getOptional('LOG_LEVEL', 'debug'),

  // CORS - Parsed into array for production
  cors: {
    origin: parseCorsOrigins(getOptional('CORS_ORIGIN', '*')),
  },

  // Helpers
  isProduction: nodeEnv === 'production',
  isDevelopment: nodeEnv === 'development',
  isTest: nodeEnv === 'test',

  // Security Features
  security: {
    enableHeaders: getBoolean('ENABLE_SECURITY_HEADERS', true),
    enableRateLimiting: getBoolean('ENABLE_RATE_LIMITING', true),
    enableRequestLogging: getBoolean('ENABLE_REQUEST_LOGGING', true),
  },
} as const;

// =============================================================================
// STARTUP VALIDATION
// =============================================================================

/**
 * Validate configuration at startup
 * Fails fast if critical config is missing
 */
function validateConfig(): void {
  const warnings: string[] = [];
  const errors: string[] = [];

  if (config.routeOptimizer.maxStops < 2) {
    errors.push('ROUTE_OPTIMIZER_MAX_STOPS must be at least 2');
  }

  if (config.googleMaps.maxElementsPerRequest < 1) {
    errors.push('DISTANCE_MATRIX_MAX_ELEMENTS must be a positive number');
  }

  // Production-specific checks
  if (config.isProduction) {
    // CORS must not be wildcard in production
    if (config.cors.origin === '*') {
      warnings.push('CORS_ORIGIN is set to "*" - this should be restricted in production');
    }

    // Without a key every optimization degrades to status "error"
    if (!config.googleMaps.enabled) {
      warnings.push('GOOGLE_MAPS_API_KEY is not set - route optimization will fail');
    }
  }

  // Log warnings
  if (warnings.length > 0) {
    console.warn('\n⚠️  Configuration Warnings:');
    warnings.forEach(w => console.warn(`   - ${w}`));
    console.warn('');
  }

  // Throw on errors
  if (errors.length > 0) {
    throw new Error(`Configuration Errors:\n${errors.map(e => `  - ${e}`).join('\n')}`);
  }
}

// Run validation
validateConfig();
