/**
 * =============================================================================
 * RATE LIMITER MIDDLEWARE
 * =============================================================================
 *
 * Prevents abuse by limiting request rates (in-memory store, per IP).
 *
 * - rateLimiter: every API route
 * - optimizeRateLimiter: the optimize endpoint, which costs up to N² paid
 *   Distance Matrix elements per call
 * =============================================================================
 */

import rateLimit from 'express-rate-limit';
import { config } from '../../config/environment';
import { ErrorCode } from '../../core';

/**
 * General API rate limiter
 */
export const rateLimiter = rateLimit({
  windowMs: config.rateLimit.windowMs,
  limit: config.rateLimit.maxRequests,
  message: {
    success: false,
    error: {
      code: ErrorCode.RATE_LIMIT_EXCEEDED,
      message: 'Too many requests. Please try again later.'
    }
  },
  standardHeaders: true,
  legacyHeaders: false,
  skip: () => !config.security.enableRateLimiting,
});

/**
 * Route optimization limiter
 * 30 optimizations per 15 minutes per IP
 */
export const optimizeRateLimiter = rateLimit({
  windowMs: 15 * 60 * 1000, // 15 minutes
  limit: 30,
  message: {
    success: false,
    error: {
      code: ErrorCode.RATE_LIMIT_EXCEEDED,
      message: 'Too many route optimizations. Please try again in 15 minutes.'
    }
  },
  standardHeaders: true,
  legacyHeaders: false,
  skip: () => !config.security.enableRateLimiting,
});
