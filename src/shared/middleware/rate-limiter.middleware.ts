/**
 * =============================================================================
 * RATE LIMITER MIDDLEWARE
 * =============================================================================
 *
 * Limits request rates per client IP (express-rate-limit, in-memory store).
 *
 * - rateLimiter:           every /api request
 * - evaluationRateLimiter: POST /api/evaluate_route, which runs the
 *                          navigation engine inside the request
 *
 * Counters are per process. A shared store would be needed behind a load
 * balancer.
 * =============================================================================
 */

import rateLimit, { RateLimitRequestHandler } from 'express-rate-limit';
import { config } from '../../config/environment';
import { ErrorCode, HTTP_STATUS, RATE_LIMITS } from '../../core/constants';

interface LimiterOptions {
  windowMs: number;
  max: number;
  message: string;
}

/**
 * Build a limiter that answers with the standard error envelope
 */
export function createRateLimiter(options: LimiterOptions): RateLimitRequestHandler {
  return rateLimit({
    windowMs: options.windowMs,
    max: options.max,
    statusCode: HTTP_STATUS.TOO_MANY_REQUESTS,
    message: {
      success: false,
      error: {
        code: ErrorCode.RATE_LIMIT_EXCEEDED,
        message: options.message
      }
    },
    standardHeaders: true,
    legacyHeaders: false,
    skip: () => !config.security.enableRateLimiting
  });
}

/**
 * Default rate limiter for all API routes
 */
export const rateLimiter = createRateLimiter({
  windowMs: config.rateLimit.windowMs,
  max: config.rateLimit.maxRequests,
  message: 'Too many requests. Please try again later.'
});

/**
 * Route evaluation limiter
 * 20 requests per minute per IP
 */
export const evaluationRateLimiter = createRateLimiter({
  windowMs: RATE_LIMITS.EVALUATION.windowMs,
  max: RATE_LIMITS.EVALUATION.max,
  message: 'Too many route evaluations. Please slow down.'
});
