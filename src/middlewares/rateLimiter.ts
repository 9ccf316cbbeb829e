/**
 * Rate Limiting Middleware
 *
 * express-rate-limit with its in-process memory store, so limits apply per
 * instance.
 *
 * Environment-based configuration:
 * - Production: strict limits
 * - Development: relaxed limits
 * - Test: very lenient limits
 *
 * Set RATE_LIMIT_DISABLED=true to disable every limiter (load tests).
 */

import { NextFunction, Request, RequestHandler, Response } from 'express';
import rateLimit from 'express-rate-limit';

import { RATE_LIMIT_CONFIG } from '../config/environments';
import { AuthRequest } from '../auth/auth.types';
import { logger } from '../observability';
import { ErrorCode } from '../types/errors';

const noopLimiter: RequestHandler = (_req: Request, _res: Response, next: NextFunction) => next();

const createLimiter = (limiter: RequestHandler): RequestHandler => {
  if (RATE_LIMIT_CONFIG.disabled) {
    logger.warn('Rate limiting is DISABLED via RATE_LIMIT_DISABLED=true');
    return noopLimiter;
  }
  return limiter;
};

const limitMessage = (code: ErrorCode, message: string) => ({
  success: false,
  error: {
    code,
    message,
    timestamp: new Date().toISOString(),
  },
});

/**
 * Global rate limiter, applied to all routes except health and metrics
 */
export const globalLimiter: RequestHandler = createLimiter(
  rateLimit({
    windowMs: RATE_LIMIT_CONFIG.global.windowMs,
    limit: RATE_LIMIT_CONFIG.global.maxRequests,
    standardHeaders: true,
    legacyHeaders: false,
    message: limitMessage(ErrorCode.RATE_LIMIT_EXCEEDED, 'Too many requests, please try again later'),
    skip: (req) => req.path.startsWith('/health') || req.path === '/metrics',
  })
);

/**
 * Limiter for endpoints that create transactions. Keyed by caller when
 * authenticated, by IP otherwise.
 */
export const transactionLimiter: RequestHandler = createLimiter(
  rateLimit({
    windowMs: RATE_LIMIT_CONFIG.transaction.windowMs,
    limit: RATE_LIMIT_CONFIG.transaction.maxRequests,
    standardHeaders: true,
    legacyHeaders: false,
    skipFailedRequests: RATE_LIMIT_CONFIG.skipFailedRequests,
    message: limitMessage(
      ErrorCode.TOO_MANY_TRANSACTIONS,
      'Too many transactions, please try again later'
    ),
    keyGenerator: (req: AuthRequest) => req.user?.userId || req.ip || 'unknown',
    validate: false,
  })
);
