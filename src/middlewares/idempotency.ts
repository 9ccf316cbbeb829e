/**
 * Idempotency Middleware
 *
 * Replays the stored response when a request repeats an X-Idempotency-Key,
 * so a client re-sending a create after a timeout does not create twice.
 */

import { Response, NextFunction } from 'express';

import { config } from '../config';
import { getRedisClient, isRedisConnected } from '../config/redis';
import { AuthRequest } from '../auth/auth.types';
import { logger } from '../observability';
import { ErrorCode } from '../types/errors';

import { ApiError } from './errorHandler';

interface CachedResponse {
  statusCode: number;
  body: unknown;
  cachedAt: string;
}

/**
 * Idempotency key TTL (24 hours)
 */
const IDEMPOTENCY_TTL = 24 * 60 * 60;

const KEY_PATTERN = /^[a-zA-Z0-9_-]{1,64}$/;

const readKey = (req: AuthRequest): string | undefined => {
  const value = req.headers['x-idempotency-key'];
  return Array.isArray(value) ? value[0] : value;
};

const parseCached = (raw: string): CachedResponse | null => {
  try {
    const parsed: unknown = JSON.parse(raw);
    if (
      parsed &&
      typeof parsed === 'object' &&
      'statusCode' in parsed &&
      typeof parsed.statusCode === 'number' &&
      'body' in parsed
    ) {
      const cachedAt = 'cachedAt' in parsed ? String(parsed.cachedAt) : '';
      return { statusCode: parsed.statusCode, body: parsed.body, cachedAt };
    }
  } catch (error) {
    logger.warn({ err: error }, 'Discarding unreadable idempotency cache entry');
  }
  return null;
};

/**
 * Idempotency middleware
 *
 * - No key: request proceeds normally
 * - First request with a key: processed, 2xx/4xx response cached for 24h
 * - Later requests with the same key: cached response returned
 *
 * Keys are scoped per caller. Without Redis the middleware passes through.
 */
export const idempotencyMiddleware = async (
  req: AuthRequest,
  res: Response,
  next: NextFunction
): Promise<void> => {
  const idempotencyKey = readKey(req);

  if (!idempotencyKey) {
    next();
    return;
  }

  if (config.isTest || !isRedisConnected()) {
    next();
    return;
  }

  const caller = req.user?.userId || req.ip || 'anonymous';
  const cacheKey = `idempotency:${caller}:${req.method}:${req.baseUrl}${req.path}:${idempotencyKey}`;

  try {
    const redis = getRedisClient();
    const raw = await redis.get(cacheKey);
    const cached = raw ? parseCached(raw) : null;

    if (cached) {
      logger.info({ idempotencyKey, caller, cachedAt: cached.cachedAt }, 'Returning cached idempotent response');
      res.setHeader('X-Idempotent-Replayed', 'true');
      res.status(cached.statusCode).json(cached.body);
      return;
    }

    const originalJson = res.json.bind(res);

    res.json = function (body: unknown) {
      // 5xx responses are not stored so the client can retry
      if (res.statusCode < 500) {
        const entry: CachedResponse = {
          statusCode: res.statusCode,
          body,
          cachedAt: new Date().toISOString(),
        };

        redis
          .setex(cacheKey, IDEMPOTENCY_TTL, JSON.stringify(entry))
          .then(() => {
            logger.debug({ idempotencyKey, statusCode: res.statusCode }, 'Cached idempotent response');
          })
          .catch((err: unknown) => {
            logger.error({ err, idempotencyKey }, 'Failed to cache idempotent response');
          });
      }

      return originalJson(body);
    };

    next();
  } catch (error) {
    // Redis failures fall through to uncached processing
    logger.error({ err: error, idempotencyKey }, 'Idempotency middleware error');
    next();
  }
};

/**
 * Rejects malformed keys: alphanumeric, dashes and underscores, max 64 chars
 */
export const validateIdempotencyKey = (req: AuthRequest, _res: Response, next: NextFunction): void => {
  const idempotencyKey = readKey(req);

  if (idempotencyKey && !KEY_PATTERN.test(idempotencyKey)) {
    next(
      new ApiError(
        ErrorCode.INVALID_INPUT,
        'Invalid X-Idempotency-Key format. Must be alphanumeric with dashes/underscores, max 64 characters.'
      )
    );
    return;
  }

  next();
};
