/**
 * Redis Client Configuration
 *
 * Shared ioredis client for the idempotency cache. bullmq opens its own
 * connections from the same settings (see queues/queue.config.ts).
 */

import Redis from 'ioredis';
import { REDIS_CONFIG } from './environments';
import { createServiceLogger } from '../observability/logger';

const log = createServiceLogger('redis');

let redisClient: Redis | null = null;

export const getRedisClient = (): Redis => {
  if (!redisClient) {
    redisClient = new Redis({
      host: REDIS_CONFIG.host,
      port: REDIS_CONFIG.port,
      password: REDIS_CONFIG.password,
      maxRetriesPerRequest: REDIS_CONFIG.maxRetriesPerRequest,
      connectTimeout: REDIS_CONFIG.connectTimeout,
      retryStrategy: (times: number) => {
        if (times > 3) {
          return null;
        }
        return Math.min(times * 100, 3000);
      },
      lazyConnect: REDIS_CONFIG.lazyConnect,
    });

    redisClient.on('error', (err: Error) => {
      log.error({ err }, 'Redis client error');
    });

    redisClient.on('connect', () => {
      log.info('Redis client connected');
    });
  }

  return redisClient;
};

export const connectRedis = async (): Promise<void> => {
  const client = getRedisClient();
  if (client.status === 'ready') {
    return;
  }
  await client.connect();
};

export const disconnectRedis = async (): Promise<void> => {
  if (redisClient) {
    await redisClient.quit();
    redisClient = null;
  }
};

export const isRedisConnected = (): boolean => {
  return redisClient?.status === 'ready';
};
