import { Router, Request, Response } from 'express';
import { getDatabaseStatus } from '../config/database';
import { isRedisConnected } from '../config/redis';

export interface HealthProbes {
  database: () => { connected: boolean; readyState: number };
  redis: () => boolean;
}

const defaultProbes: HealthProbes = {
  database: getDatabaseStatus,
  redis: isRedisConnected,
};

/**
 * The database is required. Redis only backs the idempotency cache and the
 * scheduler, so losing it degrades the service without taking it down.
 */
export const createHealthRouter = (probes: HealthProbes = defaultProbes): Router => {
  const router = Router();

  router.get('/', (_req: Request, res: Response) => {
    const dbStatus = probes.database();
    const redisConnected = probes.redis();

    const status = !dbStatus.connected ? 'unhealthy' : redisConnected ? 'healthy' : 'degraded';

    res.status(dbStatus.connected ? 200 : 503).json({
      status,
      timestamp: new Date().toISOString(),
      services: {
        database: {
          connected: dbStatus.connected,
          readyState: dbStatus.readyState,
        },
        redis: {
          connected: redisConnected,
        },
      },
    });
  });

  router.get('/live', (_req: Request, res: Response) => {
    res.status(200).json({
      status: 'alive',
      timestamp: new Date().toISOString(),
    });
  });

  router.get('/ready', (_req: Request, res: Response) => {
    const isReady = probes.database().connected;

    res.status(isReady ? 200 : 503).json({
      status: isReady ? 'ready' : 'not ready',
      timestamp: new Date().toISOString(),
    });
  });

  return router;
};
