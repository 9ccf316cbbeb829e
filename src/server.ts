import { initTracing, shutdownTracing, logger } from './observability';

// Tracing patches modules as they load, so it starts before anything else is imported
initTracing();

import { createApp } from './app';
import { config, getEnvironmentInfo } from './config';
import { connectDatabase, disconnectDatabase } from './config/database';
import { createDependencies } from './config/dependencies';
import { connectRedis, disconnectRedis } from './config/redis';
import {
  closeMaintenanceQueue,
  scheduleMaintenanceJobs,
  startMaintenanceWorker,
  stopMaintenanceWorker,
} from './queues';

const dependencies = createDependencies();
const app = createApp(dependencies);

const startServer = async (): Promise<void> => {
  try {
    logger.info(getEnvironmentInfo(), 'Starting transaction service');

    // Connect to database
    await connectDatabase();

    // Redis backs the idempotency cache and the scheduler; the API runs without it
    try {
      await connectRedis();
    } catch (error) {
      logger.warn({ err: error }, 'Redis unavailable, idempotency cache disabled');
    }

    if (config.scheduler.enabled) {
      await scheduleMaintenanceJobs();
      startMaintenanceWorker(dependencies.transactionService);
    }

    // Start HTTP server
    const server = app.listen(config.port, () => {
      logger.info(
        { port: config.port, env: config.nodeEnv, health: `http://localhost:${config.port}/health` },
        'Server running'
      );
    });

    // Graceful shutdown
    const shutdown = (signal: string): void => {
      logger.info({ signal }, 'Starting graceful shutdown');

      server.close(async () => {
        logger.info('HTTP server closed');

        try {
          await stopMaintenanceWorker();
          await closeMaintenanceQueue();
          await disconnectRedis();
          await disconnectDatabase();
          await shutdownTracing();
          logger.info('Graceful shutdown completed');
          process.exit(0);
        } catch (error) {
          logger.error({ err: error }, 'Error during shutdown');
          process.exit(1);
        }
      });

      // Force exit after 10 seconds
      setTimeout(() => {
        logger.error('Forced shutdown after timeout');
        process.exit(1);
      }, 10000).unref();
    };

    process.on('SIGTERM', () => shutdown('SIGTERM'));
    process.on('SIGINT', () => shutdown('SIGINT'));
  } catch (error) {
    logger.error({ err: error }, 'Failed to start server');
    process.exit(1);
  }
};

void startServer();
