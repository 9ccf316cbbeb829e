import express, { Application } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { config } from './config';
import { Dependencies } from './config/dependencies';
import { errorHandler, notFoundHandler, globalLimiter } from './middlewares';
import { createHealthRouter, HealthProbes } from './routes/health';
import { createAccountRouter } from './services/account';
import { createTransactionRouter } from './services/transaction';
import {
  correlationMiddleware,
  metricsMiddleware,
  getMetrics,
  getMetricsContentType,
  logger,
} from './observability';

export interface AppOptions {
  healthProbes?: HealthProbes;
}

export const createApp = (dependencies: Dependencies, options: AppOptions = {}): Application => {
  const app = express();

  // Security middleware
  app.use(
    helmet({
      contentSecurityPolicy: config.security.contentSecurityPolicy,
      hsts: config.security.hsts,
    })
  );
  app.use(
    cors({
      origin: config.api.corsOrigins,
      exposedHeaders: ['x-correlation-id', 'X-Idempotent-Replayed'],
    })
  );

  // Request parsing
  app.use(express.json({ limit: config.api.bodyLimit }));
  app.use(express.urlencoded({ extended: true, limit: config.api.bodyLimit }));

  // Observability middleware (applied early to capture all requests)
  app.use(correlationMiddleware);
  app.use(metricsMiddleware);
  app.use(globalLimiter);

  // Routes
  app.use('/health', createHealthRouter(options.healthProbes));
  app.use('/api/transactions', createTransactionRouter(dependencies.transactionController));
  app.use('/api/accounts', createAccountRouter(dependencies.accountController));

  // Metrics endpoint (Prometheus format)
  app.get('/metrics', async (_req, res) => {
    try {
      res.set('Content-Type', getMetricsContentType());
      res.send(await getMetrics());
    } catch (error) {
      logger.error({ err: error }, 'Error collecting metrics');
      res.status(500).send('Error collecting metrics');
    }
  });

  // Root route
  app.get('/', (_req, res) => {
    res.json({
      name: 'OpenBank Transaction Service',
      version: '1.0.0',
      description: 'Transaction processing with account debit/credit coordination',
    });
  });

  // Error handling
  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
};
