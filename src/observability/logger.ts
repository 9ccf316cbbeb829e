import pino from 'pino';

import { config } from '../config';
import { getLogContext } from './log-context';

/**
 * Pino logger configuration
 * - Production: JSON logs at info level
 * - Development: pretty printed logs at debug level
 * - Test: silent unless LOG_LEVEL says otherwise
 *
 * Every line logged inside a request carries its correlation id.
 */
export const logger = pino({
  level: config.logging.level,
  formatters: {
    level: (label) => ({ level: label }),
  },
  base: {
    service: config.otel.serviceName,
    env: config.nodeEnv,
  },
  mixin: () => {
    const context = getLogContext();
    return context ? { correlationId: context.correlationId } : {};
  },
  ...(config.logging.prettyPrint && {
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
      },
    },
  }),
});

// Child logger factory for component-specific logging
export const createServiceLogger = (component: string) => {
  return logger.child({ component });
};
