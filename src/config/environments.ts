/**
 * Environment Configuration
 *
 * Central place for environment detection and environment-specific values.
 * Use these flags and values throughout the app to avoid hardcoding environments.
 *
 * Usage:
 *   import { isProduction, MONGODB_URI, TRANSACTION_CONFIG } from './environments';
 */

// =============================================================================
// ENVIRONMENT FLAGS
// =============================================================================

/**
 * Current environment from NODE_ENV
 * Defaults to 'development' if not set
 */
export const NODE_ENV = process.env.NODE_ENV || 'development';

export const isProduction = NODE_ENV === 'production';
export const isDevelopment = NODE_ENV === 'development';
export const isTest = NODE_ENV === 'test';

const parseBoolean = (value: string | undefined, fallback: boolean): boolean => {
  if (value === undefined || value === '') return fallback;
  return value === 'true' || value === '1';
};

// =============================================================================
// DATABASE CONFIGURATION
// =============================================================================

/**
 * MongoDB URI by environment
 */
export const MONGODB_URI = isProduction
  ? process.env.MONGODB_URI || 'mongodb://mongodb:27017/openbank_transactions'
  : isTest
  ? process.env.MONGODB_URI || 'mongodb://localhost:27018/openbank_transactions_test'
  : process.env.MONGODB_URI || 'mongodb://localhost:27017/openbank_transactions';

/**
 * MongoDB connection pool settings
 */
export const MONGODB_CONFIG = {
  maxPoolSize: isProduction ? 50 : 10,
  minPoolSize: isProduction ? 5 : 2,
  maxIdleTimeMS: isProduction ? 60000 : 30000,
  serverSelectionTimeoutMS: isProduction ? 10000 : 5000,
};

// =============================================================================
// REDIS CONFIGURATION
// =============================================================================

export const REDIS_HOST = isProduction
  ? process.env.REDIS_HOST || 'redis'
  : process.env.REDIS_HOST || 'localhost';

export const REDIS_PORT = parseInt(
  process.env.REDIS_PORT || (isTest ? '6380' : '6379'),
  10
);

/**
 * Redis password (production only)
 */
export const REDIS_PASSWORD = isProduction
  ? process.env.REDIS_PASSWORD || undefined
  : undefined;

export const REDIS_CONFIG = {
  host: REDIS_HOST,
  port: REDIS_PORT,
  password: REDIS_PASSWORD,
  maxRetriesPerRequest: isProduction ? 5 : 3,
  connectTimeout: isProduction ? 10000 : 5000,
  lazyConnect: true,
};

// =============================================================================
// JWT / AUTHENTICATION CONFIGURATION
// =============================================================================

/**
 * JWT Secret - MUST be set in production (validateProductionEnv enforces it)
 */
export const JWT_SECRET = process.env.JWT_SECRET || 'dev-secret-do-not-use-in-production';

/**
 * Token lifetimes. Service tokens authenticate this service against the
 * Account Service and are kept short.
 */
export const JWT_CONFIG = {
  secret: JWT_SECRET,
  accessTokenExpiresIn: process.env.JWT_ACCESS_TOKEN_EXPIRES_IN || (isProduction ? '15m' : '1h'),
  serviceTokenExpiresIn: process.env.JWT_SERVICE_TOKEN_EXPIRES_IN || '5m',
  serviceName: process.env.SERVICE_NAME || 'transaction-service',
};

// =============================================================================
// RATE LIMITING CONFIGURATION
// =============================================================================

/**
 * Rate limiting configuration by environment
 *
 * Limits are relaxed outside production. Set RATE_LIMIT_DISABLED=true to turn
 * every limiter off (load tests only).
 */
export const RATE_LIMIT_CONFIG = {
  disabled: parseBoolean(process.env.RATE_LIMIT_DISABLED, false),

  // Global rate limiter (all routes)
  global: {
    windowMs: parseInt(process.env.RATE_LIMIT_WINDOW_MS || '900000', 10), // 15 minutes
    maxRequests: isProduction
      ? parseInt(process.env.RATE_LIMIT_MAX_REQUESTS || '100', 10)
      : isTest
      ? 10000
      : parseInt(process.env.RATE_LIMIT_MAX_REQUESTS || '1000', 10),
  },

  // Transaction creation limiter
  transaction: {
    windowMs: parseInt(process.env.TX_RATE_LIMIT_WINDOW_MS || '60000', 10), // 1 minute
    maxRequests: isProduction
      ? parseInt(process.env.TX_RATE_LIMIT_MAX || '10', 10)
      : isTest
      ? 10000
      : parseInt(process.env.TX_RATE_LIMIT_MAX || '100', 10),
  },

  skipFailedRequests: !isProduction,
};

// =============================================================================
// API CONFIGURATION
// =============================================================================

export const API_CONFIG = {
  bodyLimit: process.env.API_BODY_LIMIT || '100kb',
  port: parseInt(process.env.PORT || '8091', 10),
  corsOrigins: isProduction
    ? (process.env.CORS_ORIGINS || '').split(',').filter(Boolean)
    : ['http://localhost:3000', 'http://localhost:8080', 'http://127.0.0.1:3000'],
};

// =============================================================================
// ACCOUNT SERVICE
// =============================================================================

/**
 * Where the Account Service lives. Defaults to this process, which mounts the
 * companion account routes under /api/accounts.
 */
export const ACCOUNT_SERVICE_CONFIG = {
  url: process.env.ACCOUNT_SERVICE_URL || `http://localhost:${API_CONFIG.port}`,
  timeoutMs: parseInt(process.env.ACCOUNT_SERVICE_TIMEOUT_MS || '5000', 10),
};

// =============================================================================
// TRANSACTION PROCESSING
// =============================================================================

export const TRANSACTION_CONFIG = {
  // When false, new transactions stay PENDING until the scheduler picks them up
  processImmediately: parseBoolean(process.env.TRANSACTION_PROCESS_IMMEDIATELY, true),
  pendingTimeoutHours: parseInt(process.env.PENDING_TIMEOUT_HOURS || '24', 10),
  defaultCurrency: process.env.DEFAULT_CURRENCY || 'USD',
  bulkMaxSize: parseInt(process.env.BULK_MAX_SIZE || '50', 10),
  defaultPageSize: 20,
  maxPageSize: 100,
};

// =============================================================================
// SCHEDULER
// =============================================================================

export const SCHEDULER_CONFIG = {
  enabled: parseBoolean(process.env.SCHEDULER_ENABLED, !isTest),
  processPendingEveryMs: parseInt(process.env.SCHEDULER_PROCESS_PENDING_EVERY_MS || '60000', 10),
  cleanupEveryMs: parseInt(process.env.SCHEDULER_CLEANUP_EVERY_MS || '3600000', 10),
  concurrency: parseInt(process.env.SCHEDULER_CONCURRENCY || '1', 10),
};

// =============================================================================
// LOGGING CONFIGURATION
// =============================================================================

export const LOG_CONFIG = {
  level: process.env.LOG_LEVEL || (isProduction ? 'info' : isTest ? 'silent' : 'debug'),
  prettyPrint: !isProduction && !isTest,
};

// =============================================================================
// OBSERVABILITY / TELEMETRY
// =============================================================================

export const OTEL_CONFIG = {
  enabled: !isTest && (isProduction || process.env.OTEL_ENABLED === 'true'),
  serviceName: process.env.OTEL_SERVICE_NAME || 'openbank-transaction-service',
  exporterEndpoint: process.env.OTEL_EXPORTER_OTLP_ENDPOINT || 'http://localhost:4318',
};

// =============================================================================
// SECURITY CONFIGURATION
// =============================================================================

export const SECURITY_CONFIG = {
  contentSecurityPolicy: isProduction,
  hsts: isProduction,
};

// =============================================================================
// VALIDATION
// =============================================================================

/**
 * Validate required production environment variables
 * Call this during app startup in production
 */
export const validateProductionEnv = (): void => {
  if (!isProduction) return;

  const required = [
    'JWT_SECRET',
    'MONGODB_URI',
    'REDIS_HOST',
    'REDIS_PASSWORD',
    'ACCOUNT_SERVICE_URL',
    'CORS_ORIGINS',
  ];

  const missing = required.filter((key) => !process.env[key]);

  if (missing.length > 0) {
    throw new Error(
      `Missing required environment variables for production: ${missing.join(', ')}`
    );
  }

  if (process.env.JWT_SECRET && process.env.JWT_SECRET.length < 32) {
    throw new Error('JWT_SECRET must be at least 32 characters in production');
  }
};

// =============================================================================
// DEBUG / INFO
// =============================================================================

/**
 * Get current environment info (for logging/debugging)
 */
export const getEnvironmentInfo = () => ({
  nodeEnv: NODE_ENV,
  isProduction,
  isDevelopment,
  isTest,
  mongoHost: MONGODB_URI.split('@').pop()?.split('/')[2] || 'localhost', // Don't leak credentials
  redisHost: REDIS_HOST,
  accountServiceUrl: ACCOUNT_SERVICE_CONFIG.url,
  processImmediately: TRANSACTION_CONFIG.processImmediately,
  schedulerEnabled: SCHEDULER_CONFIG.enabled,
});
