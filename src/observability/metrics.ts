import { Registry, Counter, Histogram, collectDefaultMetrics } from 'prom-client';
import { config } from '../config';

/**
 * Prometheus metrics registry
 */
export const registry = new Registry();
registry.setDefaultLabels({ service: config.otel.serviceName });

// Default Node.js metrics (CPU, memory, event loop)
if (!config.isTest) {
  collectDefaultMetrics({ register: registry });
}

// ============================================
// HTTP Metrics
// ============================================

export const httpRequestsTotal = new Counter({
  name: 'http_requests_total',
  help: 'Total HTTP requests',
  labelNames: ['method', 'path', 'status'] as const,
  registers: [registry],
});

export const httpRequestDuration = new Histogram({
  name: 'http_request_duration_seconds',
  help: 'HTTP request duration in seconds',
  labelNames: ['method', 'path', 'status'] as const,
  buckets: [0.01, 0.05, 0.1, 0.25, 0.5, 1, 2, 5, 10],
  registers: [registry],
});

// ============================================
// Transaction Metrics
// ============================================

/**
 * Status changes, labelled by the state entered
 */
export const transactionsTotal = new Counter({
  name: 'transactions_total',
  help: 'Transaction status changes by resulting status',
  labelNames: ['status'] as const,
  registers: [registry],
});

export const transactionAmount = new Histogram({
  name: 'transaction_amount',
  help: 'Amounts of created transactions',
  labelNames: ['type'] as const,
  buckets: [10, 50, 100, 500, 1000, 5000, 10000, 50000, 100000],
  registers: [registry],
});

export const transactionProcessingDuration = new Histogram({
  name: 'transaction_processing_duration_seconds',
  help: 'Time spent moving money for one processing attempt',
  labelNames: ['outcome'] as const, // completed, failed
  buckets: [0.05, 0.1, 0.25, 0.5, 1, 2, 5, 10],
  registers: [registry],
});

// ============================================
// Account Metrics
// ============================================

/**
 * Outbound calls to the Account Service
 */
export const accountServiceCallsTotal = new Counter({
  name: 'account_service_calls_total',
  help: 'Account Service calls by operation and outcome',
  labelNames: ['operation', 'outcome'] as const,
  registers: [registry],
});

/**
 * Balance movements applied by the companion account service
 */
export const accountOperationsTotal = new Counter({
  name: 'account_operations_total',
  help: 'Account balance operations by type',
  labelNames: ['operation', 'result'] as const, // debit/credit, applied/replayed
  registers: [registry],
});

// ============================================
// Scheduler Metrics
// ============================================

export const maintenanceJobsTotal = new Counter({
  name: 'maintenance_jobs_total',
  help: 'Maintenance job runs by job and status',
  labelNames: ['job', 'status'] as const,
  registers: [registry],
});

export const maintenanceJobDuration = new Histogram({
  name: 'maintenance_job_duration_seconds',
  help: 'Maintenance job duration in seconds',
  labelNames: ['job'] as const,
  buckets: [0.1, 0.5, 1, 2, 5, 10, 30, 60],
  registers: [registry],
});

// ============================================
// Utility Functions
// ============================================

/**
 * Reset all metrics (useful for testing)
 */
export const resetMetrics = (): void => {
  registry.resetMetrics();
};

export const getMetrics = async (): Promise<string> => {
  return registry.metrics();
};

export const getMetricsContentType = (): string => {
  return registry.contentType;
};
