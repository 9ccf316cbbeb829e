/**
 * BullMQ Queue Configuration
 *
 * Connection settings and default job options for the maintenance queue.
 */

import { ConnectionOptions, DefaultJobOptions } from 'bullmq';

import { config } from '../config';

/**
 * Redis connection configuration for BullMQ
 */
export const queueConnection: ConnectionOptions = {
  host: config.redis.host,
  port: config.redis.port,
  password: config.redis.password,
  maxRetriesPerRequest: null, // Required for BullMQ workers
};

/**
 * Maintenance runs are not retried: the next scheduled run picks up whatever
 * this one left behind.
 */
export const maintenanceJobOptions: DefaultJobOptions = {
  attempts: 1,
  removeOnComplete: {
    count: 50,
  },
  removeOnFail: {
    count: 200,
  },
};

/**
 * Queue names
 * Note: BullMQ doesn't allow colons in queue names as they are used as Redis key separators
 */
export const QUEUE_NAMES = {
  MAINTENANCE: 'openbank-transaction-maintenance',
} as const;

export const MAINTENANCE_JOBS = {
  PROCESS_PENDING: 'process-pending',
  CLEANUP_STALE_PENDING: 'cleanup-stale-pending',
} as const;

export type MaintenanceJobName = (typeof MAINTENANCE_JOBS)[keyof typeof MAINTENANCE_JOBS];

/**
 * Worker concurrency settings
 */
export const WORKER_CONCURRENCY = {
  MAINTENANCE: config.scheduler.concurrency,
} as const;
