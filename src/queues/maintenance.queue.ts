/**
 * Maintenance Queue
 *
 * Holds the repeating "process pending" and "clean up stale pending" jobs.
 */

import { Queue } from 'bullmq';

import { config } from '../config';
import { createServiceLogger } from '../observability';

import {
  MAINTENANCE_JOBS,
  MaintenanceJobName,
  QUEUE_NAMES,
  maintenanceJobOptions,
  queueConnection,
} from './queue.config';

const log = createServiceLogger('maintenance-queue');

export interface MaintenanceJobData {
  /** schedule for repeating runs, manual for one-off enqueues */
  trigger: 'schedule' | 'manual';
}

export interface MaintenanceJobResult {
  job: MaintenanceJobName;
  examined: number;
  changed: number;
  skipped: number;
}

let maintenanceQueue: Queue<MaintenanceJobData, MaintenanceJobResult> | null = null;

/**
 * Get or create the maintenance queue
 */
export function getMaintenanceQueue(): Queue<MaintenanceJobData, MaintenanceJobResult> {
  if (!maintenanceQueue) {
    maintenanceQueue = new Queue<MaintenanceJobData, MaintenanceJobResult>(QUEUE_NAMES.MAINTENANCE, {
      connection: queueConnection,
      defaultJobOptions: maintenanceJobOptions,
    });
    log.info('Maintenance queue initialized');
  }
  return maintenanceQueue;
}

/**
 * Registers both repeating jobs. Upserting keeps a single scheduler per job
 * across restarts and picks up changed intervals.
 */
export async function scheduleMaintenanceJobs(
  intervals: { processPendingEveryMs: number; cleanupEveryMs: number } = config.scheduler
): Promise<void> {
  const queue = getMaintenanceQueue();

  await queue.upsertJobScheduler(
    MAINTENANCE_JOBS.PROCESS_PENDING,
    { every: intervals.processPendingEveryMs },
    { name: MAINTENANCE_JOBS.PROCESS_PENDING, data: { trigger: 'schedule' } }
  );
  await queue.upsertJobScheduler(
    MAINTENANCE_JOBS.CLEANUP_STALE_PENDING,
    { every: intervals.cleanupEveryMs },
    { name: MAINTENANCE_JOBS.CLEANUP_STALE_PENDING, data: { trigger: 'schedule' } }
  );

  log.info(intervals, 'Maintenance jobs scheduled');
}

/**
 * Close the maintenance queue connection
 */
export async function closeMaintenanceQueue(): Promise<void> {
  if (maintenanceQueue) {
    await maintenanceQueue.close();
    maintenanceQueue = null;
    log.info('Maintenance queue closed');
  }
}
