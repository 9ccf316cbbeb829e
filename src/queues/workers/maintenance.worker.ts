/**
 * Maintenance Worker
 *
 * Runs the scheduled transaction maintenance jobs against the transaction
 * service.
 */

import { Worker, Job } from 'bullmq';
import { v4 as uuidv4 } from 'uuid';

import {
  createServiceLogger,
  maintenanceJobDuration,
  maintenanceJobsTotal,
  runWithContext,
} from '../../observability';
import { TransactionService } from '../../services/transaction/transaction.service';
import { MaintenanceJobData, MaintenanceJobResult } from '../maintenance.queue';
import {
  MAINTENANCE_JOBS,
  MaintenanceJobName,
  QUEUE_NAMES,
  WORKER_CONCURRENCY,
  queueConnection,
} from '../queue.config';

const log = createServiceLogger('maintenance-worker');

/** Actor recorded in updatedBy for scheduled changes */
export const SCHEDULER_ACTOR = 'system-scheduler';

export type MaintenanceTasks = Pick<
  TransactionService,
  'processPendingTransactions' | 'cleanupOldPendingTransactions'
>;

let maintenanceWorker: Worker<MaintenanceJobData, MaintenanceJobResult> | null = null;

const isMaintenanceJobName = (name: string): name is MaintenanceJobName =>
  Object.values<string>(MAINTENANCE_JOBS).includes(name);

async function runTask(name: MaintenanceJobName, tasks: MaintenanceTasks): Promise<MaintenanceJobResult> {
  if (name === MAINTENANCE_JOBS.PROCESS_PENDING) {
    const result = await tasks.processPendingTransactions(SCHEDULER_ACTOR);
    return {
      job: name,
      examined: result.examined,
      changed: result.completed + result.failed,
      skipped: result.skipped,
    };
  }

  const result = await tasks.cleanupOldPendingTransactions(SCHEDULER_ACTOR);
  return { job: name, examined: result.examined, changed: result.timedOut, skipped: result.skipped };
}

/**
 * Process one maintenance job. Each run gets its own correlation id so its
 * log lines and Account Service calls can be traced together.
 */
export async function processMaintenanceJob(
  job: Job<MaintenanceJobData, MaintenanceJobResult>,
  tasks: MaintenanceTasks
): Promise<MaintenanceJobResult> {
  if (!isMaintenanceJobName(job.name)) {
    throw new Error(`Unknown maintenance job: ${job.name}`);
  }
  const name = job.name;

  return runWithContext({ correlationId: `job-${job.id ?? uuidv4()}` }, async () => {
    const endTimer = maintenanceJobDuration.startTimer({ job: name });
    log.info({ jobId: job.id, name, trigger: job.data.trigger }, 'Maintenance job started');

    try {
      const result = await runTask(name, tasks);
      maintenanceJobsTotal.inc({ job: name, status: 'success' });
      log.info({ jobId: job.id, ...result }, 'Maintenance job finished');
      return result;
    } catch (error) {
      maintenanceJobsTotal.inc({ job: name, status: 'failure' });
      log.error({ jobId: job.id, name, err: error }, 'Maintenance job failed');
      throw error;
    } finally {
      endTimer();
    }
  });
}

function setupWorkerEvents(worker: Worker<MaintenanceJobData, MaintenanceJobResult>): void {
  worker.on('failed', (job, err) => {
    log.warn({ jobId: job?.id, name: job?.name, error: err.message }, 'Maintenance job marked failed');
  });

  worker.on('error', (err) => {
    log.error({ err }, 'Maintenance worker error');
  });
}

/**
 * Start the maintenance worker
 */
export function startMaintenanceWorker(
  tasks: MaintenanceTasks
): Worker<MaintenanceJobData, MaintenanceJobResult> {
  if (maintenanceWorker) {
    return maintenanceWorker;
  }

  maintenanceWorker = new Worker<MaintenanceJobData, MaintenanceJobResult>(
    QUEUE_NAMES.MAINTENANCE,
    (job) => processMaintenanceJob(job, tasks),
    {
      connection: queueConnection,
      concurrency: WORKER_CONCURRENCY.MAINTENANCE,
    }
  );

  setupWorkerEvents(maintenanceWorker);
  log.info('Maintenance worker started');

  return maintenanceWorker;
}

/**
 * Stop the maintenance worker
 */
export async function stopMaintenanceWorker(): Promise<void> {
  if (maintenanceWorker) {
    await maintenanceWorker.close();
    maintenanceWorker = null;
    log.info('Maintenance worker stopped');
  }
}
