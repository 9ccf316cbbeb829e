/**
 * Queue Module Exports
 */

// Configuration
export {
  queueConnection,
  maintenanceJobOptions,
  QUEUE_NAMES,
  MAINTENANCE_JOBS,
  WORKER_CONCURRENCY,
} from './queue.config';
export type { MaintenanceJobName } from './queue.config';

// Maintenance Queue
export {
  getMaintenanceQueue,
  scheduleMaintenanceJobs,
  closeMaintenanceQueue,
} from './maintenance.queue';
export type { MaintenanceJobData, MaintenanceJobResult } from './maintenance.queue';

// Worker
export {
  SCHEDULER_ACTOR,
  processMaintenanceJob,
  startMaintenanceWorker,
  stopMaintenanceWorker,
} from './workers/maintenance.worker';
export type { MaintenanceTasks } from './workers/maintenance.worker';
