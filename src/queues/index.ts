/**
 * Queue Definitions
 *
 * The popup maintenance queue, its job data and its schedules.
 */

import { Queue } from 'bullmq';
import { getRedis } from '../redis';
import { logger } from '../logger';

// =============================================================================
// JOB DATA INTERFACES
// =============================================================================

export const POPUP_MAINTENANCE_QUEUE = 'popup-maintenance';

/**
 * retry_sweep:   re-send popups parked in `retry`
 * cleanup:       delete popup logs past the retention window
 * health_report: log the popup health report
 */
export type PopupMaintenanceJobData =
  | { type: 'retry_sweep' }
  | { type: 'cleanup'; days?: number }
  | { type: 'health_report' };

// =============================================================================
// DEFAULT JOB OPTIONS
// =============================================================================

const defaultJobOptions = {
  attempts: 3,
  backoff: {
    type: 'exponential' as const,
    delay: 5000, // 5s, 10s, 20s
  },
  removeOnComplete: {
    count: 100, // Keep last 100 completed jobs
    age: 24 * 60 * 60, // Or jobs older than 24 hours
  },
  removeOnFail: {
    count: 50,
    age: 7 * 24 * 60 * 60,
  },
};

// =============================================================================
// QUEUE INSTANCE
// =============================================================================

let popupMaintenanceQueue: Queue<PopupMaintenanceJobData> | null = null;

export function getPopupMaintenanceQueue(): Queue<PopupMaintenanceJobData> {
  if (!popupMaintenanceQueue) {
    popupMaintenanceQueue = new Queue<PopupMaintenanceJobData>(POPUP_MAINTENANCE_QUEUE, {
      connection: getRedis(),
      defaultJobOptions,
    });
  }
  return popupMaintenanceQueue;
}

// =============================================================================
// SCHEDULED JOBS
// =============================================================================

/**
 * Initialize all scheduled/repeatable jobs.
 * Uses upsertJobScheduler to idempotently create schedules.
 */
export async function initializeScheduledJobs(): Promise<void> {
  logger.info('Initializing scheduled jobs...');
  const queue = getPopupMaintenanceQueue();

  try {
    await queue.upsertJobScheduler(
      'popup-retry-sweep',
      { pattern: '* * * * *' },
      { name: 'retry-sweep', data: { type: 'retry_sweep' }, opts: { attempts: 1 } }
    );
    logger.info('Scheduled: popup-retry-sweep (every minute)');

    await queue.upsertJobScheduler(
      'popup-cleanup',
      { pattern: '0 3 * * *' },
      { name: 'cleanup', data: { type: 'cleanup' } }
    );
    logger.info('Scheduled: popup-cleanup (daily 03:00)');

    await queue.upsertJobScheduler(
      'popup-health-report',
      { pattern: '0 7 * * *' },
      { name: 'health-report', data: { type: 'health_report' } }
    );
    logger.info('Scheduled: popup-health-report (daily 07:00)');

    logger.info('All scheduled jobs initialized');
  } catch (err) {
    logger.error({ error: err instanceof Error ? err.message : String(err) }, 'Failed to initialize scheduled jobs');
    throw err;
  }
}

// =============================================================================
// HEALTH CHECK
// =============================================================================

export interface QueueStats {
  name: string;
  waiting: number;
  active: number;
  completed: number;
  failed: number;
  delayed: number;
}

export async function getQueuesHealth(): Promise<{ healthy: boolean; queues: QueueStats[] }> {
  const queue = getPopupMaintenanceQueue();

  let stats: QueueStats;
  try {
    const [waiting, active, completed, failed, delayed] = await Promise.all([
      queue.getWaitingCount(),
      queue.getActiveCount(),
      queue.getCompletedCount(),
      queue.getFailedCount(),
      queue.getDelayedCount(),
    ]);
    stats = { name: POPUP_MAINTENANCE_QUEUE, waiting, active, completed, failed, delayed };
  } catch (err) {
    logger.error(
      { queue: POPUP_MAINTENANCE_QUEUE, error: err instanceof Error ? err.message : String(err) },
      'Failed to get queue stats'
    );
    stats = { name: POPUP_MAINTENANCE_QUEUE, waiting: -1, active: -1, completed: -1, failed: -1, delayed: -1 };
  }

  // Unhealthy if stats failed or the backlog is piling up
  const healthy = stats.waiting >= 0 && stats.waiting < 100;
  return { healthy, queues: [stats] };
}

export async function closeQueues(): Promise<void> {
  if (popupMaintenanceQueue) {
    await popupMaintenanceQueue.close();
    popupMaintenanceQueue = null;
  }
  logger.info('All queues closed');
}
