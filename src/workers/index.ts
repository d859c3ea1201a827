/**
 * Workers Module
 *
 * Runs the single popup maintenance worker and reports its health.
 */

import type { Worker } from 'bullmq';
import type { PhoneBridgeSettings } from '../config';
import type { PopupDispatcher } from '../lib/phonebridge/popup-dispatcher';
import { logger } from '../logger';
import type { PopupMaintenanceJobData } from '../queues';
import {
  createPopupMaintenanceWorker,
  summarizeMaintenanceResult,
  type PopupMaintenanceResult,
} from './popup-maintenance.worker';

let maintenanceWorker: Worker<PopupMaintenanceJobData, PopupMaintenanceResult> | null = null;

export function initializeWorkers(dispatcher: PopupDispatcher, settings: PhoneBridgeSettings): void {
  if (maintenanceWorker) return;

  const worker = createPopupMaintenanceWorker(dispatcher, settings);

  worker.on('completed', (job, result) => {
    // The sweep runs every minute; idle sweeps stay at debug
    const idle = result.type === 'retry_sweep' && result.stats.attempted === 0;
    const log = idle ? logger.debug : logger.info;
    log({ jobId: job.id, type: result.type, ...summarizeMaintenanceResult(result) }, 'Popup maintenance job completed');
  });

  worker.on('failed', (job, err) => {
    logger.error(
      { jobId: job?.id, type: job?.data.type, attemptsMade: job?.attemptsMade, error: err.message },
      'Popup maintenance job failed'
    );
  });

  worker.on('error', (err) => {
    logger.error({ error: err.message }, 'Popup maintenance worker error');
  });

  maintenanceWorker = worker;
  logger.info(`Started worker: ${worker.name}`);
}

/**
 * Waits for the active job to complete before closing
 */
export async function shutdownWorkers(): Promise<void> {
  if (!maintenanceWorker) return;

  try {
    await maintenanceWorker.close();
    logger.info('Popup maintenance worker stopped');
  } catch (err) {
    logger.error({ error: err instanceof Error ? err.message : String(err) }, 'Error closing popup maintenance worker');
  } finally {
    maintenanceWorker = null;
  }
}

export async function getWorkersHealth(): Promise<{
  healthy: boolean;
  workers: Array<{ name: string; running: boolean; paused: boolean }>;
}> {
  if (!maintenanceWorker) {
    return { healthy: false, workers: [] };
  }

  const status = {
    name: maintenanceWorker.name,
    running: maintenanceWorker.isRunning(),
    paused: maintenanceWorker.isPaused(),
  };
  return { healthy: status.running && !status.paused, workers: [status] };
}
