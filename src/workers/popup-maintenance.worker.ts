/**
 * Popup Maintenance Worker
 *
 * Job Types:
 * - retry_sweep: re-send one batch of popups parked in `retry`
 * - cleanup: delete popup logs older than the retention window
 * - health_report: compute and log the popup health report
 */

import { Worker, type Job } from 'bullmq';
import type { PhoneBridgeSettings } from '../config';
import type { PopupDispatcher, PopupHealthReport, RetrySweepStats } from '../lib/phonebridge/popup-dispatcher';
import { logger } from '../logger';
import { POPUP_MAINTENANCE_QUEUE, type PopupMaintenanceJobData } from '../queues';
import { getRedis } from '../redis';

export type PopupMaintenanceResult =
  | { type: 'retry_sweep'; stats: RetrySweepStats }
  | { type: 'cleanup'; deleted: number }
  | { type: 'health_report'; report: PopupHealthReport };

type MaintenanceDispatcher = Pick<PopupDispatcher, 'retrySweep' | 'cleanup' | 'healthReport'>;

async function runMaintenance(
  data: PopupMaintenanceJobData,
  dispatcher: MaintenanceDispatcher,
  settings: Pick<PhoneBridgeSettings, 'popupRetentionDays'>
): Promise<PopupMaintenanceResult> {
  switch (data.type) {
    case 'retry_sweep':
      return { type: 'retry_sweep', stats: await dispatcher.retrySweep() };

    case 'cleanup':
      return { type: 'cleanup', deleted: await dispatcher.cleanup(data.days ?? settings.popupRetentionDays) };

    case 'health_report': {
      const report = await dispatcher.healthReport();
      if (report.recommendations.length > 0) {
        logger.warn({ recommendations: report.recommendations }, 'Popup health report has recommendations');
      }
      logger.info(
        {
          successRate24h: report.statistics.last24Hours.successRate,
          total24h: report.statistics.last24Hours.total,
          queueStatus: report.queueStatus,
        },
        'Popup health report'
      );
      return { type: 'health_report', report };
    }
  }
}

export async function processPopupMaintenanceJob(
  job: Pick<Job<PopupMaintenanceJobData>, 'id' | 'data'>,
  dispatcher: MaintenanceDispatcher,
  settings: Pick<PhoneBridgeSettings, 'popupRetentionDays'>
): Promise<PopupMaintenanceResult> {
  const startTime = Date.now();
  logger.info({ event: 'popup_maintenance_start', jobId: job.id, type: job.data.type });

  const result = await runMaintenance(job.data, dispatcher, settings);

  logger.info({
    event: 'popup_maintenance_complete',
    jobId: job.id,
    type: job.data.type,
    durationMs: Date.now() - startTime,
  });
  return result;
}

/**
 * Create and return the popup maintenance worker
 */
export function createPopupMaintenanceWorker(
  dispatcher: MaintenanceDispatcher,
  settings: Pick<PhoneBridgeSettings, 'popupRetentionDays'>
): Worker<PopupMaintenanceJobData, PopupMaintenanceResult> {
  return new Worker<PopupMaintenanceJobData, PopupMaintenanceResult>(
    POPUP_MAINTENANCE_QUEUE,
    (job) => processPopupMaintenanceJob(job, dispatcher, settings),
    {
      connection: getRedis(),
      concurrency: 1, // sweeps must not overlap
    }
  );
}

/** Log fields for a finished maintenance job. */
export function summarizeMaintenanceResult(result: PopupMaintenanceResult): Record<string, unknown> {
  switch (result.type) {
    case 'retry_sweep':
      return { ...result.stats };
    case 'cleanup':
      return { deleted: result.deleted };
    case 'health_report':
      return {
        successRate24h: result.report.statistics.last24Hours.successRate,
        recommendations: result.report.recommendations.length,
      };
  }
}
