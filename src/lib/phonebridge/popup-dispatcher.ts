/**
 * Popup Dispatcher
 * ================
 * Sends PhoneBridge screen-pops and tracks every attempt in a PopupRecord.
 *
 * (callId, targetUserId) is unique: a second dispatch for the same pair never
 * reaches the CRM. Transient failures (timeout, 429, 5xx) are parked in
 * `retry` for the sweep until maxRetries failed attempts, then `failed`.
 */

import { subDays, subHours } from 'date-fns';
import { logger as rootLogger, type Logger } from '@/logger';
import type { PhoneBridgeApi } from '@/lib/api/zoho';
import { isTransientFailure } from '@/lib/api/http';
import type { CallRegistry } from './call-registry';
import { buildPopupPayload } from './popup-payload';
import type { ExtensionDirectory, PopupStore, TokenProvider } from './stores';
import type { CallRecord, PopupPatch, PopupRecord, PopupStatus, PopupSummary } from './types';

const TERMINAL_POPUP_STATUSES: readonly PopupStatus[] = ['sent', 'failed', 'duplicate'];

export interface PopupDispatcherOptions {
  maxRetries: number;
  retryBatchSize: number;
  popupEnabled: boolean;
  now?: () => Date;
  logger?: Logger;
}

export interface RetrySweepStats {
  attempted: number;
  succeeded: number;
  failed: number;
}

export interface PopupStatistics extends PopupSummary {
  hours: number;
  successRate: number;
}

export interface PopupHealthReport {
  timestamp: string;
  configuration: {
    activeExtensionMappings: number;
    validZohoTokens: number;
    popupEnabled: boolean;
  };
  statistics: {
    lastHour: PopupStatistics;
    last24Hours: PopupStatistics;
    lastWeek: PopupStatistics;
  };
  queueStatus: {
    pending: number;
    failed: number;
    retry: number;
  };
  recommendations: string[];
}

export class PopupDispatcher {
  private readonly log: Logger;
  private readonly now: () => Date;

  constructor(
    private readonly popups: PopupStore,
    private readonly registry: CallRegistry,
    private readonly api: PhoneBridgeApi,
    private readonly tokens: TokenProvider,
    private readonly extensions: ExtensionDirectory,
    private readonly options: PopupDispatcherOptions
  ) {
    this.log = (options.logger ?? rootLogger).child({ component: 'popup-dispatcher' });
    this.now = options.now ?? (() => new Date());
  }

  async dispatch(call: CallRecord, zohoUserId: string): Promise<PopupRecord> {
    const existing = await this.popups.findByPair(call.callId, zohoUserId);
    if (existing) {
      this.log.info({ callId: call.callId, zohoUserId, status: existing.status }, 'Duplicate popup suppressed');
      return asDuplicate(existing);
    }

    const record = await this.popups.insertPending({
      callId: call.callId,
      targetUserId: zohoUserId,
      extension: call.extension,
      payload: buildPopupPayload(call, zohoUserId),
    });

    if (!record) {
      // A concurrent delivery created the row between the read and the insert
      const winner = await this.popups.findByPair(call.callId, zohoUserId);
      if (!winner) {
        throw new Error(`Popup for call ${call.callId} user ${zohoUserId} conflicted but could not be read back`);
      }
      return asDuplicate(winner);
    }

    const sent = await this.attempt(record, false);
    if (sent.status === 'sent') {
      await this.registry.amend(call.callId, () => ({ popupSent: true }));
    }
    return sent;
  }

  /** Dismiss the popup. 404 counts as already closed. Never throws. */
  async close(callId: string, zohoUserId: string): Promise<boolean> {
    try {
      const accessToken = await this.tokens.getAccessToken(zohoUserId);
      if (!accessToken) {
        this.log.warn({ callId, zohoUserId }, 'No access token available to close popup');
        return false;
      }

      const result = await this.api.closePopup(accessToken, callId);
      if (result.ok || result.status === 404) {
        this.log.info({ callId, zohoUserId }, 'Popup closed');
        return true;
      }

      this.log.warn({ callId, zohoUserId, error: result.error }, 'Failed to close popup');
      return false;
    } catch (error) {
      this.log.error({ callId, zohoUserId, error: errorMessage(error) }, 'Error closing popup');
      return false;
    }
  }

  /** Close every popup that reached an agent for this call. */
  async closeAllForCall(callId: string): Promise<number> {
    const sent = await this.popups.listByCall(callId, 'sent');
    let closed = 0;
    for (const popup of sent) {
      if (await this.close(callId, popup.targetUserId)) closed++;
    }
    return closed;
  }

  /** Never throws. */
  async update(callId: string, zohoUserId: string, data: Record<string, unknown>): Promise<boolean> {
    try {
      const accessToken = await this.tokens.getAccessToken(zohoUserId);
      if (!accessToken) return false;

      const result = await this.api.updatePopup(accessToken, callId, data);
      if (result.ok) {
        this.log.info({ callId, zohoUserId }, 'Popup updated');
        return true;
      }

      this.log.warn({ callId, zohoUserId, error: result.error }, 'Failed to update popup');
      return false;
    } catch (error) {
      this.log.error({ callId, zohoUserId, error: errorMessage(error) }, 'Error updating popup');
      return false;
    }
  }

  /**
   * Re-attempt one batch of `retry` popups, oldest first. Each attempt counts
   * against retryCount whatever its outcome. Safe to call from any scheduler.
   */
  async retrySweep(): Promise<RetrySweepStats> {
    const stats: RetrySweepStats = { attempted: 0, succeeded: 0, failed: 0 };
    const batch = await this.popups.listRetryable(this.options.retryBatchSize, this.options.maxRetries);

    for (const popup of batch) {
      stats.attempted++;
      this.log.info({ callId: popup.callId, attempt: popup.retryCount + 1 }, 'Retrying popup');

      try {
        const result = await this.attempt(popup, true);
        if (result.status === 'sent') {
          stats.succeeded++;
          await this.registry.amend(popup.callId, () => ({ popupSent: true }));
        } else {
          stats.failed++;
        }
      } catch (error) {
        stats.failed++;
        this.log.error({ popupId: popup.id, error: errorMessage(error) }, 'Popup retry errored');
      }
    }

    this.log.info({ ...stats }, 'Popup retry sweep complete');
    return stats;
  }

  async statistics(hours: number = 24): Promise<PopupStatistics> {
    const since = subHours(this.now(), hours);
    const summary = await this.popups.summarize(since);
    return {
      ...summary,
      hours,
      successRate: summary.total > 0 ? (summary.byStatus.sent / summary.total) * 100 : 0,
    };
  }

  async healthReport(): Promise<PopupHealthReport> {
    const [lastHour, last24Hours, lastWeek, overall, activeExtensionMappings, validZohoTokens] =
      await Promise.all([
        this.statistics(1),
        this.statistics(24),
        this.statistics(168),
        this.popups.summarize(null),
        this.extensions.countActive(),
        this.tokens.countValid(),
      ]);

    const recommendations: string[] = [];
    if (validZohoTokens === 0) {
      recommendations.push('No active Zoho tokens - users need to re-authorize');
    }
    if (activeExtensionMappings === 0) {
      recommendations.push('No active extension mappings - configure user extensions');
    }
    if (last24Hours.total > 0 && last24Hours.successRate < 80) {
      recommendations.push('Low popup success rate - investigate API issues');
    }
    if (overall.byStatus.retry > 10) {
      recommendations.push('High number of popups pending retry - check API rate limits');
    }

    return {
      timestamp: this.now().toISOString(),
      configuration: {
        activeExtensionMappings,
        validZohoTokens,
        popupEnabled: this.options.popupEnabled,
      },
      statistics: { lastHour, last24Hours, lastWeek },
      queueStatus: {
        pending: overall.byStatus.pending,
        failed: overall.byStatus.failed,
        retry: overall.byStatus.retry,
      },
      recommendations,
    };
  }

  /** Delete popup records older than `days`. */
  async cleanup(days: number): Promise<number> {
    const cutoff = subDays(this.now(), days);
    const deleted = await this.popups.deleteOlderThan(cutoff);
    this.log.info({ deleted, days }, 'Old popup records cleaned up');
    return deleted;
  }

  private async attempt(popup: PopupRecord, fromSweep: boolean): Promise<PopupRecord> {
    if (popup.status === 'sent') return popup;

    let patch: PopupPatch;
    try {
      patch = await this.send(popup, fromSweep);
    } catch (error) {
      // Thrown errors (token store, transport) count as transient failures
      const retryCount = popup.retryCount + 1;
      const retry = retryCount < this.options.maxRetries;
      patch = { status: retry ? 'retry' : 'failed', errorMessage: errorMessage(error), retryCount };
      this.log.error(
        { callId: popup.callId, zohoUserId: popup.targetUserId, error: errorMessage(error), retryCount, retry },
        'Popup attempt errored'
      );
    }

    return this.popups.update(popup.id, patch);
  }

  private async send(popup: PopupRecord, fromSweep: boolean): Promise<PopupPatch> {
    const accessToken = await this.tokens.getAccessToken(popup.targetUserId);
    if (!accessToken) {
      return {
        status: 'failed',
        errorMessage: 'No valid access token available',
        retryCount: popup.retryCount + (fromSweep ? 1 : 0),
      };
    }

    const result = await this.api.sendPopup(accessToken, popup.payload);

    if (result.ok) {
      this.log.info(
        { callId: popup.callId, zohoUserId: popup.targetUserId, responseTimeMs: result.elapsedMs },
        'Popup sent'
      );
      return {
        status: 'sent',
        responseBody: result.body,
        responseTimeMs: result.elapsedMs,
        errorMessage: null,
        retryCount: popup.retryCount + (fromSweep ? 1 : 0),
      };
    }

    const retryCount = popup.retryCount + 1;
    const retry = isTransientFailure(result) && retryCount < this.options.maxRetries;
    this.log.error(
      { callId: popup.callId, zohoUserId: popup.targetUserId, status: result.status, retryCount, retry },
      'Popup failed'
    );
    return {
      status: retry ? 'retry' : 'failed',
      responseBody: result.body || null,
      responseTimeMs: result.elapsedMs,
      errorMessage: result.error ?? `HTTP ${result.status}`,
      retryCount,
    };
  }
}

function asDuplicate(popup: PopupRecord): PopupRecord {
  return TERMINAL_POPUP_STATUSES.includes(popup.status) ? popup : { ...popup, status: 'duplicate' };
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
