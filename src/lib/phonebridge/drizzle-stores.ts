/**
 * Postgres-backed stores (drizzle-orm over postgres-js).
 *
 * Create-if-absent relies on the unique indexes on call_logs.call_id and
 * popup_logs(call_id, zoho_user_id). Call updates lock the row for the
 * duration of the read-modify-write.
 */

import { and, asc, avg, count, desc, eq, gt, gte, isNotNull, lt } from 'drizzle-orm';
import type { Database } from '@/db';
import {
  callLogs,
  extensionMappings,
  popupLogs,
  vitalpbxWebhookLogs,
  zohoTokens,
  type CallLog,
  type PopupLog,
} from '@/db/schema';
import type { RefreshedToken } from '@/lib/api/zoho';
import type { StoredZohoToken, ZohoTokenRepository } from '@/lib/api/zoho-tokens';
import type { CallStore, ExtensionDirectory, PopupStore, WebhookLogStore } from './stores';
import {
  emptyStatusCounts,
  type CallRecord,
  type ExtensionBinding,
  type NewPopupRecord,
  type PopupPatch,
  type PopupRecord,
  type PopupStatus,
  type PopupSummary,
} from './types';

// =============================================================================
// Row mapping
// =============================================================================

function toCallRecord(row: CallLog): CallRecord {
  return {
    callId: row.callId,
    extension: row.extension,
    direction: row.direction,
    callerNumber: row.callerNumber,
    calledNumber: row.calledNumber,
    normalizedPhone: row.normalizedPhone,
    state: row.state,
    contact: row.contact ?? null,
    callHistoryCount: row.callHistoryCount,
    startTime: row.startTime,
    endTime: row.endTime,
    durationSeconds: row.durationSeconds,
    popupSent: row.popupSent,
    notes: row.notes,
    recordingUrl: row.recordingUrl,
  };
}

function toPopupRecord(row: PopupLog): PopupRecord {
  return {
    id: row.id,
    callId: row.callId,
    targetUserId: row.zohoUserId,
    extension: row.extension,
    payload: row.payload,
    status: row.status,
    sentAt: row.sentAt,
    responseTimeMs: row.responseTimeMs,
    responseBody: row.responseBody,
    retryCount: row.retryCount,
    errorMessage: row.errorMessage,
  };
}

// =============================================================================
// Calls
// =============================================================================

export class DrizzleCallStore implements CallStore {
  constructor(private readonly db: Database) {}

  async insertIfAbsent(record: CallRecord): Promise<CallRecord | null> {
    const rows = await this.db
      .insert(callLogs)
      .values(record)
      .onConflictDoNothing({ target: callLogs.callId })
      .returning();
    return rows[0] ? toCallRecord(rows[0]) : null;
  }

  async findByCallId(callId: string): Promise<CallRecord | null> {
    const rows = await this.db.select().from(callLogs).where(eq(callLogs.callId, callId)).limit(1);
    return rows[0] ? toCallRecord(rows[0]) : null;
  }

  async update(callId: string, mutate: (current: CallRecord) => CallRecord): Promise<CallRecord | null> {
    return this.db.transaction(async (tx) => {
      const locked = await tx
        .select()
        .from(callLogs)
        .where(eq(callLogs.callId, callId))
        .limit(1)
        .for('update');
      if (!locked[0]) return null;

      const next = mutate(toCallRecord(locked[0]));
      const rows = await tx
        .update(callLogs)
        .set({ ...next, updatedAt: new Date() })
        .where(eq(callLogs.callId, callId))
        .returning();
      return rows[0] ? toCallRecord(rows[0]) : null;
    });
  }

  async countCompletedByPhone(normalizedPhone: string): Promise<number> {
    const [row] = await this.db
      .select({ total: count() })
      .from(callLogs)
      .where(and(eq(callLogs.normalizedPhone, normalizedPhone), eq(callLogs.state, 'completed')));
    return row?.total ?? 0;
  }
}

// =============================================================================
// Popups
// =============================================================================

export class DrizzlePopupStore implements PopupStore {
  constructor(private readonly db: Database) {}

  async insertPending(input: NewPopupRecord): Promise<PopupRecord | null> {
    const rows = await this.db
      .insert(popupLogs)
      .values({
        callId: input.callId,
        zohoUserId: input.targetUserId,
        extension: input.extension,
        payload: input.payload,
        status: 'pending',
      })
      .onConflictDoNothing({ target: [popupLogs.callId, popupLogs.zohoUserId] })
      .returning();
    return rows[0] ? toPopupRecord(rows[0]) : null;
  }

  async findByPair(callId: string, targetUserId: string): Promise<PopupRecord | null> {
    const rows = await this.db
      .select()
      .from(popupLogs)
      .where(and(eq(popupLogs.callId, callId), eq(popupLogs.zohoUserId, targetUserId)))
      .limit(1);
    return rows[0] ? toPopupRecord(rows[0]) : null;
  }

  async update(id: string, patch: PopupPatch): Promise<PopupRecord> {
    const rows = await this.db.update(popupLogs).set(patch).where(eq(popupLogs.id, id)).returning();
    if (!rows[0]) {
      throw new Error(`Popup ${id} not found`);
    }
    return toPopupRecord(rows[0]);
  }

  async listByCall(callId: string, status?: PopupStatus): Promise<PopupRecord[]> {
    const rows = await this.db
      .select()
      .from(popupLogs)
      .where(and(eq(popupLogs.callId, callId), status ? eq(popupLogs.status, status) : undefined))
      .orderBy(asc(popupLogs.sentAt));
    return rows.map(toPopupRecord);
  }

  async listRetryable(limit: number, maxRetries: number): Promise<PopupRecord[]> {
    const rows = await this.db
      .select()
      .from(popupLogs)
      .where(and(eq(popupLogs.status, 'retry'), lt(popupLogs.retryCount, maxRetries)))
      .orderBy(asc(popupLogs.sentAt))
      .limit(limit);
    return rows.map(toPopupRecord);
  }

  async summarize(since: Date | null): Promise<PopupSummary> {
    const window = since ? gte(popupLogs.sentAt, since) : undefined;

    const [grouped, timing] = await Promise.all([
      this.db
        .select({ status: popupLogs.status, total: count() })
        .from(popupLogs)
        .where(window)
        .groupBy(popupLogs.status),
      this.db
        .select({ average: avg(popupLogs.responseTimeMs) })
        .from(popupLogs)
        .where(and(window, isNotNull(popupLogs.responseTimeMs))),
    ]);

    const byStatus = emptyStatusCounts();
    let total = 0;
    for (const row of grouped) {
      byStatus[row.status] = row.total;
      total += row.total;
    }

    return {
      total,
      byStatus,
      averageResponseTimeMs: timing[0]?.average ? Number(timing[0].average) : 0,
    };
  }

  async deleteOlderThan(cutoff: Date): Promise<number> {
    const rows = await this.db
      .delete(popupLogs)
      .where(lt(popupLogs.sentAt, cutoff))
      .returning({ id: popupLogs.id });
    return rows.length;
  }
}

// =============================================================================
// Extensions
// =============================================================================

export class DrizzleExtensionDirectory implements ExtensionDirectory {
  constructor(private readonly db: Database) {}

  async activeBindings(extension: string): Promise<ExtensionBinding[]> {
    return this.db
      .select({
        extension: extensionMappings.extension,
        userId: extensionMappings.userId,
        zohoUserId: extensionMappings.zohoUserId,
      })
      .from(extensionMappings)
      .where(and(eq(extensionMappings.extension, extension), eq(extensionMappings.isActive, true)));
  }

  async countActive(): Promise<number> {
    const [row] = await this.db
      .select({ total: count() })
      .from(extensionMappings)
      .where(eq(extensionMappings.isActive, true));
    return row?.total ?? 0;
  }
}

// =============================================================================
// Zoho tokens
// =============================================================================

export class DrizzleZohoTokenRepository implements ZohoTokenRepository {
  constructor(private readonly db: Database) {}

  async findActive(zohoUserId?: string): Promise<StoredZohoToken | null> {
    const rows = await this.db
      .select({
        id: zohoTokens.id,
        zohoUserId: zohoTokens.zohoUserId,
        accessToken: zohoTokens.accessToken,
        refreshToken: zohoTokens.refreshToken,
        expiresAt: zohoTokens.expiresAt,
      })
      .from(zohoTokens)
      .where(and(eq(zohoTokens.isActive, true), zohoUserId ? eq(zohoTokens.zohoUserId, zohoUserId) : undefined))
      .orderBy(desc(zohoTokens.updatedAt))
      .limit(1);
    return rows[0] ?? null;
  }

  async save(id: string, refreshed: RefreshedToken): Promise<void> {
    await this.db
      .update(zohoTokens)
      .set({
        accessToken: refreshed.accessToken,
        expiresAt: refreshed.expiresAt,
        ...(refreshed.refreshToken ? { refreshToken: refreshed.refreshToken } : {}),
        ...(refreshed.apiDomain ? { apiDomain: refreshed.apiDomain } : {}),
        updatedAt: new Date(),
      })
      .where(eq(zohoTokens.id, id));
  }

  async countValid(now: Date): Promise<number> {
    const [row] = await this.db
      .select({ total: count() })
      .from(zohoTokens)
      .where(and(eq(zohoTokens.isActive, true), gt(zohoTokens.expiresAt, now)));
    return row?.total ?? 0;
  }
}

// =============================================================================
// Webhook log
// =============================================================================

export class DrizzleWebhookLogStore implements WebhookLogStore {
  constructor(private readonly db: Database) {}

  async record(eventType: string, payload: unknown): Promise<string> {
    const [row] = await this.db
      .insert(vitalpbxWebhookLogs)
      .values({ eventType: eventType.slice(0, 50), payload })
      .returning({ id: vitalpbxWebhookLogs.id });
    if (!row) {
      throw new Error('Webhook log insert returned no row');
    }
    return row.id;
  }

  async markProcessed(id: string): Promise<void> {
    await this.db
      .update(vitalpbxWebhookLogs)
      .set({ processed: true, processedAt: new Date(), errorMessage: null })
      .where(eq(vitalpbxWebhookLogs.id, id));
  }

  async markFailed(id: string, errorMessage: string): Promise<void> {
    await this.db
      .update(vitalpbxWebhookLogs)
      .set({ processed: false, errorMessage })
      .where(eq(vitalpbxWebhookLogs.id, id));
  }
}
