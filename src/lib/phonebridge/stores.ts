// Persistence and credential seams. Drizzle implementations live in
// drizzle-stores.ts; tests use the in-memory ones under src/test.

import type {
  CallRecord,
  ContactMatch,
  ExtensionBinding,
  NewPopupRecord,
  PopupPatch,
  PopupRecord,
  PopupStatus,
  PopupSummary,
} from './types';

export interface CallStore {
  /** Insert unless a row with the same callId exists. Returns null on conflict. */
  insertIfAbsent(record: CallRecord): Promise<CallRecord | null>;
  findByCallId(callId: string): Promise<CallRecord | null>;
  /**
   * Atomic read-modify-write of one call. Returns null when the call does not
   * exist; `mutate` is never invoked in that case.
   */
  update(callId: string, mutate: (current: CallRecord) => CallRecord): Promise<CallRecord | null>;
  countCompletedByPhone(normalizedPhone: string): Promise<number>;
}

export interface PopupStore {
  /** Returns null when a popup for (callId, targetUserId) already exists. */
  insertPending(input: NewPopupRecord): Promise<PopupRecord | null>;
  findByPair(callId: string, targetUserId: string): Promise<PopupRecord | null>;
  update(id: string, patch: PopupPatch): Promise<PopupRecord>;
  listByCall(callId: string, status?: PopupStatus): Promise<PopupRecord[]>;
  /** Oldest first. */
  listRetryable(limit: number, maxRetries: number): Promise<PopupRecord[]>;
  summarize(since: Date | null): Promise<PopupSummary>;
  deleteOlderThan(cutoff: Date): Promise<number>;
}

export interface ExtensionDirectory {
  activeBindings(extension: string): Promise<ExtensionBinding[]>;
  countActive(): Promise<number>;
}

export interface TokenProvider {
  /** A valid access token for the Zoho user, or any valid token when none is bound. */
  getAccessToken(zohoUserId?: string): Promise<string | null>;
  countValid(): Promise<number>;
}

export interface ContactDirectory {
  /** Throws on authentication or transport failure. */
  search(phone: string, accessToken: string): Promise<ContactMatch[]>;
}

export interface WebhookLogStore {
  record(eventType: string, payload: unknown): Promise<string>;
  markProcessed(id: string): Promise<void>;
  markFailed(id: string, errorMessage: string): Promise<void>;
}
