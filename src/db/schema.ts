import {
  pgTable,
  uuid,
  text,
  timestamp,
  boolean,
  integer,
  jsonb,
  varchar,
  pgEnum,
  index,
  uniqueIndex,
} from 'drizzle-orm/pg-core';
import type { ContactSnapshot, PopupPayload } from '@/lib/phonebridge/types';

// ═══════════════════════════════════════════════════════════════════════════
// ENUMS
// ═══════════════════════════════════════════════════════════════════════════

export const callDirectionEnum = pgEnum('call_direction', ['inbound', 'outbound']);

export const callStateEnum = pgEnum('call_state', [
  'initiated',
  'ringing',
  'connected',
  'completed',
  'failed',
  'busy',
  'no_answer',
]);

export const popupStatusEnum = pgEnum('popup_status', [
  'pending',
  'sent',
  'failed',
  'retry',
  'duplicate',
]);

// ═══════════════════════════════════════════════════════════════════════════
// ZOHO CREDENTIALS
// ═══════════════════════════════════════════════════════════════════════════

export const zohoTokens = pgTable('zoho_tokens', {
  id: uuid('id').primaryKey().defaultRandom(),
  userId: varchar('user_id', { length: 100 }).notNull(),
  zohoUserId: varchar('zoho_user_id', { length: 100 }),

  accessToken: text('access_token').notNull(),
  refreshToken: text('refresh_token').notNull(),
  expiresAt: timestamp('expires_at').notNull(),
  apiDomain: varchar('api_domain', { length: 200 }),

  isActive: boolean('is_active').default(true).notNull(),

  createdAt: timestamp('created_at').defaultNow().notNull(),
  updatedAt: timestamp('updated_at').defaultNow().notNull(),
}, (table) => [
  index('zoho_tokens_zoho_user_idx').on(table.zohoUserId),
  index('zoho_tokens_active_idx').on(table.isActive, table.expiresAt),
]);

// ═══════════════════════════════════════════════════════════════════════════
// EXTENSION MAPPINGS
// ═══════════════════════════════════════════════════════════════════════════

export const extensionMappings = pgTable('extension_mappings', {
  id: uuid('id').primaryKey().defaultRandom(),
  extension: varchar('extension', { length: 20 }).notNull(),
  userId: varchar('user_id', { length: 100 }).notNull(),
  zohoUserId: varchar('zoho_user_id', { length: 100 }),
  isActive: boolean('is_active').default(true).notNull(),

  createdAt: timestamp('created_at').defaultNow().notNull(),
  updatedAt: timestamp('updated_at').defaultNow().notNull(),
}, (table) => [
  index('extension_mappings_extension_idx').on(table.extension, table.isActive),
]);

// ═══════════════════════════════════════════════════════════════════════════
// CALLS
// ═══════════════════════════════════════════════════════════════════════════

export const callLogs = pgTable('call_logs', {
  id: uuid('id').primaryKey().defaultRandom(),

  // Provider call id (VitalPBX Uniqueid)
  callId: varchar('call_id', { length: 100 }).notNull(),
  extension: varchar('extension', { length: 20 }),
  direction: callDirectionEnum('direction').notNull(),
  state: callStateEnum('state').default('initiated').notNull(),

  // Phone Numbers
  callerNumber: varchar('caller_number', { length: 40 }).notNull().default(''),
  calledNumber: varchar('called_number', { length: 40 }).notNull().default(''),
  normalizedPhone: varchar('normalized_phone', { length: 40 }),

  // Enrichment
  contact: jsonb('contact').$type<ContactSnapshot>(),
  callHistoryCount: integer('call_history_count').default(0).notNull(),

  // Timing
  startTime: timestamp('start_time'),
  endTime: timestamp('end_time'),
  durationSeconds: integer('duration_seconds'),

  popupSent: boolean('popup_sent').default(false).notNull(),

  // Recording
  notes: text('notes').default('').notNull(),
  recordingUrl: text('recording_url'),

  createdAt: timestamp('created_at').defaultNow().notNull(),
  updatedAt: timestamp('updated_at').defaultNow().notNull(),
}, (table) => [
  uniqueIndex('call_logs_call_id_idx').on(table.callId),
  index('call_logs_phone_idx').on(table.normalizedPhone, table.state),
  index('call_logs_start_idx').on(table.startTime),
]);

// ═══════════════════════════════════════════════════════════════════════════
// POPUPS
// ═══════════════════════════════════════════════════════════════════════════

export const popupLogs = pgTable('popup_logs', {
  id: uuid('id').primaryKey().defaultRandom(),
  callId: varchar('call_id', { length: 100 }).notNull(),
  zohoUserId: varchar('zoho_user_id', { length: 100 }).notNull(),
  extension: varchar('extension', { length: 20 }),

  payload: jsonb('payload').$type<PopupPayload>().notNull(),
  status: popupStatusEnum('status').default('pending').notNull(),

  // Delivery
  sentAt: timestamp('sent_at').defaultNow().notNull(),
  responseTimeMs: integer('response_time_ms'),
  responseBody: text('response_body'),
  retryCount: integer('retry_count').default(0).notNull(),
  errorMessage: text('error_message'),
}, (table) => [
  uniqueIndex('popup_logs_call_user_idx').on(table.callId, table.zohoUserId),
  index('popup_logs_status_idx').on(table.status, table.sentAt),
]);

// ═══════════════════════════════════════════════════════════════════════════
// WEBHOOK LOG
// ═══════════════════════════════════════════════════════════════════════════

export const vitalpbxWebhookLogs = pgTable('vitalpbx_webhook_logs', {
  id: uuid('id').primaryKey().defaultRandom(),
  eventType: varchar('event_type', { length: 50 }).notNull(),
  payload: jsonb('payload').$type<unknown>().notNull(),
  processed: boolean('processed').default(false).notNull(),
  processedAt: timestamp('processed_at'),
  errorMessage: text('error_message'),
  createdAt: timestamp('created_at').defaultNow().notNull(),
}, (table) => [
  index('vitalpbx_webhook_logs_created_idx').on(table.createdAt),
]);

// Type exports
export type ZohoToken = typeof zohoTokens.$inferSelect;
export type ExtensionMapping = typeof extensionMappings.$inferSelect;
export type CallLog = typeof callLogs.$inferSelect;
export type NewCallLog = typeof callLogs.$inferInsert;
export type PopupLog = typeof popupLogs.$inferSelect;
export type VitalpbxWebhookLog = typeof vitalpbxWebhookLogs.$inferSelect;
