/**
 * Configuration Module
 *
 * Centralizes all environment configuration with validation. Components never
 * read process.env themselves; they receive the structs built here.
 */

import type { CountryName } from '@/lib/phone/normalizer';

export interface PhoneBridgeSettings {
  popupEnabled: boolean;
  popupTimeoutMs: number;
  maxPopupRetries: number;
  retryBatchSize: number;
  popupRetentionDays: number;
  defaultCountry: CountryName;
  includeCallHistory: boolean;
  zohoApiBase: string;
  zohoAccountsUrl: string;
}

export interface VitalPbxSettings {
  apiBase: string;
  apiKey: string;
  tenant: string;
  timeoutMs: number;
}

type Env = Record<string, string | undefined>;

export function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value.trim() === '') return fallback;
  const normalized = value.trim().toLowerCase();
  if (['true', '1', 'yes', 'on'].includes(normalized)) return true;
  if (['false', '0', 'no', 'off'].includes(normalized)) return false;
  return fallback;
}

export function parseInteger(value: string | undefined, fallback: number): number {
  if (value === undefined) return fallback;
  const parsed = parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

const COUNTRIES: readonly CountryName[] = ['kenya', 'us', 'uk'];

function parseCountry(value: string | undefined): CountryName {
  const lowered = value?.trim().toLowerCase();
  return COUNTRIES.find((c) => c === lowered) ?? 'kenya';
}

export function loadPhoneBridgeSettings(env: Env = process.env): PhoneBridgeSettings {
  return {
    popupEnabled: parseBoolean(env.POPUP_ENABLED, true),
    popupTimeoutMs: parseInteger(env.POPUP_TIMEOUT_SECONDS, 10) * 1000,
    maxPopupRetries: parseInteger(env.MAX_POPUP_RETRIES, 3),
    retryBatchSize: parseInteger(env.POPUP_RETRY_BATCH_SIZE, 10),
    popupRetentionDays: parseInteger(env.POPUP_RETENTION_DAYS, 30),
    defaultCountry: parseCountry(env.PHONE_DEFAULT_COUNTRY),
    includeCallHistory: parseBoolean(env.INCLUDE_CALL_HISTORY, true),
    zohoApiBase: (env.ZOHO_API_BASE || 'https://www.zohoapis.com').replace(/\/$/, ''),
    zohoAccountsUrl: (env.ZOHO_ACCOUNTS_URL || 'https://accounts.zoho.com').replace(/\/$/, ''),
  };
}

export function loadVitalPbxSettings(env: Env = process.env): VitalPbxSettings {
  return {
    apiBase: (env.VITALPBX_API_BASE || '').replace(/\/$/, ''),
    apiKey: env.VITALPBX_API_KEY || '',
    tenant: env.VITALPBX_TENANT || '',
    timeoutMs: parseInteger(env.CALL_TIMEOUT_SECONDS, 30) * 1000,
  };
}

export const config = {
  databaseUrl: process.env.DATABASE_URL || '',
  redisUrl: process.env.REDIS_URL || '',
  webhookKey: process.env.WEBHOOK_API_KEY || '',
  zoho: {
    clientId: process.env.ZOHO_CLIENT_ID || '',
    clientSecret: process.env.ZOHO_CLIENT_SECRET || '',
  },
  port: parseInteger(process.env.PORT, 3001),
  logLevel: process.env.LOG_LEVEL || 'info',
  nodeEnv: process.env.NODE_ENV || 'development',
} as const;

/**
 * Validate all required environment variables are present.
 * Called on startup to fail fast if misconfigured.
 */
export function validateConfig(env: Env = process.env): void {
  const required = ['DATABASE_URL', 'REDIS_URL', 'VITALPBX_API_BASE'];

  const missing = required.filter((key) => !env[key]);

  if (missing.length > 0) {
    throw new Error(`Missing required environment variables: ${missing.join(', ')}`);
  }
}
