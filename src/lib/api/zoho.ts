// =============================================================================
// Zoho API Clients - CRM search, PhoneBridge popups, OAuth token refresh
// =============================================================================
// CRM search:  GET  {apiBase}/crm/v2/{Contacts|Leads}/search?phone=...
// Popups:      POST {apiBase}/phonebridge/v3/calls/popup
//              DELETE {apiBase}/phonebridge/v3/calls/{callId}/close
//              PATCH  {apiBase}/phonebridge/v3/calls/{callId}
// OAuth:       POST {accountsUrl}/oauth/v2/token (grant_type=refresh_token)
// =============================================================================

import { z } from 'zod';
import { logger } from '@/logger';
import type { ContactDirectory } from '@/lib/phonebridge/stores';
import type { ContactMatch, PopupPayload } from '@/lib/phonebridge/types';
import { parseJson, requestWithTimeout, type HttpResult } from './http';

// =============================================================================
// CRM Search
// =============================================================================

const SEARCH_MODULES = ['Contacts', 'Leads'] as const;

const crmRecordSchema = z
  .object({
    id: z.union([z.string(), z.number()]).transform(String),
    Full_Name: z.string().nullish(),
    First_Name: z.string().nullish(),
    Last_Name: z.string().nullish(),
    Email: z.string().nullish(),
    Phone: z.string().nullish(),
    Mobile: z.string().nullish(),
    Company: z.string().nullish(),
    Account_Name: z.object({ name: z.string().nullish() }).nullish(),
  })
  .passthrough();

const crmSearchResponseSchema = z.object({ data: z.array(crmRecordSchema).default([]) });

type CrmRecord = z.infer<typeof crmRecordSchema>;

function toContactMatch(record: CrmRecord, module: string): ContactMatch {
  const name =
    record.Full_Name || [record.First_Name, record.Last_Name].filter(Boolean).join(' ') || 'Unknown';
  return {
    id: record.id,
    name,
    company: record.Account_Name?.name || record.Company || '',
    email: record.Email || '',
    phone: record.Phone || record.Mobile || '',
    module,
  };
}

export class ZohoCrmClient implements ContactDirectory {
  constructor(
    private readonly apiBase: string,
    private readonly timeoutMs: number = 10_000
  ) {}

  /**
   * Searches Contacts, then Leads, for one phone format.
   * Throws on any failed response or transport error so the caller can skip enrichment.
   */
  async search(phone: string, accessToken: string): Promise<ContactMatch[]> {
    const matches: ContactMatch[] = [];

    for (const module of SEARCH_MODULES) {
      const url = `${this.apiBase}/crm/v2/${module}/search?phone=${encodeURIComponent(phone)}`;
      const result = await requestWithTimeout(
        url,
        { method: 'GET', headers: { Authorization: `Zoho-oauthtoken ${accessToken}` } },
        this.timeoutMs
      );

      if (result.status === 204) continue;
      if (!result.ok) {
        throw new Error(`Zoho CRM ${module} search failed: ${result.error}`);
      }

      const parsed = crmSearchResponseSchema.safeParse(parseJson(result.body));
      if (!parsed.success) {
        logger.warn({ module, phone }, 'Zoho CRM search returned an unexpected body');
        continue;
      }
      matches.push(...parsed.data.data.map((record) => toContactMatch(record, module)));
    }

    return matches;
  }
}

// =============================================================================
// PhoneBridge Popups
// =============================================================================

export interface PhoneBridgeApi {
  sendPopup(accessToken: string, payload: PopupPayload): Promise<HttpResult>;
  closePopup(accessToken: string, callId: string): Promise<HttpResult>;
  updatePopup(accessToken: string, callId: string, data: Record<string, unknown>): Promise<HttpResult>;
}

export class ZohoPhoneBridgeClient implements PhoneBridgeApi {
  private readonly baseUrl: string;

  constructor(apiBase: string, private readonly timeoutMs: number) {
    this.baseUrl = `${apiBase}/phonebridge/v3`;
  }

  private headers(accessToken: string): Record<string, string> {
    return {
      Authorization: `Bearer ${accessToken}`,
      'Content-Type': 'application/json',
      Accept: 'application/json',
    };
  }

  sendPopup(accessToken: string, payload: PopupPayload): Promise<HttpResult> {
    return requestWithTimeout(
      `${this.baseUrl}/calls/popup`,
      { method: 'POST', headers: this.headers(accessToken), body: JSON.stringify(payload) },
      this.timeoutMs
    );
  }

  closePopup(accessToken: string, callId: string): Promise<HttpResult> {
    return requestWithTimeout(
      `${this.baseUrl}/calls/${encodeURIComponent(callId)}/close`,
      { method: 'DELETE', headers: this.headers(accessToken) },
      this.timeoutMs
    );
  }

  updatePopup(accessToken: string, callId: string, data: Record<string, unknown>): Promise<HttpResult> {
    return requestWithTimeout(
      `${this.baseUrl}/calls/${encodeURIComponent(callId)}`,
      { method: 'PATCH', headers: this.headers(accessToken), body: JSON.stringify(data) },
      this.timeoutMs
    );
  }
}

// =============================================================================
// OAuth Refresh
// =============================================================================

const tokenResponseSchema = z.object({
  access_token: z.string(),
  expires_in: z.number().default(3600),
  api_domain: z.string().optional(),
  refresh_token: z.string().optional(),
});

export interface RefreshedToken {
  accessToken: string;
  expiresAt: Date;
  refreshToken?: string;
  apiDomain?: string;
}

export class ZohoOAuthClient {
  constructor(
    private readonly clientId: string,
    private readonly clientSecret: string,
    private readonly timeoutMs: number = 30_000
  ) {}

  /** Throws when Zoho rejects the refresh token. */
  async refreshAccessToken(refreshToken: string, accountsUrl: string): Promise<RefreshedToken> {
    const body = new URLSearchParams({
      grant_type: 'refresh_token',
      client_id: this.clientId,
      client_secret: this.clientSecret,
      refresh_token: refreshToken,
    });

    const result = await requestWithTimeout(
      `${accountsUrl.replace(/\/$/, '')}/oauth/v2/token`,
      {
        method: 'POST',
        headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
        body: body.toString(),
      },
      this.timeoutMs
    );

    if (!result.ok) {
      throw new Error(`Zoho token refresh failed: ${result.error}`);
    }

    // Zoho answers 200 with { error: "invalid_code" } for rejected tokens
    const parsed = tokenResponseSchema.safeParse(parseJson(result.body));
    if (!parsed.success) {
      throw new Error(`Zoho token refresh returned no access token: ${result.body}`);
    }

    return {
      accessToken: parsed.data.access_token,
      expiresAt: new Date(Date.now() + parsed.data.expires_in * 1000),
      refreshToken: parsed.data.refresh_token,
      apiDomain: parsed.data.api_domain,
    };
  }
}
