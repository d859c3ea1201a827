// =============================================================================
// VitalPBX API Client - Call Control
// =============================================================================
// REST v2 API with "app-key" header authentication. Multi-tenant installs
// take a ?tenant= query parameter on every request.
// =============================================================================

import { logger } from '@/logger';
import type { VitalPbxSettings } from '@/config';
import { parseJson, requestWithTimeout, type HttpResult } from './http';

// =============================================================================
// Types
// =============================================================================

export interface OriginateResult {
  success: boolean;
  callId?: string;
  error?: string;
}

export interface HangupResult {
  success: boolean;
  callId: string;
  error?: string;
}

export interface CallStatusResult {
  success: boolean;
  status?: unknown;
  error?: string;
}

export interface ExtensionsResult {
  success: boolean;
  extensions: unknown[];
  error?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function describeFailure(result: HttpResult): string {
  return result.status === null ? result.error ?? 'No response' : `HTTP ${result.status}`;
}

// =============================================================================
// VitalPBX Client
// =============================================================================

export class VitalPbxClient {
  constructor(
    private readonly settings: VitalPbxSettings,
    private readonly now: () => Date = () => new Date()
  ) {}

  private request(endpoint: string, method: 'GET' | 'POST', data?: Record<string, unknown>): Promise<HttpResult> {
    const url = new URL(`${this.settings.apiBase}/v2/${endpoint.replace(/^\//, '')}`);
    if (this.settings.tenant) {
      url.searchParams.set('tenant', this.settings.tenant);
    }

    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      Accept: 'application/json',
      'User-Agent': 'PhoneBridge/1.0',
    };
    if (this.settings.apiKey) {
      headers['app-key'] = this.settings.apiKey;
    }

    logger.debug({ method, url: url.toString() }, 'VitalPBX request');

    return requestWithTimeout(
      url.toString(),
      { method, headers, body: data ? JSON.stringify(data) : undefined },
      this.settings.timeoutMs
    );
  }

  /** Click-to-call: rings the extension, then dials the destination. */
  async originate(extension: string, destination: string, callerId?: string): Promise<OriginateResult> {
    const actionId = `call_${this.now().getTime()}`;

    const result = await this.request('originate', 'POST', {
      Channel: `PJSIP/${extension}`,
      Context: 'from-internal',
      Exten: destination,
      Priority: 1,
      Timeout: this.settings.timeoutMs,
      CallerID: callerId || extension,
      Async: true,
      ActionID: actionId,
    });

    if (!result.ok) {
      logger.error({ extension, destination, error: result.error }, 'Call origination failed');
      return { success: false, error: `Call origination failed: ${describeFailure(result)}` };
    }

    // The PBX may answer with an empty or non-JSON body; the ActionID still tracks the call
    const body = parseJson(result.body);
    const callId = isRecord(body) && typeof body.ActionID === 'string' ? body.ActionID : actionId;

    logger.info({ extension, destination, callId }, 'Call originated');
    return { success: true, callId };
  }

  async hangup(callId: string): Promise<HangupResult> {
    const result = await this.request(`calls/${encodeURIComponent(callId)}/hangup`, 'POST');

    if (!result.ok) {
      logger.error({ callId, error: result.error }, 'Call hangup failed');
      return { success: false, callId, error: `Failed to hangup call: ${describeFailure(result)}` };
    }
    return { success: true, callId };
  }

  async getCallStatus(callId: string): Promise<CallStatusResult> {
    const result = await this.request(`calls/${encodeURIComponent(callId)}`, 'GET');

    if (!result.ok) {
      return { success: false, error: `Failed to get call status: ${describeFailure(result)}` };
    }

    const status = parseJson(result.body);
    if (status === null) {
      return { success: false, error: 'Invalid JSON response' };
    }
    return { success: true, status };
  }

  async getExtensions(): Promise<ExtensionsResult> {
    const result = await this.request('extensions', 'GET');

    if (!result.ok) {
      return { success: false, extensions: [], error: `Failed to get extensions: ${describeFailure(result)}` };
    }

    const body = parseJson(result.body);
    const data = isRecord(body) && Array.isArray(body.data) ? body.data : [];
    return { success: true, extensions: data };
  }
}
