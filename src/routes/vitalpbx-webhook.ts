// API Route: /api/vitalpbx/webhook
// Receives call events from VitalPBX. Every delivery is logged first, then
// routed through the call state machine. The PBX always gets a 200 so that a
// processing failure never turns into a redelivery storm.

import { logger as rootLogger, type Logger } from '@/logger';
import { parsePbxEvent } from '@/lib/phonebridge/webhook-events';
import type { WebhookEventRouter } from '@/lib/phonebridge/webhook-router';
import type { WebhookLogStore } from '@/lib/phonebridge/stores';

const SUPPORTED_EVENTS = ['Newchannel', 'Dial', 'Bridge', 'Hangup', 'RecordStart', 'RecordStop'];

export interface VitalPbxWebhookDeps {
  router: Pick<WebhookEventRouter, 'process'>;
  webhookLogs: WebhookLogStore;
  webhookKey: string;
  logger?: Logger;
}

/**
 * Shared key via X-Api-Key, Authorization: Bearer, or ?key=.
 * An empty key disables the check.
 */
export function verifyWebhookAuth(request: Request, webhookKey: string): boolean {
  if (!webhookKey) return true;

  if (request.headers.get('X-Api-Key') === webhookKey) return true;

  const authHeader = request.headers.get('Authorization');
  if (authHeader) {
    const [type, token] = authHeader.split(' ');
    if (type === 'Bearer' && token === webhookKey) return true;
  }

  const { searchParams } = new URL(request.url);
  return searchParams.get('key') === webhookKey;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function received(webhookId: string | null): Response {
  return Response.json({ status: 'received', webhook_id: webhookId });
}

export function createVitalPbxWebhookRoute(deps: VitalPbxWebhookDeps) {
  const log = (deps.logger ?? rootLogger).child({ route: 'vitalpbx-webhook' });

  if (!deps.webhookKey) {
    log.warn('No webhook key configured - allowing all requests');
  }

  async function POST(request: Request): Promise<Response> {
    if (!verifyWebhookAuth(request, deps.webhookKey)) {
      log.warn('Unauthorized webhook request');
      return Response.json({ error: 'Unauthorized' }, { status: 401 });
    }

    const raw = await request.text();
    let body: unknown;
    try {
      body = JSON.parse(raw);
    } catch {
      log.warn({ bodyLength: raw.length }, 'Webhook body is not valid JSON');
      return received(null);
    }

    const parsed = parsePbxEvent(body);

    let webhookId: string | null = null;
    try {
      webhookId = await deps.webhookLogs.record(parsed.eventType, body);
    } catch (error) {
      // The event is still routed; only its log entry is lost
      log.error({ error: errorMessage(error), payload: body }, 'Failed to store webhook');
    }

    if (!parsed.ok) {
      log.warn({ webhookId, eventType: parsed.eventType, error: parsed.error }, 'Malformed webhook payload');
      await markFailed(webhookId, parsed.error, body);
      return received(webhookId);
    }

    try {
      const outcome = await deps.router.process(parsed.event);
      log.info({ webhookId, eventType: parsed.eventType, action: outcome.action }, 'Webhook processed');
    } catch (error) {
      // Full payload goes to the error log so the event can be replayed
      log.error(
        { webhookId, eventType: parsed.eventType, error: errorMessage(error), payload: body },
        'Webhook processing failed'
      );
      await markFailed(webhookId, errorMessage(error), body);
      return received(webhookId);
    }

    await markProcessed(webhookId);
    return received(webhookId);
  }

  async function markProcessed(webhookId: string | null): Promise<void> {
    if (!webhookId) return;
    try {
      await deps.webhookLogs.markProcessed(webhookId);
    } catch (error) {
      log.error({ webhookId, error: errorMessage(error) }, 'Failed to mark webhook log entry processed');
    }
  }

  async function markFailed(webhookId: string | null, message: string, payload: unknown): Promise<void> {
    if (!webhookId) return;
    try {
      await deps.webhookLogs.markFailed(webhookId, message);
    } catch (error) {
      log.error({ webhookId, error: errorMessage(error), payload }, 'Failed to flag webhook log entry');
    }
  }

  async function GET(): Promise<Response> {
    return Response.json({
      status: 'ok',
      endpoint: '/api/vitalpbx/webhook',
      method: 'POST',
      supportedEvents: SUPPORTED_EVENTS,
      authentication: deps.webhookKey ? 'required' : 'disabled',
    });
  }

  return { POST, GET };
}
