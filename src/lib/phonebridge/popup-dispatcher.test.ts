import { beforeEach, describe, expect, it } from 'vitest';
import {
  FakePhoneBridgeApi,
  httpError,
  httpOk,
  MemoryCallStore,
  MemoryExtensionDirectory,
  MemoryPopupStore,
  StaticTokenProvider,
} from '@/test/memory-stores';
import { CallRegistry } from './call-registry';
import { PopupDispatcher } from './popup-dispatcher';
import { buildPopupPayload } from './popup-payload';
import type { TokenProvider } from './stores';
import type { CallRecord, ExtensionBinding } from './types';

const START = new Date('2026-03-02T09:00:00Z');

let clock: Date;
let popups: MemoryPopupStore;
let calls: MemoryCallStore;
let registry: CallRegistry;
let api: FakePhoneBridgeApi;
let call: CallRecord;

class FlakyTokenProvider implements TokenProvider {
  constructor(private failuresLeft: number) {}

  async getAccessToken(): Promise<string | null> {
    if (this.failuresLeft > 0) {
      this.failuresLeft--;
      throw new Error('token store unavailable');
    }
    return 'test-token';
  }

  async countValid(): Promise<number> {
    return 1;
  }
}

function createDispatcher(
  options: { token?: string | null; tokens?: TokenProvider; bindings?: ExtensionBinding[] } = {}
) {
  return new PopupDispatcher(
    popups,
    registry,
    api,
    options.tokens ?? new StaticTokenProvider(options.token === undefined ? 'test-token' : options.token),
    new MemoryExtensionDirectory(options.bindings ?? []),
    { maxRetries: 3, retryBatchSize: 10, popupEnabled: true, now: () => clock }
  );
}

beforeEach(async () => {
  clock = START;
  popups = new MemoryPopupStore(() => clock);
  calls = new MemoryCallStore();
  registry = new CallRegistry(calls);
  api = new FakePhoneBridgeApi();

  const { record } = await registry.getOrCreate('C1', {
    extension: '101',
    direction: 'inbound',
    callerNumber: '0712345678',
    calledNumber: '101',
    startTime: START,
  });
  call = record;
});

describe('PopupDispatcher.dispatch', () => {
  it('sends the popup and marks the call', async () => {
    const dispatcher = createDispatcher();

    const popup = await dispatcher.dispatch(call, 'zu1');

    expect(popup.status).toBe('sent');
    expect(popup.responseTimeMs).toBe(120);
    expect(popup.responseBody).toBe('{"status":"success"}');
    expect(api.sent).toHaveLength(1);
    expect(api.sent[0]?.accessToken).toBe('test-token');
    expect(api.sent[0]?.payload.user).toEqual({ id: 'zu1' });
    expect((await registry.find('C1'))?.popupSent).toBe(true);
  });

  it('never sends twice for the same call and user', async () => {
    const dispatcher = createDispatcher();

    const first = await dispatcher.dispatch(call, 'zu1');
    const second = await dispatcher.dispatch(call, 'zu1');

    expect(api.sent).toHaveLength(1);
    expect(second.id).toBe(first.id);
    expect(second.status).toBe('sent');
    expect(popups.popups).toHaveLength(1);
  });

  it('parks the popup for retry when the token lookup throws', async () => {
    const dispatcher = createDispatcher({ tokens: new FlakyTokenProvider(1) });

    const popup = await dispatcher.dispatch(call, 'zu1');

    expect(popup).toMatchObject({ status: 'retry', retryCount: 1, errorMessage: 'token store unavailable' });
    expect(api.sent).toHaveLength(0);

    expect(await dispatcher.retrySweep()).toEqual({ attempted: 1, succeeded: 1, failed: 0 });
    expect(api.sent).toHaveLength(1);
    expect(popups.popups[0]).toMatchObject({ status: 'sent', retryCount: 2 });
  });

  it('fails the popup once thrown errors exhaust the retries', async () => {
    const dispatcher = createDispatcher({ tokens: new FlakyTokenProvider(5) });

    await dispatcher.dispatch(call, 'zu1');
    await dispatcher.retrySweep();
    await dispatcher.retrySweep();

    expect(popups.popups[0]).toMatchObject({ status: 'failed', retryCount: 3 });
    expect(await dispatcher.retrySweep()).toEqual({ attempted: 0, succeeded: 0, failed: 0 });
  });

  it('reports an in-flight popup as a duplicate without changing it', async () => {
    const dispatcher = createDispatcher();
    const pending = await popups.insertPending({
      callId: 'C1',
      targetUserId: 'zu1',
      extension: '101',
      payload: buildPopupPayload(call, 'zu1'),
    });

    const result = await dispatcher.dispatch(call, 'zu1');

    expect(result.status).toBe('duplicate');
    expect(result.id).toBe(pending?.id);
    expect(popups.popups[0]?.status).toBe('pending');
    expect(api.sent).toHaveLength(0);
  });

  it('parks a 503 for retry and fails it after three attempts', async () => {
    const dispatcher = createDispatcher();
    api.sendResults = [
      httpError(503, 'Service Unavailable'),
      httpError(503, 'Service Unavailable'),
      httpError(503, 'Service Unavailable'),
    ];

    const popup = await dispatcher.dispatch(call, 'zu1');
    expect(popup.status).toBe('retry');
    expect(popup.retryCount).toBe(1);
    expect(popup.errorMessage).toBe('HTTP 503: Service Unavailable');

    expect(await dispatcher.retrySweep()).toEqual({ attempted: 1, succeeded: 0, failed: 1 });
    expect(popups.popups[0]).toMatchObject({ status: 'retry', retryCount: 2 });

    expect(await dispatcher.retrySweep()).toEqual({ attempted: 1, succeeded: 0, failed: 1 });
    expect(popups.popups[0]).toMatchObject({ status: 'failed', retryCount: 3 });

    expect(await dispatcher.retrySweep()).toEqual({ attempted: 0, succeeded: 0, failed: 0 });
    expect(api.sent).toHaveLength(3);
  });

  it('treats timeouts and 429 as transient', async () => {
    const dispatcher = createDispatcher();
    api.sendResults = [httpError(null), httpError(429, 'slow down')];

    expect((await dispatcher.dispatch(call, 'zu1')).status).toBe('retry');
    expect((await dispatcher.dispatch(call, 'zu2')).status).toBe('retry');
  });

  it('fails permanent errors immediately', async () => {
    const dispatcher = createDispatcher();
    api.sendResults = [httpError(400, 'bad payload')];

    const popup = await dispatcher.dispatch(call, 'zu1');

    expect(popup).toMatchObject({ status: 'failed', retryCount: 1, errorMessage: 'HTTP 400: bad payload' });
    expect(await dispatcher.retrySweep()).toEqual({ attempted: 0, succeeded: 0, failed: 0 });
  });

  it('fails without calling the API when no token is available', async () => {
    const dispatcher = createDispatcher({ token: null });

    const popup = await dispatcher.dispatch(call, 'zu1');

    expect(popup).toMatchObject({ status: 'failed', retryCount: 0, errorMessage: 'No valid access token available' });
    expect(api.sent).toHaveLength(0);
  });
});

describe('PopupDispatcher.retrySweep', () => {
  it('counts the sweep attempt even when it succeeds', async () => {
    const dispatcher = createDispatcher();
    api.sendResults = [httpError(502, 'Bad Gateway')];
    await dispatcher.dispatch(call, 'zu1');

    expect(await dispatcher.retrySweep()).toEqual({ attempted: 1, succeeded: 1, failed: 0 });
    expect(popups.popups[0]).toMatchObject({ status: 'sent', retryCount: 2, errorMessage: null });
    expect((await registry.find('C1'))?.popupSent).toBe(true);
  });

  it('takes at most one batch', async () => {
    const dispatcher = new PopupDispatcher(
      popups,
      registry,
      api,
      new StaticTokenProvider(),
      new MemoryExtensionDirectory(),
      { maxRetries: 3, retryBatchSize: 2, popupEnabled: true, now: () => clock }
    );
    api.sendResults = [httpError(500), httpError(500), httpError(500)];
    for (const user of ['zu1', 'zu2', 'zu3']) {
      await dispatcher.dispatch(call, user);
    }

    expect((await dispatcher.retrySweep()).attempted).toBe(2);
  });
});

describe('PopupDispatcher.close / update', () => {
  it('treats 404 as already closed', async () => {
    const dispatcher = createDispatcher();
    api.closeResult = httpError(404, 'not found');
    expect(await dispatcher.close('C1', 'zu1')).toBe(true);
  });

  it('reports other close failures without throwing', async () => {
    const dispatcher = createDispatcher();
    api.closeResult = httpError(500, 'boom');
    expect(await dispatcher.close('C1', 'zu1')).toBe(false);
  });

  it('closes every sent popup for a call', async () => {
    const dispatcher = createDispatcher();
    api.sendResults = [httpOk(), httpOk(), httpError(400, 'bad')];
    for (const user of ['zu1', 'zu2', 'zu3']) {
      await dispatcher.dispatch(call, user);
    }

    expect(await dispatcher.closeAllForCall('C1')).toBe(2);
    expect(api.closed).toEqual([
      { accessToken: 'test-token', callId: 'C1' },
      { accessToken: 'test-token', callId: 'C1' },
    ]);
  });

  it('patches popup data', async () => {
    const dispatcher = createDispatcher();
    expect(await dispatcher.update('C1', 'zu1', { status: 'connected' })).toBe(true);
    expect(api.updated).toEqual([{ accessToken: 'test-token', callId: 'C1', data: { status: 'connected' } }]);
  });

  it('does not update without a token', async () => {
    const dispatcher = createDispatcher({ token: null });
    expect(await dispatcher.update('C1', 'zu1', { status: 'connected' })).toBe(false);
    expect(api.updated).toHaveLength(0);
  });
});

describe('PopupDispatcher reporting', () => {
  async function seedThreePopups(dispatcher: PopupDispatcher) {
    api.sendResults = [httpOk('{}', 100), httpOk('{}', 200), httpError(400, 'bad', 300)];
    for (const user of ['zu1', 'zu2', 'zu3']) {
      await dispatcher.dispatch(call, user);
    }
  }

  it('computes statistics for the window', async () => {
    const dispatcher = createDispatcher();
    await seedThreePopups(dispatcher);

    const stats = await dispatcher.statistics(24);

    expect(stats.total).toBe(3);
    expect(stats.byStatus).toEqual({ pending: 0, sent: 2, failed: 1, retry: 0, duplicate: 0 });
    expect(stats.averageResponseTimeMs).toBe(200);
    expect(stats.successRate).toBeCloseTo(66.67, 1);
    expect(stats.hours).toBe(24);
  });

  it('excludes popups outside the window', async () => {
    const dispatcher = createDispatcher();
    await seedThreePopups(dispatcher);
    clock = new Date(START.getTime() + 2 * 60 * 60 * 1000);

    expect((await dispatcher.statistics(1)).total).toBe(0);
    expect((await dispatcher.statistics(24)).total).toBe(3);
  });

  it('builds a health report with recommendations', async () => {
    const dispatcher = createDispatcher();
    await seedThreePopups(dispatcher);

    const report = await dispatcher.healthReport();

    expect(report.timestamp).toBe('2026-03-02T09:00:00.000Z');
    expect(report.configuration).toEqual({ activeExtensionMappings: 0, validZohoTokens: 1, popupEnabled: true });
    expect(report.queueStatus).toEqual({ pending: 0, failed: 1, retry: 0 });
    expect(report.statistics.lastWeek.total).toBe(3);
    expect(report.recommendations).toEqual([
      'No active extension mappings - configure user extensions',
      'Low popup success rate - investigate API issues',
    ]);
  });

  it('has no recommendations when everything is healthy', async () => {
    const dispatcher = createDispatcher({ bindings: [{ extension: '101', userId: 'u1', zohoUserId: 'zu1' }] });
    await dispatcher.dispatch(call, 'zu1');

    expect((await dispatcher.healthReport()).recommendations).toEqual([]);
  });

  it('deletes popups past the retention window', async () => {
    const dispatcher = createDispatcher();
    await dispatcher.dispatch(call, 'zu1');
    clock = new Date(START.getTime() + 40 * 24 * 60 * 60 * 1000);
    await dispatcher.dispatch(call, 'zu2');

    expect(await dispatcher.cleanup(30)).toBe(1);
    expect(popups.popups.map((p) => p.targetUserId)).toEqual(['zu2']);
  });
});
