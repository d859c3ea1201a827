import { beforeEach, describe, expect, it } from 'vitest';
import type { PhoneBridgeSettings } from '@/config';
import {
  FakeContactDirectory,
  FakePhoneBridgeApi,
  MemoryCallStore,
  MemoryExtensionDirectory,
  MemoryPopupStore,
  StaticTokenProvider,
} from '@/test/memory-stores';
import { createPhoneBridge } from './index';
import type { ExtensionBinding, CallRecord } from './types';
import { parsePbxEvent, type PbxEvent } from './webhook-events';

const START = new Date('2026-03-02T09:00:00Z');

const baseSettings: PhoneBridgeSettings = {
  popupEnabled: true,
  popupTimeoutMs: 10_000,
  maxPopupRetries: 3,
  retryBatchSize: 10,
  popupRetentionDays: 30,
  defaultCountry: 'kenya',
  includeCallHistory: true,
  zohoApiBase: 'https://crm.test',
  zohoAccountsUrl: 'https://accounts.test',
};

function event(body: Record<string, unknown>): PbxEvent {
  const parsed = parsePbxEvent(body);
  if (!parsed.ok) throw new Error(parsed.error);
  return parsed.event;
}

const newChannel = (overrides: Record<string, unknown> = {}) =>
  event({
    Event: 'Newchannel',
    Uniqueid: 'C1',
    Channel: 'PJSIP/101-1',
    Context: 'from-pstn',
    CallerIDNum: '0712345678',
    Exten: 's',
    ...overrides,
  });

let clock: Date;
let calls: MemoryCallStore;
let popups: MemoryPopupStore;
let api: FakePhoneBridgeApi;
let directory: FakeContactDirectory;

function setup(
  options: {
    bindings?: ExtensionBinding[];
    settings?: Partial<PhoneBridgeSettings>;
  } = {}
) {
  return createPhoneBridge({
    calls,
    popups,
    extensions: new MemoryExtensionDirectory(options.bindings ?? [{ extension: '101', userId: 'U1', zohoUserId: 'zu1' }]),
    tokens: new StaticTokenProvider(),
    contacts: directory,
    popupApi: api,
    settings: { ...baseSettings, ...options.settings },
    now: () => clock,
  });
}

function storedCall(callId: string): CallRecord | undefined {
  return calls.calls.get(callId);
}

beforeEach(() => {
  clock = START;
  calls = new MemoryCallStore();
  popups = new MemoryPopupStore(() => clock);
  api = new FakePhoneBridgeApi();
  directory = new FakeContactDirectory({
    '+254712345678': [
      { id: 'z-1', name: 'Jane Wanjiku', company: 'Acme Ltd', email: 'jane@example.com', phone: '0712345678', module: 'Contacts' },
    ],
  });
});

describe('WebhookEventRouter', () => {
  it('creates, enriches and pops up a new inbound call', async () => {
    const { router } = setup();

    const outcome = await router.process(newChannel());

    expect(outcome).toEqual({ action: 'created', callId: 'C1', state: 'initiated', popupsDispatched: 1 });
    expect(storedCall('C1')).toMatchObject({
      direction: 'inbound',
      extension: '101',
      callerNumber: '0712345678',
      normalizedPhone: '+254712345678',
      state: 'initiated',
      popupSent: true,
      startTime: START,
    });
    expect(storedCall('C1')?.contact?.name).toBe('Jane Wanjiku');
    expect(popups.popups.map((p) => [p.callId, p.targetUserId, p.status])).toEqual([['C1', 'zu1', 'sent']]);
    expect(api.sent[0]?.payload.contact.name).toBe('Jane Wanjiku');
  });

  it('ignores a redelivered Newchannel', async () => {
    const { router } = setup();
    await router.process(newChannel());

    const outcome = await router.process(newChannel());

    expect(outcome).toEqual({ action: 'already_exists', callId: 'C1', state: 'initiated' });
    expect(calls.calls.size).toBe(1);
    expect(api.sent).toHaveLength(1);
    expect(directory.searches).toEqual(['+254712345678']);
  });

  it('runs the lifecycle to completion and closes popups', async () => {
    const { router } = setup();
    await router.process(newChannel());

    expect(await router.process(event({ Event: 'Dial', Uniqueid: 'C1' }))).toMatchObject({ state: 'ringing' });
    expect(await router.process(event({ Event: 'Bridge', Uniqueid: 'C1' }))).toMatchObject({ state: 'connected' });

    clock = new Date(START.getTime() + 95_000);
    const outcome = await router.process(event({ Event: 'Hangup', Uniqueid: 'C1', HangupCause: '16' }));

    expect(outcome).toEqual({ action: 'transitioned', callId: 'C1', state: 'completed' });
    expect(storedCall('C1')).toMatchObject({ state: 'completed', endTime: clock, durationSeconds: 95 });
    expect(api.closed).toEqual([{ accessToken: 'test-token', callId: 'C1' }]);
  });

  it('maps hangup causes to terminal states', async () => {
    const { router } = setup();
    await router.process(newChannel());

    await router.process(event({ Event: 'Hangup', Uniqueid: 'C1', HangupCause: '17' }));

    expect(storedCall('C1')?.state).toBe('busy');
  });

  it('keeps the first terminal state but refreshes the end time', async () => {
    const { router } = setup();
    await router.process(newChannel());
    await router.process(event({ Event: 'Hangup', Uniqueid: 'C1', HangupCause: '21' }));

    clock = new Date(START.getTime() + 10_000);
    await router.process(event({ Event: 'Hangup', Uniqueid: 'C1', HangupCause: '16' }));

    expect(storedCall('C1')).toMatchObject({ state: 'failed', durationSeconds: 10 });
  });

  it('does not regress on out-of-order events', async () => {
    const { router } = setup();
    await router.process(newChannel());
    await router.process(event({ Event: 'Bridge', Uniqueid: 'C1' }));

    const outcome = await router.process(event({ Event: 'Dial', Uniqueid: 'C1' }));

    expect(outcome.state).toBe('connected');
  });

  it('ignores events for unknown calls', async () => {
    const { router } = setup();

    const outcome = await router.process(event({ Event: 'Hangup', Uniqueid: 'C99', HangupCause: '16' }));

    expect(outcome).toEqual({ action: 'unknown_call', callId: 'C99' });
    expect(calls.calls.size).toBe(0);
  });

  it('tracks calls without an extension but skips enrichment and popups', async () => {
    const { router } = setup();

    const outcome = await router.process(newChannel({ Channel: 'PJSIP/trunk-abc-00000001' }));

    expect(outcome).toEqual({ action: 'created', callId: 'C1', state: 'initiated', popupsDispatched: 0 });
    expect(storedCall('C1')).toMatchObject({ extension: null, normalizedPhone: null, calledNumber: 's' });
    expect(directory.searches).toEqual([]);
    expect(api.sent).toHaveLength(0);
  });

  it('skips bindings without a Zoho user id', async () => {
    const { router } = setup({
      bindings: [
        { extension: '101', userId: 'U1', zohoUserId: null },
        { extension: '101', userId: 'U2', zohoUserId: 'zu2' },
      ],
    });

    const outcome = await router.process(newChannel());

    expect(outcome.popupsDispatched).toBe(1);
    expect(api.sent.map((s) => s.payload.user.id)).toEqual(['zu2']);
  });

  it('enriches but does not pop up when popups are disabled', async () => {
    const { router } = setup({ settings: { popupEnabled: false } });

    await router.process(newChannel());

    expect(storedCall('C1')?.normalizedPhone).toBe('+254712345678');
    expect(storedCall('C1')?.popupSent).toBe(false);
    expect(api.sent).toHaveLength(0);
  });

  it('still pops up an unknown caller when the CRM is down', async () => {
    directory.failure = new Error('Zoho CRM Contacts search failed: Request timeout after 10000ms');
    const { router } = setup();

    const outcome = await router.process(newChannel());

    expect(outcome.action).toBe('created');
    expect(storedCall('C1')?.contact).toBeNull();
    expect(api.sent[0]?.payload.contact.name).toBe('Unknown Caller');
  });

  it('records the call even when popup dispatch throws', async () => {
    popups = new (class extends MemoryPopupStore {
      override async insertPending(): Promise<null> {
        throw new Error('popup_logs unavailable');
      }
    })(() => clock);
    const { router } = setup();

    const outcome = await router.process(newChannel());

    expect(outcome).toEqual({ action: 'created', callId: 'C1', state: 'initiated', popupsDispatched: 0 });
    expect(storedCall('C1')?.state).toBe('initiated');
  });

  it('propagates call persistence failures', async () => {
    calls = new (class extends MemoryCallStore {
      override async insertIfAbsent(): Promise<null> {
        throw new Error('connection refused');
      }
    })();
    const { router } = setup();

    await expect(router.process(newChannel())).rejects.toThrow('connection refused');
  });

  it('stores recording metadata without changing state', async () => {
    const { router } = setup();
    await router.process(newChannel());

    await router.process(event({ Event: 'RecordStart', Uniqueid: 'C1', RecordingFile: '/rec/c1-a.wav' }));
    await router.process(event({ Event: 'RecordStart', Uniqueid: 'C1', RecordingFile: '/rec/c1-b.wav' }));
    const outcome = await router.process(event({ Event: 'RecordStop', Uniqueid: 'C1', RecordingFile: '/rec/c1-b.wav' }));

    expect(outcome).toEqual({ action: 'recorded', callId: 'C1', state: 'initiated' });
    expect(storedCall('C1')).toMatchObject({
      notes: 'Recording started: /rec/c1-a.wav\nRecording started: /rec/c1-b.wav',
      recordingUrl: '/rec/c1-b.wav',
    });
  });

  it('ignores unhandled event types', async () => {
    const { router } = setup();
    expect(await router.process(event({ Event: 'PeerStatus' }))).toEqual({ action: 'ignored', callId: null });
  });
});
