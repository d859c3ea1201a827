import { describe, expect, it, vi } from 'vitest';
import type { VitalPbxSettings } from '@/config';
import { VitalPbxClient } from './vitalpbx';

const settings: VitalPbxSettings = {
  apiBase: 'https://pbx.test/api',
  apiKey: 'test-key',
  tenant: 'acme',
  timeoutMs: 30_000,
};

function stubFetch(body: string, status = 200) {
  const fetchMock = vi.fn(async (_input: string, _init?: RequestInit) => new Response(body, { status }));
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

function firstCall(fetchMock: ReturnType<typeof stubFetch>): [string, RequestInit | undefined] {
  const call = fetchMock.mock.calls[0];
  if (!call) throw new Error('fetch was not called');
  return [call[0], call[1]];
}

const fixedNow = () => new Date(1_700_000_000_000);

describe('VitalPbxClient.originate', () => {
  it('posts an originate action with tenant and app-key', async () => {
    const fetchMock = stubFetch('');
    const client = new VitalPbxClient(settings, fixedNow);

    const result = await client.originate('101', '0712345678');

    expect(result).toEqual({ success: true, callId: 'call_1700000000000' });
    const [url, init] = firstCall(fetchMock);
    expect(url).toBe('https://pbx.test/api/v2/originate?tenant=acme');
    expect(init).toMatchObject({ method: 'POST', headers: { 'app-key': 'test-key' } });
    expect(JSON.parse(String(init?.body))).toEqual({
      Channel: 'PJSIP/101',
      Context: 'from-internal',
      Exten: '0712345678',
      Priority: 1,
      Timeout: 30_000,
      CallerID: '101',
      Async: true,
      ActionID: 'call_1700000000000',
    });
  });

  it('prefers the ActionID the PBX returns', async () => {
    stubFetch('{"ActionID":"pbx-77"}');
    const client = new VitalPbxClient(settings, fixedNow);

    expect(await client.originate('101', '0712345678', '0200000000')).toEqual({ success: true, callId: 'pbx-77' });
  });

  it('reports HTTP failures', async () => {
    stubFetch('boom', 500);
    const client = new VitalPbxClient(settings, fixedNow);

    expect(await client.originate('101', '0712345678')).toEqual({
      success: false,
      error: 'Call origination failed: HTTP 500',
    });
  });

  it('omits tenant and app-key when they are not configured', async () => {
    const fetchMock = stubFetch('');
    const client = new VitalPbxClient({ ...settings, apiKey: '', tenant: '' }, fixedNow);

    await client.originate('101', '0712345678');

    const [url, init] = firstCall(fetchMock);
    expect(url).toBe('https://pbx.test/api/v2/originate');
    expect(init?.headers).not.toHaveProperty('app-key');
  });
});

describe('VitalPbxClient call control', () => {
  it('hangs up by encoded call id', async () => {
    const fetchMock = stubFetch('{}');
    const client = new VitalPbxClient(settings);

    expect(await client.hangup('C 1')).toEqual({ success: true, callId: 'C 1' });
    expect(firstCall(fetchMock)[0]).toBe('https://pbx.test/api/v2/calls/C%201/hangup?tenant=acme');
  });

  it('reports a failed hangup', async () => {
    stubFetch('', 404);
    const client = new VitalPbxClient(settings);

    expect(await client.hangup('C1')).toEqual({
      success: false,
      callId: 'C1',
      error: 'Failed to hangup call: HTTP 404',
    });
  });

  it('returns the parsed call status', async () => {
    stubFetch('{"state":"Up"}');
    const client = new VitalPbxClient(settings);

    expect(await client.getCallStatus('C1')).toEqual({ success: true, status: { state: 'Up' } });
  });

  it('rejects a non-JSON status body', async () => {
    stubFetch('<html>');
    const client = new VitalPbxClient(settings);

    expect(await client.getCallStatus('C1')).toEqual({ success: false, error: 'Invalid JSON response' });
  });

  it('lists extensions from the data array', async () => {
    stubFetch('{"data":[{"extension":"101"},{"extension":"102"}]}');
    const client = new VitalPbxClient(settings);

    expect(await client.getExtensions()).toEqual({
      success: true,
      extensions: [{ extension: '101' }, { extension: '102' }],
    });
  });

  it('returns an empty list when listing fails', async () => {
    stubFetch('', 503);
    const client = new VitalPbxClient(settings);

    expect(await client.getExtensions()).toEqual({
      success: false,
      extensions: [],
      error: 'Failed to get extensions: HTTP 503',
    });
  });
});
