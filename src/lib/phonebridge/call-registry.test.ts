import { describe, expect, it } from 'vitest';
import { MemoryCallStore } from '@/test/memory-stores';
import { CallRegistry } from './call-registry';
import type { NewCallFields } from './types';

const initial: NewCallFields = {
  extension: '101',
  direction: 'inbound',
  callerNumber: '0712345678',
  calledNumber: '101',
  startTime: new Date('2026-03-02T09:00:00Z'),
};

describe('CallRegistry', () => {
  it('creates a call once per call id', async () => {
    const store = new MemoryCallStore();
    const registry = new CallRegistry(store);

    const first = await registry.getOrCreate('C1', initial);
    const second = await registry.getOrCreate('C1', { ...initial, callerNumber: '0799999999' });

    expect(first.created).toBe(true);
    expect(first.record.state).toBe('initiated');
    expect(second.created).toBe(false);
    expect(second.record.callerNumber).toBe('0712345678');
    expect(store.calls.size).toBe(1);
  });

  it('re-reads the winner when the insert loses a race', async () => {
    const store = new MemoryCallStore();
    const registry = new CallRegistry(store);

    const results = await Promise.all([
      registry.getOrCreate('C1', initial),
      registry.getOrCreate('C1', initial),
    ]);

    expect(results.map((r) => r.created).sort()).toEqual([false, true]);
    expect(store.calls.size).toBe(1);
  });

  it('only moves state forward', async () => {
    const registry = new CallRegistry(new MemoryCallStore());
    await registry.getOrCreate('C1', initial);

    await registry.transition('C1', 'connected');
    const regressed = await registry.transition('C1', 'ringing', { notes: 'late' });

    expect(regressed?.state).toBe('connected');
    expect(regressed?.notes).toBe('late');
  });

  it('returns null for an unknown call', async () => {
    const registry = new CallRegistry(new MemoryCallStore());
    expect(await registry.transition('C99', 'completed')).toBeNull();
    expect(await registry.amend('C99', () => ({ notes: 'x' }))).toBeNull();
    expect(await registry.find('C99')).toBeNull();
  });

  it('amends fields without touching state', async () => {
    const registry = new CallRegistry(new MemoryCallStore());
    await registry.getOrCreate('C1', initial);
    await registry.transition('C1', 'ringing');

    const amended = await registry.amend('C1', (current) => ({ notes: `${current.state} seen` }));

    expect(amended?.state).toBe('ringing');
    expect(amended?.notes).toBe('ringing seen');
  });

  it('counts completed calls by normalized phone', async () => {
    const registry = new CallRegistry(new MemoryCallStore());
    for (const id of ['A', 'B', 'C']) {
      await registry.getOrCreate(id, initial);
      await registry.amend(id, () => ({ normalizedPhone: '+254712345678' }));
    }
    await registry.transition('A', 'completed');
    await registry.transition('B', 'completed');
    await registry.transition('C', 'busy');

    expect(await registry.countCompletedByPhone('+254712345678')).toBe(2);
  });
});
