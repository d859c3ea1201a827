/**
 * Call Registry
 * =============
 * One CallRecord per provider call id. Creation is create-if-absent, so
 * duplicate or concurrent Newchannel deliveries converge on a single row.
 */

import { logger as rootLogger, type Logger } from '@/logger';
import { applyTransition } from './call-state';
import type { CallStore } from './stores';
import type { CallFieldsPatch, CallRecord, CallState, NewCallFields } from './types';

export interface GetOrCreateResult {
  record: CallRecord;
  created: boolean;
}

export class CallRegistry {
  private readonly log: Logger;

  constructor(
    private readonly store: CallStore,
    log: Logger = rootLogger
  ) {
    this.log = log.child({ component: 'call-registry' });
  }

  async getOrCreate(callId: string, initial: NewCallFields): Promise<GetOrCreateResult> {
    const inserted = await this.store.insertIfAbsent({
      callId,
      ...initial,
      normalizedPhone: null,
      state: 'initiated',
      contact: null,
      callHistoryCount: 0,
      endTime: null,
      durationSeconds: null,
      popupSent: false,
      notes: '',
      recordingUrl: null,
    });

    if (inserted) {
      return { record: inserted, created: true };
    }

    // Lost the insert race (or a redelivery); read the winner's row
    const existing = await this.store.findByCallId(callId);
    if (!existing) {
      throw new Error(`Call ${callId} conflicted on insert but could not be read back`);
    }
    return { record: existing, created: false };
  }

  /**
   * Merge `fields` unconditionally; move to `nextState` only when it ranks
   * above the stored state. Returns null for an unknown call.
   */
  async transition(
    callId: string,
    nextState: CallState,
    fields: CallFieldsPatch = {}
  ): Promise<CallRecord | null> {
    const seen: { previous?: CallState; changed: boolean } = { changed: false };

    const record = await this.store.update(callId, (current) => {
      const result = applyTransition(current, nextState, fields);
      seen.previous = current.state;
      seen.changed = result.stateChanged;
      return result.record;
    });

    if (record && !seen.changed) {
      this.log.info({ callId, current: seen.previous, requested: nextState }, 'State regression ignored');
    }
    return record;
  }

  /** Merge fields computed from the current row without touching state. */
  async amend(
    callId: string,
    build: (current: CallRecord) => CallFieldsPatch
  ): Promise<CallRecord | null> {
    return this.store.update(callId, (current) => ({
      ...current,
      ...build(current),
      callId: current.callId,
      state: current.state,
    }));
  }

  find(callId: string): Promise<CallRecord | null> {
    return this.store.findByCallId(callId);
  }

  countCompletedByPhone(normalizedPhone: string): Promise<number> {
    return this.store.countCompletedByPhone(normalizedPhone);
  }
}
