/**
 * Call State Ordering
 * ===================
 * initiated → ringing → connected → completed | failed | busy | no_answer
 *
 * State only moves to a strictly higher rank. Equal or lower ranks are
 * absorbed: their fields still merge, the stored state stays. Among the
 * terminal states the first one stored wins.
 */

import type { CallFieldsPatch, CallRecord, CallState, TerminalCallState } from './types';

const STATE_RANK: Record<CallState, number> = {
  initiated: 0,
  ringing: 1,
  connected: 2,
  completed: 3,
  failed: 3,
  busy: 3,
  no_answer: 3,
};

export function stateRank(state: CallState): number {
  return STATE_RANK[state];
}

export function isTerminalState(state: CallState): state is TerminalCallState {
  return STATE_RANK[state] === 3;
}

export interface TransitionResult {
  record: CallRecord;
  stateChanged: boolean;
}

export function applyTransition(
  current: CallRecord,
  nextState: CallState,
  fields: CallFieldsPatch = {}
): TransitionResult {
  const stateChanged = stateRank(nextState) > stateRank(current.state);
  return {
    record: {
      ...current,
      ...fields,
      callId: current.callId,
      state: stateChanged ? nextState : current.state,
    },
    stateChanged,
  };
}

/** Whole seconds between start and end; null when unknown or negative. */
export function computeDurationSeconds(start: Date | null, end: Date | null): number | null {
  if (!start || !end) return null;
  const seconds = Math.floor((end.getTime() - start.getTime()) / 1000);
  return seconds >= 0 ? seconds : null;
}
