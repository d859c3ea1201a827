// Builds the PhoneBridge popup body for one call and one agent.

import type { CallDirection, CallRecord, PopupAction, PopupPayload } from './types';

const RECORD_ACTION: PopupAction = { id: 'record', label: 'Record', type: 'toggle', action: 'toggle_recording' };

export function popupActions(direction: CallDirection): PopupAction[] {
  if (direction === 'inbound') {
    return [
      { id: 'answer', label: 'Answer', type: 'primary', action: 'answer_call' },
      { id: 'decline', label: 'Decline', type: 'secondary', action: 'decline_call' },
      RECORD_ACTION,
    ];
  }
  return [{ id: 'hangup', label: 'Hangup', type: 'danger', action: 'hangup_call' }, RECORD_ACTION];
}

export function buildPopupPayload(call: CallRecord, zohoUserId: string): PopupPayload {
  const phone = call.normalizedPhone || call.callerNumber;
  const contact = call.contact
    ? {
        name: call.contact.name,
        phone,
        email: call.contact.email,
        company: call.contact.company || 'Unknown Company',
        type: call.contact.type,
      }
    : { name: 'Unknown Caller', phone, email: '', company: '', type: 'unknown' as const };

  return {
    call: {
      id: call.callId,
      from: call.callerNumber,
      to: call.calledNumber,
      direction: call.direction,
      startTime: call.startTime ? call.startTime.toISOString() : null,
      status: 'ringing',
    },
    contact,
    metadata: {
      callHistory: { totalCalls: call.contact ? call.callHistoryCount : 0 },
      source: 'VitalPBX',
      integration: 'PhoneBridge',
    },
    user: { id: zohoUserId },
    actions: popupActions(call.direction),
  };
}
