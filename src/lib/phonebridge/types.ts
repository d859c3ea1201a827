// Domain types for the PBX call-event pipeline and CRM popup dispatch.

export const CALL_STATES = [
  'initiated',
  'ringing',
  'connected',
  'completed',
  'failed',
  'busy',
  'no_answer',
] as const;

export type CallState = (typeof CALL_STATES)[number];
export type TerminalCallState = 'completed' | 'failed' | 'busy' | 'no_answer';
export type CallDirection = 'inbound' | 'outbound';
export type ContactType = 'contact' | 'lead' | 'unknown';

export interface ContactSnapshot {
  id: string;
  name: string;
  company: string;
  email: string;
  type: ContactType;
}

export interface CallRecord {
  callId: string;
  extension: string | null;
  direction: CallDirection;
  callerNumber: string;
  calledNumber: string;
  normalizedPhone: string | null;
  state: CallState;
  contact: ContactSnapshot | null;
  callHistoryCount: number;
  startTime: Date | null;
  endTime: Date | null;
  durationSeconds: number | null;
  popupSent: boolean;
  notes: string;
  recordingUrl: string | null;
}

export type NewCallFields = Pick<
  CallRecord,
  'extension' | 'direction' | 'callerNumber' | 'calledNumber' | 'startTime'
>;

/** Fields that merge onto a call regardless of state ordering. */
export type CallFieldsPatch = Partial<Omit<CallRecord, 'callId' | 'state'>>;

export const POPUP_STATUSES = ['pending', 'sent', 'failed', 'retry', 'duplicate'] as const;
export type PopupStatus = (typeof POPUP_STATUSES)[number];

export function emptyStatusCounts(): Record<PopupStatus, number> {
  return { pending: 0, sent: 0, failed: 0, retry: 0, duplicate: 0 };
}

export interface PopupAction {
  id: 'answer' | 'decline' | 'hangup' | 'record';
  label: string;
  type: 'primary' | 'secondary' | 'danger' | 'toggle';
  action: 'answer_call' | 'decline_call' | 'hangup_call' | 'toggle_recording';
}

export interface PopupPayload {
  call: {
    id: string;
    from: string;
    to: string;
    direction: CallDirection;
    startTime: string | null;
    status: 'ringing';
  };
  contact: {
    name: string;
    phone: string;
    email: string;
    company: string;
    type: ContactType;
  };
  metadata: {
    callHistory: { totalCalls: number };
    source: 'VitalPBX';
    integration: 'PhoneBridge';
  };
  user: { id: string };
  actions: PopupAction[];
}

export interface PopupRecord {
  id: string;
  callId: string;
  targetUserId: string;
  extension: string | null;
  payload: PopupPayload;
  status: PopupStatus;
  sentAt: Date;
  responseTimeMs: number | null;
  responseBody: string | null;
  retryCount: number;
  errorMessage: string | null;
}

export type NewPopupRecord = Pick<PopupRecord, 'callId' | 'targetUserId' | 'extension' | 'payload'>;

export type PopupPatch = Partial<
  Pick<PopupRecord, 'status' | 'responseTimeMs' | 'responseBody' | 'retryCount' | 'errorMessage'>
>;

export interface ExtensionBinding {
  extension: string;
  userId: string;
  zohoUserId: string | null;
}

/** A CRM record returned by a phone search. `module` is the CRM module name as returned. */
export interface ContactMatch {
  id: string;
  name: string;
  company: string;
  email: string;
  phone: string;
  module: string;
}

export interface PopupSummary {
  total: number;
  byStatus: Record<PopupStatus, number>;
  averageResponseTimeMs: number;
}
