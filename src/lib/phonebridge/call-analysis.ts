// Derives direction, extension and party numbers from VitalPBX channel data.

import type { CallDirection, TerminalCallState } from './types';

const EXTENSION_PATTERNS: RegExp[] = [
  /PJSIP\/(\d+)-/,
  /SIP\/(\d+)-/,
  /Local\/(\d+)@/,
  /DAHDI\/(\d+)-/,
  // Channel name without the unique suffix, e.g. "PJSIP/101"
  /^(?:PJSIP|SIP)\/(\d+)$/,
];

const INBOUND_CONTEXTS = ['from-pstn', 'from-trunk', 'from-external', 'from-did', 'inbound'];
const OUTBOUND_CONTEXTS = ['from-internal', 'from-zoho', 'from-extensions', 'outbound'];

// Q.850 cause codes. Anything not listed is treated as a completed call.
const HANGUP_CAUSES: Record<string, TerminalCallState> = {
  '16': 'completed', // normal clearing
  '17': 'busy',
  '18': 'no_answer', // no user responding
  '19': 'no_answer', // no answer from user
  '21': 'failed', // call rejected
  '34': 'failed', // no circuit available
};

export function extractExtension(channel: string): string | null {
  for (const pattern of EXTENSION_PATTERNS) {
    const match = pattern.exec(channel);
    if (match) return match[1];
  }
  return null;
}

export function determineDirection(context: string, channel: string): CallDirection {
  const ctx = context.toLowerCase();

  if (INBOUND_CONTEXTS.some((marker) => ctx.includes(marker))) return 'inbound';
  if (OUTBOUND_CONTEXTS.some((marker) => ctx.includes(marker))) return 'outbound';

  if (channel.toLowerCase().startsWith('local/')) return 'outbound';

  return 'inbound';
}

export function mapHangupCause(cause: string | null | undefined): TerminalCallState {
  if (!cause) return 'completed';
  return HANGUP_CAUSES[cause.trim()] ?? 'completed';
}

export interface CallParties {
  direction: CallDirection;
  extension: string | null;
  callerNumber: string;
  calledNumber: string;
}

export function deriveCallParties(input: {
  channel: string;
  context: string;
  callerIdNum: string;
  exten: string;
  destinationExt: string;
}): CallParties {
  const direction = determineDirection(input.context, input.channel);
  const extension = extractExtension(input.channel);

  if (direction === 'inbound') {
    return {
      direction,
      extension,
      callerNumber: input.callerIdNum,
      calledNumber: extension ?? input.exten,
    };
  }

  return {
    direction,
    extension,
    callerNumber: extension ?? input.callerIdNum,
    calledNumber: input.exten || input.destinationExt,
  };
}

/** The party outside the PBX, used for normalization and CRM lookup. */
export function externalNumber(parties: Pick<CallParties, 'direction' | 'callerNumber' | 'calledNumber'>): string {
  return parties.direction === 'inbound' ? parties.callerNumber : parties.calledNumber;
}
