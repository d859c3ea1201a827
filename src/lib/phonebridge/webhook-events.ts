/**
 * VitalPBX webhook payload parsing.
 *
 * Raw AMI-style bodies are validated with zod and classified into one tagged
 * variant per event kind. Unknown event names become `other`.
 */

import { z } from 'zod';

const scalar = z
  .union([z.string(), z.number()])
  .transform((value) => String(value).trim());

const optionalScalar = scalar.optional().transform((value) => value ?? '');

export const vitalPbxPayloadSchema = z
  .object({
    Event: scalar,
    Uniqueid: optionalScalar,
    Channel: optionalScalar,
    CallerIDNum: optionalScalar,
    CallerIDName: optionalScalar,
    Context: optionalScalar,
    Exten: optionalScalar,
    DestinationExt: optionalScalar,
    HangupCause: optionalScalar,
    RecordingFile: optionalScalar,
  })
  .passthrough();

export type VitalPbxPayload = z.infer<typeof vitalPbxPayloadSchema>;

export interface NewChannelEvent {
  kind: 'new_channel';
  callId: string;
  channel: string;
  callerIdNum: string;
  callerIdName: string;
  context: string;
  exten: string;
  destinationExt: string;
}

export interface DialEvent {
  kind: 'dial';
  callId: string;
}

export interface BridgeEvent {
  kind: 'bridge';
  callId: string;
}

export interface HangupEvent {
  kind: 'hangup';
  callId: string;
  hangupCause: string;
}

export interface RecordingEvent {
  kind: 'record_start' | 'record_stop';
  callId: string;
  recordingFile: string;
}

export interface OtherEvent {
  kind: 'other';
  eventType: string;
  callId: string | null;
}

export type PbxEvent =
  | NewChannelEvent
  | DialEvent
  | BridgeEvent
  | HangupEvent
  | RecordingEvent
  | OtherEvent;

export type ParseResult =
  | { ok: true; eventType: string; event: PbxEvent }
  | { ok: false; eventType: string; error: string };

function describeIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`).join('; ');
}

export function parsePbxEvent(body: unknown): ParseResult {
  const parsed = vitalPbxPayloadSchema.safeParse(body);
  if (!parsed.success) {
    return { ok: false, eventType: 'unknown', error: describeIssues(parsed.error) };
  }

  const payload = parsed.data;
  const eventType = payload.Event;
  const callId = payload.Uniqueid;

  const lifecycle = ['Newchannel', 'Dial', 'Bridge', 'Hangup', 'RecordStart', 'RecordStop'];
  if (!lifecycle.includes(eventType)) {
    return { ok: true, eventType, event: { kind: 'other', eventType, callId: callId || null } };
  }

  if (!callId) {
    return { ok: false, eventType, error: `${eventType} event missing Uniqueid` };
  }

  switch (eventType) {
    case 'Newchannel':
      return {
        ok: true,
        eventType,
        event: {
          kind: 'new_channel',
          callId,
          channel: payload.Channel,
          callerIdNum: payload.CallerIDNum,
          callerIdName: payload.CallerIDName,
          context: payload.Context,
          exten: payload.Exten,
          destinationExt: payload.DestinationExt,
        },
      };
    case 'Dial':
      return { ok: true, eventType, event: { kind: 'dial', callId } };
    case 'Bridge':
      return { ok: true, eventType, event: { kind: 'bridge', callId } };
    case 'Hangup':
      return { ok: true, eventType, event: { kind: 'hangup', callId, hangupCause: payload.HangupCause } };
    case 'RecordStart':
      return { ok: true, eventType, event: { kind: 'record_start', callId, recordingFile: payload.RecordingFile } };
    default:
      return { ok: true, eventType, event: { kind: 'record_stop', callId, recordingFile: payload.RecordingFile } };
  }
}
