/**
 * Webhook Event Router
 * ====================
 * Drives the call lifecycle from VitalPBX events:
 *
 *   Newchannel → create call (once), enrich, pop up every bound agent
 *   Dial       → ringing
 *   Bridge     → connected
 *   Hangup     → completed | busy | no_answer | failed, close popups
 *   RecordStart / RecordStop → recording metadata only
 *
 * Enrichment and popup failures are logged and never undo a recorded state.
 * Storage failures propagate to the caller.
 */

import { logger as rootLogger, type Logger } from '@/logger';
import { deriveCallParties, mapHangupCause } from './call-analysis';
import type { CallRegistry } from './call-registry';
import { computeDurationSeconds } from './call-state';
import type { ContactEnricher } from './enrichment';
import type { PopupDispatcher } from './popup-dispatcher';
import type { ExtensionDirectory } from './stores';
import type { CallRecord, CallState, ExtensionBinding } from './types';
import type { HangupEvent, NewChannelEvent, PbxEvent, RecordingEvent } from './webhook-events';

export type ProcessAction =
  | 'created'
  | 'already_exists'
  | 'transitioned'
  | 'recorded'
  | 'ignored'
  | 'unknown_call';

export interface ProcessOutcome {
  action: ProcessAction;
  callId: string | null;
  state?: CallState;
  popupsDispatched?: number;
}

export interface WebhookEventRouterOptions {
  popupEnabled: boolean;
  now?: () => Date;
  logger?: Logger;
}

export class WebhookEventRouter {
  private readonly log: Logger;
  private readonly now: () => Date;

  constructor(
    private readonly registry: CallRegistry,
    private readonly enricher: ContactEnricher,
    private readonly dispatcher: PopupDispatcher,
    private readonly extensions: ExtensionDirectory,
    private readonly options: WebhookEventRouterOptions
  ) {
    this.log = (options.logger ?? rootLogger).child({ component: 'webhook-router' });
    this.now = options.now ?? (() => new Date());
  }

  async process(event: PbxEvent): Promise<ProcessOutcome> {
    switch (event.kind) {
      case 'new_channel':
        return this.handleNewChannel(event);
      case 'dial':
        return this.handleTransition(event.callId, 'ringing', 'Dial');
      case 'bridge':
        return this.handleTransition(event.callId, 'connected', 'Bridge');
      case 'hangup':
        return this.handleHangup(event);
      case 'record_start':
      case 'record_stop':
        return this.handleRecording(event);
      case 'other':
        this.log.info({ eventType: event.eventType, callId: event.callId }, 'Unhandled event type');
        return { action: 'ignored', callId: event.callId };
    }
  }

  private async handleNewChannel(event: NewChannelEvent): Promise<ProcessOutcome> {
    const parties = deriveCallParties(event);

    const { record, created } = await this.registry.getOrCreate(event.callId, {
      extension: parties.extension,
      direction: parties.direction,
      callerNumber: parties.callerNumber,
      calledNumber: parties.calledNumber,
      startTime: this.now(),
    });

    if (!created) {
      this.log.info({ callId: event.callId }, 'Call already initiated');
      return { action: 'already_exists', callId: event.callId, state: record.state };
    }

    this.log.info(
      { callId: event.callId, direction: parties.direction, extension: parties.extension },
      'New call detected'
    );

    if (!parties.extension) {
      this.log.info({ callId: event.callId, channel: event.channel }, 'No extension on channel, skipping popup');
      return { action: 'created', callId: event.callId, state: record.state, popupsDispatched: 0 };
    }

    const patch = await this.enricher.enrich(record);
    const enriched = (await this.registry.amend(event.callId, () => patch)) ?? { ...record, ...patch };

    const popupsDispatched = this.options.popupEnabled ? await this.dispatchPopups(enriched) : 0;
    return { action: 'created', callId: event.callId, state: enriched.state, popupsDispatched };
  }

  private async dispatchPopups(call: CallRecord): Promise<number> {
    if (!call.extension) return 0;

    let bindings: ExtensionBinding[];
    try {
      bindings = await this.extensions.activeBindings(call.extension);
    } catch (error) {
      this.log.error({ callId: call.callId, error: errorMessage(error) }, 'Extension lookup failed');
      return 0;
    }

    if (bindings.length === 0) {
      this.log.info({ extension: call.extension }, 'No users mapped to extension');
      return 0;
    }

    let dispatched = 0;
    for (const binding of bindings) {
      if (!binding.zohoUserId) {
        this.log.warn({ extension: call.extension, userId: binding.userId }, 'User has no Zoho user ID');
        continue;
      }
      try {
        await this.dispatcher.dispatch(call, binding.zohoUserId);
        dispatched++;
      } catch (error) {
        this.log.error(
          { callId: call.callId, zohoUserId: binding.zohoUserId, error: errorMessage(error) },
          'Popup dispatch failed'
        );
      }
    }
    return dispatched;
  }

  private async handleTransition(callId: string, state: CallState, eventType: string): Promise<ProcessOutcome> {
    const record = await this.registry.transition(callId, state);
    if (!record) {
      return this.unknownCall(callId, eventType);
    }
    this.log.info({ callId, state: record.state }, `${eventType} processed`);
    return { action: 'transitioned', callId, state: record.state };
  }

  private async handleHangup(event: HangupEvent): Promise<ProcessOutcome> {
    const endTime = this.now();
    const finalState = mapHangupCause(event.hangupCause);

    const record = await this.registry.amend(event.callId, (current) => ({
      endTime,
      durationSeconds: computeDurationSeconds(current.startTime, endTime),
    }));
    if (!record) {
      return this.unknownCall(event.callId, 'Hangup');
    }

    const final = (await this.registry.transition(event.callId, finalState)) ?? record;
    this.log.info(
      { callId: event.callId, state: final.state, cause: event.hangupCause, durationSeconds: final.durationSeconds },
      'Call ended'
    );

    try {
      await this.dispatcher.closeAllForCall(event.callId);
    } catch (error) {
      this.log.error({ callId: event.callId, error: errorMessage(error) }, 'Closing popups failed');
    }

    return { action: 'transitioned', callId: event.callId, state: final.state };
  }

  private async handleRecording(event: RecordingEvent): Promise<ProcessOutcome> {
    const file = event.recordingFile;
    const record = await this.registry.amend(event.callId, (current) => {
      if (!file) return {};
      return event.kind === 'record_start'
        ? { notes: current.notes ? `${current.notes}\nRecording started: ${file}` : `Recording started: ${file}` }
        : { recordingUrl: file };
    });

    if (!record) {
      return this.unknownCall(event.callId, event.kind === 'record_start' ? 'RecordStart' : 'RecordStop');
    }
    this.log.info({ callId: event.callId, kind: event.kind, file }, 'Recording event stored');
    return { action: 'recorded', callId: event.callId, state: record.state };
  }

  private unknownCall(callId: string, eventType: string): ProcessOutcome {
    this.log.warn({ callId, eventType }, 'Event for unknown call');
    return { action: 'unknown_call', callId };
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
