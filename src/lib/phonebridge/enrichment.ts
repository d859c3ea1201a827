/**
 * Call enrichment: normalized phone plus the best matching CRM record.
 *
 * Best effort throughout. A missing token, an auth failure or an unreachable
 * CRM leaves the call without contact data and the popup falls back to
 * "Unknown Caller".
 */

import { logger as rootLogger, type Logger } from '@/logger';
import type { PhoneNormalizer } from '@/lib/phone/normalizer';
import { externalNumber } from './call-analysis';
import type { CallRegistry } from './call-registry';
import type { ContactDirectory, TokenProvider } from './stores';
import type { CallFieldsPatch, CallRecord, ContactMatch, ContactSnapshot, ContactType } from './types';

function contactTypeOf(module: string): ContactType {
  const lowered = module.toLowerCase();
  if (lowered === 'contact' || lowered === 'contacts') return 'contact';
  if (lowered === 'lead' || lowered === 'leads') return 'lead';
  return 'unknown';
}

const TYPE_PRIORITY: Record<ContactType, number> = { contact: 1, lead: 2, unknown: 3 };

/** Contact over lead over anything else; ties go to the first returned. */
export function pickBestMatch(matches: ContactMatch[]): ContactSnapshot | null {
  let best: ContactMatch | null = null;
  for (const match of matches) {
    if (!best || TYPE_PRIORITY[contactTypeOf(match.module)] < TYPE_PRIORITY[contactTypeOf(best.module)]) {
      best = match;
    }
  }
  if (!best) return null;

  return {
    id: best.id,
    name: best.name,
    company: best.company,
    email: best.email,
    type: contactTypeOf(best.module),
  };
}

export interface ContactEnricherOptions {
  includeCallHistory: boolean;
  logger?: Logger;
}

export class ContactEnricher {
  private readonly log: Logger;

  constructor(
    private readonly normalizer: PhoneNormalizer,
    private readonly directory: ContactDirectory,
    private readonly tokens: TokenProvider,
    private readonly registry: CallRegistry,
    private readonly options: ContactEnricherOptions
  ) {
    this.log = (options.logger ?? rootLogger).child({ component: 'enrichment' });
  }

  /**
   * Probe the directory one format at a time and stop at the first format
   * that returns anything.
   */
  async findContact(variants: string[], accessToken: string): Promise<ContactSnapshot | null> {
    for (const variant of variants) {
      const matches = await this.directory.search(variant, accessToken);
      if (matches.length > 0) {
        return pickBestMatch(matches);
      }
    }
    return null;
  }

  /** Fields to merge onto the call. Never throws. */
  async enrich(call: CallRecord): Promise<CallFieldsPatch> {
    const normalized = this.normalizer.normalize(externalNumber(call));
    const patch: CallFieldsPatch = { normalizedPhone: normalized.normalized || null };

    if (!normalized.valid) {
      this.log.info({ callId: call.callId, phone: normalized.original }, 'Phone not normalizable, skipping CRM lookup');
      return patch;
    }

    try {
      const accessToken = await this.tokens.getAccessToken();
      if (!accessToken) {
        this.log.warn({ callId: call.callId }, 'No valid Zoho token available for contact lookup');
      } else {
        patch.contact = await this.findContact(normalized.variants, accessToken);
      }
    } catch (error) {
      this.log.warn(
        { callId: call.callId, error: error instanceof Error ? error.message : String(error) },
        'Contact lookup failed'
      );
    }

    if (patch.contact && this.options.includeCallHistory) {
      try {
        patch.callHistoryCount = await this.registry.countCompletedByPhone(normalized.normalized);
      } catch (error) {
        this.log.warn(
          { callId: call.callId, error: error instanceof Error ? error.message : String(error) },
          'Call history count failed'
        );
      }
    }

    this.log.info(
      { callId: call.callId, normalizedPhone: patch.normalizedPhone, contact: patch.contact?.name ?? null },
      'Call enriched'
    );
    return patch;
  }
}
