import type { PhoneBridgeSettings } from '@/config';
import type { PhoneBridgeApi } from '@/lib/api/zoho';
import { PhoneNormalizer } from '@/lib/phone/normalizer';
import type { Logger } from '@/logger';
import { CallRegistry } from './call-registry';
import { ContactEnricher } from './enrichment';
import { PopupDispatcher } from './popup-dispatcher';
import type { CallStore, ContactDirectory, ExtensionDirectory, PopupStore, TokenProvider } from './stores';
import { WebhookEventRouter } from './webhook-router';

export interface PhoneBridgeDeps {
  calls: CallStore;
  popups: PopupStore;
  extensions: ExtensionDirectory;
  tokens: TokenProvider;
  contacts: ContactDirectory;
  popupApi: PhoneBridgeApi;
  settings: PhoneBridgeSettings;
  now?: () => Date;
  logger?: Logger;
}

export interface PhoneBridge {
  normalizer: PhoneNormalizer;
  registry: CallRegistry;
  enricher: ContactEnricher;
  dispatcher: PopupDispatcher;
  router: WebhookEventRouter;
}

/** Wire the call pipeline from its stores and API clients. */
export function createPhoneBridge(deps: PhoneBridgeDeps): PhoneBridge {
  const { settings, now, logger } = deps;

  const normalizer = new PhoneNormalizer(settings.defaultCountry);
  const registry = new CallRegistry(deps.calls, logger);
  const enricher = new ContactEnricher(normalizer, deps.contacts, deps.tokens, registry, {
    includeCallHistory: settings.includeCallHistory,
    logger,
  });
  const dispatcher = new PopupDispatcher(deps.popups, registry, deps.popupApi, deps.tokens, deps.extensions, {
    maxRetries: settings.maxPopupRetries,
    retryBatchSize: settings.retryBatchSize,
    popupEnabled: settings.popupEnabled,
    now,
    logger,
  });
  const router = new WebhookEventRouter(registry, enricher, dispatcher, deps.extensions, {
    popupEnabled: settings.popupEnabled,
    now,
    logger,
  });

  return { normalizer, registry, enricher, dispatcher, router };
}

export { CallRegistry } from './call-registry';
export { ContactEnricher, pickBestMatch } from './enrichment';
export { PopupDispatcher } from './popup-dispatcher';
export { WebhookEventRouter } from './webhook-router';
export { parsePbxEvent } from './webhook-events';
export type { PbxEvent, ParseResult } from './webhook-events';
export type { ProcessOutcome } from './webhook-router';
