/**
 * PhoneBridge Entry Point
 *
 * One process: the HTTP server for VitalPBX webhooks and operator endpoints,
 * plus the BullMQ worker for popup maintenance.
 */

import 'dotenv/config';
import type http from 'http';
import { config, loadPhoneBridgeSettings, loadVitalPbxSettings, validateConfig } from './config';
import { closeDb, getDb } from './db';
import { VitalPbxClient } from './lib/api/vitalpbx';
import { ZohoCrmClient, ZohoOAuthClient, ZohoPhoneBridgeClient } from './lib/api/zoho';
import { ZohoTokenProvider } from './lib/api/zoho-tokens';
import { createPhoneBridge } from './lib/phonebridge';
import {
  DrizzleCallStore,
  DrizzleExtensionDirectory,
  DrizzlePopupStore,
  DrizzleWebhookLogStore,
  DrizzleZohoTokenRepository,
} from './lib/phonebridge/drizzle-stores';
import { logger } from './logger';
import { closeQueues, getQueuesHealth, initializeScheduledJobs } from './queues';
import { checkRedisHealth, closeRedis } from './redis';
import { createCallRoutes } from './routes/calls';
import { createPopupRoutes } from './routes/popups';
import { createVitalPbxWebhookRoute } from './routes/vitalpbx-webhook';
import { startServer } from './server';
import { getWorkersHealth, initializeWorkers, shutdownWorkers } from './workers';

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

async function main() {
  logger.info('Starting PhoneBridge...');
  logger.info({
    environment: config.nodeEnv,
    logLevel: config.logLevel,
    nodeVersion: process.version,
  });

  // Validate configuration before starting
  try {
    validateConfig();
    logger.info('Configuration validated');
  } catch (err) {
    logger.error({ error: describe(err) }, 'Configuration validation failed');
    process.exit(1);
  }

  const settings = loadPhoneBridgeSettings();
  const db = getDb();

  const tokens = new ZohoTokenProvider(
    new DrizzleZohoTokenRepository(db),
    new ZohoOAuthClient(config.zoho.clientId, config.zoho.clientSecret),
    settings.zohoAccountsUrl
  );
  const extensions = new DrizzleExtensionDirectory(db);

  const phoneBridge = createPhoneBridge({
    calls: new DrizzleCallStore(db),
    popups: new DrizzlePopupStore(db),
    extensions,
    tokens,
    contacts: new ZohoCrmClient(settings.zohoApiBase, settings.popupTimeoutMs),
    popupApi: new ZohoPhoneBridgeClient(settings.zohoApiBase, settings.popupTimeoutMs),
    settings,
  });

  const server: http.Server = await startServer(
    {
      webhook: createVitalPbxWebhookRoute({
        router: phoneBridge.router,
        webhookLogs: new DrizzleWebhookLogStore(db),
        webhookKey: config.webhookKey,
      }),
      popups: createPopupRoutes(phoneBridge.dispatcher),
      calls: createCallRoutes(new VitalPbxClient(loadVitalPbxSettings())),
      health: async () => {
        const [redis, workers, queues] = await Promise.all([checkRedisHealth(), getWorkersHealth(), getQueuesHealth()]);
        return { healthy: redis && workers.healthy && queues.healthy, redis, workers, queues };
      },
      ready: checkRedisHealth,
    },
    config.port
  );

  await initializeScheduledJobs();
  initializeWorkers(phoneBridge.dispatcher, settings);

  logger.info({ popupEnabled: settings.popupEnabled, defaultCountry: settings.defaultCountry }, 'PhoneBridge running');

  const shutdown = async (signal: string) => {
    logger.info(`${signal} received, starting graceful shutdown...`);

    try {
      await new Promise<void>((resolve) => server.close(() => resolve()));
      await shutdownWorkers();
      await closeQueues();
      await closeRedis();
      await closeDb();

      logger.info('Shutdown complete');
      process.exit(0);
    } catch (err) {
      logger.error({ error: describe(err) }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  process.on('uncaughtException', (err) => {
    logger.error({ error: err.message, stack: err.stack }, 'Uncaught exception');
    void shutdown('uncaughtException');
  });

  process.on('unhandledRejection', (reason) => {
    logger.error({ reason: describe(reason) }, 'Unhandled rejection');
  });
}

main().catch((err) => {
  logger.error({ error: describe(err) }, 'Failed to start PhoneBridge');
  process.exit(1);
});
