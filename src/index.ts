import dotenvFlow from 'dotenv-flow';
import type { Server } from 'http';

import { createApp } from './app';
import { getAppConfig } from './config/appConfig';
import { getBluelinkConfig } from './config/bluelinkConfig';
import { sqliteConfigEntryStore } from './db/repositories/configEntry.repository';
import { sqliteVehicleStore } from './db/repositories/vehicle.repository';
import { closeDatabase, runMigrations } from './db/sqlite';
import { BluelinkClient } from './integrations/bluelink/client';
import { IntegrationService } from './services/integration.service';
import { NotificationCenter } from './services/notification.service';
import { OAuthFlowService } from './services/oauthFlow.service';
import { logger } from './utils/logger';

dotenvFlow.config();

const { port } = getAppConfig();
const bluelinkConfig = getBluelinkConfig();
const client = new BluelinkClient(bluelinkConfig);
const notifications = new NotificationCenter();
const integration = new IntegrationService({
  config: bluelinkConfig,
  client,
  entries: sqliteConfigEntryStore,
  vehicles: sqliteVehicleStore,
  notifications,
});
const flows = new OAuthFlowService({
  config: bluelinkConfig,
  client,
  entries: sqliteConfigEntryStore,
  onCompleted: integration.completeFlow,
});
const app = createApp({ integration, flows, notifications });
let server: Server | undefined;

const start = async (): Promise<void> => {
  await runMigrations();
  server = app.listen(port, () => {
    logger.info({ port }, 'server listening');
  });

  const runtimes = await integration.setupAll();
  logger.info({ entries: runtimes.length }, 'config entries loaded');
};

const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
  logger.info({ signal }, 'shutdown signal received');
  integration.shutdown();

  await new Promise<void>((resolve, reject) => {
    if (!server) {
      resolve();
      return;
    }

    server.close((error) => {
      if (error) {
        reject(error);
        return;
      }

      resolve();
    });
  });

  await closeDatabase().catch((error: unknown) => {
    logger.error({ err: error }, 'failed to close sqlite connection');
  });

  logger.info('shutdown complete');
  process.exit(0);
};

start().catch(async (error: unknown) => {
  logger.error({ err: error }, 'failed to start server');
  integration.shutdown();
  await closeDatabase().catch((closeError: unknown) => {
    logger.error({ err: closeError }, 'error closing sqlite during startup failure');
  });
  process.exit(1);
});

const signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM', 'SIGQUIT'];
signals.forEach((signal) => {
  process.on(signal, () => {
    shutdown(signal).catch((error: unknown) => {
      logger.error({ err: error }, 'error during shutdown');
      process.exit(1);
    });
  });
});
