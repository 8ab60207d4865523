import dotenvFlow from 'dotenv-flow';

import { getBluelinkConfig } from '../src/config/bluelinkConfig';
import { sqliteConfigEntryStore } from '../src/db/repositories/configEntry.repository';
import { sqliteVehicleStore } from '../src/db/repositories/vehicle.repository';
import { closeDatabase, runMigrations } from '../src/db/sqlite';
import { BluelinkClient } from '../src/integrations/bluelink/client';
import { IntegrationService } from '../src/services/integration.service';
import { NotificationCenter } from '../src/services/notification.service';
import { logger } from '../src/utils/logger';

dotenvFlow.config();

const parseArgs = () =>
  process.argv.slice(2).reduce<{ entryId?: string }>((accumulator, arg) => {
    if (arg.startsWith('--entryId=')) {
      return { ...accumulator, entryId: arg.split('=')[1] };
    }

    return accumulator;
  }, {});

const run = async () => {
  const args = parseArgs();
  await runMigrations();

  const config = getBluelinkConfig();
  const notifications = new NotificationCenter();
  const integration = new IntegrationService({
    config,
    client: new BluelinkClient(config),
    entries: sqliteConfigEntryStore,
    vehicles: sqliteVehicleStore,
    notifications,
  });

  const entries = await sqliteConfigEntryStore.listEntries();
  const selected = args.entryId
    ? entries.filter((entry) => entry.entryId === args.entryId)
    : entries;

  if (selected.length === 0) {
    throw new Error('No config entries to poll.');
  }

  const results = await Promise.all(
    selected.map(async (entry) => {
      await integration.setupEntry(entry.entryId, { startPolling: false });
      const jobs = await integration.refreshEntry(entry.entryId);
      const entities = integration.getEntities(entry.entryId);
      integration.unloadEntry(entry.entryId);

      const failed = jobs.filter((job) => job.lastError !== null).map((job) => job.name);
      if (failed.length > 0) {
        logger.warn({ entryId: entry.entryId, failed }, 'some jobs failed');
      }

      return { ...entities, jobs };
    }),
  );

  // eslint-disable-next-line no-console
  console.log(JSON.stringify({ entries: results, notifications: notifications.list() }, null, 2));
};

run()
  .catch((error: unknown) => {
    // eslint-disable-next-line no-console
    console.error(error);
    process.exitCode = 1;
  })
  .finally(async () => {
    await closeDatabase();
  });
