import dotenvFlow from 'dotenv-flow';

import { closeDatabase, getDatabasePath, getMigrationStatus, runMigrations } from './sqlite';
import { logger } from '../utils/logger';

dotenvFlow.config();

const run = async (): Promise<void> => {
  try {
    await runMigrations();
    const { applied, pending } = await getMigrationStatus();
    logger.info({ databasePath: getDatabasePath(), applied, pending }, 'migrations applied');
  } catch (error) {
    logger.error({ err: error }, 'migration run failed');
    process.exitCode = 1;
  } finally {
    await closeDatabase();
  }
};

run().catch((error: unknown) => {
  logger.error({ err: error }, 'unexpected migration failure');
  process.exit(1);
});
