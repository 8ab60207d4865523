import fs from 'fs';
import path from 'path';
import sqlite3 from 'sqlite3';

import { logger } from '../utils/logger';

sqlite3.verbose();

const DEFAULT_DB_PATH = path.resolve(process.cwd(), 'data', 'bluelink.sqlite');
const MIGRATION_FILE = /^(?<name>.+)\.sql$/;

const resolveMigrationsDirectory = (migrationsDir?: string): string =>
  migrationsDir || process.env.MIGRATIONS_DIR || path.resolve(process.cwd(), 'migrations');

// Concurrent callers share one open attempt.
let opening: Promise<sqlite3.Database> | null = null;

const resolveDatabasePath = (): string => {
  const configured = process.env.DATABASE_PATH?.trim();
  return configured && configured.length > 0 ? configured : DEFAULT_DB_PATH;
};

const isFileBacked = (targetPath: string): boolean =>
  targetPath !== ':memory:' && !targetPath.startsWith('file:');

export const run = (
  database: sqlite3.Database,
  sql: string,
  params: unknown[] = [],
): Promise<void> =>
  new Promise((resolve, reject) => {
    database.run(sql, params, (error) => {
      if (error) {
        reject(error);
        return;
      }

      resolve();
    });
  });

export const all = <T>(
  database: sqlite3.Database,
  sql: string,
  params: unknown[] = [],
): Promise<T[]> =>
  new Promise((resolve, reject) => {
    database.all<T>(sql, params, (error, rows) => {
      if (error) {
        reject(error);
        return;
      }

      resolve(rows ?? []);
    });
  });

export const get = <T>(
  database: sqlite3.Database,
  sql: string,
  params: unknown[] = [],
): Promise<T | null> =>
  new Promise((resolve, reject) => {
    database.get<T>(sql, params, (error, row) => {
      if (error) {
        reject(error);
        return;
      }

      resolve(row ?? null);
    });
  });

const exec = (database: sqlite3.Database, sql: string): Promise<void> =>
  new Promise((resolve, reject) => {
    database.exec(sql, (error) => {
      if (error) {
        reject(error);
        return;
      }

      resolve();
    });
  });

/**
 * Runs `work` inside BEGIN/COMMIT and rolls back when it throws. The thrown
 * error is rethrown even if the rollback itself fails.
 */
export const withTransaction = async <T>(
  database: sqlite3.Database,
  work: () => Promise<T>,
): Promise<T> => {
  await exec(database, 'BEGIN;');
  try {
    const result = await work();
    await exec(database, 'COMMIT;');
    return result;
  } catch (error) {
    await exec(database, 'ROLLBACK;').catch((rollbackError: unknown) => {
      logger.error({ err: rollbackError }, 'transaction rollback failed');
    });
    throw error;
  }
};

const openDatabase = async (databasePath: string): Promise<sqlite3.Database> => {
  if (isFileBacked(databasePath)) {
    fs.mkdirSync(path.dirname(databasePath), { recursive: true });
  }

  const database = await new Promise<sqlite3.Database>((resolve, reject) => {
    const instance = new sqlite3.Database(databasePath, (error) => {
      if (error) {
        reject(error);
        return;
      }

      resolve(instance);
    });
  });

  database.configure('busyTimeout', 5000);
  // Vehicle descriptors cascade with their config entry.
  await exec(database, 'PRAGMA foreign_keys = ON;');
  logger.info({ databasePath }, 'sqlite database ready');
  return database;
};

export const getDatabase = (): Promise<sqlite3.Database> => {
  if (!opening) {
    opening = openDatabase(resolveDatabasePath()).catch((error: unknown) => {
      opening = null;
      throw error;
    });
  }

  return opening;
};

export const closeDatabase = async (): Promise<void> => {
  if (!opening) {
    return;
  }

  const database = await opening;
  opening = null;
  await new Promise<void>((resolve, reject) => {
    database.close((error) => {
      if (error) {
        reject(error);
        return;
      }

      resolve();
    });
  });

  logger.info('sqlite connection closed');
};

const ensureMigrationsTable = (database: sqlite3.Database): Promise<void> =>
  exec(
    database,
    `CREATE TABLE IF NOT EXISTS migrations (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      name TEXT NOT NULL UNIQUE,
      applied_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP
    );`,
  );

const listAppliedMigrations = async (database: sqlite3.Database): Promise<string[]> => {
  const rows = await all<{ name: string }>(
    database,
    'SELECT name FROM migrations ORDER BY name ASC;',
  );
  return rows.map((row) => row.name);
};

type MigrationFile = {
  name: string;
  filePath: string;
};

// `*.down.sql` files are rollbacks and never applied automatically.
const listMigrationFiles = (directory: string): MigrationFile[] => {
  if (!fs.existsSync(directory)) {
    return [];
  }

  return fs
    .readdirSync(directory)
    .filter((file) => !file.endsWith('.down.sql'))
    .sort()
    .flatMap((file) => {
      const name = MIGRATION_FILE.exec(file)?.groups?.name;
      return name ? [{ name, filePath: path.join(directory, file) }] : [];
    });
};

export const runMigrations = async (migrationsDir?: string): Promise<string[]> => {
  const database = await getDatabase();
  await ensureMigrationsTable(database);

  const directory = resolveMigrationsDirectory(migrationsDir);
  const files = listMigrationFiles(directory);
  if (files.length === 0) {
    logger.warn({ directory }, 'no migrations found, skipping');
    return [];
  }

  const applied = new Set(await listAppliedMigrations(database));
  const appliedNow: string[] = [];

  for (const file of files.filter((candidate) => !applied.has(candidate.name))) {
    logger.info({ migration: file.name }, 'running migration');
    const sql = fs.readFileSync(file.filePath, 'utf-8');
    await withTransaction(database, async () => {
      await exec(database, sql);
      await run(database, 'INSERT INTO migrations (name) VALUES (?);', [file.name]);
    });
    appliedNow.push(file.name);
  }

  logger.info({ applied: appliedNow }, 'migration check complete');
  return appliedNow;
};

export const getDatabasePath = (): string => resolveDatabasePath();

export type DatabaseHealth = {
  connected: boolean;
  path: string;
  lastMigration?: string | null;
  error?: string;
};

export const getDatabaseHealth = async (): Promise<DatabaseHealth> => {
  const databasePath = getDatabasePath();
  try {
    const database = await getDatabase();
    await ensureMigrationsTable(database);
    const latest = await get<{ name: string }>(
      database,
      'SELECT name FROM migrations ORDER BY applied_at DESC, name DESC LIMIT 1;',
    );
    return { connected: true, path: databasePath, lastMigration: latest?.name ?? null };
  } catch (error) {
    logger.error({ err: error }, 'database health check failed');
    return {
      connected: false,
      path: databasePath,
      error: error instanceof Error ? error.message : 'unknown error',
    };
  }
};

export type MigrationStatus = {
  applied: string[];
  pending: string[];
};

export const getMigrationStatus = async (migrationsDir?: string): Promise<MigrationStatus> => {
  const database = await getDatabase();
  await ensureMigrationsTable(database);

  const applied = await listAppliedMigrations(database);
  const appliedSet = new Set(applied);
  const pending = listMigrationFiles(resolveMigrationsDirectory(migrationsDir))
    .map((file) => file.name)
    .filter((name) => !appliedSet.has(name));

  return { applied, pending };
};
