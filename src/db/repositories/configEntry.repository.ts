import { randomUUID } from 'crypto';

import {
  migrateEntryPayload,
  persistedCredentialsSchema,
  persistedOptionsSchema,
  serializeCredentials,
  serializeOptions,
  type ConfigEntry,
  type CredentialSet,
  type EntryOptions,
} from '../../models/configEntry';
import { logger } from '../../utils/logger';
import { all, get, getDatabase, run } from '../sqlite';

export interface CredentialStore {
  saveCredentials(entryId: string, credentials: CredentialSet): Promise<void>;
}

export interface ConfigEntryStore extends CredentialStore {
  listEntries(): Promise<ConfigEntry[]>;
  getEntry(entryId: string): Promise<ConfigEntry | null>;
  findEntryByClientId(clientId: string): Promise<ConfigEntry | null>;
  createEntry(input: {
    title: string;
    credentials: CredentialSet;
    options: EntryOptions;
  }): Promise<ConfigEntry>;
  saveOptions(entryId: string, options: EntryOptions): Promise<void>;
  deleteEntry(entryId: string): Promise<void>;
}

type ConfigEntryRow = {
  entryId: string;
  title: string;
  data: string;
  options: string;
  createdAt: string;
  updatedAt: string;
};

const SELECT_COLUMNS = `SELECT entry_id AS entryId,
              title,
              data,
              options,
              created_at AS createdAt,
              updated_at AS updatedAt
       FROM config_entries`;

const parseJsonObject = (value: string): Record<string, unknown> => {
  const parsed: unknown = JSON.parse(value);
  if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) {
    return {};
  }

  return Object.fromEntries(Object.entries(parsed));
};

const mapRow = async (row: ConfigEntryRow): Promise<ConfigEntry> => {
  const payload = migrateEntryPayload({
    data: parseJsonObject(row.data),
    options: parseJsonObject(row.options),
  });

  if (payload.migrated) {
    const db = await getDatabase();
    await run(
      db,
      `UPDATE config_entries
       SET data = ?, options = ?, updated_at = CURRENT_TIMESTAMP
       WHERE entry_id = ?;`,
      [JSON.stringify(payload.data), JSON.stringify(payload.options), row.entryId],
    );
    logger.info({ entryId: row.entryId }, 'config entry migrated to data/options layout');
  }

  return {
    entryId: row.entryId,
    title: row.title,
    credentials: persistedCredentialsSchema.parse(payload.data),
    options: persistedOptionsSchema.parse(payload.options),
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
};

export const listConfigEntries = async (): Promise<ConfigEntry[]> => {
  const db = await getDatabase();
  const rows = await all<ConfigEntryRow>(db, `${SELECT_COLUMNS} ORDER BY created_at ASC;`);
  return Promise.all(rows.map((row) => mapRow(row)));
};

export const getConfigEntry = async (entryId: string): Promise<ConfigEntry | null> => {
  const db = await getDatabase();
  const row = await get<ConfigEntryRow>(db, `${SELECT_COLUMNS} WHERE entry_id = ?;`, [
    entryId,
  ]);
  return row ? mapRow(row) : null;
};

export const findConfigEntryByClientId = async (
  clientId: string,
): Promise<ConfigEntry | null> => {
  const db = await getDatabase();
  const row = await get<ConfigEntryRow>(
    db,
    `${SELECT_COLUMNS} WHERE client_id = ? ORDER BY created_at ASC LIMIT 1;`,
    [clientId],
  );
  return row ? mapRow(row) : null;
};

export const createConfigEntry = async (input: {
  title: string;
  credentials: CredentialSet;
  options: EntryOptions;
}): Promise<ConfigEntry> => {
  const db = await getDatabase();
  const entryId = randomUUID();
  await run(
    db,
    `INSERT INTO config_entries (entry_id, title, client_id, data, options)
     VALUES (?, ?, ?, ?, ?);`,
    [
      entryId,
      input.title,
      input.credentials.clientId,
      JSON.stringify(serializeCredentials(input.credentials)),
      JSON.stringify(serializeOptions(input.options)),
    ],
  );

  const created = await getConfigEntry(entryId);
  if (!created) {
    throw new Error(`config entry ${entryId} missing after insert`);
  }

  return created;
};

export const saveConfigEntryCredentials = async (
  entryId: string,
  credentials: CredentialSet,
): Promise<void> => {
  const db = await getDatabase();
  await run(
    db,
    `UPDATE config_entries
     SET data = ?, client_id = ?, updated_at = CURRENT_TIMESTAMP
     WHERE entry_id = ?;`,
    [JSON.stringify(serializeCredentials(credentials)), credentials.clientId, entryId],
  );
};

export const saveConfigEntryOptions = async (
  entryId: string,
  options: EntryOptions,
): Promise<void> => {
  const db = await getDatabase();
  await run(
    db,
    `UPDATE config_entries
     SET options = ?, updated_at = CURRENT_TIMESTAMP
     WHERE entry_id = ?;`,
    [JSON.stringify(serializeOptions(options)), entryId],
  );
};

export const deleteConfigEntry = async (entryId: string): Promise<void> => {
  const db = await getDatabase();
  await run(db, 'DELETE FROM config_entries WHERE entry_id = ?;', [entryId]);
};

export const sqliteConfigEntryStore: ConfigEntryStore = {
  listEntries: listConfigEntries,
  getEntry: getConfigEntry,
  findEntryByClientId: findConfigEntryByClientId,
  createEntry: createConfigEntry,
  saveCredentials: saveConfigEntryCredentials,
  saveOptions: saveConfigEntryOptions,
  deleteEntry: deleteConfigEntry,
};
