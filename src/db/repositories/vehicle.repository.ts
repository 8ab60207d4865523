import { VEHICLE_TYPES, type VehicleDescriptor, type VehicleType } from '../../models/configEntry';
import { all, getDatabase, run } from '../sqlite';

export type VehicleRecord = VehicleDescriptor & {
  entryId: string;
  disabled: boolean;
  lastSeenAt: string | null;
  createdAt: string;
  updatedAt: string;
};

export interface VehicleStore {
  listVehicles(entryId: string): Promise<VehicleRecord[]>;
  upsertVehicle(
    entryId: string,
    descriptor: VehicleDescriptor,
    state: { disabled: boolean; seenAt: string | null },
  ): Promise<void>;
  setVehicleDisabled(entryId: string, vehicleId: string, disabled: boolean): Promise<void>;
  deleteVehicles(entryId: string): Promise<void>;
}

type VehicleRow = {
  entryId: string;
  vehicleId: string;
  nickname: string;
  vin: string | null;
  vehicleType: string | null;
  rawType: string | null;
  model: string | null;
  swVersion: string | null;
  disabled: number;
  lastSeenAt: string | null;
  createdAt: string;
  updatedAt: string;
};

const parseVehicleType = (value: string | null): VehicleType | null =>
  VEHICLE_TYPES.find((type) => type === value) ?? null;

const mapVehicleRow = (row: VehicleRow): VehicleRecord => ({
  entryId: row.entryId,
  vehicleId: row.vehicleId,
  nickname: row.nickname,
  vin: row.vin,
  type: parseVehicleType(row.vehicleType),
  rawType: row.rawType,
  model: row.model,
  swVersion: row.swVersion,
  disabled: Number(row.disabled) === 1,
  lastSeenAt: row.lastSeenAt,
  createdAt: row.createdAt,
  updatedAt: row.updatedAt,
});

export const listVehicles = async (entryId: string): Promise<VehicleRecord[]> => {
  const db = await getDatabase();
  const rows = await all<VehicleRow>(
    db,
    `SELECT entry_id AS entryId,
            vehicle_id AS vehicleId,
            nickname,
            vin,
            vehicle_type AS vehicleType,
            raw_type AS rawType,
            model,
            sw_version AS swVersion,
            disabled,
            last_seen_at AS lastSeenAt,
            created_at AS createdAt,
            updated_at AS updatedAt
     FROM vehicles
     WHERE entry_id = ?
     ORDER BY created_at ASC, vehicle_id ASC;`,
    [entryId],
  );

  return rows.map((row) => mapVehicleRow(row));
};

export const upsertVehicle = async (
  entryId: string,
  descriptor: VehicleDescriptor,
  state: { disabled: boolean; seenAt: string | null },
): Promise<void> => {
  const db = await getDatabase();
  await run(
    db,
    `INSERT INTO vehicles (
       entry_id, vehicle_id, nickname, vin, vehicle_type, raw_type, model, sw_version,
       disabled, last_seen_at, updated_at
     ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, CURRENT_TIMESTAMP)
     ON CONFLICT(entry_id, vehicle_id) DO UPDATE SET
       nickname = excluded.nickname,
       vin = COALESCE(excluded.vin, vehicles.vin),
       vehicle_type = excluded.vehicle_type,
       raw_type = excluded.raw_type,
       model = excluded.model,
       sw_version = excluded.sw_version,
       disabled = excluded.disabled,
       last_seen_at = COALESCE(excluded.last_seen_at, vehicles.last_seen_at),
       updated_at = CURRENT_TIMESTAMP;`,
    [
      entryId,
      descriptor.vehicleId,
      descriptor.nickname,
      descriptor.vin,
      descriptor.type,
      descriptor.rawType,
      descriptor.model,
      descriptor.swVersion,
      state.disabled ? 1 : 0,
      state.seenAt,
    ],
  );
};

export const setVehicleDisabled = async (
  entryId: string,
  vehicleId: string,
  disabled: boolean,
): Promise<void> => {
  const db = await getDatabase();
  await run(
    db,
    `UPDATE vehicles
     SET disabled = ?, updated_at = CURRENT_TIMESTAMP
     WHERE entry_id = ? AND vehicle_id = ?;`,
    [disabled ? 1 : 0, entryId, vehicleId],
  );
};

export const deleteVehicles = async (entryId: string): Promise<void> => {
  const db = await getDatabase();
  await run(db, 'DELETE FROM vehicles WHERE entry_id = ?;', [entryId]);
};

export const sqliteVehicleStore: VehicleStore = {
  listVehicles,
  upsertVehicle,
  setVehicleDisabled,
  deleteVehicles,
};
