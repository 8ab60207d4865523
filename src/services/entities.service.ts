import { WARNING_TYPES, type WarningType } from '../models/bluelink';
import type { JobStatus } from './pollingCoordinator.service';
import { warningFieldName, type JobName } from './pollingJobs';
import type { SnapshotStore, SnapshotValue } from './snapshotStore';

export type EntityKind = 'sensor' | 'binary_sensor';

export type EntityDefinition = {
  key: string;
  name: string;
  kind: EntityKind;
  field: string;
  job: JobName;
};

export type EntityStatus = 'no_data' | 'fresh' | 'stale';

export type EntityState = {
  entityId: string;
  name: string;
  kind: EntityKind;
  state: SnapshotValue;
  unit: string | null;
  available: boolean;
  status: EntityStatus;
  updatedAt: string | null;
  staleSince: string | null;
};

export type ButtonState = {
  entityId: string;
  name: string;
  available: boolean;
};

export const FORCE_REFRESH_KEY = 'force_refresh';

const WARNING_LABELS: Record<WarningType, string> = {
  lowFuel: 'Low Fuel Warning',
  tirePressure: 'Tire Pressure Warning',
  lampWire: 'Lamp Wire Warning',
  smartKeyBattery: 'Smart Key Battery Warning',
  washerFluid: 'Washer Fluid Warning',
  breakOil: 'Brake Oil Warning',
  engineOil: 'Engine Oil Warning',
};

export const ENTITY_CATALOGUE: EntityDefinition[] = [
  {
    key: 'driving_range',
    name: 'Driving Range',
    kind: 'sensor',
    field: 'driving_range',
    job: 'driving_range',
  },
  {
    key: 'phev_total_range',
    name: 'Total Range',
    kind: 'sensor',
    field: 'phev_total_range',
    job: 'driving_range',
  },
  { key: 'odometer', name: 'Odometer', kind: 'sensor', field: 'odometer', job: 'odometer' },
  { key: 'ev_soc', name: 'EV SOC', kind: 'sensor', field: 'ev_soc', job: 'ev_battery' },
  {
    key: 'ev_plugged_in',
    name: 'EV Plugged In',
    kind: 'binary_sensor',
    field: 'ev_plugged_in',
    job: 'ev_battery',
  },
  {
    key: 'charging_state',
    name: 'Charging',
    kind: 'binary_sensor',
    field: 'charging_state',
    job: 'ev_charging',
  },
  {
    key: 'charging_target_soc',
    name: 'Charging Target SOC',
    kind: 'sensor',
    field: 'charging_target_soc',
    job: 'ev_charging',
  },
  {
    key: 'charging_remaining_time',
    name: 'Charging Remaining Time',
    kind: 'sensor',
    field: 'charging_remaining_time',
    job: 'ev_charging',
  },
  ...WARNING_TYPES.map<EntityDefinition>((type) => ({
    key: warningFieldName(type),
    name: WARNING_LABELS[type],
    kind: 'binary_sensor',
    field: warningFieldName(type),
    job: 'warnings',
  })),
  {
    key: 'warning_lamp',
    name: 'Warning Lamp',
    kind: 'binary_sensor',
    field: 'warning_lamp',
    job: 'warnings',
  },
];

export type EntityContext = {
  vehicleId: string;
  vehicleName: string;
  snapshot: SnapshotStore;
  jobs: JobStatus[];
  available: boolean;
};

const toTime = (iso: string): number => new Date(iso).getTime();

/**
 * A value is stale once its job failed after the value was written. Never
 * written values report `no_data` instead.
 */
export const resolveEntityStatus = (
  updatedAt: string,
  job: JobStatus | undefined,
): { status: EntityStatus; staleSince: string | null } => {
  if (!job?.failingSince || toTime(job.failingSince) < toTime(updatedAt)) {
    return { status: 'fresh', staleSince: null };
  }

  return { status: 'stale', staleSince: job.failingSince };
};

// Entities whose job is not registered for this vehicle are left out.
export const buildEntityStates = (context: EntityContext): EntityState[] => {
  const jobsByName = new Map(context.jobs.map((job) => [job.name, job]));

  return ENTITY_CATALOGUE.filter((definition) => jobsByName.has(definition.job)).map(
    (definition) => {
      const entityId = `${context.vehicleId}_${definition.key}`;
      const name = `${context.vehicleName} ${definition.name}`;
      const reading = context.snapshot.read(definition.field);

      if (reading.status === 'no_data') {
        return {
          entityId,
          name,
          kind: definition.kind,
          state: null,
          unit: null,
          available: context.available,
          status: 'no_data',
          updatedAt: null,
          staleSince: null,
        };
      }

      return {
        entityId,
        name,
        kind: definition.kind,
        state: reading.value,
        unit: reading.unit,
        available: context.available,
        updatedAt: reading.updatedAt,
        ...resolveEntityStatus(reading.updatedAt, jobsByName.get(definition.job)),
      };
    },
  );
};

export const buildButtonStates = (
  context: Pick<EntityContext, 'vehicleId' | 'vehicleName' | 'available'>,
): ButtonState[] => [
  {
    entityId: `${context.vehicleId}_${FORCE_REFRESH_KEY}`,
    name: `${context.vehicleName} Force Refresh`,
    available: context.available,
  },
];
