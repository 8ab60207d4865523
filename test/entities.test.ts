import { describe, expect, it } from 'vitest';

import {
  ENTITY_CATALOGUE,
  buildButtonStates,
  buildEntityStates,
  resolveEntityStatus,
} from '../src/services/entities.service';
import type { JobStatus } from '../src/services/pollingCoordinator.service';
import type { JobName } from '../src/services/pollingJobs';
import { SnapshotStore } from '../src/services/snapshotStore';

const T0 = '2026-03-01T09:00:00.000Z';
const T1 = '2026-03-01T10:00:00.000Z';
const T2 = '2026-03-01T11:00:00.000Z';

const jobStatus = (name: JobName, overrides: Partial<JobStatus> = {}): JobStatus => ({
  name,
  intervalMs: 600_000,
  fastIntervalMs: null,
  fastActive: false,
  inFlight: false,
  lastRunAt: null,
  lastSuccessAt: null,
  lastError: null,
  failingSince: null,
  nextRunAt: null,
  ...overrides,
});

describe('resolveEntityStatus', () => {
  it('is fresh while the owning job is healthy', () => {
    expect(resolveEntityStatus(T1, jobStatus('odometer'))).toEqual({
      status: 'fresh',
      staleSince: null,
    });
  });

  it('is stale once the job failed after the value was written', () => {
    expect(resolveEntityStatus(T1, jobStatus('odometer', { failingSince: T2 }))).toEqual({
      status: 'stale',
      staleSince: T2,
    });
  });

  it('ignores a failure older than the value', () => {
    expect(resolveEntityStatus(T1, jobStatus('odometer', { failingSince: T0 }))).toEqual({
      status: 'fresh',
      staleSince: null,
    });
  });
});

describe('buildEntityStates', () => {
  it('only exposes entities of registered jobs', () => {
    const states = buildEntityStates({
      vehicleId: 'car-ice',
      vehicleName: 'Sonata',
      snapshot: new SnapshotStore(),
      jobs: [jobStatus('odometer')],
      available: true,
    });

    expect(states).toEqual([
      {
        entityId: 'car-ice_odometer',
        name: 'Sonata Odometer',
        kind: 'sensor',
        state: null,
        unit: null,
        available: true,
        status: 'no_data',
        updatedAt: null,
        staleSince: null,
      },
    ]);
  });

  it('reads values and staleness from the snapshot and job status', () => {
    const snapshot = new SnapshotStore();
    snapshot.merge('odometer', { odometer: { value: 12000, unit: 'km' } }, new Date(T1));
    snapshot.merge('ev_battery', { ev_soc: { value: 64, unit: '%' } }, new Date(T1));

    const states = buildEntityStates({
      vehicleId: 'car-ev',
      vehicleName: 'Blue Ioniq',
      snapshot,
      jobs: [jobStatus('odometer', { failingSince: T2 }), jobStatus('ev_battery')],
      available: false,
    });

    expect(states.map((state) => state.entityId)).toEqual([
      'car-ev_odometer',
      'car-ev_ev_soc',
      'car-ev_ev_plugged_in',
    ]);
    expect(states[0]).toMatchObject({
      state: 12000,
      unit: 'km',
      status: 'stale',
      updatedAt: T1,
      staleSince: T2,
      available: false,
    });
    expect(states[1]).toMatchObject({ name: 'Blue Ioniq EV SOC', state: 64, status: 'fresh' });
    expect(states[2]).toMatchObject({ kind: 'binary_sensor', status: 'no_data' });
  });

  it('lists one binary sensor per warning lamp plus the aggregate lamp', () => {
    const warnings = ENTITY_CATALOGUE.filter((definition) => definition.job === 'warnings');

    expect(warnings.map((definition) => definition.name)).toEqual([
      'Low Fuel Warning',
      'Tire Pressure Warning',
      'Lamp Wire Warning',
      'Smart Key Battery Warning',
      'Washer Fluid Warning',
      'Brake Oil Warning',
      'Engine Oil Warning',
      'Warning Lamp',
    ]);
    expect(warnings.every((definition) => definition.kind === 'binary_sensor')).toBe(true);
  });
});

describe('buildButtonStates', () => {
  it('exposes the force refresh button', () => {
    expect(
      buildButtonStates({ vehicleId: 'car-ev', vehicleName: 'Blue Ioniq', available: true }),
    ).toEqual([
      { entityId: 'car-ev_force_refresh', name: 'Blue Ioniq Force Refresh', available: true },
    ]);
  });
});
