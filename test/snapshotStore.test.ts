import { describe, expect, it } from 'vitest';

import { NO_DATA, SnapshotStore } from '../src/services/snapshotStore';

const T1 = new Date('2026-03-01T10:00:00.000Z');
const T2 = new Date('2026-03-01T10:10:00.000Z');

describe('SnapshotStore', () => {
  it('reports no_data for a field that was never written', () => {
    const store = new SnapshotStore();

    expect(store.read('odometer')).toBe(NO_DATA);
    expect(store.readAll()).toEqual({});
    expect(store.version).toBe(0);
  });

  it('stamps every field of a merge with the same time and job', () => {
    const store = new SnapshotStore();

    store.merge(
      'driving_range',
      {
        driving_range: { value: 310, unit: 'km' },
        phev_total_range: { value: 620, unit: 'km' },
      },
      T1,
    );

    expect(store.read('driving_range')).toEqual({
      status: 'present',
      value: 310,
      unit: 'km',
      updatedAt: T1.toISOString(),
      job: 'driving_range',
    });
    expect(store.read('phev_total_range')).toMatchObject({ updatedAt: T1.toISOString() });
    expect(store.version).toBe(1);
  });

  it('keeps fields owned by other jobs when merging', () => {
    const store = new SnapshotStore();
    store.merge('odometer', { odometer: { value: 12000, unit: 'km' } }, T1);

    store.merge('ev_battery', { ev_soc: { value: 80, unit: '%' } }, T2);

    expect(store.readAll()).toEqual({
      odometer: { value: 12000, unit: 'km', updatedAt: T1.toISOString(), job: 'odometer' },
      ev_soc: { value: 80, unit: '%', updatedAt: T2.toISOString(), job: 'ev_battery' },
    });
  });

  it('ignores an empty update', () => {
    const store = new SnapshotStore();
    const seen: string[] = [];
    store.subscribe((job) => seen.push(job));

    store.merge('odometer', {}, T1);

    expect(store.version).toBe(0);
    expect(seen).toEqual([]);
  });

  it('notifies listeners after the whole update is visible', () => {
    const store = new SnapshotStore();
    const observed: Array<[string, unknown, unknown]> = [];
    store.subscribe((job) => {
      const soc = store.read('ev_soc');
      const plugged = store.read('ev_plugged_in');
      observed.push([
        job,
        soc.status === 'present' ? soc.value : null,
        plugged.status === 'present' ? plugged.value : null,
      ]);
    });

    store.merge(
      'ev_battery',
      { ev_soc: { value: 55, unit: '%' }, ev_plugged_in: { value: true, unit: null } },
      T1,
    );

    expect(observed).toEqual([['ev_battery', 55, true]]);
  });

  it('stops notifying after unsubscribe', () => {
    const store = new SnapshotStore();
    const seen: string[] = [];
    const unsubscribe = store.subscribe((job) => seen.push(job));

    store.merge('odometer', { odometer: { value: 1, unit: 'km' } }, T1);
    unsubscribe();
    store.merge('odometer', { odometer: { value: 2, unit: 'km' } }, T2);

    expect(seen).toEqual(['odometer']);
  });

  it('hands out copies that cannot change the stored values', () => {
    const store = new SnapshotStore();
    store.merge('odometer', { odometer: { value: 1, unit: 'km' } }, T1);

    const copy = store.readAll();
    copy.odometer.value = 99;

    expect(store.read('odometer')).toMatchObject({ value: 1 });
  });
});
