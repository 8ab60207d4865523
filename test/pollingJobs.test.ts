import { describe, expect, it } from 'vitest';

import { BluelinkClient } from '../src/integrations/bluelink/client';
import { ENTITY_CATALOGUE } from '../src/services/entities.service';
import {
  buildPollingJobs,
  drivingRangeFields,
  evBatteryFields,
  evChargingFields,
  odometerFields,
  warningFields,
} from '../src/services/pollingJobs';
import { FakeVendorApi } from './support/fakeVendorApi';
import { statusPath, testConfig } from './support/fixtures';

describe('field mappers', () => {
  it('maps driving range with unit codes', () => {
    expect(drivingRangeFields({ value: 320, unit: 1 })).toEqual({
      driving_range: { value: 320, unit: 'km' },
    });
  });

  it('adds the combined range of a plug-in hybrid', () => {
    expect(drivingRangeFields({ value: 40, unit: 1, phevTotalValue: 600, phevTotalUnit: 3 })).toEqual(
      {
        driving_range: { value: 40, unit: 'km' },
        phev_total_range: { value: 600, unit: 'mi' },
      },
    );
  });

  it('keeps an unknown unit code as text', () => {
    expect(drivingRangeFields({ value: 5, unit: 9 })).toEqual({
      driving_range: { value: 5, unit: '9' },
    });
  });

  it('takes the first odometer reading', () => {
    expect(
      odometerFields({
        odometers: [
          { value: 15200.5, unit: 1 },
          { value: 15100, unit: 1 },
        ],
      }),
    ).toEqual({ odometer: { value: 15200.5, unit: 'km' } });
  });

  it('yields nothing for an empty odometer list', () => {
    expect(odometerFields({ odometers: [] })).toEqual({});
  });

  it('derives the plug state from batteryPlugin', () => {
    expect(evBatteryFields({ soc: 72, batteryPlugin: 0 })).toEqual({
      ev_soc: { value: 72, unit: '%' },
      ev_plugged_in: { value: false, unit: null },
    });
    expect(evBatteryFields({ soc: 72, batteryPlugin: 2 })).toMatchObject({
      ev_plugged_in: { value: true },
    });
  });

  it('maps charging state, target and remaining time', () => {
    expect(
      evChargingFields({
        batteryCharge: true,
        remainTime: { value: 45, unit: 1 },
        targetSOC: { plugType: 0, targetSOClevel: 90 },
      }),
    ).toEqual({
      charging_state: { value: true, unit: null },
      charging_target_soc: { value: 90, unit: '%' },
      charging_remaining_time: { value: 45, unit: 'min' },
    });
  });

  it('turns the warning lamp on when any lamp is lit', () => {
    const fields = warningFields({
      lowFuel: false,
      tirePressure: true,
      lampWire: false,
      smartKeyBattery: false,
      washerFluid: false,
      breakOil: false,
      engineOil: false,
    });

    expect(fields.warning_tirePressure).toEqual({ value: true, unit: null });
    expect(fields.warning_breakOil).toEqual({ value: false, unit: null });
    expect(fields.warning_lamp).toEqual({ value: true, unit: null });
    expect(Object.keys(fields)).toEqual(
      ENTITY_CATALOGUE.filter((definition) => definition.job === 'warnings').map(
        (definition) => definition.field,
      ),
    );
  });
});

describe('buildPollingJobs', () => {
  const intervals = testConfig().intervals;

  it('registers the EV jobs only for EV-capable vehicles', () => {
    expect(buildPollingJobs(intervals, { evCapable: false }).map((job) => job.name)).toEqual([
      'driving_range',
      'odometer',
      'warnings',
    ]);
    expect(buildPollingJobs(intervals, { evCapable: true }).map((job) => job.name)).toEqual([
      'driving_range',
      'odometer',
      'ev_battery',
      'ev_charging',
      'warnings',
    ]);
  });

  it('gives only ev_charging a fast interval', () => {
    const jobs = buildPollingJobs(intervals, { evCapable: true });

    expect(jobs.map((job) => [job.name, job.intervalMs, job.fastIntervalMs])).toEqual([
      ['driving_range', 600_000, null],
      ['odometer', 3_600_000, null],
      ['ev_battery', 600_000, null],
      ['ev_charging', 600_000, 60_000],
      ['warnings', 1_800_000, null],
    ]);
  });

  it('reports the fast condition while the vehicle is charging', async () => {
    const fake = new FakeVendorApi();
    fake.on('GET', statusPath('car-ev', 'ev/charging'), {
      data: { batteryCharge: true, remainTime: { value: 30, unit: 1 } },
    });
    const job = buildPollingJobs(intervals, { evCapable: true }).find(
      (candidate) => candidate.name === 'ev_charging',
    );

    const outcome = await job?.poll({
      client: new BluelinkClient(testConfig(), fake.http),
      accessToken: 'tok',
      vehicleId: 'car-ev',
    });

    expect(outcome).toEqual({
      fields: {
        charging_state: { value: true, unit: null },
        charging_remaining_time: { value: 30, unit: 'min' },
      },
      fastCondition: true,
    });
  });

  it('queries every warning lamp in order', async () => {
    const fake = new FakeVendorApi();
    const client = new BluelinkClient(testConfig(), fake.http);
    [
      'lowFuel',
      'tirePressure',
      'lampWire',
      'smartKeyBattery',
      'washerFluid',
      'breakOil',
      'engineOil',
    ].forEach((type) => {
      fake.on('GET', statusPath('car-ice', `warning/${type}`), {
        data: { status: type === 'engineOil' },
      });
    });
    const job = buildPollingJobs(intervals, { evCapable: false }).find(
      (candidate) => candidate.name === 'warnings',
    );

    const outcome = await job?.poll({ client, accessToken: 'tok', vehicleId: 'car-ice' });

    expect(fake.calls.map((call) => call.path.split('/').pop())).toEqual([
      'lowFuel',
      'tirePressure',
      'lampWire',
      'smartKeyBattery',
      'washerFluid',
      'breakOil',
      'engineOil',
    ]);
    expect(outcome?.fields.warning_engineOil).toEqual({ value: true, unit: null });
    expect(outcome?.fastCondition).toBe(false);
  });
});
