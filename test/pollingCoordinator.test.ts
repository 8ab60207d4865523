import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { BluelinkClient } from '../src/integrations/bluelink/client';
import { WARNING_TYPES } from '../src/models/bluelink';
import { PollingCoordinator } from '../src/services/pollingCoordinator.service';
import { buildPollingJobs, type JobName } from '../src/services/pollingJobs';
import { SnapshotStore } from '../src/services/snapshotStore';
import { ReauthRequiredError } from '../src/utils/errors';
import { FakeVendorApi, deferred, type FakeReply } from './support/fakeVendorApi';
import { MINUTE, statusPath, testConfig } from './support/fixtures';

const NOW = Date.parse('2026-03-01T09:00:00.000Z');
const at = (offsetMs: number): string => new Date(NOW + offsetMs).toISOString();

class StubTokenSource {
  invalidations = 0;

  reauthRequired = false;

  async getValidToken(): Promise<string> {
    if (this.reauthRequired) {
      throw new ReauthRequiredError('Re-authentication required: test', {
        operation: 'get valid token',
      });
    }
    return 'tok';
  }

  invalidateAccessToken(): void {
    this.invalidations += 1;
  }
}

const routeWarnings = (fake: FakeVendorApi, carId: string): void => {
  WARNING_TYPES.forEach((type) => {
    fake.on('GET', statusPath(carId, `warning/${type}`), { data: { status: false } });
  });
};

describe('PollingCoordinator', () => {
  let fake: FakeVendorApi;
  let tokens: StubTokenSource;
  let snapshot: SnapshotStore;

  const createCoordinator = (vehicleId: string, names: JobName[]): PollingCoordinator =>
    new PollingCoordinator({
      entryId: 'entry-1',
      vehicleId,
      jobs: buildPollingJobs(testConfig().intervals, { evCapable: true }).filter((job) =>
        names.includes(job.name),
      ),
      client: new BluelinkClient(testConfig(), fake.http),
      tokenManager: tokens,
      snapshot,
    });

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(NOW);
    fake = new FakeVendorApi();
    tokens = new StubTokenSource();
    snapshot = new SnapshotStore();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('runs every job once on start and schedules each on its own interval', async () => {
    fake.on('GET', statusPath('car-ev', 'dte'), { data: { value: 300, unit: 1 } });
    fake.on('GET', statusPath('car-ev', 'odometer'), {
      data: { odometers: [{ value: 12000, unit: 1 }] },
    });
    const coordinator = createCoordinator('car-ev', ['driving_range', 'odometer']);

    await coordinator.start();

    expect(coordinator.isRunning).toBe(true);
    expect(coordinator.getJobStatuses().map((status) => [status.name, status.nextRunAt])).toEqual([
      ['driving_range', at(10 * MINUTE)],
      ['odometer', at(60 * MINUTE)],
    ]);

    await vi.advanceTimersByTimeAsync(60 * MINUTE);

    expect(fake.callsTo('GET', statusPath('car-ev', 'dte'))).toHaveLength(7);
    expect(fake.callsTo('GET', statusPath('car-ev', 'odometer'))).toHaveLength(2);
    coordinator.stop();
  });

  it('switches ev_charging to the fast interval while charging and back afterwards', async () => {
    let charging = false;
    fake.on('GET', statusPath('car-ev', 'ev/charging'), () => ({
      data: { batteryCharge: charging },
    }));
    const chargingCalls = (): number =>
      fake.callsTo('GET', statusPath('car-ev', 'ev/charging')).length;
    const coordinator = createCoordinator('car-ev', ['ev_charging']);

    await coordinator.start();
    expect(coordinator.getJobStatus('ev_charging')).toMatchObject({
      fastActive: false,
      nextRunAt: at(10 * MINUTE),
    });

    charging = true;
    await vi.advanceTimersByTimeAsync(10 * MINUTE);
    expect(chargingCalls()).toBe(2);
    expect(coordinator.getJobStatus('ev_charging')).toMatchObject({
      fastActive: true,
      nextRunAt: at(11 * MINUTE),
    });

    await vi.advanceTimersByTimeAsync(MINUTE);
    expect(chargingCalls()).toBe(3);

    charging = false;
    await vi.advanceTimersByTimeAsync(MINUTE);
    expect(chargingCalls()).toBe(4);
    expect(coordinator.getJobStatus('ev_charging')).toMatchObject({
      fastActive: false,
      nextRunAt: at(22 * MINUTE),
    });

    await vi.advanceTimersByTimeAsync(9 * MINUTE);
    expect(chargingCalls()).toBe(4);
    await vi.advanceTimersByTimeAsync(MINUTE);
    expect(chargingCalls()).toBe(5);
    coordinator.stop();
  });

  it('keeps the last odometer value when the vendor rate-limits', async () => {
    fake.on('GET', statusPath('car-ev', 'odometer'), {
      data: { odometers: [{ value: 12000, unit: 1 }] },
    });
    const coordinator = createCoordinator('car-ev', ['odometer']);
    await coordinator.start();

    fake.on('GET', statusPath('car-ev', 'odometer'), {
      status: 429,
      data: { errCode: '4029', errMsg: 'too many requests' },
    });
    await vi.advanceTimersByTimeAsync(60 * MINUTE);

    expect(snapshot.read('odometer')).toEqual({
      status: 'present',
      value: 12000,
      unit: 'km',
      updatedAt: at(0),
      job: 'odometer',
    });
    expect(coordinator.getJobStatus('odometer')).toMatchObject({
      lastSuccessAt: at(0),
      failingSince: at(60 * MINUTE),
      nextRunAt: at(120 * MINUTE),
      lastError: {
        code: 'RATE_LIMITED',
        message: 'odometer request failed (4029): too many requests',
        at: at(60 * MINUTE),
      },
    });

    await vi.advanceTimersByTimeAsync(59 * MINUTE);
    expect(fake.callsTo('GET', statusPath('car-ev', 'odometer'))).toHaveLength(2);
    coordinator.stop();
  });

  it('drops the fast cadence when a charging poll fails', async () => {
    let reply: FakeReply = { data: { batteryCharge: true } };
    fake.on('GET', statusPath('car-ev', 'ev/charging'), () => reply);
    const coordinator = createCoordinator('car-ev', ['ev_charging']);
    await coordinator.start();
    expect(coordinator.getJobStatus('ev_charging')).toMatchObject({
      fastActive: true,
      nextRunAt: at(MINUTE),
    });

    reply = { status: 429, data: { errCode: '4029', errMsg: 'too many requests' } };
    await vi.advanceTimersByTimeAsync(MINUTE);

    expect(coordinator.getJobStatus('ev_charging')).toMatchObject({
      fastActive: false,
      failingSince: at(MINUTE),
      nextRunAt: at(11 * MINUTE),
    });
    coordinator.stop();
  });

  it('clears the failure after the next success', async () => {
    fake.on('GET', statusPath('car-ev', 'dte'), { status: 500, data: {} });
    const coordinator = createCoordinator('car-ev', ['driving_range']);
    await coordinator.start();

    expect(coordinator.getJobStatus('driving_range')).toMatchObject({
      failingSince: at(0),
      lastError: { code: 'UPSTREAM_ERROR' },
    });
    expect(snapshot.read('driving_range')).toEqual({ status: 'no_data' });

    fake.on('GET', statusPath('car-ev', 'dte'), { data: { value: 250, unit: 1 } });
    await vi.advanceTimersByTimeAsync(10 * MINUTE);

    expect(coordinator.getJobStatus('driving_range')).toMatchObject({
      failingSince: null,
      lastError: null,
      lastSuccessAt: at(10 * MINUTE),
    });
    expect(snapshot.read('driving_range')).toMatchObject({ value: 250 });
    coordinator.stop();
  });

  it('does not issue a second request for a job already in flight', async () => {
    routeWarnings(fake, 'car-ev');
    const gate = deferred<FakeReply>();
    fake.on('GET', statusPath('car-ev', 'warning/lowFuel'), () => gate.promise);
    const coordinator = createCoordinator('car-ev', ['warnings']);

    const starting = coordinator.start();
    expect(coordinator.getJobStatus('warnings')?.inFlight).toBe(true);
    const refreshing = coordinator.refreshAll();
    gate.resolve({ data: { status: true } });
    const [, statuses] = await Promise.all([starting, refreshing]);

    expect(fake.callsTo('GET', statusPath('car-ev', 'warning/lowFuel'))).toHaveLength(1);
    expect(statuses).toEqual([expect.objectContaining({ name: 'warnings', inFlight: false })]);
    expect(snapshot.read('warning_lamp')).toMatchObject({ value: true });
    coordinator.stop();
  });

  it('invalidates the access token when the vendor rejects it', async () => {
    fake.on('GET', statusPath('car-ev', 'dte'), { status: 401, data: {} });
    const coordinator = createCoordinator('car-ev', ['driving_range']);

    await coordinator.start();

    expect(tokens.invalidations).toBe(1);
    expect(coordinator.getJobStatus('driving_range')?.lastError?.code).toBe('AUTH_ERROR');
    coordinator.stop();
  });

  it('halts every timer once re-authentication is required', async () => {
    fake.on('GET', statusPath('car-ev', 'dte'), { data: { value: 300, unit: 1 } });
    fake.on('GET', statusPath('car-ev', 'odometer'), {
      data: { odometers: [{ value: 12000, unit: 1 }] },
    });
    const coordinator = createCoordinator('car-ev', ['driving_range', 'odometer']);
    await coordinator.start();

    tokens.reauthRequired = true;
    await vi.advanceTimersByTimeAsync(10 * MINUTE);

    expect(coordinator.isHalted).toBe(true);
    expect(coordinator.getJobStatuses().map((status) => status.nextRunAt)).toEqual([null, null]);
    expect(coordinator.getJobStatus('driving_range')?.lastError?.code).toBe('REAUTH_REQUIRED');

    await vi.advanceTimersByTimeAsync(120 * MINUTE);
    expect(fake.calls).toHaveLength(2);

    tokens.reauthRequired = false;
    await coordinator.start();
    expect(coordinator.isHalted).toBe(false);
    expect(fake.calls).toHaveLength(4);
    coordinator.stop();
  });

  it('stops scheduling after stop()', async () => {
    fake.on('GET', statusPath('car-ev', 'dte'), { data: { value: 300, unit: 1 } });
    const coordinator = createCoordinator('car-ev', ['driving_range']);
    await coordinator.start();

    coordinator.stop();
    await vi.advanceTimersByTimeAsync(60 * MINUTE);

    expect(fake.calls).toHaveLength(1);
    expect(coordinator.isRunning).toBe(false);
    expect(coordinator.getJobStatus('driving_range')?.nextRunAt).toBeNull();
  });

  it('returns null for a job that is not registered', async () => {
    const coordinator = createCoordinator('car-ice', ['driving_range']);

    await expect(coordinator.refreshJob('ev_charging')).resolves.toBeNull();
    expect(coordinator.getJobStatus('ev_charging')).toBeNull();
  });
});
