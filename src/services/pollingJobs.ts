import type { PollingIntervals } from '../config/bluelinkConfig';
import type { BluelinkClient } from '../integrations/bluelink/client';
import {
  DISTANCE_UNITS,
  TIME_UNITS,
  WARNING_TYPES,
  resolveUnit,
  type DrivingRangePayload,
  type EvBatteryPayload,
  type EvChargingPayload,
  type OdometerPayload,
  type WarningType,
} from '../models/bluelink';
import type { FieldUpdates } from './snapshotStore';

export const JOB_NAMES = [
  'driving_range',
  'odometer',
  'ev_battery',
  'ev_charging',
  'warnings',
] as const;

export type JobName = (typeof JOB_NAMES)[number];

export type VehicleDataClient = Pick<
  BluelinkClient,
  'getDrivingRange' | 'getOdometer' | 'getEvBattery' | 'getEvCharging' | 'getWarning'
>;

export type PollContext = {
  client: VehicleDataClient;
  accessToken: string;
  vehicleId: string;
};

export type PollOutcome = {
  fields: FieldUpdates;
  // Whether the payload asks for the job's fast cadence.
  fastCondition: boolean;
};

export type PollingJob = {
  name: JobName;
  intervalMs: number;
  fastIntervalMs: number | null;
  poll(context: PollContext): Promise<PollOutcome>;
};

type JobDefinition<T> = {
  name: JobName;
  intervalMs: number;
  fastIntervalMs?: number;
  fetch: (context: PollContext) => Promise<T>;
  toFields: (payload: T) => FieldUpdates;
  fastCondition?: (payload: T) => boolean;
};

/**
 * Pairs one vendor call with the function that turns its payload into snapshot
 * fields. The payload type stays inside the closure.
 */
export const definePollingJob = <T>(definition: JobDefinition<T>): PollingJob => ({
  name: definition.name,
  intervalMs: definition.intervalMs,
  fastIntervalMs: definition.fastIntervalMs ?? null,
  async poll(context) {
    const payload = await definition.fetch(context);
    return {
      fields: definition.toFields(payload),
      fastCondition: definition.fastCondition ? definition.fastCondition(payload) : false,
    };
  },
});

export const drivingRangeFields = (payload: DrivingRangePayload): FieldUpdates => {
  const fields: FieldUpdates = {
    driving_range: { value: payload.value, unit: resolveUnit(DISTANCE_UNITS, payload.unit) },
  };

  if (payload.phevTotalValue !== undefined) {
    fields.phev_total_range = {
      value: payload.phevTotalValue,
      unit: resolveUnit(DISTANCE_UNITS, payload.phevTotalUnit ?? payload.unit),
    };
  }

  return fields;
};

// The vendor lists the most recent reading first.
export const odometerFields = (payload: OdometerPayload): FieldUpdates => {
  const [latest] = payload.odometers;
  if (!latest) {
    return {};
  }

  return { odometer: { value: latest.value, unit: resolveUnit(DISTANCE_UNITS, latest.unit) } };
};

export const evBatteryFields = (payload: EvBatteryPayload): FieldUpdates => {
  const fields: FieldUpdates = { ev_soc: { value: payload.soc, unit: '%' } };
  if (payload.batteryPlugin !== undefined) {
    fields.ev_plugged_in = { value: payload.batteryPlugin > 0, unit: null };
  }

  return fields;
};

export const evChargingFields = (payload: EvChargingPayload): FieldUpdates => {
  const fields: FieldUpdates = {
    charging_state: { value: payload.batteryCharge, unit: null },
  };

  const targetLevel = payload.targetSOC?.targetSOClevel;
  if (targetLevel !== undefined) {
    fields.charging_target_soc = { value: targetLevel, unit: '%' };
  }

  if (payload.remainTime) {
    fields.charging_remaining_time = {
      value: payload.remainTime.value,
      unit: resolveUnit(TIME_UNITS, payload.remainTime.unit),
    };
  }

  return fields;
};

export const warningFieldName = (type: WarningType): string => `warning_${type}`;

export const warningFields = (statuses: Record<WarningType, boolean>): FieldUpdates => {
  const fields: FieldUpdates = {};
  WARNING_TYPES.forEach((type) => {
    fields[warningFieldName(type)] = { value: statuses[type], unit: null };
  });
  fields.warning_lamp = {
    value: WARNING_TYPES.some((type) => statuses[type]),
    unit: null,
  };
  return fields;
};

// One call per lamp, issued in sequence; any failure fails the whole job.
const fetchWarnings = async ({
  client,
  accessToken,
  vehicleId,
}: PollContext): Promise<Record<WarningType, boolean>> => {
  const statuses: Record<WarningType, boolean> = {
    lowFuel: false,
    tirePressure: false,
    lampWire: false,
    smartKeyBattery: false,
    washerFluid: false,
    breakOil: false,
    engineOil: false,
  };

  for (const type of WARNING_TYPES) {
    const payload = await client.getWarning(accessToken, vehicleId, type);
    statuses[type] = payload.status;
  }

  return statuses;
};

/**
 * Builds the fixed job set for one vehicle. EV jobs are only included for
 * EV-capable vehicles.
 */
export const buildPollingJobs = (
  intervals: PollingIntervals,
  options: { evCapable: boolean },
): PollingJob[] => {
  const jobs: PollingJob[] = [
    definePollingJob({
      name: 'driving_range',
      intervalMs: intervals.drivingRangeMs,
      fetch: ({ client, accessToken, vehicleId }) =>
        client.getDrivingRange(accessToken, vehicleId),
      toFields: drivingRangeFields,
    }),
    definePollingJob({
      name: 'odometer',
      intervalMs: intervals.odometerMs,
      fetch: ({ client, accessToken, vehicleId }) => client.getOdometer(accessToken, vehicleId),
      toFields: odometerFields,
    }),
  ];

  if (options.evCapable) {
    jobs.push(
      definePollingJob({
        name: 'ev_battery',
        intervalMs: intervals.evBatteryMs,
        fetch: ({ client, accessToken, vehicleId }) =>
          client.getEvBattery(accessToken, vehicleId),
        toFields: evBatteryFields,
      }),
      definePollingJob({
        name: 'ev_charging',
        intervalMs: intervals.evChargingMs,
        fastIntervalMs: intervals.evChargingFastMs,
        fetch: ({ client, accessToken, vehicleId }) =>
          client.getEvCharging(accessToken, vehicleId),
        toFields: evChargingFields,
        fastCondition: (payload) => payload.batteryCharge,
      }),
    );
  }

  jobs.push(
    definePollingJob({
      name: 'warnings',
      intervalMs: intervals.warningsMs,
      fetch: fetchWarnings,
      toFields: warningFields,
    }),
  );

  return jobs;
};
