import { z } from 'zod';

const optionalText = z.string().optional();

export const tokenResponseSchema = z.object({
  access_token: z.string().min(1, 'access_token is required'),
  refresh_token: z.string().min(1).optional(),
  token_type: optionalText,
  expires_in: z.number().positive().optional(),
});

export type TokenResponse = z.infer<typeof tokenResponseSchema>;

export const profileSchema = z
  .object({
    id: z.string().min(1, 'profile id is required'),
    email: optionalText,
    name: optionalText,
  })
  .passthrough();

export type BluelinkProfile = z.infer<typeof profileSchema>;

export const carSchema = z
  .object({
    carId: z.string().min(1),
    carNickname: optionalText,
    carName: optionalText,
    carType: optionalText,
    carSellname: optionalText,
  })
  .passthrough();

export type BluelinkCar = z.infer<typeof carSchema>;

export const carListSchema = z.object({
  cars: z.array(carSchema),
});

export const drivingRangeSchema = z.object({
  msgId: optionalText,
  timestamp: optionalText,
  value: z.number(),
  unit: z.number().int(),
  phevTotalValue: z.number().optional(),
  phevTotalUnit: z.number().int().optional(),
});

export type DrivingRangePayload = z.infer<typeof drivingRangeSchema>;

export const odometerSchema = z.object({
  msgId: optionalText,
  odometers: z.array(
    z.object({
      date: optionalText,
      timestamp: optionalText,
      value: z.number(),
      unit: z.number().int(),
    }),
  ),
});

export type OdometerPayload = z.infer<typeof odometerSchema>;

export const evBatterySchema = z.object({
  msgId: optionalText,
  timestamp: optionalText,
  soc: z.number().min(0).max(100),
  batteryPlugin: z.number().int().optional(),
});

export type EvBatteryPayload = z.infer<typeof evBatterySchema>;

export const evChargingSchema = z.object({
  msgId: optionalText,
  timestamp: optionalText,
  batteryCharge: z.boolean(),
  batteryPlugin: z.number().int().optional(),
  soc: z.number().min(0).max(100).optional(),
  remainTime: z
    .object({
      value: z.number(),
      unit: z.number().int(),
    })
    .optional(),
  targetSOC: z
    .object({
      plugType: z.number().int().optional(),
      targetSOClevel: z.number().optional(),
    })
    .optional(),
});

export type EvChargingPayload = z.infer<typeof evChargingSchema>;

export const WARNING_TYPES = [
  'lowFuel',
  'tirePressure',
  'lampWire',
  'smartKeyBattery',
  'washerFluid',
  'breakOil',
  'engineOil',
] as const;

export type WarningType = (typeof WARNING_TYPES)[number];

export const warningSchema = z.object({
  msgId: optionalText,
  timestamp: optionalText,
  status: z.boolean(),
});

export type WarningPayload = z.infer<typeof warningSchema>;

export const vendorErrorSchema = z
  .object({
    errCode: z.union([z.string(), z.number()]).transform((value) => String(value)),
    errMsg: z.string().optional(),
  })
  .passthrough();

export const DISTANCE_UNITS: Record<number, string> = {
  0: 'ft',
  1: 'km',
  2: 'm',
  3: 'mi',
};

export const TIME_UNITS: Record<number, string> = {
  0: 'h',
  1: 'min',
  2: 'ms',
  3: 's',
};

export const resolveUnit = (table: Record<number, string>, code: number): string =>
  table[code] ?? String(code);
