import { z } from 'zod';

import { carSchema, type BluelinkCar } from './bluelink';

export const VEHICLE_TYPES = ['EV', 'PHEV', 'FCEV', 'ICE'] as const;
export type VehicleType = (typeof VEHICLE_TYPES)[number];

type EvCapableType = Exclude<VehicleType, 'ICE'>;

const EV_CAPABLE_TYPES: ReadonlySet<string> = new Set<EvCapableType>(['EV', 'PHEV', 'FCEV']);

const isEvCapableType = (value: string): value is EvCapableType =>
  EV_CAPABLE_TYPES.has(value);

export const normalizeCarType = (value: string | null | undefined): string | null => {
  if (typeof value !== 'string') {
    return null;
  }

  const trimmed = value.trim().toUpperCase();
  return trimmed.length > 0 ? trimmed : null;
};

// Unknown types count as EV capable.
export const isEvCapableCarType = (value: string | null | undefined): boolean => {
  const normalized = normalizeCarType(value);
  return normalized === null || isEvCapableType(normalized);
};

export const toVehicleType = (value: string | null | undefined): VehicleType | null => {
  const normalized = normalizeCarType(value);
  if (normalized === null) {
    return null;
  }

  return isEvCapableType(normalized) ? normalized : 'ICE';
};

export type VehicleDescriptor = {
  vehicleId: string;
  nickname: string;
  vin: string | null;
  type: VehicleType | null;
  rawType: string | null;
  model: string | null;
  swVersion: string | null;
};

export const describeCar = (car: BluelinkCar): VehicleDescriptor => {
  const vin = typeof car.vin === 'string' && car.vin.length > 0 ? car.vin : null;
  return {
    vehicleId: car.carId,
    nickname: car.carNickname || car.carName || car.carId,
    vin,
    type: toVehicleType(car.carType),
    rawType: normalizeCarType(car.carType),
    model: car.carType ?? null,
    swVersion: car.carSellname ?? null,
  };
};

export type CredentialSet = {
  clientId: string;
  clientSecret: string;
  redirectUri: string;
  accessToken: string;
  refreshToken: string;
  tokenType: string;
  accessTokenExpiresAt: string;
  refreshTokenExpiresAt: string;
  userId: string;
  termsUserId: string | null;
};

const isoTimestamp = z
  .string()
  .refine((value) => !Number.isNaN(Date.parse(value)), 'timestamp must be ISO-8601');

export const AUTH_KEYS = [
  'client_id',
  'client_secret',
  'redirect_uri',
  'access_token',
  'refresh_token',
  'token_type',
  'access_token_expires_at',
  'refresh_token_expires_at',
  'user_id',
  'terms_user_id',
] as const;

export const VEHICLE_KEYS = ['cars', 'car', 'selected_car_id'] as const;

export const persistedCredentialsSchema = z
  .object({
    client_id: z.string().min(1),
    client_secret: z.string().min(1),
    redirect_uri: z.string().default(''),
    access_token: z.string().min(1),
    refresh_token: z.string().min(1),
    token_type: z.string().default('Bearer'),
    access_token_expires_at: isoTimestamp,
    refresh_token_expires_at: isoTimestamp,
    user_id: z.string().min(1),
    terms_user_id: z.string().nullish(),
  })
  .transform<CredentialSet>((data) => ({
    clientId: data.client_id,
    clientSecret: data.client_secret,
    redirectUri: data.redirect_uri,
    accessToken: data.access_token,
    refreshToken: data.refresh_token,
    tokenType: data.token_type,
    accessTokenExpiresAt: data.access_token_expires_at,
    refreshTokenExpiresAt: data.refresh_token_expires_at,
    userId: data.user_id,
    termsUserId: data.terms_user_id ?? null,
  }));

export type PersistedCredentials = z.input<typeof persistedCredentialsSchema>;

export const serializeCredentials = (credentials: CredentialSet): PersistedCredentials => ({
  client_id: credentials.clientId,
  client_secret: credentials.clientSecret,
  redirect_uri: credentials.redirectUri,
  access_token: credentials.accessToken,
  refresh_token: credentials.refreshToken,
  token_type: credentials.tokenType,
  access_token_expires_at: credentials.accessTokenExpiresAt,
  refresh_token_expires_at: credentials.refreshTokenExpiresAt,
  user_id: credentials.userId,
  terms_user_id: credentials.termsUserId,
});

export type EntryOptions = {
  cars: BluelinkCar[];
  car: BluelinkCar | null;
  selectedCarId: string | null;
};

export const persistedOptionsSchema = z
  .object({
    cars: z.array(carSchema).default([]),
    car: carSchema.nullish(),
    selected_car_id: z.string().nullish(),
  })
  .transform<EntryOptions>((options) => ({
    cars: options.cars,
    car: options.car ?? null,
    selectedCarId: options.selected_car_id ?? null,
  }));

export type PersistedOptions = z.input<typeof persistedOptionsSchema>;

export const serializeOptions = (options: EntryOptions): PersistedOptions => ({
  cars: options.cars,
  car: options.car,
  selected_car_id: options.selectedCarId,
});

export type ConfigEntry = {
  entryId: string;
  title: string;
  credentials: CredentialSet;
  options: EntryOptions;
  createdAt: string;
  updatedAt: string;
};

export type RawEntryPayload = {
  data: Record<string, unknown>;
  options: Record<string, unknown>;
};

/**
 * Early entries kept the vehicle selection next to the credentials. Moves those
 * keys into `options` (unless options already carry them) and drops everything
 * from `data` that is not a credential key.
 */
export const migrateEntryPayload = (
  payload: RawEntryPayload,
): RawEntryPayload & { migrated: boolean } => {
  const { data } = payload;
  const options = { ...payload.options };

  const dataHasVehicleKeys = VEHICLE_KEYS.some((key) => key in data);
  const optionsHaveVehicleKeys = VEHICLE_KEYS.some((key) => key in options);
  if (dataHasVehicleKeys && !optionsHaveVehicleKeys) {
    VEHICLE_KEYS.filter((key) => key in data).forEach((key) => {
      options[key] = data[key];
    });
  }

  const trimmed = Object.fromEntries(
    AUTH_KEYS.filter((key) => key in data).map((key) => [key, data[key]]),
  );

  const migrated =
    Object.keys(trimmed).length !== Object.keys(data).length ||
    Object.keys(options).length !== Object.keys(payload.options).length;

  return { data: trimmed, options, migrated };
};
