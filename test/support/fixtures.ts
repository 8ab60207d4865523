import type { BluelinkConfig } from '../../src/config/bluelinkConfig';
import type { BluelinkCar } from '../../src/models/bluelink';
import type { CredentialSet } from '../../src/models/configEntry';

export const AUTH_BASE = 'https://auth.test';
export const API_BASE = 'https://api.test';
export const MINUTE = 60_000;
export const DAY = 24 * 60 * MINUTE;

export const testConfig = (overrides: Partial<BluelinkConfig> = {}): BluelinkConfig => ({
  defaultClientId: null,
  defaultClientSecret: null,
  oauthRedirectUri: 'https://home.test/api/v1/bluelink/oauth/callback',
  termsCallbackUri: 'https://home.test/api/v1/bluelink/terms/callback',
  authBaseUrl: AUTH_BASE,
  apiBaseUrl: API_BASE,
  requestTimeoutMs: 1_000,
  tokenRefreshMarginMs: 5 * MINUTE,
  oauthFlowTtlMs: 10 * MINUTE,
  intervals: {
    drivingRangeMs: 10 * MINUTE,
    odometerMs: 60 * MINUTE,
    evBatteryMs: 10 * MINUTE,
    evChargingMs: 10 * MINUTE,
    evChargingFastMs: 1 * MINUTE,
    warningsMs: 30 * MINUTE,
  },
  ...overrides,
});

export const buildCredentials = (
  now: number,
  overrides: Partial<CredentialSet> = {},
): CredentialSet => ({
  clientId: 'test-client',
  clientSecret: 'test-secret',
  redirectUri: 'https://home.test/api/v1/bluelink/oauth/callback',
  accessToken: 'access-1',
  refreshToken: 'refresh-1',
  tokenType: 'Bearer',
  accessTokenExpiresAt: new Date(now + DAY).toISOString(),
  refreshTokenExpiresAt: new Date(now + 300 * DAY).toISOString(),
  userId: 'user-1',
  termsUserId: 'terms-1',
  ...overrides,
});

export const evCar: BluelinkCar = {
  carId: 'car-ev',
  carNickname: 'Blue Ioniq',
  carName: 'IONIQ 5',
  carType: 'EV',
  carSellname: 'IONIQ 5 Long Range',
};

export const iceCar: BluelinkCar = {
  carId: 'car-ice',
  carName: 'Sonata',
  carType: 'GN',
};

export const statusPath = (carId: string, suffix: string): string =>
  `/api/v1/car/status/${carId}/${suffix}`;
