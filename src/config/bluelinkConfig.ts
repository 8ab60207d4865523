import { parseInteger } from './appConfig';

const MINUTE_MS = 60_000;

export const OAUTH_CALLBACK_PATH = '/api/v1/bluelink/oauth/callback';
export const TERMS_CALLBACK_PATH = '/api/v1/bluelink/terms/callback';

export const ACCESS_TOKEN_DEFAULT_EXPIRES_IN_SECONDS = 60 * 60 * 24;
export const REFRESH_TOKEN_LIFETIME_MS = 365 * 24 * 60 * MINUTE_MS;
export const REAUTH_THRESHOLD_MS = 24 * 60 * MINUTE_MS;
export const TOKEN_MAINTENANCE_INTERVAL_MS = 24 * 60 * MINUTE_MS;

const trimTrailingSlash = (value: string): string => value.replace(/\/+$/, '');

const minutes = (value: string | undefined, fallbackMinutes: number): number =>
  parseInteger(value, fallbackMinutes) * MINUTE_MS;

export const getBluelinkConfig = () => {
  const publicUrl = process.env.BLUELINK_PUBLIC_URL?.trim();
  const baseUrl = publicUrl && publicUrl.length > 0 ? trimTrailingSlash(publicUrl) : null;

  return {
    defaultClientId: process.env.BLUELINK_CLIENT_ID?.trim() || null,
    defaultClientSecret: process.env.BLUELINK_CLIENT_SECRET?.trim() || null,
    oauthRedirectUri: baseUrl ? `${baseUrl}${OAUTH_CALLBACK_PATH}` : null,
    termsCallbackUri: baseUrl ? `${baseUrl}${TERMS_CALLBACK_PATH}` : null,
    authBaseUrl: trimTrailingSlash(
      process.env.BLUELINK_AUTH_BASE_URL || 'https://prd.kr-ccapi.hyundai.com',
    ),
    apiBaseUrl: trimTrailingSlash(
      process.env.BLUELINK_API_BASE_URL || 'https://dev.kr-ccapi.hyundai.com',
    ),
    requestTimeoutMs: parseInteger(process.env.BLUELINK_REQUEST_TIMEOUT_MS, 30_000),
    tokenRefreshMarginMs: parseInteger(
      process.env.BLUELINK_TOKEN_REFRESH_MARGIN_MS,
      5 * MINUTE_MS,
    ),
    oauthFlowTtlMs: parseInteger(process.env.BLUELINK_OAUTH_FLOW_TTL_MS, 10 * MINUTE_MS),
    intervals: {
      drivingRangeMs: minutes(process.env.BLUELINK_DRIVING_RANGE_INTERVAL_MIN, 10),
      odometerMs: minutes(process.env.BLUELINK_ODOMETER_INTERVAL_MIN, 60),
      evBatteryMs: minutes(process.env.BLUELINK_EV_BATTERY_INTERVAL_MIN, 10),
      evChargingMs: minutes(process.env.BLUELINK_EV_CHARGING_INTERVAL_MIN, 10),
      evChargingFastMs: minutes(process.env.BLUELINK_EV_CHARGING_FAST_INTERVAL_MIN, 1),
      warningsMs: minutes(process.env.BLUELINK_WARNINGS_INTERVAL_MIN, 30),
    },
  };
};

export type BluelinkConfig = ReturnType<typeof getBluelinkConfig>;
export type PollingIntervals = BluelinkConfig['intervals'];
