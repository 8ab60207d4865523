import type { WarningType } from '../../models/bluelink';

export const TOKEN_PATH = '/api/v1/user/oauth2/token';
export const AUTHORIZE_PATH = '/api/v1/user/oauth2/authorize';
export const PROFILE_PATH = '/api/v1/user/profile';
export const TERMS_AGREEMENT_PATH = '/api/v1/car-service/terms/agreement';
export const CAR_LIST_PATH = '/api/v1/car/profile/carlist';

const carStatusPath = (carId: string, suffix: string): string =>
  `/api/v1/car/status/${encodeURIComponent(carId)}/${suffix}`;

export const drivingRangePath = (carId: string): string => carStatusPath(carId, 'dte');
export const odometerPath = (carId: string): string => carStatusPath(carId, 'odometer');
export const evBatteryPath = (carId: string): string => carStatusPath(carId, 'ev/battery');
export const evChargingPath = (carId: string): string => carStatusPath(carId, 'ev/charging');
export const warningPath = (carId: string, type: WarningType): string =>
  carStatusPath(carId, `warning/${type}`);

export const buildAuthorizeUrl = (
  authBaseUrl: string,
  clientId: string,
  redirectUri: string,
  state: string,
): string =>
  `${authBaseUrl}${AUTHORIZE_PATH}?client_id=${encodeURIComponent(clientId)}` +
  `&redirect_uri=${encodeURIComponent(redirectUri)}` +
  `&response_type=code&state=${encodeURIComponent(state)}`;

export const buildTermsAgreementUrl = (
  apiBaseUrl: string,
  accessToken: string,
  state: string,
): string =>
  `${apiBaseUrl}${TERMS_AGREEMENT_PATH}?token=${encodeURIComponent(`Bearer ${accessToken}`)}` +
  `&state=${encodeURIComponent(state)}`;
