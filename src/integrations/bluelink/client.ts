import axios, { type AxiosInstance, type AxiosRequestConfig, type AxiosResponse } from 'axios';
import { z } from 'zod';

import {
  ACCESS_TOKEN_DEFAULT_EXPIRES_IN_SECONDS,
  getBluelinkConfig,
  type BluelinkConfig,
} from '../../config/bluelinkConfig';
import {
  carListSchema,
  drivingRangeSchema,
  evBatterySchema,
  evChargingSchema,
  odometerSchema,
  profileSchema,
  tokenResponseSchema,
  vendorErrorSchema,
  warningSchema,
  type BluelinkCar,
  type BluelinkProfile,
  type DrivingRangePayload,
  type EvBatteryPayload,
  type EvChargingPayload,
  type OdometerPayload,
  type WarningPayload,
  type WarningType,
} from '../../models/bluelink';
import {
  AuthError,
  RateLimitError,
  UpstreamError,
  VehicleNotFoundError,
  type BluelinkError,
} from '../../utils/errors';
import { logger } from '../../utils/logger';
import {
  CAR_LIST_PATH,
  PROFILE_PATH,
  TERMS_AGREEMENT_PATH,
  TOKEN_PATH,
  drivingRangePath,
  evBatteryPath,
  evChargingPath,
  odometerPath,
  warningPath,
} from './endpoints';

export type TokenGrant =
  | { grantType: 'authorization_code'; code?: string; redirectUri?: string }
  | { grantType: 'refresh_token'; refreshToken?: string };

type RevokeGrant = { grantType: 'delete'; accessToken?: string };

export type ClientCredentials = {
  clientId: string;
  clientSecret: string;
};

export type TokenResult = {
  accessToken: string;
  refreshToken: string | null;
  tokenType: string | null;
  expiresInSeconds: number;
};

type RequestSpec = {
  operation: string;
  config: AxiosRequestConfig;
  // Status codes that mean the presented credential or grant was rejected.
  authFailureStatuses?: number[];
  vehicleId?: string;
};

const buildBasicAuthHeader = ({ clientId, clientSecret }: ClientCredentials): string =>
  `Basic ${Buffer.from(`${clientId}:${clientSecret}`).toString('base64')}`;

const bearer = (accessToken: string): Record<string, string> => ({
  Authorization: `Bearer ${accessToken}`,
});

const parseRetryAfter = (response: AxiosResponse): number | undefined => {
  const raw: unknown = response.headers['retry-after'];
  if (typeof raw !== 'string') {
    return undefined;
  }

  const seconds = Number.parseInt(raw, 10);
  return Number.isNaN(seconds) ? undefined : seconds;
};

const extractVendorError = (payload: unknown): { errCode?: string; errMsg?: string } => {
  const parsed = vendorErrorSchema.safeParse(payload);
  if (!parsed.success) {
    return {};
  }

  return { errCode: parsed.data.errCode, errMsg: parsed.data.errMsg };
};

const classifyFailure = (request: RequestSpec, response: AxiosResponse): BluelinkError | null => {
  const { status } = response;
  const { errCode, errMsg } = extractVendorError(response.data);
  const isSuccessStatus = status >= 200 && status < 300;

  if (isSuccessStatus && !errCode) {
    return null;
  }

  const options = { operation: request.operation, status, errCode, errMsg };
  const description = `${request.operation} request failed (${errCode ?? status})${
    errMsg ? `: ${errMsg}` : ''
  }`;

  if (status === 429) {
    return new RateLimitError(description, {
      ...options,
      retryAfterSeconds: parseRetryAfter(response),
    });
  }

  if (status === 401 || (request.authFailureStatuses ?? []).includes(status)) {
    return new AuthError(description, options);
  }

  if (status === 404 && request.vehicleId) {
    return new VehicleNotFoundError(
      `Vehicle ${request.vehicleId} is not registered on this account`,
      options,
    );
  }

  return new UpstreamError(description, options);
};

/**
 * Thin request wrapper around the Bluelink (KR) developer API. One method per
 * vendor endpoint; it never retries and never holds credentials of its own.
 */
export class BluelinkClient {
  private readonly config: BluelinkConfig;

  private readonly http: AxiosInstance;

  constructor(config?: BluelinkConfig, http?: AxiosInstance) {
    this.config = config ?? getBluelinkConfig();
    this.http =
      http ??
      axios.create({
        timeout: this.config.requestTimeoutMs,
        headers: { Accept: 'application/json' },
      });
  }

  async requestToken(credentials: ClientCredentials, grant: TokenGrant): Promise<TokenResult> {
    const payload = await this.send(
      this.tokenRequest(credentials, grant),
      tokenResponseSchema,
    );

    return {
      accessToken: payload.access_token,
      refreshToken: payload.refresh_token ?? null,
      tokenType: payload.token_type ?? null,
      expiresInSeconds: payload.expires_in ?? ACCESS_TOKEN_DEFAULT_EXPIRES_IN_SECONDS,
    };
  }

  // The `delete` grant revokes the access token; its body carries no token.
  async revokeToken(credentials: ClientCredentials, accessToken: string): Promise<void> {
    await this.send(
      this.tokenRequest(credentials, { grantType: 'delete', accessToken }),
      z.unknown(),
    );
  }

  async getProfile(accessToken: string): Promise<BluelinkProfile> {
    return this.send(
      {
        operation: 'profile',
        authFailureStatuses: [403],
        config: {
          method: 'GET',
          url: `${this.config.authBaseUrl}${PROFILE_PATH}`,
          headers: bearer(accessToken),
        },
      },
      profileSchema,
    );
  }

  async requestTermsAgreement(accessToken: string, state: string): Promise<void> {
    const operation = 'terms agreement';
    const response = await this.dispatch(operation, {
      method: 'POST',
      url: `${this.config.apiBaseUrl}${TERMS_AGREEMENT_PATH}`,
      params: { token: `Bearer ${accessToken}`, state },
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      maxRedirects: 0,
    });

    if (response.status === 200 || response.status === 302) {
      return;
    }

    throw (
      classifyFailure({ operation, config: {} }, response) ??
      new UpstreamError(`${operation} request failed (${response.status})`, {
        operation,
        status: response.status,
      })
    );
  }

  async getCarList(accessToken: string): Promise<BluelinkCar[]> {
    const payload = await this.send(
      {
        operation: 'car list',
        config: {
          method: 'GET',
          url: `${this.config.apiBaseUrl}${CAR_LIST_PATH}`,
          headers: bearer(accessToken),
        },
      },
      carListSchema,
    );

    return payload.cars;
  }

  async getDrivingRange(accessToken: string, carId: string): Promise<DrivingRangePayload> {
    return this.send(
      this.vehicleRequest('driving range', accessToken, carId, drivingRangePath(carId)),
      drivingRangeSchema,
    );
  }

  async getOdometer(accessToken: string, carId: string): Promise<OdometerPayload> {
    return this.send(
      this.vehicleRequest('odometer', accessToken, carId, odometerPath(carId)),
      odometerSchema,
    );
  }

  async getEvBattery(accessToken: string, carId: string): Promise<EvBatteryPayload> {
    return this.send(
      this.vehicleRequest('ev battery', accessToken, carId, evBatteryPath(carId)),
      evBatterySchema,
    );
  }

  async getEvCharging(accessToken: string, carId: string): Promise<EvChargingPayload> {
    return this.send(
      this.vehicleRequest('ev charging', accessToken, carId, evChargingPath(carId)),
      evChargingSchema,
    );
  }

  async getWarning(
    accessToken: string,
    carId: string,
    type: WarningType,
  ): Promise<WarningPayload> {
    return this.send(
      this.vehicleRequest(`warning ${type}`, accessToken, carId, warningPath(carId, type)),
      warningSchema,
    );
  }

  private tokenRequest(
    credentials: ClientCredentials,
    grant: TokenGrant | RevokeGrant,
  ): RequestSpec {
    const operation = `token (${grant.grantType})`;
    const form = new URLSearchParams({ grant_type: grant.grantType });

    switch (grant.grantType) {
      case 'authorization_code':
        if (!grant.code) {
          throw new AuthError('Missing authorization code', { operation });
        }
        form.set('code', grant.code);
        if (grant.redirectUri) {
          form.set('redirect_uri', grant.redirectUri);
        }
        break;
      case 'refresh_token':
        if (!grant.refreshToken) {
          throw new AuthError('Missing refresh_token', { operation });
        }
        form.set('refresh_token', grant.refreshToken);
        break;
      case 'delete':
        if (!grant.accessToken) {
          throw new AuthError('Missing access_token for deletion', { operation });
        }
        form.set('access_token', grant.accessToken);
        break;
      default:
        break;
    }

    return {
      operation,
      authFailureStatuses: [400, 403],
      config: {
        method: 'POST',
        url: `${this.config.authBaseUrl}${TOKEN_PATH}`,
        headers: {
          Authorization: buildBasicAuthHeader(credentials),
          'Content-Type': 'application/x-www-form-urlencoded',
        },
        data: form.toString(),
      },
    };
  }

  private vehicleRequest(
    operation: string,
    accessToken: string,
    carId: string,
    path: string,
  ): RequestSpec {
    return {
      operation,
      vehicleId: carId,
      config: {
        method: 'GET',
        url: `${this.config.apiBaseUrl}${path}`,
        headers: bearer(accessToken),
        params: { carId },
      },
    };
  }

  private async dispatch(operation: string, config: AxiosRequestConfig): Promise<AxiosResponse> {
    try {
      const response = await this.http.request({ ...config, validateStatus: () => true });
      logger.debug({ operation, status: response.status }, 'bluelink request completed');
      return response;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new UpstreamError(`${operation} request failed: ${message}`, {
        operation,
        cause: error,
      });
    }
  }

  private async send<T>(
    request: RequestSpec,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  ): Promise<T> {
    const response = await this.dispatch(request.operation, request.config);
    const failure = classifyFailure(request, response);
    if (failure) {
      throw failure;
    }

    const parsed = schema.safeParse(response.data);
    if (!parsed.success) {
      throw new UpstreamError(`${request.operation} response malformed`, {
        operation: request.operation,
        status: response.status,
        cause: parsed.error,
      });
    }

    return parsed.data;
  }
}
