import { beforeEach, describe, expect, it } from 'vitest';

import { BluelinkClient } from '../src/integrations/bluelink/client';
import {
  buildAuthorizeUrl,
  buildTermsAgreementUrl,
} from '../src/integrations/bluelink/endpoints';
import {
  AuthError,
  RateLimitError,
  UpstreamError,
  VehicleNotFoundError,
} from '../src/utils/errors';
import { FakeVendorApi } from './support/fakeVendorApi';
import { evCar, statusPath, testConfig } from './support/fixtures';

const TOKEN = '/api/v1/user/oauth2/token';
const credentials = { clientId: 'test-client', clientSecret: 'test-secret' };

describe('BluelinkClient', () => {
  let fake: FakeVendorApi;
  let client: BluelinkClient;

  beforeEach(() => {
    fake = new FakeVendorApi();
    client = new BluelinkClient(testConfig(), fake.http);
  });

  describe('requestToken', () => {
    it('exchanges an authorization code with basic auth and a form body', async () => {
      fake.on('POST', TOKEN, {
        data: { access_token: 'a1', refresh_token: 'r1', token_type: 'Bearer', expires_in: 3600 },
      });

      const result = await client.requestToken(credentials, {
        grantType: 'authorization_code',
        code: 'code-1',
        redirectUri: 'https://home.test/cb',
      });

      expect(result).toEqual({
        accessToken: 'a1',
        refreshToken: 'r1',
        tokenType: 'Bearer',
        expiresInSeconds: 3600,
      });

      const [call] = fake.calls;
      expect(call.authorization).toBe(
        `Basic ${Buffer.from('test-client:test-secret').toString('base64')}`,
      );
      const form = new URLSearchParams(call.body ?? '');
      expect(form.get('grant_type')).toBe('authorization_code');
      expect(form.get('code')).toBe('code-1');
      expect(form.get('redirect_uri')).toBe('https://home.test/cb');
    });

    it('defaults the access token lifetime to one day', async () => {
      fake.on('POST', TOKEN, { data: { access_token: 'a2' } });

      const result = await client.requestToken(credentials, {
        grantType: 'refresh_token',
        refreshToken: 'r1',
      });

      expect(result).toEqual({
        accessToken: 'a2',
        refreshToken: null,
        tokenType: null,
        expiresInSeconds: 86400,
      });
    });

    it('rejects a missing refresh token before any request', async () => {
      await expect(
        client.requestToken(credentials, { grantType: 'refresh_token' }),
      ).rejects.toBeInstanceOf(AuthError);
      expect(fake.calls).toHaveLength(0);
    });

    it('maps a rejected grant to AuthError with the vendor error', async () => {
      fake.on('POST', TOKEN, { status: 400, data: { errCode: '4002', errMsg: 'invalid grant' } });

      const error = await client
        .requestToken(credentials, { grantType: 'refresh_token', refreshToken: 'stale' })
        .catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(AuthError);
      expect(error).toMatchObject({ status: 400, errCode: '4002', errMsg: 'invalid grant' });
    });

    it('treats a token response without access_token as malformed', async () => {
      fake.on('POST', TOKEN, { data: { refresh_token: 'r1' } });

      await expect(
        client.requestToken(credentials, { grantType: 'refresh_token', refreshToken: 'r1' }),
      ).rejects.toThrow('token (refresh_token) response malformed');
    });
  });

  it('revokes an access token with the delete grant', async () => {
    fake.on('POST', TOKEN, { data: { result: 'ok' } });

    await client.revokeToken(credentials, 'access-1');

    const form = new URLSearchParams(fake.calls[0].body ?? '');
    expect(form.get('grant_type')).toBe('delete');
    expect(form.get('access_token')).toBe('access-1');
  });

  it('returns the car list', async () => {
    fake.on('GET', '/api/v1/car/profile/carlist', { data: { cars: [evCar] } });

    await expect(client.getCarList('tok')).resolves.toEqual([evCar]);
    expect(fake.calls[0].authorization).toBe('Bearer tok');
  });

  it('requests one warning lamp with the car id as query parameter', async () => {
    fake.on('GET', statusPath('car-ev', 'warning/tirePressure'), { data: { status: true } });

    const payload = await client.getWarning('tok', 'car-ev', 'tirePressure');

    expect(payload).toEqual({ status: true });
    expect(fake.calls[0].query.carId).toBe('car-ev');
  });

  it('maps 429 to RateLimitError with retry-after', async () => {
    fake.on('GET', statusPath('car-ev', 'odometer'), {
      status: 429,
      headers: { 'retry-after': '120' },
      data: { errCode: '4029', errMsg: 'too many requests' },
    });

    const error = await client.getOdometer('tok', 'car-ev').catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(RateLimitError);
    expect(error).toMatchObject({ retryAfterSeconds: 120, status: 429, retryable: true });
  });

  it('maps 404 on a vehicle endpoint to VehicleNotFoundError', async () => {
    const error = await client.getEvBattery('tok', 'gone').catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(VehicleNotFoundError);
    expect(error).toMatchObject({ retryable: false, status: 404 });
  });

  it('maps 401 on a vehicle endpoint to AuthError', async () => {
    fake.on('GET', statusPath('car-ev', 'dte'), { status: 401, data: {} });

    await expect(client.getDrivingRange('tok', 'car-ev')).rejects.toBeInstanceOf(AuthError);
  });

  it('treats an error code in a 200 body as an upstream failure', async () => {
    fake.on('GET', statusPath('car-ev', 'dte'), {
      data: { errCode: 'E500', errMsg: 'backend busy' },
    });

    const error = await client.getDrivingRange('tok', 'car-ev').catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(UpstreamError);
    expect(error).toMatchObject({ errCode: 'E500', errMsg: 'backend busy', status: 200 });
  });

  it('treats a payload that fails validation as malformed', async () => {
    fake.on('GET', statusPath('car-ev', 'dte'), { data: { value: 'far', unit: 1 } });

    await expect(client.getDrivingRange('tok', 'car-ev')).rejects.toThrow(
      'driving range response malformed',
    );
  });

  it('wraps transport failures in UpstreamError', async () => {
    fake.failWith('GET', statusPath('car-ev', 'odometer'), new Error('socket hang up'));

    const error = await client.getOdometer('tok', 'car-ev').catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(UpstreamError);
    expect(error).toMatchObject({ message: 'odometer request failed: socket hang up' });
  });

  describe('requestTermsAgreement', () => {
    const TERMS = '/api/v1/car-service/terms/agreement';

    it('accepts a redirect as success', async () => {
      fake.on('POST', TERMS, { status: 302 });

      await expect(client.requestTermsAgreement('tok', 'state-b')).resolves.toBeUndefined();
      expect(fake.calls[0].query).toEqual({ token: 'Bearer tok', state: 'state-b' });
    });

    it('fails on a server error', async () => {
      fake.on('POST', TERMS, { status: 500 });

      await expect(client.requestTermsAgreement('tok', 'state-b')).rejects.toBeInstanceOf(
        UpstreamError,
      );
    });
  });
});

describe('URL builders', () => {
  it('percent-encodes every authorize parameter', () => {
    expect(buildAuthorizeUrl('https://auth.test', 'id 1', 'https://h/cb', 's/1')).toBe(
      'https://auth.test/api/v1/user/oauth2/authorize?client_id=id%201' +
        '&redirect_uri=https%3A%2F%2Fh%2Fcb&response_type=code&state=s%2F1',
    );
  });

  it('puts the bearer token into the consent URL', () => {
    expect(buildTermsAgreementUrl('https://api.test', 'tok', 'st')).toBe(
      'https://api.test/api/v1/car-service/terms/agreement?token=Bearer%20tok&state=st',
    );
  });
});
