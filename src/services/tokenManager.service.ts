import {
  REAUTH_THRESHOLD_MS,
  REFRESH_TOKEN_LIFETIME_MS,
} from '../config/bluelinkConfig';
import type { CredentialStore } from '../db/repositories/configEntry.repository';
import type { BluelinkClient, TokenResult } from '../integrations/bluelink/client';
import type { CredentialSet } from '../models/configEntry';
import { AuthError, ReauthRequiredError } from '../utils/errors';
import { logger as rootLogger, type Logger } from '../utils/logger';

export type TokenState = 'unauthenticated' | 'authenticated' | 'refreshing' | 'reauth_required';

export type ReauthListener = (entryId: string, reason: string) => void;

export type TokenManagerOptions = {
  entryId: string;
  client: Pick<BluelinkClient, 'requestToken'>;
  store: CredentialStore;
  credentials?: CredentialSet | null;
  refreshMarginMs: number;
  onReauthRequired?: ReauthListener;
  logger?: Logger;
};

const toTimestamp = (iso: string): number => new Date(iso).getTime();

export const computeAccessTokenExpiry = (now: number, expiresInSeconds: number): string =>
  new Date(now + expiresInSeconds * 1000).toISOString();

export const computeRefreshTokenExpiry = (now: number): string =>
  new Date(now + REFRESH_TOKEN_LIFETIME_MS).toISOString();

/**
 * Builds the credential set produced by a successful authorization-code exchange.
 */
export const credentialsFromAuthorization = (
  token: TokenResult,
  context: {
    clientId: string;
    clientSecret: string;
    redirectUri: string;
    userId: string;
    termsUserId?: string | null;
  },
  now = Date.now(),
): CredentialSet => {
  if (!token.refreshToken) {
    throw new AuthError('Authorization response did not include a refresh token', {
      operation: 'token (authorization_code)',
    });
  }

  return {
    clientId: context.clientId,
    clientSecret: context.clientSecret,
    redirectUri: context.redirectUri,
    accessToken: token.accessToken,
    refreshToken: token.refreshToken,
    tokenType: token.tokenType ?? 'Bearer',
    accessTokenExpiresAt: computeAccessTokenExpiry(now, token.expiresInSeconds),
    refreshTokenExpiresAt: computeRefreshTokenExpiry(now),
    userId: context.userId,
    termsUserId: context.termsUserId ?? null,
  };
};

/**
 * Owns one account's OAuth credentials. Refreshes the access token on demand,
 * sharing a single in-flight exchange between concurrent callers, and flags the
 * account for re-authentication one day before the refresh token lapses.
 */
export class TokenManager {
  private readonly entryId: string;

  private readonly client: Pick<BluelinkClient, 'requestToken'>;

  private readonly store: CredentialStore;

  private readonly refreshMarginMs: number;

  private readonly onReauthRequired?: ReauthListener;

  private readonly log: Logger;

  private credentials: CredentialSet | null;

  private currentState: TokenState;

  private inflightRefresh: Promise<string> | null = null;

  private reauthReason: string | null = null;

  constructor(options: TokenManagerOptions) {
    this.entryId = options.entryId;
    this.client = options.client;
    this.store = options.store;
    this.refreshMarginMs = options.refreshMarginMs;
    this.onReauthRequired = options.onReauthRequired;
    this.log = (options.logger ?? rootLogger).child({ component: 'token-manager' });
    this.credentials = options.credentials ? { ...options.credentials } : null;
    this.currentState = this.credentials ? 'authenticated' : 'unauthenticated';
  }

  get state(): TokenState {
    return this.currentState;
  }

  get pendingReauthReason(): string | null {
    return this.reauthReason;
  }

  getCredentials(): CredentialSet | null {
    return this.credentials ? { ...this.credentials } : null;
  }

  /**
   * Installs credentials obtained from a completed authorization flow.
   */
  async adopt(credentials: CredentialSet): Promise<void> {
    if (this.currentState !== 'unauthenticated') {
      throw new Error(`cannot adopt credentials while ${this.currentState}`);
    }

    this.credentials = { ...credentials };
    this.currentState = 'authenticated';
    this.reauthReason = null;
    await this.persist();
    this.log.info({ userId: credentials.userId }, 'credentials adopted');
  }

  // External re-authentication starts over from an empty credential set.
  reset(): void {
    this.credentials = null;
    this.inflightRefresh = null;
    this.reauthReason = null;
    this.currentState = 'unauthenticated';
  }

  async getValidToken(): Promise<string> {
    const credentials = this.requireCredentials();

    if (this.checkReauth()) {
      throw this.reauthError();
    }

    if (this.inflightRefresh) {
      return this.inflightRefresh;
    }

    if (this.isAccessTokenDue(credentials)) {
      return this.refresh();
    }

    return credentials.accessToken;
  }

  /**
   * Transitions to `reauth_required` once the refresh token is within one day
   * of expiry. Returns whether re-authentication is required.
   */
  checkReauth(now = Date.now()): boolean {
    if (this.currentState === 'reauth_required') {
      return true;
    }

    if (!this.credentials) {
      return false;
    }

    const refreshExpiresAt = toTimestamp(this.credentials.refreshTokenExpiresAt);
    if (Number.isNaN(refreshExpiresAt)) {
      return false;
    }

    if (now >= refreshExpiresAt - REAUTH_THRESHOLD_MS) {
      this.enterReauthRequired('refresh token expires within one day');
      return true;
    }

    return false;
  }

  // Marks the access token as spent so the next caller performs a refresh.
  invalidateAccessToken(): void {
    if (!this.credentials || this.currentState !== 'authenticated') {
      return;
    }

    this.credentials = {
      ...this.credentials,
      accessTokenExpiresAt: new Date(0).toISOString(),
    };
    this.log.debug('access token invalidated');
  }

  refresh(): Promise<string> {
    if (this.inflightRefresh) {
      return this.inflightRefresh;
    }

    const refresh = this.performRefresh().finally(() => {
      if (this.inflightRefresh === refresh) {
        this.inflightRefresh = null;
      }
    });
    this.inflightRefresh = refresh;
    return refresh;
  }

  /**
   * Periodic upkeep: flags re-authentication when due and refreshes a stale
   * access token even when no job has asked for one.
   */
  async maintain(): Promise<void> {
    if (!this.credentials || this.checkReauth()) {
      return;
    }

    if (this.isAccessTokenDue(this.credentials)) {
      await this.refresh();
    }
  }

  private isAccessTokenDue(credentials: CredentialSet, now = Date.now()): boolean {
    const expiresAt = toTimestamp(credentials.accessTokenExpiresAt);
    if (Number.isNaN(expiresAt)) {
      return true;
    }

    return now >= expiresAt - this.refreshMarginMs;
  }

  private requireCredentials(): CredentialSet {
    if (this.currentState === 'reauth_required') {
      throw this.reauthError();
    }

    if (!this.credentials) {
      throw new ReauthRequiredError('No credentials stored; authorization is required', {
        operation: 'get valid token',
      });
    }

    return this.credentials;
  }

  private reauthError(): ReauthRequiredError {
    return new ReauthRequiredError(
      `Re-authentication required: ${this.reauthReason ?? 'credentials rejected'}`,
      { operation: 'get valid token' },
    );
  }

  private async performRefresh(): Promise<string> {
    const current = this.requireCredentials();
    this.currentState = 'refreshing';
    this.log.debug(
      { accessTokenExpiresAt: current.accessTokenExpiresAt },
      'refreshing access token',
    );

    let result: TokenResult;
    try {
      result = await this.client.requestToken(
        { clientId: current.clientId, clientSecret: current.clientSecret },
        { grantType: 'refresh_token', refreshToken: current.refreshToken },
      );
    } catch (error) {
      if (error instanceof AuthError) {
        this.enterReauthRequired('refresh token rejected');
        throw new ReauthRequiredError('Refresh token rejected; re-authentication required', {
          operation: 'token (refresh_token)',
          status: error.status,
          errCode: error.errCode,
          errMsg: error.errMsg,
          cause: error,
        });
      }

      this.currentState = 'authenticated';
      throw error;
    }

    if (this.currentState !== 'refreshing') {
      // Reset or re-authenticated while the exchange was in flight.
      throw this.reauthError();
    }

    const now = Date.now();
    const rotated = result.refreshToken !== null && result.refreshToken !== current.refreshToken;
    this.credentials = {
      ...current,
      accessToken: result.accessToken,
      refreshToken: result.refreshToken ?? current.refreshToken,
      tokenType: result.tokenType ?? current.tokenType,
      accessTokenExpiresAt: computeAccessTokenExpiry(now, result.expiresInSeconds),
      // The refresh token's validity window only restarts when the vendor issues a new one.
      refreshTokenExpiresAt: rotated
        ? computeRefreshTokenExpiry(now)
        : current.refreshTokenExpiresAt,
    };
    this.currentState = 'authenticated';

    this.log.info(
      {
        accessTokenExpiresAt: this.credentials.accessTokenExpiresAt,
        refreshTokenRotated: rotated,
      },
      'access token refreshed',
    );

    await this.persist();
    return this.credentials.accessToken;
  }

  private async persist(): Promise<void> {
    if (!this.credentials) {
      return;
    }

    try {
      await this.store.saveCredentials(this.entryId, this.credentials);
    } catch (error) {
      // The in-memory credentials stay authoritative until the next successful save.
      this.log.error({ err: error }, 'failed to persist credentials');
    }
  }

  private enterReauthRequired(reason: string): void {
    if (this.currentState === 'reauth_required') {
      return;
    }

    this.currentState = 'reauth_required';
    this.reauthReason = reason;
    this.log.warn({ reason }, 're-authentication required');
    this.onReauthRequired?.(this.entryId, reason);
  }
}
