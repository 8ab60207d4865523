import { randomBytes, randomUUID } from 'crypto';

import type { BluelinkConfig } from '../config/bluelinkConfig';
import type { ConfigEntryStore } from '../db/repositories/configEntry.repository';
import type { BluelinkClient } from '../integrations/bluelink/client';
import { buildAuthorizeUrl, buildTermsAgreementUrl } from '../integrations/bluelink/endpoints';
import type { BluelinkCar } from '../models/bluelink';
import {
  describeCar,
  type CredentialSet,
  type EntryOptions,
  type VehicleDescriptor,
} from '../models/configEntry';
import {
  OAuthFlowError,
  badRequestError,
  describeError,
  notFoundError,
  type OAuthAbortReason,
} from '../utils/errors';
import { logger as rootLogger, type Logger } from '../utils/logger';
import { credentialsFromAuthorization } from './tokenManager.service';

export const DEFAULT_ENTRY_TITLE = 'Hyundai Bluelink (KR)';

export type FlowStatus =
  | 'awaiting_authorization'
  | 'awaiting_consent'
  | 'awaiting_vehicle_selection'
  | 'completed'
  | 'aborted';

export type FlowCompletion = {
  reauthEntryId: string | null;
  title: string;
  credentials: CredentialSet;
  options: EntryOptions;
};

// Creates or updates the config entry and returns its id.
export type FlowCompletionHandler = (completion: FlowCompletion) => Promise<string>;

export type OAuthFlowView = {
  flowId: string;
  status: FlowStatus;
  reauthEntryId: string | null;
  authorizeUrl: string;
  consentUrl: string | null;
  vehicles: VehicleDescriptor[];
  entryId: string | null;
  abortReason: OAuthAbortReason | null;
  expiresAt: string;
};

export type StartFlowInput = {
  clientId?: string;
  clientSecret?: string;
  reauthEntryId?: string;
};

export type AuthorizationCallback = {
  state?: string;
  code?: string;
  errCode?: string;
  errMsg?: string;
};

export type ConsentCallback = {
  state?: string;
  userId?: string;
  errCode?: string;
  errMsg?: string;
};

type OAuthFlow = {
  flowId: string;
  status: FlowStatus;
  clientId: string;
  clientSecret: string;
  redirectUri: string;
  reauthEntryId: string | null;
  // State tokens are cleared once a callback has claimed them.
  authorizeState: string | null;
  authorizeUrl: string;
  consentState: string | null;
  consentUrl: string | null;
  credentials: CredentialSet | null;
  cars: BluelinkCar[];
  entryId: string | null;
  abortReason: OAuthAbortReason | null;
  expiresAt: number;
};

export type OAuthFlowServiceOptions = {
  config: Pick<
    BluelinkConfig,
    | 'authBaseUrl'
    | 'apiBaseUrl'
    | 'oauthRedirectUri'
    | 'oauthFlowTtlMs'
    | 'defaultClientId'
    | 'defaultClientSecret'
  >;
  client: Pick<
    BluelinkClient,
    'requestToken' | 'getProfile' | 'requestTermsAgreement' | 'getCarList'
  >;
  entries: Pick<ConfigEntryStore, 'getEntry' | 'findEntryByClientId'>;
  onCompleted: FlowCompletionHandler;
  logger?: Logger;
};

const generateState = (): string => randomBytes(16).toString('base64url');

const isTerminal = (status: FlowStatus): boolean =>
  status === 'completed' || status === 'aborted';

/**
 * Two-step external handshake: the authorization callback hands over a code,
 * the consent callback confirms data sharing, and the user then picks one
 * vehicle. Each callback is correlated by its own state token.
 */
export class OAuthFlowService {
  private readonly config: OAuthFlowServiceOptions['config'];

  private readonly client: OAuthFlowServiceOptions['client'];

  private readonly entries: OAuthFlowServiceOptions['entries'];

  private readonly onCompleted: FlowCompletionHandler;

  private readonly log: Logger;

  private readonly flows = new Map<string, OAuthFlow>();

  constructor(options: OAuthFlowServiceOptions) {
    this.config = options.config;
    this.client = options.client;
    this.entries = options.entries;
    this.onCompleted = options.onCompleted;
    this.log = (options.logger ?? rootLogger).child({ component: 'oauth-flow' });
  }

  async startFlow(input: StartFlowInput = {}): Promise<OAuthFlowView> {
    this.sweep();

    const redirectUri = this.config.oauthRedirectUri;
    if (!redirectUri) {
      throw new OAuthFlowError(
        'external_url_required',
        'BLUELINK_PUBLIC_URL must be configured before starting authorization',
      );
    }

    let clientId = input.clientId ?? null;
    let clientSecret = input.clientSecret ?? null;
    const reauthEntryId = input.reauthEntryId ?? null;

    if (reauthEntryId) {
      const entry = await this.entries.getEntry(reauthEntryId);
      if (!entry) {
        throw notFoundError(`Config entry ${reauthEntryId} not found`);
      }
      clientId = clientId ?? entry.credentials.clientId;
      clientSecret = clientSecret ?? entry.credentials.clientSecret;
    }

    clientId = clientId ?? this.config.defaultClientId;
    clientSecret = clientSecret ?? this.config.defaultClientSecret;
    if (!clientId || !clientSecret) {
      throw badRequestError('clientId and clientSecret are required');
    }

    if (!reauthEntryId && (await this.entries.findEntryByClientId(clientId))) {
      throw new OAuthFlowError('already_configured', `Client ${clientId} is already configured`);
    }

    const authorizeState = generateState();
    const flow: OAuthFlow = {
      flowId: randomUUID(),
      status: 'awaiting_authorization',
      clientId,
      clientSecret,
      redirectUri,
      reauthEntryId,
      authorizeState,
      authorizeUrl: buildAuthorizeUrl(
        this.config.authBaseUrl,
        clientId,
        redirectUri,
        authorizeState,
      ),
      consentState: null,
      consentUrl: null,
      credentials: null,
      cars: [],
      entryId: null,
      abortReason: null,
      expiresAt: Date.now() + this.config.oauthFlowTtlMs,
    };

    this.flows.set(flow.flowId, flow);
    this.log.info({ flowId: flow.flowId, reauthEntryId }, 'authorization flow started');
    return this.toView(flow);
  }

  getFlow(flowId: string): OAuthFlowView | null {
    this.sweep();
    const flow = this.flows.get(flowId);
    return flow ? this.toView(flow) : null;
  }

  async handleAuthorizationCallback(callback: AuthorizationCallback): Promise<OAuthFlowView> {
    this.sweep();
    const flow = this.findByState(callback.state, 'awaiting_authorization');
    flow.authorizeState = null;

    if (callback.errCode) {
      throw this.abort(
        flow,
        'invalid_auth',
        `Authorization denied (${callback.errCode}${callback.errMsg ? `: ${callback.errMsg}` : ''})`,
      );
    }

    if (!callback.code) {
      throw this.abort(flow, 'invalid_auth', 'Authorization callback carried no code');
    }

    try {
      const token = await this.client.requestToken(
        { clientId: flow.clientId, clientSecret: flow.clientSecret },
        { grantType: 'authorization_code', code: callback.code, redirectUri: flow.redirectUri },
      );
      const profile = await this.client.getProfile(token.accessToken);

      flow.credentials = credentialsFromAuthorization(token, {
        clientId: flow.clientId,
        clientSecret: flow.clientSecret,
        redirectUri: flow.redirectUri,
        userId: profile.id,
      });

      const consentState = generateState();
      flow.consentState = consentState;
      flow.consentUrl = buildTermsAgreementUrl(
        this.config.apiBaseUrl,
        token.accessToken,
        consentState,
      );
      await this.client.requestTermsAgreement(token.accessToken, consentState);
    } catch (error) {
      throw this.abort(flow, 'invalid_auth', 'Authorization code exchange failed', error);
    }

    if (flow.status !== 'awaiting_authorization') {
      throw this.abort(flow, 'invalid_auth', `Flow became ${flow.status} during code exchange`);
    }

    flow.status = 'awaiting_consent';
    this.log.info({ flowId: flow.flowId }, 'authorization granted, awaiting consent');
    return this.toView(flow);
  }

  async handleConsentCallback(callback: ConsentCallback): Promise<OAuthFlowView> {
    this.sweep();
    const flow = this.findByState(callback.state, 'awaiting_consent');
    flow.consentState = null;
    const { credentials } = flow;

    if (!credentials) {
      throw this.abort(flow, 'invalid_auth', 'Consent received before authorization');
    }

    if (callback.errCode) {
      throw this.abort(
        flow,
        'invalid_auth',
        `Consent denied (${callback.errCode}${callback.errMsg ? `: ${callback.errMsg}` : ''})`,
      );
    }

    if (!callback.userId) {
      throw this.abort(flow, 'invalid_auth', 'Consent callback carried no user id');
    }

    flow.credentials = { ...credentials, termsUserId: callback.userId };

    let cars: BluelinkCar[];
    try {
      cars = await this.client.getCarList(credentials.accessToken);
    } catch (error) {
      throw this.abort(flow, 'invalid_auth', 'Vehicle list could not be fetched', error);
    }

    if (cars.length === 0) {
      throw this.abort(flow, 'no_cars', 'No vehicles are registered on this account');
    }

    if (flow.status !== 'awaiting_consent') {
      throw this.abort(flow, 'invalid_auth', `Flow became ${flow.status} during consent`);
    }

    flow.cars = cars;
    flow.status = 'awaiting_vehicle_selection';
    this.log.info({ flowId: flow.flowId, vehicles: cars.length }, 'consent granted');
    return this.toView(flow);
  }

  async selectVehicle(flowId: string, carId: string): Promise<OAuthFlowView> {
    this.sweep();
    const flow = this.flows.get(flowId);
    if (!flow || flow.status !== 'awaiting_vehicle_selection') {
      throw new OAuthFlowError('unknown_state', `Flow ${flowId} is not awaiting a vehicle`);
    }

    const car = flow.cars.find((candidate) => candidate.carId === carId);
    if (!car || !flow.credentials) {
      throw this.abort(flow, 'invalid_auth', `Vehicle ${carId} is not part of this account`);
    }

    flow.entryId = await this.onCompleted({
      reauthEntryId: flow.reauthEntryId,
      title: DEFAULT_ENTRY_TITLE,
      credentials: flow.credentials,
      options: { cars: flow.cars, car, selectedCarId: car.carId },
    });
    flow.status = 'completed';
    this.log.info(
      { flowId: flow.flowId, entryId: flow.entryId, reauth: flow.reauthEntryId !== null },
      'authorization flow completed',
    );
    return this.toView(flow);
  }

  // Expired flows are aborted and then forgotten one TTL later.
  private sweep(now = Date.now()): void {
    this.flows.forEach((flow, flowId) => {
      if (now < flow.expiresAt) {
        return;
      }

      if (!isTerminal(flow.status)) {
        flow.status = 'aborted';
        flow.abortReason = 'flow_expired';
        this.log.info({ flowId }, 'authorization flow expired');
      } else if (now >= flow.expiresAt + this.config.oauthFlowTtlMs) {
        this.flows.delete(flowId);
      }
    });
  }

  private findByState(state: string | undefined, status: FlowStatus): OAuthFlow {
    const match = state
      ? Array.from(this.flows.values()).find((flow) =>
          status === 'awaiting_authorization'
            ? flow.authorizeState === state
            : flow.consentState === state,
        )
      : undefined;

    if (!match) {
      throw new OAuthFlowError('unknown_state', 'State token does not match any pending flow');
    }

    // The consent state exists just before the flow reaches awaiting_consent.
    if (match.status !== status) {
      return this.reject(match, `Flow is ${match.status}, expected ${status}`);
    }

    return match;
  }

  private reject(flow: OAuthFlow, message: string): never {
    this.log.warn({ flowId: flow.flowId, status: flow.status }, 'callback rejected');
    throw new OAuthFlowError(flow.abortReason ?? 'invalid_auth', message);
  }

  // Completed and aborted flows keep their outcome.
  private abort(
    flow: OAuthFlow,
    reason: OAuthAbortReason,
    message: string,
    cause?: unknown,
  ): OAuthFlowError {
    if (!isTerminal(flow.status)) {
      flow.status = 'aborted';
      flow.abortReason = reason;
    }

    const details = cause === undefined ? {} : { cause: describeError(cause) };
    this.log.warn({ flowId: flow.flowId, reason, ...details }, 'authorization flow aborted');
    return new OAuthFlowError(flow.abortReason ?? reason, message, { cause });
  }

  private toView(flow: OAuthFlow): OAuthFlowView {
    return {
      flowId: flow.flowId,
      status: flow.status,
      reauthEntryId: flow.reauthEntryId,
      authorizeUrl: flow.authorizeUrl,
      consentUrl: flow.consentUrl,
      vehicles: flow.cars.map((car) => describeCar(car)),
      entryId: flow.entryId,
      abortReason: flow.abortReason,
      expiresAt: new Date(flow.expiresAt).toISOString(),
    };
  }
}
