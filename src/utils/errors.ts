export class HttpError extends Error {
  status: number;

  code: string;

  details?: unknown;

  constructor(status: number, code: string, message: string, details?: unknown) {
    super(message);
    this.status = status;
    this.code = code;
    this.details = details;
  }
}

export const unauthorizedError = (message = 'Unauthorized'): HttpError =>
  new HttpError(401, 'UNAUTHORIZED', message);

export const badRequestError = (message: string, details?: unknown): HttpError =>
  new HttpError(400, 'BAD_REQUEST', message, details);

export const notFoundError = (message: string): HttpError =>
  new HttpError(404, 'NOT_FOUND', message);

export type BluelinkErrorCode =
  | 'AUTH_ERROR'
  | 'REAUTH_REQUIRED'
  | 'RATE_LIMITED'
  | 'UPSTREAM_ERROR'
  | 'VEHICLE_NOT_FOUND';

export type BluelinkErrorOptions = {
  operation: string;
  status?: number;
  errCode?: string;
  errMsg?: string;
  cause?: unknown;
};

/**
 * Base class for failures of the vendor API or of the credential lifecycle.
 * `retryable` tells the polling layer whether the next natural tick may succeed.
 */
export abstract class BluelinkError extends Error {
  abstract readonly code: BluelinkErrorCode;

  abstract readonly retryable: boolean;

  readonly operation: string;

  readonly status?: number;

  readonly errCode?: string;

  readonly errMsg?: string;

  constructor(message: string, options: BluelinkErrorOptions) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.operation = options.operation;
    this.status = options.status;
    this.errCode = options.errCode;
    this.errMsg = options.errMsg;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      operation: this.operation,
      status: this.status,
      errCode: this.errCode,
      errMsg: this.errMsg,
    };
  }
}

export class AuthError extends BluelinkError {
  readonly code = 'AUTH_ERROR';

  readonly retryable = true;
}

export class ReauthRequiredError extends BluelinkError {
  readonly code = 'REAUTH_REQUIRED';

  readonly retryable = false;
}

export class RateLimitError extends BluelinkError {
  readonly code = 'RATE_LIMITED';

  readonly retryable = true;

  readonly retryAfterSeconds?: number;

  constructor(message: string, options: BluelinkErrorOptions & { retryAfterSeconds?: number }) {
    super(message, options);
    this.retryAfterSeconds = options.retryAfterSeconds;
  }
}

export class UpstreamError extends BluelinkError {
  readonly code = 'UPSTREAM_ERROR';

  readonly retryable = true;
}

// Configuration-level: keeps failing until the user re-discovers or reselects a vehicle.
export class VehicleNotFoundError extends BluelinkError {
  readonly code = 'VEHICLE_NOT_FOUND';

  readonly retryable = false;
}

export type OAuthAbortReason =
  | 'invalid_auth'
  | 'unknown_state'
  | 'flow_expired'
  | 'no_cars'
  | 'already_configured'
  | 'external_url_required';

export class OAuthFlowError extends Error {
  readonly reason: OAuthAbortReason;

  constructor(reason: OAuthAbortReason, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'OAuthFlowError';
    this.reason = reason;
  }
}

export const describeError = (error: unknown): { code: string; message: string } => {
  if (error instanceof BluelinkError) {
    return { code: error.code, message: error.message };
  }

  if (error instanceof Error) {
    return { code: error.name, message: error.message };
  }

  return { code: 'UNKNOWN', message: String(error) };
};
