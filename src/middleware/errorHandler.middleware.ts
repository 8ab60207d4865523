import type { ErrorRequestHandler } from 'express';
import { ZodError } from 'zod';

import {
  AuthError,
  BluelinkError,
  HttpError,
  OAuthFlowError,
  RateLimitError,
  ReauthRequiredError,
  UpstreamError,
  VehicleNotFoundError,
  badRequestError,
} from '../utils/errors';
import { logger } from '../utils/logger';

const describeDomainError = (error: BluelinkError): Record<string, unknown> => ({
  operation: error.operation,
  upstreamStatus: error.status,
  errCode: error.errCode,
  errMsg: error.errMsg,
});

/**
 * Maps domain failures onto the HTTP error shape. Returns null for anything
 * that is not a known error.
 */
export const toHttpError = (error: unknown): HttpError | null => {
  if (error instanceof HttpError) {
    return error;
  }

  if (error instanceof ZodError) {
    return badRequestError('Request validation failed', error.flatten());
  }

  if (error instanceof OAuthFlowError) {
    return new HttpError(400, 'OAUTH_FLOW_FAILED', error.message, { reason: error.reason });
  }

  if (error instanceof ReauthRequiredError) {
    return new HttpError(409, 'REAUTH_REQUIRED', error.message, describeDomainError(error));
  }

  if (error instanceof VehicleNotFoundError) {
    return new HttpError(404, 'VEHICLE_NOT_FOUND', error.message, describeDomainError(error));
  }

  if (error instanceof RateLimitError) {
    return new HttpError(503, 'UPSTREAM_RATE_LIMITED', error.message, {
      ...describeDomainError(error),
      retryAfterSeconds: error.retryAfterSeconds,
    });
  }

  if (error instanceof AuthError) {
    return new HttpError(502, 'UPSTREAM_AUTH_FAILED', error.message, describeDomainError(error));
  }

  if (error instanceof UpstreamError) {
    return new HttpError(502, 'UPSTREAM_ERROR', error.message, describeDomainError(error));
  }

  return null;
};

export const errorHandler: ErrorRequestHandler = (error, _req, res, next) => {
  if (res.headersSent) {
    next(error);
    return;
  }

  const httpError = toHttpError(error);
  if (httpError) {
    if (httpError.status >= 500) {
      logger.warn({ err: error, code: httpError.code }, 'upstream failure surfaced');
    }

    res.status(httpError.status).json({
      error: {
        code: httpError.code,
        message: httpError.message,
        details: httpError.details,
      },
    });
    return;
  }

  logger.error({ err: error }, 'unhandled error');
  res.status(500).json({
    error: {
      code: 'INTERNAL_SERVER_ERROR',
      message: 'Something went wrong. Try again later.',
    },
  });
};
