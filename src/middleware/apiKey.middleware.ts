import { timingSafeEqual } from 'crypto';
import type { RequestHandler } from 'express';

import { unauthorizedError } from '../utils/errors';
import { logger } from '../utils/logger';

export const apiKeyMatches = (provided: string, expected: string): boolean => {
  const providedBuffer = Buffer.from(provided);
  const expectedBuffer = Buffer.from(expected);
  return (
    providedBuffer.length === expectedBuffer.length &&
    timingSafeEqual(providedBuffer, expectedBuffer)
  );
};

// Guards the management API. Without a configured key every request is refused.
export const requireApiKey =
  (apiKey: string | null): RequestHandler =>
  (req, _res, next) => {
    if (!apiKey) {
      logger.error('API_KEY is not configured; refusing management request');
      next(unauthorizedError());
      return;
    }

    const providedKey = req.header('x-api-key');
    if (!providedKey || !apiKeyMatches(providedKey, apiKey)) {
      next(unauthorizedError('Invalid API key'));
      return;
    }

    next();
  };
