import { randomUUID } from 'crypto';
import express, { Application, RequestHandler, Router } from 'express';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import pinoHttp from 'pino-http';

import { requireApiKey } from './middleware/apiKey.middleware';
import { errorHandler } from './middleware/errorHandler.middleware';
import { createOAuthRouters } from './controllers/oauth.controller';
import {
  createEntriesRouter,
  createNotificationsRouter,
} from './controllers/entries.controller';
import { getAppConfig, type AppConfig } from './config/appConfig';
import type { IntegrationService } from './services/integration.service';
import type { NotificationCenter } from './services/notification.service';
import type { OAuthFlowService } from './services/oauthFlow.service';
import { logger } from './utils/logger';
import { getMigrationStatus, getDatabaseHealth } from './db/sqlite';

export type AppDependencies = {
  integration: IntegrationService;
  flows: OAuthFlowService;
  notifications: NotificationCenter;
};

const extractRequestId = (req: unknown): string | undefined => {
  if (req && typeof req === 'object' && 'id' in req && typeof req.id === 'string') {
    return req.id;
  }

  return undefined;
};

const errorEnvelope = (
  req: unknown,
  code: string,
  message: string,
  details?: Record<string, unknown>,
) => ({
  error: { code, message, details, requestId: extractRequestId(req) },
});

const headerRedactPath = (header: string): string => {
  const sanitized = header.toLowerCase();
  return /^[a-z0-9_]+$/.test(sanitized)
    ? `req.headers.${sanitized}`
    : `req.headers["${sanitized}"]`;
};

const requestLogger = (appConfig: AppConfig) =>
  pinoHttp({
    logger,
    genReqId: (req, res) => {
      const incoming = req.headers[appConfig.requestIdHeader];
      const candidate = Array.isArray(incoming) ? incoming[0] : incoming;
      const requestId = candidate && candidate.length > 0 ? candidate : randomUUID();
      res.setHeader(appConfig.requestIdHeader, requestId);
      return requestId;
    },
    redact: {
      paths: appConfig.logging.redactHeaders.map(headerRedactPath),
      remove: true,
    },
    // Callback query strings carry authorization codes.
    serializers: {
      req(req) {
        const { id, method } = req;
        const path = typeof req.url === 'string' ? req.url.split('?')[0] : req.url;
        return { id, method, path };
      },
      res(res) {
        return { statusCode: res.statusCode };
      },
    },
  });

const apiLimiter = ({ rateLimit: limits }: AppConfig): RequestHandler =>
  rateLimit({
    windowMs: limits.windowMs,
    limit: limits.max,
    standardHeaders: true,
    legacyHeaders: false,
    handler: (req, res) => {
      const retryAfterSeconds = Math.ceil(limits.windowMs / 1000);
      res.setHeader('Retry-After', retryAfterSeconds.toString());
      res.status(429).json(
        errorEnvelope(req, 'RATE_LIMITED', 'Too many requests. Slow down before retrying.', {
          windowMs: limits.windowMs,
          maxRequests: limits.max,
          retryAfterSeconds,
        }),
      );
    },
  });

const readinessHandler =
  (integration: IntegrationService): RequestHandler =>
  async (req, res, next) => {
    try {
      const database = await getDatabaseHealth();
      const { pending, applied } = await getMigrationStatus();

      if (!database.connected || pending.length > 0) {
        res.status(503).json(
          errorEnvelope(req, 'SERVICE_UNAVAILABLE', 'Service is not ready to accept traffic.', {
            database,
            pendingMigrations: pending,
          }),
        );
        return;
      }

      res.json({
        status: 'ready',
        details: {
          database,
          appliedMigrations: applied,
          loadedEntries: integration.loadedEntryCount,
        },
        requestId: extractRequestId(req),
      });
    } catch (error) {
      next(error);
    }
  };

export const createApp = (dependencies: AppDependencies): Application => {
  const appConfig = getAppConfig();
  const app = express();

  app.use(requestLogger(appConfig));
  app.use(helmet({ contentSecurityPolicy: appConfig.helmet.contentSecurityPolicy }));
  app.use(express.json());

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok' });
  });
  app.get('/ready', readinessHandler(dependencies.integration));

  const { oauthPublicRouter, oauthRouter } = createOAuthRouters(dependencies.flows);

  const apiRouter = Router();
  apiRouter.use(requireApiKey(appConfig.apiKey));
  apiRouter.use('/bluelink', oauthRouter);
  apiRouter.use('/entries', createEntriesRouter(dependencies.integration));
  apiRouter.use('/notifications', createNotificationsRouter(dependencies.notifications));

  app.use('/api/v1', apiLimiter(appConfig));
  app.use('/api/v1/bluelink', oauthPublicRouter);
  app.use('/api/v1', apiRouter);

  app.use((req, res) => {
    res.status(404).json(errorEnvelope(req, 'NOT_FOUND', 'Resource not found'));
  });

  app.use(errorHandler);

  return app;
};
