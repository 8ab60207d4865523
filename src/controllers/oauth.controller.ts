import { Router } from 'express';
import { z } from 'zod';

import { parseInput } from '../middleware/validation.middleware';
import type { OAuthFlowService } from '../services/oauthFlow.service';
import { OAuthFlowError, notFoundError } from '../utils/errors';
import { logger } from '../utils/logger';

const CLOSE_HINT = 'You can close this window.';

const authorizationCallbackSchema = z.object({
  code: z.string().optional(),
  state: z.string().optional(),
  errCode: z.string().optional(),
  errMsg: z.string().optional(),
});

const consentCallbackSchema = z.object({
  state: z.string().optional(),
  userId: z.string().optional(),
  errCode: z.string().optional(),
  errMsg: z.string().optional(),
});

const startFlowSchema = z
  .object({
    clientId: z.string().min(1).optional(),
    clientSecret: z.string().min(1).optional(),
    reauthEntryId: z.string().min(1).optional(),
  })
  .default({});

const selectVehicleSchema = z.object({
  carId: z.string().min(1),
});

export type OAuthRouters = {
  oauthPublicRouter: Router;
  oauthRouter: Router;
};

export const createOAuthRouters = (flows: OAuthFlowService): OAuthRouters => {
  const oauthPublicRouter = Router();
  const oauthRouter = Router();

  oauthPublicRouter.get('/oauth/callback', async (req, res, next) => {
    try {
      const query = parseInput(authorizationCallbackSchema, req.query);
      const flow = await flows.handleAuthorizationCallback(query);
      logger.info({ flowId: flow.flowId }, 'authorization callback accepted');
      res.type('text/plain').send(`Authorization received. ${CLOSE_HINT}`);
    } catch (error) {
      if (error instanceof OAuthFlowError) {
        res
          .status(400)
          .type('text/plain')
          .send(`Authorization failed (${error.reason}). ${CLOSE_HINT}`);
        return;
      }

      next(error);
    }
  });

  oauthPublicRouter.get('/terms/callback', async (req, res, next) => {
    try {
      const query = parseInput(consentCallbackSchema, req.query);
      const flow = await flows.handleConsentCallback(query);
      logger.info({ flowId: flow.flowId }, 'consent callback accepted');
      res.type('text/plain').send(`Terms agreement received. ${CLOSE_HINT}`);
    } catch (error) {
      if (error instanceof OAuthFlowError) {
        res
          .status(400)
          .type('text/plain')
          .send(`Terms agreement failed (${error.reason}). ${CLOSE_HINT}`);
        return;
      }

      next(error);
    }
  });

  oauthRouter.post('/flows', async (req, res, next) => {
    try {
      const input = parseInput(startFlowSchema, req.body);
      const flow = await flows.startFlow(input);
      res.status(201).json({ data: flow });
    } catch (error) {
      next(error);
    }
  });

  oauthRouter.get('/flows/:flowId', (req, res, next) => {
    try {
      const flow = flows.getFlow(req.params.flowId);
      if (!flow) {
        throw notFoundError(`Flow ${req.params.flowId} not found`);
      }

      res.json({ data: flow });
    } catch (error) {
      next(error);
    }
  });

  oauthRouter.post('/flows/:flowId/vehicle', async (req, res, next) => {
    try {
      const { carId } = parseInput(selectVehicleSchema, req.body);
      const flow = await flows.selectVehicle(req.params.flowId, carId);
      res.json({ data: flow });
    } catch (error) {
      next(error);
    }
  });

  return { oauthPublicRouter, oauthRouter };
};
