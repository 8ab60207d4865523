import { Router } from 'express';
import { z } from 'zod';

import { parseInput } from '../middleware/validation.middleware';
import type { IntegrationService } from '../services/integration.service';
import type { NotificationCenter } from '../services/notification.service';
import { notFoundError } from '../utils/errors';
import { logger } from '../utils/logger';

const selectVehicleSchema = z.object({
  carId: z.string().min(1),
});

export const createEntriesRouter = (integration: IntegrationService): Router => {
  const entriesRouter = Router();

  entriesRouter.get('/', async (_req, res, next) => {
    try {
      const entries = await integration.listEntries();
      res.json({ data: { entries } });
    } catch (error) {
      next(error);
    }
  });

  entriesRouter.get('/:entryId/entities', (req, res, next) => {
    try {
      res.json({ data: integration.getEntities(req.params.entryId) });
    } catch (error) {
      next(error);
    }
  });

  entriesRouter.get('/:entryId/jobs', (req, res, next) => {
    try {
      const jobs = integration.getJobStatuses(req.params.entryId);
      res.json({ data: { entryId: req.params.entryId, jobs } });
    } catch (error) {
      next(error);
    }
  });

  entriesRouter.post('/:entryId/refresh', async (req, res, next) => {
    try {
      const { entryId } = req.params;
      const jobs = await integration.refreshEntry(entryId);
      logger.info({ entryId }, 'manual refresh completed');
      res.json({ data: { entryId, jobs } });
    } catch (error) {
      next(error);
    }
  });

  entriesRouter.post('/:entryId/resync', async (req, res, next) => {
    try {
      const { entryId } = req.params;
      const result = await integration.resyncEntry(entryId);
      res.json({ data: { entryId, ...result } });
    } catch (error) {
      next(error);
    }
  });

  entriesRouter.post('/:entryId/vehicle', async (req, res, next) => {
    try {
      const { entryId } = req.params;
      const { carId } = parseInput(selectVehicleSchema, req.body);
      await integration.selectVehicle(entryId, carId);
      res.json({ data: integration.getEntities(entryId) });
    } catch (error) {
      next(error);
    }
  });

  entriesRouter.delete('/:entryId', async (req, res, next) => {
    try {
      await integration.removeEntry(req.params.entryId);
      res.status(204).send();
    } catch (error) {
      next(error);
    }
  });

  return entriesRouter;
};

export const createNotificationsRouter = (notifications: NotificationCenter): Router => {
  const notificationsRouter = Router();

  notificationsRouter.get('/', (_req, res) => {
    res.json({ data: { notifications: notifications.list() } });
  });

  notificationsRouter.delete('/:notificationId', (req, res, next) => {
    try {
      if (!notifications.dismiss(req.params.notificationId)) {
        throw notFoundError(`Notification ${req.params.notificationId} not found`);
      }

      res.status(204).send();
    } catch (error) {
      next(error);
    }
  });

  return notificationsRouter;
};
