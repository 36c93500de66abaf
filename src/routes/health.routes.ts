import { Router } from 'express';
import { HealthController } from '../controllers/health.controller';
import { asyncHandler } from '../middleware/async-handler';
import { EventApp } from '../services/dispatch/event-app';

export function createHealthRoutes(app: EventApp): Router {
  const router = Router();
  const controller = new HealthController(app);

  router.get('/', asyncHandler((req, res) => controller.check(req, res)));
  router.get('/integrations', asyncHandler((req, res) => controller.checkIntegrations(req, res)));

  return router;
}
