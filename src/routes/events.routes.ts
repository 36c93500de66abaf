import express, { Router } from 'express';
import { EventsController } from '../controllers/events.controller';
import { asyncHandler } from '../middleware/async-handler';
import { EventApp } from '../services/dispatch/event-app';

export function createEventRoutes(app: EventApp): Router {
  const router = Router();
  const controller = new EventsController(app);

  // Signatures are computed over the exact bytes Frame.io sent
  router.post('/', express.raw({ type: '*/*', limit: '1mb' }), asyncHandler((req, res) => controller.receive(req, res)));

  return router;
}
