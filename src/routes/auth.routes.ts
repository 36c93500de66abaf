import { Router } from 'express';
import { AuthController } from '../controllers/auth.controller';
import { asyncHandler } from '../middleware/async-handler';
import { EventApp } from '../services/dispatch/event-app';

export function createAuthRoutes(app: EventApp): Router {
  const router = Router();
  const controller = new AuthController(app);

  router.get('/login', asyncHandler((req, res) => controller.login(req, res)));
  router.get('/callback', asyncHandler((req, res) => controller.callback(req, res)));

  return router;
}
