import { Router } from 'express';
import { EventApp } from '../services/dispatch/event-app';
import { createAuthRoutes } from './auth.routes';
import { createEventRoutes } from './events.routes';
import { createHealthRoutes } from './health.routes';
import { createInstallRoutes } from './install.routes';

export function createRoutes(app: EventApp): Router {
  const router = Router();

  // Mount routes
  router.use('/', createEventRoutes(app));
  router.use('/health', createHealthRoutes(app));
  if (app.oauthClient) {
    router.use('/auth', createAuthRoutes(app));
  }
  if (app.installationManager) {
    router.use('/install', createInstallRoutes(app));
  }

  return router;
}
