import express, { Router } from 'express';
import { InstallController } from '../controllers/install.controller';
import { asyncHandler } from '../middleware/async-handler';
import { EventApp } from '../services/dispatch/event-app';

export function createInstallRoutes(app: EventApp): Router {
  const router = Router();
  const controller = new InstallController(app);
  const form = express.urlencoded({ extended: false });

  router.get('/', asyncHandler((req, res) => controller.landing(req, res)));
  router.get('/login', asyncHandler((req, res) => controller.login(req, res)));
  router.get('/callback', asyncHandler((req, res) => controller.callback(req, res)));
  router.get('/workspaces', asyncHandler((req, res) => controller.workspaces(req, res)));
  router.get('/status', asyncHandler((req, res) => controller.status(req, res)));
  router.post('/execute', form, asyncHandler((req, res) => controller.execute(req, res)));
  router.post('/uninstall', form, asyncHandler((req, res) => controller.uninstall(req, res)));
  router.post('/logout', asyncHandler((req, res) => controller.logout(req, res)));

  return router;
}
