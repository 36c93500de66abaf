import { Request, Response } from 'express';
import { EventApp } from '../services/dispatch/event-app';
import { createLogger } from '../utils/logger';

const logger = createLogger('health');

export class HealthController {
  constructor(private readonly app: EventApp) {}

  /**
   * Basic health check
   */
  async check(_req: Request, res: Response): Promise<void> {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
    });
  }

  /**
   * Storage reachability plus registered handlers
   */
  async checkIntegrations(_req: Request, res: Response): Promise<void> {
    let storage = 'ok';
    try {
      await this.app.storage.get('health:probe');
    } catch (error) {
      storage = 'error';
      logger.error('Storage health check failed:', error);
    }

    const problems = this.app.validateConfiguration();
    const ok = storage === 'ok' && problems.length === 0;

    res.status(ok ? 200 : 503).json({
      status: ok ? 'ok' : 'degraded',
      integrations: {
        storage,
        oauth: this.app.oauthClient ? 'configured' : 'disabled',
        install: this.app.installationManager ? 'configured' : 'disabled',
      },
      handlers: this.app.registeredTypes,
      problems,
      timestamp: new Date().toISOString(),
    });
  }
}
