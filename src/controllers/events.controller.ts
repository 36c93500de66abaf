import { Request, Response } from 'express';
import { EventApp } from '../services/dispatch/event-app';
import { EventDispatcher } from '../services/dispatch/event-dispatcher.service';
import { toResponseBody } from '../types/response.types';
import {
  BadRequestError,
  ConfigurationError,
  EventValidationError,
  HandlerNotFoundError,
  SecretResolutionError,
  SignatureVerificationError,
} from '../utils/errors';
import { createLogger } from '../utils/logger';

const logger = createLogger('events');

export function requestBaseUrl(req: Request): string {
  return `${req.protocol}://${req.get('host') ?? 'localhost'}`;
}

/**
 * Event delivery endpoint for webhooks and custom actions.
 * Expects the body as raw bytes (express.raw) so signatures match.
 */
export class EventsController {
  private readonly dispatcher: EventDispatcher;

  constructor(private readonly app: EventApp) {
    this.dispatcher = new EventDispatcher(app);
  }

  /**
   * POST /
   */
  async receive(req: Request, res: Response): Promise<void> {
    const rawBody: Buffer = Buffer.isBuffer(req.body) ? req.body : Buffer.alloc(0);

    try {
      const response = await this.dispatcher.dispatch(rawBody, req.headers, this.app.resolveBaseUrl(requestBaseUrl(req)));
      if (response) {
        res.status(200).json(toResponseBody(response));
      } else {
        res.status(200).type('text/plain').send('OK');
      }
    } catch (error) {
      this.sendError(res, error);
    }
  }

  private sendError(res: Response, error: unknown): void {
    if (error instanceof BadRequestError) {
      res.status(400).json({ error: error.message });
    } else if (error instanceof HandlerNotFoundError) {
      logger.warn(error.message);
      res.status(404).json({ error: error.message });
    } else if (error instanceof EventValidationError) {
      logger.warn(`Payload validation failed for ${error.eventType}: ${error.issues.join('; ')}`);
      res.status(422).json({ error: 'Payload validation error', details: error.issues });
    } else if (error instanceof SecretResolutionError) {
      logger.error(`Secret resolution failed for ${error.eventType}: ${error.message}`);
      res.status(error.statusCode).json({
        error: error.statusCode === 401 ? 'Unauthorized' : 'Secret resolution failed',
      });
    } else if (error instanceof SignatureVerificationError) {
      logger.warn('Rejected request with invalid signature');
      res.status(401).json({ error: 'Invalid signature' });
    } else if (error instanceof ConfigurationError) {
      logger.error(`Configuration error: ${error.message}`);
      res.status(503).json({ error: 'Service misconfigured' });
    } else {
      logger.error('Handler failed:', error);
      res.status(500).json({ error: 'Internal Server Error' });
    }
  }
}
