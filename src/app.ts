import express, { Express } from 'express';
import helmet from 'helmet';
import cors from 'cors';
import cookieParser from 'cookie-parser';
import { requestLogger } from './middleware/logger';
import { errorHandler, notFoundHandler } from './middleware/error-handler';
import { EventApp } from './services/dispatch/event-app';
import { createRoutes } from './routes';

/**
 * Build the HTTP server for an EventApp. Body parsers are attached per route:
 * the event endpoint needs the raw bytes.
 */
export function createApp(eventApp: EventApp): Express {
  const app: Express = express();

  // Security middleware
  app.use(helmet({
    contentSecurityPolicy: {
      directives: {
        defaultSrc: ["'self'"],
        scriptSrc: ["'self'"],
        styleSrc: ["'self'", "'unsafe-inline'"],
        imgSrc: ["'self'", 'data:'],
        formAction: ["'self'"],
      },
    },
  }));
  app.use(cors());
  app.use(cookieParser());

  // Request logging
  app.use(requestLogger);

  // Routes
  app.use('/', createRoutes(eventApp));

  // 404 handler
  app.use(notFoundHandler);

  // Error handler (must be last)
  app.use(errorHandler);

  return app;
}

export default createApp;
