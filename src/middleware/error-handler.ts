import { Request, Response, NextFunction } from 'express';
import { FrameioKitError } from '../utils/errors';
import { createLogger } from '../utils/logger';

const logger = createLogger('error');

function statusOf(err: unknown): number {
  if (err instanceof FrameioKitError) return err.statusCode;
  // body-parser errors (payload too large, bad encoding) carry `status`
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
    return err.status;
  }
  return 500;
}

/**
 * Last-resort handler for errors that escape a controller. Only client
 * errors raised by this package echo their message.
 */
export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  const statusCode = statusOf(err);
  const exposed = err instanceof FrameioKitError && statusCode < 500;

  logger.error(`${req.method} ${req.path} failed with ${statusCode}:`, err);

  res.status(statusCode).json({
    error: exposed && err instanceof Error ? err.message : statusCode < 500 ? 'Bad Request' : 'Internal Server Error',
  });
}

/**
 * 404 handler
 */
export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json({
    error: 'Not Found',
    path: req.path,
  });
}
