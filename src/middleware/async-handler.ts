import { NextFunction, Request, RequestHandler, Response } from 'express';

/**
 * Forward rejections from async controller methods to the error handler.
 */
export function asyncHandler(fn: (req: Request, res: Response) => Promise<void>): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    fn(req, res).catch(next);
  };
}
