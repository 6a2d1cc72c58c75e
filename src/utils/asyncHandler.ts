import type { NextFunction, RequestHandler, Response } from 'express';
import type { AuthedRequest } from '../middleware/auth';

/** Forwards a rejected handler promise to the global error trap. */
export function asyncHandler(fn: (req: AuthedRequest, res: Response) => Promise<void>): RequestHandler {
  return (req: AuthedRequest, res: Response, next: NextFunction) => {
    fn(req, res).catch(next);
  };
}
