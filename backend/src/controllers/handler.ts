import type { NextFunction, Request, RequestHandler, Response } from 'express';

/** Forwards a rejected handler promise to the error middleware. */
export function handle(fn: (req: Request, res: Response) => Promise<void>): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    fn(req, res).catch(next);
  };
}
