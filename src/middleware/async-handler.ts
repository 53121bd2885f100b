/**
 * Async Handler
 * =============
 * Express 4 does not catch rejected promises from async handlers.
 * Wrap async route handlers with this helper so errors reach the central error middleware.
 */

import type { NextFunction, Request, RequestHandler, Response } from "express";

export type AsyncRequestHandler = (req: Request, res: Response, next: NextFunction) => Promise<unknown>;

export function asyncHandler(handler: AsyncRequestHandler): RequestHandler {
  return (req, res, next) => {
    handler(req, res, next).catch(next);
  };
}
