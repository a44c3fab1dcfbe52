import type { NextFunction, Request, RequestHandler, Response } from "express";
import { StoreUnavailableError } from "../store/storeErrors.js";

type AsyncRequestHandler = (req: Request, res: Response, next: NextFunction) => Promise<void>;

/** Express 4 does not forward rejected handler promises; this does. */
export function asyncHandler(handler: AsyncRequestHandler): RequestHandler {
  return (req, res, next) => {
    handler(req, res, next).catch(next);
  };
}

export function requireStore(ensureStoreConnected: () => Promise<void>): RequestHandler {
  return (_req, _res, next) => {
    ensureStoreConnected().then(
      () => next(),
      (error: unknown) => next(new StoreUnavailableError("Graph store unavailable", { cause: error }))
    );
  };
}
