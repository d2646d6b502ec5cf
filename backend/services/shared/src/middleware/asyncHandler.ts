// backend/services/shared/src/middleware/asyncHandler.ts
import type { Request, RequestHandler, Response } from "express";

type AsyncRoute = (req: Request, res: Response) => Promise<void>;

/** Express 4 ignores returned promises; send rejections to the error tail. */
export function asyncHandler(fn: AsyncRoute): RequestHandler {
  return (req, res, next) => {
    fn(req, res).catch(next);
  };
}
