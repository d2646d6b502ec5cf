// backend/services/shared/src/health.ts

/**
 * Liveness answers "is the process up?" (local, no dependencies).
 * Readiness answers "can this instance take traffic?" (fast, bounded checks).
 * Both are open and carry the request id so probe failures correlate with logs.
 *
 * Exposes:
 *   GET /health         -> liveness
 *   GET /health/live    -> liveness
 *   GET /health/ready   -> readiness
 *   GET /healthz        -> k8s-style liveness
 *   GET /readyz         -> k8s-style readiness
 *   GET /live           -> liveness
 *   GET /ready          -> readiness
 */

import express, { type Request, type Response, type Router } from "express";
import { asyncHandler } from "@shared/middleware/asyncHandler";

export type ReadinessDetails = Record<string, unknown>;
export type ReadinessFn = (
  req: Request
) => Promise<ReadinessDetails> | ReadinessDetails;

export type HealthRouterOptions = {
  service: string;
  /** Optional, fast readiness checker. Throwing marks the instance not ready. */
  readiness?: ReadinessFn;
};

export const HEALTH_PATHS = {
  live: ["/health", "/health/live", "/healthz", "/live"],
  ready: ["/health/ready", "/readyz", "/ready"],
} as const;

export function createHealthRouter(opts: HealthRouterOptions): Router {
  const router = express.Router();

  const base = { service: opts.service, env: process.env.NODE_ENV };

  const requestId = (req: Request) => (req.id ? String(req.id) : undefined);

  const liveness = (req: Request, res: Response) => {
    res.json({ ...base, ok: true, requestId: requestId(req) });
  };

  const readiness = async (req: Request, res: Response) => {
    try {
      const details = opts.readiness ? await opts.readiness(req) : {};
      res.json({ ...base, ok: true, requestId: requestId(req), ...details });
    } catch (err) {
      // 503 = "not ready" to orchestrators.
      res.status(503).json({
        ...base,
        ok: false,
        requestId: requestId(req),
        error: err instanceof Error ? err.message : String(err),
      });
    }
  };

  for (const path of HEALTH_PATHS.live) router.get(path, liveness);
  for (const path of HEALTH_PATHS.ready) router.get(path, asyncHandler(readiness));

  return router;
}
