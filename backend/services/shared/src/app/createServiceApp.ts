// backend/services/shared/src/app/createServiceApp.ts

/**
 * Assembles the standard service stack:
 *   requestId → http logger → CORS → health → openapi.json → background tasks →
 *   JSON body → routes (+405 tail) → 404 → error formatter.
 *
 * Notes:
 * - Health and `/openapi.json` stay open and outside the route table.
 * - CORS runs before everything that can fail, so error responses carry
 *   the allow-list headers too.
 * - The background task middleware must precede the routes: handlers enqueue
 *   through `req.backgroundTasks`.
 */

import express, { type Express } from "express";
import cors from "cors";
import type { BackgroundTaskRunner } from "@shared/background/BackgroundTaskRunner";
import { createHealthRouter } from "@shared/health";
import { createOpenApiRouter, type ApiInfo } from "@shared/http/openapi";
import type { RouteTable } from "@shared/http/RouteTable";
import { backgroundTasks } from "@shared/middleware/backgroundTasks";
import { makeHttpLogger } from "@shared/middleware/httpLogger";
import {
  errorProblemJson,
  notFoundProblemJson,
} from "@shared/middleware/problemJson";
import { requestIdMiddleware } from "@shared/middleware/requestId";

export type CreateServiceAppOptions = {
  /** Service slug, used in logs and health bodies. */
  serviceName: string;
  /** Exact origins allowed to call with credentials. */
  corsOrigins: readonly string[];
  routes: RouteTable;
  runner: BackgroundTaskRunner;
  /** Title and version of the generated OpenAPI document. */
  api: ApiInfo;
  /** Base path for the route table (default "/"). */
  apiPrefix?: string;
};

export function createServiceApp(opts: CreateServiceAppOptions): Express {
  const { serviceName, corsOrigins, routes, runner } = opts;
  const app = express();
  app.disable("x-powered-by");

  // ── Transport & telemetry ───────────────────────────────────────────────────
  app.use(requestIdMiddleware());
  app.use(makeHttpLogger(serviceName));

  // Allow-list only; request headers are reflected, credentials allowed.
  const allowed = new Set(corsOrigins);
  app.use(
    cors({
      origin: (origin, cb) => cb(null, origin !== undefined && allowed.has(origin)),
      credentials: true,
      methods: ["GET", "HEAD", "POST", "PUT", "PATCH", "DELETE", "OPTIONS"],
      exposedHeaders: ["x-request-id"],
    })
  );

  // ── Health & docs (open) ─────────────────────────────────────────────────────
  app.use(
    createHealthRouter({
      service: serviceName,
      readiness: () => ({ backgroundJobs: runner.pending }),
    })
  );
  app.use(createOpenApiRouter(routes, opts.api, opts.apiPrefix));

  // ── Request pipeline ────────────────────────────────────────────────────────
  app.use(backgroundTasks(runner));
  app.use(express.json({ limit: "1mb" }));

  const api = express.Router();
  routes.mount(api);
  api.use(routes.methodNotAllowed());
  app.use(opts.apiPrefix ?? "/", api);

  // ── Tails ───────────────────────────────────────────────────────────────────
  app.use(notFoundProblemJson());
  app.use(errorProblemJson());

  return app;
}
