// backend/services/course/src/app.ts

/**
 * Assembled on the shared builder: requestId → httpLogger → CORS →
 * health and openapi.json (open) → background tasks → JSON → routes → 404 → error.
 */

import "./bootstrap";
import "./log.init";

import type { Express } from "express";
import { createServiceApp } from "@shared/app/createServiceApp";
import { BackgroundTaskRunner } from "@shared/background/BackgroundTaskRunner";
import { SERVICE_NAME } from "./bootstrap";
import { config } from "./config";
import { buildRouteTable } from "./routes";

export type CourseApp = {
  app: Express;
  runner: BackgroundTaskRunner;
};

export function createCourseApp(
  opts: { runner?: BackgroundTaskRunner; corsOrigins?: readonly string[] } = {}
): CourseApp {
  const runner = opts.runner ?? new BackgroundTaskRunner();
  const app = createServiceApp({
    serviceName: SERVICE_NAME,
    corsOrigins: opts.corsOrigins ?? config.corsOrigins,
    routes: buildRouteTable(),
    runner,
    api: { title: "Course tutorial API", version: "0.1.0" },
  });
  return { app, runner };
}

const { app, runner } = createCourseApp();

export { runner };
export default app;
