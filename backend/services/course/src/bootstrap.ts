// backend/services/course/src/bootstrap.ts

/**
 * Load envs via the shared cascade (repo → family → service) and assert the
 * variables this service cannot start without.
 */

import { assertEnv, loadEnvCascadeForService } from "@shared/env";

export const SERVICE_NAME = "course" as const;

loadEnvCascadeForService(__dirname);

assertEnv([
  "LOG_LEVEL",
  "COURSE_HOST",
  "COURSE_PORT",
  "COURSE_CORS_ORIGINS",
  "COURSE_NOTIFY_DELAY_MS",
]);
