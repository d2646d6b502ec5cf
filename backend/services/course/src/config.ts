// backend/services/course/src/config.ts

/**
 * - No dotenv loading here (bootstrap.ts loads env).
 * - No hardcoded defaults: every value comes from the env files or the caller.
 * - Fails fast at import time if something is missing or invalid.
 */

import { requireEnum, requireEnv, requireList, requireNumber } from "@shared/env";

const MODES = ["dev", "docker", "test", "production"] as const;

function requireNonNegative(name: string): number {
  const n = requireNumber(name);
  if (n < 0) throw new Error(`Env var ${name} must be >= 0, got ${n}`);
  return n;
}

// Validated only; nothing reads it from config.
requireEnum("NODE_ENV", MODES);

export const config = {
  host: requireEnv("COURSE_HOST"),
  port: requireNonNegative("COURSE_PORT"),
  corsOrigins: requireList("COURSE_CORS_ORIGINS"),
  notifyDelayMs: requireNonNegative("COURSE_NOTIFY_DELAY_MS"),
} as const;
