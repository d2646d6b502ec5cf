// backend/services/shared/src/utils/logger.ts
import type { Request } from "express";
import pino, {
  type Logger,
  type LoggerOptions,
  type LevelWithSilent,
  stdTimeFunctions,
} from "pino";

/**
 * Shared Logger (authoritative)
 *
 * Each service MUST call `initLogger(SERVICE_NAME)` at bootstrap BEFORE
 * creating any request loggers (e.g., pino-http).
 *
 * Usage:
 *   import { initLogger } from "@shared/utils/logger";
 *   initLogger(SERVICE_NAME);
 */

const validLevels: readonly LevelWithSilent[] = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
];

function isLevel(value: string): value is LevelWithSilent {
  return validLevels.some((l) => l === value);
}

function envLevel(): LevelWithSilent {
  const raw = (process.env.LOG_LEVEL ?? "").trim();
  if (!raw) throw new Error("Missing required env var: LOG_LEVEL");
  if (!isLevel(raw)) throw new Error(`Invalid LOG_LEVEL: "${raw}"`);
  return raw;
}

// NOTE: Avoid stamping "service":"unknown". Start with NO base.service;
//       initLogger() recreates the logger with base.service set.
let SERVICE_NAME = "";

function pinoOptions(): LoggerOptions {
  return {
    level: envLevel(),
    base: SERVICE_NAME ? { service: SERVICE_NAME } : {},
    timestamp: stdTimeFunctions.isoTime,
    redact: {
      remove: true,
      paths: ["req.headers.authorization", "req.headers.cookie"],
    },
  };
}

export let logger: Logger = pino(pinoOptions());

/** Initialize the shared logger for this running service. Call once at bootstrap. */
export function initLogger(serviceName: string): Logger {
  SERVICE_NAME = String(serviceName || "").trim();
  if (!SERVICE_NAME) throw new Error("initLogger requires serviceName");
  logger = pino(pinoOptions());
  return logger;
}

export type LogContext = {
  requestId: string | null;
  path: string;
  method: string;
  ip?: string;
  service?: string;
};

export function extractLogContext(req: Request): LogContext {
  return {
    requestId: req.id ? String(req.id) : null,
    path: req.originalUrl,
    method: req.method,
    ip: req.ip,
    service: SERVICE_NAME || undefined,
  };
}
