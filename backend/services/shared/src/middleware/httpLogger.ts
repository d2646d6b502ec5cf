// backend/services/shared/src/middleware/httpLogger.ts

/**
 * Structured request logs across services, aggregated by `service` and
 * correlated by `reqId`.
 *
 * Order:
 * - Mount immediately after `requestIdMiddleware` so `req.id` is populated
 *   and every log line carries the same correlation key.
 *
 * Notes:
 * - Severity mapping: 2xx/3xx=info, 4xx=warn, 5xx/error=error.
 * - Health and favicon probes are not logged.
 * - `req.log` (child logger) is what handlers and the error tail use.
 */

import type { IncomingMessage, ServerResponse } from "node:http";
import { randomUUID } from "node:crypto";
import pinoHttp from "pino-http";
import { logger as rootLogger } from "@shared/utils/logger";
import { HEALTH_PATHS } from "@shared/health";
import { pickRequestId } from "./requestId";

const IGNORED_PATHS = new Set<string>([
  ...HEALTH_PATHS.live,
  ...HEALTH_PATHS.ready,
  "/favicon.ico",
]);

function levelFor(status: number, err?: Error): "error" | "warn" | "info" {
  if (err || status >= 500) return "error";
  return status >= 400 ? "warn" : "info";
}

export function makeHttpLogger(serviceName: string) {
  const logger = rootLogger.child({ service: serviceName });

  return pinoHttp({
    logger,

    // Reuse the id minted by requestIdMiddleware; fall back to headers/UUID
    // when mounted on its own.
    genReqId: (req: IncomingMessage, res: ServerResponse) => {
      const id = req.id ? String(req.id) : pickRequestId(req.headers) ?? randomUUID();
      res.setHeader("x-request-id", id);
      return id;
    },

    customLogLevel: (_req: IncomingMessage, res: ServerResponse, err?: Error) =>
      levelFor(res.statusCode, err),

    customProps: (req: IncomingMessage) => ({
      service: serviceName,
      reqId: req.id,
    }),

    autoLogging: {
      ignore: (req: IncomingMessage) =>
        IGNORED_PATHS.has((req.url ?? "").split("?")[0] ?? ""),
    },

    serializers: {
      req: (req: IncomingMessage) => ({ id: req.id, method: req.method, url: req.url }),
      res: (res: ServerResponse) => ({ statusCode: res.statusCode }),
      err: (err: Error) => ({ type: err.name, msg: err.message }),
    },
  });
}
