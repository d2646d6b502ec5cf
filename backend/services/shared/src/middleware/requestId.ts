// backend/services/shared/src/middleware/requestId.ts

/**
 * Every inbound request carries a stable correlation key so logs, error
 * bodies (`instance`) and background job logs can be tied together.
 *
 * Notes:
 * - Must run before the HTTP logger and anything that logs.
 * - Never overwrites a caller-supplied id; mints a UUID only if the request
 *   lacks all recognized headers.
 * - Headers honored: `x-request-id`, `x-correlation-id`, `x-amzn-trace-id`.
 *   The response always echoes `x-request-id`.
 */

import type { IncomingHttpHeaders } from "node:http";
import { randomUUID } from "node:crypto";
import type { RequestHandler } from "express";

const CORRELATION_HEADERS = [
  "x-request-id",
  "x-correlation-id",
  "x-amzn-trace-id",
] as const;

export function pickRequestId(headers: IncomingHttpHeaders): string | undefined {
  for (const name of CORRELATION_HEADERS) {
    const raw = headers[name];
    const value = Array.isArray(raw) ? raw[0] : raw;
    if (value && value.trim()) return value.trim();
  }
  return undefined;
}

export function requestIdMiddleware(): RequestHandler {
  return (req, res, next) => {
    const id = pickRequestId(req.headers) ?? randomUUID();
    req.id = id;
    res.setHeader("x-request-id", id);
    next();
  };
}
