// backend/services/shared/src/middleware/problemJson.ts

/**
 * Tails for every service app: 404 and the single error formatter.
 *
 * Every error leaves as RFC 7807 Problem+JSON (`application/problem+json`)
 * with `instance` set to the request id. Internal messages and stacks stay in
 * the logs; 5xx bodies only carry the generic title.
 *
 * Mapping:
 * - RequestValidationError      → 422 VALIDATION_ERROR + `errors`
 * - malformed JSON body         → 422 VALIDATION_ERROR (`json_invalid`)
 * - HttpError                   → its status/code/detail (+ headers, e.g. Allow)
 * - other exposed 4xx errors    → their status, code derived from it
 * - ResponseValidationError     → 500 RESPONSE_VALIDATION_ERROR
 * - anything else               → 500 INTERNAL_ERROR
 */

import type { ErrorRequestHandler, Request, RequestHandler, Response } from "express";
import { clean, type Problem } from "@shared/contracts/problem";
import {
  HttpError,
  RequestValidationError,
  ResponseValidationError,
  titleFor,
} from "@shared/http/errors";
import { extractLogContext, logger as sharedLogger } from "@shared/utils/logger";

const PROBLEM_TYPE = "application/problem+json";

function send(req: Request, res: Response, problem: Problem): void {
  res
    .status(problem.status)
    .type(PROBLEM_TYPE)
    .json(clean({ ...problem, instance: req.id ? String(req.id) : undefined }));
}

function isMalformedJson(err: unknown): err is { type: string; message: string } {
  return (
    typeof err === "object" &&
    err !== null &&
    "type" in err &&
    err.type === "entity.parse.failed"
  );
}

/** http-errors style (body-parser, etc.): numeric status, `expose` for 4xx. */
function exposedClientStatus(err: unknown): number | undefined {
  if (typeof err !== "object" || err === null) return undefined;
  if (!("status" in err) || typeof err.status !== "number") return undefined;
  if (!("expose" in err) || err.expose !== true) return undefined;
  return err.status >= 400 && err.status < 500 ? err.status : undefined;
}

function messageOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function notFoundProblemJson(): RequestHandler {
  return (req, res) => {
    send(req, res, {
      type: "about:blank",
      title: titleFor(404),
      status: 404,
      detail: "Route not found",
      code: "NOT_FOUND",
    });
  };
}

export function errorProblemJson(): ErrorRequestHandler {
  return (err: unknown, req, res, next) => {
    // Too late to send a problem body; let Express tear the socket down.
    if (res.headersSent) {
      next(err);
      return;
    }
    const log = req.log ?? sharedLogger;

    if (err instanceof RequestValidationError) {
      send(req, res, {
        type: "about:blank",
        title: titleFor(422),
        status: 422,
        detail: err.detail,
        code: err.code,
        errors: [...err.errors],
      });
      return;
    }

    if (isMalformedJson(err)) {
      send(req, res, {
        type: "about:blank",
        title: titleFor(422),
        status: 422,
        detail: "Validation failed",
        code: "VALIDATION_ERROR",
        errors: [{ in: "body", path: "", code: "json_invalid", message: err.message }],
      });
      return;
    }

    if (err instanceof HttpError) {
      if (err.status >= 500) {
        log.error({ ...extractLogContext(req), err, status: err.status }, "request error");
      }
      for (const [name, value] of Object.entries(err.headers)) {
        res.setHeader(name, value);
      }
      send(req, res, {
        type: "about:blank",
        title: titleFor(err.status),
        status: err.status,
        detail: err.status >= 500 ? titleFor(err.status) : err.detail,
        code: err.code,
      });
      return;
    }

    const clientStatus = exposedClientStatus(err);
    if (clientStatus !== undefined) {
      const mapped = new HttpError(clientStatus, messageOf(err));
      send(req, res, {
        type: "about:blank",
        title: titleFor(clientStatus),
        status: clientStatus,
        detail: mapped.detail,
        code: mapped.code,
      });
      return;
    }

    if (err instanceof ResponseValidationError) {
      log.error(
        { ...extractLogContext(req), err, route: err.route, issues: err.issues },
        "response failed its declared schema"
      );
      send(req, res, {
        type: "about:blank",
        title: titleFor(500),
        status: 500,
        detail: titleFor(500),
        code: "RESPONSE_VALIDATION_ERROR",
      });
      return;
    }

    log.error({ ...extractLogContext(req), err, status: 500 }, "unhandled request error");
    send(req, res, {
      type: "about:blank",
      title: titleFor(500),
      status: 500,
      detail: titleFor(500),
      code: "INTERNAL_ERROR",
    });
  };
}
