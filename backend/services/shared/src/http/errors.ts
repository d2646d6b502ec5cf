// backend/services/shared/src/http/errors.ts
import { STATUS_CODES } from "node:http";
import type { ZodIssue } from "zod";

/** Where a request value came from. */
export type ValueSource = "path" | "query" | "header" | "cookie" | "body";

/** One field-level validation failure, as sent in Problem+JSON `errors`. */
export type FieldError = {
  in: ValueSource;
  path: string;
  code: string;
  message: string;
};

export function titleFor(status: number): string {
  return STATUS_CODES[status] ?? "Error";
}

function codeFor(status: number): string {
  return titleFor(status)
    .toUpperCase()
    .replace(/[^A-Z0-9]+/g, "_")
    .replace(/^_|_$/g, "");
}

/**
 * Explicit, handler-raised short-circuit: status + human-readable detail.
 * Skips response shaping; the error tail renders it as Problem+JSON.
 */
export class HttpError extends Error {
  readonly status: number;
  readonly code: string;
  readonly headers: Readonly<Record<string, string>>;

  constructor(
    status: number,
    detail: string,
    opts: { code?: string; headers?: Record<string, string> } = {}
  ) {
    super(detail);
    this.name = "HttpError";
    this.status = status;
    this.code = opts.code ?? codeFor(status);
    this.headers = opts.headers ?? {};
  }

  get detail(): string {
    return this.message;
  }
}

/** Request values failed their declared schema. Always 422. */
export class RequestValidationError extends HttpError {
  readonly errors: readonly FieldError[];

  constructor(errors: readonly FieldError[]) {
    super(422, "Validation failed", { code: "VALIDATION_ERROR" });
    this.name = "RequestValidationError";
    this.errors = errors;
  }
}

/**
 * A handler returned a value that does not satisfy its route's declared
 * response schema. Server-side contract violation, served as a bare 500.
 */
export class ResponseValidationError extends Error {
  readonly route: string;
  readonly issues: readonly ZodIssue[];

  constructor(route: string, issues: readonly ZodIssue[]) {
    super(`Response for ${route} violates its declared schema`);
    this.name = "ResponseValidationError";
    this.route = route;
    this.issues = issues;
  }
}

/** Custom issues carry their own code in `params.code` (see params.ts). */
function issueCode(issue: ZodIssue): string {
  if (issue.code === "custom" && typeof issue.params?.code === "string") {
    return issue.params.code;
  }
  return issue.code;
}

export function toFieldErrors(
  source: ValueSource,
  issues: readonly ZodIssue[]
): FieldError[] {
  return issues.map((i) => ({
    in: source,
    path: i.path.map(String).join("."),
    code: issueCode(i),
    message: i.message,
  }));
}
