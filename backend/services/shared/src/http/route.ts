// backend/services/shared/src/http/route.ts

/**
 * Typed routes: a route declares where each value comes from (path, query,
 * header, cookie, body) as zod descriptor tables, what it returns, and the
 * status it answers with. One generic routine validates every source; the
 * handler only ever sees fully validated values.
 *
 * Lifecycle per request:
 *   raw values → validateRequest (all-or-nothing, 422 on any issue)
 *              → handler(ctx)     (may throw HttpError to short-circuit)
 *              → shapeResponse    (declared response schema; extra fields dropped)
 */

import { parse as parseCookies } from "cookie";
import type { Request, RequestHandler } from "express";
import type { Logger } from "pino";
import { z } from "zod";
import type { BackgroundTasks } from "@shared/background/BackgroundTasks";
import { asyncHandler } from "@shared/middleware/asyncHandler";
import { logger as sharedLogger } from "@shared/utils/logger";
import {
  RequestValidationError,
  ResponseValidationError,
  toFieldErrors,
  type FieldError,
  type ValueSource,
} from "./errors";

export type HttpMethod = "GET" | "POST" | "PUT" | "PATCH" | "DELETE";
export const HTTP_METHODS: readonly HttpMethod[] = [
  "GET",
  "POST",
  "PUT",
  "PATCH",
  "DELETE",
];

/** Raw values per source, already flattened to one string per name. */
export type RawValues = {
  path: Record<string, string>;
  query: Record<string, string>;
  header: Record<string, string>;
  cookie: Record<string, string>;
  body: unknown;
};

const emptyTable = z.object({});
type EmptyTable = typeof emptyTable;
const anyBody = z.unknown();
type AnyBody = typeof anyBody;

/** Full request schema of a route; absent tables accept nothing / anything. */
export type RequestSchema = {
  path: z.ZodTypeAny;
  query: z.ZodTypeAny;
  header: z.ZodTypeAny;
  cookie: z.ZodTypeAny;
  body: z.ZodTypeAny;
};

export type RequestValues<S extends RequestSchema> = {
  [K in keyof RequestSchema]: z.output<S[K]>;
};

export type RouteInfo = {
  readonly method: HttpMethod;
  readonly path: string;
};

export type InvokeEnv = {
  tasks: BackgroundTasks;
  requestId: string;
  log: Logger;
};

export type RequestContext<S extends RequestSchema> = InvokeEnv & {
  route: RouteInfo;
  raw: RawValues;
  values: RequestValues<S>;
};

export type RouteResult = { status: number; body: unknown };

type HandlerReturn<R> = R extends z.ZodTypeAny ? z.input<R> : unknown;

export type RouteConfig<
  P extends z.ZodTypeAny,
  Q extends z.ZodTypeAny,
  H extends z.ZodTypeAny,
  C extends z.ZodTypeAny,
  B extends z.ZodTypeAny,
  R extends z.ZodTypeAny | undefined,
> = {
  method: HttpMethod;
  /** Express-style template, e.g. "/items/:item_id". */
  path: string;
  summary?: string;
  /** Status for successful responses (default 200). */
  status?: number;
  request?: RequestTables<P, Q, H, C, B>;
  /** Declared response shape; the handler's return is re-shaped through it. */
  response?: R;
  handler: (
    ctx: RequestContext<{ path: P; query: Q; header: H; cookie: C; body: B }>
  ) => HandlerReturn<R> | Promise<HandlerReturn<R>>;
};

/** Type-erased route as held by a RouteTable. */
export interface Route extends RouteInfo {
  readonly summary?: string;
  readonly status: number;
  readonly request: RequestSchema;
  readonly response?: z.ZodTypeAny;
  /** Validate raw values, run the handler, shape its result. */
  invoke(raw: RawValues, env: InvokeEnv): Promise<RouteResult>;
}

type RequestTables<P, Q, H, C, B> = {
  path?: P;
  query?: Q;
  header?: H;
  cookie?: C;
  body?: B;
};

function collect(
  result: z.SafeParseReturnType<unknown, unknown>,
  source: ValueSource,
  errors: FieldError[]
): void {
  if (!result.success) errors.push(...toFieldErrors(source, result.error.issues));
}

/**
 * Validate every source against its table. All issues from all sources are
 * collected; if there is any, nothing is returned.
 */
export function validateRequest<
  P extends z.ZodTypeAny,
  Q extends z.ZodTypeAny,
  H extends z.ZodTypeAny,
  C extends z.ZodTypeAny,
  B extends z.ZodTypeAny,
>(
  tables: RequestTables<P, Q, H, C, B>,
  raw: RawValues
): RequestValues<{ path: P; query: Q; header: H; cookie: C; body: B }> {
  const path = (tables.path ?? emptyTable).safeParse(raw.path);
  const query = (tables.query ?? emptyTable).safeParse(raw.query);
  const header = (tables.header ?? emptyTable).safeParse(raw.header);
  const cookie = (tables.cookie ?? emptyTable).safeParse(raw.cookie);
  const body = (tables.body ?? anyBody).safeParse(raw.body);

  const errors: FieldError[] = [];
  collect(path, "path", errors);
  collect(query, "query", errors);
  collect(header, "header", errors);
  collect(cookie, "cookie", errors);
  collect(body, "body", errors);

  if (
    !path.success ||
    !query.success ||
    !header.success ||
    !cookie.success ||
    !body.success
  ) {
    throw new RequestValidationError(errors);
  }
  return {
    path: path.data,
    query: query.data,
    header: header.data,
    cookie: cookie.data,
    body: body.data,
  };
}

/** Re-shape a handler's return through the route's declared response schema. */
export function shapeResponse(route: Route, result: unknown): unknown {
  if (!route.response) return result;
  const shaped = route.response.safeParse(result);
  if (!shaped.success) {
    throw new ResponseValidationError(
      `${route.method} ${route.path}`,
      shaped.error.issues
    );
  }
  return shaped.data;
}

export function defineRoute<
  P extends z.ZodTypeAny = EmptyTable,
  Q extends z.ZodTypeAny = EmptyTable,
  H extends z.ZodTypeAny = EmptyTable,
  C extends z.ZodTypeAny = EmptyTable,
  B extends z.ZodTypeAny = AnyBody,
  R extends z.ZodTypeAny | undefined = undefined,
>(config: RouteConfig<P, Q, H, C, B, R>): Route {
  const declared: RequestTables<P, Q, H, C, B> = config.request ?? {};
  const info: RouteInfo = { method: config.method, path: config.path };

  const route: Route = {
    ...info,
    summary: config.summary,
    status: config.status ?? 200,
    request: {
      path: declared.path ?? emptyTable,
      query: declared.query ?? emptyTable,
      header: declared.header ?? emptyTable,
      cookie: declared.cookie ?? emptyTable,
      body: declared.body ?? anyBody,
    },
    response: config.response,
    async invoke(raw, env) {
      const values = validateRequest(declared, raw);
      const result = await config.handler({ ...env, route: info, raw, values });
      return { status: route.status, body: shapeResponse(route, result) };
    },
  };
  return route;
}

/** Validate, run the handler and shape its result for one request. */
export function invokeRoute(
  route: Route,
  raw: RawValues,
  env: InvokeEnv
): Promise<RouteResult> {
  return route.invoke(raw, env);
}

// ── Express adapter ──────────────────────────────────────────────────────────

function lastString(value: unknown): string | undefined {
  if (typeof value === "string") return value;
  if (Array.isArray(value)) {
    const strings = value.filter((v): v is string => typeof v === "string");
    return strings[strings.length - 1];
  }
  return undefined;
}

/** Flatten a multi-valued map; repeated names keep their last value. */
function flatten(source: Record<string, unknown> | undefined): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(source ?? {})) {
    const picked = lastString(value);
    if (picked !== undefined) out[key] = picked;
  }
  return out;
}

/** Cookie values exactly as sent; no `j:`/`s:` decoding. */
export function extractRawValues(req: Request): RawValues {
  return {
    path: flatten(req.params),
    query: flatten(req.query),
    header: flatten(req.headers),
    cookie: flatten(parseCookies(req.headers.cookie ?? "")),
    body: req.body,
  };
}

export function toRequestHandler(route: Route): RequestHandler {
  return asyncHandler(async (req, res) => {
    const tasks = req.backgroundTasks;
    if (!tasks) {
      throw new Error(
        `backgroundTasks middleware is not mounted (${route.method} ${route.path})`
      );
    }
    const { status, body } = await invokeRoute(route, extractRawValues(req), {
      tasks,
      requestId: String(req.id),
      log: req.log ?? sharedLogger,
    });
    res.status(status).json(body === undefined ? null : body);
  });
}
