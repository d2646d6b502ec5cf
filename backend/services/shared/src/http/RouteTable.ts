// backend/services/shared/src/http/RouteTable.ts

/**
 * Static route registry. Routes are registered once at start-up and never
 * change afterwards; Express does the actual dispatch once `mount()` has run.
 *
 * `match()` mirrors Express's matching on path segments so the 405 tail can
 * tell "no such path" (404) from "path exists under another method" (405).
 */

import type { RequestHandler, Router } from "express";
import { HttpError } from "./errors";
import { HTTP_METHODS, toRequestHandler, type HttpMethod, type Route } from "./route";

const PARAM_NAME_RE = /^[A-Za-z_][A-Za-z0-9_]*$/;

export type RouteMatch =
  | { route: Route; params: Record<string, string> }
  | { allowed: HttpMethod[] };

type Segment = { kind: "literal"; value: string } | { kind: "param"; name: string };

type Entry = { route: Route; segments: Segment[] };

function splitPath(path: string): string[] {
  return path.split("/").filter((s) => s.length > 0);
}

function decodeSegment(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    return segment;
  }
}

function compile(route: Route): Segment[] {
  if (!route.path.startsWith("/")) {
    throw new Error(`Route path must start with "/": ${route.method} ${route.path}`);
  }
  const seen = new Set<string>();
  return splitPath(route.path).map((part): Segment => {
    if (!part.startsWith(":")) return { kind: "literal", value: part };
    const name = part.slice(1);
    if (!PARAM_NAME_RE.test(name)) {
      throw new Error(`Invalid path parameter "${part}" in ${route.method} ${route.path}`);
    }
    if (seen.has(name)) {
      throw new Error(`Duplicate path parameter "${name}" in ${route.method} ${route.path}`);
    }
    seen.add(name);
    return { kind: "param", name };
  });
}

function keyOf(method: HttpMethod, segments: Segment[]): string {
  const shape = segments
    .map((s) => (s.kind === "literal" ? s.value : ":"))
    .join("/");
  return `${method} /${shape}`;
}

function matchSegments(
  segments: Segment[],
  parts: string[]
): Record<string, string> | null {
  if (segments.length !== parts.length) return null;
  const params: Record<string, string> = {};
  for (let i = 0; i < segments.length; i++) {
    const seg = segments[i];
    const part = parts[i];
    if (seg === undefined || part === undefined) return null;
    if (seg.kind === "literal") {
      if (seg.value !== part) return null;
    } else {
      params[seg.name] = decodeSegment(part);
    }
  }
  return params;
}

export class RouteTable {
  private readonly entries: Entry[] = [];
  private readonly keys = new Set<string>();

  constructor(routes: readonly Route[] = []) {
    for (const r of routes) this.register(r);
  }

  /** Add a route; malformed templates and duplicate (method, path) pairs throw. */
  register(route: Route): this {
    const segments = compile(route);
    const key = keyOf(route.method, segments);
    if (this.keys.has(key)) {
      throw new Error(`Duplicate route: ${route.method} ${route.path}`);
    }
    this.keys.add(key);
    this.entries.push({ route, segments });
    return this;
  }

  list(): readonly Route[] {
    return this.entries.map((e) => e.route);
  }

  /**
   * Structural match in registration order. HEAD is answered by GET routes.
   * Returns the allowed methods when only the method is wrong, null when no
   * route has this path.
   */
  match(method: string, pathname: string): RouteMatch | null {
    const wanted = method.toUpperCase() === "HEAD" ? "GET" : method.toUpperCase();
    const parts = splitPath(pathname);
    const allowed = new Set<HttpMethod>();

    for (const { route, segments } of this.entries) {
      const params = matchSegments(segments, parts);
      if (!params) continue;
      if (route.method === wanted) return { route, params };
      allowed.add(route.method);
    }

    if (allowed.size === 0) return null;
    return { allowed: HTTP_METHODS.filter((m) => allowed.has(m)) };
  }

  /** Register every route on an Express router. */
  mount(router: Router): Router {
    for (const { route } of this.entries) {
      const handler = toRequestHandler(route);
      switch (route.method) {
        case "GET":
          router.get(route.path, handler);
          break;
        case "POST":
          router.post(route.path, handler);
          break;
        case "PUT":
          router.put(route.path, handler);
          break;
        case "PATCH":
          router.patch(route.path, handler);
          break;
        case "DELETE":
          router.delete(route.path, handler);
          break;
        default: {
          const unreachable: never = route.method;
          throw new Error(`Unsupported method: ${String(unreachable)}`);
        }
      }
    }
    return router;
  }

  /** Tail for the mounted router: known path, wrong method → 405 with Allow. */
  methodNotAllowed(): RequestHandler {
    return (req, _res, next) => {
      const found = this.match(req.method, req.path);
      if (found && "allowed" in found) {
        const allow = found.allowed.join(", ");
        next(
          new HttpError(405, "Method not allowed", {
            code: "METHOD_NOT_ALLOWED",
            headers: { Allow: allow },
          })
        );
        return;
      }
      next();
    };
  }
}
