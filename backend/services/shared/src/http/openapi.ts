// backend/services/shared/src/http/openapi.ts

/**
 * OpenAPI 3 document generated from a RouteTable: one operation per route,
 * parameters from the path/query/header/cookie tables, the body table as the
 * request body, the declared response as the success schema. Served open at
 * `GET /openapi.json`, next to health.
 */

import express, { type Router } from "express";
import { z } from "zod";
import { zodToJsonSchema } from "zod-to-json-schema";
import { zProblem } from "@shared/contracts/problem";
import type { Route } from "./route";
import type { RouteTable } from "./RouteTable";

export type ApiInfo = { title: string; version: string };

type JsonSchema = object;

type ParameterIn = "path" | "query" | "header" | "cookie";
const PARAMETER_SOURCES: readonly ParameterIn[] = ["path", "query", "header", "cookie"];

export type OpenApiParameter = {
  name: string;
  in: ParameterIn;
  required: boolean;
  schema: JsonSchema;
};

type MediaContent = Record<string, { schema: JsonSchema }>;

export type OpenApiOperation = {
  summary?: string;
  parameters: OpenApiParameter[];
  requestBody?: { required: boolean; content: MediaContent };
  responses: Record<string, { description: string; content?: MediaContent }>;
};

export type OpenApiDocument = {
  openapi: "3.0.3";
  info: ApiInfo;
  paths: Record<string, Record<string, OpenApiOperation>>;
  components: { schemas: Record<string, JsonSchema> };
};

const PROBLEM_REF = { $ref: "#/components/schemas/Problem" };

function toSchema(schema: z.ZodTypeAny): JsonSchema {
  return zodToJsonSchema(schema, { target: "openApi3", $refStrategy: "none" });
}

/** Strip optional, default and transform wrappers down to the wire schema. */
function wireSchema(field: z.ZodTypeAny): z.ZodTypeAny {
  if (field instanceof z.ZodOptional) return wireSchema(field.unwrap());
  if (field instanceof z.ZodDefault) return wireSchema(field.removeDefault());
  if (field instanceof z.ZodEffects) return wireSchema(field.innerType());
  return field;
}

function fieldsOf(table: z.ZodTypeAny): [string, z.ZodTypeAny][] {
  return table instanceof z.ZodObject ? Object.entries<z.ZodTypeAny>(table.shape) : [];
}

/** "/items/:item_id" under "/api" → "/api/items/{item_id}" */
export function toOpenApiPath(template: string, prefix = "/"): string {
  const base = prefix.replace(/\/+$/, "");
  return base + template.replace(/:([A-Za-z_][A-Za-z0-9_]*)/g, "{$1}");
}

function operationFor(route: Route): OpenApiOperation {
  const parameters = PARAMETER_SOURCES.flatMap((source) =>
    fieldsOf(route.request[source]).map(([name, field]) => ({
      name,
      in: source,
      required: source === "path" || !field.isOptional(),
      schema: toSchema(wireSchema(field)),
    }))
  );

  const body = route.request.body;
  const requestBody =
    body instanceof z.ZodUnknown
      ? undefined
      : {
          required: !body.isOptional(),
          content: { "application/json": { schema: toSchema(body) } },
        };

  const responses: OpenApiOperation["responses"] = {
    [String(route.status)]: {
      description: "Successful response",
      content: {
        "application/json": { schema: route.response ? toSchema(route.response) : {} },
      },
    },
  };
  if (parameters.length > 0 || requestBody) {
    responses["422"] = {
      description: "Validation error",
      content: { "application/problem+json": { schema: PROBLEM_REF } },
    };
  }

  return { summary: route.summary, parameters, requestBody, responses };
}

export function buildOpenApiDocument(
  routes: RouteTable,
  info: ApiInfo,
  prefix = "/"
): OpenApiDocument {
  const paths: OpenApiDocument["paths"] = {};
  for (const route of routes.list()) {
    const path = toOpenApiPath(route.path, prefix);
    paths[path] = { ...paths[path], [route.method.toLowerCase()]: operationFor(route) };
  }
  return {
    openapi: "3.0.3",
    info,
    paths,
    components: { schemas: { Problem: toSchema(zProblem) } },
  };
}

export function createOpenApiRouter(
  routes: RouteTable,
  info: ApiInfo,
  prefix = "/"
): Router {
  const document = buildOpenApiDocument(routes, info, prefix);
  const router = express.Router();
  router.get("/openapi.json", (_req, res) => {
    res.json(document);
  });
  return router;
}
