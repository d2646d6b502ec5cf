// backend/services/shared/test/openapi.spec.ts
import { describe, it, expect } from "vitest";
import { z } from "zod";
import { buildOpenApiDocument, toOpenApiPath } from "@shared/http/openapi";
import { param, withDefault } from "@shared/http/params";
import { defineRoute } from "@shared/http/route";
import { RouteTable } from "@shared/http/RouteTable";

const table = new RouteTable([
  defineRoute({
    method: "GET",
    path: "/widgets/:widget_id",
    summary: "Fetch a widget",
    request: {
      path: z.object({ widget_id: param.enumOf(["a", "b"]) }),
      query: z.object({ verbose: withDefault(param.bool(), false) }),
      header: z.object({ "x-tenant": param.str() }),
    },
    response: z.object({ id: z.string() }),
    handler: ({ values }) => ({ id: values.path.widget_id }),
  }),
  defineRoute({
    method: "POST",
    path: "/widgets",
    status: 201,
    request: { body: z.object({ label: z.string() }) },
    handler: ({ values }) => values.body,
  }),
  defineRoute({ method: "GET", path: "/ping", handler: () => "pong" }),
]);

describe("toOpenApiPath", () => {
  it("turns :params into {params} under the prefix", () => {
    expect(toOpenApiPath("/widgets/:widget_id", "/api/")).toBe("/api/widgets/{widget_id}");
    expect(toOpenApiPath("/ping")).toBe("/ping");
  });
});

describe("buildOpenApiDocument", () => {
  const doc = buildOpenApiDocument(table, { title: "Widgets", version: "1.0.0" });

  it("lists every route in registration order", () => {
    expect(doc.openapi).toBe("3.0.3");
    expect(doc.info).toEqual({ title: "Widgets", version: "1.0.0" });
    expect(Object.keys(doc.paths)).toEqual(["/widgets/{widget_id}", "/widgets", "/ping"]);
  });

  it("describes parameters per source with their requiredness", () => {
    const op = doc.paths["/widgets/{widget_id}"]?.["get"];
    expect(op?.summary).toBe("Fetch a widget");
    expect(op?.parameters.map(({ name, in: where, required }) => [name, where, required])).toEqual([
      ["widget_id", "path", true],
      ["verbose", "query", false],
      ["x-tenant", "header", true],
    ]);
    expect(op?.parameters[0]?.schema).toEqual({ type: "string", enum: ["a", "b"] });
  });

  it("uses the declared response and adds 422 for routes with input", () => {
    const op = doc.paths["/widgets/{widget_id}"]?.["get"];
    expect(Object.keys(op?.responses ?? {})).toEqual(["200", "422"]);
    expect(op?.responses["200"]?.content?.["application/json"]?.schema).toMatchObject({
      type: "object",
      properties: { id: { type: "string" } },
      required: ["id"],
    });
    expect(op?.responses["422"]?.content?.["application/problem+json"]?.schema).toEqual({
      $ref: "#/components/schemas/Problem",
    });
  });

  it("documents the body and the declared status", () => {
    const op = doc.paths["/widgets"]?.["post"];
    expect(op?.requestBody?.required).toBe(true);
    expect(op?.requestBody?.content["application/json"]?.schema).toMatchObject({
      type: "object",
      required: ["label"],
    });
    expect(Object.keys(op?.responses ?? {})).toEqual(["201", "422"]);
  });

  it("leaves input-free routes without parameters, body or 422", () => {
    const op = doc.paths["/ping"]?.["get"];
    expect(op?.parameters).toEqual([]);
    expect(op?.requestBody).toBeUndefined();
    expect(Object.keys(op?.responses ?? {})).toEqual(["200"]);
  });

  it("carries the Problem schema", () => {
    expect(doc.components.schemas["Problem"]).toMatchObject({
      type: "object",
      required: ["title", "status"],
    });
  });
});
