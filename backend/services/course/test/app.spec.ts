// backend/services/course/test/app.spec.ts
import request from "supertest";
import { describe, it, expect } from "vitest";
import app from "../src/app";

describe("tails", () => {
  it("formats unknown routes as Problem+JSON 404", async () => {
    const res = await request(app).get("/nope").set("x-request-id", "req-404");
    expect(res.status).toBe(404);
    expect(res.headers["content-type"]).toMatch(/^application\/problem\+json/);
    expect(res.body).toEqual({
      type: "about:blank",
      title: "Not Found",
      status: 404,
      detail: "Route not found",
      code: "NOT_FOUND",
      instance: "req-404",
    });
  });

  it("answers 405 with Allow for a known path under another method", async () => {
    const res = await request(app).delete("/items/1");
    expect(res.status).toBe(405);
    expect(res.headers["allow"]).toBe("GET");
    expect(res.body).toMatchObject({
      title: "Method Not Allowed",
      status: 405,
      detail: "Method not allowed",
      code: "METHOD_NOT_ALLOWED",
    });
  });

  it("lists POST as the only method on /courses/", async () => {
    const res = await request(app).get("/courses/");
    expect(res.status).toBe(405);
    expect(res.headers["allow"]).toBe("POST");
  });
});

describe("request id", () => {
  it("reuses the caller's id", async () => {
    const res = await request(app).get("/items/1").set("x-correlation-id", "corr-7");
    expect(res.headers["x-request-id"]).toBe("corr-7");
  });

  it("mints one when none is sent", async () => {
    const res = await request(app).get("/items/1");
    expect(res.headers["x-request-id"]).toMatch(/^[0-9a-f-]{36}$/);
  });
});

describe("CORS", () => {
  it("echoes an allowed origin with credentials", async () => {
    const res = await request(app)
      .get("/items/1")
      .set("Origin", "http://localhost:8080");
    expect(res.status).toBe(200);
    expect(res.headers["access-control-allow-origin"]).toBe("http://localhost:8080");
    expect(res.headers["access-control-allow-credentials"]).toBe("true");
  });

  it("sends no CORS headers to other origins", async () => {
    const res = await request(app)
      .get("/items/1")
      .set("Origin", "http://evil.example");
    expect(res.status).toBe(200);
    expect(res.headers["access-control-allow-origin"]).toBeUndefined();
  });

  it("answers preflight with reflected request headers", async () => {
    const res = await request(app)
      .options("/courses/")
      .set("Origin", "http://localhost")
      .set("Access-Control-Request-Method", "POST")
      .set("Access-Control-Request-Headers", "content-type,x-custom");
    expect(res.status).toBe(204);
    expect(res.headers["access-control-allow-origin"]).toBe("http://localhost");
    expect(res.headers["access-control-allow-headers"]).toBe("content-type,x-custom");
    expect(res.headers["access-control-allow-methods"]).toBe(
      "GET,HEAD,POST,PUT,PATCH,DELETE,OPTIONS"
    );
  });
});

describe("health", () => {
  it("reports liveness", async () => {
    const res = await request(app).get("/health").set("x-request-id", "probe-1");
    expect(res.status).toBe(200);
    expect(res.body).toEqual({
      service: "course",
      env: "test",
      ok: true,
      requestId: "probe-1",
    });
  });

  it("reports readiness with the background job count", async () => {
    const res = await request(app).get("/readyz");
    expect(res.status).toBe(200);
    expect(res.body.ok).toBe(true);
    expect(res.body.backgroundJobs).toBe(0);
  });
});

describe("GET /openapi.json", () => {
  it("documents every course route", async () => {
    const res = await request(app).get("/openapi.json");
    expect(res.status).toBe(200);
    expect(res.body.info).toEqual({ title: "Course tutorial API", version: "0.1.0" });
    expect(Object.keys(res.body.paths)).toEqual([
      "/items/{item_id}",
      "/courses/{course}",
      "/courses/",
      "/students/",
      "/current_cart",
      "/flights/{flight_id}",
      "/send_email/{email}",
    ]);
  });

  it("describes the course lookup parameters", async () => {
    const res = await request(app).get("/openapi.json");
    const op = res.body.paths["/courses/{course}"].get;
    expect(op.summary).toBe("Describe a course");
    expect(op.parameters).toEqual([
      {
        name: "course",
        in: "path",
        required: true,
        schema: { type: "string", enum: ["chemistry", "physics", "math"] },
      },
      { name: "language", in: "query", required: true, schema: { type: "string" } },
      { name: "minRating", in: "query", required: false, schema: { type: "string" } },
    ]);
  });
});
