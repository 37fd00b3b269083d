// tests/http/health.test.ts
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import type { FastifyInstance } from "fastify";
import { buildTestApp } from "../support/app.js";

let app: FastifyInstance;

describe("Health endpoints", () => {
  beforeAll(async () => {
    ({ app } = await buildTestApp());
  });

  afterAll(async () => {
    await app.close();
  });

  it("GET /healthz reports the process as alive", async () => {
    const res = await app.inject({ method: "GET", url: "/healthz" });

    expect(res.statusCode).toBe(200);
    expect(res.json<{ status: string; pid: number }>()).toEqual({ status: "alive", pid: process.pid });
  });

  it("GET /readyz answers ready once the app is up", async () => {
    const res = await app.inject({ method: "GET", url: "/readyz" });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ status: "ready", ready: true });
  });

  it("GET /health/redis reports the disabled store without Redis", async () => {
    const res = await app.inject({ method: "GET", url: "/health/redis" });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ ok: true, mode: "disabled" });
  });

  it("sets baseline security headers and echoes the request id", async () => {
    const res = await app.inject({ method: "GET", url: "/healthz" });

    expect(res.headers["x-content-type-options"]).toBe("nosniff");
    expect(res.headers["x-frame-options"]).toBe("DENY");
    expect(res.headers["referrer-policy"]).toBe("no-referrer");
    expect(res.headers["x-request-id"]).toMatch(/^[0-9a-f-]{36}$/);
  });

  it("answers unknown routes with the error envelope", async () => {
    const res = await app.inject({ method: "GET", url: "/nope" });

    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({
      status: 404,
      error: { code: "NOT_FOUND", message: "Route GET:/nope not found" },
    });
  });

  it("GET /metrics exposes request counters", async () => {
    await app.inject({ method: "GET", url: "/healthz" });

    const res = await app.inject({ method: "GET", url: "/metrics" });

    expect(res.statusCode).toBe(200);
    expect(res.headers["content-type"]).toContain("text/plain");
    expect(res.body).toContain("# TYPE http_requests_total counter");
    expect(res.body).toContain("# TYPE http_request_duration_seconds histogram");
  });
});
