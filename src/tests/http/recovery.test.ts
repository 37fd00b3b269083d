// tests/http/recovery.test.ts
import { afterEach, describe, expect, it } from "vitest";
import type { FastifyInstance } from "fastify";
import { verifyRecoveryToken } from "../../libs/jwt.js";
import type { TestDeps } from "../support/deps.js";
import { buildTestApp } from "../support/app.js";

const USER = "user-1";
const EMAIL = "alice@example.test";

type ErrorBody = { status: number; error: { code: string; message: string }; details?: Record<string, string[]> };

let app: FastifyInstance;
let deps: TestDeps;

afterEach(async () => {
  await app.close();
});

describe("/auth/recovery", () => {
  it("walks start, e-mail code and token", async () => {
    ({ app, deps } = await buildTestApp());
    deps.users.add(EMAIL, USER);

    const started = await app.inject({ method: "POST", url: "/auth/recovery/start", payload: { email: EMAIL } });
    expect(started.statusCode).toBe(202);
    const { recoveryId, nextStep, expiresAt } = started.json<{
      recoveryId: string;
      nextStep: string;
      expiresAt: string;
    }>();
    expect(nextStep).toBe("EMAIL");
    expect(expiresAt).toBe("2026-03-02T09:30:00.000Z");

    const emailStep = await app.inject({
      method: "POST",
      url: `/auth/recovery/${recoveryId}/email`,
      payload: { code: deps.dispatcher.lastEmailCode(EMAIL) },
    });
    expect(emailStep.statusCode).toBe(200);
    expect(emailStep.json()).toEqual({ nextStep: "TOKEN", phoneNumberHint: null });

    const token = await app.inject({ method: "POST", url: `/auth/recovery/${recoveryId}/token` });
    expect(token.statusCode).toBe(200);
    expect(token.headers["cache-control"]).toBe("no-store");
    const body = token.json<{ userId: string; recoveryToken: string }>();
    expect(body.userId).toBe(USER);
    const claims = await verifyRecoveryToken(body.recoveryToken, deps.clock.now());
    expect(claims.rid).toBe(recoveryId);

    const again = await app.inject({ method: "POST", url: `/auth/recovery/${recoveryId}/token` });
    expect(again.statusCode).toBe(409);
    expect(again.json<ErrorBody>().error).toEqual({ code: "ALREADY_USED", message: "recovery_completed" });
  });

  it("hides whether the address exists", async () => {
    ({ app, deps } = await buildTestApp());

    const started = await app.inject({
      method: "POST",
      url: "/auth/recovery/start",
      payload: { email: "nobody@example.test" },
    });
    expect(started.statusCode).toBe(202);
    const { recoveryId } = started.json<{ recoveryId: string }>();

    const status = await app.inject({ method: "GET", url: `/auth/recovery/${recoveryId}` });
    expect(status.statusCode).toBe(404);
    expect(deps.dispatcher.emails).toEqual([]);
  });

  it("limits starts per address with Retry-After", async () => {
    ({ app, deps } = await buildTestApp());
    const start = () =>
      app.inject({ method: "POST", url: "/auth/recovery/start", payload: { email: "nobody@example.test" } });

    await start();
    await start();
    await start();
    const limited = await start();

    expect(limited.statusCode).toBe(429);
    expect(limited.headers["retry-after"]).toBe("86400");
    expect(limited.json<ErrorBody>().error).toEqual({ code: "RATE_LIMITED", message: "recovery_too_many_requests" });
  });

  it("rejects malformed input", async () => {
    ({ app, deps } = await buildTestApp());

    const badEmail = await app.inject({ method: "POST", url: "/auth/recovery/start", payload: { email: "nope" } });
    expect(badEmail.statusCode).toBe(400);
    expect(badEmail.json<ErrorBody>().error.code).toBe("VALIDATION_FAILED");
    expect(badEmail.json<ErrorBody>().details?.email).toBeDefined();

    const badId = await app.inject({ method: "GET", url: "/auth/recovery/not-a-uuid" });
    expect(badId.statusCode).toBe(400);
  });
});

describe("/internal/housekeeping/run", () => {
  it("requires the internal token", async () => {
    ({ app, deps } = await buildTestApp({ internalToken: "test-internal-token" }));

    const anonymous = await app.inject({ method: "POST", url: "/internal/housekeeping/run" });
    expect(anonymous.statusCode).toBe(401);

    const wrong = await app.inject({
      method: "POST",
      url: "/internal/housekeeping/run",
      headers: { "x-internal-token": "wrong-token" },
    });
    expect(wrong.statusCode).toBe(401);
  });

  it("runs every sweeper with the right token", async () => {
    ({ app, deps } = await buildTestApp({ internalToken: "test-internal-token" }));

    const res = await app.inject({
      method: "POST",
      url: "/internal/housekeeping/run",
      headers: { "x-internal-token": "test-internal-token" },
    });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({
      ok: true,
      report: {
        otp_codes: { ok: true, changed: 0 },
        passkey_challenges: { ok: true, changed: 0 },
        push_auth_requests: { ok: true, changed: 0 },
        recovery_requests: { ok: true, changed: 0 },
      },
    });
  });

  it("is switched off without a configured token", async () => {
    ({ app, deps } = await buildTestApp({ internalToken: "" }));

    const res = await app.inject({
      method: "POST",
      url: "/internal/housekeeping/run",
      headers: { "x-internal-token": "test-internal-token" },
    });

    expect(res.statusCode).toBe(404);
  });
});
