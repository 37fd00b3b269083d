import { beforeEach, describe, expect, it } from "vitest";
import type { AuthResult } from "../../libs/errors.js";
import { verifyFactorAssertion } from "../../libs/jwt.js";
import { disableMethod } from "../../modules/methods/service.js";
import {
  approvePushAuth,
  cancelPushAuth,
  claimPushApproval,
  denyPushAuth,
  getPushAuthStatus,
  initiatePushAuth,
  registerPushDevice,
  sweepExpiredPushRequests,
} from "../../modules/push/service.js";
import type { PushInitiation, PushStatusView } from "../../modules/push/types.js";
import { makeDeps, type TestDeps } from "../support/deps.js";

const USER = "user-1";
const OTHER = "user-2";
const CONTEXT = { ipAddress: "203.0.113.5", userAgent: "test-agent", location: null };

let deps: TestDeps;

beforeEach(() => {
  deps = makeDeps();
});

async function addDevice(userId = USER, n = 1): Promise<string> {
  const result = await registerPushDevice(deps, userId, {
    endpoint: `https://push.example.test/sub/${userId}/${n}`,
    keys: { p256dh: "test-p256dh", auth: "test-auth" },
    deviceName: `Phone ${n}`,
  });
  if (!result.ok) throw new Error(result.reason);
  return result.value.id;
}

async function initiate(userId = USER): Promise<PushInitiation> {
  const result = await initiatePushAuth(deps, { userId, purpose: "signin", context: CONTEXT });
  if (!result.ok) throw new Error(result.reason);
  return result.value;
}

describe("initiatePushAuth", () => {
  it("needs at least one configured device", async () => {
    expect(await initiatePushAuth(deps, { userId: USER, purpose: "signin", context: CONTEXT })).toEqual({
      ok: false,
      kind: "NOT_FOUND",
      reason: "no_push_device",
    });
  });

  it("skips disabled devices", async () => {
    const deviceId = await addDevice();
    await disableMethod(deps, USER, deviceId);

    const result = await initiatePushAuth(deps, { userId: USER, purpose: "signin", context: CONTEXT });

    expect(result).toEqual({ ok: false, kind: "NOT_FOUND", reason: "no_push_device" });
  });

  it("notifies every device with the challenge", async () => {
    const first = await addDevice(USER, 1);
    const second = await addDevice(USER, 2);

    const started = await initiate();

    expect(started.notificationsSent).toBe(2);
    expect((await deps.stores.pushRequests.get(started.requestId))?.notificationsSent).toBe(2);
    expect(started.expiresAt).toEqual(new Date("2026-03-02T09:01:30.000Z"));
    expect(deps.dispatcher.pushes.map((push) => push.payload.subscriptionId)).toEqual([first, second]);
    expect(deps.dispatcher.pushes[0]?.payload).toMatchObject({
      type: "push_auth",
      requestId: started.requestId,
      challenge: started.challenge,
      purpose: "signin",
      context: CONTEXT,
    });
    expect(deps.dispatcher.pushes[1]?.target.endpoint).toBe(`https://push.example.test/sub/${USER}/2`);
  });
});

describe("device responses", () => {
  it("approves once and hands out one assertion", async () => {
    const deviceId = await addDevice();
    const started = await initiate();
    deps.clock.advance(10);

    const approved = await approvePushAuth(deps, {
      requestId: started.requestId,
      challenge: started.challenge,
      subscriptionId: deviceId,
      userId: USER,
    });
    expect(approved).toEqual({
      ok: true,
      value: {
        requestId: started.requestId,
        status: "APPROVED",
        purpose: "signin",
        expiresAt: "2026-03-02T09:01:30.000Z",
        respondedAt: "2026-03-02T09:00:10.000Z",
      },
    });

    const claimed = await claimPushApproval(deps, { requestId: started.requestId, challenge: started.challenge });
    if (!claimed.ok) throw new Error(claimed.reason);
    const claims = await verifyFactorAssertion(claimed.value.assertion, deps.clock.now());
    expect(claims.sub).toBe(USER);
    expect(claims.amr).toEqual(["push"]);
    expect(claims.mid).toBe(deviceId);

    expect(await claimPushApproval(deps, { requestId: started.requestId, challenge: started.challenge })).toEqual({
      ok: false,
      kind: "ALREADY_USED",
      reason: "push_approval_already_claimed",
    });
  });

  it("keeps the initiator waiting while the request is pending", async () => {
    await addDevice();
    const started = await initiate();

    expect(await claimPushApproval(deps, { requestId: started.requestId, challenge: started.challenge })).toEqual({
      ok: false,
      kind: "NOT_READY",
      reason: "push_request_pending",
    });
  });

  it("turns a denial into UNAUTHORIZED for the initiator", async () => {
    await addDevice();
    const started = await initiate();

    const denied = await denyPushAuth(deps, { requestId: started.requestId, userId: USER });
    expect(denied.ok && denied.value.status).toBe("DENIED");

    expect(await claimPushApproval(deps, { requestId: started.requestId, challenge: started.challenge })).toEqual({
      ok: false,
      kind: "UNAUTHORIZED",
      reason: "push_request_denied",
    });
  });

  it("refuses responses from someone else", async () => {
    const ownDevice = await addDevice(USER);
    const foreignDevice = await addDevice(OTHER);
    const started = await initiate();

    expect(
      await approvePushAuth(deps, {
        requestId: started.requestId,
        challenge: started.challenge,
        subscriptionId: foreignDevice,
        userId: OTHER,
      }),
    ).toEqual({ ok: false, kind: "UNAUTHORIZED", reason: "push_request_not_owned" });

    expect(
      await approvePushAuth(deps, {
        requestId: started.requestId,
        challenge: started.challenge,
        subscriptionId: foreignDevice,
        userId: USER,
      }),
    ).toEqual({ ok: false, kind: "UNAUTHORIZED", reason: "push_device_not_authorized" });

    expect(
      await approvePushAuth(deps, {
        requestId: started.requestId,
        challenge: "wrong-challenge",
        subscriptionId: ownDevice,
        userId: USER,
      }),
    ).toEqual({ ok: false, kind: "VALIDATION_FAILED", reason: "push_challenge_mismatch" });

    const status = await getPushAuthStatus(deps, started.requestId);
    expect(status.ok && status.value.status).toBe("PENDING");
  });

  it("lets only one of approve and deny win a race", async () => {
    const deviceId = await addDevice();
    const started = await initiate();

    let denied: AuthResult<PushStatusView> | null = null;
    deps.stores.pushRequests.interleaveBeforeNextPut(async () => {
      denied = await denyPushAuth(deps, { requestId: started.requestId, userId: USER });
    });

    const approved = await approvePushAuth(deps, {
      requestId: started.requestId,
      challenge: started.challenge,
      subscriptionId: deviceId,
      userId: USER,
    });

    expect(denied).toMatchObject({ ok: true });
    expect(approved).toEqual({ ok: false, kind: "ALREADY_USED", reason: "push_request_already_resolved" });
    const status = await getPushAuthStatus(deps, started.requestId);
    expect(status.ok && status.value.status).toBe("DENIED");
  });
});

describe("expiry", () => {
  it("reports EXPIRED on the next poll after the ttl", async () => {
    await addDevice();
    const started = await initiate();
    deps.clock.advance(90);

    const status = await getPushAuthStatus(deps, started.requestId);

    expect(status.ok && status.value.status).toBe("EXPIRED");
    expect((await deps.stores.pushRequests.get(started.requestId))?.status).toBe("EXPIRED");
  });

  it("persists the expiry when a late approval arrives", async () => {
    const deviceId = await addDevice();
    const started = await initiate();
    deps.clock.advance(91);

    const late = await approvePushAuth(deps, {
      requestId: started.requestId,
      challenge: started.challenge,
      subscriptionId: deviceId,
      userId: USER,
    });

    expect(late).toEqual({ ok: false, kind: "EXPIRED", reason: "push_request_expired" });
    expect((await deps.stores.pushRequests.get(started.requestId))?.status).toBe("EXPIRED");
  });

  it("sweeps only pending requests past their expiry", async () => {
    const deviceId = await addDevice();
    await initiate();
    const approvedRequest = await initiate();
    await approvePushAuth(deps, {
      requestId: approvedRequest.requestId,
      challenge: approvedRequest.challenge,
      subscriptionId: deviceId,
      userId: USER,
    });

    deps.clock.advance(90);

    expect(await sweepExpiredPushRequests(deps)).toBe(1);
    expect((await deps.stores.pushRequests.get(approvedRequest.requestId))?.status).toBe("APPROVED");
  });
});

describe("initiator actions", () => {
  it("cancels a pending request and refuses to claim it afterwards", async () => {
    await addDevice();
    const started = await initiate();

    const cancelled = await cancelPushAuth(deps, { requestId: started.requestId, challenge: started.challenge });
    expect(cancelled.ok && cancelled.value.status).toBe("CANCELLED");

    expect(await claimPushApproval(deps, { requestId: started.requestId, challenge: started.challenge })).toEqual({
      ok: false,
      kind: "ALREADY_USED",
      reason: "push_request_cancelled",
    });
  });

  it("requires the challenge to cancel", async () => {
    await addDevice();
    const started = await initiate();

    expect(await cancelPushAuth(deps, { requestId: started.requestId, challenge: "wrong-challenge" })).toEqual({
      ok: false,
      kind: "VALIDATION_FAILED",
      reason: "push_challenge_mismatch",
    });
  });

  it("reports NOT_FOUND for unknown requests", async () => {
    expect(await getPushAuthStatus(deps, "missing")).toEqual({
      ok: false,
      kind: "NOT_FOUND",
      reason: "push_request_not_found",
    });
  });
});
