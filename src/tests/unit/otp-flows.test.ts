import { beforeEach, describe, expect, it } from "vitest";
import { verifyFactorAssertion } from "../../libs/jwt.js";
import { disableMethod, getMethod, registerMethod } from "../../modules/methods/service.js";
import {
  confirmFactorEnrollment,
  requestSignInOtp,
  startFactorEnrollment,
  verifySignInOtp,
} from "../../modules/otp/flows.js";
import { makeDeps, type TestDeps } from "../support/deps.js";

const USER = "user-1";
const OTHER = "user-2";
const PHONE = "+49151234567";

let deps: TestDeps;

beforeEach(() => {
  deps = makeDeps();
});

async function registerVerifiedPhone(userId: string, phoneNumber = PHONE): Promise<string> {
  const result = await registerMethod(deps, userId, "Phone", { type: "SMS_OTP", phoneNumber }, { verified: true });
  if (!result.ok) throw new Error(result.reason);
  return result.value.id;
}

describe("OTP sign-in", () => {
  it("answers the same for unknown targets and sends nothing", async () => {
    const result = await requestSignInOtp(deps, { channel: "sms", target: "+49170000000" });

    expect(result).toEqual({ ok: true, value: { sent: true, expiresInSec: 300 } });
    expect(deps.dispatcher.sms).toEqual([]);
  });

  it("issues a factor assertion for the owner of the phone", async () => {
    const methodId = await registerVerifiedPhone(USER);

    const requested = await requestSignInOtp(deps, { channel: "sms", target: "+49 151 234567" });
    expect(requested).toEqual({ ok: true, value: { sent: true, expiresInSec: 300 } });

    const mirrored = await getMethod(deps, methodId);
    expect(mirrored?.type === "SMS_OTP" && mirrored.dailySendCount).toBe(1);

    const code = deps.dispatcher.lastSmsCode(PHONE);
    const verified = await verifySignInOtp(deps, { channel: "sms", target: PHONE, code });
    if (!verified.ok) throw new Error(verified.reason);

    expect(verified.value.userId).toBe(USER);
    expect(verified.value.methodId).toBe(methodId);
    expect(verified.value.assertionExpiresAt).toEqual(new Date("2026-03-02T09:02:00.000Z"));

    const claims = await verifyFactorAssertion(verified.value.assertion, deps.clock.now());
    expect(claims.sub).toBe(USER);
    expect(claims.amr).toEqual(["sms_otp"]);
    expect(claims.mid).toBe(methodId);

    const used = await getMethod(deps, methodId);
    expect(used?.lastUsedAt).toEqual(deps.clock.now());
  });

  it("refuses the assertion when the factor was disabled after the code went out", async () => {
    const methodId = await registerVerifiedPhone(USER);
    await requestSignInOtp(deps, { channel: "sms", target: PHONE });
    const code = deps.dispatcher.lastSmsCode(PHONE);

    await disableMethod(deps, USER, methodId);

    const result = await verifySignInOtp(deps, { channel: "sms", target: PHONE, code });
    expect(result).toEqual({ ok: false, kind: "UNAUTHORIZED", reason: "method_not_configured" });
  });

  it("applies the same cooldown to known and unknown targets", async () => {
    await registerVerifiedPhone(USER);
    const unknown = "+49170000000";

    const knownFirst = await requestSignInOtp(deps, { channel: "sms", target: PHONE });
    const unknownFirst = await requestSignInOtp(deps, { channel: "sms", target: unknown });
    expect(unknownFirst).toEqual(knownFirst);

    const knownAgain = await requestSignInOtp(deps, { channel: "sms", target: PHONE });
    const unknownAgain = await requestSignInOtp(deps, { channel: "sms", target: unknown });

    expect(knownAgain).toEqual({ ok: false, kind: "RATE_LIMITED", reason: "otp_cooldown", retryAfterSec: 60 });
    expect(unknownAgain).toEqual(knownAgain);
    expect(deps.dispatcher.sms.map((sms) => sms.to)).toEqual([PHONE]);
  });

  it("does not sign in with a code recorded for an unknown target", async () => {
    await requestSignInOtp(deps, { channel: "sms", target: "+49170000000" });

    const result = await verifySignInOtp(deps, { channel: "sms", target: "+49170000000", code: "123456" });

    expect(result.ok).toBe(false);
  });
});

describe("SMS / e-mail enrollment", () => {
  it("registers an unverified method and verifies it with the emailed code", async () => {
    const started = await startFactorEnrollment(deps, USER, { channel: "email", target: "Bob@Example.test" });
    if (!started.ok) throw new Error(started.reason);

    const pending = await getMethod(deps, started.value.methodId);
    expect(pending?.verified).toBe(false);
    expect(pending?.name).toBe("E-Mail");

    const code = deps.dispatcher.lastEmailCode("bob@example.test");
    const confirmed = await confirmFactorEnrollment(deps, USER, { channel: "email", target: "bob@example.test", code });
    if (!confirmed.ok) throw new Error(confirmed.reason);

    expect(confirmed.value.verified).toBe(true);
    expect(confirmed.value.configured).toBe(true);
    expect(confirmed.value.hint).toBe("bo**@example.test");

    const twice = await confirmFactorEnrollment(deps, USER, { channel: "email", target: "bob@example.test", code });
    expect(twice).toEqual({ ok: false, kind: "NOT_FOUND", reason: "enrollment_not_found" });
  });

  it("reuses the pending method when enrollment is restarted", async () => {
    const first = await startFactorEnrollment(deps, USER, { channel: "sms", target: PHONE });
    deps.clock.advance(60);
    const second = await startFactorEnrollment(deps, USER, { channel: "sms", target: PHONE });

    expect(first.ok && second.ok && second.value.methodId === first.value.methodId).toBe(true);
    expect(deps.dispatcher.sms).toHaveLength(2);
  });

  it("rejects a phone number another user has configured", async () => {
    await registerVerifiedPhone(OTHER);

    const result = await startFactorEnrollment(deps, USER, { channel: "sms", target: PHONE });

    expect(result).toEqual({ ok: false, kind: "VALIDATION_FAILED", reason: "target_in_use" });
  });

  it("rejects enrolling a target that is already verified for the user", async () => {
    await registerVerifiedPhone(USER);

    const result = await startFactorEnrollment(deps, USER, { channel: "sms", target: PHONE });

    expect(result).toEqual({ ok: false, kind: "VALIDATION_FAILED", reason: "method_already_registered" });
  });

  it("leaves the method unverified after a wrong code", async () => {
    const started = await startFactorEnrollment(deps, USER, { channel: "sms", target: PHONE });
    if (!started.ok) throw new Error(started.reason);
    const code = deps.dispatcher.lastSmsCode(PHONE);

    const result = await confirmFactorEnrollment(deps, USER, {
      channel: "sms",
      target: PHONE,
      code: code === "000000" ? "111111" : "000000",
    });

    expect(result).toEqual({ ok: false, kind: "MISMATCH", reason: "otp_mismatch" });
    expect((await getMethod(deps, started.value.methodId))?.verified).toBe(false);
  });
});
