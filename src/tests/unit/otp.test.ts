import { beforeEach, describe, expect, it } from "vitest";
import { otpTargetId } from "../../modules/otp/repository.js";
import { canSendOtp, cleanupExpiredOtps, issueOtp, verifyOtp } from "../../modules/otp/service.js";
import type { OtpIssueResult } from "../../modules/otp/types.js";
import { makeDeps, type TestDeps } from "../support/deps.js";

const PHONE = "+49151234567";

let deps: TestDeps;

beforeEach(() => {
  deps = makeDeps();
});

async function issueSignin(target = PHONE): Promise<OtpIssueResult> {
  const result = await issueOtp(deps, { channel: "sms", target, purpose: "signin", userId: "user-1" });
  if (!result.ok) throw new Error(result.reason);
  return result.value;
}

function wrongCode(code: string): string {
  return code === "000000" ? "111111" : "000000";
}

describe("issueOtp / verifyOtp", () => {
  it("delivers a six digit code that verifies exactly once", async () => {
    await issueSignin("+49 151 234567");

    expect(deps.dispatcher.sms).toHaveLength(1);
    expect(deps.dispatcher.sms[0]?.to).toBe(PHONE);
    const code = deps.dispatcher.lastSmsCode(PHONE);
    expect(code).toMatch(/^\d{6}$/);

    const first = await verifyOtp(deps, { channel: "sms", target: PHONE, purpose: "signin", code });
    expect(first.ok && first.value.userId).toBe("user-1");

    const replay = await verifyOtp(deps, { channel: "sms", target: PHONE, purpose: "signin", code });
    expect(replay).toEqual({ ok: false, kind: "ALREADY_USED", reason: "otp_already_used" });
  });

  it("stores only a hash and a masked target", async () => {
    await issueSignin();
    const code = deps.dispatcher.lastSmsCode(PHONE);

    const stored = await deps.stores.otpTargets.get(otpTargetId("sms", PHONE));

    expect(stored?.maskedTarget).toBe("***-***-4567");
    expect(stored?.codes).toHaveLength(1);
    expect(stored?.codes[0]?.codeHash).toMatch(/^[0-9a-f]{64}$/);
    expect(stored?.codes[0]?.codeHash).not.toBe(code);
  });

  it("locks the code after the configured number of wrong guesses", async () => {
    await issueSignin();
    const code = deps.dispatcher.lastSmsCode(PHONE);
    const guess = { channel: "sms" as const, target: PHONE, purpose: "signin" as const, code: wrongCode(code) };

    expect(await verifyOtp(deps, guess)).toEqual({ ok: false, kind: "MISMATCH", reason: "otp_mismatch" });
    expect(await verifyOtp(deps, guess)).toEqual({ ok: false, kind: "MISMATCH", reason: "otp_mismatch" });
    expect(await verifyOtp(deps, guess)).toEqual({
      ok: false,
      kind: "ATTEMPTS_EXCEEDED",
      reason: "otp_attempts_exceeded",
    });

    const correct = await verifyOtp(deps, { ...guess, code });
    expect(correct).toEqual({ ok: false, kind: "ATTEMPTS_EXCEEDED", reason: "otp_attempts_exceeded" });
  });

  it("rejects a code once its ttl has passed", async () => {
    await issueSignin();
    const code = deps.dispatcher.lastSmsCode(PHONE);
    deps.clock.advance(300);

    const result = await verifyOtp(deps, { channel: "sms", target: PHONE, purpose: "signin", code });

    expect(result).toEqual({ ok: false, kind: "EXPIRED", reason: "otp_expired" });
  });

  it("answers NOT_FOUND for a target without codes", async () => {
    const result = await verifyOtp(deps, { channel: "email", target: "nobody@example.test", purpose: "signin", code: "123456" });
    expect(result).toEqual({ ok: false, kind: "NOT_FOUND", reason: "otp_not_found" });
  });

  it("keeps verifying codes issued before a pepper rotation", async () => {
    await issueSignin();
    const code = deps.dispatcher.lastSmsCode(PHONE);

    deps.config = { ...deps.config, peppers: ["rotated-pepper", "test-pepper"] };

    const result = await verifyOtp(deps, { channel: "sms", target: PHONE, purpose: "signin", code });
    expect(result.ok).toBe(true);
  });
});

describe("send window", () => {
  it("applies the cooldown per target and purpose", async () => {
    const first = await issueSignin();

    const tooSoon = await issueOtp(deps, { channel: "sms", target: PHONE, purpose: "signin" });
    expect(tooSoon).toEqual({ ok: false, kind: "RATE_LIMITED", reason: "otp_cooldown", retryAfterSec: 60 });
    expect(await canSendOtp(deps, { channel: "sms", target: PHONE })).toEqual({
      allowed: false,
      reason: "cooldown",
      retryAfterSec: 60,
    });

    const otherPurpose = await issueOtp(deps, { channel: "sms", target: PHONE, purpose: "enroll", userId: "user-1" });
    expect(otherPurpose.ok).toBe(true);

    deps.clock.advance(60);
    const second = await issueSignin();
    expect(second.codeId).not.toBe(first.codeId);

    // Der neue Code ersetzt den alten
    const stale = await verifyOtp(deps, {
      channel: "sms",
      target: PHONE,
      purpose: "signin",
      code: "123456",
      codeId: first.codeId,
    });
    expect(stale).toEqual({ ok: false, kind: "NOT_FOUND", reason: "otp_not_found" });
  });

  it("caps sends per target within the daily window", async () => {
    for (let sent = 1; sent <= 5; sent += 1) {
      const issued = await issueSignin();
      expect(issued.dailyCount).toBe(sent);
      deps.clock.advance(60);
    }

    const capped = await issueOtp(deps, { channel: "sms", target: PHONE, purpose: "signin" });
    expect(capped).toEqual({ ok: false, kind: "RATE_LIMITED", reason: "otp_daily_cap", retryAfterSec: 86_100 });

    deps.clock.advance(86_100);
    const nextDay = await issueSignin();
    expect(nextDay.dailyCount).toBe(1);
    expect(nextDay.dailyWindowResetsAt).toEqual(new Date("2026-03-04T09:00:00.000Z"));
  });
});

describe("cleanupExpiredOtps", () => {
  it("drops expired codes first and the whole target after the daily window", async () => {
    await issueSignin();
    const id = otpTargetId("sms", PHONE);

    deps.clock.advance(301);
    expect(await cleanupExpiredOtps(deps)).toBe(1);
    const trimmed = await deps.stores.otpTargets.get(id);
    expect(trimmed?.codes).toEqual([]);
    expect(trimmed?.dailyCount).toBe(1);

    deps.clock.advance(86_400);
    expect(await cleanupExpiredOtps(deps)).toBe(1);
    expect(await deps.stores.otpTargets.get(id)).toBeNull();

    expect(await cleanupExpiredOtps(deps)).toBe(0);
  });
});
