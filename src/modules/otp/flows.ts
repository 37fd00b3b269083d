// src/modules/otp/flows.ts
// ============================================================================
// Flows auf der OTP-Engine
// ----------------------------------------------------------------------------
// - Passwordless Sign-in per SMS/E-Mail (ohne Account-Enumeration)
// - Enrollment eines SMS-/E-Mail-Faktors mit Bestaetigungscode
// ============================================================================

import type { AuthDeps } from "../../deps.js";
import { failure, success, type AuthResult } from "../../libs/errors.js";
import { signFactorAssertion, type AssertedFactor } from "../../libs/jwt.js";
import { hashEmailForLog } from "../../libs/pii.js";
import {
  describeMethod,
  findConfiguredTargetMethod,
  findMethodsByType,
  markMethodUsed,
  markMethodVerified,
  noteOtpSent,
  registerMethod,
} from "../methods/service.js";
import type { AuthenticationMethod, MethodView } from "../methods/types.js";
import { maskTarget, normalizeTarget } from "./repository.js";
import { issueOtp, recordSendWindow, verifyOtp } from "./service.js";
import type { OtpChannel, OtpIssueResult } from "./types.js";

type TargetMethodType = "SMS_OTP" | "EMAIL_OTP";

export type SignInRequestResult = {
  sent: true;
  expiresInSec: number;
};

export type SignInCompletion = {
  userId: string;
  methodId: string;
  assertion: string;
  assertionExpiresAt: Date;
};

export type EnrollmentStart = {
  methodId: string;
  codeId: string;
  expiresAt: Date;
};

function methodTypeFor(channel: OtpChannel): TargetMethodType {
  return channel === "sms" ? "SMS_OTP" : "EMAIL_OTP";
}

function factorFor(channel: OtpChannel): AssertedFactor {
  return channel === "sms" ? "sms_otp" : "email_otp";
}

function targetOf(method: AuthenticationMethod): string | null {
  if (method.type === "SMS_OTP") return normalizeTarget("sms", method.phoneNumber);
  if (method.type === "EMAIL_OTP") return normalizeTarget("email", method.email);
  return null;
}

function logTarget(channel: OtpChannel, target: string): Record<string, string> {
  return channel === "email" ? { emailHash: hashEmailForLog(target) } : { phone: maskTarget(channel, target) };
}

async function mirrorSendCounter(deps: AuthDeps, methodId: string, issued: OtpIssueResult) {
  const mirrored = await noteOtpSent(deps, methodId, issued.dailyCount, issued.dailyWindowResetsAt);
  if (!mirrored.ok) {
    deps.log.warn({ methodId, reason: mirrored.reason }, "otp_send_counter_not_mirrored");
  }
}

// ---------------------------------------------------------------------------
// Sign-in
// ---------------------------------------------------------------------------

/**
 * Antwortet fuer unbekannte Ziele genauso wie fuer bekannte, einschliesslich
 * RATE_LIMITED: beide laufen durch dasselbe Sendefenster.
 */
export async function requestSignInOtp(
  deps: AuthDeps,
  input: { channel: OtpChannel; target: string },
): Promise<AuthResult<SignInRequestResult>> {
  const target = normalizeTarget(input.channel, input.target);
  const answer = success<SignInRequestResult>({ sent: true, expiresInSec: deps.config.otp.ttlSec });

  const method = await findConfiguredTargetMethod(deps, methodTypeFor(input.channel), target);
  if (!method) {
    deps.log.info({ channel: input.channel, ...logTarget(input.channel, target) }, "otp_signin_unknown_target");
    const recorded = await recordSendWindow(deps, { channel: input.channel, target, purpose: "signin" });
    return recorded.ok ? answer : recorded;
  }

  const issued = await issueOtp(deps, {
    channel: input.channel,
    target,
    purpose: "signin",
    userId: method.userId,
  });
  if (!issued.ok) return issued;

  await mirrorSendCounter(deps, method.id, issued.value);
  return answer;
}

export async function verifySignInOtp(
  deps: AuthDeps,
  input: { channel: OtpChannel; target: string; code: string },
): Promise<AuthResult<SignInCompletion>> {
  const target = normalizeTarget(input.channel, input.target);

  const verified = await verifyOtp(deps, {
    channel: input.channel,
    target,
    purpose: "signin",
    code: input.code,
  });
  if (!verified.ok) return verified;

  // Faktor kann zwischen Ausstellen und Einloesen deaktiviert worden sein
  const method = await findConfiguredTargetMethod(deps, methodTypeFor(input.channel), target);
  if (!method || method.userId !== verified.value.userId) {
    return failure("UNAUTHORIZED", "method_not_configured");
  }

  const used = await markMethodUsed(deps, method.id);
  if (!used.ok) return used;

  const assertion = await signFactorAssertion({
    userId: method.userId,
    factor: factorFor(input.channel),
    methodId: method.id,
    now: deps.clock.now(),
    ttlSec: deps.config.assertionTtlSec,
  });

  deps.log.info({ userId: method.userId, methodId: method.id, channel: input.channel }, "otp_signin_verified");

  return success({
    userId: method.userId,
    methodId: method.id,
    assertion: assertion.token,
    assertionExpiresAt: assertion.expiresAt,
  });
}

// ---------------------------------------------------------------------------
// Enrollment SMS / E-Mail
// ---------------------------------------------------------------------------

async function findOwnMethodForTarget(
  deps: AuthDeps,
  userId: string,
  channel: OtpChannel,
  target: string,
): Promise<AuthenticationMethod | null> {
  const methods = await findMethodsByType(deps, userId, methodTypeFor(channel));
  const match = methods.find((method) => method.status === "ACTIVE" && targetOf(method) === target);
  return match ?? null;
}

export async function startFactorEnrollment(
  deps: AuthDeps,
  userId: string,
  input: { channel: OtpChannel; target: string; name?: string },
): Promise<AuthResult<EnrollmentStart>> {
  const target = normalizeTarget(input.channel, input.target);
  const type = methodTypeFor(input.channel);

  const holder = await findConfiguredTargetMethod(deps, type, target);
  if (holder && holder.userId !== userId) {
    return failure("VALIDATION_FAILED", "target_in_use");
  }

  let method = await findOwnMethodForTarget(deps, userId, input.channel, target);
  if (method?.verified) {
    return failure("VALIDATION_FAILED", "method_already_registered");
  }

  if (!method) {
    const name = input.name ?? (input.channel === "sms" ? "SMS" : "E-Mail");
    const registered = await registerMethod(
      deps,
      userId,
      name,
      input.channel === "sms" ? { type: "SMS_OTP", phoneNumber: target } : { type: "EMAIL_OTP", email: target },
    );
    if (!registered.ok) return registered;
    method = registered.value;
  }

  const issued = await issueOtp(deps, { channel: input.channel, target, purpose: "enroll", userId });
  if (!issued.ok) return issued;

  await mirrorSendCounter(deps, method.id, issued.value);
  deps.log.info({ userId, methodId: method.id, type }, "factor_enrollment_started");

  return success({ methodId: method.id, codeId: issued.value.codeId, expiresAt: issued.value.expiresAt });
}

export async function confirmFactorEnrollment(
  deps: AuthDeps,
  userId: string,
  input: { channel: OtpChannel; target: string; code: string },
): Promise<AuthResult<MethodView>> {
  const target = normalizeTarget(input.channel, input.target);

  const method = await findOwnMethodForTarget(deps, userId, input.channel, target);
  if (!method || method.verified) {
    return failure("NOT_FOUND", "enrollment_not_found");
  }

  const verified = await verifyOtp(deps, {
    channel: input.channel,
    target,
    purpose: "enroll",
    code: input.code,
  });
  if (!verified.ok) return verified;
  if (verified.value.userId !== userId) {
    return failure("UNAUTHORIZED", "code_bound_to_other_user");
  }

  const confirmed = await markMethodVerified(deps, method.id);
  if (!confirmed.ok) return confirmed;

  deps.log.info({ userId, methodId: method.id, type: method.type }, "factor_enrollment_confirmed");
  return success(describeMethod(confirmed.value));
}
