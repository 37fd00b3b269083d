// src/modules/recovery/service.ts
// ============================================================================
// Account Recovery Orchestrator
// ----------------------------------------------------------------------------
// Ablauf:
//   start -> E-Mail-Code -> (bei MFA) SMS-Code -> Recovery-Credential
//
// - Missbrauchsschutz vor allem anderen: pro E-Mail und pro IP
// - Unbekannte E-Mail: gleiche Antwort mit Decoy-Id; nur das OTP-Sendefenster
//   wird belegt, keine Anfrage gespeichert
// - Jeder Schritt hat einen eigenen Versuchszaehler (unabhaengig vom OTP)
// - Das Credential wird genau einmal ausgestellt
// ============================================================================

import { randomUUID } from "node:crypto";
import type { AuthDeps } from "../../deps.js";
import { addSeconds } from "../../libs/clock.js";
import { failure, success, type AuthResult } from "../../libs/errors.js";
import { signRecoveryToken } from "../../libs/jwt.js";
import { recordRecovery } from "../../libs/metrics.js";
import { hashEmailForLog, maskPhone, normalizeEmail, sha256 } from "../../libs/pii.js";
import { mutateDocument, sweepDocuments, type Decision } from "../../libs/store.js";
import { findRecoveryPhone, hasMfaEnabled } from "../methods/service.js";
import { issueOtp, recordSendWindow, verifyOtp } from "../otp/service.js";
import type { OtpIssueResult } from "../otp/types.js";
import { cancelAllPendingPush } from "../push/service.js";
import { listActiveRecoveries } from "./repository.js";
import {
  isActive,
  isReadyForToken,
  type RecoveryCredential,
  type RecoveryRequest,
  type RecoveryStart,
  type RecoveryStatusView,
  type RecoveryStep,
  type RecoveryStepResult,
} from "./types.js";

type RecoveryDecision<R> = Decision<RecoveryRequest, AuthResult<R>>;

function describe(request: RecoveryRequest): RecoveryStatusView {
  return {
    recoveryId: request.id,
    status: request.status,
    mfaRequired: request.mfaRequired,
    emailVerified: request.emailVerified,
    smsVerified: request.smsVerified,
    phoneNumberHint: request.phoneNumberHint,
    expiresAt: request.expiresAt.toISOString(),
  };
}

/**
 * Terminale Zustaende und Ablauf. Liefert null, wenn die Anfrage noch offen
 * und nicht abgelaufen ist.
 */
function rejectInactive<R>(current: RecoveryRequest, now: Date): RecoveryDecision<R> | null {
  switch (current.status) {
    case "COMPLETED":
    case "CANCELLED":
      return { result: failure("ALREADY_USED", `recovery_${current.status.toLowerCase()}`) };
    case "EXPIRED":
      return { result: failure("EXPIRED", "recovery_expired") };
    case "PENDING_EMAIL":
    case "PENDING_SMS":
      break;
  }

  if (now >= current.expiresAt) {
    return {
      result: failure("EXPIRED", "recovery_expired"),
      next: { ...current, status: "EXPIRED", updatedAt: now },
    };
  }
  return null;
}

function stepMismatch<R>(current: RecoveryRequest, step: RecoveryStep): RecoveryDecision<R> | null {
  if (step === "EMAIL" && (current.status !== "PENDING_EMAIL" || current.emailVerified)) {
    return { result: failure("ALREADY_USED", "recovery_email_already_verified") };
  }
  if (step === "SMS" && current.status !== "PENDING_SMS") {
    return { result: failure("NOT_READY", "recovery_email_not_verified") };
  }
  return null;
}

function logStep(deps: AuthDeps, step: string, recoveryId: string, result: AuthResult<unknown>) {
  recordRecovery(step, result.ok ? "ok" : result.kind.toLowerCase());
  if (!result.ok) {
    deps.log.info({ recoveryId, step, kind: result.kind, reason: result.reason }, "recovery_step_rejected");
  }
}

// ---------------------------------------------------------------------------
// Start
// ---------------------------------------------------------------------------

export async function startRecovery(
  deps: AuthDeps,
  input: {
    email: string;
    ipAddress: string | null;
    userAgent: string | null;
  },
): Promise<AuthResult<RecoveryStart>> {
  const cfg = deps.config.recovery;
  const now = deps.clock.now();
  const email = normalizeEmail(input.email);
  const emailHash = hashEmailForLog(email);

  const perEmail = await deps.limiter.hit("recovery-email", sha256(email), cfg.emailWindowSec, cfg.maxPerEmail, now);
  if (!perEmail.allowed) {
    recordRecovery("start", "rate_limited");
    deps.log.warn({ emailHash }, "recovery_rate_limited_email");
    return failure("RATE_LIMITED", "recovery_too_many_requests", perEmail.retryAfterSec);
  }

  if (input.ipAddress) {
    const perIp = await deps.limiter.hit("recovery-ip", sha256(input.ipAddress), cfg.ipWindowSec, cfg.maxPerIp, now);
    if (!perIp.allowed) {
      recordRecovery("start", "rate_limited");
      deps.log.warn({ emailHash }, "recovery_rate_limited_ip");
      return failure("RATE_LIMITED", "recovery_too_many_requests", perIp.retryAfterSec);
    }
  }

  const expiresAt = addSeconds(now, cfg.ttlSec);
  const userId = await deps.users.findUserIdByEmail(email);
  if (!userId) {
    // Gleiche Antwortform wie fuer bekannte Konten, auch im OTP-Cooldown
    const recorded = await recordSendWindow(deps, { channel: "email", target: email, purpose: "recovery-email" });
    if (!recorded.ok) {
      recordRecovery("start", recorded.kind.toLowerCase());
      return recorded;
    }
    recordRecovery("start", "unknown_email");
    deps.log.info({ emailHash }, "recovery_unknown_email");
    return success({ recoveryId: randomUUID(), expiresAt, nextStep: "EMAIL" });
  }

  const mfaEnabled = await hasMfaEnabled(deps, userId);
  const phoneNumber = mfaEnabled ? await findRecoveryPhone(deps, userId) : null;
  const mfaRequired = mfaEnabled && phoneNumber !== null;

  const issued = await issueOtp(deps, { channel: "email", target: email, purpose: "recovery-email", userId });
  if (!issued.ok) {
    recordRecovery("start", issued.kind.toLowerCase());
    return issued;
  }

  await cancelActiveRecoveries(deps, userId, now);

  const request: RecoveryRequest = {
    id: randomUUID(),
    version: 1,
    userId,
    email,
    status: "PENDING_EMAIL",
    emailVerified: false,
    smsVerified: false,
    mfaRequired,
    phoneNumber: mfaRequired ? phoneNumber : null,
    phoneNumberHint: mfaRequired && phoneNumber ? maskPhone(phoneNumber) : null,
    emailCodeId: issued.value.codeId,
    smsCodeId: null,
    emailAttempts: 0,
    smsAttempts: 0,
    ipAddress: input.ipAddress,
    userAgent: input.userAgent,
    expiresAt,
    completedAt: null,
    usedForAuthentication: false,
    createdAt: now,
    updatedAt: now,
  };

  const created = await deps.stores.recoveries.create(request);
  if (!created) {
    return failure("VALIDATION_FAILED", "recovery_id_conflict");
  }

  recordRecovery("start", "ok");
  deps.log.info({ userId, recoveryId: created.id, mfaRequired }, "recovery_started");
  return success({ recoveryId: created.id, expiresAt: created.expiresAt, nextStep: "EMAIL" });
}

async function cancelActiveRecoveries(deps: AuthDeps, userId: string, now: Date): Promise<number> {
  const active = await listActiveRecoveries(deps.stores.recoveries, userId);
  let cancelled = 0;

  for (const request of active) {
    const changed = await mutateDocument<RecoveryRequest, boolean>(deps.stores.recoveries, request.id, (current) => {
      if (!current || !isActive(current.status)) return { result: false };
      return { result: true, next: { ...current, status: "CANCELLED", updatedAt: now } };
    });
    if (changed) cancelled += 1;
  }

  if (cancelled > 0) {
    deps.log.info({ userId, cancelled }, "recovery_superseded");
  }
  return cancelled;
}

// ---------------------------------------------------------------------------
// Schritte
// ---------------------------------------------------------------------------

/**
 * Zaehlt den Versuch vor der Code-Pruefung. Ist das Limit bereits erreicht,
 * wird die Anfrage abgebrochen.
 */
function beginAttempt(
  deps: AuthDeps,
  recoveryId: string,
  step: RecoveryStep,
  now: Date,
): Promise<AuthResult<RecoveryRequest>> {
  const max = deps.config.recovery.maxStepAttempts;

  return mutateDocument<RecoveryRequest, AuthResult<RecoveryRequest>>(deps.stores.recoveries, recoveryId, (current) => {
    if (!current) return { result: failure("NOT_FOUND", "recovery_not_found") };

    const inactive = rejectInactive<RecoveryRequest>(current, now);
    if (inactive) return inactive;
    const outOfOrder = stepMismatch<RecoveryRequest>(current, step);
    if (outOfOrder) return outOfOrder;
    if (step === "SMS" && !current.smsCodeId) {
      return { result: failure("NOT_READY", "recovery_sms_not_sent") };
    }

    const attempts = step === "EMAIL" ? current.emailAttempts : current.smsAttempts;
    if (attempts >= max) {
      return {
        result: failure("ATTEMPTS_EXCEEDED", "recovery_attempts_exceeded"),
        next: { ...current, status: "CANCELLED", updatedAt: now },
      };
    }

    const next: RecoveryRequest =
      step === "EMAIL"
        ? { ...current, emailAttempts: attempts + 1, updatedAt: now }
        : { ...current, smsAttempts: attempts + 1, updatedAt: now };
    return { result: success(next), next };
  });
}

export async function verifyRecoveryEmail(
  deps: AuthDeps,
  input: { recoveryId: string; code: string },
): Promise<AuthResult<RecoveryStepResult>> {
  const result = await runEmailStep(deps, input);
  logStep(deps, "email", input.recoveryId, result);
  return result;
}

async function runEmailStep(
  deps: AuthDeps,
  input: { recoveryId: string; code: string },
): Promise<AuthResult<RecoveryStepResult>> {
  const now = deps.clock.now();
  const attempt = await beginAttempt(deps, input.recoveryId, "EMAIL", now);
  if (!attempt.ok) return attempt;

  const request = attempt.value;
  if (!request.emailCodeId) {
    return failure("NOT_FOUND", "recovery_email_code_missing");
  }

  const verified = await verifyOtp(deps, {
    channel: "email",
    target: request.email,
    purpose: "recovery-email",
    code: input.code,
    codeId: request.emailCodeId,
  });
  if (!verified.ok) return verified;
  if (verified.value.userId !== request.userId) {
    return failure("UNAUTHORIZED", "recovery_code_not_bound");
  }

  // SMS-Code vor dem Zustandswechsel ausstellen, damit die Code-Id im selben Write landet
  let smsIssue: AuthResult<OtpIssueResult> | null = null;
  if (request.mfaRequired && request.phoneNumber) {
    smsIssue = await issueOtp(deps, {
      channel: "sms",
      target: request.phoneNumber,
      purpose: "recovery-sms",
      userId: request.userId,
    });
    if (!smsIssue.ok) {
      deps.log.warn({ recoveryId: request.id, reason: smsIssue.reason }, "recovery_sms_issue_failed");
    }
  }
  const smsCodeId = smsIssue?.ok ? smsIssue.value.codeId : null;
  const smsFailure = smsIssue !== null && !smsIssue.ok ? smsIssue : null;

  return mutateDocument<RecoveryRequest, AuthResult<RecoveryStepResult>>(
    deps.stores.recoveries,
    request.id,
    (current) => {
      if (!current) return { result: failure("NOT_FOUND", "recovery_not_found") };
      const inactive = rejectInactive<RecoveryStepResult>(current, now);
      if (inactive) return inactive;
      const outOfOrder = stepMismatch<RecoveryStepResult>(current, "EMAIL");
      if (outOfOrder) return outOfOrder;

      if (current.mfaRequired) {
        // E-Mail gilt als bestaetigt; ohne SMS-Code geht es nur ueber resend weiter
        return {
          result: smsFailure ?? success({ nextStep: "SMS", phoneNumberHint: current.phoneNumberHint }),
          next: {
            ...current,
            emailVerified: true,
            status: "PENDING_SMS",
            smsCodeId,
            smsAttempts: 0,
            updatedAt: now,
          },
        };
      }

      return {
        result: success({ nextStep: "TOKEN", phoneNumberHint: null }),
        next: { ...current, emailVerified: true, updatedAt: now },
      };
    },
  );
}

export async function verifyRecoverySms(
  deps: AuthDeps,
  input: { recoveryId: string; code: string },
): Promise<AuthResult<RecoveryStepResult>> {
  const result = await runSmsStep(deps, input);
  logStep(deps, "sms", input.recoveryId, result);
  return result;
}

async function runSmsStep(
  deps: AuthDeps,
  input: { recoveryId: string; code: string },
): Promise<AuthResult<RecoveryStepResult>> {
  const now = deps.clock.now();
  const attempt = await beginAttempt(deps, input.recoveryId, "SMS", now);
  if (!attempt.ok) return attempt;

  const request = attempt.value;
  if (!request.phoneNumber || !request.smsCodeId) {
    return failure("NOT_FOUND", "recovery_sms_code_missing");
  }

  const verified = await verifyOtp(deps, {
    channel: "sms",
    target: request.phoneNumber,
    purpose: "recovery-sms",
    code: input.code,
    codeId: request.smsCodeId,
  });
  if (!verified.ok) return verified;
  if (verified.value.userId !== request.userId) {
    return failure("UNAUTHORIZED", "recovery_code_not_bound");
  }

  return mutateDocument<RecoveryRequest, AuthResult<RecoveryStepResult>>(
    deps.stores.recoveries,
    request.id,
    (current) => {
      if (!current) return { result: failure("NOT_FOUND", "recovery_not_found") };
      const inactive = rejectInactive<RecoveryStepResult>(current, now);
      if (inactive) return inactive;
      const outOfOrder = stepMismatch<RecoveryStepResult>(current, "SMS");
      if (outOfOrder) return outOfOrder;

      return {
        result: success({ nextStep: "TOKEN", phoneNumberHint: current.phoneNumberHint }),
        next: { ...current, smsVerified: true, updatedAt: now },
      };
    },
  );
}

// ---------------------------------------------------------------------------
// Credential
// ---------------------------------------------------------------------------

export async function issueRecoveryToken(
  deps: AuthDeps,
  recoveryId: string,
): Promise<AuthResult<RecoveryCredential>> {
  const now = deps.clock.now();

  const completed = await mutateDocument<RecoveryRequest, AuthResult<RecoveryRequest>>(
    deps.stores.recoveries,
    recoveryId,
    (current) => {
      if (!current) return { result: failure("NOT_FOUND", "recovery_not_found") };
      const inactive = rejectInactive<RecoveryRequest>(current, now);
      if (inactive) return inactive;
      if (!isReadyForToken(current)) return { result: failure("NOT_READY", "recovery_not_verified") };

      const next: RecoveryRequest = {
        ...current,
        status: "COMPLETED",
        completedAt: now,
        usedForAuthentication: true,
        updatedAt: now,
      };
      return { result: success(next), next };
    },
  );

  logStep(deps, "token", recoveryId, completed);
  if (!completed.ok) return completed;

  const credential = await signRecoveryToken({
    userId: completed.value.userId,
    recoveryId,
    now,
    ttlSec: deps.config.recovery.tokenTtlSec,
  });

  // Offene Push-Anfragen stammen womoeglich vom Angreifer, der das Konto hatte
  await cancelAllPendingPush(deps, completed.value.userId);

  deps.log.info({ userId: completed.value.userId, recoveryId }, "recovery_completed");
  return success({ userId: completed.value.userId, token: credential.token, expiresAt: credential.expiresAt });
}

// ---------------------------------------------------------------------------
// Status / Abbruch / erneut senden
// ---------------------------------------------------------------------------

export async function getRecoveryStatus(
  deps: AuthDeps,
  recoveryId: string,
): Promise<AuthResult<RecoveryStatusView>> {
  const now = deps.clock.now();
  const result = await mutateDocument<RecoveryRequest, AuthResult<RecoveryRequest>>(
    deps.stores.recoveries,
    recoveryId,
    (current) => {
      if (!current) return { result: failure("NOT_FOUND", "recovery_not_found") };
      if (isActive(current.status) && now >= current.expiresAt) {
        const next: RecoveryRequest = { ...current, status: "EXPIRED", updatedAt: now };
        return { result: success(next), next };
      }
      return { result: success(current) };
    },
  );
  return result.ok ? success(describe(result.value)) : result;
}

export async function cancelRecovery(
  deps: AuthDeps,
  recoveryId: string,
): Promise<AuthResult<RecoveryStatusView>> {
  const now = deps.clock.now();
  const result = await mutateDocument<RecoveryRequest, AuthResult<RecoveryRequest>>(
    deps.stores.recoveries,
    recoveryId,
    (current) => {
      if (!current) return { result: failure("NOT_FOUND", "recovery_not_found") };
      if (!isActive(current.status)) {
        return { result: failure("ALREADY_USED", `recovery_${current.status.toLowerCase()}`) };
      }
      const next: RecoveryRequest = { ...current, status: "CANCELLED", updatedAt: now };
      return { result: success(next), next };
    },
  );

  logStep(deps, "cancel", recoveryId, result);
  if (result.ok) deps.log.info({ recoveryId }, "recovery_cancelled");
  return result.ok ? success(describe(result.value)) : result;
}

/**
 * Stellt den Code des aktuellen Schritts neu aus (OTP-Cooldown gilt) und
 * setzt den Versuchszaehler des Schritts zurueck.
 */
export async function resendRecoveryCode(
  deps: AuthDeps,
  recoveryId: string,
): Promise<AuthResult<{ step: RecoveryStep; expiresAt: Date }>> {
  const now = deps.clock.now();
  const checked = await mutateDocument<RecoveryRequest, AuthResult<RecoveryRequest>>(
    deps.stores.recoveries,
    recoveryId,
    (current) => {
      if (!current) return { result: failure("NOT_FOUND", "recovery_not_found") };
      const inactive = rejectInactive<RecoveryRequest>(current, now);
      if (inactive) return inactive;
      const step: RecoveryStep = current.status === "PENDING_EMAIL" ? "EMAIL" : "SMS";
      const outOfOrder = stepMismatch<RecoveryRequest>(current, step);
      if (outOfOrder) return outOfOrder;
      return { result: success(current) };
    },
  );
  if (!checked.ok) {
    logStep(deps, "resend", recoveryId, checked);
    return checked;
  }

  const request = checked.value;
  const step: RecoveryStep = request.status === "PENDING_EMAIL" ? "EMAIL" : "SMS";
  const issued = await issueStepCode(deps, request, step);
  if (!issued.ok) {
    logStep(deps, "resend", recoveryId, issued);
    return issued;
  }

  const codeId = issued.value.codeId;
  const result = await mutateDocument<RecoveryRequest, AuthResult<{ step: RecoveryStep; expiresAt: Date }>>(
    deps.stores.recoveries,
    recoveryId,
    (latest) => {
      if (!latest) return { result: failure("NOT_FOUND", "recovery_not_found") };
      const rejected = rejectInactive<{ step: RecoveryStep; expiresAt: Date }>(latest, now);
      if (rejected) return rejected;
      const outOfOrder = stepMismatch<{ step: RecoveryStep; expiresAt: Date }>(latest, step);
      if (outOfOrder) return outOfOrder;

      const next: RecoveryRequest =
        step === "EMAIL"
          ? { ...latest, emailCodeId: codeId, emailAttempts: 0, updatedAt: now }
          : { ...latest, smsCodeId: codeId, smsAttempts: 0, updatedAt: now };
      return { result: success({ step, expiresAt: issued.value.expiresAt }), next };
    },
  );

  logStep(deps, "resend", recoveryId, result);
  return result;
}

function issueStepCode(
  deps: AuthDeps,
  request: RecoveryRequest,
  step: RecoveryStep,
): Promise<AuthResult<OtpIssueResult>> {
  if (step === "EMAIL") {
    return issueOtp(deps, { channel: "email", target: request.email, purpose: "recovery-email", userId: request.userId });
  }
  if (!request.phoneNumber) {
    return Promise.resolve(failure("NOT_FOUND", "recovery_phone_missing"));
  }
  return issueOtp(deps, { channel: "sms", target: request.phoneNumber, purpose: "recovery-sms", userId: request.userId });
}

// ---------------------------------------------------------------------------
// Bereinigung
// ---------------------------------------------------------------------------

export async function sweepExpiredRecoveries(deps: AuthDeps): Promise<number> {
  const now = deps.clock.now();
  return sweepDocuments(deps.stores.recoveries, now, (current) => {
    if (!current || !isActive(current.status) || current.expiresAt > now) {
      return { result: false };
    }
    return { result: true, next: { ...current, status: "EXPIRED", updatedAt: now } };
  }, deps.log);
}
