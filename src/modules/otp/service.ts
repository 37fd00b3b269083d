// src/modules/otp/service.ts
// ============================================================================
// OTP-Engine (SMS + E-Mail)
// ----------------------------------------------------------------------------
// - Ausstellen: Cooldown pro (Ziel, Zweck), Tageslimit pro Ziel, ein Code pro
//   (Ziel, Zweck); alles in einem bedingten Schreibvorgang
// - Verifizieren: Konstantzeit-Vergleich gegen alle Pepper, Versuchszaehler,
//   Single-Use
// - Versand: fire-and-forget ueber den Dispatcher
// ============================================================================

import { randomUUID } from "node:crypto";
import type { AuthDeps } from "../../deps.js";
import type { OtpConfig } from "../../libs/auth-config.js";
import { addSeconds } from "../../libs/clock.js";
import {
  generateNumericCode,
  hashOtpCode,
  hashOtpCodeCandidates,
  matchesAnyHash,
  randomToken,
} from "../../libs/crypto.js";
import { failure, success, type AuthResult } from "../../libs/errors.js";
import { recordOtpIssued, recordOtpVerify } from "../../libs/metrics.js";
import { dispatchInBackground } from "../../libs/notify.js";
import { mutateDocument, sweepDocuments } from "../../libs/store.js";
import { DAILY_WINDOW_SEC, maskTarget, normalizeTarget, otpTargetId } from "./repository.js";
import type {
  OtpChannel,
  OtpCode,
  OtpIssueInput,
  OtpIssueResult,
  OtpPurpose,
  OtpTarget,
  OtpVerifyInput,
  OtpVerifyResult,
  SendWindow,
} from "./types.js";

function secondsUntil(later: Date, now: Date): number {
  return Math.max(1, Math.ceil((later.getTime() - now.getTime()) / 1000));
}

function windowEnd(state: OtpTarget): Date | null {
  return state.dailyWindowStartedAt ? addSeconds(state.dailyWindowStartedAt, DAILY_WINDOW_SEC) : null;
}

/**
 * Darf fuer dieses Ziel jetzt ein Code mit diesem Zweck verschickt werden?
 * Pure Funktion, damit Route (canSend) und Ausstellung dieselbe Regel sehen.
 */
export function evaluateSendWindow(
  state: OtpTarget | null,
  purpose: OtpPurpose,
  now: Date,
  cfg: OtpConfig,
): SendWindow {
  if (!state) return { allowed: true, windowExpired: true };

  const previous = state.codes.find((code) => code.purpose === purpose);
  if (previous) {
    const cooldownEndsAt = addSeconds(previous.createdAt, cfg.cooldownSec);
    if (now < cooldownEndsAt) {
      return { allowed: false, reason: "cooldown", retryAfterSec: secondsUntil(cooldownEndsAt, now) };
    }
  }

  const resetsAt = windowEnd(state);
  const windowExpired = !resetsAt || now >= resetsAt;
  if (!windowExpired && resetsAt && state.dailyCount >= cfg.dailyCap) {
    return { allowed: false, reason: "daily_cap", retryAfterSec: secondsUntil(resetsAt, now) };
  }

  return { allowed: true, windowExpired };
}

function messageFor(purpose: OtpPurpose, code: string, ttlSec: number): { subject: string; body: string } {
  const minutes = Math.max(1, Math.round(ttlSec / 60));
  switch (purpose) {
    case "signin":
      return { subject: "Dein Anmeldecode", body: `Dein Anmeldecode lautet ${code}. Gueltig fuer ${minutes} Minuten.` };
    case "enroll":
      return { subject: "Bestaetigungscode", body: `Dein Bestaetigungscode lautet ${code}. Gueltig fuer ${minutes} Minuten.` };
    case "recovery-email":
    case "recovery-sms":
      return {
        subject: "Konto-Wiederherstellung",
        body: `Dein Wiederherstellungscode lautet ${code}. Gueltig fuer ${minutes} Minuten. Nicht angefordert? Ignoriere diese Nachricht.`,
      };
  }
}

function dispatchCode(deps: AuthDeps, channel: OtpChannel, target: string, purpose: OtpPurpose, code: string) {
  const { subject, body } = messageFor(purpose, code, deps.config.otp.ttlSec);
  const context = { channel, purpose, target: maskTarget(channel, target) };

  dispatchInBackground(deps.log, "otp_dispatch", context, () =>
    channel === "email" ? deps.dispatcher.sendEmail(target, subject, body) : deps.dispatcher.sendSms(target, body),
  );
}

// ---------------------------------------------------------------------------
// Ausstellen
// ---------------------------------------------------------------------------

/**
 * Schreibt einen Code fuer (Ziel, Zweck) unter den Sendefenster-Regeln.
 * Versand und Erfolgs-Log bleiben beim Aufrufer.
 */
async function storeCode(
  deps: AuthDeps,
  input: OtpIssueInput,
  target: string,
  code: string,
): Promise<AuthResult<OtpIssueResult>> {
  const cfg = deps.config.otp;
  const now = deps.clock.now();
  const id = otpTargetId(input.channel, target);

  const salt = randomToken(16);
  const [pepper] = deps.config.peppers;

  const result = await mutateDocument<OtpTarget, AuthResult<OtpIssueResult>>(deps.stores.otpTargets, id, (current) => {
    const window = evaluateSendWindow(current, input.purpose, now, cfg);
    if (!window.allowed) {
      return {
        result: failure("RATE_LIMITED", `otp_${window.reason}`, window.retryAfterSec),
      };
    }

    const dailyWindowStartedAt = window.windowExpired || !current?.dailyWindowStartedAt
      ? now
      : current.dailyWindowStartedAt;
    const dailyCount = window.windowExpired || !current ? 1 : current.dailyCount + 1;

    const entry: OtpCode = {
      id: randomUUID(),
      purpose: input.purpose,
      salt,
      codeHash: hashOtpCode(code, salt, pepper),
      userId: input.userId ?? null,
      expiresAt: addSeconds(now, cfg.ttlSec),
      verified: false,
      attempts: 0,
      createdAt: now,
    };

    // Neuer Code ersetzt den alten fuer denselben Zweck
    const codes = (current?.codes ?? []).filter((existing) => existing.purpose !== input.purpose);

    const next: OtpTarget = {
      id,
      version: current?.version ?? 1,
      channel: input.channel,
      maskedTarget: maskTarget(input.channel, target),
      dailyCount,
      dailyWindowStartedAt,
      codes: [...codes, entry],
    };

    return {
      result: success({
        codeId: entry.id,
        expiresAt: entry.expiresAt,
        dailyCount,
        dailyWindowResetsAt: addSeconds(dailyWindowStartedAt, DAILY_WINDOW_SEC),
      }),
      next,
    };
  });

  if (!result.ok) {
    recordOtpIssued(input.channel, "rate_limited");
    deps.log.info(
      { channel: input.channel, purpose: input.purpose, target: maskTarget(input.channel, target), reason: result.reason },
      "otp_rate_limited",
    );
  }
  return result;
}

export async function issueOtp(deps: AuthDeps, input: OtpIssueInput): Promise<AuthResult<OtpIssueResult>> {
  const target = normalizeTarget(input.channel, input.target);
  const code = generateNumericCode(deps.config.otp.codeLength);

  const result = await storeCode(deps, input, target, code);
  if (!result.ok) return result;

  recordOtpIssued(input.channel, "ok");
  deps.log.info(
    {
      channel: input.channel,
      purpose: input.purpose,
      target: maskTarget(input.channel, target),
      codeId: result.value.codeId,
      dailyCount: result.value.dailyCount,
    },
    "otp_issued",
  );

  dispatchCode(deps, input.channel, target, input.purpose, code);
  return result;
}

/**
 * Fuer Ziele ohne Konto: belegt Cooldown und Tageslimit wie ein echter
 * Versand. Der Code wird nie verschickt.
 */
export async function recordSendWindow(
  deps: AuthDeps,
  input: { channel: OtpChannel; target: string; purpose: OtpPurpose },
): Promise<AuthResult<OtpIssueResult>> {
  const target = normalizeTarget(input.channel, input.target);
  const code = generateNumericCode(deps.config.otp.codeLength);

  const result = await storeCode(deps, { ...input, userId: null }, target, code);
  if (result.ok) {
    recordOtpIssued(input.channel, "decoy");
    deps.log.debug(
      { channel: input.channel, purpose: input.purpose, target: maskTarget(input.channel, target) },
      "otp_decoy_recorded",
    );
  }
  return result;
}

// ---------------------------------------------------------------------------
// Verifizieren
// ---------------------------------------------------------------------------

export async function verifyOtp(deps: AuthDeps, input: OtpVerifyInput): Promise<AuthResult<OtpVerifyResult>> {
  const cfg = deps.config.otp;
  const now = deps.clock.now();
  const target = normalizeTarget(input.channel, input.target);
  const id = otpTargetId(input.channel, target);
  const submitted = input.code.trim();

  const result = await mutateDocument<OtpTarget, AuthResult<OtpVerifyResult>>(deps.stores.otpTargets, id, (current) => {
    const entry = current?.codes.find((code) => code.purpose === input.purpose);
    if (!current || !entry || (input.codeId && entry.id !== input.codeId)) {
      return { result: failure("NOT_FOUND", "otp_not_found") };
    }

    if (entry.verified) {
      return { result: failure("ALREADY_USED", "otp_already_used") };
    }
    if (now >= entry.expiresAt) {
      return { result: failure("EXPIRED", "otp_expired") };
    }
    if (entry.attempts >= cfg.maxAttempts) {
      return { result: failure("ATTEMPTS_EXCEEDED", "otp_attempts_exceeded") };
    }

    const candidates = hashOtpCodeCandidates(submitted, entry.salt, deps.config.peppers);
    const matched = matchesAnyHash(entry.codeHash, candidates);

    const updated: OtpCode = matched
      ? { ...entry, verified: true }
      : { ...entry, attempts: entry.attempts + 1 };
    const next: OtpTarget = {
      ...current,
      codes: current.codes.map((code) => (code.id === entry.id ? updated : code)),
    };

    if (!matched) {
      const exhausted = updated.attempts >= cfg.maxAttempts;
      return {
        result: exhausted
          ? failure("ATTEMPTS_EXCEEDED", "otp_attempts_exceeded")
          : failure("MISMATCH", "otp_mismatch"),
        next,
      };
    }

    return { result: success({ codeId: entry.id, userId: entry.userId }), next };
  });

  recordOtpVerify(input.channel, result.ok ? "ok" : result.kind.toLowerCase());
  if (!result.ok) {
    deps.log.info(
      { channel: input.channel, purpose: input.purpose, target: maskTarget(input.channel, target), kind: result.kind },
      "otp_verify_failed",
    );
  }
  return result;
}

// ---------------------------------------------------------------------------
// Abfrage + Bereinigung
// ---------------------------------------------------------------------------

export async function canSendOtp(
  deps: AuthDeps,
  input: { channel: OtpChannel; target: string; purpose?: OtpPurpose },
): Promise<SendWindow> {
  const state = await deps.stores.otpTargets.get(otpTargetId(input.channel, input.target));
  return evaluateSendWindow(state, input.purpose ?? "signin", deps.clock.now(), deps.config.otp);
}

/**
 * Entfernt abgelaufene Codes; Dokumente ohne Codes und mit abgelaufenem
 * Tagesfenster werden geloescht. Mehrfaches Ausfuehren ist ein No-op.
 */
export async function cleanupExpiredOtps(deps: AuthDeps): Promise<number> {
  const now = deps.clock.now();

  return sweepDocuments(deps.stores.otpTargets, now, (current) => {
    if (!current) return { result: false };

    const codes = current.codes.filter((code) => code.expiresAt > now);
    const resetsAt = windowEnd(current);
    const windowOpen = resetsAt !== null && resetsAt > now;

    if (codes.length === 0 && !windowOpen) {
      return { result: true, remove: true };
    }

    const windowElapsed = current.dailyWindowStartedAt !== null && !windowOpen;
    if (codes.length === current.codes.length && !windowElapsed) {
      return { result: false };
    }

    const next: OtpTarget = windowElapsed
      ? { ...current, codes, dailyCount: 0, dailyWindowStartedAt: null }
      : { ...current, codes };
    return { result: true, next };
  }, deps.log);
}
