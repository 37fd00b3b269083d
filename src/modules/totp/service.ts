// src/modules/totp/service.ts
// ============================================================================
// TOTP-Faktor (RFC 6238, otplib)
// ----------------------------------------------------------------------------
// - Secret: 160 Bit, at rest AES-256-GCM verschluesselt
// - Pruefung gegen die injizierte Uhr, Fenster +-N Schritte (Config)
// - Replay-Schutz: ein Zeitschritt wird pro Methode nur einmal akzeptiert
// ============================================================================

import { authenticator } from "otplib";
import type { AuthDeps } from "../../deps.js";
import { decryptSecret, encryptSecret } from "../../libs/crypto.js";
import { failure, success, type AuthResult } from "../../libs/errors.js";
import { signFactorAssertion } from "../../libs/jwt.js";
import { findMethodsByType, registerMethod, updateMethod } from "../methods/service.js";
import type { AuthenticationMethod, TotpMethod } from "../methods/types.js";

const SECRET_BYTES = 20;
const STEP_SEC = 30;

export type TotpEnrollment = {
  methodId: string;
  secret: string;
  otpauthUri: string;
};

export type TotpVerification = {
  methodId: string;
  /** true beim ersten erfolgreichen Code nach dem Enrollment */
  enrolled: boolean;
  assertion: string;
  assertionExpiresAt: Date;
};

function timeStep(now: Date): number {
  return Math.floor(now.getTime() / 1000 / STEP_SEC);
}

/** Akzeptierter Zeitschritt oder null. */
export function matchTotpStep(code: string, secret: string, now: Date, window: number): number | null {
  const token = code.replace(/\s+/g, "");
  if (!/^\d{6}$/.test(token)) return null;

  const checker = authenticator.clone({ epoch: now.getTime(), window, step: STEP_SEC });
  const delta = checker.checkDelta(token, secret);
  return delta === null ? null : timeStep(now) + delta;
}

// ---------------------------------------------------------------------------
// Enrollment
// ---------------------------------------------------------------------------

export async function enrollTotp(
  deps: AuthDeps,
  userId: string,
  accountName: string,
): Promise<AuthResult<TotpEnrollment>> {
  // Fruehere, nie bestaetigte Enrollments ablegen
  const existing = await findMethodsByType(deps, userId, "TOTP");
  for (const method of existing) {
    if (method.verified || method.status !== "ACTIVE") continue;
    const disabled = await updateMethod(deps, method.id, (current) => success({ ...current, status: "DISABLED" }));
    if (!disabled.ok) return disabled;
  }

  const secret = authenticator.generateSecret(SECRET_BYTES);
  const registered = await registerMethod(deps, userId, "Authenticator app", {
    type: "TOTP",
    encryptedSecret: encryptSecret(secret, deps.config.totp.encryptionKey),
  });
  if (!registered.ok) return registered;

  deps.log.info({ userId, methodId: registered.value.id }, "totp_enrollment_started");

  return success({
    methodId: registered.value.id,
    secret,
    otpauthUri: authenticator.keyuri(accountName, deps.config.totp.issuer, secret),
  });
}

// ---------------------------------------------------------------------------
// Verifikation
// ---------------------------------------------------------------------------

export async function verifyTotp(
  deps: AuthDeps,
  userId: string,
  code: string,
): Promise<AuthResult<TotpVerification>> {
  const methods = (await findMethodsByType(deps, userId, "TOTP")).filter((method) => method.status === "ACTIVE");
  if (methods.length === 0) {
    return failure("NOT_FOUND", "totp_not_enrolled");
  }

  const now = deps.clock.now();
  const matched = findMatchingMethod(deps, methods, code, now);
  if (!matched) {
    deps.log.info({ userId }, "totp_mismatch");
    return failure("MISMATCH", "totp_mismatch");
  }

  const { method, step } = matched;
  const wasVerified = method.verified;

  const updated = await updateMethod(deps, method.id, (current) => {
    if (current.type !== "TOTP") return failure("VALIDATION_FAILED", "method_not_totp");
    if (current.lastAcceptedStep !== null && step <= current.lastAcceptedStep) {
      return failure("ALREADY_USED", "totp_code_already_used");
    }

    const next: AuthenticationMethod = {
      ...current,
      verified: true,
      lastVerifiedAt: current.verified ? current.lastVerifiedAt : now,
      lastUsedAt: now,
      lastAcceptedStep: step,
    };
    return success(next);
  });
  if (!updated.ok) {
    deps.log.info({ userId, methodId: method.id, reason: updated.reason }, "totp_rejected");
    return updated;
  }

  const assertion = await signFactorAssertion({
    userId,
    factor: "totp",
    methodId: method.id,
    now,
    ttlSec: deps.config.assertionTtlSec,
  });

  deps.log.info({ userId, methodId: method.id, enrolled: !wasVerified }, "totp_verified");
  return success({
    methodId: method.id,
    enrolled: !wasVerified,
    assertion: assertion.token,
    assertionExpiresAt: assertion.expiresAt,
  });
}

function findMatchingMethod(
  deps: AuthDeps,
  methods: TotpMethod[],
  code: string,
  now: Date,
): { method: TotpMethod; step: number } | null {
  for (const method of methods) {
    let secret: string;
    try {
      secret = decryptSecret(method.encryptedSecret, deps.config.totp.encryptionKey);
    } catch (err) {
      // z.B. nach Key-Rotation ohne Migration
      deps.log.error({ err, methodId: method.id }, "totp_secret_undecryptable");
      continue;
    }

    const step = matchTotpStep(code, secret, now, deps.config.totp.window);
    if (step !== null) return { method, step };
  }
  return null;
}
