// src/modules/passkeys/service.ts
// ============================================================================
// Passkey Challenge Service
// ----------------------------------------------------------------------------
// Ablauf Authentifizierung:
//   1) beginCeremony: 32-Byte-Nonce, TTL aus Config, used=false
//   2) completeCeremony:
//      - Credential global aufloesen (nicht nur im Konto des Anfragenden)
//      - Signatur pruefen (PasskeyVerifier)
//      - Challenge pruefen + atomar verbrauchen (CAS, genau ein Gewinner)
//      - signCount / lastUsedAt der Methode nachziehen
//      - Faktor-Assertion fuer den Session-Issuer ausstellen
// ============================================================================

import { randomUUID } from "node:crypto";
import type { AuthDeps } from "../../deps.js";
import { addSeconds } from "../../libs/clock.js";
import { randomToken } from "../../libs/crypto.js";
import { failure, success, type AuthResult } from "../../libs/errors.js";
import { signFactorAssertion } from "../../libs/jwt.js";
import { recordPasskeyCeremony } from "../../libs/metrics.js";
import { mutateDocument, sweepDocuments } from "../../libs/store.js";
import {
  findPasskeyByCredentialId,
  listConfiguredMethods,
  registerMethod,
  updateMethod,
} from "../methods/service.js";
import type { AuthenticationMethod, PasskeyMethod } from "../methods/types.js";
import { findChallengeByValue } from "./repository.js";
import type {
  AuthenticationCompletion,
  AuthenticationResponse,
  CeremonyPurpose,
  CeremonyStart,
  PasskeyChallenge,
  RegistrationResponse,
} from "./types.js";

const CHALLENGE_BYTES = 32;

export type CeremonyOptions = CeremonyStart & {
  purpose: CeremonyPurpose;
  /** Bekannte Credentials des Users (allow- bzw. excludeCredentials). */
  credentials: { id: string; transports: string[] }[];
};

// ---------------------------------------------------------------------------
// Start
// ---------------------------------------------------------------------------

export async function beginCeremony(
  deps: AuthDeps,
  purpose: CeremonyPurpose,
  userId?: string | null,
): Promise<AuthResult<CeremonyOptions>> {
  if (purpose === "registration" && !userId) {
    return failure("VALIDATION_FAILED", "registration_requires_user");
  }

  const cfg = deps.config.passkey;
  const now = deps.clock.now();
  const challenge: PasskeyChallenge = {
    id: randomUUID(),
    version: 1,
    challenge: randomToken(CHALLENGE_BYTES),
    userId: userId ?? null,
    purpose,
    sessionId: randomUUID(),
    createdAt: now,
    expiresAt: addSeconds(now, cfg.challengeTtlSec),
    used: false,
    usedAt: null,
  };

  const created = await deps.stores.challenges.create(challenge);
  if (!created) {
    return failure("VALIDATION_FAILED", "challenge_id_conflict");
  }

  const known: PasskeyMethod[] = userId ? await listConfiguredMethods(deps, userId, "PASSKEY") : [];

  deps.log.info({ purpose, userId: userId ?? null, sessionId: created.sessionId }, "passkey_challenge_issued");

  return success({
    purpose,
    challenge: created.challenge,
    sessionId: created.sessionId,
    expiresAt: created.expiresAt,
    timeoutMs: cfg.challengeTtlSec * 1000,
    rpId: cfg.rpId,
    credentials: known.map((method) => ({ id: method.credentialId, transports: method.transports })),
  });
}

// ---------------------------------------------------------------------------
// Challenge verbrauchen
// ---------------------------------------------------------------------------

/**
 * Prueft die Challenge und setzt used=true. Bei einem verlorenen Rennen wird
 * neu gelesen und erneut entschieden: der Verlierer sieht ALREADY_USED.
 */
async function consumeChallenge(
  deps: AuthDeps,
  value: string,
  purpose: CeremonyPurpose,
  userId: string,
): Promise<AuthResult<PasskeyChallenge>> {
  const found = await findChallengeByValue(deps.stores.challenges, value);
  if (!found) {
    return failure("NOT_FOUND", "challenge_not_found");
  }

  const now = deps.clock.now();

  return mutateDocument<PasskeyChallenge, AuthResult<PasskeyChallenge>>(
    deps.stores.challenges,
    found.id,
    (current) => {
      if (!current) return { result: failure("NOT_FOUND", "challenge_not_found") };
      if (current.purpose !== purpose) return { result: failure("VALIDATION_FAILED", "challenge_purpose_mismatch") };
      if (current.userId && current.userId !== userId) {
        return { result: failure("UNAUTHORIZED", "challenge_bound_to_other_user") };
      }
      if (now >= current.expiresAt) return { result: failure("EXPIRED", "challenge_expired") };
      if (current.used) return { result: failure("ALREADY_USED", "challenge_already_used") };

      const next: PasskeyChallenge = { ...current, used: true, usedAt: now };
      return { result: success(next), next };
    },
  );
}

// ---------------------------------------------------------------------------
// Authentifizierung abschliessen
// ---------------------------------------------------------------------------

export async function completeCeremony(
  deps: AuthDeps,
  input: {
    challenge: string;
    credentialId: string;
    response: AuthenticationResponse;
  },
): Promise<AuthResult<AuthenticationCompletion>> {
  const result = await completeAuthentication(deps, input);
  recordPasskeyCeremony("authentication", result.ok ? "ok" : result.kind.toLowerCase());

  if (!result.ok) {
    deps.log.info(
      { credentialId: `${input.credentialId.slice(0, 8)}...`, kind: result.kind, reason: result.reason },
      "passkey_authentication_failed",
    );
  }
  return result;
}

async function completeAuthentication(
  deps: AuthDeps,
  input: {
    challenge: string;
    credentialId: string;
    response: AuthenticationResponse;
  },
): Promise<AuthResult<AuthenticationCompletion>> {
  if (input.response.id !== input.credentialId) {
    return failure("VALIDATION_FAILED", "credential_id_mismatch");
  }

  // (a) global: die Challenge sagt vorab nicht, welcher User sich anmeldet
  const method = await findPasskeyByCredentialId(deps, input.credentialId);
  if (!method) {
    return failure("NOT_FOUND", "credential_not_found");
  }

  // (b)
  const check = await deps.passkeyVerifier.verifyAuthentication({
    response: input.response,
    expectedChallenge: input.challenge,
    credential: {
      credentialId: method.credentialId,
      publicKey: method.publicKey,
      signCount: method.signCount,
      transports: method.transports,
    },
  });
  if (!check.verified) {
    return failure("VALIDATION_FAILED", "assertion_invalid");
  }

  // (c) + (d)
  const consumed = await consumeChallenge(deps, input.challenge, "authentication", method.userId);
  if (!consumed.ok) return consumed;

  // (e) Zaehler darf nicht zuruecklaufen (geklonter Authenticator)
  const newSignCount = check.newSignCount;
  const updated = await updateMethod(deps, method.id, (current, now) => {
    if (current.type !== "PASSKEY") return failure("VALIDATION_FAILED", "method_not_passkey");
    if (current.status !== "ACTIVE") return failure("UNAUTHORIZED", "method_disabled");

    // Authenticatoren ohne Zaehler melden konstant 0
    const counterInUse = current.signCount > 0 && newSignCount > 0;
    if (counterInUse && newSignCount <= current.signCount) {
      return failure("VALIDATION_FAILED", "sign_count_regression");
    }

    const next: AuthenticationMethod = { ...current, signCount: newSignCount, lastUsedAt: now };
    return success(next);
  });
  if (!updated.ok) {
    if (updated.reason === "sign_count_regression") {
      deps.log.warn({ userId: method.userId, methodId: method.id }, "passkey_sign_count_regression");
    }
    return updated;
  }

  const assertion = await signFactorAssertion({
    userId: method.userId,
    factor: "passkey",
    methodId: method.id,
    now: deps.clock.now(),
    ttlSec: deps.config.assertionTtlSec,
  });

  deps.log.info({ userId: method.userId, methodId: method.id }, "passkey_authenticated");

  return success({
    userId: method.userId,
    methodId: method.id,
    assertion: assertion.token,
    assertionExpiresAt: assertion.expiresAt,
  });
}

// ---------------------------------------------------------------------------
// Registrierung abschliessen
// ---------------------------------------------------------------------------

export async function completeRegistration(
  deps: AuthDeps,
  userId: string,
  input: {
    challenge: string;
    response: RegistrationResponse;
    name: string;
  },
): Promise<AuthResult<PasskeyMethod>> {
  const check = await deps.passkeyVerifier.verifyRegistration({
    response: input.response,
    expectedChallenge: input.challenge,
  });
  if (!check.verified) {
    recordPasskeyCeremony("registration", "validation_failed");
    return failure("VALIDATION_FAILED", "attestation_invalid");
  }

  const consumed = await consumeChallenge(deps, input.challenge, "registration", userId);
  if (!consumed.ok) {
    recordPasskeyCeremony("registration", consumed.kind.toLowerCase());
    return consumed;
  }

  // Besitz ist durch die Attestation bewiesen -> direkt verifiziert
  const registered = await registerMethod(
    deps,
    userId,
    input.name,
    {
      type: "PASSKEY",
      credentialId: check.credential.credentialId,
      publicKey: check.credential.publicKey,
      signCount: check.credential.signCount,
      transports: check.credential.transports,
    },
    { verified: true },
  );

  recordPasskeyCeremony("registration", registered.ok ? "ok" : registered.kind.toLowerCase());
  if (!registered.ok) return registered;

  if (registered.value.type !== "PASSKEY") {
    return failure("VALIDATION_FAILED", "method_not_passkey");
  }
  return success(registered.value);
}

// ---------------------------------------------------------------------------
// Bereinigung
// ---------------------------------------------------------------------------

/** Loescht abgelaufene Challenges (benutzt oder nicht). */
export async function sweepExpiredChallenges(deps: AuthDeps): Promise<number> {
  const now = deps.clock.now();
  return sweepDocuments(deps.stores.challenges, now, (current) => {
    if (!current || current.expiresAt > now) return { result: false };
    return { result: true, remove: true };
  }, deps.log);
}
