// src/libs/jwt.ts
// ============================================================================
// JWT-Hilfen (JOSE)
// ----------------------------------------------------------------------------
// Design:
// - HS256 Symmetric Key (JWT_SECRET_ACTIVE via env.ts, secrets-first)
// - Access-Tokens werden downstream gemintet; hier nur verifiziert
// - Selbst ausgestellt werden nur zwei kurzlebige Credentials fuer den
//   Session-Issuer:
//   * typ="recovery"          nach abgeschlossener Account-Recovery
//   * typ="factor_assertion"  nach erfolgreich verifiziertem Faktor
// - Signieren nimmt "now" explizit entgegen (injizierte Clock)
// ============================================================================

import { randomUUID } from "node:crypto";
import { SignJWT, jwtVerify, type JWTPayload } from "jose";
import { toEpochSeconds } from "./clock.js";
import { env } from "./env.js";

// ---------------------------------------------------------------------------
// JWT Secret laden (secrets-first via env.ts)
// ---------------------------------------------------------------------------

const activeRawSecret = env.JWT_SECRET_ACTIVE;
const previousRawSecret = env.JWT_SECRET_PREVIOUS;

if (!activeRawSecret) {
  // Kein unsicherer Fallback (auch nicht in dev/test) -> bewusstes Setup erzwingen
  throw new Error("JWT Secret fehlt: setze JWT_SECRET_ACTIVE oder JWT_SECRET_ACTIVE_FILE.");
}

const activeSecret = new TextEncoder().encode(activeRawSecret);
const previousSecret = previousRawSecret
  ? new TextEncoder().encode(previousRawSecret)
  : undefined;

const JWT_ISSUER = env.JWT_ISSUER;
const JWT_AUDIENCE = env.JWT_AUDIENCE;

export const RECOVERY_SCOPE = "account:recover";

// ---------------------------------------------------------------------------
// Payload-Typen
// ---------------------------------------------------------------------------

export interface AccessTokenPayload extends JWTPayload {
  sub: string;
  jti: string;
  typ: "access";
  scope?: string;
}

export interface RecoveryTokenPayload extends JWTPayload {
  sub: string;
  jti: string;
  typ: "recovery";
  rid: string;
  scope: typeof RECOVERY_SCOPE;
}

export type AssertedFactor = "totp" | "passkey" | "sms_otp" | "email_otp" | "push";

export interface FactorAssertionPayload extends JWTPayload {
  sub: string;
  jti: string;
  typ: "factor_assertion";
  amr: AssertedFactor[];
  mid?: string;
}

// ---------------------------------------------------------------------------
// Intern: signieren / verifizieren mit Rotation
// ---------------------------------------------------------------------------

async function sign(
  claims: Record<string, unknown>,
  sub: string,
  now: Date,
  ttlSec: number,
): Promise<{ token: string; jti: string; expiresAt: Date }> {
  const jti = randomUUID();
  const iat = toEpochSeconds(now);
  const exp = iat + ttlSec;

  const token = await new SignJWT(claims)
    .setProtectedHeader({
      alg: "HS256",
      ...(env.JWT_ACTIVE_KID ? { kid: env.JWT_ACTIVE_KID } : {}),
    })
    .setSubject(sub)
    .setJti(jti)
    .setIssuedAt(iat)
    .setExpirationTime(exp)
    .setIssuer(JWT_ISSUER)
    .setAudience(JWT_AUDIENCE)
    .sign(activeSecret);

  return { token, jti, expiresAt: new Date(exp * 1000) };
}

async function verify(token: string, now?: Date): Promise<JWTPayload> {
  const verifyOptions = {
    issuer: JWT_ISSUER,
    audience: JWT_AUDIENCE,
    clockTolerance: env.JWT_CLOCK_SKEW_SEC,
    ...(now ? { currentDate: now } : {}),
  };

  try {
    const verified = await jwtVerify(token, activeSecret, verifyOptions);
    return verified.payload;
  } catch (activeError) {
    if (!previousSecret) {
      throw activeError;
    }
    const verified = await jwtVerify(token, previousSecret, verifyOptions);
    return verified.payload;
  }
}

function requireString(payload: JWTPayload, claim: string): string {
  const value = payload[claim];
  if (typeof value !== "string" || value.length === 0) {
    throw new Error(`${claim}_missing`);
  }
  return value;
}

// ---------------------------------------------------------------------------
// Access-Token (downstream gemintet) verifizieren
// ---------------------------------------------------------------------------

export async function verifyAccessToken(token: string): Promise<AccessTokenPayload> {
  const payload = await verify(token);

  if (payload.typ !== "access") {
    throw new Error("invalid_token_type");
  }

  const sub = requireString(payload, "sub");
  const jti = requireString(payload, "jti");
  const scope = typeof payload.scope === "string" ? payload.scope : undefined;

  return { ...payload, sub, jti, typ: "access", scope };
}

// ---------------------------------------------------------------------------
// Recovery-Credential
// ---------------------------------------------------------------------------

export async function signRecoveryToken(input: {
  userId: string;
  recoveryId: string;
  now: Date;
  ttlSec: number;
}) {
  return sign(
    { typ: "recovery", rid: input.recoveryId, scope: RECOVERY_SCOPE },
    input.userId,
    input.now,
    input.ttlSec,
  );
}

export async function verifyRecoveryToken(token: string, now?: Date): Promise<RecoveryTokenPayload> {
  const payload = await verify(token, now);

  if (payload.typ !== "recovery" || payload.scope !== RECOVERY_SCOPE) {
    throw new Error("invalid_token_type");
  }

  return {
    ...payload,
    sub: requireString(payload, "sub"),
    jti: requireString(payload, "jti"),
    rid: requireString(payload, "rid"),
    typ: "recovery",
    scope: RECOVERY_SCOPE,
  };
}

// ---------------------------------------------------------------------------
// Faktor-Assertion
// ---------------------------------------------------------------------------

const ASSERTED_FACTORS: readonly AssertedFactor[] = ["totp", "passkey", "sms_otp", "email_otp", "push"];

function isAssertedFactor(value: unknown): value is AssertedFactor {
  return ASSERTED_FACTORS.some((factor) => factor === value);
}

export async function signFactorAssertion(input: {
  userId: string;
  factor: AssertedFactor;
  methodId?: string;
  now: Date;
  ttlSec: number;
}) {
  return sign(
    {
      typ: "factor_assertion",
      amr: [input.factor],
      ...(input.methodId ? { mid: input.methodId } : {}),
    },
    input.userId,
    input.now,
    input.ttlSec,
  );
}

export async function verifyFactorAssertion(
  token: string,
  now?: Date,
): Promise<FactorAssertionPayload> {
  const payload = await verify(token, now);

  if (payload.typ !== "factor_assertion") {
    throw new Error("invalid_token_type");
  }

  const amr = Array.isArray(payload.amr) ? payload.amr.filter(isAssertedFactor) : [];
  if (amr.length === 0) {
    throw new Error("amr_missing");
  }

  return {
    ...payload,
    sub: requireString(payload, "sub"),
    jti: requireString(payload, "jti"),
    typ: "factor_assertion",
    amr,
    mid: typeof payload.mid === "string" ? payload.mid : undefined,
  };
}
