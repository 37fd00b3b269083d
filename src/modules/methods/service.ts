// src/modules/methods/service.ts
// ============================================================================
// Authentication Method Registry
// ----------------------------------------------------------------------------
// Quelle der Wahrheit fuer "hat User X Faktor Y aktiv?". Alle Flows (OTP,
// Passkey, Push, Recovery) fragen hier nach, bevor sie handeln.
// Methoden werden nur deaktiviert, nie geloescht.
// ============================================================================

import { randomUUID } from "node:crypto";
import type { AuthDeps } from "../../deps.js";
import { failure, success, type AuthResult } from "../../libs/errors.js";
import { maskEmail, maskPhone } from "../../libs/pii.js";
import { mutateDocument } from "../../libs/store.js";
import {
  emailKey,
  findMethodsByTargetKey,
  listMethodsByUser,
  passkeyKey,
  phoneKey,
  pushKey,
  targetKeyOf,
} from "./repository.js";
import type {
  AuthenticationMethod,
  MethodOfType,
  MethodRegistration,
  MethodStatus,
  MethodType,
  MethodView,
  PasskeyMethod,
} from "./types.js";

// Faktoren, die als zweiter Faktor zaehlen (Recovery verlangt dann SMS)
const MFA_TYPES: ReadonlySet<MethodType> = new Set<MethodType>(["TOTP", "PASSKEY", "SMS_OTP"]);

// ---------------------------------------------------------------------------
// Pure Helfer
// ---------------------------------------------------------------------------

export function isConfigured(method: AuthenticationMethod): boolean {
  if (!method.verified || method.status !== "ACTIVE") return false;

  switch (method.type) {
    case "TOTP":
      return method.encryptedSecret.length > 0;
    case "PASSKEY":
      return method.credentialId.length > 0 && method.publicKey.length > 0;
    case "SMS_OTP":
      return method.phoneNumber.length > 0;
    case "EMAIL_OTP":
      return method.email.length > 0;
    case "PUSH":
      return method.endpoint.length > 0 && method.keys.p256dh.length > 0 && method.keys.auth.length > 0;
  }
}

function hintFor(method: AuthenticationMethod): string | null {
  switch (method.type) {
    case "TOTP":
      return null;
    case "PASSKEY":
      return `${method.credentialId.slice(0, 8)}...`;
    case "SMS_OTP":
      return maskPhone(method.phoneNumber);
    case "EMAIL_OTP":
      return maskEmail(method.email);
    case "PUSH":
      return method.deviceName;
  }
}

export function describeMethod(method: AuthenticationMethod): MethodView {
  return {
    id: method.id,
    type: method.type,
    name: method.name,
    status: method.status,
    verified: method.verified,
    configured: isConfigured(method),
    hint: hintFor(method),
    createdAt: method.createdAt.toISOString(),
    lastUsedAt: method.lastUsedAt ? method.lastUsedAt.toISOString() : null,
  };
}

type MethodEnvelope = Omit<AuthenticationMethod, "type">;

function buildMethod(
  base: MethodEnvelope,
  input: MethodRegistration,
): AuthenticationMethod {
  switch (input.type) {
    case "TOTP":
      return { ...base, type: "TOTP", encryptedSecret: input.encryptedSecret, lastAcceptedStep: null };
    case "PASSKEY":
      return {
        ...base,
        type: "PASSKEY",
        credentialId: input.credentialId,
        publicKey: input.publicKey,
        signCount: input.signCount,
        transports: input.transports,
      };
    case "SMS_OTP":
      return { ...base, type: "SMS_OTP", phoneNumber: input.phoneNumber, dailySendCount: 0, dailyCountResetAt: null };
    case "EMAIL_OTP":
      return {
        ...base,
        type: "EMAIL_OTP",
        email: input.email.trim().toLowerCase(),
        dailySendCount: 0,
        dailyCountResetAt: null,
      };
    case "PUSH":
      return { ...base, type: "PUSH", endpoint: input.endpoint, keys: input.keys, deviceName: input.deviceName };
  }
}

function registrationKey(input: MethodRegistration): string | null {
  switch (input.type) {
    case "TOTP":
      return null;
    case "PASSKEY":
      return passkeyKey(input.credentialId);
    case "SMS_OTP":
      return phoneKey(input.phoneNumber);
    case "EMAIL_OTP":
      return emailKey(input.email);
    case "PUSH":
      return pushKey(input.endpoint);
  }
}

// ---------------------------------------------------------------------------
// Registrierung
// ---------------------------------------------------------------------------

export async function registerMethod(
  deps: AuthDeps,
  userId: string,
  name: string,
  input: MethodRegistration,
  opts: { verified?: boolean } = {},
): Promise<AuthResult<AuthenticationMethod>> {
  const key = registrationKey(input);

  if (key) {
    const existing = await listMethodsByUser(deps.stores.methods, userId);
    const duplicate = existing.some(
      (method) => method.status === "ACTIVE" && method.type === input.type && targetKeyOf(method) === key,
    );
    if (duplicate) {
      return failure("VALIDATION_FAILED", "method_already_registered");
    }
  }

  // Credential-Ids sind global eindeutig, sonst waere der Login mehrdeutig
  if (input.type === "PASSKEY" && key) {
    const holders = await findMethodsByTargetKey(deps.stores.methods, key);
    if (holders.length > 0) {
      return failure("VALIDATION_FAILED", "credential_already_registered");
    }
  }

  const now = deps.clock.now();
  const verified = opts.verified ?? false;
  const method = buildMethod(
    {
      id: randomUUID(),
      version: 1,
      userId,
      name,
      status: "ACTIVE",
      verified,
      createdAt: now,
      updatedAt: now,
      lastUsedAt: null,
      lastVerifiedAt: verified ? now : null,
    },
    input,
  );

  const created = await deps.stores.methods.create(method);
  if (!created) {
    return failure("VALIDATION_FAILED", "method_id_conflict");
  }

  deps.log.info({ userId, methodId: created.id, type: created.type }, "method_registered");
  return success(created);
}

// ---------------------------------------------------------------------------
// Abfragen
// ---------------------------------------------------------------------------

export async function getMethod(deps: AuthDeps, methodId: string): Promise<AuthenticationMethod | null> {
  return deps.stores.methods.get(methodId);
}

export async function listAllMethods(deps: AuthDeps, userId: string): Promise<AuthenticationMethod[]> {
  return listMethodsByUser(deps.stores.methods, userId);
}

export async function listEnabledMethods(deps: AuthDeps, userId: string): Promise<AuthenticationMethod[]> {
  const methods = await listMethodsByUser(deps.stores.methods, userId);
  return methods.filter((method) => method.status === "ACTIVE");
}

export async function findMethodsByType<K extends MethodType>(
  deps: AuthDeps,
  userId: string,
  type: K,
): Promise<MethodOfType<K>[]> {
  const methods = await listMethodsByUser(deps.stores.methods, userId);
  return methods.filter((method): method is MethodOfType<K> => method.type === type);
}

export async function listConfiguredMethods<K extends MethodType>(
  deps: AuthDeps,
  userId: string,
  type: K,
): Promise<MethodOfType<K>[]> {
  const methods = await findMethodsByType(deps, userId, type);
  return methods.filter(isConfigured);
}

/** Globaler Lookup: Credential-Id -> aktive Passkey-Methode (beliebiger User). */
export async function findPasskeyByCredentialId(
  deps: AuthDeps,
  credentialId: string,
): Promise<PasskeyMethod | null> {
  const holders = await findMethodsByTargetKey(deps.stores.methods, passkeyKey(credentialId));
  const match = holders.find(
    (method): method is PasskeyMethod =>
      method.type === "PASSKEY" && method.status === "ACTIVE" && method.credentialId === credentialId,
  );
  return match ?? null;
}

/** Globaler Lookup eines konfigurierten SMS-/E-Mail-Faktors. */
export async function findConfiguredTargetMethod(
  deps: AuthDeps,
  type: "SMS_OTP" | "EMAIL_OTP",
  target: string,
): Promise<MethodOfType<"SMS_OTP" | "EMAIL_OTP"> | null> {
  const key = type === "SMS_OTP" ? phoneKey(target) : emailKey(target);
  const holders = await findMethodsByTargetKey(deps.stores.methods, key);
  const match = holders.find(
    (method): method is MethodOfType<"SMS_OTP" | "EMAIL_OTP"> =>
      method.type === type && isConfigured(method),
  );
  return match ?? null;
}

export async function hasMfaEnabled(deps: AuthDeps, userId: string): Promise<boolean> {
  const methods = await listMethodsByUser(deps.stores.methods, userId);
  return methods.some((method) => MFA_TYPES.has(method.type) && isConfigured(method));
}

export async function findRecoveryPhone(deps: AuthDeps, userId: string): Promise<string | null> {
  const phones = await listConfiguredMethods(deps, userId, "SMS_OTP");
  return phones[0]?.phoneNumber ?? null;
}

// ---------------------------------------------------------------------------
// Zustandsaenderungen
// ---------------------------------------------------------------------------

/**
 * Read-decide-write auf einer Methode. change liefert die neue Methode oder
 * null fuer "keine Aenderung".
 */
export async function updateMethod(
  deps: AuthDeps,
  methodId: string,
  change: (method: AuthenticationMethod, now: Date) => AuthResult<AuthenticationMethod | null>,
): Promise<AuthResult<AuthenticationMethod>> {
  const now = deps.clock.now();

  return mutateDocument<AuthenticationMethod, AuthResult<AuthenticationMethod>>(deps.stores.methods, methodId, (current) => {
    if (!current) {
      return { result: failure("NOT_FOUND", "method_not_found") };
    }

    const decided = change(current, now);
    if (!decided.ok) return { result: decided };
    if (!decided.value) return { result: success(current) };

    const next = { ...decided.value, updatedAt: now };
    return { result: success(next), next };
  });
}

async function setMethodStatus(
  deps: AuthDeps,
  userId: string,
  methodId: string,
  status: MethodStatus,
): Promise<AuthResult<AuthenticationMethod>> {
  const result = await updateMethod(deps, methodId, (method) => {
    if (method.userId !== userId) return failure("UNAUTHORIZED", "method_not_owned");
    if (method.status === status) return success(null);
    return success({ ...method, status });
  });

  if (result.ok) {
    deps.log.info({ userId, methodId, status }, "method_status_changed");
  }
  return result;
}

export function disableMethod(deps: AuthDeps, userId: string, methodId: string) {
  return setMethodStatus(deps, userId, methodId, "DISABLED");
}

export function enableMethod(deps: AuthDeps, userId: string, methodId: string) {
  return setMethodStatus(deps, userId, methodId, "ACTIVE");
}

export function markMethodVerified(deps: AuthDeps, methodId: string) {
  return updateMethod(deps, methodId, (method, now) =>
    success({ ...method, verified: true, lastVerifiedAt: now }),
  );
}

export function markMethodUsed(deps: AuthDeps, methodId: string) {
  return updateMethod(deps, methodId, (method, now) => success({ ...method, lastUsedAt: now }));
}

/** Spiegelt den Tageszaehler des OTP-Ziels in die SMS-/E-Mail-Methode. */
export function noteOtpSent(
  deps: AuthDeps,
  methodId: string,
  dailySendCount: number,
  dailyCountResetAt: Date,
) {
  return updateMethod(deps, methodId, (method) => {
    if (method.type !== "SMS_OTP" && method.type !== "EMAIL_OTP") {
      return failure("VALIDATION_FAILED", "method_has_no_send_counter");
    }
    return success({ ...method, dailySendCount, dailyCountResetAt });
  });
}
