// src/modules/push/service.ts
// ============================================================================
// Push Authentication Flow
// ----------------------------------------------------------------------------
// - initiate: Anfrage anlegen, alle konfigurierten Geraete benachrichtigen
// - approve / deny: Antwort eines Geraets des Besitzers (genau ein Gewinner)
// - cancel / claim: Aktionen des Initiators (haelt die Challenge)
// - status: Polling mit lazy Ablauf
// Jeder Uebergang laeuft ueber mutateDocument; ein verlorenes Rennen wird
// neu entschieden und endet als ALREADY_USED.
// ============================================================================

import { randomUUID } from "node:crypto";
import type { AuthDeps } from "../../deps.js";
import { addSeconds } from "../../libs/clock.js";
import { constantTimeEqual, randomToken } from "../../libs/crypto.js";
import { failure, success, type AuthFailure, type AuthResult } from "../../libs/errors.js";
import { signFactorAssertion } from "../../libs/jwt.js";
import { recordPushAuth } from "../../libs/metrics.js";
import { dispatchInBackground } from "../../libs/notify.js";
import { mutateDocument, sweepDocuments, type Decision } from "../../libs/store.js";
import { getMethod, isConfigured, listConfiguredMethods, registerMethod } from "../methods/service.js";
import type { PushMethod } from "../methods/types.js";
import type {
  PushAuthRequest,
  PushContext,
  PushInitiation,
  PushPurpose,
  PushStatus,
  PushStatusView,
} from "./types.js";

const CHALLENGE_BYTES = 32;

type Transition = Decision<PushAuthRequest, AuthResult<PushAuthRequest>>;

function describe(request: PushAuthRequest): PushStatusView {
  return {
    requestId: request.id,
    status: request.status,
    purpose: request.purpose,
    expiresAt: request.expiresAt.toISOString(),
    respondedAt: request.respondedAt ? request.respondedAt.toISOString() : null,
  };
}

function expire(current: PushAuthRequest, now: Date): Transition {
  return {
    result: failure("EXPIRED", "push_request_expired"),
    next: { ...current, status: "EXPIRED", updatedAt: now },
  };
}

function transition(
  current: PushAuthRequest,
  status: PushStatus,
  now: Date,
  patch: Partial<Pick<PushAuthRequest, "approvingSubscriptionId" | "respondedAt">> = {},
): Transition {
  const next: PushAuthRequest = { ...current, ...patch, status, updatedAt: now };
  return { result: success(next), next };
}

function logOutcome(deps: AuthDeps, event: string, requestId: string, result: AuthResult<unknown>) {
  recordPushAuth(result.ok ? event : `${event}_${result.kind.toLowerCase()}`);
  if (result.ok) {
    deps.log.info({ requestId }, `push_auth_${event}`);
  } else {
    deps.log.info({ requestId, kind: result.kind, reason: result.reason }, `push_auth_${event}_rejected`);
  }
}

// ---------------------------------------------------------------------------
// Geraete
// ---------------------------------------------------------------------------

/** Web-Push-Subscription als PUSH-Methode registrieren (Besitz durch Subscription belegt). */
export function registerPushDevice(
  deps: AuthDeps,
  userId: string,
  input: {
    endpoint: string;
    keys: { p256dh: string; auth: string };
    deviceName?: string | null;
  },
) {
  return registerMethod(
    deps,
    userId,
    input.deviceName ?? "Push device",
    { type: "PUSH", endpoint: input.endpoint, keys: input.keys, deviceName: input.deviceName ?? null },
    { verified: true },
  );
}

// ---------------------------------------------------------------------------
// Initiieren
// ---------------------------------------------------------------------------

export async function initiatePushAuth(
  deps: AuthDeps,
  input: {
    userId: string;
    purpose: PushPurpose;
    context: PushContext;
    recoveryRequestId?: string | null;
  },
): Promise<AuthResult<PushInitiation>> {
  const devices = await listConfiguredMethods(deps, input.userId, "PUSH");
  if (devices.length === 0) {
    recordPushAuth("initiate_no_device");
    return failure("NOT_FOUND", "no_push_device");
  }

  const now = deps.clock.now();
  const request: PushAuthRequest = {
    id: randomUUID(),
    version: 1,
    userId: input.userId,
    status: "PENDING",
    purpose: input.purpose,
    challenge: randomToken(CHALLENGE_BYTES),
    expiresAt: addSeconds(now, deps.config.push.ttlSec),
    respondedAt: null,
    approvingSubscriptionId: null,
    notificationsSent: 0,
    context: input.context,
    recoveryRequestId: input.recoveryRequestId ?? null,
    claimed: false,
    createdAt: now,
    updatedAt: now,
  };

  const created = await deps.stores.pushRequests.create(request);
  if (!created) {
    return failure("VALIDATION_FAILED", "push_request_id_conflict");
  }

  let notificationsSent = 0;
  for (const device of devices) {
    notifyDevice(deps, created, device);
    notificationsSent += 1;
  }

  // Zaehler nachtragen; ein Geraet kann schon geantwortet haben
  await mutateDocument<PushAuthRequest, boolean>(deps.stores.pushRequests, created.id, (current) =>
    current ? { result: true, next: { ...current, notificationsSent } } : { result: false },
  );

  recordPushAuth("initiated");
  deps.log.info(
    { userId: input.userId, requestId: created.id, purpose: input.purpose, notificationsSent },
    "push_auth_initiated",
  );

  return success({
    requestId: created.id,
    challenge: created.challenge,
    expiresAt: created.expiresAt,
    notificationsSent,
  });
}

function notifyDevice(deps: AuthDeps, request: PushAuthRequest, device: PushMethod) {
  const payload = {
    type: "push_auth",
    requestId: request.id,
    challenge: request.challenge,
    purpose: request.purpose,
    subscriptionId: device.id,
    expiresAt: request.expiresAt.toISOString(),
    context: request.context,
  };

  dispatchInBackground(deps.log, "push_dispatch", { requestId: request.id, methodId: device.id }, () =>
    deps.dispatcher.sendPush({ endpoint: device.endpoint, keys: device.keys }, payload),
  );
}

// ---------------------------------------------------------------------------
// Antwort des Geraets
// ---------------------------------------------------------------------------

/**
 * Gemeinsame Vorbedingungen fuer approve/deny, in dieser Reihenfolge:
 * UNAUTHORIZED, ALREADY_USED, EXPIRED (wird persistiert).
 */
function checkResponder(
  current: PushAuthRequest,
  userId: string,
  deviceFailure: AuthFailure | null,
  now: Date,
): Transition | null {
  if (current.userId !== userId) return { result: failure("UNAUTHORIZED", "push_request_not_owned") };
  if (deviceFailure) return { result: deviceFailure };
  if (current.status !== "PENDING") return { result: failure("ALREADY_USED", "push_request_already_resolved") };
  if (now >= current.expiresAt) return expire(current, now);
  return null;
}

async function resolveDevice(
  deps: AuthDeps,
  userId: string,
  subscriptionId: string,
): Promise<AuthFailure | null> {
  const device = await getMethod(deps, subscriptionId);
  if (!device || device.type !== "PUSH" || device.userId !== userId || !isConfigured(device)) {
    return failure("UNAUTHORIZED", "push_device_not_authorized");
  }
  return null;
}

export async function approvePushAuth(
  deps: AuthDeps,
  input: {
    requestId: string;
    challenge: string;
    subscriptionId: string;
    userId: string;
  },
): Promise<AuthResult<PushStatusView>> {
  const deviceFailure = await resolveDevice(deps, input.userId, input.subscriptionId);

  const now = deps.clock.now();
  const result = await mutateDocument<PushAuthRequest, AuthResult<PushAuthRequest>>(
    deps.stores.pushRequests,
    input.requestId,
    (current) => {
      if (!current) return { result: failure("NOT_FOUND", "push_request_not_found") };
      const rejected = checkResponder(current, input.userId, deviceFailure, now);
      if (rejected) return rejected;

      if (!constantTimeEqual(current.challenge, input.challenge)) {
        return { result: failure("VALIDATION_FAILED", "push_challenge_mismatch") };
      }

      return transition(current, "APPROVED", now, {
        approvingSubscriptionId: input.subscriptionId,
        respondedAt: now,
      });
    },
  );

  logOutcome(deps, "approved", input.requestId, result);
  return result.ok ? success(describe(result.value)) : result;
}

export async function denyPushAuth(
  deps: AuthDeps,
  input: { requestId: string; userId: string },
): Promise<AuthResult<PushStatusView>> {
  const now = deps.clock.now();
  const result = await mutateDocument<PushAuthRequest, AuthResult<PushAuthRequest>>(
    deps.stores.pushRequests,
    input.requestId,
    (current) => {
      if (!current) return { result: failure("NOT_FOUND", "push_request_not_found") };
      const rejected = checkResponder(current, input.userId, null, now);
      if (rejected) return rejected;
      return transition(current, "DENIED", now, { respondedAt: now });
    },
  );

  logOutcome(deps, "denied", input.requestId, result);
  return result.ok ? success(describe(result.value)) : result;
}

// ---------------------------------------------------------------------------
// Aktionen des Initiators
// ---------------------------------------------------------------------------

export async function cancelPushAuth(
  deps: AuthDeps,
  input: { requestId: string; challenge: string },
): Promise<AuthResult<PushStatusView>> {
  const now = deps.clock.now();
  const result = await mutateDocument<PushAuthRequest, AuthResult<PushAuthRequest>>(
    deps.stores.pushRequests,
    input.requestId,
    (current) => {
      if (!current) return { result: failure("NOT_FOUND", "push_request_not_found") };
      if (!constantTimeEqual(current.challenge, input.challenge)) {
        return { result: failure("VALIDATION_FAILED", "push_challenge_mismatch") };
      }
      if (current.status !== "PENDING") return { result: failure("ALREADY_USED", "push_request_already_resolved") };
      if (now >= current.expiresAt) return expire(current, now);
      return transition(current, "CANCELLED", now);
    },
  );

  logOutcome(deps, "cancelled", input.requestId, result);
  return result.ok ? success(describe(result.value)) : result;
}

/** Status fuer Polling; eine abgelaufene PENDING-Anfrage wird dabei als EXPIRED gespeichert. */
export async function getPushAuthStatus(
  deps: AuthDeps,
  requestId: string,
): Promise<AuthResult<PushStatusView>> {
  const now = deps.clock.now();
  const result = await mutateDocument<PushAuthRequest, AuthResult<PushAuthRequest>>(
    deps.stores.pushRequests,
    requestId,
    (current) => {
      if (!current) return { result: failure("NOT_FOUND", "push_request_not_found") };
      if (current.status === "PENDING" && now >= current.expiresAt) {
        const next: PushAuthRequest = { ...current, status: "EXPIRED", updatedAt: now };
        return { result: success(next), next };
      }
      return { result: success(current) };
    },
  );

  return result.ok ? success(describe(result.value)) : result;
}

/**
 * Tauscht eine APPROVED-Anfrage einmalig gegen eine Faktor-Assertion.
 */
export async function claimPushApproval(
  deps: AuthDeps,
  input: { requestId: string; challenge: string },
): Promise<AuthResult<{ userId: string; assertion: string; assertionExpiresAt: Date }>> {
  const now = deps.clock.now();
  const result = await mutateDocument<PushAuthRequest, AuthResult<PushAuthRequest>>(
    deps.stores.pushRequests,
    input.requestId,
    (current) => {
      if (!current) return { result: failure("NOT_FOUND", "push_request_not_found") };
      if (!constantTimeEqual(current.challenge, input.challenge)) {
        return { result: failure("VALIDATION_FAILED", "push_challenge_mismatch") };
      }

      switch (current.status) {
        case "PENDING":
          return now >= current.expiresAt
            ? expire(current, now)
            : { result: failure("NOT_READY", "push_request_pending") };
        case "DENIED":
          return { result: failure("UNAUTHORIZED", "push_request_denied") };
        case "EXPIRED":
          return { result: failure("EXPIRED", "push_request_expired") };
        case "CANCELLED":
          return { result: failure("ALREADY_USED", "push_request_cancelled") };
        case "APPROVED": {
          if (current.claimed) return { result: failure("ALREADY_USED", "push_approval_already_claimed") };
          const next: PushAuthRequest = { ...current, claimed: true, updatedAt: now };
          return { result: success(next), next };
        }
      }
    },
  );

  if (!result.ok) {
    logOutcome(deps, "claimed", input.requestId, result);
    return result;
  }

  const assertion = await signFactorAssertion({
    userId: result.value.userId,
    factor: "push",
    methodId: result.value.approvingSubscriptionId ?? undefined,
    now,
    ttlSec: deps.config.assertionTtlSec,
  });

  logOutcome(deps, "claimed", input.requestId, result);
  return success({
    userId: result.value.userId,
    assertion: assertion.token,
    assertionExpiresAt: assertion.expiresAt,
  });
}

// ---------------------------------------------------------------------------
// Massenoperationen
// ---------------------------------------------------------------------------

export async function sweepExpiredPushRequests(deps: AuthDeps): Promise<number> {
  const now = deps.clock.now();
  return sweepDocuments(deps.stores.pushRequests, now, (current) => {
    if (!current || current.status !== "PENDING" || current.expiresAt > now) {
      return { result: false };
    }
    return { result: true, next: { ...current, status: "EXPIRED", updatedAt: now } };
  }, deps.log);
}

/** Bricht alle offenen Anfragen eines Users ab (z.B. nach Recovery). */
export async function cancelAllPendingPush(deps: AuthDeps, userId: string): Promise<number> {
  const now = deps.clock.now();
  const requests = await deps.stores.pushRequests.queryByOwner(userId);
  let cancelled = 0;

  for (const request of requests) {
    if (request.status !== "PENDING") continue;
    const changed = await mutateDocument<PushAuthRequest, boolean>(deps.stores.pushRequests, request.id, (current) => {
      if (!current || current.status !== "PENDING") return { result: false };
      return { result: true, next: { ...current, status: "CANCELLED", updatedAt: now } };
    });
    if (changed) cancelled += 1;
  }

  if (cancelled > 0) {
    deps.log.info({ userId, cancelled }, "push_auth_bulk_cancelled");
  }
  return cancelled;
}
