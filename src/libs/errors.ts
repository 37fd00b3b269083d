// src/libs/errors.ts
// ============================================================================
// Typisierte Ergebnisse der Faktor-Flows
// ----------------------------------------------------------------------------
// Fachliche Fehler (Ablauf, Replay, Lockout, ...) werden als Wert
// zurueckgegeben, nicht geworfen. Geworfen wird nur bei Infrastruktur-
// Fehlern (DB weg, CAS-Retries erschoepft); die landen im Fastify-Error-Handler.
// ============================================================================

import type { FastifyReply } from "fastify";
import { sendApiError } from "./error-response.js";

export const AUTH_ERROR_KINDS = [
  "NOT_FOUND",
  "EXPIRED",
  "ALREADY_USED",
  "RATE_LIMITED",
  "ATTEMPTS_EXCEEDED",
  "UNAUTHORIZED",
  "NOT_READY",
  "VALIDATION_FAILED",
  "MISMATCH",
] as const;

export type AuthErrorKind = (typeof AUTH_ERROR_KINDS)[number];

export type AuthFailure = {
  ok: false;
  kind: AuthErrorKind;
  reason: string;
  /** Sekunden bis zum naechsten erlaubten Versuch (nur RATE_LIMITED). */
  retryAfterSec?: number;
};

export type AuthResult<T> = { ok: true; value: T } | AuthFailure;

export function success<T>(value: T): AuthResult<T> {
  return { ok: true, value };
}

export function failure(
  kind: AuthErrorKind,
  reason: string,
  retryAfterSec?: number,
): AuthFailure {
  return retryAfterSec === undefined
    ? { ok: false, kind, reason }
    : { ok: false, kind, reason, retryAfterSec };
}

const STATUS_BY_KIND: Record<AuthErrorKind, number> = {
  NOT_FOUND: 404,
  EXPIRED: 410,
  ALREADY_USED: 409,
  RATE_LIMITED: 429,
  ATTEMPTS_EXCEEDED: 423,
  UNAUTHORIZED: 403,
  NOT_READY: 409,
  VALIDATION_FAILED: 400,
  MISMATCH: 401,
};

export function statusForKind(kind: AuthErrorKind): number {
  return STATUS_BY_KIND[kind];
}

export function sendAuthFailure(reply: FastifyReply, result: AuthFailure) {
  if (result.retryAfterSec !== undefined) {
    reply.header("Retry-After", String(Math.max(1, result.retryAfterSec)));
  }
  return sendApiError(reply, statusForKind(result.kind), result.kind, result.reason);
}

/** CAS-Schleife hat nach allen Retries keinen Schreibslot bekommen. */
export class StoreConflictError extends Error {
  readonly statusCode = 503;
  readonly code = "STORE_CONFLICT";

  constructor(collection: string, id: string) {
    super(`Concurrent modification on ${collection}/${id}`);
    this.name = "StoreConflictError";
  }
}
