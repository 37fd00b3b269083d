// src/modules/otp/repository.ts
// ============================================================================
// Collection "otp_codes" (ein Dokument pro Kanal + Ziel)
// ----------------------------------------------------------------------------
// Die Dokument-Id ist ein Hash aus Kanal und normalisiertem Ziel; das Ziel
// selbst wird nie gespeichert, nur maskiert fuer Logs.
// ============================================================================

import { addSeconds } from "../../libs/clock.js";
import { sha256Hex } from "../../libs/crypto.js";
import { maskEmail, maskPhone, normalizeEmail, normalizePhone } from "../../libs/pii.js";
import type { CollectionSpec, DocumentStore } from "../../libs/store.js";
import { OtpTargetSchema, type OtpChannel, type OtpTarget } from "./types.js";

export const DAILY_WINDOW_SEC = 24 * 60 * 60;

export function normalizeTarget(channel: OtpChannel, target: string): string {
  return channel === "email" ? normalizeEmail(target) : normalizePhone(target);
}

export function maskTarget(channel: OtpChannel, target: string): string {
  return channel === "email" ? maskEmail(target) : maskPhone(target);
}

export function otpTargetId(channel: OtpChannel, target: string): string {
  return sha256Hex(`${channel}:${normalizeTarget(channel, target)}`);
}

/** Naechster Zeitpunkt, an dem die Bereinigung etwas zu tun hat. */
function nextHousekeepingAt(doc: OtpTarget): Date | null {
  const instants = doc.codes.map((code) => code.expiresAt.getTime());
  if (doc.dailyWindowStartedAt) {
    instants.push(addSeconds(doc.dailyWindowStartedAt, DAILY_WINDOW_SEC).getTime());
  }
  return instants.length > 0 ? new Date(Math.min(...instants)) : null;
}

export const otpTargetCollection: CollectionSpec<OtpTarget> = {
  name: "otp_codes",
  schema: OtpTargetSchema,
  ownerOf: () => null,
  globalKeysOf: () => [],
  expiresAtOf: nextHousekeepingAt,
};

export type OtpTargetStore = DocumentStore<OtpTarget>;
