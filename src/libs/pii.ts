// src/libs/pii.ts
// Ziele (E-Mail, Telefon, IP) nie roh loggen oder an Clients spiegeln.

import { createHash } from "node:crypto";

export function sha256(value: string): string {
  return createHash("sha256").update(value, "utf8").digest("hex");
}

export function hashEmailForLog(email: string): string {
  return sha256(email.trim().toLowerCase());
}

export function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}

/** E.164 ohne Trennzeichen: "+49 151 234-567" -> "+49151234567". */
export function normalizePhone(phone: string): string {
  return phone.replace(/[\s\-().]/g, "");
}

/** "alice@example.test" -> "al**@example.test" */
export function maskEmail(email: string): string {
  const at = email.indexOf("@");
  if (at <= 0) return "***";
  const local = email.slice(0, at);
  const domain = email.slice(at + 1);
  const visible = local.length > 2 ? local.slice(0, 2) : local.slice(0, 1);
  return `${visible}**@${domain}`;
}

/** "+49151234567" -> "***-***-4567" */
export function maskPhone(phone: string): string {
  const digits = phone.replace(/\D/g, "");
  if (digits.length < 4) return "***-***-****";
  return `***-***-${digits.slice(-4)}`;
}
