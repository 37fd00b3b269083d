// src/libs/crypto.ts
// ============================================================================
// Krypto-Helfer fuer Faktoren
// ----------------------------------------------------------------------------
// - Zufallswerte: Challenges, Ids, numerische OTP-Codes
// - OTP-Hash: HMAC-SHA256(pepper, salt:code), Pepper-Rotation via Kandidaten
// - Konstantzeit-Vergleich
// - AES-256-GCM fuer TOTP-Secrets at rest
// ============================================================================

import {
  createCipheriv,
  createDecipheriv,
  createHash,
  createHmac,
  randomBytes,
  randomInt,
  timingSafeEqual,
} from "node:crypto";

// ---------------------------------------------------------------------------
// Zufall
// ---------------------------------------------------------------------------

/** base64url-kodierte Zufallsbytes (Challenges, Anti-Replay-Token). */
export function randomToken(bytes = 32): string {
  return randomBytes(bytes).toString("base64url");
}

/** N-stelliger Code, gleichverteilt ueber 0..10^N-1. */
export function generateNumericCode(length: number): string {
  let code = "";
  for (let i = 0; i < length; i += 1) {
    code += String(randomInt(0, 10));
  }
  return code;
}

export function sha256Hex(value: string): string {
  return createHash("sha256").update(value, "utf8").digest("hex");
}

// ---------------------------------------------------------------------------
// OTP-Code hashen
// ---------------------------------------------------------------------------

export function hashOtpCode(code: string, salt: string, pepper?: string): string {
  const material = `${salt}:${code}`;
  if (pepper && pepper.length > 0) {
    return createHmac("sha256", pepper).update(material, "utf8").digest("hex");
  }
  return sha256Hex(material);
}

/**
 * Ein Hash pro konfiguriertem Pepper (aktiv + vorherige), damit Codes, die
 * vor einer Pepper-Rotation ausgestellt wurden, noch verifizierbar bleiben.
 */
export function hashOtpCodeCandidates(code: string, salt: string, peppers: string[]): string[] {
  if (peppers.length === 0) return [hashOtpCode(code, salt)];
  const hashes = new Set<string>();
  for (const pepper of peppers) {
    hashes.add(hashOtpCode(code, salt, pepper));
  }
  return [...hashes];
}

export function constantTimeEqual(a: string, b: string): boolean {
  const left = Buffer.from(a, "utf8");
  const right = Buffer.from(b, "utf8");
  if (left.length !== right.length) {
    // Laenge leakt ohnehin; Vergleich trotzdem ausfuehren
    timingSafeEqual(left, left);
    return false;
  }
  return timingSafeEqual(left, right);
}

/** Prueft alle Kandidaten ohne Short-Circuit. */
export function matchesAnyHash(stored: string, candidates: string[]): boolean {
  let matched = false;
  for (const candidate of candidates) {
    if (constantTimeEqual(stored, candidate)) matched = true;
  }
  return matched;
}

// ---------------------------------------------------------------------------
// Secret-Verschluesselung (TOTP)
// ---------------------------------------------------------------------------

function deriveKey(secret: string): Buffer {
  return createHash("sha256").update(secret, "utf8").digest();
}

/** Format: iv.tag.ciphertext (jeweils base64url). */
export function encryptSecret(plain: string, keyMaterial: string): string {
  const iv = randomBytes(12);
  const cipher = createCipheriv("aes-256-gcm", deriveKey(keyMaterial), iv);
  const ciphertext = Buffer.concat([cipher.update(plain, "utf8"), cipher.final()]);
  const tag = cipher.getAuthTag();
  return [iv, tag, ciphertext].map((part) => part.toString("base64url")).join(".");
}

export function decryptSecret(encrypted: string, keyMaterial: string): string {
  const parts = encrypted.split(".");
  if (parts.length !== 3) {
    throw new Error("encrypted_secret_malformed");
  }
  const [iv, tag, ciphertext] = parts.map((part) => Buffer.from(part, "base64url"));
  const decipher = createDecipheriv("aes-256-gcm", deriveKey(keyMaterial), iv);
  decipher.setAuthTag(tag);
  return Buffer.concat([decipher.update(ciphertext), decipher.final()]).toString("utf8");
}
