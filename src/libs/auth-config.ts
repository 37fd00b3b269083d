// src/libs/auth-config.ts
// ============================================================================
// Typisierte Faktor-Konfiguration (aus env.ts abgeleitet)
// ----------------------------------------------------------------------------
// Flows lesen ausschliesslich deps.config, nie env direkt. Tests bauen sich
// eine eigene AuthConfig mit kurzen TTLs.
// ============================================================================

import { env, type Env } from "./env.js";

export type OtpConfig = {
  codeLength: number;
  ttlSec: number;
  cooldownSec: number;
  dailyCap: number;
  maxAttempts: number;
};

export type AuthConfig = {
  otp: OtpConfig;
  passkey: {
    challengeTtlSec: number;
    rpId: string;
    rpName: string;
    origins: string[];
  };
  push: {
    ttlSec: number;
  };
  recovery: {
    ttlSec: number;
    maxStepAttempts: number;
    maxPerEmail: number;
    emailWindowSec: number;
    maxPerIp: number;
    ipWindowSec: number;
    tokenTtlSec: number;
  };
  totp: {
    issuer: string;
    window: number;
    encryptionKey: string;
  };
  assertionTtlSec: number;
  /** HMAC-Pepper fuer OTP-Hashes; Index 0 = aktiv, danach Vorgaenger. */
  peppers: string[];
};

// Nur fuer lokale Entwicklung; env.ts erzwingt in PROD gesetzte Werte.
const DEV_TOTP_KEY = "dev-only-totp-key";

export function authConfigFromEnv(source: Env = env): AuthConfig {
  const peppers = [source.TOKEN_PEPPER_ACTIVE, source.TOKEN_PEPPER_PREVIOUS].filter(
    (value): value is string => typeof value === "string" && value.length > 0,
  );

  return {
    otp: {
      codeLength: source.OTP_CODE_LENGTH,
      ttlSec: source.OTP_TTL_SEC,
      cooldownSec: source.OTP_COOLDOWN_SEC,
      dailyCap: source.OTP_DAILY_CAP,
      maxAttempts: source.OTP_MAX_ATTEMPTS,
    },
    passkey: {
      challengeTtlSec: source.PASSKEY_CHALLENGE_TTL_SEC,
      rpId: source.PASSKEY_RP_ID,
      rpName: source.PASSKEY_RP_NAME,
      origins: source.PASSKEY_ORIGIN_ITEMS,
    },
    push: {
      ttlSec: source.PUSH_TTL_SEC,
    },
    recovery: {
      ttlSec: source.RECOVERY_TTL_SEC,
      maxStepAttempts: source.RECOVERY_MAX_STEP_ATTEMPTS,
      maxPerEmail: source.RECOVERY_MAX_PER_EMAIL,
      emailWindowSec: source.RECOVERY_EMAIL_WINDOW_SEC,
      maxPerIp: source.RECOVERY_MAX_PER_IP,
      ipWindowSec: source.RECOVERY_IP_WINDOW_SEC,
      tokenTtlSec: source.RECOVERY_TOKEN_TTL_SEC,
    },
    totp: {
      issuer: source.TOTP_ISSUER,
      window: source.TOTP_WINDOW,
      encryptionKey: source.TOTP_ENCRYPTION_KEY ?? DEV_TOTP_KEY,
    },
    assertionTtlSec: source.ASSERTION_TTL_SEC,
    peppers,
  };
}
