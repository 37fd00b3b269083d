// src/libs/env.ts
// ============================================================================
// Zentrale Umgebungsvariablen-Verwaltung (Docker + Secrets-first) mit Zod
// ----------------------------------------------------------------------------
// Ziele
// - Keine .env-Abhängigkeit (kein dotenv)
// - Secrets bevorzugt aus *_FILE (Docker secrets) lesen
// - Fail-fast nur beim echten Service-Start (nicht bei Test-Imports)
// - Keine Secret-Werte loggen (nur [set]/[unset])
//
// Hinweise
// - In PROD STARTUP_VALIDATE_ENV=1 setzen (Compose), damit fehlende
//   kritische Variablen sofort auffallen.
// - JWT-Secret, Token-Pepper, TOTP-Key und VAPID-Key kommen in PROD via
//   Docker secret (*_FILE).
// - Faktor-Parameter (OTP, Push, Recovery, Passkey) werden hier nur geparst;
//   die typisierte Sicht fuer die Flows baut auth-config.ts.
// ============================================================================

import { readFileSync } from "node:fs";
import { z } from "zod";

// ----------------------------------------------------------------------------
// Helpers: Secrets lesen
// ----------------------------------------------------------------------------

/**
 * Liest ein Secret aus einer Datei (Docker secrets: /run/secrets/*).
 * - trimmt Whitespace
 * - entfernt trailing newlines
 * - wirft Fehler, wenn Datei nicht lesbar / leer
 */
function readSecretFile(filePath: string | undefined, label: string): string | undefined {
  if (!filePath) return undefined;

  let value: string;
  try {
    value = readFileSync(filePath, "utf8");
  } catch {
    throw new Error(`${label} nicht lesbar: ${filePath}`);
  }

  const trimmed = value.replace(/\r?\n+$/, "").trim();
  if (!trimmed) throw new Error(`${label} ist leer: ${filePath}`);

  return trimmed;
}

/**
 * Entscheidet: *_FILE wird bevorzugt gelesen, ENV ist Fallback.
 * - Secrets-first fuer Container/Production
 * - ENV-Fallback fuer lokale Entwicklung
 */
function resolveFromFileOrEnv(opts: {
  envValue?: string;
  filePath?: string;
  label: string;
}): string | undefined {
  const fromFile = readSecretFile(opts.filePath, opts.label);
  if (fromFile && fromFile.trim() !== "") return fromFile;
  if (opts.envValue && opts.envValue.trim() !== "") return opts.envValue;
  return undefined;
}

/**
 * Maskiert sensible Werte für Logs.
 */
function mask(value: unknown): string {
  if (value === undefined || value === null || value === "") return "[unset]";
  return "[set]";
}

// ----------------------------------------------------------------------------
// Schema: erwartet ENV + optional *_FILE
// ----------------------------------------------------------------------------

const EnvSchema = z.object({
  // --------------------------------------------------------------------------
  // Laufzeit / Server
  // --------------------------------------------------------------------------
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  HOST: z.string().default("0.0.0.0"),
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  LOG_LEVEL: z.string().default("info"),

  // --------------------------------------------------------------------------
  // CORS / HTTP
  // --------------------------------------------------------------------------
  CORS_ORIGIN: z.string().default("*"),
  REQUEST_ID_HEADER: z.string().default("x-request-id"),
  TRUST_PROXY: z.coerce.boolean().default(true),
  METRICS_ENABLED: z.coerce.boolean().default(true),

  // --------------------------------------------------------------------------
  // Redis
  // - entweder REDIS_URL komplett
  // - oder granular (HOST/PORT/USERNAME/PASSWORD)
  // - PASSWORD kann via REDIS_PASSWORD_FILE kommen
  // --------------------------------------------------------------------------
  REDIS_URL: z.string().optional(),
  REDIS_HOST: z.string().optional(),
  REDIS_PORT: z.coerce.number().int().optional(),
  REDIS_USERNAME: z.string().optional(),
  REDIS_PASSWORD: z.string().optional(),
  REDIS_PASSWORD_FILE: z.string().optional(),
  REDIS_NAMESPACE: z.string().default("factor-auth"),

  // --------------------------------------------------------------------------
  // PostgreSQL (Dokument-Store + auth.users)
  // --------------------------------------------------------------------------
  DATABASE_URL: z.string().optional(),
  DATABASE_URL_FILE: z.string().optional(),

  // --------------------------------------------------------------------------
  // HTTP Rate Limit (@fastify/rate-limit)
  // --------------------------------------------------------------------------
  RATE_LIMIT_WINDOW: z.coerce.number().int().positive().default(60),
  RATE_LIMIT_MAX: z.coerce.number().int().positive().default(60),
  // Code-Versand, Verifikation, Recovery-Start
  RATE_LIMIT_SENSITIVE_MAX: z.coerce.number().int().positive().default(10),
  RATE_LIMIT_ALLOWLIST: z.string().default(""),

  // --------------------------------------------------------------------------
  // SMTP / Mail (in DEV kann Mailpit laufen)
  // --------------------------------------------------------------------------
  SMTP_HOST: z.string().default("localhost"),
  SMTP_PORT: z.coerce.number().int().default(1025),
  SMTP_SECURE: z.coerce.boolean().default(false),
  SMTP_USER: z.string().optional(),
  SMTP_PASS: z.string().optional(),
  SMTP_USER_FILE: z.string().optional(),
  SMTP_PASS_FILE: z.string().optional(),
  SMTP_FROM: z.string().default("Auth Service <no-reply@local.test>"),

  // --------------------------------------------------------------------------
  // SMS-Provider (JSON-Webhook) + Web Push (VAPID)
  // --------------------------------------------------------------------------
  SMS_WEBHOOK_URL: z.string().url().optional(),
  SMS_WEBHOOK_TOKEN: z.string().optional(),
  SMS_WEBHOOK_TOKEN_FILE: z.string().optional(),
  VAPID_SUBJECT: z.string().default("mailto:security@local.test"),
  VAPID_PUBLIC_KEY: z.string().optional(),
  VAPID_PRIVATE_KEY: z.string().optional(),
  VAPID_PRIVATE_KEY_FILE: z.string().optional(),
  NOTIFY_MAX_RETRIES: z.coerce.number().int().min(0).max(10).default(3),
  NOTIFY_BASE_DELAY_MS: z.coerce.number().int().positive().default(200),

  // --------------------------------------------------------------------------
  // JWT (Access-Token-Verifikation, Recovery-Credential, Faktor-Assertion)
  // - active/previous erlaubt Secret-Rotation ohne Downtime
  // --------------------------------------------------------------------------
  JWT_SECRET_ACTIVE: z.string().optional(),
  JWT_SECRET_ACTIVE_FILE: z.string().optional(),
  JWT_SECRET_PREVIOUS: z.string().optional(),
  JWT_SECRET_PREVIOUS_FILE: z.string().optional(),
  JWT_ACTIVE_KID: z.string().optional(),
  JWT_ISSUER: z.string().default("auth-service"),
  JWT_AUDIENCE: z.string().default("auth-client"),
  JWT_CLOCK_SKEW_SEC: z.coerce.number().int().min(0).max(300).default(60),

  // OTP-Hashes: HMAC-Pepper (active/previous fuer Rotation)
  TOKEN_PEPPER_ACTIVE: z.string().optional(),
  TOKEN_PEPPER_ACTIVE_FILE: z.string().optional(),
  TOKEN_PEPPER_PREVIOUS: z.string().optional(),
  TOKEN_PEPPER_PREVIOUS_FILE: z.string().optional(),

  // --------------------------------------------------------------------------
  // Faktoren
  // --------------------------------------------------------------------------
  OTP_CODE_LENGTH: z.coerce.number().int().min(4).max(10).default(6),
  OTP_TTL_SEC: z.coerce.number().int().positive().default(300),
  OTP_COOLDOWN_SEC: z.coerce.number().int().min(0).default(60),
  OTP_DAILY_CAP: z.coerce.number().int().positive().default(10),
  OTP_MAX_ATTEMPTS: z.coerce.number().int().positive().default(5),

  PASSKEY_CHALLENGE_TTL_SEC: z.coerce.number().int().positive().default(300),
  PASSKEY_RP_ID: z.string().default("localhost"),
  PASSKEY_RP_NAME: z.string().default("Auth Service"),
  PASSKEY_ORIGINS: z.string().default("http://localhost:5173"),

  PUSH_TTL_SEC: z.coerce.number().int().min(10).max(600).default(90),

  RECOVERY_TTL_SEC: z.coerce.number().int().positive().default(1800),
  RECOVERY_MAX_STEP_ATTEMPTS: z.coerce.number().int().positive().default(5),
  RECOVERY_MAX_PER_EMAIL: z.coerce.number().int().positive().default(3),
  RECOVERY_EMAIL_WINDOW_SEC: z.coerce.number().int().positive().default(86_400),
  RECOVERY_MAX_PER_IP: z.coerce.number().int().positive().default(10),
  RECOVERY_IP_WINDOW_SEC: z.coerce.number().int().positive().default(3600),
  RECOVERY_TOKEN_TTL_SEC: z.coerce.number().int().positive().default(900),
  ASSERTION_TTL_SEC: z.coerce.number().int().positive().default(120),

  TOTP_ISSUER: z.string().default("Auth Service"),
  TOTP_WINDOW: z.coerce.number().int().min(0).max(3).default(1),
  TOTP_ENCRYPTION_KEY: z.string().optional(),
  TOTP_ENCRYPTION_KEY_FILE: z.string().optional(),

  // --------------------------------------------------------------------------
  // Housekeeping / interne Endpunkte
  // --------------------------------------------------------------------------
  HOUSEKEEPING_INTERVAL_SEC: z.coerce.number().int().min(0).default(60),
  INTERNAL_API_TOKEN: z.string().optional(),
  INTERNAL_API_TOKEN_FILE: z.string().optional(),

  // --------------------------------------------------------------------------
  // Startup-Validation Switch (nur als String; wir interpretieren unten)
  // --------------------------------------------------------------------------
  STARTUP_VALIDATE_ENV: z.string().optional(),
});

// ----------------------------------------------------------------------------
// Secret-Resolution: *_FILE → konkrete Werte
// ----------------------------------------------------------------------------

const FILE_SECRETS = [
  "REDIS_PASSWORD",
  "DATABASE_URL",
  "SMTP_USER",
  "SMTP_PASS",
  "SMS_WEBHOOK_TOKEN",
  "VAPID_PRIVATE_KEY",
  "JWT_SECRET_ACTIVE",
  "JWT_SECRET_PREVIOUS",
  "TOKEN_PEPPER_ACTIVE",
  "TOKEN_PEPPER_PREVIOUS",
  "TOTP_ENCRYPTION_KEY",
  "INTERNAL_API_TOKEN",
] as const;

const resolvedSecrets: Record<string, string | undefined> = {};
for (const name of FILE_SECRETS) {
  resolvedSecrets[name] = resolveFromFileOrEnv({
    envValue: process.env[name],
    filePath: process.env[`${name}_FILE`],
    label: `${name}_FILE`,
  });
}

// ----------------------------------------------------------------------------
// Parse & Normalize
// ----------------------------------------------------------------------------

const raw = EnvSchema.parse({
  ...process.env,
  ...resolvedSecrets,
});

/**
 * Baut eine Redis-URL aus granularen Feldern, falls REDIS_URL nicht gesetzt ist.
 * Erwartet: HOST, PORT, USERNAME, PASSWORD.
 */
function buildRedisUrl(input: {
  REDIS_URL?: string;
  REDIS_HOST?: string;
  REDIS_PORT?: number;
  REDIS_USERNAME?: string;
  REDIS_PASSWORD?: string;
}): string | undefined {
  if (input.REDIS_URL) return input.REDIS_URL;

  const { REDIS_HOST, REDIS_PORT, REDIS_USERNAME, REDIS_PASSWORD } = input;
  if (!REDIS_HOST || !REDIS_PORT || !REDIS_USERNAME || !REDIS_PASSWORD) return undefined;

  const u = encodeURIComponent(REDIS_USERNAME);
  const p = encodeURIComponent(REDIS_PASSWORD);
  return `redis://${u}:${p}@${REDIS_HOST}:${REDIS_PORT}`;
}

function splitList(value: string): string[] {
  return value
    .split(",")
    .map((item) => item.trim())
    .filter(Boolean);
}

// Final export: normalisierte ENV (REDIS_URL ggf. abgeleitet)
export const env = {
  ...raw,
  REQUEST_ID_HEADER: raw.REQUEST_ID_HEADER.toLowerCase(),
  REDIS_URL: buildRedisUrl(raw),
  PASSKEY_ORIGIN_ITEMS: splitList(raw.PASSKEY_ORIGINS),
  RATE_LIMIT_ALLOW_ITEMS: splitList(raw.RATE_LIMIT_ALLOWLIST),
};

// ----------------------------------------------------------------------------
// Fail-fast: nur wenn Service wirklich startet
// ----------------------------------------------------------------------------
//
// Vitest importiert Module, bevor Setup-Dateien laufen → nicht in test crashen.
//
// Schalter:
// - STARTUP_VALIDATE_ENV=1 -> immer validieren (typisch im Container)
// - sonst: validate in development/production, nicht in test
//
const shouldValidate =
  process.env.STARTUP_VALIDATE_ENV === "1" ? true : env.NODE_ENV !== "test";

if (shouldValidate) {
  if (!env.DATABASE_URL) {
    throw new Error("DATABASE_URL fehlt: setze DATABASE_URL oder DATABASE_URL_FILE.");
  }
  if (!env.REDIS_URL) {
    throw new Error(
      "Redis-Konfiguration fehlt: setze REDIS_URL oder alle REDIS_HOST/REDIS_PORT/REDIS_USERNAME/REDIS_PASSWORD (alternativ REDIS_PASSWORD_FILE).",
    );
  }

  if (env.NODE_ENV === "production") {
    if (!env.JWT_SECRET_ACTIVE) {
      throw new Error("JWT Secret fehlt: setze JWT_SECRET_ACTIVE oder JWT_SECRET_ACTIVE_FILE.");
    }
    if (!env.TOKEN_PEPPER_ACTIVE) {
      throw new Error("Token-Pepper fehlt: setze TOKEN_PEPPER_ACTIVE oder TOKEN_PEPPER_ACTIVE_FILE.");
    }
    if (!env.TOTP_ENCRYPTION_KEY) {
      throw new Error("TOTP-Key fehlt: setze TOTP_ENCRYPTION_KEY oder TOTP_ENCRYPTION_KEY_FILE.");
    }
  }

  // Production-CORS Warnung (nicht hart failen, nur warnen)
  if (env.NODE_ENV === "production" && env.CORS_ORIGIN === "*") {
    // eslint-disable-next-line no-console
    console.warn("[env] WARNUNG: In Production sollte CORS_ORIGIN nicht '*' sein.");
  }
}

// ----------------------------------------------------------------------------
// Debug-Ausgabe ohne Secrets
// ----------------------------------------------------------------------------

/**
 * Gibt eine sichere Zusammenfassung der Konfiguration aus (ohne Secrets).
 * Wird beim Startup einmal geloggt.
 */
export function logEnvSummary(
  log: (msg: string, extra?: unknown) => void = console.info,
) {
  const summary = {
    NODE_ENV: env.NODE_ENV,
    HOST: env.HOST,
    PORT: env.PORT,
    LOG_LEVEL: env.LOG_LEVEL,
    CORS_ORIGIN: env.CORS_ORIGIN,
    METRICS_ENABLED: env.METRICS_ENABLED,

    REDIS_URL: mask(env.REDIS_URL),
    REDIS_NAMESPACE: env.REDIS_NAMESPACE,
    DATABASE_URL: mask(env.DATABASE_URL),

    RATE_LIMIT_WINDOW: env.RATE_LIMIT_WINDOW,
    RATE_LIMIT_MAX: env.RATE_LIMIT_MAX,

    SMTP_HOST: env.SMTP_HOST,
    SMTP_PORT: env.SMTP_PORT,
    SMTP_USER: mask(env.SMTP_USER),
    SMTP_PASS: mask(env.SMTP_PASS),
    SMS_WEBHOOK_URL: mask(env.SMS_WEBHOOK_URL),
    VAPID_PUBLIC_KEY: mask(env.VAPID_PUBLIC_KEY),
    VAPID_PRIVATE_KEY: mask(env.VAPID_PRIVATE_KEY),

    JWT_SECRET_ACTIVE: mask(env.JWT_SECRET_ACTIVE),
    JWT_SECRET_PREVIOUS: mask(env.JWT_SECRET_PREVIOUS),
    TOKEN_PEPPER_ACTIVE: mask(env.TOKEN_PEPPER_ACTIVE),
    TOKEN_PEPPER_PREVIOUS: mask(env.TOKEN_PEPPER_PREVIOUS),
    TOTP_ENCRYPTION_KEY: mask(env.TOTP_ENCRYPTION_KEY),
    INTERNAL_API_TOKEN: mask(env.INTERNAL_API_TOKEN),

    OTP_TTL_SEC: env.OTP_TTL_SEC,
    OTP_COOLDOWN_SEC: env.OTP_COOLDOWN_SEC,
    OTP_DAILY_CAP: env.OTP_DAILY_CAP,
    PUSH_TTL_SEC: env.PUSH_TTL_SEC,
    RECOVERY_TTL_SEC: env.RECOVERY_TTL_SEC,
    PASSKEY_RP_ID: env.PASSKEY_RP_ID,
    HOUSEKEEPING_INTERVAL_SEC: env.HOUSEKEEPING_INTERVAL_SEC,
  };

  log("[env] configuration summary", summary);
}

export type Env = typeof env;
