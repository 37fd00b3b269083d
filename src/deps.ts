// src/deps.ts
// ============================================================================
// Abhaengigkeiten der Faktor-Flows
// ----------------------------------------------------------------------------
// Alle Services bekommen deps als erstes Argument (wie frueher den DB-Client).
// Produktion: Postgres-Stores, Redis-Limiter, SMTP/SMS/Web-Push, SimpleWebAuthn.
// Tests: In-Memory-Stand-ins aus src/tests/support.
// ============================================================================

import type pg from "pg";
import { authConfigFromEnv, type AuthConfig } from "./libs/auth-config.js";
import { systemClock, type Clock } from "./libs/clock.js";
import { pool } from "./libs/db.js";
import { env } from "./libs/env.js";
import { redisAttemptLimiter, type AttemptLimiter } from "./libs/limiter.js";
import type { Logger } from "./libs/logger.js";
import { SMTP_FROM, transporter } from "./libs/mail.js";
import { ProviderDispatcher, type NotificationDispatcher } from "./libs/notify.js";
import { PgDocumentStore } from "./libs/pg-store.js";
import { DEFAULT_RETRY_CONFIG } from "./libs/retry.js";
import { methodCollection, type MethodStore } from "./modules/methods/repository.js";
import { otpTargetCollection, type OtpTargetStore } from "./modules/otp/repository.js";
import { passkeyChallengeCollection, type PasskeyChallengeStore } from "./modules/passkeys/repository.js";
import { SimpleWebAuthnVerifier, type PasskeyVerifier } from "./modules/passkeys/verifier.js";
import { pushRequestCollection, type PushRequestStore } from "./modules/push/repository.js";
import { recoveryCollection, type RecoveryStore } from "./modules/recovery/repository.js";
import { PgUserDirectory, type UserDirectory } from "./modules/users/repository.js";

export type AuthStores = {
  methods: MethodStore;
  challenges: PasskeyChallengeStore;
  pushRequests: PushRequestStore;
  otpTargets: OtpTargetStore;
  recoveries: RecoveryStore;
};

export type AuthDeps = {
  clock: Clock;
  log: Logger;
  config: AuthConfig;
  stores: AuthStores;
  dispatcher: NotificationDispatcher;
  users: UserDirectory;
  limiter: AttemptLimiter;
  passkeyVerifier: PasskeyVerifier;
};

export function createPgStores(db: pg.Pool): AuthStores {
  return {
    methods: new PgDocumentStore(db, methodCollection),
    challenges: new PgDocumentStore(db, passkeyChallengeCollection),
    pushRequests: new PgDocumentStore(db, pushRequestCollection),
    otpTargets: new PgDocumentStore(db, otpTargetCollection),
    recoveries: new PgDocumentStore(db, recoveryCollection),
  };
}

function createDispatcher(config: AuthConfig): NotificationDispatcher {
  const vapid =
    env.VAPID_PUBLIC_KEY && env.VAPID_PRIVATE_KEY
      ? { subject: env.VAPID_SUBJECT, publicKey: env.VAPID_PUBLIC_KEY, privateKey: env.VAPID_PRIVATE_KEY }
      : undefined;

  return new ProviderDispatcher({
    mail: transporter,
    mailFrom: SMTP_FROM,
    smsWebhookUrl: env.SMS_WEBHOOK_URL,
    smsWebhookToken: env.SMS_WEBHOOK_TOKEN,
    vapid,
    pushTtlSec: config.push.ttlSec,
    retry: {
      ...DEFAULT_RETRY_CONFIG,
      maxRetries: env.NOTIFY_MAX_RETRIES,
      baseDelayMs: env.NOTIFY_BASE_DELAY_MS,
    },
  });
}

/** Produktions-Verdrahtung aus env.ts. */
export function createDefaultDeps(log: Logger): AuthDeps {
  const config = authConfigFromEnv();

  return {
    clock: systemClock,
    log,
    config,
    stores: createPgStores(pool),
    dispatcher: createDispatcher(config),
    users: new PgUserDirectory(pool),
    limiter: redisAttemptLimiter,
    passkeyVerifier: new SimpleWebAuthnVerifier({
      rpId: config.passkey.rpId,
      origins: config.passkey.origins,
    }),
  };
}
