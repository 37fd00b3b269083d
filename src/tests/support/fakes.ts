// Stand-ins fuer Uhr, Versand, Limiter, Benutzerverzeichnis und WebAuthn.

import type { Clock } from "../../libs/clock.js";
import type { AttemptLimiter } from "../../libs/limiter.js";
import type { DeliveryResult, NotificationDispatcher, PushTarget } from "../../libs/notify.js";
import type { WindowHit } from "../../libs/redis.js";
import type { UserDirectory } from "../../modules/users/repository.js";
import type {
  AuthenticationCheck,
  PasskeyVerifier,
  RegistrationCheck,
  StoredCredential,
} from "../../modules/passkeys/verifier.js";
import type { AuthenticationResponse, RegistrationResponse } from "../../modules/passkeys/types.js";

export const TEST_EPOCH = new Date("2026-03-02T09:00:00.000Z");

export class ManualClock implements Clock {
  private current: Date;

  constructor(start: Date = TEST_EPOCH) {
    this.current = new Date(start.getTime());
  }

  now(): Date {
    return new Date(this.current.getTime());
  }

  advance(seconds: number) {
    this.current = new Date(this.current.getTime() + seconds * 1000);
  }
}

// ---------------------------------------------------------------------------

type SentMessage = { to: string; subject?: string; body: string };
type SentPush = { target: PushTarget; payload: Record<string, unknown> };

const CODE_RE = /\b(\d{4,10})\b/;

export class RecordingDispatcher implements NotificationDispatcher {
  readonly sms: SentMessage[] = [];
  readonly emails: SentMessage[] = [];
  readonly pushes: SentPush[] = [];
  outcome: DeliveryResult = { ok: true, attempts: 1 };

  sendSms(to: string, body: string): Promise<DeliveryResult> {
    this.sms.push({ to, body });
    return Promise.resolve(this.outcome);
  }

  sendEmail(to: string, subject: string, body: string): Promise<DeliveryResult> {
    this.emails.push({ to, subject, body });
    return Promise.resolve(this.outcome);
  }

  sendPush(target: PushTarget, payload: Record<string, unknown>): Promise<DeliveryResult> {
    this.pushes.push({ target, payload });
    return Promise.resolve(this.outcome);
  }

  private lastCode(messages: SentMessage[], to: string): string {
    const message = [...messages].reverse().find((entry) => entry.to === to);
    const code = message?.body.match(CODE_RE)?.[1];
    if (!code) throw new Error(`no code sent to ${to}`);
    return code;
  }

  lastSmsCode(to: string): string {
    return this.lastCode(this.sms, to);
  }

  lastEmailCode(to: string): string {
    return this.lastCode(this.emails, to);
  }
}

// ---------------------------------------------------------------------------

export class MemoryLimiter implements AttemptLimiter {
  private readonly hits = new Map<string, number[]>();

  async hit(scope: string, subject: string, windowSec: number, max: number, now: Date): Promise<WindowHit> {
    const key = `${scope}:${subject}`;
    const nowMs = now.getTime();
    const windowMs = windowSec * 1000;
    const recent = (this.hits.get(key) ?? []).filter((at) => at > nowMs - windowMs);

    if (recent.length >= max) {
      this.hits.set(key, recent);
      const oldest = recent[0] ?? nowMs;
      return {
        allowed: false,
        count: recent.length,
        retryAfterSec: Math.max(1, Math.ceil((oldest + windowMs - nowMs) / 1000)),
      };
    }

    recent.push(nowMs);
    this.hits.set(key, recent);
    return { allowed: true, count: recent.length, retryAfterSec: 0 };
  }
}

// ---------------------------------------------------------------------------

export class MemoryUserDirectory implements UserDirectory {
  private readonly byEmail = new Map<string, string>();

  add(email: string, userId: string) {
    this.byEmail.set(email.trim().toLowerCase(), userId);
  }

  async findUserIdByEmail(email: string): Promise<string | null> {
    return this.byEmail.get(email.trim().toLowerCase()) ?? null;
  }
}

// ---------------------------------------------------------------------------

/**
 * WebAuthn-Fake: Signatur "valid-signature" gilt als korrekt, der gemeldete
 * Zaehler kommt aus nextSignCount.
 */
export class FakePasskeyVerifier implements PasskeyVerifier {
  nextSignCount = 0;
  rejectRegistration = false;
  readonly authenticationCalls: { expectedChallenge: string; credential: StoredCredential }[] = [];

  async verifyAuthentication(input: {
    response: AuthenticationResponse;
    expectedChallenge: string;
    credential: StoredCredential;
  }): Promise<AuthenticationCheck> {
    this.authenticationCalls.push({ expectedChallenge: input.expectedChallenge, credential: input.credential });
    if (input.response.response.signature !== "valid-signature") {
      return { verified: false, reason: "signature_invalid" };
    }
    return { verified: true, newSignCount: this.nextSignCount };
  }

  async verifyRegistration(input: {
    response: RegistrationResponse;
    expectedChallenge: string;
  }): Promise<RegistrationCheck> {
    if (this.rejectRegistration) {
      return { verified: false, reason: "attestation_rejected" };
    }
    return {
      verified: true,
      credential: {
        credentialId: input.response.id,
        publicKey: `pk-${input.response.id}`,
        signCount: 0,
        transports: input.response.response.transports ?? [],
      },
    };
  }
}

export function authenticationResponse(credentialId: string, signature = "valid-signature"): AuthenticationResponse {
  return {
    id: credentialId,
    rawId: credentialId,
    type: "public-key",
    response: {
      clientDataJSON: "Y2xpZW50RGF0YQ",
      authenticatorData: "YXV0aERhdGE",
      signature,
    },
    clientExtensionResults: {},
  };
}

export function registrationResponse(credentialId: string): RegistrationResponse {
  return {
    id: credentialId,
    rawId: credentialId,
    type: "public-key",
    response: {
      clientDataJSON: "Y2xpZW50RGF0YQ",
      attestationObject: "YXR0ZXN0YXRpb24",
      transports: ["internal"],
    },
    clientExtensionResults: {},
  };
}
