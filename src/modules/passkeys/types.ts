// src/modules/passkeys/types.ts
// ============================================================================
// Passkey-Challenges + WebAuthn-Antwortformen
// ============================================================================

import { z } from "zod";
import { PASSKEY_TRANSPORTS } from "../methods/types.js";

export const CEREMONY_PURPOSES = ["registration", "authentication"] as const;
export type CeremonyPurpose = (typeof CEREMONY_PURPOSES)[number];

export const PasskeyChallengeSchema = z.object({
  id: z.string(),
  version: z.number().int(),
  challenge: z.string(),
  userId: z.string().nullable(),
  purpose: z.enum(CEREMONY_PURPOSES),
  sessionId: z.string(),
  createdAt: z.coerce.date(),
  expiresAt: z.coerce.date(),
  used: z.boolean(),
  usedAt: z.coerce.date().nullable(),
});

export type PasskeyChallenge = z.infer<typeof PasskeyChallengeSchema>;

// Client-Antworten (navigator.credentials.get/create, JSON-serialisiert)
const base64url = z.string().min(1).regex(/^[A-Za-z0-9_-]+$/, "base64url expected");

export const AuthenticationResponseSchema = z.object({
  id: base64url,
  rawId: base64url,
  type: z.literal("public-key"),
  response: z.object({
    clientDataJSON: base64url,
    authenticatorData: base64url,
    signature: base64url,
    userHandle: base64url.optional(),
  }),
  authenticatorAttachment: z.enum(["cross-platform", "platform"]).optional(),
  clientExtensionResults: z.object({}).default({}),
});

export const RegistrationResponseSchema = z.object({
  id: base64url,
  rawId: base64url,
  type: z.literal("public-key"),
  response: z.object({
    clientDataJSON: base64url,
    attestationObject: base64url,
    authenticatorData: base64url.optional(),
    transports: z.array(z.enum(PASSKEY_TRANSPORTS)).optional(),
    publicKeyAlgorithm: z.number().int().optional(),
    publicKey: base64url.optional(),
  }),
  authenticatorAttachment: z.enum(["cross-platform", "platform"]).optional(),
  clientExtensionResults: z.object({}).default({}),
});

export type AuthenticationResponse = z.infer<typeof AuthenticationResponseSchema>;
export type RegistrationResponse = z.infer<typeof RegistrationResponseSchema>;

export type CeremonyStart = {
  challenge: string;
  sessionId: string;
  expiresAt: Date;
  timeoutMs: number;
  rpId: string;
};

export type AuthenticationCompletion = {
  userId: string;
  methodId: string;
  assertion: string;
  assertionExpiresAt: Date;
};
