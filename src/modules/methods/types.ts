// src/modules/methods/types.ts
// ============================================================================
// Authentifizierungs-Methoden (Faktoren) als Tagged Union
// ----------------------------------------------------------------------------
// Gemeinsamer Umschlag (Status, Verifikation, Zeitstempel) + variantenspezifischer
// Payload. Das zod-Schema ist zugleich Persistenz-Vertrag: beim Lesen aus dem
// Store werden ISO-Strings wieder zu Date.
// ============================================================================

import { z } from "zod";

export const METHOD_TYPES = ["TOTP", "PASSKEY", "SMS_OTP", "EMAIL_OTP", "PUSH"] as const;
export type MethodType = (typeof METHOD_TYPES)[number];

export const METHOD_STATUSES = ["ACTIVE", "DISABLED"] as const;
export type MethodStatus = (typeof METHOD_STATUSES)[number];

export const PASSKEY_TRANSPORTS = [
  "ble",
  "cable",
  "hybrid",
  "internal",
  "nfc",
  "smart-card",
  "usb",
] as const;
export type PasskeyTransport = (typeof PASSKEY_TRANSPORTS)[number];

const envelope = {
  id: z.string(),
  version: z.number().int(),
  userId: z.string(),
  name: z.string(),
  status: z.enum(METHOD_STATUSES),
  verified: z.boolean(),
  createdAt: z.coerce.date(),
  updatedAt: z.coerce.date(),
  lastUsedAt: z.coerce.date().nullable(),
  lastVerifiedAt: z.coerce.date().nullable(),
};

const sendCounter = {
  dailySendCount: z.number().int().min(0),
  dailyCountResetAt: z.coerce.date().nullable(),
};

export const TotpMethodSchema = z.object({
  ...envelope,
  type: z.literal("TOTP"),
  encryptedSecret: z.string(),
  /** Zeitschritt des zuletzt akzeptierten Codes (Replay-Schutz). */
  lastAcceptedStep: z.number().int().nullable(),
});

export const PasskeyMethodSchema = z.object({
  ...envelope,
  type: z.literal("PASSKEY"),
  credentialId: z.string(),
  /** COSE-Public-Key, base64url */
  publicKey: z.string(),
  signCount: z.number().int().min(0),
  transports: z.array(z.enum(PASSKEY_TRANSPORTS)).default([]),
});

export const SmsMethodSchema = z.object({
  ...envelope,
  ...sendCounter,
  type: z.literal("SMS_OTP"),
  phoneNumber: z.string(),
});

export const EmailMethodSchema = z.object({
  ...envelope,
  ...sendCounter,
  type: z.literal("EMAIL_OTP"),
  email: z.string(),
});

export const PushMethodSchema = z.object({
  ...envelope,
  type: z.literal("PUSH"),
  endpoint: z.string().url(),
  keys: z.object({
    p256dh: z.string(),
    auth: z.string(),
  }),
  deviceName: z.string().nullable(),
});

export const AuthenticationMethodSchema = z.discriminatedUnion("type", [
  TotpMethodSchema,
  PasskeyMethodSchema,
  SmsMethodSchema,
  EmailMethodSchema,
  PushMethodSchema,
]);

export type AuthenticationMethod = z.infer<typeof AuthenticationMethodSchema>;
export type TotpMethod = z.infer<typeof TotpMethodSchema>;
export type PasskeyMethod = z.infer<typeof PasskeyMethodSchema>;
export type SmsMethod = z.infer<typeof SmsMethodSchema>;
export type EmailMethod = z.infer<typeof EmailMethodSchema>;
export type PushMethod = z.infer<typeof PushMethodSchema>;

export type MethodOfType<K extends MethodType> = Extract<AuthenticationMethod, { type: K }>;

/** Eingaben fuer register(): nur der variantenspezifische Teil. */
export type MethodRegistration =
  | { type: "TOTP"; encryptedSecret: string }
  | {
      type: "PASSKEY";
      credentialId: string;
      publicKey: string;
      signCount: number;
      transports: PasskeyTransport[];
    }
  | { type: "SMS_OTP"; phoneNumber: string }
  | { type: "EMAIL_OTP"; email: string }
  | {
      type: "PUSH";
      endpoint: string;
      keys: { p256dh: string; auth: string };
      deviceName: string | null;
    };

/** Oeffentliche Sicht fuer GET /auth/methods (ohne Secrets/Keys). */
export type MethodView = {
  id: string;
  type: MethodType;
  name: string;
  status: MethodStatus;
  verified: boolean;
  configured: boolean;
  hint: string | null;
  createdAt: string;
  lastUsedAt: string | null;
};
