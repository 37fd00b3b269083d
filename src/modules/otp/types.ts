// src/modules/otp/types.ts
// ============================================================================
// Typen fuer die OTP-Engine (SMS + E-Mail)
// ----------------------------------------------------------------------------
// Ein Dokument pro Ziel (Telefonnummer bzw. E-Mail-Adresse). Darin liegen der
// Tageszaehler und hoechstens ein Code pro Zweck. Damit deckt ein einziger
// bedingter Schreibvorgang Cooldown, Tageslimit und Code-Ersetzung ab.
// ============================================================================

import { z } from "zod";

export const OTP_CHANNELS = ["sms", "email"] as const;
export type OtpChannel = (typeof OTP_CHANNELS)[number];

export const OTP_PURPOSES = ["signin", "enroll", "recovery-email", "recovery-sms"] as const;
export type OtpPurpose = (typeof OTP_PURPOSES)[number];

export const OtpCodeSchema = z.object({
  id: z.string(),
  purpose: z.enum(OTP_PURPOSES),
  salt: z.string(),
  codeHash: z.string(),
  userId: z.string().nullable(),
  expiresAt: z.coerce.date(),
  verified: z.boolean(),
  attempts: z.number().int().min(0),
  createdAt: z.coerce.date(),
});

export const OtpTargetSchema = z.object({
  id: z.string(),
  version: z.number().int(),
  channel: z.enum(OTP_CHANNELS),
  maskedTarget: z.string(),
  dailyCount: z.number().int().min(0),
  dailyWindowStartedAt: z.coerce.date().nullable(),
  codes: z.array(OtpCodeSchema),
});

export type OtpCode = z.infer<typeof OtpCodeSchema>;
export type OtpTarget = z.infer<typeof OtpTargetSchema>;

export type OtpIssueInput = {
  channel: OtpChannel;
  target: string;
  purpose: OtpPurpose;
  userId?: string | null;
};

export type OtpIssueResult = {
  codeId: string;
  expiresAt: Date;
  dailyCount: number;
  dailyWindowResetsAt: Date;
};

export type OtpVerifyInput = {
  channel: OtpChannel;
  target: string;
  purpose: OtpPurpose;
  code: string;
  /** Optional: nur genau diesen Code akzeptieren (Recovery-Schritte). */
  codeId?: string | null;
};

export type OtpVerifyResult = {
  codeId: string;
  userId: string | null;
};

export type SendWindow =
  | { allowed: true; windowExpired: boolean }
  | { allowed: false; reason: "cooldown" | "daily_cap"; retryAfterSec: number };
