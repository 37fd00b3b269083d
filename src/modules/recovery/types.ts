// src/modules/recovery/types.ts
// ============================================================================
// Account-Recovery-Anfragen
// ----------------------------------------------------------------------------
// PENDING_EMAIL -> PENDING_SMS (nur bei mfaRequired) -> COMPLETED
// EXPIRED / CANCELLED aus jedem nicht-terminalen Zustand.
// ============================================================================

import { z } from "zod";

export const RECOVERY_STATUSES = ["PENDING_EMAIL", "PENDING_SMS", "COMPLETED", "EXPIRED", "CANCELLED"] as const;
export type RecoveryStatus = (typeof RECOVERY_STATUSES)[number];

export const RecoveryRequestSchema = z.object({
  id: z.string(),
  version: z.number().int(),
  userId: z.string(),
  email: z.string(),
  status: z.enum(RECOVERY_STATUSES),
  emailVerified: z.boolean(),
  smsVerified: z.boolean(),
  mfaRequired: z.boolean(),
  phoneNumber: z.string().nullable(),
  phoneNumberHint: z.string().nullable(),
  emailCodeId: z.string().nullable(),
  smsCodeId: z.string().nullable(),
  emailAttempts: z.number().int().min(0),
  smsAttempts: z.number().int().min(0),
  ipAddress: z.string().nullable(),
  userAgent: z.string().nullable(),
  expiresAt: z.coerce.date(),
  completedAt: z.coerce.date().nullable(),
  usedForAuthentication: z.boolean(),
  createdAt: z.coerce.date(),
  updatedAt: z.coerce.date(),
});

export type RecoveryRequest = z.infer<typeof RecoveryRequestSchema>;

export type RecoveryStep = "EMAIL" | "SMS";

export type RecoveryStart = {
  recoveryId: string;
  expiresAt: Date;
  nextStep: "EMAIL";
};

export type RecoveryStepResult = {
  nextStep: "SMS" | "TOKEN";
  phoneNumberHint: string | null;
};

export type RecoveryStatusView = {
  recoveryId: string;
  status: RecoveryStatus;
  mfaRequired: boolean;
  emailVerified: boolean;
  smsVerified: boolean;
  phoneNumberHint: string | null;
  expiresAt: string;
};

export type RecoveryCredential = {
  userId: string;
  token: string;
  expiresAt: Date;
};

export function isActive(status: RecoveryStatus): boolean {
  return status === "PENDING_EMAIL" || status === "PENDING_SMS";
}

export function isReadyForToken(request: RecoveryRequest): boolean {
  return request.emailVerified && (!request.mfaRequired || request.smsVerified);
}
