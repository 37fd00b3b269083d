// src/modules/push/types.ts
// ============================================================================
// Push-Anfragen (Zustandsautomat)
// ----------------------------------------------------------------------------
// PENDING -> APPROVED | DENIED | EXPIRED | CANCELLED
// Aus einem Endzustand fuehrt kein Uebergang heraus.
// ============================================================================

import { z } from "zod";

export const PUSH_STATUSES = ["PENDING", "APPROVED", "DENIED", "EXPIRED", "CANCELLED"] as const;
export type PushStatus = (typeof PUSH_STATUSES)[number];

export const PUSH_PURPOSES = ["signin", "mfa", "recovery"] as const;
export type PushPurpose = (typeof PUSH_PURPOSES)[number];

export const PushContextSchema = z.object({
  ipAddress: z.string().nullable(),
  userAgent: z.string().nullable(),
  location: z.string().nullable(),
});

export type PushContext = z.infer<typeof PushContextSchema>;

export const PushAuthRequestSchema = z.object({
  id: z.string(),
  version: z.number().int(),
  userId: z.string(),
  status: z.enum(PUSH_STATUSES),
  purpose: z.enum(PUSH_PURPOSES),
  challenge: z.string(),
  expiresAt: z.coerce.date(),
  respondedAt: z.coerce.date().nullable(),
  approvingSubscriptionId: z.string().nullable(),
  notificationsSent: z.number().int().min(0),
  context: PushContextSchema,
  recoveryRequestId: z.string().nullable(),
  /** true, sobald der Initiator die Zustimmung gegen eine Assertion getauscht hat */
  claimed: z.boolean().default(false),
  createdAt: z.coerce.date(),
  updatedAt: z.coerce.date(),
});

export type PushAuthRequest = z.infer<typeof PushAuthRequestSchema>;

export type PushInitiation = {
  requestId: string;
  challenge: string;
  expiresAt: Date;
  notificationsSent: number;
};

export type PushStatusView = {
  requestId: string;
  status: PushStatus;
  purpose: PushPurpose;
  expiresAt: string;
  respondedAt: string | null;
};
