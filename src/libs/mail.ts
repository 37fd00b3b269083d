// src/libs/mail.ts
// ============================================================================
// SMTP / Mailpit-Integration
// ----------------------------------------------------------------------------
// - Transport aus env.ts (SMTP_*), Credentials secrets-first
// - Healthcheck via transporter.verify()
// ============================================================================

import nodemailer from "nodemailer";
import { env } from "./env.js";

export const SMTP_FROM = env.SMTP_FROM;

export const transporter = nodemailer.createTransport({
  host: env.SMTP_HOST,
  port: env.SMTP_PORT,
  secure: env.SMTP_SECURE,
  auth:
    env.SMTP_USER && env.SMTP_PASS
      ? {
          user: env.SMTP_USER,
          pass: env.SMTP_PASS,
        }
      : undefined,
});

export interface MailTransport {
  sendMail(message: { from: string; to: string; subject: string; text: string }): Promise<unknown>;
}

// Health-Check für /health und /health/smtp
export async function mailHealth(): Promise<{
  ok: boolean;
  reason?: string;
}> {
  try {
    await transporter.verify();
    return { ok: true };
  } catch (err: unknown) {
    return {
      ok: false,
      reason: err instanceof Error ? err.message : "smtp_verify_failed",
    };
  }
}
