// src/libs/notify.ts
// ============================================================================
// Notification-Dispatcher (SMS / E-Mail / Web Push)
// ----------------------------------------------------------------------------
// - E-Mail: nodemailer (SMTP, in DEV Mailpit)
// - SMS: JSON-Webhook eines SMS-Providers
// - Push: web-push mit VAPID
//
// Jeder Versand wird intern mit Backoff wiederholt und liefert ein Ergebnis
// statt zu werfen. Flows rufen den Dispatcher nur ueber dispatchInBackground()
// auf: der Zustandsuebergang ist zu diesem Zeitpunkt bereits geschrieben.
// ============================================================================

import webpush from "web-push";
import type { Logger } from "./logger.js";
import type { MailTransport } from "./mail.js";
import { NonRetryableError, withRetry, type RetryConfig } from "./retry.js";

export type DeliveryResult = {
  ok: boolean;
  attempts: number;
  error?: string;
};

export type PushTarget = {
  endpoint: string;
  keys: {
    p256dh: string;
    auth: string;
  };
};

export interface NotificationDispatcher {
  sendSms(to: string, body: string): Promise<DeliveryResult>;
  sendEmail(to: string, subject: string, body: string): Promise<DeliveryResult>;
  sendPush(target: PushTarget, payload: Record<string, unknown>): Promise<DeliveryResult>;
}

export type ProviderDispatcherOptions = {
  mail: MailTransport;
  mailFrom: string;
  smsWebhookUrl?: string;
  smsWebhookToken?: string;
  vapid?: {
    subject: string;
    publicKey: string;
    privateKey: string;
  };
  pushTtlSec: number;
  retry: RetryConfig;
};

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function readStatusCode(err: unknown): number | undefined {
  if (typeof err !== "object" || err === null || !("statusCode" in err)) return undefined;
  return typeof err.statusCode === "number" ? err.statusCode : undefined;
}

export class ProviderDispatcher implements NotificationDispatcher {
  constructor(private readonly opts: ProviderDispatcherOptions) {}

  private async deliver(operation: () => Promise<unknown>): Promise<DeliveryResult> {
    const outcome = await withRetry(operation, this.opts.retry);
    return outcome.ok
      ? { ok: true, attempts: outcome.attempts }
      : { ok: false, attempts: outcome.attempts, error: errorMessage(outcome.error) };
  }

  sendEmail(to: string, subject: string, body: string): Promise<DeliveryResult> {
    return this.deliver(() =>
      this.opts.mail.sendMail({
        from: this.opts.mailFrom,
        to,
        subject,
        text: body,
      }),
    );
  }

  sendSms(to: string, body: string): Promise<DeliveryResult> {
    const { smsWebhookUrl, smsWebhookToken } = this.opts;
    if (!smsWebhookUrl) {
      return Promise.resolve({ ok: false, attempts: 0, error: "sms_provider_not_configured" });
    }

    return this.deliver(async () => {
      const res = await fetch(smsWebhookUrl, {
        method: "POST",
        headers: {
          "content-type": "application/json",
          ...(smsWebhookToken ? { authorization: `Bearer ${smsWebhookToken}` } : {}),
        },
        body: JSON.stringify({ to, body }),
      });

      if (res.ok) return;
      // 4xx (ausser 429) wird durch Wiederholen nicht besser
      if (res.status >= 400 && res.status < 500 && res.status !== 429) {
        throw new NonRetryableError(`sms_provider_rejected_${res.status}`);
      }
      throw new Error(`sms_provider_failed_${res.status}`);
    });
  }

  sendPush(target: PushTarget, payload: Record<string, unknown>): Promise<DeliveryResult> {
    const { vapid, pushTtlSec } = this.opts;
    if (!vapid) {
      return Promise.resolve({ ok: false, attempts: 0, error: "vapid_not_configured" });
    }

    return this.deliver(async () => {
      try {
        await webpush.sendNotification(target, JSON.stringify(payload), {
          vapidDetails: vapid,
          TTL: pushTtlSec,
        });
      } catch (err) {
        const status = readStatusCode(err);
        // 404/410: Subscription existiert beim Push-Dienst nicht mehr
        if (status === 404 || status === 410) {
          throw new NonRetryableError(`push_subscription_gone_${status}`);
        }
        throw err;
      }
    });
  }
}

/**
 * Versand ohne auf das Ergebnis zu warten. Fehler werden geloggt, nie
 * an den Aufrufer durchgereicht.
 */
export function dispatchInBackground(
  log: Logger,
  event: string,
  context: Record<string, unknown>,
  send: () => Promise<DeliveryResult>,
): void {
  void send()
    .then((result) => {
      if (result.ok) {
        log.debug({ ...context, attempts: result.attempts }, `${event}_sent`);
      } else {
        log.warn({ ...context, attempts: result.attempts, error: result.error }, `${event}_failed`);
      }
    })
    .catch((err: unknown) => {
      log.error({ ...context, err }, `${event}_failed`);
    });
}
