/**
 * Retry mit exponentiellem Backoff und Full Jitter.
 *
 * Genutzt vom Notification-Dispatcher: Versand-Fehler werden hier
 * wiederholt, ohne den Zustandsuebergang des Aufrufers zu blockieren.
 */

export interface RetryConfig {
  /** Maximale Anzahl Wiederholungen (ohne Erstversuch) */
  maxRetries: number;
  /** Basis-Verzoegerung in ms */
  baseDelayMs: number;
  /** Obergrenze pro Wartezeit in ms */
  maxDelayMs: number;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxRetries: 3,
  baseDelayMs: 200,
  maxDelayMs: 5000,
};

export class NonRetryableError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "NonRetryableError";
  }
}

/** Volle Jitter-Verzoegerung: zufaellig in [0, min(base * 2^attempt, max)). */
export function calculateDelay(attempt: number, config: RetryConfig = DEFAULT_RETRY_CONFIG): number {
  const exponentialDelay = config.baseDelayMs * Math.pow(2, attempt);
  const cappedDelay = Math.min(exponentialDelay, config.maxDelayMs);
  return Math.floor(Math.random() * cappedDelay);
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export type RetryOutcome<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; error: unknown; attempts: number };

/**
 * Fuehrt operation bis zu maxRetries + 1 mal aus. Wirft nie; das Ergebnis
 * traegt den letzten Fehler. NonRetryableError bricht sofort ab.
 */
export async function withRetry<T>(
  operation: () => Promise<T>,
  config: RetryConfig = DEFAULT_RETRY_CONFIG,
  wait: (ms: number) => Promise<void> = sleep,
): Promise<RetryOutcome<T>> {
  let lastError: unknown;

  for (let attempt = 0; attempt <= config.maxRetries; attempt++) {
    try {
      const value = await operation();
      return { ok: true, value, attempts: attempt + 1 };
    } catch (error) {
      lastError = error;

      if (error instanceof NonRetryableError || attempt >= config.maxRetries) {
        return { ok: false, error, attempts: attempt + 1 };
      }

      await wait(calculateDelay(attempt, config));
    }
  }

  return { ok: false, error: lastError, attempts: config.maxRetries + 1 };
}
