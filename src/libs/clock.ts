// src/libs/clock.ts
// ============================================================================
// Zeitquelle fuer alle Ablauf-/Cooldown-Pruefungen
// ----------------------------------------------------------------------------
// Flows rufen nie Date.now() direkt auf, sondern deps.clock.now().
// Tests injizieren eine manuell vorgestellte Uhr.
// ============================================================================

export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};

export function addSeconds(date: Date, seconds: number): Date {
  return new Date(date.getTime() + seconds * 1000);
}

/** Unix-Sekunden (JWT iat/exp). */
export function toEpochSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}
