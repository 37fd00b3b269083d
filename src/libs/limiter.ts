// src/libs/limiter.ts
// Trailing-Window-Limiter fuer Missbrauchsschutz (Recovery-Starts pro E-Mail/IP).

import { namespacedKey, slidingWindowHit, type WindowHit } from "./redis.js";

export interface AttemptLimiter {
  hit(scope: string, subject: string, windowSec: number, max: number, now: Date): Promise<WindowHit>;
}

export const redisAttemptLimiter: AttemptLimiter = {
  hit: (scope, subject, windowSec, max, now) =>
    slidingWindowHit(namespacedKey("limit", scope, subject), windowSec, max, now.getTime()),
};
