// ============================================================================
// src/libs/redis.ts
// ----------------------------------------------------------------------------
// Redis-Integration (ioredis v5)
// - nutzt env.REDIS_URL oder granularen Fallback
// - globaler Singleton-Client (lazyConnect, Verbindung erst in ensureRedis)
// - Store fuer @fastify/rate-limit
// - Trailing-Window-Zaehler (Sorted Set) fuer Recovery-Missbrauchsschutz
// ============================================================================
import { Redis } from "ioredis";
import { createHash, randomUUID } from "node:crypto";
import { env } from "./env.js";

// globaler Cache fuer Singleton (verhindert Mehrfachverbindungen im Dev)
const GLOBAL_KEY = "__factor_auth_redis__" as const;
type GlobalWithRedis = typeof globalThis & { [GLOBAL_KEY]?: Redis };
const g: GlobalWithRedis = globalThis;

const KEY_PART_RE = /^[a-z0-9:_.-]{1,128}$/;

// -----------------------------
// Client-Erzeugung
// -----------------------------
function createClient(): Redis {
  const url = env.REDIS_URL ?? "redis://localhost:6379";

  const client = new Redis(url, {
    lazyConnect: true,
    enableReadyCheck: true,
    enableAutoPipelining: true,
    maxRetriesPerRequest: 3,
    retryStrategy: (times: number) => Math.min(1000 * times, 10_000),
  });

  client.on("error", (err) => console.error("[redis] error", err));
  return client;
}

export function getRedis(): Redis {
  const existing = g[GLOBAL_KEY];
  if (existing) return existing;
  const created = createClient();
  g[GLOBAL_KEY] = created;
  return created;
}

// -----------------------------
// Health & Lifecycle
// -----------------------------
export async function ensureRedis() {
  const redis = getRedis();
  if (redis.status === "wait" || redis.status === "end") {
    await redis.connect();
  }
  await redis.ping();
}

export async function redisHealth(): Promise<{ ok: boolean; ping?: string; mode: string }> {
  const redis = getRedis();
  try {
    const pong = await redis.ping();
    return { ok: pong === "PONG", ping: pong, mode: redis.status };
  } catch {
    return { ok: false, mode: redis.status };
  }
}

export async function quitRedis() {
  const redis = g[GLOBAL_KEY];
  if (!redis) return;
  try {
    await redis.quit();
  } catch {
    redis.disconnect();
  }
  delete g[GLOBAL_KEY];
}

// -----------------------------
// Key-Helper
// -----------------------------
function hashKeyPart(input: string): string {
  return createHash("sha256").update(input, "utf8").digest("hex");
}

function normalizedKeyPart(input: string): string {
  const value = input.trim().toLowerCase();
  if (KEY_PART_RE.test(value)) return value;
  return hashKeyPart(input);
}

export function namespacedKey(...parts: string[]): string {
  return [env.REDIS_NAMESPACE, ...parts.map(normalizedKeyPart)].join(":");
}

// -----------------------------
// Trailing-Window-Zaehler
// -----------------------------
export type WindowHit = {
  allowed: boolean;
  count: number;
  retryAfterSec: number;
};

/**
 * Zaehlt einen Versuch im gleitenden Fenster [now - windowSec, now].
 * Abgelehnte Versuche werden wieder entfernt und zaehlen nicht mit.
 */
export async function slidingWindowHit(
  key: string,
  windowSec: number,
  max: number,
  nowMs: number,
): Promise<WindowHit> {
  const redis = getRedis();
  const windowMs = windowSec * 1000;
  const member = `${nowMs}:${randomUUID()}`;

  const results = await redis
    .multi()
    .zremrangebyscore(key, 0, nowMs - windowMs)
    .zadd(key, nowMs, member)
    .zcard(key)
    .zrange(key, 0, 0, "WITHSCORES")
    .pexpire(key, windowMs)
    .exec();

  const cardRaw = results?.[2]?.[1];
  const count = typeof cardRaw === "number" ? cardRaw : 0;

  if (count <= max) {
    return { allowed: true, count, retryAfterSec: 0 };
  }

  await redis.zrem(key, member);

  const oldestRaw = results?.[3]?.[1];
  const oldestScore =
    Array.isArray(oldestRaw) && typeof oldestRaw[1] === "string" ? Number(oldestRaw[1]) : nowMs;
  const retryAfterSec = Math.max(1, Math.ceil((oldestScore + windowMs - nowMs) / 1000));

  return { allowed: false, count: count - 1, retryAfterSec };
}
