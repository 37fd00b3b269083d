// ============================================================================
// src/plugins/rate-limit.ts
// ----------------------------------------------------------------------------
// HTTP-Rate-Limiting (@fastify/rate-limit)
// - Cluster: gemeinsamer Redis-Store (ioredis-Singleton)
// - Ohne Redis (Tests): In-Memory-Store des Plugins
// - Schluessel: IP + Route
// - Health/Metrics ausgenommen
// - Allowlist via ENV
// ============================================================================
import fp from "fastify-plugin";
import rateLimit from "@fastify/rate-limit";
import type { FastifyPluginAsync, FastifyRequest } from "fastify";
import type { Redis } from "ioredis";
import { env } from "../libs/env.js";
import { getRouteId, isHealthPath } from "../libs/http.js";

export type RateLimitPluginOptions = {
  redis?: Redis;
};

/** Route-Config fuer Code-Versand, Verifikation und Recovery-Start. */
export const SENSITIVE_RATE_LIMIT = {
  max: env.RATE_LIMIT_SENSITIVE_MAX,
  timeWindow: `${env.RATE_LIMIT_WINDOW} seconds`,
};

const allowSet = new Set(env.RATE_LIMIT_ALLOW_ITEMS);

// Laeuft onRequest, also vor dem Auth-Plugin: nur IP + Route
function keyFor(req: FastifyRequest): string {
  return `ip:${req.ip}:${getRouteId(req)}`;
}

const rateLimitPlugin: FastifyPluginAsync<RateLimitPluginOptions> = async (app, opts) => {
  await app.register(rateLimit, {
    global: true,
    max: env.RATE_LIMIT_MAX,
    timeWindow: `${env.RATE_LIMIT_WINDOW} seconds`,
    ...(opts.redis ? { redis: opts.redis } : {}),
    keyGenerator: keyFor,
    allowList: (req) => allowSet.has(req.ip) || isHealthPath(req) || req.url === "/metrics",
    addHeaders: {
      "x-ratelimit-limit": true,
      "x-ratelimit-remaining": true,
      "x-ratelimit-reset": true,
      "retry-after": true,
    },
    // Wird geworfen und landet im Error-Handler von app.ts
    errorResponseBuilder: (_req, context) => ({
      statusCode: 429,
      code: "RATE_LIMITED",
      message: `Too many requests. Retry in ${context.after}.`,
    }),
  });

  app.log.info(
    {
      max: env.RATE_LIMIT_MAX,
      sensitiveMax: env.RATE_LIMIT_SENSITIVE_MAX,
      windowSec: env.RATE_LIMIT_WINDOW,
      store: opts.redis ? "redis" : "memory",
      allowListCount: allowSet.size,
    },
    "rate_limit_enabled",
  );
};

export default fp(rateLimitPlugin, { name: "rate-limit" });
