// src/app.ts
// ============================================================================
// Factor-Auth-Service (Fastify)
// ----------------------------------------------------------------------------
// Verantwortlichkeiten:
//  - Zentrales Fastify-Setup (Logger, Timeouts, CORS, Rate-Limit)
//  - Flow-Abhaengigkeiten (deps) anhaengen; Tests reichen Stand-ins rein
//  - Redis-Init + Health, DB-Health + SMTP-Health
//  - /health, /healthz, /readyz, /health/*, /metrics
//  - Registrierung der Faktor-Module hinter dem Auth-Plugin
//  - Graceful Shutdown (Redis + DB via onClose)
// ============================================================================

import Fastify, {
  type FastifyInstance,
  type FastifyReply,
  type FastifyServerOptions,
} from "fastify";
import cors from "@fastify/cors";
import { randomUUID } from "node:crypto";

import { createDefaultDeps, type AuthDeps } from "./deps.js";
import authPlugin from "./plugins/auth.js";
import depsPlugin from "./plugins/deps.js";
import rateLimitPlugin from "./plugins/rate-limit.js";

import { ensureRedis, getRedis, redisHealth, quitRedis } from "./libs/redis.js";
import { env } from "./libs/env.js";
import { dbHealth, closeDb } from "./libs/db.js";
import { mailHealth } from "./libs/mail.js";
import { apiError } from "./libs/error-response.js";
import { mapDbError } from "./libs/error-map.js";
import { getRouteId } from "./libs/http.js";
import { recordHttpRequest, renderPrometheusMetrics } from "./libs/metrics.js";

// Faktor-Module (Routen-Plugins)
import internalRoutes from "./modules/internal/routes.js";
import methodRoutes from "./modules/methods/routes.js";
import otpRoutes from "./modules/otp/routes.js";
import passkeyRoutes from "./modules/passkeys/routes.js";
import pushRoutes from "./modules/push/routes.js";
import recoveryRoutes from "./modules/recovery/routes.js";
import totpRoutes from "./modules/totp/routes.js";

// ---------------------------------------------------------------------------
// Readiness-Flag (von server.ts über setReady() manipulierbar)
// ---------------------------------------------------------------------------

let isReady = false;

export function setReady(ready: boolean) {
  isReady = ready;
}

// Optionale Start-Parameter für Tests / spezielle Umgebungen
export type AppOptions = FastifyServerOptions & {
  /** Flow-Abhaengigkeiten; ohne Angabe: Postgres, Redis, SMTP, Web-Push. */
  deps?: AuthDeps;
  /** false: kein Redis (Rate-Limit im Speicher, kein Redis-Lifecycle). */
  useRedis?: boolean;
  enableCors?: boolean;
  internalToken?: string;
};

// ---------------------------------------------------------------------------
// Hilfsfunktion: Faktor-Module registrieren (Auth-Plugin vor den Routen)
// ---------------------------------------------------------------------------

async function registerAuthModules(app: FastifyInstance) {
  await app.register(async (instance) => {
    // Auth (JWT -> request.user) fuer Routen mit config.auth === true
    instance.register(authPlugin);

    instance.register(methodRoutes, { prefix: "/auth/methods" });
    instance.register(totpRoutes, { prefix: "/auth/totp" });
    instance.register(passkeyRoutes, { prefix: "/auth/passkeys" });
    instance.register(otpRoutes, { prefix: "/auth/otp" });
    instance.register(pushRoutes, { prefix: "/auth/push" });
    instance.register(recoveryRoutes, { prefix: "/auth/recovery" });
  });
}

// ---------------------------------------------------------------------------
// Hilfsfunktion: Health- und Observability-Routen registrieren
// ---------------------------------------------------------------------------

type ComponentState = "ok" | "degraded" | "down" | "unknown";

async function registerHealthRoutes(app: FastifyInstance, useRedis: boolean) {
  // Basis-Info / Root
  app.get("/", async () => ({
    ok: true,
    service: "factor-auth-service",
    ts: Date.now(),
  }));

  // Prometheus endpoint (optional per config)
  app.get("/metrics", async (_req, reply) => {
    if (!env.METRICS_ENABLED) {
      return reply.code(404).send(apiError(404, "NOT_FOUND", "Not found."));
    }
    reply.type("text/plain; version=0.0.4; charset=utf-8");
    return reply.send(renderPrometheusMetrics());
  });

  // Liveness: lebt der Prozess?
  app.get("/healthz", async () => ({ status: "alive", pid: process.pid }));
  app.get("/health/live", async () => ({ status: "alive", pid: process.pid }));

  const checkRedis = async () => (useRedis ? redisHealth() : { ok: true, mode: "disabled" });

  // Zentrales Health-Aggregat (Docker-Healthcheck haengt an /health)
  app.get("/health", async (_req, reply) => {
    const services: Record<"redis" | "db" | "smtp", ComponentState> = {
      redis: "unknown",
      db: "unknown",
      smtp: "unknown",
    };

    let overall: "ok" | "degraded" | "down" = isReady ? "ok" : "degraded";

    const rh = await checkRedis();
    services.redis = rh.ok ? "ok" : "down";
    if (!rh.ok) overall = "down";

    const dh = await dbHealth();
    services.db = dh.ok ? "ok" : "down";
    if (!dh.ok) overall = "down";

    // SMTP ist fuer Codes wichtig, aber kein Grund fuer "down"
    const sh = await mailHealth();
    services.smtp = sh.ok ? "ok" : "degraded";
    if (!sh.ok && overall === "ok") overall = "degraded";

    return reply.code(overall === "down" ? 503 : 200).send({
      status: overall,
      env: env.NODE_ENV,
      ready: isReady,
      services,
      ts: new Date().toISOString(),
    });
  });

  const handleReady = async (_req: unknown, reply: FastifyReply) => {
    if (!isReady) {
      return reply.code(503).send({ status: "starting", ready: false });
    }

    const rh = await checkRedis();
    if (!rh.ok) {
      return reply.code(503).send({ status: "degraded", redis: rh, ready: false });
    }

    return reply.send({ status: "ready", ready: true });
  };

  // Readiness fuer Loadbalancer/K8s
  app.get("/readyz", handleReady);
  app.get("/health/ready", handleReady);

  // Detail-Endpoints
  app.get("/health/redis", async (_req, reply) => {
    const rh = await checkRedis();
    return reply.code(rh.ok ? 200 : 503).send(rh);
  });

  app.get("/health/db", async (_req, reply) => {
    const dh = await dbHealth();
    return reply.code(dh.ok ? 200 : 503).send({ status: dh.ok ? "ok" : "down", ...dh });
  });

  app.get("/health/smtp", async (_req, reply) => {
    const sh = await mailHealth();
    return reply.send({ status: sh.ok ? "ok" : "degraded", ...sh });
  });
}

// ---------------------------------------------------------------------------
// Haupt-Fabrikfunktion: baut eine Fastify-Instanz
// ---------------------------------------------------------------------------

export async function buildApp(opts: AppOptions = {}): Promise<FastifyInstance> {
  const {
    deps: injectedDeps,
    useRedis = true,
    enableCors = true,
    internalToken = env.INTERNAL_API_TOKEN,
    logger = { level: env.LOG_LEVEL },
    ...rest
  } = opts;

  const app = Fastify({
    logger,
    trustProxy: env.TRUST_PROXY,
    requestIdHeader: env.REQUEST_ID_HEADER,
    requestIdLogLabel: "request_id",
    genReqId: () => randomUUID(),
    requestTimeout: 30_000,
    connectionTimeout: 10_000,
    keepAliveTimeout: 65_000,
    ...rest,
  });

  // Eigene Stand-ins (Tests) -> keine Infrastruktur schliessen
  const ownsInfrastructure = injectedDeps === undefined;
  const deps = injectedDeps ?? createDefaultDeps(app.log);
  await app.register(depsPlugin, { deps });

  app.addHook("onRequest", async (request, reply) => {
    request.requestStartedAtNs = process.hrtime.bigint();
    reply.header(env.REQUEST_ID_HEADER, request.id);
  });

  app.addHook("onSend", async (_request, reply, payload) => {
    // Baseline Security Headers for auth endpoints.
    reply.header("X-Content-Type-Options", "nosniff");
    reply.header("Referrer-Policy", "no-referrer");
    reply.header("X-Frame-Options", "DENY");
    reply.header("Permissions-Policy", "geolocation=(), microphone=(), camera=()");
    reply.header("Content-Security-Policy", "frame-ancestors 'none'");
    return payload;
  });

  app.addHook("onResponse", async (request, reply) => {
    const started = request.requestStartedAtNs;
    if (!started) return;

    const durationNs = process.hrtime.bigint() - started;
    const durationSeconds = Number(durationNs) / 1_000_000_000;
    recordHttpRequest(
      request.method,
      getRouteId(request),
      reply.statusCode,
      durationSeconds,
    );
  });

  // Basis-Plugins (CORS, Rate-Limit)
  const DEFAULT_CORS_ORIGINS = [
    "http://localhost:5173", // Vite dev
    "http://localhost:3000", // Docker lokal
  ];

  const corsAllowlist =
    env.CORS_ORIGIN === "*"
      ? DEFAULT_CORS_ORIGINS
      : env.CORS_ORIGIN
          .split(",")
          .map((o) => o.trim())
          .filter(Boolean);

  if (enableCors) {
    await app.register(cors, {
      origin: (origin, cb) => {
        if (!origin) return cb(null, true);
        return cb(null, corsAllowlist.includes(origin));
      },
      methods: ["GET", "POST", "OPTIONS"],
      credentials: true,
      maxAge: 86_400,
    });
  }

  await app.register(rateLimitPlugin, useRedis ? { redis: getRedis() } : {});

  // Redis-Initialisierung (onReady-Hook)
  app.addHook("onReady", async () => {
    if (useRedis) {
      try {
        await ensureRedis();
        app.log.info("Redis connection established");
      } catch (err) {
        app.log.error({ err }, "Redis initialization failed");
      }
    }

    isReady = true;
  });

  await app.register(internalRoutes, { prefix: "/internal", internalToken });
  await registerAuthModules(app);

  // Health & Observability
  await registerHealthRoutes(app, useRedis);

  // Error-/NotFound-Handler
  app.setErrorHandler((err, req, reply) => {
    if (!err.statusCode && err.code) {
      const mappedDbError = mapDbError(err);
      if (mappedDbError.code !== "INTERNAL") {
        req.log.error({ err }, "store_error");
        return reply
          .code(mappedDbError.status)
          .type("application/json")
          .send(apiError(mappedDbError.status, mappedDbError.code, mappedDbError.message));
      }
    }

    const status = err.statusCode ?? (err.validation ? 400 : 500);
    if (status >= 500) {
      req.log.error({ err }, "unhandled_error");
    } else {
      req.log.warn({ err }, "request_failed");
    }

    const code =
      status === 400
        ? "VALIDATION_FAILED"
        : status === 401
          ? "UNAUTHORIZED"
          : status === 403
            ? "FORBIDDEN"
            : status === 404
              ? "NOT_FOUND"
              : status === 429
                ? "RATE_LIMITED"
                : "INTERNAL";
    const message = status === 500 ? "Internal server error." : err.message || "Request failed.";

    return reply
      .code(status)
      .type("application/json")
      .send(apiError(status, err.code ?? code, message, err.validation));
  });

  app.setNotFoundHandler((req, reply) => {
    return reply
      .code(404)
      .send(apiError(404, "NOT_FOUND", `Route ${req.method}:${req.url} not found`));
  });

  // Graceful Shutdown Hooks (werden von server.ts via app.close() getriggert)
  app.addHook("onClose", async () => {
    if (!ownsInfrastructure) return;

    if (useRedis) {
      try {
        await quitRedis();
        app.log.info("Redis connection closed");
      } catch (err) {
        app.log.warn({ err }, "Redis shutdown failed");
      }
    }

    try {
      await closeDb();
      app.log.info("DB pool closed");
    } catch (err) {
      app.log.warn({ err }, "DB shutdown failed");
    }
  });

  return app;
}
