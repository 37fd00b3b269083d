// src/server.ts
// ============================================================================
// Bootstrap für den Factor-Auth-Service
// ----------------------------------------------------------------------------
// Aufgaben:
//  - Prozessstart: buildApp() + listen()
//  - Housekeeping-Intervall (Sweeper fuer abgelaufene Challenges/Codes)
//  - Prozessweite Fehlerwächter (unhandledRejection / uncaughtException)
//  - Geordneter Shutdown mit Timeout-Guard (SIGINT, SIGTERM, SIGUSR2)
//  - Node-HTTP Low-Level Timeouts (gegen Slowloris / hängende Verbindungen)
// ============================================================================

import { buildApp, setReady } from "./app.js";
import { env, logEnvSummary } from "./libs/env.js";
import { runHousekeeping } from "./modules/housekeeping/service.js";

// Shutdown-Konfiguration
// Maximale Wartezeit für geordnetes Beenden, bevor hart terminiert wird.
const SHUTDOWN_TIMEOUT_MS = Number(process.env.SHUTDOWN_TIMEOUT_MS ?? 10_000);

// HTTP-Timeouts (Node-Server-Ebene, zusätzlich zu Fastify-Optionen)
const REQUEST_TIMEOUT_MS = Number(process.env.REQUEST_TIMEOUT_MS ?? 30_000);
const HEADERS_TIMEOUT_MS = Number(process.env.HEADERS_TIMEOUT_MS ?? 61_000);
const KEEPALIVE_TIMEOUT_MS = Number(process.env.KEEPALIVE_TIMEOUT_MS ?? 65_000);

// Doppel-Start/Mehrfach-Shutdown verhindern
let app: Awaited<ReturnType<typeof buildApp>> | undefined;
let housekeepingTimer: NodeJS.Timeout | undefined;
let housekeepingRunning = false;
let startingUp = false;
let shuttingDown = false;

/**
 * Loggt über den Fastify-Logger (pino), vor dem Start über console.*
 */
function safeLog(level: "info" | "warn" | "error", msg: string, extra: Record<string, unknown> = {}) {
  if (app) {
    app.log[level]({ ctx: "server", ...extra }, msg);
    return;
  }
  const fn = level === "error" ? console.error : level === "warn" ? console.warn : console.log;
  fn(msg, extra);
}

// ============================================================================
// Prozessweite Fehlerwächter
// ============================================================================

process.on("unhandledRejection", (reason) => {
  safeLog("error", "unhandled_rejection", { reason });
  // Kein harter Exit → Shutdown wird über Signal ausgelöst.
});

process.on("uncaughtException", (err) => {
  safeLog("error", "uncaught_exception", { err });
  void shutdown("uncaughtException");
});

// ============================================================================
// Housekeeping
// ============================================================================

async function housekeepingTick() {
  // Ein Lauf gleichzeitig; langsame DB -> Tick auslassen
  if (!app || housekeepingRunning) return;
  housekeepingRunning = true;
  try {
    await runHousekeeping(app.deps);
  } catch (err) {
    safeLog("error", "housekeeping_tick_failed", { err });
  } finally {
    housekeepingRunning = false;
  }
}

function startHousekeeping() {
  if (env.HOUSEKEEPING_INTERVAL_SEC === 0) {
    safeLog("info", "housekeeping_disabled");
    return;
  }
  housekeepingTimer = setInterval(() => void housekeepingTick(), env.HOUSEKEEPING_INTERVAL_SEC * 1000);
  housekeepingTimer.unref();
}

// ============================================================================
// Start & Listen
// ============================================================================

async function start() {
  if (startingUp) return;
  startingUp = true;

  try {
    app = await buildApp();

    // Node-HTTP Low-Level Timeouts zusätzlich zu Fastify-Options
    app.server.requestTimeout = REQUEST_TIMEOUT_MS;
    app.server.headersTimeout = HEADERS_TIMEOUT_MS;
    app.server.keepAliveTimeout = KEEPALIVE_TIMEOUT_MS;

    const log = app.log;
    logEnvSummary((msg, extra) => log.info({ env: extra }, msg));

    app.log.info(
      {
        env: env.NODE_ENV,
        pid: process.pid,
        node: process.version,
        host: env.HOST,
        port: env.PORT,
        requestTimeoutMs: REQUEST_TIMEOUT_MS,
        headersTimeoutMs: HEADERS_TIMEOUT_MS,
        keepAliveTimeoutMs: KEEPALIVE_TIMEOUT_MS,
      },
      "factor_auth_bootstrap",
    );

    await app.listen({ host: env.HOST, port: env.PORT });
    startHousekeeping();

    app.log.info({ address: app.server.address() }, "factor_auth_listening");
  } catch (err) {
    // Startfehler → sauberer Exit, damit Orchestrator (Docker/K8s) neu starten kann.
    console.error("server_start_failed", err);
    process.exitCode = 1;
    setTimeout(() => process.exit(1), 50); // kurze Verzögerung, damit Logs flushen
  }
}

// ============================================================================
// Geordneter Shutdown
// ============================================================================

async function shutdown(reason: string) {
  if (shuttingDown) return;
  shuttingDown = true;

  // Fail-Safe: falls irgendwas hängt, nach Timeout hart beenden
  const killTimer = setTimeout(() => {
    safeLog("error", "shutdown_forced_exit", { timeoutMs: SHUTDOWN_TIMEOUT_MS, reason });
    process.exit(1);
  }, SHUTDOWN_TIMEOUT_MS);
  killTimer.unref();

  try {
    safeLog("info", "shutdown_received", { reason });

    // 1) Readiness sofort degradieren, Loadbalancer nimmt Instanz raus
    setReady(false);
    if (housekeepingTimer) clearInterval(housekeepingTimer);

    // 2) HTTP-Server schließen: offene Requests dürfen auslaufen
    if (app) {
      await app.close(); // triggert onClose-Hooks (closeDb(), Redis)
      safeLog("info", "server_closed");
    }

    clearTimeout(killTimer);
    process.exit(0);
  } catch (err) {
    safeLog("error", "shutdown_error", { err });
    clearTimeout(killTimer);
    process.exit(1);
  }
}

// ============================================================================
// Signal-Handler (einmalig registriert)
// ============================================================================
// SIGINT  = Ctrl+C / `docker stop`
// SIGTERM = Standard-Stop in Docker/Kubernetes
// SIGUSR2 = häufig von nodemon im Dev-Modus genutzt

process.once("SIGINT", () => void shutdown("SIGINT"));
process.once("SIGTERM", () => void shutdown("SIGTERM"));
process.once("SIGUSR2", () => void shutdown("SIGUSR2"));

void start();
