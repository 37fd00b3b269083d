// src/libs/logger.ts
// ============================================================================
// Logger-Vertrag fuer Flows
// ----------------------------------------------------------------------------
// - HTTP: Fastify-Logger (pino) wird durchgereicht
// - Skripte/Tests: eigener pino-Logger
// ============================================================================

import pino from "pino";
import type { FastifyBaseLogger } from "fastify";
import { env } from "./env.js";

export type Logger = Pick<FastifyBaseLogger, "debug" | "info" | "warn" | "error">;

export function createLogger(name: string, level: string = env.LOG_LEVEL): Logger {
  return pino({ name, level });
}
