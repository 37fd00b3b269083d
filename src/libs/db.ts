// src/libs/db.ts
// ============================================================================
// PostgreSQL Connector
// - Ein zentraler Connection-Pool pro Prozess (Dokument-Store + auth.users)
// - Healthcheck fuer /health & /health/db
// - Graceful Shutdown (onClose in app.ts)
// ============================================================================

import pg from "pg";
import { env } from "./env.js";

const { Pool } = pg;

/**
 * Globaler Pool. Verbindet lazy: der erste Query baut die Verbindung auf,
 * Tests ohne DB importieren das Modul folgenlos.
 */
export const pool = new Pool({
  connectionString: env.DATABASE_URL,
  max: 10,
  idleTimeoutMillis: 10_000,
  connectionTimeoutMillis: 5_000,
});

export async function dbHealth(): Promise<{ ok: boolean; error?: string }> {
  try {
    await pool.query("SELECT 1;");
    return { ok: true };
  } catch (err: unknown) {
    const message =
      err instanceof Error ? err.message : "unknown database error";

    return {
      ok: false,
      error: message,
    };
  }
}

export async function closeDb(): Promise<void> {
  await pool.end();
}
