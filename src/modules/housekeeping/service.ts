// src/modules/housekeeping/service.ts
// ============================================================================
// Housekeeping: alle Sweeper nacheinander
// ----------------------------------------------------------------------------
// - Aufruf: Intervall in server.ts, POST /internal/housekeeping/run,
//   scripts/run-housekeeping.ts
// - Ein fehlschlagender Sweeper stoppt die anderen nicht; der naechste Lauf
//   holt nach. Mehrfaches Ausfuehren ist ein No-op.
// ============================================================================

import type { AuthDeps } from "../../deps.js";
import { recordSweep } from "../../libs/metrics.js";
import { cleanupExpiredOtps } from "../otp/service.js";
import { sweepExpiredChallenges } from "../passkeys/service.js";
import { sweepExpiredPushRequests } from "../push/service.js";
import { sweepExpiredRecoveries } from "../recovery/service.js";

export const SWEEPERS = {
  otp_codes: cleanupExpiredOtps,
  passkey_challenges: sweepExpiredChallenges,
  push_auth_requests: sweepExpiredPushRequests,
  recovery_requests: sweepExpiredRecoveries,
} as const satisfies Record<string, (deps: AuthDeps) => Promise<number>>;

export type SweepJob = keyof typeof SWEEPERS;

export type SweepOutcome = { ok: true; changed: number } | { ok: false; error: string };

export type HousekeepingReport = Record<SweepJob, SweepOutcome>;

async function runJob(deps: AuthDeps, job: SweepJob): Promise<SweepOutcome> {
  try {
    const changed = await SWEEPERS[job](deps);
    recordSweep(job, changed);
    return { ok: true, changed };
  } catch (err) {
    deps.log.error({ err, job }, "housekeeping_job_failed");
    return { ok: false, error: err instanceof Error ? err.message : String(err) };
  }
}

export async function runHousekeeping(deps: AuthDeps): Promise<HousekeepingReport> {
  const report: HousekeepingReport = {
    otp_codes: await runJob(deps, "otp_codes"),
    passkey_challenges: await runJob(deps, "passkey_challenges"),
    push_auth_requests: await runJob(deps, "push_auth_requests"),
    recovery_requests: await runJob(deps, "recovery_requests"),
  };

  deps.log.info({ report }, "housekeeping_completed");
  return report;
}
