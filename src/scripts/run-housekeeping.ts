// src/scripts/run-housekeeping.ts
// Einmaliger Sweeper-Lauf (Cron/K8s-Job): npm run housekeeping
// Exit-Code 1, wenn mindestens ein Sweeper fehlschlaegt.

import { createDefaultDeps } from "../deps.js";
import { closeDb } from "../libs/db.js";
import { createLogger } from "../libs/logger.js";
import { ensureRedis, quitRedis } from "../libs/redis.js";
import { runHousekeeping } from "../modules/housekeeping/service.js";

const log = createLogger("housekeeping");

async function main() {
  await ensureRedis();
  const deps = createDefaultDeps(log);

  try {
    const report = await runHousekeeping(deps);
    const failed = Object.entries(report).filter(([, outcome]) => !outcome.ok);
    if (failed.length > 0) {
      log.error({ failed: failed.map(([job]) => job) }, "housekeeping_partial_failure");
      process.exitCode = 1;
    }
  } finally {
    await quitRedis();
    await closeDb();
  }
}

main().catch((err) => {
  log.error({ err }, "housekeeping_failed");
  process.exit(1);
});
