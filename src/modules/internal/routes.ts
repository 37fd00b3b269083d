// src/modules/internal/routes.ts
// ============================================================================
// Internal Routes (service-to-service)
// ----------------------------------------------------------------------------
// - POST /internal/housekeeping/run -> alle Sweeper sofort ausfuehren
//   (Cron/Orchestrator; Header x-internal-token)
// Ohne konfigurierten INTERNAL_API_TOKEN ist der Endpunkt aus (404).
// ============================================================================

import type { FastifyInstance } from "fastify";
import { constantTimeEqual } from "../../libs/crypto.js";
import { sendApiError } from "../../libs/error-response.js";
import { readHeaderValue } from "../../libs/http.js";
import { runHousekeeping } from "../housekeeping/service.js";

export type InternalRoutesOptions = {
  internalToken?: string;
};

export default async function internalRoutes(app: FastifyInstance, opts: InternalRoutesOptions) {
  app.post("/housekeeping/run", async (req, reply) => {
    const expected = opts.internalToken;
    if (!expected) {
      return sendApiError(reply, 404, "NOT_FOUND", "Not found.");
    }

    const presented = readHeaderValue(req.headers["x-internal-token"]);
    if (!presented || !constantTimeEqual(presented, expected)) {
      return sendApiError(reply, 401, "UNAUTHORIZED", "Invalid internal token.");
    }

    const report = await runHousekeeping(app.deps);
    return reply.send({ ok: true, report });
  });
}
