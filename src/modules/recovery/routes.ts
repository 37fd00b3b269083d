// src/modules/recovery/routes.ts
// ============================================================================
// Account-Recovery (/auth/recovery)
// ----------------------------------------------------------------------------
// start -> :id/email -> (:id/sms) -> :id/token
// Alle Endpunkte ohne Login; die Recovery-Id ist das Handle des Clients.
// ============================================================================

import type { FastifyInstance } from "fastify";
import { z } from "zod";
import { sendAuthFailure } from "../../libs/errors.js";
import { sendInvalidInput } from "../../libs/error-response.js";
import { requestContext } from "../../libs/http.js";
import { SENSITIVE_RATE_LIMIT } from "../../plugins/rate-limit.js";
import {
  cancelRecovery,
  getRecoveryStatus,
  issueRecoveryToken,
  resendRecoveryCode,
  startRecovery,
  verifyRecoveryEmail,
  verifyRecoverySms,
} from "./service.js";

const RecoveryParams = z.object({
  id: z.string().uuid(),
});

const StartBody = z.object({
  email: z.string().email(),
});

const CodeBody = z.object({
  code: z.string().regex(/^\d{4,10}$/),
});

export default async function recoveryRoutes(app: FastifyInstance) {
  const limited = { config: { rateLimit: SENSITIVE_RATE_LIMIT } };

  app.post("/start", limited, async (req, reply) => {
    const parse = StartBody.safeParse(req.body);
    if (!parse.success) return sendInvalidInput(reply, parse.error);

    const { ipAddress, userAgent } = requestContext(req);
    const result = await startRecovery(app.deps, { email: parse.data.email, ipAddress, userAgent });
    if (!result.ok) return sendAuthFailure(reply, result);

    return reply.code(202).send({
      recoveryId: result.value.recoveryId,
      expiresAt: result.value.expiresAt.toISOString(),
      nextStep: result.value.nextStep,
    });
  });

  app.get("/:id", async (req, reply) => {
    const params = RecoveryParams.safeParse(req.params);
    if (!params.success) return sendInvalidInput(reply, params.error);

    const result = await getRecoveryStatus(app.deps, params.data.id);
    if (!result.ok) return sendAuthFailure(reply, result);
    return reply.send(result.value);
  });

  app.post("/:id/email", limited, async (req, reply) => {
    const params = RecoveryParams.safeParse(req.params);
    if (!params.success) return sendInvalidInput(reply, params.error);
    const body = CodeBody.safeParse(req.body);
    if (!body.success) return sendInvalidInput(reply, body.error);

    const result = await verifyRecoveryEmail(app.deps, { recoveryId: params.data.id, code: body.data.code });
    if (!result.ok) return sendAuthFailure(reply, result);
    return reply.send(result.value);
  });

  app.post("/:id/sms", limited, async (req, reply) => {
    const params = RecoveryParams.safeParse(req.params);
    if (!params.success) return sendInvalidInput(reply, params.error);
    const body = CodeBody.safeParse(req.body);
    if (!body.success) return sendInvalidInput(reply, body.error);

    const result = await verifyRecoverySms(app.deps, { recoveryId: params.data.id, code: body.data.code });
    if (!result.ok) return sendAuthFailure(reply, result);
    return reply.send(result.value);
  });

  app.post("/:id/token", async (req, reply) => {
    const params = RecoveryParams.safeParse(req.params);
    if (!params.success) return sendInvalidInput(reply, params.error);

    const result = await issueRecoveryToken(app.deps, params.data.id);
    if (!result.ok) return sendAuthFailure(reply, result);

    reply.header("Cache-Control", "no-store");
    return reply.send({
      userId: result.value.userId,
      recoveryToken: result.value.token,
      expiresAt: result.value.expiresAt.toISOString(),
    });
  });

  app.post("/:id/resend", limited, async (req, reply) => {
    const params = RecoveryParams.safeParse(req.params);
    if (!params.success) return sendInvalidInput(reply, params.error);

    const result = await resendRecoveryCode(app.deps, params.data.id);
    if (!result.ok) return sendAuthFailure(reply, result);
    return reply.code(202).send({ step: result.value.step, expiresAt: result.value.expiresAt.toISOString() });
  });

  app.post("/:id/cancel", async (req, reply) => {
    const params = RecoveryParams.safeParse(req.params);
    if (!params.success) return sendInvalidInput(reply, params.error);

    const result = await cancelRecovery(app.deps, params.data.id);
    if (!result.ok) return sendAuthFailure(reply, result);
    return reply.send(result.value);
  });
}
