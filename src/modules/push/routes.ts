// src/modules/push/routes.ts
// ============================================================================
// Push-Approval (/auth/push)
// ----------------------------------------------------------------------------
// Initiator (ohne Login): initiate, status, cancel, claim (haelt die Challenge)
// Geraet des Besitzers (mit Access-Token): approve, deny
// ============================================================================

import type { FastifyInstance } from "fastify";
import { z } from "zod";
import { failure, sendAuthFailure } from "../../libs/errors.js";
import { sendInvalidInput } from "../../libs/error-response.js";
import { requestContext } from "../../libs/http.js";
import { hashEmailForLog } from "../../libs/pii.js";
import { sendMissingToken } from "../../plugins/auth.js";
import { SENSITIVE_RATE_LIMIT } from "../../plugins/rate-limit.js";
import {
  approvePushAuth,
  cancelPushAuth,
  claimPushApproval,
  denyPushAuth,
  getPushAuthStatus,
  initiatePushAuth,
} from "./service.js";

const RequestParams = z.object({
  requestId: z.string().uuid(),
});

const InitiateBody = z.object({
  email: z.string().email(),
  purpose: z.enum(["signin", "mfa"]).default("signin"),
  location: z.string().trim().max(128).optional(),
});

const ChallengeBody = z.object({
  challenge: z.string().min(1),
});

const ApproveBody = z.object({
  challenge: z.string().min(1),
  subscriptionId: z.string().uuid(),
});

export default async function pushRoutes(app: FastifyInstance) {
  app.post("/initiate", { config: { rateLimit: SENSITIVE_RATE_LIMIT } }, async (req, reply) => {
    const parse = InitiateBody.safeParse(req.body);
    if (!parse.success) return sendInvalidInput(reply, parse.error);

    const userId = await app.deps.users.findUserIdByEmail(parse.data.email);
    if (!userId) {
      // Unbekanntes Konto sieht aus wie ein Konto ohne Push-Geraet
      req.log.info({ emailHash: hashEmailForLog(parse.data.email) }, "push_auth_unknown_account");
      return sendAuthFailure(reply, failure("NOT_FOUND", "no_push_device"));
    }

    const { ipAddress, userAgent } = requestContext(req);
    const result = await initiatePushAuth(app.deps, {
      userId,
      purpose: parse.data.purpose,
      context: { ipAddress, userAgent, location: parse.data.location ?? null },
    });
    if (!result.ok) return sendAuthFailure(reply, result);

    return reply.code(201).send({
      requestId: result.value.requestId,
      challenge: result.value.challenge,
      expiresAt: result.value.expiresAt.toISOString(),
      notificationsSent: result.value.notificationsSent,
    });
  });

  app.get("/:requestId", async (req, reply) => {
    const params = RequestParams.safeParse(req.params);
    if (!params.success) return sendInvalidInput(reply, params.error);

    const result = await getPushAuthStatus(app.deps, params.data.requestId);
    if (!result.ok) return sendAuthFailure(reply, result);
    return reply.send(result.value);
  });

  app.post("/:requestId/cancel", async (req, reply) => {
    const params = RequestParams.safeParse(req.params);
    if (!params.success) return sendInvalidInput(reply, params.error);
    const body = ChallengeBody.safeParse(req.body);
    if (!body.success) return sendInvalidInput(reply, body.error);

    const result = await cancelPushAuth(app.deps, {
      requestId: params.data.requestId,
      challenge: body.data.challenge,
    });
    if (!result.ok) return sendAuthFailure(reply, result);
    return reply.send(result.value);
  });

  app.post("/:requestId/claim", async (req, reply) => {
    const params = RequestParams.safeParse(req.params);
    if (!params.success) return sendInvalidInput(reply, params.error);
    const body = ChallengeBody.safeParse(req.body);
    if (!body.success) return sendInvalidInput(reply, body.error);

    const result = await claimPushApproval(app.deps, {
      requestId: params.data.requestId,
      challenge: body.data.challenge,
    });
    if (!result.ok) return sendAuthFailure(reply, result);

    return reply.send({
      userId: result.value.userId,
      assertion: result.value.assertion,
      assertionExpiresAt: result.value.assertionExpiresAt.toISOString(),
    });
  });

  // -------------------------------------------------------------------------
  // Antwort vom Geraet
  // -------------------------------------------------------------------------

  app.post("/:requestId/approve", { config: { auth: true } }, async (req, reply) => {
    if (!req.user) return sendMissingToken(reply);
    const params = RequestParams.safeParse(req.params);
    if (!params.success) return sendInvalidInput(reply, params.error);
    const body = ApproveBody.safeParse(req.body);
    if (!body.success) return sendInvalidInput(reply, body.error);

    const result = await approvePushAuth(app.deps, {
      requestId: params.data.requestId,
      challenge: body.data.challenge,
      subscriptionId: body.data.subscriptionId,
      userId: req.user.sub,
    });
    if (!result.ok) return sendAuthFailure(reply, result);
    return reply.send(result.value);
  });

  app.post("/:requestId/deny", { config: { auth: true } }, async (req, reply) => {
    if (!req.user) return sendMissingToken(reply);
    const params = RequestParams.safeParse(req.params);
    if (!params.success) return sendInvalidInput(reply, params.error);

    const result = await denyPushAuth(app.deps, {
      requestId: params.data.requestId,
      userId: req.user.sub,
    });
    if (!result.ok) return sendAuthFailure(reply, result);
    return reply.send(result.value);
  });
}
