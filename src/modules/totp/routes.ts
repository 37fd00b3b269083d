// src/modules/totp/routes.ts
// TOTP-Enrollment und -Verifikation (/auth/totp), nur mit Access-Token.

import type { FastifyInstance } from "fastify";
import { z } from "zod";
import { sendAuthFailure } from "../../libs/errors.js";
import { sendInvalidInput } from "../../libs/error-response.js";
import { sendMissingToken } from "../../plugins/auth.js";
import { SENSITIVE_RATE_LIMIT } from "../../plugins/rate-limit.js";
import { enrollTotp, verifyTotp } from "./service.js";

const EnrollBody = z
  .object({
    accountName: z.string().trim().min(1).max(128).optional(),
  })
  .default({});

const VerifyBody = z.object({
  code: z.string().regex(/^\d{3}\s?\d{3}$/),
});

export default async function totpRoutes(app: FastifyInstance) {
  app.post("/enroll", { config: { auth: true } }, async (req, reply) => {
    if (!req.user) return sendMissingToken(reply);
    const parse = EnrollBody.safeParse(req.body ?? {});
    if (!parse.success) return sendInvalidInput(reply, parse.error);

    const result = await enrollTotp(app.deps, req.user.sub, parse.data.accountName ?? req.user.sub);
    if (!result.ok) return sendAuthFailure(reply, result);

    // Secret wird genau einmal ausgeliefert
    reply.header("Cache-Control", "no-store");
    return reply.code(201).send(result.value);
  });

  app.post("/verify", { config: { auth: true, rateLimit: SENSITIVE_RATE_LIMIT } }, async (req, reply) => {
    if (!req.user) return sendMissingToken(reply);
    const parse = VerifyBody.safeParse(req.body);
    if (!parse.success) return sendInvalidInput(reply, parse.error);

    const result = await verifyTotp(app.deps, req.user.sub, parse.data.code);
    if (!result.ok) return sendAuthFailure(reply, result);

    return reply.send({
      methodId: result.value.methodId,
      enrolled: result.value.enrolled,
      assertion: result.value.assertion,
      assertionExpiresAt: result.value.assertionExpiresAt.toISOString(),
    });
  });
}
