// src/modules/otp/routes.ts
// ============================================================================
// Passwordless Sign-in per Code (/auth/otp)
// ----------------------------------------------------------------------------
// request: antwortet fuer unbekannte Ziele identisch (202)
// verify:  liefert eine Faktor-Assertion fuer den Session-Issuer
// ============================================================================

import type { FastifyInstance, FastifyReply } from "fastify";
import { z } from "zod";
import { sendAuthFailure, type AuthResult } from "../../libs/errors.js";
import { sendInvalidInput } from "../../libs/error-response.js";
import { SENSITIVE_RATE_LIMIT } from "../../plugins/rate-limit.js";
import { requestSignInOtp, verifySignInOtp, type SignInCompletion, type SignInRequestResult } from "./flows.js";

const CodeSchema = z.string().regex(/^\d{4,10}$/);

const EmailRequestBody = z.object({
  email: z.string().email(),
});

const EmailVerifyBody = z.object({
  email: z.string().email(),
  code: CodeSchema,
});

const SmsRequestBody = z.object({
  phoneNumber: z.string().min(6).max(32),
});

const SmsVerifyBody = z.object({
  phoneNumber: z.string().min(6).max(32),
  code: CodeSchema,
});

function sendRequested(reply: FastifyReply, result: AuthResult<SignInRequestResult>) {
  if (!result.ok) return sendAuthFailure(reply, result);
  return reply.code(202).send({ ok: true, expiresInSec: result.value.expiresInSec });
}

function sendVerified(reply: FastifyReply, result: AuthResult<SignInCompletion>) {
  if (!result.ok) return sendAuthFailure(reply, result);
  return reply.send({
    userId: result.value.userId,
    methodId: result.value.methodId,
    assertion: result.value.assertion,
    assertionExpiresAt: result.value.assertionExpiresAt.toISOString(),
  });
}

export default async function otpRoutes(app: FastifyInstance) {
  const limited = { config: { rateLimit: SENSITIVE_RATE_LIMIT } };

  app.post("/email/request", limited, async (req, reply) => {
    const parse = EmailRequestBody.safeParse(req.body);
    if (!parse.success) return sendInvalidInput(reply, parse.error);
    return sendRequested(reply, await requestSignInOtp(app.deps, { channel: "email", target: parse.data.email }));
  });

  app.post("/email/verify", limited, async (req, reply) => {
    const parse = EmailVerifyBody.safeParse(req.body);
    if (!parse.success) return sendInvalidInput(reply, parse.error);
    return sendVerified(
      reply,
      await verifySignInOtp(app.deps, { channel: "email", target: parse.data.email, code: parse.data.code }),
    );
  });

  app.post("/sms/request", limited, async (req, reply) => {
    const parse = SmsRequestBody.safeParse(req.body);
    if (!parse.success) return sendInvalidInput(reply, parse.error);
    return sendRequested(reply, await requestSignInOtp(app.deps, { channel: "sms", target: parse.data.phoneNumber }));
  });

  app.post("/sms/verify", limited, async (req, reply) => {
    const parse = SmsVerifyBody.safeParse(req.body);
    if (!parse.success) return sendInvalidInput(reply, parse.error);
    return sendVerified(
      reply,
      await verifySignInOtp(app.deps, { channel: "sms", target: parse.data.phoneNumber, code: parse.data.code }),
    );
  });
}
