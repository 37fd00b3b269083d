// src/modules/methods/routes.ts
// ============================================================================
// Faktor-Verwaltung des angemeldeten Users (/auth/methods)
// ----------------------------------------------------------------------------
// - Liste (ohne Secrets), Deaktivieren/Aktivieren
// - SMS-/E-Mail-Faktor: Enrollment mit Bestaetigungscode
// - Web-Push-Subscription als Geraet registrieren
// ============================================================================

import type { FastifyInstance } from "fastify";
import { z } from "zod";
import { sendAuthFailure } from "../../libs/errors.js";
import { sendInvalidInput } from "../../libs/error-response.js";
import { sendMissingToken } from "../../plugins/auth.js";
import { SENSITIVE_RATE_LIMIT } from "../../plugins/rate-limit.js";
import { confirmFactorEnrollment, startFactorEnrollment } from "../otp/flows.js";
import { registerPushDevice } from "../push/service.js";
import { describeMethod, disableMethod, enableMethod, listAllMethods } from "./service.js";

const MethodParams = z.object({
  methodId: z.string().uuid(),
});

const SmsEnrollBody = z.object({
  phoneNumber: z.string().regex(/^\+[1-9][\d\s\-().]{6,20}$/, "E.164 expected"),
  name: z.string().trim().min(1).max(64).optional(),
});

const SmsConfirmBody = z.object({
  phoneNumber: z.string().min(1),
  code: z.string().regex(/^\d{4,10}$/),
});

const EmailEnrollBody = z.object({
  email: z.string().email(),
  name: z.string().trim().min(1).max(64).optional(),
});

const EmailConfirmBody = z.object({
  email: z.string().email(),
  code: z.string().regex(/^\d{4,10}$/),
});

const PushSubscribeBody = z.object({
  endpoint: z.string().url(),
  keys: z.object({
    p256dh: z.string().min(1),
    auth: z.string().min(1),
  }),
  deviceName: z.string().trim().min(1).max(64).optional(),
});

export default async function methodRoutes(app: FastifyInstance) {
  app.get("/", { config: { auth: true } }, async (req, reply) => {
    if (!req.user) return sendMissingToken(reply);

    const methods = await listAllMethods(app.deps, req.user.sub);
    return reply.send({ methods: methods.map(describeMethod) });
  });

  app.post("/:methodId/disable", { config: { auth: true } }, async (req, reply) => {
    if (!req.user) return sendMissingToken(reply);
    const params = MethodParams.safeParse(req.params);
    if (!params.success) return sendInvalidInput(reply, params.error);

    const result = await disableMethod(app.deps, req.user.sub, params.data.methodId);
    if (!result.ok) return sendAuthFailure(reply, result);
    return reply.send({ method: describeMethod(result.value) });
  });

  app.post("/:methodId/enable", { config: { auth: true } }, async (req, reply) => {
    if (!req.user) return sendMissingToken(reply);
    const params = MethodParams.safeParse(req.params);
    if (!params.success) return sendInvalidInput(reply, params.error);

    const result = await enableMethod(app.deps, req.user.sub, params.data.methodId);
    if (!result.ok) return sendAuthFailure(reply, result);
    return reply.send({ method: describeMethod(result.value) });
  });

  // -------------------------------------------------------------------------
  // SMS / E-Mail
  // -------------------------------------------------------------------------

  app.post("/sms/enroll", { config: { auth: true, rateLimit: SENSITIVE_RATE_LIMIT } }, async (req, reply) => {
    if (!req.user) return sendMissingToken(reply);
    const parse = SmsEnrollBody.safeParse(req.body);
    if (!parse.success) return sendInvalidInput(reply, parse.error);

    const result = await startFactorEnrollment(app.deps, req.user.sub, {
      channel: "sms",
      target: parse.data.phoneNumber,
      name: parse.data.name,
    });
    if (!result.ok) return sendAuthFailure(reply, result);
    return reply.code(202).send(result.value);
  });

  app.post("/sms/confirm", { config: { auth: true, rateLimit: SENSITIVE_RATE_LIMIT } }, async (req, reply) => {
    if (!req.user) return sendMissingToken(reply);
    const parse = SmsConfirmBody.safeParse(req.body);
    if (!parse.success) return sendInvalidInput(reply, parse.error);

    const result = await confirmFactorEnrollment(app.deps, req.user.sub, {
      channel: "sms",
      target: parse.data.phoneNumber,
      code: parse.data.code,
    });
    if (!result.ok) return sendAuthFailure(reply, result);
    return reply.send({ method: result.value });
  });

  app.post("/email/enroll", { config: { auth: true, rateLimit: SENSITIVE_RATE_LIMIT } }, async (req, reply) => {
    if (!req.user) return sendMissingToken(reply);
    const parse = EmailEnrollBody.safeParse(req.body);
    if (!parse.success) return sendInvalidInput(reply, parse.error);

    const result = await startFactorEnrollment(app.deps, req.user.sub, {
      channel: "email",
      target: parse.data.email,
      name: parse.data.name,
    });
    if (!result.ok) return sendAuthFailure(reply, result);
    return reply.code(202).send(result.value);
  });

  app.post("/email/confirm", { config: { auth: true, rateLimit: SENSITIVE_RATE_LIMIT } }, async (req, reply) => {
    if (!req.user) return sendMissingToken(reply);
    const parse = EmailConfirmBody.safeParse(req.body);
    if (!parse.success) return sendInvalidInput(reply, parse.error);

    const result = await confirmFactorEnrollment(app.deps, req.user.sub, {
      channel: "email",
      target: parse.data.email,
      code: parse.data.code,
    });
    if (!result.ok) return sendAuthFailure(reply, result);
    return reply.send({ method: result.value });
  });

  // -------------------------------------------------------------------------
  // Push-Geraet
  // -------------------------------------------------------------------------

  app.post("/push/subscribe", { config: { auth: true } }, async (req, reply) => {
    if (!req.user) return sendMissingToken(reply);
    const parse = PushSubscribeBody.safeParse(req.body);
    if (!parse.success) return sendInvalidInput(reply, parse.error);

    const result = await registerPushDevice(app.deps, req.user.sub, parse.data);
    if (!result.ok) return sendAuthFailure(reply, result);
    return reply.code(201).send({ method: describeMethod(result.value) });
  });
}
