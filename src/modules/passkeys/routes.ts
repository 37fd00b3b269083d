// src/modules/passkeys/routes.ts
// ============================================================================
// Passkey-Zeremonien (/auth/passkeys)
// ----------------------------------------------------------------------------
// authentication/*  ohne Login (passwordless, Credential wird global aufgeloest)
// registration/*    nur mit Access-Token
// Die Options-Objekte folgen PublicKeyCredential{Request,Creation}Options.
// ============================================================================

import type { FastifyInstance } from "fastify";
import { z } from "zod";
import { isoBase64URL } from "@simplewebauthn/server/helpers";
import { sendAuthFailure } from "../../libs/errors.js";
import { sendInvalidInput } from "../../libs/error-response.js";
import { sendMissingToken } from "../../plugins/auth.js";
import { describeMethod } from "../methods/service.js";
import { beginCeremony, completeCeremony, completeRegistration } from "./service.js";
import { AuthenticationResponseSchema, RegistrationResponseSchema } from "./types.js";

const AuthenticationCompleteBody = z.object({
  challenge: z.string().min(1),
  credentialId: z.string().min(1),
  response: AuthenticationResponseSchema,
});

const RegistrationCompleteBody = z.object({
  challenge: z.string().min(1),
  name: z.string().trim().min(1).max(64).default("Passkey"),
  response: RegistrationResponseSchema,
});

export default async function passkeyRoutes(app: FastifyInstance) {
  const { rpName } = app.deps.config.passkey;

  app.post("/authentication/begin", async (_req, reply) => {
    const result = await beginCeremony(app.deps, "authentication", null);
    if (!result.ok) return sendAuthFailure(reply, result);

    const options = result.value;
    return reply.send({
      sessionId: options.sessionId,
      expiresAt: options.expiresAt.toISOString(),
      publicKey: {
        challenge: options.challenge,
        rpId: options.rpId,
        timeout: options.timeoutMs,
        userVerification: "preferred",
        allowCredentials: [],
      },
    });
  });

  app.post("/authentication/complete", async (req, reply) => {
    const parse = AuthenticationCompleteBody.safeParse(req.body);
    if (!parse.success) return sendInvalidInput(reply, parse.error);

    const result = await completeCeremony(app.deps, parse.data);
    if (!result.ok) return sendAuthFailure(reply, result);

    return reply.send({
      userId: result.value.userId,
      methodId: result.value.methodId,
      assertion: result.value.assertion,
      assertionExpiresAt: result.value.assertionExpiresAt.toISOString(),
    });
  });

  app.post("/registration/begin", { config: { auth: true } }, async (req, reply) => {
    if (!req.user) return sendMissingToken(reply);
    const userId = req.user.sub;

    const result = await beginCeremony(app.deps, "registration", userId);
    if (!result.ok) return sendAuthFailure(reply, result);

    const options = result.value;
    return reply.send({
      sessionId: options.sessionId,
      expiresAt: options.expiresAt.toISOString(),
      publicKey: {
        challenge: options.challenge,
        rp: { id: options.rpId, name: rpName },
        user: {
          id: isoBase64URL.fromUTF8String(userId),
          name: userId,
          displayName: userId,
        },
        pubKeyCredParams: [
          { type: "public-key", alg: -7 },
          { type: "public-key", alg: -257 },
        ],
        timeout: options.timeoutMs,
        attestation: "none",
        authenticatorSelection: { residentKey: "preferred", userVerification: "preferred" },
        excludeCredentials: options.credentials.map((credential) => ({
          type: "public-key",
          id: credential.id,
          transports: credential.transports,
        })),
      },
    });
  });

  app.post("/registration/complete", { config: { auth: true } }, async (req, reply) => {
    if (!req.user) return sendMissingToken(reply);
    const parse = RegistrationCompleteBody.safeParse(req.body);
    if (!parse.success) return sendInvalidInput(reply, parse.error);

    const result = await completeRegistration(app.deps, req.user.sub, parse.data);
    if (!result.ok) return sendAuthFailure(reply, result);
    return reply.code(201).send({ method: describeMethod(result.value) });
  });
}
