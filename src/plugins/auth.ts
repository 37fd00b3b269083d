// src/plugins/auth.ts
// ============================================================================
// Auth-Plugin (Fastify)
// ----------------------------------------------------------------------------
// - Fuer Routes mit config.auth === true:
//   - Bearer Token extrahieren
//   - Access Token verifizieren (downstream gemintet, shared secret)
//   - req.user setzen
// - Health/System-Pfade bleiben immer ohne Auth moeglich
// ============================================================================

import fp from "fastify-plugin";
import type { FastifyPluginAsync, FastifyReply, FastifyRequest } from "fastify";
import { sendApiError } from "../libs/error-response.js";
import { isHealthPath } from "../libs/http.js";
import { verifyAccessToken } from "../libs/jwt.js";

function routeNeedsAuth(req: FastifyRequest): boolean {
  return req.routeOptions.config.auth === true;
}

function extractBearerToken(authHeader: string | string[] | undefined): string | null {
  const raw = Array.isArray(authHeader) ? authHeader[0] : authHeader;
  if (!raw) return null;

  // toleriert: "Bearer <token>", "bearer <token>", extra spaces
  const m = raw.match(/^\s*Bearer\s+(.+)\s*$/i);
  const token = m?.[1]?.trim();
  return token && token.length > 0 ? token : null;
}

export function sendMissingToken(reply: FastifyReply) {
  // Standardkonform: WWW-Authenticate setzen (ohne Details)
  reply.header("WWW-Authenticate", 'Bearer realm="factor-auth-service"');
  return sendApiError(reply, 401, "MISSING_TOKEN", "Missing bearer token.");
}

const authPlugin: FastifyPluginAsync = async (app) => {
  app.addHook("preHandler", async (req, reply) => {
    if (isHealthPath(req)) return;
    if (!routeNeedsAuth(req)) return;

    const token = extractBearerToken(req.headers.authorization);
    if (!token) {
      return sendMissingToken(reply);
    }

    try {
      req.user = await verifyAccessToken(token);
    } catch (err) {
      // Keine internen Fehler nach aussen leaken
      req.log.debug({ err }, "access_token_rejected");
      reply.header("WWW-Authenticate", 'Bearer error="invalid_token"');
      return sendApiError(reply, 401, "INVALID_TOKEN", "Invalid bearer token.");
    }
  });
};

export default fp(authPlugin, { name: "auth" });
