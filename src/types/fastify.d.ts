// src/types/fastify.d.ts
// ============================================================================
// Fastify Type Augmentation
// ----------------------------------------------------------------------------
// - app.deps: Abhaengigkeiten der Faktor-Flows (plugins/deps.ts)
// - request.user: verifiziertes Access-Token (plugins/auth.ts)
// - Route Config: config.auth
//
// Nur Type-Imports, keine Runtime-Imports.
// ============================================================================

import "fastify";

declare module "fastify" {
  interface FastifyContextConfig {
    /** true: Bearer-Token Pflicht (plugins/auth.ts). */
    auth?: boolean;
  }

  interface FastifyInstance {
    deps: import("../deps.js").AuthDeps;
  }

  interface FastifyRequest {
    /**
     * Verifizierter JWT-Payload (nur vorhanden, wenn Route config.auth === true
     * und plugins/auth.ts erfolgreich verifyAccessToken() ausgefuehrt hat).
     */
    user?: import("../libs/jwt.js").AccessTokenPayload;

    requestStartedAtNs?: bigint;
  }
}
