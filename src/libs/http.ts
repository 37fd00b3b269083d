// ============================================================================
// src/libs/http.ts
// ----------------------------------------------------------------------------
// HTTP-Hilfsfunktionen (Logging, Keys, Metriken, Request-Kontext)
// ============================================================================
import type { FastifyRequest } from "fastify";

/** Liefert eine stabile Routen-ID (für Logs/Keys/Metriken). */
export function getRouteId(req: FastifyRequest): string {
  return req.routeOptions?.url || req.url || req.raw?.url || "unknown";
}

/** Ermittelt, ob die Anfrage einen Health-Endpoint adressiert. */
export function isHealthPath(req: FastifyRequest): boolean {
  const url = req.raw.url ?? "";
  return (
    url === "/health" ||
    url === "/healthz" ||
    url === "/readyz" ||
    url.startsWith("/health/")
  );
}

/** Erster Wert eines Headers, getrimmt; leere Werte zaehlen als fehlend. */
export function readHeaderValue(value: unknown): string | undefined {
  if (typeof value === "string") {
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : undefined;
  }

  if (Array.isArray(value) && typeof value[0] === "string") {
    const trimmed = value[0].trim();
    return trimmed.length > 0 ? trimmed : undefined;
  }

  return undefined;
}

/** ip/user-agent fuer Push-Kontext und Recovery-Audit. */
export function requestContext(req: FastifyRequest): { ipAddress: string; userAgent: string | null } {
  return {
    ipAddress: req.ip,
    userAgent: readHeaderValue(req.headers["user-agent"])?.slice(0, 512) ?? null,
  };
}
