// src/libs/error-response.ts
// Einheitlicher Fehler-Body: { status, error: { code, message }, details? }
import type { FastifyReply } from "fastify";
import type { ZodError } from "zod";

export type ApiErrorBody = {
  status: number;
  error: {
    code: string;
    message: string;
  };
  details?: unknown;
};

export function apiError(
  status: number,
  code: string,
  message: string,
  details?: unknown,
): ApiErrorBody {
  const base: ApiErrorBody = {
    status,
    error: {
      code,
      message,
    },
  };

  if (details !== undefined) {
    base.details = details;
  }

  return base;
}

export function sendApiError(
  reply: FastifyReply,
  status: number,
  code: string,
  message: string,
  details?: unknown,
) {
  return reply.code(status).send(apiError(status, code, message, details));
}

/** 400 fuer fehlgeschlagene zod-Validierung von Body/Params. */
export function sendInvalidInput(reply: FastifyReply, error: ZodError) {
  return sendApiError(reply, 400, "VALIDATION_FAILED", "Invalid input.", error.flatten().fieldErrors);
}
