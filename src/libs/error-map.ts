export type MappedDbError = {
  status: number;
  code: string;
  message: string;
};

function readErrorCode(err: unknown): string | undefined {
  if (typeof err !== "object" || err === null || !("code" in err)) return undefined;
  return typeof err.code === "string" ? err.code : undefined;
}

export function mapDbError(err: unknown): MappedDbError {
  switch (readErrorCode(err)) {
    case "23505":
      return {
        status: 409,
        code: "ALREADY_USED",
        message: "Eintrag existiert bereits.",
      };
    case "23503":
    case "23514":
    case "23502":
    case "22P02":
      return {
        status: 400,
        code: "VALIDATION_FAILED",
        message: "Ungueltige Eingabedaten.",
      };
    case "57P01":
    case "08006":
    case "08001":
    case "ECONNREFUSED":
      return {
        status: 503,
        code: "STORE_UNAVAILABLE",
        message: "Storage voruebergehend nicht erreichbar.",
      };
    default:
      return {
        status: 500,
        code: "INTERNAL",
        message: "Internal server error.",
      };
  }
}
