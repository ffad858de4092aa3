import { SidstoreError } from "@sidstore/core";

const UNAVAILABLE_CODES = new Set(["ECONNREFUSED", "ECONNRESET", "ETIMEDOUT", "ENOTFOUND", "EAI_AGAIN", "NR_CLOSED"]);

const UNAVAILABLE_KEYWORDS = [
  "connect",
  "connection",
  "socket",
  "closed",
  "timeout",
  "read only",
  "loading",
  "clusterdown",
  "try again",
];

/**
 * Wraps a failed Redis call. Connectivity problems become `STORE_UNAVAILABLE`.
 */
export function toRedisError(error: unknown, details: Record<string, unknown>): SidstoreError {
  if (error instanceof SidstoreError) {
    return error;
  }

  const redisCode = errorField(error, "code").toUpperCase();
  const message = errorField(error, "message").toLowerCase();
  const unavailable =
    UNAVAILABLE_CODES.has(redisCode) || UNAVAILABLE_KEYWORDS.some((keyword) => message.includes(keyword));

  return new SidstoreError(
    unavailable ? "STORE_UNAVAILABLE" : "INTERNAL_ERROR",
    unavailable ? "Session store is unavailable." : "Redis operation failed.",
    error,
    { ...details, redisCode },
  );
}

function errorField(error: unknown, field: "code" | "message"): string {
  if (typeof error === "object" && error !== null && field in error) {
    const value: unknown = Reflect.get(error, field);
    return value === undefined || value === null ? "" : String(value);
  }
  return typeof error === "string" && field === "message" ? error : "";
}
