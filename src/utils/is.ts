import { StreamPayload } from "../core/stream";

/**
 * Type guard detecting streaming bodies supplied to `execute`.
 */
export function isStreamPayload(value: unknown): value is StreamPayload {
  return value instanceof StreamPayload;
}

export function isPlainObject(
  value: unknown,
): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
