import pino, { type Logger } from "pino";

/**
 * Header paths scrubbed from every log line.
 */
export const REDACTED_PATHS = [
  "headers.authorization",
  'headers["x-oss-security-token"]',
];

export const createLogger = (level: pino.LevelWithSilent = "warn"): Logger =>
  pino({ name: "osswire", level, redact: REDACTED_PATHS });

/**
 * Flattens {@link Headers} into a plain object for structured logging.
 */
export function headersToObject(headers: Headers): Record<string, string> {
  const result: Record<string, string> = {};
  headers.forEach((value, key) => {
    result[key] = value;
  });
  return result;
}
