import { z } from "zod";

import type { ConnectionConfig, ResolvedConfig } from "../types";
import { VERSION } from "../version";

export const DEFAULT_OPEN_TIMEOUT_MS = 10_000;
export const DEFAULT_READ_TIMEOUT_MS = 120_000;

const optionalString = z
  .string()
  .trim()
  .transform((value) => value || undefined)
  .optional();

const timeout = (fallback: number) =>
  z.number().int().positive().default(fallback);

export const configSchema = z.object({
  endpoint: z
    .string()
    .url()
    .transform((value) => new URL(value))
    .refine((url) => url.protocol === "http:" || url.protocol === "https:", {
      message: "endpoint must use http or https",
    }),
  cname: z.boolean().default(false),
  accessKeyId: optionalString,
  accessKeySecret: optionalString,
  securityToken: optionalString,
  openTimeout: timeout(DEFAULT_OPEN_TIMEOUT_MS),
  readTimeout: timeout(DEFAULT_READ_TIMEOUT_MS),
  userAgent: z.string().min(1).optional(),
});

/**
 * Validates connection settings and fills in defaults. The user agent is
 * computed here, once per client.
 *
 * @param input - Connection settings, usually from the client constructor.
 */
export function resolveConfig(input: ConnectionConfig): ResolvedConfig {
  const parsed = configSchema.safeParse(input);
  if (!parsed.success) {
    throw new Error(`Invalid configuration: ${parsed.error.message}`);
  }
  const { userAgent, ...rest } = parsed.data;
  return Object.freeze({
    ...rest,
    userAgent: userAgent ?? defaultUserAgent(),
  });
}

const envSchema = z.object({
  OSS_ENDPOINT: z.string().min(1),
  OSS_CNAME: z
    .enum(["true", "false"])
    .default("false")
    .transform((value) => value === "true"),
  OSS_ACCESS_KEY_ID: z.string().optional(),
  OSS_ACCESS_KEY_SECRET: z.string().optional(),
  OSS_SECURITY_TOKEN: z.string().optional(),
  OSS_OPEN_TIMEOUT_MS: z
    .string()
    .regex(/^\d+$/)
    .transform((value) => Number.parseInt(value, 10))
    .optional(),
  OSS_READ_TIMEOUT_MS: z
    .string()
    .regex(/^\d+$/)
    .transform((value) => Number.parseInt(value, 10))
    .optional(),
});

/**
 * Reads connection settings from `OSS_*` environment variables.
 *
 * @param env - Defaults to `process.env`.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
): ConnectionConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new Error(`Invalid configuration: ${parsed.error.message}`);
  }
  const vars = parsed.data;
  return {
    endpoint: vars.OSS_ENDPOINT,
    cname: vars.OSS_CNAME,
    accessKeyId: vars.OSS_ACCESS_KEY_ID,
    accessKeySecret: vars.OSS_ACCESS_KEY_SECRET,
    securityToken: vars.OSS_SECURITY_TOKEN,
    openTimeout: vars.OSS_OPEN_TIMEOUT_MS,
    readTimeout: vars.OSS_READ_TIMEOUT_MS,
  };
}

export function defaultUserAgent(): string {
  return `osswire/${VERSION} node/${process.version} (${process.platform}; ${process.arch})`;
}
