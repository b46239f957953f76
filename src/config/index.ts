/**
 * Centralized Configuration Module
 *
 * Provides type-safe, validated access to all environment variables.
 * Invalid configurations fail fast at first access.
 *
 * Scoring weights and lexicons are NOT configuration: they live in
 * src/requirements/pipeline/lexicons.ts and are fixed for output parity.
 */

import { z } from "zod";
import { log } from "../utils/telemetry.js";

/**
 * Environment enum
 */
const Environment = z.enum(["development", "test", "production"]);

/**
 * Log Level enum
 */
const LogLevel = z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]);

/**
 * Comma-separated list, empty entries dropped
 */
const commaList = z
  .string()
  .transform((val) =>
    val
      .split(",")
      .map((item) => item.trim())
      .filter((item) => item.length > 0),
  );

/**
 * Configuration Schema
 */
const ConfigSchema = z.object({
  server: z.object({
    port: z.coerce.number().int().positive().default(3000),
    host: z.string().default("0.0.0.0"),
    nodeEnv: Environment.default("development"),
    logLevel: LogLevel.default("info"),
    bodyLimitBytes: z.coerce.number().int().positive().default(1024 * 1024),
    allowedOrigins: commaList.default("http://localhost:3000,http://localhost:5173"),
  }),

  rateLimits: z.object({
    rpm: z.coerce.number().int().positive().default(120),
  }),

  extraction: z.object({
    maxDescriptionChars: z.coerce.number().int().positive().default(20_000),
  }),
});

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Parse and validate configuration from environment variables
 */
function parseConfig(): Config {
  const env = process.env;

  const rawConfig = {
    server: {
      port: env.PORT,
      host: env.HOST,
      nodeEnv: env.NODE_ENV,
      logLevel: env.LOG_LEVEL,
      bodyLimitBytes: env.BODY_LIMIT_BYTES,
      allowedOrigins: env.ALLOWED_ORIGINS,
    },
    rateLimits: {
      rpm: env.RATE_LIMIT_RPM,
    },
    extraction: {
      maxDescriptionChars: env.MAX_DESCRIPTION_CHARS,
    },
  };

  const result = ConfigSchema.safeParse(rawConfig);
  if (!result.success) {
    log.error({ issues: result.error.issues }, "Configuration validation failed");
    throw new Error("Invalid configuration. Please check environment variables.");
  }

  if (
    result.data.server.nodeEnv === "production" &&
    result.data.server.allowedOrigins.some((origin) => origin === "*")
  ) {
    throw new Error("FATAL: ALLOWED_ORIGINS cannot contain '*' in production");
  }

  return result.data;
}

/**
 * Configuration is parsed once on first access and cached thereafter, so
 * tests can set environment variables before anything reads it.
 */
let _cachedConfig: Config | null = null;

/**
 * Get configuration (parsed lazily)
 */
export function getConfig(): Config {
  if (_cachedConfig === null) {
    _cachedConfig = parseConfig();
  }
  return _cachedConfig;
}

/**
 * Reset cached configuration (for testing only)
 *
 * @internal
 */
export function _resetConfigCache(): void {
  _cachedConfig = null;
}
