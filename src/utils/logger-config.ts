/**
 * Centralized Logger Configuration
 *
 * Single source of truth for Pino logger options.
 * Used by both server.ts (Fastify) and telemetry.ts (standalone Pino).
 *
 * Descriptions submitted for extraction are customer text: any field that
 * could carry them is redacted along with the usual auth secrets.
 */

import type { LoggerOptions } from "pino";

/**
 * Paths to redact from all log output.
 * Uses Pino's path syntax with wildcards.
 */
export const REDACT_PATHS = [
  // Auth secrets (at any depth)
  "*.password",
  "*.secret",
  "*.token",
  "*.apiKey",
  "*.api_key",
  "*.authorization",
  "*.headers.authorization",
  "*.headers.cookie",
  "*.headers.x-api-key",

  // Submitted text
  "description",
  "*.description",
  "body.description",
] as const;

/**
 * Redaction censor string
 */
export const REDACT_CENSOR = "[REDACTED]";

/**
 * Create a Pino-compatible redact configuration
 */
export function createRedactConfig(): { paths: string[]; censor: string } {
  return {
    paths: [...REDACT_PATHS],
    censor: REDACT_CENSOR,
  };
}

/**
 * Create full Pino logger options
 */
export function createLoggerConfig(level: string): LoggerOptions {
  return {
    level,
    redact: createRedactConfig(),
  };
}
