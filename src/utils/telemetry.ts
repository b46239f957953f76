import { env } from "node:process";
import pino from "pino";
import { createLoggerConfig } from "./logger-config.js";

/**
 * Pino logger with secret/text redaction
 *
 * Redaction paths are centralized in src/utils/logger-config.ts so the
 * Fastify logger and this standalone logger stay in sync.
 */
export const log = pino(createLoggerConfig(env.LOG_LEVEL || "info"));

/**
 * Frozen telemetry event names
 */
export const TelemetryEvents = {
  PipelineCompleted: "requirements.pipeline.completed",
  PipelineFailed: "requirements.pipeline.failed",
  EngineLoaded: "requirements.engine.loaded",
} as const;

export type TelemetryEventName = (typeof TelemetryEvents)[keyof typeof TelemetryEvents];

/** Telemetry payloads carry counts and identifiers only, never text. */
export type TelemetryData = Record<string, string | number | boolean | null>;

type TestSink = (eventName: TelemetryEventName, data: TelemetryData) => void;

let testSink: TestSink | null = null;

/**
 * Capture emitted events in tests. Only allowed when running under vitest.
 */
export function setTestSink(sink: TestSink | null): void {
  const isTestEnv = env.NODE_ENV === "test" || Boolean(env.VITEST);
  if (!isTestEnv) {
    throw new Error("setTestSink() can only be used in test environment");
  }
  testSink = sink;
}

/**
 * Emit a telemetry event: forwarded to the test sink when one is installed,
 * always logged through pino.
 */
export function emit(event: TelemetryEventName, data: TelemetryData): void {
  if (testSink) {
    testSink(event, data);
  }

  log.info({ event, ...data });
}
