import { describe, it, expect } from "vitest";
import { Writable } from "node:stream";
import pino from "pino";
import {
  createLoggerConfig,
  createRedactConfig,
  REDACT_CENSOR,
  REDACT_PATHS,
} from "../../src/utils/logger-config.js";

function captureLogger() {
  const lines: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      lines.push(chunk.toString());
      callback();
    },
  });
  return { logger: pino(createLoggerConfig("info"), stream), lines };
}

describe("logger configuration", () => {
  it("redacts submitted descriptions and auth headers", () => {
    const { logger, lines } = captureLogger();

    logger.info({ body: { description: "private text" }, req: { headers: { authorization: "Bearer test-secret" } } });

    const record = JSON.parse(lines[0] ?? "{}");
    expect(record.body.description).toBe(REDACT_CENSOR);
    expect(record.req.headers.authorization).toBe(REDACT_CENSOR);
  });

  it("passes counts through untouched", () => {
    const { logger, lines } = captureLogger();

    logger.info({ requirement_count: 3 }, "done");

    const record = JSON.parse(lines[0] ?? "{}");
    expect(record.requirement_count).toBe(3);
    expect(record.msg).toBe("done");
  });

  it("builds a redact config from the shared path list", () => {
    expect(createRedactConfig()).toEqual({ paths: [...REDACT_PATHS], censor: "[REDACTED]" });
    expect(createLoggerConfig("debug").level).toBe("debug");
  });
});
