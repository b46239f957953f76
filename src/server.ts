// Load environment variables from .env file (local development only)
import "dotenv/config";

import { pathToFileURL } from "node:url";
import Fastify from "fastify";
import cors from "@fastify/cors";
import helmet from "@fastify/helmet";
import rateLimit from "@fastify/rate-limit";
import { getConfig } from "./config/index.js";
import { getDefaultEngine } from "./nlp/index.js";
import type { LinguisticEngine } from "./nlp/types.js";
import { RequirementsExtractor } from "./requirements/index.js";
import healthRoute from "./routes/healthz.js";
import requirementsRoute from "./routes/v1.requirements.js";
import { buildErrorV1, getStatusCodeForErrorCode, toErrorV1 } from "./utils/errors.js";
import { createLoggerConfig } from "./utils/logger-config.js";
import { getRequestId, REQUEST_ID_HEADER, resolveRequestId } from "./utils/request-id.js";
import { SERVICE_NAME, SERVICE_VERSION } from "./version.js";

export interface BuildOptions {
  /** Analysis engine override (tests inject a fixture engine). */
  engine?: LinguisticEngine;
}

/**
 * Build and configure Fastify server instance
 * (Can be imported for testing or run directly)
 */
export async function build(options: BuildOptions = {}) {
  const config = getConfig();
  const engine = options.engine ?? getDefaultEngine();
  const extractor = new RequirementsExtractor(engine);

  const app = Fastify({
    logger: createLoggerConfig(config.server.logLevel),
    bodyLimit: config.server.bodyLimitBytes,
    requestIdHeader: false,
    genReqId: (req) => resolveRequestId(req.headers),
  });

  // CORS: Strict allowlist
  await app.register(cors, {
    origin: config.server.allowedOrigins,
  });

  // Security headers; CSP is irrelevant for a JSON API
  await app.register(helmet, {
    contentSecurityPolicy: false,
    crossOriginEmbedderPolicy: false,
    crossOriginOpenerPolicy: false,
    crossOriginResourcePolicy: { policy: "cross-origin" },
    strictTransportSecurity: {
      maxAge: 31536000, // 1 year
      includeSubDomains: true,
    },
  });

  // Rate limiting: global, per IP
  await app.register(rateLimit, {
    global: true,
    max: config.rateLimits.rpm,
    timeWindow: "1 minute",
    errorResponseBuilder: (req, context) => {
      const retryAfter = Math.max(1, Math.ceil(context.ttl / 1000));
      app.log.warn(
        { event: "rate_limit_hit", max: config.rateLimits.rpm, request_id: getRequestId(req) },
        "Rate limit exceeded",
      );
      // Thrown by the plugin, so it reaches the error handler below
      return Object.assign(new Error("Too many requests"), { statusCode: 429, retryAfter });
    },
  });

  // Echo the request id on every response
  app.addHook("onSend", async (request, reply, payload) => {
    reply.header(REQUEST_ID_HEADER, getRequestId(request));
    return payload;
  });

  app.setErrorHandler((error, request, reply) => {
    const errorV1 = toErrorV1(error, request);
    const statusCode = getStatusCodeForErrorCode(errorV1.code);

    // Log errors with context (redaction handled by logger)
    if (statusCode >= 500) {
      request.log.error(
        { error, request_id: errorV1.request_id, method: request.method, url: request.url },
        `[${errorV1.code}] ${errorV1.message}`,
      );
    } else {
      request.log.warn(
        { request_id: errorV1.request_id, code: errorV1.code, method: request.method, url: request.url },
        `[${errorV1.code}] ${errorV1.message}`,
      );
    }

    const retryAfter = errorV1.details?.retry_after_seconds;
    if (errorV1.code === "RATE_LIMITED" && typeof retryAfter === "number") {
      reply.header("Retry-After", String(retryAfter));
    }

    return reply.status(statusCode).send(errorV1);
  });

  app.setNotFoundHandler((request, reply) => {
    return reply
      .status(404)
      .send(buildErrorV1("NOT_FOUND", `Route ${request.method} ${request.url} not found`, undefined, getRequestId(request)));
  });

  await healthRoute(app, { engineName: engine.name });
  await requirementsRoute(app, { extractor });

  return app;
}

// If running directly (not imported), start the server
if (process.argv[1] !== undefined && import.meta.url === pathToFileURL(process.argv[1]).href) {
  build()
    .then(async (app) => {
      const config = getConfig();

      app.log.info(
        {
          service: SERVICE_NAME,
          version: SERVICE_VERSION,
          rate_limit_rpm: config.rateLimits.rpm,
          body_limit_mb: (config.server.bodyLimitBytes / 1024 / 1024).toFixed(1),
          max_description_chars: config.extraction.maxDescriptionChars,
          cors_origins: config.server.allowedOrigins,
        },
        "Requirements extraction service starting",
      );

      await app.listen({ port: config.server.port, host: config.server.host });
    })
    .catch((err: unknown) => {
      console.error("Failed to start server:", err);
      process.exit(1);
    });
}
