import type { FastifyInstance } from "fastify";
import { SERVICE_NAME, SERVICE_VERSION } from "../version.js";

export interface HealthRouteOptions {
  engineName: string;
}

/**
 * GET /healthz - liveness plus the version and analysis engine in use
 */
export default async function healthRoute(app: FastifyInstance, opts: HealthRouteOptions) {
  app.get("/healthz", async () => ({
    ok: true,
    service: SERVICE_NAME,
    version: SERVICE_VERSION,
    engine: opts.engineName,
  }));
}
