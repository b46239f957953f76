/**
 * POST /v1/requirements           - classified requirements + grouped text
 * POST /v1/requirements/formatted - grouped requirement text only
 *
 * Request body: { description: string }
 *
 * Extraction is synchronous and in-memory. Validation failures return
 * error.v1 BAD_INPUT; analysis-engine failures are thrown to the global
 * error handler (502 UPSTREAM_ERROR).
 */

import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { getConfig } from "../config/index.js";
import { groupByStakeholder, type RequirementsExtractor } from "../requirements/index.js";
import {
  createExtractRequestSchema,
  type FormattedRequirementsResponse,
  type RequirementsResponse,
} from "../schemas/requirements.js";
import { zodErrorToErrorV1 } from "../utils/errors.js";
import { getRequestId } from "../utils/request-id.js";

export interface RequirementsRouteOptions {
  extractor: RequirementsExtractor;
}

export default async function requirementsRoute(
  app: FastifyInstance,
  opts: RequirementsRouteOptions,
) {
  const { extractor } = opts;
  const RequestSchema = createExtractRequestSchema(getConfig().extraction.maxDescriptionChars);

  /** Returns the description, or sends a 400 and returns null. */
  function readDescription(req: FastifyRequest, reply: FastifyReply): string | null {
    const parsed = RequestSchema.safeParse(req.body);
    if (!parsed.success) {
      reply.code(400).send(zodErrorToErrorV1(parsed.error, getRequestId(req)));
      return null;
    }
    return parsed.data.description;
  }

  app.post("/v1/requirements", async (req, reply) => {
    const description = readDescription(req, reply);
    if (description === null) return reply;

    const classified = extractor.extractRequirements(description);
    const body: RequirementsResponse = {
      schema: "requirements.v1",
      requirements: classified.map((item) => ({
        requirement: item.requirement,
        stakeholder: item.stakeholder,
        type: item.type,
        categories: [...item.categories],
      })),
      grouped: groupByStakeholder(classified).map((item) => item.requirement),
    };

    req.log.info(
      { request_id: getRequestId(req), requirement_count: body.requirements.length },
      "requirements extracted",
    );
    return reply.code(200).send(body);
  });

  app.post("/v1/requirements/formatted", async (req, reply) => {
    const description = readDescription(req, reply);
    if (description === null) return reply;

    const body: FormattedRequirementsResponse = {
      schema: "requirements.formatted.v1",
      requirements: extractor.extractAndFormat(description),
    };

    req.log.info(
      { request_id: getRequestId(req), requirement_count: body.requirements.length },
      "requirements formatted",
    );
    return reply.code(200).send(body);
  });
}
