/**
 * Requirements API Schemas
 *
 * zod schemas for the /v1/requirements request body and response payloads.
 */

import { z } from "zod";

/**
 * Request body. The upper bound comes from config, so the schema is built
 * per call site.
 */
export function createExtractRequestSchema(maxDescriptionChars: number) {
  return z
    .object({
      description: z.string().max(maxDescriptionChars),
    })
    .strict();
}

export const StakeholderSchema = z.enum(["Customer", "Administrator", "System"]);
export const RequirementTypeSchema = z.enum(["Functional", "Non-functional"]);

export const ClassifiedRequirementSchema = z.object({
  requirement: z.string(),
  stakeholder: StakeholderSchema,
  type: RequirementTypeSchema,
  categories: z.array(z.string()).min(1),
});

export const RequirementsResponseSchema = z.object({
  schema: z.literal("requirements.v1"),
  requirements: z.array(ClassifiedRequirementSchema),
  grouped: z.array(z.string()),
});

export const FormattedRequirementsResponseSchema = z.object({
  schema: z.literal("requirements.formatted.v1"),
  requirements: z.array(z.string()),
});

export type RequirementsResponse = z.infer<typeof RequirementsResponseSchema>;
export type FormattedRequirementsResponse = z.infer<typeof FormattedRequirementsResponseSchema>;
