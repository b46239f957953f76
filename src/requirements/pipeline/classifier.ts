/**
 * Requirement Classifier
 *
 * Keyword-based stakeholder, type and category tagging over the refined text.
 *
 * Pure functions. No engine calls, no I/O.
 */

import {
  ADMINISTRATOR_KEYWORDS,
  CATEGORY_TAXONOMY,
  CUSTOMER_KEYWORDS,
  DEFAULT_CATEGORY,
  NON_FUNCTIONAL_KEYWORDS,
  containsAny,
} from "./lexicons.js";
import {
  STAKEHOLDER_ORDER,
  type ClassifiedRequirement,
  type RequirementType,
  type Stakeholder,
} from "./types.js";

export function detectStakeholder(lower: string): Stakeholder {
  if (containsAny(lower, CUSTOMER_KEYWORDS)) return "Customer";
  if (containsAny(lower, ADMINISTRATOR_KEYWORDS)) return "Administrator";
  return "System";
}

export function detectType(lower: string): RequirementType {
  return containsAny(lower, NON_FUNCTIONAL_KEYWORDS) ? "Non-functional" : "Functional";
}

export function detectCategories(lower: string): string[] {
  const categories = CATEGORY_TAXONOMY.filter(([, keywords]) => containsAny(lower, keywords)).map(
    ([category]) => category,
  );
  return categories.length > 0 ? categories : [DEFAULT_CATEGORY];
}

export function classifyRequirement(requirement: string): ClassifiedRequirement {
  const lower = requirement.toLowerCase();
  return {
    requirement,
    stakeholder: detectStakeholder(lower),
    type: detectType(lower),
    categories: detectCategories(lower),
  };
}

export function classifyRequirements(requirements: readonly string[]): ClassifiedRequirement[] {
  return requirements.map(classifyRequirement);
}

/**
 * Customer, then Administrator, then System; order inside a group is kept.
 */
export function groupByStakeholder(
  classified: readonly ClassifiedRequirement[],
): ClassifiedRequirement[] {
  return STAKEHOLDER_ORDER.flatMap((stakeholder) =>
    classified.filter((item) => item.stakeholder === stakeholder),
  );
}
