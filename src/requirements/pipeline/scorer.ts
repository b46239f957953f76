/**
 * Requirement Scorer
 *
 * Fixed linear heuristic over a feature record. Weights, lexicons and the
 * threshold come from ./lexicons.ts.
 */

import {
  COMPONENT_KEYWORDS,
  REQUIREMENT_KEYWORDS,
  ROLE_KEYWORDS,
  SCORE_THRESHOLD,
  SCORE_WEIGHTS,
  containsAny,
} from "./lexicons.js";
import type { FeatureRecord, ScoredCandidate } from "./types.js";

export function computeRequirementScore(record: FeatureRecord): number {
  const lower = record.sentence.toLowerCase();
  let score = 0;

  score += record.actionVerbs.length * SCORE_WEIGHTS.actionVerb;
  score += record.modals.length * SCORE_WEIGHTS.modal;
  score += record.svoPatterns.length * SCORE_WEIGHTS.svoPattern;

  if (containsAny(lower, REQUIREMENT_KEYWORDS)) score += SCORE_WEIGHTS.requirementKeyword;
  if (containsAny(lower, COMPONENT_KEYWORDS)) score += SCORE_WEIGHTS.componentKeyword;
  if (containsAny(lower, ROLE_KEYWORDS)) score += SCORE_WEIGHTS.roleKeyword;

  return score;
}

/**
 * Score every record, keep those above SCORE_THRESHOLD, highest first.
 * Array.prototype.sort is stable, so equal scores keep extraction order.
 */
export function scoreFeatures(records: readonly FeatureRecord[]): ScoredCandidate[] {
  return records
    .map((record): ScoredCandidate => ({ ...record, score: computeRequirementScore(record) }))
    .filter((candidate) => candidate.score > SCORE_THRESHOLD)
    .sort((a, b) => b.score - a.score);
}
