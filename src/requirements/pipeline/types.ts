/**
 * Requirement Pipeline Types
 *
 * Records flowing between the six stages. Everything is read-only: a stage
 * that needs to add information (the Scorer's score) builds a new object.
 */

import type { ParsedSentence } from "../../nlp/types.js";

// ============================================================================
// Feature Extraction
// ============================================================================

export interface SvoPattern {
  readonly subject: string;
  readonly verb: string;
  readonly object: string;
}

export interface FeatureRecord {
  readonly sentence: string;
  /** Lemmas of VERB tokens, token order. */
  readonly verbs: readonly string[];
  readonly actionVerbs: readonly string[];
  /** Surface text of NOUN tokens, token order. */
  readonly nouns: readonly string[];
  readonly entities: readonly string[];
  readonly svoPatterns: readonly SvoPattern[];
  readonly modals: readonly string[];
  /** Engine parse, shared by reference with the Formulator. */
  readonly parse: ParsedSentence;
}

// ============================================================================
// Scoring
// ============================================================================

export interface ScoredCandidate extends FeatureRecord {
  readonly score: number;
}

// ============================================================================
// Classification
// ============================================================================

export type Stakeholder = "Customer" | "Administrator" | "System";

export type RequirementType = "Functional" | "Non-functional";

export interface ClassifiedRequirement {
  readonly requirement: string;
  readonly stakeholder: Stakeholder;
  readonly type: RequirementType;
  /** Never empty: ["General"] when no taxonomy keyword matched. */
  readonly categories: readonly string[];
}

/** Fixed presentation order for grouped output. */
export const STAKEHOLDER_ORDER: readonly Stakeholder[] = ["Customer", "Administrator", "System"];

// ============================================================================
// Pipeline
// ============================================================================

/** Intermediate output of every stage for one run. */
export interface PipelineTrace {
  readonly sentences: readonly string[];
  readonly features: readonly FeatureRecord[];
  readonly candidates: readonly ScoredCandidate[];
  readonly drafts: readonly string[];
  readonly refined: readonly string[];
  readonly classified: readonly ClassifiedRequirement[];
}
