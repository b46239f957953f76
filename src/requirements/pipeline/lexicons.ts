/**
 * Requirement Extraction Lexicons
 *
 * Every vocabulary, weight and threshold the pipeline uses. These are fixed
 * tables: changing any of them changes which sentences become requirements
 * and how they are tagged.
 */

// ============================================================================
// Segmenter
// ============================================================================

/** Sentences with this many words or fewer are discarded. */
export const MIN_SENTENCE_WORDS = 5;

// ============================================================================
// Feature Extractor
// ============================================================================

export const ACTION_VERBS: ReadonlySet<string> = new Set([
  "allow",
  "enable",
  "provide",
  "support",
  "manage",
  "monitor",
  "check",
  "view",
  "book",
  "pay",
  "receive",
  "create",
  "track",
  "generate",
]);

export const MODAL_VERBS: ReadonlySet<string> = new Set(["should", "must", "will", "can", "could"]);

// ============================================================================
// Scorer
// ============================================================================

export const REQUIREMENT_KEYWORDS = Object.freeze([
  "need",
  "require",
  "must",
  "should",
  "allow",
  "enable",
  "access",
  "view",
  "book",
  "reserve",
]);

export const COMPONENT_KEYWORDS = Object.freeze([
  "machine",
  "payment",
  "reservation",
  "notification",
  "camera",
  "account",
  "feedback",
  "review",
]);

export const ROLE_KEYWORDS = Object.freeze(["customer", "client", "user", "administrator", "owner"]);

export const SCORE_WEIGHTS = Object.freeze({
  actionVerb: 2,
  modal: 3,
  svoPattern: 2,
  requirementKeyword: 3,
  componentKeyword: 2,
  roleKeyword: 2,
});

/** Candidates must score strictly above this. */
export const SCORE_THRESHOLD = 3;

// ============================================================================
// Formulator
// ============================================================================

export const CUSTOMER_ACTORS: ReadonlySet<string> = new Set(["customer", "client", "user"]);
export const ADMIN_ACTORS: ReadonlySet<string> = new Set(["administrator", "admin", "owner"]);

export const ACTOR_PHRASES = Object.freeze({
  customer: "The customer",
  administrator: "The administrator",
  system: "The system",
});

export const DEFAULT_ACTION = "support";

// ============================================================================
// Refiner
// ============================================================================

/** Drafts need more than this many words to survive deduplication. */
export const MIN_DRAFT_WORDS = 4;

export const APPROVED_LEADS = Object.freeze([
  "the system shall",
  "the customer should",
  "the administrator should",
  "the customer shall",
  "the administrator shall",
]);

export const DEFAULT_LEAD = "The system shall ";

export const TEXT_FIXUPS: ReadonlyArray<readonly [string, string]> = Object.freeze([
  [" should be able to be able to ", " should be able to "],
  [" should should ", " should "],
  [" shall shall ", " shall "],
] as const);

// ============================================================================
// Classifier
// ============================================================================

export const CUSTOMER_KEYWORDS = Object.freeze(["customer", "client", "user"]);
export const ADMINISTRATOR_KEYWORDS = Object.freeze(["administrator", "admin", "owner"]);

export const NON_FUNCTIONAL_KEYWORDS = Object.freeze([
  "performance",
  "security",
  "reliability",
  "usability",
  "maintainability",
]);

/** Declaration order is output order. */
export const CATEGORY_TAXONOMY: ReadonlyArray<readonly [string, readonly string[]]> = Object.freeze([
  ["Washing/Drying", ["machine", "washer", "dryer", "washing", "drying"]],
  ["Security", ["security", "camera", "monitor", "surveillance"]],
  ["Scheduling", ["schedule", "booking", "reservation", "book", "reserve"]],
  ["Payment", ["payment", "pay", "coin", "card", "credit", "debit"]],
  ["Reporting", ["report", "record", "track", "log"]],
  ["Communication", ["communicate", "notification", "alert", "message"]],
  ["Feedback", ["feedback", "review", "comment", "rating"]],
] as const);

export const DEFAULT_CATEGORY = "General";

/**
 * True when `text` contains any keyword as a substring.
 */
export function containsAny(text: string, keywords: readonly string[]): boolean {
  return keywords.some((kw) => text.includes(kw));
}
