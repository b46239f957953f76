import { describe, it, expect } from "vitest";
import { extractFeatures } from "../../../src/requirements/pipeline/feature-extractor.js";
import {
  formulateRequirement,
  formulateRequirements,
} from "../../../src/requirements/pipeline/formulator.js";
import type { ScoredCandidate } from "../../../src/requirements/pipeline/types.js";
import type { ParsedToken } from "../../../src/nlp/types.js";
import {
  ADMIN_SENTENCE,
  CUSTOMER_SENTENCE,
  DRYER_SENTENCE,
  OWNER_SENTENCE,
  PLURAL_CUSTOMER_SENTENCE,
  WEATHER_SENTENCE,
  createFixtureEngine,
} from "../../helpers/fixture-engine.js";

const engine = createFixtureEngine();

function candidate(sentence: string, score = 10): ScoredCandidate {
  return { ...extractFeatures(sentence, engine), score };
}

describe("formulateRequirement", () => {
  it("builds actor, action and first object", () => {
    expect(formulateRequirement(candidate(CUSTOMER_SENTENCE))).toBe("The customer shall book a washing machine");
  });

  it("appends prepositional objects missing from the draft", () => {
    expect(formulateRequirement(candidate(ADMIN_SENTENCE))).toBe(
      "The administrator shall monitor the payment system for fraud",
    );
  });

  it("appends every prepositional object in chunk order", () => {
    expect(formulateRequirement(candidate(OWNER_SENTENCE))).toBe(
      "The administrator shall view reports for each machine for the laundromat",
    );
  });

  it("matches a plural subject through its root lemma", () => {
    expect(formulateRequirement(candidate(PLURAL_CUSTOMER_SENTENCE))).toBe(
      "The customer shall check machines for the app",
    );
  });

  it("falls back to the lowercased sentence when no object chunk exists", () => {
    expect(formulateRequirement(candidate(DRYER_SENTENCE))).toBe(
      "The system shall stop each dryer will stop automatically when finished.",
    );
  });

  it("uses 'support' when the sentence has no verbs", () => {
    expect(formulateRequirement(candidate(WEATHER_SENTENCE))).toBe(
      "The system shall support the weather today is quite pleasant and mild.",
    );
  });

  it("prefers the customer when both roles are subjects", () => {
    const token = (index: number, text: string, pos: ParsedToken["pos"], dep: ParsedToken["dep"], head: number): ParsedToken => ({
      index,
      text,
      lemma: text.toLowerCase(),
      pos,
      dep,
      head,
    });
    const mixed: ScoredCandidate = {
      sentence: "Admin and user approve refunds",
      verbs: ["approve"],
      actionVerbs: [],
      nouns: ["Admin", "user", "refunds"],
      entities: [],
      svoPatterns: [],
      modals: [],
      score: 5,
      parse: {
        text: "Admin and user approve refunds",
        tokens: [
          token(0, "Admin", "NOUN", "nsubj", 3),
          token(1, "and", "CCONJ", "cc", 0),
          token(2, "user", "NOUN", "nsubj", 3),
          token(3, "approve", "VERB", "ROOT", 3),
          token(4, "refunds", "NOUN", "dobj", 3),
        ],
        nounChunks: [
          { text: "Admin", start: 0, end: 1, root: 0 },
          { text: "user", start: 2, end: 3, root: 2 },
          { text: "refunds", start: 4, end: 5, root: 4 },
        ],
        entities: [],
      },
    };

    expect(formulateRequirement(mixed)).toBe("The customer shall approve refunds");
  });

  it("collapses double spaces once and trims", () => {
    const base = candidate(WEATHER_SENTENCE);
    const spaced: ScoredCandidate = { ...base, sentence: "  The  weather   holds  " };

    // Non-overlapping single pass: three spaces become two, two become one
    expect(formulateRequirement(spaced)).toBe("The system shall support  the weather  holds");
  });
});

describe("formulateRequirements", () => {
  it("formulates each candidate in order", () => {
    expect(formulateRequirements([candidate(ADMIN_SENTENCE), candidate(CUSTOMER_SENTENCE)])).toEqual([
      "The administrator shall monitor the payment system for fraud",
      "The customer shall book a washing machine",
    ]);
  });
});
