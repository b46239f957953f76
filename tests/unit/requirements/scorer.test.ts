import { describe, it, expect } from "vitest";
import { computeRequirementScore, scoreFeatures } from "../../../src/requirements/pipeline/scorer.js";
import { extractAllFeatures } from "../../../src/requirements/pipeline/feature-extractor.js";
import type { FeatureRecord } from "../../../src/requirements/pipeline/types.js";
import {
  ADMIN_SENTENCE,
  CUSTOMER_SENTENCE,
  DRYER_SENTENCE,
  OWNER_SENTENCE,
  WEATHER_SENTENCE,
  createFixtureEngine,
} from "../../helpers/fixture-engine.js";

function record(sentence: string, overrides: Partial<FeatureRecord> = {}): FeatureRecord {
  return {
    sentence,
    verbs: [],
    actionVerbs: [],
    nouns: [],
    entities: [],
    svoPatterns: [],
    modals: [],
    parse: { text: sentence, tokens: [], nounChunks: [], entities: [] },
    ...overrides,
  };
}

describe("computeRequirementScore", () => {
  it("weights action verbs, modals and SVO triples by count", () => {
    const score = computeRequirementScore(
      record("plain words only here", {
        actionVerbs: ["track", "generate"],
        modals: ["will", "can"],
        svoPatterns: [{ subject: "It", verb: "track", object: "time" }],
      }),
    );
    expect(score).toBe(2 * 2 + 2 * 3 + 1 * 2);
  });

  it("adds each lexicon bonus at most once", () => {
    expect(computeRequirementScore(record("we need and require and must"))).toBe(3);
    expect(computeRequirementScore(record("machine payment camera"))).toBe(2);
    expect(computeRequirementScore(record("Customer and Owner"))).toBe(2);
  });

  it("matches keywords as substrings of the lowercased sentence", () => {
    // "review" holds "view"; "users" holds "user"
    expect(computeRequirementScore(record("Users review it"))).toBe(3 + 2 + 2);
  });

  it("scores zero when nothing matches", () => {
    expect(computeRequirementScore(record("The weather today is quite pleasant and mild."))).toBe(0);
  });
});

describe("scoreFeatures", () => {
  const engine = createFixtureEngine();

  it("scores both scenario sentences 14 and keeps source order on the tie", () => {
    const candidates = scoreFeatures(extractAllFeatures([CUSTOMER_SENTENCE, ADMIN_SENTENCE], engine));

    expect(candidates.map((c) => [c.sentence, c.score])).toEqual([
      [CUSTOMER_SENTENCE, 14],
      [ADMIN_SENTENCE, 14],
    ]);
  });

  it("drops records at or below the threshold", () => {
    // DRYER_SENTENCE scores exactly 3 (one modal), WEATHER_SENTENCE 0
    const candidates = scoreFeatures(
      extractAllFeatures([DRYER_SENTENCE, WEATHER_SENTENCE, OWNER_SENTENCE], engine),
    );

    expect(candidates.map((c) => c.sentence)).toEqual([OWNER_SENTENCE]);
    expect(candidates[0]?.score).toBe(14);
  });

  it("sorts descending by score", () => {
    const candidates = scoreFeatures([
      record("low", { modals: ["can"], actionVerbs: ["view"] }),
      record("high", { modals: ["must", "should"], actionVerbs: ["view"] }),
      record("middle", { modals: ["will"], actionVerbs: ["view", "book"] }),
    ]);

    expect(candidates.map((c) => [c.sentence, c.score])).toEqual([
      ["high", 8],
      ["middle", 7],
      ["low", 5],
    ]);
  });

  it("returns new objects and leaves the records untouched", () => {
    const input = record("Staff must book", { modals: ["must"] });
    const [candidate] = scoreFeatures([input]);

    expect(candidate).not.toBe(input);
    expect(candidate?.parse).toBe(input.parse);
    expect("score" in input).toBe(false);
  });
});
