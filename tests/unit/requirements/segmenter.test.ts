import { describe, it, expect } from "vitest";
import { countWords, segmentSentences } from "../../../src/requirements/pipeline/segmenter.js";
import { createFixtureEngine } from "../../helpers/fixture-engine.js";

describe("segmentSentences", () => {
  const engine = createFixtureEngine();

  it("keeps sentences with more than five words in source order", () => {
    const text = "The customer should book a washing machine. Fix the pump. The owner reviews every single report.";

    expect(segmentSentences(text, engine)).toEqual([
      "The customer should book a washing machine.",
      "The owner reviews every single report.",
    ]);
  });

  it("drops a sentence of exactly five words", () => {
    expect(segmentSentences("Customers can book washing machines.", engine)).toEqual([]);
  });

  it("collapses whitespace runs before splitting", () => {
    const text = "The customer   should\n\tbook a washing\n machine.";

    expect(segmentSentences(text, engine)).toEqual(["The customer should book a washing machine."]);
  });

  it("returns [] for empty and whitespace-only input", () => {
    expect(segmentSentences("", engine)).toEqual([]);
    expect(segmentSentences(" \n\t ", engine)).toEqual([]);
  });

  it("never parses the sentences it filters", () => {
    const fresh = createFixtureEngine();
    segmentSentences("Fix the pump.", fresh);
    expect(fresh.parseCalls).toEqual([]);
  });
});

describe("countWords", () => {
  it("counts whitespace-delimited words", () => {
    expect(countWords("  one two\tthree\nfour ")).toBe(4);
    expect(countWords("")).toBe(0);
  });
});
