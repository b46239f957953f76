/**
 * Fixture Linguistic Engine for Tests
 *
 * Deterministic stand-in for the compromise engine. Sentences split on
 * terminal punctuation; each known sentence has a hand-tagged token list that
 * runs through the real shallow dependency labeller.
 *
 * Tokens are written "text/POS" or "text/POS/lemma" (lemma defaults to
 * the lowercased text), space-separated.
 */

import { labelDependencies, type TaggedToken } from "../../src/nlp/shallow-parser.js";
import type {
  CoarsePos,
  EntitySpan,
  LinguisticEngine,
  ParsedSentence,
} from "../../src/nlp/types.js";
import { AnalysisEngineError } from "../../src/utils/errors.js";

const COARSE_POS: ReadonlySet<string> = new Set([
  "ADJ", "ADP", "ADV", "AUX", "CCONJ", "DET", "INTJ", "NOUN", "NUM",
  "PART", "PRON", "PROPN", "PUNCT", "SCONJ", "SYM", "VERB", "X",
]);

function isCoarsePos(value: string): value is CoarsePos {
  return COARSE_POS.has(value);
}

/**
 * Parse "The/DET customer/NOUN books/VERB/book" into tagged tokens.
 */
export function tagged(line: string): TaggedToken[] {
  return line
    .trim()
    .split(/\s+/)
    .map((part) => {
      const [text = "", pos = "", lemma] = part.split("/");
      if (!isCoarsePos(pos)) {
        throw new Error(`Unknown POS "${pos}" in token "${part}"`);
      }
      return { text, pos, lemma: lemma ?? text.toLowerCase() };
    });
}

export interface SentenceFixture {
  readonly tokens: string;
  readonly entities?: readonly EntitySpan[];
}

export class FixtureEngine implements LinguisticEngine {
  readonly name = "fixture";
  readonly parseCalls: string[] = [];

  constructor(private readonly fixtures: Readonly<Record<string, SentenceFixture>>) {}

  splitSentences(text: string): string[] {
    return text
      .split(/(?<=[.!?])\s+/)
      .map((s) => s.trim())
      .filter((s) => s.length > 0);
  }

  parse(sentence: string): ParsedSentence {
    this.parseCalls.push(sentence);
    const fixture = this.fixtures[sentence];
    if (fixture === undefined) {
      throw new AnalysisEngineError(`No fixture for sentence: ${sentence}`, this.name, "parse");
    }
    return labelDependencies(sentence, tagged(fixture.tokens), fixture.entities ?? []);
  }

  isStopWord(word: string): boolean {
    return ["the", "a", "an", "and", "for"].includes(word.toLowerCase());
  }
}

// ============================================================================
// Shared sentences
// ============================================================================

export const CUSTOMER_SENTENCE = "The customer should book a washing machine.";
export const ADMIN_SENTENCE = "The administrator must monitor the payment system for fraud.";
export const SCENARIO_DESCRIPTION = `${CUSTOMER_SENTENCE} ${ADMIN_SENTENCE}`;

export const OWNER_SENTENCE = "The owner should view reports for each machine in the laundromat.";
export const PLURAL_CUSTOMER_SENTENCE = "Customers can check machines and dryers from the app.";
export const DRYER_SENTENCE = "Each dryer will stop automatically when finished.";
export const WEATHER_SENTENCE = "The weather today is quite pleasant and mild.";

export const SENTENCE_FIXTURES: Readonly<Record<string, SentenceFixture>> = {
  [CUSTOMER_SENTENCE]: {
    tokens: "The/DET customer/NOUN should/AUX book/VERB a/DET washing/VERB/wash machine/NOUN ./PUNCT",
  },
  [ADMIN_SENTENCE]: {
    tokens:
      "The/DET administrator/NOUN must/AUX monitor/VERB the/DET payment/NOUN system/NOUN for/ADP fraud/NOUN ./PUNCT",
  },
  [OWNER_SENTENCE]: {
    tokens:
      "The/DET owner/NOUN should/AUX view/VERB reports/NOUN/report for/ADP each/DET machine/NOUN in/ADP the/DET laundromat/NOUN ./PUNCT",
  },
  [PLURAL_CUSTOMER_SENTENCE]: {
    tokens:
      "Customers/NOUN/customer can/AUX check/VERB machines/NOUN/machine and/CCONJ dryers/NOUN/dryer from/ADP the/DET app/NOUN ./PUNCT",
  },
  [DRYER_SENTENCE]: {
    tokens: "Each/DET dryer/NOUN will/AUX stop/VERB automatically/ADV when/SCONJ finished/VERB/finish ./PUNCT",
  },
  [WEATHER_SENTENCE]: {
    tokens: "The/DET weather/NOUN today/NOUN is/AUX/be quite/ADV pleasant/ADJ and/CCONJ mild/ADJ ./PUNCT",
  },
};

export function createFixtureEngine(): FixtureEngine {
  return new FixtureEngine(SENTENCE_FIXTURES);
}
