/**
 * Feature Extractor
 *
 * Parses each sentence once and derives the fixed feature record the Scorer
 * and Formulator work from. The parse itself rides along on the record.
 */

import type { LinguisticEngine, ParsedSentence } from "../../nlp/types.js";
import { ACTION_VERBS, MODAL_VERBS } from "./lexicons.js";
import type { FeatureRecord, SvoPattern } from "./types.js";

const OBJECT_DEPS: ReadonlySet<string> = new Set(["dobj", "pobj"]);

/**
 * Subject-verb-object triples: one per (nsubj chunk, object token) pair where
 * the chunk's root hangs off a VERB and the object token hangs off that same
 * verb as dobj/pobj.
 */
export function findSvoPatterns(parse: ParsedSentence): SvoPattern[] {
  const patterns: SvoPattern[] = [];

  for (const chunk of parse.nounChunks) {
    const root = parse.tokens[chunk.root];
    if (root === undefined || root.dep !== "nsubj") continue;

    const head = parse.tokens[root.head];
    if (head === undefined || head.pos !== "VERB") continue;

    for (const token of parse.tokens) {
      if (token.head === head.index && OBJECT_DEPS.has(token.dep)) {
        patterns.push({ subject: chunk.text, verb: head.lemma, object: token.text });
      }
    }
  }

  return patterns;
}

export function extractFeatures(sentence: string, engine: LinguisticEngine): FeatureRecord {
  const parse = engine.parse(sentence);
  const { tokens } = parse;

  const verbs = tokens.filter((t) => t.pos === "VERB").map((t) => t.lemma);

  return {
    sentence,
    verbs,
    actionVerbs: verbs.filter((lemma) => ACTION_VERBS.has(lemma)),
    nouns: tokens.filter((t) => t.pos === "NOUN").map((t) => t.text),
    entities: parse.entities.map((e) => e.text),
    svoPatterns: findSvoPatterns(parse),
    modals: tokens
      .filter((t) => t.dep === "aux" && MODAL_VERBS.has(t.text.toLowerCase()))
      .map((t) => t.text),
    parse,
  };
}

export function extractAllFeatures(
  sentences: readonly string[],
  engine: LinguisticEngine,
): FeatureRecord[] {
  return sentences.map((sentence) => extractFeatures(sentence, engine));
}
