/**
 * Compromise-backed Linguistic Engine
 *
 * compromise supplies sentence boundaries, tokens, part-of-speech tags,
 * verb infinitives / noun singulars (lemmas) and person/place/organization
 * spans. It has no dependency parser, so noun chunks, heads and dependency
 * labels come from the shallow labeller in ./shallow-parser.ts.
 *
 * Every library failure surfaces as an AnalysisEngineError.
 */

import nlp from "compromise";
import { z } from "zod";
import { AnalysisEngineError, getErrorMessage } from "../utils/errors.js";
import { labelDependencies, type TaggedToken } from "./shallow-parser.js";
import { loadStopwords } from "./stopwords.js";
import type { CoarsePos, EntitySpan, LinguisticEngine, ParsedSentence } from "./types.js";

// ============================================================================
// compromise output schemas
// ============================================================================

const SentenceListSchema = z.array(z.string());

const TermSchema = z.object({
  text: z.string(),
  pre: z.string().default(""),
  post: z.string().default(""),
  normal: z.string().optional(),
  implicit: z.string().optional(),
  tags: z.array(z.string()),
});

const DocJsonSchema = z.array(
  z.object({
    text: z.string(),
    terms: z.array(TermSchema),
  }),
);

type Term = z.infer<typeof TermSchema>;

// ============================================================================
// Tag mapping
// ============================================================================

/** Checked in order: the first compromise tag present decides the coarse POS. */
const TAG_TO_POS: ReadonlyArray<readonly [string, CoarsePos]> = [
  ["Auxiliary", "AUX"],
  ["Modal", "AUX"],
  ["Copula", "AUX"],
  ["Negative", "PART"],
  ["Verb", "VERB"],
  ["Pronoun", "PRON"],
  ["QuestionWord", "PRON"],
  ["ProperNoun", "PROPN"],
  ["Value", "NUM"],
  ["Cardinal", "NUM"],
  ["Noun", "NOUN"],
  ["Adjective", "ADJ"],
  ["Adverb", "ADV"],
  ["Determiner", "DET"],
  ["Preposition", "ADP"],
  ["Conjunction", "CCONJ"],
  ["Particle", "PART"],
];

const COORDINATORS: ReadonlySet<string> = new Set(["and", "or", "but", "nor", "yet"]);
const VERB_FORM_TAGS = ["PastTense", "PresentTense", "Gerund", "Infinitive"] as const;
const PUNCTUATION = /[.,;:!?()[\]"]/g;
const TRAILING_NON_WORD = /[^\p{L}\p{N}]+$/u;
const HYPHEN = /^[-\u2010\u2011]$/;
const INNER_HYPHEN = /[\p{L}\p{N}]-[\p{L}\p{N}]/u;
const NOMINAL_POS: ReadonlySet<CoarsePos> = new Set<CoarsePos>(["NOUN", "PROPN", "ADJ", "NUM"]);
const NOMINAL_FOLLOWERS: ReadonlySet<CoarsePos> = new Set<CoarsePos>(["NOUN", "PROPN", "ADJ"]);
const MODIFIER_CONTEXT: ReadonlySet<CoarsePos> = new Set<CoarsePos>(["DET", "ADJ", "NUM"]);

export function mapTagsToPos(tags: readonly string[], normal: string): CoarsePos {
  for (const [tag, pos] of TAG_TO_POS) {
    if (!tags.includes(tag)) continue;
    if (pos === "CCONJ" && !COORDINATORS.has(normal)) return "SCONJ";
    return pos;
  }
  return "X";
}

function lemmatize(text: string, normal: string, pos: CoarsePos, tags: readonly string[]): string {
  if (pos === "VERB") {
    const doc = nlp(text);
    const form = VERB_FORM_TAGS.find((tag) => tags.includes(tag));
    if (form) doc.tag(form);
    const infinitive = doc.verbs().toInfinitive().text().trim().toLowerCase();
    return infinitive || normal;
  }
  if (pos === "NOUN" && tags.includes("Plural")) {
    const doc = nlp(text);
    doc.tag("Plural");
    const singular = doc.nouns().toSingular().text().trim().toLowerCase();
    return singular || normal;
  }
  return normal;
}

function punctuationTokens(chunk: string): TaggedToken[] {
  return (chunk.match(PUNCTUATION) ?? []).map((mark): TaggedToken => ({ text: mark, lemma: mark, pos: "PUNCT" }));
}

function normalOf(term: Term): string {
  return (term.normal || term.implicit || term.text).toLowerCase();
}

// ============================================================================
// Source offsets and hyphenated compounds
// ============================================================================

interface LocatedTerm {
  readonly term: Term;
  /** Offset of term.text in the sentence; unset for implicit terms. */
  readonly start?: number;
}

function locateTerms(sentence: string, terms: readonly Term[]): LocatedTerm[] {
  let cursor = 0;
  return terms.map((term): LocatedTerm => {
    const start = term.text.length > 0 ? sentence.indexOf(term.text, cursor) : -1;
    if (start === -1) return { term };
    cursor = start + term.text.length;
    return { term, start };
  });
}

// compromise splits "drop-off" into two terms joined by a bare hyphen
function joinsNext(current: LocatedTerm, next: LocatedTerm | undefined): boolean {
  return (
    next !== undefined &&
    current.term.text.length > 0 &&
    next.term.text.length > 0 &&
    HYPHEN.test(`${current.term.post}${next.term.pre}`)
  );
}

function groupHyphenated(terms: readonly LocatedTerm[]): LocatedTerm[][] {
  const groups: LocatedTerm[][] = [];
  let current: LocatedTerm[] = [];
  terms.forEach((term, i) => {
    current.push(term);
    if (!joinsNext(term, terms[i + 1])) {
      groups.push(current);
      current = [];
    }
  });
  return groups;
}

function groupText(group: readonly LocatedTerm[]): string {
  const [only] = group;
  if (group.length === 1 && only !== undefined) return only.term.text || only.term.implicit || "";
  return group
    .map(({ term }, k) => (k === group.length - 1 ? term.text : `${term.text}${term.post}${group[k + 1]?.term.pre ?? ""}`))
    .join("");
}

/**
 * A compound keeps its last part's POS when that part is nominal. A verb
 * compound stays VERB unless a determiner, adjective or number precedes it.
 * Anything else is a modifier (ADJ) in front of a nominal, or a NOUN.
 */
export function compoundPos(
  lastPart: CoarsePos,
  previous: CoarsePos | undefined,
  next: CoarsePos | undefined,
): CoarsePos {
  if (NOMINAL_POS.has(lastPart)) return lastPart;
  if (lastPart === "VERB" && (previous === undefined || !MODIFIER_CONTEXT.has(previous))) return "VERB";
  return next !== undefined && NOMINAL_FOLLOWERS.has(next) ? "ADJ" : "NOUN";
}

function toTaggedTokens(sentence: string, terms: readonly Term[]): TaggedToken[] {
  const groups = groupHyphenated(locateTerms(sentence, terms));
  const groupPos = groups.map((group): CoarsePos => {
    const last = group[group.length - 1];
    return last === undefined ? "X" : mapTagsToPos(last.term.tags, normalOf(last.term));
  });

  return groups.flatMap((group, i): TaggedToken[] => {
    const first = group[0];
    const last = group[group.length - 1];
    const text = groupText(group);
    if (first === undefined || last === undefined || text.length === 0) return [];

    const ownPos = groupPos[i] ?? "X";
    const compound = group.length > 1 || INNER_HYPHEN.test(text);
    const pos = compound ? compoundPos(ownPos, groupPos[i - 1], groupPos[i + 1]) : ownPos;
    const lastText = last.term.text || last.term.implicit || "";
    const lemma = [
      ...group.slice(0, -1).map(({ term }) => term.text.toLowerCase()),
      lemmatize(lastText, normalOf(last.term), pos, last.term.tags),
    ].join("-");

    const token: TaggedToken =
      first.start !== undefined && last.start !== undefined
        ? { text, lemma, pos, start: first.start, end: last.start + last.term.text.length }
        : { text, lemma, pos };

    return [...punctuationTokens(first.term.pre), token, ...punctuationTokens(last.term.post)];
  });
}

// ============================================================================
// Engine
// ============================================================================

export class CompromiseEngine implements LinguisticEngine {
  readonly name = "compromise";
  private readonly stopwords: ReadonlySet<string>;

  constructor(stopwords?: ReadonlySet<string>) {
    try {
      this.stopwords = stopwords ?? loadStopwords();
    } catch (error) {
      throw new AnalysisEngineError(
        `Failed to load stopwords: ${getErrorMessage(error)}`,
        this.name,
        "load",
        { cause: error },
      );
    }
  }

  splitSentences(text: string): string[] {
    if (text.trim().length === 0) return [];

    try {
      const sentences = SentenceListSchema.parse(nlp(text).sentences().out("array"));
      return sentences.map((s) => s.trim()).filter((s) => s.length > 0);
    } catch (error) {
      throw new AnalysisEngineError(
        `Sentence segmentation failed: ${getErrorMessage(error)}`,
        this.name,
        "split_sentences",
        { cause: error },
      );
    }
  }

  parse(sentence: string): ParsedSentence {
    try {
      const doc = nlp(sentence);
      const json = DocJsonSchema.parse(doc.json());
      const tokens = toTaggedTokens(
        sentence,
        json.flatMap((s) => s.terms),
      );
      return labelDependencies(sentence, tokens, this.extractEntities(sentence));
    } catch (error) {
      throw new AnalysisEngineError(
        `Parse failed: ${getErrorMessage(error)}`,
        this.name,
        "parse",
        { cause: error },
      );
    }
  }

  isStopWord(word: string): boolean {
    return this.stopwords.has(word.toLowerCase());
  }

  private extractEntities(sentence: string): EntitySpan[] {
    const doc = nlp(sentence);
    const clean = (items: unknown): string[] =>
      SentenceListSchema.parse(items)
        .map((item) => item.trim().replace(TRAILING_NON_WORD, ""))
        .filter((item) => item.length > 0);

    const labels = new Map<string, string>();
    for (const text of clean(doc.organizations().out("array"))) labels.set(text, "ORG");
    for (const text of clean(doc.places().out("array"))) labels.set(text, "GPE");
    for (const text of clean(doc.people().out("array"))) labels.set(text, "PERSON");

    // topics() keeps source order across the three kinds
    return clean(doc.topics().out("array")).flatMap((text) => {
      const label = labels.get(text);
      return label ? [{ text, label }] : [];
    });
  }
}
