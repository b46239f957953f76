/**
 * Linguistic Analysis Engine Contract
 *
 * The requirements pipeline never talks to an NLP library directly. It goes
 * through this interface, which exposes exactly what the stages consume:
 * sentence boundaries, per-token lemma/POS/dependency/head, noun chunks with
 * a root token, named-entity spans and an English stopword test.
 *
 * Parsed structures are read-only once returned. Later stages hold on to the
 * same ParsedSentence the Feature Extractor received instead of re-parsing.
 */

// ============================================================================
// Tag Sets
// ============================================================================

/** Coarse (Universal Dependencies) part-of-speech tags. */
export type CoarsePos =
  | 'ADJ'
  | 'ADP'
  | 'ADV'
  | 'AUX'
  | 'CCONJ'
  | 'DET'
  | 'INTJ'
  | 'NOUN'
  | 'NUM'
  | 'PART'
  | 'PRON'
  | 'PROPN'
  | 'PUNCT'
  | 'SCONJ'
  | 'SYM'
  | 'VERB'
  | 'X';

/**
 * Dependency labels (ClearNLP-style, as produced by common English parsers).
 * Only nsubj, dobj, pobj and aux carry meaning for the pipeline; the rest are
 * emitted so every token has a label.
 */
export type DependencyLabel =
  | 'ROOT'
  | 'nsubj'
  | 'dobj'
  | 'pobj'
  | 'aux'
  | 'prep'
  | 'det'
  | 'amod'
  | 'compound'
  | 'nummod'
  | 'poss'
  | 'attr'
  | 'xcomp'
  | 'advcl'
  | 'conj'
  | 'cc'
  | 'advmod'
  | 'neg'
  | 'mark'
  | 'punct'
  | 'dep';

// ============================================================================
// Parsed Structures
// ============================================================================

export interface ParsedToken {
  /** Position within the sentence (0-based). */
  readonly index: number;
  readonly text: string;
  readonly lemma: string;
  readonly pos: CoarsePos;
  readonly dep: DependencyLabel;
  /** Index of the syntactic head. A ROOT token is its own head. */
  readonly head: number;
}

export interface NounChunk {
  readonly text: string;
  /** First token index (inclusive). */
  readonly start: number;
  /** Last token index (exclusive). */
  readonly end: number;
  /** Index of the chunk's root token. */
  readonly root: number;
}

export interface EntitySpan {
  readonly text: string;
  readonly label: string;
}

export interface ParsedSentence {
  readonly text: string;
  readonly tokens: readonly ParsedToken[];
  readonly nounChunks: readonly NounChunk[];
  readonly entities: readonly EntitySpan[];
}

// ============================================================================
// Engine
// ============================================================================

/**
 * Read-only linguistic analysis collaborator.
 *
 * Implementations must be safe to share across concurrent requests: no
 * per-call mutation of engine state.
 */
export interface LinguisticEngine {
  readonly name: string;
  splitSentences(text: string): string[];
  parse(sentence: string): ParsedSentence;
  isStopWord(word: string): boolean;
}
