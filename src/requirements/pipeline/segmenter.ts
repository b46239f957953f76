import type { LinguisticEngine } from "../../nlp/types.js";
import { MIN_SENTENCE_WORDS } from "./lexicons.js";

/**
 * Count whitespace-delimited words.
 */
export function countWords(text: string): number {
  return text.split(/\s+/).filter((word) => word.length > 0).length;
}

/**
 * Split a description into candidate sentences.
 *
 * Whitespace runs collapse to one space, the engine finds sentence
 * boundaries, and sentences of MIN_SENTENCE_WORDS words or fewer are dropped.
 * Source order is kept. Empty input yields [].
 */
export function segmentSentences(text: string, engine: LinguisticEngine): string[] {
  const normalized = text.replace(/\s+/g, " ");
  if (normalized.trim().length === 0) return [];

  return engine
    .splitSentences(normalized)
    .filter((sentence) => countWords(sentence) > MIN_SENTENCE_WORDS);
}
