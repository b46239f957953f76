/**
 * Requirement Refiner
 *
 * Drops short and duplicate drafts, then normalizes lead phrase, final
 * period and repeated modals.
 */

import {
  APPROVED_LEADS,
  DEFAULT_LEAD,
  MIN_DRAFT_WORDS,
  TEXT_FIXUPS,
} from "./lexicons.js";
import { countWords } from "./segmenter.js";

/**
 * Comparison key for deduplication: lowercased, ASCII letters and digits only.
 */
export function dedupKey(draft: string): string {
  return draft.toLowerCase().replace(/[^a-zA-Z0-9]/g, "");
}

function normalizeDraft(draft: string): string {
  let text = draft;

  const lower = text.toLowerCase();
  if (!APPROVED_LEADS.some((lead) => lower.startsWith(lead))) {
    text = `${DEFAULT_LEAD}${text}`;
  }

  if (!text.endsWith(".")) {
    text += ".";
  }

  for (const [from, to] of TEXT_FIXUPS) {
    text = text.replaceAll(from, to);
  }

  return text;
}

/** First occurrence wins among duplicates. */
export function refineRequirements(drafts: readonly string[]): string[] {
  const seen = new Set<string>();
  const unique: string[] = [];

  for (const draft of drafts) {
    const key = dedupKey(draft);
    if (!seen.has(key) && countWords(draft) > MIN_DRAFT_WORDS) {
      seen.add(key);
      unique.push(draft);
    }
  }

  return unique.map(normalizeDraft);
}
