import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { z } from "zod";

/**
 * English stopword list
 *
 * Loaded from data/stopwords-en.json, resolved relative to this file so it
 * works both from src/ (tsx, vitest) and from dist/src/ (node).
 */

const StopwordFileSchema = z.object({
  language: z.literal("en"),
  words: z.array(z.string().min(1)).min(1),
});

const CANDIDATE_PATHS = ["../../data/stopwords-en.json", "../../../data/stopwords-en.json"];

function readStopwordFile(): unknown {
  let lastError: unknown;
  for (const relative of CANDIDATE_PATHS) {
    try {
      const path = fileURLToPath(new URL(relative, import.meta.url));
      return JSON.parse(readFileSync(path, "utf-8"));
    } catch (error) {
      lastError = error;
    }
  }
  throw lastError;
}

/**
 * Load the English stopword set (lowercase).
 *
 * Throws when the data file is missing or malformed; the engine wraps that in
 * an AnalysisEngineError with operation "load".
 */
export function loadStopwords(): ReadonlySet<string> {
  const parsed = StopwordFileSchema.parse(readStopwordFile());
  return new Set(parsed.words.map((word) => word.toLowerCase()));
}
