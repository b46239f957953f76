/**
 * Requirement Pipeline Orchestrator
 *
 * Runs Segmenter → Feature Extractor → Scorer → Formulator → Refiner →
 * Classifier in order. Each stage consumes the whole output of the previous
 * one. Engine failures propagate; there is no partial result.
 *
 * Telemetry carries counts and timings only, never description text.
 */

import type { LinguisticEngine } from "../../nlp/types.js";
import { emit, log, TelemetryEvents } from "../../utils/telemetry.js";
import { classifyRequirements } from "./classifier.js";
import { extractAllFeatures } from "./feature-extractor.js";
import { formulateRequirements } from "./formulator.js";
import { refineRequirements } from "./refiner.js";
import { scoreFeatures } from "./scorer.js";
import { segmentSentences } from "./segmenter.js";
import type { PipelineTrace } from "./types.js";

export function runPipeline(description: string, engine: LinguisticEngine): PipelineTrace {
  const startedAt = Date.now();

  try {
    const sentences = segmentSentences(description, engine);
    log.debug({ stage: "segment", sentence_count: sentences.length }, "requirements stage done");

    const features = extractAllFeatures(sentences, engine);
    log.debug({ stage: "extract_features", record_count: features.length }, "requirements stage done");

    const candidates = scoreFeatures(features);
    log.debug(
      { stage: "score", candidate_count: candidates.length, top_score: candidates[0]?.score ?? null },
      "requirements stage done",
    );

    const drafts = formulateRequirements(candidates);
    log.debug({ stage: "formulate", draft_count: drafts.length }, "requirements stage done");

    const refined = refineRequirements(drafts);
    log.debug({ stage: "refine", refined_count: refined.length }, "requirements stage done");

    const classified = classifyRequirements(refined);
    log.debug({ stage: "classify", requirement_count: classified.length }, "requirements stage done");

    emit(TelemetryEvents.PipelineCompleted, {
      engine: engine.name,
      sentence_count: sentences.length,
      candidate_count: candidates.length,
      requirement_count: classified.length,
      elapsed_ms: Date.now() - startedAt,
    });

    return { sentences, features, candidates, drafts, refined, classified };
  } catch (error) {
    emit(TelemetryEvents.PipelineFailed, {
      engine: engine.name,
      error_name: error instanceof Error ? error.name : "unknown",
      elapsed_ms: Date.now() - startedAt,
    });
    throw error;
  }
}
