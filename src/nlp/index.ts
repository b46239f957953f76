import { emit, TelemetryEvents } from "../utils/telemetry.js";
import { CompromiseEngine } from "./compromise-engine.js";
import type { LinguisticEngine } from "./types.js";

export type {
  CoarsePos,
  DependencyLabel,
  EntitySpan,
  LinguisticEngine,
  NounChunk,
  ParsedSentence,
  ParsedToken,
} from "./types.js";
export { CompromiseEngine } from "./compromise-engine.js";

let defaultEngine: LinguisticEngine | null = null;

/**
 * Process-wide engine, created on first use and shared read-only afterwards.
 */
export function getDefaultEngine(): LinguisticEngine {
  if (defaultEngine === null) {
    defaultEngine = new CompromiseEngine();
    emit(TelemetryEvents.EngineLoaded, { engine: defaultEngine.name });
  }
  return defaultEngine;
}
