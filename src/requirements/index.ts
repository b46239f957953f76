/**
 * Requirements Extraction API
 *
 * Library entry point. `RequirementsExtractor` holds one engine and can be
 * shared across concurrent callers; the free functions use the process-wide
 * default engine unless one is passed.
 */

import { getDefaultEngine } from "../nlp/index.js";
import type { LinguisticEngine } from "../nlp/types.js";
import { groupByStakeholder } from "./pipeline/classifier.js";
import { runPipeline } from "./pipeline/pipeline.js";
import type { ClassifiedRequirement, PipelineTrace } from "./pipeline/types.js";

export type {
  ClassifiedRequirement,
  FeatureRecord,
  PipelineTrace,
  RequirementType,
  ScoredCandidate,
  Stakeholder,
  SvoPattern,
} from "./pipeline/types.js";
export { groupByStakeholder } from "./pipeline/classifier.js";

export class RequirementsExtractor {
  constructor(private readonly engine: LinguisticEngine = getDefaultEngine()) {}

  get engineName(): string {
    return this.engine.name;
  }

  /** Every stage's output, for inspection and debugging. */
  run(description: string): PipelineTrace {
    return runPipeline(description, this.engine);
  }

  /** Classified requirements in scorer order. */
  extractRequirements(description: string): ClassifiedRequirement[] {
    return [...this.run(description).classified];
  }

  /** Requirement text only, grouped Customer → Administrator → System. */
  extractAndFormat(description: string): string[] {
    return groupByStakeholder(this.extractRequirements(description)).map((item) => item.requirement);
  }
}

export function extractRequirements(
  description: string,
  engine?: LinguisticEngine,
): ClassifiedRequirement[] {
  return new RequirementsExtractor(engine).extractRequirements(description);
}

export function extractAndFormat(description: string, engine?: LinguisticEngine): string[] {
  return new RequirementsExtractor(engine).extractAndFormat(description);
}
