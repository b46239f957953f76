/**
 * Requirement Formulator
 *
 * Builds "{actor} shall {action} {object}" from a scored candidate, re-reading
 * noun chunks and dependency roles from the candidate's parse. Falls back to
 * the whole lowercased sentence when subject, action or object is missing.
 *
 * Pure functions. No engine calls, no I/O.
 */

import type { NounChunk, ParsedSentence } from "../../nlp/types.js";
import { ACTOR_PHRASES, ADMIN_ACTORS, CUSTOMER_ACTORS, DEFAULT_ACTION } from "./lexicons.js";
import type { ScoredCandidate } from "./types.js";

// ============================================================================
// Chunk queries
// ============================================================================

function chunksWithRootDep(parse: ParsedSentence, deps: readonly string[]): NounChunk[] {
  return parse.nounChunks.filter((chunk) => {
    const root = parse.tokens[chunk.root];
    return root !== undefined && deps.includes(root.dep);
  });
}

/**
 * Role words a subject chunk answers to: its full lowercased text and the
 * lemma of its root, so "The customer" and "Customers" both read as "customer".
 */
function actorForms(parse: ParsedSentence, chunk: NounChunk): string[] {
  const forms = [chunk.text.toLowerCase()];
  const root = parse.tokens[chunk.root];
  if (root !== undefined) forms.push(root.lemma.toLowerCase());
  return forms;
}

export function selectPrimaryActor(parse: ParsedSentence, actors: readonly NounChunk[]): string {
  const forms = actors.flatMap((chunk) => actorForms(parse, chunk));

  // Customer wins over administrator when both appear
  if (forms.some((form) => CUSTOMER_ACTORS.has(form))) return ACTOR_PHRASES.customer;
  if (forms.some((form) => ADMIN_ACTORS.has(form))) return ACTOR_PHRASES.administrator;
  return ACTOR_PHRASES.system;
}

// ============================================================================
// Formulation
// ============================================================================

export function formulateRequirement(candidate: ScoredCandidate): string {
  const { parse } = candidate;

  const actors = chunksWithRootDep(parse, ["nsubj"]);
  const primaryActor = selectPrimaryActor(parse, actors);

  const actions = candidate.actionVerbs.length > 0 ? candidate.actionVerbs : candidate.verbs;
  const action = actions[0] ?? DEFAULT_ACTION;

  const objects = chunksWithRootDep(parse, ["dobj", "pobj"]);
  const firstObject = objects[0];

  let requirement =
    actors.length > 0 && actions.length > 0 && firstObject !== undefined
      ? `${primaryActor} shall ${action} ${firstObject.text}`
      : `${primaryActor} shall ${action} ${candidate.sentence.toLowerCase()}`;

  requirement = requirement.replaceAll("  ", " ").trim();

  for (const chunk of chunksWithRootDep(parse, ["pobj"])) {
    if (!requirement.includes(chunk.text) && !requirement.endsWith(".")) {
      requirement += ` for ${chunk.text}`;
    }
  }

  return requirement;
}

export function formulateRequirements(candidates: readonly ScoredCandidate[]): string[] {
  return candidates.map(formulateRequirement);
}
