/**
 * Shallow Dependency Labeller
 *
 * Derives noun chunks, head links and a small set of dependency labels from a
 * POS-tagged token sequence. It is not a full parser: it recognises the
 * clause shapes that carry requirement signal (subject chunk, auxiliary and
 * modal chain, verb, object chunk, prepositional objects, coordination) and
 * labels everything else `dep`.
 *
 * Pure function. Makes no NLP library calls.
 */

import type {
  CoarsePos,
  DependencyLabel,
  EntitySpan,
  NounChunk,
  ParsedSentence,
  ParsedToken,
} from "./types.js";

// ============================================================================
// Types
// ============================================================================

export interface TaggedToken {
  readonly text: string;
  readonly lemma: string;
  readonly pos: CoarsePos;
  /** Character offsets into the sentence text, when the tagger reports them. */
  readonly start?: number;
  readonly end?: number;
}

interface Arc {
  dep: DependencyLabel;
  head: number;
}

interface ChunkSpan {
  start: number;
  end: number;
  root: number;
}

interface Predicate {
  index: number;
  /** First token of the auxiliary/adverb/"to" chain in front of the predicate. */
  groupStart: number;
  infinitival: boolean;
  marked: boolean;
}

// ============================================================================
// Constants
// ============================================================================

const CHUNK_HEAD_POS: ReadonlySet<CoarsePos> = new Set<CoarsePos>(["NOUN", "PROPN"]);
const CHUNK_BODY_POS: ReadonlySet<CoarsePos> = new Set<CoarsePos>(["ADJ", "NUM", "NOUN", "PROPN"]);
const NOMINAL_POS: ReadonlySet<CoarsePos> = new Set<CoarsePos>(["ADJ", "NUM", "NOUN", "PROPN"]);
const VERB_GROUP_POS: ReadonlySet<CoarsePos> = new Set<CoarsePos>(["AUX", "PART", "ADV"]);
const GERUND_MODIFIER_CONTEXT: ReadonlySet<CoarsePos> = new Set<CoarsePos>(["DET", "ADJ", "NUM", "PRON"]);
const NEGATIONS: ReadonlySet<string> = new Set(["not", "n't", "never"]);

// ============================================================================
// Noun Chunks
// ============================================================================

function isGerundModifier(tokens: readonly TaggedToken[], index: number): boolean {
  const token = tokens[index];
  const previous = tokens[index - 1];
  const next = tokens[index + 1];
  return (
    token !== undefined &&
    previous !== undefined &&
    GERUND_MODIFIER_CONTEXT.has(previous.pos) &&
    token.pos === "VERB" &&
    /(ing|ed)$/i.test(token.text) &&
    next !== undefined &&
    (next.pos === "NOUN" || next.pos === "ADJ")
  );
}

function opensChunk(tokens: readonly TaggedToken[], index: number): boolean {
  const token = tokens[index];
  if (token === undefined) return false;
  if (token.pos === "DET" || CHUNK_BODY_POS.has(token.pos)) return true;
  // Possessive pronoun in front of a nominal ("their machine")
  if (token.pos === "PRON") {
    const next = tokens[index + 1];
    return next !== undefined && NOMINAL_POS.has(next.pos);
  }
  return false;
}

function continuesChunk(tokens: readonly TaggedToken[], index: number): boolean {
  const token = tokens[index];
  if (token === undefined) return false;
  return CHUNK_BODY_POS.has(token.pos) || isGerundModifier(tokens, index);
}

function findChunkSpans(tokens: readonly TaggedToken[]): ChunkSpan[] {
  const spans: ChunkSpan[] = [];
  let i = 0;

  while (i < tokens.length) {
    const token = tokens[i];

    // Standalone pronoun ("they", "who")
    if (token !== undefined && token.pos === "PRON" && !opensChunk(tokens, i)) {
      spans.push({ start: i, end: i + 1, root: i });
      i++;
      continue;
    }

    if (!opensChunk(tokens, i)) {
      i++;
      continue;
    }

    let root = CHUNK_HEAD_POS.has(tokens[i]?.pos ?? "X") ? i : -1;
    let j = i + 1;
    while (j < tokens.length && continuesChunk(tokens, j)) {
      if (CHUNK_HEAD_POS.has(tokens[j]?.pos ?? "X")) root = j;
      j++;
    }

    if (root === -1) {
      i = j;
      continue;
    }

    spans.push({ start: i, end: root + 1, root });
    i = root + 1;
  }

  return spans;
}

/**
 * Chunk text is the exact source span when both edge tokens carry offsets;
 * otherwise the token texts joined by single spaces.
 */
function chunkText(text: string, tokens: readonly TaggedToken[], span: ChunkSpan): string {
  const first = tokens[span.start];
  const last = tokens[span.end - 1];
  if (first?.start !== undefined && last?.end !== undefined && first.start < last.end) {
    return text.slice(first.start, last.end);
  }
  return tokens
    .slice(span.start, span.end)
    .map((t) => t.text)
    .join(" ");
}

function modifierLabel(pos: CoarsePos): DependencyLabel {
  switch (pos) {
    case "DET":
      return "det";
    case "PRON":
      return "poss";
    case "NUM":
      return "nummod";
    case "NOUN":
    case "PROPN":
      return "compound";
    default:
      return "amod";
  }
}

// ============================================================================
// Predicates
// ============================================================================

function isInfinitiveMarker(tokens: readonly TaggedToken[], index: number): boolean {
  const token = tokens[index];
  return token !== undefined && token.text.toLowerCase() === "to" && (token.pos === "PART" || token.pos === "ADP");
}

function findPredicates(tokens: readonly TaggedToken[], covered: ReadonlySet<number>): Predicate[] {
  const predicates: Predicate[] = [];

  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];
    if (token === undefined || covered.has(i)) continue;

    let isPredicate = token.pos === "VERB";
    if (token.pos === "AUX") {
      // Copula or bare auxiliary: a predicate only when no verb follows its chain
      let k = i + 1;
      while (k < tokens.length && VERB_GROUP_POS.has(tokens[k]?.pos ?? "X")) k++;
      isPredicate = tokens[k]?.pos !== "VERB" || covered.has(k);
    }
    if (!isPredicate) continue;

    let groupStart = i;
    let infinitival = false;
    for (let k = i - 1; k >= 0 && !covered.has(k); k--) {
      if (isInfinitiveMarker(tokens, k)) {
        groupStart = k;
        infinitival = true;
      } else if (VERB_GROUP_POS.has(tokens[k]?.pos ?? "X")) {
        groupStart = k;
      } else {
        break;
      }
    }

    predicates.push({ index: i, groupStart, infinitival, marked: false });
  }

  return predicates;
}

// ============================================================================
// Labeller
// ============================================================================

/**
 * Label a tagged sentence with noun chunks, heads and dependency labels.
 */
export function labelDependencies(
  text: string,
  tokens: readonly TaggedToken[],
  entities: readonly EntitySpan[] = [],
): ParsedSentence {
  const arcs: Arc[] = tokens.map((_, i): Arc => ({ dep: "dep", head: i }));
  const labelled = new Set<number>();
  const setArc = (index: number, dep: DependencyLabel, head: number): void => {
    arcs[index] = { dep, head };
    labelled.add(index);
  };

  // 1. Noun chunks and their internal modifiers
  const spans = findChunkSpans(tokens);
  const covered = new Set<number>();
  const spanByStart = new Map<number, ChunkSpan>();
  const spanByEnd = new Map<number, ChunkSpan>();
  for (const span of spans) {
    spanByStart.set(span.start, span);
    spanByEnd.set(span.end, span);
    for (let k = span.start; k < span.end; k++) {
      covered.add(k);
      const token = tokens[k];
      if (k !== span.root && token !== undefined) {
        setArc(k, modifierLabel(token.pos), span.root);
      }
    }
  }

  // 2. Predicates and their auxiliary chains
  const predicates = findPredicates(tokens, covered);
  for (const predicate of predicates) {
    for (let k = predicate.groupStart; k < predicate.index; k++) {
      const token = tokens[k];
      if (token === undefined) continue;
      if (NEGATIONS.has(token.text.toLowerCase())) {
        setArc(k, "neg", predicate.index);
      } else if (token.pos === "ADV") {
        setArc(k, "advmod", predicate.index);
      } else {
        setArc(k, "aux", predicate.index);
      }
    }
  }

  const previousPredicateBefore = (index: number): Predicate | undefined =>
    [...predicates].reverse().find((p) => p.index < index);

  // 3. Prepositional objects
  tokens.forEach((token, a) => {
    if (token.pos !== "ADP" || labelled.has(a)) return;

    const attachTo = spanByEnd.get(a)?.root ?? previousPredicateBefore(a)?.index ?? -1;
    const objectSpan = spanByStart.get(a + 1);
    if (objectSpan) {
      setArc(objectSpan.root, "pobj", a);
      setArc(a, "prep", attachTo);
    } else {
      setArc(a, "advmod", attachTo);
    }
  });

  const isFree = (span: ChunkSpan): boolean => !labelled.has(span.root);

  // Follow "X, Y and Z" from a labelled chunk, attaching each conjunct to the first
  const attachConjuncts = (first: ChunkSpan): void => {
    let current = first;
    for (;;) {
      let k = current.end;
      const separators: number[] = [];
      while (tokens[k] !== undefined && (tokens[k]?.pos === "CCONJ" || tokens[k]?.text === ",")) {
        separators.push(k);
        k++;
      }
      const next = spanByStart.get(k);
      if (separators.length === 0 || next === undefined || !isFree(next)) return;
      for (const sep of separators) {
        setArc(sep, tokens[sep]?.pos === "CCONJ" ? "cc" : "punct", first.root);
      }
      setArc(next.root, "conj", first.root);
      current = next;
    }
  };

  // 4. Subjects, objects and clause markers
  let boundary = -1;
  for (const predicate of predicates) {
    for (let k = boundary + 1; k < predicate.groupStart; k++) {
      if (tokens[k]?.pos === "SCONJ" && !labelled.has(k)) {
        setArc(k, "mark", predicate.index);
        predicate.marked = true;
      }
    }

    const candidates = spans.filter(
      (span) => span.start > boundary && span.end <= predicate.groupStart && isFree(span),
    );
    let subject = candidates[candidates.length - 1];
    if (subject !== undefined && subject.end === predicate.groupStart) {
      // Walk back over coordination to the first conjunct ("Each washer and dryer has")
      for (;;) {
        const sep = subject.start - 1;
        const sepToken = tokens[sep];
        const previous = spanByEnd.get(sep);
        if (
          sepToken === undefined ||
          previous === undefined ||
          previous.start <= boundary ||
          !isFree(previous) ||
          !(sepToken.pos === "CCONJ" || sepToken.text === ",")
        ) {
          break;
        }
        setArc(sep, sepToken.pos === "CCONJ" ? "cc" : "punct", previous.root);
        setArc(subject.root, "conj", previous.root);
        subject = previous;
      }
      setArc(subject.root, "nsubj", predicate.index);
    }

    let k = predicate.index + 1;
    while (tokens[k]?.pos === "PART") k++;
    const objectSpan = spanByStart.get(k);
    if (objectSpan !== undefined && isFree(objectSpan)) {
      const isCopula = tokens[predicate.index]?.pos === "AUX";
      setArc(objectSpan.root, isCopula ? "attr" : "dobj", predicate.index);
      attachConjuncts(objectSpan);
    }

    boundary = predicate.index;
  }

  // 5. Clause structure
  const rootPredicate =
    predicates.find((p) => !p.marked && !p.infinitival) ?? predicates[0];
  const root = rootPredicate?.index ?? spans[0]?.root ?? 0;

  predicates.forEach((predicate, i) => {
    if (predicate === rootPredicate) return;
    const previous = predicates[i - 1];
    if (predicate.infinitival && previous !== undefined) {
      setArc(predicate.index, "xcomp", previous.index);
    } else if (predicate.marked) {
      setArc(predicate.index, "advcl", root);
    } else if (previous !== undefined && tokens[predicate.groupStart - 1]?.pos === "CCONJ") {
      setArc(predicate.groupStart - 1, "cc", previous.index);
      setArc(predicate.index, "conj", previous.index);
    } else {
      setArc(predicate.index, "dep", root);
    }
  });

  // 6. Everything still unattached hangs off the root
  tokens.forEach((token, k) => {
    if (labelled.has(k)) {
      const arc = arcs[k];
      if (arc !== undefined && arc.head === -1) arc.head = root;
      return;
    }
    if (token.pos === "PUNCT") {
      setArc(k, "punct", root);
    } else if (token.pos === "CCONJ") {
      setArc(k, "cc", root);
    } else if (token.pos === "ADV") {
      setArc(k, "advmod", root);
    } else {
      setArc(k, "dep", root);
    }
  });
  if (tokens.length > 0) {
    arcs[root] = { dep: "ROOT", head: root };
  }

  const parsedTokens: ParsedToken[] = tokens.map((token, index) => ({
    index,
    text: token.text,
    lemma: token.lemma,
    pos: token.pos,
    dep: arcs[index]?.dep ?? "dep",
    head: arcs[index]?.head ?? root,
  }));

  const nounChunks: NounChunk[] = spans.map((span) => ({
    text: chunkText(text, tokens, span),
    start: span.start,
    end: span.end,
    root: span.root,
  }));

  return {
    text,
    tokens: parsedTokens,
    nounChunks,
    entities: [...entities],
  };
}
