// verifiedQueries.ts
// Scores a request against the model's verified queries.
//
// A verified query is accepted only when it is the single best candidate and
// its score clears the threshold; everything below falls through to
// generation. Scores are deterministic:
//
//   exact question / paraphrase          -> 1.0
//   otherwise 0.6 * lexical + 0.25 * entity + 0.15 * structure
//
// lexical   best Dice coefficient of content words vs. question + paraphrases
// entity    Jaccard overlap of table sets (both empty counts as a match)
// structure share of agreeing shape flags

import Enumerable from "linq";
import type { QueryShape, SemanticModel, VerifiedQuery } from "./semanticModel";
import { STOP_WORDS } from "./wordLists";

export interface MatchRequest {
  intentText: string;
  /** Table keys the request touches. */
  tables: string[];
  shape: QueryShape;
}

export interface CandidateScore {
  name: string;
  score: number;
  exact: boolean;
  lexical: number;
  entity: number;
  structure: number;
}

export interface VerifiedMatch {
  query: VerifiedQuery;
  confidence: number;
  candidates: CandidateScore[];
}

export interface MatchOptions {
  threshold: number;
}

const WEIGHTS = { lexical: 0.6, entity: 0.25, structure: 0.15 } as const;

/* --------------------------------------------------------------------------
 * TEXT
 * -------------------------------------------------------------------------- */

/** Lower case, single spaces, no trailing punctuation. */
export function normalizeQuestion(text: string): string {
  return text
    .toLowerCase()
    .replace(/\s+/g, " ")
    .trim()
    .replace(/[\s?.!;:]+$/, "");
}

function stem(word: string): string {
  return word.length > 3 && word.endsWith("s") && !word.endsWith("ss") ? word.slice(0, -1) : word;
}

export function contentWords(text: string): Set<string> {
  const words = text
    .toLowerCase()
    .split(/[^\p{L}\p{N}_]+/u)
    .filter((w) => w.length > 0 && !STOP_WORDS.has(w))
    .map(stem);
  return new Set(words);
}

function dice(a: Set<string>, b: Set<string>): number {
  if (a.size === 0 || b.size === 0) return 0;
  let shared = 0;
  a.forEach((w) => {
    if (b.has(w)) shared++;
  });
  return (2 * shared) / (a.size + b.size);
}

function jaccard(a: Set<string>, b: Set<string>): number {
  if (a.size === 0 && b.size === 0) return 1;
  const union = new Set([...a, ...b]);
  let shared = 0;
  a.forEach((t) => {
    if (b.has(t)) shared++;
  });
  return shared / union.size;
}

function round4(value: number): number {
  return Math.round(value * 10000) / 10000;
}

/**
 * Tables named in free text, by logical name or synonym.
 */
export function spotTables(model: SemanticModel, text: string): string[] {
  const words = contentWords(text);
  const normalized = ` ${normalizeQuestion(text)} `;
  return model.tables
    .filter(
      (table) =>
        words.has(stem(table.name.key.toLowerCase())) ||
        table.synonyms.some((s) => normalized.includes(` ${normalizeQuestion(s)} `))
    )
    .map((table) => table.name.key);
}

/* --------------------------------------------------------------------------
 * SCORING
 * -------------------------------------------------------------------------- */

function structureScore(a: QueryShape, b: QueryShape): number {
  const flags: Array<keyof QueryShape> = ["aggregate", "grouped", "timeScoped", "limited"];
  return flags.filter((flag) => a[flag] === b[flag]).length / flags.length;
}

function scoreQuery(query: VerifiedQuery, request: MatchRequest, requestWords: Set<string>): CandidateScore {
  const phrasings = [query.question, ...query.synonyms];
  const wanted = normalizeQuestion(request.intentText);

  if (wanted.length > 0 && phrasings.some((p) => normalizeQuestion(p) === wanted)) {
    return { name: query.name, score: 1, exact: true, lexical: 1, entity: 1, structure: 1 };
  }

  const lexical = Math.max(...phrasings.map((p) => dice(requestWords, contentWords(p))));
  const entity = jaccard(new Set(request.tables), new Set(query.tables));
  const structure = structureScore(request.shape, query.shape);
  const score =
    WEIGHTS.lexical * lexical + WEIGHTS.entity * entity + WEIGHTS.structure * structure;

  return {
    name: query.name,
    score: round4(score),
    exact: false,
    lexical: round4(lexical),
    entity: round4(entity),
    structure: round4(structure),
  };
}

/**
 * Every verified query scored against the request, best first; equal
 * scores keep declaration order.
 */
export function rankVerifiedQueries(model: SemanticModel, request: MatchRequest): CandidateScore[] {
  const requestWords = contentWords(request.intentText);
  return Enumerable.from(model.verifiedQueries)
    .select((query, index) => ({ index, candidate: scoreQuery(query, request, requestWords) }))
    .orderByDescending((r) => r.candidate.score)
    .thenBy((r) => r.index)
    .select((r) => r.candidate)
    .toArray();
}

/**
 * Accept the top-ranked candidate when it clears the threshold.
 */
export function selectMatch(
  model: SemanticModel,
  ranked: CandidateScore[],
  options: MatchOptions
): VerifiedMatch | null {
  const best = ranked[0];
  if (!best || best.score < options.threshold) return null;
  const query = model.verifiedQueries.find((q) => q.name === best.name);
  if (!query) return null;
  return { query, confidence: best.score, candidates: ranked };
}

export function matchVerifiedQuery(
  model: SemanticModel,
  request: MatchRequest,
  options: MatchOptions
): VerifiedMatch | null {
  return selectMatch(model, rankVerifiedQueries(model, request), options);
}
