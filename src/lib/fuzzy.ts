/**
 * Fuzzy resolution of partially typed note names.
 *
 * Scores are non-negative and lower is better:
 *   0        exact match
 *   (0, 1]   case-insensitive prefix, by the unmatched remainder
 *   (1, 2)   case-insensitive subsequence, by leading offset and gaps
 */

import { ARCHIVE_PREFIX } from "./checklist.js";
import { AmbiguousError, NotFoundError } from "./errors.js";
import { listIdentifiers, type Vault } from "./vault.js";

export interface Candidate {
  id: string;
  archived: boolean;
}

export interface Match extends Candidate {
  score: number;
}

export type Resolution =
  | { status: "found"; match: Match }
  | { status: "ambiguous"; matches: Match[] }
  | { status: "none" };

/**
 * Cheapest alignment of query as a subsequence of candidate, as the
 * unmatched leading characters plus the characters skipped in between.
 */
function subsequenceCost(candidate: string, query: string): number | null {
  let best: number | null = null;

  for (let start = 0; start < candidate.length; start++) {
    if (candidate[start] !== query[0]) continue;

    let pos = start;
    let matched = 1;
    while (matched < query.length) {
      pos = candidate.indexOf(query[matched], pos + 1);
      if (pos === -1) break;
      matched++;
    }
    // Later starts can only find fewer characters.
    if (matched < query.length) break;

    const gaps = pos - start + 1 - query.length;
    const cost = start + gaps;
    if (best === null || cost < best) best = cost;
  }

  return best;
}

export function score(candidate: string, query: string): number | null {
  if (candidate === query) return 0;

  const lowerCandidate = candidate.toLowerCase();
  const lowerQuery = query.toLowerCase();

  if (lowerCandidate.startsWith(lowerQuery)) {
    const remaining = candidate.length - query.length;
    return (remaining + 1) / (candidate.length + 1);
  }

  if (lowerQuery.length === 0) return null;
  const cost = subsequenceCost(lowerCandidate, lowerQuery);
  return cost === null ? null : 1 + cost / candidate.length;
}

/**
 * Matching candidates ordered by score, then identifier.
 */
export function rankMatches(query: string, candidates: readonly Candidate[]): Match[] {
  const matches: Match[] = [];
  for (const candidate of candidates) {
    const value = score(candidate.id, query);
    if (value !== null) matches.push({ ...candidate, score: value });
  }
  return matches.sort(
    (a, b) =>
      a.score - b.score ||
      a.id.localeCompare(b.id) ||
      Number(a.archived) - Number(b.archived),
  );
}

export function resolve(query: string, candidates: readonly Candidate[]): Resolution {
  const ranked = rankMatches(query, candidates);
  if (ranked.length === 0) return { status: "none" };

  const best = ranked.filter((match) => match.score === ranked[0].score);
  return best.length === 1
    ? { status: "found", match: best[0] }
    : { status: "ambiguous", matches: best };
}

export interface CandidateOptions {
  includeArchived?: boolean;
}

export function candidatesFor(vault: Vault, options: CandidateOptions = {}): Candidate[] {
  const active = listIdentifiers(vault).map((id) => ({ id, archived: false }));
  if (!options.includeArchived) return active;
  const archived = listIdentifiers(vault, { archived: true }).map((id) => ({ id, archived: true }));
  return [...active, ...archived];
}

/**
 * Split an `archive/`-prefixed query into the bare query and a flag.
 */
export function splitArchiveQuery(query: string): { query: string; archivedOnly: boolean } {
  return query.startsWith(ARCHIVE_PREFIX)
    ? { query: query.slice(ARCHIVE_PREFIX.length), archivedOnly: true }
    : { query, archivedOnly: false };
}

export function displayName(candidate: Candidate): string {
  return candidate.archived ? `${ARCHIVE_PREFIX}${candidate.id}` : candidate.id;
}

/**
 * Resolve a user-typed name to one note.
 *
 * A query prefixed `archive/` searches archive/ only; `includeArchived`
 * searches both sets.
 */
export function resolveNote(vault: Vault, input: string, options: CandidateOptions = {}): Match {
  const { query, archivedOnly } = splitArchiveQuery(input);
  const candidates = archivedOnly
    ? candidatesFor(vault, { includeArchived: true }).filter((c) => c.archived)
    : candidatesFor(vault, options);

  const result = resolve(query, candidates);
  switch (result.status) {
    case "found":
      vault.logger.debug({ query: input, match: result.match }, "resolved note");
      return result.match;
    case "ambiguous":
      throw new AmbiguousError(input, result.matches.map(displayName));
    case "none":
      throw new NotFoundError(input);
  }
}
