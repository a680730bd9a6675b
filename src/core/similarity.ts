/**
 * Similarity Suggester
 *
 * Edit-distance based "did you mean" suggestions for names the user
 * mistyped.
 */

import { normalizeName } from "./utils.js";

export const MAX_SUGGESTIONS = 3;

/**
 * Optimal string alignment distance: insertions, deletions, substitutions
 * and transpositions of adjacent characters each cost 1.
 */
export function editDistance(a: string, b: string): number {
  if (a === b) return 0;
  if (a.length === 0) return b.length;
  if (b.length === 0) return a.length;

  const rows = a.length + 1;
  const cols = b.length + 1;
  const d: number[][] = [];

  for (let i = 0; i < rows; i++) {
    d.push(new Array<number>(cols).fill(0));
    d[i][0] = i;
  }
  for (let j = 0; j < cols; j++) {
    d[0][j] = j;
  }

  for (let i = 1; i < rows; i++) {
    for (let j = 1; j < cols; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      let best = Math.min(d[i - 1][j] + 1, d[i][j - 1] + 1, d[i - 1][j - 1] + cost);
      if (i > 1 && j > 1 && a[i - 1] === b[j - 2] && a[i - 2] === b[j - 1]) {
        best = Math.min(best, d[i - 2][j - 2] + 1);
      }
      d[i][j] = best;
    }
  }

  return d[a.length][b.length];
}

interface Scored {
  candidate: string;
  distance: number;
}

/**
 * Candidates within `maxDistance` of `input` (case-insensitive), nearest
 * first, ties in ordinal order. A candidate also has to share more than
 * half of the longer string, so short words are not all "similar".
 */
export function findSimilar(
  input: string,
  candidates: Iterable<string>,
  maxDistance = 2,
  maxResults = MAX_SUGGESTIONS
): string[] {
  const needle = normalizeName(input);
  if (needle.length === 0) return [];

  const seen = new Set<string>();
  const scored: Scored[] = [];

  for (const candidate of candidates) {
    if (seen.has(candidate)) continue;
    seen.add(candidate);

    const distance = editDistance(needle, normalizeName(candidate));
    const longer = Math.max(needle.length, candidate.length);
    if (distance <= maxDistance && distance * 2 < longer) {
      scored.push({ candidate, distance });
    }
  }

  scored.sort((x, y) => {
    if (x.distance !== y.distance) return x.distance - y.distance;
    if (x.candidate < y.candidate) return -1;
    if (x.candidate > y.candidate) return 1;
    return 0;
  });

  return scored.slice(0, maxResults).map((s) => s.candidate);
}

/**
 * The single best candidate, if any.
 */
export function findMostSimilar(
  input: string,
  candidates: Iterable<string>,
  maxDistance = 3
): string | undefined {
  return findSimilar(input, candidates, maxDistance, 1)[0];
}

export function formatSuggestions(suggestions: readonly string[]): string | undefined {
  if (suggestions.length === 0) return undefined;
  if (suggestions.length === 1) return `Did you mean '${suggestions[0]}'?`;
  return `Did you mean one of: ${suggestions.map((s) => `'${s}'`).join(", ")}?`;
}
