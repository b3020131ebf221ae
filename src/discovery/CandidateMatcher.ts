import { tokenize } from '../utils/tokens.js';
import type { CandidateServer } from './types.js';

/**
 * Orders candidates for one capability.
 *
 * 1. keywords equal to a token of the capability name, descending
 * 2. score, descending
 * 3. shorter package name, then lexical order
 */
export class CandidateMatcher {
  /** Number of candidate keywords that equal a token of `capability`. */
  keywordMatches(capability: string, candidate: CandidateServer): number {
    const tokens = new Set(tokenize(capability));
    let matches = 0;
    for (const keyword of new Set(candidate.capabilities.map((c) => c.toLowerCase()))) {
      if (tokens.has(keyword)) matches++;
    }
    return matches;
  }

  rank(capability: string, candidates: readonly CandidateServer[]): CandidateServer[] {
    const scored = candidates.map((candidate) => ({
      candidate,
      matches: this.keywordMatches(capability, candidate),
    }));
    scored.sort(
      (a, b) =>
        b.matches - a.matches ||
        b.candidate.score - a.candidate.score ||
        a.candidate.packageName.length - b.candidate.packageName.length ||
        (a.candidate.packageName < b.candidate.packageName ? -1 : a.candidate.packageName > b.candidate.packageName ? 1 : 0),
    );
    return scored.map((s) => s.candidate);
  }

  /** First candidate of an already ranked list, or null. */
  select(candidates: readonly CandidateServer[]): CandidateServer | null {
    return candidates[0] ?? null;
  }
}
