/**
 * Candidate ranker.
 * Filters a pool through the eligibility rules and orders the rest by
 * score. The returned sequence is lazy (nothing is scored before the first
 * iteration) and restartable (every iteration yields the same order).
 */

import type { UserProfile } from '../types/models.js';
import { compareIds } from './catalog.js';
import { checkEligibility, type EligibilityContext } from './eligibility.js';
import type { CompatibilityScore } from './scorer.js';

export interface RankFilter {
  /** Drop candidates scoring below this. Default: 0. */
  minScore?: number;
  excludeInsufficientData?: boolean;
  excludeDealBreakers?: boolean;
  /** Keep at most this many candidates. */
  limit?: number;
}

export interface RankedCandidate {
  candidate: UserProfile;
  score: CompatibilityScore;
}

export interface RankInput {
  user: UserProfile;
  pool: readonly UserProfile[];
  context: EligibilityContext;
  filter?: RankFilter;
  scoreCandidate: (candidate: UserProfile) => CompatibilityScore;
}

export class RankedCandidates implements Iterable<RankedCandidate> {
  private computed: RankedCandidate[] | null = null;

  constructor(private readonly compute: () => RankedCandidate[]) {}

  *[Symbol.iterator](): Iterator<RankedCandidate> {
    yield* this.materialize();
  }

  /** The first `count` candidates. */
  take(count: number): RankedCandidate[] {
    return this.materialize().slice(0, Math.max(0, count));
  }

  toArray(): RankedCandidate[] {
    return [...this.materialize()];
  }

  private materialize(): readonly RankedCandidate[] {
    if (!this.computed) {
      this.computed = this.compute();
    }
    return this.computed;
  }
}

export function rankCandidates(input: RankInput): RankedCandidates {
  return new RankedCandidates(() => {
    const filter = input.filter ?? {};
    const minScore = filter.minScore ?? 0;
    const seen = new Set<string>();
    const ranked: RankedCandidate[] = [];

    for (const candidate of input.pool) {
      if (seen.has(candidate.userId)) continue;
      seen.add(candidate.userId);

      if (!checkEligibility(input.user, candidate, input.context).eligible) continue;

      const score = input.scoreCandidate(candidate);
      if (score.overall < minScore) continue;
      if (filter.excludeInsufficientData && score.insufficientData) continue;
      if (filter.excludeDealBreakers && score.dealBreakers.length > 0) continue;

      ranked.push({ candidate, score });
    }

    ranked.sort(compareRanked);
    return filter.limit !== undefined ? ranked.slice(0, Math.max(0, filter.limit)) : ranked;
  });
}

/** Higher score first, then more shared answers, then candidate id ascending. */
export function compareRanked(a: RankedCandidate, b: RankedCandidate): number {
  if (a.score.overall !== b.score.overall) return b.score.overall - a.score.overall;
  if (a.score.fieldCount !== b.score.fieldCount) return b.score.fieldCount - a.score.fieldCount;
  return compareIds(a.candidate.userId, b.candidate.userId);
}
