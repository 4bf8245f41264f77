/**
 * Bounded memo of pairwise compatibility scores.
 * Keys embed the catalog version and each user's response generation, so
 * neither a catalog change nor a write seen by another instance serves a
 * stale score. Local answer writes also evict every entry involving the user.
 */

import type { CompatibilityScore } from '../matching/scorer.js';

/** One side of a scored pair: the user and the generation of the responses scored. */
export interface ScoredUser {
  userId: string;
  generation: string;
}

export interface IScoreCache {
  get(catalogVersion: string, a: ScoredUser, b: ScoredUser): CompatibilityScore | undefined;
  /** Ignored when any user was invalidated since `epoch` was read. */
  set(
    catalogVersion: string,
    a: ScoredUser,
    b: ScoredUser,
    score: CompatibilityScore,
    epoch: number
  ): void;
  invalidateUser(userId: string): void;
  /** Advances on every invalidation. Read it before loading the responses to score. */
  readonly epoch: number;
}

interface Entry {
  users: [string, string];
  score: CompatibilityScore;
}

export class LruScoreCache implements IScoreCache {
  private readonly entries = new Map<string, Entry>();
  private invalidations = 0;

  constructor(private readonly capacity = 10_000) {}

  get size(): number {
    return this.entries.size;
  }

  get epoch(): number {
    return this.invalidations;
  }

  get(catalogVersion: string, a: ScoredUser, b: ScoredUser): CompatibilityScore | undefined {
    const key = cacheKey(catalogVersion, a, b);
    const entry = this.entries.get(key);
    if (!entry) return undefined;

    // Refresh recency.
    this.entries.delete(key);
    this.entries.set(key, entry);
    return entry.score;
  }

  set(
    catalogVersion: string,
    a: ScoredUser,
    b: ScoredUser,
    score: CompatibilityScore,
    epoch: number
  ): void {
    // Responses loaded before a write may already be stale.
    if (epoch !== this.invalidations) return;

    const key = cacheKey(catalogVersion, a, b);
    this.entries.delete(key);
    this.entries.set(key, { users: [a.userId, b.userId], score });

    while (this.entries.size > this.capacity) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
  }

  invalidateUser(userId: string): void {
    this.invalidations++;
    for (const [key, entry] of this.entries) {
      if (entry.users[0] === userId || entry.users[1] === userId) {
        this.entries.delete(key);
      }
    }
  }
}

function cacheKey(catalogVersion: string, a: ScoredUser, b: ScoredUser): string {
  const [first, second] = a.userId < b.userId ? [a, b] : [b, a];
  return `${catalogVersion}|${first.userId}@${first.generation}|${second.userId}@${second.generation}`;
}
