/**
 * Journey data access interface.
 * A journey is stored as one aggregate (history, consent and meeting
 * requests included). Writes are either a guarded insert or a versioned
 * compare-and-swap; nothing else mutates a stored journey.
 */

import type { Journey } from '../types/models.js';

export type InsertJourneyResult =
  | { created: true; journey: Journey }
  | { created: false; existing: Journey };

export interface FindJourneysOptions {
  activeOnly?: boolean;
  limit: number;
  offset: number;
}

export interface IJourneyRepository {
  /**
   * Insert unless a non-terminal journey exists for the same pair.
   * Must be atomic: of two concurrent inserts for one pair, one loses.
   */
  insertIfNoActive(journey: Journey): Promise<InsertJourneyResult>;

  findById(id: string): Promise<Journey | null>;

  findActiveByPair(userA: string, userB: string): Promise<Journey | null>;

  /** Newest first. */
  findByParticipant(userId: string, options: FindJourneysOptions): Promise<Journey[]>;

  /** Declined journeys involving the user, last updated at or after `since`. */
  findDeclinedSince(userId: string, since: Date): Promise<Journey[]>;

  /** Non-terminal journeys whose deadline is at or before `now`, earliest deadline first. */
  findDue(now: Date, limit: number): Promise<Journey[]>;

  /**
   * Replace the stored journey with `next` if its version still equals
   * `expectedVersion`. Returns false, writing nothing, otherwise.
   */
  compareAndSwap(next: Journey, expectedVersion: number): Promise<boolean>;
}
