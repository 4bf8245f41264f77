/**
 * Profile collaborator interface.
 * Profiles are owned by the profile service; this core only reads the
 * fields the eligibility filter needs.
 */

import type { UserProfile } from '../types/models.js';

export interface IProfileProvider {
  getProfile(userId: string): Promise<UserProfile | null>;

  /** Profiles that may be ranked for this user. The user's own profile may be included. */
  listCandidatePool(userId: string): Promise<UserProfile[]>;
}
