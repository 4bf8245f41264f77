/**
 * Builds the eligibility context for a user from their journeys.
 */

import type { IJourneyRepository } from '../repositories/IJourneyRepository.js';
import type { EligibilityContext } from '../matching/eligibility.js';
import { otherParticipant } from '../journey/transitions.js';

const DAY_MS = 24 * 60 * 60 * 1000;

/** Upper bound on active journeys read for one user. */
const ACTIVE_JOURNEY_SCAN_LIMIT = 500;

export async function loadEligibilityContext(
  journeyRepo: IJourneyRepository,
  userId: string,
  now: Date,
  declineCooldownDays: number
): Promise<EligibilityContext> {
  const since = new Date(now.getTime() - declineCooldownDays * DAY_MS);
  const [active, declined] = await Promise.all([
    journeyRepo.findByParticipant(userId, {
      activeOnly: true,
      limit: ACTIVE_JOURNEY_SCAN_LIMIT,
      offset: 0,
    }),
    declineCooldownDays > 0 ? journeyRepo.findDeclinedSince(userId, since) : Promise.resolve([]),
  ]);

  return {
    now,
    activePartnerIds: new Set(active.map((j) => otherParticipant(j, userId))),
    cooldownPartnerIds: new Set(declined.map((j) => otherParticipant(j, userId))),
    requireVerified: true,
  };
}
