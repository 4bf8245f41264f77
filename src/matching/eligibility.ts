/**
 * Eligibility filter.
 * Decides whether a candidate may be ranked for (or paired with) a user.
 * Preference bounds are checked in both directions.
 */

import type { GeoPoint, UserProfile } from '../types/models.js';

export type IneligibilityReason =
  | 'self'
  | 'unverified'
  | 'active_journey'
  | 'declined_cooldown'
  | 'age_preference'
  | 'gender_preference'
  | 'distance';

export type EligibilityResult =
  | { eligible: true }
  | { eligible: false; reason: IneligibilityReason };

export interface EligibilityContext {
  now: Date;
  /** Users sharing a non-terminal journey with the user. */
  activePartnerIds: ReadonlySet<string>;
  /** Users from a journey with the user declined inside the cooldown window. */
  cooldownPartnerIds: ReadonlySet<string>;
  requireVerified: boolean;
}

const EARTH_RADIUS_KM = 6371;

export function checkEligibility(
  user: UserProfile,
  candidate: UserProfile,
  ctx: EligibilityContext
): EligibilityResult {
  if (candidate.userId === user.userId) return ineligible('self');
  if (ctx.requireVerified && !candidate.verified) return ineligible('unverified');
  if (ctx.activePartnerIds.has(candidate.userId)) return ineligible('active_journey');
  if (ctx.cooldownPartnerIds.has(candidate.userId)) return ineligible('declined_cooldown');

  if (!acceptsAge(user, candidate, ctx.now) || !acceptsAge(candidate, user, ctx.now)) {
    return ineligible('age_preference');
  }

  if (
    !user.preferences.genders.includes(candidate.gender) ||
    !candidate.preferences.genders.includes(user.gender)
  ) {
    return ineligible('gender_preference');
  }

  if (!user.location || !candidate.location) return ineligible('distance');
  const distance = distanceKm(user.location, candidate.location);
  if (
    distance > user.preferences.maxDistanceKm ||
    distance > candidate.preferences.maxDistanceKm
  ) {
    return ineligible('distance');
  }

  return { eligible: true };
}

function ineligible(reason: IneligibilityReason): EligibilityResult {
  return { eligible: false, reason };
}

function acceptsAge(chooser: UserProfile, other: UserProfile, now: Date): boolean {
  const age = ageOn(other.birthDate, now);
  return age >= chooser.preferences.ageMin && age <= chooser.preferences.ageMax;
}

/** Whole years completed on `now` (UTC calendar). */
export function ageOn(birthDate: Date, now: Date): number {
  let age = now.getUTCFullYear() - birthDate.getUTCFullYear();
  const monthDelta = now.getUTCMonth() - birthDate.getUTCMonth();
  if (monthDelta < 0 || (monthDelta === 0 && now.getUTCDate() < birthDate.getUTCDate())) {
    age -= 1;
  }
  return age;
}

/** Great-circle (haversine) distance. */
export function distanceKm(a: GeoPoint, b: GeoPoint): number {
  const toRad = (deg: number) => (deg * Math.PI) / 180;
  const dLat = toRad(b.latitude - a.latitude);
  const dLon = toRad(b.longitude - a.longitude);
  const h =
    Math.sin(dLat / 2) ** 2 +
    Math.cos(toRad(a.latitude)) * Math.cos(toRad(b.latitude)) * Math.sin(dLon / 2) ** 2;
  return 2 * EARTH_RADIUS_KM * Math.asin(Math.min(1, Math.sqrt(h)));
}
