/**
 * Supabase implementation of IProfileProvider.
 * Reads the profile service's `profiles` table.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type { IProfileProvider } from './IProfileProvider.js';
import type { ProfileRow } from '../types/database.js';
import type { Gender, UserProfile } from '../types/models.js';
import { fetchAllPages } from '../repositories/paging.js';
import { canonicalUserId } from '../repositories/ids.js';

const GENDERS: readonly Gender[] = ['man', 'woman', 'nonbinary'];

export class SupabaseProfileProvider implements IProfileProvider {
  constructor(private readonly db: SupabaseClient) {}

  async getProfile(userId: string): Promise<UserProfile | null> {
    const id = canonicalUserId(userId);
    if (!id) return null;

    const { data, error } = await this.db
      .from('profiles')
      .select('*')
      .eq('user_id', id)
      .maybeSingle();

    if (error) throw new Error(`Failed to fetch profile: ${error.message}`);
    return data ? toProfile(data as ProfileRow) : null;
  }

  /** Every verified profile but the user's own, read page by page in id order. */
  async listCandidatePool(userId: string): Promise<UserProfile[]> {
    const rows = await fetchAllPages<ProfileRow>(
      (from, to) =>
        this.db
          .from('profiles')
          .select('*', { count: 'exact' })
          .neq('user_id', userId)
          .eq('verified', true)
          .order('user_id', { ascending: true })
          .range(from, to),
      'candidate pool'
    );
    return rows.map(toProfile);
  }
}

function toProfile(row: ProfileRow): UserProfile {
  return {
    userId: row.user_id,
    verified: row.verified,
    birthDate: new Date(row.birth_date),
    gender: toGender(row.gender),
    preferences: {
      ageMin: row.pref_age_min,
      ageMax: row.pref_age_max,
      maxDistanceKm: row.pref_max_distance_km,
      genders: row.pref_genders.map(toGender),
    },
    location:
      row.latitude !== null && row.longitude !== null
        ? { latitude: row.latitude, longitude: row.longitude }
        : null,
  };
}

function toGender(value: string): Gender {
  const gender = GENDERS.find((g) => g === value);
  if (!gender) throw new Error(`Unknown gender value in profiles: "${value}"`);
  return gender;
}
