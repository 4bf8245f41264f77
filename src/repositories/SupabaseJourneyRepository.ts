/**
 * Supabase implementation of IJourneyRepository.
 * Pair uniqueness rests on the partial unique index
 * `journeys_active_pair_key` (pair_key where not is_terminal).
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type {
  FindJourneysOptions,
  IJourneyRepository,
  InsertJourneyResult,
} from './IJourneyRepository.js';
import type { Journey } from '../types/models.js';
import type { JourneyRow } from '../types/database.js';
import { fromJourneyRow, toJourneyRow } from './mappers.js';
import { pairKey } from '../journey/transitions.js';

const UNIQUE_VIOLATION = '23505';

export class SupabaseJourneyRepository implements IJourneyRepository {
  constructor(private readonly db: SupabaseClient) {}

  async insertIfNoActive(journey: Journey): Promise<InsertJourneyResult> {
    const { data, error } = await this.db
      .from('journeys')
      .insert(toJourneyRow(journey))
      .select()
      .single();

    if (error?.code === UNIQUE_VIOLATION) {
      const [a, b] = journey.participants;
      const existing = await this.findActiveByPair(a, b);
      // The blocking journey can end between the failed insert and the read.
      if (!existing) return this.insertIfNoActive(journey);
      return { created: false, existing };
    }
    if (error) throw new Error(`Failed to create journey: ${error.message}`);
    return { created: true, journey: fromJourneyRow(data as JourneyRow) };
  }

  async findById(id: string): Promise<Journey | null> {
    const { data, error } = await this.db
      .from('journeys')
      .select('*')
      .eq('id', id)
      .maybeSingle();

    if (error) throw new Error(`Failed to fetch journey: ${error.message}`);
    return data ? fromJourneyRow(data as JourneyRow) : null;
  }

  async findActiveByPair(userA: string, userB: string): Promise<Journey | null> {
    const { data, error } = await this.db
      .from('journeys')
      .select('*')
      .eq('pair_key', pairKey(userA, userB))
      .eq('is_terminal', false)
      .maybeSingle();

    if (error) throw new Error(`Failed to fetch journey: ${error.message}`);
    return data ? fromJourneyRow(data as JourneyRow) : null;
  }

  async findByParticipant(userId: string, options: FindJourneysOptions): Promise<Journey[]> {
    let query = this.db
      .from('journeys')
      .select('*')
      .or(`participant_a.eq.${userId},participant_b.eq.${userId}`);

    if (options.activeOnly) query = query.eq('is_terminal', false);

    const { data, error } = await query
      .order('created_at', { ascending: false })
      .range(options.offset, options.offset + options.limit - 1);

    if (error) throw new Error(`Failed to fetch journeys: ${error.message}`);
    return ((data ?? []) as JourneyRow[]).map(fromJourneyRow);
  }

  async findDeclinedSince(userId: string, since: Date): Promise<Journey[]> {
    const { data, error } = await this.db
      .from('journeys')
      .select('*')
      .or(`participant_a.eq.${userId},participant_b.eq.${userId}`)
      .eq('stage', 'declined')
      .gte('updated_at', since.toISOString());

    if (error) throw new Error(`Failed to fetch declined journeys: ${error.message}`);
    return ((data ?? []) as JourneyRow[]).map(fromJourneyRow);
  }

  async findDue(now: Date, limit: number): Promise<Journey[]> {
    const { data, error } = await this.db
      .from('journeys')
      .select('*')
      .eq('is_terminal', false)
      .lte('deadline', now.toISOString())
      .order('deadline', { ascending: true })
      .limit(limit);

    if (error) throw new Error(`Failed to fetch due journeys: ${error.message}`);
    return ((data ?? []) as JourneyRow[]).map(fromJourneyRow);
  }

  async compareAndSwap(next: Journey, expectedVersion: number): Promise<boolean> {
    const { id, created_at: _createdAt, ...changes } = toJourneyRow(next);

    const { data, error } = await this.db
      .from('journeys')
      .update(changes)
      .eq('id', id)
      .eq('version', expectedVersion)
      .select('id');

    if (error) throw new Error(`Failed to update journey: ${error.message}`);
    return (data ?? []).length === 1;
  }
}
