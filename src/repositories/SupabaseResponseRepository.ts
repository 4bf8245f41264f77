/**
 * Supabase implementation of IResponseRepository.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type { IResponseRepository, ResponseInput } from './IResponseRepository.js';
import type { Response } from '../types/models.js';
import type { ResponseRow } from '../types/database.js';
import { fromResponseRow } from './mappers.js';
import { chunk, fetchAllPages, IN_FILTER_CHUNK } from './paging.js';
import { canonicalUserId } from './ids.js';

export class SupabaseResponseRepository implements IResponseRepository {
  constructor(private readonly db: SupabaseClient) {}

  async upsertMany(userId: string, answers: ResponseInput[], at: Date): Promise<Response[]> {
    if (answers.length === 0) return [];

    const rows: ResponseRow[] = answers.map((answer) => ({
      user_id: userId,
      field_id: answer.fieldId,
      value: answer.value,
      updated_at: at.toISOString(),
    }));

    const { data, error } = await this.db
      .from('responses')
      .upsert(rows, { onConflict: 'user_id,field_id' })
      .select();

    if (error) throw new Error(`Failed to save responses: ${error.message}`);
    return ((data ?? []) as ResponseRow[]).map(fromResponseRow);
  }

  async findByUser(userId: string): Promise<Response[]> {
    return this.findByUsers([userId]);
  }

  /** Paged and chunked; a partial read would silently change scores. */
  async findByUsers(userIds: string[]): Promise<Response[]> {
    const ids = [
      ...new Set(userIds.map(canonicalUserId).filter((id): id is string => id !== null)),
    ];
    const rows: ResponseRow[] = [];

    for (const batch of chunk(ids, IN_FILTER_CHUNK)) {
      const page = await fetchAllPages<ResponseRow>(
        (from, to) =>
          this.db
            .from('responses')
            .select('*', { count: 'exact' })
            .in('user_id', batch)
            .order('user_id', { ascending: true })
            .order('field_id', { ascending: true })
            .range(from, to),
        'responses'
      );
      rows.push(...page);
    }
    return rows.map(fromResponseRow);
  }
}
