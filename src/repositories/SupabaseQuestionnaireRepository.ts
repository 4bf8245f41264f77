/**
 * Supabase implementation of IQuestionnaireRepository.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type { IQuestionnaireRepository } from './IQuestionnaireRepository.js';
import type { QuestionnaireField } from '../types/models.js';
import type { QuestionnaireFieldRow } from '../types/database.js';
import { fromFieldRow, toFieldRow } from './mappers.js';

const UNIQUE_VIOLATION = '23505';

export class SupabaseQuestionnaireRepository implements IQuestionnaireRepository {
  constructor(private readonly db: SupabaseClient) {}

  async listFields(): Promise<QuestionnaireField[]> {
    const { data, error } = await this.db
      .from('questionnaire_fields')
      .select('*')
      .order('id', { ascending: true });

    if (error) throw new Error(`Failed to fetch questionnaire fields: ${error.message}`);
    return ((data ?? []) as QuestionnaireFieldRow[]).map(fromFieldRow);
  }

  async insertField(field: QuestionnaireField): Promise<boolean> {
    const { error } = await this.db.from('questionnaire_fields').insert(toFieldRow(field));

    if (error?.code === UNIQUE_VIOLATION) return false;
    if (error) throw new Error(`Failed to create questionnaire field: ${error.message}`);
    return true;
  }
}
