/**
 * Questionnaire field data access interface.
 * Fields are insert-only: a stored definition is never updated.
 */

import type { QuestionnaireField } from '../types/models.js';

export interface IQuestionnaireRepository {
  listFields(): Promise<QuestionnaireField[]>;

  /** Insert a new field. Returns false when the id is already taken. */
  insertField(field: QuestionnaireField): Promise<boolean>;
}
