/**
 * Questionnaire response data access interface.
 */

import type { AnswerValue, Response } from '../types/models.js';

export interface ResponseInput {
  fieldId: string;
  value: AnswerValue;
}

export interface IResponseRepository {
  /** Write all answers for a user in one statement, replacing earlier values. */
  upsertMany(userId: string, answers: ResponseInput[], at: Date): Promise<Response[]>;

  findByUser(userId: string): Promise<Response[]>;

  findByUsers(userIds: string[]): Promise<Response[]>;
}
