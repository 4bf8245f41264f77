/**
 * Feedback data access interface.
 */

import type { Feedback } from '../types/models.js';

export type CreateFeedbackInput = Omit<Feedback, 'id' | 'createdAt'>;

export interface IFeedbackRepository {
  /** Insert unless the submitter already has feedback for the meeting; null in that case. */
  insertIfAbsent(input: CreateFeedbackInput): Promise<Feedback | null>;

  findByMeeting(meetingRequestId: string): Promise<Feedback[]>;

  /** Feedback written about the user, newest first. */
  findBySubject(userId: string): Promise<Feedback[]>;

  /** Feedback the user wrote, newest first. */
  findBySubmitter(userId: string): Promise<Feedback[]>;
}
