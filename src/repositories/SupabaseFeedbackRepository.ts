/**
 * Supabase implementation of IFeedbackRepository.
 * One feedback per (meeting_request_id, submitted_by), enforced by a unique index.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type { CreateFeedbackInput, IFeedbackRepository } from './IFeedbackRepository.js';
import type { Feedback } from '../types/models.js';
import type { FeedbackRow } from '../types/database.js';
import { fromFeedbackRow } from './mappers.js';

const UNIQUE_VIOLATION = '23505';

export class SupabaseFeedbackRepository implements IFeedbackRepository {
  constructor(private readonly db: SupabaseClient) {}

  async insertIfAbsent(input: CreateFeedbackInput): Promise<Feedback | null> {
    const { data, error } = await this.db
      .from('feedback')
      .insert({
        journey_id: input.journeyId,
        meeting_request_id: input.meetingRequestId,
        submitted_by: input.submittedBy,
        subject_id: input.subjectId,
        rating: input.rating,
        comment: input.comment,
        wants_to_continue: input.wantsToContinue,
      })
      .select()
      .single();

    if (error?.code === UNIQUE_VIOLATION) return null;
    if (error) throw new Error(`Failed to save feedback: ${error.message}`);
    return fromFeedbackRow(data as FeedbackRow);
  }

  async findByMeeting(meetingRequestId: string): Promise<Feedback[]> {
    const { data, error } = await this.db
      .from('feedback')
      .select('*')
      .eq('meeting_request_id', meetingRequestId)
      .order('created_at', { ascending: true });

    if (error) throw new Error(`Failed to fetch feedback: ${error.message}`);
    return ((data ?? []) as FeedbackRow[]).map(fromFeedbackRow);
  }

  async findBySubject(userId: string): Promise<Feedback[]> {
    const { data, error } = await this.db
      .from('feedback')
      .select('*')
      .eq('subject_id', userId)
      .order('created_at', { ascending: false });

    if (error) throw new Error(`Failed to fetch feedback: ${error.message}`);
    return ((data ?? []) as FeedbackRow[]).map(fromFeedbackRow);
  }

  async findBySubmitter(userId: string): Promise<Feedback[]> {
    const { data, error } = await this.db
      .from('feedback')
      .select('*')
      .eq('submitted_by', userId)
      .order('created_at', { ascending: false });

    if (error) throw new Error(`Failed to fetch feedback: ${error.message}`);
    return ((data ?? []) as FeedbackRow[]).map(fromFeedbackRow);
  }
}
