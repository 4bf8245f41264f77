/**
 * Feedback service.
 * Stores post-meeting feedback and reports on it. Storing feedback also
 * records it on the journey, which moves on once both participants have
 * submitted. Feedback never feeds back into scoring.
 */

import type { IFeedbackRepository } from '../repositories/IFeedbackRepository.js';
import type { IJourneyRepository } from '../repositories/IJourneyRepository.js';
import type { SubmitFeedbackRequest, FeedbackSummary } from '../types/api.js';
import type { Feedback, Journey } from '../types/models.js';
import type { JourneyService } from './JourneyService.js';
import { isParticipant, otherParticipant } from '../journey/transitions.js';
import {
  DuplicateFeedbackError,
  ForbiddenError,
  InvalidMeetingStateError,
  NotFoundError,
  ValidationError,
} from '../errors.js';

export const MIN_RATING = 1;
export const MAX_RATING = 5;
export const MAX_COMMENT_LENGTH = 2000;

export interface FeedbackSubmission {
  feedback: Feedback;
  journey: Journey;
}

export class FeedbackService {
  constructor(
    private readonly feedbackRepo: IFeedbackRepository,
    private readonly journeyRepo: IJourneyRepository,
    private readonly journeyService: JourneyService
  ) {}

  async submit(
    journeyId: string,
    meetingRequestId: string,
    submitterId: string,
    input: SubmitFeedbackRequest
  ): Promise<FeedbackSubmission> {
    if (!Number.isInteger(input.rating) || input.rating < MIN_RATING || input.rating > MAX_RATING) {
      throw new ValidationError(`rating must be an integer between ${MIN_RATING} and ${MAX_RATING}`);
    }
    const comment = input.comment?.trim() || null;
    if (comment && comment.length > MAX_COMMENT_LENGTH) {
      throw new ValidationError(`comment must be ${MAX_COMMENT_LENGTH} characters or less`);
    }

    const journey = await this.journeyRepo.findById(journeyId);
    if (!journey) throw new NotFoundError(`Journey "${journeyId}" not found`);
    if (!isParticipant(journey, submitterId)) {
      throw new ForbiddenError('Only participants can give feedback on a meeting');
    }

    const meeting = journey.meetings.find((m) => m.id === meetingRequestId);
    if (!meeting) throw new NotFoundError(`Meeting request "${meetingRequestId}" not found`);
    if (meeting.status !== 'completed') {
      throw new InvalidMeetingStateError(
        `Feedback needs a completed meeting (status: ${meeting.status})`,
        meeting.status
      );
    }

    const feedback = await this.feedbackRepo.insertIfAbsent({
      journeyId,
      meetingRequestId,
      submittedBy: submitterId,
      subjectId: otherParticipant(journey, submitterId),
      rating: input.rating,
      comment,
      wantsToContinue: input.wantsToContinue ?? null,
    });

    // Recording is idempotent, so a duplicate still repairs a journey that
    // missed the first record.
    const recorded = await this.journeyService.recordFeedback(journeyId, meetingRequestId, submitterId);
    if (!feedback) throw new DuplicateFeedbackError(meetingRequestId);

    return { feedback, journey: recorded.journey };
  }

  async listReceived(userId: string): Promise<Feedback[]> {
    return this.feedbackRepo.findBySubject(userId);
  }

  async listGiven(userId: string): Promise<Feedback[]> {
    return this.feedbackRepo.findBySubmitter(userId);
  }

  /** Feedback for one meeting, visible to its participants only. */
  async listForMeeting(
    journeyId: string,
    meetingRequestId: string,
    userId: string
  ): Promise<Feedback[]> {
    const journey = await this.journeyRepo.findById(journeyId);
    if (!journey || !isParticipant(journey, userId)) {
      throw new NotFoundError(`Journey "${journeyId}" not found`);
    }
    if (!journey.meetings.some((m) => m.id === meetingRequestId)) {
      throw new NotFoundError(`Meeting request "${meetingRequestId}" not found`);
    }
    return this.feedbackRepo.findByMeeting(meetingRequestId);
  }

  async summarize(userId: string): Promise<FeedbackSummary> {
    return summarizeFeedback(userId, await this.feedbackRepo.findBySubject(userId));
  }
}

/** Aggregate of feedback about one user. Rates are rounded to 4 places. */
export function summarizeFeedback(userId: string, received: readonly Feedback[]): FeedbackSummary {
  if (received.length === 0) {
    return { userId, count: 0, averageRating: null, wantsToContinueRate: null };
  }

  const ratingTotal = received.reduce((sum, f) => sum + f.rating, 0);
  const answered = received.filter((f) => f.wantsToContinue !== null);
  const continuing = answered.filter((f) => f.wantsToContinue === true).length;

  return {
    userId,
    count: received.length,
    averageRating: round4(ratingTotal / received.length),
    wantsToContinueRate: answered.length === 0 ? null : round4(continuing / answered.length),
  };
}

function round4(value: number): number {
  return Math.round(value * 10_000) / 10_000;
}
