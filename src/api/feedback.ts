/**
 * Feedback endpoints (auth required).
 * POST /api/v1/journeys/:id/meetings/:mid/feedback  — Rate a completed meeting
 * GET  /api/v1/journeys/:id/meetings/:mid/feedback  — Feedback on one meeting
 * GET  /api/v1/feedback                             — Summary and list (?scope=received|given)
 */

import { pipeline, requireUser } from '../middleware/index.js';
import { validateBody } from '../middleware/validate-body.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import type { BodySchema } from '../types/common.js';
import { MAX_COMMENT_LENGTH, MAX_RATING, MIN_RATING } from '../services/FeedbackService.js';
import { ValidationError } from '../errors.js';
import {
  json,
  numberField,
  optionalBoolean,
  optionalString,
  readBody,
  segmentAt,
} from './http.js';
import { toFeedbackResponse, toJourneyResponse } from './serializers.js';

const submitSchema: BodySchema = {
  rating: { type: 'number', required: true, integer: true, min: MIN_RATING, max: MAX_RATING },
  comment: { type: 'string', maxLength: MAX_COMMENT_LENGTH },
  wantsToContinue: { type: 'boolean' },
};

export function createFeedbackHandlers(container: Container) {
  const submit: Handler = pipeline(
    container.bodyLimit,
    container.logging,
    container.errorHandler,
    container.authenticate,
    container.rateLimit.feedback,
    validateBody(submitSchema)
  )(async (req, ctx) => {
    const body = await readBody(req);
    const wantsToContinue = optionalBoolean(body, 'wantsToContinue');
    const comment = optionalString(body, 'comment');

    // Pattern: /api/v1/journeys/:id/meetings/:mid/feedback
    const result = await container.feedbackService.submit(
      segmentAt(req, 1),
      segmentAt(req, 3),
      requireUser(ctx),
      {
        rating: numberField(body, 'rating'),
        ...(comment !== undefined ? { comment } : {}),
        ...(wantsToContinue !== undefined ? { wantsToContinue } : {}),
      }
    );

    return json(
      {
        feedback: toFeedbackResponse(result.feedback),
        journey: toJourneyResponse(result.journey),
      },
      201
    );
  });

  const forMeeting: Handler = pipeline(
    container.logging,
    container.errorHandler,
    container.authenticate
  )(async (req, ctx) => {
    const feedback = await container.feedbackService.listForMeeting(
      segmentAt(req, 1),
      segmentAt(req, 3),
      requireUser(ctx)
    );
    return json({ feedback: feedback.map(toFeedbackResponse) });
  });

  const mine: Handler = pipeline(
    container.logging,
    container.errorHandler,
    container.authenticate
  )(async (req, ctx) => {
    const userId = requireUser(ctx);
    const scope = new URL(req.url).searchParams.get('scope') ?? 'received';
    if (scope !== 'received' && scope !== 'given') {
      throw new ValidationError('scope must be one of: received, given');
    }

    const [summary, feedback] = await Promise.all([
      container.feedbackService.summarize(userId),
      scope === 'received'
        ? container.feedbackService.listReceived(userId)
        : container.feedbackService.listGiven(userId),
    ]);
    return json({ summary, feedback: feedback.map(toFeedbackResponse) });
  });

  return { submit, forMeeting, mine };
}
