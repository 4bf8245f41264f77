/**
 * Journey endpoints (all auth required).
 * POST /api/v1/journeys                                  — Propose a journey
 * GET  /api/v1/journeys                                  — List own journeys (?active=true&limit&offset)
 * GET  /api/v1/journeys/:id                              — One journey
 * POST /api/v1/journeys/:id/respond                      — Accept or decline a proposal
 * POST /api/v1/journeys/:id/end                          — Leave the journey
 * POST /api/v1/journeys/:id/meetings                     — Propose a meeting
 * POST /api/v1/journeys/:id/meetings/:mid/respond        — Accept or decline a meeting
 * POST /api/v1/journeys/:id/meetings/:mid/complete       — Mark a meeting as held
 *
 * Mutations answer `{ outcome, journey }`; a repeated action is `already_applied`.
 */

import { pipeline, requireUser } from '../middleware/index.js';
import { validateBody } from '../middleware/validate-body.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import type { JourneyMutation } from '../services/JourneyService.js';
import type { BodySchema } from '../types/common.js';
import type { JourneyDecision, JourneyMutationResponse } from '../types/api.js';
import { ValidationError } from '../errors.js';
import { json, optionalString, queryFlag, queryInteger, readBody, segmentAt, stringField } from './http.js';
import { toJourneyResponse } from './serializers.js';

const DECISIONS = ['accept', 'decline'] as const;

const createSchema: BodySchema = {
  partnerId: { type: 'string', required: true, maxLength: 100 },
};

const respondSchema: BodySchema = {
  decision: { type: 'string', required: true, enum: DECISIONS },
  reason: { type: 'string', maxLength: 500 },
};

const endSchema: BodySchema = {
  reason: { type: 'string', maxLength: 500 },
};

const proposeMeetingSchema: BodySchema = {
  proposedTime: { type: 'string', required: true, maxLength: 40 },
  location: { type: 'string', required: true, maxLength: 200 },
};

const meetingAnswerSchema: BodySchema = {
  decision: { type: 'string', required: true, enum: DECISIONS },
};

export function createJourneyHandlers(container: Container) {
  const journeys = container.journeyService;

  const create: Handler = pipeline(
    container.bodyLimit,
    container.logging,
    container.errorHandler,
    container.authenticate,
    container.rateLimit.createJourney,
    validateBody(createSchema)
  )(async (req, ctx) => {
    const userId = requireUser(ctx);
    const body = await readBody(req);

    const journey = await journeys.createJourney(userId, stringField(body, 'partnerId'));
    return json(toJourneyResponse(journey), 201);
  });

  const list: Handler = pipeline(
    container.logging,
    container.errorHandler,
    container.authenticate
  )(async (req, ctx) => {
    const userId = requireUser(ctx);
    const url = new URL(req.url);

    const result = await journeys.listJourneys(userId, {
      activeOnly: queryFlag(url, 'active'),
      limit: queryInteger(url, 'limit'),
      offset: queryInteger(url, 'offset'),
    });
    return json({ journeys: result.map(toJourneyResponse) });
  });

  const getById: Handler = pipeline(
    container.logging,
    container.errorHandler,
    container.authenticate
  )(async (req, ctx) => {
    const journey = await journeys.getJourney(segmentAt(req, 1), requireUser(ctx));
    return json(toJourneyResponse(journey));
  });

  const respond: Handler = pipeline(
    container.bodyLimit,
    container.logging,
    container.errorHandler,
    container.authenticate,
    container.rateLimit.journeyAction,
    validateBody(respondSchema)
  )(async (req, ctx) => {
    const body = await readBody(req);
    const result = await journeys.respond(
      segmentAt(req, 1),
      requireUser(ctx),
      toDecision(stringField(body, 'decision')),
      optionalString(body, 'reason')
    );
    return mutationResponse(result);
  });

  const end: Handler = pipeline(
    container.bodyLimit,
    container.logging,
    container.errorHandler,
    container.authenticate,
    container.rateLimit.journeyAction,
    validateBody(endSchema)
  )(async (req, ctx) => {
    const body = await readBody(req);
    const result = await journeys.endJourney(
      segmentAt(req, 1),
      requireUser(ctx),
      optionalString(body, 'reason')
    );
    return mutationResponse(result);
  });

  const proposeMeeting: Handler = pipeline(
    container.bodyLimit,
    container.logging,
    container.errorHandler,
    container.authenticate,
    container.rateLimit.proposeMeeting,
    validateBody(proposeMeetingSchema)
  )(async (req, ctx) => {
    const body = await readBody(req);
    const proposedTime = new Date(stringField(body, 'proposedTime'));
    if (Number.isNaN(proposedTime.getTime())) {
      throw new ValidationError('proposedTime must be an ISO-8601 date-time');
    }

    const result = await journeys.proposeMeeting(
      segmentAt(req, 1),
      requireUser(ctx),
      proposedTime,
      stringField(body, 'location')
    );
    return mutationResponse(result);
  });

  const respondToMeeting: Handler = pipeline(
    container.bodyLimit,
    container.logging,
    container.errorHandler,
    container.authenticate,
    container.rateLimit.journeyAction,
    validateBody(meetingAnswerSchema)
  )(async (req, ctx) => {
    const body = await readBody(req);
    // Pattern: /api/v1/journeys/:id/meetings/:mid/respond
    const result = await journeys.respondToMeeting(
      segmentAt(req, 1),
      segmentAt(req, 3),
      requireUser(ctx),
      toDecision(stringField(body, 'decision')) === 'accept'
    );
    return mutationResponse(result);
  });

  const completeMeeting: Handler = pipeline(
    container.logging,
    container.errorHandler,
    container.authenticate,
    container.rateLimit.journeyAction
  )(async (req, ctx) => {
    const result = await journeys.completeMeeting(
      segmentAt(req, 1),
      segmentAt(req, 3),
      requireUser(ctx)
    );
    return mutationResponse(result);
  });

  return { create, list, getById, respond, end, proposeMeeting, respondToMeeting, completeMeeting };
}

function toDecision(value: string): JourneyDecision {
  const decision = DECISIONS.find((d) => d === value);
  if (!decision) throw new ValidationError(`decision must be one of: ${DECISIONS.join(', ')}`);
  return decision;
}

function mutationResponse(result: JourneyMutation): Response {
  const body: JourneyMutationResponse = {
    outcome: result.outcome,
    journey: toJourneyResponse(result.journey),
  };
  return json(body);
}
