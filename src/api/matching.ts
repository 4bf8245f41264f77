/**
 * Matching endpoints.
 * GET /api/v1/compatibility/:userId  — Score the caller against another user
 * GET /api/v1/candidates             — Ranked candidates for the caller
 *   ?minScore=0.5&limit=20&excludeInsufficientData=true&excludeDealBreakers=true
 */

import { pipeline, requireUser } from '../middleware/index.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import type { RankFilter } from '../matching/ranker.js';
import { json, queryFlag, queryInteger, queryNumber, segmentAt } from './http.js';
import { toCandidateResponse, toCompatibilityResponse } from './serializers.js';

const DEFAULT_CANDIDATE_LIMIT = 20;

export function createMatchingHandlers(container: Container) {
  const compatibility: Handler = pipeline(
    container.logging,
    container.errorHandler,
    container.authenticate
  )(async (req, ctx) => {
    const userId = requireUser(ctx);
    // Pattern: /api/v1/compatibility/:userId
    const otherUserId = segmentAt(req, 1);

    const score = await container.compatibilityService.score(userId, otherUserId);
    return json(toCompatibilityResponse(userId, otherUserId, score));
  });

  const candidates: Handler = pipeline(
    container.logging,
    container.errorHandler,
    container.authenticate,
    container.rateLimit.rank
  )(async (req, ctx) => {
    const userId = requireUser(ctx);
    const url = new URL(req.url);

    const filter: RankFilter = {
      limit: queryInteger(url, 'limit') ?? DEFAULT_CANDIDATE_LIMIT,
      excludeInsufficientData: queryFlag(url, 'excludeInsufficientData'),
      excludeDealBreakers: queryFlag(url, 'excludeDealBreakers'),
    };
    const minScore = queryNumber(url, 'minScore');
    if (minScore !== undefined) filter.minScore = minScore;

    const ranked = await container.candidateService.rank(userId, filter);
    return json({ candidates: ranked.toArray().map(toCandidateResponse) });
  });

  return { compatibility, candidates };
}
