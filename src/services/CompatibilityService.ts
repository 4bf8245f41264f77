/**
 * Compatibility service.
 * Loads responses and scores pairs against the current catalog, memoising
 * results in the score cache. Responses are always read fresh; the cache
 * only saves the scoring work and never changes a result.
 */

import type { IResponseRepository } from '../repositories/IResponseRepository.js';
import type { IScoreCache, ScoredUser } from '../stores/ScoreCache.js';
import type { AnswerValue } from '../types/models.js';
import type { QuestionnaireCatalog } from '../matching/catalog.js';
import type { QuestionnaireService } from './QuestionnaireService.js';
import { scoreResponses, type CompatibilityScore, type ResponseMap } from '../matching/scorer.js';
import { ValidationError } from '../errors.js';

const NO_RESPONSES: ResponseMap = new Map();
const NO_GENERATION = '0';

export interface LoadedResponses {
  /** Answers per user, keyed by field id. Users without answers are absent. */
  answers: Map<string, ResponseMap>;
  /** Latest write time and row count per user. */
  generations: Map<string, string>;
  /** Score cache epoch read before the load. */
  epoch: number;
}

export class CompatibilityService {
  constructor(
    private readonly questionnaireService: QuestionnaireService,
    private readonly responseRepo: IResponseRepository,
    private readonly scoreCache: IScoreCache
  ) {}

  async score(userA: string, userB: string): Promise<CompatibilityScore> {
    if (userA === userB) {
      throw new ValidationError('Cannot score a user against themselves');
    }

    const catalog = await this.questionnaireService.getCatalog();
    const responses = await this.loadResponses([userA, userB]);
    return this.scorePair(catalog, userA, userB, responses);
  }

  async loadResponses(userIds: string[]): Promise<LoadedResponses> {
    const epoch = this.scoreCache.epoch;
    const rows = await this.responseRepo.findByUsers([...new Set(userIds)]);

    const answers = new Map<string, Map<string, AnswerValue>>();
    const latest = new Map<string, { at: number; count: number }>();

    for (const row of rows) {
      let own = answers.get(row.userId);
      if (!own) {
        own = new Map();
        answers.set(row.userId, own);
      }
      own.set(row.fieldId, row.value);

      const seen = latest.get(row.userId) ?? { at: 0, count: 0 };
      latest.set(row.userId, {
        at: Math.max(seen.at, row.updatedAt.getTime()),
        count: seen.count + 1,
      });
    }

    const generations = new Map<string, string>();
    for (const [userId, { at, count }] of latest) {
      generations.set(userId, `${at}.${count}`);
    }
    return { answers, generations, epoch };
  }

  /** Score with already-loaded responses, through the cache. */
  scorePair(
    catalog: QuestionnaireCatalog,
    userA: string,
    userB: string,
    responses: LoadedResponses
  ): CompatibilityScore {
    const a = scoredUser(userA, responses);
    const b = scoredUser(userB, responses);
    const cached = this.scoreCache.get(catalog.version, a, b);
    if (cached) return cached;

    // Fixed argument order keeps the result identical for (A, B) and (B, A).
    const [left, right] = userA < userB ? [userA, userB] : [userB, userA];
    const score = scoreResponses(
      catalog,
      responses.answers.get(left) ?? NO_RESPONSES,
      responses.answers.get(right) ?? NO_RESPONSES
    );
    this.scoreCache.set(catalog.version, a, b, score, responses.epoch);
    return score;
  }
}

function scoredUser(userId: string, responses: LoadedResponses): ScoredUser {
  return { userId, generation: responses.generations.get(userId) ?? NO_GENERATION };
}
