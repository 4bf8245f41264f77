/**
 * Candidate service.
 * Gathers the user's profile, the candidate pool, their journeys and all
 * responses, then hands them to the ranker. Scoring itself stays lazy.
 */

import type { IProfileProvider } from '../providers/IProfileProvider.js';
import type { IJourneyRepository } from '../repositories/IJourneyRepository.js';
import type { CompatibilityService } from './CompatibilityService.js';
import type { QuestionnaireService } from './QuestionnaireService.js';
import { rankCandidates, type RankFilter, type RankedCandidates } from '../matching/ranker.js';
import { loadEligibilityContext } from './eligibility-context.js';
import { NotFoundError, ValidationError } from '../errors.js';

export interface CandidateServiceOptions {
  declineCooldownDays: number;
}

export class CandidateService {
  constructor(
    private readonly profileProvider: IProfileProvider,
    private readonly journeyRepo: IJourneyRepository,
    private readonly questionnaireService: QuestionnaireService,
    private readonly compatibilityService: CompatibilityService,
    private readonly options: CandidateServiceOptions
  ) {}

  async rank(userId: string, filter: RankFilter = {}): Promise<RankedCandidates> {
    validateFilter(filter);

    const user = await this.profileProvider.getProfile(userId);
    if (!user) {
      throw new NotFoundError(`Profile "${userId}" not found`);
    }

    const now = new Date();
    const [pool, context, catalog] = await Promise.all([
      this.profileProvider.listCandidatePool(userId),
      loadEligibilityContext(this.journeyRepo, userId, now, this.options.declineCooldownDays),
      this.questionnaireService.getCatalog(),
    ]);
    const responses = await this.compatibilityService.loadResponses([
      userId,
      ...pool.map((p) => p.userId),
    ]);

    return rankCandidates({
      user,
      pool,
      context,
      filter,
      scoreCandidate: (candidate) =>
        this.compatibilityService.scorePair(catalog, userId, candidate.userId, responses),
    });
  }
}

function validateFilter(filter: RankFilter): void {
  if (filter.minScore !== undefined && !(filter.minScore >= 0 && filter.minScore <= 1)) {
    throw new ValidationError('minScore must be between 0 and 1');
  }
  if (filter.limit !== undefined && !(Number.isInteger(filter.limit) && filter.limit >= 1)) {
    throw new ValidationError('limit must be a positive integer');
  }
}
