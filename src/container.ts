/**
 * Dependency wiring.
 * Constructs all services with their dependencies. Production passes
 * Supabase-backed repositories; tests pass the in-memory mocks.
 */

import type { AppConfig } from './config.js';
import type { IQuestionnaireRepository } from './repositories/IQuestionnaireRepository.js';
import type { IResponseRepository } from './repositories/IResponseRepository.js';
import type { IJourneyRepository } from './repositories/IJourneyRepository.js';
import type { IFeedbackRepository } from './repositories/IFeedbackRepository.js';
import type { IProfileProvider } from './providers/IProfileProvider.js';
import type { IIdentityProvider } from './providers/IIdentityProvider.js';
import type { INotificationProvider } from './providers/INotificationProvider.js';
import type { ILogProvider } from './providers/ILogProvider.js';
import type { IRateLimitStore } from './stores/IRateLimitStore.js';
import type { Middleware } from './middleware/pipeline.js';
import { LruScoreCache, type IScoreCache } from './stores/ScoreCache.js';
import { QuestionnaireService } from './services/QuestionnaireService.js';
import { CompatibilityService } from './services/CompatibilityService.js';
import { CandidateService } from './services/CandidateService.js';
import { JourneyService } from './services/JourneyService.js';
import { FeedbackService } from './services/FeedbackService.js';
import { ExpirySweepService } from './services/ExpirySweepService.js';
import { createAuthMiddleware } from './middleware/authenticate.js';
import { createRateLimitMiddleware, RATE_LIMITS } from './middleware/rate-limit.js';
import { createLoggingMiddleware } from './middleware/logging.js';
import { createErrorHandler } from './middleware/error-handler.js';
import { bodyLimit } from './middleware/body-limit.js';

export interface Container {
  config: AppConfig;
  questionnaireService: QuestionnaireService;
  compatibilityService: CompatibilityService;
  candidateService: CandidateService;
  journeyService: JourneyService;
  feedbackService: FeedbackService;
  sweepService: ExpirySweepService;
  logProvider: ILogProvider;
  authenticate: Middleware;
  bodyLimit: Middleware;
  logging: Middleware;
  errorHandler: Middleware;
  rateLimit: {
    createJourney: Middleware;
    journeyAction: Middleware;
    proposeMeeting: Middleware;
    writeAnswers: Middleware;
    feedback: Middleware;
    rank: Middleware;
  };
}

export interface ContainerDeps {
  config: AppConfig;
  questionnaireRepo: IQuestionnaireRepository;
  responseRepo: IResponseRepository;
  journeyRepo: IJourneyRepository;
  feedbackRepo: IFeedbackRepository;
  profileProvider: IProfileProvider;
  identityProvider: IIdentityProvider;
  notificationProvider: INotificationProvider;
  logProvider: ILogProvider;
  rateLimitStore: IRateLimitStore;
  scoreCache?: IScoreCache;
}

export function createContainer(deps: ContainerDeps): Container {
  const { config } = deps;
  const scoreCache = deps.scoreCache ?? new LruScoreCache();

  const questionnaireService = new QuestionnaireService(
    deps.questionnaireRepo,
    deps.responseRepo,
    scoreCache,
    deps.logProvider,
    {
      choiceSimilarity: config.choiceSimilarity,
      catalogRefreshSeconds: config.catalogRefreshSeconds,
    }
  );
  const compatibilityService = new CompatibilityService(
    questionnaireService,
    deps.responseRepo,
    scoreCache
  );
  const candidateService = new CandidateService(
    deps.profileProvider,
    deps.journeyRepo,
    questionnaireService,
    compatibilityService,
    { declineCooldownDays: config.declineCooldownDays }
  );
  const journeyService = new JourneyService(
    deps.journeyRepo,
    deps.profileProvider,
    deps.notificationProvider,
    deps.logProvider,
    { policy: config.journey, declineCooldownDays: config.declineCooldownDays }
  );
  const feedbackService = new FeedbackService(deps.feedbackRepo, deps.journeyRepo, journeyService);
  const sweepService = new ExpirySweepService(
    deps.journeyRepo,
    journeyService,
    deps.logProvider,
    config.sweepBatchSize
  );

  const limit = (settings: (typeof RATE_LIMITS)[keyof typeof RATE_LIMITS]) =>
    createRateLimitMiddleware(deps.rateLimitStore, settings);

  return {
    config,
    questionnaireService,
    compatibilityService,
    candidateService,
    journeyService,
    feedbackService,
    sweepService,
    logProvider: deps.logProvider,
    authenticate: createAuthMiddleware(deps.identityProvider),
    bodyLimit: bodyLimit(64 * 1024), // 64KB max request body
    logging: createLoggingMiddleware(deps.logProvider),
    errorHandler: createErrorHandler(deps.logProvider),
    rateLimit: {
      createJourney: limit(RATE_LIMITS.createJourney),
      journeyAction: limit(RATE_LIMITS.journeyAction),
      proposeMeeting: limit(RATE_LIMITS.proposeMeeting),
      writeAnswers: limit(RATE_LIMITS.writeAnswers),
      feedback: limit(RATE_LIMITS.feedback),
      rank: limit(RATE_LIMITS.rank),
    },
  };
}
