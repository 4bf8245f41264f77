/**
 * API types — shapes for request/response payloads.
 * Decoupled from domain models so the API can evolve independently.
 */

import type {
  AnswerKind,
  AnswerValue,
  CompatibilityTable,
  ComparisonRule,
  JourneyStage,
  MeetingStatus,
} from './models.js';

// ── Requests ──

export interface DefineFieldRequest {
  id: string;
  category: string;
  label: string;
  weight: number;
  answerKind: AnswerKind;
  comparisonRule: ComparisonRule;
  scale?: { min: number; max: number };
  options?: string[];
  compatibility?: CompatibilityTable;
  dealBreaker?: boolean;
}

export interface AnswerRequest {
  fieldId: string;
  value: AnswerValue;
}

export interface CreateJourneyRequest {
  partnerId: string;
}

export type JourneyDecision = 'accept' | 'decline';

export interface RespondRequest {
  decision: JourneyDecision;
  reason?: string;
}

export interface ProposeMeetingRequest {
  proposedTime: string;
  location: string;
}

export interface SubmitFeedbackRequest {
  rating: number;
  comment?: string;
  wantsToContinue?: boolean;
}

// ── Responses ──

export interface QuestionnaireFieldResponse {
  id: string;
  category: string;
  label: string;
  weight: number;
  answerKind: AnswerKind;
  comparisonRule: ComparisonRule;
  scale: { min: number; max: number } | null;
  options: string[] | null;
  dealBreaker: boolean;
}

export interface CatalogResponse {
  version: string;
  categories: string[];
  fields: QuestionnaireFieldResponse[];
}

export interface AnswerResponse {
  fieldId: string;
  value: AnswerValue;
  updatedAt: string;
}

export interface CategoryScoreResponse {
  score: number;
  fieldCount: number;
  weight: number;
}

export interface CompatibilityResponse {
  userId: string;
  otherUserId: string;
  overall: number;
  insufficientData: boolean;
  fieldCount: number;
  coverage: number;
  categories: Record<string, CategoryScoreResponse>;
  dealBreakers: string[];
  catalogVersion: string;
}

export interface CandidateResponse {
  userId: string;
  overall: number;
  insufficientData: boolean;
  fieldCount: number;
  categories: Record<string, CategoryScoreResponse>;
}

export interface StageHistoryResponse {
  stage: JourneyStage;
  actor: string | null;
  at: string;
  note?: string;
}

export interface MeetingRequestResponse {
  id: string;
  proposedBy: string;
  proposedTime: string;
  location: string;
  status: MeetingStatus;
  respondBy: string;
  respondedAt: string | null;
  completedAt: string | null;
}

export interface JourneyResponse {
  id: string;
  participants: [string, string];
  initiatorId: string;
  stage: JourneyStage;
  deadline: string | null;
  consent: Partial<Record<JourneyStage, string[]>>;
  stageHistory: StageHistoryResponse[];
  meetings: MeetingRequestResponse[];
  failedMeetingAttempts: number;
  endedBy: string | null;
  endReason: string | null;
  version: number;
  createdAt: string;
  updatedAt: string;
}

export type MutationOutcome = 'applied' | 'already_applied';

export interface JourneyMutationResponse {
  outcome: MutationOutcome;
  journey: JourneyResponse;
}

export interface FeedbackResponse {
  id: string;
  journeyId: string;
  meetingRequestId: string;
  submittedBy: string;
  subjectId: string;
  rating: number;
  comment: string | null;
  wantsToContinue: boolean | null;
  createdAt: string;
}

export interface FeedbackSummary {
  userId: string;
  count: number;
  averageRating: number | null;
  wantsToContinueRate: number | null;
}

// ── Errors ──

export type ErrorCode =
  | 'INVALID_REQUEST'
  | 'UNAUTHORIZED'
  | 'FORBIDDEN'
  | 'NOT_FOUND'
  | 'CONFLICT'
  | 'STATE_CONFLICT'
  | 'ALREADY_EXISTS'
  | 'NOT_ELIGIBLE'
  | 'DUPLICATE_FEEDBACK'
  | 'INVALID_MEETING_STATE'
  | 'RATE_LIMITED'
  | 'PAYLOAD_TOO_LARGE'
  | 'INTERNAL_ERROR';

export interface ApiErrorResponse {
  error: {
    code: ErrorCode;
    message: string;
    details?: Record<string, unknown>;
  };
}
