/**
 * Domain model → API payload mapping. Dates become ISO strings.
 */

import type {
  AnswerResponse,
  CandidateResponse,
  CatalogResponse,
  CompatibilityResponse,
  FeedbackResponse,
  JourneyResponse,
  MeetingRequestResponse,
  QuestionnaireFieldResponse,
} from '../types/api.js';
import type {
  Feedback,
  Journey,
  MeetingRequest,
  QuestionnaireField,
  Response as StoredResponse,
} from '../types/models.js';
import type { QuestionnaireCatalog } from '../matching/catalog.js';
import type { CompatibilityScore } from '../matching/scorer.js';
import type { RankedCandidate } from '../matching/ranker.js';

export function toFieldResponse(field: QuestionnaireField): QuestionnaireFieldResponse {
  return {
    id: field.id,
    category: field.category,
    label: field.label,
    weight: field.weight,
    answerKind: field.answerKind,
    comparisonRule: field.comparisonRule,
    scale: field.scale,
    options: field.options,
    dealBreaker: field.dealBreaker,
  };
}

export function toCatalogResponse(catalog: QuestionnaireCatalog): CatalogResponse {
  return {
    version: catalog.version,
    categories: catalog.categories(),
    fields: catalog.fields.map(toFieldResponse),
  };
}

export function toAnswerResponse(response: StoredResponse): AnswerResponse {
  return {
    fieldId: response.fieldId,
    value: response.value,
    updatedAt: response.updatedAt.toISOString(),
  };
}

export function toCompatibilityResponse(
  userId: string,
  otherUserId: string,
  score: CompatibilityScore
): CompatibilityResponse {
  return {
    userId,
    otherUserId,
    overall: score.overall,
    insufficientData: score.insufficientData,
    fieldCount: score.fieldCount,
    coverage: score.coverage,
    categories: { ...score.categories },
    dealBreakers: [...score.dealBreakers],
    catalogVersion: score.catalogVersion,
  };
}

export function toCandidateResponse(ranked: RankedCandidate): CandidateResponse {
  return {
    userId: ranked.candidate.userId,
    overall: ranked.score.overall,
    insufficientData: ranked.score.insufficientData,
    fieldCount: ranked.score.fieldCount,
    categories: { ...ranked.score.categories },
  };
}

export function toMeetingResponse(meeting: MeetingRequest): MeetingRequestResponse {
  return {
    id: meeting.id,
    proposedBy: meeting.proposedBy,
    proposedTime: meeting.proposedTime.toISOString(),
    location: meeting.location,
    status: meeting.status,
    respondBy: meeting.respondBy.toISOString(),
    respondedAt: meeting.respondedAt?.toISOString() ?? null,
    completedAt: meeting.completedAt?.toISOString() ?? null,
  };
}

export function toJourneyResponse(journey: Journey): JourneyResponse {
  return {
    id: journey.id,
    participants: [...journey.participants],
    initiatorId: journey.initiatorId,
    stage: journey.stage,
    deadline: journey.deadline?.toISOString() ?? null,
    consent: journey.consent,
    stageHistory: journey.stageHistory.map((entry) => ({
      stage: entry.stage,
      actor: entry.actor,
      at: entry.at.toISOString(),
      ...(entry.note !== undefined ? { note: entry.note } : {}),
    })),
    meetings: journey.meetings.map(toMeetingResponse),
    failedMeetingAttempts: journey.failedMeetingAttempts,
    endedBy: journey.endedBy,
    endReason: journey.endReason,
    version: journey.version,
    createdAt: journey.createdAt.toISOString(),
    updatedAt: journey.updatedAt.toISOString(),
  };
}

export function toFeedbackResponse(feedback: Feedback): FeedbackResponse {
  return {
    id: feedback.id,
    journeyId: feedback.journeyId,
    meetingRequestId: feedback.meetingRequestId,
    submittedBy: feedback.submittedBy,
    subjectId: feedback.subjectId,
    rating: feedback.rating,
    comment: feedback.comment,
    wantsToContinue: feedback.wantsToContinue,
    createdAt: feedback.createdAt.toISOString(),
  };
}
