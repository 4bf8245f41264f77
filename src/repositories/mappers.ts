/**
 * Row ↔ model conversion for the Supabase repositories.
 * Rows come back untyped from the client; unknown enum values are a data
 * error and throw.
 */

import type {
  FeedbackRow,
  JourneyRow,
  MeetingRequestJson,
  QuestionnaireFieldRow,
  ResponseRow,
  StageHistoryJson,
} from '../types/database.js';
import type {
  ConsentLedger,
  Feedback,
  Journey,
  JourneyStage,
  MeetingRequest,
  MeetingStatus,
  QuestionnaireField,
  Response,
} from '../types/models.js';
import { ANSWER_KINDS, COMPARISON_RULES } from '../matching/catalog.js';
import { isJourneyStage, isTerminal } from '../journey/stages.js';
import { pairKey } from '../journey/transitions.js';

const MEETING_STATUSES: readonly MeetingStatus[] = [
  'pending',
  'accepted',
  'declined',
  'completed',
  'expired',
];

// ── Questionnaire ──

export function toFieldRow(field: QuestionnaireField): QuestionnaireFieldRow {
  return {
    id: field.id,
    category: field.category,
    label: field.label,
    weight: field.weight,
    answer_kind: field.answerKind,
    comparison_rule: field.comparisonRule,
    scale_min: field.scale?.min ?? null,
    scale_max: field.scale?.max ?? null,
    options: field.options,
    compatibility: field.compatibility,
    deal_breaker: field.dealBreaker,
    created_at: field.createdAt.toISOString(),
  };
}

export function fromFieldRow(row: QuestionnaireFieldRow): QuestionnaireField {
  return {
    id: row.id,
    category: row.category,
    label: row.label,
    weight: Number(row.weight),
    answerKind: oneOf(row.answer_kind, ANSWER_KINDS, 'answer_kind'),
    comparisonRule: oneOf(row.comparison_rule, COMPARISON_RULES, 'comparison_rule'),
    scale:
      row.scale_min !== null && row.scale_max !== null
        ? { min: Number(row.scale_min), max: Number(row.scale_max) }
        : null,
    options: row.options,
    compatibility: row.compatibility,
    dealBreaker: row.deal_breaker,
    createdAt: new Date(row.created_at),
  };
}

export function fromResponseRow(row: ResponseRow): Response {
  return {
    userId: row.user_id,
    fieldId: row.field_id,
    value: row.value,
    updatedAt: new Date(row.updated_at),
  };
}

// ── Journeys ──

export function toJourneyRow(journey: Journey): JourneyRow {
  const [a, b] = journey.participants;
  return {
    id: journey.id,
    participant_a: a,
    participant_b: b,
    pair_key: pairKey(a, b),
    initiator_id: journey.initiatorId,
    stage: journey.stage,
    is_terminal: isTerminal(journey.stage),
    stage_history: journey.stageHistory.map(
      (entry): StageHistoryJson => ({
        stage: entry.stage,
        actor: entry.actor,
        at: entry.at.toISOString(),
        ...(entry.note !== undefined ? { note: entry.note } : {}),
      })
    ),
    consent: toConsentJson(journey.consent),
    deadline: journey.deadline?.toISOString() ?? null,
    meetings: journey.meetings.map(toMeetingJson),
    failed_meeting_attempts: journey.failedMeetingAttempts,
    ended_by: journey.endedBy,
    end_reason: journey.endReason,
    version: journey.version,
    created_at: journey.createdAt.toISOString(),
    updated_at: journey.updatedAt.toISOString(),
  };
}

export function fromJourneyRow(row: JourneyRow): Journey {
  return {
    id: row.id,
    participants: [row.participant_a, row.participant_b],
    initiatorId: row.initiator_id,
    stage: toStage(row.stage),
    stageHistory: row.stage_history.map((entry) => ({
      stage: toStage(entry.stage),
      actor: entry.actor,
      at: new Date(entry.at),
      ...(entry.note !== undefined ? { note: entry.note } : {}),
    })),
    consent: fromConsentJson(row.consent),
    deadline: row.deadline ? new Date(row.deadline) : null,
    meetings: row.meetings.map(fromMeetingJson),
    failedMeetingAttempts: row.failed_meeting_attempts,
    endedBy: row.ended_by,
    endReason: row.end_reason,
    version: row.version,
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
  };
}

function toConsentJson(consent: ConsentLedger): Record<string, string[]> {
  const json: Record<string, string[]> = {};
  for (const [stage, users] of Object.entries(consent)) {
    if (users) json[stage] = [...users];
  }
  return json;
}

function fromConsentJson(json: Record<string, string[]>): ConsentLedger {
  const consent: ConsentLedger = {};
  for (const [stage, users] of Object.entries(json)) {
    consent[toStage(stage)] = [...users];
  }
  return consent;
}

function toMeetingJson(meeting: MeetingRequest): MeetingRequestJson {
  return {
    id: meeting.id,
    proposed_by: meeting.proposedBy,
    proposed_time: meeting.proposedTime.toISOString(),
    location: meeting.location,
    status: meeting.status,
    respond_by: meeting.respondBy.toISOString(),
    responded_at: meeting.respondedAt?.toISOString() ?? null,
    completed_at: meeting.completedAt?.toISOString() ?? null,
    created_at: meeting.createdAt.toISOString(),
  };
}

function fromMeetingJson(json: MeetingRequestJson): MeetingRequest {
  return {
    id: json.id,
    proposedBy: json.proposed_by,
    proposedTime: new Date(json.proposed_time),
    location: json.location,
    status: oneOf(json.status, MEETING_STATUSES, 'meeting status'),
    respondBy: new Date(json.respond_by),
    respondedAt: json.responded_at ? new Date(json.responded_at) : null,
    completedAt: json.completed_at ? new Date(json.completed_at) : null,
    createdAt: new Date(json.created_at),
  };
}

// ── Feedback ──

export function fromFeedbackRow(row: FeedbackRow): Feedback {
  return {
    id: row.id,
    journeyId: row.journey_id,
    meetingRequestId: row.meeting_request_id,
    submittedBy: row.submitted_by,
    subjectId: row.subject_id,
    rating: row.rating,
    comment: row.comment,
    wantsToContinue: row.wants_to_continue,
    createdAt: new Date(row.created_at),
  };
}

// ── Private ──

function toStage(value: string): JourneyStage {
  if (!isJourneyStage(value)) throw new Error(`Unknown journey stage "${value}"`);
  return value;
}

function oneOf<T extends string>(value: string, allowed: readonly T[], label: string): T {
  const match = allowed.find((candidate) => candidate === value);
  if (!match) throw new Error(`Unknown ${label} "${value}"`);
  return match;
}
