/**
 * Journey transition function.
 * `applyEvent(journey, event, policy)` is pure: it never mutates its input
 * and never performs I/O. The service persists an `applied` result with a
 * compare-and-swap on the journey version.
 *
 * `unchanged` means the actor's intent already holds (a repeated accept, a
 * re-sweep of an expired journey), which callers report as success.
 */

import type { JourneyPolicy } from '../config.js';
import type {
  Journey,
  JourneyStage,
  MeetingRequest,
  MeetingStatus,
} from '../types/models.js';
import {
  AppError,
  ForbiddenError,
  InvalidMeetingStateError,
  NotFoundError,
  StateConflictError,
  ValidationError,
} from '../errors.js';
import { canTransition, isTerminal } from './stages.js';

const HOUR_MS = 60 * 60 * 1000;

export type JourneyEvent =
  | { type: 'accept'; actor: string; at: Date }
  | { type: 'decline'; actor: string; at: Date; reason?: string }
  | {
      type: 'propose_meeting';
      actor: string;
      at: Date;
      meetingId: string;
      proposedTime: Date;
      location: string;
    }
  | { type: 'respond_meeting'; actor: string; at: Date; meetingId: string; accept: boolean }
  | { type: 'complete_meeting'; actor: string | null; at: Date; meetingId: string }
  | { type: 'record_feedback'; actor: string; at: Date; meetingId: string }
  | { type: 'expire'; at: Date };

export type TransitionResult =
  | { kind: 'applied'; journey: Journey }
  | { kind: 'unchanged'; journey: Journey }
  | { kind: 'rejected'; error: AppError };

export interface NewJourneyInput {
  id: string;
  initiatorId: string;
  partnerId: string;
  at: Date;
}

export function pairKey(a: string, b: string): string {
  const [first, second] = sortPair(a, b);
  return `${first}:${second}`;
}

export function sortPair(a: string, b: string): [string, string] {
  return a < b ? [a, b] : [b, a];
}

export function createJourneyRecord(input: NewJourneyInput, policy: JourneyPolicy): Journey {
  return {
    id: input.id,
    participants: sortPair(input.initiatorId, input.partnerId),
    initiatorId: input.initiatorId,
    stage: 'proposed',
    stageHistory: [{ stage: 'proposed', actor: input.initiatorId, at: input.at }],
    consent: { proposed: [input.initiatorId] },
    deadline: addHours(input.at, policy.proposalTtlHours),
    meetings: [],
    failedMeetingAttempts: 0,
    endedBy: null,
    endReason: null,
    version: 1,
    createdAt: input.at,
    updatedAt: input.at,
  };
}

export function applyEvent(
  journey: Journey,
  event: JourneyEvent,
  policy: JourneyPolicy
): TransitionResult {
  if (event.type !== 'expire' && event.actor !== null && !isParticipant(journey, event.actor)) {
    return reject(new ForbiddenError('Only participants can act on a journey'));
  }

  const result = dispatch(journey, event, policy);
  if (result.kind !== 'applied') return result;

  // One version step per persisted change, however many stages it crossed.
  return { kind: 'applied', journey: { ...result.journey, version: journey.version + 1 } };
}

function dispatch(journey: Journey, event: JourneyEvent, policy: JourneyPolicy): TransitionResult {
  switch (event.type) {
    case 'accept':
      return accept(journey, event, policy);
    case 'decline':
      return decline(journey, event);
    case 'propose_meeting':
      return proposeMeeting(journey, event, policy);
    case 'respond_meeting':
      return respondMeeting(journey, event, policy);
    case 'complete_meeting':
      return completeMeeting(journey, event, policy);
    case 'record_feedback':
      return recordFeedback(journey, event);
    case 'expire':
      return expire(journey, event, policy);
  }
}

export function isParticipant(journey: Journey, userId: string): boolean {
  return journey.participants[0] === userId || journey.participants[1] === userId;
}

export function otherParticipant(journey: Journey, userId: string): string {
  return journey.participants[0] === userId ? journey.participants[1] : journey.participants[0];
}

/** The meeting request currently awaiting an answer, if any. */
export function pendingMeeting(journey: Journey): MeetingRequest | undefined {
  return journey.meetings.find((m) => m.status === 'pending');
}

// ── Event handlers ──

function accept(
  journey: Journey,
  event: Extract<JourneyEvent, { type: 'accept' }>,
  policy: JourneyPolicy
): TransitionResult {
  if (journey.stage === 'declined' || journey.stage === 'expired') {
    return conflict(journey, `Cannot accept a ${journey.stage} journey`);
  }
  // Past `proposed` both participants have consented.
  if (journey.stage !== 'proposed' || consented(journey, 'proposed', event.actor)) {
    return unchanged(journey);
  }

  const lapsed = deadlineLapsed(journey, event.at);
  if (lapsed) return lapsed;

  const both = [...journey.participants];
  const matched = moveTo(journey, 'mutual_match', event.actor, event.at, {
    consent: { ...journey.consent, proposed: both, mutual_match: both },
  });
  return applied(
    moveTo(matched, 'guided_conversation', null, event.at, {
      deadline: addHours(event.at, policy.conversationTtlHours),
      note: 'both_consented',
    })
  );
}

function decline(
  journey: Journey,
  event: Extract<JourneyEvent, { type: 'decline' }>
): TransitionResult {
  if (journey.stage === 'declined' || journey.stage === 'expired') {
    return unchanged(journey);
  }
  if (isTerminal(journey.stage)) {
    return conflict(journey, `Cannot decline a ${journey.stage} journey`);
  }

  return applied(
    moveTo(journey, 'declined', event.actor, event.at, {
      deadline: null,
      meetings: settleMeeting(journey.meetings, 'pending', 'declined', event.at),
      endedBy: event.actor,
      endReason: event.reason ?? null,
      note: event.reason,
    })
  );
}

function proposeMeeting(
  journey: Journey,
  event: Extract<JourneyEvent, { type: 'propose_meeting' }>,
  policy: JourneyPolicy
): TransitionResult {
  if (journey.stage === 'meeting_proposed') {
    const open = pendingMeeting(journey);
    const sameRequest =
      open !== undefined &&
      open.proposedBy === event.actor &&
      open.proposedTime.getTime() === event.proposedTime.getTime() &&
      open.location === event.location;
    return sameRequest
      ? unchanged(journey)
      : conflict(journey, 'A meeting request is already awaiting an answer');
  }
  if (journey.stage !== 'guided_conversation') {
    return conflict(journey, `Cannot propose a meeting while ${journey.stage}`);
  }

  const lapsed = deadlineLapsed(journey, event.at);
  if (lapsed) return lapsed;

  if (event.proposedTime.getTime() <= event.at.getTime()) {
    return reject(new ValidationError('proposedTime must be in the future'));
  }

  const responseCutoff = addHours(event.at, policy.meetingResponseTtlHours);
  const respondBy =
    responseCutoff.getTime() < event.proposedTime.getTime() ? responseCutoff : event.proposedTime;

  const meeting: MeetingRequest = {
    id: event.meetingId,
    proposedBy: event.actor,
    proposedTime: event.proposedTime,
    location: event.location,
    status: 'pending',
    respondBy,
    respondedAt: null,
    completedAt: null,
    createdAt: event.at,
  };

  return applied(
    moveTo(journey, 'meeting_proposed', event.actor, event.at, {
      deadline: respondBy,
      meetings: [...journey.meetings, meeting],
      consent: { ...journey.consent, meeting_proposed: [event.actor] },
    })
  );
}

function respondMeeting(
  journey: Journey,
  event: Extract<JourneyEvent, { type: 'respond_meeting' }>,
  policy: JourneyPolicy
): TransitionResult {
  const meeting = journey.meetings.find((m) => m.id === event.meetingId);
  if (!meeting) {
    return reject(new NotFoundError(`Meeting request "${event.meetingId}" not found`));
  }
  if (meeting.proposedBy === event.actor) {
    return reject(new ForbiddenError('Only the invited participant can answer a meeting request'));
  }

  if (meeting.status !== 'pending') {
    const alreadyAccepted =
      event.accept && (meeting.status === 'accepted' || meeting.status === 'completed');
    const alreadyDeclined = !event.accept && meeting.status === 'declined';
    if (alreadyAccepted || alreadyDeclined) return unchanged(journey);
    return reject(
      new InvalidMeetingStateError(`Meeting request is already ${meeting.status}`, meeting.status)
    );
  }

  if (event.at.getTime() >= meeting.respondBy.getTime()) {
    return reject(
      new StateConflictError('The meeting request has lapsed', journey.stage, 'deadline_passed')
    );
  }

  if (event.accept) {
    return applied(
      moveTo(journey, 'meeting_confirmed', event.actor, event.at, {
        deadline: addHours(meeting.proposedTime, policy.meetingCompletionGraceHours),
        meetings: updateMeeting(journey.meetings, meeting.id, {
          status: 'accepted',
          respondedAt: event.at,
        }),
        consent: {
          ...journey.consent,
          meeting_confirmed: [...journey.participants],
        },
      })
    );
  }

  return applied(
    failMeeting(
      {
        ...journey,
        meetings: updateMeeting(journey.meetings, meeting.id, {
          status: 'declined',
          respondedAt: event.at,
        }),
      },
      event.actor,
      event.at,
      'meeting_declined',
      policy
    )
  );
}

function completeMeeting(
  journey: Journey,
  event: Extract<JourneyEvent, { type: 'complete_meeting' }>,
  policy: JourneyPolicy
): TransitionResult {
  const meeting = journey.meetings.find((m) => m.id === event.meetingId);
  if (!meeting) {
    return reject(new NotFoundError(`Meeting request "${event.meetingId}" not found`));
  }
  if (meeting.status === 'completed') return unchanged(journey);
  if (meeting.status !== 'accepted') {
    return reject(
      new InvalidMeetingStateError(
        `Only an accepted meeting can be completed (status: ${meeting.status})`,
        meeting.status
      )
    );
  }
  if (journey.stage !== 'meeting_confirmed') {
    return conflict(journey, `Cannot complete a meeting while ${journey.stage}`);
  }

  const lapsed = deadlineLapsed(journey, event.at);
  if (lapsed) return lapsed;

  if (event.at.getTime() < meeting.proposedTime.getTime()) {
    return reject(
      new InvalidMeetingStateError('The meeting has not taken place yet', meeting.status)
    );
  }

  return applied(
    moveTo(journey, 'post_meeting_feedback', event.actor, event.at, {
      deadline: addHours(event.at, policy.feedbackWindowHours),
      meetings: updateMeeting(journey.meetings, meeting.id, {
        status: 'completed',
        completedAt: event.at,
      }),
      consent: { ...journey.consent, post_meeting_feedback: [] },
    })
  );
}

function recordFeedback(
  journey: Journey,
  event: Extract<JourneyEvent, { type: 'record_feedback' }>
): TransitionResult {
  // Late feedback is still stored by the feedback service; the journey has moved on.
  if (journey.stage !== 'post_meeting_feedback') return unchanged(journey);
  if (consented(journey, 'post_meeting_feedback', event.actor)) return unchanged(journey);

  const submitted = [...(journey.consent.post_meeting_feedback ?? []), event.actor].sort();
  const consent = { ...journey.consent, post_meeting_feedback: submitted };

  if (submitted.length < 2) {
    return applied(touch({ ...journey, consent }, event.at));
  }

  return applied(
    moveTo({ ...journey, consent }, 'ongoing', event.actor, event.at, {
      deadline: null,
      note: 'feedback_complete',
    })
  );
}

function expire(
  journey: Journey,
  event: Extract<JourneyEvent, { type: 'expire' }>,
  policy: JourneyPolicy
): TransitionResult {
  if (isTerminal(journey.stage)) return unchanged(journey);
  if (!journey.deadline || event.at.getTime() < journey.deadline.getTime()) {
    return unchanged(journey);
  }

  switch (journey.stage) {
    case 'meeting_proposed': {
      const open = pendingMeeting(journey);
      return applied(
        failMeeting(
          {
            ...journey,
            meetings: open
              ? updateMeeting(journey.meetings, open.id, { status: 'expired' })
              : journey.meetings,
          },
          null,
          event.at,
          'meeting_expired',
          policy
        )
      );
    }

    case 'meeting_confirmed':
      return applied(
        moveTo(journey, 'expired', null, event.at, {
          deadline: null,
          meetings: settleMeeting(journey.meetings, 'accepted', 'expired', event.at),
          note: 'meeting_not_completed',
        })
      );

    case 'post_meeting_feedback': {
      const submitted = journey.consent.post_meeting_feedback ?? [];
      if (submitted.length === 0) {
        return applied(
          moveTo(journey, 'expired', null, event.at, { deadline: null, note: 'no_feedback' })
        );
      }
      const missing = journey.participants.filter((p) => !submitted.includes(p));
      return applied(
        moveTo(journey, 'ongoing', null, event.at, {
          deadline: null,
          note: `feedback_missing:${missing.join(',')}`,
        })
      );
    }

    default:
      return applied(
        moveTo(journey, 'expired', null, event.at, {
          deadline: null,
          meetings: settleMeeting(journey.meetings, 'pending', 'expired', event.at),
          note: 'deadline_elapsed',
        })
      );
  }
}

// ── Helpers ──

interface StagePatch {
  deadline?: Date | null;
  meetings?: MeetingRequest[];
  consent?: Journey['consent'];
  endedBy?: string | null;
  endReason?: string | null;
  note?: string;
}

function moveTo(
  journey: Journey,
  stage: JourneyStage,
  actor: string | null,
  at: Date,
  patch: StagePatch = {}
): Journey {
  if (!canTransition(journey.stage, stage)) {
    throw new Error(`Illegal journey transition ${journey.stage} → ${stage}`);
  }

  const { note, ...rest } = patch;
  return touch(
    {
      ...journey,
      ...rest,
      stage,
      stageHistory: [...journey.stageHistory, note ? { stage, actor, at, note } : { stage, actor, at }],
    },
    at
  );
}

function touch(journey: Journey, at: Date): Journey {
  return { ...journey, updatedAt: at };
}

/** Apply one failed meeting attempt: back to the conversation, or expired past the retry limit. */
function failMeeting(
  journey: Journey,
  actor: string | null,
  at: Date,
  note: string,
  policy: JourneyPolicy
): Journey {
  const failedMeetingAttempts = journey.failedMeetingAttempts + 1;

  if (failedMeetingAttempts > policy.maxMeetingRetries) {
    return moveTo({ ...journey, failedMeetingAttempts }, 'expired', actor, at, {
      deadline: null,
      note: 'meeting_retries_exhausted',
    });
  }

  const consent = { ...journey.consent };
  delete consent.meeting_proposed;
  return moveTo({ ...journey, failedMeetingAttempts, consent }, 'guided_conversation', actor, at, {
    deadline: addHours(at, policy.conversationTtlHours),
    note,
  });
}

function updateMeeting(
  meetings: MeetingRequest[],
  id: string,
  patch: Partial<MeetingRequest>
): MeetingRequest[] {
  return meetings.map((m) => (m.id === id ? { ...m, ...patch } : m));
}

function settleMeeting(
  meetings: MeetingRequest[],
  from: MeetingStatus,
  to: MeetingStatus,
  at: Date
): MeetingRequest[] {
  return meetings.map((m) =>
    m.status === from
      ? { ...m, status: to, respondedAt: to === 'declined' ? at : m.respondedAt }
      : m
  );
}

function consented(journey: Journey, stage: JourneyStage, userId: string): boolean {
  return journey.consent[stage]?.includes(userId) ?? false;
}

function deadlineLapsed(journey: Journey, at: Date): TransitionResult | null {
  if (journey.deadline && at.getTime() >= journey.deadline.getTime()) {
    return reject(
      new StateConflictError(
        `The ${journey.stage} stage has lapsed`,
        journey.stage,
        'deadline_passed'
      )
    );
  }
  return null;
}

export function addHours(date: Date, hours: number): Date {
  return new Date(date.getTime() + hours * HOUR_MS);
}

function applied(journey: Journey): TransitionResult {
  return { kind: 'applied', journey };
}

function unchanged(journey: Journey): TransitionResult {
  return { kind: 'unchanged', journey };
}

function reject(error: AppError): TransitionResult {
  return { kind: 'rejected', error };
}

function conflict(journey: Journey, message: string): TransitionResult {
  return reject(new StateConflictError(message, journey.stage));
}
