/**
 * Journey service.
 * Every mutation runs under a per-journey lock: load, apply the pure
 * transition, then compare-and-swap on the stored version. A lost swap
 * (another process got there first) re-reads and re-evaluates, so a
 * caller whose intent was already achieved gets `already_applied`.
 */

import { randomUUID } from 'node:crypto';
import type { IJourneyRepository } from '../repositories/IJourneyRepository.js';
import type { IProfileProvider } from '../providers/IProfileProvider.js';
import type { INotificationProvider } from '../providers/INotificationProvider.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { JourneyPolicy } from '../config.js';
import type { JourneyDecision, MutationOutcome } from '../types/api.js';
import type { Journey } from '../types/models.js';
import {
  applyEvent,
  createJourneyRecord,
  isParticipant,
  type JourneyEvent,
} from '../journey/transitions.js';
import { KeyedMutex } from '../journey/keyed-mutex.js';
import { checkEligibility } from '../matching/eligibility.js';
import { loadEligibilityContext } from './eligibility-context.js';
import {
  AlreadyExistsError,
  ConflictError,
  NotEligibleError,
  NotFoundError,
  ValidationError,
} from '../errors.js';

/** Swap attempts before a mutation gives up with a Conflict. */
export const MAX_SWAP_ATTEMPTS = 5;

const MAX_LOCATION_LENGTH = 200;
const MAX_REASON_LENGTH = 500;
const MAX_PAGE_SIZE = 100;

export interface JourneyMutation {
  outcome: MutationOutcome;
  journey: Journey;
}

export interface ListJourneysOptions {
  activeOnly?: boolean;
  limit?: number;
  offset?: number;
}

export interface JourneyServiceOptions {
  policy: JourneyPolicy;
  declineCooldownDays: number;
}

export class JourneyService {
  private readonly locks = new KeyedMutex();

  constructor(
    private readonly journeyRepo: IJourneyRepository,
    private readonly profileProvider: IProfileProvider,
    private readonly notificationProvider: INotificationProvider,
    private readonly logProvider: ILogProvider,
    private readonly options: JourneyServiceOptions
  ) {}

  async createJourney(initiatorId: string, partnerId: string): Promise<Journey> {
    if (initiatorId === partnerId) {
      throw new NotEligibleError('Cannot start a journey with yourself', 'self');
    }

    const [initiator, partner] = await Promise.all([
      this.profileProvider.getProfile(initiatorId),
      this.profileProvider.getProfile(partnerId),
    ]);
    if (!initiator) throw new NotFoundError(`Profile "${initiatorId}" not found`);
    if (!partner) throw new NotFoundError(`Profile "${partnerId}" not found`);

    // From here on only the stored ids: the pair key must not depend on how an id was spelled.
    const from = initiator.userId;
    const to = partner.userId;
    if (from === to) {
      throw new NotEligibleError('Cannot start a journey with yourself', 'self');
    }

    const existing = await this.journeyRepo.findActiveByPair(from, to);
    if (existing) throw new AlreadyExistsError(existing.id);

    if (!initiator.verified) {
      throw new NotEligibleError('Only verified users can start a journey', 'unverified');
    }

    const now = new Date();
    const context = await loadEligibilityContext(
      this.journeyRepo,
      from,
      now,
      this.options.declineCooldownDays
    );
    const eligibility = checkEligibility(initiator, partner, context);
    if (!eligibility.eligible) {
      throw new NotEligibleError(
        `User "${to}" is not eligible for a journey (${eligibility.reason})`,
        eligibility.reason
      );
    }

    const record = createJourneyRecord(
      { id: randomUUID(), initiatorId: from, partnerId: to, at: now },
      this.options.policy
    );
    const inserted = await this.journeyRepo.insertIfNoActive(record);
    if (!inserted.created) throw new AlreadyExistsError(inserted.existing.id);

    this.logProvider.info(`journey ${record.id}: created`, {
      journeyId: record.id,
      initiatorId: from,
      partnerId: to,
    });
    return inserted.journey;
  }

  async getJourney(journeyId: string, userId: string): Promise<Journey> {
    const journey = await this.journeyRepo.findById(journeyId);
    // Non-participants cannot tell a foreign journey from a missing one.
    if (!journey || !isParticipant(journey, userId)) {
      throw new NotFoundError(`Journey "${journeyId}" not found`);
    }
    return journey;
  }

  async listJourneys(userId: string, options: ListJourneysOptions = {}): Promise<Journey[]> {
    const limit = options.limit ?? 20;
    const offset = options.offset ?? 0;
    if (!Number.isInteger(limit) || limit < 1 || limit > MAX_PAGE_SIZE) {
      throw new ValidationError(`limit must be an integer between 1 and ${MAX_PAGE_SIZE}`);
    }
    if (!Number.isInteger(offset) || offset < 0) {
      throw new ValidationError('offset must be a non-negative integer');
    }

    return this.journeyRepo.findByParticipant(userId, {
      activeOnly: options.activeOnly ?? false,
      limit,
      offset,
    });
  }

  async respond(
    journeyId: string,
    actor: string,
    decision: JourneyDecision,
    reason?: string
  ): Promise<JourneyMutation> {
    checkReason(reason);
    return this.mutate(journeyId, (at) =>
      decision === 'accept'
        ? { type: 'accept', actor, at }
        : { type: 'decline', actor, at, reason }
    );
  }

  /** Leave the journey from any non-terminal stage. */
  async endJourney(journeyId: string, actor: string, reason?: string): Promise<JourneyMutation> {
    checkReason(reason);
    return this.mutate(journeyId, (at) => ({
      type: 'decline',
      actor,
      at,
      reason: reason ?? 'ended_by_participant',
    }));
  }

  async proposeMeeting(
    journeyId: string,
    actor: string,
    proposedTime: Date,
    location: string
  ): Promise<JourneyMutation> {
    if (Number.isNaN(proposedTime.getTime())) {
      throw new ValidationError('proposedTime must be a valid date');
    }
    const place = location.trim();
    if (!place) throw new ValidationError('location is required');
    if (place.length > MAX_LOCATION_LENGTH) {
      throw new ValidationError(`location must be ${MAX_LOCATION_LENGTH} characters or less`);
    }

    const meetingId = randomUUID();
    return this.mutate(journeyId, (at) => ({
      type: 'propose_meeting',
      actor,
      at,
      meetingId,
      proposedTime,
      location: place,
    }));
  }

  async respondToMeeting(
    journeyId: string,
    meetingId: string,
    actor: string,
    accept: boolean
  ): Promise<JourneyMutation> {
    return this.mutate(journeyId, (at) => ({
      type: 'respond_meeting',
      actor,
      at,
      meetingId,
      accept,
    }));
  }

  /** Mark an accepted meeting as held. A null actor is a system caller. */
  async completeMeeting(
    journeyId: string,
    meetingId: string,
    actor: string | null
  ): Promise<JourneyMutation> {
    return this.mutate(journeyId, (at) => ({ type: 'complete_meeting', actor, at, meetingId }));
  }

  /** Note that a participant's feedback for the meeting is stored. */
  async recordFeedback(
    journeyId: string,
    meetingId: string,
    actor: string
  ): Promise<JourneyMutation> {
    return this.mutate(journeyId, (at) => ({ type: 'record_feedback', actor, at, meetingId }));
  }

  /** Apply the deadline if it has passed as of `asOf` (default: now). Used by the sweep. */
  async expire(journeyId: string, asOf?: Date): Promise<JourneyMutation> {
    return this.mutate(journeyId, (at) => ({ type: 'expire', at: asOf ?? at }));
  }

  /** Number of journeys with a mutation in flight in this process. */
  get inFlight(): number {
    return this.locks.activeKeys;
  }

  private async mutate(
    journeyId: string,
    eventAt: (at: Date) => JourneyEvent
  ): Promise<JourneyMutation> {
    return this.locks.run(journeyId, async () => {
      for (let attempt = 1; attempt <= MAX_SWAP_ATTEMPTS; attempt++) {
        const current = await this.journeyRepo.findById(journeyId);
        if (!current) throw new NotFoundError(`Journey "${journeyId}" not found`);

        const event = eventAt(new Date());
        const result = applyEvent(current, event, this.options.policy);

        if (result.kind === 'rejected') throw result.error;
        if (result.kind === 'unchanged') {
          return { outcome: 'already_applied', journey: result.journey };
        }

        if (await this.journeyRepo.compareAndSwap(result.journey, current.version)) {
          this.announce(current, result.journey, event);
          return { outcome: 'applied', journey: result.journey };
        }

        this.logProvider.debug(`journey ${journeyId}: version ${current.version} is stale, retrying`, {
          journeyId,
          event: event.type,
          attempt,
        });
      }

      throw new ConflictError('The journey is being changed concurrently, try again', { journeyId });
    });
  }

  private announce(before: Journey, after: Journey, event: JourneyEvent): void {
    if (before.stage === after.stage) return;

    const actor = event.type === 'expire' ? null : event.actor;
    const last = after.stageHistory[after.stageHistory.length - 1];
    this.logProvider.info(`journey ${after.id}: ${before.stage} → ${after.stage}`, {
      journeyId: after.id,
      from: before.stage,
      to: after.stage,
      actor,
      event: event.type,
      version: after.version,
      ...(last?.note ? { note: last.note } : {}),
    });

    const signal = {
      journeyId: after.id,
      participants: after.participants,
      from: before.stage,
      to: after.stage,
      actor,
      at: after.updatedAt.toISOString(),
      version: after.version,
    };
    void this.notificationProvider.notify(signal).catch((err: unknown) => {
      this.logProvider.warn(`journey ${after.id}: notification failed`, {
        journeyId: after.id,
        to: after.stage,
        error: err instanceof Error ? err.message : String(err),
      });
    });
  }
}

function checkReason(reason: string | undefined): void {
  if (reason !== undefined && reason.length > MAX_REASON_LENGTH) {
    throw new ValidationError(`reason must be ${MAX_REASON_LENGTH} characters or less`);
  }
}
