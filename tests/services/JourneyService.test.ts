import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { JourneyService, MAX_SWAP_ATTEMPTS } from '../../src/services/JourneyService.js';
import { ConsoleLogProvider } from '../../src/providers/ConsoleLogProvider.js';
import { DEFAULT_JOURNEY_POLICY } from '../../src/config.js';
import { addHours, applyEvent, type JourneyEvent } from '../../src/journey/transitions.js';
import { MockJourneyRepository } from '../mocks/MockJourneyRepository.js';
import { MockProfileProvider, makeProfile } from '../mocks/MockProfileProvider.js';
import { RecordingNotificationProvider } from '../mocks/RecordingNotificationProvider.js';

const T0 = new Date('2025-06-01T10:00:00Z');
const at = (hours: number) => addHours(T0, hours);
const tick = () => new Promise((r) => setTimeout(r, 0));

describe('JourneyService', () => {
  let service: JourneyService;
  let journeyRepo: MockJourneyRepository;
  let profiles: MockProfileProvider;
  let notifications: RecordingNotificationProvider;
  let logProvider: ConsoleLogProvider;

  beforeEach(() => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(T0);

    journeyRepo = new MockJourneyRepository();
    profiles = new MockProfileProvider();
    profiles.add(makeProfile('alice'), makeProfile('bob'), makeProfile('carol'));
    notifications = new RecordingNotificationProvider();
    logProvider = new ConsoleLogProvider();
    service = new JourneyService(journeyRepo, profiles, notifications, logProvider, {
      policy: DEFAULT_JOURNEY_POLICY,
      declineCooldownDays: 90,
    });
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  /** Write `event` to the stored journey as another process would. */
  function writeBehindService(journeyId: string, event: JourneyEvent): void {
    const stored = journeyRepo.items.get(journeyId);
    if (!stored) throw new Error(`no journey ${journeyId}`);
    const result = applyEvent(stored, event, DEFAULT_JOURNEY_POLICY);
    if (result.kind !== 'applied') throw new Error(`setup event was ${result.kind}`);
    journeyRepo.put(result.journey);
  }

  // --- createJourney() ---

  describe('createJourney', () => {
    it('should open a proposed journey for the pair', async () => {
      const journey = await service.createJourney('bob', 'alice');

      expect(journey).toMatchObject({
        participants: ['alice', 'bob'],
        initiatorId: 'bob',
        stage: 'proposed',
        deadline: at(72),
        version: 1,
      });
      expect(journeyRepo.items.size).toBe(1);
      expect(logProvider.eventsAt('info')[0].message).toBe(`journey ${journey.id}: created`);
    });

    it('should refuse a journey with yourself', async () => {
      await expect(service.createJourney('bob', 'bob')).rejects.toMatchObject({
        code: 'NOT_ELIGIBLE',
        details: { reason: 'self' },
      });
    });

    it('should report unknown profiles', async () => {
      await expect(service.createJourney('bob', 'ghost')).rejects.toMatchObject({
        code: 'NOT_FOUND',
        message: 'Profile "ghost" not found',
      });
    });

    it('should point at the existing journey for the pair', async () => {
      const existing = await service.createJourney('bob', 'alice');

      await expect(service.createJourney('alice', 'bob')).rejects.toMatchObject({
        code: 'ALREADY_EXISTS',
        details: { existingJourneyId: existing.id },
      });
    });

    it('should only let verified users start a journey', async () => {
      profiles.add(makeProfile('dave', { verified: false }));

      await expect(service.createJourney('dave', 'alice')).rejects.toMatchObject({
        code: 'NOT_ELIGIBLE',
        message: 'Only verified users can start a journey',
        details: { reason: 'unverified' },
      });
    });

    it('should refuse a partner outside the preferences', async () => {
      profiles.add(makeProfile('carol', { location: { latitude: 41.1579, longitude: -8.6291 } }));

      await expect(service.createJourney('bob', 'carol')).rejects.toMatchObject({
        code: 'NOT_ELIGIBLE',
        message: 'User "carol" is not eligible for a journey (distance)',
        details: { reason: 'distance' },
      });
    });

    it('should refuse a partner who declined recently', async () => {
      const journey = await service.createJourney('bob', 'alice');
      await service.respond(journey.id, 'alice', 'decline');

      await expect(service.createJourney('bob', 'alice')).rejects.toMatchObject({
        code: 'NOT_ELIGIBLE',
        details: { reason: 'declined_cooldown' },
      });
    });

    it('should create one journey when both users start at once', async () => {
      const results = await Promise.allSettled([
        service.createJourney('bob', 'alice'),
        service.createJourney('alice', 'bob'),
      ]);

      expect(results.filter((r) => r.status === 'fulfilled')).toHaveLength(1);
      const failure = results.find((r) => r.status === 'rejected');
      expect(failure).toMatchObject({ reason: { code: 'ALREADY_EXISTS' } });
      expect(journeyRepo.items.size).toBe(1);
    });

    it('should find the existing journey whatever the case of the partner id', async () => {
      const existing = await service.createJourney('alice', 'bob');

      await expect(service.createJourney('bob', 'ALICE')).rejects.toMatchObject({
        code: 'ALREADY_EXISTS',
        details: { existingJourneyId: existing.id },
      });
      expect(journeyRepo.items.size).toBe(1);
    });

    it('should store participants by their profile ids', async () => {
      const journey = await service.createJourney('bob', 'Carol');

      expect(journey.participants).toEqual(['bob', 'carol']);
      expect(logProvider.eventsAt('info')[0].fields).toMatchObject({ partnerId: 'carol' });
    });

    it('should refuse yourself under another spelling', async () => {
      await expect(service.createJourney('bob', 'BOB')).rejects.toMatchObject({
        code: 'NOT_ELIGIBLE',
        details: { reason: 'self' },
      });
    });
  });

  // --- reads ---

  describe('getJourney and listJourneys', () => {
    it('should hide a journey from non-participants', async () => {
      const journey = await service.createJourney('bob', 'alice');

      expect((await service.getJourney(journey.id, 'alice')).id).toBe(journey.id);
      await expect(service.getJourney(journey.id, 'carol')).rejects.toMatchObject({
        code: 'NOT_FOUND',
      });
    });

    it('should list a participant journeys, optionally active only', async () => {
      const journey = await service.createJourney('bob', 'alice');
      await service.endJourney(journey.id, 'bob');
      vi.setSystemTime(at(1));
      await service.createJourney('bob', 'carol');

      expect(await service.listJourneys('bob')).toHaveLength(2);
      expect((await service.listJourneys('bob', { activeOnly: true })).map((j) => j.stage)).toEqual([
        'proposed',
      ]);
      expect(await service.listJourneys('carol', { limit: 1, offset: 1 })).toEqual([]);
    });

    it('should validate paging', async () => {
      await expect(service.listJourneys('bob', { limit: 0 })).rejects.toThrow(
        'limit must be an integer between 1 and 100'
      );
      await expect(service.listJourneys('bob', { offset: -1 })).rejects.toThrow(
        'offset must be a non-negative integer'
      );
    });
  });

  // --- mutations ---

  describe('mutations', () => {
    let journeyId: string;

    beforeEach(async () => {
      journeyId = (await service.createJourney('bob', 'alice')).id;
    });

    it('should take the pair through to ongoing and announce each stage', async () => {
      vi.setSystemTime(at(1));
      await service.respond(journeyId, 'alice', 'accept');

      vi.setSystemTime(at(2));
      const proposed = await service.proposeMeeting(journeyId, 'alice', at(50), '  Cafe Central ');
      const meeting = proposed.journey.meetings[0];
      expect(meeting.location).toBe('Cafe Central');

      vi.setSystemTime(at(3));
      await service.respondToMeeting(journeyId, meeting.id, 'bob', true);

      vi.setSystemTime(at(51));
      await service.completeMeeting(journeyId, meeting.id, 'alice');
      await service.recordFeedback(journeyId, meeting.id, 'bob');
      const done = await service.recordFeedback(journeyId, meeting.id, 'alice');

      expect(done.outcome).toBe('applied');
      expect(done.journey.stage).toBe('ongoing');
      expect(done.journey.version).toBe(7);
      expect(notifications.signals.map((s) => [s.from, s.to, s.actor])).toEqual([
        ['proposed', 'guided_conversation', 'alice'],
        ['guided_conversation', 'meeting_proposed', 'alice'],
        ['meeting_proposed', 'meeting_confirmed', 'bob'],
        ['meeting_confirmed', 'post_meeting_feedback', 'alice'],
        ['post_meeting_feedback', 'ongoing', 'alice'],
      ]);
      expect(notifications.signals[4]).toMatchObject({
        journeyId,
        participants: ['alice', 'bob'],
        at: at(51).toISOString(),
        version: 7,
      });
      expect(service.inFlight).toBe(0);
    });

    it('should log each stage change', async () => {
      await service.respond(journeyId, 'alice', 'accept');

      expect(logProvider.eventsAt('info')[1]).toMatchObject({
        message: `journey ${journeyId}: proposed → guided_conversation`,
        fields: { from: 'proposed', to: 'guided_conversation', actor: 'alice', event: 'accept', version: 2 },
      });
    });

    it('should report a repeated action as already applied', async () => {
      await service.respond(journeyId, 'alice', 'accept');
      const again = await service.respond(journeyId, 'alice', 'accept');

      expect(again.outcome).toBe('already_applied');
      expect(again.journey.version).toBe(2);
      expect(notifications.signals).toHaveLength(1);
    });

    it('should run concurrent actions on one journey one after another', async () => {
      const outcomes = await Promise.all([
        service.respond(journeyId, 'alice', 'accept'),
        service.respond(journeyId, 'alice', 'accept'),
      ]);

      expect(outcomes.map((o) => o.outcome).sort()).toEqual(['already_applied', 'applied']);
      expect(journeyRepo.swapCalls).toBe(1);
    });

    it('should report already_applied when another process made the same change first', async () => {
      journeyRepo.interleaveBeforeNextSwap(async () => {
        writeBehindService(journeyId, { type: 'accept', actor: 'alice', at: T0 });
      });

      const result = await service.respond(journeyId, 'alice', 'accept');

      expect(result.outcome).toBe('already_applied');
      expect(result.journey.stage).toBe('guided_conversation');
      expect(journeyRepo.swapCalls).toBe(1);
    });

    it('should re-evaluate against a conflicting concurrent change', async () => {
      journeyRepo.interleaveBeforeNextSwap(async () => {
        writeBehindService(journeyId, { type: 'decline', actor: 'bob', at: T0 });
      });

      await expect(service.respond(journeyId, 'alice', 'accept')).rejects.toMatchObject({
        code: 'STATE_CONFLICT',
        details: { currentStage: 'declined' },
      });
      expect(journeyRepo.items.get(journeyId)?.endedBy).toBe('bob');
    });

    it('should give up after repeated lost swaps', async () => {
      const bump = async (): Promise<void> => {
        const stored = journeyRepo.items.get(journeyId);
        if (stored) journeyRepo.put({ ...stored, version: stored.version + 1 });
        journeyRepo.interleaveBeforeNextSwap(bump);
      };
      journeyRepo.interleaveBeforeNextSwap(bump);

      await expect(service.respond(journeyId, 'alice', 'accept')).rejects.toMatchObject({
        code: 'CONFLICT',
        message: 'The journey is being changed concurrently, try again',
      });
      expect(journeyRepo.swapCalls).toBe(MAX_SWAP_ATTEMPTS);
    });

    it('should keep the transition when the notification fails', async () => {
      notifications.failWith = new Error('webhook down');

      const result = await service.respond(journeyId, 'alice', 'accept');
      await tick();

      expect(result.outcome).toBe('applied');
      expect(journeyRepo.items.get(journeyId)?.stage).toBe('guided_conversation');
      expect(logProvider.eventsAt('warn')).toEqual([
        expect.objectContaining({
          message: `journey ${journeyId}: notification failed`,
          fields: { journeyId, to: 'guided_conversation', error: 'webhook down' },
        }),
      ]);
    });

    it('should end a journey with a default reason', async () => {
      const { journey } = await service.endJourney(journeyId, 'bob');

      expect(journey).toMatchObject({
        stage: 'declined',
        endedBy: 'bob',
        endReason: 'ended_by_participant',
      });
    });

    it('should expire as of the given time', async () => {
      const { journey } = await service.expire(journeyId, at(72));

      expect(journey.stage).toBe('expired');
      expect(notifications.signals).toEqual([
        expect.objectContaining({ from: 'proposed', to: 'expired', actor: null }),
      ]);
    });

    it('should validate input before touching the journey', async () => {
      await expect(service.respond(journeyId, 'alice', 'decline', 'x'.repeat(501))).rejects.toThrow(
        'reason must be 500 characters or less'
      );
      await expect(service.proposeMeeting(journeyId, 'alice', new Date('nope'), 'Cafe')).rejects.toThrow(
        'proposedTime must be a valid date'
      );
      await expect(service.proposeMeeting(journeyId, 'alice', at(50), '   ')).rejects.toThrow(
        'location is required'
      );
      await expect(
        service.proposeMeeting(journeyId, 'alice', at(50), 'x'.repeat(201))
      ).rejects.toThrow('location must be 200 characters or less');
      expect(journeyRepo.swapCalls).toBe(0);
    });

    it('should report an unknown journey', async () => {
      await expect(service.respond('missing', 'alice', 'accept')).rejects.toMatchObject({
        code: 'NOT_FOUND',
        message: 'Journey "missing" not found',
      });
    });

    it('should reject actions from outsiders', async () => {
      await expect(service.respond(journeyId, 'carol', 'accept')).rejects.toMatchObject({
        code: 'FORBIDDEN',
      });
    });
  });
});
