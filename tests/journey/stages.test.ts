import { describe, it, expect } from 'vitest';
import {
  JOURNEY_STAGES,
  STAGE_TRANSITIONS,
  canTransition,
  isJourneyStage,
  isTerminal,
  isValidHistory,
} from '../../src/journey/stages.js';
import type { StageHistoryEntry } from '../../src/types/models.js';

function entry(stage: StageHistoryEntry['stage'], minute: number): StageHistoryEntry {
  return { stage, actor: null, at: new Date(Date.UTC(2025, 5, 1, 10, minute)) };
}

describe('journey stages', () => {
  it('should mark ongoing, declined and expired as terminal', () => {
    expect(JOURNEY_STAGES.filter(isTerminal)).toEqual(['ongoing', 'declined', 'expired']);
  });

  it('should give terminal stages no exits', () => {
    for (const stage of JOURNEY_STAGES.filter(isTerminal)) {
      expect(STAGE_TRANSITIONS[stage]).toEqual([]);
    }
  });

  it('should allow declined and expired from every non-terminal stage', () => {
    for (const stage of JOURNEY_STAGES.filter((s) => !isTerminal(s))) {
      expect(canTransition(stage, 'declined')).toBe(true);
      expect(canTransition(stage, 'expired')).toBe(true);
    }
  });

  it('should follow the forward order and allow the meeting fallback', () => {
    expect(canTransition('proposed', 'mutual_match')).toBe(true);
    expect(canTransition('proposed', 'guided_conversation')).toBe(false);
    expect(canTransition('meeting_proposed', 'guided_conversation')).toBe(true);
    expect(canTransition('meeting_confirmed', 'guided_conversation')).toBe(false);
    expect(canTransition('post_meeting_feedback', 'ongoing')).toBe(true);
    expect(canTransition('ongoing', 'declined')).toBe(false);
  });

  it('should recognise stage names', () => {
    expect(isJourneyStage('meeting_confirmed')).toBe(true);
    expect(isJourneyStage('married')).toBe(false);
  });
});

describe('isValidHistory', () => {
  it('should accept a history that walks the graph forward in time', () => {
    expect(
      isValidHistory([
        entry('proposed', 0),
        entry('mutual_match', 1),
        entry('guided_conversation', 1),
        entry('meeting_proposed', 2),
        entry('guided_conversation', 3),
        entry('declined', 4),
      ])
    ).toBe(true);
  });

  it('should reject an empty history or one not starting at proposed', () => {
    expect(isValidHistory([])).toBe(false);
    expect(isValidHistory([entry('mutual_match', 0)])).toBe(false);
  });

  it('should reject skipped stages', () => {
    expect(isValidHistory([entry('proposed', 0), entry('meeting_proposed', 1)])).toBe(false);
  });

  it('should reject timestamps going backwards', () => {
    expect(isValidHistory([entry('proposed', 5), entry('mutual_match', 4)])).toBe(false);
  });
});
