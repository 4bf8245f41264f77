/**
 * Journey stages and the legal transition graph.
 */

import type { JourneyStage, StageHistoryEntry } from '../types/models.js';

export const JOURNEY_STAGES: readonly JourneyStage[] = [
  'proposed',
  'mutual_match',
  'guided_conversation',
  'meeting_proposed',
  'meeting_confirmed',
  'post_meeting_feedback',
  'ongoing',
  'declined',
  'expired',
];

export const TERMINAL_STAGES: readonly JourneyStage[] = ['ongoing', 'declined', 'expired'];

/** Declined and expired are reachable from every non-terminal stage. */
const EXITS: readonly JourneyStage[] = ['declined', 'expired'];

export const STAGE_TRANSITIONS: Readonly<Record<JourneyStage, readonly JourneyStage[]>> = {
  proposed: ['mutual_match', ...EXITS],
  mutual_match: ['guided_conversation', ...EXITS],
  guided_conversation: ['meeting_proposed', ...EXITS],
  // Back to the conversation when a meeting request is declined or lapses.
  meeting_proposed: ['meeting_confirmed', 'guided_conversation', ...EXITS],
  meeting_confirmed: ['post_meeting_feedback', ...EXITS],
  post_meeting_feedback: ['ongoing', ...EXITS],
  ongoing: [],
  declined: [],
  expired: [],
};

export function isTerminal(stage: JourneyStage): boolean {
  return TERMINAL_STAGES.includes(stage);
}

export function canTransition(from: JourneyStage, to: JourneyStage): boolean {
  return STAGE_TRANSITIONS[from].includes(to);
}

export function isJourneyStage(value: string): value is JourneyStage {
  return JOURNEY_STAGES.some((stage) => stage === value);
}

/** True when the history starts at `proposed` and every step is an edge of the graph. */
export function isValidHistory(history: readonly StageHistoryEntry[]): boolean {
  if (history.length === 0 || history[0].stage !== 'proposed') return false;

  for (let index = 1; index < history.length; index += 1) {
    const previous = history[index - 1];
    const current = history[index];
    if (!canTransition(previous.stage, current.stage)) return false;
    if (current.at.getTime() < previous.at.getTime()) return false;
  }
  return true;
}
