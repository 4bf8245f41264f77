/**
 * Notification collaborator interface.
 * Informed of every journey stage transition. Delivery is best effort:
 * the journey service never waits on it and never fails because of it.
 */

import type { JourneyStage } from '../types/models.js';

export interface StageTransitionSignal {
  journeyId: string;
  participants: [string, string];
  from: JourneyStage;
  to: JourneyStage;
  /** Null for system-driven transitions (deadline sweep). */
  actor: string | null;
  at: string;
  version: number;
}

export interface INotificationProvider {
  notify(signal: StageTransitionSignal): Promise<void>;
}
