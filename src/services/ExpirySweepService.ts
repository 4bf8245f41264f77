/**
 * Deadline sweep.
 * Applies the expire event to every journey whose deadline has passed,
 * through the same locked compare-and-swap path as user actions. Failures
 * are logged per journey and counted; the sweep itself does not throw for them.
 */

import type { IJourneyRepository } from '../repositories/IJourneyRepository.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { JourneyService } from './JourneyService.js';

export interface SweepStats {
  scanned: number;
  /** Moved to expired. */
  expired: number;
  /** Failed meeting request sent back to the conversation. */
  retried: number;
  /** Feedback window closed with partial feedback, moved to ongoing. */
  advanced: number;
  /** Already handled elsewhere since the scan. */
  unchanged: number;
  failed: number;
}

export class ExpirySweepService {
  constructor(
    private readonly journeyRepo: IJourneyRepository,
    private readonly journeyService: JourneyService,
    private readonly logProvider: ILogProvider,
    private readonly batchSize: number
  ) {}

  async sweep(now: Date = new Date()): Promise<SweepStats> {
    const due = await this.journeyRepo.findDue(now, this.batchSize);
    const stats: SweepStats = {
      scanned: due.length,
      expired: 0,
      retried: 0,
      advanced: 0,
      unchanged: 0,
      failed: 0,
    };

    for (const journey of due) {
      try {
        const { outcome, journey: after } = await this.journeyService.expire(journey.id, now);
        if (outcome === 'already_applied') stats.unchanged++;
        else if (after.stage === 'expired') stats.expired++;
        else if (after.stage === 'guided_conversation') stats.retried++;
        else if (after.stage === 'ongoing') stats.advanced++;
        else stats.unchanged++;
      } catch (err) {
        stats.failed++;
        this.logProvider.error(`journey ${journey.id}: expiry failed`, {
          journeyId: journey.id,
          stage: journey.stage,
          error: err instanceof Error ? err.message : String(err),
        });
      }
    }

    this.logProvider.info('Expiry sweep finished', { ...stats, at: now.toISOString() });
    return stats;
  }
}
