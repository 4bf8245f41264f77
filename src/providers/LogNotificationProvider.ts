/**
 * Notification provider that only records transitions in the log.
 * Used when no webhook is configured.
 */

import type { ILogProvider } from './ILogProvider.js';
import type { INotificationProvider, StageTransitionSignal } from './INotificationProvider.js';

export class LogNotificationProvider implements INotificationProvider {
  constructor(private readonly logProvider: ILogProvider) {}

  async notify(signal: StageTransitionSignal): Promise<void> {
    this.logProvider.info(`journey ${signal.journeyId}: ${signal.from} → ${signal.to}`, {
      journeyId: signal.journeyId,
      from: signal.from,
      to: signal.to,
      actor: signal.actor,
      version: signal.version,
    });
  }
}
