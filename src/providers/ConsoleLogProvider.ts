/**
 * Console-based log provider.
 * Either writes each event to stdout as one JSON line, or buffers events in
 * memory for inspection (useful in tests). Never both: a long-lived function
 * instance would otherwise keep every event it ever logged.
 */

import type { ILogProvider, LogEvent, LogLevel } from './ILogProvider.js';
import { isLevelEnabled } from './ILogProvider.js';

export interface ConsoleLogProviderOptions {
  /** Write events to console.log as they arrive instead of buffering them. Default: false. */
  outputToConsole?: boolean;
  /** Events below this level are dropped. Default: 'debug'. */
  minLevel?: LogLevel;
  /** Merged into the fields of every event (service name, deploy id, ...). */
  baseFields?: Record<string, unknown>;
}

export class ConsoleLogProvider implements ILogProvider {
  /** Inspectable buffer of logged events (most recent last). Empty when writing to console. */
  readonly events: LogEvent[] = [];

  private readonly outputToConsole: boolean;
  private readonly minLevel: LogLevel;
  private readonly baseFields: Record<string, unknown> | undefined;

  constructor(options?: ConsoleLogProviderOptions) {
    this.outputToConsole = options?.outputToConsole ?? false;
    this.minLevel = options?.minLevel ?? 'debug';
    this.baseFields = options?.baseFields;
  }

  log(event: LogEvent): void {
    if (!isLevelEnabled(event.level, this.minLevel)) return;

    const fields =
      this.baseFields || event.fields
        ? { ...this.baseFields, ...event.fields }
        : undefined;

    const stamped: LogEvent = {
      ...event,
      timestamp: event.timestamp ?? new Date().toISOString(),
      ...(fields && { fields }),
    };
    if (this.outputToConsole) {
      console.log(JSON.stringify(stamped));
    } else {
      this.events.push(stamped);
    }
  }

  async flush(): Promise<void> {
    // Nothing to flush, events are written synchronously.
  }

  info(message: string, fields?: Record<string, unknown>): void {
    this.log({ level: 'info', message, fields });
  }

  warn(message: string, fields?: Record<string, unknown>): void {
    this.log({ level: 'warn', message, fields });
  }

  error(message: string, fields?: Record<string, unknown>): void {
    this.log({ level: 'error', message, fields });
  }

  debug(message: string, fields?: Record<string, unknown>): void {
    this.log({ level: 'debug', message, fields });
  }

  /** Events at the given level, oldest first. */
  eventsAt(level: LogLevel): LogEvent[] {
    return this.events.filter((event) => event.level === level);
  }

  /** Clear the event buffer. Useful between test cases. */
  clear(): void {
    this.events.length = 0;
  }
}
