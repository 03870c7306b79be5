/**
 * Console log provider, used locally and in tests.
 * Keeps events in memory for inspection and can also print them:
 * warn and error to stderr, everything else to stdout.
 */

import type { LogEvent, LogLevel } from './ILogProvider.js';
import { BaseLogProvider, isAtLeast } from './BaseLogProvider.js';

export interface ConsoleLogProviderOptions {
  /** Print events as they arrive. Default: false. */
  outputToConsole?: boolean;
  /** Default: 'debug' (keep everything). */
  minLevel?: LogLevel;
  /** Keep events in `events`. Default: true. Turn off for long-running processes. */
  retainEvents?: boolean;
}

export class ConsoleLogProvider extends BaseLogProvider {
  /** Retained events, oldest first. */
  readonly events: LogEvent[] = [];

  private readonly outputToConsole: boolean;
  private readonly retainEvents: boolean;

  constructor(options: ConsoleLogProviderOptions = {}) {
    super(options.minLevel);
    this.outputToConsole = options.outputToConsole ?? false;
    this.retainEvents = options.retainEvents ?? true;
  }

  protected write(event: LogEvent): void {
    if (this.retainEvents) this.events.push(event);
    if (!this.outputToConsole) return;

    const extra = event.fields ? ` ${JSON.stringify(event.fields)}` : '';
    const line = `${event.timestamp} [${event.level.toUpperCase()}] ${event.message}${extra}`;
    if (isAtLeast(event.level, 'warn')) {
      console.error(line);
    } else {
      console.log(line);
    }
  }

  async flush(): Promise<void> {
    // Nothing buffered; write() prints synchronously
  }

  clear(): void {
    this.events.length = 0;
  }
}
