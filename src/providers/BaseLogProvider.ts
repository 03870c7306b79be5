/**
 * Shared front half of every log provider: level filtering, timestamping
 * and the convenience methods. Subclasses decide where a kept event goes.
 */

import type { ILogProvider, LogEvent, LogLevel } from './ILogProvider.js';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function isAtLeast(level: LogLevel, threshold: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[threshold];
}

export abstract class BaseLogProvider implements ILogProvider {
  /** @param minLevel events below this level are dropped */
  protected constructor(private readonly minLevel: LogLevel = 'debug') {}

  log(event: LogEvent): void {
    if (!isAtLeast(event.level, this.minLevel)) return;

    this.write({
      ...event,
      timestamp: event.timestamp ?? new Date().toISOString(),
    });
  }

  abstract flush(): Promise<void>;

  /** Receives events that passed the level filter, always timestamped. */
  protected abstract write(event: LogEvent): void;

  debug(message: string, fields?: Record<string, unknown>): void {
    this.log({ level: 'debug', message, fields });
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
}
