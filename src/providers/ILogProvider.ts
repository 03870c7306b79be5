/**
 * Structured logging contract.
 * ConsoleLogProvider serves local runs and tests; AxiomLogProvider ships
 * events in production. Both extend BaseLogProvider.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEvent {
  level: LogLevel;
  message: string;
  /** ISO-8601. Providers stamp the current time when it is missing. */
  timestamp?: string;
  fields?: Record<string, unknown>;
}

/** One per HTTP request, emitted by the logging middleware. */
export interface RequestLogEvent extends LogEvent {
  method: string;
  /** Path without the query string, e.g. /api/articles. */
  path: string;
  status: number;
  durationMs: number;
  /** Present when the request carried a valid token. */
  userId?: string;
}

export interface ILogProvider {
  /** Never blocks on delivery. */
  log(event: LogEvent): void;

  /** Resolves once buffered events have been handed off, or the attempt failed. */
  flush(): Promise<void>;

  debug(message: string, fields?: Record<string, unknown>): void;
  info(message: string, fields?: Record<string, unknown>): void;
  warn(message: string, fields?: Record<string, unknown>): void;
  error(message: string, fields?: Record<string, unknown>): void;
}
