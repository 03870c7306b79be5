/**
 * Axiom log provider.
 * Queues events and posts them in batches to the dataset's ingest endpoint.
 * log() never waits on the network. A failed post leaves its batch queued
 * for the next flush and goes to `onFlushError`; the queue is capped and the
 * oldest events go first once it is full.
 * An empty apiToken turns the provider into a no-op.
 */

import type { LogEvent, LogLevel } from './ILogProvider.js';
import { BaseLogProvider } from './BaseLogProvider.js';

export interface AxiomLogProviderOptions {
  /** Bearer token. Empty disables sending. */
  apiToken: string;
  dataset: string;
  /** Flush once this many events are queued. Default: 50. */
  flushThreshold?: number;
  /** Timer-driven flush interval in ms. Default: 10_000. 0 disables the timer. */
  flushIntervalMs?: number;
  /** Default: 1000. */
  maxBufferSize?: number;
  /** Default: 'debug'. */
  minLevel?: LogLevel;
  /** Default: prints to stderr. */
  onFlushError?: (error: Error) => void;
}

const INGEST_BASE_URL = 'https://api.axiom.co/v1/datasets';

export class AxiomLogProvider extends BaseLogProvider {
  private queue: LogEvent[] = [];
  /** Sequence number of queue[0]; advances as events leave the head. */
  private headSeq = 0;
  private inFlight: Promise<void> | null = null;
  private timer: ReturnType<typeof setInterval> | null = null;
  private readonly enabled: boolean;
  private readonly ingestUrl: string;
  private readonly apiToken: string;
  private readonly flushThreshold: number;
  private readonly maxBufferSize: number;
  private readonly onFlushError: (error: Error) => void;

  constructor(options: AxiomLogProviderOptions) {
    super(options.minLevel);
    this.apiToken = options.apiToken;
    this.enabled = options.apiToken.length > 0;
    this.ingestUrl = `${INGEST_BASE_URL}/${options.dataset}/ingest`;
    this.flushThreshold = options.flushThreshold ?? 50;
    this.maxBufferSize = options.maxBufferSize ?? 1000;
    this.onFlushError =
      options.onFlushError ?? ((error) => console.error(`[axiom] ${error.message}`));

    const intervalMs = options.flushIntervalMs ?? 10_000;
    if (this.enabled && intervalMs > 0) {
      this.timer = setInterval(() => void this.flush(), intervalMs);
      this.timer.unref();
    }
  }

  /** Events queued and not yet accepted by Axiom. */
  get pending(): number {
    return this.queue.length;
  }

  protected write(event: LogEvent): void {
    if (!this.enabled) return;

    this.queue.push(event);
    const overflow = this.queue.length - this.maxBufferSize;
    if (overflow > 0) this.dropHead(overflow);

    if (this.queue.length >= this.flushThreshold) {
      void this.flush();
    }
  }

  /** Flushes run one at a time; a call made mid-flight waits its turn. */
  async flush(): Promise<void> {
    const run: Promise<void> = this.inFlight
      ? this.inFlight.then(() => this.send())
      : this.send();
    this.inFlight = run;
    try {
      await run;
    } finally {
      if (this.inFlight === run) this.inFlight = null;
    }
  }

  private async send(): Promise<void> {
    if (!this.enabled || this.queue.length === 0) return;

    const batch = this.queue.slice();
    const endSeq = this.headSeq + batch.length;
    let response: Response;
    try {
      response = await fetch(this.ingestUrl, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${this.apiToken}`,
        },
        body: JSON.stringify(batch),
      });
    } catch (err) {
      this.onFlushError(err instanceof Error ? err : new Error(String(err)));
      return;
    }

    if (!response.ok) {
      this.onFlushError(new Error(`Axiom ingest failed with status ${response.status}`));
      return;
    }

    // Overflow may already have dropped part of the batch from the head
    this.dropHead(Math.max(0, endSeq - this.headSeq));
  }

  private dropHead(count: number): void {
    this.queue.splice(0, count);
    this.headSeq += count;
  }

  /** Stop the timer and send whatever is left. */
  async dispose(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    await this.flush();
  }
}
