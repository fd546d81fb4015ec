/**
 * Meshconf Runtime Host: Debug Log Buffer
 *
 * The durable sink behind every DualSinkLogger. Events are collected in
 * memory and written to a DebugLogWriter in batches:
 *
 *   - as soon as the buffer holds `maxBufferSize` events
 *   - `flushIntervalMs` after the first event of a batch arrived
 *   - on an explicit flush() or shutdown()
 *
 * Flushes never overlap: each one is chained behind the previous, so
 * batches reach the writer in the order their events were appended.
 *
 * A failed write is reported through this buffer's own logger (which is
 * opted out of durable storage). Up to `maxBufferSize` of the failed events
 * go back to the front of the buffer for the next attempt, unless that would
 * push the buffer to `2 * maxBufferSize`; then the batch is dropped.
 */

import { DualSinkLogger, describeError } from '@meshconf/kernel';
import type { DurableLogSink, LogEvent } from '@meshconf/kernel';

/** Destination of flushed batches (a JSONL file in production). */
export interface DebugLogWriter {
  write(events: ReadonlyArray<LogEvent>): void | Promise<void>;
}

export interface DebugLogBufferOptions {
  /** Events held before a flush is forced. Default: 50. */
  readonly maxBufferSize?: number | undefined;
  /** Delay between the first buffered event and the timed flush. Default: 5000. */
  readonly flushIntervalMs?: number | undefined;
  readonly logger?: DualSinkLogger | undefined;
}

export const DEFAULT_MAX_BUFFER_SIZE = 50;
export const DEFAULT_FLUSH_INTERVAL_MS = 5000;

export class DebugLogBuffer implements DurableLogSink {
  private readonly maxBufferSize: number;
  private readonly flushIntervalMs: number;
  private readonly logger: DualSinkLogger;

  private buffer: LogEvent[] = [];
  private timer: NodeJS.Timeout | undefined;
  private flushChain: Promise<void> = Promise.resolve();
  private closed = false;
  private written = 0;
  private dropped = 0;

  constructor(
    private readonly writer: DebugLogWriter,
    options: DebugLogBufferOptions = {},
  ) {
    this.maxBufferSize = Math.max(1, options.maxBufferSize ?? DEFAULT_MAX_BUFFER_SIZE);
    this.flushIntervalMs = Math.max(0, options.flushIntervalMs ?? DEFAULT_FLUSH_INTERVAL_MS);
    this.logger = options.logger ?? new DualSinkLogger('meshconf.runtime', 'DebugLogBuffer', { durable: false });
  }

  /** Events waiting for the next flush. */
  get pending(): number {
    return this.buffer.length;
  }

  /** Events handed to the writer successfully. */
  get writtenCount(): number {
    return this.written;
  }

  /** Events discarded after a failed write could not be re-queued. */
  get droppedCount(): number {
    return this.dropped;
  }

  append(event: LogEvent): Promise<void> {
    this.buffer.push(event);
    // After shutdown there is no timer to wait for.
    if (this.closed || this.buffer.length >= this.maxBufferSize) {
      return this.flush();
    }
    this.scheduleFlush();
    return Promise.resolve();
  }

  /** Write everything buffered now. Resolves once the write has finished or failed. */
  flush(): Promise<void> {
    this.cancelTimer();
    this.flushChain = this.flushChain.then(() => this.drain());
    return this.flushChain;
  }

  /**
   * Stop the timer and write what is left.
   *
   * Later appends are not held for a timer: each one starts a flush. Appends
   * made in the same tick share one writer call, since the queued flush takes
   * everything buffered when it runs; appends spread over time cost one
   * writer call (one file append for JsonlDebugLogWriter) each. This suits
   * the few events logged while a process exits; a long-lived process should
   * not keep logging into a buffer it has shut down.
   */
  async shutdown(): Promise<void> {
    this.closed = true;
    await this.flush();
  }

  private scheduleFlush(): void {
    if (this.timer !== undefined || this.closed) return;
    this.timer = setTimeout(() => {
      this.timer = undefined;
      void this.flush();
    }, this.flushIntervalMs);
    this.timer.unref();
  }

  private cancelTimer(): void {
    if (this.timer === undefined) return;
    clearTimeout(this.timer);
    this.timer = undefined;
  }

  private async drain(): Promise<void> {
    if (this.buffer.length === 0) return;
    const batch = this.buffer;
    this.buffer = [];

    try {
      await this.writer.write(batch);
      this.written += batch.length;
    } catch (err: unknown) {
      this.logger.error(`Failed to write ${batch.length} debug log entries: ${describeError(err)}`);
      this.requeue(batch);
    }
  }

  private requeue(batch: ReadonlyArray<LogEvent>): void {
    const retry = batch.slice(0, this.maxBufferSize);
    if (this.buffer.length + retry.length < 2 * this.maxBufferSize) {
      this.buffer = [...retry, ...this.buffer];
      this.dropped += batch.length - retry.length;
      this.scheduleFlush();
    } else {
      this.dropped += batch.length;
      this.logger.warning(`Dropped ${batch.length} debug log entries: buffer is full`);
    }
  }
}
