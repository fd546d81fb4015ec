/**
 * Meshconf Kernel: Dual-Sink Logger
 *
 * A leveled logger bound to one subsystem/category pair. Every call:
 *
 *   1. builds an immutable LogEvent (id, timestamp, level, tags, message)
 *   2. writes it synchronously to the ephemeral sink (console by default)
 *   3. if a durable sink is bound process-wide, schedules append(event) on a
 *      microtask and returns without waiting for it
 *
 * Logging never throws. A failing ephemeral write or a rejected durable
 * append is counted and dropped; an unbound durable handle silently skips
 * durable storage. The live view is authoritative, the durable copy is
 * best effort.
 *
 * Events from one logger reach the durable sink in call order: each
 * handoff is queued behind the previous one on the microtask queue.
 */

import { LogLevel, MAX_LOG_MESSAGE_LENGTH } from '../types/log.js';
import type { LogEvent } from '../types/log.js';
import { consoleSink } from './console-sink.js';
import { getDurableSink } from './durable-sink-handle.js';
import type { EphemeralLogSink } from './log-sink.js';
import { ulid } from './ulid.js';

export interface DualSinkLoggerOptions {
  /** Live destination. Default: consoleSink. */
  readonly ephemeral?: EphemeralLogSink | undefined;
  /**
   * Lowest level written to the ephemeral sink. Default: Debug.
   * The durable sink always receives every level.
   */
  readonly minLevel?: LogLevel | undefined;
  /**
   * Set to false for loggers used by the durable sink itself, so a failing
   * flush cannot feed its own error back into the buffer. Default: true.
   */
  readonly durable?: boolean | undefined;
}

export class DualSinkLogger {
  private readonly ephemeral: EphemeralLogSink;
  private readonly minLevel: LogLevel;
  private readonly durable: boolean;
  private ephemeralFailures = 0;
  private durableFailures = 0;

  constructor(
    readonly subsystem: string,
    readonly category: string,
    options: DualSinkLoggerOptions = {},
  ) {
    this.ephemeral = options.ephemeral ?? consoleSink;
    this.minLevel = options.minLevel ?? LogLevel.Debug;
    this.durable = options.durable ?? true;
  }

  debug(message: string): void {
    this.log(LogLevel.Debug, message);
  }

  info(message: string): void {
    this.log(LogLevel.Info, message);
  }

  notice(message: string): void {
    this.log(LogLevel.Notice, message);
  }

  warning(message: string): void {
    this.log(LogLevel.Warning, message);
  }

  error(message: string): void {
    this.log(LogLevel.Error, message);
  }

  fault(message: string): void {
    this.log(LogLevel.Fault, message);
  }

  /** Ephemeral writes that threw and were dropped. */
  get droppedEphemeralWrites(): number {
    return this.ephemeralFailures;
  }

  /** Durable appends that threw or rejected and were dropped. */
  get failedDurableWrites(): number {
    return this.durableFailures;
  }

  log(level: LogLevel, message: string): void {
    const now = Date.now();
    const event: LogEvent = Object.freeze({
      id: ulid(now),
      timestamp: new Date(now).toISOString(),
      level,
      subsystem: this.subsystem,
      category: this.category,
      message: message.length > MAX_LOG_MESSAGE_LENGTH
        ? message.slice(0, MAX_LOG_MESSAGE_LENGTH)
        : message,
    });

    if (level >= this.minLevel) {
      try {
        this.ephemeral.write(event);
      } catch {
        this.ephemeralFailures++;
      }
    }

    if (this.durable) {
      this.persist(event);
    }
  }

  private persist(event: LogEvent): void {
    const sink = getDurableSink();
    if (sink === undefined) return;

    void Promise.resolve()
      .then(() => sink.append(event))
      .catch(() => {
        this.durableFailures++;
      });
  }
}
