/**
 * Meshconf Kernel: Log Sink Interfaces
 *
 * DualSinkLogger writes every event to two destinations:
 *
 *   EphemeralLogSink  live view (console / system log), written synchronously
 *                     on the caller's stack; best effort
 *   DurableLogSink    append-only store, handed the event on a microtask so
 *                     its latency never reaches the caller
 *
 * The kernel owns both contracts. The durable implementation
 * (DebugLogBuffer) lives in the runtime host and is bound into the
 * process-wide handle once storage is ready.
 */

import type { LogEvent } from '../types/log.js';

/**
 * Live log destination.
 *
 * write() must be fast. A throw is treated as a dropped line, never
 * propagated to the code that logged.
 */
export interface EphemeralLogSink {
  write(event: LogEvent): void;
}

/**
 * Durable log destination.
 *
 * append() must be safe to call from concurrent callers. Events from a
 * single caller must be kept in submission order; once accepted, an event
 * must not be lost or reordered. The return value is not awaited by loggers.
 */
export interface DurableLogSink {
  append(event: LogEvent): void | Promise<void>;
}
