/**
 * Meshconf Kernel: Process-wide Durable Sink Handle
 *
 * Loggers are created early (often at module load), before the storage
 * layer exists. They read this handle on every call and drop the durable
 * write while it is unbound. The runtime binds it once storage is
 * initialized.
 */

import type { DurableLogSink } from './log-sink.js';

let boundSink: DurableLogSink | undefined;

/** Bind the process-wide durable sink. Replaces any previous binding. */
export function bindDurableSink(sink: DurableLogSink): void {
  boundSink = sink;
}

/** Clear the binding. Subsequent log calls skip durable storage. */
export function unbindDurableSink(): void {
  boundSink = undefined;
}

/** The bound durable sink, or undefined before bindDurableSink(). */
export function getDurableSink(): DurableLogSink | undefined {
  return boundSink;
}
