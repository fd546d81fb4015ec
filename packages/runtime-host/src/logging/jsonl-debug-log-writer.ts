/**
 * Meshconf Runtime Host: JSONL Debug Log Writer
 *
 * Writes flushed DebugLogBuffer batches to `<home>/logs/debug.jsonl`, one
 * JSON object per line. A batch is appended in a single write.
 *
 * The line schema is what readDebugLog() parses back:
 *   { event_id, timestamp, level, level_label, subsystem, category, message }
 */

import { LOG_LEVEL_LABELS } from '@meshconf/kernel';
import type { LogEvent } from '@meshconf/kernel';
import type { StateIO } from '../state/state-io.js';
import type { DebugLogWriter } from './debug-log-buffer.js';

export const DEBUG_LOG_FILE = 'debug.jsonl';

/** Serialize one event as a debug.jsonl line (no trailing newline). */
export function toDebugLogLine(event: LogEvent): string {
  return JSON.stringify({
    event_id: event.id,
    timestamp: event.timestamp,
    level: event.level,
    level_label: LOG_LEVEL_LABELS[event.level],
    subsystem: event.subsystem,
    category: event.category,
    message: event.message,
  });
}

export class JsonlDebugLogWriter implements DebugLogWriter {
  constructor(
    private readonly stateIO: StateIO,
    private readonly logfilename: string = DEBUG_LOG_FILE,
  ) {}

  write(events: ReadonlyArray<LogEvent>): void {
    this.stateIO.appendLines(this.logfilename, events.map(toDebugLogLine));
  }
}
