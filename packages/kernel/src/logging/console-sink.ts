/**
 * Meshconf Kernel: Console Sink
 *
 * Default ephemeral sink. One line per event on the console method matching
 * the severity, so terminals and process supervisors keep their own
 * stdout/stderr split.
 */

import { LOG_LEVEL_LABELS, LogLevel } from '../types/log.js';
import type { LogEvent } from '../types/log.js';
import type { EphemeralLogSink } from './log-sink.js';

/**
 * Format an event as a single console line:
 * `<timestamp> <LABEL> [<subsystem>:<category>] <message>`
 */
export function formatLogLine(event: LogEvent): string {
  const label = LOG_LEVEL_LABELS[event.level];
  return `${event.timestamp} ${label} [${event.subsystem}:${event.category}] ${event.message}`;
}

export const consoleSink: EphemeralLogSink = {
  write(event: LogEvent): void {
    const line = formatLogLine(event);
    /* eslint-disable no-console */
    switch (event.level) {
      case LogLevel.Debug:
        console.debug(line);
        break;
      case LogLevel.Info:
      case LogLevel.Notice:
        console.info(line);
        break;
      case LogLevel.Warning:
        console.warn(line);
        break;
      case LogLevel.Error:
      case LogLevel.Fault:
        console.error(line);
        break;
    }
    /* eslint-enable no-console */
  },
};
