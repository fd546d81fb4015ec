/**
 * Meshconf Kernel: Log Event Types
 *
 * A LogEvent is an immutable value. Once built it is either discarded by the
 * ephemeral sink or appended, unchanged and in order, to the durable log.
 */

// ---------------------------------------------------------------------------
// Level
// ---------------------------------------------------------------------------

/**
 * Ordered severity levels. The numeric value is persisted in the durable
 * log, so existing values must never be renumbered.
 */
export enum LogLevel {
  Debug = 0,
  Info = 1,
  Notice = 2,
  Warning = 3,
  Error = 4,
  Fault = 5,
}

/** Display label per level, as written to the durable log and the console. */
export const LOG_LEVEL_LABELS: Readonly<Record<LogLevel, string>> = {
  [LogLevel.Debug]: 'DEBUG',
  [LogLevel.Info]: 'INFO',
  [LogLevel.Notice]: 'NOTICE',
  [LogLevel.Warning]: 'WARNING',
  [LogLevel.Error]: 'ERROR',
  [LogLevel.Fault]: 'FAULT',
};

/** All levels, lowest severity first. */
export const LOG_LEVELS: ReadonlyArray<LogLevel> = [
  LogLevel.Debug,
  LogLevel.Info,
  LogLevel.Notice,
  LogLevel.Warning,
  LogLevel.Error,
  LogLevel.Fault,
];

/**
 * Parse a level from its label ('warning', 'WARNING') or numeric value ('3').
 * Returns undefined for anything else.
 */
export function parseLogLevel(text: string): LogLevel | undefined {
  const trimmed = text.trim();
  if (/^\d+$/.test(trimmed)) {
    const n = Number(trimmed);
    return LOG_LEVELS.find((level) => level === n);
  }
  const upper = trimmed.toUpperCase();
  return LOG_LEVELS.find((level) => LOG_LEVEL_LABELS[level] === upper);
}

// ---------------------------------------------------------------------------
// Event
// ---------------------------------------------------------------------------

/** Messages are cut to this many characters before they reach any sink. */
export const MAX_LOG_MESSAGE_LENGTH = 4000;

export interface LogEvent {
  /** 26-character ULID. The dedupe key when the durable log is read back. */
  readonly id: string;
  /** ISO 8601 creation time. */
  readonly timestamp: string;
  readonly level: LogLevel;
  readonly subsystem: string;
  readonly category: string;
  readonly message: string;
}
