/**
 * Meshconf Runtime Host: Debug Log Reader
 *
 * Pure function that turns the raw text of debug.jsonl back into LogEvents.
 *
 *   LOGR-U1: valid lines are parsed; malformed lines are dropped and counted
 *   LOGR-U2: events are deduplicated by event_id, first seen wins
 *   LOGR-U3: a content without a final '\n' has its partial last line dropped
 *   LOGR-U4: more than one timestamp regression in file order sets outOfOrder
 *   LOGR-U5: output is sorted by (timestamp asc, event_id asc)
 *   LOGR-U6: filters apply after sorting; `limit` keeps the newest N
 *
 * No I/O. Callers obtain the content through StateIO.readLogRaw().
 */

import { LOG_LEVELS } from '@meshconf/kernel';
import type { LogEvent, LogLevel } from '@meshconf/kernel';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface DebugLogFilter {
  /** Drop events below this level. */
  readonly minLevel?: LogLevel | undefined;
  /** Keep only events from this subsystem (exact match). */
  readonly subsystem?: string | undefined;
  /** Keep only events at or after this instant. */
  readonly since?: Date | undefined;
  /** Keep only the newest N events. */
  readonly limit?: number | undefined;
}

export interface LogReadStats {
  /** Complete, non-empty lines processed. */
  totalLines: number;
  /** Unique events parsed, before filtering. */
  parsedEvents: number;
  /** Events dropped because their event_id was already seen. */
  duplicates: number;
  /** Lines dropped because they did not parse as a debug log entry. */
  parseErrors: number;
  /** True if the content did not end with '\n'; the last line was dropped. */
  partialTrailingLine: boolean;
  /** True if more than one timestamp regression was seen in file order. */
  outOfOrder: boolean;
  /** Events removed by the filter. */
  filtered: number;
}

export interface LogReadResult {
  events: ReadonlyArray<LogEvent>;
  stats: LogReadStats;
}

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseLine(line: string): LogEvent | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch {
    return undefined;
  }
  if (!isRecord(parsed)) return undefined;

  const { event_id, timestamp, level, subsystem, category, message } = parsed;
  if (
    typeof event_id !== 'string' ||
    typeof timestamp !== 'string' ||
    typeof subsystem !== 'string' ||
    typeof category !== 'string' ||
    typeof message !== 'string'
  ) {
    return undefined;
  }
  const knownLevel = LOG_LEVELS.find((l) => l === level);
  if (knownLevel === undefined) return undefined;

  return { id: event_id, timestamp, level: knownLevel, subsystem, category, message };
}

function compareEvents(a: LogEvent, b: LogEvent): number {
  if (a.timestamp < b.timestamp) return -1;
  if (a.timestamp > b.timestamp) return 1;
  if (a.id < b.id) return -1;
  if (a.id > b.id) return 1;
  return 0;
}

function matches(event: LogEvent, filter: DebugLogFilter): boolean {
  if (filter.minLevel !== undefined && event.level < filter.minLevel) return false;
  if (filter.subsystem !== undefined && event.subsystem !== filter.subsystem) return false;
  if (filter.since !== undefined && Date.parse(event.timestamp) < filter.since.getTime()) return false;
  return true;
}

// ---------------------------------------------------------------------------
// readDebugLog
// ---------------------------------------------------------------------------

export function readDebugLog(rawContent: string, filter: DebugLogFilter = {}): LogReadResult {
  const partialTrailingLine = rawContent.length > 0 && !rawContent.endsWith('\n');
  const rawLines = rawContent.split('\n');
  const lines = (partialTrailingLine ? rawLines.slice(0, -1) : rawLines).filter((l) => l.trim().length > 0);

  let duplicates = 0;
  let parseErrors = 0;
  const seen = new Set<string>();
  const fileOrder: LogEvent[] = [];

  for (const line of lines) {
    const event = parseLine(line);
    if (event === undefined) {
      parseErrors++;
      continue;
    }
    if (seen.has(event.id)) {
      duplicates++;
      continue;
    }
    seen.add(event.id);
    fileOrder.push(event);
  }

  let regressions = 0;
  for (let i = 1; i < fileOrder.length; i++) {
    const prev = fileOrder[i - 1];
    const curr = fileOrder[i];
    if (prev !== undefined && curr !== undefined && curr.timestamp < prev.timestamp) {
      regressions++;
    }
  }

  const sorted = [...fileOrder].sort(compareEvents);
  let events = sorted.filter((e) => matches(e, filter));
  if (filter.limit !== undefined && events.length > filter.limit) {
    events = events.slice(events.length - Math.max(0, filter.limit));
  }

  return {
    events,
    stats: {
      totalLines: lines.length,
      parsedEvents: fileOrder.length,
      duplicates,
      parseErrors,
      partialTrailingLine,
      outOfOrder: regressions > 1,
      filtered: sorted.length - events.length,
    },
  };
}
