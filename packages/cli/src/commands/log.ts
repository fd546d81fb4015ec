/**
 * meshconf log: Query the debug log
 *
 * Reads `<home>/logs/debug.jsonl` through readDebugLog(): duplicates are
 * dropped, a half-written last line is ignored, and events are shown oldest
 * first. --limit keeps the newest N after the other filters.
 */

import { Command } from 'commander';
import { parseLogLevel } from '@meshconf/kernel';
import { DEBUG_LOG_FILE, readDebugLog } from '@meshconf/runtime-host';
import type { DebugLogFilter } from '@meshconf/runtime-host';
import { withRuntime } from '../runtime.js';
import { renderLogLine, t } from '../tui/theme.js';
import { fail, printJson } from './report.js';

interface LogOptions {
  level?: string;
  subsystem?: string;
  since?: string;
  limit?: string;
  json?: boolean;
}

/** Turn CLI option strings into a filter, or an error message. */
export function parseLogFilter(options: LogOptions): { ok: true; filter: DebugLogFilter } | { ok: false; error: string } {
  const filter: { -readonly [K in keyof DebugLogFilter]: DebugLogFilter[K] } = {};

  if (options.level !== undefined) {
    const level = parseLogLevel(options.level);
    if (level === undefined) return { ok: false, error: `unknown level '${options.level}'` };
    filter.minLevel = level;
  }
  if (options.subsystem !== undefined) {
    filter.subsystem = options.subsystem;
  }
  if (options.since !== undefined) {
    const since = new Date(options.since);
    if (Number.isNaN(since.getTime())) return { ok: false, error: `--since is not a date: '${options.since}'` };
    filter.since = since;
  }
  if (options.limit !== undefined) {
    if (!/^\d+$/.test(options.limit)) return { ok: false, error: `--limit must be a whole number, got '${options.limit}'` };
    filter.limit = Number(options.limit);
  }
  return { ok: true, filter };
}

export function logCommand(): Command {
  return new Command('log')
    .description('Show the debug log')
    .option('--level <level>', 'Minimum level (debug|info|notice|warning|error|fault or 0-5)')
    .option('--subsystem <name>', 'Only events from this subsystem')
    .option('--since <iso-date>', 'Only events at or after this ISO 8601 time')
    .option('--limit <n>', 'Show at most the newest n events', '100')
    .option('--json', 'Output as JSON')
    .action(async (options: LogOptions, cmd: Command) => {
      const parsed = parseLogFilter(options);
      if (!parsed.ok) {
        fail(parsed.error);
        return;
      }

      await withRuntime(cmd, async (rt) => {
        const { events, stats } = readDebugLog(rt.stateIO.readLogRaw(DEBUG_LOG_FILE), parsed.filter);

        if (options.json === true) {
          printJson({ events, stats });
          return;
        }

        /* eslint-disable no-console */
        if (events.length === 0) {
          console.log('No matching log entries.');
        }
        for (const event of events) {
          console.log(renderLogLine(event));
        }
        const skipped = stats.parseErrors + stats.duplicates;
        if (skipped > 0 || stats.partialTrailingLine) {
          console.log(
            t.muted(
              `(${stats.parseErrors} malformed, ${stats.duplicates} duplicate` +
              (stats.partialTrailingLine ? ', partial last line' : '') + ' skipped)',
            ),
          );
        }
        /* eslint-enable no-console */
      });
    });
}
