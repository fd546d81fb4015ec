import chalk, { type ChalkInstance } from 'chalk'
import { LOG_LEVEL_LABELS, LogLevel } from '@meshconf/kernel'
import type { EphemeralLogSink, LogEvent } from '@meshconf/kernel'

export const t = {
  teal:       chalk.hex('#4DB6AC'),
  tealBright: chalk.hex('#80CBC4'),
  text:       chalk.hex('#C8C8C0'),
  white:      chalk.hex('#F2F2EC'),
  dim:        chalk.hex('#444444'),
  muted:      chalk.hex('#666666'),
  amber:      chalk.hex('#D4880A'),
  green:      chalk.hex('#81C784'),
  red:        chalk.hex('#CF6679'),
} as const

const _levelColors: Record<LogLevel, ChalkInstance> = {
  [LogLevel.Debug]:   t.muted,
  [LogLevel.Info]:    t.text,
  [LogLevel.Notice]:  t.teal,
  [LogLevel.Warning]: t.amber,
  [LogLevel.Error]:   t.red,
  [LogLevel.Fault]:   t.red.bold,
}

export const levelColor = (level: LogLevel): ChalkInstance => _levelColors[level]

/** One colored line per event, without the trailing newline. */
export function renderLogLine(event: LogEvent): string {
  const label = LOG_LEVEL_LABELS[event.level].padEnd(7)
  return (
    t.dim(event.timestamp) + ' ' +
    levelColor(event.level)(label) + ' ' +
    t.muted(`[${event.subsystem}:${event.category}]`) + ' ' +
    event.message
  )
}

/**
 * Ephemeral sink for the CLI. Writes to stderr so `--json` output on stdout
 * stays machine-readable.
 */
export function terminalSink(stream: NodeJS.WritableStream = process.stderr): EphemeralLogSink {
  return {
    write(event: LogEvent): void {
      stream.write(renderLogLine(event) + '\n')
    },
  }
}
