import { t } from '../tui/theme.js';

/** Print an operator-facing error on stderr and mark the process as failed. */
export function fail(message: string): void {
  // eslint-disable-next-line no-console
  console.error(`${t.red('error:')} ${message}`);
  process.exitCode = 1;
}

export function printJson(value: unknown): void {
  // eslint-disable-next-line no-console
  console.log(JSON.stringify(value, null, 2));
}
