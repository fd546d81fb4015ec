/**
 * Meshconf CLI: Command Tests
 *
 * Each test parses a fresh program against its own temp home. Console
 * output is captured; the terminal log sink is silenced through
 * MESHCONF_LOG_LEVEL.
 *
 *   CLI-U1: register, set and show round-trip through the file store
 *   CLI-U2: ocv applies the custom-curve policy and battery uses the curve
 *   CLI-U3: failures print an error and set a non-zero exit code
 *   CLI-U4: log reads back what earlier invocations wrote
 *   CLI-U5: log option parsing
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { MockInstance } from 'vitest';
import { mkdirSync, mkdtempSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { LogLevel } from '@meshconf/kernel';
import { createProgram } from '../src/commands/index.js';
import { parseLogFilter } from '../src/commands/log.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const ANSI = /\u001b\[[0-9;]*m/g;

let home: string;
let logSpy: MockInstance<typeof console.log>;
let errorSpy: MockInstance<typeof console.log>;
let savedLevel: string | undefined;

async function run(...args: string[]): Promise<void> {
  await createProgram().exitOverride().parseAsync(['--home', home, ...args], { from: 'user' });
}

function printed(spy: MockInstance<typeof console.log>): string[] {
  return spy.mock.calls.map((call) => String(call[0]).replace(ANSI, ''));
}

function lastJson(): unknown {
  const lines = printed(logSpy);
  return JSON.parse(lines[lines.length - 1] ?? 'null');
}

beforeEach(() => {
  home = mkdtempSync(`${tmpdir()}/meshconf-cli-`);
  savedLevel = process.env['MESHCONF_LOG_LEVEL'];
  process.env['MESHCONF_LOG_LEVEL'] = 'fault';
  logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
  errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
});

afterEach(() => {
  vi.restoreAllMocks();
  process.exitCode = undefined;
  if (savedLevel === undefined) {
    delete process.env['MESHCONF_LOG_LEVEL'];
  } else {
    process.env['MESHCONF_LOG_LEVEL'] = savedLevel;
  }
});

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('meshconf CLI-U1: device records', () => {
  it('registers, updates one field and keeps the others', async () => {
    await run('device', 'register', 'node-a', '--field', 'long_name=Base', 'hop_limit=3');
    await run('device', 'set', 'node-a', 'hop_limit=5');
    await run('device', 'show', 'node-a', '--json');

    expect(printed(logSpy).slice(0, 2)).toEqual([
      'registered node-a at revision 0',
      'saved node-a at revision 1',
    ]);
    expect(lastJson()).toMatchObject({
      device_id: 'node-a',
      revision: 1,
      fields: { long_name: 'Base', hop_limit: 5 },
    });
    expect(process.exitCode).toBeUndefined();
  });

  it('lists registered devices as JSON', async () => {
    await run('device', 'register', 'node-b');
    await run('device', 'register', 'node-a');
    await run('device', 'list', '--json');

    const listed = lastJson();
    expect(Array.isArray(listed)).toBe(true);
    expect(Array.isArray(listed) ? listed.map((d: { device_id: string }) => d.device_id) : []).toEqual([
      'node-a',
      'node-b',
    ]);
  });
});

describe('meshconf CLI-U2: battery curves', () => {
  it('rejects the custom preset without a curve under the default policy', async () => {
    await run('device', 'register', 'node-a');
    await run('device', 'ocv', 'node-a', 'custom');

    expect(process.exitCode).toBe(1);
    expect(printed(errorSpy)).toEqual([
      "error: Invalid update: preset 'custom' requires a custom OCV array (invalid_update)",
    ]);
  });

  it('estimates charge on the selected curve', async () => {
    await run('device', 'register', 'node-a');
    await run('device', 'battery', 'node-a', '3720');
    await run('device', 'ocv', 'node-a', 'custom', '--custom', '4200,4100,4000,3900,3800,3700,3600,3500,3400,3300,3200');
    await run('device', 'battery', 'node-a', '3750');

    expect(printed(logSpy)).toEqual([
      'registered node-a at revision 0',
      'node-a: 3720 mV = 50% (liIon)',
      'saved node-a at revision 1',
      'node-a: 3750 mV = 55% (custom)',
    ]);
  });
});

describe('meshconf CLI-U3: failures', () => {
  it('reports an unknown device', async () => {
    await run('device', 'set', 'ghost', 'a=1');

    expect(process.exitCode).toBe(1);
    expect(printed(errorSpy)).toEqual(['error: Device not found: ghost (not_found)']);
  });

  it('reports a malformed assignment before touching the store', async () => {
    await run('device', 'set', 'node-a', 'nonsense');

    expect(process.exitCode).toBe(1);
    expect(printed(errorSpy)).toEqual(["error: expected key=value, got 'nonsense'"]);
  });

  it('applies the custom-curve policy to ocv_preset set as a plain field', async () => {
    await run('device', 'register', 'node-a');
    await run('device', 'set', 'node-a', 'ocv_preset=custom');

    expect(process.exitCode).toBe(1);
    expect(printed(errorSpy)).toEqual([
      "error: Invalid update: preset 'custom' requires a custom OCV array (invalid_update)",
    ]);
  });

  it('reports an unreadable record instead of a missing one', async () => {
    mkdirSync(join(home, 'state'), { recursive: true });
    writeFileSync(join(home, 'state', 'device-node-a.json'), '{"device_id":', 'utf-8');

    await run('device', 'show', 'node-a');

    expect(process.exitCode).toBe(1);
    const [line] = printed(errorSpy);
    expect(line?.startsWith('error: Failed to read device node-a: state file device-node-a.json is not valid JSON: ')).toBe(true);
  });

  it('refuses a duplicate registration', async () => {
    await run('device', 'register', 'node-a');
    await run('device', 'register', 'node-a');

    expect(process.exitCode).toBe(1);
    expect(printed(errorSpy)).toEqual(["error: device 'node-a' is already registered"]);
  });
});

describe('meshconf CLI-U4: debug log', () => {
  it('shows events persisted by earlier commands', async () => {
    await run('device', 'register', 'node-a');
    await run('device', 'set', 'node-a', 'region=EU_868');
    await run('log', '--subsystem', 'meshconf.kernel', '--json');

    const result = lastJson();
    const messages =
      typeof result === 'object' && result !== null && 'events' in result && Array.isArray(result.events)
        ? result.events.map((e: { message: string }) => e.message)
        : [];
    // Both events can share a millisecond, so their order is not asserted.
    expect([...messages].sort()).toEqual([
      'Saved device node-a at revision 1',
      'Updating device node-a: set region',
    ]);
  });
});

describe('meshconf CLI-U5: log filter options', () => {
  it('parses every option', () => {
    expect(
      parseLogFilter({ level: 'warning', subsystem: 'meshconf.kernel', since: '2026-03-01T00:00:00Z', limit: '5' }),
    ).toEqual({
      ok: true,
      filter: {
        minLevel: LogLevel.Warning,
        subsystem: 'meshconf.kernel',
        since: new Date('2026-03-01T00:00:00Z'),
        limit: 5,
      },
    });
  });

  it('rejects bad values', () => {
    expect(parseLogFilter({ level: 'loud' })).toEqual({ ok: false, error: "unknown level 'loud'" });
    expect(parseLogFilter({ since: 'yesterday' })).toEqual({ ok: false, error: "--since is not a date: 'yesterday'" });
    expect(parseLogFilter({ limit: '-1' })).toEqual({ ok: false, error: "--limit must be a whole number, got '-1'" });
  });
});
