/**
 * Meshconf Runtime Host: Settings
 *
 * Operator settings are read from `<home>/settings.json` and layered:
 *
 *   defaults  <  settings.json  <  environment
 *
 * settings.json keys:     log_level, custom_ocv_policy,
 *                         log_flush_interval_ms, log_buffer_size
 * environment overrides:  MESHCONF_LOG_LEVEL, MESHCONF_CUSTOM_OCV_POLICY,
 *                         MESHCONF_LOG_FLUSH_MS
 *
 * A value that does not validate is ignored (the lower layer stays in
 * effect) and reported in `warnings`. The file itself failing to parse is
 * reported the same way.
 */

import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { LogLevel, parseLogLevel } from '@meshconf/kernel';
import type { CustomOcvPolicy } from '@meshconf/kernel';
import { isNodeError } from '../state/state-io.js';
import { DEFAULT_FLUSH_INTERVAL_MS, DEFAULT_MAX_BUFFER_SIZE } from '../logging/debug-log-buffer.js';

export const SETTINGS_FILE = 'settings.json';

export interface MeshconfSettings {
  /** Lowest level shown on the terminal. The debug log keeps every level. */
  readonly logLevel: LogLevel;
  readonly customOcvPolicy: CustomOcvPolicy;
  readonly logFlushIntervalMs: number;
  readonly logBufferSize: number;
}

export const DEFAULT_SETTINGS: MeshconfSettings = {
  logLevel: LogLevel.Info,
  customOcvPolicy: 'reject',
  logFlushIntervalMs: DEFAULT_FLUSH_INTERVAL_MS,
  logBufferSize: DEFAULT_MAX_BUFFER_SIZE,
};

export interface LoadSettingsResult {
  readonly settings: MeshconfSettings;
  readonly warnings: ReadonlyArray<string>;
}

type Env = Readonly<Record<string, string | undefined>>;

// ---------------------------------------------------------------------------
// Value parsers
// ---------------------------------------------------------------------------

function parsePolicy(value: unknown): CustomOcvPolicy | undefined {
  return value === 'reject' || value === 'allow_absent' ? value : undefined;
}

function parseLevel(value: unknown): LogLevel | undefined {
  if (typeof value === 'string') return parseLogLevel(value);
  if (typeof value === 'number') return parseLogLevel(String(value));
  return undefined;
}

function parsePositiveInt(value: unknown): number | undefined {
  const n = typeof value === 'string' && /^\d+$/.test(value.trim()) ? Number(value) : value;
  return typeof n === 'number' && Number.isInteger(n) && n > 0 ? n : undefined;
}

// ---------------------------------------------------------------------------
// loadSettings
// ---------------------------------------------------------------------------

export function loadSettings(homeDir: string, env: Env = process.env): LoadSettingsResult {
  const warnings: string[] = [];
  const file = readSettingsFile(join(homeDir, SETTINGS_FILE), warnings);

  function pick<T>(
    source: string,
    raw: unknown,
    parse: (value: unknown) => T | undefined,
    fallback: T,
  ): T {
    if (raw === undefined) return fallback;
    const parsed = parse(raw);
    if (parsed === undefined) {
      warnings.push(`ignoring invalid ${source}: ${JSON.stringify(raw)}`);
      return fallback;
    }
    return parsed;
  }

  let logLevel = pick('log_level', file['log_level'], parseLevel, DEFAULT_SETTINGS.logLevel);
  let customOcvPolicy = pick('custom_ocv_policy', file['custom_ocv_policy'], parsePolicy, DEFAULT_SETTINGS.customOcvPolicy);
  let logFlushIntervalMs = pick('log_flush_interval_ms', file['log_flush_interval_ms'], parsePositiveInt, DEFAULT_SETTINGS.logFlushIntervalMs);
  const logBufferSize = pick('log_buffer_size', file['log_buffer_size'], parsePositiveInt, DEFAULT_SETTINGS.logBufferSize);

  logLevel = pick('MESHCONF_LOG_LEVEL', env['MESHCONF_LOG_LEVEL'], parseLevel, logLevel);
  customOcvPolicy = pick('MESHCONF_CUSTOM_OCV_POLICY', env['MESHCONF_CUSTOM_OCV_POLICY'], parsePolicy, customOcvPolicy);
  logFlushIntervalMs = pick('MESHCONF_LOG_FLUSH_MS', env['MESHCONF_LOG_FLUSH_MS'], parsePositiveInt, logFlushIntervalMs);

  return {
    settings: { logLevel, customOcvPolicy, logFlushIntervalMs, logBufferSize },
    warnings,
  };
}

function readSettingsFile(path: string, warnings: string[]): Readonly<Record<string, unknown>> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (err: unknown) {
    if (isNodeError(err, 'ENOENT')) return {};
    if (err instanceof SyntaxError) {
      warnings.push(`ignoring ${SETTINGS_FILE}: ${err.message}`);
      return {};
    }
    throw err;
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    warnings.push(`ignoring ${SETTINGS_FILE}: expected a JSON object`);
    return {};
  }
  return Object.fromEntries(Object.entries(parsed));
}
