/**
 * Meshconf Runtime Host: StateIO
 *
 * A home-scoped I/O abstraction for JSON state files and JSONL log files.
 *
 *   FileStateIO   durable file I/O under a meshconf home directory
 *   MemoryStateIO in-memory I/O for tests and embedded use
 *
 * Stores and log writers take a StateIO instead of touching the file system,
 * so the same code runs against a temp directory, a real home, or memory.
 */

import { appendFileSync, mkdirSync, readFileSync, renameSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';

// ---------------------------------------------------------------------------
// StateIO Interface
// ---------------------------------------------------------------------------

/**
 * Invariants:
 * - readJson / writeJson address the `state/` subdirectory
 * - appendLines / readLogRaw address the `logs/` subdirectory
 * - writeJson replaces the whole file; a reader never sees a half-written one
 */
export interface StateIO {
  /**
   * Read and parse a JSON state file.
   *
   * Returns undefined if the file does not exist and throws if it exists
   * but does not parse. The value is unvalidated; callers narrow it.
   */
  readJson(filename: string): unknown;

  /** Serialize `value` and replace the state file with it. */
  writeJson(filename: string, value: unknown): void;

  /**
   * Append lines to a log file, each followed by '\n', in one write.
   * An empty `lines` array is a no-op.
   */
  appendLines(logfilename: string, lines: ReadonlyArray<string>): void;

  /** Raw text of a log file, or '' if it does not exist. */
  readLogRaw(logfilename: string): string;
}

// ---------------------------------------------------------------------------
// FileStateIO
// ---------------------------------------------------------------------------

/**
 * Reads and writes `<homeDir>/state/<filename>`, appends to
 * `<homeDir>/logs/<logfilename>`.
 *
 * ENOENT on read is recoverable (undefined). A file that does not parse
 * is reported with its name; other I/O errors are rethrown.
 */
export class FileStateIO implements StateIO {
  constructor(private readonly homeDir: string) {}

  readJson(filename: string): unknown {
    const filePath = join(this.homeDir, 'state', filename);
    try {
      const raw = readFileSync(filePath, 'utf-8');
      const parsed: unknown = JSON.parse(raw);
      return parsed;
    } catch (err: unknown) {
      if (isNodeError(err, 'ENOENT')) {
        return undefined;
      }
      if (err instanceof SyntaxError) {
        throw new Error(`state file ${filename} is not valid JSON: ${err.message}`);
      }
      throw err;
    }
  }

  writeJson(filename: string, value: unknown): void {
    const subDir = join(this.homeDir, 'state');
    mkdirSync(subDir, { recursive: true });
    const filePath = join(subDir, filename);
    // Write beside the target, then rename over it.
    const tmpPath = `${filePath}.${process.pid}.tmp`;
    writeFileSync(tmpPath, JSON.stringify(value, null, 2), 'utf-8');
    renameSync(tmpPath, filePath);
  }

  appendLines(logfilename: string, lines: ReadonlyArray<string>): void {
    if (lines.length === 0) return;
    const logsDir = join(this.homeDir, 'logs');
    mkdirSync(logsDir, { recursive: true });
    appendFileSync(join(logsDir, logfilename), lines.map((l) => l + '\n').join(''), 'utf-8');
  }

  readLogRaw(logfilename: string): string {
    const logPath = join(this.homeDir, 'logs', logfilename);
    try {
      return readFileSync(logPath, 'utf-8');
    } catch (err: unknown) {
      if (isNodeError(err, 'ENOENT')) {
        return '';
      }
      throw err;
    }
  }
}

// ---------------------------------------------------------------------------
// MemoryStateIO
// ---------------------------------------------------------------------------

/**
 * In-memory StateIO. Instances are isolated from each other.
 *
 * Values round-trip through JSON on write, matching FileStateIO
 * (undefined properties disappear, Dates become strings).
 */
export class MemoryStateIO implements StateIO {
  private readonly store: Map<string, string> = new Map();
  private readonly logs: Map<string, string[]> = new Map();

  readJson(filename: string): unknown {
    const raw = this.store.get(filename);
    if (raw === undefined) return undefined;
    const parsed: unknown = JSON.parse(raw);
    return parsed;
  }

  writeJson(filename: string, value: unknown): void {
    this.store.set(filename, JSON.stringify(value));
  }

  appendLines(logfilename: string, lines: ReadonlyArray<string>): void {
    if (lines.length === 0) return;
    const existing = this.logs.get(logfilename) ?? [];
    existing.push(...lines);
    this.logs.set(logfilename, existing);
  }

  /** Lines appended to a log file. Not part of StateIO; for test assertions. */
  readLines(logfilename: string): ReadonlyArray<string> {
    return this.logs.get(logfilename) ?? [];
  }

  /** State filenames written so far. Not part of StateIO. */
  stateFiles(): ReadonlyArray<string> {
    return [...this.store.keys()].sort();
  }

  readLogRaw(logfilename: string): string {
    const lines = this.logs.get(logfilename) ?? [];
    if (lines.length === 0) return '';
    return lines.join('\n') + '\n';
  }
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

/** True if `err` is a Node.js errno exception with the given code. */
export function isNodeError(err: unknown, code: string): boolean {
  return err instanceof Error && 'code' in err && err.code === code;
}
