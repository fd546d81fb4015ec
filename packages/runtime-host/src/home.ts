/**
 * Meshconf Runtime Host: Home Directory Resolution
 *
 * Precedence:
 *
 *   1. Explicit `home` option (the CLI's --home flag)
 *   2. MESHCONF_HOME environment variable
 *   3. Default: ~/.meshconf
 *
 * Layout under the resolved home:
 *
 *   <home>/
 *     settings.json
 *     state/
 *       devices.json
 *       device-<id>.json
 *     logs/
 *       debug.jsonl
 */

import { existsSync, mkdirSync } from 'node:fs';
import { join } from 'node:path';
import { homedir } from 'node:os';

export interface ResolveMeshconfHomeOptions {
  /** Explicit override, highest precedence. */
  readonly home?: string | undefined;
  /** Directory the default `.meshconf` lives in. Default: the user's home. */
  readonly userHome?: string | undefined;
}

/** Resolve the meshconf home and create it if missing. */
export function resolveMeshconfHome(opts?: ResolveMeshconfHomeOptions): string {
  const envHome = process.env['MESHCONF_HOME'];
  let meshconfHome: string;

  if (typeof opts?.home === 'string' && opts.home !== '') {
    meshconfHome = opts.home;
  } else if (typeof envHome === 'string' && envHome !== '') {
    meshconfHome = envHome;
  } else {
    meshconfHome = join(opts?.userHome ?? homedir(), '.meshconf');
  }

  if (!existsSync(meshconfHome)) {
    mkdirSync(meshconfHome, { recursive: true });
  }

  return meshconfHome;
}
