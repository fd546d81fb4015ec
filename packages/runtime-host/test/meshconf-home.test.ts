/**
 * Meshconf Runtime Host: Home Resolution Tests
 *
 *   MH-U1: an explicit home wins over MESHCONF_HOME
 *   MH-U2: MESHCONF_HOME is honored when no explicit home is given
 *   MH-U3: a missing home directory is created
 *   MH-U4: without either, the home is .meshconf in the user's home directory
 *
 * Each test saves and restores MESHCONF_HOME.
 */

import { describe, it, expect, afterEach, beforeEach } from 'vitest';
import { existsSync, mkdtempSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { resolveMeshconfHome } from '../src/home.js';

let savedHome: string | undefined;

beforeEach(() => {
  savedHome = process.env['MESHCONF_HOME'];
});

afterEach(() => {
  if (savedHome === undefined) {
    delete process.env['MESHCONF_HOME'];
  } else {
    process.env['MESHCONF_HOME'] = savedHome;
  }
});

describe('resolveMeshconfHome', () => {
  it('MH-U1: an explicit home wins over MESHCONF_HOME', () => {
    const fromEnv = mkdtempSync(`${tmpdir()}/meshconf-mh-env-`);
    const explicit = mkdtempSync(`${tmpdir()}/meshconf-mh-flag-`);
    process.env['MESHCONF_HOME'] = fromEnv;

    expect(resolveMeshconfHome({ home: explicit })).toBe(explicit);
  });

  it('MH-U2: MESHCONF_HOME is honored when no explicit home is given', () => {
    const fromEnv = mkdtempSync(`${tmpdir()}/meshconf-mh-u2-`);
    process.env['MESHCONF_HOME'] = fromEnv;

    expect(resolveMeshconfHome()).toBe(fromEnv);
    expect(resolveMeshconfHome({ home: '' })).toBe(fromEnv);
  });

  it('MH-U3: creates the resolved directory when it does not exist', () => {
    const target = join(mkdtempSync(`${tmpdir()}/meshconf-mh-u3-`), 'nested', 'home');

    const result = resolveMeshconfHome({ home: target });

    expect(result).toBe(target);
    expect(existsSync(target)).toBe(true);
  });

  it("MH-U4: falls back to .meshconf in the user's home directory", () => {
    delete process.env['MESHCONF_HOME'];
    const userHome = mkdtempSync(`${tmpdir()}/meshconf-mh-u4-`);

    const result = resolveMeshconfHome({ userHome });

    expect(result).toBe(join(userHome, '.meshconf'));
    expect(existsSync(result)).toBe(true);
  });
});
