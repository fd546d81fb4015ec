/**
 * commands/index.ts: Commander program, configured and exported without .parse().
 *
 * Imported by:
 *   src/bin/meshconf.ts   (the `meshconf` executable)
 *   src/index.ts          (library entry)
 *
 * createProgram() builds a fresh command tree; tests parse one per case.
 */

import { Command } from 'commander';
import { deviceCommand } from './device.js';
import { logCommand } from './log.js';
import { presetsCommand } from './presets.js';

export function createProgram(): Command {
  return new Command('meshconf')
    .description(
      'meshconf: mesh radio device configuration records and debug log.\n' +
      'Every update is a full-record replace, serialized per device.',
    )
    .version('0.1.0')
    .option('--home <dir>', 'meshconf home directory (default: $MESHCONF_HOME or ~/.meshconf)')
    .addCommand(deviceCommand())
    .addCommand(presetsCommand())
    .addCommand(logCommand());
}

export const program = createProgram();
