/**
 * meshconf presets: List battery OCV presets
 */

import { Command } from 'commander';
import { CUSTOM_OCV_PRESET, OCV_PRESETS } from '@meshconf/kernel';
import { t } from '../tui/theme.js';
import { printJson } from './report.js';

export function presetsCommand(): Command {
  return new Command('presets')
    .description('List the battery OCV presets (millivolts at 100% .. 0%)')
    .option('--json', 'Output as JSON')
    .action((options: { json?: boolean }) => {
      if (options.json === true) {
        printJson(OCV_PRESETS);
        return;
      }
      const width = Math.max(...OCV_PRESETS.map((p) => p.name.length));
      for (const preset of OCV_PRESETS) {
        // eslint-disable-next-line no-console
        console.log(
          `  ${t.teal(preset.name.padEnd(width))}  ${preset.curve.join(',')}  ${t.muted(preset.displayName)}`,
        );
      }
      // eslint-disable-next-line no-console
      console.log(`  ${t.teal(CUSTOM_OCV_PRESET.padEnd(width))}  ${t.muted('use --custom with `meshconf device ocv`')}`);
    });
}
