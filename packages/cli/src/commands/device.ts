/**
 * meshconf device: Device configuration records
 *
 * Subcommands:
 *   meshconf device register <id> [--field k=v ...]   create revision 0
 *   meshconf device list [--json]                     all registered devices
 *   meshconf device show <id> [--json]                one record
 *   meshconf device set <id> <k=v...>                 update fields
 *   meshconf device ocv <id> <preset> [--custom csv]  select a battery curve
 *   meshconf device battery <id> <millivolts>         charge estimate
 *
 * Updates go through ConfigMutator; each one writes the full record.
 */

/* eslint-disable no-console */

import { Command } from 'commander';
import {
  CUSTOM_OCV_PRESET,
  OCV_PRESET_FIELD,
  activeOcvCurve,
  batteryPercentage,
  describeError,
} from '@meshconf/kernel';
import type { ConfigUpdate, DeviceConfig } from '@meshconf/kernel';
import { withRuntime } from '../runtime.js';
import type { Runtime } from '../runtime.js';
import { t } from '../tui/theme.js';
import { parseAssignments } from './assignments.js';
import { fail, printJson } from './report.js';

// ---------------------------------------------------------------------------
// Rendering
// ---------------------------------------------------------------------------

function renderConfig(config: DeviceConfig): void {
  console.log(`${t.white.bold(config.device_id)}  ${t.muted(`revision ${config.revision}  updated ${config.updated_at}`)}`);
  const keys = Object.keys(config.fields).sort();
  if (keys.length === 0) {
    console.log(`  ${t.muted('(no fields)')}`);
    return;
  }
  const width = Math.max(...keys.map((k) => k.length));
  for (const key of keys) {
    console.log(`  ${t.teal(key.padEnd(width))}  ${JSON.stringify(config.fields[key])}`);
  }
}

/** The stored record, or undefined after reporting why there is none. */
async function fetchOrFail(rt: Runtime, deviceId: string): Promise<DeviceConfig | undefined> {
  let config: DeviceConfig | undefined;
  try {
    config = await rt.store.fetch(deviceId);
  } catch (err: unknown) {
    fail(`Failed to read device ${deviceId}: ${describeError(err)}`);
    return undefined;
  }
  if (config === undefined) {
    fail(`Device not found: ${deviceId}`);
  }
  return config;
}

async function applyUpdate(rt: Runtime, deviceId: string, update: ConfigUpdate): Promise<void> {
  const result = await rt.mutator.updateField(deviceId, update);
  if (result.ok) {
    console.log(`${t.green('saved')} ${deviceId} at revision ${result.config.revision}`);
  } else {
    fail(`${result.error.message} (${result.error.code})`);
  }
}

// ---------------------------------------------------------------------------
// Subcommands
// ---------------------------------------------------------------------------

function registerCommand(): Command {
  return new Command('register')
    .description('Register a new device with an initial set of fields')
    .argument('<id>', 'Device id (letters, digits, _ and -)')
    .option('-f, --field <assignment...>', 'Initial field as key=value (repeatable)')
    .action(async (id: string, options: { field?: string[] }, cmd: Command) => {
      const parsed = parseAssignments(options.field ?? []);
      if (!parsed.ok) {
        fail(parsed.error);
        return;
      }
      await withRuntime(cmd, async (rt) => {
        const result = await rt.store.register(id, parsed.fields);
        if (!result.ok) {
          fail(result.reason);
          return;
        }
        rt.logger('device').info(`Registered device ${id}`);
        console.log(`${t.green('registered')} ${id} at revision 0`);
      });
    });
}

function listCommand(): Command {
  return new Command('list')
    .description('List registered devices')
    .option('--json', 'Output as JSON')
    .action(async (options: { json?: boolean }, cmd: Command) => {
      await withRuntime(cmd, async (rt) => {
        let devices: DeviceConfig[];
        try {
          devices = await rt.store.list();
        } catch (err: unknown) {
          fail(`Failed to list devices: ${describeError(err)}`);
          return;
        }
        if (options.json === true) {
          printJson(devices);
          return;
        }
        if (devices.length === 0) {
          console.log('No devices registered. Run `meshconf device register <id>` to add one.');
          return;
        }
        for (const d of devices) {
          const preset = d.fields[OCV_PRESET_FIELD];
          console.log(
            `  ${d.device_id}  rev=${d.revision}  updated=${d.updated_at}` +
            (typeof preset === 'string' ? `  ocv=${preset}` : ''),
          );
        }
      });
    });
}

function showCommand(): Command {
  return new Command('show')
    .description('Show the configuration record of a device')
    .argument('<id>', 'Device id')
    .option('--json', 'Output as JSON')
    .action(async (id: string, options: { json?: boolean }, cmd: Command) => {
      await withRuntime(cmd, async (rt) => {
        const config = await fetchOrFail(rt, id);
        if (config === undefined) return;
        if (options.json === true) {
          printJson(config);
        } else {
          renderConfig(config);
        }
      });
    });
}

function setCommand(): Command {
  return new Command('set')
    .description('Update one or more fields; other fields are kept')
    .argument('<id>', 'Device id')
    .argument('<assignments...>', 'Fields as key=value')
    .action(async (id: string, assignments: string[], _options: unknown, cmd: Command) => {
      const parsed = parseAssignments(assignments);
      if (!parsed.ok) {
        fail(parsed.error);
        return;
      }
      await withRuntime(cmd, async (rt) => {
        await applyUpdate(rt, id, { kind: 'set_fields', fields: parsed.fields });
      });
    });
}

function ocvCommand(): Command {
  return new Command('ocv')
    .description(`Select a battery OCV preset ('${CUSTOM_OCV_PRESET}' takes --custom)`)
    .argument('<id>', 'Device id')
    .argument('<preset>', 'Preset name (see `meshconf presets`)')
    .option('--custom <csv>', '11 comma-separated millivolt values, 100% to 0%')
    .action(async (id: string, preset: string, options: { custom?: string }, cmd: Command) => {
      await withRuntime(cmd, async (rt) => {
        const update: ConfigUpdate = options.custom === undefined
          ? { kind: 'set_ocv', preset }
          : { kind: 'set_ocv', preset, customArray: options.custom };
        await applyUpdate(rt, id, update);
      });
    });
}

function batteryCommand(): Command {
  return new Command('battery')
    .description("Estimate charge from a voltage reading on the device's active curve")
    .argument('<id>', 'Device id')
    .argument('<millivolts>', 'Battery reading in mV')
    .action(async (id: string, millivoltsText: string, _options: unknown, cmd: Command) => {
      const millivolts = Number(millivoltsText);
      if (!/^\d+$/.test(millivoltsText) || !Number.isSafeInteger(millivolts)) {
        fail(`millivolts must be a whole number, got '${millivoltsText}'`);
        return;
      }
      await withRuntime(cmd, async (rt) => {
        const config = await fetchOrFail(rt, id);
        if (config === undefined) return;
        const percent = batteryPercentage(millivolts, activeOcvCurve(config));
        if (percent === null) {
          fail(`Active OCV curve of ${id} does not have 11 points`);
          return;
        }
        const preset = config.fields[OCV_PRESET_FIELD];
        console.log(`${id}: ${millivolts} mV = ${percent}% (${typeof preset === 'string' ? preset : 'liIon'})`);
      });
    });
}

// ---------------------------------------------------------------------------
// meshconf device
// ---------------------------------------------------------------------------

export function deviceCommand(): Command {
  return new Command('device')
    .description('Register, inspect and update device configuration records')
    .addCommand(registerCommand())
    .addCommand(listCommand())
    .addCommand(showCommand())
    .addCommand(setCommand())
    .addCommand(ocvCommand())
    .addCommand(batteryCommand());
}
