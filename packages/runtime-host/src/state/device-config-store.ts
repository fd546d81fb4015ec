/**
 * Meshconf Runtime Host: Device Configuration Store
 *
 * File-backed implementation of the kernel's DeviceConfigStore. Each device
 * record lives in its own state file, `state/device-<id>.json`; the set of
 * registered ids is kept in `state/devices.json`.
 *
 * Reads are always fresh from StateIO, with no in-memory cache, so two
 * processes sharing a home directory see each other's writes.
 *
 * Records are only created by register(). ConfigMutator owns every later
 * write through save().
 */

import { describeError } from '@meshconf/kernel';
import type { ConfigFields, ConfigValue, DeviceConfig, DeviceConfigStore, DeviceId } from '@meshconf/kernel';
import type { StateIO } from './state-io.js';

/** Filename of the device id index within the state directory. */
const DEVICE_INDEX_FILE = 'devices.json';

const DEVICE_ID_PATTERN = /^[A-Za-z0-9_-]{1,64}$/;

interface DeviceIndex {
  readonly devices: ReadonlyArray<DeviceId>;
}

export type RegisterResult =
  | { readonly ok: true; readonly config: DeviceConfig }
  | { readonly ok: false; readonly reason: string };

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

/** Ids become part of a filename, so they are restricted to a safe alphabet. */
export function isValidDeviceId(id: string): boolean {
  return DEVICE_ID_PATTERN.test(id);
}

function isConfigValue(value: unknown): value is ConfigValue {
  return (
    value === null ||
    typeof value === 'string' ||
    typeof value === 'boolean' ||
    (typeof value === 'number' && Number.isFinite(value))
  );
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Narrow a parsed state file to a DeviceConfig.
 * Returns undefined if any part of the shape is wrong, or if the record
 * names a device other than `expectedId`.
 */
export function parseDeviceConfig(value: unknown, expectedId?: DeviceId): DeviceConfig | undefined {
  if (!isRecord(value)) return undefined;
  const { device_id, revision, updated_at, fields } = value;
  if (typeof device_id !== 'string' || typeof updated_at !== 'string') return undefined;
  if (expectedId !== undefined && device_id !== expectedId) return undefined;
  if (typeof revision !== 'number' || !Number.isInteger(revision) || revision < 0) return undefined;
  if (!isRecord(fields)) return undefined;

  const parsedFields: Record<string, ConfigValue> = {};
  for (const [key, fieldValue] of Object.entries(fields)) {
    if (!isConfigValue(fieldValue)) return undefined;
    parsedFields[key] = fieldValue;
  }
  return { device_id, revision, updated_at, fields: parsedFields };
}

// ---------------------------------------------------------------------------
// StateDeviceConfigStore
// ---------------------------------------------------------------------------

export class StateDeviceConfigStore implements DeviceConfigStore {
  constructor(
    private readonly stateIO: StateIO,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  /**
   * The stored record, or undefined if there is none. Rejects when a record
   * exists but cannot be read back, so it is never mistaken for a missing one.
   */
  async fetch(deviceId: DeviceId): Promise<DeviceConfig | undefined> {
    if (!isValidDeviceId(deviceId)) return undefined;
    const filename = deviceFile(deviceId);
    const raw = this.stateIO.readJson(filename);
    if (raw === undefined) return undefined;
    const config = parseDeviceConfig(raw, deviceId);
    if (config === undefined) {
      throw new Error(`device record ${filename} is malformed or names another device`);
    }
    return config;
  }

  async save(config: DeviceConfig): Promise<void> {
    if (!isValidDeviceId(config.device_id)) {
      throw new Error(`invalid device id '${config.device_id}'`);
    }
    this.stateIO.writeJson(deviceFile(config.device_id), config);
  }

  /**
   * Create the revision-0 record for a new device.
   * Fails if the id is malformed or already registered, and never writes
   * over a stored record it cannot read.
   */
  async register(deviceId: DeviceId, fields: ConfigFields = {}): Promise<RegisterResult> {
    if (!isValidDeviceId(deviceId)) {
      return { ok: false, reason: `invalid device id '${deviceId}' (allowed: A-Z a-z 0-9 _ -, at most 64)` };
    }
    let existing: DeviceConfig | undefined;
    let ids: Set<DeviceId>;
    try {
      existing = await this.fetch(deviceId);
      ids = new Set(this.readIndex().devices);
    } catch (err: unknown) {
      return { ok: false, reason: `device '${deviceId}' has an unreadable record: ${describeError(err)}` };
    }
    if (existing !== undefined) {
      return { ok: false, reason: `device '${deviceId}' is already registered` };
    }

    const config: DeviceConfig = Object.freeze({
      device_id: deviceId,
      revision: 0,
      updated_at: this.clock().toISOString(),
      fields: Object.freeze({ ...fields }),
    });
    this.stateIO.writeJson(deviceFile(deviceId), config);

    ids.add(deviceId);
    const index: DeviceIndex = { devices: [...ids].sort() };
    this.stateIO.writeJson(DEVICE_INDEX_FILE, index);

    return { ok: true, config };
  }

  /**
   * All registered devices in id order. Index entries without a record are
   * skipped; an unreadable record rejects, as in fetch().
   */
  async list(): Promise<DeviceConfig[]> {
    const configs: DeviceConfig[] = [];
    for (const id of this.readIndex().devices) {
      const config = await this.fetch(id);
      if (config !== undefined) configs.push(config);
    }
    return configs;
  }

  private readIndex(): DeviceIndex {
    const raw = this.stateIO.readJson(DEVICE_INDEX_FILE);
    if (!isRecord(raw) || !Array.isArray(raw['devices'])) return { devices: [] };
    const devices: unknown[] = raw['devices'];
    return { devices: devices.filter((d): d is string => typeof d === 'string') };
  }
}

function deviceFile(deviceId: DeviceId): string {
  return `device-${deviceId}.json`;
}
