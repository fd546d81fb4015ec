/**
 * Meshconf Kernel: Config Mutator
 *
 * The only sanctioned path for changing a device's configuration record.
 *
 * updateField() is a strict pipeline, run under a per-device lock:
 *
 *   fetch → merge → validate → save     (inside the lock)
 *   notify observer                     (after the lock is released)
 *
 * Invariants:
 * - Two updates for the same device never interleave their fetch/save
 *   phases; the second one fetches the record the first one saved.
 *   Updates for different devices do not wait on each other.
 * - The merged record is a new value. Every field the update does not name
 *   is carried over unchanged; nothing is mutated in place, so a failed
 *   save leaves the stored record authoritative with no rollback.
 * - The observer is called exactly once per successful save, with the saved
 *   record, and never for a failed update. Whatever the observer does (slow
 *   work, throw, reject) does not change the update's result.
 * - An update that has taken the lock runs to completion.
 */

import { describeError, ConfigError } from '../types/errors.js';
import type { UpdateResult } from '../types/errors.js';
import { CUSTOM_OCV_ARRAY_FIELD, OCV_PRESET_FIELD } from '../types/device.js';
import type {
  ConfigFields,
  ConfigUpdate,
  DeviceConfig,
  DeviceConfigObserver,
  DeviceId,
} from '../types/device.js';
import type { DeviceConfigStore } from '../types/store.js';
import { DualSinkLogger } from '../logging/dual-sink-logger.js';
import { KeyedMutex } from './keyed-mutex.js';
import { CUSTOM_OCV_PRESET, isOcvPresetName } from './ocv-presets.js';

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

/**
 * What to do when the preset is set to 'custom' without a custom curve.
 *
 *   reject        fail with invalid_update; nothing is written
 *   allow_absent  store the preset with custom_ocv_array = null
 *
 * The policy applies to both update kinds, since set_fields can name
 * ocv_preset directly. A custom array that is present is stored as given;
 * activeOcvCurve() falls back to a named curve when it does not parse.
 * The curve is never invented in either case.
 */
export type CustomOcvPolicy = 'reject' | 'allow_absent';

export interface ConfigMutatorOptions {
  /** Default: 'reject'. */
  readonly customOcvPolicy?: CustomOcvPolicy | undefined;
  readonly logger?: DualSinkLogger | undefined;
  /** Source of `updated_at`. Default: the system clock. */
  readonly clock?: (() => Date) | undefined;
}

// ---------------------------------------------------------------------------
// ConfigMutator
// ---------------------------------------------------------------------------

export class ConfigMutator {
  private readonly locks = new KeyedMutex<DeviceId>();
  private readonly logger: DualSinkLogger;
  private readonly clock: () => Date;
  private readonly customOcvPolicy: CustomOcvPolicy;
  private observer: DeviceConfigObserver | undefined;

  constructor(
    private readonly store: DeviceConfigStore,
    options: ConfigMutatorOptions = {},
  ) {
    this.logger = options.logger ?? new DualSinkLogger('meshconf.kernel', 'ConfigMutator');
    this.clock = options.clock ?? (() => new Date());
    this.customOcvPolicy = options.customOcvPolicy ?? 'reject';
  }

  /**
   * Set the observer notified after each successful update.
   * Replaces any previously registered observer.
   */
  registerObserver(observer: DeviceConfigObserver): void {
    this.observer = observer;
  }

  /**
   * Apply `update` to the record of `deviceId` and persist the full record.
   *
   * Waits behind any in-flight update for the same device. Resolves with the
   * saved record, or with a ConfigError (not_found, persistence_failed,
   * invalid_update). Never rejects because of the store or the observer.
   */
  async updateField(deviceId: DeviceId, update: ConfigUpdate): Promise<UpdateResult> {
    this.logger.info(`Updating device ${deviceId}: ${describeUpdate(update)}`);

    const result = await this.locks.runExclusive(deviceId, () =>
      this.fetchMergeSave(deviceId, update),
    );

    if (result.ok) {
      this.notify(result.config);
    }
    return result;
  }

  // -------------------------------------------------------------------------
  // Critical section
  // -------------------------------------------------------------------------

  private async fetchMergeSave(deviceId: DeviceId, update: ConfigUpdate): Promise<UpdateResult> {
    let current: DeviceConfig | undefined;
    try {
      current = await this.store.fetch(deviceId);
    } catch (err: unknown) {
      const reason = describeError(err);
      this.logger.error(`Failed to read device ${deviceId}: ${reason}`);
      return { ok: false, error: ConfigError.persistenceFailed(deviceId, reason) };
    }

    if (current === undefined) {
      this.logger.error(`Device not found: ${deviceId}`);
      return { ok: false, error: ConfigError.notFound(deviceId) };
    }

    const patch = toPatch(update);
    const next = mergeConfig(current, patch, this.clock());

    // OCV fields are checked on the merged record, whichever update kind set them.
    if (touchesOcvFields(patch)) {
      const reason = this.checkOcvFields(next.fields);
      if (reason !== undefined) {
        const error = ConfigError.invalidUpdate(deviceId, reason);
        this.logger.warning(error.message);
        return { ok: false, error };
      }
    }

    try {
      await this.store.save(next);
    } catch (err: unknown) {
      const reason = describeError(err);
      this.logger.error(`Failed to save device ${deviceId}: ${reason}`);
      return { ok: false, error: ConfigError.persistenceFailed(deviceId, reason) };
    }

    this.logger.info(`Saved device ${deviceId} at revision ${next.revision}`);
    return { ok: true, config: next };
  }

  /** Reason the OCV part of `fields` is not acceptable, or undefined. */
  private checkOcvFields(fields: ConfigFields): string | undefined {
    const preset = fields[OCV_PRESET_FIELD];
    const customArray = fields[CUSTOM_OCV_ARRAY_FIELD];

    if (customArray !== undefined && customArray !== null && typeof customArray !== 'string') {
      return `${CUSTOM_OCV_ARRAY_FIELD} must be a comma-separated string`;
    }
    if (preset === undefined || preset === null) return undefined;
    if (typeof preset !== 'string' || !isOcvPresetName(preset)) {
      return `unknown OCV preset '${String(preset)}'`;
    }
    if (preset === CUSTOM_OCV_PRESET && typeof customArray !== 'string' && this.customOcvPolicy === 'reject') {
      return "preset 'custom' requires a custom OCV array";
    }
    return undefined;
  }

  // -------------------------------------------------------------------------
  // Notification
  // -------------------------------------------------------------------------

  private notify(config: DeviceConfig): void {
    const observer = this.observer;
    if (observer === undefined) return;

    const onFailure = (err: unknown): void => {
      this.logger.error(
        `Observer failed for device ${config.device_id} revision ${config.revision}: ${describeError(err)}`,
      );
    };

    try {
      void Promise.resolve(observer.onDeviceConfigUpdated(config)).catch(onFailure);
    } catch (err: unknown) {
      onFailure(err);
    }
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Build the next revision of `current` with `patch` applied.
 * Exported for tests and for stores that need to preview a merge.
 */
export function mergeConfig(current: DeviceConfig, patch: ConfigFields, now: Date): DeviceConfig {
  return Object.freeze({
    device_id: current.device_id,
    revision: current.revision + 1,
    updated_at: now.toISOString(),
    fields: Object.freeze({ ...current.fields, ...patch }),
  });
}

function toPatch(update: ConfigUpdate): ConfigFields {
  switch (update.kind) {
    case 'set_fields':
      return update.fields;
    case 'set_ocv':
      return {
        [OCV_PRESET_FIELD]: update.preset,
        [CUSTOM_OCV_ARRAY_FIELD]: update.customArray ?? null,
      };
  }
}

function touchesOcvFields(patch: ConfigFields): boolean {
  return Object.hasOwn(patch, OCV_PRESET_FIELD) || Object.hasOwn(patch, CUSTOM_OCV_ARRAY_FIELD);
}

function describeUpdate(update: ConfigUpdate): string {
  switch (update.kind) {
    case 'set_fields':
      return `set ${Object.keys(update.fields).join(', ') || '(no fields)'}`;
    case 'set_ocv':
      return `ocv preset=${update.preset}`;
  }
}
