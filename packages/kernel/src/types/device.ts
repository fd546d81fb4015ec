/**
 * Meshconf Kernel: Device Configuration Types
 *
 * A DeviceConfig is the single persisted configuration record of one radio.
 * The kernel treats the field map as opaque apart from the two battery-curve
 * fields named below; the hardware schema belongs to the surrounding app.
 *
 * Records are values. An update never edits a record in place: it builds a
 * complete new record with the next revision number and hands that to the
 * store.
 */

// ---------------------------------------------------------------------------
// Identity
// ---------------------------------------------------------------------------

/** Stable, opaque device identifier. One record per identifier. */
export type DeviceId = string;

// ---------------------------------------------------------------------------
// Record
// ---------------------------------------------------------------------------

/** A single configuration field value. Must survive a JSON round-trip. */
export type ConfigValue = string | number | boolean | null;

/** Named configuration fields of a device (radio parameters, identity, presets). */
export type ConfigFields = Readonly<Record<string, ConfigValue>>;

/**
 * The persisted configuration of one device at one revision.
 */
export interface DeviceConfig {
  readonly device_id: DeviceId;
  /** 0 at registration; incremented by exactly one on every successful update. */
  readonly revision: number;
  /** ISO 8601 timestamp of the write that produced this revision. */
  readonly updated_at: string;
  readonly fields: ConfigFields;
}

/** Field holding the selected battery OCV preset name. */
export const OCV_PRESET_FIELD = 'ocv_preset';

/** Field holding the comma-separated custom OCV curve (used when the preset is 'custom'). */
export const CUSTOM_OCV_ARRAY_FIELD = 'custom_ocv_array';

// ---------------------------------------------------------------------------
// Updates
// ---------------------------------------------------------------------------

/**
 * Replace the named fields with the given values.
 * Fields not named in `fields` are carried over unchanged.
 */
export interface SetFieldsUpdate {
  readonly kind: 'set_fields';
  readonly fields: ConfigFields;
}

/**
 * Select a battery OCV preset.
 *
 * `customArray` is the dependent value: the caller must supply it when
 * `preset` is 'custom'. What happens when it is missing is decided by the
 * mutator's CustomOcvPolicy; it is never invented.
 */
export interface SetOcvUpdate {
  readonly kind: 'set_ocv';
  readonly preset: string;
  readonly customArray?: string | undefined;
}

/** A field-level change request accepted by ConfigMutator.updateField(). */
export type ConfigUpdate = SetFieldsUpdate | SetOcvUpdate;

// ---------------------------------------------------------------------------
// Observer
// ---------------------------------------------------------------------------

/**
 * Receives the post-update record after every successful update.
 *
 * Invoked after the store has confirmed the save, outside the device lock.
 * The return value (or rejection) is not awaited by the update call.
 */
export interface DeviceConfigObserver {
  onDeviceConfigUpdated(config: DeviceConfig): void | Promise<void>;
}
