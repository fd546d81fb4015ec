/**
 * Meshconf Kernel: Device Config Store Interface
 *
 * The kernel owns this contract; the concrete store lives in the runtime
 * host (StateDeviceConfigStore). The kernel never touches disk itself.
 */

import type { DeviceConfig, DeviceId } from './device.js';

/**
 * Persistence boundary for device configuration records.
 *
 * Invariants an implementation must hold:
 * - fetch() never exposes a partially written record
 * - save() replaces the stored record for `config.device_id` atomically;
 *   when it rejects, the previously stored record is left intact
 */
export interface DeviceConfigStore {
  /** Current record for `deviceId`, or undefined when none is registered. */
  fetch(deviceId: DeviceId): Promise<DeviceConfig | undefined>;

  /** Replace the stored record. Rejects when the write did not happen. */
  save(config: DeviceConfig): Promise<void>;
}
