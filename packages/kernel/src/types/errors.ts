/**
 * Meshconf Kernel: Configuration Errors
 *
 * The full error taxonomy of ConfigMutator.updateField(). Errors are
 * returned inside an UpdateResult rather than thrown, so callers branch on
 * `code` instead of catching.
 *
 *   not_found          target record absent; not retryable until the device
 *                      is registered
 *   persistence_failed the store rejected the read or the save; the whole
 *                      fetch-merge-save cycle may be retried
 *   invalid_update     the update was refused by the validation policy
 *                      before anything was written
 */

import type { DeviceConfig, DeviceId } from './device.js';

export type ConfigErrorCode = 'not_found' | 'persistence_failed' | 'invalid_update';

export class ConfigError extends Error {
  constructor(
    readonly code: ConfigErrorCode,
    message: string,
    readonly deviceId: DeviceId,
    /** Underlying reason reported by the store or the validator. */
    readonly reason?: string,
  ) {
    super(message);
    this.name = 'ConfigError';
  }

  static notFound(deviceId: DeviceId): ConfigError {
    return new ConfigError('not_found', `Device not found: ${deviceId}`, deviceId);
  }

  static persistenceFailed(deviceId: DeviceId, reason: string): ConfigError {
    return new ConfigError(
      'persistence_failed',
      `Failed to save device settings: ${reason}`,
      deviceId,
      reason,
    );
  }

  static invalidUpdate(deviceId: DeviceId, reason: string): ConfigError {
    return new ConfigError('invalid_update', `Invalid update: ${reason}`, deviceId, reason);
  }
}

/**
 * Result of ConfigMutator.updateField().
 * A discriminated union: either the persisted record or the error.
 */
export type UpdateResult =
  | { readonly ok: true; readonly config: DeviceConfig }
  | { readonly ok: false; readonly error: ConfigError };

/** Render any thrown value as a one-line reason string. */
export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
