/**
 * @meshconf/kernel
 *
 * Device configuration mutation and dual-sink logging: the serialized
 * update pipeline, the per-device lock, the leveled logger, the durable
 * sink handle, and the battery OCV presets.
 *
 * This package is side-effect free. It contains no imports of node:fs,
 * node:child_process or node:net. node:crypto is used for ULID randomness.
 * Stores and durable sinks are implemented in @meshconf/runtime-host.
 */

// Types
export type {
  ConfigFields,
  ConfigUpdate,
  ConfigValue,
  DeviceConfig,
  DeviceConfigObserver,
  DeviceId,
  SetFieldsUpdate,
  SetOcvUpdate,
} from './types/device.js';
export { CUSTOM_OCV_ARRAY_FIELD, OCV_PRESET_FIELD } from './types/device.js';

export type { ConfigErrorCode, UpdateResult } from './types/errors.js';
export { ConfigError, describeError } from './types/errors.js';

export type { LogEvent } from './types/log.js';
export {
  LOG_LEVEL_LABELS,
  LOG_LEVELS,
  LogLevel,
  MAX_LOG_MESSAGE_LENGTH,
  parseLogLevel,
} from './types/log.js';

// Store interface (implementation lives in runtime-host)
export type { DeviceConfigStore } from './types/store.js';

// Configuration mutation
export type { ConfigMutatorOptions, CustomOcvPolicy } from './config/config-mutator.js';
export { ConfigMutator, mergeConfig } from './config/config-mutator.js';
export type { Release } from './config/keyed-mutex.js';
export { KeyedMutex } from './config/keyed-mutex.js';

// Battery presets
export type { OcvPreset } from './config/ocv-presets.js';
export {
  CUSTOM_OCV_PRESET,
  DEFAULT_OCV_CURVE,
  OCV_POINTS,
  OCV_PRESETS,
  activeOcvCurve,
  batteryPercentage,
  findOcvPreset,
  isOcvPresetName,
  parseCustomOcvArray,
} from './config/ocv-presets.js';

// Logging
export type { DurableLogSink, EphemeralLogSink } from './logging/log-sink.js';
export type { DualSinkLoggerOptions } from './logging/dual-sink-logger.js';
export { DualSinkLogger } from './logging/dual-sink-logger.js';
export { bindDurableSink, getDurableSink, unbindDurableSink } from './logging/durable-sink-handle.js';
export { consoleSink, formatLogLine } from './logging/console-sink.js';
export { ulid } from './logging/ulid.js';
