/**
 * @meshconf/runtime-host
 *
 * Side-effectful implementations of the kernel's contracts: the file-backed
 * device store, the batched durable log sink and its JSONL writer, plus
 * home directory and settings resolution. Depends on @meshconf/kernel;
 * nothing in the kernel imports from here.
 */

// StateIO: home-scoped I/O abstraction
export type { StateIO } from './state/state-io.js';
export { FileStateIO, MemoryStateIO } from './state/state-io.js';

// Device store
export type { RegisterResult } from './state/device-config-store.js';
export { StateDeviceConfigStore, isValidDeviceId, parseDeviceConfig } from './state/device-config-store.js';

// Durable logging
export type { DebugLogBufferOptions, DebugLogWriter } from './logging/debug-log-buffer.js';
export { DEFAULT_FLUSH_INTERVAL_MS, DEFAULT_MAX_BUFFER_SIZE, DebugLogBuffer } from './logging/debug-log-buffer.js';
export { DEBUG_LOG_FILE, JsonlDebugLogWriter, toDebugLogLine } from './logging/jsonl-debug-log-writer.js';
export type { DebugLogFilter, LogReadResult, LogReadStats } from './logging/log-reader.js';
export { readDebugLog } from './logging/log-reader.js';

// Home and settings
export type { ResolveMeshconfHomeOptions } from './home.js';
export { resolveMeshconfHome } from './home.js';
export type { LoadSettingsResult, MeshconfSettings } from './config/settings.js';
export { DEFAULT_SETTINGS, SETTINGS_FILE, loadSettings } from './config/settings.js';
