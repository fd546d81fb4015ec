/**
 * runtime.ts: per-invocation wiring of the CLI.
 *
 * Resolves the home directory, loads settings, opens the device store,
 * binds the debug log buffer as the process-wide durable sink, and builds
 * the ConfigMutator. shutdown() flushes the buffer and unbinds it; every
 * command runs inside withRuntime() so that happens on all paths.
 */

import type { Command } from 'commander'
import {
  ConfigMutator,
  DualSinkLogger,
  bindDurableSink,
  unbindDurableSink,
} from '@meshconf/kernel'
import {
  DebugLogBuffer,
  FileStateIO,
  JsonlDebugLogWriter,
  StateDeviceConfigStore,
  loadSettings,
  resolveMeshconfHome,
} from '@meshconf/runtime-host'
import type { MeshconfSettings, StateIO } from '@meshconf/runtime-host'
import { terminalSink } from './tui/theme.js'

export interface Runtime {
  readonly home: string
  readonly settings: MeshconfSettings
  readonly stateIO: StateIO
  readonly store: StateDeviceConfigStore
  readonly buffer: DebugLogBuffer
  readonly mutator: ConfigMutator
  logger(category: string): DualSinkLogger
  shutdown(): Promise<void>
}

export interface BuildRuntimeOptions {
  readonly home?: string | undefined
  readonly ephemeral?: NodeJS.WritableStream | undefined
}

export function buildRuntime(opts: BuildRuntimeOptions = {}): Runtime {
  const home = resolveMeshconfHome({ home: opts.home })
  const { settings, warnings } = loadSettings(home)
  const sink = terminalSink(opts.ephemeral)

  const loggerFor = (subsystem: string, category: string, durable = true): DualSinkLogger =>
    new DualSinkLogger(subsystem, category, { ephemeral: sink, minLevel: settings.logLevel, durable })

  const stateIO = new FileStateIO(home)
  const buffer = new DebugLogBuffer(new JsonlDebugLogWriter(stateIO), {
    maxBufferSize: settings.logBufferSize,
    flushIntervalMs: settings.logFlushIntervalMs,
    logger: loggerFor('meshconf.runtime', 'DebugLogBuffer', false),
  })
  bindDurableSink(buffer)

  const cliLogger = loggerFor('meshconf.cli', 'runtime')
  for (const warning of warnings) {
    cliLogger.warning(`settings: ${warning}`)
  }

  const store = new StateDeviceConfigStore(stateIO)
  const mutator = new ConfigMutator(store, {
    customOcvPolicy: settings.customOcvPolicy,
    logger: loggerFor('meshconf.kernel', 'ConfigMutator'),
  })
  const observerLogger = loggerFor('meshconf.cli', 'observer')
  mutator.registerObserver({
    onDeviceConfigUpdated: (config) => {
      observerLogger.notice(`Device ${config.device_id} is now at revision ${config.revision}`)
    },
  })

  return {
    home,
    settings,
    stateIO,
    store,
    buffer,
    mutator,
    logger: (category) => loggerFor('meshconf.cli', category),
    async shutdown() {
      // Let handoffs queued by the last log calls reach the buffer first.
      await new Promise<void>((resolve) => setImmediate(resolve))
      await buffer.shutdown()
      unbindDurableSink()
    },
  }
}

/** The --home value from the root program, if given. */
export function homeOption(cmd: Command): string | undefined {
  const home: unknown = cmd.optsWithGlobals()['home']
  return typeof home === 'string' ? home : undefined
}

/** Run `task` with a fresh runtime and always shut it down afterwards. */
export async function withRuntime<T>(cmd: Command, task: (rt: Runtime) => Promise<T>): Promise<T> {
  const rt = buildRuntime({ home: homeOption(cmd) })
  try {
    return await task(rt)
  } finally {
    await rt.shutdown()
  }
}
