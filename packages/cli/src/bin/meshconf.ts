#!/usr/bin/env node
/**
 * bin/meshconf.ts: entry point for the `meshconf` CLI command.
 *
 * Parses argv with the Commander program. Each command flushes the debug
 * log before it returns, so the process can exit as soon as parsing ends.
 */

const { program } = await import('../commands/index.js')
await program.parseAsync()
