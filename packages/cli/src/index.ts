/**
 * @meshconf/cli
 *
 * The `meshconf` operator CLI. The executable lives in src/bin/meshconf.ts;
 * this entry exposes the program and runtime wiring for embedding and tests.
 */

export { createProgram, program } from './commands/index.js';
export type { BuildRuntimeOptions, Runtime } from './runtime.js';
export { buildRuntime, withRuntime } from './runtime.js';
export type { AssignmentResult } from './commands/assignments.js';
export { parseAssignments, parseConfigValue } from './commands/assignments.js';
export { terminalSink } from './tui/theme.js';
