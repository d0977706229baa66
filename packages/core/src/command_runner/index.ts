/**
 * Command runner - spawns external tools and returns a typed result
 *
 * @module command_runner
 */

export { createExecCommand, formatCommandLine } from './command_runner';
export type { ExecCommand, ExecOptions, ExecResult } from './command_runner.types';
