/**
 * Options for executing shell commands
 */
export type ExecOptions = {
  /** Working directory for the command */
  cwd?: string;
  /** Additional environment variables */
  env?: Record<string, string>;
};

/**
 * Result of executing a command
 */
export type ExecResult = {
  /** Exit code (0 = success) */
  exitCode: number;
  /** Standard output */
  stdout: string;
  /** Standard error output */
  stderr: string;
};

/**
 * Runs one external command and resolves with its captured output.
 * Implementations never reject: failures are reported through exitCode/stderr.
 */
export type ExecCommand = (
  command: string,
  args: string[],
  options?: ExecOptions
) => Promise<ExecResult>;
