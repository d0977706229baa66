import { spawn } from 'child_process';
import type { ExecCommand, ExecOptions, ExecResult } from './command_runner.types';

/**
 * Creates an ExecCommand backed by child_process.spawn.
 *
 * No shell is involved, so arguments are passed through verbatim.
 * A command that cannot be started resolves with exitCode 127 and the
 * spawn error in stderr; a command killed by a signal resolves with 128.
 *
 * @param defaults - Options applied to every call (per-call options win)
 */
export function createExecCommand(defaults: ExecOptions = {}): ExecCommand {
  return (command: string, args: string[], options?: ExecOptions) => {
    return new Promise<ExecResult>((resolve) => {
      const cwd = options?.cwd ?? defaults.cwd ?? process.cwd();
      const proc = spawn(command, args, {
        cwd,
        env: { ...process.env, ...defaults.env, ...options?.env },
      });

      let stdout = '';
      let stderr = '';
      let settled = false;

      const finish = (result: ExecResult) => {
        if (!settled) {
          settled = true;
          resolve(result);
        }
      };

      proc.stdout?.on('data', (data: Buffer) => { stdout += data.toString('utf-8'); });
      proc.stderr?.on('data', (data: Buffer) => { stderr += data.toString('utf-8'); });

      proc.on('close', (code: number | null) => {
        finish({ exitCode: code ?? 128, stdout, stderr });
      });

      proc.on('error', (error: Error) => {
        finish({ exitCode: 127, stdout, stderr: stderr + error.message });
      });
    });
  };
}

/**
 * Renders a command line for diagnostics, quoting arguments that contain spaces.
 */
export function formatCommandLine(command: string, args: string[]): string {
  return [command, ...args]
    .map((part) => (/[\s"]/.test(part) ? JSON.stringify(part) : part))
    .join(' ');
}
