/**
 * LocalGitModule - CLI-based implementation of IGitModule
 *
 * Runs the git executable through an injected execCommand so tests can
 * replace process spawning with a fake.
 *
 * @module git/local
 */

import type { ExecCommand, ExecResult } from '../../command_runner';
import { formatCommandLine } from '../../command_runner';
import type { ChangelogLogOptions, GitModuleDependencies, IGitModule } from '../types';
import { GitCommandError } from '../errors';
import { createLogger } from '../../logger/logger';

const logger = createLogger("[GitModule] ");

/**
 * `--format` template producing one header line, one body line and a blank
 * separator per commit. The trailing space on the header is part of the format.
 */
export const CHANGELOG_LOG_FORMAT = '* %cd %aN<%ae> %n- %s%d%n';

export class LocalGitModule implements IGitModule {
  private readonly execCommand: ExecCommand;
  private readonly gitBinary: string;

  /**
   * @throws Error if execCommand is not provided
   */
  constructor(dependencies: GitModuleDependencies) {
    if (!dependencies.execCommand) {
      throw new Error('execCommand is required for LocalGitModule');
    }

    this.execCommand = dependencies.execCommand;
    this.gitBinary = dependencies.gitBinary || 'git';
  }

  private async execGit(args: string[], cwd: string): Promise<ExecResult> {
    logger.debug(`${formatCommandLine(this.gitBinary, args)} (cwd: ${cwd})`);
    return this.execCommand(this.gitBinary, args, { cwd });
  }

  async isRepository(repoPath: string): Promise<boolean> {
    const result = await this.execGit(['rev-parse', '--is-inside-work-tree'], repoPath);
    return result.exitCode === 0 && result.stdout.trim() === 'true';
  }

  /**
   * Dumps the history of a work tree in the raw changelog format
   *
   * @throws GitCommandError if git exits non-zero
   *
   * @example
   * const text = await git.getChangelogLog({ repoPath: '/root/rpmbuild/runc', since: '2022-01-05 00:00:00' });
   * // => "* Wed Jan 5 10:00:00 2022 Jane Doe<jane@example.com> \n- fix build\n\n"
   */
  async getChangelogLog(options: ChangelogLogOptions): Promise<string> {
    const args = [
      'log',
      `--after=${options.since}`,
      `--format=${CHANGELOG_LOG_FORMAT}`,
      '--date=local',
    ];

    const result = await this.execGit(args, options.repoPath);

    if (result.exitCode !== 0) {
      throw new GitCommandError(
        `Failed to read history of ${options.repoPath}`,
        result.stderr,
        formatCommandLine(this.gitBinary, args),
        result.stdout,
        result.exitCode
      );
    }

    return result.stdout;
  }
}
