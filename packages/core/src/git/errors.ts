/**
 * Custom Error Classes for GitModule
 */

import { ChangelogError } from '../errors';

/**
 * Base error class for all Git-related errors
 */
export class GitError extends ChangelogError {
  constructor(message: string, code: string = 'GIT_ERROR') {
    super(message, code);
  }
}

/**
 * Error thrown when a Git command fails
 */
export class GitCommandError extends GitError {
  public readonly stderr: string;
  public readonly stdout: string;
  public readonly command: string | undefined;
  public readonly exitCode: number | undefined;

  constructor(message: string, stderr: string = '', command?: string, stdout: string = '', exitCode?: number) {
    super(message, 'GIT_COMMAND_ERROR');
    this.stderr = stderr;
    this.stdout = stdout;
    this.command = command;
    this.exitCode = exitCode;
  }
}

/**
 * Error thrown when a configured source tree is not a Git work tree
 */
export class RepositoryNotFoundError extends GitError {
  public readonly repoPath: string;

  constructor(repoPath: string) {
    super(`Not a Git repository: ${repoPath}`, 'REPOSITORY_NOT_FOUND');
    this.repoPath = repoPath;
  }
}
