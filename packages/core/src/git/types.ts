/**
 * Type Definitions for GitModule
 */

import type { ExecCommand } from '../command_runner';

/**
 * Dependencies required by LocalGitModule
 */
export type GitModuleDependencies = {
  /** Function to execute external commands (required) */
  execCommand: ExecCommand;
  /** Git executable (default: "git") */
  gitBinary?: string;
};

/**
 * Options for dumping a source tree's history as raw changelog text
 */
export type ChangelogLogOptions = {
  /** Work tree to read the history from */
  repoPath: string;
  /** Only commits after this moment, in any form `git log --after` accepts */
  since: string;
};

/**
 * Contract implemented by every Git backend
 */
export interface IGitModule {
  /**
   * Returns true when repoPath is inside a Git work tree
   */
  isRepository(repoPath: string): Promise<boolean>;

  /**
   * Returns the history of repoPath since options.since in the raw changelog format:
   *
   * ```
   * * <Weekday> <Mon> <D> <HH:MM:SS> <YYYY> <name><<email>> 
   * - <subject><decorations>
   *
   * ```
   */
  getChangelogLog(options: ChangelogLogOptions): Promise<string>;
}
