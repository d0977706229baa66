/**
 * MemoryGitModule - In-memory Git implementation for tests
 *
 * Test Helpers:
 * - setCommits(repoPath, commits[]): Register a work tree and its history
 * - setLog(repoPath, text): Register a work tree with a raw log dump
 * - setFailure(repoPath, stderr): Make getChangelogLog fail for a work tree
 * - getRequests(): Inspect the getChangelogLog calls made so far
 * - clear(): Reset all state
 *
 * @module git/memory
 */

import type { ChangelogLogOptions, IGitModule } from '../types';
import { GitCommandError } from '../errors';

/**
 * A commit as git would print it with --date=local
 */
export type MemoryCommit = {
  /** e.g. "Wed Jan 5 10:00:00 2022" */
  date: string;
  author: string;
  email: string;
  subject: string;
  /** e.g. " (HEAD -> main, tag: v1.0.0)"; empty when omitted */
  decorations?: string;
};

interface MemoryRepository {
  log: string;
  failure: string | null;
}

export class MemoryGitModule implements IGitModule {
  private repositories = new Map<string, MemoryRepository>();
  private requests: ChangelogLogOptions[] = [];

  async isRepository(repoPath: string): Promise<boolean> {
    return this.repositories.has(repoPath);
  }

  async getChangelogLog(options: ChangelogLogOptions): Promise<string> {
    this.requests.push({ ...options });

    const repository = this.repositories.get(options.repoPath);
    if (!repository) {
      throw new GitCommandError(
        `Failed to read history of ${options.repoPath}`,
        `fatal: not a git repository: ${options.repoPath}`,
        'git log',
        '',
        128
      );
    }

    if (repository.failure !== null) {
      throw new GitCommandError(
        `Failed to read history of ${options.repoPath}`,
        repository.failure,
        'git log',
        '',
        128
      );
    }

    return repository.log;
  }

  // ═══════════════════════════════════════════════════════════════════════
  // TEST HELPERS
  // ═══════════════════════════════════════════════════════════════════════

  setCommits(repoPath: string, commits: MemoryCommit[]): void {
    const log = commits
      .map((c) => `* ${c.date} ${c.author}<${c.email}> \n- ${c.subject}${c.decorations ?? ''}\n\n`)
      .join('');
    this.setLog(repoPath, log);
  }

  setLog(repoPath: string, log: string): void {
    this.repositories.set(repoPath, { log, failure: null });
  }

  setFailure(repoPath: string, stderr: string): void {
    const repository = this.repositories.get(repoPath);
    this.repositories.set(repoPath, { log: repository?.log ?? '', failure: stderr });
  }

  getRequests(): ChangelogLogOptions[] {
    return [...this.requests];
  }

  clear(): void {
    this.repositories.clear();
    this.requests = [];
  }
}
