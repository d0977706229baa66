/**
 * FsChangelogStore - Filesystem implementation of ChangelogStore
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import type { ChangelogStore } from '../changelog_store';

function isNotFound(error: unknown): boolean {
  return (error as NodeJS.ErrnoException).code === 'ENOENT';
}

export class FsChangelogStore implements ChangelogStore {
  private readonly logPath: string;
  private readonly specPath: string;

  constructor(logPath: string, specPath: string) {
    this.logPath = path.resolve(logPath);
    this.specPath = path.resolve(specPath);
  }

  async writeLog(text: string): Promise<void> {
    await fs.mkdir(path.dirname(this.logPath), { recursive: true });
    await fs.writeFile(this.logPath, text, 'utf-8');
  }

  async appendLog(text: string): Promise<void> {
    await fs.mkdir(path.dirname(this.logPath), { recursive: true });
    await fs.appendFile(this.logPath, text, 'utf-8');
  }

  async readLog(): Promise<string> {
    try {
      return await fs.readFile(this.logPath, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) {
        return '';
      }
      throw error;
    }
  }

  async readSpec(): Promise<string | null> {
    try {
      return await fs.readFile(this.specPath, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      throw error;
    }
  }

  async appendToSpec(text: string): Promise<void> {
    await fs.appendFile(this.specPath, text, 'utf-8');
  }

  describe(): { logPath: string; specPath: string } {
    return { logPath: this.logPath, specPath: this.specPath };
  }
}
