/**
 * MemoryChangelogStore - In-memory implementation of ChangelogStore
 *
 * Test Helpers:
 * - setLog(text) / getLog(): Seed and inspect the working log
 * - setSpec(text | null) / getSpec(): Seed and inspect the spec file
 */

import type { ChangelogStore } from '../changelog_store';

export class MemoryChangelogStore implements ChangelogStore {
  private log: string | null = null;
  private spec: string | null;
  private readonly logPath: string;
  private readonly specPath: string;

  constructor(options: { spec?: string | null; logPath?: string; specPath?: string } = {}) {
    this.spec = options.spec ?? null;
    this.logPath = options.logPath ?? 'memory://gitlog';
    this.specPath = options.specPath ?? 'memory://package.spec';
  }

  async writeLog(text: string): Promise<void> {
    this.log = text;
  }

  async appendLog(text: string): Promise<void> {
    this.log = (this.log ?? '') + text;
  }

  async readLog(): Promise<string> {
    return this.log ?? '';
  }

  async readSpec(): Promise<string | null> {
    return this.spec;
  }

  async appendToSpec(text: string): Promise<void> {
    this.spec = (this.spec ?? '') + text;
  }

  describe(): { logPath: string; specPath: string } {
    return { logPath: this.logPath, specPath: this.specPath };
  }

  // ==================== Test Helper Methods ====================

  setLog(text: string | null): void {
    this.log = text;
  }

  getLog(): string | null {
    return this.log;
  }

  setSpec(text: string | null): void {
    this.spec = text;
  }

  getSpec(): string | null {
    return this.spec;
  }
}
