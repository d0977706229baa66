/**
 * ChangelogStore Interface
 *
 * Abstraction over the two files the generator touches:
 * - the working log file, rewritten by every run and never deleted
 * - the packaging spec file, which only ever gets text appended
 *
 * Implementations:
 * - FsChangelogStore: Filesystem-based
 * - MemoryChangelogStore: In-memory for tests
 */
export interface ChangelogStore {
  /** Replaces the working log with text (creating it if needed) */
  writeLog(text: string): Promise<void>;

  /** Appends text to the working log */
  appendLog(text: string): Promise<void>;

  /** Reads the working log; an absent log reads as "" */
  readLog(): Promise<string>;

  /** Reads the spec file, or null when it does not exist */
  readSpec(): Promise<string | null>;

  /** Appends text to the spec file (creating it if needed) */
  appendToSpec(text: string): Promise<void>;

  /** Human-readable locations, for logs and reports */
  describe(): { logPath: string; specPath: string };
}
