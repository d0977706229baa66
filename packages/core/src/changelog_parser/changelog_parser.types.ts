/**
 * ChangelogParser Types
 */

/**
 * Commit date tokens exactly as `git log --date=local` prints them.
 * `time` is null once the time of day has been dropped from the header.
 */
export type CommitDate = {
  weekday: string;
  month: string;
  day: number;
  time: string | null;
  year: number;
};

/**
 * Ticket and CVE references found in an entry's body.
 */
export type EntryReferences = {
  /** e.g. "TFS12345" or "EC881" */
  ticket: string | null;
  /** e.g. "CVE-2023-0001" */
  cve: string | null;
};

/**
 * One commit's changelog record (header line + body line).
 */
export type ChangelogEntry = {
  date: CommitDate;
  /** Wall-clock commit date in epoch milliseconds; a missing time counts as midnight */
  timestamp: number;
  author: string;
  email: string;
  subject: string;
  /** Ref decorations including the leading space, e.g. " (HEAD -> main)"; empty when none */
  decorations: string;
  /** Tag markers appended after the subject, in order */
  markers: string[];
  /** null until the entry has been enriched */
  references: EntryReferences | null;
};

export type SkippedLine = {
  /** 1-based */
  lineNumber: number;
  line: string;
  reason: 'orphan-header' | 'stray-line';
};

export type ParsedLog = {
  entries: ChangelogEntry[];
  skipped: SkippedLine[];
};

export type ParseOptions = {
  /**
   * Markers that may trail a body line. They are split off into `markers`
   * instead of being read as part of the subject.
   */
  markers?: string[];
};
