import type { ChangelogEntry } from '../changelog_parser';

export type CleanupOptions = {
  /** Entries whose subject starts with this word are dropped (default: "Merge") */
  mergePrefix: string;
};

export type CleanupResult = {
  entries: ChangelogEntry[];
  /** The merge entries that were dropped, in input order */
  removed: ChangelogEntry[];
};

export type EnrichOptions = {
  /** Ticket id prefixes, e.g. ["TFS", "EC"] */
  ticketPrefixes: string[];
  /**
   * Prefixes also recognised past the first word, when a digit follows
   * (default: ["TFS"])
   */
  inlineTicketPrefixes?: string[];
  /** CVE id prefix, e.g. "CVE-" */
  cvePrefix: string;
};
