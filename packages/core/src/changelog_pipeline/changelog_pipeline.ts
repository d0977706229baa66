/**
 * Changelog pipeline stages
 *
 * Pure functions over ChangelogEntry lists. None of them mutates its input;
 * each returns new entries so stages compose in any order the generator needs.
 *
 * @module changelog_pipeline
 */

import type { ChangelogEntry, EntryReferences } from '../changelog_parser';
import type { CleanupOptions, CleanupResult, EnrichOptions } from './changelog_pipeline.types';

export const DEFAULT_MERGE_PREFIX = 'Merge';
export const DEFAULT_TICKET_PREFIXES = ['TFS', 'EC'];
export const DEFAULT_INLINE_TICKET_PREFIXES = ['TFS'];
export const DEFAULT_CVE_PREFIX = 'CVE-';

function words(text: string): string[] {
  return text.split(/\s+/).filter((word) => word.length > 0);
}

/**
 * Appends a tag marker to every entry (e.g. "RUNC" for the runc source tree).
 * An empty marker leaves the entries unchanged.
 */
export function annotateEntries(entries: ChangelogEntry[], marker: string): ChangelogEntry[] {
  if (!marker) {
    return [...entries];
  }
  return entries.map((entry) => ({ ...entry, markers: [...entry.markers, marker] }));
}

/**
 * Orders entries newest first. Entries sharing a timestamp keep their input order.
 */
export function sortEntries(entries: ChangelogEntry[]): ChangelogEntry[] {
  // Array.prototype.sort is stable
  return [...entries].sort((a, b) => b.timestamp - a.timestamp);
}

/**
 * Returns true when the subject's first word starts with the merge prefix.
 */
export function isMergeEntry(entry: ChangelogEntry, mergePrefix: string = DEFAULT_MERGE_PREFIX): boolean {
  const [firstWord] = words(entry.subject);
  return firstWord !== undefined && firstWord.startsWith(mergePrefix);
}

/**
 * Drops the time of day from every header and removes merge entries.
 *
 * A merge entry is removed on its own wherever it sits in the log; entries
 * around it are kept. Running cleanup on cleaned entries returns them unchanged.
 */
export function cleanupEntries(
  entries: ChangelogEntry[],
  options: CleanupOptions = { mergePrefix: DEFAULT_MERGE_PREFIX }
): CleanupResult {
  const kept: ChangelogEntry[] = [];
  const removed: ChangelogEntry[] = [];

  for (const entry of entries) {
    if (isMergeEntry(entry, options.mergePrefix)) {
      removed.push(entry);
      continue;
    }
    kept.push({ ...entry, date: { ...entry.date, time: null } });
  }

  return { entries: kept, removed };
}

/**
 * Finds the ticket and CVE references of one entry.
 *
 * Ticket: the first word when it starts with a ticket prefix; otherwise the
 * first word made of an inline ticket prefix directly followed by a digit.
 * "EC" stays out of the inline set by default so words like "EC2" are not tickets.
 * CVE: the last word starting with the CVE prefix.
 */
export function findReferences(
  entry: ChangelogEntry,
  options: EnrichOptions = { ticketPrefixes: DEFAULT_TICKET_PREFIXES, cvePrefix: DEFAULT_CVE_PREFIX }
): EntryReferences {
  const bodyWords = words(`${entry.subject}${entry.decorations} ${entry.markers.join(' ')}`);
  const prefixes = options.ticketPrefixes.filter((prefix) => prefix.length > 0);
  const inlinePrefixes = (options.inlineTicketPrefixes ?? DEFAULT_INLINE_TICKET_PREFIXES)
    .filter((prefix) => prefix.length > 0);

  const [firstWord] = bodyWords;
  let ticket: string | null = null;
  if (firstWord !== undefined && prefixes.some((prefix) => firstWord.startsWith(prefix))) {
    ticket = firstWord;
  } else {
    ticket = bodyWords.find((word) =>
      inlinePrefixes.some((prefix) => word.startsWith(prefix) && /^\d/.test(word.slice(prefix.length)))
    ) ?? null;
  }

  let cve: string | null = null;
  if (options.cvePrefix) {
    for (const word of bodyWords) {
      if (word.startsWith(options.cvePrefix)) {
        cve = word;
      }
    }
  }

  return { ticket, cve };
}

/**
 * Attaches ticket/CVE references to every entry; rendering then appends
 * ` [<ticket>] {<cve>}` to the body line.
 */
export function enrichEntries(
  entries: ChangelogEntry[],
  options: EnrichOptions = { ticketPrefixes: DEFAULT_TICKET_PREFIXES, cvePrefix: DEFAULT_CVE_PREFIX }
): ChangelogEntry[] {
  return entries.map((entry) => ({ ...entry, references: findReferences(entry, options) }));
}
