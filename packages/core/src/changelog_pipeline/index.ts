export {
  annotateEntries,
  sortEntries,
  cleanupEntries,
  enrichEntries,
  findReferences,
  isMergeEntry,
  DEFAULT_MERGE_PREFIX,
  DEFAULT_TICKET_PREFIXES,
  DEFAULT_INLINE_TICKET_PREFIXES,
  DEFAULT_CVE_PREFIX,
} from './changelog_pipeline';
export type { CleanupOptions, CleanupResult, EnrichOptions } from './changelog_pipeline.types';
