export { parseChangelogLog, parseHeader, WEEKDAYS, MONTHS } from './changelog_parser';
export { renderChangelog, renderEntry, renderHeader, renderBody } from './changelog_renderer';
export type {
  ChangelogEntry,
  CommitDate,
  EntryReferences,
  ParsedLog,
  ParseOptions,
  SkippedLine,
} from './changelog_parser.types';
