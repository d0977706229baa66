import type { IGitModule } from '../git';
import type { ChangelogStore } from '../changelog_store';
import type { ChangelogConfig } from '../config_manager';
import type { ChangelogEntry } from '../changelog_parser';
import type { Logger } from '../logger';

export type ChangelogGeneratorDependencies = {
  git: IGitModule;
  store: ChangelogStore;
  config: ChangelogConfig;
  /** Defaults to a "[ChangelogGenerator] " console logger */
  logger?: Logger;
};

export type GenerateOptions = {
  /** Build the changelog and rewrite the log, but leave the spec file alone */
  dryRun?: boolean;
};

export type SourceReport = {
  name: string;
  path: string;
  entryCount: number;
};

export type GenerateResult = {
  /** Final changelog text, as written to the log and appended to the spec */
  text: string;
  entries: ChangelogEntry[];
  sources: SourceReport[];
  removedMergeCount: number;
  /** Lines of the working log that formed no entry */
  skippedLineCount: number;
  /** True when the text was appended to the spec file */
  published: boolean;
  logPath: string;
  specPath: string;
};
