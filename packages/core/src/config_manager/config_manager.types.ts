/**
 * ConfigManager Types
 */

/**
 * One upstream work tree contributing to the changelog
 */
export type ChangelogSource = {
  /** Short name used in logs and reports, e.g. "runc" */
  name: string;
  /** Path of the Git work tree */
  path: string;
  /** Tag marker appended to every entry of this source, e.g. "RUNC" */
  marker?: string;
};

/**
 * Configuration document as stored on disk. Every field is optional;
 * missing fields take the defaults of DEFAULT_CHANGELOG_CONFIG.
 */
export type ChangelogConfigFile = {
  logPath?: string;
  specPath?: string;
  since?: string;
  sources?: ChangelogSource[];
  mergePrefix?: string;
  ticketPrefixes?: string[];
  inlineTicketPrefixes?: string[];
  cvePrefix?: string;
};

/**
 * Fully resolved configuration passed into the generator
 */
export type ChangelogConfig = {
  /** Working log file, rewritten on every run */
  logPath: string;
  /** Packaging spec file receiving the changelog */
  specPath: string;
  /** Only commits after this moment ("YYYY-MM-DD[ HH:MM:SS]") */
  since: string;
  /** Extraction order; the first source creates the log, the others append */
  sources: ChangelogSource[];
  mergePrefix: string;
  ticketPrefixes: string[];
  /** Ticket prefixes also matched past the first word of a subject */
  inlineTicketPrefixes: string[];
  cvePrefix: string;
};

/**
 * Command-line overrides applied after the file is loaded
 */
export type ConfigOverrides = {
  since?: string;
};

export interface IConfigManager {
  loadConfig(overrides?: ConfigOverrides): Promise<ChangelogConfig>;
}
