/**
 * ChangelogGenerator - end-to-end changelog build
 *
 * 1. Check that every source is a Git work tree, then extract each source's
 *    history (configuration order). The first source creates the working log,
 *    later ones append to it. A source with a marker is annotated before
 *    anything else is appended.
 * 2. Read the whole log back and parse it into entries.
 * 3. Sort newest first, drop times and merge entries, attach ticket/CVE references.
 * 4. Rewrite the log with the result and append it to the spec file.
 *
 * Steps run one after another; any failure stops the run and propagates.
 */

import type { IGitModule } from '../git';
import { RepositoryNotFoundError } from '../git';
import type { ChangelogStore } from '../changelog_store';
import type { ChangelogConfig, ChangelogSource } from '../config_manager';
import { collectMarkers } from '../config_manager';
import { parseChangelogLog, renderChangelog } from '../changelog_parser';
import { annotateEntries, cleanupEntries, enrichEntries, sortEntries } from '../changelog_pipeline';
import { ChangelogError } from '../errors';
import type { Logger } from '../logger';
import { createLogger } from '../logger';
import type {
  ChangelogGeneratorDependencies,
  GenerateOptions,
  GenerateResult,
  SourceReport,
} from './changelog_generator.types';

const CHANGELOG_SECTION = /^%changelog\s*$/m;

export class ChangelogGenerator {
  private readonly git: IGitModule;
  private readonly store: ChangelogStore;
  private readonly config: ChangelogConfig;
  private readonly logger: Logger;

  constructor(dependencies: ChangelogGeneratorDependencies) {
    this.git = dependencies.git;
    this.store = dependencies.store;
    this.config = dependencies.config;
    this.logger = dependencies.logger ?? createLogger("[ChangelogGenerator] ");
  }

  /**
   * Reads one source's history since the given moment, annotated with the
   * source's marker when it has one.
   *
   * @throws RepositoryNotFoundError if the source is not a Git work tree
   * @throws GitCommandError if git fails
   */
  async extract(source: ChangelogSource, since: string = this.config.since): Promise<string> {
    if (!(await this.git.isRepository(source.path))) {
      throw new RepositoryNotFoundError(source.path);
    }

    const raw = await this.git.getChangelogLog({ repoPath: source.path, since });
    if (!source.marker) {
      return raw;
    }

    const { entries, skipped } = parseChangelogLog(raw);
    if (skipped.length > 0) {
      this.logger.warn(`${source.name}: dropped ${skipped.length} lines that formed no entry`);
    }
    return renderChangelog(annotateEntries(entries, source.marker));
  }

  async generate(options: GenerateOptions = {}): Promise<GenerateResult> {
    const { logPath, specPath } = this.store.describe();
    const sources: SourceReport[] = [];

    if (this.config.sources.length === 0) {
      throw new ChangelogError('No changelog sources configured', 'NO_SOURCES');
    }
    await this.verifySources();

    for (const [index, source] of this.config.sources.entries()) {
      const text = await this.extract(source);
      const entryCount = parseChangelogLog(text).entries.length;

      if (index === 0) {
        await this.store.writeLog(text);
      } else {
        await this.store.appendLog(text);
      }

      sources.push({ name: source.name, path: source.path, entryCount });
      this.logger.info(`${source.name}: ${entryCount} commits since ${this.config.since}`);
    }

    const parsed = parseChangelogLog(await this.store.readLog(), { markers: collectMarkers(this.config) });
    for (const skipped of parsed.skipped) {
      this.logger.warn(`Skipping line ${skipped.lineNumber} of ${logPath} (${skipped.reason}): ${skipped.line}`);
    }

    const sorted = sortEntries(parsed.entries);
    const cleaned = cleanupEntries(sorted, { mergePrefix: this.config.mergePrefix });
    if (cleaned.removed.length > 0) {
      this.logger.info(`Removed ${cleaned.removed.length} merge entries`);
    }

    const entries = enrichEntries(cleaned.entries, {
      ticketPrefixes: this.config.ticketPrefixes,
      inlineTicketPrefixes: this.config.inlineTicketPrefixes,
      cvePrefix: this.config.cvePrefix,
    });
    const text = renderChangelog(entries);

    await this.store.writeLog(text);

    let published = false;
    if (options.dryRun) {
      this.logger.info(`Dry run: ${specPath} left unchanged`);
    } else {
      await this.publish(text, specPath);
      published = true;
    }

    return {
      text,
      entries,
      sources,
      removedMergeCount: cleaned.removed.length,
      skippedLineCount: parsed.skipped.length,
      published,
      logPath,
      specPath,
    };
  }

  // All sources are checked before the first write; a bad path leaves the previous log intact
  private async verifySources(): Promise<void> {
    for (const source of this.config.sources) {
      if (!(await this.git.isRepository(source.path))) {
        throw new RepositoryNotFoundError(source.path);
      }
    }
  }

  private async publish(text: string, specPath: string): Promise<void> {
    const spec = await this.store.readSpec();
    if (spec === null) {
      this.logger.warn(`${specPath} does not exist; it will contain only the changelog`);
    } else if (!CHANGELOG_SECTION.test(spec)) {
      this.logger.warn(`${specPath} has no %changelog section; appending anyway`);
    }

    await this.store.appendToSpec(text);
    this.logger.info(`Appended changelog to ${specPath}`);
  }
}
