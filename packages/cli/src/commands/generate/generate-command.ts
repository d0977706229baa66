import { Command } from 'commander';
import { BaseCommand } from '../../base/base-command';
import type { BaseCommandOptions } from '../../interfaces/command';

/**
 * Generate Command Options
 */
export interface GenerateCommandOptions extends BaseCommandOptions {
  /** Configuration file (default: ./changelog.config.json, built-in defaults when absent) */
  config?: string;
  /** Only commits after this moment, "YYYY-MM-DD[ HH:MM:SS]" */
  since?: string;
  /** Print the changelog instead of appending it to the spec file */
  dryRun?: boolean;
}

/**
 * Generate Command - Thin wrapper around ChangelogGenerator
 *
 * This command is responsible for:
 * - Parsing CLI arguments
 * - Injecting dependencies
 * - Formatting output (text/JSON)
 * - Setting exit codes
 */
export class GenerateCommand extends BaseCommand<GenerateCommandOptions> {
  protected commandName = 'generate';
  protected description = 'Build the changelog from git history and append it to the spec file';

  register(program: Command): void {
    program
      .command(this.commandName, { isDefault: true })
      .description(this.description)
      .option('-c, --config <file>', 'Configuration file (.json, .yaml or .yml)')
      .option('--since <timestamp>', 'Only commits after this moment (YYYY-MM-DD[ HH:MM:SS])')
      .option('--dry-run', 'Print the changelog instead of appending it to the spec file', false)
      .option('--json', 'Output in JSON format', false)
      .option('-v, --verbose', 'Show technical details on errors', false)
      .option('-q, --quiet', 'Only print errors', false)
      .action(async (options: GenerateCommandOptions) => {
        await this.execute(options);
      });
  }

  async execute(options: GenerateCommandOptions): Promise<void> {
    try {
      const generator = await this.container.getChangelogGenerator({
        ...(options.config !== undefined && { configPath: options.config }),
        ...(options.since !== undefined && { since: options.since }),
      });

      const result = await generator.generate({ dryRun: options.dryRun || false });

      if (options.json) {
        this.handleSuccess({
          entryCount: result.entries.length,
          removedMergeCount: result.removedMergeCount,
          skippedLineCount: result.skippedLineCount,
          sources: result.sources,
          published: result.published,
          logPath: result.logPath,
          specPath: result.specPath,
          changelog: result.text,
        }, options);
        return;
      }

      if (options.dryRun) {
        process.stdout.write(result.text);
        return;
      }

      if (!options.quiet) {
        for (const source of result.sources) {
          this.logger.info(`📦 ${source.name}: ${source.entryCount} commits`);
        }
        if (result.removedMergeCount > 0) {
          this.logger.info(`🧹 Removed ${result.removedMergeCount} merge entries`);
        }
      }

      this.handleSuccess(
        result,
        options,
        `Appended ${result.entries.length} changelog entries to ${result.specPath}`
      );
    } catch (error) {
      this.handleError(
        `Failed to generate changelog: ${error instanceof Error ? error.message : String(error)}`,
        options,
        error instanceof Error ? error : undefined
      );
    }
  }
}
