/**
 * Base Command Class for the spec-changelog CLI
 *
 * Provides dependency injection plus consistent success/error output.
 */

import { Command } from 'commander';
import { DependencyInjectionService } from '../services/dependency-injection';
import type { BaseCommandOptions, ICompleteCommand } from '../interfaces/command';

export abstract class BaseCommand<TOptions extends BaseCommandOptions = BaseCommandOptions>
  implements ICompleteCommand<TOptions> {

  protected readonly container = DependencyInjectionService.getInstance();
  protected readonly logger = console;

  /**
   * Register the command with Commander.js
   */
  abstract register(program: Command): void;

  abstract execute(options: TOptions): Promise<void>;

  /**
   * Handle errors consistently across all commands
   */
  protected handleError(message: string, options: TOptions, error?: Error, exitCode: number = 1): void {
    const isJson = options.json || false;
    const isVerbose = options.verbose || false;

    if (isJson) {
      console.log(JSON.stringify({
        success: false,
        error: message,
        ...(error && 'code' in error && typeof error.code === 'string' ? { code: error.code } : {}),
        exitCode
      }, null, 2));
    } else {
      // Only add ❌ if message doesn't already have it
      const formattedMessage = message.startsWith('❌') ? message : `❌ ${message}`;
      console.error(formattedMessage);
      if (isVerbose && error) {
        console.error(`🔍 Technical details: ${error.stack}`);
      }
    }

    process.exit(exitCode);
  }

  /**
   * Handle successful output consistently
   */
  protected handleSuccess(data: unknown, options: TOptions, message?: string): void {
    const isJson = options.json || false;
    const isQuiet = options.quiet || false;

    if (isJson) {
      console.log(JSON.stringify({
        success: true,
        data
      }, null, 2));
    } else if (message && !isQuiet) {
      console.log(`✅ ${message}`);
    }
  }
}
