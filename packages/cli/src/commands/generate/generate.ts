import { Command } from 'commander';
import { GenerateCommand } from './generate-command';

/**
 * Register the generate command
 */
export function registerGenerateCommand(program: Command): void {
  const generateCommand = new GenerateCommand();
  generateCommand.register(program);
}
