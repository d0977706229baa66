import { Command } from 'commander';
import { registerGenerateCommand } from './commands/generate/generate';

export const CLI_VERSION = '1.0.0';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('spec-changelog')
    .description('Append upstream git history to an RPM spec file as %changelog entries')
    .version(CLI_VERSION);

  registerGenerateCommand(program);

  return program;
}
