/**
 * GitModule - history extraction for changelog sources
 *
 * @module git
 */

export { LocalGitModule, CHANGELOG_LOG_FORMAT } from './local';
export { MemoryGitModule } from './memory';

export type {
  IGitModule,
  GitModuleDependencies,
  ChangelogLogOptions,
} from './types';

export {
  GitError,
  GitCommandError,
  RepositoryNotFoundError,
} from './errors';
