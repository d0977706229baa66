export { ChangelogGenerator } from './changelog_generator';
export type {
  ChangelogGeneratorDependencies,
  GenerateOptions,
  GenerateResult,
  SourceReport,
} from './changelog_generator.types';
