export { ChangelogError, ChangelogParseError, ConfigValidationError } from './errors';
export type { ConfigFieldError } from './errors';
