export type { ChangelogStore } from './changelog_store';
export { FsChangelogStore } from './fs';
export { MemoryChangelogStore } from './memory';
