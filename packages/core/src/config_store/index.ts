export type { ConfigStore } from './config_store';
export { FsConfigStore, DEFAULT_CONFIG_FILE } from './fs';
export { MemoryConfigStore } from './memory';
