export { ConfigManager, DEFAULT_CHANGELOG_CONFIG, collectMarkers } from './config_manager';
export { validateChangelogConfig } from './config_validator';
export type {
  ChangelogConfig,
  ChangelogConfigFile,
  ChangelogSource,
  ConfigOverrides,
  IConfigManager,
} from './config_manager.types';
