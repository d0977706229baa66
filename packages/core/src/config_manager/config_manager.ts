/**
 * ConfigManager - Changelog configuration
 *
 * Loads the raw document from a ConfigStore, validates it against
 * changelog_config.schema.json, fills defaults and applies overrides.
 * The resolved ChangelogConfig is what the generator receives at startup.
 */

import type { ConfigStore } from '../config_store/config_store';
import { ConfigValidationError } from '../errors';
import { validateChangelogConfig } from './config_validator';
import type {
  ChangelogConfig,
  ConfigOverrides,
  IConfigManager,
} from './config_manager.types';
import { createLogger } from '../logger/logger';

const logger = createLogger("[ConfigManager] ");

/**
 * Defaults reproduce the rpmbuild layout of the containerd package build:
 * runc history tagged RUNC, then containerd.io history.
 */
export const DEFAULT_CHANGELOG_CONFIG: ChangelogConfig = {
  logPath: '/root/rpmbuild/SPECS/gitlog',
  specPath: '/root/rpmbuild/SPECS/containerd.spec',
  since: '2022-01-05 00:00:00',
  sources: [
    { name: 'runc', path: '/root/rpmbuild/runc', marker: 'RUNC' },
    { name: 'containerd', path: '/root/rpmbuild/containerd.io' },
  ],
  mergePrefix: 'Merge',
  ticketPrefixes: ['TFS', 'EC'],
  inlineTicketPrefixes: ['TFS'],
  cvePrefix: 'CVE-',
};

const SINCE_PATTERN = /^\d{4}-\d{2}-\d{2}( \d{2}:\d{2}:\d{2})?$/;

export class ConfigManager implements IConfigManager {
  private readonly configStore: ConfigStore;

  constructor(configStore: ConfigStore) {
    this.configStore = configStore;
  }

  /**
   * Load and resolve the configuration
   *
   * @throws ConfigValidationError if the document or an override is invalid
   */
  async loadConfig(overrides: ConfigOverrides = {}): Promise<ChangelogConfig> {
    const raw = await this.configStore.loadConfig();
    const source = this.configStore.describe();

    let config: ChangelogConfig = { ...DEFAULT_CHANGELOG_CONFIG };

    if (raw === null || raw === undefined) {
      logger.debug(`No configuration at ${source}, using defaults`);
    } else {
      const result = validateChangelogConfig(raw);
      if (!result.isValid) {
        throw new ConfigValidationError(source, result.errors);
      }
      config = {
        logPath: result.config.logPath ?? config.logPath,
        specPath: result.config.specPath ?? config.specPath,
        since: result.config.since ?? config.since,
        sources: result.config.sources ?? config.sources,
        mergePrefix: result.config.mergePrefix ?? config.mergePrefix,
        ticketPrefixes: result.config.ticketPrefixes ?? config.ticketPrefixes,
        inlineTicketPrefixes: result.config.inlineTicketPrefixes ?? config.inlineTicketPrefixes,
        cvePrefix: result.config.cvePrefix ?? config.cvePrefix,
      };
    }

    if (overrides.since !== undefined) {
      if (!SINCE_PATTERN.test(overrides.since)) {
        throw new ConfigValidationError('--since', [
          { field: 'since', message: 'must match "YYYY-MM-DD[ HH:MM:SS]"' },
        ]);
      }
      config.since = overrides.since;
    }

    return config;
  }
}

/**
 * Markers configured on any source, used to split markers off parsed body lines.
 */
export function collectMarkers(config: ChangelogConfig): string[] {
  const markers = config.sources
    .map((source) => source.marker)
    .filter((marker): marker is string => typeof marker === 'string' && marker.length > 0);
  return [...new Set(markers)];
}
