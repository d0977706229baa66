/**
 * MemoryConfigStore - In-memory implementation of ConfigStore
 */

import type { ConfigStore } from '../config_store';

/**
 * In-memory ConfigStore implementation for tests.
 *
 * @example
 * ```typescript
 * const configStore = new MemoryConfigStore();
 * configStore.setConfig({ since: '2023-01-01' });
 * const config = await new ConfigManager(configStore).loadConfig();
 * ```
 */
export class MemoryConfigStore implements ConfigStore {
  private config: unknown = null;

  async loadConfig(): Promise<unknown> {
    return this.config;
  }

  describe(): string {
    return 'memory://config';
  }

  // ==================== Test Helper Methods ====================

  /**
   * Set the raw document directly; accepts null to clear it
   */
  setConfig(config: unknown): void {
    this.config = config;
  }
}
