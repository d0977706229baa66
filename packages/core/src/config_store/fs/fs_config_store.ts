/**
 * FsConfigStore - Filesystem implementation of ConfigStore
 *
 * Reads `.json` files with JSON.parse and `.yaml`/`.yml` files with js-yaml.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import * as yaml from 'js-yaml';
import type { ConfigStore } from '../config_store';
import { ConfigValidationError } from '../../errors';

export const DEFAULT_CONFIG_FILE = 'changelog.config.json';

export class FsConfigStore implements ConfigStore {
  private readonly configPath: string;

  constructor(configPath: string = DEFAULT_CONFIG_FILE) {
    this.configPath = path.resolve(configPath);
  }

  /**
   * Returns null for a missing file; a file that exists but does not parse
   * is an error rather than a silent fallback to defaults.
   */
  async loadConfig(): Promise<unknown> {
    let content: string;
    try {
      content = await fs.readFile(this.configPath, 'utf-8');
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        return null;
      }
      throw error;
    }

    try {
      return this.isYaml() ? yaml.load(content) ?? null : JSON.parse(content);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ConfigValidationError(this.configPath, [{ field: 'root', message }]);
    }
  }

  describe(): string {
    return this.configPath;
  }

  private isYaml(): boolean {
    const extension = path.extname(this.configPath).toLowerCase();
    return extension === '.yaml' || extension === '.yml';
  }
}
