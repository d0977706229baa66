/**
 * ConfigStore Interface
 *
 * Abstraction for loading the changelog configuration document.
 *
 * Implementations:
 * - FsConfigStore: JSON or YAML file on disk
 * - MemoryConfigStore: In-memory for tests
 *
 * Stores return the raw document; validation and defaults belong to ConfigManager.
 */
export interface ConfigStore {
  /**
   * Load the raw configuration document
   *
   * @returns The parsed document, or null when there is none
   * @throws ConfigValidationError if the document exists but cannot be parsed
   */
  loadConfig(): Promise<unknown>;

  /** Where the document comes from, for error messages */
  describe(): string;
}
