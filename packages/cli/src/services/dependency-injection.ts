import { CommandRunner, Config, ConfigStore, Generator, Git, Store } from '@spec-changelog/core';

export type GeneratorOptions = {
  /** Configuration file (.json, .yaml or .yml); defaults to ./changelog.config.json */
  configPath?: string;
  /** Overrides the configured "since" moment */
  since?: string;
};

/**
 * Dependency Injection Service for the spec-changelog CLI
 *
 * Builds the core modules from the configuration file and wires them together.
 */
export class DependencyInjectionService {
  private static instance: DependencyInjectionService | null = null;
  private gitModule: Git.IGitModule | null = null;

  private constructor() { }

  /**
   * Singleton pattern to ensure single instance across CLI
   */
  static getInstance(): DependencyInjectionService {
    if (!DependencyInjectionService.instance) {
      DependencyInjectionService.instance = new DependencyInjectionService();
    }
    return DependencyInjectionService.instance;
  }

  static reset(): void {
    DependencyInjectionService.instance = null;
  }

  async getConfig(options: GeneratorOptions = {}): Promise<Config.ChangelogConfig> {
    const configStore = new ConfigStore.FsConfigStore(options.configPath);
    const configManager = new Config.ConfigManager(configStore);
    return configManager.loadConfig(options.since !== undefined ? { since: options.since } : {});
  }

  getGitModule(): Git.IGitModule {
    if (!this.gitModule) {
      this.gitModule = new Git.LocalGitModule({
        execCommand: CommandRunner.createExecCommand(),
      });
    }
    return this.gitModule;
  }

  async getChangelogGenerator(options: GeneratorOptions = {}): Promise<Generator.ChangelogGenerator> {
    const config = await this.getConfig(options);

    return new Generator.ChangelogGenerator({
      git: this.getGitModule(),
      store: new Store.FsChangelogStore(config.logPath, config.specPath),
      config,
    });
  }
}
