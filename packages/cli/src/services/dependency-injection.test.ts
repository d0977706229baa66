import { Config, Generator } from '@spec-changelog/core';
import { DependencyInjectionService } from './dependency-injection';

describe('DependencyInjectionService', () => {
  const missingConfig = '/nonexistent-spec-changelog/changelog.config.json';

  beforeEach(() => {
    DependencyInjectionService.reset();
  });

  it('should return the same instance until reset', () => {
    const first = DependencyInjectionService.getInstance();

    expect(DependencyInjectionService.getInstance()).toBe(first);

    DependencyInjectionService.reset();
    expect(DependencyInjectionService.getInstance()).not.toBe(first);
  });

  it('should fall back to the built-in configuration when the file is missing', async () => {
    const config = await DependencyInjectionService.getInstance().getConfig({ configPath: missingConfig });

    expect(config).toEqual(Config.DEFAULT_CHANGELOG_CONFIG);
  });

  it('should apply the since override', async () => {
    const config = await DependencyInjectionService.getInstance().getConfig({
      configPath: missingConfig,
      since: '2024-02-01',
    });

    expect(config.since).toBe('2024-02-01');
  });

  it('should reuse one git module across generators', async () => {
    const service = DependencyInjectionService.getInstance();

    const generator = await service.getChangelogGenerator({ configPath: missingConfig });

    expect(generator).toBeInstanceOf(Generator.ChangelogGenerator);
    expect(service.getGitModule()).toBe(service.getGitModule());
  });
});
