import { Command } from 'commander';
import { createRuntime, type CliContext } from '../context';

const MS_PER_HOUR = 60 * 60 * 1000;

export function registerInfoCommand(program: Command, context: CliContext, version: string) {
  program
    .command('info')
    .description('Show where roster keeps its files and how fresh the cache is')
    .action(async () => {
      const runtime = createRuntime(program, context);
      const store = runtime.cacheStore();
      const [repositories, savedAt] = await Promise.all([store.load(), store.lastSavedAt()]);
      const { loaded } = runtime;

      runtime.renderer.renderInfo({
        version,
        rosterHome: loaded.rosterHome,
        userConfigPath: loaded.userConfigPath,
        configPath: loaded.configPath,
        cachePath: loaded.cachePath,
        repositoryCount: repositories.size,
        cacheUpdatedAt: savedAt ? savedAt.toISOString() : null,
        cacheAgeHours: savedAt
          ? Math.max(0, Math.trunc((context.now().getTime() - savedAt.getTime()) / MS_PER_HOUR))
          : null,
      });
    });
}
