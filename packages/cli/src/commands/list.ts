import { Command } from 'commander';
import { createRuntime, type CliContext } from '../context';

export function registerListCommand(program: Command, context: CliContext) {
  program
    .command('list', { isDefault: true })
    .description('List cached git repositories [the default]')
    .allowExcessArguments(false)
    .action(async () => {
      const runtime = createRuntime(program, context);
      const repositories = await runtime.cacheStore().load();

      runtime.renderer.renderList({
        cachePath: runtime.loaded.cachePath,
        repositories: repositories.toSortedArray(),
      });
    });
}
