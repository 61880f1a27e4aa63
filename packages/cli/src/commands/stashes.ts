import { Command } from 'commander';
import { createRuntime, type CliContext } from '../context';
import { buildCachedReport } from './report';

export function registerStashesCommand(program: Command, context: CliContext) {
  program
    .command('stashes')
    .description('List the stashes of every cached repository')
    .action(async () => {
      const runtime = createRuntime(program, context);
      const report = await buildCachedReport(runtime, context, { withStashesOnly: true });

      runtime.renderer.renderStashes(report);
    });
}
