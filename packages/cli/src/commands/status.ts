import { Command } from 'commander';
import type { ConfigInput } from '@roster/shared';
import { createRuntime, type CliContext } from '../context';
import { parseNonNegativeInt, parsePositiveInt, parseSortColumn } from './options';
import { buildCachedReport } from './report';

interface StatusCommandOptions {
  full?: boolean;
  sort?: string;
  desc?: boolean;
  dirty?: boolean;
  maxAge?: string;
  concurrency?: string;
}

export function registerStatusCommand(program: Command, context: CliContext) {
  program
    .command('status')
    .description('Show the status of every cached repository')
    .option('--full', 'List every changed file')
    .option('--sort <column>', 'Sort by path, lastCommit or status')
    .option('--desc', 'Reverse the sort order')
    .option('--dirty', 'Only show repositories with changes')
    .option('--max-age <hours>', 'Only show repositories committed to within this many hours')
    .option('--concurrency <n>', 'Repositories queried at the same time')
    .action(async (options: StatusCommandOptions) => {
      const report: NonNullable<ConfigInput['report']> = {};
      if (options.sort !== undefined) report.sortBy = parseSortColumn(options.sort);
      if (options.concurrency !== undefined) {
        report.concurrency = parsePositiveInt('--concurrency', options.concurrency);
      }
      const maxAgeHours =
        options.maxAge === undefined ? undefined : parseNonNegativeInt('--max-age', options.maxAge);

      const runtime = createRuntime(program, context, { report });
      const result = await buildCachedReport(runtime, context, {
        sortBy: runtime.loaded.config.report.sortBy,
        direction: options.desc ? 'desc' : 'asc',
        includeStatusEntries: options.full ?? false,
        dirtyOnly: options.dirty ?? false,
        maxAgeHours,
      });

      runtime.renderer.renderStatus(result);
    });
}
