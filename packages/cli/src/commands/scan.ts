import { Command } from 'commander';
import { ScanAbortedError, type ConfigInput } from '@roster/shared';
import { RepoScanner } from '@roster/repo';
import { createRuntime, type CliContext } from '../context';
import { parsePositiveInt, splitIgnoreEntries } from './options';

interface ScanCommandOptions {
  ignore?: string[];
  hidden?: boolean;
  followSymlinks?: boolean;
  concurrency?: string;
}

export function registerScanCommand(program: Command, context: CliContext) {
  program
    .command('scan [roots...]')
    .description('Scan the filesystem for git repositories and update the cache')
    .option('--ignore <pattern...>', 'Skip directories matching a pattern or below a path')
    .option('--hidden', 'Also descend into directories whose name starts with a dot')
    .option('--no-follow-symlinks', 'Do not follow symlinked directories')
    .option('--concurrency <n>', 'Directories read at the same time')
    .action(async (roots: string[], options: ScanCommandOptions) => {
      const scan: NonNullable<ConfigInput['scan']> = {};
      if (roots.length > 0) scan.roots = roots;
      if (options.ignore) scan.ignore = options.ignore;
      if (options.hidden) scan.excludeHidden = false;
      if (options.followSymlinks === false) scan.followSymlinks = false;
      if (options.concurrency !== undefined) {
        scan.concurrency = parsePositiveInt('--concurrency', options.concurrency);
      }

      const runtime = createRuntime(program, context, { scan });
      const { config, roots: scanRoots, cachePath } = runtime.loaded;
      const { patterns, excludePaths } = splitIgnoreEntries(config.scan.ignore, context.home);

      const controller = new AbortController();
      const removeInterruptHandler = context.onInterrupt(() => {
        controller.abort(new Error('Interrupted'));
      });

      try {
        runtime.renderer.log(`Scanning ${scanRoots.join(', ')}`);
        const scanner = new RepoScanner(undefined, {
          logger: runtime.logger,
          runId: runtime.runId,
        });
        const result = await scanner.scan(scanRoots, {
          ignore: patterns,
          excludePaths,
          excludeHidden: config.scan.excludeHidden,
          followSymlinks: config.scan.followSymlinks,
          concurrency: config.scan.concurrency,
          signal: controller.signal,
          onRepository: (repoPath) => {
            void runtime.logger.debug(`Found ${repoPath}`);
          },
        });

        const store = runtime.cacheStore();
        const merged = await store.reconcile(result.repositories);
        // The cache keeps its previous contents when interrupted before the write.
        if (controller.signal.aborted) {
          throw new ScanAbortedError({ cause: controller.signal.reason });
        }
        await store.save(merged.repositories);

        runtime.renderer.renderScan({
          roots: scanRoots,
          cachePath,
          repositories: merged.repositories.toSortedArray(),
          added: merged.added,
          pruned: merged.pruned,
          warnings: result.warnings,
          directoriesVisited: result.stats.directoriesVisited,
          durationMs: result.stats.durationMs,
        });
      } finally {
        removeInterruptHandler();
      }
    });
}
