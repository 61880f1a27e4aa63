import { RepositoryHandle, ReportBuilder, type Report, type ReportOptions } from '@roster/repo';
import type { CliContext, Runtime } from '../context';

/**
 * Builds a report over every cached repository.
 */
export async function buildCachedReport(
  runtime: Runtime,
  context: CliContext,
  options: ReportOptions,
  concurrency?: number,
): Promise<Report> {
  const repositories = await runtime.cacheStore().load();
  const handles = Array.from(
    repositories,
    (repoPath) => new RepositoryHandle(repoPath, context.backend, { now: context.now }),
  );
  const builder = new ReportBuilder({
    concurrency: concurrency ?? runtime.loaded.config.report.concurrency,
    logger: runtime.logger,
    runId: runtime.runId,
    now: context.now,
  });
  return builder.build(handles, options);
}
