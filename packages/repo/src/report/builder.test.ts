import { describe, it, expect } from 'vitest';
import type { Logger, RosterEvent } from '@roster/shared';
import { FakeBackend } from '../git/fake';
import { makeStatusFlags } from '../git/types';
import { RepositoryHandle, UNKNOWN_AGE_HOURS } from '../handle/repository-handle';
import { ReportBuilder, isDirty, type SummarySource } from './builder';

const NOW = new Date('2026-06-01T00:00:00Z');
const now = () => NOW;

function hoursAgo(hours: number): Date {
  return new Date(NOW.getTime() - hours * 60 * 60 * 1000);
}

function eventLogger(events: RosterEvent[]): Logger {
  const logger: Logger = {
    log: (event) => {
      events.push(event);
    },
    debug: () => {},
    info: () => {},
    warn: () => {},
    error: () => {},
    child: () => logger,
  };
  return logger;
}

function handles(backend: FakeBackend, paths: string[]): RepositoryHandle[] {
  return paths.map((p) => new RepositoryHandle(p, backend, { now }));
}

describe('ReportBuilder', () => {
  it('keeps inaccessible repositories as tagged entries in path order', async () => {
    const sources: SummarySource[] = [
      {
        path: '/r3',
        summarize: () => Promise.reject(new Error('repository vanished')),
      },
      {
        path: '/r2',
        summarize: () => Promise.resolve({ lastCommitAgeHours: 9000, shortStatus: 'M ' }),
      },
      {
        path: '/r1',
        summarize: () => Promise.resolve({ lastCommitAgeHours: 2, shortStatus: '  ' }),
      },
    ];

    const report = await new ReportBuilder({ now }).build(sources);

    expect(report.entries).toEqual([
      { path: '/r1', accessible: true, lastCommitAgeHours: 2, shortStatus: '  ' },
      { path: '/r2', accessible: true, lastCommitAgeHours: 9000, shortStatus: 'M ' },
      {
        path: '/r3',
        accessible: false,
        error: { code: 'UnknownError', message: 'repository vanished' },
      },
    ]);
    expect(report.counts).toEqual({ total: 3, accessible: 2, inaccessible: 1, dirty: 1 });
    expect(report.generatedAt).toBe('2026-06-01T00:00:00.000Z');
  });

  it('tags repositories that no longer open with the repository error code', async () => {
    const backend = new FakeBackend({ '/work/live': { headTimestamp: hoursAgo(3) } });

    const report = await new ReportBuilder().build(handles(backend, ['/work/live', '/work/gone']));

    expect(report.entries[0]).toEqual({
      path: '/work/gone',
      accessible: false,
      error: {
        code: 'RepositoryError',
        message: 'Could not open /work/gone as a git repository.',
      },
    });
  });

  it('tags repositories whose status cannot be read', async () => {
    const backend = new FakeBackend({ '/work/broken': { statusError: true } });

    const report = await new ReportBuilder().build(handles(backend, ['/work/broken']));

    expect(report.entries[0]).toMatchObject({
      accessible: false,
      error: { code: 'BackendError' },
    });
  });

  it('reports the unknown age for repositories without commits', async () => {
    const backend = new FakeBackend({ '/work/empty': { headTimestamp: null } });

    const report = await new ReportBuilder().build(handles(backend, ['/work/empty']));

    expect(report.entries[0]).toMatchObject({ lastCommitAgeHours: UNKNOWN_AGE_HOURS });
  });

  it('produces the same order on every build', async () => {
    const backend = new FakeBackend();
    const paths = ['/m', '/a', '/z', '/b', '/y'];
    for (const p of paths) backend.set(p, { headTimestamp: hoursAgo(1) });
    const builder = new ReportBuilder({ concurrency: 2 });

    const first = await builder.build(handles(backend, paths));
    const second = await builder.build(handles(backend, [...paths].reverse()));

    expect(first.entries.map((e) => e.path)).toEqual(['/a', '/b', '/m', '/y', '/z']);
    expect(second.entries).toEqual(first.entries);
  });

  it('sorts by the requested column', async () => {
    const backend = new FakeBackend({
      '/old': { headTimestamp: hoursAgo(100) },
      '/new': { headTimestamp: hoursAgo(1) },
      '/mid': { headTimestamp: hoursAgo(10) },
    });

    const report = await new ReportBuilder({ now }).build(
      handles(backend, ['/old', '/new', '/mid']),
      { sortBy: 'lastCommit' },
    );

    expect(report.sortBy).toBe('lastCommit');
    expect(report.direction).toBe('asc');
    expect(report.entries.map((e) => e.path)).toEqual(['/new', '/mid', '/old']);
  });

  it('never runs more summaries at once than the concurrency limit', async () => {
    let running = 0;
    let peak = 0;
    const sources: SummarySource[] = Array.from({ length: 12 }, (_, i) => ({
      path: `/repo${String(i).padStart(2, '0')}`,
      summarize: async () => {
        running++;
        peak = Math.max(peak, running);
        await new Promise((resolve) => setTimeout(resolve, 5));
        running--;
        return { lastCommitAgeHours: i, shortStatus: '  ' };
      },
    }));

    const report = await new ReportBuilder({ concurrency: 3 }).build(sources);

    expect(report.entries).toHaveLength(12);
    expect(peak).toBeLessThanOrEqual(3);
  });

  describe('filters', () => {
    const backend = new FakeBackend({
      '/clean': { headTimestamp: hoursAgo(5) },
      '/dirty': {
        headTimestamp: hoursAgo(500),
        statuses: [{ path: 'a.ts', flags: makeStatusFlags({ wtModified: true }) }],
      },
      '/stashed': { headTimestamp: hoursAgo(50), stashes: ['On main: wip'] },
    });
    const all = () => handles(backend, ['/clean', '/dirty', '/stashed', '/gone']);

    it('dirtyOnly keeps changed and inaccessible repositories', async () => {
      const report = await new ReportBuilder({ now }).build(all(), { dirtyOnly: true });

      expect(report.entries.map((e) => e.path)).toEqual(['/dirty', '/gone']);
      expect(report.counts).toEqual({ total: 4, accessible: 3, inaccessible: 1, dirty: 1 });
    });

    it('withStashesOnly collects stashes and keeps repositories that have them', async () => {
      const report = await new ReportBuilder({ now }).build(all(), { withStashesOnly: true });

      expect(report.entries.map((e) => e.path)).toEqual(['/gone', '/stashed']);
      expect(report.entries[1]).toMatchObject({ stashes: ['stash@{0}: On main: wip'] });
    });

    it('maxAgeHours drops repositories with an older tip', async () => {
      const report = await new ReportBuilder({ now }).build(all(), { maxAgeHours: 50 });

      expect(report.entries.map((e) => e.path)).toEqual(['/clean', '/gone', '/stashed']);
    });

    it('includes per-file status on request', async () => {
      const report = await new ReportBuilder({ now }).build(handles(backend, ['/dirty']), {
        includeStatusEntries: true,
      });

      expect(report.entries[0]).toMatchObject({ statusEntries: [{ path: 'a.ts', code: ' M' }] });
    });
  });

  it('emits a ReportBuilt event with the counts', async () => {
    const events: RosterEvent[] = [];
    const backend = new FakeBackend({ '/a': {} });

    await new ReportBuilder({ logger: eventLogger(events), runId: 'run-1' }).build(
      handles(backend, ['/a', '/b']),
    );

    expect(events).toHaveLength(1);
    expect(events[0]).toMatchObject({
      type: 'ReportBuilt',
      runId: 'run-1',
      payload: { total: 2, accessible: 1, inaccessible: 1, dirty: 0 },
    });
  });
});

describe('isDirty', () => {
  it('treats inaccessible entries as not dirty', () => {
    expect(
      isDirty({ path: '/x', accessible: false, error: { code: 'RepositoryError', message: '' } }),
    ).toBe(false);
  });

  it('counts staged-only changes once the full status is known', () => {
    expect(
      isDirty({
        path: '/x',
        accessible: true,
        lastCommitAgeHours: 0,
        shortStatus: '  ',
        statusEntries: [{ path: 'a', code: 'M ' }],
      }),
    ).toBe(true);
  });
});
