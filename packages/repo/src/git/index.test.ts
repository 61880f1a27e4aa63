import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { spawn } from 'child_process';
import { BackendError, ProcessError, RepositoryUnavailableError } from '@roster/shared';
import { GitCliBackend } from './index';
import { makeStatusFlags } from './types';

const COMMIT_ENV = {
  GIT_AUTHOR_NAME: 'Test User',
  GIT_AUTHOR_EMAIL: 'test@example.com',
  GIT_COMMITTER_NAME: 'Test User',
  GIT_COMMITTER_EMAIL: 'test@example.com',
  GIT_AUTHOR_DATE: '2026-01-01T00:00:00Z',
  GIT_COMMITTER_DATE: '2026-01-01T00:00:00Z',
};

const run = (args: string[], cwd: string) => {
  return new Promise<void>((resolve, reject) => {
    const p = spawn('git', args, {
      cwd,
      stdio: 'ignore',
      env: { ...process.env, ...COMMIT_ENV, GIT_CEILING_DIRECTORIES: path.dirname(cwd) },
    });
    p.on('close', (code) => {
      if (code === 0) resolve();
      else reject(new Error(`Command git ${args.join(' ')} failed with code ${code}`));
    });
    p.on('error', reject);
  });
};

describe('GitCliBackend', () => {
  let tmpDir: string;
  let backend: GitCliBackend;

  beforeEach(async () => {
    tmpDir = await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), 'roster-git-test-')));
    backend = new GitCliBackend();
    await run(['init', '-q'], tmpDir);
    await run(['config', 'commit.gpgsign', 'false'], tmpDir);
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('opens a repository', async () => {
    const repo = await backend.open(tmpDir);
    expect(repo.path).toBe(tmpDir);
    expect(repo.gitDir).toBe(path.join(tmpDir, '.git'));
  });

  it('refuses a plain directory', async () => {
    const plain = await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), 'roster-plain-')));
    try {
      await expect(backend.open(plain)).rejects.toBeInstanceOf(RepositoryUnavailableError);
    } finally {
      await fs.rm(plain, { recursive: true, force: true });
    }
  });

  it('refuses a path that no longer exists', async () => {
    await expect(backend.open(path.join(tmpDir, 'missing'))).rejects.toBeInstanceOf(
      RepositoryUnavailableError,
    );
  });

  it('returns null for the tip of an empty repository', async () => {
    const repo = await backend.open(tmpDir);
    expect(await backend.headCommitTimestamp(repo)).toBeNull();
  });

  it('reads the tip commit time', async () => {
    await run(['commit', '--allow-empty', '-q', '-m', 'Initial commit'], tmpDir);
    const repo = await backend.open(tmpDir);
    expect(await backend.headCommitTimestamp(repo)).toEqual(new Date('2026-01-01T00:00:00Z'));
  });

  it('reports index and worktree flags', async () => {
    await fs.writeFile(path.join(tmpDir, 'tracked.txt'), 'one\n');
    await run(['add', 'tracked.txt'], tmpDir);
    await run(['commit', '-q', '-m', 'add tracked'], tmpDir);

    await fs.writeFile(path.join(tmpDir, 'tracked.txt'), 'two\n');
    await fs.writeFile(path.join(tmpDir, 'staged.txt'), 'new\n');
    await run(['add', 'staged.txt'], tmpDir);
    await fs.writeFile(path.join(tmpDir, 'untracked.txt'), 'x\n');

    const repo = await backend.open(tmpDir);
    const entries = await backend.statuses(repo, {
      show: 'index-and-worktree',
      includeUntracked: true,
      includeIgnored: false,
    });

    const byPath = Object.fromEntries(entries.map((e) => [e.path, e.flags]));
    expect(byPath).toEqual({
      'staged.txt': makeStatusFlags({ indexNew: true }),
      'tracked.txt': makeStatusFlags({ wtModified: true }),
      'untracked.txt': makeStatusFlags({ wtNew: true }),
    });
  });

  it('omits untracked files when asked to', async () => {
    await fs.writeFile(path.join(tmpDir, 'untracked.txt'), 'x\n');
    const repo = await backend.open(tmpDir);

    const entries = await backend.statuses(repo, {
      show: 'worktree-only',
      includeUntracked: false,
      includeIgnored: false,
    });

    expect(entries).toEqual([]);
  });

  it('lists stashes most recent first', async () => {
    await fs.writeFile(path.join(tmpDir, 'file.txt'), 'base\n');
    await run(['add', 'file.txt'], tmpDir);
    await run(['commit', '-q', '-m', 'base'], tmpDir);

    await fs.writeFile(path.join(tmpDir, 'file.txt'), 'first\n');
    await run(['stash', 'push', '-q', '-m', 'first change'], tmpDir);
    await fs.writeFile(path.join(tmpDir, 'file.txt'), 'second\n');
    await run(['stash', 'push', '-q', '-m', 'second change'], tmpDir);

    const repo = await backend.open(tmpDir);
    const stashes = await backend.stashEntries(repo);

    expect(stashes.map((s) => s.index)).toEqual([0, 1]);
    expect(stashes[0].message).toMatch(/second change$/);
    expect(stashes[1].message).toMatch(/first change$/);
  });

  it('wraps query failures in BackendError', async () => {
    const repo = await backend.open(tmpDir);
    await fs.rm(path.join(tmpDir, '.git'), { recursive: true, force: true });

    await expect(
      backend.statuses(repo, { show: 'index-and-worktree', includeUntracked: true, includeIgnored: false }),
    ).rejects.toBeInstanceOf(BackendError);
  });
});

describe('GitCliBackend with a scripted git', () => {
  let tmpDir: string;
  let gitBinary: string;

  beforeEach(async () => {
    tmpDir = await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), 'roster-fake-git-')));
    gitBinary = path.join(tmpDir, 'fake-git');
    await fs.copyFile(path.join(__dirname, '__fixtures__', 'fake-git.sh'), gitBinary);
    await fs.chmod(gitBinary, 0o755);
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  const backendFor = (mode = '') =>
    new GitCliBackend({ gitBinary, env: { ...process.env, FAKE_GIT_MODE: mode } });

  const statusOptions = {
    show: 'index-and-worktree',
    includeUntracked: true,
    includeIgnored: false,
  } as const;

  it('opens the directory it was given', async () => {
    const repo = await backendFor().open(tmpDir);

    expect(repo).toEqual({ path: tmpDir, gitDir: path.join(tmpDir, '.git') });
  });

  it('keeps multi-byte characters intact when output arrives in pieces', async () => {
    const backend = backendFor();
    const repo = await backend.open(tmpDir);

    const entries = await backend.statuses(repo, statusOptions);

    expect(entries).toEqual([
      { path: 'café.txt', flags: makeStatusFlags({ wtNew: true }) },
      { path: 'src/naïve.ts', flags: makeStatusFlags({ wtModified: true }) },
    ]);
  });

  it('reads the tip commit time from seconds since the epoch', async () => {
    const backend = backendFor();
    const repo = await backend.open(tmpDir);

    expect(await backend.headCommitTimestamp(repo)).toEqual(new Date('2026-01-01T00:00:00Z'));
  });

  it('returns null when HEAD does not resolve to a commit', async () => {
    const backend = backendFor('unborn');
    const repo = await backend.open(tmpDir);

    expect(await backend.headCommitTimestamp(repo)).toBeNull();
  });

  it('numbers stash lines in the order git lists them', async () => {
    const backend = backendFor();
    const repo = await backend.open(tmpDir);

    expect(await backend.stashEntries(repo)).toEqual([
      { index: 0, message: 'On main: résumé' },
      { index: 1, message: 'WIP on main: abc1234 first' },
    ]);
  });

  it('keeps the decoded stderr and exit code of a failed open', async () => {
    const error = await backendFor('fail')
      .open(tmpDir)
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RepositoryUnavailableError);
    const cause = error instanceof RepositoryUnavailableError ? error.cause : undefined;
    expect(cause).toBeInstanceOf(ProcessError);
    expect(cause).toMatchObject({
      exitCode: 128,
      message: 'Git command failed: git rev-parse --absolute-git-dir\nfatal: dépôt introuvable',
    });
  });

  it('wraps a failed status query in BackendError', async () => {
    const backend = backendFor('status-fail');
    const repo = await backend.open(tmpDir);

    await expect(backend.statuses(repo, statusOptions)).rejects.toThrow(
      new BackendError(`Could not read status for ${tmpDir}`),
    );
  });

  it('reports a git binary that cannot be started', async () => {
    const backend = new GitCliBackend({ gitBinary: path.join(tmpDir, 'no-such-git') });

    const error = await backend.open(tmpDir).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RepositoryUnavailableError);
    const cause = error instanceof RepositoryUnavailableError ? error.cause : undefined;
    expect(cause).toBeInstanceOf(ProcessError);
    expect(cause instanceof Error ? cause.message : '').toMatch(/^Failed to start git process: /);
  });
});
