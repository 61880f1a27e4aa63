import { spawn } from 'child_process';
import path from 'path';
import { BackendError, ProcessError, RepositoryUnavailableError } from '@roster/shared';
import { parsePorcelainZ } from './porcelain';
import type {
  BackendRepository,
  BackendStatusEntry,
  StashEntry,
  StatusQueryOptions,
  VcsBackend,
} from './types';

export * from './types';
export { parsePorcelainZ, flagsFromXY } from './porcelain';

export interface GitCliBackendOptions {
  /** Executable to run. Defaults to `git` on PATH. */
  gitBinary?: string;
  env?: NodeJS.ProcessEnv;
}

// Variables that would point git at some other repository than the one asked for.
const REPO_OVERRIDE_VARS = ['GIT_DIR', 'GIT_WORK_TREE', 'GIT_INDEX_FILE', 'GIT_COMMON_DIR'];

/**
 * Answers backend queries by running read-only `git` commands.
 */
export class GitCliBackend implements VcsBackend {
  private readonly gitBinary: string;
  private readonly env: NodeJS.ProcessEnv;

  constructor(options: GitCliBackendOptions = {}) {
    this.gitBinary = options.gitBinary ?? 'git';
    const env = { ...(options.env ?? process.env) };
    for (const name of REPO_OVERRIDE_VARS) {
      delete env[name];
    }
    this.env = env;
  }

  private async exec(cwd: string, args: string[]): Promise<string> {
    return new Promise((resolve, reject) => {
      const child = spawn(this.gitBinary, ['--no-optional-locks', ...args], {
        cwd,
        env: {
          ...this.env,
          // Never discover a repository above the one being queried.
          GIT_CEILING_DIRECTORIES: path.dirname(cwd),
          GIT_OPTIONAL_LOCKS: '0',
        },
      });
      // Decoded once complete so multi-byte characters split across chunks survive.
      const stdout: Buffer[] = [];
      const stderr: Buffer[] = [];

      child.stdout.on('data', (data: Buffer) => {
        stdout.push(data);
      });

      child.stderr.on('data', (data: Buffer) => {
        stderr.push(data);
      });

      child.on('close', (code) => {
        if (code === 0) {
          resolve(Buffer.concat(stdout).toString('utf8'));
        } else {
          const message = Buffer.concat(stderr).toString('utf8').trim();
          reject(
            new ProcessError(`Git command failed: git ${args.join(' ')}\n${message}`, {
              exitCode: code ?? undefined,
              details: { cwd },
            }),
          );
        }
      });

      child.on('error', (err) => {
        reject(new ProcessError(`Failed to start git process: ${err.message}`, { cause: err }));
      });
    });
  }

  async open(repoPath: string): Promise<BackendRepository> {
    try {
      const gitDir = (await this.exec(repoPath, ['rev-parse', '--absolute-git-dir'])).trim();
      return { path: repoPath, gitDir };
    } catch (error) {
      throw new RepositoryUnavailableError(repoPath, { cause: error });
    }
  }

  async statuses(
    repo: BackendRepository,
    options: StatusQueryOptions,
  ): Promise<BackendStatusEntry[]> {
    const args = [
      'status',
      '--porcelain=v1',
      '-z',
      options.includeUntracked ? '--untracked-files=normal' : '--untracked-files=no',
      options.includeIgnored ? '--ignored=matching' : '--ignored=no',
    ];
    const output = await this.query(repo, args, 'read status');
    return parsePorcelainZ(output, options.show);
  }

  async headCommitTimestamp(repo: BackendRepository): Promise<Date | null> {
    try {
      await this.exec(repo.path, ['rev-parse', '--verify', '--quiet', 'HEAD^{commit}']);
    } catch {
      // Unborn branch: no commit yet.
      return null;
    }
    const output = await this.query(repo, ['log', '-1', '--format=%ct', 'HEAD'], 'read HEAD');
    const seconds = Number.parseInt(output.trim(), 10);
    if (!Number.isFinite(seconds)) {
      throw new BackendError(`Unexpected commit time "${output.trim()}" in ${repo.path}`);
    }
    return new Date(seconds * 1000);
  }

  async stashEntries(repo: BackendRepository): Promise<StashEntry[]> {
    const output = await this.query(repo, ['stash', 'list', '--format=%gs'], 'list stashes');
    return output
      .split('\n')
      .filter((line) => line.length > 0)
      .map((message, index) => ({ index, message }));
  }

  private async query(repo: BackendRepository, args: string[], what: string): Promise<string> {
    try {
      return await this.exec(repo.path, args);
    } catch (error) {
      throw new BackendError(`Could not ${what} for ${repo.path}`, { cause: error });
    }
  }
}
