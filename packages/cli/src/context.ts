import os from 'os';
import { Command } from 'commander';
import {
  ConsoleLogger,
  JsonlLogger,
  type ConfigInput,
  type Logger,
} from '@roster/shared';
import { CacheStore, GitCliBackend, type VcsBackend } from '@roster/repo';
import { ConfigLoader, type LoadedConfig } from './config/loader';
import { OutputRenderer } from './output';
import type { GlobalOptions } from './types';

/** Everything the commands take from the process, so tests can swap it. */
export interface CliContext {
  env: NodeJS.ProcessEnv;
  home: string;
  backend: VcsBackend;
  now: () => Date;
  /** Colored human output; defaults to terminal support */
  color?: boolean;
  /** Registers a Ctrl-C handler and returns its remover */
  onInterrupt: (handler: () => void) => () => void;
}

export function defaultContext(): CliContext {
  return {
    env: process.env,
    home: os.homedir(),
    backend: new GitCliBackend(),
    now: () => new Date(),
    onInterrupt: (handler) => {
      process.once('SIGINT', handler);
      return () => {
        process.removeListener('SIGINT', handler);
      };
    },
  };
}

export interface Runtime {
  options: GlobalOptions;
  loaded: LoadedConfig;
  logger: Logger;
  renderer: OutputRenderer;
  runId: string;
  cacheStore(): CacheStore;
}

/**
 * Resolves global options and configuration for one command invocation.
 */
export function createRuntime(
  program: Command,
  context: CliContext,
  flags: ConfigInput = {},
): Runtime {
  const options = program.opts<GlobalOptions>();
  const loaded = ConfigLoader.load({
    configPath: options.config,
    flags,
    env: context.env,
    home: context.home,
  });

  const consoleLogger = new ConsoleLogger({ level: options.verbose ? 'debug' : 'warn' });
  const logger: Logger = options.logFile
    ? new JsonlLogger(options.logFile, {}, consoleLogger)
    : consoleLogger;
  const runId = context.now().getTime().toString();

  return {
    options,
    loaded,
    logger,
    renderer: new OutputRenderer(options.json ?? false, { color: context.color }),
    runId,
    cacheStore: () => new CacheStore({ cachePath: loaded.cachePath, logger, runId }),
  };
}
