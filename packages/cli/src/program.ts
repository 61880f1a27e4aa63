import { Command, CommanderError } from 'commander';
import { AppError, UsageError, isUserError } from '@roster/shared';
import { registerInfoCommand } from './commands/info';
import { registerListCommand } from './commands/list';
import { registerScanCommand } from './commands/scan';
import { registerStashesCommand } from './commands/stashes';
import { registerStatusCommand } from './commands/status';
import { defaultContext, type CliContext } from './context';
import type { GlobalOptions } from './types';
import { readVersion } from './version';

export const name = '@roster/cli';

export function createProgram(context: CliContext): Command {
  const program = new Command();
  const version = readVersion();

  program
    .name('roster')
    .description('Keep track of every git repository on this machine')
    .version(version)
    .option('--json', 'Output results as JSON')
    .option('--config <path>', 'Path to configuration file')
    .option('--verbose', 'Enable verbose logging')
    .option('--log-file <path>', 'Append structured events to a JSON-lines file')
    // Commander errors surface as UsageError through runCli.
    .exitOverride()
    .configureOutput({ outputError: () => {} });

  registerScanCommand(program, context);
  registerListCommand(program, context);
  registerStatusCommand(program, context);
  registerStashesCommand(program, context);
  registerInfoCommand(program, context, version);

  return program;
}

function renderError(e: unknown, opts: GlobalOptions): void {
  if (opts.json) {
    if (e instanceof AppError) {
      console.log(
        JSON.stringify({
          error: {
            code: e.code,
            message: e.message,
            details: e.details,
          },
        }),
      );
    } else {
      console.log(
        JSON.stringify({
          error: {
            code: 'UnknownError',
            message: e instanceof Error ? e.message : String(e),
          },
        }),
      );
    }
    return;
  }

  // Human-readable output
  console.error(`❌ Error: ${(e instanceof Error && e.message) || String(e)}`);
  if (e instanceof AppError && e.details) {
    console.error(
      `  Details: ${typeof e.details === 'string' ? e.details : JSON.stringify(e.details, null, 2)}`,
    );
  }
  if (opts.verbose && e instanceof Error && e.stack) {
    console.error(`\nStack Trace:\n${e.stack}`);
  } else {
    console.error(`\nFor more details, run with the --verbose flag.`);
  }
}

/**
 * Parses `argv` (including the node and script entries), runs the command
 * and resolves to the process exit code.
 */
export async function runCli(
  argv: string[],
  context: CliContext = defaultContext(),
): Promise<number> {
  const program = createProgram(context);
  try {
    await program.parseAsync(argv);
    return 0;
  } catch (caught) {
    let e = caught;
    if (caught instanceof CommanderError) {
      // --help and --version end parsing with exit code 0.
      if (caught.exitCode === 0) return 0;
      e = new UsageError(caught.message.replace(/^error: /, ''), { cause: caught });
    }
    renderError(e, program.opts<GlobalOptions>());
    return isUserError(e) ? 2 : 1;
  }
}
