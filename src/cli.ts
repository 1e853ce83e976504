#!/usr/bin/env node
/**
 * CLI entry point
 *
 * Usage:
 *   tsx src/cli.ts run [options] -- <command> [args...]
 */

import { loadConfig } from './config';
import { CliUsageError, parseRunArgs, toProcessOptions, type CliOptions } from './cli-options';
import { isCancellation, InvalidResultError } from './core/errors';
import { validate } from './core/result';
import { ProcessSession } from './runner/process-session';

const EXIT_USAGE = 2;
const EXIT_CANCELLED = 130;

async function main(): Promise<void> {
  const [command, ...args] = process.argv.slice(2);

  if (!command) {
    printUsage();
    process.exit(EXIT_USAGE);
  }

  switch (command) {
    case 'run': {
      process.exitCode = await run(args);
      break;
    }

    case 'help':
    case '--help':
    case '-h':
      printUsage();
      break;

    default:
      console.error(`Unknown command: ${command}`);
      printUsage();
      process.exit(EXIT_USAGE);
  }
}

async function run(args: string[]): Promise<number> {
  let cli: CliOptions;
  try {
    cli = parseRunArgs(args);
  } catch (err) {
    if (err instanceof CliUsageError) {
      console.error(`Error: ${err.message}`);
      return EXIT_USAGE;
    }
    throw err;
  }

  const config = loadConfig();
  const signal = cli.timeoutMs !== null ? AbortSignal.timeout(cli.timeoutMs) : undefined;
  const options = toProcessOptions(cli, (line) => console.log(line), signal);
  const session = new ProcessSession(cli.command, options, {
    ...config,
    verbose: config.verbose || cli.verbose,
  });

  try {
    const result = await session.run();
    if (cli.strict) {
      validate(result);
    }
    return result.exitCode;
  } catch (err) {
    if (isCancellation(err)) {
      console.error(`Cancelled: ${cli.command.join(' ')}`);
      return EXIT_CANCELLED;
    }
    if (err instanceof InvalidResultError) {
      console.error(`Error: ${err.message}`);
      return 1;
    }
    throw err;
  }
}

function printUsage(): void {
  console.log(`
proc-session

Commands:
  run [options] -- <command...>   Run a command and arbitrate its streams
  help                            Show this help message

Options:
  --stdout <sink>       print | silent | capture | consume | file:PATH | append:PATH (default: print)
  --stderr <sink>       same as --stdout (default: print)
  --input <text>        Write text to the command's stdin
  --input-file <path>   Redirect the command's stdin from a file
  --cwd <dir>           Working directory of the command
  --env KEY=VALUE       Add an environment variable (repeatable)
  --timeout <ms>        Cancel the command after this many milliseconds
  --force               Kill with SIGKILL instead of SIGTERM when cancelled
  --strict              Exit with 1 when the command exits non-zero
  --verbose, -v         Log session transitions to stderr

Environment:
  PROC_SESSION_DEBUG     Enable verbose logging (1/true/yes)
  PROC_SESSION_ENCODING  Output encoding (default: utf8)
  PROC_SESSION_KILL      graceful | forceful (default: graceful)

Examples:
  tsx src/cli.ts run --stdout capture --stderr capture -- ./build.sh
  tsx src/cli.ts run --input "hello" --stdout capture -- cat
  tsx src/cli.ts run --stdout file:out.log --timeout 5000 -- make test
`);
}

main().catch((err) => {
  console.error('Fatal error:', err);
  process.exit(1);
});
