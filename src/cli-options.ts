/**
 * Argument parsing for the `run` command of the CLI
 */

import { z } from 'zod';
import { InputSource } from './core/input-source';
import { Redirect } from './core/redirect';
import type { ProcessOptions, StreamSink } from './types';

export type SinkSpec =
  | { mode: 'print' | 'silent' | 'capture' | 'consume' }
  | { mode: 'file'; path: string; append: boolean };

export interface CliOptions {
  command: string[];
  stdout: SinkSpec;
  stderr: SinkSpec;
  input: string | null;
  inputFile: string | null;
  cwd: string | null;
  env: Record<string, string>;
  timeoutMs: number | null;
  force: boolean;
  strict: boolean;
  verbose: boolean;
}

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

const SinkModeSchema = z.enum(['print', 'silent', 'capture', 'consume']);
const TimeoutSchema = z.coerce.number().int().positive();
const EnvPairSchema = z
  .string()
  .regex(/^[A-Za-z_][A-Za-z0-9_]*=/, 'expected KEY=VALUE');

export function parseSink(value: string): SinkSpec {
  for (const [prefix, append] of [['file:', false], ['append:', true]] as const) {
    if (value.startsWith(prefix)) {
      const path = value.slice(prefix.length);
      if (!path) {
        throw new CliUsageError(`Missing path in "${value}"`);
      }
      return { mode: 'file', path, append };
    }
  }

  const parsed = SinkModeSchema.safeParse(value);
  if (!parsed.success) {
    throw new CliUsageError(
      `Invalid sink "${value}" (expected print, silent, capture, consume, file:PATH or append:PATH)`
    );
  }
  return { mode: parsed.data };
}

function takeValue(args: string[], index: number, flag: string): string {
  const value = args[index + 1];
  if (value === undefined) {
    throw new CliUsageError(`${flag} requires a value`);
  }
  return value;
}

/**
 * Parse the arguments following `run`. The command starts after `--`, or at
 * the first argument that is not an option.
 */
export function parseRunArgs(args: string[]): CliOptions {
  const options: CliOptions = {
    command: [],
    stdout: { mode: 'print' },
    stderr: { mode: 'print' },
    input: null,
    inputFile: null,
    cwd: null,
    env: {},
    timeoutMs: null,
    force: false,
    strict: false,
    verbose: false,
  };

  let i = 0;
  for (; i < args.length; i++) {
    const arg = args[i];
    if (arg === undefined || arg === '--') {
      i++;
      break;
    }
    if (!arg.startsWith('-')) break;

    switch (arg) {
      case '--stdout':
        options.stdout = parseSink(takeValue(args, i++, arg));
        break;
      case '--stderr':
        options.stderr = parseSink(takeValue(args, i++, arg));
        break;
      case '--input':
        options.input = takeValue(args, i++, arg);
        break;
      case '--input-file':
        options.inputFile = takeValue(args, i++, arg);
        break;
      case '--cwd':
        options.cwd = takeValue(args, i++, arg);
        break;
      case '--env': {
        const pair = EnvPairSchema.safeParse(takeValue(args, i++, arg));
        if (!pair.success) {
          throw new CliUsageError(`--env expects KEY=VALUE, got "${args[i] ?? ''}"`);
        }
        const separator = pair.data.indexOf('=');
        options.env[pair.data.slice(0, separator)] = pair.data.slice(separator + 1);
        break;
      }
      case '--timeout': {
        const timeout = TimeoutSchema.safeParse(takeValue(args, i++, arg));
        if (!timeout.success) {
          throw new CliUsageError(`--timeout expects a positive integer, got "${args[i] ?? ''}"`);
        }
        options.timeoutMs = timeout.data;
        break;
      }
      case '--force':
        options.force = true;
        break;
      case '--strict':
        options.strict = true;
        break;
      case '--verbose':
      case '-v':
        options.verbose = true;
        break;
      default:
        throw new CliUsageError(`Unknown option: ${arg}`);
    }
  }

  options.command = args.slice(i);
  if (options.command.length === 0) {
    throw new CliUsageError('A command to run is required');
  }
  if (options.input !== null && options.inputFile !== null) {
    throw new CliUsageError('--input and --input-file are mutually exclusive');
  }
  return options;
}

function toSink(spec: SinkSpec, label: string, write: (line: string) => void): StreamSink {
  switch (spec.mode) {
    case 'print':
      return Redirect.PRINT;
    case 'silent':
      return Redirect.SILENT;
    case 'capture':
      return Redirect.CAPTURE;
    case 'consume':
      return Redirect.consume(async (lines) => {
        for await (const line of lines) {
          write(`${label}> ${line}`);
        }
      });
    case 'file':
      return Redirect.toFile(spec.path, spec.append);
  }
}

/**
 * Map parsed CLI options onto session options. Captured and consumed lines
 * are handed to `write` as they arrive.
 */
export function toProcessOptions(
  cli: CliOptions,
  write: (line: string) => void,
  signal?: AbortSignal
): ProcessOptions {
  const stdin =
    cli.input !== null
      ? InputSource.fromString(cli.input)
      : cli.inputFile !== null
        ? InputSource.fromFile(cli.inputFile)
        : undefined;

  return {
    stdin,
    stdout: toSink(cli.stdout, 'stdout', write),
    stderr: toSink(cli.stderr, 'stderr', write),
    env: cli.env,
    cwd: cli.cwd ?? undefined,
    consumer: write,
    destroyForcibly: cli.force || undefined,
    signal,
  };
}
