/**
 * Process Session - orchestrates one invocation end to end
 *
 * Holds the XState actor for the session lifecycle, launches the process
 * through the launcher port, runs every pump concurrently and only waits for
 * the exit code once all of them have drained their streams.
 */

import { createActor, type Actor } from 'xstate';
import { ExecaProcessLauncher } from '../adapters/execa-launcher.adapter';
import { DEFAULT_CONFIG, loadConfig, type SessionConfig } from '../config';
import {
  ProcessCancelledError,
  ProcessLaunchError,
  StreamPumpError,
  isCancellation,
  type StreamName,
} from '../core/errors';
import { Redirect, captureStream, resolveInput, resolveRedirects } from '../core/redirect';
import { createResult } from '../core/result';
import { ConsoleLogger, type Logger } from '../services/logger.service';
import { capturePump, consumePump, inputPump } from './stream-pump';
import {
  sessionMachine,
  getPhase,
  type SessionPhase,
  type SessionSnapshot,
} from '../workflows/session.workflow';
import type {
  ErrorDirective,
  IProcessLauncher,
  LaunchedProcess,
  StdioDirective,
} from '../ports/process.port';
import type { ProcessOptions, ProcessResult, StreamSink } from '../types';

interface PumpOutcome {
  lines: readonly string[] | null;
  error: StreamPumpError | null;
}

interface PumpTask {
  name: string;
  outcome: Promise<PumpOutcome>;
}

interface CancellationWatch {
  aborted: Promise<never>;
  dispose(): void;
}

function describe(reason: unknown): string {
  return reason instanceof Error ? reason.message : String(reason);
}

function startPump(
  stream: StreamName,
  role: string,
  pump: () => Promise<readonly string[] | null>
): PumpTask {
  return {
    name: `${stream}:${role}`,
    outcome: pump().then(
      (lines) => ({ lines, error: null }),
      (err: unknown) => ({ lines: null, error: new StreamPumpError(stream, err) })
    ),
  };
}

function requireStream<T>(stream: T | null, name: StreamName): T {
  if (!stream) {
    throw new Error(`Launcher did not provide a ${name} pipe`);
  }
  return stream;
}

/**
 * Reject once `signal` aborts; never settles otherwise.
 */
function watchCancellation(signal: AbortSignal | undefined): CancellationWatch {
  if (!signal) {
    return { aborted: new Promise<never>(() => {}), dispose: () => {} };
  }

  let onAbort = (): void => {};
  const aborted = new Promise<never>((_, reject) => {
    onAbort = () => reject(new ProcessCancelledError(signal.reason));
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener('abort', onAbort, { once: true });
    }
  });

  return {
    aborted,
    dispose: () => signal.removeEventListener('abort', onAbort),
  };
}

export class ProcessSession {
  private command: readonly string[];
  private options: Readonly<ProcessOptions>;
  private config: SessionConfig;
  private launcher: IProcessLauncher;
  private logger: Logger;
  private actor: Actor<typeof sessionMachine>;
  private used = false;

  constructor(
    command: readonly string[],
    options: ProcessOptions = {},
    config: SessionConfig = DEFAULT_CONFIG
  ) {
    this.command = Object.freeze([...command]);
    this.options = Object.freeze({ ...options });
    this.config = config;
    this.launcher = options.launcher ?? new ExecaProcessLauncher();
    this.logger = options.logger ?? new ConsoleLogger({ verbose: config.verbose });
    this.actor = createActor(sessionMachine, { input: { command: this.command } });
  }

  get phase(): SessionPhase {
    return getPhase(this.actor.getSnapshot());
  }

  get snapshot(): SessionSnapshot {
    return this.actor.getSnapshot();
  }

  /**
   * Run the invocation. Resolves with the result even for non-zero exit
   * codes; rejects with ProcessLaunchError, StreamPumpError or
   * ProcessCancelledError.
   */
  async run(): Promise<ProcessResult> {
    if (this.used) {
      throw new Error('A ProcessSession can only be run once');
    }
    this.used = true;

    const subscription = this.actor.subscribe((snapshot) => {
      this.logger.debug(`${this.command[0] ?? '<empty>'}: ${getPhase(snapshot)}`, {
        pid: snapshot.context.pid,
      });
    });
    this.actor.start();

    try {
      return await this.execute();
    } finally {
      subscription.unsubscribe();
      this.actor.stop();
    }
  }

  private async execute(): Promise<ProcessResult> {
    const { signal } = this.options;
    const stdout = this.options.stdout ?? Redirect.PRINT;
    const stderr = this.options.stderr ?? Redirect.PRINT;

    if (signal?.aborted) {
      this.actor.send({ type: 'CANCEL', reason: describe(signal.reason) });
      throw new ProcessCancelledError(signal.reason);
    }

    const redirects = resolveRedirects(stdout, stderr);
    const child = await this.launch(redirects.stdout, redirects.stderr);

    const cancellation = watchCancellation(signal);
    try {
      const pumps = this.startPumps(child, stdout, stderr);
      this.actor.send({ type: 'PUMPS_STARTED', pumps: pumps.map((pump) => pump.name) });

      // Every pump must drain before the exit wait, or trailing output is lost.
      const outcomes = await Promise.race([
        Promise.all(pumps.map((pump) => pump.outcome)),
        cancellation.aborted,
      ]);
      const failure = outcomes.find((outcome) => outcome.error !== null)?.error ?? null;
      const output = outcomes.find((outcome) => outcome.lines !== null)?.lines ?? [];

      if (failure) {
        this.logger.warn(`${this.command[0] ?? '<empty>'}: ${failure.message}`);
        await Promise.race([child.waitFor(), cancellation.aborted]);
        this.actor.send({ type: 'FAIL', error: failure.message });
        throw failure;
      }

      this.actor.send({ type: 'PUMPS_DRAINED', lines: output.length });
      const exitCode = await Promise.race([child.waitFor(), cancellation.aborted]);
      this.actor.send({ type: 'EXITED', exitCode });

      return createResult(exitCode, output);
    } catch (err) {
      if (isCancellation(err)) {
        this.teardown(child, err.cause);
      }
      throw err;
    } finally {
      cancellation.dispose();
    }
  }

  private async launch(
    stdout: StdioDirective,
    stderr: ErrorDirective
  ): Promise<LaunchedProcess> {
    try {
      const child = await this.launcher.launch({
        command: this.command,
        env: this.options.env,
        cwd: this.options.cwd,
        stdin: resolveInput(this.options.stdin),
        stdout,
        stderr,
      });
      this.actor.send({ type: 'LAUNCHED', pid: child.pid ?? null });
      return child;
    } catch (err) {
      this.actor.send({ type: 'FAIL', error: describe(err) });
      if (err instanceof ProcessLaunchError) throw err;
      throw new ProcessLaunchError(this.command, describe(err), err);
    }
  }

  private startPumps(child: LaunchedProcess, stdout: StreamSink, stderr: StreamSink): PumpTask[] {
    const encoding = this.options.encoding ?? this.config.encoding;
    const pumps: PumpTask[] = [];

    const source = this.options.stdin;
    if (source && source.kind !== 'file') {
      pumps.push(
        startPump('stdin', source.kind, async () => {
          await inputPump(requireStream(child.stdin, 'stdin'), source);
          return null;
        })
      );
    }

    if (stdout.kind === 'consume') {
      const { handler } = stdout;
      pumps.push(
        startPump('stdout', 'consume', async () => {
          await consumePump(requireStream(child.stdout, 'stdout'), handler, encoding);
          return null;
        })
      );
    }
    if (stderr.kind === 'consume') {
      const { handler } = stderr;
      pumps.push(
        startPump('stderr', 'consume', async () => {
          await consumePump(requireStream(child.stderr, 'stderr'), handler, encoding);
          return null;
        })
      );
    }

    // When both streams capture, stderr was merged into stdout by the launcher.
    const captured = captureStream(stdout, stderr);
    if (captured) {
      pumps.push(
        startPump(captured, 'capture', () =>
          capturePump(requireStream(child[captured], captured), {
            encoding,
            consumer: this.options.consumer,
            signal: this.options.signal,
          })
        )
      );
    }

    return pumps;
  }

  private teardown(child: LaunchedProcess, reason: unknown): void {
    const forcibly = this.options.destroyForcibly ?? this.config.destroyForcibly;
    this.actor.send({ type: 'CANCEL', reason: describe(reason) });

    if (forcibly) {
      child.terminateForcibly();
    } else {
      child.terminate();
    }

    this.actor.send({ type: 'TERMINATION_REQUESTED', forcibly });
    this.logger.debug(`${this.command[0] ?? '<empty>'}: terminated after cancellation`, {
      pid: child.pid,
      forcibly,
    });
  }
}

/**
 * Run `command` to completion with defaults taken from the environment.
 */
export async function runProcess(
  command: readonly string[],
  options: ProcessOptions = {}
): Promise<ProcessResult> {
  return new ProcessSession(command, options, loadConfig()).run();
}
