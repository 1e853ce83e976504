/**
 * Mock Process Launcher - Test adapter for IProcessLauncher
 *
 * Plays a scripted sequence of output lines through in-memory pipes so the
 * session can be exercised without spawning real processes.
 */

import { PassThrough } from 'node:stream';
import { ProcessLaunchError } from '../../core/errors';
import type { IProcessLauncher, LaunchedProcess, LaunchSpec } from '../../ports/process.port';

export interface MockOutput {
  stream: 'stdout' | 'stderr';
  line: string;
}

export interface MockCommand {
  output?: MockOutput[];
  exitCode?: number;
  /** Pause before each output line, in ms. */
  delay?: number;
  /** Copy stdin to stdout like `cat`, and exit only after stdin ends. */
  echoStdin?: boolean;
  /** Never exit on its own; only terminate() ends it. */
  hang?: boolean;
  launchError?: string;
}

export interface MockProcessLauncherOptions {
  commands?: Map<string, MockCommand>;
}

const SIGTERM_EXIT = 143;
const SIGKILL_EXIT = 137;

export class MockLaunchedProcess implements LaunchedProcess {
  readonly pid: number;
  readonly stdin: PassThrough | null;
  readonly stdout: PassThrough | null;
  readonly stderr: PassThrough | null;
  readonly receivedInput: string[] = [];
  terminatedWith: 'SIGTERM' | 'SIGKILL' | null = null;

  private mock: MockCommand;
  private merged: boolean;
  private trace: string[];
  private exited = false;
  private exitCode: Promise<number>;
  private resolveExit: (code: number) => void = () => {};

  constructor(spec: LaunchSpec, mock: MockCommand, trace: string[]) {
    this.pid = Math.floor(Math.random() * 10000) + 1000;
    this.mock = mock;
    this.trace = trace;
    this.merged = spec.stderr.type === 'stdout';
    this.stdin = spec.stdin.type === 'pipe' ? new PassThrough() : null;
    this.stdout = spec.stdout.type === 'pipe' ? new PassThrough() : null;
    this.stderr = spec.stderr.type === 'pipe' ? new PassThrough() : null;
    this.exitCode = new Promise((resolve) => {
      this.resolveExit = resolve;
    });

    setImmediate(() => {
      this.play().catch((err: unknown) => {
        this.stdout?.destroy(err instanceof Error ? err : new Error(String(err)));
        this.exit(1);
      });
    });
  }

  waitFor(): Promise<number> {
    this.trace.push('waitFor');
    return this.exitCode;
  }

  terminate(): void {
    this.kill('SIGTERM', SIGTERM_EXIT);
  }

  terminateForcibly(): void {
    this.kill('SIGKILL', SIGKILL_EXIT);
  }

  private async play(): Promise<void> {
    const input = this.readInput();

    for (const out of this.mock.output ?? []) {
      if (this.mock.delay) {
        await new Promise((resolve) => setTimeout(resolve, this.mock.delay));
      }
      if (this.exited) return;
      const target = out.stream === 'stderr' && !this.merged ? this.stderr : this.stdout;
      target?.write(`${out.line}\n`);
    }

    if (this.mock.echoStdin) {
      await input;
    }
    if (this.mock.hang || this.exited) return;

    this.stdout?.end();
    this.stderr?.end();
    this.exit(this.mock.exitCode ?? 0);
  }

  private async readInput(): Promise<void> {
    if (!this.stdin) return;
    for await (const chunk of this.stdin) {
      const text = String(chunk);
      this.receivedInput.push(text);
      if (this.mock.echoStdin && !this.exited) {
        this.stdout?.write(text);
      }
    }
  }

  private kill(signal: 'SIGTERM' | 'SIGKILL', code: number): void {
    if (this.exited) return;
    this.terminatedWith = signal;
    this.stdout?.end();
    this.stderr?.end();
    this.exit(code);
  }

  private exit(code: number): void {
    if (this.exited) return;
    this.exited = true;
    this.trace.push(`exit:${code}`);
    this.resolveExit(code);
  }
}

export class MockProcessLauncher implements IProcessLauncher {
  readonly trace: string[] = [];
  private commands: Map<string, MockCommand>;
  private launchHistory: LaunchSpec[] = [];
  private processes: MockLaunchedProcess[] = [];

  constructor(options: MockProcessLauncherOptions = {}) {
    this.commands = options.commands ?? new Map();
  }

  private getCommandKey(command: readonly string[]): string {
    return command.join(' ');
  }

  async launch(spec: LaunchSpec): Promise<LaunchedProcess> {
    this.launchHistory.push(spec);

    const mock = this.commands.get(this.getCommandKey(spec.command));
    if (!mock) {
      throw new ProcessLaunchError(spec.command, 'command not found');
    }
    if (mock.launchError) {
      throw new ProcessLaunchError(spec.command, mock.launchError);
    }

    const proc = new MockLaunchedProcess(spec, mock, this.trace);
    this.processes.push(proc);
    return proc;
  }

  // Test helpers
  setCommand(command: readonly string[], result: MockCommand): void {
    this.commands.set(this.getCommandKey(command), result);
  }

  getLaunchHistory(): LaunchSpec[] {
    return [...this.launchHistory];
  }

  getProcesses(): MockLaunchedProcess[] {
    return [...this.processes];
  }

  lastProcess(): MockLaunchedProcess | undefined {
    return this.processes[this.processes.length - 1];
  }
}
