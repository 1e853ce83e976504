/**
 * Process Port - Interface for the OS process-creation facility
 *
 * Following Hexagonal Architecture, this port defines the contract
 * for launching a process without specifying implementation details.
 */

import type { Readable, Writable } from 'node:stream';

export type FileMode = 'read' | 'truncate' | 'append';

export type StdioDirective =
  | { type: 'ignore' }
  | { type: 'inherit' }
  | { type: 'pipe' }
  | { type: 'file'; path: string; mode: FileMode };

/** stderr may additionally be merged into the stdout pipe. */
export type ErrorDirective = StdioDirective | { type: 'stdout' };

export interface LaunchSpec {
  command: readonly string[];
  env?: Record<string, string>;
  cwd?: string;
  stdin: StdioDirective;
  stdout: StdioDirective;
  stderr: ErrorDirective;
}

export interface LaunchedProcess {
  pid: number | undefined;
  /** Present only when the matching directive is `pipe`. */
  stdin: Writable | null;
  stdout: Readable | null;
  stderr: Readable | null;

  /**
   * Resolve with the exit code; `128 + n` when killed by signal n
   */
  waitFor(): Promise<number>;

  /**
   * Ask the process to stop (SIGTERM). Safe to call after exit.
   */
  terminate(): void;

  /**
   * Kill the process (SIGKILL). Safe to call after exit.
   */
  terminateForcibly(): void;
}

export interface IProcessLauncher {
  /**
   * Start a process; resolves once the OS reports it running and
   * rejects with ProcessLaunchError otherwise
   */
  launch(spec: LaunchSpec): Promise<LaunchedProcess>;
}
