/**
 * Core types for a single process invocation
 */

import type { Readable, Writable } from 'node:stream';
import type { IProcessLauncher } from './ports/process.port';
import type { Logger } from './services/logger.service';

/** Invoked for every captured line, in arrival order. Calls never overlap. */
export type LineConsumer = (line: string) => void | Promise<void>;

/** Receives the lazy line sequence of a `consume` stream and owns its iteration. */
export type LineHandler = (lines: AsyncIterable<string>) => void | Promise<void>;

/** Writes the child's stdin. The handle is ended once the writer settles. */
export type StdinWriter = (stdin: Writable) => void | Promise<void>;

export type StreamSink =
  | { readonly kind: 'discard' }
  | { readonly kind: 'inherit' }
  | { readonly kind: 'capture' }
  | { readonly kind: 'file'; readonly path: string; readonly append: boolean }
  | { readonly kind: 'consume'; readonly handler: LineHandler };

export type InputSource =
  | { readonly kind: 'bytes'; readonly data: Uint8Array }
  | { readonly kind: 'file'; readonly path: string }
  | { readonly kind: 'stream'; readonly stream: Readable }
  | { readonly kind: 'writer'; readonly writer: StdinWriter };

export interface ProcessOptions {
  /** Omitted: the child gets an open stdin pipe nobody writes to. */
  stdin?: InputSource;
  stdout?: StreamSink;
  stderr?: StreamSink;
  /** Added on top of the inherited environment. */
  env?: Record<string, string>;
  cwd?: string;
  consumer?: LineConsumer;
  encoding?: BufferEncoding;
  /** SIGKILL rather than SIGTERM when the invocation is cancelled. */
  destroyForcibly?: boolean;
  signal?: AbortSignal;
  logger?: Logger;
  launcher?: IProcessLauncher;
}

export interface ProcessResult {
  readonly exitCode: number;
  readonly output: readonly string[];
}
