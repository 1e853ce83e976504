/**
 * Redirect - Stream sink policies and their resolution into stdio directives
 *
 * Pure functions with no side effects - testable without mocks.
 */

import type { InputSource, LineHandler, StreamSink } from '../types';
import type { ErrorDirective, StdioDirective } from '../ports/process.port';

/** Ignores the stream. */
const SILENT: StreamSink = Object.freeze({ kind: 'discard' });

/** Shares the parent's matching stream, preserving its ordering. */
const PRINT: StreamSink = Object.freeze({ kind: 'inherit' });

/**
 * Keeps the stream's lines in the returned ProcessResult.
 * When stdout and stderr both capture, the child's stderr is merged into
 * its stdout so the lines keep their real order.
 */
const CAPTURE: StreamSink = Object.freeze({ kind: 'capture' });

export const Redirect = {
  SILENT,
  PRINT,
  CAPTURE,

  toFile(path: string, append = false): StreamSink {
    return { kind: 'file', path, append };
  },

  /**
   * Streams lines to `handler` without keeping them; they never appear
   * in the ProcessResult.
   */
  consume(handler: LineHandler): StreamSink {
    return { kind: 'consume', handler };
  },
} as const;

export interface ResolvedRedirects {
  stdout: StdioDirective;
  stderr: ErrorDirective;
  mergeOutputs: boolean;
}

function assertNever(value: never): never {
  throw new Error(`Unhandled variant: ${JSON.stringify(value)}`);
}

export function toDirective(sink: StreamSink): StdioDirective {
  switch (sink.kind) {
    case 'discard':
      return { type: 'ignore' };
    case 'inherit':
      return { type: 'inherit' };
    case 'capture':
    case 'consume':
      return { type: 'pipe' };
    case 'file':
      return { type: 'file', path: sink.path, mode: sink.append ? 'append' : 'truncate' };
    default:
      return assertNever(sink);
  }
}

export function resolveRedirects(stdout: StreamSink, stderr: StreamSink): ResolvedRedirects {
  if (stdout.kind === 'capture' && stderr.kind === 'capture') {
    return {
      stdout: { type: 'pipe' },
      stderr: { type: 'stdout' },
      mergeOutputs: true,
    };
  }

  return {
    stdout: toDirective(stdout),
    stderr: toDirective(stderr),
    mergeOutputs: false,
  };
}

export function resolveInput(source: InputSource | undefined): StdioDirective {
  if (!source) return { type: 'pipe' };

  switch (source.kind) {
    case 'file':
      return { type: 'file', path: source.path, mode: 'read' };
    case 'bytes':
    case 'stream':
    case 'writer':
      return { type: 'pipe' };
    default:
      return assertNever(source);
  }
}

/**
 * Which child stream the capture pump reads, if any.
 */
export function captureStream(
  stdout: StreamSink,
  stderr: StreamSink
): 'stdout' | 'stderr' | null {
  if (stdout.kind === 'capture') return 'stdout';
  if (stderr.kind === 'capture') return 'stderr';
  return null;
}
