/**
 * Stream pumps - move bytes between a child process and its sinks/sources
 *
 * Each pump is an independent promise. The session starts them together
 * and joins all of them before waiting for the process to exit.
 */

import { Readable, type Writable } from 'node:stream';
import { finished, pipeline } from 'node:stream/promises';
import { readLines, drain } from './line-stream';
import type { InputSource, LineConsumer, LineHandler } from '../types';

export interface CapturePumpOptions {
  encoding?: BufferEncoding;
  consumer?: LineConsumer;
  signal?: AbortSignal;
}

/**
 * Collect every line of `stream`, handing each to the consumer first.
 */
export async function capturePump(
  stream: Readable,
  options: CapturePumpOptions = {}
): Promise<string[]> {
  const lines: string[] = [];

  try {
    for await (const line of readLines(stream, options.encoding)) {
      options.signal?.throwIfAborted();
      if (options.consumer) {
        await options.consumer(line);
      }
      lines.push(line);
    }
  } finally {
    drain(stream);
  }

  return lines;
}

/**
 * Give the handler the lazy line sequence; nothing is retained.
 */
export async function consumePump(
  stream: Readable,
  handler: LineHandler,
  encoding?: BufferEncoding
): Promise<void> {
  try {
    await handler(readLines(stream, encoding));
  } finally {
    // The handler may stop early; the child must still be able to write.
    drain(stream);
  }
}

export type PipedInputSource = Exclude<InputSource, { kind: 'file' }>;

/**
 * Run `block` with the writable, then end it and wait until it is flushed.
 * The writable is ended on every exit path.
 */
export async function useWritable(
  stdin: Writable,
  block: (stdin: Writable) => void | Promise<void>
): Promise<void> {
  // Settles to the close error, if any. The child may exit or be killed while
  // the block is still running, so the outcome is observed from the start.
  const closed = finished(stdin, { readable: false }).then(
    () => null,
    (err: unknown) => err
  );

  try {
    await block(stdin);
  } catch (err) {
    stdin.end();
    // The block's failure takes precedence over a close failure it caused.
    await closed;
    throw err;
  }

  if (!stdin.writableEnded) {
    stdin.end();
  }
  const closeError = await closed;
  if (closeError !== null) {
    throw closeError;
  }
}

/**
 * Feed the child's stdin from `source`. Ends stdin when done.
 */
export async function inputPump(stdin: Writable, source: PipedInputSource): Promise<void> {
  switch (source.kind) {
    case 'bytes':
      await pipeline(Readable.from([source.data]), stdin);
      return;
    case 'stream':
      await pipeline(source.stream, stdin);
      return;
    case 'writer':
      await useWritable(stdin, source.writer);
      return;
  }
}
