/**
 * Line decoding for child output streams
 */

import { createInterface } from 'node:readline';
import type { Readable } from 'node:stream';

/**
 * Lazily decode `stream` into lines.
 *
 * Nothing is read before the first `next()`, so a handler may start iterating
 * late without losing lines. The sequence ends at end-of-stream and can only
 * be iterated once.
 */
export async function* readLines(
  stream: Readable,
  encoding: BufferEncoding = 'utf8'
): AsyncGenerator<string, void, undefined> {
  stream.setEncoding(encoding);
  const reader = createInterface({ input: stream, crlfDelay: Infinity });

  try {
    for await (const line of reader) {
      yield line;
    }
  } finally {
    reader.close();
  }
}

/**
 * Discard whatever is left in `stream` so the writer never blocks on a full pipe.
 */
export function drain(stream: Readable): void {
  if (!stream.destroyed && !stream.readableEnded) {
    stream.resume();
  }
}
