/**
 * Input sources for a process's stdin
 */

import { Buffer } from 'node:buffer';
import type { Readable } from 'node:stream';
import type { InputSource as InputSourceType, StdinWriter } from '../types';

export type InputSource = InputSourceType;

export const InputSource = {
  fromString(text: string, encoding: BufferEncoding = 'utf8'): Extract<InputSourceType, { kind: 'bytes' }> {
    return { kind: 'bytes', data: Buffer.from(text, encoding) };
  },

  fromBytes(data: Uint8Array): Extract<InputSourceType, { kind: 'bytes' }> {
    return { kind: 'bytes', data };
  },

  /** Redirected by the OS; no pump is involved. */
  fromFile(path: string): Extract<InputSourceType, { kind: 'file' }> {
    return { kind: 'file', path };
  },

  fromStream(stream: Readable): Extract<InputSourceType, { kind: 'stream' }> {
    return { kind: 'stream', stream };
  },

  /**
   * The writer owns the stdin handle while it runs; the handle is ended
   * afterwards even if the writer throws.
   */
  fromWriter(writer: StdinWriter): Extract<InputSourceType, { kind: 'writer' }> {
    return { kind: 'writer', writer };
  },
} as const;
