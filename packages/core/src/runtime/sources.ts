/**
 * Character Sources
 * Synchronous suppliers of UTF-16 code units. `read()` blocks until a
 * character is available and returns EOF at end of input.
 */

import * as fs from 'node:fs';
import { StringDecoder } from 'node:string_decoder';
import { EOF } from '../automaton/alphabet.js';

export interface CharSource {
  read(): number;
}

export function stringSource(text: string): CharSource {
  let pos = 0;
  return {
    read(): number {
      if (pos >= text.length) return EOF;
      return text.charCodeAt(pos++);
    },
  };
}

export interface FileSourceOptions {
  /** Bytes per blocking read (default 64 KiB) */
  readonly chunkSize?: number | undefined;
}

/**
 * Reads a file descriptor (0 for standard input) or a path in chunks with
 * `fs.readSync`, decoding UTF-8. A path is opened on the first read and
 * closed at end of input or when a read fails; after a failure the source
 * returns EOF.
 */
export function fileSource(
  target: number | string,
  options: FileSourceOptions = {}
): CharSource {
  const chunk = Buffer.alloc(options.chunkSize ?? 64 * 1024);
  const decoder = new StringDecoder('utf8');
  let fd: number | undefined;
  let pending = '';
  let pos = 0;
  let done = false;

  const fill = (): boolean => {
    while (pos >= pending.length) {
      if (done) return false;
      const handle =
        fd ?? (fd = typeof target === 'number' ? target : fs.openSync(target, 'r'));
      let bytes: number;
      try {
        bytes = fs.readSync(handle, chunk, 0, chunk.length, null);
      } catch (err) {
        // reading a closed pipe on Windows throws instead of returning 0
        if (isErrnoException(err) && err.code === 'EOF') {
          bytes = 0;
        } else {
          if (typeof target === 'string') fs.closeSync(handle);
          done = true;
          throw err;
        }
      }
      if (bytes === 0) {
        done = true;
        pending = decoder.end();
        pos = 0;
        if (typeof target === 'string') fs.closeSync(handle);
        return pending.length > 0;
      }
      pending = decoder.write(chunk.subarray(0, bytes));
      pos = 0;
    }
    return true;
  };

  return {
    read(): number {
      if (!fill()) return EOF;
      return pending.charCodeAt(pos++);
    },
  };
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}

/** Converts char codes to a string without exceeding argument limits */
export function codesToString(codes: readonly number[]): string {
  const CHUNK = 4096;
  if (codes.length <= CHUNK) return String.fromCharCode(...codes);
  let out = '';
  for (let i = 0; i < codes.length; i += CHUNK) {
    out += String.fromCharCode(...codes.slice(i, i + CHUNK));
  }
  return out;
}
