/**
 * Read-Ahead Buffer
 * Characters read from the source but not yet committed to a lexeme.
 *
 * The last `unconsumed` characters have not been handed out during the
 * current attempt; everything before them has. Invariant:
 * `0 <= unconsumed <= chars.length`.
 */

import { EOF } from '../automaton/alphabet.js';
import type { CharSource } from './sources.js';

export class ReadAheadBuffer {
  private chars: number[] = [];
  private unconsumed = 0;
  private exhausted = false;

  constructor(private source: CharSource) {}

  /** Buffered characters, consumed or not */
  get length(): number {
    return this.chars.length;
  }

  /** Characters the current attempt has not yet been handed */
  get pending(): number {
    return this.unconsumed;
  }

  /**
   * Next character for the scan: a buffered one if any remain unconsumed,
   * otherwise a fresh read that is appended to the buffer. EOF is never
   * buffered, and once seen the source is not read again.
   */
  next(): number {
    if (this.unconsumed > 0) {
      const code = this.chars[this.chars.length - this.unconsumed] ?? EOF;
      this.unconsumed--;
      return code;
    }
    if (this.exhausted) return EOF;

    const code = this.source.read();
    if (code === EOF) {
      this.exhausted = true;
      return EOF;
    }
    this.chars.push(code);
    return code;
  }

  /**
   * Removes and returns the characters handed out since the last commit.
   * Only the unconsumed tail stays buffered.
   */
  commit(): number[] {
    return this.chars.splice(0, this.chars.length - this.unconsumed);
  }

  /** Marks every buffered character unconsumed again */
  rewind(): void {
    this.unconsumed = this.chars.length;
  }

  /** Drops buffered characters and starts over on a new source */
  reset(source: CharSource): void {
    this.source = source;
    this.chars = [];
    this.unconsumed = 0;
    this.exhausted = false;
  }
}
