/**
 * Offset to line/column mapping for specification text
 */

import type { SourceLocation } from '../source-location.js';

/** Offsets at which each line of `text` starts */
export function lineStarts(text: string): number[] {
  const starts = [0];
  for (let i = 0; i < text.length; i++) {
    if (text.charCodeAt(i) === 10) starts.push(i + 1);
  }
  return starts;
}

/**
 * Location of the character at `offset`; line and column are 1-based.
 * Offsets past the end locate the end of the text.
 */
export function locateOffset(
  starts: readonly number[],
  offset: number
): SourceLocation {
  let lo = 0;
  let hi = starts.length - 1;
  while (lo < hi) {
    const mid = (lo + hi + 1) >> 1;
    if ((starts[mid] ?? 0) <= offset) lo = mid;
    else hi = mid - 1;
  }
  return { line: lo + 1, column: offset - (starts[lo] ?? 0) + 1, offset };
}
