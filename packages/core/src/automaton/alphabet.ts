/**
 * Alphabet
 * Letters are UTF-16 code units 0-255; every higher code unit shares the
 * single letter OTHER_LETTER.
 */

export const OTHER_LETTER = 256;
export const ALPHABET_SIZE = 257;

/** End-of-input sentinel returned by sources and `next()`. Never buffered. */
export const EOF = -1;

export function letterOf(code: number): number {
  return code > 255 ? OTHER_LETTER : code;
}

/** All letters, in ascending order */
export const ALL_LETTERS: readonly number[] = Array.from(
  { length: ALPHABET_SIZE },
  (_, i) => i
);

export function complementLetters(letters: readonly number[]): number[] {
  const excluded = new Set(letters);
  return ALL_LETTERS.filter((letter) => !excluded.has(letter));
}

/** Printable description of a letter for diagnostics and generated comments */
export function describeLetter(letter: number): string {
  if (letter === OTHER_LETTER) return '<other>';
  if (letter === 10) return '\\n';
  if (letter === 9) return '\\t';
  if (letter === 13) return '\\r';
  if (letter === 32) return '\\s';
  if (letter < 32 || letter >= 127) {
    return `\\x${letter.toString(16).padStart(2, '0')}`;
  }
  return String.fromCharCode(letter);
}
