/**
 * Pattern Parser
 * Recursive descent over the pattern language:
 *
 *   union   := concat ('|' concat)*
 *   concat  := postfix*
 *   postfix := atom ('*' | '+' | '?' | '{' n (',' m?)? '}')*
 *   atom    := char | '\' escape | '.' | '[' class ']' | '"' quoted '"'
 *            | '(' union? ')' | '{' NAME '}'
 */

import { PatternError } from '../error-classes.js';
import {
  ALL_LETTERS,
  complementLetters,
  letterOf,
  OTHER_LETTER,
} from '../automaton/alphabet.js';
import {
  concat,
  EMPTY,
  letters,
  star,
  union,
  type PatternNode,
} from './ast.js';

/** Upper bound for counted repetition, which is expanded in place */
const MAX_REPEAT = 1000;

/** Outcome of looking up a `{NAME}` reference */
export type DefinitionLookup =
  | { readonly node: PatternNode }
  | { readonly error: 'unknown' | 'recursive' };

export interface ParsePatternOptions {
  /** Resolves `{NAME}` references */
  readonly resolveDefinition?:
    | ((name: string) => DefinitionLookup)
    | undefined;
  /** End the pattern at unescaped whitespace outside classes and quotes */
  readonly stopAtWhitespace?: boolean | undefined;
  /** Index in `text` where the pattern starts */
  readonly start?: number | undefined;
}

export interface ParsedPattern {
  readonly node: PatternNode;
  /** Index just past the last character of the pattern */
  readonly end: number;
}

const ANY_BUT_NEWLINE: readonly number[] = ALL_LETTERS.filter((l) => l !== 10);
const DIGITS: readonly number[] = range(48, 57);
const WORD: readonly number[] = [
  ...DIGITS,
  ...range(65, 90),
  95,
  ...range(97, 122),
];

function range(lo: number, hi: number): number[] {
  const out: number[] = [];
  for (let c = lo; c <= hi; c++) out.push(c);
  return out;
}

export function isPatternWhitespace(ch: string): boolean {
  return ch === ' ' || ch === '\t' || ch === '\n' || ch === '\r';
}

function isNameChar(ch: string): boolean {
  return /^[A-Za-z0-9_]$/.test(ch);
}

function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}

class PatternParser {
  private pos: number;

  constructor(
    private readonly text: string,
    private readonly options: ParsePatternOptions
  ) {
    this.pos = options.start ?? 0;
  }

  parse(): ParsedPattern {
    const node = this.parseUnion(0);
    return { node, end: this.pos };
  }

  private peek(offset = 0): string {
    return this.text.charAt(this.pos + offset);
  }

  private atEnd(): boolean {
    if (this.pos >= this.text.length) return true;
    return (
      this.options.stopAtWhitespace === true &&
      isPatternWhitespace(this.peek())
    );
  }

  private fail(detail: string, at: number = this.pos): never {
    throw new PatternError('LEX-P001', this.text, { detail }, { offset: at });
  }

  private parseUnion(depth: number): PatternNode {
    const alternatives = [this.parseConcat()];
    while (!this.atEnd() && this.peek() === '|') {
      this.pos++;
      alternatives.push(this.parseConcat());
    }
    if (depth === 0 && !this.atEnd() && this.peek() === ')') {
      this.fail(`unmatched ')'`);
    }
    return union(alternatives);
  }

  private parseConcat(): PatternNode {
    const items: PatternNode[] = [];
    while (!this.atEnd() && this.peek() !== '|' && this.peek() !== ')') {
      items.push(this.parsePostfix());
    }
    return items.length === 0 ? EMPTY : concat(items);
  }

  private parsePostfix(): PatternNode {
    let node = this.parseAtom();
    for (;;) {
      if (this.atEnd()) return node;
      const ch = this.peek();
      if (ch === '*') {
        this.pos++;
        node = star(node);
      } else if (ch === '+') {
        this.pos++;
        node = concat([node, star(node)]);
      } else if (ch === '?') {
        this.pos++;
        node = union([node, EMPTY]);
      } else if (ch === '{' && isDigit(this.peek(1))) {
        node = this.parseRepeat(node);
      } else {
        return node;
      }
    }
  }

  private parseRepeat(node: PatternNode): PatternNode {
    const start = this.pos;
    this.pos++; // {
    const min = this.readNumber();
    let max: number | undefined = min;
    if (this.peek() === ',') {
      this.pos++;
      max = isDigit(this.peek()) ? this.readNumber() : undefined;
    }
    if (this.peek() !== '}') {
      this.fail('unterminated repetition', start);
    }
    this.pos++;

    if (max !== undefined && max < min) {
      this.fail(`repetition {${min},${max}} has max below min`, start);
    }
    if ((max ?? min) > MAX_REPEAT) {
      this.fail(`repetition count exceeds ${MAX_REPEAT}`, start);
    }

    const parts: PatternNode[] = [];
    for (let i = 0; i < min; i++) parts.push(node);
    if (max === undefined) {
      parts.push(star(node));
    } else {
      const optional = union([node, EMPTY]);
      for (let i = min; i < max; i++) parts.push(optional);
    }
    return parts.length === 0 ? EMPTY : concat(parts);
  }

  private readNumber(): number {
    const start = this.pos;
    while (isDigit(this.peek())) this.pos++;
    return Number.parseInt(this.text.slice(start, this.pos), 10);
  }

  private parseAtom(): PatternNode {
    const start = this.pos;
    const ch = this.peek();
    switch (ch) {
      case '(': {
        this.pos++;
        if (this.peek() === ')') {
          this.pos++;
          return EMPTY;
        }
        const inner = this.parseUnion(1);
        if (this.pos >= this.text.length || this.peek() !== ')') {
          this.fail(`unclosed '('`, start);
        }
        this.pos++;
        return inner;
      }
      case '[':
        return this.parseClass();
      case '"':
        return this.parseQuoted();
      case '.':
        this.pos++;
        return letters(ANY_BUT_NEWLINE);
      case '\\':
        return letters(this.readEscape());
      case '{':
        return this.parseReference();
      case '*':
      case '+':
      case '?':
        return this.fail(`nothing to repeat before '${ch}'`);
      default:
        this.pos++;
        return letters([letterOf(ch.charCodeAt(0))]);
    }
  }

  /** Reads a backslash escape at `pos` and returns the letters it denotes */
  private readEscape(): readonly number[] {
    const start = this.pos;
    this.pos++; // backslash
    if (this.pos >= this.text.length) {
      this.fail('dangling escape', start);
    }
    const ch = this.peek();
    this.pos++;
    switch (ch) {
      case 'n':
        return [10];
      case 't':
        return [9];
      case 'r':
        return [13];
      case 'f':
        return [12];
      case 'v':
        return [11];
      case '0':
        return [0];
      case 's':
        return [32];
      case 'd':
        return DIGITS;
      case 'w':
        return WORD;
      case 'x': {
        const hex = this.text.slice(this.pos, this.pos + 2);
        if (!/^[0-9A-Fa-f]{2}$/.test(hex)) {
          this.fail('\\x needs two hex digits', start);
        }
        this.pos += 2;
        return [Number.parseInt(hex, 16)];
      }
      default:
        return [letterOf(ch.charCodeAt(0))];
    }
  }

  /** Reads one class member endpoint; multi-letter escapes return an array */
  private readClassChar(): number | readonly number[] {
    if (this.peek() === '\\') {
      const set = this.readEscape();
      return set.length === 1 && set[0] !== undefined ? set[0] : set;
    }
    const code = this.text.charCodeAt(this.pos);
    this.pos++;
    return code;
  }

  private parseClass(): PatternNode {
    const start = this.pos;
    this.pos++; // [
    let negated = false;
    if (this.peek() === '^') {
      negated = true;
      this.pos++;
    }

    const members = new Set<number>();
    while (this.peek() !== ']') {
      if (this.pos >= this.text.length) {
        this.fail(`unclosed '['`, start);
      }
      const lo = this.readClassChar();
      if (typeof lo !== 'number') {
        for (const letter of lo) members.add(letter);
        continue;
      }
      if (this.peek() === '-' && this.peek(1) !== ']' && this.peek(1) !== '') {
        const dash = this.pos;
        this.pos++;
        const hi = this.readClassChar();
        if (typeof hi !== 'number') {
          this.fail('class range cannot end in a multi-character escape', dash);
        }
        if (hi < lo) {
          this.fail('class range is out of order', dash);
        }
        for (let c = lo; c <= Math.min(hi, 255); c++) members.add(c);
        if (hi > 255) members.add(OTHER_LETTER);
      } else {
        members.add(letterOf(lo));
      }
    }
    this.pos++; // ]

    if (members.size === 0 && !negated) {
      this.fail('empty character class', start);
    }
    const set = [...members].sort((a, b) => a - b);
    return letters(negated ? complementLetters(set) : set);
  }

  private parseQuoted(): PatternNode {
    const start = this.pos;
    this.pos++; // "
    const parts: PatternNode[] = [];
    while (this.peek() !== '"') {
      if (this.pos >= this.text.length) {
        this.fail('unterminated quoted string', start);
      }
      if (this.peek() === '\\') {
        parts.push(letters(this.readEscape()));
      } else {
        parts.push(letters([letterOf(this.text.charCodeAt(this.pos))]));
        this.pos++;
      }
    }
    this.pos++; // "
    return parts.length === 0 ? EMPTY : concat(parts);
  }

  private parseReference(): PatternNode {
    const start = this.pos;
    this.pos++; // {
    const nameStart = this.pos;
    while (isNameChar(this.peek())) this.pos++;
    const name = this.text.slice(nameStart, this.pos);
    if (name === '' || this.peek() !== '}') {
      this.fail('expected {NAME} definition reference', start);
    }
    this.pos++;

    const lookup: DefinitionLookup = this.options.resolveDefinition?.(
      name
    ) ?? {
      error: 'unknown',
    };
    if ('node' in lookup) return lookup.node;
    throw new PatternError(
      lookup.error === 'unknown' ? 'LEX-P002' : 'LEX-P003',
      this.text,
      { name },
      { offset: start }
    );
  }
}

/**
 * Parse a pattern. With `stopAtWhitespace`, parsing ends at the first
 * unescaped whitespace outside a class or quoted string, and `end` tells the
 * caller where.
 *
 * @throws PatternError LEX-P001 on syntax errors, LEX-P002 on unknown
 *   references, LEX-P003 on recursive ones
 */
export function parsePattern(
  text: string,
  options: ParsePatternOptions = {}
): ParsedPattern {
  return new PatternParser(text, options).parse();
}
