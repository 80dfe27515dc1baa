/**
 * Scan Session
 * Checkpoint/rollback engine. Owns the read-ahead buffer, the checkpoint,
 * the lexeme under construction, the position tracker and the parser
 * switchboard for one input stream.
 *
 * Every accepting state a procedure enters moves the characters read so far
 * out of the read-ahead buffer and into the lexeme, so a character is
 * replayed at most once: after the failed tail of a longer attempt.
 */

import { EOF } from '../automaton/alphabet.js';
import { NONE } from '../automaton/dfa.js';
import { ScanError } from '../error-classes.js';
import type { SourceLocation } from '../source-location.js';
import {
  advance,
  capture,
  createPositionState,
  currentLocation,
  restore,
  type PositionSnapshot,
  type PositionState,
} from './position.js';
import { ReadAheadBuffer } from './read-ahead.js';
import { codesToString, stringSource, type CharSource } from './sources.js';
import { ParserSwitchboard } from './switchboard.js';
import type {
  ActionContext,
  ParserDefinition,
  ScanCallbacks,
  ScanPrimitives,
  ScanStatus,
  Token,
} from './types.js';

export interface ScanSessionOptions {
  /** Declared parsers; the first is active unless `initialParser` is set */
  readonly parsers: readonly ParserDefinition[];
  readonly initialParser?: string | undefined;
  /** Input; defaults to an empty string */
  readonly source?: CharSource | undefined;
  readonly sourceName?: string | undefined;
  readonly callbacks?: ScanCallbacks | undefined;
}

export class ScanSession implements ActionContext {
  private readonly switchboard: ParserSwitchboard;
  private readonly buffer: ReadAheadBuffer;
  private readonly callbacks: ScanCallbacks;
  private readonly primitives: ScanPrimitives;
  private name: string;

  private readonly position: PositionState = createPositionState();
  /**
   * Position after the last committed character: captured on every accept,
   * and kept across tokens so a failed attempt rolls back to the end of the
   * previous token.
   */
  private checkpointPosition: PositionSnapshot = capture(this.position);
  private checkpointTag = NONE;
  private lexemeParts: string[] = [];
  /** Latched on the first character of the current attempt */
  private attemptStart: SourceLocation | undefined;

  private scanning = false;
  private outcome: ScanStatus | undefined;
  private completed: Token | undefined;
  private lastStart: SourceLocation | undefined;

  constructor(options: ScanSessionOptions) {
    this.switchboard = new ParserSwitchboard(
      options.parsers,
      options.initialParser
    );
    this.buffer = new ReadAheadBuffer(options.source ?? stringSource(''));
    this.name = options.sourceName ?? '<input>';
    this.callbacks = options.callbacks ?? {};
    this.primitives = {
      next: () => this.next(),
      accept: (tag) => this.accept(tag),
      reject: () => this.reject(),
    };
  }

  // ============================================================
  // QUERIES
  // ============================================================

  /** Text of the last completed token; valid until the next scan begins */
  get lexeme(): string {
    return this.completed?.text ?? '';
  }

  /** Last completed token, if the most recent scan produced one */
  get token(): Token | undefined {
    return this.completed;
  }

  /**
   * Start of the current token: the last completed token, or the first
   * unmatched character after `stuck`, or the scan position at end of input.
   */
  get tokenStart(): SourceLocation {
    return (
      this.completed?.start ??
      this.lastStart ??
      currentLocation(this.checkpointPosition)
    );
  }

  get sourceName(): string {
    return this.name;
  }

  get activeParser(): string {
    return this.switchboard.active.name;
  }

  /** Characters read ahead of the scan position and not yet committed */
  get bufferedLength(): number {
    return this.buffer.length;
  }

  // ============================================================
  // MUTATORS
  // ============================================================

  /**
   * Replace the input source. Read-ahead, end-of-input state and position
   * start over for the new source; the active parser is kept.
   */
  setInput(source: CharSource, name: string): void {
    this.assertIdle('setInput');
    this.buffer.reset(source);
    restore(this.position, createPositionState());
    this.checkpointPosition = capture(this.position);
    this.name = name;
    this.lastStart = undefined;
  }

  /**
   * Switch the active parser. Allowed between tokens and from token actions.
   *
   * @throws ScanError LEX-R001 for an undeclared parser
   * @throws ScanError LEX-R002 while a token scan is in progress
   */
  switchParser(name: string): void {
    this.assertIdle('switchParser');
    const previous = this.switchboard.switchTo(name);
    if (previous.name !== name) {
      this.callbacks.onSwitch?.({ from: previous.name, to: name });
    }
  }

  /**
   * Drop one character at the scan position, for callers recovering from
   * `stuck`. Returns the dropped character, or EOF at end of input.
   */
  skip(): number {
    this.assertIdle('skip');
    this.buffer.rewind();
    const code = this.buffer.next();
    if (code === EOF) return EOF;
    this.buffer.commit();
    advance(this.position, code);
    this.checkpointPosition = capture(this.position);
    this.lastStart = undefined;
    return code;
  }

  // ============================================================
  // SCANNING
  // ============================================================

  /**
   * Scan one token with the active parser and run its action.
   *
   * @returns 'token' when a token completed (more input may follow),
   *   'eof' at a clean end of input, 'stuck' when no pattern matches
   */
  scanToken(): ScanStatus {
    this.assertIdle('scanToken');
    const parser = this.switchboard.active;
    this.completed = undefined;
    this.lastStart = undefined;
    this.attemptStart = undefined;
    this.outcome = undefined;

    this.scanning = true;
    try {
      parser.procedure(this.primitives);
    } catch (err) {
      this.abandonAttempt();
      throw err;
    } finally {
      this.scanning = false;
    }

    const outcome = this.outcome;
    if (outcome === undefined) {
      this.abandonAttempt();
      throw new ScanError('LEX-R003', {
        detail: `parser ${parser.name} returned without calling reject()`,
      });
    }

    this.lastStart = this.attemptStart;
    if (outcome === 'token' && this.completed) {
      this.callbacks.onToken?.(this.completed);
      parser.onToken?.(this.completed, this);
    } else if (outcome === 'stuck') {
      this.callbacks.onStuck?.({
        parser: parser.name,
        sourceName: this.name,
        location: this.tokenStart,
      });
    } else if (outcome === 'eof') {
      this.callbacks.onEnd?.({ sourceName: this.name, parser: parser.name });
    }
    return outcome;
  }

  /**
   * Scan until end of input or until no pattern matches.
   *
   * @returns 0 at a clean end of input, 1 when stuck
   */
  scanAll(): 0 | 1 {
    for (;;) {
      const status = this.scanToken();
      if (status === 'eof') return 0;
      if (status === 'stuck') return 1;
    }
  }

  /**
   * Iterate completed tokens until end of input.
   *
   * @throws ScanError LEX-R004 when no pattern matches
   */
  *tokens(): Generator<Token, void, undefined> {
    for (;;) {
      const status = this.scanToken();
      if (status === 'eof') return;
      if (status === 'stuck') {
        const location = this.tokenStart;
        throw new ScanError(
          'LEX-R004',
          { location: `${this.name}:${location.line}:${location.column}` },
          location
        );
      }
      if (this.completed) yield this.completed;
    }
  }

  // ============================================================
  // PRIMITIVES
  // ============================================================

  private next(): number {
    this.assertInProcedure('next');
    const code = this.buffer.next();
    if (code !== EOF) {
      advance(this.position, code);
      this.attemptStart ??= currentLocation(this.position);
    }
    return code;
  }

  private accept(tag: number): void {
    this.assertInProcedure('accept');
    if (!Number.isInteger(tag) || tag < 0) {
      throw new ScanError('LEX-R003', { detail: `invalid tag ${tag}` });
    }
    this.checkpointTag = tag;
    this.checkpointPosition = capture(this.position);
    this.lexemeParts.push(codesToString(this.buffer.commit()));
  }

  private reject(): void {
    this.assertInProcedure('reject');
    this.buffer.rewind();
    restore(this.position, this.checkpointPosition);

    if (this.checkpointTag === NONE) {
      this.outcome = this.buffer.length === 0 ? 'eof' : 'stuck';
    } else {
      this.completed = {
        tag: this.checkpointTag,
        text: this.lexemeParts.join(''),
        start: this.attemptStart ?? currentLocation(this.checkpointPosition),
        end: currentLocation(this.checkpointPosition),
        parser: this.switchboard.active.name,
      };
      this.outcome = 'token';
    }
    this.checkpointTag = NONE;
    this.lexemeParts = [];
  }

  private abandonAttempt(): void {
    this.completed = undefined;
    this.buffer.rewind();
    restore(this.position, this.checkpointPosition);
    this.checkpointTag = NONE;
    this.lexemeParts = [];
  }

  private assertInProcedure(primitive: string): void {
    if (!this.scanning) {
      throw new ScanError('LEX-R003', {
        detail: `${primitive}() called outside a token scan`,
      });
    }
    if (this.outcome !== undefined) {
      throw new ScanError('LEX-R003', {
        detail: `${primitive}() called after reject()`,
      });
    }
  }

  private assertIdle(operation: string): void {
    if (this.scanning) {
      throw new ScanError('LEX-R002', { operation });
    }
  }
}
