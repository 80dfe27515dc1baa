/**
 * Runtime Types
 */

import type { SourceLocation } from '../source-location.js';

/**
 * The primitives a transition procedure is written against. A procedure
 * calls `next()` for each character, `accept(tag)` on entering every
 * accepting state, and `reject()` exactly once, when no transition exists.
 */
export interface ScanPrimitives {
  next(): number;
  accept(tag: number): void;
  reject(): void;
}

/** One scanning attempt over a single automaton */
export type TransitionProcedure = (primitives: ScanPrimitives) => void;

/** Outcome of a single-token scan */
export type ScanStatus = 'token' | 'eof' | 'stuck';

export interface Token {
  readonly tag: number;
  readonly text: string;
  /** Location of the first character */
  readonly start: SourceLocation;
  /** Location of the last character */
  readonly end: SourceLocation;
  /** Parser that produced the token */
  readonly parser: string;
}

/** What a token action may do with the session that produced the token */
export interface ActionContext {
  readonly lexeme: string;
  readonly tokenStart: SourceLocation;
  readonly sourceName: string;
  readonly activeParser: string;
  switchParser(name: string): void;
}

export interface ParserDefinition {
  readonly name: string;
  readonly procedure: TransitionProcedure;
  /** Token action, run after the procedure has returned */
  readonly onToken?:
    | ((token: Token, context: ActionContext) => void)
    | undefined;
}

// ============================================================
// OBSERVABILITY
// ============================================================

/** Observability callbacks for monitoring a scanning session */
export interface ScanCallbacks {
  /** Called for every completed token, before its action */
  onToken?: ((token: Token) => void) | undefined;
  /** Called when no pattern matches at the scan position */
  onStuck?: ((event: StuckEvent) => void) | undefined;
  /** Called when the active parser changes */
  onSwitch?: ((event: SwitchEvent) => void) | undefined;
  /** Called when a scan ends cleanly at end of input */
  onEnd?: ((event: EndEvent) => void) | undefined;
}

export interface StuckEvent {
  readonly parser: string;
  readonly sourceName: string;
  /** Location of the first character no pattern matches */
  readonly location: SourceLocation;
}

export interface SwitchEvent {
  readonly from: string;
  readonly to: string;
}

export interface EndEvent {
  readonly sourceName: string;
  readonly parser: string;
}
