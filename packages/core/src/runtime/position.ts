/**
 * Position Tracker
 * Line/column of the last character delivered to a transition procedure.
 *
 * A newline only sets `pendingNewline`; the line advances when the next
 * character arrives, so a trailing newline before end of input never moves
 * the position onto a line that does not exist.
 */

import type { SourceLocation } from '../source-location.js';

export interface PositionState {
  line: number;
  column: number;
  /** Index of the last delivered character; -1 before the first */
  offset: number;
  pendingNewline: boolean;
}

export type PositionSnapshot = Readonly<PositionState>;

export function createPositionState(): PositionState {
  return {
    line: 1,
    column: 0,
    offset: -1,
    pendingNewline: false,
  };
}

export function advance(state: PositionState, code: number): void {
  if (state.pendingNewline) {
    state.pendingNewline = false;
    state.line++;
    state.column = 0;
  }
  state.column++;
  state.offset++;
  if (code === 10) {
    state.pendingNewline = true;
  }
}

export function capture(state: PositionState): PositionSnapshot {
  return { ...state };
}

/** Restores every field, including the pending-newline flag */
export function restore(state: PositionState, snapshot: PositionSnapshot): void {
  state.line = snapshot.line;
  state.column = snapshot.column;
  state.offset = snapshot.offset;
  state.pendingNewline = snapshot.pendingNewline;
}

export function currentLocation(state: PositionSnapshot): SourceLocation {
  return { line: state.line, column: state.column, offset: state.offset };
}
