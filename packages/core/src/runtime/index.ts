/**
 * Runtime Module
 * Scanning sessions and the primitives transition procedures run against
 */

export { interpretAutomaton } from './interpret.js';
export type { PositionSnapshot, PositionState } from './position.js';
export { ReadAheadBuffer } from './read-ahead.js';
export { ScanSession, type ScanSessionOptions } from './session.js';
export {
  codesToString,
  fileSource,
  stringSource,
  type CharSource,
  type FileSourceOptions,
} from './sources.js';
export { ParserSwitchboard } from './switchboard.js';
export type {
  ActionContext,
  EndEvent,
  ParserDefinition,
  ScanCallbacks,
  ScanPrimitives,
  ScanStatus,
  StuckEvent,
  SwitchEvent,
  Token,
  TransitionProcedure,
} from './types.js';
