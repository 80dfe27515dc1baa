/**
 * lexloom
 * Lexer compiler: patterns to tagged automata, backtracking scan sessions,
 * specification files and TypeScript code generation
 */

export {
  ALPHABET_SIZE,
  Automaton,
  type AutomatonStats,
  compileAutomaton,
  describeLetter,
  EOF,
  letterOf,
  NONE,
  OTHER_LETTER,
  type TaggedPattern,
  type TransitionRange,
} from './automaton/index.js';
export { DefinitionTable } from './pattern/definitions.js';
export type { PatternNode } from './pattern/ast.js';
export {
  type DefinitionLookup,
  parsePattern,
  type ParsePatternOptions,
  type ParsedPattern,
} from './pattern/parser.js';
export {
  type ActionContext,
  codesToString,
  type CharSource,
  type EndEvent,
  fileSource,
  type FileSourceOptions,
  interpretAutomaton,
  type ParserDefinition,
  ParserSwitchboard,
  ReadAheadBuffer,
  type ScanCallbacks,
  type ScanPrimitives,
  ScanSession,
  type ScanSessionOptions,
  type ScanStatus,
  stringSource,
  type StuckEvent,
  type SwitchEvent,
  type Token,
  type TransitionProcedure,
} from './runtime/index.js';
export {
  type ActionHandler,
  type CompileCallbacks,
  CompiledLexer,
  type CompiledParser,
  compileLexer,
  type CompileOptions,
  type CreateSessionOptions,
  type LexerSpec,
  type ParserSpec,
  type PatternSpec,
  type TokenPattern,
} from './lexer/index.js';
export {
  buildLexer,
  DEFAULT_PARSER,
  type LexerSpecFile,
  lineStarts,
  locateOffset,
  parseSpecFile,
  type SpecDefinition,
  type SpecEntry,
  type SpecInstructions,
  type SpecParser,
} from './spec/index.js';
export {
  CodeWriter,
  DEFAULT_RUNTIME_MODULE,
  generateLexerModule,
  type GenerateOptions,
  writeTransitionProcedure,
} from './codegen/index.js';
export {
  ConfigError,
  createError,
  LexloomError,
  type LexloomErrorData,
  PatternError,
  type PatternErrorOptions,
  ScanError,
  SpecError,
} from './error-classes.js';
export {
  ERROR_REGISTRY,
  type ErrorCategory,
  type ErrorDefinition,
  renderMessage,
} from './error-registry.js';
export {
  formatLocation,
  type SourceLocation,
} from './source-location.js';
export {
  parseVersion,
  VERSION,
  VERSION_INFO,
  type VersionInfo,
} from './version.js';
