/**
 * Lexer Module
 * Compiles pattern sets into scanning sessions
 */

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
} from './compile.js';
