/**
 * Lexer Compiler
 * Builds one automaton and transition procedure per parser from pattern
 * strings, and creates scanning sessions over them.
 */

import { compileAutomaton, type AutomatonStats } from '../automaton/compile.js';
import type { Automaton } from '../automaton/dfa.js';
import { SpecError } from '../error-classes.js';
import { DefinitionTable } from '../pattern/definitions.js';
import { interpretAutomaton } from '../runtime/interpret.js';
import { ScanSession } from '../runtime/session.js';
import { stringSource, type CharSource } from '../runtime/sources.js';
import type {
  ActionContext,
  ParserDefinition,
  ScanCallbacks,
  Token,
  TransitionProcedure,
} from '../runtime/types.js';

// ============================================================
// INPUT
// ============================================================

export interface PatternSpec<A> {
  readonly pattern: string;
  readonly action: A;
}

export interface ParserSpec<A> {
  readonly name: string;
  /** In priority order: earlier patterns win equal-length matches */
  readonly patterns: readonly PatternSpec<A>[];
}

export interface LexerSpec<A> {
  /** The first parser is active when a session starts */
  readonly parsers: readonly ParserSpec<A>[];
  /** Named definitions for `{NAME}` references */
  readonly definitions?: Readonly<Record<string, string>> | undefined;
}

/** Observability callbacks for lexer compilation */
export interface CompileCallbacks {
  /** Called once per parser after its automaton is built */
  onAutomaton?: ((stats: AutomatonStats) => void) | undefined;
}

export interface CompileOptions {
  readonly callbacks?: CompileCallbacks | undefined;
}

// ============================================================
// OUTPUT
// ============================================================

export interface TokenPattern<A> {
  readonly source: string;
  /** Declaration index inside the parser; lower tags take priority */
  readonly tag: number;
  readonly action: A;
}

export interface CompiledParser<A> {
  readonly name: string;
  readonly automaton: Automaton;
  readonly patterns: readonly TokenPattern<A>[];
  readonly procedure: TransitionProcedure;
}

/** Runs the action of a matched pattern */
export type ActionHandler<A> = (
  action: A,
  token: Token,
  context: ActionContext
) => void;

export interface CreateSessionOptions<A> {
  readonly source?: CharSource | undefined;
  readonly sourceName?: string | undefined;
  readonly initialParser?: string | undefined;
  readonly callbacks?: ScanCallbacks | undefined;
  readonly onAction?: ActionHandler<A> | undefined;
}

export class CompiledLexer<A> {
  private readonly byName: ReadonlyMap<string, CompiledParser<A>>;

  constructor(readonly parsers: readonly CompiledParser<A>[]) {
    this.byName = new Map(parsers.map((parser) => [parser.name, parser]));
  }

  parser(name: string): CompiledParser<A> | undefined {
    return this.byName.get(name);
  }

  createSession(options: CreateSessionOptions<A> = {}): ScanSession {
    const onAction = options.onAction;
    const definitions: ParserDefinition[] = this.parsers.map((parser) => ({
      name: parser.name,
      procedure: parser.procedure,
      onToken: onAction
        ? (token: Token, context: ActionContext): void => {
            const pattern = parser.patterns[token.tag];
            if (pattern) onAction(pattern.action, token, context);
          }
        : undefined,
    }));
    return new ScanSession({
      parsers: definitions,
      initialParser: options.initialParser,
      source: options.source,
      sourceName: options.sourceName,
      callbacks: options.callbacks,
    });
  }

  /**
   * Scan all of `text`, running actions as tokens complete.
   *
   * @throws ScanError LEX-R004 when no pattern matches
   */
  tokenize(
    text: string,
    options: Omit<CreateSessionOptions<A>, 'source'> = {}
  ): Token[] {
    const session = this.createSession({
      ...options,
      source: stringSource(text),
    });
    return [...session.tokens()];
  }
}

// ============================================================
// COMPILATION
// ============================================================

/**
 * Compile every parser of `spec`.
 *
 * @throws PatternError for malformed patterns or definitions
 * @throws SpecError LEX-B002 when a pattern matches the empty string,
 *   LEX-B006 when no parser declares a pattern
 * @throws TypeError for duplicate parser names
 */
export function compileLexer<A>(
  spec: LexerSpec<A>,
  options: CompileOptions = {}
): CompiledLexer<A> {
  const patternCount = spec.parsers.reduce(
    (sum, parser) => sum + parser.patterns.length,
    0
  );
  if (patternCount === 0) {
    throw new SpecError('LEX-B006', {});
  }

  const table = new DefinitionTable(Object.entries(spec.definitions ?? {}));
  const seen = new Set<string>();
  const parsers = spec.parsers.map((parser): CompiledParser<A> => {
    if (seen.has(parser.name)) {
      throw new TypeError(`Duplicate parser name: ${parser.name}`);
    }
    seen.add(parser.name);
    return compileParser(parser, table, options.callbacks);
  });
  return new CompiledLexer(parsers);
}

function compileParser<A>(
  spec: ParserSpec<A>,
  table: DefinitionTable,
  callbacks: CompileCallbacks | undefined
): CompiledParser<A> {
  const patterns = spec.patterns.map(
    (entry, tag): TokenPattern<A> => ({
      source: entry.pattern,
      tag,
      action: entry.action,
    })
  );
  const automaton = compileAutomaton(
    patterns.map((p) => ({ node: table.parse(p.source), tag: p.tag })),
    spec.name,
    callbacks?.onAutomaton
  );
  return {
    name: spec.name,
    automaton,
    patterns,
    procedure: interpretAutomaton(automaton),
  };
}
