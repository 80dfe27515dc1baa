/**
 * Lexer Module Generator
 * Turns a specification file into a standalone TypeScript module that scans
 * with generated transition procedures and runs the actions verbatim.
 */

import type {
  CompileCallbacks,
  CompiledLexer,
  TokenPattern,
} from '../lexer/compile.js';
import { buildLexer } from '../spec/build.js';
import type { LexerSpecFile } from '../spec/types.js';
import { writeTransitionProcedure } from './procedure.js';
import { CodeWriter } from './writer.js';

/** Module the generated code imports the runtime from */
export const DEFAULT_RUNTIME_MODULE = '@lexloom/core';

export interface GenerateOptions {
  /** Import specifier of the runtime (default `@lexloom/core`) */
  readonly runtimeModule?: string | undefined;
  /** Overrides the file's `emit_main` instruction */
  readonly emitMain?: boolean | undefined;
  /** Lexer already built from the same file; built here when absent */
  readonly lexer?: CompiledLexer<string> | undefined;
  readonly callbacks?: CompileCallbacks | undefined;
}

/**
 * Generate the TypeScript source of a lexer module.
 *
 * Output order: prologue, runtime import, `scan_<parser>` and
 * `act_<parser>` per parser, the session and its exported helpers,
 * epilogue, and with `emit_main` a trailing `process.exitCode = scanAll();`.
 *
 * @throws PatternError or SpecError when the file does not build
 */
export function generateLexerModule(
  spec: LexerSpecFile,
  options: GenerateOptions = {}
): string {
  const lexer =
    options.lexer ?? buildLexer(spec, { callbacks: options.callbacks });
  const emitMain = options.emitMain ?? spec.instructions.emitMain;
  const runtime = options.runtimeModule ?? DEFAULT_RUNTIME_MODULE;
  const out = new CodeWriter();

  if (spec.prologue.trim() !== '') {
    out.write(spec.prologue);
    out.blankLine();
  }
  out.line('import {');
  out.indent();
  out.line('ScanSession,');
  out.line('fileSource,');
  out.line('type ActionContext,');
  if (spec.instructions.emitInputVar) out.line('type CharSource,');
  out.line('type ScanPrimitives,');
  out.line('type ScanStatus,');
  out.line('type Token,');
  out.dedent();
  out.line(`} from ${JSON.stringify(runtime)};`);

  for (const parser of lexer.parsers) {
    out.blankLine();
    writeTransitionProcedure(out, `scan_${parser.name}`, parser.automaton);
    out.blankLine();
    writeActions(out, parser.name, parser.patterns);
  }

  out.blankLine();
  out.line('const session = new ScanSession({');
  out.indent();
  out.line('parsers: [');
  out.indent();
  for (const parser of lexer.parsers) {
    const name = JSON.stringify(parser.name);
    out.line(
      `{ name: ${name}, procedure: scan_${parser.name}, onToken: act_${parser.name} },`
    );
  }
  out.dedent();
  out.line('],');
  out.line('source: fileSource(0),');
  out.line(`sourceName: '<stdin>',`);
  out.dedent();
  out.line('});');

  writeHelpers(out, spec.instructions.emitInputVar);

  if (spec.epilogue.trim() !== '') {
    out.blankLine();
    out.write(spec.epilogue.replace(/^\n+/, ''));
  }
  if (emitMain) {
    out.blankLine();
    out.line('process.exitCode = scanAll();');
  }
  return out.toString();
}

function writeActions(
  out: CodeWriter,
  parser: string,
  patterns: readonly TokenPattern<string>[]
): void {
  out.line(
    `function act_${parser}(token: Token, context: ActionContext): void {`
  );
  out.indent();
  out.line('switch (token.tag) {');
  out.indent();
  for (const pattern of patterns) {
    out.line(`case ${pattern.tag}: {`);
    out.indent();
    const action = pattern.action.trim();
    if (action !== '') out.line(action);
    out.line('break;');
    out.dedent();
    out.line('}');
  }
  out.dedent();
  out.line('}');
  out.dedent();
  out.line('}');
}

function writeHelpers(out: CodeWriter, emitInputVar: boolean): void {
  const helpers: [signature: string, body: string][] = [
    ['lexeme(): string', 'return session.lexeme;'],
    ['tokenLine(): number', 'return session.tokenStart.line;'],
    ['tokenColumn(): number', 'return session.tokenStart.column;'],
    ['inputName(): string', 'return session.sourceName;'],
    ['switchParser(name: string): void', 'session.switchParser(name);'],
    ['scanToken(): ScanStatus', 'return session.scanToken();'],
    ['scanAll(): 0 | 1', 'return session.scanAll();'],
  ];
  if (emitInputVar) {
    helpers.push([
      'setInput(source: CharSource, name: string): void',
      'session.setInput(source, name);',
    ]);
  }
  for (const [signature, body] of helpers) {
    out.blankLine();
    out.line(`export function ${signature} {`);
    out.indent();
    out.line(body);
    out.dedent();
    out.line('}');
  }
}
