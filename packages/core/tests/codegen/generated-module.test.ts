/**
 * Lexloom Tests: Generated Lexer Modules
 * Writes generated modules to disk, imports them and scans with them
 */

import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  buildLexer,
  generateLexerModule,
  parseSpecFile,
  stringSource,
  type CharSource,
} from '../../src/index.js';

const RUNTIME = fileURLToPath(new URL('../../src/index.ts', import.meta.url));

/** Exports every module below has: a prologue array plus the helpers */
interface GeneratedLexer {
  readonly seen: string[];
  setInput(source: CharSource, name: string): void;
  scanAll(): 0 | 1;
}

function isGeneratedLexer(value: unknown): value is GeneratedLexer {
  return (
    typeof value === 'object' &&
    value !== null &&
    'seen' in value &&
    Array.isArray(value.seen) &&
    'setInput' in value &&
    typeof value.setInput === 'function' &&
    'scanAll' in value &&
    typeof value.scanAll === 'function'
  );
}

/** Prologue, instructions and definitions shared by the files below */
function specFile(definitions: string[], entries: string[]): string {
  return [
    'export const seen: string[] = [];',
    '%%',
    'emit_input_fs_var',
    '%%',
    ...definitions,
    '%%',
    ...entries,
    '%%',
    '',
  ].join('\n');
}

const RECORD = '%{ seen.push(`${token.tag}:${lexeme()}`); %}';

describe('generated lexer modules', () => {
  let dir: string;
  let count = 0;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'lexloom-generated-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  async function load(text: string): Promise<GeneratedLexer> {
    const code = generateLexerModule(parseSpecFile(text, 'test.lex'), {
      runtimeModule: RUNTIME,
    });
    const path = join(dir, `lexer${count++}.ts`);
    writeFileSync(path, code);
    const mod: unknown = await import(path);
    if (!isGeneratedLexer(mod)) {
      throw new Error(`${path} does not export the lexer helpers`);
    }
    return mod;
  }

  it('takes the longest match and resumes after it', async () => {
    const lexer = await load(
      specFile([], [`"aba" ${RECORD}`, `a ${RECORD}`, `b ${RECORD}`])
    );

    lexer.setInput(stringSource('abab'), 'first');
    expect(lexer.scanAll()).toBe(0);
    expect(lexer.seen).toEqual(['0:aba', '2:b']);

    lexer.setInput(stringSource('ab'), 'second');
    expect(lexer.scanAll()).toBe(0);
    expect(lexer.seen).toEqual(['0:aba', '2:b', '1:a', '2:b']);
  });

  it('switches parsers from actions and reports token positions', async () => {
    const where = 'seen.push(`${lexeme()}@${tokenLine()}:${tokenColumn()}`);';
    const lexer = await load(
      specFile(
        [],
        [
          `a %{ ${where} switchParser('s'); %}`,
          '\\n %{%}',
          `b %{s%} %{ ${where} switchParser('default'); %}`,
        ]
      )
    );

    lexer.setInput(stringSource('ab\nab'), 'input');
    expect(lexer.scanAll()).toBe(0);
    expect(lexer.seen).toEqual(['a@1:1', 'b@1:2', 'a@2:1', 'b@2:2']);
  });

  it('returns 1 when a parser gets stuck', async () => {
    const lexer = await load(
      specFile([], [`a ${RECORD}`, `b %{s%} ${RECORD}`])
    );

    // "b" belongs to parser s, which is never active
    lexer.setInput(stringSource('aab'), 'input');
    expect(lexer.scanAll()).toBe(1);
    expect(lexer.seen).toEqual(['0:a', '0:a']);
  });

  it('produces the same tokens as the interpreted automaton', async () => {
    const text = specFile(
      ['D [0-9]', 'L [a-z]'],
      [
        `"if" ${RECORD}`,
        `{L}({L}|{D})* ${RECORD}`,
        `{D}+ ${RECORD}`,
        `[\\s\\n]+ ${RECORD}`,
      ]
    );
    const input = 'if iffy 42\nx1 if';
    const lexer = await load(text);

    lexer.setInput(stringSource(input), 'input');
    expect(lexer.scanAll()).toBe(0);

    const interpreted = buildLexer(parseSpecFile(text, 'test.lex'))
      .tokenize(input)
      .map((token) => `${token.tag}:${token.text}`);
    expect(lexer.seen).toEqual(interpreted);
    expect(lexer.seen).toEqual([
      '0:if',
      '3: ',
      '1:iffy',
      '3: ',
      '2:42',
      '3:\n',
      '1:x1',
      '3: ',
      '0:if',
    ]);
  });
});
