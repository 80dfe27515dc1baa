/**
 * CLI Compile Tests
 * Argument parsing and end-to-end runs against an in-memory IO surface
 */

import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ConfigError, VERSION } from '@lexloom/core';
import {
  compileInputs,
  formatStats,
  parseArgs,
  readInputs,
  run,
  type CliIO,
} from '../src/cli-compile.js';
import { USAGE } from '../src/cli-shared.js';

const SPEC = '%%\n%%\nD [0-9]\n%%\n{D}+ %{ n++; %}\n%%\n';

interface FakeIO extends CliIO {
  readonly out: string[];
  readonly err: string[];
}

function fakeIO(cwd: string, stdin = ''): FakeIO {
  const out: string[] = [];
  const err: string[] = [];
  return {
    cwd,
    out,
    err,
    stdout: (text) => out.push(text),
    stderr: (line) => err.push(line),
    readStdin: () => stdin,
  };
}

describe('parseArgs', () => {
  it('parses files and options in any order', () => {
    expect(
      parseArgs(['a.lex', '-o', 'out.ts', '--debug', 'b.lex', '--config=c.yaml'])
    ).toEqual({
      mode: 'compile',
      files: ['a.lex', 'b.lex'],
      output: 'out.ts',
      config: 'c.yaml',
      debug: true,
      format: 'compact',
    });
  });

  it('gives help precedence over version', () => {
    expect(parseArgs(['--version', 'x.lex', '-h'])).toEqual({ mode: 'help' });
    expect(parseArgs(['x.lex', '-v'])).toEqual({ mode: 'version' });
  });

  it('treats - and everything after -- as files', () => {
    expect(parseArgs(['-', '--', '-o'])).toMatchObject({
      files: ['-', '-o'],
      output: undefined,
    });
  });

  it('reads --format', () => {
    expect(parseArgs(['--format', 'json'])).toMatchObject({ format: 'json' });
  });

  it.each([
    [['--watch'], 'Invalid arguments: unknown option --watch'],
    [['-o'], 'Invalid arguments: missing value after -o'],
    [['--output='], 'Invalid arguments: missing value after --output'],
    [
      ['--format', 'xml'],
      'Invalid arguments: --format must be one of compact, human, json (got xml)',
    ],
  ])('rejects %j', (argv, message) => {
    expect(() => parseArgs(argv)).toThrow(ConfigError);
    expect(() => parseArgs(argv)).toThrow(message);
  });
});

describe('compileInputs', () => {
  it('compiles the concatenation of the inputs', () => {
    const result = compileInputs([
      { name: 'head.lex', text: '%%\n%%\n' },
      { name: 'rules.lex', text: 'D [0-9]\n%%\n{D}+ %{%}\n%%\n' },
    ]);
    expect(result.code).toContain('function scan_default(');
    expect(result.stats).toHaveLength(1);
    expect(result.stats[0]).toMatchObject({ parser: 'default', patterns: 1 });
  });

  it('passes the runtime module and main override through', () => {
    const result = compileInputs([{ name: 'a.lex', text: SPEC }], {
      runtimeModule: './rt.js',
      emitMain: true,
    });
    expect(result.code).toContain('} from "./rt.js";');
    expect(result.code.endsWith('process.exitCode = scanAll();\n')).toBe(true);
  });
});

describe('formatStats', () => {
  it('summarizes one parser on a line', () => {
    expect(
      formatStats({
        parser: 'default',
        patterns: 2,
        nfaStates: 9,
        dfaStates: 4,
        minimizedStates: 3,
        transitions: 12,
      })
    ).toBe(
      'parser default: 2 patterns, 9 NFA states, 4 DFA states, 3 minimized, 12 transitions'
    );
  });
});

describe('run', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'lexloom-cli-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('prints usage and version', () => {
    const io = fakeIO(dir);
    expect(run(['--help'], io)).toBe(0);
    expect(run(['--version'], io)).toBe(0);
    expect(io.out).toEqual([`${USAGE}\n`, `${VERSION}\n`]);
  });

  it('compiles stdin to stdout', () => {
    const io = fakeIO(dir, SPEC);
    expect(run([], io)).toBe(0);
    expect(io.err).toEqual([]);
    expect(io.out).toHaveLength(1);
    expect(io.out[0]).toContain('      n++;\n');
  });

  it('writes the output file', () => {
    writeFileSync(join(dir, 'calc.lex'), SPEC);
    const io = fakeIO(dir);
    expect(run(['calc.lex', '-o', 'calc.ts'], io)).toBe(0);
    expect(io.out).toEqual([]);
    expect(readFileSync(join(dir, 'calc.ts'), 'utf-8')).toContain(
      'export function scanToken(): ScanStatus {'
    );
  });

  it('prints automaton stats with --debug', () => {
    const io = fakeIO(dir, SPEC);
    expect(run(['-d', '-'], io)).toBe(0);
    expect(io.err).toHaveLength(2);
    expect(io.err[0]).toMatch(
      /^\[debug\] parser default: 1 patterns, \d+ NFA states, \d+ DFA states, 2 minimized, \d+ transitions$/
    );
    expect(io.err[1]).toMatch(/^\[debug\] compiled 1 parsers in \d+\.\d ms$/);
  });

  it('applies the configuration file', () => {
    writeFileSync(
      join(dir, 'lexloom.config.yaml'),
      'output: gen/lexer.ts\ndebug: true\nruntimeModule: ./rt.js\n'
    );
    mkdirSync(join(dir, 'gen'));
    const io = fakeIO(dir, SPEC);
    expect(run([], io)).toBe(0);
    expect(io.err).toHaveLength(2);
    expect(readFileSync(join(dir, 'gen/lexer.ts'), 'utf-8')).toContain(
      '} from "./rt.js";'
    );
  });

  it('lets -o override the configured output', () => {
    writeFileSync(join(dir, 'lexloom.config.yaml'), 'output: configured.ts\n');
    const io = fakeIO(dir, SPEC);
    expect(run(['-o', 'flag.ts'], io)).toBe(0);
    expect(existsSync(join(dir, 'flag.ts'))).toBe(true);
    expect(existsSync(join(dir, 'configured.ts'))).toBe(false);
  });

  it('reports a missing input file', () => {
    const io = fakeIO(dir);
    expect(run(['missing.lex'], io)).toBe(1);
    expect(io.err).toEqual(['error[LEX-C002]: Input not found: missing.lex']);
  });

  it('reports argument errors', () => {
    const io = fakeIO(dir);
    expect(run(['--bogus'], io)).toBe(1);
    expect(io.err).toEqual([
      'error[LEX-C003]: Invalid arguments: unknown option --bogus',
    ]);
  });

  it('reports specification errors in the file they occur in', () => {
    writeFileSync(join(dir, 'head.lex'), '%%\n%%\n');
    writeFileSync(join(dir, 'rules.lex'), '%%\nb* %{%}\n%%\n');
    const io = fakeIO(dir);
    expect(run(['head.lex', 'rules.lex'], io)).toBe(1);
    expect(io.err).toEqual([
      'rules.lex:2:1: error[LEX-B002]: Pattern accepts the empty string in parser default',
    ]);
  });

  it('formats errors as requested', () => {
    const io = fakeIO(dir, '%%\n%%\n%%\na(b %{%}\n%%\n');
    expect(run(['--format', 'human'], io)).toBe(1);
    expect(io.err).toEqual([
      [
        "error[LEX-P001]: Invalid pattern: unclosed '('",
        '  --> <stdin>:4:2',
        '   |',
        ' 4 | a(b %{%}',
        '   |  ^',
      ].join('\n'),
    ]);
  });
});

describe('readInputs', () => {
  it('reads stdin for an empty file list', () => {
    expect(readInputs([], fakeIO('/', 'text'))).toEqual([
      { name: '<stdin>', text: 'text' },
    ]);
  });
});
