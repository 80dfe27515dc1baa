#!/usr/bin/env node
/**
 * CLI Compile Entry Point
 *
 * Implements main(), parseArgs() and compileInputs() for the lexloom binary.
 * Reads specification files (or stdin), writes the generated TypeScript
 * module to a file or stdout.
 */

import { existsSync, readFileSync, writeFileSync } from 'node:fs';
import { resolve } from 'node:path';
import {
  buildLexer,
  ConfigError,
  generateLexerModule,
  parseSpecFile,
  type AutomatonStats,
} from '@lexloom/core';
import {
  ERROR_FORMATS,
  isErrorFormat,
  type ErrorFormat,
} from './cli-error-formatter.js';
import {
  formatError,
  USAGE,
  VERSION,
  type InputFile,
} from './cli-shared.js';
import { loadConfig } from './config.js';

/**
 * Parsed command-line arguments
 */
export type ParsedArgs =
  | { mode: 'help' | 'version' }
  | {
      mode: 'compile';
      /** Input paths in order; empty or `-` reads stdin */
      files: string[];
      output: string | undefined;
      config: string | undefined;
      debug: boolean;
      format: ErrorFormat;
    };

const VALUE_FLAGS: Readonly<Record<string, 'output' | 'config' | 'format'>> =
  {
    '-o': 'output',
    '--output': 'output',
    '-c': 'config',
    '--config': 'config',
    '--format': 'format',
  };

function invalidArgs(detail: string): ConfigError {
  return new ConfigError('LEX-C003', { detail });
}

/**
 * Parse command-line arguments into structured command
 *
 * @param argv - Raw command-line arguments (typically process.argv.slice(2))
 * @returns Parsed command object
 * @throws ConfigError LEX-C003 for unknown options or missing values
 */
export function parseArgs(argv: string[]): ParsedArgs {
  // Help takes precedence over version, in any position
  if (argv.includes('--help') || argv.includes('-h')) {
    return { mode: 'help' };
  }
  if (argv.includes('--version') || argv.includes('-v')) {
    return { mode: 'version' };
  }

  const files: string[] = [];
  const values: Partial<Record<'output' | 'config' | 'format', string>> = {};
  let debug = false;
  let optionsEnded = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === undefined) continue;

    if (optionsEnded || arg === '-' || !arg.startsWith('-')) {
      files.push(arg);
      continue;
    }
    if (arg === '--') {
      optionsEnded = true;
      continue;
    }
    if (arg === '-d' || arg === '--debug') {
      debug = true;
      continue;
    }

    const eq = arg.indexOf('=');
    const flag = arg.startsWith('--') && eq !== -1 ? arg.slice(0, eq) : arg;
    const key = VALUE_FLAGS[flag];
    if (key === undefined) {
      throw invalidArgs(`unknown option ${flag}`);
    }
    const value = flag !== arg ? arg.slice(eq + 1) : argv[++i];
    if (value === undefined || value === '') {
      throw invalidArgs(`missing value after ${flag}`);
    }
    values[key] = value;
  }

  const format = values.format ?? 'compact';
  if (!isErrorFormat(format)) {
    throw invalidArgs(
      `--format must be one of ${ERROR_FORMATS.join(', ')} (got ${format})`
    );
  }

  return {
    mode: 'compile',
    files,
    output: values.output,
    config: values.config,
    debug,
    format,
  };
}

// ============================================================
// COMPILATION
// ============================================================

/** Process surface the CLI reads from and writes to */
export interface CliIO {
  readonly cwd: string;
  /** Receives text that already ends in a newline */
  readonly stdout: (text: string) => void;
  /** Receives single lines without a trailing newline */
  readonly stderr: (line: string) => void;
  readonly readStdin: () => string;
}

/**
 * Read the inputs named on the command line, in order. `-` (and an empty
 * list) reads standard input.
 *
 * @throws ConfigError LEX-C002 for a file that does not exist
 */
export function readInputs(files: readonly string[], io: CliIO): InputFile[] {
  const names = files.length === 0 ? ['-'] : files;
  return names.map((name): InputFile => {
    if (name === '-') return { name: '<stdin>', text: io.readStdin() };
    const path = resolve(io.cwd, name);
    if (!existsSync(path)) {
      throw new ConfigError('LEX-C002', { path: name });
    }
    return { name, text: readFileSync(path, 'utf-8') };
  });
}

export interface CompileInputsOptions {
  readonly runtimeModule?: string | undefined;
  readonly emitMain?: boolean | undefined;
}

export interface CompileInputsResult {
  readonly code: string;
  /** One entry per parser, in build order */
  readonly stats: AutomatonStats[];
  readonly elapsedMs: number;
}

/**
 * Compile the concatenation of `inputs` into a TypeScript module.
 * Error locations refer to the concatenated text.
 *
 * @throws SpecError or PatternError when the specification is invalid
 */
export function compileInputs(
  inputs: readonly InputFile[],
  options: CompileInputsOptions = {}
): CompileInputsResult {
  const started = performance.now();
  const text = inputs.map((input) => input.text).join('');
  const name = inputs.length === 1 && inputs[0] ? inputs[0].name : '<input>';
  const stats: AutomatonStats[] = [];

  const spec = parseSpecFile(text, name);
  const lexer = buildLexer(spec, {
    callbacks: { onAutomaton: (s) => stats.push(s) },
  });
  const code = generateLexerModule(spec, {
    lexer,
    runtimeModule: options.runtimeModule,
    emitMain: options.emitMain,
  });
  return { code, stats, elapsedMs: performance.now() - started };
}

export function formatStats(stats: AutomatonStats): string {
  return (
    `parser ${stats.parser}: ${stats.patterns} patterns, ` +
    `${stats.nfaStates} NFA states, ${stats.dfaStates} DFA states, ` +
    `${stats.minimizedStates} minimized, ${stats.transitions} transitions`
  );
}

/**
 * Run the CLI with `argv` against `io`.
 *
 * @returns Exit code: 0 on success, 1 on any error
 */
export function run(argv: string[], io: CliIO): number {
  let format: ErrorFormat = 'compact';
  let inputs: InputFile[] = [];

  try {
    const parsed = parseArgs(argv);

    switch (parsed.mode) {
      case 'help':
        io.stdout(`${USAGE}\n`);
        return 0;

      case 'version':
        io.stdout(`${VERSION}\n`);
        return 0;

      case 'compile': {
        format = parsed.format;
        const config = loadConfig(io.cwd, parsed.config)?.config ?? {};
        const debug = parsed.debug || config.debug === true;
        const output =
          parsed.output !== undefined
            ? resolve(io.cwd, parsed.output)
            : config.output;

        inputs = readInputs(parsed.files, io);
        const result = compileInputs(inputs, {
          runtimeModule: config.runtimeModule,
          emitMain: config.emitMain,
        });

        if (debug) {
          for (const stats of result.stats) {
            io.stderr(`[debug] ${formatStats(stats)}`);
          }
          io.stderr(
            `[debug] compiled ${result.stats.length} parsers in ${result.elapsedMs.toFixed(1)} ms`
          );
        }

        if (output !== undefined) {
          writeFileSync(output, result.code, 'utf-8');
        } else {
          io.stdout(result.code);
        }
        return 0;
      }
    }
  } catch (err) {
    io.stderr(formatError(err, format, inputs));
    return 1;
  }
}

const processIO: CliIO = {
  cwd: process.cwd(),
  stdout: (text) => {
    process.stdout.write(text);
  },
  stderr: (line) => console.error(line),
  readStdin: () => readFileSync(0, 'utf-8'),
};

/**
 * Entry point for the lexloom binary
 *
 * Sets process.exitCode to 1 on any error.
 */
export function main(): void {
  process.exitCode = run(process.argv.slice(2), processIO);
}

// Only run main if not in test environment
const shouldRunMain =
  process.env['NODE_ENV'] !== 'test' &&
  !process.env['VITEST'] &&
  !process.env['VITEST_WORKER_ID'];

if (shouldRunMain) {
  main();
}
