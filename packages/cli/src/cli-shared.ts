/**
 * CLI Shared Utilities
 * Usage text and error formatting for the lexloom command
 */

import {
  LexloomError,
  lineStarts,
  locateOffset,
  VERSION,
  type LexloomErrorData,
} from '@lexloom/core';
import {
  formatErrorData,
  type ErrorFormat,
} from './cli-error-formatter.js';

/** One input file; specifications are compiled from their concatenation */
export interface InputFile {
  readonly name: string;
  readonly text: string;
}

export const USAGE = `Usage:
  lexloom [options] [file.lex ...]   Compile specification files into a TypeScript lexer
  lexloom -                          Read the specification from stdin
  lexloom --help                     Show this help message
  lexloom --version                  Show version information

Options:
  -o, --output <file>       Write the generated module to <file> (default: stdout)
  -c, --config <file>       Configuration file (default: ./lexloom.config.yaml)
  -d, --debug               Print automaton sizes and timing to stderr
  --format <format>         Error format: compact, human, json (default: compact)

Files are concatenated in argument order. Without files, stdin is read.

Examples:
  lexloom calc.lex -o calc-lexer.ts
  lexloom --debug prologue.lex rules.lex
  cat calc.lex | lexloom - > calc-lexer.ts`;

/**
 * Map an error located in the concatenation of `inputs` back to the input
 * file it falls in.
 *
 * @returns The relocated data and the text of that file, or the data
 *   unchanged when it has no location
 */
export function placeInInputs(
  data: LexloomErrorData,
  inputs: readonly InputFile[]
): { data: LexloomErrorData; text?: string | undefined } {
  const offset = data.location?.offset;
  if (offset === undefined) return { data };

  let start = 0;
  for (const [i, input] of inputs.entries()) {
    const end = start + input.text.length;
    const last = i === inputs.length - 1;
    if (offset < end || (last && offset <= end)) {
      const location = locateOffset(lineStarts(input.text), offset - start);
      return {
        data: { ...data, location, source: input.name },
        text: input.text,
      };
    }
    start = end;
  }
  return { data };
}

/**
 * Format error for stderr output
 *
 * Lexloom errors use the error formatter, placed in the input file they
 * refer to when `inputs` is given; other errors print their message.
 *
 * @param err - The error to format
 * @param format - Output format (defaults to compact)
 * @param inputs - Input files the error location refers to
 * @returns Formatted error message
 */
export function formatError(
  err: unknown,
  format: ErrorFormat = 'compact',
  inputs: readonly InputFile[] = []
): string {
  if (err instanceof LexloomError) {
    const placed =
      inputs.length > 0
        ? placeInInputs(err.toData(), inputs)
        : { data: err.toData(), text: undefined };
    return formatErrorData(placed.data, { format, sourceText: placed.text });
  }

  // Handle file system errors raised outside the input reader
  if (
    err instanceof Error &&
    'code' in err &&
    err.code === 'ENOENT' &&
    'path' in err
  ) {
    return `File not found: ${String(err.path)}`;
  }

  if (err instanceof Error) return err.message;
  return String(err);
}

/**
 * Package version string (the core package's version)
 */
export { VERSION };
