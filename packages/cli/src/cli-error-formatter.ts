/**
 * CLI Error Formatter
 * Format lexloom errors for human-readable, JSON, or compact output
 */

import {
  ERROR_REGISTRY,
  type LexloomErrorData,
  type SourceLocation,
} from '@lexloom/core';

// ============================================================
// PUBLIC TYPES
// ============================================================

export type ErrorFormat = 'human' | 'json' | 'compact';

export const ERROR_FORMATS: readonly ErrorFormat[] = [
  'compact',
  'human',
  'json',
];

export function isErrorFormat(value: unknown): value is ErrorFormat {
  return ERROR_FORMATS.some((format) => format === value);
}

/**
 * Format options for error output.
 */
export interface FormatOptions {
  readonly format: ErrorFormat;
  /** Text the error location points into, for the human snippet */
  readonly sourceText?: string | undefined;
}

// ============================================================
// ERROR FORMATTING
// ============================================================

/**
 * Format error data for output.
 *
 * - Compact: `file:line:column: error[ID]: message` on one line
 * - Human: header, location arrow, the offending line with a caret and the
 *   registry's resolution hint
 * - JSON: LSP Diagnostic compatible
 *
 * @throws {TypeError} Unknown format
 */
export function formatErrorData(
  error: LexloomErrorData,
  options: FormatOptions
): string {
  switch (options.format) {
    case 'compact':
      return formatErrorCompact(error);
    case 'human':
      return formatErrorHuman(error, options.sourceText);
    case 'json':
      return formatErrorJson(error);
    default:
      throw new TypeError(`Unknown format: ${String(options.format)}`);
  }
}

function locationPrefix(error: LexloomErrorData): string {
  const { location, source } = error;
  if (!location) return source !== undefined ? `${source}: ` : '';
  const position = `${location.line}:${location.column}`;
  return source !== undefined ? `${source}:${position}: ` : `${position}: `;
}

/**
 * Format error in compact format (single line).
 */
function formatErrorCompact(error: LexloomErrorData): string {
  return `${locationPrefix(error)}error[${error.errorId}]: ${error.message}`;
}

/**
 * Format error in human-readable format.
 *
 * Output format:
 * ```
 * error[LEX-B002]: Pattern accepts the empty string in parser default
 *   --> lexer.lex:5:1
 *    |
 *  5 | a* %{ count++; %}
 *    | ^
 *    = help: Replace x* with x+ or otherwise require at least one character.
 * ```
 */
function formatErrorHuman(
  error: LexloomErrorData,
  sourceText: string | undefined
): string {
  const lines: string[] = [`error[${error.errorId}]: ${error.message}`];
  const { location } = error;
  let gutter = ' ';

  if (location) {
    const file = error.source !== undefined ? `${error.source}:` : '';
    lines.push(`  --> ${file}${location.line}:${location.column}`);

    const content = sourceText?.split('\n')[location.line - 1];
    if (content !== undefined) {
      const lineNumber = String(location.line);
      gutter = ' '.repeat(lineNumber.length);
      lines.push(` ${gutter} |`);
      lines.push(` ${lineNumber} | ${content.replace(/\r$/, '')}`);
      lines.push(` ${gutter} | ${renderCaret(location)}`);
    }
  }

  const resolution = ERROR_REGISTRY.get(error.errorId)?.resolution;
  if (resolution !== undefined) {
    lines.push(` ${gutter} = help: ${resolution}`);
  }
  return lines.join('\n');
}

/**
 * Format error in JSON format (LSP Diagnostic compatible).
 */
function formatErrorJson(error: LexloomErrorData): string {
  const diagnostic: {
    errorId: string;
    severity: number;
    message: string;
    file?: string;
    range?: {
      start: { line: number; character: number };
      end: { line: number; character: number };
    };
    source: string;
    code: string;
  } = {
    errorId: error.errorId,
    severity: 1, // LSP: 1 = Error
    message: error.message,
    source: 'lexloom',
    code: error.errorId,
  };

  if (error.source !== undefined) {
    diagnostic.file = error.source;
  }
  if (error.location) {
    // LSP positions are 0-based
    const start = {
      line: error.location.line - 1,
      character: Math.max(0, error.location.column - 1),
    };
    diagnostic.range = {
      start,
      end: { line: start.line, character: start.character + 1 },
    };
  }

  return JSON.stringify(diagnostic, null, 2);
}

// ============================================================
// CARET
// ============================================================

/**
 * Caret under the character at a 1-based column.
 *
 * @throws {RangeError} Column below 1
 */
export function renderCaret(location: SourceLocation): string {
  if (location.column < 1) {
    throw new RangeError('Column must be at least 1');
  }
  return `${' '.repeat(location.column - 1)}^`;
}
