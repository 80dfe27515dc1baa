/**
 * Error Classes and Factory
 * Structured error types with registry-based error codes
 */

import type { SourceLocation } from './source-location.js';
import {
  ERROR_REGISTRY,
  renderMessage,
  type ErrorCategory,
} from './error-registry.js';

// ============================================================
// ERROR DATA
// ============================================================

/** Structured error data for host applications */
export interface LexloomErrorData {
  readonly errorId: string;
  readonly message: string;
  readonly location?: SourceLocation | undefined;
  readonly source?: string | undefined;
  readonly context?: Record<string, unknown> | undefined;
}

// ============================================================
// BASE ERROR CLASS
// ============================================================

/**
 * Base error class for all lexloom errors.
 * Provides structured data for host applications to format as needed.
 */
export class LexloomError extends Error {
  readonly errorId: string;
  readonly location?: SourceLocation | undefined;
  /** Name of the file or input the location refers to */
  readonly source?: string | undefined;
  readonly context?: Record<string, unknown> | undefined;

  constructor(data: LexloomErrorData) {
    if (!data.errorId) {
      throw new TypeError('errorId is required');
    }
    if (!ERROR_REGISTRY.has(data.errorId)) {
      throw new TypeError(`Unknown error ID: ${data.errorId}`);
    }

    const locationStr = data.location
      ? ` at ${data.location.line}:${data.location.column}`
      : '';
    super(`${data.message}${locationStr}`);
    this.name = 'LexloomError';
    this.errorId = data.errorId;
    this.location = data.location;
    this.source = data.source;
    this.context = data.context;
  }

  /** Get structured error data for custom formatting */
  toData(): LexloomErrorData {
    return {
      errorId: this.errorId,
      message: this.message.replace(/ at \d+:\d+$/, ''),
      location: this.location,
      source: this.source,
      context: this.context,
    };
  }

  /** Format error for display (can be overridden by host) */
  format(formatter?: (data: LexloomErrorData) => string): string {
    if (formatter) return formatter(this.toData());
    return this.message;
  }
}

/**
 * Renders the registry template for `errorId`, checking that the ID belongs
 * to the expected category.
 */
function renderFor(
  errorId: string,
  category: ErrorCategory,
  context: Record<string, unknown>
): string {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }
  if (definition.category !== category) {
    throw new TypeError(`Expected ${category} error ID, got: ${errorId}`);
  }
  return renderMessage(definition.messageTemplate, context);
}

// ============================================================
// SPECIALIZED ERROR CLASSES
// ============================================================

/** Specification compile failures (malformed spec, empty-match pattern) */
export class SpecError extends LexloomError {
  constructor(
    errorId: string,
    context: Record<string, unknown>,
    location?: SourceLocation,
    source?: string
  ) {
    super({
      errorId,
      message: renderFor(errorId, 'build', context),
      location,
      source,
      context,
    });
    this.name = 'SpecError';
  }
}

export interface PatternErrorOptions {
  /** Index of the offending character in the pattern text */
  readonly offset?: number | undefined;
  /** Named definition whose text the pattern is, when the error lies in one */
  readonly definition?: string | undefined;
  /** Position in a specification file, replacing the in-pattern position */
  readonly location?: SourceLocation | undefined;
  readonly source?: string | undefined;
}

/**
 * Pattern syntax and reference errors. Without a file `location`, the
 * location is the offending character inside the pattern text (line 1).
 */
export class PatternError extends LexloomError {
  readonly pattern: string;
  readonly offset?: number | undefined;
  readonly definition?: string | undefined;

  constructor(
    errorId: string,
    pattern: string,
    context: Record<string, unknown>,
    options: PatternErrorOptions = {}
  ) {
    const { offset } = options;
    super({
      errorId,
      message: renderFor(errorId, 'pattern', context),
      location:
        options.location ??
        (offset === undefined
          ? undefined
          : { line: 1, column: offset + 1, offset }),
      source: options.source,
      context: { ...context, pattern },
    });
    this.name = 'PatternError';
    this.pattern = pattern;
    this.offset = offset;
    this.definition = options.definition;
  }

  /** Same error, with the given options replacing this one's */
  with(options: PatternErrorOptions): PatternError {
    return new PatternError(this.errorId, this.pattern, this.context ?? {}, {
      offset: this.offset,
      definition: this.definition,
      location: this.location,
      source: this.source,
      ...options,
    });
  }
}

/** Scanning session contract violations */
export class ScanError extends LexloomError {
  constructor(
    errorId: string,
    context: Record<string, unknown>,
    location?: SourceLocation
  ) {
    super({
      errorId,
      message: renderFor(errorId, 'runtime', context),
      location,
      context,
    });
    this.name = 'ScanError';
  }
}

/** Command-line and configuration errors */
export class ConfigError extends LexloomError {
  constructor(errorId: string, context: Record<string, unknown>) {
    super({
      errorId,
      message: renderFor(errorId, 'cli', context),
      context,
    });
    this.name = 'ConfigError';
  }
}

// ============================================================
// ERROR FACTORY
// ============================================================

/**
 * Factory function for creating errors from registry.
 *
 * @throws TypeError if errorId is not found in registry
 *
 * @example
 * createError('LEX-R001', { name: 'comment' })
 * // LexloomError: "Unknown parser comment"
 */
export function createError(
  errorId: string,
  context: Record<string, unknown>,
  location?: SourceLocation
): LexloomError {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }

  return new LexloomError({
    errorId,
    message: renderMessage(definition.messageTemplate, context),
    location,
    context,
  });
}
