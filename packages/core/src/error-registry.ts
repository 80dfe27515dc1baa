/**
 * Error Registry
 * Central error definition registry with template rendering.
 */

// ============================================================
// ERROR CATEGORIES
// ============================================================

/** Error category determining error ID prefix */
export type ErrorCategory = 'build' | 'pattern' | 'runtime' | 'cli';

const CATEGORY_PREFIX: Record<ErrorCategory, string> = {
  build: 'B',
  pattern: 'P',
  runtime: 'R',
  cli: 'C',
};

/** Error registry entry containing all metadata for a single error condition */
export interface ErrorDefinition {
  /** Format: LEX-{category}{3-digit} (e.g., LEX-B001) */
  readonly errorId: string;
  readonly category: ErrorCategory;
  /** Message template with {placeholder} syntax */
  readonly messageTemplate: string;
  /** Hint printed under the error in human output */
  readonly resolution?: string | undefined;
}

// ============================================================
// ERROR REGISTRY
// ============================================================

/**
 * Central registry for all error definitions with O(1) lookup.
 * Immutable after initialization.
 */
export interface ErrorRegistry {
  get(errorId: string): ErrorDefinition | undefined;
  has(errorId: string): boolean;
  entries(): IterableIterator<[string, ErrorDefinition]>;
}

class ErrorRegistryImpl implements ErrorRegistry {
  private readonly byId: ReadonlyMap<string, ErrorDefinition>;

  constructor(definitions: readonly ErrorDefinition[]) {
    const idMap = new Map<string, ErrorDefinition>();

    for (const def of definitions) {
      const expectedPrefix = `LEX-${CATEGORY_PREFIX[def.category]}`;
      if (!def.errorId.startsWith(expectedPrefix)) {
        throw new TypeError(
          `Error ID ${def.errorId} does not match category ${def.category}`
        );
      }
      idMap.set(def.errorId, def);
    }

    this.byId = idMap;
  }

  get(errorId: string): ErrorDefinition | undefined {
    return this.byId.get(errorId);
  }

  has(errorId: string): boolean {
    return this.byId.has(errorId);
  }

  entries(): IterableIterator<[string, ErrorDefinition]> {
    return this.byId.entries();
  }
}

const ERROR_DEFINITIONS: readonly ErrorDefinition[] = [
  // Build Errors (LEX-B0xx)
  {
    errorId: 'LEX-B001',
    category: 'build',
    messageTemplate: 'Malformed specification: {detail}',
    resolution:
      'Check the %% delimiters, definition names and %{ %} action blocks near the reported position.',
  },
  {
    errorId: 'LEX-B002',
    category: 'build',
    messageTemplate: 'Pattern accepts the empty string in parser {parser}',
    resolution: 'Replace x* with x+ or otherwise require at least one character.',
  },
  {
    errorId: 'LEX-B003',
    category: 'build',
    messageTemplate: 'Unknown instruction {name}',
    resolution: 'Use emit_main or emit_input_fs_var.',
  },
  {
    errorId: 'LEX-B004',
    category: 'build',
    messageTemplate: 'Unexpected end of specification: {detail}',
  },
  {
    errorId: 'LEX-B005',
    category: 'build',
    messageTemplate: 'Duplicate definition {name}',
    resolution: 'Rename or remove one of the definitions.',
  },
  {
    errorId: 'LEX-B006',
    category: 'build',
    messageTemplate: 'Specification declares no token patterns',
  },

  // Pattern Errors (LEX-P0xx)
  {
    errorId: 'LEX-P001',
    category: 'pattern',
    messageTemplate: 'Invalid pattern: {detail}',
  },
  {
    errorId: 'LEX-P002',
    category: 'pattern',
    messageTemplate: 'Unknown definition {name}',
    resolution: 'Declare the definition in the regular definitions section.',
  },
  {
    errorId: 'LEX-P003',
    category: 'pattern',
    messageTemplate: 'Definition {name} refers to itself',
  },

  // Runtime Errors (LEX-R0xx)
  {
    errorId: 'LEX-R001',
    category: 'runtime',
    messageTemplate: 'Unknown parser {name}',
    resolution: 'Declare the parser with a %{name%} header or fix the name.',
  },
  {
    errorId: 'LEX-R002',
    category: 'runtime',
    messageTemplate: '{operation} called while a token scan is in progress',
  },
  {
    errorId: 'LEX-R003',
    category: 'runtime',
    messageTemplate: 'Scan primitive misuse: {detail}',
  },
  {
    errorId: 'LEX-R004',
    category: 'runtime',
    messageTemplate: 'No pattern matches input at {location}',
  },

  // CLI Errors (LEX-C0xx)
  {
    errorId: 'LEX-C001',
    category: 'cli',
    messageTemplate: 'Invalid configuration: {detail}',
  },
  {
    errorId: 'LEX-C002',
    category: 'cli',
    messageTemplate: 'Input not found: {path}',
  },
  {
    errorId: 'LEX-C003',
    category: 'cli',
    messageTemplate: 'Invalid arguments: {detail}',
  },
];

/**
 * Global error registry instance.
 * Read-only singleton initialized at module load.
 */
export const ERROR_REGISTRY: ErrorRegistry = new ErrorRegistryImpl(
  ERROR_DEFINITIONS
);

// ============================================================
// TEMPLATE RENDERING
// ============================================================

/**
 * Renders a message template by replacing placeholders with context values.
 *
 * Placeholder format: {varName}
 * Missing context values render as empty string.
 * Invalid templates (unclosed braces) return template unchanged.
 *
 * @example
 * renderMessage("Unknown parser {name}", { name: "comment" })
 * // Returns: "Unknown parser comment"
 */
export function renderMessage(
  template: string,
  context: Record<string, unknown>
): string {
  let result = '';
  let i = 0;

  while (i < template.length) {
    const char = template.charAt(i);

    if (char === '{') {
      const close = template.indexOf('}', i + 1);
      if (close === -1) {
        return template;
      }

      const value = context[template.slice(i + 1, close)];
      if (value !== undefined) {
        result += String(value);
      }
      i = close + 1;
      continue;
    }

    result += char;
    i++;
  }

  return result;
}
