/**
 * Named Definitions
 * `{NAME}` references resolve against this table. Definitions may refer to
 * earlier or later ones; each is parsed once, on first use.
 */

import { PatternError } from '../error-classes.js';
import type { PatternNode } from './ast.js';
import { parsePattern, type DefinitionLookup } from './parser.js';

export class DefinitionTable {
  private readonly texts: ReadonlyMap<string, string>;
  private readonly resolved = new Map<string, PatternNode>();
  private readonly inProgress = new Set<string>();

  /**
   * @throws TypeError when a name repeats or is not `[A-Za-z0-9_]+`
   */
  constructor(definitions: Iterable<readonly [string, string]> = []) {
    const texts = new Map<string, string>();
    for (const [name, text] of definitions) {
      if (!/^[A-Za-z0-9_]+$/.test(name)) {
        throw new TypeError(`Invalid definition name: ${name}`);
      }
      if (texts.has(name)) {
        throw new TypeError(`Duplicate definition: ${name}`);
      }
      texts.set(name, text);
    }
    this.texts = texts;
  }

  /**
   * Parse a pattern whose `{NAME}` references resolve against this table.
   *
   * @throws PatternError for syntax errors in the pattern or in any
   *   definition it reaches; `definition` names the definition at fault
   */
  parse(text: string): PatternNode {
    return parsePattern(text, { resolveDefinition: this.lookup }).node;
  }

  /** Parse every definition, whether or not a pattern refers to it */
  check(): void {
    for (const name of this.texts.keys()) this.lookup(name);
  }

  private readonly lookup = (name: string): DefinitionLookup => {
    const cached = this.resolved.get(name);
    if (cached) return { node: cached };

    const text = this.texts.get(name);
    if (text === undefined) return { error: 'unknown' };
    if (this.inProgress.has(name)) return { error: 'recursive' };

    this.inProgress.add(name);
    try {
      const node = parsePattern(text, { resolveDefinition: this.lookup }).node;
      this.resolved.set(name, node);
      return { node };
    } catch (err) {
      if (err instanceof PatternError && err.definition === undefined) {
        throw err.with({ definition: name });
      }
      throw err;
    } finally {
      this.inProgress.delete(name);
    }
  };
}
