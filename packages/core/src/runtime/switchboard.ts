/**
 * Parser Switchboard
 * Named parsers with exactly one active. Switching only moves the active
 * pointer; buffered input and position belong to the session.
 */

import { ScanError } from '../error-classes.js';
import type { ParserDefinition } from './types.js';

export class ParserSwitchboard {
  private readonly byName: ReadonlyMap<string, ParserDefinition>;
  private current: ParserDefinition;

  /**
   * @param parsers - Declared parsers; the first is the default
   * @param initial - Name of the parser active at the start, if not the first
   * @throws TypeError when no parsers are given or names repeat
   */
  constructor(parsers: readonly ParserDefinition[], initial?: string) {
    const [first] = parsers;
    if (!first) {
      throw new TypeError('At least one parser is required');
    }

    const byName = new Map<string, ParserDefinition>();
    for (const parser of parsers) {
      if (byName.has(parser.name)) {
        throw new TypeError(`Duplicate parser name: ${parser.name}`);
      }
      byName.set(parser.name, parser);
    }
    this.byName = byName;
    this.current = first;
    if (initial !== undefined) this.switchTo(initial);
  }

  get active(): ParserDefinition {
    return this.current;
  }

  /**
   * Make `name` the active parser.
   *
   * @returns The previously active parser
   * @throws ScanError LEX-R001 for an undeclared name
   */
  switchTo(name: string): ParserDefinition {
    const target = this.byName.get(name);
    if (!target) {
      throw new ScanError('LEX-R001', { name });
    }
    const previous = this.current;
    this.current = target;
    return previous;
  }
}
