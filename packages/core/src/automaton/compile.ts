/**
 * Automaton Compiler
 * Prioritized patterns in, one minimal tagged DFA out.
 */

import { SpecError } from '../error-classes.js';
import { determinize, minimize, type Automaton } from './dfa.js';
import { buildNfa, type TaggedPattern } from './nfa.js';

export interface AutomatonStats {
  readonly parser: string;
  readonly patterns: number;
  readonly nfaStates: number;
  readonly dfaStates: number;
  readonly minimizedStates: number;
  readonly transitions: number;
}

/**
 * Compile tagged patterns into a minimal DFA. Lower tags take priority among
 * equal-length matches.
 *
 * @throws SpecError LEX-B002 when the start state accepts (some pattern
 *   matches the empty string)
 */
export function compileAutomaton(
  patterns: readonly TaggedPattern[],
  parser = 'default',
  onStats?: (stats: AutomatonStats) => void
): Automaton {
  const nfa = buildNfa(patterns);
  const dfa = determinize(nfa);
  const automaton = minimize(dfa);

  const startTag = automaton.acceptTag(automaton.start);
  if (startTag !== undefined) {
    throw new SpecError('LEX-B002', { parser, tag: startTag });
  }

  onStats?.({
    parser,
    patterns: patterns.length,
    nfaStates: nfa.nodes.length,
    dfaStates: dfa.stateCount,
    minimizedStates: automaton.stateCount,
    transitions: automaton.countTransitions(),
  });
  return automaton;
}
