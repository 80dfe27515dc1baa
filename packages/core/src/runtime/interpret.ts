/**
 * Automaton Interpreter
 * Transition procedure that walks an automaton's tables directly, as an
 * alternative to generated code.
 */

import { NONE, type Automaton } from '../automaton/dfa.js';
import type { TransitionProcedure } from './types.js';

export function interpretAutomaton(automaton: Automaton): TransitionProcedure {
  return (primitives) => {
    let state = automaton.start;
    for (;;) {
      const next = automaton.transition(state, primitives.next());
      if (next === NONE) {
        primitives.reject();
        return;
      }
      state = next;
      const tag = automaton.acceptTag(state);
      if (tag !== undefined) primitives.accept(tag);
    }
  };
}
