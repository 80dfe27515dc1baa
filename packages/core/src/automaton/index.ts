/**
 * Automaton Module
 * Pattern-to-DFA compilation
 */

export {
  ALPHABET_SIZE,
  EOF,
  OTHER_LETTER,
  describeLetter,
  letterOf,
} from './alphabet.js';
export { compileAutomaton, type AutomatonStats } from './compile.js';
export { Automaton, NONE, type TransitionRange } from './dfa.js';
export type { TaggedPattern } from './nfa.js';
