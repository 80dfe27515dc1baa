/**
 * DFA
 * Subset construction and Hopcroft minimization producing a tagged,
 * partial deterministic automaton. State 0 is always the start state.
 */

import { ALPHABET_SIZE, EOF, letterOf, OTHER_LETTER } from './alphabet.js';
import type { Nfa } from './nfa.js';
import { Partition } from './partition.js';

/** Marks a missing transition or a non-accepting state */
export const NONE = -1;

/** A run of consecutive char codes sharing one successor */
export interface TransitionRange {
  readonly lo: number;
  /** Inclusive; `Infinity` when the range extends over every code above 255 */
  readonly hi: number;
  readonly target: number;
}

/**
 * Minimal deterministic automaton with tagged accepting states.
 * Transitions are stored row-major, `ALPHABET_SIZE` entries per state.
 */
export class Automaton {
  readonly start = 0;

  constructor(
    readonly stateCount: number,
    private readonly table: Int32Array,
    private readonly tags: Int32Array
  ) {}

  /** Successor of `state` on char code `code`, or NONE */
  transition(state: number, code: number): number {
    if (code === EOF) return NONE;
    return this.table[state * ALPHABET_SIZE + letterOf(code)] ?? NONE;
  }

  /** Tag accepted in `state`, or undefined when it is not accepting */
  acceptTag(state: number): number | undefined {
    const tag = this.tags[state] ?? NONE;
    return tag === NONE ? undefined : tag;
  }

  /**
   * Outgoing transitions of `state` as ranges of char codes, ascending.
   * Codes above 255 all share the transition of OTHER_LETTER.
   */
  ranges(state: number): TransitionRange[] {
    const out: TransitionRange[] = [];
    let letter = 0;
    while (letter < OTHER_LETTER) {
      const target = this.successor(state, letter);
      let end = letter;
      while (
        end + 1 < OTHER_LETTER &&
        this.successor(state, end + 1) === target
      ) {
        end++;
      }
      if (target !== NONE) {
        if (end === 255 && this.successor(state, OTHER_LETTER) === target) {
          out.push({ lo: letter, hi: Infinity, target });
          return out;
        }
        out.push({ lo: letter, hi: end, target });
      }
      letter = end + 1;
    }
    const other = this.successor(state, OTHER_LETTER);
    if (other !== NONE) out.push({ lo: 256, hi: Infinity, target: other });
    return out;
  }

  private successor(state: number, letter: number): number {
    return this.table[state * ALPHABET_SIZE + letter] ?? NONE;
  }

  countTransitions(): number {
    let count = 0;
    for (const target of this.table) {
      if (target !== NONE) count++;
    }
    return count;
  }
}

// ============================================================
// SUBSET CONSTRUCTION
// ============================================================

interface SubsetTable {
  readonly stateCount: number;
  /** Row-major; NONE for the empty subset */
  readonly table: Int32Array;
  readonly tags: Int32Array;
}

function closure(nfa: Nfa, seeds: Iterable<number>): number[] {
  const seen = new Set<number>();
  const stack = [...seeds];
  while (stack.length > 0) {
    const id = stack.pop();
    if (id === undefined || seen.has(id)) continue;
    seen.add(id);
    for (const eps of nfa.nodes[id]?.epsilons ?? []) {
      if (!seen.has(eps)) stack.push(eps);
    }
  }
  return [...seen].sort((a, b) => a - b);
}

/**
 * Powerset construction. A subset accepts the smallest tag among its NFA
 * accepting nodes, which is what makes the earliest-declared pattern win
 * among equal-length matches.
 */
export function determinize(nfa: Nfa): SubsetTable {
  const subsets: number[][] = [];
  const ids = new Map<string, number>();

  const idOf = (subset: number[]): number => {
    const key = subset.join(',');
    let id = ids.get(key);
    if (id === undefined) {
      id = subsets.length;
      ids.set(key, id);
      subsets.push(subset);
    }
    return id;
  };

  idOf(closure(nfa, [nfa.start]));
  const rows: number[][] = [];
  const tags: number[] = [];

  // `subsets` grows while this loop runs
  for (let id = 0; id < subsets.length; id++) {
    const subset = subsets[id] ?? [];
    const moves = new Map<number, Set<number>>();
    let tag = NONE;
    for (const nodeId of subset) {
      const node = nfa.nodes[nodeId];
      if (!node) continue;
      if (node.acceptTag !== NONE && (tag === NONE || node.acceptTag < tag)) {
        tag = node.acceptTag;
      }
      for (const letter of node.letters) {
        let targets = moves.get(letter);
        if (!targets) {
          targets = new Set();
          moves.set(letter, targets);
        }
        targets.add(node.next);
      }
    }

    const row = new Array<number>(ALPHABET_SIZE).fill(NONE);
    const cache = new Map<string, number>();
    for (const [letter, targets] of moves) {
      const key = [...targets].sort((a, b) => a - b).join(',');
      let target = cache.get(key);
      if (target === undefined) {
        target = idOf(closure(nfa, targets));
        cache.set(key, target);
      }
      row[letter] = target;
    }
    rows.push(row);
    tags.push(tag);
  }

  const table = new Int32Array(subsets.length * ALPHABET_SIZE);
  rows.forEach((row, id) => table.set(row, id * ALPHABET_SIZE));
  return {
    stateCount: subsets.length,
    table,
    tags: Int32Array.from(tags),
  };
}

// ============================================================
// MINIMIZATION
// ============================================================

/**
 * Hopcroft minimization. A sink state stands in for missing transitions so
 * the automaton is total while refining; the sink's block (every state that
 * can no longer reach acceptance) becomes "no transition" again afterwards.
 * Blocks are seeded by tag, so states with different tags never merge.
 */
export function minimize(dfa: SubsetTable): Automaton {
  const sink = dfa.stateCount;
  const n = dfa.stateCount + 1;
  const target = (state: number, letter: number): number => {
    if (state === sink) return sink;
    const t = dfa.table[state * ALPHABET_SIZE + letter] ?? NONE;
    return t === NONE ? sink : t;
  };

  const inverse = new Array<number[] | undefined>(ALPHABET_SIZE * n);
  for (let state = 0; state < n; state++) {
    for (let letter = 0; letter < ALPHABET_SIZE; letter++) {
      const index = letter * n + target(state, letter);
      (inverse[index] ??= []).push(state);
    }
  }

  const partition = new Partition(n);
  const byTag = new Map<number, Set<number>>();
  for (let state = 0; state < dfa.stateCount; state++) {
    const tag = dfa.tags[state] ?? NONE;
    if (tag === NONE) continue;
    let set = byTag.get(tag);
    if (!set) {
      set = new Set();
      byTag.set(tag, set);
    }
    set.add(state);
  }
  for (const set of byTag.values()) partition.refine(set);

  for (;;) {
    const block = partition.pollPending();
    if (!block) break;
    for (let letter = 0; letter < ALPHABET_SIZE; letter++) {
      const predecessors = new Set<number>();
      for (const state of block) {
        for (const p of inverse[letter * n + state] ?? []) predecessors.add(p);
      }
      if (predecessors.size > 0) partition.refine(predecessors);
    }
  }

  // renumber blocks so the start state's block is 0 and the sink's is
  // dropped (unless the start state itself can never accept)
  const sinkRep = partition.representative(sink);
  const newId = new Map<number, number>();
  newId.set(partition.representative(0), 0);
  for (const rep of partition.representatives()) {
    if (rep !== sinkRep && !newId.has(rep)) newId.set(rep, newId.size);
  }

  const stateCount = newId.size;
  const table = new Int32Array(stateCount * ALPHABET_SIZE).fill(NONE);
  const tags = new Int32Array(stateCount).fill(NONE);
  for (const [rep, id] of newId) {
    tags[id] = dfa.tags[rep] ?? NONE;
    for (let letter = 0; letter < ALPHABET_SIZE; letter++) {
      const toRep = partition.representative(target(rep, letter));
      if (toRep === sinkRep) continue;
      const to = newId.get(toRep);
      if (to !== undefined) table[id * ALPHABET_SIZE + letter] = to;
    }
  }
  return new Automaton(stateCount, table, tags);
}
