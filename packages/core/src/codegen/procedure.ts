/**
 * Transition Procedure Emitter
 * Writes an automaton as a TypeScript function over the scan primitives:
 * one `switch` case per state with a range test per outgoing transition.
 */

import { describeLetter } from '../automaton/alphabet.js';
import type { Automaton, TransitionRange } from '../automaton/dfa.js';
import type { CodeWriter } from './writer.js';

function condition(range: TransitionRange): string {
  if (range.hi === Infinity) return `c >= ${range.lo}`;
  if (range.lo === range.hi) return `c === ${range.lo}`;
  return `c >= ${range.lo} && c <= ${range.hi}`;
}

function describeRange(range: TransitionRange): string {
  const lo = describeLetter(Math.min(range.lo, 256));
  if (range.hi === Infinity) return range.lo > 255 ? lo : `${lo}-<other>`;
  if (range.lo === range.hi) return lo;
  return `${lo}-${describeLetter(range.hi)}`;
}

/** Accepting states grouped by tag, in ascending tag order */
function statesByTag(automaton: Automaton): Map<number, number[]> {
  const groups = new Map<number, number[]>();
  for (let state = 0; state < automaton.stateCount; state++) {
    const tag = automaton.acceptTag(state);
    if (tag === undefined) continue;
    const states = groups.get(tag) ?? [];
    states.push(state);
    groups.set(tag, states);
  }
  return new Map([...groups].sort(([a], [b]) => a - b));
}

/**
 * Writes `function <name>(p: ScanPrimitives): void`. The function follows
 * one transition per `p.next()`, calls `p.accept(tag)` on entering an
 * accepting state and `p.reject()` when no transition exists.
 */
export function writeTransitionProcedure(
  out: CodeWriter,
  name: string,
  automaton: Automaton
): void {
  out.line(`function ${name}(p: ScanPrimitives): void {`);
  out.indent();
  out.line(`let state = ${automaton.start};`);
  out.line('for (;;) {');
  out.indent();
  out.line('const c = p.next();');
  out.line('switch (state) {');
  out.indent();
  for (let state = 0; state < automaton.stateCount; state++) {
    writeStateCase(out, state, automaton.ranges(state));
  }
  out.dedent();
  out.line('}');

  const accepting = statesByTag(automaton);
  if (accepting.size > 0) {
    out.line('switch (state) {');
    out.indent();
    for (const [tag, states] of accepting) {
      for (const state of states) out.line(`case ${state}:`);
      out.indent();
      out.line(`p.accept(${tag});`);
      out.line('break;');
      out.dedent();
    }
    out.dedent();
    out.line('}');
  }

  out.dedent();
  out.line('}');
  out.dedent();
  out.line('}');
}

function writeStateCase(
  out: CodeWriter,
  state: number,
  ranges: readonly TransitionRange[]
): void {
  out.line(`case ${state}:`);
  out.indent();
  if (ranges.length === 0) {
    out.line('return p.reject();');
    out.dedent();
    return;
  }
  ranges.forEach((range, i) => {
    const keyword = i === 0 ? 'if' : 'else if';
    out.line(
      `${keyword} (${condition(range)}) state = ${range.target}; // ${describeRange(range)}`
    );
  });
  out.line('else return p.reject();');
  out.line('break;');
  out.dedent();
}
