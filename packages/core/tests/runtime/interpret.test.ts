/**
 * Lexloom Tests: Automaton Interpreter
 */

import { describe, expect, it } from 'vitest';
import {
  compileAutomaton,
  EOF,
  interpretAutomaton,
  parsePattern,
  type ScanPrimitives,
} from '../../src/index.js';

/** Primitives over `input` that record every call */
function recorder(input: string): { primitives: ScanPrimitives; calls: string[] } {
  const calls: string[] = [];
  let pos = 0;
  return {
    calls,
    primitives: {
      next: () => {
        const code = pos < input.length ? input.charCodeAt(pos++) : EOF;
        calls.push(code === EOF ? 'next EOF' : `next ${String.fromCharCode(code)}`);
        return code;
      },
      accept: (tag) => calls.push(`accept ${tag}`),
      reject: () => calls.push('reject'),
    },
  };
}

function procedureOf(...patterns: string[]) {
  return interpretAutomaton(
    compileAutomaton(
      patterns.map((text, tag) => ({ node: parsePattern(text).node, tag }))
    )
  );
}

describe('interpretAutomaton', () => {
  it('accepts on every accepting state and rejects on a missing transition', () => {
    const { primitives, calls } = recorder('ab1');
    procedureOf('[a-z]+')(primitives);
    expect(calls).toEqual([
      'next a',
      'accept 0',
      'next b',
      'accept 0',
      'next 1',
      'reject',
    ]);
  });

  it('rejects at EOF', () => {
    const { primitives, calls } = recorder('if');
    procedureOf('"if"', '[a-z]+')(primitives);
    expect(calls).toEqual([
      'next i',
      'accept 1',
      'next f',
      'accept 0',
      'next EOF',
      'reject',
    ]);
  });

  it('reads through non-accepting states without accepting', () => {
    const { primitives, calls } = recorder('abx');
    procedureOf('"abc"')(primitives);
    expect(calls).toEqual(['next a', 'next b', 'next x', 'reject']);
  });
});
