/**
 * NFA
 * Thompson construction of one NFA for a prioritized list of patterns.
 * Every pattern gets its own accepting node carrying the pattern's tag.
 */

import type { PatternNode } from '../pattern/ast.js';

export interface NfaNode {
  readonly epsilons: number[];
  readonly letters: readonly number[];
  /** Target for every letter in `letters`; -1 when `letters` is empty */
  readonly next: number;
  /** Tag of the pattern accepted here, or -1 */
  readonly acceptTag: number;
}

export interface Nfa {
  readonly nodes: readonly NfaNode[];
  readonly start: number;
}

export interface TaggedPattern {
  readonly node: PatternNode;
  readonly tag: number;
}

class NfaBuilder {
  readonly nodes: NfaNode[] = [];

  makeNode(
    epsilons: number[],
    letters: readonly number[] = [],
    next = -1,
    acceptTag = -1
  ): number {
    this.nodes.push({ epsilons, letters, next, acceptTag });
    return this.nodes.length - 1;
  }

  /** Builds `node` so that it leads to `out`; returns the entry node */
  build(node: PatternNode, out: number): number {
    // https://en.wikipedia.org/wiki/Thompson's_construction
    switch (node.type) {
      case 'Letters':
        return this.makeNode([], node.letters, out);
      case 'Concat': {
        let entry = out;
        for (let i = node.children.length - 1; i >= 0; i--) {
          const child = node.children[i];
          if (child) entry = this.build(child, entry);
        }
        return entry;
      }
      case 'Union':
        return this.makeNode(
          node.children.map((child) => this.build(child, out))
        );
      case 'Star': {
        const loop = this.makeNode([out]);
        const entry = this.build(node.child, loop);
        this.nodes[loop]?.epsilons.push(entry);
        return this.makeNode([entry, out]);
      }
    }
  }
}

export function buildNfa(patterns: readonly TaggedPattern[]): Nfa {
  const builder = new NfaBuilder();
  const start = builder.makeNode([]);
  const entries = patterns.map((pattern) => {
    const accept = builder.makeNode([], [], -1, pattern.tag);
    return builder.build(pattern.node, accept);
  });
  builder.nodes[start]?.epsilons.push(...entries);
  return { nodes: builder.nodes, start };
}
