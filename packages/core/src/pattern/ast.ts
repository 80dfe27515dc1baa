/**
 * Pattern AST
 * Counted repetition, `+` and `?` are desugared by the parser, so only four
 * node types reach the NFA builder.
 */

export type PatternNode = LettersNode | ConcatNode | UnionNode | StarNode;

/** Matches exactly one letter from the set */
export interface LettersNode {
  readonly type: 'Letters';
  readonly letters: readonly number[];
}

/** Matches the children in sequence; no children matches the empty string */
export interface ConcatNode {
  readonly type: 'Concat';
  readonly children: readonly PatternNode[];
}

export interface UnionNode {
  readonly type: 'Union';
  readonly children: readonly PatternNode[];
}

export interface StarNode {
  readonly type: 'Star';
  readonly child: PatternNode;
}

export const EMPTY: ConcatNode = { type: 'Concat', children: [] };

export function letters(set: readonly number[]): LettersNode {
  return { type: 'Letters', letters: set };
}

export function concat(children: readonly PatternNode[]): PatternNode {
  const [only] = children;
  if (children.length === 1 && only) return only;
  return { type: 'Concat', children };
}

export function union(children: readonly PatternNode[]): PatternNode {
  const [only] = children;
  if (children.length === 1 && only) return only;
  return { type: 'Union', children };
}

export function star(child: PatternNode): StarNode {
  return { type: 'Star', child };
}
