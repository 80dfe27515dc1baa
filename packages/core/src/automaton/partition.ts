/**
 * Partition refinement over the integers 0..n-1, used by Hopcroft
 * minimization.
 *
 * https://en.wikipedia.org/wiki/Partition_refinement#Data_structure
 */

interface Block {
  /** Position of this block in `Partition.blocks` */
  index: number;
  /** Range of `Partition.elements` holding this block's members, [start, end) */
  start: number;
  end: number;
  /** Whether the minimizer still has to split other blocks by this one */
  pending: boolean;
  /** While refining, the block receiving members split off from this one */
  sibling: Block | undefined;
}

export class Partition {
  /**
   * A permutation of 0..n-1 in which every block is a contiguous range.
   * Invariant: `elements[i] === x` iff `positions[x] === i`
   */
  private readonly elements: number[];
  private readonly positions: number[];
  private readonly blocks: Block[] = [];
  /** Stack of pending blocks; may also hold blocks deleted since pushed */
  private readonly worklist: Block[] = [];
  /** Block containing each element */
  private readonly blockOf: Block[];

  constructor(n: number) {
    this.elements = Array.from({ length: n }, (_, i) => i);
    this.positions = Array.from({ length: n }, (_, i) => i);
    const initial = this.makeBlock(0, n, true);
    this.blockOf = new Array<Block>(n).fill(initial);
  }

  private makeBlock(start: number, end: number, pending: boolean): Block {
    const block: Block = {
      index: this.blocks.length,
      start,
      end,
      pending,
      sibling: undefined,
    };
    this.blocks.push(block);
    if (pending) this.worklist.push(block);
    return block;
  }

  private deleteBlock(block: Block): void {
    const last = this.blocks.pop();
    if (last && last !== block) {
      last.index = block.index;
      this.blocks[block.index] = last;
    }
    block.pending = false;
  }

  /** Takes a pending block off the worklist, or undefined when none remain */
  pollPending(): readonly number[] | undefined {
    for (;;) {
      const block = this.worklist.pop();
      if (!block) return undefined;
      if (block.pending) {
        block.pending = false;
        return this.elements.slice(block.start, block.end);
      }
    }
  }

  /** Smallest-position member of the block containing `x` */
  representative(x: number): number {
    const block = this.blockOf[x];
    if (!block) throw new RangeError(`Element ${x} out of range`);
    return this.elements[block.start] ?? x;
  }

  representatives(): number[] {
    return this.blocks.map((block) => this.elements[block.start] ?? 0);
  }

  /**
   * Splits every block that `set` partly intersects. When a pending block is
   * split both halves stay pending; otherwise only the smaller half becomes
   * pending.
   */
  refine(set: ReadonlySet<number>): void {
    const split: Block[] = [];
    for (const x of set) {
      const block = this.blockOf[x];
      if (!block) continue;
      if (!block.sibling) {
        split.push(block);
        block.sibling = this.makeBlock(block.end, block.end, block.pending);
      }
      this.moveToSibling(x, block, block.sibling);
    }

    for (const block of split) {
      const sibling = block.sibling;
      block.sibling = undefined;
      if (!sibling) continue;
      if (block.start === block.end) {
        this.deleteBlock(block);
      } else if (!block.pending) {
        const smaller =
          block.end - block.start <= sibling.end - sibling.start
            ? block
            : sibling;
        smaller.pending = true;
        this.worklist.push(smaller);
      }
    }
  }

  /** Swaps `x` to the end of `block` and moves the boundary past it */
  private moveToSibling(x: number, block: Block, sibling: Block): void {
    const { elements, positions } = this;
    const i = positions[x] ?? 0;
    const j = --sibling.start;
    block.end = j;

    const y = elements[j] ?? x;
    elements[i] = y;
    positions[y] = i;
    elements[j] = x;
    positions[x] = j;

    this.blockOf[x] = sibling;
  }
}
