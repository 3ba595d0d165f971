import { VectorIndex } from "./vectorIndex.js";

/**
 * Holder for the live index. Queries take a snapshot with `current()` and
 * keep using it even if a rebuild swaps in a newer one mid-query.
 */
export class IndexHandle {
  private index: VectorIndex;
  private gen = 0;

  constructor(initial: VectorIndex = VectorIndex.empty()) {
    this.index = initial;
  }

  current(): VectorIndex {
    return this.index;
  }

  /** Number of swaps so far. */
  get generation(): number {
    return this.gen;
  }

  swap(next: VectorIndex): VectorIndex {
    const previous = this.index;
    this.index = next;
    this.gen += 1;
    return previous;
  }
}
