/**
 * Binary min-heap of open record indices.
 *
 * Ordered by rank, then by arena index, so among equal ranks the record
 * created first comes out first. Entries are never updated in place: the
 * search pushes the replacing record and skips stale entries on pop.
 */

interface Entry {
  rank: number;
  index: number;
}

export class OpenQueue {
  private heap: Entry[] = [];

  get size(): number {
    return this.heap.length;
  }

  push(index: number, rank: number): void {
    this.heap.push({ rank, index });
    this.bubbleUp(this.heap.length - 1);
  }

  /**
   * Remove and return the index with the lowest (rank, index).
   */
  pop(): number | undefined {
    const top = this.heap[0];
    if (top === undefined) return undefined;
    const last = this.heap.pop();
    if (last !== undefined && this.heap.length > 0) {
      this.heap[0] = last;
      this.bubbleDown(0);
    }
    return top.index;
  }

  peekRank(): number | undefined {
    return this.heap[0]?.rank;
  }

  clear(): void {
    this.heap = [];
  }

  private before(a: Entry, b: Entry): boolean {
    return a.rank < b.rank || (a.rank === b.rank && a.index < b.index);
  }

  private bubbleUp(i: number): void {
    while (i > 0) {
      const p = (i - 1) >> 1;
      if (!this.before(this.heap[i], this.heap[p])) break;
      [this.heap[p], this.heap[i]] = [this.heap[i], this.heap[p]];
      i = p;
    }
  }

  private bubbleDown(i: number): void {
    const n = this.heap.length;
    while (true) {
      const l = i * 2 + 1;
      const r = l + 1;
      let m = i;
      if (l < n && this.before(this.heap[l], this.heap[m])) m = l;
      if (r < n && this.before(this.heap[r], this.heap[m])) m = r;
      if (m === i) break;
      [this.heap[m], this.heap[i]] = [this.heap[i], this.heap[m]];
      i = m;
    }
  }
}
