/**
 * Binary min-heap over node handles with decrease-key support.
 *
 * The heap stores integer handles into the caller's node table and reads
 * priorities through the supplied comparator, so updating a node's cost only
 * needs a `decreaseKey(handle)` call afterwards.
 */
export class OpenSet {
  private items: number[] = [];
  /** handle -> index in `items`, or -1 when not queued */
  private positions: number[] = [];

  constructor(private readonly less: (a: number, b: number) => boolean) {}

  get size(): number {
    return this.items.length;
  }

  push(handle: number): void {
    this.items.push(handle);
    this.positions[handle] = this.items.length - 1;
    this.siftUp(this.items.length - 1);
  }

  pop(): number | undefined {
    const a = this.items;
    if (a.length === 0) return undefined;
    const top = a[0];
    const last = a.pop();
    this.positions[top] = -1;
    if (last !== undefined && a.length > 0) {
      a[0] = last;
      this.positions[last] = 0;
      this.siftDown(0);
    }
    return top;
  }

  /**
   * Restores heap order after the handle's priority was lowered.
   */
  decreaseKey(handle: number): void {
    const index = this.positions[handle] ?? -1;
    if (index < 0) return;
    this.siftUp(index);
  }

  private swap(i: number, j: number): void {
    const a = this.items;
    [a[i], a[j]] = [a[j], a[i]];
    this.positions[a[i]] = i;
    this.positions[a[j]] = j;
  }

  private siftUp(i: number): void {
    const a = this.items;
    while (i > 0) {
      const p = (i - 1) >> 1;
      if (!this.less(a[i], a[p])) break;
      this.swap(i, p);
      i = p;
    }
  }

  private siftDown(i: number): void {
    const a = this.items;
    const n = a.length;
    while (true) {
      let s = i;
      const l = i * 2 + 1;
      const r = l + 1;
      if (l < n && this.less(a[l], a[s])) s = l;
      if (r < n && this.less(a[r], a[s])) s = r;
      if (s === i) break;
      this.swap(i, s);
      i = s;
    }
  }
}
