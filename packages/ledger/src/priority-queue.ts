/**
 * @splitledger/ledger — Binary heap priority queue.
 *
 * `compare(a, b) < 0` means `a` comes out before `b`.
 * Order among items the comparator treats as equal is unspecified.
 */

export type Comparator<T> = (a: T, b: T) => number;

export class PriorityQueue<T> {
  private readonly _heap: T[] = [];
  private readonly _compare: Comparator<T>;

  constructor(compare: Comparator<T>, items: Iterable<T> = []) {
    this._compare = compare;
    for (const item of items) {
      this.push(item);
    }
  }

  get size(): number {
    return this._heap.length;
  }

  isEmpty(): boolean {
    return this._heap.length === 0;
  }

  peek(): T | undefined {
    return this._heap[0];
  }

  push(item: T): void {
    this._heap.push(item);
    this._siftUp(this._heap.length - 1);
  }

  /**
   * Remove and return the first item, or undefined when empty.
   */
  pop(): T | undefined {
    const top = this._heap[0];
    const last = this._heap.pop();
    if (top === undefined || last === undefined) {
      return undefined;
    }
    if (this._heap.length > 0) {
      this._heap[0] = last;
      this._siftDown(0);
    }
    return top;
  }

  private _before(i: number, j: number): boolean {
    const a = this._heap[i];
    const b = this._heap[j];
    if (a === undefined || b === undefined) {
      return false;
    }
    return this._compare(a, b) < 0;
  }

  private _swap(i: number, j: number): void {
    const a = this._heap[i];
    const b = this._heap[j];
    if (a === undefined || b === undefined) {
      return;
    }
    this._heap[i] = b;
    this._heap[j] = a;
  }

  private _siftUp(index: number): void {
    let child = index;
    while (child > 0) {
      const parent = (child - 1) >> 1;
      if (!this._before(child, parent)) {
        return;
      }
      this._swap(child, parent);
      child = parent;
    }
  }

  private _siftDown(index: number): void {
    let parent = index;
    const length = this._heap.length;
    for (;;) {
      const left = 2 * parent + 1;
      const right = left + 1;
      let first = parent;

      if (left < length && this._before(left, first)) {
        first = left;
      }
      if (right < length && this._before(right, first)) {
        first = right;
      }
      if (first === parent) {
        return;
      }

      this._swap(parent, first);
      parent = first;
    }
  }
}
