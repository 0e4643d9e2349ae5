/**
 * Indexed binary min-heap of alarms ordered by (at, id).
 *
 * Ids grow monotonically, so alarms due at the same instant pop in
 * registration order. Every entry tracks its heap index, which lets remove()
 * restore the heap invariant in O(log n) instead of re-heapifying.
 */

import type { AlarmCallback, AlarmToken } from "./types.js";

export type AlarmEntry = Readonly<{
  id: number;
  at: number;
  callback: AlarmCallback;
}>;

type Slot = AlarmEntry & { index: number };

function before(a: Slot, b: Slot): boolean {
  return a.at < b.at || (a.at === b.at && a.id < b.id);
}

export class AlarmHeap {
  private readonly heap: Slot[] = [];
  private readonly byId = new Map<number, Slot>();
  private idCounter = 1;

  get size(): number {
    return this.heap.length;
  }

  /** Id the next pushed alarm will receive. */
  get nextId(): number {
    return this.idCounter;
  }

  has(id: number): boolean {
    return this.byId.has(id);
  }

  push(at: number, callback: AlarmCallback): AlarmToken {
    const slot: Slot = { id: this.idCounter++, at, callback, index: this.heap.length };
    this.heap.push(slot);
    this.byId.set(slot.id, slot);
    this.siftUp(slot.index);
    return Object.freeze({ id: slot.id, at });
  }

  remove(id: number): boolean {
    const slot = this.byId.get(id);
    if (slot === undefined) return false;
    this.byId.delete(id);
    const last = this.heap.pop();
    if (last !== undefined && last !== slot) {
      this.heap[slot.index] = last;
      last.index = slot.index;
      this.siftDown(last.index);
      this.siftUp(last.index);
    }
    return true;
  }

  peek(): AlarmEntry | undefined {
    return this.heap[0];
  }

  /** Absolute time of the earliest alarm, or null when empty. */
  nextDueAt(): number | null {
    return this.heap[0]?.at ?? null;
  }

  /** Removes and returns the earliest alarm if it is due at `now`. */
  popDue(now: number): AlarmEntry | undefined {
    const head = this.heap[0];
    if (head === undefined || head.at > now) return undefined;
    this.remove(head.id);
    return head;
  }

  clear(): void {
    this.heap.length = 0;
    this.byId.clear();
  }

  private siftUp(index: number): void {
    let i = index;
    while (i > 0) {
      const parentIndex = (i - 1) >> 1;
      const node = this.heap[i];
      const parent = this.heap[parentIndex];
      if (node === undefined || parent === undefined || !before(node, parent)) return;
      this.swap(i, parentIndex);
      i = parentIndex;
    }
  }

  private siftDown(index: number): void {
    let i = index;
    for (;;) {
      let smallest = i;
      for (const child of [2 * i + 1, 2 * i + 2]) {
        const candidate = this.heap[child];
        const current = this.heap[smallest];
        if (candidate !== undefined && current !== undefined && before(candidate, current)) {
          smallest = child;
        }
      }
      if (smallest === i) return;
      this.swap(i, smallest);
      i = smallest;
    }
  }

  private swap(i: number, j: number): void {
    const a = this.heap[i];
    const b = this.heap[j];
    if (a === undefined || b === undefined) return;
    this.heap[i] = b;
    this.heap[j] = a;
    a.index = j;
    b.index = i;
  }
}
