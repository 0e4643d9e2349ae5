/**
 * FIFO queue with optional capacity and promise-based blocking operations.
 *
 * Invariants:
 *   - Pending getters exist only while the queue is empty.
 *   - Pending putters exist only while the queue is full.
 *   - An item handed directly to a pending getter never occupies capacity.
 */

import { SkeinError } from "../errors.js";

export type QueueWaitOptions = Readonly<{
  /** Maximum time to wait; omitted means wait indefinitely. */
  timeoutMs?: number;
}>;

export type BoundedQueueOptions = Readonly<{
  /** Maximum number of queued items; omitted, zero or negative means unbounded. */
  capacity?: number;
}>;

type Timer = ReturnType<typeof setTimeout>;

type PendingGet<T> = {
  resolve: (item: T) => void;
  reject: (err: Error) => void;
  timer: Timer | null;
};

type PendingPut<T> = {
  item: T;
  resolve: () => void;
  reject: (err: Error) => void;
  timer: Timer | null;
};

function normalizeCapacity(capacity: number | undefined): number {
  if (capacity === undefined || capacity <= 0) return Number.POSITIVE_INFINITY;
  if (!Number.isInteger(capacity)) {
    throw new SkeinError("SKEIN_INVALID_ARGUMENT", "BoundedQueue: capacity must be an integer");
  }
  return capacity;
}

export class BoundedQueue<T> {
  readonly capacity: number;
  private readonly items: Array<Readonly<{ value: T }>> = [];
  private readonly getters: PendingGet<T>[] = [];
  private readonly putters: PendingPut<T>[] = [];
  private readonly joiners: Array<() => void> = [];
  private unfinished = 0;

  constructor(opts: BoundedQueueOptions = {}) {
    this.capacity = normalizeCapacity(opts.capacity);
  }

  get size(): number {
    return this.items.length;
  }

  get isEmpty(): boolean {
    return this.items.length === 0;
  }

  get isFull(): boolean {
    return this.items.length >= this.capacity;
  }

  /** Number of items put but not yet marked done with taskDone(). */
  get unfinishedTasks(): number {
    return this.unfinished;
  }

  putNowait(item: T): void {
    if (!this.tryPut(item)) {
      throw new SkeinError("SKEIN_QUEUE_FULL", "put: queue is full");
    }
  }

  put(item: T, opts: QueueWaitOptions = {}): Promise<void> {
    if (this.tryPut(item)) return Promise.resolve();
    return new Promise<void>((resolve, reject) => {
      const pending: PendingPut<T> = { item, resolve, reject, timer: null };
      if (opts.timeoutMs !== undefined) {
        pending.timer = setTimeout(
          () => {
            removeFrom(this.putters, pending);
            reject(new SkeinError("SKEIN_QUEUE_FULL", "put: no free slot within timeout"));
          },
          Math.max(0, opts.timeoutMs),
        );
      }
      this.putters.push(pending);
    });
  }

  getNowait(): T {
    return this.takeHead();
  }

  get(opts: QueueWaitOptions = {}): Promise<T> {
    if (this.items.length > 0) return Promise.resolve(this.takeHead());
    return new Promise<T>((resolve, reject) => {
      const pending: PendingGet<T> = { resolve, reject, timer: null };
      if (opts.timeoutMs !== undefined) {
        pending.timer = setTimeout(
          () => {
            removeFrom(this.getters, pending);
            reject(new SkeinError("SKEIN_QUEUE_EMPTY", "get: no item within timeout"));
          },
          Math.max(0, opts.timeoutMs),
        );
      }
      this.getters.push(pending);
    });
  }

  /** Marks one previously retrieved item as fully processed. */
  taskDone(): void {
    if (this.unfinished <= 0) {
      throw new SkeinError("SKEIN_INVALID_STATE", "taskDone: called more times than items put");
    }
    this.unfinished--;
    if (this.unfinished === 0) {
      const joiners = this.joiners.splice(0);
      for (const resolve of joiners) resolve();
    }
  }

  /** Resolves once every item put so far has been marked done. */
  join(): Promise<void> {
    if (this.unfinished === 0) return Promise.resolve();
    return new Promise<void>((resolve) => {
      this.joiners.push(resolve);
    });
  }

  private tryPut(item: T): boolean {
    const getter = this.getters.shift();
    if (getter !== undefined) {
      if (getter.timer !== null) clearTimeout(getter.timer);
      this.unfinished++;
      getter.resolve(item);
      return true;
    }
    if (this.isFull) return false;
    this.items.push({ value: item });
    this.unfinished++;
    return true;
  }

  private takeHead(): T {
    const head = this.items.shift();
    if (head === undefined) {
      throw new SkeinError("SKEIN_QUEUE_EMPTY", "get: queue is empty");
    }
    const putter = this.putters.shift();
    if (putter !== undefined) {
      if (putter.timer !== null) clearTimeout(putter.timer);
      this.items.push({ value: putter.item });
      this.unfinished++;
      putter.resolve();
    }
    return head.value;
  }
}

function removeFrom<T>(list: T[], entry: T): void {
  const idx = list.indexOf(entry);
  if (idx >= 0) list.splice(idx, 1);
}
