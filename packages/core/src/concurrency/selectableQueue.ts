/**
 * Event queue paired with a Notifier so a single-threaded loop can wait for
 * "new item queued" alongside its other readiness sources.
 *
 * False-positive readiness (notifier ready, queue empty) is possible and
 * harmless; false negatives are not: getAll() drains the notifier *before*
 * collecting, so a put() racing with the collection leaves the notifier ready.
 */

import { SkeinError } from "../errors.js";
import { BoundedQueue, type QueueWaitOptions } from "./boundedQueue.js";
import { Notifier } from "./notifier.js";

export type SelectableQueueOptions<T> = Readonly<{
  /** Queue to wrap; a fresh BoundedQueue is created when omitted. */
  queue?: BoundedQueue<T>;
  /** Capacity of the fresh queue; ignored when `queue` is given. */
  capacity?: number;
}>;

export class SelectableQueue<T> {
  readonly notifier: Notifier;
  private readonly queue: BoundedQueue<T>;

  constructor(opts: SelectableQueueOptions<T> = {}) {
    this.queue =
      opts.queue ?? new BoundedQueue<T>(opts.capacity === undefined ? {} : { capacity: opts.capacity });
    this.notifier = new Notifier();
  }

  /** The pollable handle that becomes ready when items are put in the queue. */
  get handle(): SharedArrayBuffer {
    return this.notifier.handle;
  }

  get closed(): boolean {
    return this.notifier.closed;
  }

  get size(): number {
    return this.queue.size;
  }

  async put(item: T, opts: QueueWaitOptions = {}): Promise<void> {
    this.assertOpen();
    await this.queue.put(item, opts);
    this.notifier.notify();
  }

  putNowait(item: T): void {
    this.assertOpen();
    this.queue.putNowait(item);
    this.notifier.notify();
  }

  /** Returns every pending item without blocking; may be empty. */
  getAll(): T[] {
    this.notifier.drain();
    const result: T[] = [];
    while (!this.queue.isEmpty) {
      result.push(this.queue.getNowait());
    }
    return result;
  }

  /** Closes the queue. Items must not be added afterwards. */
  close(): void {
    this.notifier.close();
  }

  private assertOpen(): void {
    if (this.notifier.closed) {
      throw new SkeinError("SKEIN_RESOURCE_CLOSED", "put: queue is already closed");
    }
  }
}
