/**
 * Cross-thread readiness notifier.
 *
 * The shared-memory counterpart of the self-pipe trick: producers bump a
 * counter word and wake async waiters; the owning loop awaits readiness with
 * waitReady() and consumes pending signals with drain().
 *
 * Layout of `handle` (Int32 words):
 *   [0] pending notifications
 *   [1] closed flag (1 once closed)
 */

import { SkeinError } from "../errors.js";
import { waitForWordChange } from "./atomicCounter.js";

const PENDING_WORD = 0;
const CLOSED_WORD = 1;
const NOTIFIER_WORDS = 2;

export class Notifier {
  /** Pollable handle; stable for the lifetime of the notifier. */
  readonly handle: SharedArrayBuffer;
  private readonly cells: Int32Array;

  /**
   * Creates a fresh notifier, or attaches to `handle` when one created in
   * another isolate is passed in.
   */
  constructor(handle?: SharedArrayBuffer) {
    if (handle === undefined) {
      this.handle = new SharedArrayBuffer(NOTIFIER_WORDS * Int32Array.BYTES_PER_ELEMENT);
    } else if (handle.byteLength !== NOTIFIER_WORDS * Int32Array.BYTES_PER_ELEMENT) {
      throw new SkeinError(
        "SKEIN_INVALID_ARGUMENT",
        `Notifier: expected a ${String(NOTIFIER_WORDS * Int32Array.BYTES_PER_ELEMENT)}-byte handle, got ${String(handle.byteLength)}`,
      );
    } else {
      this.handle = handle;
    }
    this.cells = new Int32Array(this.handle);
  }

  /** Attaches to a notifier created in another isolate. */
  static fromHandle(handle: SharedArrayBuffer): Notifier {
    return new Notifier(handle);
  }

  get closed(): boolean {
    return Atomics.load(this.cells, CLOSED_WORD) !== 0;
  }

  get ready(): boolean {
    return Atomics.load(this.cells, PENDING_WORD) !== 0;
  }

  notify(): void {
    if (this.closed) {
      throw new SkeinError("SKEIN_RESOURCE_CLOSED", "notify: notifier is already closed");
    }
    Atomics.add(this.cells, PENDING_WORD, 1);
    Atomics.notify(this.cells, PENDING_WORD);
  }

  /** Consumes every pending notification; returns how many there were. */
  drain(): number {
    if (this.closed) return 0;
    return Atomics.exchange(this.cells, PENDING_WORD, 0);
  }

  /**
   * Resolves true once the notifier is ready, false when the timeout elapses
   * first or the notifier gets closed.
   */
  async waitReady(timeoutMs?: number): Promise<boolean> {
    const deadline = timeoutMs === undefined ? null : Date.now() + Math.max(0, timeoutMs);
    for (;;) {
      if (this.closed) return false;
      if (this.ready) return true;
      const remaining = deadline === null ? undefined : deadline - Date.now();
      if (remaining !== undefined && remaining <= 0) return false;
      const outcome = await waitForWordChange(this.cells, PENDING_WORD, 0, remaining);
      if (outcome === "timed-out") return this.ready && !this.closed;
    }
  }

  /** Closes the notifier. No-op when already closed. */
  close(): void {
    if (Atomics.compareExchange(this.cells, CLOSED_WORD, 0, 1) !== 0) return;
    Atomics.store(this.cells, PENDING_WORD, 0);
    Atomics.notify(this.cells, PENDING_WORD);
  }
}
