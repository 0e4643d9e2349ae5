/**
 * Shared-memory integer counter.
 *
 * The counter lives in a SharedArrayBuffer so it can be handed to
 * `worker_threads` isolates; increments from any isolate wake async waiters
 * through Atomics.notify.
 */

import { SkeinError } from "../errors.js";

export type AtomicWaitOutcome = "ok" | "not-equal" | "timed-out";

type AtomicsWaitAsyncResult =
  | Readonly<{ async: false; value: "not-equal" | "timed-out" }>
  | Readonly<{ async: true; value: Promise<"ok" | "timed-out"> }>;

type AtomicsWithWaitAsync = typeof Atomics & {
  waitAsync: (
    typedArray: Int32Array,
    index: number,
    value: number,
    timeout?: number,
  ) => AtomicsWaitAsyncResult;
};

/**
 * Waits asynchronously until `cells[index]` is notified while holding
 * `expected`. Resolves immediately with "not-equal" if the word already moved.
 */
export function waitForWordChange(
  cells: Int32Array,
  index: number,
  expected: number,
  timeoutMs?: number,
): Promise<AtomicWaitOutcome> {
  const timeout = timeoutMs === undefined ? undefined : Math.max(0, timeoutMs);
  const result = (Atomics as AtomicsWithWaitAsync).waitAsync(cells, index, expected, timeout);
  return result.async ? result.value : Promise.resolve(result.value);
}

function remainingUntil(deadline: number | null): number | undefined {
  return deadline === null ? undefined : deadline - Date.now();
}

export class AtomicCounter {
  readonly buffer: SharedArrayBuffer;
  private readonly cells: Int32Array;
  private readonly index: number;

  /**
   * Creates a counter holding `valueOrBuffer`, or attaches to word `index` of
   * an existing SharedArrayBuffer without resetting it (to share one counter
   * between isolates, or to embed a counter in a larger buffer).
   */
  constructor(valueOrBuffer: number | SharedArrayBuffer = 0, index = 0) {
    if (typeof valueOrBuffer === "number") {
      this.buffer = new SharedArrayBuffer(Int32Array.BYTES_PER_ELEMENT);
      this.cells = new Int32Array(this.buffer);
      this.index = 0;
      Atomics.store(this.cells, 0, valueOrBuffer);
      return;
    }
    const words = Math.floor(valueOrBuffer.byteLength / Int32Array.BYTES_PER_ELEMENT);
    if (!Number.isInteger(index) || index < 0 || index >= words) {
      throw new SkeinError(
        "SKEIN_INVALID_ARGUMENT",
        `AtomicCounter: word index ${String(index)} is outside the shared buffer`,
      );
    }
    this.buffer = valueOrBuffer;
    this.cells = new Int32Array(valueOrBuffer);
    this.index = index;
  }

  get value(): number {
    return Atomics.load(this.cells, this.index);
  }

  set value(next: number) {
    Atomics.store(this.cells, this.index, next);
    Atomics.notify(this.cells, this.index);
  }

  increase(delta = 1): number {
    const prev = Atomics.add(this.cells, this.index, delta);
    Atomics.notify(this.cells, this.index);
    return prev + delta;
  }

  decrease(delta = 1): number {
    return this.increase(-delta);
  }

  /** Sets the counter to zero and returns the value it held. */
  reset(): number {
    const prev = Atomics.exchange(this.cells, this.index, 0);
    if (prev !== 0) Atomics.notify(this.cells, this.index);
    return prev;
  }

  /**
   * Resolves with the counter value once it is non-zero. With a timeout, the
   * current value is returned when the timeout elapses, zero or not.
   */
  async wait(timeoutMs?: number): Promise<number> {
    const deadline = timeoutMs === undefined ? null : Date.now() + Math.max(0, timeoutMs);
    for (;;) {
      const current = this.value;
      if (current !== 0) return current;
      const remaining = remainingUntil(deadline);
      if (remaining !== undefined && remaining <= 0) return current;
      const outcome = await waitForWordChange(this.cells, this.index, 0, remaining);
      if (outcome === "timed-out") return this.value;
    }
  }

  /** Like wait(), then resets the counter and returns the value before the reset. */
  async waitAndReset(timeoutMs?: number): Promise<number> {
    await this.wait(timeoutMs);
    return this.reset();
  }
}
