/**
 * Thread identity for cooperative execution contexts.
 *
 * A "thread" is an async execution context: everything started inside
 * runInThread(), including code resumed after `await`, observes the same
 * identity through currentThread(). Code outside any thread (module top level,
 * stream listeners, test bodies) observes `undefined`.
 */

import { AsyncLocalStorage } from "node:async_hooks";

export type ThreadIdentity = Readonly<{
  id: number;
  name: string;
}>;

const storage = new AsyncLocalStorage<ThreadIdentity>();
let nextThreadId = 1;

export function allocateThreadId(): number {
  return nextThreadId++;
}

export function createThreadIdentity(name: string): ThreadIdentity {
  const id = allocateThreadId();
  return Object.freeze({ id, name: `${name}-${String(id)}` });
}

export function currentThread(): ThreadIdentity | undefined {
  return storage.getStore();
}

export function runInThread<R>(thread: ThreadIdentity, fn: () => R): R {
  return storage.run(thread, fn);
}
