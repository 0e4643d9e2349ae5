/**
 * Bridges worker_threads isolates to the application shell.
 *
 * A Worker cannot call into the UI isolate directly; its messages are decoded
 * and injected as application events. Isolates that share memory can also
 * wake the loop through `app.wakeHandle` (see signalWakeHandle).
 */

import type { Worker } from "node:worker_threads";
import { type App, Notifier } from "@skein-tui/core";

/** Maps a raw message to an event, or null to drop it. */
export type WorkerMessageDecoder<E> = (message: unknown) => E | null;

/** Forwards decoded worker messages to `app.injectEvent`. Returns a detach function. */
export function attachWorkerEvents<E>(
  app: App<E>,
  worker: Worker,
  decode: WorkerMessageDecoder<E>,
): () => void {
  const onMessage = (message: unknown): void => {
    const event = decode(message);
    if (event !== null) app.injectEvent(event);
  };
  worker.on("message", onMessage);
  return () => {
    worker.off("message", onMessage);
  };
}

/** Signals a notifier attached from its shared handle, e.g. one posted by another isolate. */
export function signalWakeHandle(handle: SharedArrayBuffer): void {
  Notifier.fromHandle(handle).notify();
}
