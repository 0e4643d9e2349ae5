export { AtomicCounter, type AtomicWaitOutcome, waitForWordChange } from "./atomicCounter.js";
export {
  BoundedQueue,
  type BoundedQueueOptions,
  type QueueWaitOptions,
} from "./boundedQueue.js";
export {
  CancellableThread,
  type CancellableThreadOptions,
  type ThreadState,
  type ThreadTarget,
} from "./cancellableThread.js";
export { Notifier } from "./notifier.js";
export { SelectableQueue, type SelectableQueueOptions } from "./selectableQueue.js";
export {
  type ThreadIdentity,
  createThreadIdentity,
  currentThread,
  runInThread,
} from "./threadContext.js";
export { ThreadPool, type ThreadPoolOptions, WorkerThread } from "./threadPool.js";
export {
  type ErrorHandler,
  type ExecutableJob,
  type JobOutcome,
  type ResultHandler,
  type TerminationHandler,
  ThreadPoolJob,
} from "./threadPoolJob.js";
