/**
 * Fixed-size pool of worker threads sharing one bounded job queue.
 *
 * The queue capacity equals the worker count: once every worker is busy and
 * the queue is full, submit() waits for a free slot and submitNowait() throws
 * SKEIN_QUEUE_FULL. Workers wait for jobs as soon as the pool is constructed.
 */

import { createLogger } from "../debug/logger.js";
import { SkeinError, toError } from "../errors.js";
import { BoundedQueue, type QueueWaitOptions } from "./boundedQueue.js";
import { CancellableThread } from "./cancellableThread.js";
import { type ExecutableJob, type JobOutcome, ThreadPoolJob } from "./threadPoolJob.js";

const STOP_SENTINEL: unique symbol = Symbol("skein.stopWorker");

type QueuedJob = ExecutableJob | typeof STOP_SENTINEL;

const DEFAULT_POOL_SIZE = 5;

const log = createLogger("threadPool");

/** Worker thread that executes jobs from a shared queue one by one. */
export class WorkerThread extends CancellableThread<void> {
  private readonly jobs: BoundedQueue<QueuedJob>;

  constructor(jobs: BoundedQueue<QueuedJob>, name?: string) {
    super(name === undefined ? { daemon: true, eager: true } : { name, daemon: true, eager: true });
    this.jobs = jobs;
  }

  override requestStop(): void {
    super.requestStop();
    // Unblocks the worker if it is waiting for a job.
    this.jobs.put(STOP_SENTINEL).catch((err: unknown) => {
      log.error("failed to enqueue stop sentinel", { thread: this.name, error: toError(err) });
    });
  }

  protected override async run(): Promise<void> {
    while (!this.isStopRequested) {
      const job = await this.jobs.get();
      if (job === STOP_SENTINEL) {
        this.jobs.taskDone();
        continue;
      }

      let outcome: JobOutcome<unknown>;
      try {
        outcome = { ok: true, value: await job.execute() };
      } catch (err: unknown) {
        outcome = { ok: false, error: toError(err) };
      } finally {
        this.jobs.taskDone();
      }

      try {
        job.resolve(outcome);
      } catch (err: unknown) {
        log.error("job handler failed", { thread: this.name, error: toError(err) });
      }
    }
  }
}

export type ThreadPoolOptions = Readonly<{
  /** Number of worker threads (default: 5). */
  size?: number;
  /** Prefix for worker thread names. */
  name?: string;
}>;

export class ThreadPool {
  readonly size: number;
  private readonly jobs: BoundedQueue<QueuedJob>;
  private readonly workers: WorkerThread[];
  private stopped = false;

  constructor(opts: ThreadPoolOptions = {}) {
    const size = opts.size ?? DEFAULT_POOL_SIZE;
    if (!Number.isInteger(size) || size <= 0) {
      throw new SkeinError("SKEIN_INVALID_ARGUMENT", "ThreadPool: size must be a positive integer");
    }
    this.size = size;
    this.jobs = new BoundedQueue<QueuedJob>({ capacity: size });
    const prefix = opts.name ?? "pool";
    this.workers = Array.from(
      { length: size },
      (_, i) => new WorkerThread(this.jobs, `${prefix}-worker-${String(i)}`),
    );
    for (const worker of this.workers) worker.start();
  }

  get isStopped(): boolean {
    return this.stopped;
  }

  /** Submits a job, waiting for a free queue slot when the pool is saturated. */
  async submit<A extends unknown[], R>(
    fn: (...args: A) => R,
    ...args: A
  ): Promise<ThreadPoolJob<Awaited<R>>> {
    return this.submitWithin({}, fn, ...args);
  }

  /**
   * Submits a job without waiting. Throws SKEIN_QUEUE_FULL when every worker
   * is busy and the queue is full.
   */
  submitNowait<A extends unknown[], R>(
    fn: (...args: A) => R,
    ...args: A
  ): ThreadPoolJob<Awaited<R>> {
    const job = this.createJob(fn, args);
    this.jobs.putNowait(job);
    return job;
  }

  /** Like submit(), rejecting with SKEIN_QUEUE_FULL after `timeoutMs`. */
  async submitWithin<A extends unknown[], R>(
    opts: QueueWaitOptions,
    fn: (...args: A) => R,
    ...args: A
  ): Promise<ThreadPoolJob<Awaited<R>>> {
    const job = this.createJob(fn, args);
    await this.jobs.put(job, opts);
    return job;
  }

  /** Resolves once every submitted job has been executed. */
  waitForCompletion(): Promise<void> {
    return this.jobs.join();
  }

  /** Requests every worker to stop. Idempotent. */
  stop(): void {
    if (this.stopped) return;
    this.stopped = true;
    for (const worker of this.workers) worker.requestStop();
  }

  /** Resolves once every worker has terminated (after stop()). */
  async join(): Promise<void> {
    await Promise.all(this.workers.map((worker) => worker.join()));
  }

  dispose(): void {
    this.stop();
  }

  private createJob<A extends unknown[], R>(
    fn: (...args: A) => R,
    args: A,
  ): ThreadPoolJob<Awaited<R>> {
    if (this.stopped) {
      throw new SkeinError("SKEIN_INVALID_STATE", "submit: thread pool is stopped");
    }
    if (typeof fn !== "function") {
      throw new SkeinError("SKEIN_INVALID_ARGUMENT", "submit: job must be a function");
    }
    return new ThreadPoolJob<Awaited<R>>(async (): Promise<Awaited<R>> => await fn(...args));
  }
}
