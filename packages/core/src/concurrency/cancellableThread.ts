/**
 * Cooperatively cancellable thread.
 *
 * State machine: created → running → stopRequested → terminated.
 * requestStop() only raises a flag; the body is expected to poll
 * `isStopRequested` at safe points. Nothing is interrupted preemptively.
 */

import { createLogger } from "../debug/logger.js";
import { SkeinError, toError } from "../errors.js";
import { type ThreadIdentity, allocateThreadId, runInThread } from "./threadContext.js";

export type ThreadState = "created" | "running" | "stopRequested" | "terminated";

export type ThreadTarget<R> = (thread: CancellableThread<R>) => R | Promise<R>;

export type CancellableThreadOptions<R> = Readonly<{
  target?: ThreadTarget<R>;
  name?: string;
  /** Daemon threads are asked to stop when the owning application exits. */
  daemon?: boolean;
  /** Run the body synchronously inside start(), up to its first await. */
  eager?: boolean;
}>;

const log = createLogger("thread");

export class CancellableThread<R = unknown> implements ThreadIdentity {
  readonly id: number;
  readonly name: string;
  daemon: boolean;

  private readonly target: ThreadTarget<R> | undefined;
  private readonly eager: boolean;
  private currentState: ThreadState = "created";
  private stopFlag = false;
  private started = false;
  private threadResult: R | undefined = undefined;
  private threadError: Error | null = null;
  private readonly terminated: Promise<void>;
  private markTerminated: () => void = () => {};

  constructor(opts: CancellableThreadOptions<R> = {}) {
    this.id = allocateThreadId();
    this.name = opts.name ?? `thread-${String(this.id)}`;
    this.daemon = opts.daemon === true;
    this.target = opts.target;
    this.eager = opts.eager === true;
    this.terminated = new Promise<void>((resolve) => {
      this.markTerminated = resolve;
    });
  }

  get state(): ThreadState {
    return this.currentState;
  }

  get isStopRequested(): boolean {
    return this.stopFlag;
  }

  get isAlive(): boolean {
    return this.currentState === "running" || this.currentState === "stopRequested";
  }

  /** Value returned by the body, once terminated successfully. */
  get result(): R | undefined {
    return this.threadResult;
  }

  /** Failure raised by the body, once terminated unsuccessfully. */
  get error(): Error | null {
    return this.threadError;
  }

  /**
   * Starts the thread. The body begins on the next macrotask, inside its own
   * thread context; an eager thread enters its body before start() returns.
   */
  start(): void {
    if (this.started) {
      throw new SkeinError("SKEIN_INVALID_STATE", `start: thread ${this.name} was already started`);
    }
    this.started = true;
    this.currentState = this.stopFlag ? "stopRequested" : "running";
    const enter = (): void => {
      runInThread(this, () => {
        void this.execute();
      });
    };
    if (this.eager) enter();
    else setImmediate(enter);
  }

  requestStop(): void {
    this.stopFlag = true;
    if (this.currentState === "running") this.currentState = "stopRequested";
  }

  /**
   * Resolves true once the thread has terminated, or false when `timeoutMs`
   * elapses first.
   */
  join(timeoutMs?: number): Promise<boolean> {
    if (!this.started) {
      throw new SkeinError("SKEIN_INVALID_STATE", `join: thread ${this.name} was never started`);
    }
    if (timeoutMs === undefined) return this.terminated.then(() => true);
    return new Promise<boolean>((resolve) => {
      const timer = setTimeout(() => resolve(false), Math.max(0, timeoutMs));
      void this.terminated.then(() => {
        clearTimeout(timer);
        resolve(true);
      });
    });
  }

  /** The thread body; subclasses override it instead of passing a target. */
  protected run(): R | Promise<R> {
    if (this.target === undefined) {
      throw new SkeinError("SKEIN_INVALID_STATE", `run: thread ${this.name} has no target`);
    }
    return this.target(this);
  }

  private async execute(): Promise<void> {
    try {
      this.threadResult = await this.run();
    } catch (err: unknown) {
      this.threadError = toError(err);
      log.error("thread body failed", { thread: this.name, error: this.threadError });
    } finally {
      this.currentState = "terminated";
      this.markTerminated();
    }
  }
}
