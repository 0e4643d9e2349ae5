/**
 * A unit of work submitted to a ThreadPool.
 *
 * The outcome is set exactly once. Each handler slot (result, error,
 * terminated) accepts one handler; a handler registered after the outcome is
 * known runs immediately, synchronously, in the registering thread.
 *
 * Handlers are registered with onResult / onError / onTerminated rather than
 * then / catch / finally so a job never acts as a thenable.
 */

import { SkeinError } from "../errors.js";

export type JobOutcome<T> = Readonly<{ ok: true; value: T }> | Readonly<{ ok: false; error: Error }>;

export type ResultHandler<T> = (value: T) => void;
export type ErrorHandler = (error: Error) => void;
export type TerminationHandler = (error: Error | null) => void;

/** The part of a job a worker thread needs, independent of the result type. */
export interface ExecutableJob {
  execute(): Promise<unknown>;
  resolve(outcome: JobOutcome<unknown>): void;
}

function requireHandler(kind: string, handler: unknown): void {
  if (typeof handler !== "function") {
    throw new SkeinError("SKEIN_INVALID_ARGUMENT", `${kind} handler must be a function`);
  }
}

export class ThreadPoolJob<T> implements ExecutableJob {
  /** Resolves with the outcome; awaiting it does not consume a handler slot. */
  readonly settled: Promise<JobOutcome<T>>;

  private readonly body: () => Promise<T>;
  private jobOutcome: JobOutcome<T> | null = null;
  private resultHandler: ResultHandler<T> | null = null;
  private errorHandler: ErrorHandler | null = null;
  private terminationHandler: TerminationHandler | null = null;
  private settle: (outcome: JobOutcome<T>) => void = () => {};

  constructor(body: () => Promise<T>) {
    this.body = body;
    this.settled = new Promise<JobOutcome<T>>((resolve) => {
      this.settle = resolve;
    });
  }

  get outcome(): JobOutcome<T> | null {
    return this.jobOutcome;
  }

  get isResolved(): boolean {
    return this.jobOutcome !== null;
  }

  /** @internal Runs the job body in the calling thread. */
  execute(): Promise<T> {
    return this.body();
  }

  /** @internal Records the outcome and dispatches registered handlers. */
  resolve(outcome: JobOutcome<T>): void {
    if (this.jobOutcome !== null) {
      throw new SkeinError("SKEIN_DUPLICATE_REGISTRATION", "job cannot be resolved twice");
    }
    this.jobOutcome = outcome;
    this.settle(outcome);
    this.callResultHandlerIfNeeded();
    this.callErrorHandlerIfNeeded();
    this.callTerminationHandlerIfNeeded();
  }

  /** Registers the success handler, and optionally the error handler. */
  onResult(handler: ResultHandler<T>, onError?: ErrorHandler): this {
    requireHandler("result", handler);
    if (this.resultHandler !== null) {
      throw new SkeinError(
        "SKEIN_DUPLICATE_REGISTRATION",
        "multiple result handlers are not supported",
      );
    }
    this.resultHandler = handler;
    this.callResultHandlerIfNeeded();
    if (onError !== undefined) this.onError(onError);
    return this;
  }

  onError(handler: ErrorHandler): this {
    requireHandler("error", handler);
    if (this.errorHandler !== null) {
      throw new SkeinError("SKEIN_DUPLICATE_REGISTRATION", "multiple error handlers are not supported");
    }
    this.errorHandler = handler;
    this.callErrorHandlerIfNeeded();
    return this;
  }

  /** Registers a handler receiving `null` on success or the error on failure. */
  onTerminated(handler: TerminationHandler): this {
    requireHandler("termination", handler);
    if (this.terminationHandler !== null) {
      throw new SkeinError(
        "SKEIN_DUPLICATE_REGISTRATION",
        "multiple termination handlers are not supported",
      );
    }
    this.terminationHandler = handler;
    this.callTerminationHandlerIfNeeded();
    return this;
  }

  private callResultHandlerIfNeeded(): void {
    const outcome = this.jobOutcome;
    if (outcome === null || this.resultHandler === null) return;
    if (outcome.ok) this.resultHandler(outcome.value);
  }

  private callErrorHandlerIfNeeded(): void {
    const outcome = this.jobOutcome;
    if (outcome === null || this.errorHandler === null) return;
    if (!outcome.ok) this.errorHandler(outcome.error);
  }

  private callTerminationHandlerIfNeeded(): void {
    const outcome = this.jobOutcome;
    if (outcome === null || this.terminationHandler === null) return;
    this.terminationHandler(outcome.ok ? null : outcome.error);
  }
}
