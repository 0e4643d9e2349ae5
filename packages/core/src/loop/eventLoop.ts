/**
 * packages/core/src/loop/eventLoop.ts — Default MainLoop implementation.
 *
 * One iteration:
 *   1) fire every alarm due at the start of the iteration, in (at, id) order
 *   2) invoke callbacks of watched notifiers that are ready
 *   3) dispatch queued input keys
 *   4) run idle hooks (screen redraw) after any activity, at most once per frame
 *   5) sleep until the next alarm, a notifier wake-up, input, exit() or a
 *      deferred redraw
 *
 * Alarms registered during step 1 fire no earlier than the next iteration.
 * Pending work never waits for a frame; only idle hooks are paced by fpsCap.
 * Every wake source settles the wait, so a quiet loop sleeps up to
 * QUIET_WAIT_MS before re-arming its notifier waits.
 * All callbacks run inside runInThread(loop.thread), so currentThread()
 * identifies the UI thread for them. A callback that throws stops the loop
 * and rejects run().
 */

import { createThreadIdentity, runInThread } from "../concurrency/threadContext.js";
import type { ThreadIdentity } from "../concurrency/threadContext.js";
import type { Notifier } from "../concurrency/notifier.js";
import { createLogger } from "../debug/logger.js";
import { SkeinError, invalidArgument } from "../errors.js";
import { AlarmHeap } from "./alarmHeap.js";
import type {
  AlarmCallback,
  AlarmToken,
  InputHandler,
  InputSource,
  LoopExit,
  MainLoop,
  WatchToken,
} from "./types.js";

export type EventLoopOptions = Readonly<{
  name?: string;
  input?: InputSource;
  fpsCap?: number;
  clock?: () => number;
}>;

type Watch = Readonly<{ notifier: Notifier; callback: () => void }>;

const STOPPED: LoopExit = Object.freeze({ reason: "stopped" });
const QUIET_WAIT_MS = 500;

const log = createLogger("loop");

export class EventLoop implements MainLoop {
  readonly thread: ThreadIdentity;
  private readonly alarms = new AlarmHeap();
  private readonly watches = new Map<number, Watch>();
  private readonly idleHooks = new Set<() => void>();
  private readonly inputHandlers = new Set<InputHandler>();
  private readonly input: InputSource | undefined;
  private readonly clock: () => number;
  private readonly frameMs: number;
  private pendingInput: string[] = [];
  private nextWatchId = 1;
  private running = false;
  private exitRequest: LoopExit | null = null;
  private wakeResolver: (() => void) | null = null;
  private lastIdleAt: number | null = null;
  private redrawPending = false;

  constructor(opts: EventLoopOptions = {}) {
    this.thread = createThreadIdentity(opts.name ?? "ui");
    this.input = opts.input;
    this.clock = opts.clock ?? Date.now;
    const fpsCap = opts.fpsCap ?? 60;
    if (!Number.isFinite(fpsCap) || fpsCap <= 0) {
      invalidArgument(`EventLoop: 'fpsCap' must be a positive number (got ${String(fpsCap)})`);
    }
    this.frameMs = Math.max(1, Math.ceil(1000 / fpsCap));
  }

  get isRunning(): boolean {
    return this.running;
  }

  now(): number {
    return this.clock();
  }

  setAlarmAt(at: number, callback: AlarmCallback): AlarmToken {
    if (!Number.isFinite(at)) invalidArgument(`setAlarmAt: 'at' must be a finite number (got ${String(at)})`);
    const token = this.alarms.push(at, callback);
    this.wake();
    return token;
  }

  removeAlarm(token: AlarmToken): boolean {
    return this.alarms.remove(token.id);
  }

  watchNotifier(notifier: Notifier, callback: () => void): WatchToken {
    const id = this.nextWatchId++;
    this.watches.set(id, Object.freeze({ notifier, callback }));
    this.wake();
    return Object.freeze({ id });
  }

  removeWatch(token: WatchToken): boolean {
    return this.watches.delete(token.id);
  }

  onIdle(callback: () => void): () => void {
    this.idleHooks.add(callback);
    return () => {
      this.idleHooks.delete(callback);
    };
  }

  onInput(handler: InputHandler): () => void {
    this.inputHandlers.add(handler);
    return () => {
      this.inputHandlers.delete(handler);
    };
  }

  exit(exit: LoopExit = STOPPED): void {
    if (this.exitRequest === null) this.exitRequest = exit;
    this.wake();
  }

  async run(): Promise<LoopExit> {
    if (this.running) {
      throw new SkeinError("SKEIN_INVALID_STATE", "run: loop is already running");
    }
    this.running = true;
    this.exitRequest = null;
    log.debug("loop started", { thread: this.thread.name });
    const stopInput = this.input?.start((key) => {
      this.pendingInput.push(key);
      this.wake();
    });
    try {
      return await runInThread(this.thread, () => this.loop());
    } finally {
      stopInput?.();
      this.running = false;
      this.wakeResolver = null;
      this.lastIdleAt = null;
      this.redrawPending = false;
      this.pendingInput = [];
      log.debug("loop stopped", { thread: this.thread.name });
    }
  }

  private async loop(): Promise<LoopExit> {
    this.redrawPending = true;
    for (;;) {
      if (this.iterate()) this.redrawPending = true;
      if (this.exitRequest !== null) return this.exitRequest;
      if (this.redrawPending && this.redrawDueAt() <= this.clock()) {
        this.redrawPending = false;
        this.lastIdleAt = this.clock();
        for (const hook of [...this.idleHooks]) {
          hook();
          if (this.exitRequest !== null) return this.exitRequest;
        }
      }
      await this.waitForActivity(this.computeTimeout());
      if (this.exitRequest !== null) return this.exitRequest;
    }
  }

  private redrawDueAt(): number {
    return this.lastIdleAt === null ? Number.NEGATIVE_INFINITY : this.lastIdleAt + this.frameMs;
  }

  /** Runs one batch of alarms, watches and input. Returns whether anything ran. */
  private iterate(): boolean {
    let active = false;

    // Alarms registered while this batch runs wait for the next iteration.
    const now = this.clock();
    const cutoffId = this.alarms.nextId;
    for (;;) {
      const head = this.alarms.peek();
      if (head === undefined || head.at > now || head.id >= cutoffId) break;
      this.alarms.remove(head.id);
      active = true;
      head.callback();
      if (this.exitRequest !== null) return active;
    }

    for (const watch of [...this.watches.values()]) {
      if (!watch.notifier.ready) continue;
      active = true;
      watch.callback();
      if (this.exitRequest !== null) return active;
    }

    if (this.pendingInput.length > 0) {
      const keys = this.pendingInput;
      this.pendingInput = [];
      for (const key of keys) {
        active = true;
        for (const handler of [...this.inputHandlers]) handler(key);
        if (this.exitRequest !== null) return active;
      }
    }

    return active;
  }

  /** Quiet wait, cut short by the next alarm and by a redraw deferred to the next frame. */
  private computeTimeout(): number {
    const now = this.clock();
    let deadline = now + QUIET_WAIT_MS;
    const nextAt = this.alarms.nextDueAt();
    if (nextAt !== null) deadline = Math.min(deadline, nextAt);
    const redrawAt = this.redrawDueAt();
    if (this.redrawPending && redrawAt > now) {
      deadline = Math.min(deadline, redrawAt);
    }
    return Math.max(0, deadline - now);
  }

  private hasPendingWork(): boolean {
    if (this.exitRequest !== null || this.pendingInput.length > 0) return true;
    for (const watch of this.watches.values()) {
      if (watch.notifier.ready) return true;
    }
    const nextAt = this.alarms.nextDueAt();
    return nextAt !== null && nextAt <= this.clock();
  }

  private async waitForActivity(timeoutMs: number): Promise<void> {
    if (timeoutMs <= 0 || this.hasPendingWork()) return;
    let timer: ReturnType<typeof setTimeout> | undefined;
    const waits: Promise<unknown>[] = [
      new Promise<void>((resolve) => {
        timer = setTimeout(resolve, timeoutMs);
      }),
      new Promise<void>((resolve) => {
        this.wakeResolver = resolve;
      }),
    ];
    for (const watch of this.watches.values()) {
      if (!watch.notifier.closed) waits.push(watch.notifier.waitReady(timeoutMs));
    }
    try {
      await Promise.race(waits);
    } finally {
      clearTimeout(timer);
      this.wakeResolver = null;
    }
  }

  private wake(): void {
    const resolve = this.wakeResolver;
    this.wakeResolver = null;
    resolve?.();
  }
}
