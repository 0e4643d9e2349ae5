/**
 * packages/core/src/app/callbackHandle.ts — Handle to a scheduled UI-thread callback.
 *
 * A handle owns at most one pending alarm on the main loop. Recurring handles
 * re-arm themselves after every fire at `fireTime + interval` (clamped to now),
 * unless the callback cancelled or rescheduled the handle itself.
 *
 * Every state change wakes the loop so a sleeping loop recomputes its timeout.
 */

import { invalidArgument } from "../errors.js";
import type { AlarmToken, MainLoop } from "../loop/types.js";
import type { CallbackFn, ScheduleOptions } from "./types.js";

/** What a handle needs from the application that created it. */
export type SchedulerHost = Readonly<{
  loop: MainLoop;
  /** Interrupts the loop's wait; no-op when called on the UI thread. */
  wakeUp: () => void;
}>;

function requireFinite(name: string, v: number): number {
  if (!Number.isFinite(v)) invalidArgument(`${name} must be a finite number (got ${String(v)})`);
  return v;
}

export class CallbackHandle<A extends unknown[] = unknown[]> {
  readonly callback: CallbackFn<A>;
  readonly args: A;
  /** Recurrence interval in ms, or null for a one-shot callback. */
  readonly interval: number | null;

  private readonly host: SchedulerHost;
  private token: AlarmToken | null = null;
  private nextCallAt: number | null = null;
  private calls = 0;
  private firing = false;
  private cancelledWhileFiring = false;

  constructor(host: SchedulerHost, callback: CallbackFn<A>, args: A, interval: number | null = null) {
    if (typeof callback !== "function") invalidArgument("callback must be a function");
    if (interval !== null && (!Number.isFinite(interval) || interval <= 0)) {
      invalidArgument(`interval must be a positive number (got ${String(interval)})`);
    }
    this.host = host;
    this.callback = callback;
    this.args = args;
    this.interval = interval;
  }

  get called(): boolean {
    return this.calls > 0;
  }

  get numCalled(): number {
    return this.calls;
  }

  /** Absolute time (epoch ms) of the next fire, or null when nothing is pending. */
  get pendingAt(): number | null {
    return this.nextCallAt;
  }

  get isPending(): boolean {
    return this.token !== null;
  }

  /** Milliseconds until the next fire (never negative), or null when nothing is pending. */
  get msLeft(): number | null {
    if (this.nextCallAt === null) return null;
    return Math.max(0, this.nextCallAt - this.host.loop.now());
  }

  /** Removes the pending alarm, if any. Stops a recurring handle for good. */
  cancel(): void {
    if (this.firing) this.cancelledWhileFiring = true;
    if (this.clearPending()) this.host.wakeUp();
  }

  /**
   * Replaces the pending fire with a new one. Exactly one of `afterMs` or `at`
   * must be given; times in the past fire as soon as possible.
   */
  reschedule(target: ScheduleOptions): boolean {
    const { afterMs, at } = target;
    let delayFrom: (now: number) => number;
    if (afterMs !== undefined && at === undefined) {
      const delay = requireFinite("afterMs", afterMs);
      delayFrom = () => delay;
    } else if (at !== undefined && afterMs === undefined) {
      const when = requireFinite("at", at);
      delayFrom = (now) => when - now;
    } else {
      invalidArgument("reschedule: exactly one of 'afterMs' or 'at' must be given");
    }

    this.clearPending();
    this.cancelledWhileFiring = false;
    const loop = this.host.loop;
    const now = loop.now();
    const fireAt = now + Math.max(0, delayFrom(now));
    this.nextCallAt = fireAt;
    this.token = loop.setAlarmAt(fireAt, () => {
      this.fire();
    });
    this.host.wakeUp();
    return true;
  }

  rescheduleNow(): boolean {
    return this.reschedule({ afterMs: 0 });
  }

  /**
   * Pushes the pending fire back by `byMs`. Returns false when nothing is
   * pending, or when a one-shot callback already fired.
   */
  delayNextCall(byMs: number): boolean {
    requireFinite("byMs", byMs);
    if (this.nextCallAt === null) return false;
    if (this.interval === null && this.called) return false;
    return this.reschedule({ at: this.nextCallAt + byMs });
  }

  private clearPending(): boolean {
    const token = this.token;
    this.token = null;
    this.nextCallAt = null;
    if (token === null) return false;
    this.host.loop.removeAlarm(token);
    return true;
  }

  private fire(): void {
    const firedAt = this.host.loop.now();
    this.calls++;
    this.token = null;
    this.nextCallAt = null;
    this.firing = true;
    this.cancelledWhileFiring = false;
    try {
      this.callback(...this.args);
    } finally {
      this.firing = false;
      const interval = this.interval;
      if (interval !== null && !this.cancelledWhileFiring && this.token === null) {
        this.reschedule({ at: firedAt + interval });
      }
    }
  }
}
