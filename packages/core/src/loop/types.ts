import type { Notifier } from "../concurrency/notifier.js";
import type { ThreadIdentity } from "../concurrency/threadContext.js";

export type AlarmCallback = () => void;

/** Opaque reference to a registered alarm; `at` is the absolute fire time (ms). */
export type AlarmToken = Readonly<{ id: number; at: number }>;

export type WatchToken = Readonly<{ id: number }>;

/** Result of MainLoop.run(): an explicit sentinel instead of exception-based exit. */
export type LoopExit = Readonly<{ reason: "quit"; value: unknown }> | Readonly<{ reason: "stopped" }>;

export type InputHandler = (key: string) => void;

/**
 * Contract between the application shell and the loop that owns the UI
 * thread. Every callback registered here runs on `thread`.
 */
export interface MainLoop {
  readonly thread: ThreadIdentity;
  readonly isRunning: boolean;
  /** Current time in epoch milliseconds, on the clock alarms are measured against. */
  now(): number;
  setAlarmAt(at: number, callback: AlarmCallback): AlarmToken;
  /** Returns false when the alarm already fired or was removed. */
  removeAlarm(token: AlarmToken): boolean;
  /**
   * Invokes `callback` on every iteration in which `notifier` is ready. The
   * callback is expected to drain the notifier.
   */
  watchNotifier(notifier: Notifier, callback: () => void): WatchToken;
  removeWatch(token: WatchToken): boolean;
  /** Registers a hook run at the end of every iteration (screen redraw). */
  onIdle(callback: () => void): () => void;
  onInput(handler: InputHandler): () => void;
  run(): Promise<LoopExit>;
  /** Asks the loop to stop after the current callback; run() resolves with `exit`. */
  exit(exit?: LoopExit): void;
}

/** Rendering seam: whatever draws the widget tree to the terminal. */
export type Screen = Readonly<{
  start?: () => void;
  render: () => void;
  stop?: () => void;
}>;

/** Input seam: starts delivering key names to `emit`; returns a stop function. */
export type InputSource = Readonly<{
  start: (emit: (key: string) => void) => () => void;
}>;
