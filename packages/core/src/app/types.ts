/**
 * packages/core/src/app/types.ts — Public types of the application shell.
 */

import type { CancellableThread } from "../concurrency/cancellableThread.js";
import type { InputSource, LoopExit, MainLoop, Screen } from "../loop/types.js";
import type { CallbackHandle } from "./callbackHandle.js";

/** Exactly one of `afterMs` (relative delay) or `at` (epoch ms). */
export type ScheduleOptions = Readonly<{
  afterMs?: number;
  at?: number;
}>;

/** `everyMs` alone means "start now, then repeat". */
export type CallLaterOptions = ScheduleOptions &
  Readonly<{
    everyMs?: number;
  }>;

/** false, null or a non-positive number disables; true selects the default interval. */
export type AutoRefreshSetting = number | boolean | null;

export type AppExit = LoopExit;

export type AppConfig = Readonly<{
  autoRefresh?: AutoRefreshSetting;
  autoRefreshDefaultMs?: number;
  fpsCap?: number;
  quitKeys?: readonly string[];
}>;

export type ResolvedAppConfig = Readonly<{
  autoRefresh: AutoRefreshSetting;
  autoRefreshDefaultMs: number;
  fpsCap: number;
  quitKeys: readonly string[];
}>;

export type CallbackFn<A extends unknown[]> = (...args: A) => void;

export type Scheduler = Readonly<{
  callLater: <A extends unknown[]>(
    callback: CallbackFn<A>,
    opts: CallLaterOptions,
    ...args: A
  ) => CallbackHandle<A>;
  callOnUiThread: <A extends unknown[]>(fn: CallbackFn<A>, ...args: A) => CallbackHandle<A>;
}>;

/** Handed to every worker body; the worker's only channel back to the UI thread. */
export type WorkerContext<E> = Scheduler &
  Readonly<{
    /** Same as callOnUiThread. */
    call: Scheduler["callOnUiThread"];
    injectEvent: (event: E) => void;
    refresh: () => void;
    isStopRequested: () => boolean;
  }>;

export type WorkerBody<E, A extends unknown[], R> = (
  ui: WorkerContext<E>,
  ...args: A
) => R | Promise<R>;

export type ThreadFactory<R> = (
  opts: Readonly<{ name?: string; daemon: boolean; target: () => Promise<R> }>,
) => CancellableThread<R>;

export type WorkerOptions<R> = Readonly<{
  name?: string;
  daemon?: boolean;
  threadFactory?: ThreadFactory<R>;
}>;

export type EventHandler<E> = (event: E, app: App<E>) => void;

/** Return true to mark the key as consumed (suppresses quit keys). */
export type KeyHandler<E> = (key: string, app: App<E>) => boolean | void;

export type CreateAppOptions<E> = Readonly<{
  loop?: MainLoop;
  screen?: Screen;
  input?: InputSource;
  config?: AppConfig;
  onEvent?: EventHandler<E>;
  onInput?: KeyHandler<E>;
  onStart?: (app: App<E>) => void;
  onStop?: (app: App<E>) => void;
}>;

export interface App<E> extends Scheduler {
  readonly loop: MainLoop;
  readonly config: ResolvedAppConfig;
  /** Shared buffer of the event notifier; other isolates may wake the loop through it. */
  readonly wakeHandle: SharedArrayBuffer;
  readonly isRunning: boolean;
  get autoRefresh(): number;
  set autoRefresh(value: AutoRefreshSetting);
  isUiThread(): boolean;
  injectEvent(event: E): void;
  refresh(): void;
  quit(value?: unknown): void;
  run(): Promise<AppExit>;
  createWorker<A extends unknown[], R>(
    body: WorkerBody<E, A, R>,
    ...args: A
  ): CancellableThread<Awaited<R>>;
  createDaemon<A extends unknown[], R>(
    body: WorkerBody<E, A, R>,
    ...args: A
  ): CancellableThread<Awaited<R>>;
  createThread<A extends unknown[], R>(
    opts: WorkerOptions<Awaited<R>>,
    body: WorkerBody<E, A, R>,
    ...args: A
  ): CancellableThread<Awaited<R>>;
  dispose(): void;
}
