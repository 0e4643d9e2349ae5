/**
 * packages/core/src/app/createApp.ts — Application factory and cross-thread scheduling.
 *
 * The application owns a main loop (the UI thread) and a SelectableQueue of
 * internal events. Any thread may:
 *   - schedule callbacks on the UI thread (callLater, callOnUiThread)
 *   - inject user events (delivered to `onEvent` on the UI thread)
 *   - request a redraw (refresh)
 *
 * Invariants:
 *   - All scheduled callbacks and event handlers run on loop.thread
 *   - A wake-up marker is enqueued only when the loop is running and the
 *     caller is not the UI thread
 *   - Daemon workers are asked to stop when run() returns
 */

import { CancellableThread } from "../concurrency/cancellableThread.js";
import { SelectableQueue } from "../concurrency/selectableQueue.js";
import { currentThread } from "../concurrency/threadContext.js";
import { createLogger } from "../debug/logger.js";
import { SkeinError, invalidArgument } from "../errors.js";
import { EventLoop } from "../loop/eventLoop.js";
import type { Screen } from "../loop/types.js";
import { CallbackHandle, type SchedulerHost } from "./callbackHandle.js";
import { normalizeAutoRefresh, resolveAppConfig } from "./config.js";
import type {
  App,
  AppExit,
  AutoRefreshSetting,
  CallLaterOptions,
  CallbackFn,
  CreateAppOptions,
  ThreadFactory,
  WorkerBody,
  WorkerContext,
  WorkerOptions,
} from "./types.js";

export { resolveAppConfig } from "./config.js";

type QueuedEvent<E> =
  | Readonly<{ kind: "user"; event: E }>
  | Readonly<{ kind: "refresh" }>
  | Readonly<{ kind: "wakeUp" }>;

const REFRESH_EVENT = Object.freeze({ kind: "refresh" as const });
const WAKE_UP_EVENT = Object.freeze({ kind: "wakeUp" as const });

const NULL_SCREEN: Screen = Object.freeze({ render: () => {} });

const log = createLogger("app");

function defaultThreadFactory<R>(
  opts: Parameters<ThreadFactory<R>>[0],
): CancellableThread<R> {
  return new CancellableThread<R>({
    target: opts.target,
    daemon: opts.daemon,
    ...(opts.name === undefined ? {} : { name: opts.name }),
  });
}

function resolveDelay(opts: CallLaterOptions, now: number): Readonly<{ afterMs: number; everyMs: number | null }> {
  const { afterMs, at, everyMs } = opts;
  if (everyMs !== undefined && (!Number.isFinite(everyMs) || everyMs <= 0)) {
    invalidArgument(`callLater: 'everyMs' must be a positive number (got ${String(everyMs)})`);
  }
  const every = everyMs ?? null;
  if (afterMs !== undefined && at !== undefined) {
    invalidArgument("callLater: 'afterMs' and 'at' are mutually exclusive");
  }
  if (afterMs !== undefined) return { afterMs, everyMs: every };
  if (at !== undefined) return { afterMs: at - now, everyMs: every };
  if (every === null) invalidArgument("callLater: one of 'afterMs', 'at' or 'everyMs' must be given");
  return { afterMs: 0, everyMs: every };
}

export function createApp<E = unknown>(opts: CreateAppOptions<E> = {}): App<E> {
  const config = resolveAppConfig(opts.config);
  const loop =
    opts.loop ??
    new EventLoop({ fpsCap: config.fpsCap, ...(opts.input === undefined ? {} : { input: opts.input }) });
  const screen = opts.screen ?? NULL_SCREEN;
  const events = new SelectableQueue<QueuedEvent<E>>();
  const daemons = new Set<Readonly<{ requestStop: () => void }>>();

  let running = false;
  let autoRefreshMs = 0;
  let autoRefreshHandle: CallbackHandle<[]> | null = null;

  function isUiThread(): boolean {
    return currentThread() === loop.thread;
  }

  function wakeUp(): void {
    if (!running || events.closed || isUiThread()) return;
    events.putNowait(WAKE_UP_EVENT);
  }

  const host: SchedulerHost = Object.freeze({ loop, wakeUp });

  function callLater<A extends unknown[]>(
    callback: CallbackFn<A>,
    options: CallLaterOptions,
    ...args: A
  ): CallbackHandle<A> {
    const { afterMs, everyMs } = resolveDelay(options, loop.now());
    const handle = new CallbackHandle<A>(host, callback, args, everyMs);
    handle.reschedule({ afterMs });
    return handle;
  }

  function callOnUiThread<A extends unknown[]>(fn: CallbackFn<A>, ...args: A): CallbackHandle<A> {
    const handle = new CallbackHandle<A>(host, fn, args);
    handle.rescheduleNow();
    return handle;
  }

  function injectEvent(event: E): void {
    events.putNowait({ kind: "user", event });
  }

  function refresh(): void {
    events.putNowait(REFRESH_EVENT);
  }

  function quit(value?: unknown): void {
    log.debug("quit requested");
    loop.exit({ reason: "quit", value });
  }

  function setAutoRefresh(value: AutoRefreshSetting): void {
    const next = normalizeAutoRefresh(value, config.autoRefreshDefaultMs);
    if (next === autoRefreshMs) return;
    autoRefreshHandle?.cancel();
    autoRefreshHandle = null;
    autoRefreshMs = next;
    if (next > 0) autoRefreshHandle = callLater(refresh, { afterMs: next, everyMs: next });
  }

  function createThread<A extends unknown[], R>(
    options: WorkerOptions<Awaited<R>>,
    body: WorkerBody<E, A, R>,
    ...args: A
  ): CancellableThread<Awaited<R>> {
    if (typeof body !== "function") invalidArgument("createThread: body must be a function");
    let thread: CancellableThread<Awaited<R>> | null = null;
    const context: WorkerContext<E> = Object.freeze({
      call: callOnUiThread,
      callLater,
      callOnUiThread,
      injectEvent,
      refresh,
      isStopRequested: () => thread?.isStopRequested === true,
    });
    const factory = options.threadFactory ?? defaultThreadFactory;
    const created = factory({
      daemon: options.daemon === true,
      target: async (): Promise<Awaited<R>> => await body(context, ...args),
      ...(options.name === undefined ? {} : { name: options.name }),
    });
    thread = created;
    if (created.daemon) daemons.add(created);
    return created;
  }

  function createWorker<A extends unknown[], R>(
    body: WorkerBody<E, A, R>,
    ...args: A
  ): CancellableThread<Awaited<R>> {
    return createThread<A, R>({}, body, ...args);
  }

  function createDaemon<A extends unknown[], R>(
    body: WorkerBody<E, A, R>,
    ...args: A
  ): CancellableThread<Awaited<R>> {
    return createThread<A, R>({ daemon: true }, body, ...args);
  }

  function processPendingEvents(): void {
    for (const queued of events.getAll()) {
      switch (queued.kind) {
        case "user":
          opts.onEvent?.(queued.event, app);
          break;
        case "refresh":
        case "wakeUp":
          // The loop redraws at the end of this iteration.
          break;
      }
    }
  }

  function handleInput(key: string): void {
    const consumed = opts.onInput?.(key, app) === true;
    if (!consumed && config.quitKeys.includes(key)) quit();
  }

  async function run(): Promise<AppExit> {
    if (running) throw new SkeinError("SKEIN_INVALID_STATE", "run: application is already running");
    if (events.closed) throw new SkeinError("SKEIN_RESOURCE_CLOSED", "run: application was disposed");
    running = true;
    const watch = loop.watchNotifier(events.notifier, processPendingEvents);
    const offIdle = loop.onIdle(() => {
      screen.render();
    });
    const offInput = loop.onInput(handleInput);
    try {
      screen.start?.();
      opts.onStart?.(app);
      log.info("application started", { thread: loop.thread.name });
      const exit = await loop.run();
      log.info("application exited", { reason: exit.reason });
      return exit;
    } finally {
      loop.removeWatch(watch);
      offIdle();
      offInput();
      running = false;
      for (const daemon of daemons) daemon.requestStop();
      daemons.clear();
      try {
        opts.onStop?.(app);
      } finally {
        screen.stop?.();
      }
    }
  }

  function dispose(): void {
    setAutoRefresh(false);
    events.close();
  }

  const app: App<E> = {
    loop,
    config,
    get wakeHandle() {
      return events.handle;
    },
    get isRunning() {
      return running;
    },
    get autoRefresh(): number {
      return autoRefreshMs;
    },
    set autoRefresh(value: AutoRefreshSetting) {
      setAutoRefresh(value);
    },
    isUiThread,
    callLater,
    callOnUiThread,
    injectEvent,
    refresh,
    quit,
    run,
    createThread,
    createWorker,
    createDaemon,
    dispose,
  };

  setAutoRefresh(config.autoRefresh);
  return app;
}
