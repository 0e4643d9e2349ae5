import { assert, describe, test } from "@skein-tui/testkit";
import { CancellableThread } from "../../concurrency/cancellableThread.js";
import { Notifier } from "../../concurrency/notifier.js";
import { currentThread } from "../../concurrency/threadContext.js";
import { isSkeinError } from "../../errors.js";
import type { Screen } from "../../loop/types.js";
import { ManualLoop } from "../../testing/manualLoop.js";
import { createApp } from "../createApp.js";

const invalidArgument = (err: unknown) => isSkeinError(err, "SKEIN_INVALID_ARGUMENT");

function recordingScreen(log: string[]): Screen {
  return {
    start: () => log.push("start"),
    render: () => log.push("render"),
    stop: () => log.push("stop"),
  };
}

describe("app/createApp scheduling", () => {
  test("callLater runs the callback on the UI thread after the delay", () => {
    const loop = new ManualLoop({ startAt: 500 });
    const app = createApp({ loop });
    const seen: string[] = [];
    const handle = app.callLater(
      (label: string) => seen.push(`${label}:${String(app.isUiThread())}`),
      { afterMs: 30 },
      "tick",
    );
    assert.equal(app.isUiThread(), false);
    assert.equal(handle.pendingAt, 530);
    loop.advance(29);
    assert.deepEqual(seen, []);
    loop.advance(1);
    assert.deepEqual(seen, ["tick:true"]);
  });

  test("callLater accepts an absolute time", () => {
    const loop = new ManualLoop({ startAt: 500 });
    const app = createApp({ loop });
    const handle = app.callLater(() => {}, { at: 650 });
    assert.equal(handle.pendingAt, 650);
    assert.equal(handle.interval, null);
  });

  test("everyMs alone starts immediately and repeats", () => {
    const loop = new ManualLoop();
    const app = createApp({ loop });
    const times: number[] = [];
    const handle = app.callLater(() => times.push(loop.now()), { everyMs: 40 });
    assert.equal(handle.interval, 40);
    loop.advance(0);
    loop.advance(100);
    assert.deepEqual(times, [0, 40, 80]);
    handle.cancel();
  });

  test("callLater validates its schedule", () => {
    const app = createApp({ loop: new ManualLoop() });
    assert.throws(() => app.callLater(() => {}, {}), invalidArgument);
    assert.throws(() => app.callLater(() => {}, { afterMs: 1, at: 5 }), invalidArgument);
    assert.throws(() => app.callLater(() => {}, { afterMs: 1, everyMs: 0 }), invalidArgument);
  });

  test("callOnUiThread never runs synchronously", () => {
    const loop = new ManualLoop();
    const app = createApp({ loop });
    const seen: number[] = [];
    const handle = app.callOnUiThread((a: number, b: number) => seen.push(a + b), 2, 3);
    assert.equal(handle.called, false);
    assert.deepEqual(seen, []);
    loop.advance(0);
    assert.deepEqual(seen, [5]);
    assert.equal(handle.numCalled, 1);
  });

  test("autoRefresh schedules periodic refresh requests", () => {
    const loop = new ManualLoop();
    const app = createApp({ loop });
    const wake = new Notifier(app.wakeHandle);
    assert.equal(app.autoRefresh, 0);
    app.autoRefresh = 50;
    assert.equal(app.autoRefresh, 50);
    assert.equal(loop.pendingAlarms, 1);
    loop.advance(49);
    assert.equal(wake.ready, false);
    loop.advance(1);
    assert.equal(wake.drain(), 1);
    app.autoRefresh = true;
    assert.equal(app.autoRefresh, 100);
    assert.equal(loop.pendingAlarms, 1);
    app.autoRefresh = false;
    assert.equal(app.autoRefresh, 0);
    assert.equal(loop.pendingAlarms, 0);
    app.autoRefresh = null;
    app.autoRefresh = -10;
    assert.equal(loop.pendingAlarms, 0);
  });

  test("config.autoRefresh applies at creation", () => {
    const loop = new ManualLoop();
    const app = createApp({ loop, config: { autoRefresh: true, autoRefreshDefaultMs: 20 } });
    assert.equal(app.autoRefresh, 20);
    assert.equal(loop.nextAlarmAt(), 20);
  });
});

describe("app/createApp run loop", () => {
  test("injected events reach onEvent in order on the UI thread", async () => {
    const loop = new ManualLoop();
    const seen: string[] = [];
    const app = createApp<string>({
      loop,
      onEvent: (event, self) => seen.push(`${event}:${String(self.isUiThread())}`),
    });
    const running = app.run();
    assert.equal(app.isRunning, true);
    app.injectEvent("a");
    app.injectEvent("b");
    loop.flushWatches();
    assert.deepEqual(seen, ["a:true", "b:true"]);
    app.quit(7);
    assert.deepEqual(await running, { reason: "quit", value: 7 });
    assert.equal(app.isRunning, false);
  });

  test("wake-ups are queued only off the UI thread while running", async () => {
    const loop = new ManualLoop();
    const app = createApp({ loop });
    const wake = new Notifier(app.wakeHandle);

    app.callLater(() => {}, { afterMs: 10 });
    assert.equal(wake.ready, false);

    const running = app.run();
    app.callLater(() => {}, { afterMs: 10 });
    assert.equal(wake.ready, true);
    loop.flushWatches();
    assert.equal(wake.ready, false);

    let readyAfterUiSchedule: boolean | null = null;
    app.callOnUiThread(() => {
      app.callLater(() => {}, { afterMs: 10 });
      readyAfterUiSchedule = wake.ready;
    });
    loop.flushWatches();
    loop.advance(0);
    assert.equal(readyAfterUiSchedule, false);

    app.quit();
    await running;
  });

  test("unhandled quit keys stop the app; onInput can consume them", async () => {
    const loop = new ManualLoop();
    const keys: string[] = [];
    const app = createApp({
      loop,
      onInput: (key) => {
        keys.push(key);
        return key === "Q";
      },
    });
    const running = app.run();
    loop.pressKey("x");
    loop.pressKey("Q");
    assert.equal(loop.isRunning, true);
    loop.pressKey("escape");
    assert.deepEqual(await running, { reason: "quit", value: undefined });
    assert.deepEqual(keys, ["x", "Q", "escape"]);
  });

  test("the screen and lifecycle hooks wrap the run", async () => {
    const loop = new ManualLoop();
    const log: string[] = [];
    const app = createApp({
      loop,
      screen: recordingScreen(log),
      onStart: () => log.push("onStart"),
      onStop: () => log.push("onStop"),
    });
    const running = app.run();
    loop.advance(0);
    app.quit();
    await running;
    assert.deepEqual(log, ["start", "onStart", "render", "onStop", "stop"]);
  });

  test("run twice rejects with SKEIN_INVALID_STATE", async () => {
    const loop = new ManualLoop();
    const app = createApp({ loop });
    const running = app.run();
    await assert.rejects(app.run(), (err: unknown) => isSkeinError(err, "SKEIN_INVALID_STATE"));
    app.quit();
    await running;
  });

  test("dispose closes the event queue", async () => {
    const app = createApp({ loop: new ManualLoop() });
    app.autoRefresh = 10;
    app.dispose();
    assert.equal(app.autoRefresh, 0);
    assert.throws(() => app.injectEvent("late"), (err: unknown) =>
      isSkeinError(err, "SKEIN_RESOURCE_CLOSED"),
    );
    await assert.rejects(app.run(), (err: unknown) => isSkeinError(err, "SKEIN_RESOURCE_CLOSED"));
  });
});

describe("app/createApp workers", () => {
  test("workers are created unstarted and talk to the UI through their context", async () => {
    const loop = new ManualLoop();
    const seen: string[] = [];
    const app = createApp<string>({ loop, onEvent: (event) => seen.push(`event:${event}`) });
    const running = app.run();
    const worker = app.createWorker(
      (ui, count: number) => {
        ui.call((n: number) => seen.push(`call:${String(n)}:${String(app.isUiThread())}`), count);
        ui.injectEvent("done");
        return count * 2;
      },
      21,
    );
    assert.equal(worker.state, "created");
    assert.equal(worker.daemon, false);
    worker.start();
    await worker.join();
    assert.equal(worker.result, 42);
    loop.advance(0);
    assert.deepEqual(seen, ["call:21:true", "event:done"]);
    app.quit();
    await running;
  });

  test("worker bodies run in their own thread context", async () => {
    const app = createApp({ loop: new ManualLoop() });
    const worker = app.createWorker(() => currentThread());
    worker.start();
    await worker.join();
    assert.equal(worker.result, worker);
  });

  test("daemons are asked to stop when run() returns", async () => {
    const loop = new ManualLoop();
    const app = createApp({ loop });
    const daemon = app.createDaemon(async (ui) => {
      while (!ui.isStopRequested()) {
        await new Promise<void>((resolve) => setTimeout(resolve, 1));
      }
      return "stopped";
    });
    assert.equal(daemon.daemon, true);
    const running = app.run();
    daemon.start();
    app.quit();
    await running;
    assert.equal(daemon.isStopRequested, true);
    assert.equal(await daemon.join(1000), true);
    assert.equal(daemon.result, "stopped");
  });

  test("createThread honours name and threadFactory", async () => {
    const app = createApp({ loop: new ManualLoop() });
    const names: string[] = [];
    const thread = app.createThread(
      {
        name: "fetcher",
        threadFactory: (opts) => {
          names.push(opts.name ?? "");
          return new CancellableThread({ target: opts.target, name: opts.name, daemon: opts.daemon });
        },
      },
      () => 1,
    );
    assert.deepEqual(names, ["fetcher"]);
    assert.equal(thread.name, "fetcher");
    thread.start();
    await thread.join();
    assert.equal(thread.result, 1);
  });
});
