import { assert, describe, test } from "@skein-tui/testkit";
import { isSkeinError } from "../../errors.js";
import { Notifier } from "../notifier.js";

describe("concurrency/Notifier", () => {
  test("drain consumes every pending notification", () => {
    const notifier = new Notifier();
    assert.equal(notifier.ready, false);
    notifier.notify();
    notifier.notify();
    notifier.notify();
    assert.equal(notifier.ready, true);
    assert.equal(notifier.drain(), 3);
    assert.equal(notifier.ready, false);
    assert.equal(notifier.drain(), 0);
  });

  test("waitReady resolves true when notified later", async () => {
    const notifier = new Notifier();
    const waiting = notifier.waitReady(1000);
    setTimeout(() => notifier.notify(), 5);
    assert.equal(await waiting, true);
  });

  test("waitReady resolves immediately when already ready", async () => {
    const notifier = new Notifier();
    notifier.notify();
    assert.equal(await notifier.waitReady(), true);
  });

  test("waitReady resolves false on timeout", async () => {
    const notifier = new Notifier();
    assert.equal(await notifier.waitReady(10), false);
  });

  test("close releases waiters and rejects further notifications", async () => {
    const notifier = new Notifier();
    const waiting = notifier.waitReady();
    notifier.close();
    assert.equal(await waiting, false);
    assert.equal(notifier.closed, true);
    assert.throws(
      () => notifier.notify(),
      (err: unknown) => isSkeinError(err, "SKEIN_RESOURCE_CLOSED"),
    );
    assert.equal(notifier.drain(), 0);
    notifier.close();
    assert.equal(notifier.closed, true);
  });

  test("fromHandle attaches to the same notifier", () => {
    const notifier = new Notifier();
    const remote = Notifier.fromHandle(notifier.handle);
    remote.notify();
    assert.equal(notifier.ready, true);
    assert.equal(notifier.drain(), 1);
    notifier.close();
    assert.equal(remote.closed, true);
  });

  test("a handle of the wrong size is rejected", () => {
    assert.throws(
      () => new Notifier(new SharedArrayBuffer(4)),
      (err: unknown) => isSkeinError(err, "SKEIN_INVALID_ARGUMENT"),
    );
  });
});
