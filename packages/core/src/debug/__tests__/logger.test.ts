import { assert, describe, test } from "@skein-tui/testkit";
import { createLogger, getLogLevel, parseLogLevel, setLogLevel, setLogSink } from "../logger.js";

function capture(run: (lines: string[]) => void): void {
  const lines: string[] = [];
  const previousSink = setLogSink((line) => lines.push(line));
  const previousLevel = getLogLevel();
  try {
    run(lines);
  } finally {
    setLogSink(previousSink);
    setLogLevel(previousLevel);
  }
}

function parse(line: string | undefined): Record<string, unknown> {
  const value: unknown = JSON.parse(line ?? "null");
  assert.ok(value !== null && typeof value === "object" && !Array.isArray(value));
  return Object.fromEntries(Object.entries(value));
}

describe("debug/logger", () => {
  test("parseLogLevel accepts known levels case-insensitively", () => {
    assert.equal(parseLogLevel(" DEBUG "), "debug");
    assert.equal(parseLogLevel("silent"), "silent");
    assert.equal(parseLogLevel("verbose"), null);
    assert.equal(parseLogLevel(undefined), null);
  });

  test("records are single NDJSON lines with scope and fields", () => {
    capture((lines) => {
      setLogLevel("debug");
      createLogger("loop").info("started", { thread: "ui-1", count: 2n });
      assert.equal(lines.length, 1);
      const record = parse(lines[0]);
      assert.equal(typeof record.ts, "string");
      assert.equal(record.level, "info");
      assert.equal(record.scope, "loop");
      assert.equal(record.msg, "started");
      assert.equal(record.thread, "ui-1");
      assert.equal(record.count, "2");
    });
  });

  test("records below the threshold are dropped", () => {
    capture((lines) => {
      setLogLevel("warn");
      const log = createLogger("app");
      log.debug("hidden");
      log.info("hidden");
      log.warn("shown");
      log.error("shown too");
      assert.deepEqual(
        lines.map((line) => parse(line).level),
        ["warn", "error"],
      );
      assert.equal(log.enabled("info"), false);
      assert.equal(log.enabled("error"), true);
      setLogLevel("silent");
      log.error("muted");
      assert.equal(lines.length, 2);
    });
  });

  test("errors are serialized with name and message", () => {
    capture((lines) => {
      setLogLevel("error");
      createLogger("thread").error("thread body failed", { error: new TypeError("bad input") });
      const error = parse(lines[0]).error;
      assert.ok(error !== null && typeof error === "object");
      assert.equal("name" in error ? error.name : undefined, "TypeError");
      assert.equal("message" in error ? error.message : undefined, "bad input");
    });
  });

  test("unserializable fields degrade to a record with logError", () => {
    capture((lines) => {
      setLogLevel("warn");
      const cyclic: { self?: unknown } = {};
      cyclic.self = cyclic;
      createLogger("app").warn("odd", { cyclic });
      const record = parse(lines[0]);
      assert.equal(record.msg, "odd");
      assert.equal(typeof record.logError, "string");
      assert.equal("cyclic" in record, false);
    });
  });
});
