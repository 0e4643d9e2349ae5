import assert from "node:assert/strict";
import { mkdtempSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import test from "node:test";
import { createLogger, setLogLevel, setLogSink } from "@skein-tui/core";
import { createFileLogSink, installLogFileFromEnv } from "../logging/fileSink.js";

function withTempDir(fn: (dir: string) => void): void {
  const dir = mkdtempSync(join(tmpdir(), "skein-log-"));
  try {
    fn(dir);
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }
}

test("file sink creates the directory and appends one line per record", () => {
  withTempDir((dir) => {
    const path = join(dir, "nested", "app.ndjson");
    const sink = createFileLogSink(path);
    sink('{"n":1}');
    sink('{"n":2}');
    assert.equal(readFileSync(path, "utf8"), '{"n":1}\n{"n":2}\n');
  });
});

test("installLogFileFromEnv ignores an unset or blank variable", () => {
  assert.equal(installLogFileFromEnv({}), null);
  assert.equal(installLogFileFromEnv({ SKEIN_LOG_FILE: "  " }), null);
});

test("installLogFileFromEnv routes core logging to the named file", () => {
  withTempDir((dir) => {
    const path = join(dir, "skein.log");
    const previousSink = setLogSink(null);
    const previousLevel = setLogLevel("warn");
    try {
      assert.equal(installLogFileFromEnv({ SKEIN_LOG_FILE: path }), path);
      createLogger("fileSink-test").warn("disk almost full", { freeMb: 12 });
    } finally {
      setLogSink(previousSink);
      setLogLevel(previousLevel);
    }
    const lines = readFileSync(path, "utf8").trimEnd().split("\n");
    assert.equal(lines.length, 1);
    const record: unknown = JSON.parse(lines[0] ?? "");
    assert.ok(typeof record === "object" && record !== null);
    assert.deepEqual(
      { ...record, ts: 0 },
      { ts: 0, level: "warn", scope: "fileSink-test", msg: "disk almost full", freeMb: 12 },
    );
  });
});
