/**
 * packages/core/src/debug/logger.ts — Structured NDJSON logging.
 *
 * Every record is a single JSON line: { ts, level, scope, msg, ...fields }.
 *
 * Configure with:
 *   SKEIN_LOG_LEVEL=debug|info|warn|error|silent   (default: warn)
 *
 * A terminal UI owns stdout and usually the visible stderr as well, so hosts
 * install their own sink with setLogSink() (see @skein-tui/node's file sink).
 */

export type LogLevel = "debug" | "info" | "warn" | "error";
export type LogLevelSetting = LogLevel | "silent";
export type LogFields = Readonly<Record<string, unknown>>;
export type LogSink = (line: string) => void;

export type Logger = Readonly<{
  scope: string;
  enabled: (level: LogLevel) => boolean;
  debug: (msg: string, fields?: LogFields) => void;
  info: (msg: string, fields?: LogFields) => void;
  warn: (msg: string, fields?: LogFields) => void;
  error: (msg: string, fields?: LogFields) => void;
}>;

const LEVEL_RANK: Readonly<Record<LogLevelSetting, number>> = Object.freeze({
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
});

const DEFAULT_LEVEL: LogLevelSetting = "warn";

export function parseLogLevel(raw: string | null | undefined): LogLevelSetting | null {
  if (raw === null || raw === undefined) return null;
  const value = raw.trim().toLowerCase();
  switch (value) {
    case "debug":
    case "info":
    case "warn":
    case "error":
    case "silent":
      return value;
    default:
      return null;
  }
}

let threshold: LogLevelSetting = parseLogLevel(process.env.SKEIN_LOG_LEVEL) ?? DEFAULT_LEVEL;
let sink: LogSink | null = null;

/** Installs a log sink and returns the previous one (`null` means stderr). */
export function setLogSink(next: LogSink | null): LogSink | null {
  const prev = sink;
  sink = next;
  return prev;
}

/** Changes the level threshold and returns the previous one. */
export function setLogLevel(level: LogLevelSetting): LogLevelSetting {
  const prev = threshold;
  threshold = level;
  return prev;
}

export function getLogLevel(): LogLevelSetting {
  return threshold;
}

function writeLine(line: string): void {
  if (sink !== null) {
    sink(line);
    return;
  }
  process.stderr.write(`${line}\n`);
}

function serializeValue(value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message, stack: value.stack };
  }
  if (typeof value === "bigint") return value.toString();
  return value;
}

function formatRecord(level: LogLevel, scope: string, msg: string, fields: LogFields): string {
  const record: Record<string, unknown> = {
    ts: new Date().toISOString(),
    level,
    scope,
    msg,
  };
  for (const [key, value] of Object.entries(fields)) {
    record[key] = serializeValue(value);
  }
  try {
    return JSON.stringify(record);
  } catch (err: unknown) {
    // Unserializable fields (cycles, exotic values) degrade to a bare record.
    return JSON.stringify({
      ts: record.ts,
      level,
      scope,
      msg,
      logError: err instanceof Error ? err.message : String(err),
    });
  }
}

export function createLogger(scope: string): Logger {
  const enabled = (level: LogLevel): boolean => LEVEL_RANK[level] >= LEVEL_RANK[threshold];
  const emit = (level: LogLevel, msg: string, fields: LogFields | undefined): void => {
    if (!enabled(level)) return;
    writeLine(formatRecord(level, scope, msg, fields ?? {}));
  };
  return Object.freeze({
    scope,
    enabled,
    debug: (msg: string, fields?: LogFields) => emit("debug", msg, fields),
    info: (msg: string, fields?: LogFields) => emit("info", msg, fields),
    warn: (msg: string, fields?: LogFields) => emit("warn", msg, fields),
    error: (msg: string, fields?: LogFields) => emit("error", msg, fields),
  });
}
