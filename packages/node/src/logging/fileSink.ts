import { appendFileSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";
import { type LogSink, setLogSink } from "@skein-tui/core";

export function createFileLogSink(path: string): LogSink {
  mkdirSync(dirname(path), { recursive: true });
  return (line) => {
    appendFileSync(path, `${line}\n`, "utf8");
  };
}

/**
 * Redirects core logging to the file named by SKEIN_LOG_FILE, keeping log
 * records off the terminal the UI draws on. Returns the path, or null when
 * the variable is unset.
 */
export function installLogFileFromEnv(env: NodeJS.ProcessEnv = process.env): string | null {
  const path = env.SKEIN_LOG_FILE?.trim();
  if (path === undefined || path.length === 0) return null;
  setLogSink(createFileLogSink(path));
  return path;
}
