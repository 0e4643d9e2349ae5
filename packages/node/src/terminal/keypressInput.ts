/**
 * Keyboard input through node:readline keypress events.
 *
 * Keys are reported as names: printable characters as themselves ("q", "Q"),
 * special keys by readline's name ("escape", "up", "return"), and modified
 * keys as "ctrl+<name>" / "meta+<name>".
 */

import { emitKeypressEvents } from "node:readline";
import { ReadStream } from "node:tty";
import type { InputSource } from "@skein-tui/core";

export type KeypressKey = Readonly<{
  name?: string;
  sequence?: string;
  ctrl?: boolean;
  meta?: boolean;
  shift?: boolean;
}>;

export type KeypressInputOptions = Readonly<{
  input?: NodeJS.ReadableStream;
  /** Put a TTY input into raw mode while started. Default: true. */
  rawMode?: boolean;
}>;

function isPrintable(str: string): boolean {
  return str.length === 1 && str >= " " && str !== "\u007f";
}

export function keyNameOf(str: string | undefined, key: KeypressKey | undefined): string | null {
  const name = key?.name;
  if (name !== undefined && name.length > 0) {
    if (key?.ctrl === true) return `ctrl+${name}`;
    if (key?.meta === true) return `meta+${name}`;
  }
  if (str !== undefined && isPrintable(str)) return str;
  if (name !== undefined && name.length > 0) return name;
  if (str !== undefined && str.length > 0) return str;
  return null;
}

export function createKeypressInput(opts: KeypressInputOptions = {}): InputSource {
  const input = opts.input ?? process.stdin;
  return Object.freeze({
    start: (emit: (key: string) => void) => {
      emitKeypressEvents(input);
      const tty = opts.rawMode !== false && input instanceof ReadStream && input.isTTY ? input : null;
      const wasRaw = tty?.isRaw ?? false;
      tty?.setRawMode(true);
      const onKeypress = (str: string | undefined, key: KeypressKey | undefined): void => {
        const keyName = keyNameOf(str, key);
        if (keyName !== null) emit(keyName);
      };
      input.on("keypress", onKeypress);
      input.resume();
      return () => {
        input.off("keypress", onKeypress);
        tty?.setRawMode(wasRaw);
        input.pause();
      };
    },
  });
}
