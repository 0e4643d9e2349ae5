/**
 * @skein-tui/node
 *
 * Node.js host for @skein-tui/core: terminal screen, keypress input, file
 * logging and worker_threads bridging.
 */

import { type App, type CreateAppOptions, createApp } from "@skein-tui/core";
import { installLogFileFromEnv } from "./logging/fileSink.js";
import { createKeypressInput } from "./terminal/keypressInput.js";
import { createTerminalScreen } from "./terminal/terminalScreen.js";

export { createFileLogSink, installLogFileFromEnv } from "./logging/fileSink.js";
export {
  type KeypressInputOptions,
  type KeypressKey,
  createKeypressInput,
  keyNameOf,
} from "./terminal/keypressInput.js";
export {
  CLEAR_AND_HOME,
  ENTER_ALT_SCREEN,
  LEAVE_ALT_SCREEN,
  type TerminalScreen,
  type TerminalScreenOptions,
  createTerminalScreen,
} from "./terminal/terminalScreen.js";
export {
  type WorkerMessageDecoder,
  attachWorkerEvents,
  signalWakeHandle,
} from "./worker/workerBridge.js";

export type CreateNodeAppOptions<E> = CreateAppOptions<E> &
  Readonly<{
    /** Text to paint on every redraw. Ignored when `screen` is given. */
    view?: () => string;
    stdin?: NodeJS.ReadableStream;
    stdout?: NodeJS.WritableStream;
    env?: NodeJS.ProcessEnv;
  }>;

/**
 * Creates an application wired to the process terminal. Logging goes to
 * SKEIN_LOG_FILE when set.
 */
export function createNodeApp<E = unknown>(opts: CreateNodeAppOptions<E> = {}): App<E> {
  const { view, stdin, stdout, env, ...appOptions } = opts;
  installLogFileFromEnv(env ?? process.env);
  const screen =
    opts.screen ??
    (view === undefined
      ? undefined
      : createTerminalScreen({ view, ...(stdout === undefined ? {} : { output: stdout }) }));
  const input = opts.input ?? createKeypressInput(stdin === undefined ? {} : { input: stdin });
  return createApp<E>({
    ...appOptions,
    input,
    ...(screen === undefined ? {} : { screen }),
  });
}
