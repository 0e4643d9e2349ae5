/**
 * Full-repaint terminal screen: switches to the alternate buffer, hides the
 * cursor and redraws the text returned by `view()` whenever it changes.
 */

import type { Screen } from "@skein-tui/core";

const CSI = "\u001b[";

export const ENTER_ALT_SCREEN = `${CSI}?1049h${CSI}?25l`;
export const LEAVE_ALT_SCREEN = `${CSI}?25h${CSI}?1049l`;
export const CLEAR_AND_HOME = `${CSI}H${CSI}2J`;

export type TerminalScreenOptions = Readonly<{
  view: () => string;
  output?: NodeJS.WritableStream;
  /** Default: true. */
  alternateBuffer?: boolean;
}>;

export type TerminalScreen = Screen &
  Readonly<{
    lastFrame: () => string | null;
  }>;

export function createTerminalScreen(opts: TerminalScreenOptions): TerminalScreen {
  const output = opts.output ?? process.stdout;
  const alternateBuffer = opts.alternateBuffer !== false;
  let lastFrame: string | null = null;

  return Object.freeze({
    start: () => {
      lastFrame = null;
      if (alternateBuffer) output.write(ENTER_ALT_SCREEN);
    },
    render: () => {
      const frame = opts.view();
      if (frame === lastFrame) return;
      lastFrame = frame;
      output.write(CLEAR_AND_HOME + frame.split("\n").join("\r\n"));
    },
    stop: () => {
      if (alternateBuffer) output.write(LEAVE_ALT_SCREEN);
    },
    lastFrame: () => lastFrame,
  });
}
