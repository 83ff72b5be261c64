/**
 * packages/core/src/backend.ts — Terminal backend contract.
 *
 * A backend owns the terminal: it enters and leaves the alternate screen,
 * decodes raw input into key events on its own read path, and accepts the
 * renderer's ANSI output. The frame loop never touches the terminal directly.
 */

import type { KeyEvent } from "./input/keys.js";

export type TerminalSize = Readonly<{
  cols: number;
  rows: number;
}>;

export type Unsubscribe = () => void;

export interface TerminalBackend {
  /** Enter raw mode and the alternate screen; begin reading input. */
  start(): Promise<void>;

  /**
   * Restore terminal modes, leave the alternate screen, show the cursor and
   * stop reading. Must be safe to call more than once.
   */
  stop(): Promise<void>;

  /** Write one frame of ANSI output. */
  write(output: string): void;

  size(): TerminalSize;

  onInput(listener: (key: KeyEvent) => void): Unsubscribe;

  onResize(listener: (size: TerminalSize) => void): Unsubscribe;
}
