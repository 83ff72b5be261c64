/**
 * packages/core/src/renderer/diff.ts — Back/front buffer diff to ANSI output.
 *
 * Emission rules:
 *   - unchanged cells emit nothing (unless a full repaint is pending)
 *   - cursor position is emitted only when the previous emitted cell of the
 *     row is not directly to the left
 *   - colors are emitted only when they differ from the last emitted colors
 *   - a wide lead cell advances the cursor by 2; its placeholder is not written
 */

import {
  BEGIN_SYNCHRONIZED_UPDATE,
  END_SYNCHRONIZED_UPDATE,
  RESET_SGR,
  cursorTo,
  sgrColors,
} from "../terminal/ansi.js";
import type { Rgb24 } from "../theme/color.js";
import { cellsEqual } from "./cell.js";
import type { FrameBuffer } from "./frameBuffer.js";

export type DiffResult = Readonly<{
  /** ANSI bytes to write; "" when nothing changed. */
  output: string;
  changedCells: number;
  full: boolean;
}>;

export type DiffOptions = Readonly<{
  /** Wrap non-empty output in synchronized-update markers. */
  synchronized?: boolean;
}>;

export function diffFrame(buffer: FrameBuffer, opts: DiffOptions = {}): DiffResult {
  const cols = buffer.cols;
  const rows = buffer.rows;
  const back = buffer.backCells;
  const front = buffer.frontCells;
  const full = buffer.needsFullRepaint;

  let out = "";
  let changedCells = 0;
  let lastFg: Rgb24 | null = null;
  let lastBg: Rgb24 | null = null;

  for (let y = 0; y < rows; y++) {
    // Column the terminal cursor sits on after the last write in this row.
    let cursorX = -1;
    for (let x = 0; x < cols; x++) {
      const i = y * cols + x;
      const cell = back[i];
      const prev = front[i];
      if (cell === undefined || prev === undefined) continue;

      if (cell.width === 0) {
        // Placeholder: written together with its lead cell.
        if (!cellsEqual(cell, prev)) buffer.commitCell(i);
        continue;
      }
      if (!full && cellsEqual(cell, prev)) continue;

      if (cursorX !== x) out += cursorTo(x, y);
      out += sgrColors(cell.fg, cell.bg, lastFg, lastBg);
      lastFg = cell.fg;
      lastBg = cell.bg;
      out += cell.char;
      buffer.commitCell(i);
      changedCells++;

      if (cell.width === 2 && x + 1 < cols) {
        buffer.commitCell(i + 1);
        cursorX = x + 2;
        x++;
      } else {
        cursorX = x + 1;
      }
    }
  }

  if (full) buffer.markRepainted();
  if (out.length === 0) return Object.freeze({ output: "", changedCells: 0, full });

  out += RESET_SGR;
  if (opts.synchronized === true) out = `${BEGIN_SYNCHRONIZED_UPDATE}${out}${END_SYNCHRONIZED_UPDATE}`;
  return Object.freeze({ output: out, changedCells, full });
}
