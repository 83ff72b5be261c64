/**
 * packages/core/src/renderer/cell.ts — Frame buffer cell values.
 *
 * A wide grapheme occupies its lead cell (width 2) and a blank placeholder cell
 * to its right (width 0). Cells are frozen and replaced wholesale on write.
 */

import type { Rgb24 } from "../theme/color.js";

export type CellWidth = 0 | 1 | 2;

export type Cell = Readonly<{
  char: string;
  fg: Rgb24;
  bg: Rgb24;
  /** 1 for narrow, 2 for a wide lead cell, 0 for a wide placeholder. */
  width: CellWidth;
}>;

export function createCell(char: string, fg: Rgb24, bg: Rgb24, width: CellWidth = 1): Cell {
  return Object.freeze({ char, fg, bg, width });
}

export function blankCell(fg: Rgb24, bg: Rgb24): Cell {
  return createCell(" ", fg, bg, 1);
}

export function cellsEqual(a: Cell, b: Cell): boolean {
  return a.char === b.char && a.fg === b.fg && a.bg === b.bg && a.width === b.width;
}
