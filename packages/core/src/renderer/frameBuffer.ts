/**
 * packages/core/src/renderer/frameBuffer.ts — Double-buffered cell grid.
 *
 * Invariants:
 *   - front mirrors what the terminal currently shows
 *   - back is composed freely; cells reach front only when the diff emits them
 *   - a wide lead cell is always followed by its placeholder (and vice versa)
 */

import { invalidProps } from "../errors.js";
import { graphemeWidth, splitGraphemes } from "../layout/textMeasure.js";
import type { Rect } from "../layout/types.js";
import type { Rgb24 } from "../theme/color.js";
import { type Cell, blankCell, createCell } from "./cell.js";

const DEFAULT_FG: Rgb24 = 0xffffff;
const DEFAULT_BG: Rgb24 = 0x000000;

/** Back cells copied out by saveRegion(). */
export type SavedRegion = Readonly<{
  rect: Rect;
  cols: number;
  rows: number;
  cells: readonly Cell[];
}>;

function requireDimension(name: string, v: number): number {
  if (!Number.isInteger(v) || v < 0) invalidProps(`${name} must be a non-negative integer`);
  return v;
}

export class FrameBuffer {
  private widthCells: number;
  private heightCells: number;
  private front: Cell[];
  private back: Cell[];
  private forceFull = true;

  constructor(cols: number, rows: number) {
    this.widthCells = requireDimension("cols", cols);
    this.heightCells = requireDimension("rows", rows);
    this.front = this.allocate();
    this.back = this.allocate();
  }

  get cols(): number {
    return this.widthCells;
  }

  get rows(): number {
    return this.heightCells;
  }

  /** True until the next diff has repainted every cell. */
  get needsFullRepaint(): boolean {
    return this.forceFull;
  }

  get bounds(): Rect {
    return Object.freeze({ x: 0, y: 0, w: this.widthCells, h: this.heightCells });
  }

  private allocate(): Cell[] {
    const blank = blankCell(DEFAULT_FG, DEFAULT_BG);
    return new Array<Cell>(this.widthCells * this.heightCells).fill(blank);
  }

  private indexOf(x: number, y: number): number {
    if (x < 0 || y < 0 || x >= this.widthCells || y >= this.heightCells) return -1;
    return y * this.widthCells + x;
  }

  /** Reallocate both grids; the next frame repaints everything. */
  resize(cols: number, rows: number): void {
    const nextCols = requireDimension("cols", cols);
    const nextRows = requireDimension("rows", rows);
    if (nextCols === this.widthCells && nextRows === this.heightCells) return;
    this.widthCells = nextCols;
    this.heightCells = nextRows;
    this.front = this.allocate();
    this.back = this.allocate();
    this.forceFull = true;
  }

  /** Request a full repaint on the next diff (after resize or a recovered error). */
  invalidate(): void {
    this.forceFull = true;
  }

  /** Called by the diff once a full repaint has been emitted. */
  markRepainted(): void {
    this.forceFull = false;
  }

  clearBack(fg: Rgb24, bg: Rgb24): void {
    this.back.fill(blankCell(fg, bg));
  }

  getBack(x: number, y: number): Cell | undefined {
    const i = this.indexOf(x, y);
    return i < 0 ? undefined : this.back[i];
  }

  getFront(x: number, y: number): Cell | undefined {
    const i = this.indexOf(x, y);
    return i < 0 ? undefined : this.front[i];
  }

  /** Row-major cell arrays; the diff reads back and writes front. */
  get backCells(): readonly Cell[] {
    return this.back;
  }

  get frontCells(): readonly Cell[] {
    return this.front;
  }

  commitCell(index: number): void {
    const cell = this.back[index];
    if (cell !== undefined) this.front[index] = cell;
  }

  /**
   * Write one cell into back, repairing any wide pair it cuts in half.
   */
  setBack(x: number, y: number, cell: Cell): void {
    const i = this.indexOf(x, y);
    if (i < 0) return;
    const prev = this.back[i];
    if (prev !== undefined) {
      if (prev.width === 0 && x > 0) {
        const lead = this.back[i - 1];
        if (lead !== undefined && lead.width === 2) this.back[i - 1] = blankCell(lead.fg, lead.bg);
      } else if (prev.width === 2 && cell.width !== 2 && x + 1 < this.widthCells) {
        const tail = this.back[i + 1];
        if (tail !== undefined && tail.width === 0) this.back[i + 1] = blankCell(tail.fg, tail.bg);
      }
    }
    this.back[i] = cell;
  }

  fillBack(rect: Rect, char: string, fg: Rgb24, bg: Rgb24): void {
    const clipped = clipToBuffer(rect, this.widthCells, this.heightCells);
    const cell = createCell(char, fg, bg, 1);
    for (let y = clipped.y; y < clipped.y + clipped.h; y++) {
      for (let x = clipped.x; x < clipped.x + clipped.w; x++) this.setBack(x, y, cell);
    }
  }

  /**
   * Write text into back starting at (x, y), clipped to the buffer and `clip`.
   * Returns the next writable column.
   */
  writeText(x: number, y: number, text: string, fg: Rgb24, bg: Rgb24, clip?: Rect): number {
    const area = clipToBuffer(clip ?? this.bounds, this.widthCells, this.heightCells);
    const rowVisible = y >= area.y && y < area.y + area.h;
    const right = area.x + area.w;
    let col = x;

    for (const g of splitGraphemes(text)) {
      const w = graphemeWidth(g);
      if (w === 0) continue;
      if (col >= right) {
        col += w;
        continue;
      }
      if (w === 2) {
        if (rowVisible && col >= area.x && col + 1 < right) {
          this.setBack(col, y, createCell(g, fg, bg, 2));
          this.setBack(col + 1, y, createCell(" ", fg, bg, 0));
        } else if (rowVisible && col >= area.x) {
          // A wide grapheme straddling the clip edge degrades to one space.
          this.setBack(col, y, createCell(" ", fg, bg, 1));
        } else if (rowVisible && col + 1 === area.x) {
          this.setBack(col + 1, y, createCell(" ", fg, bg, 1));
        }
        col += 2;
        continue;
      }
      if (rowVisible && col >= area.x) this.setBack(col, y, createCell(g, fg, bg, 1));
      col += 1;
    }
    return col;
  }

  /**
   * Copy the back cells under `rect`, widened by one column on each side so
   * wide-pair repairs at the edges are covered too.
   */
  saveRegion(rect: Rect): SavedRegion {
    const area = clipToBuffer(
      { x: rect.x - 1, y: rect.y, w: rect.w + 2, h: rect.h },
      this.widthCells,
      this.heightCells,
    );
    const cells: Cell[] = [];
    for (let y = area.y; y < area.y + area.h; y++) {
      const start = y * this.widthCells + area.x;
      cells.push(...this.back.slice(start, start + area.w));
    }
    return Object.freeze({ rect: area, cols: this.widthCells, rows: this.heightCells, cells });
  }

  /** Put saved cells back as they were; a no-op after a resize. */
  restoreRegion(saved: SavedRegion): void {
    if (saved.cols !== this.widthCells || saved.rows !== this.heightCells) return;
    const { x, y, w, h } = saved.rect;
    for (let row = 0; row < h; row++) {
      for (let col = 0; col < w; col++) {
        const cell = saved.cells[row * w + col];
        if (cell !== undefined) this.back[(y + row) * this.widthCells + x + col] = cell;
      }
    }
  }

  /** Text of one back row, placeholders omitted (test and debug aid). */
  backRowText(y: number): string {
    let out = "";
    for (let x = 0; x < this.widthCells; x++) {
      const cell = this.getBack(x, y);
      if (cell === undefined || cell.width === 0) continue;
      out += cell.char;
    }
    return out;
  }
}

function clipToBuffer(rect: Rect, cols: number, rows: number): Rect {
  const x = Math.max(0, rect.x);
  const y = Math.max(0, rect.y);
  const right = Math.min(cols, rect.x + rect.w);
  const bottom = Math.min(rows, rect.y + rect.h);
  return Object.freeze({ x, y, w: Math.max(0, right - x), h: Math.max(0, bottom - y) });
}
