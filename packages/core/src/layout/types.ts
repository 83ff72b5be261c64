/**
 * packages/core/src/layout/types.ts — Layout primitive type definitions.
 *
 * All coordinates are absolute terminal cell units.
 */

/** Rectangle with position (x,y) and dimensions (w,h) in terminal cells. */
export type Rect = Readonly<{ x: number; y: number; w: number; h: number }>;

/** Size dimensions (width and height) in terminal cells. */
export type Size = Readonly<{ w: number; h: number }>;

/** Stacking direction of a StackPanel. */
export type Orientation = "vertical" | "horizontal";

/** Per-edge spacing in cells. */
export type Insets = Readonly<{ top: number; right: number; bottom: number; left: number }>;

/** Padding shorthand: one value for every edge, or explicit edges. */
export type InsetsInput = number | Partial<Insets>;

export const ZERO_INSETS: Insets = Object.freeze({ top: 0, right: 0, bottom: 0, left: 0 });

function cellCount(v: number | undefined): number {
  if (v === undefined || !Number.isFinite(v)) return 0;
  return Math.max(0, Math.floor(v));
}

export function resolveInsets(input: InsetsInput | undefined): Insets {
  if (input === undefined) return ZERO_INSETS;
  if (typeof input === "number") {
    const v = cellCount(input);
    return Object.freeze({ top: v, right: v, bottom: v, left: v });
  }
  return Object.freeze({
    top: cellCount(input.top),
    right: cellCount(input.right),
    bottom: cellCount(input.bottom),
    left: cellCount(input.left),
  });
}

export function intersectRects(a: Rect, b: Rect): Rect {
  const x = Math.max(a.x, b.x);
  const y = Math.max(a.y, b.y);
  const right = Math.min(a.x + a.w, b.x + b.w);
  const bottom = Math.min(a.y + a.h, b.y + b.h);
  return Object.freeze({ x, y, w: Math.max(0, right - x), h: Math.max(0, bottom - y) });
}

export function rectContains(r: Rect, x: number, y: number): boolean {
  return x >= r.x && y >= r.y && x < r.x + r.w && y < r.y + r.h;
}
