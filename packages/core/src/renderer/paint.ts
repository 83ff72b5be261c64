/**
 * packages/core/src/renderer/paint.ts — Drawing surface handed to render hooks.
 *
 * All drawing goes to the back buffer and is clipped to `clip` (the node's own
 * rect for tree nodes, the whole buffer for screen chrome).
 */

import { intersectRects, type Rect } from "../layout/types.js";
import type { Rgb24 } from "../theme/color.js";
import { resolveColor } from "../theme/theme.js";
import type { Theme, ThemeColorName } from "../theme/types.js";
import type { FrameBuffer } from "./frameBuffer.js";

export type PaintColor = ThemeColorName | Rgb24;

export type PaintStyle = Readonly<{
  fg?: PaintColor;
  bg?: PaintColor;
}>;

export type BorderStyle = "single" | "double" | "rounded";

type BorderGlyphs = Readonly<{
  tl: string;
  tr: string;
  bl: string;
  br: string;
  h: string;
  v: string;
}>;

const BORDER_GLYPHS: Readonly<Record<BorderStyle, BorderGlyphs>> = Object.freeze({
  single: Object.freeze({ tl: "┌", tr: "┐", bl: "└", br: "┘", h: "─", v: "│" }),
  double: Object.freeze({ tl: "╔", tr: "╗", bl: "╚", br: "╝", h: "═", v: "║" }),
  rounded: Object.freeze({ tl: "╭", tr: "╮", bl: "╰", br: "╯", h: "─", v: "│" }),
});

export class PaintContext {
  readonly buffer: FrameBuffer;
  readonly theme: Theme;
  readonly clip: Rect;

  constructor(buffer: FrameBuffer, theme: Theme, clip: Rect) {
    this.buffer = buffer;
    this.theme = theme;
    this.clip = intersectRects(clip, buffer.bounds);
  }

  color(c: PaintColor): Rgb24 {
    return resolveColor(this.theme, c);
  }

  /** Background currently in the back buffer under (x, y), or the theme bg. */
  private bgAt(x: number, y: number): Rgb24 {
    return this.buffer.getBack(x, y)?.bg ?? this.theme.colors.bg;
  }

  /** Draw text; returns the next column. Unset bg keeps what is underneath. */
  drawText(x: number, y: number, text: string, style: PaintStyle = {}): number {
    const fg = this.color(style.fg ?? "fg");
    const bg = style.bg === undefined ? this.bgAt(x, y) : this.color(style.bg);
    return this.buffer.writeText(x, y, text, fg, bg, this.clip);
  }

  fill(rect: Rect, style: PaintStyle = {}, char = " "): void {
    const area = intersectRects(rect, this.clip);
    const fg = this.color(style.fg ?? "fg");
    const bg = this.color(style.bg ?? "bg");
    this.buffer.fillBack(area, char, fg, bg);
  }

  drawBorder(
    rect: Rect,
    opts: Readonly<{ style?: BorderStyle; fg?: PaintColor; bg?: PaintColor; title?: string }> = {},
  ): void {
    if (rect.w < 2 || rect.h < 2) return;
    const g = BORDER_GLYPHS[opts.style ?? "single"];
    const style: PaintStyle = {
      fg: opts.fg ?? "border",
      ...(opts.bg === undefined ? {} : { bg: opts.bg }),
    };
    const right = rect.x + rect.w - 1;
    const bottom = rect.y + rect.h - 1;
    const inner = g.h.repeat(rect.w - 2);

    this.drawText(rect.x, rect.y, `${g.tl}${inner}${g.tr}`, style);
    this.drawText(rect.x, bottom, `${g.bl}${inner}${g.br}`, style);
    for (let y = rect.y + 1; y < bottom; y++) {
      this.drawText(rect.x, y, g.v, style);
      this.drawText(right, y, g.v, style);
    }

    const title = opts.title;
    if (title !== undefined && title.length > 0 && rect.w > 4) {
      const titleClip: Rect = { x: rect.x + 2, y: rect.y, w: rect.w - 4, h: 1 };
      const titleCtx = this.withClip(titleClip);
      titleCtx.drawText(rect.x + 2, rect.y, ` ${title} `, style);
    }
  }

  /** A context drawing into the intersection of this clip and `rect`. */
  withClip(rect: Rect): PaintContext {
    return new PaintContext(this.buffer, this.theme, intersectRects(this.clip, rect));
  }
}
