/**
 * packages/core/src/widgets/box.ts — Bordered, titled stack container.
 *
 * The border takes one cell on each side, inside the rect and outside the
 * padding. The border switches to the focus color while a descendant holds
 * focus.
 */

import { StackPanel, type StackPanelProps } from "../layout/stackPanel.js";
import { type InsetsInput, resolveInsets } from "../layout/types.js";
import type { BorderStyle, PaintColor, PaintContext } from "../renderer/paint.js";
import { walkAll } from "../tree/traversal.js";

export type BoxProps = StackPanelProps &
  Readonly<{
    title?: string;
    border?: BorderStyle | "none";
    borderColor?: PaintColor;
  }>;

function withBorder(padding: InsetsInput | undefined, border: boolean): InsetsInput {
  const p = resolveInsets(padding);
  if (!border) return p;
  return { top: p.top + 1, right: p.right + 1, bottom: p.bottom + 1, left: p.left + 1 };
}

export class Box extends StackPanel {
  title: string;
  readonly border: BorderStyle | "none";
  borderColor: PaintColor;

  constructor(props: BoxProps = {}) {
    const border = props.border ?? "single";
    super({ ...props, padding: withBorder(props.padding, border !== "none") });
    this.title = props.title ?? "";
    this.border = border;
    this.borderColor = props.borderColor ?? "border";
  }

  hasFocusWithin(): boolean {
    let found = false;
    walkAll(this, (n) => {
      if (n.isFocused) found = true;
    });
    return found;
  }

  override render(ctx: PaintContext): void {
    super.render(ctx);
    if (this.border === "none") return;
    ctx.drawBorder(this.rect, {
      style: this.border,
      fg: this.hasFocusWithin() ? "focus" : this.borderColor,
      ...(this.title.length > 0 ? { title: this.title } : {}),
    });
  }
}
