/**
 * packages/core/src/widgets/label.ts — Single-line text.
 */

import { measureTextCells, truncateWithEllipsis } from "../layout/textMeasure.js";
import type { PaintContext, PaintStyle } from "../renderer/paint.js";
import { type NodeProps, UiNode } from "../tree/node.js";

export type TextAlign = "left" | "center" | "right";

export type LabelProps = NodeProps &
  Readonly<{
    text?: string;
    style?: PaintStyle;
    align?: TextAlign;
  }>;

export class Label extends UiNode {
  private value: string;
  private readonly autoWidth: boolean;
  style: PaintStyle;
  align: TextAlign;

  constructor(props: LabelProps = {}) {
    super({ height: 1, ...props });
    this.value = props.text ?? "";
    this.autoWidth = props.width === undefined;
    this.style = props.style ?? {};
    this.align = props.align ?? "left";
    if (this.autoWidth) this.width = measureTextCells(this.value);
  }

  get text(): string {
    return this.value;
  }

  /** Auto-sized labels (no width prop) grow and shrink with their text. */
  setText(text: string): void {
    this.value = text;
    if (this.autoWidth) this.width = measureTextCells(text);
  }

  override render(ctx: PaintContext): void {
    const shown = truncateWithEllipsis(this.value, this.width);
    const free = this.width - measureTextCells(shown);
    const offset = this.align === "right" ? free : this.align === "center" ? Math.floor(free / 2) : 0;
    ctx.drawText(this.x + offset, this.y, shown, this.style);
  }
}
