/**
 * packages/core/src/widgets/button.ts — Focusable push button.
 *
 * Enter or Space presses the button.
 */

import type { UiContext } from "../app/context.js";
import type { KeyEvent } from "../input/keys.js";
import { measureTextCells, truncateWithEllipsis } from "../layout/textMeasure.js";
import type { PaintContext } from "../renderer/paint.js";
import { type NodeProps, UiNode } from "../tree/node.js";

export type ButtonProps = NodeProps &
  Readonly<{
    label: string;
    onPress?: (ctx: UiContext) => void;
  }>;

export class Button extends UiNode {
  label: string;
  onPress: ((ctx: UiContext) => void) | undefined;

  constructor(props: ButtonProps) {
    super({ height: 1, width: measureTextCells(props.label) + 4, focusable: true, ...props });
    this.label = props.label;
    this.onPress = props.onPress;
  }

  override handleInput(ctx: UiContext, key: KeyEvent): boolean {
    if (key.ctrl || key.alt) return false;
    if (key.name !== "enter" && key.name !== "space") return false;
    this.onPress?.(ctx);
    return true;
  }

  override render(ctx: PaintContext): void {
    const style = this.isFocused
      ? ({ fg: "bg", bg: "primary" } as const)
      : ({ fg: "fg", bg: "surface" } as const);
    ctx.fill(this.rect, style);
    const text = truncateWithEllipsis(this.label, Math.max(0, this.width - 2));
    const offset = Math.floor((this.width - measureTextCells(text)) / 2);
    ctx.drawText(this.x + offset, this.y, text, style);
  }
}
