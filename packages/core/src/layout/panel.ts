/**
 * packages/core/src/layout/panel.ts — Base class for layout panels.
 *
 * A panel positions its children in arrange(), which the traversal calls
 * before the children are visited, so every child sees its final bounds.
 */

import type { PaintContext, PaintColor } from "../renderer/paint.js";
import { type NodeProps, UiNode } from "../tree/node.js";
import { type Insets, type InsetsInput, type Rect, resolveInsets } from "./types.js";

export type PanelProps = NodeProps &
  Readonly<{
    padding?: InsetsInput;
    /** Fill the panel rect before children paint. */
    background?: PaintColor;
  }>;

export abstract class Panel extends UiNode {
  padding: Insets;
  background: PaintColor | undefined;

  constructor(props: PanelProps = {}) {
    super(props);
    this.padding = resolveInsets(props.padding);
    this.background = props.background;
  }

  override get isLayoutPanel(): boolean {
    return true;
  }

  /** Panel rect minus padding. */
  get contentRect(): Rect {
    const p = this.padding;
    return Object.freeze({
      x: this.x + p.left,
      y: this.y + p.top,
      w: Math.max(0, this.width - p.left - p.right),
      h: Math.max(0, this.height - p.top - p.bottom),
    });
  }

  override render(ctx: PaintContext): void {
    if (this.background !== undefined) ctx.fill(this.rect, { bg: this.background });
  }
}
