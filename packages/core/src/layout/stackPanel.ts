/**
 * packages/core/src/layout/stackPanel.ts — Sequential stacking layout.
 *
 * Children are placed one after another along the orientation axis from the
 * content origin, each advancing the cursor by its own size plus `spacing`.
 * Hidden children are skipped and reserve no space. The cross-axis size is
 * clipped to the content size, or stretched to it with `stretch: true`.
 *
 * A child's requested cross size survives clipping: it is remembered until
 * something other than arrange() resizes the child, so a panel that shrinks
 * and grows again gives its children their old size back.
 */

import type { UiNode } from "../tree/node.js";
import type { Orientation, Size } from "./types.js";
import { Panel, type PanelProps } from "./panel.js";

type CrossSize = Readonly<{ requested: number; laidOut: Size }>;

export type StackPanelProps = PanelProps &
  Readonly<{
    orientation?: Orientation;
    spacing?: number;
    stretch?: boolean;
  }>;

export class StackPanel extends Panel {
  orientation: Orientation;
  spacing: number;
  stretch: boolean;
  private readonly crossSizes = new Map<UiNode, CrossSize>();

  constructor(props: StackPanelProps = {}) {
    super(props);
    this.orientation = props.orientation ?? "vertical";
    this.spacing = Math.max(0, Math.floor(props.spacing ?? 0));
    this.stretch = props.stretch === true;
  }

  override arrange(): void {
    const content = this.contentRect;
    const vertical = this.orientation === "vertical";
    let cursor = vertical ? content.y : content.x;

    for (const child of this.children) {
      if (!child.visible) continue;
      const requested = this.requestedCrossSize(child, vertical);
      if (vertical) {
        const w = this.stretch ? content.w : Math.min(requested, content.w);
        child.setPosition(content.x, cursor);
        child.setSize(w, child.height);
        cursor += child.height + this.spacing;
      } else {
        const h = this.stretch ? content.h : Math.min(requested, content.h);
        child.setPosition(cursor, content.y);
        child.setSize(child.width, h);
        cursor += child.width + this.spacing;
      }
      this.crossSizes.set(child, { requested, laidOut: { w: child.width, h: child.height } });
    }
  }

  private requestedCrossSize(child: UiNode, vertical: boolean): number {
    const current = vertical ? child.width : child.height;
    const last = this.crossSizes.get(child);
    if (last === undefined) return current;
    const untouched = child.width === last.laidOut.w && child.height === last.laidOut.h;
    return untouched ? last.requested : current;
  }

  override removeChild(child: UiNode): boolean {
    this.crossSizes.delete(child);
    return super.removeChild(child);
  }

  override clearChildren(): void {
    this.crossSizes.clear();
    super.clearChildren();
  }

  /** Main-axis extent the visible children occupy, including padding. */
  measureMainAxis(): number {
    const vertical = this.orientation === "vertical";
    let total = 0;
    let count = 0;
    for (const child of this.children) {
      if (!child.visible) continue;
      total += vertical ? child.height : child.width;
      count++;
    }
    const spacing = count > 1 ? (count - 1) * this.spacing : 0;
    const p = this.padding;
    return total + spacing + (vertical ? p.top + p.bottom : p.left + p.right);
  }
}
