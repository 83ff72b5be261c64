/**
 * packages/core/src/runtime/screen.ts — Screen base class.
 *
 * A screen is the root node of one navigation entry. It fills the viewport;
 * its children are composed by the renderer, and renderChrome() is the only
 * place that draws outside the tree walk.
 */

import type { UiContext } from "../app/context.js";
import type { Size } from "../layout/types.js";
import type { PaintContext } from "../renderer/paint.js";
import { type NodeProps, UiNode } from "../tree/node.js";

export type ScreenProps = NodeProps &
  Readonly<{
    title?: string;
  }>;

export class Screen extends UiNode {
  title: string;

  constructor(props: ScreenProps = {}) {
    super(props);
    this.title = props.title ?? "";
  }

  /** Runs when the screen becomes current through push or replace. */
  init(_ctx: UiContext): void {}

  /** Direct drawing under the component tree (headers, footers, frames). */
  renderChrome(_ctx: PaintContext): void {}

  onExit(_ctx: UiContext): void {}

  onResume(_ctx: UiContext): void {}

  /** Size the children for the viewport; called before every frame. */
  layout(_viewport: Size): void {}

  override placeRoot(viewport: Size): void {
    this.setBounds({ x: 0, y: 0, w: viewport.w, h: viewport.h });
    this.layout(viewport);
  }
}
